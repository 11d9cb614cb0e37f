import type {
	BundleName,
	ContentHash,
	GitUrl,
	NonEmptyString,
	UniversalPath,
} from "./branded"
import {
	coerceBundleName,
	coerceContentHash,
	coerceGitUrl,
	coerceNonEmpty,
	coerceUniversalPath,
} from "./coerce"

export function isNonEmpty(value: string): value is NonEmptyString {
	return coerceNonEmpty(value) === value
}

export function isBundleName(value: string): value is BundleName {
	return coerceBundleName(value) !== null
}

export function isGitUrl(value: string): value is GitUrl {
	return coerceGitUrl(value) !== null
}

export function isUniversalPath(value: string): value is UniversalPath {
	return coerceUniversalPath(value) === value
}

export function isContentHash(value: string): value is ContentHash {
	return coerceContentHash(value) !== null
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value)
}
