import type {
	BundleName,
	ContentHash,
	GitUrl,
	NonEmptyString,
	UniversalPath,
} from "./branded"
import type { GitRef } from "./bundle"

export function coerceNonEmpty(value: string): NonEmptyString | null {
	const trimmed = value.trim()
	if (trimmed.length === 0) return null
	return trimmed as NonEmptyString
}

const BUNDLE_NAME_INVALID_CHARS = /[/\\:\s]/

export function coerceBundleName(value: string): BundleName | null {
	const trimmed = value.trim()
	if (trimmed.length === 0) return null
	if (trimmed.startsWith(".")) return null
	if (BUNDLE_NAME_INVALID_CHARS.test(trimmed)) return null
	return trimmed as BundleName
}

/**
 * Normalizes a bundle-relative path to forward slashes.
 * Rejects absolute paths and anything escaping the bundle root.
 */
export function coerceUniversalPath(value: string): UniversalPath | null {
	const slashed = value.trim().replaceAll("\\", "/")
	if (slashed.length === 0 || slashed.startsWith("/")) return null

	const segments: string[] = []
	for (const segment of slashed.split("/")) {
		if (segment === "" || segment === ".") continue
		if (segment === "..") return null
		segments.push(segment)
	}

	if (segments.length === 0) return null
	return segments.join("/") as UniversalPath
}

const SSH_GIT_PATTERN = /^git@([^:]+):(.+?)(?:\.git)?$/
const HTTP_GIT_PATTERN = /^(https?):\/\/([^/]+)\/(.+?)(?:\.git)?\/?$/
const FILE_GIT_PATTERN = /^file:\/\/(\/.+?)\/?$/

export function coerceGitUrl(value: string): GitUrl | null {
	const trimmed = value.trim()
	if (trimmed.length === 0) return null

	const sshMatch = SSH_GIT_PATTERN.exec(trimmed)
	if (sshMatch) {
		const [, host, repoPath] = sshMatch
		return `git@${host}:${repoPath}` as GitUrl
	}

	const httpMatch = HTTP_GIT_PATTERN.exec(trimmed)
	if (httpMatch) {
		const [, scheme, host, repoPath] = httpMatch
		return `${scheme}://${host}/${repoPath}` as GitUrl
	}

	const fileMatch = FILE_GIT_PATTERN.exec(trimmed)
	if (fileMatch) {
		return `file://${fileMatch[1]}` as GitUrl
	}

	return null
}

export function coerceGitRef(options: {
	tag?: string
	branch?: string
	rev?: string
}): GitRef | null {
	const candidates: GitRef[] = []
	const tag = options.tag ? coerceNonEmpty(options.tag) : null
	const branch = options.branch ? coerceNonEmpty(options.branch) : null
	const rev = options.rev ? coerceNonEmpty(options.rev) : null
	if (tag) candidates.push({ type: "tag", value: tag })
	if (branch) candidates.push({ type: "branch", value: branch })
	if (rev) candidates.push({ type: "rev", value: rev })
	return candidates.length === 1 ? (candidates[0] ?? null) : null
}

const CONTENT_HASH_PATTERN = /^sha256:[0-9a-f]{64}$/

export function coerceContentHash(value: string): ContentHash | null {
	const trimmed = value.trim()
	if (!CONTENT_HASH_PATTERN.test(trimmed)) return null
	return trimmed as ContentHash
}
