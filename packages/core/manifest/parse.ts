import { parse, TomlError } from "smol-toml"
import { z } from "zod"
import { MANIFEST_FILENAME } from "../constants"
import type { AbsolutePath, BundleName } from "../types/branded"
import type { BundleManifest, Declaration } from "../types/bundle"
import {
	coerceBundleName,
	coerceGitRef,
	coerceGitUrl,
	coerceNonEmpty,
	coerceUniversalPath,
} from "../types/coerce"
import type { ParseError, Result, ValidationError } from "../types/error"

export type ManifestResult = Result<BundleManifest, ParseError | ValidationError>

const trimmedString = (label: string) =>
	z
		.string()
		.transform((value) => value.trim())
		.refine((value) => value.length > 0, {
			message: `${label} must not be empty.`,
		})

const bundleSchema = z
	.object({
		description: trimmedString("bundle.description").optional(),
		name: trimmedString("bundle.name").optional(),
		version: trimmedString("bundle.version").optional(),
	})
	.strict()

const enforceSingleRef = (value: Record<string, unknown>, ctx: z.RefinementCtx) => {
	const refs = ["tag", "branch", "rev"].filter((key) => value[key] !== undefined)
	if (refs.length > 1) {
		ctx.addIssue({
			code: z.ZodIssueCode.custom,
			message: "Only one of tag, branch, or rev may be set.",
		})
	}
}

const gitSchema = z
	.object({
		branch: trimmedString("branch").optional(),
		git: trimmedString("git"),
		path: trimmedString("path").optional(),
		rev: trimmedString("rev").optional(),
		tag: trimmedString("tag").optional(),
	})
	.strict()
	.superRefine(enforceSingleRef)

const dirSchema = z
	.object({
		path: trimmedString("path"),
	})
	.strict()

const manifestSchema = z
	.object({
		bundle: bundleSchema.optional(),
		dependencies: z.record(z.record(z.unknown())).optional(),
		platforms: z.record(z.boolean()).optional(),
	})
	.strict()

type RawDependency = z.infer<typeof gitSchema> | z.infer<typeof dirSchema>

function parseDependency(
	raw: Record<string, unknown>,
): { success: true; data: RawDependency } | { success: false; error: z.ZodError } {
	const parsed = "git" in raw ? gitSchema.safeParse(raw) : dirSchema.safeParse(raw)
	return parsed.success
		? { data: parsed.data, success: true }
		: { error: parsed.error, success: false }
}

/**
 * Parse and validate a bundle manifest. Dependency order follows the file.
 */
export function parseManifest(contents: string, sourcePath: AbsolutePath): ManifestResult {
	let data: unknown
	try {
		data = parse(contents)
	} catch (error) {
		return {
			error: {
				message:
					error instanceof TomlError
						? `Invalid TOML: ${error.message}`
						: "Invalid TOML.",
				path: sourcePath,
				rawError: error instanceof Error ? error : undefined,
				source: MANIFEST_FILENAME,
				type: "parse",
			},
			ok: false,
		}
	}

	const parsed = manifestSchema.safeParse(data)
	if (!parsed.success) {
		return {
			error: {
				field: "manifest",
				message: formatZodError(parsed.error),
				path: sourcePath,
				source: "zod",
				type: "validation",
				zodError: parsed.error,
			},
			ok: false,
		}
	}

	const dependencies = new Map<BundleName, Declaration>()
	for (const [key, raw] of Object.entries(parsed.data.dependencies ?? {})) {
		const name = coerceBundleName(key)
		if (!name) {
			return invalid(`dependencies.${key}`, `Invalid bundle name "${key}".`, sourcePath)
		}

		const field = `dependencies.${key}`
		const checked = parseDependency(raw)
		if (!checked.success) {
			return {
				error: {
					field,
					message: formatZodError(checked.error, field),
					path: sourcePath,
					source: "zod",
					type: "validation",
					zodError: checked.error,
				},
				ok: false,
			}
		}

		const declaration = coerceDeclaration(checked.data)
		if (!declaration.ok) {
			return invalid(field, declaration.error, sourcePath)
		}
		dependencies.set(name, declaration.value)
	}

	const manifest: BundleManifest = {
		dependencies,
		platforms: new Map(Object.entries(parsed.data.platforms ?? {})),
	}

	const bundle = parsed.data.bundle
	if (bundle) {
		const name = bundle.name === undefined ? null : coerceBundleName(bundle.name)
		if (bundle.name !== undefined && !name) {
			return invalid("bundle.name", `Invalid bundle name "${bundle.name}".`, sourcePath)
		}
		manifest.bundle = {}
		if (name) manifest.bundle.name = name
		const description = bundle.description ? coerceNonEmpty(bundle.description) : null
		if (description) manifest.bundle.description = description
		const version = bundle.version ? coerceNonEmpty(bundle.version) : null
		if (version) manifest.bundle.version = version
	}

	return { ok: true, value: manifest }
}

function coerceDeclaration(
	raw: RawDependency,
): { ok: true; value: Declaration } | { ok: false; error: string } {
	if ("git" in raw) {
		const url = coerceGitUrl(raw.git)
		if (!url) {
			return { error: `Invalid git url "${raw.git}".`, ok: false }
		}

		const declaration: Declaration = { type: "git", url }
		if (raw.tag || raw.branch || raw.rev) {
			const ref = coerceGitRef(raw)
			if (!ref) {
				return { error: "Invalid git ref.", ok: false }
			}
			declaration.ref = ref
		}

		if (raw.path) {
			const subpath = coerceUniversalPath(raw.path)
			if (!subpath) {
				return { error: `Invalid repository subpath "${raw.path}".`, ok: false }
			}
			declaration.path = subpath
		}
		return { ok: true, value: declaration }
	}

	const dirPath = coerceNonEmpty(raw.path)
	if (!dirPath) {
		return { error: "Directory path must not be empty.", ok: false }
	}
	return { ok: true, value: { path: dirPath, type: "dir" } }
}

function invalid(field: string, message: string, path: AbsolutePath): ManifestResult {
	return {
		error: { field, message, path, source: "manual", type: "validation" },
		ok: false,
	}
}

function formatZodError(error: z.ZodError, prefix?: string): string {
	const issues = error.issues.map((issue) => {
		const segments = [...(prefix ? [prefix] : []), ...issue.path.map(String)]
		const path = segments.length > 0 ? segments.join(".") : "manifest"
		return `${path}: ${issue.message}`
	})
	return `Invalid manifest: ${issues.join("; ")}`
}
