import { z } from "zod"
import type { AbsolutePath } from "../types/branded"
import type { Lockfile } from "../types/bundle"
import type { ParseError, Result, ValidationError } from "../types/error"
import {
	isBundleName,
	isContentHash,
	isGitUrl,
	isNonEmpty,
	isUniversalPath,
} from "../types/guards"

const nonEmpty = z.string().refine(isNonEmpty, "Must not be empty.")

const refSchema = z
	.object({
		type: z.enum(["tag", "branch", "rev"]),
		value: nonEmpty,
	})
	.strict()

const sourceSchema = z.discriminatedUnion("type", [
	z
		.object({
			path: nonEmpty,
			revision: z.string().refine(isContentHash, "Invalid revision hash."),
			type: z.literal("dir"),
		})
		.strict(),
	z
		.object({
			path: z.string().refine(isUniversalPath, "Invalid subpath.").optional(),
			ref: refSchema.optional(),
			revision: nonEmpty,
			type: z.literal("git"),
			url: z.string().refine(isGitUrl, "Invalid git url."),
		})
		.strict(),
])

const bundleName = z.string().refine(isBundleName, "Invalid bundle name.")

const bundleSchema = z
	.object({
		dependencies: z.array(bundleName),
		description: nonEmpty.optional(),
		files: z.array(z.string().refine(isUniversalPath, "Invalid file path.")),
		hash: z.string().refine(isContentHash, "Invalid content hash."),
		name: bundleName,
		source: sourceSchema,
		version: nonEmpty.optional(),
	})
	.strict()

const lockfileSchema = z
	.object({
		bundles: z.array(bundleSchema).min(1),
		version: z.literal(1),
		workspace: bundleName,
	})
	.strict()
	.superRefine((lockfile, ctx) => {
		const last = lockfile.bundles.at(-1)
		if (last && last.name !== lockfile.workspace) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: "The workspace bundle must be the last entry.",
			})
		}
	})

export function parseLockfile(
	contents: string,
	sourcePath: AbsolutePath,
): Result<Lockfile, ParseError | ValidationError> {
	let data: unknown
	try {
		data = JSON.parse(contents)
	} catch (error) {
		return {
			error: {
				message: "Lockfile is not valid JSON.",
				path: sourcePath,
				rawError: error instanceof Error ? error : undefined,
				source: "quiver.lock",
				type: "parse",
			},
			ok: false,
		}
	}

	const parsed = lockfileSchema.safeParse(data)
	if (!parsed.success) {
		return {
			error: {
				field: "lockfile",
				message: "Lockfile has an unexpected shape.",
				path: sourcePath,
				source: "zod",
				type: "validation",
				zodError: parsed.error,
			},
			ok: false,
		}
	}

	return { ok: true, value: parsed.data }
}
