import {
	type AbsolutePath,
	type BundleName,
	comparePaths,
	isBundleName,
	isUniversalPath,
	type MergeStrategy,
	type ParseError,
	type Result,
	type UniversalPath,
	type ValidationError,
} from "@quiver/core"
import { z } from "zod"

export interface IndexEntry {
	platform: string
	/** Universal path of the installed resource */
	path: UniversalPath
	/** Last bundle in lock order providing the path */
	bundle: BundleName
	/** Workspace-relative output path */
	output: string
	strategy: MergeStrategy
	/** Every bundle merged into the output, in lock order; merged outputs only. */
	contributors?: BundleName[]
}

export interface WorkspaceIndex {
	version: 1
	platforms: string[]
	entries: IndexEntry[]
	/** Per merged output, its content before quiver first wrote it (null: absent). */
	baselines: Record<string, string | null>
}

const bundleName = z.string().refine(isBundleName, "Invalid bundle name.")

const entrySchema = z
	.object({
		bundle: bundleName,
		contributors: z.array(bundleName).optional(),
		output: z.string().min(1),
		path: z.string().refine(isUniversalPath, "Invalid resource path."),
		platform: z.string().min(1),
		strategy: z.enum(["replace", "shallow", "deep", "composite"]),
	})
	.strict()

const indexSchema = z
	.object({
		baselines: z.record(z.string().nullable()),
		entries: z.array(entrySchema),
		platforms: z.array(z.string().min(1)),
		version: z.literal(1),
	})
	.strict()
	.superRefine((index, ctx) => {
		const seen = new Set<string>()
		for (const entry of index.entries) {
			const key = `${entry.platform}\0${entry.path}`
			if (seen.has(key)) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					message: `Duplicate entry for ${entry.path} on ${entry.platform}.`,
					path: ["entries"],
				})
			}
			seen.add(key)
		}
	})

export function emptyIndex(): WorkspaceIndex {
	return { baselines: {}, entries: [], platforms: [], version: 1 }
}

export function isMerged(strategy: MergeStrategy): boolean {
	return strategy !== "replace"
}

export function parseIndex(
	contents: string,
	sourcePath: AbsolutePath,
): Result<WorkspaceIndex, ParseError | ValidationError> {
	let data: unknown
	try {
		data = JSON.parse(contents)
	} catch (error) {
		return {
			error: {
				message: "Invalid JSON in workspace index.",
				path: sourcePath,
				rawError: error instanceof Error ? error : undefined,
				source: "json",
				type: "parse",
			},
			ok: false,
		}
	}

	const parsed = indexSchema.safeParse(data)
	if (!parsed.success) {
		return {
			error: {
				field: "index",
				message: "Invalid workspace index.",
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

/** Fixed key order, entries sorted by platform then path, baselines by output. */
export function serializeIndex(index: WorkspaceIndex): string {
	const entries = [...index.entries].sort(compareEntries).map((entry) => {
		const output: Record<string, unknown> = {
			platform: entry.platform,
			path: entry.path,
			bundle: entry.bundle,
			output: entry.output,
			strategy: entry.strategy,
		}
		if (entry.contributors) output.contributors = [...entry.contributors]
		return output
	})

	const baselines: Record<string, string | null> = {}
	for (const key of Object.keys(index.baselines).sort(comparePaths)) {
		baselines[key] = index.baselines[key] ?? null
	}

	const output = {
		version: index.version,
		platforms: [...index.platforms],
		entries,
		baselines,
	}
	return `${JSON.stringify(output, null, 2)}\n`
}

export function compareEntries(a: IndexEntry, b: IndexEntry): number {
	return comparePaths(a.platform, b.platform) || comparePaths(a.path, b.path)
}
