import path from "node:path"
import {
	builtinPlatforms,
	findPlatform,
	mergePlatforms,
	type NotFoundError,
	type ParseError,
	type Platform,
	parseStructured,
	platformFileSchema,
	type Result,
	type ValidationError,
} from "@quiver/core"
import { readOptionalFile, safeStat } from "@/io/fs"
import type { IoError, IoResult } from "@/io/types"
import type { WorkspacePaths } from "@/workspace/paths"

/** Built-in platforms with the workspace's `platforms.jsonc` applied. */
export async function loadPlatforms(
	paths: WorkspacePaths,
): Promise<Result<Platform[], IoError | ParseError | ValidationError>> {
	const builtins = builtinPlatforms()
	const file = await readOptionalFile(paths.platformOverrides)
	if (!file.ok) {
		return file
	}
	if (file.value === null) {
		return { ok: true, value: builtins }
	}

	const data = parseStructured(file.value.toString("utf8"), "json")
	if (!data.ok) {
		return { error: { ...data.error, path: paths.platformOverrides }, ok: false }
	}

	const parsed = platformFileSchema.safeParse(data.value)
	if (!parsed.success) {
		return {
			error: {
				field: "platforms",
				message: "Invalid platform overrides.",
				path: paths.platformOverrides,
				source: "zod",
				type: "validation",
				zodError: parsed.error,
			},
			ok: false,
		}
	}

	return { ok: true, value: mergePlatforms(builtins, parsed.data.platforms) }
}

/** Platforms with at least one detection marker present in the workspace root. */
export async function detectPlatforms(
	root: string,
	platforms: ReadonlyArray<Platform>,
): Promise<IoResult<Platform[]>> {
	const detected: Platform[] = []
	for (const platform of platforms) {
		for (const marker of platform.detect) {
			const stats = await safeStat(path.join(root, ...marker.split("/")))
			if (!stats.ok) {
				return stats
			}
			if (stats.value) {
				detected.push(platform)
				break
			}
		}
	}
	return { ok: true, value: detected }
}

export interface PlatformSelection {
	/** Ids given on the command line; win over everything else. */
	requested?: ReadonlyArray<string>
	/** The manifest's `[platforms]` table. */
	configured: ReadonlyMap<string, boolean>
}

/**
 * Requested ids, else the platforms the manifest enables, else detection.
 * Unknown ids are errors.
 */
export async function selectPlatforms(
	root: string,
	platforms: ReadonlyArray<Platform>,
	selection: PlatformSelection,
): Promise<Result<Platform[], IoError | NotFoundError>> {
	if (selection.requested && selection.requested.length > 0) {
		return lookupAll(platforms, selection.requested)
	}

	if (selection.configured.size > 0) {
		const enabled = [...selection.configured]
			.filter(([, on]) => on)
			.map(([id]) => id)
		return lookupAll(platforms, enabled)
	}

	return detectPlatforms(root, platforms)
}

export function lookupAll(
	platforms: ReadonlyArray<Platform>,
	ids: ReadonlyArray<string>,
): Result<Platform[], NotFoundError> {
	const selected: Platform[] = []
	for (const id of ids) {
		const platform = findPlatform(platforms, id)
		if (!platform) {
			return {
				error: {
					message: `Unknown platform "${id}".`,
					target: id,
					type: "not_found",
				},
				ok: false,
			}
		}
		if (!selected.includes(platform)) selected.push(platform)
	}
	return { ok: true, value: selected }
}
