import type { Platform } from "../types/platform"
import data from "./platforms.json" with { type: "json" }
import { platformFileSchema } from "./schema"

let builtins: Platform[] | null = null

export function builtinPlatforms(): Platform[] {
	if (builtins) return builtins

	const parsed = platformFileSchema.safeParse(data)
	if (!parsed.success) {
		throw new Error(`Built-in platform definitions are invalid: ${parsed.error.message}`)
	}
	builtins = parsed.data.platforms
	return builtins
}

/** Overrides replace the built-in platform with the same id; new ids are appended. */
export function mergePlatforms(
	base: ReadonlyArray<Platform>,
	overrides: ReadonlyArray<Platform>,
): Platform[] {
	const byId = new Map(overrides.map((platform) => [platform.id, platform]))
	const merged = base.map((platform) => byId.get(platform.id) ?? platform)
	const known = new Set(base.map((platform) => platform.id))
	for (const platform of overrides) {
		if (!known.has(platform.id)) merged.push(platform)
	}
	return merged
}

export function findPlatform(
	platforms: ReadonlyArray<Platform>,
	id: string,
): Platform | undefined {
	return platforms.find((platform) => platform.id === id)
}
