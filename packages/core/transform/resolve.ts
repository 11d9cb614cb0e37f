import path from "node:path"
import type { UniversalPath } from "../types/branded"
import type { Platform, TransformRule, TransformTarget } from "../types/platform"
import { type CompiledGlob, compileGlob, type GlobMatch, matchGlob } from "./glob"

const compiled = new Map<string, CompiledGlob>()

function globFor(pattern: string): CompiledGlob {
	const existing = compiled.get(pattern)
	if (existing) return existing
	const glob = compileGlob(pattern)
	compiled.set(pattern, glob)
	return glob
}

/**
 * Maps a universal path to its output for one platform. The first matching
 * rule wins; an empty list means the platform does not take this resource.
 */
export function resolveTransform(
	universalPath: UniversalPath,
	platform: Platform,
): TransformTarget[] {
	for (const rule of platform.rules) {
		const match = matchGlob(globFor(rule.from), universalPath)
		if (match) {
			return [{ merge: rule.merge, output: buildOutputPath(rule, match, universalPath) }]
		}
	}
	return []
}

export function buildOutputPath(
	rule: TransformRule,
	match: GlobMatch,
	universalPath: string,
): string {
	const stem = fileStem(path.posix.basename(universalPath))
	const name = match.name ?? stem
	const stars = [...match.stars]
	const segments: string[] = []

	for (const segment of rule.to.split("/")) {
		if (segment === "**") {
			if (match.deep) segments.push(match.deep)
			continue
		}

		const substituted = segment
			.replaceAll("{name}", name)
			.replace(/\*/g, () => stars.shift() ?? stem)
		if (substituted) segments.push(substituted)
	}

	const output = segments.join("/")
	return rule.extension ? applyExtension(output, rule.extension) : output
}

export function applyExtension(output: string, extension: string): string {
	const ext = extension.replace(/^\.+/, "")
	if (output.endsWith(`.${ext}`)) return output

	const slash = output.lastIndexOf("/")
	const base = output.slice(slash + 1)
	const dot = base.lastIndexOf(".")
	const stem = dot > 0 ? base.slice(0, dot) : base
	return `${output.slice(0, slash + 1)}${stem}.${ext}`
}

function fileStem(base: string): string {
	const dot = base.lastIndexOf(".")
	return dot > 0 ? base.slice(0, dot) : base
}
