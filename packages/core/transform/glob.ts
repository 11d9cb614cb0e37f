/**
 * Path globs for transform rules.
 *
 * - `*` matches within a single segment
 * - `**` as a whole segment matches zero or more segments
 * - `{name}` captures exactly one non-empty segment (or part of one)
 */

type CaptureKind = "deep" | "star" | "name"

export interface CompiledGlob {
	pattern: string
	regex: RegExp
	captures: CaptureKind[]
}

export interface GlobMatch {
	/** Segments consumed by `**`, joined with `/`; empty when it matched nothing. */
	deep: string
	stars: string[]
	name?: string
}

const NAME_TOKEN = "{name}"
const REGEX_SPECIAL = /[.+?^$()[\]{}|\\]/

export function compileGlob(pattern: string): CompiledGlob {
	const captures: CaptureKind[] = []
	const segments = pattern.split("/")
	let source = "^"

	segments.forEach((segment, index) => {
		const last = index === segments.length - 1
		if (segment === "**") {
			captures.push("deep")
			source += last ? "(.+)" : "(?:(.+)/)?"
			return
		}

		source += compileSegment(segment, captures)
		if (!last) {
			source += "/"
		}
	})

	return { captures, pattern, regex: new RegExp(`${source}$`) }
}

export function matchGlob(glob: CompiledGlob, target: string): GlobMatch | null {
	const match = glob.regex.exec(target)
	if (!match) return null

	const result: GlobMatch = { deep: "", stars: [] }
	glob.captures.forEach((kind, index) => {
		const value = match[index + 1] ?? ""
		switch (kind) {
			case "deep":
				result.deep = value
				break
			case "star":
				result.stars.push(value)
				break
			case "name":
				result.name = value
				break
		}
	})
	return result
}

export function countNameCaptures(pattern: string): number {
	return pattern.split(NAME_TOKEN).length - 1
}

function compileSegment(segment: string, captures: CaptureKind[]): string {
	let source = ""
	let index = 0
	while (index < segment.length) {
		if (segment.startsWith(NAME_TOKEN, index)) {
			captures.push("name")
			source += "([^/]+)"
			index += NAME_TOKEN.length
			continue
		}

		const char = segment.charAt(index)
		if (char === "*") {
			captures.push("star")
			source += "([^/]*)"
		} else if (REGEX_SPECIAL.test(char)) {
			source += `\\${char}`
		} else {
			source += char
		}
		index += 1
	}
	return source
}
