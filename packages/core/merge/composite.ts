/**
 * Delimited per-bundle blocks inside shared text files such as AGENTS.md.
 *
 *   <!-- quiver:begin <bundle> -->
 *   ...
 *   <!-- quiver:end <bundle> -->
 */

export function blockMarkers(owner: string): { begin: string; end: string } {
	return {
		begin: `<!-- quiver:begin ${owner} -->`,
		end: `<!-- quiver:end ${owner} -->`,
	}
}

export function renderBlock(owner: string, content: string): string {
	const { begin, end } = blockMarkers(owner)
	const body = content.replace(/\s+$/, "")
	return body ? `${begin}\n${body}\n${end}` : `${begin}\n${end}`
}

/** Replaces the owner's block in place, or appends one at the end. */
export function upsertBlock(existing: string | null, owner: string, content: string): string {
	const block = renderBlock(owner, content)
	const text = existing ?? ""
	const range = findBlock(text, owner)
	if (range) {
		return `${text.slice(0, range.start)}${block}${text.slice(range.end)}`
	}

	const head = text.replace(/\s+$/, "")
	return head ? `${head}\n\n${block}\n` : `${block}\n`
}

export function removeBlock(existing: string, owner: string): string {
	const range = findBlock(existing, owner)
	if (!range) return existing

	const before = existing.slice(0, range.start).replace(/\s+$/, "")
	const after = existing.slice(range.end).replace(/^\s+/, "")
	if (before && after) return `${before}\n\n${after}`
	if (before) return `${before}\n`
	return after
}

function findBlock(text: string, owner: string): { start: number; end: number } | null {
	const { begin, end } = blockMarkers(owner)
	const start = text.indexOf(begin)
	if (start === -1) return null
	const endIndex = text.indexOf(end, start + begin.length)
	if (endIndex === -1) return null
	return { end: endIndex + end.length, start }
}
