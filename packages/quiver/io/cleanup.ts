import path from "node:path"
import type { IoResult } from "@/io/types"

/**
 * Walks up from each deleted file and removes directories left empty,
 * stopping at `rootDir` and at any preserved directory.
 */
export async function pruneEmptyParents(
	rootDir: string,
	deletedPaths: ReadonlyArray<string>,
	preservedDirs: ReadonlySet<string>,
	removeIfEmpty: (dir: string) => Promise<IoResult<boolean>>,
): Promise<IoResult<string[]>> {
	const root = path.resolve(rootDir)
	const candidates = new Set<string>()

	for (const deleted of deletedPaths) {
		let current = path.dirname(path.resolve(deleted))
		while (current.startsWith(`${root}${path.sep}`) && !preservedDirs.has(current)) {
			candidates.add(current)
			current = path.dirname(current)
		}
	}

	const removed: string[] = []
	const deepestFirst = [...candidates].sort((a, b) => b.length - a.length)
	for (const dir of deepestFirst) {
		const result = await removeIfEmpty(dir)
		if (!result.ok) {
			return result
		}
		if (result.value) removed.push(dir)
	}

	return { ok: true, value: removed }
}
