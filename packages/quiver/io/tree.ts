import path from "node:path"
import {
	coerceUniversalPath,
	type FileTree,
	IGNORED_DIRS,
	type UniversalPath,
} from "@quiver/core"
import { listDir, readBinaryFile, safeStat } from "@/io/fs"
import type { IoResult } from "@/io/types"

export interface ReadTreeOptions {
	/** Skip files and directories whose name starts with a dot. */
	skipDotfiles?: boolean
	/** Universal paths to leave out. */
	exclude?: (file: UniversalPath) => boolean
}

/**
 * Reads every regular file below `root` into memory, keyed by its
 * forward-slash path relative to `root`.
 */
export async function readTree(
	root: string,
	options: ReadTreeOptions = {},
): Promise<IoResult<Map<UniversalPath, Buffer>>> {
	const tree = new Map<UniversalPath, Buffer>()
	const rootStats = await safeStat(root)
	if (!rootStats.ok) {
		return rootStats
	}
	if (!rootStats.value) {
		return { ok: true, value: tree }
	}

	const pending: string[] = [""]
	while (pending.length > 0) {
		const relativeDir = pending.pop() ?? ""
		const entries = await listDir(path.join(root, relativeDir))
		if (!entries.ok) {
			return entries
		}

		for (const entry of entries.value) {
			if (options.skipDotfiles && entry.name.startsWith(".")) continue
			const relative = relativeDir ? `${relativeDir}/${entry.name}` : entry.name

			if (entry.isDirectory) {
				if (!IGNORED_DIRS.has(entry.name)) pending.push(relative)
				continue
			}
			if (!entry.isFile) continue

			const file = coerceUniversalPath(relative)
			if (!file || options.exclude?.(file)) continue

			const contents = await readBinaryFile(path.join(root, relative))
			if (!contents.ok) {
				return contents
			}
			tree.set(file, contents.value)
		}
	}

	return { ok: true, value: tree }
}

export function subtree(tree: FileTree, prefix: UniversalPath | undefined): FileTree {
	if (!prefix) return tree
	const result = new Map<UniversalPath, Buffer>()
	const start = `${prefix}/`
	for (const [file, contents] of tree) {
		if (!file.startsWith(start)) continue
		const relative = coerceUniversalPath(file.slice(start.length))
		if (relative) result.set(relative, contents)
	}
	return result
}
