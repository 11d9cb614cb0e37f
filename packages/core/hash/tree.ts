import { createHash } from "node:crypto"
import type { ContentHash, UniversalPath } from "../types/branded"
import type { FileTree } from "../types/bundle"

/**
 * Hashes every file in the tree in path order. Each file contributes its path,
 * a NUL byte, its bytes and another NUL, so renames change the digest.
 */
export function hashTree(tree: FileTree): ContentHash {
	const hash = createHash("sha256")
	for (const file of sortedPaths(tree)) {
		const contents = tree.get(file)
		if (!contents) continue
		hash.update(file)
		hash.update("\0")
		hash.update(contents)
		hash.update("\0")
	}
	return `sha256:${hash.digest("hex")}` as ContentHash
}

export function sortedPaths(tree: FileTree): UniversalPath[] {
	return [...tree.keys()].sort(comparePaths)
}

/** Code-unit order, independent of locale. */
export function comparePaths(a: string, b: string): number {
	if (a < b) return -1
	if (a > b) return 1
	return 0
}
