import {
	coerceUniversalPath,
	type FileTree,
	MANIFEST_FILENAME,
	sortedPaths,
	type UniversalPath,
} from "@quiver/core"

/**
 * Bundle roots inside a source that is not itself a bundle: directories
 * holding a manifest, outermost only. A source with a root manifest has none.
 */
export function findBundleRoots(tree: FileTree): UniversalPath[] {
	const files = sortedPaths(tree)
	if (files.some((file) => file === MANIFEST_FILENAME)) {
		return []
	}

	const suffix = `/${MANIFEST_FILENAME}`
	const dirs: UniversalPath[] = []
	for (const file of files) {
		if (!file.endsWith(suffix)) continue
		const dir = coerceUniversalPath(file.slice(0, -suffix.length))
		if (dir) dirs.push(dir)
	}

	return dirs.filter((dir) => !dirs.some((other) => dir.startsWith(`${other}/`)))
}
