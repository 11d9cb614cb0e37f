import path from "node:path"
import {
	type AbsolutePath,
	INDEX_FILENAME,
	LOCKFILE_FILENAME,
	MANIFEST_FILENAME,
	PLATFORM_OVERRIDES_FILENAME,
	WORKSPACE_DIR,
} from "@quiver/core"
import { toAbsolutePath } from "@/io/fs"

export interface WorkspacePaths {
	root: AbsolutePath
	/** `<root>/.quiver`: records plus the workspace bundle's own files */
	dir: AbsolutePath
	manifest: AbsolutePath
	lockfile: AbsolutePath
	index: AbsolutePath
	platformOverrides: AbsolutePath
}

export function workspacePaths(root: string): WorkspacePaths {
	const absoluteRoot = toAbsolutePath(root)
	const dir = toAbsolutePath(path.join(absoluteRoot, WORKSPACE_DIR))
	return {
		dir,
		index: toAbsolutePath(path.join(dir, INDEX_FILENAME)),
		lockfile: toAbsolutePath(path.join(dir, LOCKFILE_FILENAME)),
		manifest: toAbsolutePath(path.join(dir, MANIFEST_FILENAME)),
		platformOverrides: toAbsolutePath(path.join(dir, PLATFORM_OVERRIDES_FILENAME)),
		root: absoluteRoot,
	}
}

/** The three records a transaction snapshots. */
export function recordPaths(paths: WorkspacePaths): string[] {
	return [paths.manifest, paths.lockfile, paths.index]
}

/** Absolute location of a workspace-relative output path. */
export function outputLocation(paths: WorkspacePaths, output: string): string {
	return path.join(paths.root, ...output.split("/"))
}
