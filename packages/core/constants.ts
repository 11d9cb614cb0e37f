/**
 * Canonical filenames and directories.
 */

/** Workspace directory holding the records and the workspace bundle's own files */
export const WORKSPACE_DIR = ".quiver"

/** Bundle manifest: metadata, platforms and direct dependencies */
export const MANIFEST_FILENAME = "quiver.toml"

export const LOCKFILE_FILENAME = "quiver.lock"

export const INDEX_FILENAME = "quiver.index.json"

/** Optional workspace additions to the built-in platform table (JSONC) */
export const PLATFORM_OVERRIDES_FILENAME = "platforms.jsonc"

/** Advisory lock target inside WORKSPACE_DIR */
export const LOCK_TARGET_FILENAME = ".lock"

/** Records a bundle never hashes or provides as resources. */
export const RECORD_FILENAMES: ReadonlySet<string> = new Set([
	LOCKFILE_FILENAME,
	INDEX_FILENAME,
])

/**
 * Directories skipped when reading a bundle tree.
 */
export const IGNORED_DIRS: ReadonlySet<string> = new Set([
	".git",
	".hg",
	".svn",
	"node_modules",
])
