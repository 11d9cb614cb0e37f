import path from "node:path"
import {
	type BundleManifest,
	type BundleName,
	coerceBundleName,
	type FileTree,
	type Lockfile,
	type ParseError,
	PLATFORM_OVERRIDES_FILENAME,
	parseLockfile,
	parseManifest,
	type Result,
	type UniversalPath,
	type ValidationError,
} from "@quiver/core"
import { readOptionalFile } from "@/io/fs"
import { readTree } from "@/io/tree"
import type { IoError, IoResult } from "@/io/types"
import { parseIndex, type WorkspaceIndex } from "@/workspace/index-file"
import { type WorkspacePaths, workspacePaths } from "@/workspace/paths"

export type StateError = IoError | ParseError | ValidationError

/** Everything persisted about a workspace, read once per command. */
export interface WorkspaceState {
	paths: WorkspacePaths
	manifest: BundleManifest
	lockfile: Lockfile | null
	index: WorkspaceIndex | null
}

const FALLBACK_NAME = "workspace"

export async function loadWorkspaceState(
	root: string,
): Promise<Result<WorkspaceState, StateError>> {
	const paths = workspacePaths(root)

	const manifestFile = await readOptionalFile(paths.manifest)
	if (!manifestFile.ok) {
		return manifestFile
	}
	let manifest: BundleManifest = { dependencies: new Map(), platforms: new Map() }
	if (manifestFile.value !== null) {
		const parsed = parseManifest(manifestFile.value.toString("utf8"), paths.manifest)
		if (!parsed.ok) {
			return parsed
		}
		manifest = parsed.value
	}

	const lockFile = await readOptionalFile(paths.lockfile)
	if (!lockFile.ok) {
		return lockFile
	}
	let lockfile: Lockfile | null = null
	if (lockFile.value !== null) {
		const parsed = parseLockfile(lockFile.value.toString("utf8"), paths.lockfile)
		if (!parsed.ok) {
			return parsed
		}
		lockfile = parsed.value
	}

	const indexFile = await readOptionalFile(paths.index)
	if (!indexFile.ok) {
		return indexFile
	}
	let index: WorkspaceIndex | null = null
	if (indexFile.value !== null) {
		const parsed = parseIndex(indexFile.value.toString("utf8"), paths.index)
		if (!parsed.ok) {
			return parsed
		}
		index = parsed.value
	}

	return { ok: true, value: { index, lockfile, manifest, paths } }
}

/**
 * The workspace bundle's name: `[bundle] name`, else the project directory's
 * name made valid, else "workspace".
 */
export function workspaceName(state: WorkspaceState): BundleName {
	const declared = state.manifest.bundle?.name
	if (declared) return declared

	const fromDir = coerceBundleName(
		path
			.basename(state.paths.root)
			.replace(/[\s/\\:]+/g, "-")
			.replace(/^\.+/, ""),
	)
	if (fromDir) return fromDir

	const fallback = coerceBundleName(FALLBACK_NAME)
	if (!fallback) throw new Error(`"${FALLBACK_NAME}" is not a valid bundle name.`)
	return fallback
}

/**
 * Reads the workspace bundle's files. Dotfiles (the lock, temp files) and the
 * platform overrides are not resources. `overlay` adds or replaces files that
 * are about to be written, such as migrated edits.
 */
export async function readWorkspaceTree(
	paths: WorkspacePaths,
	overlay: ReadonlyMap<UniversalPath, Buffer> = new Map(),
): Promise<IoResult<FileTree>> {
	const tree = await readTree(paths.dir, {
		exclude: (file) => file === PLATFORM_OVERRIDES_FILENAME,
		skipDotfiles: true,
	})
	if (!tree.ok) {
		return tree
	}
	for (const [file, contents] of overlay) {
		tree.value.set(file, contents)
	}
	return tree
}
