import { RECORD_FILENAMES } from "../constants"
import { hashTree, sortedPaths } from "../hash/tree"
import type { BundleName, UniversalPath } from "../types/branded"
import type { LockedBundle, Lockfile, ResolvedBundle } from "../types/bundle"

/**
 * Pins each resolved bundle to its hash and file list. Resolution order is kept
 * as is, so the workspace bundle must already be last.
 */
export function generateLockfile(
	workspace: BundleName,
	order: ReadonlyArray<ResolvedBundle>,
): Lockfile {
	return {
		bundles: order.map(lockBundle),
		version: 1,
		workspace,
	}
}

export function lockBundle(bundle: ResolvedBundle): LockedBundle {
	const provided = new Map<UniversalPath, Buffer>()
	for (const file of sortedPaths(bundle.tree)) {
		const contents = bundle.tree.get(file)
		if (contents && !RECORD_FILENAMES.has(file)) {
			provided.set(file, contents)
		}
	}

	const locked: LockedBundle = {
		dependencies: [...bundle.dependencies],
		files: [...provided.keys()],
		hash: hashTree(provided),
		name: bundle.name,
		source: bundle.source,
	}
	if (bundle.description) locked.description = bundle.description
	if (bundle.version) locked.version = bundle.version
	return locked
}
