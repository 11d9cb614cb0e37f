import type { Result, UniversalPath } from "@quiver/core"
import { type CacheError, readCacheEntry } from "@/cache/store"
import { readOptionalFile } from "@/io/fs"
import { sourceIdentity, specFromLocked } from "@/sources/identity"
import type { IndexEntry } from "@/workspace/index-file"
import { outputLocation } from "@/workspace/paths"
import type { WorkspaceState } from "@/workspace/state"

export interface ModifiedFile {
	entry: IndexEntry
	/** Live content of the edited output */
	contents: Buffer
}

export interface ModifiedScan {
	modified: ModifiedFile[]
	warnings: string[]
}

/**
 * Finds replace-strategy outputs whose content no longer matches the file the
 * owning bundle provided at its locked revision. Entries whose snapshot is
 * not cached are skipped with a warning.
 */
export async function detectModified(
	state: WorkspaceState,
	cacheDir: string,
): Promise<Result<ModifiedScan, CacheError>> {
	const scan: ModifiedScan = { modified: [], warnings: [] }
	if (!state.index || !state.lockfile) {
		return { ok: true, value: scan }
	}

	const bundles = new Map(state.lockfile.bundles.map((bundle) => [bundle.name, bundle]))
	const snapshots = new Map<string, ReadonlyMap<UniversalPath, Buffer> | null>()
	const seen = new Map<UniversalPath, Buffer>()

	for (const entry of state.index.entries) {
		if (entry.strategy !== "replace") continue

		const live = await readOptionalFile(outputLocation(state.paths, entry.output))
		if (!live.ok) {
			return live
		}
		if (live.value === null) continue

		const locked = bundles.get(entry.bundle)
		if (!locked) {
			scan.warnings.push(`${entry.output} belongs to ${entry.bundle}, which is not locked.`)
			continue
		}

		let snapshot = snapshots.get(locked.name)
		if (snapshot === undefined) {
			const identity = sourceIdentity(specFromLocked(locked.source, state.paths.root))
			const cached = await readCacheEntry(cacheDir, identity, locked.source.revision)
			if (!cached.ok) {
				return cached
			}
			snapshot = cached.value
			snapshots.set(locked.name, snapshot)
			if (!snapshot) {
				scan.warnings.push(
					`Cache entry for ${locked.name} is missing; edits to its outputs were not checked.`,
				)
			}
		}
		if (!snapshot) continue

		const original = snapshot.get(entry.path)
		if (!original || original.equals(live.value)) continue

		const earlier = seen.get(entry.path)
		if (earlier) {
			if (!earlier.equals(live.value)) {
				scan.warnings.push(
					`${entry.path} was edited differently on several platforms; keeping the first edit.`,
				)
			}
			continue
		}

		seen.set(entry.path, live.value)
		scan.modified.push({ contents: live.value, entry })
	}

	return { ok: true, value: scan }
}
