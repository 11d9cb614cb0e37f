import path from "node:path"
import {
	coerceUniversalPath,
	describeSource,
	type IntegrityMismatchError,
	type Lockfile,
	MANIFEST_FILENAME,
	type Platform,
	type Result,
	serializeLockfile,
	type UniversalPath,
} from "@quiver/core"
import type { InstallPlan } from "@/install/plan"
import type { InstallSummary } from "@/install/types"
import { type ReconcileSummary, reconcile } from "@/install/reconcile"
import { runTransaction } from "@/transaction/transaction"
import type { QuiverError } from "@/types/errors"
import { emptyIndex, serializeIndex, type WorkspaceIndex } from "@/workspace/index-file"
import type { ModifiedFile } from "@/workspace/modified"
import { recordPaths, type WorkspacePaths } from "@/workspace/paths"

export function migrationOverlay(
	modified: ReadonlyArray<ModifiedFile>,
): Map<UniversalPath, Buffer> {
	return new Map(modified.map((file) => [file.entry.path, file.contents]))
}

/**
 * A bundle pinned to the same source and revision must hash the same as
 * when it was locked.
 */
export function checkIntegrity(
	existing: Lockfile | null,
	fresh: Lockfile,
): Result<void, IntegrityMismatchError> {
	if (!existing) {
		return { ok: true, value: undefined }
	}

	const before = new Map(existing.bundles.map((bundle) => [bundle.name, bundle]))
	for (const bundle of fresh.bundles) {
		if (bundle.name === fresh.workspace) continue
		const locked = before.get(bundle.name)
		if (!locked) continue
		if (describeSource(locked.source) !== describeSource(bundle.source)) continue
		if (locked.source.revision !== bundle.source.revision) continue
		if (locked.hash !== bundle.hash) {
			return {
				error: {
					actual: bundle.hash,
					expected: locked.hash,
					message: `${bundle.name} at ${bundle.source.revision} no longer matches its locked content hash.`,
					target: bundle.name,
					type: "integrity_mismatch",
				},
				ok: false,
			}
		}
	}
	return { ok: true, value: undefined }
}

export interface PersistInput {
	paths: WorkspacePaths
	migrations: ReadonlyArray<ModifiedFile>
	/** New manifest text, when the manifest changes */
	manifest?: string
	lockfile: Lockfile
	plan: InstallPlan
	previousIndex: WorkspaceIndex | null
	selected: ReadonlyArray<Platform>
	known: ReadonlyArray<Platform>
}

export interface PersistOutcome {
	summary: ReconcileSummary
	lockfileChanged: boolean
}

/**
 * One transaction: migrate edited outputs into the workspace bundle, bring the
 * outputs in line with the plan, then write the manifest, lockfile and index.
 */
export async function persistInstall(
	input: PersistInput,
): Promise<Result<PersistOutcome, QuiverError>> {
	const { paths } = input
	const transaction = await runTransaction(recordPaths(paths), async (tx) => {
		for (const migration of input.migrations) {
			const target = path.join(paths.dir, ...migration.entry.path.split("/"))
			const written = await tx.writeFile(target, migration.contents)
			if (!written.ok) {
				return written
			}
		}

		const reconciled = await reconcile(tx, {
			known: input.known,
			paths,
			plan: input.plan,
			previous: input.previousIndex ?? emptyIndex(),
			selected: input.selected,
		})
		if (!reconciled.ok) {
			return reconciled
		}

		// Records go last, so an interrupted run leaves all three as they were.
		if (input.manifest !== undefined) {
			const written = await tx.writeRecord(paths.manifest, input.manifest)
			if (!written.ok) {
				return written
			}
		}

		const lockText = serializeLockfile(input.lockfile)
		const lockfileChanged = tx.recordChanged(paths.lockfile, lockText)
		if (lockfileChanged) {
			const written = await tx.writeRecord(paths.lockfile, lockText)
			if (!written.ok) {
				return written
			}
		}

		const indexText = serializeIndex(reconciled.value.index)
		if (tx.recordChanged(paths.index, indexText)) {
			const written = await tx.writeRecord(paths.index, indexText)
			if (!written.ok) {
				return written
			}
		}

		return { ok: true, value: { lockfileChanged, summary: reconciled.value.summary } }
	})

	if (transaction.status === "committed") {
		return { ok: true, value: transaction.value }
	}

	const [firstRollbackError] = transaction.rollbackErrors
	if (firstRollbackError) {
		return {
			error: {
				...firstRollbackError,
				cause: transaction.error,
				message: `Rollback left ${transaction.rollbackErrors.length} change(s) in place after a failure.`,
			},
			ok: false,
		}
	}
	return { error: transaction.error, ok: false }
}

export function emptySummary(overrides: Partial<InstallSummary> = {}): InstallSummary {
	return {
		bundles: [],
		lockfileChanged: false,
		migrated: [],
		platforms: [],
		removed: [],
		warnings: [],
		written: [],
		...overrides,
	}
}

export function manifestPath(): UniversalPath {
	const file = coerceUniversalPath(MANIFEST_FILENAME)
	if (!file) throw new Error(`${MANIFEST_FILENAME} is not a valid resource path.`)
	return file
}
