import {
	type BundleManifest,
	type BundleName,
	type LockedBundle,
	type Lockfile,
	lockBundle,
	type ResolvedBundle,
	type Result,
	serializeManifest,
} from "@quiver/core"
import { loadPinned } from "@/cache/store"
import { failUninstall, isStaged } from "@/install/errors"
import { planInstall } from "@/install/plan"
import {
	emptySummary,
	manifestPath,
	migrationOverlay,
	persistInstall,
} from "@/install/shared"
import type { EngineOptions, InstallResult, UninstallSummary } from "@/install/types"
import { withWorkspaceLock } from "@/lock/workspace-lock"
import { resolveWorkspaceBundle } from "@/resolver/resolve"
import { specFromLocked } from "@/sources/identity"
import type { Fetcher } from "@/sources/types"
import type { QuiverError } from "@/types/errors"
import { detectModified } from "@/workspace/modified"
import { workspacePaths } from "@/workspace/paths"
import { loadPlatforms, lookupAll } from "@/workspace/platforms"
import { loadWorkspaceState, readWorkspaceTree, workspaceName } from "@/workspace/state"

export interface UninstallOptions extends EngineOptions {
	names: ReadonlyArray<BundleName>
}

/**
 * Removes direct dependencies and every bundle no longer reachable from the
 * workspace. Remaining bundles come from their cached snapshots; nothing is
 * re-resolved.
 */
export async function uninstall(
	options: UninstallOptions,
): Promise<InstallResult<UninstallSummary>> {
	const paths = workspacePaths(options.root)
	const locked = await withWorkspaceLock(
		paths.dir,
		{ retries: options.lockRetries },
		() => uninstallLocked(options),
	)
	if (locked.ok) {
		return locked
	}
	return isStaged(locked.error)
		? { error: locked.error, ok: false }
		: failUninstall("lock", locked.error)
}

async function uninstallLocked(
	options: UninstallOptions,
): Promise<InstallResult<UninstallSummary>> {
	const state = await loadWorkspaceState(options.root)
	if (!state.ok) {
		return failUninstall("state", state.error)
	}
	const { paths } = state.value

	for (const name of options.names) {
		if (!state.value.manifest.dependencies.has(name)) {
			return failUninstall("state", {
				message: `${name} is not a direct dependency of this workspace.`,
				path: paths.manifest,
				target: name,
				type: "not_found",
			})
		}
	}

	const existing = state.value.lockfile
	if (!existing) {
		return failUninstall("state", {
			message: "Nothing is installed yet; run install first.",
			path: paths.lockfile,
			target: "lockfile",
			type: "not_found",
		})
	}

	const manifest: BundleManifest = {
		...state.value.manifest,
		dependencies: new Map(state.value.manifest.dependencies),
	}
	for (const name of options.names) {
		manifest.dependencies.delete(name)
	}
	const manifestText = serializeManifest(manifest)

	const platforms = await loadPlatforms(paths)
	if (!platforms.ok) {
		return failUninstall("platforms", platforms.error)
	}
	const selected = lookupAll(platforms.value, state.value.index?.platforms ?? [])
	if (!selected.ok) {
		return failUninstall("platforms", selected.error)
	}

	const scan = await detectModified(state.value, options.cacheDir)
	if (!scan.ok) {
		return failUninstall("detect", scan.error)
	}
	const overlay = migrationOverlay(scan.value.modified)
	overlay.set(manifestPath(), Buffer.from(manifestText))
	const tree = await readWorkspaceTree(paths, overlay)
	if (!tree.ok) {
		return failUninstall("detect", tree.error)
	}

	const name = workspaceName({ ...state.value, manifest })
	const workspace = await resolveWorkspaceBundle(
		{ manifest, name, tree: tree.value },
		{ cacheDir: options.cacheDir, fetcher: options.fetcher, workspaceRoot: paths.root },
	)
	if (!workspace.ok) {
		return failUninstall("resolve", workspace.error)
	}

	const kept = reachableBundles(existing, [...manifest.dependencies.keys()])
	const order: ResolvedBundle[] = []
	for (const bundle of kept) {
		const restored = await restoreBundle(bundle, options.root, options.cacheDir, options.fetcher)
		if (!restored.ok) {
			return failUninstall("snapshot", restored.error)
		}
		order.push(restored.value)
	}
	order.push(workspace.value)

	const lockfile: Lockfile = {
		bundles: order.map(lockBundle),
		version: 1,
		workspace: name,
	}

	const plan = planInstall(order, selected.value)
	if (!plan.ok) {
		return failUninstall("plan", plan.error)
	}

	const persisted = await persistInstall({
		known: platforms.value,
		lockfile,
		manifest: manifestText,
		migrations: scan.value.modified,
		paths,
		plan: plan.value,
		previousIndex: state.value.index,
		selected: selected.value,
	})
	if (!persisted.ok) {
		return failUninstall("apply", persisted.error)
	}

	const keptNames = new Set(lockfile.bundles.map((bundle) => bundle.name))
	return {
		ok: true,
		value: {
			...emptySummary(),
			bundles: lockfile.bundles.map((bundle) => bundle.name),
			dropped: existing.bundles
				.map((bundle) => bundle.name)
				.filter((bundle) => bundle !== existing.workspace && !keptNames.has(bundle)),
			lockfileChanged: persisted.value.lockfileChanged,
			migrated: scan.value.modified.map((file) => file.entry.path),
			platforms: selected.value.map((platform) => platform.id),
			removed: persisted.value.summary.removed,
			warnings: scan.value.warnings,
			written: persisted.value.summary.written,
		},
	}
}

/** Locked bundles reachable from `roots`, in their lock order, workspace excluded. */
export function reachableBundles(
	lockfile: Lockfile,
	roots: ReadonlyArray<BundleName>,
): LockedBundle[] {
	const byName = new Map(lockfile.bundles.map((bundle) => [bundle.name, bundle]))
	const reachable = new Set<BundleName>()
	const pending = [...roots]
	while (pending.length > 0) {
		const name = pending.pop()
		if (!name || reachable.has(name)) continue
		const bundle = byName.get(name)
		if (!bundle || name === lockfile.workspace) continue
		reachable.add(name)
		pending.push(...bundle.dependencies)
	}
	return lockfile.bundles.filter((bundle) => reachable.has(bundle.name))
}

async function restoreBundle(
	locked: LockedBundle,
	root: string,
	cacheDir: string,
	fetcher: Fetcher,
): Promise<Result<ResolvedBundle, QuiverError>> {
	const spec = specFromLocked(locked.source, root)
	const tree = await loadPinned(cacheDir, spec, locked.source.revision, fetcher)
	if (!tree.ok) {
		return tree
	}

	const bundle: ResolvedBundle = {
		dependencies: [...locked.dependencies],
		name: locked.name,
		source: locked.source,
		tree: tree.value,
	}
	if (locked.description) bundle.description = locked.description
	if (locked.version) bundle.version = locked.version

	const relocked = lockBundle(bundle)
	if (relocked.hash !== locked.hash) {
		return {
			error: {
				actual: relocked.hash,
				expected: locked.hash,
				message: `Snapshot of ${locked.name} no longer matches its locked content hash.`,
				target: locked.name,
				type: "integrity_mismatch",
			},
			ok: false,
		}
	}
	return { ok: true, value: bundle }
}
