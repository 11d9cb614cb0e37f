import { type BundleManifest, serializeManifest, validateFrozen } from "@quiver/core"
import { failInstall, isStaged } from "@/install/errors"
import { planInstall } from "@/install/plan"
import {
	checkIntegrity,
	emptySummary,
	manifestPath,
	migrationOverlay,
	persistInstall,
} from "@/install/shared"
import type { InstallOptions, InstallResult, InstallSummary } from "@/install/types"
import { withWorkspaceLock } from "@/lock/workspace-lock"
import { resolveWorkspace } from "@/resolver/resolve"
import { detectModified } from "@/workspace/modified"
import { workspacePaths } from "@/workspace/paths"
import { loadPlatforms, selectPlatforms } from "@/workspace/platforms"
import { loadWorkspaceState, readWorkspaceTree, workspaceName } from "@/workspace/state"

/**
 * Resolves the workspace's dependencies, locks them and installs their
 * resources for the selected platforms. Everything that can fail without
 * touching the workspace runs before the transaction opens.
 */
export async function install(options: InstallOptions): Promise<InstallResult<InstallSummary>> {
	const paths = workspacePaths(options.root)
	const locked = await withWorkspaceLock(
		paths.dir,
		{ retries: options.lockRetries },
		() => installLocked(options),
	)
	if (locked.ok) {
		return locked
	}
	return isStaged(locked.error)
		? { error: locked.error, ok: false }
		: failInstall("lock", locked.error)
}

async function installLocked(options: InstallOptions): Promise<InstallResult<InstallSummary>> {
	const state = await loadWorkspaceState(options.root)
	if (!state.ok) {
		return failInstall("state", state.error)
	}
	const { paths } = state.value
	const additions = options.add ?? []

	if (options.frozen && additions.length > 0) {
		return failInstall("state", {
			field: "frozen",
			message: "Cannot add dependencies in frozen mode.",
			source: "manual",
			type: "validation",
		})
	}

	const manifest: BundleManifest = {
		...state.value.manifest,
		dependencies: new Map(state.value.manifest.dependencies),
	}
	for (const { declaration, name } of additions) {
		manifest.dependencies.set(name, declaration)
	}
	const manifestText = additions.length > 0 ? serializeManifest(manifest) : undefined

	const platforms = await loadPlatforms(paths)
	if (!platforms.ok) {
		return failInstall("platforms", platforms.error)
	}
	const selected = await selectPlatforms(paths.root, platforms.value, {
		configured: manifest.platforms,
		requested: options.platforms,
	})
	if (!selected.ok) {
		return failInstall("platforms", selected.error)
	}
	const noPlatforms = selected.value.length === 0
	// Frozen runs still check the lockfile before stopping for want of platforms.
	if (noPlatforms && !options.frozen) {
		return { ok: true, value: emptySummary({ noOpReason: "no-platforms" }) }
	}

	const scan = await detectModified(state.value, options.cacheDir)
	if (!scan.ok) {
		return failInstall("detect", scan.error)
	}

	const overlay = migrationOverlay(scan.value.modified)
	if (manifestText !== undefined) {
		overlay.set(manifestPath(), Buffer.from(manifestText))
	}
	const tree = await readWorkspaceTree(paths, overlay)
	if (!tree.ok) {
		return failInstall("detect", tree.error)
	}

	const resolution = await resolveWorkspace(
		{
			manifest,
			name: workspaceName({ ...state.value, manifest }),
			tree: tree.value,
		},
		{ cacheDir: options.cacheDir, fetcher: options.fetcher, workspaceRoot: paths.root },
	)
	if (!resolution.ok) {
		return failInstall("resolve", resolution.error)
	}
	const { lockfile, order } = resolution.value

	if (options.frozen) {
		const existing = state.value.lockfile
		if (!existing) {
			return failInstall("frozen", {
				differences: ["lockfile missing"],
				message: "Frozen install requires an existing lockfile.",
				type: "frozen_mismatch",
			})
		}
		const frozen = validateFrozen(existing, lockfile)
		if (!frozen.ok) {
			return failInstall("frozen", frozen.error)
		}
		if (noPlatforms) {
			return { ok: true, value: emptySummary({ noOpReason: "no-platforms" }) }
		}
	}

	const integrity = checkIntegrity(state.value.lockfile, lockfile)
	if (!integrity.ok) {
		return failInstall("integrity", integrity.error)
	}

	const plan = planInstall(order, selected.value)
	if (!plan.ok) {
		return failInstall("plan", plan.error)
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
		return failInstall("apply", persisted.error)
	}

	return {
		ok: true,
		value: {
			bundles: lockfile.bundles.map((bundle) => bundle.name),
			lockfileChanged: persisted.value.lockfileChanged,
			migrated: scan.value.modified.map((file) => file.entry.path),
			platforms: selected.value.map((platform) => platform.id),
			removed: persisted.value.summary.removed,
			warnings: scan.value.warnings,
			written: persisted.value.summary.written,
		},
	}
}
