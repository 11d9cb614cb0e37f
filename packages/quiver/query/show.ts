import {
	type BundleName,
	describeSource,
	type MergeStrategy,
	type NotFoundError,
	type Result,
	type UniversalPath,
} from "@quiver/core"
import { type CacheError, readCacheEntry } from "@/cache/store"
import { readDescription } from "@/query/frontmatter"
import { sourceIdentity, specFromLocked } from "@/sources/identity"
import { loadWorkspaceState, type StateError } from "@/workspace/state"

const INSTRUCTIONS_FILE = "AGENTS.md"

export interface InstalledOutput {
	platform: string
	path: UniversalPath
	output: string
	strategy: MergeStrategy
	/** Owned by the bundle, not only merged into */
	owner: boolean
}

export interface BundleDetails {
	name: BundleName
	workspace: boolean
	source: string
	revision: string
	hash: string
	version?: string
	description?: string
	dependencies: BundleName[]
	/** Locked bundles that declare this one */
	dependents: BundleName[]
	files: number
	outputs: InstalledOutput[]
	warnings: string[]
}

/**
 * Everything recorded about one bundle. Without a `[bundle] description`,
 * the description comes from the frontmatter of its cached AGENTS.md.
 */
export async function showBundle(
	root: string,
	name: string,
	cacheDir: string,
): Promise<Result<BundleDetails, StateError | NotFoundError | CacheError>> {
	const state = await loadWorkspaceState(root)
	if (!state.ok) {
		return state
	}

	const { index, lockfile, paths } = state.value
	const locked = lockfile?.bundles.find((bundle) => bundle.name === name)
	if (!lockfile || !locked) {
		return {
			error: {
				message: `${name} is not installed in this workspace.`,
				path: paths.lockfile,
				target: name,
				type: "not_found",
			},
			ok: false,
		}
	}

	const details: BundleDetails = {
		dependencies: [...locked.dependencies],
		dependents: lockfile.bundles
			.filter((bundle) => bundle.dependencies.includes(locked.name))
			.map((bundle) => bundle.name),
		files: locked.files.length,
		hash: locked.hash,
		name: locked.name,
		outputs: [],
		revision: locked.source.revision,
		source: describeSource(locked.source),
		warnings: [],
		workspace: locked.name === lockfile.workspace,
	}
	if (locked.version) details.version = locked.version
	if (locked.description) details.description = locked.description

	for (const entry of index?.entries ?? []) {
		const owner = entry.bundle === locked.name
		if (!owner && !entry.contributors?.includes(locked.name)) continue
		details.outputs.push({
			output: entry.output,
			owner,
			path: entry.path,
			platform: entry.platform,
			strategy: entry.strategy,
		})
	}

	if (!details.description && locked.files.some((file) => file === INSTRUCTIONS_FILE)) {
		const identity = sourceIdentity(specFromLocked(locked.source, paths.root))
		const snapshot = await readCacheEntry(cacheDir, identity, locked.source.revision)
		if (!snapshot.ok) {
			return snapshot
		}
		const instructions = snapshot.value
			? [...snapshot.value].find(([file]) => file === INSTRUCTIONS_FILE)?.[1]
			: undefined
		if (instructions) {
			const description = readDescription(instructions.toString("utf8"))
			if (description.ok) {
				if (description.value) details.description = description.value
			} else {
				details.warnings.push(`${INSTRUCTIONS_FILE}: ${description.error.message}`)
			}
		}
	}

	return { ok: true, value: details }
}
