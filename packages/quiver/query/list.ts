import { type BundleName, describeSource, type Result } from "@quiver/core"
import { loadWorkspaceState, type StateError } from "@/workspace/state"

export interface ListedBundle {
	name: BundleName
	/** The workspace's own bundle */
	workspace: boolean
	/** Declared in the workspace manifest */
	direct: boolean
	files: number
	source: string
	hash: string
	version?: string
	description?: string
}

/** Locked bundles in install order. An unlocked workspace lists nothing. */
export async function listBundles(root: string): Promise<Result<ListedBundle[], StateError>> {
	const state = await loadWorkspaceState(root)
	if (!state.ok) {
		return state
	}

	const { lockfile, manifest } = state.value
	if (!lockfile) {
		return { ok: true, value: [] }
	}

	return {
		ok: true,
		value: lockfile.bundles.map((bundle) => {
			const listed: ListedBundle = {
				direct: manifest.dependencies.has(bundle.name),
				files: bundle.files.length,
				hash: bundle.hash,
				name: bundle.name,
				source: describeSource(bundle.source),
				workspace: bundle.name === lockfile.workspace,
			}
			if (bundle.version) listed.version = bundle.version
			if (bundle.description) listed.description = bundle.description
			return listed
		}),
	}
}
