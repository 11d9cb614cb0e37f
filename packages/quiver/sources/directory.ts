import { hashTree, type SourceSpec } from "@quiver/core"
import { safeStat } from "@/io/fs"
import { readTree } from "@/io/tree"
import { type Fetcher, type FetchResult, resolutionFailure } from "@/sources/types"

/** Local directories: the revision is the hash of the tree as it is on disk. */
export class DirectoryFetcher implements Fetcher {
	async fetch(spec: SourceSpec): Promise<FetchResult> {
		if (spec.type !== "dir") {
			return unsupported(spec)
		}

		const stats = await safeStat(spec.path)
		if (!stats.ok) {
			return resolutionFailure(spec.path, stats.error.message, stats.error)
		}
		if (!stats.value) {
			return resolutionFailure(spec.path, `Local path does not exist: ${spec.path}`)
		}
		if (!stats.value.isDirectory()) {
			return resolutionFailure(spec.path, `Local path is not a directory: ${spec.path}`)
		}

		const tree = await readTree(spec.path)
		if (!tree.ok) {
			return resolutionFailure(spec.path, tree.error.message, tree.error)
		}

		return { ok: true, value: { revision: hashTree(tree.value), tree: tree.value } }
	}
}

function unsupported(spec: SourceSpec) {
	return resolutionFailure(spec.type, `Directory fetcher cannot fetch ${spec.type} sources.`)
}
