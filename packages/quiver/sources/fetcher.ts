import type { Result, SourceResolutionError, SourceSpec } from "@quiver/core"
import { DirectoryFetcher } from "@/sources/directory"
import { GitFetcher } from "@/sources/git"
import type { Fetcher, FetchResult } from "@/sources/types"

/** Dispatches on the source type. */
export class SourceFetcher implements Fetcher {
	constructor(
		private readonly directory: Fetcher = new DirectoryFetcher(),
		private readonly git: Fetcher = new GitFetcher(),
	) {}

	fetch(spec: SourceSpec): Promise<FetchResult> {
		return spec.type === "git" ? this.git.fetch(spec) : this.directory.fetch(spec)
	}

	async resolveRevision(
		spec: SourceSpec,
	): Promise<Result<string | null, SourceResolutionError>> {
		const fetcher = spec.type === "git" ? this.git : this.directory
		if (!fetcher.resolveRevision) {
			return { ok: true, value: null }
		}
		return fetcher.resolveRevision(spec)
	}
}
