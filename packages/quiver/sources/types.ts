import type {
	BaseError,
	FileTree,
	Result,
	SourceResolutionError,
	SourceSpec,
} from "@quiver/core"

export interface FetchedSource {
	/** Exact revision: a commit for git, the tree hash for directories. */
	revision: string
	tree: FileTree
}

export type FetchResult = Result<FetchedSource, SourceResolutionError>

/**
 * Retrieves the file tree of a source at its requested ref. `resolveRevision`
 * is optional: fetchers that can name the revision without downloading let the
 * cache skip the fetch; `null` means "unknown, fetch to find out".
 */
export interface Fetcher {
	fetch(spec: SourceSpec): Promise<FetchResult>
	resolveRevision?(spec: SourceSpec): Promise<Result<string | null, SourceResolutionError>>
}

export function resolutionFailure(
	source: string,
	message: string,
	cause?: BaseError,
): { ok: false; error: SourceResolutionError } {
	return {
		error: {
			...(cause ? { cause } : {}),
			message,
			source,
			type: "source_resolution",
		},
		ok: false,
	}
}
