import type {
	AbsolutePath,
	BundleName,
	ContentHash,
	GitUrl,
	NonEmptyString,
	UniversalPath,
} from "./branded"

export type GitRef =
	| { type: "tag"; value: NonEmptyString }
	| { type: "branch"; value: NonEmptyString }
	| { type: "rev"; value: NonEmptyString }

/** A dependency as written in a manifest; `path` is relative to the declaring bundle. */
export type Declaration =
	| { type: "dir"; path: NonEmptyString }
	| { type: "git"; url: GitUrl; ref?: GitRef; path?: UniversalPath }

/** A declaration anchored to a concrete location, before its revision is known. */
export type SourceSpec =
	| { type: "dir"; path: AbsolutePath }
	| { type: "git"; url: GitUrl; ref?: GitRef; path?: UniversalPath }

export type LockedSource =
	| { type: "dir"; path: string; revision: ContentHash }
	| {
			type: "git"
			url: GitUrl
			ref?: GitRef
			path?: UniversalPath
			revision: string
	  }

/** File contents keyed by universal path. */
export type FileTree = ReadonlyMap<UniversalPath, Buffer>

export interface BundleMetadata {
	description?: NonEmptyString
	version?: NonEmptyString
}

export interface LockedBundle extends BundleMetadata {
	name: BundleName
	source: LockedSource
	hash: ContentHash
	dependencies: BundleName[]
	files: UniversalPath[]
}

export interface Lockfile {
	version: 1
	workspace: BundleName
	bundles: LockedBundle[]
}

export interface BundleManifest {
	bundle?: BundleMetadata & { name?: BundleName }
	platforms: Map<string, boolean>
	dependencies: Map<BundleName, Declaration>
}

/** A bundle after resolution: source pinned, content in hand. */
export interface ResolvedBundle extends BundleMetadata {
	name: BundleName
	source: LockedSource
	dependencies: BundleName[]
	tree: FileTree
}
