import path from "node:path"
import {
	type AbsolutePath,
	type BundleManifest,
	type BundleMetadata,
	type BundleName,
	type CircularDependencyError,
	coerceContentHash,
	type FileTree,
	type GraphNode,
	generateLockfile,
	hashTree,
	type LockedSource,
	type Lockfile,
	MANIFEST_FILENAME,
	type NameConflictError,
	orderGraph,
	type ParseError,
	parseManifest,
	RECORD_FILENAMES,
	type ResolvedBundle,
	type Result,
	type SourceResolutionError,
	type SourceSpec,
	type UniversalPath,
	type ValidationError,
	WORKSPACE_DIR,
} from "@quiver/core"
import { CACHE_FILES_DIR, cacheEntryDir } from "@/cache/paths"
import { type CacheLookupError, getOrFetch, storeCacheEntry } from "@/cache/store"
import { toAbsolutePath } from "@/io/fs"
import { type Anchor, anchorDeclaration, anchorFor } from "@/resolver/anchor"
import { describeSpec, lockedDirPath, refKey, sourceIdentity } from "@/sources/identity"
import type { Fetcher } from "@/sources/types"

export type ResolveError =
	| CacheLookupError
	| CircularDependencyError
	| NameConflictError
	| ParseError
	| ValidationError
	| SourceResolutionError

export interface ResolveOptions {
	/** Project directory; holds WORKSPACE_DIR. */
	workspaceRoot: AbsolutePath
	cacheDir: string
	fetcher: Fetcher
}

export interface WorkspaceBundle {
	name: BundleName
	manifest: BundleManifest
	/** Files under WORKSPACE_DIR, records included or not. */
	tree: FileTree
}

export interface Resolution {
	/** Dependencies first, workspace bundle last. */
	order: ResolvedBundle[]
	lockfile: Lockfile
}

interface ResolveState {
	options: ResolveOptions
	nodes: Map<string, GraphNode>
	bundles: Map<string, ResolvedBundle>
	/** name -> node key and a human description of its source */
	byName: Map<BundleName, { key: string; source: string }>
}

/**
 * Walks the declarations from the workspace bundle down, fetching each
 * bundle through the cache, and orders the graph. A node is registered before
 * its dependencies are visited, so a cycle shows up as a back edge when the
 * graph is ordered instead of as unbounded recursion.
 */
export async function resolveWorkspace(
	workspace: WorkspaceBundle,
	options: ResolveOptions,
): Promise<Result<Resolution, ResolveError>> {
	const state: ResolveState = {
		byName: new Map(),
		bundles: new Map(),
		nodes: new Map(),
		options,
	}

	const rootKey = `workspace\0${workspace.name}`
	const root: GraphNode = { dependencies: [], key: rootKey, name: workspace.name }
	state.nodes.set(rootKey, root)
	state.byName.set(workspace.name, { key: rootKey, source: WORKSPACE_DIR })

	const dependencies = await visitDependencies(
		workspace.manifest,
		{ root: options.workspaceRoot, type: "dir" },
		state,
	)
	if (!dependencies.ok) {
		return dependencies
	}
	root.dependencies = dependencies.value

	const workspaceBundle = await resolveWorkspaceBundle(workspace, options)
	if (!workspaceBundle.ok) {
		return workspaceBundle
	}
	state.bundles.set(rootKey, workspaceBundle.value)

	const ordered = orderGraph(rootKey, state.nodes)
	if (!ordered.ok) {
		return ordered
	}

	const order: ResolvedBundle[] = []
	for (const node of ordered.value) {
		const bundle = state.bundles.get(node.key)
		if (!bundle) {
			return {
				error: {
					bundle: node.name,
					message: `Bundle ${node.name} was not resolved.`,
					source: node.key,
					type: "source_resolution",
				},
				ok: false,
			}
		}
		order.push(bundle)
	}

	return { ok: true, value: { lockfile: generateLockfile(workspace.name, order), order } }
}

/** The workspace bundle: its own files, records excluded, pinned by hash. */
export async function resolveWorkspaceBundle(
	workspace: WorkspaceBundle,
	options: ResolveOptions,
): Promise<Result<ResolvedBundle, ResolveError>> {
	const tree = new Map<UniversalPath, Buffer>()
	for (const [file, contents] of workspace.tree) {
		if (!RECORD_FILENAMES.has(file)) tree.set(file, contents)
	}

	const revision = hashTree(tree)
	const workspaceDir = toAbsolutePath(path.join(options.workspaceRoot, WORKSPACE_DIR))
	const stored = await storeCacheEntry(
		options.cacheDir,
		sourceIdentity({ path: workspaceDir, type: "dir" }),
		revision,
		tree,
	)
	if (!stored.ok) {
		return stored
	}

	return {
		ok: true,
		value: {
			...metadataOf(workspace.manifest),
			dependencies: [...workspace.manifest.dependencies.keys()],
			name: workspace.name,
			source: { path: WORKSPACE_DIR, revision, type: "dir" },
			tree,
		},
	}
}

async function visitDependencies(
	manifest: BundleManifest,
	anchor: Anchor,
	state: ResolveState,
): Promise<Result<string[], ResolveError>> {
	const keys: string[] = []

	for (const [name, declaration] of manifest.dependencies) {
		const anchored = anchorDeclaration(declaration, anchor)
		if (!anchored.ok) {
			return { error: { ...anchored.error, bundle: name }, ok: false }
		}

		const spec = anchored.value
		const key = nodeKey(name, spec)
		const known = state.byName.get(name)
		if (known && known.key !== key) {
			return {
				error: {
					bundle: name,
					existing: known.source,
					incoming: describeSpec(spec),
					message: `Bundle ${name} is declared from two sources: ${known.source} and ${describeSpec(spec)}.`,
					type: "name_conflict",
				},
				ok: false,
			}
		}

		keys.push(key)
		if (known) continue

		state.byName.set(name, { key, source: describeSpec(spec) })
		const node: GraphNode = { dependencies: [], key, name }
		state.nodes.set(key, node)

		const visited = await visitBundle(name, key, spec, state)
		if (!visited.ok) {
			return visited
		}
		node.dependencies = visited.value
	}

	return { ok: true, value: keys }
}

async function visitBundle(
	name: BundleName,
	key: string,
	spec: SourceSpec,
	state: ResolveState,
): Promise<Result<string[], ResolveError>> {
	const { cacheDir, fetcher, workspaceRoot } = state.options
	const fetched = await getOrFetch(cacheDir, spec, fetcher)
	if (!fetched.ok) {
		return fetched.error.type === "source_resolution"
			? { error: { ...fetched.error, bundle: name }, ok: false }
			: fetched
	}

	const { revision, tree } = fetched.value
	const manifest = readBundleManifest(tree, manifestLocation(spec, revision, cacheDir))
	if (!manifest.ok) {
		return manifest
	}

	const dependencies = await visitDependencies(manifest.value, anchorFor(spec), state)
	if (!dependencies.ok) {
		return dependencies
	}

	const source = lockedSource(spec, revision, workspaceRoot)
	if (!source.ok) {
		return { error: { ...source.error, bundle: name }, ok: false }
	}

	state.bundles.set(key, {
		...metadataOf(manifest.value),
		dependencies: [...manifest.value.dependencies.keys()],
		name,
		source: source.value,
		tree,
	})
	return dependencies
}

/** A bundle without a manifest has no dependencies and no metadata. */
export function readBundleManifest(
	tree: FileTree,
	location: AbsolutePath,
): Result<BundleManifest, ParseError | ValidationError> {
	for (const [file, contents] of tree) {
		if (file === MANIFEST_FILENAME) {
			return parseManifest(contents.toString("utf8"), location)
		}
	}
	return { ok: true, value: { dependencies: new Map(), platforms: new Map() } }
}

export function lockedSource(
	spec: SourceSpec,
	revision: string,
	workspaceRoot: string,
): Result<LockedSource, SourceResolutionError> {
	if (spec.type === "git") {
		return { ok: true, value: { ...spec, revision } }
	}

	const hash = coerceContentHash(revision)
	if (!hash) {
		return {
			error: {
				message: `Directory revision ${revision} is not a content hash.`,
				source: spec.path,
				type: "source_resolution",
			},
			ok: false,
		}
	}
	return {
		ok: true,
		value: { path: lockedDirPath(spec.path, workspaceRoot), revision: hash, type: "dir" },
	}
}

function metadataOf(manifest: BundleManifest): BundleMetadata {
	const metadata: BundleMetadata = {}
	if (manifest.bundle?.description) metadata.description = manifest.bundle.description
	if (manifest.bundle?.version) metadata.version = manifest.bundle.version
	return metadata
}

function nodeKey(name: BundleName, spec: SourceSpec): string {
	const ref = spec.type === "git" ? refKey(spec.ref) : ""
	return `${name}\0${sourceIdentity(spec)}\0${ref}`
}

function manifestLocation(spec: SourceSpec, revision: string, cacheDir: string): AbsolutePath {
	const dir =
		spec.type === "dir"
			? spec.path
			: path.join(cacheEntryDir(cacheDir, sourceIdentity(spec), revision), CACHE_FILES_DIR)
	return toAbsolutePath(path.join(dir, MANIFEST_FILENAME))
}
