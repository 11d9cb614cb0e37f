import path from "node:path"
import { isCancel, multiselect } from "@clack/prompts"
import {
	type AbsolutePath,
	type BundleName,
	coerceBundleName,
	coerceGitRef,
	coerceGitUrl,
	coerceNonEmpty,
	coerceUniversalPath,
	type Declaration,
	type FileTree,
	MANIFEST_FILENAME,
	type ParseError,
	type Result,
	type SourceSpec,
	type UniversalPath,
	type ValidationError,
} from "@quiver/core"
import { CACHE_FILES_DIR, cacheEntryDir } from "@/cache/paths"
import { getOrFetch } from "@/cache/store"
import { CommandResult } from "@/commands/types"
import type { EngineOptions } from "@/install/types"
import { toAbsolutePath } from "@/io/fs"
import { subtree } from "@/io/tree"
import { readBundleManifest } from "@/resolver/resolve"
import { findBundleRoots } from "@/sources/discover"
import { lockedDirPath, sourceIdentity } from "@/sources/identity"

export interface SourceOptions {
	tag?: string
	branch?: string
	rev?: string
	path?: string
	as?: string
	nonInteractive: boolean
}

export interface Addition {
	name: BundleName
	declaration: Declaration
}

/**
 * Turns the `install <source>` argument into declarations. A source holding
 * several bundles offers them for selection unless `--path` names one.
 */
export async function resolveAdditions(
	source: string,
	options: SourceOptions,
	context: EngineOptions,
): Promise<CommandResult<Addition[]>> {
	const spec = parseSource(source, options, context.root)
	if (!spec.ok) {
		return CommandResult.failed(spec.error)
	}

	const fetched = await getOrFetch(context.cacheDir, spec.value, context.fetcher)
	if (!fetched.ok) {
		return CommandResult.failed(fetched.error)
	}
	const tree = fetched.value.tree

	let chosen: Array<UniversalPath | undefined> = [undefined]
	if (options.path === undefined) {
		const roots = findBundleRoots(tree)
		if (roots.length === 1) {
			chosen = roots
		} else if (roots.length > 1) {
			if (options.nonInteractive) {
				return CommandResult.unchanged(
					`${source} holds ${roots.length} bundles; pick one with --path: ${roots.join(", ")}`,
				)
			}
			const picked = await multiselect<Array<{ label: string; value: UniversalPath }>, UniversalPath>({
				message: `Select bundles to install from ${source}`,
				options: roots.map((root) => ({ label: root, value: root })),
				required: true,
			})
			if (isCancel(picked) || picked.length === 0) {
				return CommandResult.cancelled()
			}
			chosen = picked
		}
	}

	if (options.as !== undefined && chosen.length > 1) {
		return CommandResult.failed(invalid("as", "--as can name only one bundle.").error)
	}

	const snapshot = path.join(
		cacheEntryDir(context.cacheDir, sourceIdentity(spec.value), fetched.value.revision),
		CACHE_FILES_DIR,
	)
	const additions: Addition[] = []
	for (const subpath of chosen) {
		const addition = buildAddition(spec.value, subpath, tree, snapshot, options, context.root)
		if (!addition.ok) {
			return CommandResult.failed(addition.error)
		}
		additions.push(addition.value)
	}
	return CommandResult.completed(additions)
}

export function parseSource(
	source: string,
	options: SourceOptions,
	root: string,
): Result<SourceSpec, ValidationError> {
	const refCount = [options.tag, options.branch, options.rev].filter(Boolean).length
	if (refCount > 1) {
		return invalid("ref", "Only one of --tag, --branch, or --rev may be set.")
	}

	const subpath = options.path === undefined ? undefined : coerceUniversalPath(options.path)
	if (subpath === null) {
		return invalid("path", `Invalid --path "${options.path}".`)
	}

	if (isGitSource(source)) {
		const url = coerceGitUrl(source)
		if (!url) {
			return invalid("source", `Invalid git url "${source}".`)
		}
		const ref = coerceGitRef(options)
		return {
			ok: true,
			value: {
				type: "git",
				url,
				...(ref ? { ref } : {}),
				...(subpath ? { path: subpath } : {}),
			},
		}
	}

	if (refCount > 0) {
		return invalid("ref", "--tag, --branch and --rev apply to git sources only.")
	}
	const dir = path.resolve(root, source, ...(subpath ? subpath.split("/") : []))
	return { ok: true, value: { path: toAbsolutePath(dir), type: "dir" } }
}

export function isGitSource(source: string): boolean {
	return /^(https?|ssh|git|file):\/\//.test(source) || /^[\w.-]+@[\w.-]+:/.test(source)
}

function buildAddition(
	spec: SourceSpec,
	subpath: UniversalPath | undefined,
	tree: FileTree,
	snapshot: string,
	options: SourceOptions,
	root: string,
): Result<Addition, ParseError | ValidationError> {
	const bundleTree = subtree(tree, subpath)
	const target = narrowSpec(spec, subpath)
	const manifest = readBundleManifest(bundleTree, manifestLocation(target, snapshot, subpath))
	if (!manifest.ok) {
		return manifest
	}

	const rawName = options.as ?? manifest.value.bundle?.name ?? defaultName(target)
	const name = coerceBundleName(rawName)
	if (!name) {
		return invalid("as", `Invalid bundle name "${rawName}"; pass --as <name>.`)
	}

	if (target.type === "git") {
		return { ok: true, value: { declaration: target, name } }
	}

	const relative = coerceNonEmpty(lockedDirPath(target.path, root))
	if (!relative) {
		return invalid("source", "The workspace cannot depend on itself.")
	}
	return { ok: true, value: { declaration: { path: relative, type: "dir" }, name } }
}

function narrowSpec(spec: SourceSpec, subpath: UniversalPath | undefined): SourceSpec {
	if (!subpath) return spec
	if (spec.type === "dir") {
		return { path: toAbsolutePath(path.join(spec.path, ...subpath.split("/"))), type: "dir" }
	}
	const joined = coerceUniversalPath(spec.path ? `${spec.path}/${subpath}` : subpath)
	return joined ? { ...spec, path: joined } : spec
}

function defaultName(spec: SourceSpec): string {
	if (spec.type === "dir") {
		return path.basename(spec.path)
	}
	const last = spec.path ? spec.path.split("/").at(-1) : undefined
	const repo = spec.url.replace(/\.git$/, "").split(/[/:]/).at(-1)
	return last ?? repo ?? spec.url
}

function manifestLocation(
	spec: SourceSpec,
	snapshot: string,
	subpath: UniversalPath | undefined,
): AbsolutePath {
	const base =
		spec.type === "dir" ? spec.path : path.join(snapshot, ...(subpath?.split("/") ?? []))
	return toAbsolutePath(path.join(base, MANIFEST_FILENAME))
}

function invalid(field: string, message: string): { ok: false; error: ValidationError } {
	return {
		error: { field, message, source: "manual", type: "validation" },
		ok: false,
	}
}
