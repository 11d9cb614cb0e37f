import { randomBytes } from "node:crypto"
import path from "node:path"
import {
	coerceNonEmpty,
	type FileTree,
	hashTree,
	type IntegrityMismatchError,
	isContentHash,
	type ParseError,
	type Result,
	type SourceResolutionError,
	type SourceSpec,
	sortedPaths,
	type ValidationError,
} from "@quiver/core"
import { consola } from "consola"
import { z } from "zod"
import {
	CACHE_BUNDLES_DIR,
	CACHE_ENTRY_FILENAME,
	CACHE_FILES_DIR,
	cacheEntryDir,
} from "@/cache/paths"
import {
	ensureDir,
	listDir,
	movePath,
	readOptionalFile,
	removePath,
	safeStat,
	toAbsolutePath,
	writeFileAtomic,
} from "@/io/fs"
import { readTree } from "@/io/tree"
import type { IoError, IoResult } from "@/io/types"
import { describeSpec, sourceIdentity } from "@/sources/identity"
import type { FetchedSource, Fetcher } from "@/sources/types"

export type CacheError = IoError | ParseError | ValidationError | IntegrityMismatchError

export type CacheLookupError = CacheError | SourceResolutionError

export interface CacheListing {
	identity: string
	revision: string
	hash: string
	files: number
	path: string
}

export interface CachedSource extends FetchedSource {
	/** True when the tree came from an existing entry without fetching. */
	cached: boolean
}

const entrySchema = z
	.object({
		files: z.number().int().nonnegative(),
		hash: z.string().refine(isContentHash, { message: "Invalid content hash." }),
		identity: z.string().min(1),
		revision: z.string().min(1),
		version: z.literal(1),
	})
	.strict()

type CacheEntryRecord = z.infer<typeof entrySchema>

export async function readCacheEntry(
	root: string,
	identity: string,
	revision: string,
): Promise<Result<FileTree | null, CacheError>> {
	const dir = cacheEntryDir(root, identity, revision)
	const record = await readEntryRecord(dir)
	if (!record.ok) {
		return record
	}
	if (record.value === null) {
		return { ok: true, value: null }
	}

	if (record.value.identity !== identity || record.value.revision !== revision) {
		return {
			error: {
				field: "identity",
				message: `Cache entry ${dir} belongs to ${record.value.identity}@${record.value.revision}.`,
				path: toAbsolutePath(dir),
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	const tree = await readTree(path.join(dir, CACHE_FILES_DIR))
	if (!tree.ok) {
		return tree
	}

	const actual = hashTree(tree.value)
	if (actual !== record.value.hash) {
		return {
			error: {
				actual,
				expected: record.value.hash,
				message: `Cache entry for ${identity}@${revision} does not match its recorded hash.`,
				target: dir,
				type: "integrity_mismatch",
			},
			ok: false,
		}
	}

	return { ok: true, value: tree.value }
}

/**
 * Writes an entry once. The tree is staged in a sibling directory and renamed
 * into place; an entry that already exists is left untouched.
 */
export async function storeCacheEntry(
	root: string,
	identity: string,
	revision: string,
	tree: FileTree,
): Promise<IoResult<void>> {
	const dir = cacheEntryDir(root, identity, revision)
	const existing = await safeStat(dir)
	if (!existing.ok) {
		return existing
	}
	if (existing.value) {
		return { ok: true, value: undefined }
	}

	const parent = await ensureDir(path.dirname(dir))
	if (!parent.ok) {
		return parent
	}

	const staging = `${dir}.${randomBytes(6).toString("hex")}.tmp`
	const staged = await stageEntry(staging, identity, revision, tree)
	if (!staged.ok) {
		const cleanup = await removePath(staging)
		if (!cleanup.ok) staged.error.cause = cleanup.error
		return staged
	}

	const moved = await movePath(staging, dir)
	if (moved.ok) {
		return moved
	}

	// Another process stored the same revision first.
	const raced = await safeStat(dir)
	const cleanup = await removePath(staging)
	if (raced.ok && raced.value && cleanup.ok) {
		return { ok: true, value: undefined }
	}
	return moved
}

/**
 * Returns the tree for `spec`, from the cache when the fetcher can name the
 * revision up front and an entry exists, otherwise by fetching and storing.
 */
export async function getOrFetch(
	root: string,
	spec: SourceSpec,
	fetcher: Fetcher,
): Promise<Result<CachedSource, CacheLookupError>> {
	const identity = sourceIdentity(spec)

	if (fetcher.resolveRevision) {
		const revision = await fetcher.resolveRevision(spec)
		if (!revision.ok) {
			return revision
		}
		if (revision.value) {
			const cached = await readCacheEntry(root, identity, revision.value)
			if (!cached.ok) {
				return cached
			}
			if (cached.value) {
				consola.debug(`Cache hit for ${describeSpec(spec)} at ${revision.value}.`)
				return {
					ok: true,
					value: { cached: true, revision: revision.value, tree: cached.value },
				}
			}
		}
	}

	consola.debug(`Fetching ${describeSpec(spec)}.`)
	const fetched = await fetcher.fetch(spec)
	if (!fetched.ok) {
		return fetched
	}

	const stored = await storeCacheEntry(
		root,
		identity,
		fetched.value.revision,
		fetched.value.tree,
	)
	if (!stored.ok) {
		return stored
	}

	return { ok: true, value: { ...fetched.value, cached: false } }
}

/**
 * Loads the snapshot of a source at a locked revision. Falls back to fetching
 * when the entry is gone; the fetched revision must match the lock.
 */
export async function loadPinned(
	root: string,
	spec: SourceSpec,
	revision: string,
	fetcher: Fetcher,
): Promise<Result<FileTree, CacheLookupError>> {
	const identity = sourceIdentity(spec)
	const cached = await readCacheEntry(root, identity, revision)
	if (!cached.ok) {
		return cached
	}
	if (cached.value) {
		return { ok: true, value: cached.value }
	}

	let pinned = spec
	const rev = coerceNonEmpty(revision)
	if (spec.type === "git" && rev) {
		pinned = { ...spec, ref: { type: "rev", value: rev } }
	}
	const fetched = await getOrFetch(root, pinned, fetcher)
	if (!fetched.ok) {
		return fetched
	}
	if (fetched.value.revision !== revision) {
		return {
			error: {
				message: `${describeSpec(spec)} changed since it was locked at ${revision}.`,
				source: describeSpec(spec),
				type: "source_resolution",
			},
			ok: false,
		}
	}
	return { ok: true, value: fetched.value.tree }
}

export async function listCacheEntries(root: string): Promise<Result<CacheListing[], CacheError>> {
	const bundlesDir = path.join(root, CACHE_BUNDLES_DIR)
	const stats = await safeStat(bundlesDir)
	if (!stats.ok) {
		return stats
	}
	if (!stats.value) {
		return { ok: true, value: [] }
	}

	const sources = await listDir(bundlesDir)
	if (!sources.ok) {
		return sources
	}

	const listings: CacheListing[] = []
	for (const source of sources.value) {
		if (!source.isDirectory) continue
		const revisions = await listDir(path.join(bundlesDir, source.name))
		if (!revisions.ok) {
			return revisions
		}
		for (const revision of revisions.value) {
			if (!revision.isDirectory || revision.name.endsWith(".tmp")) continue
			const dir = path.join(bundlesDir, source.name, revision.name)
			const record = await readEntryRecord(dir)
			if (!record.ok) {
				return record
			}
			if (!record.value) continue
			listings.push({
				files: record.value.files,
				hash: record.value.hash,
				identity: record.value.identity,
				path: dir,
				revision: record.value.revision,
			})
		}
	}

	listings.sort(
		(a, b) =>
			a.identity.localeCompare(b.identity) || a.revision.localeCompare(b.revision),
	)
	return { ok: true, value: listings }
}

/** Removes every entry; returns how many there were. */
export async function cleanCache(root: string): Promise<Result<number, CacheError>> {
	const listings = await listCacheEntries(root)
	if (!listings.ok) {
		return listings
	}

	const removed = await removePath(path.join(root, CACHE_BUNDLES_DIR))
	if (!removed.ok) {
		return removed
	}
	return { ok: true, value: listings.value.length }
}

async function stageEntry(
	staging: string,
	identity: string,
	revision: string,
	tree: FileTree,
): Promise<IoResult<void>> {
	const filesDir = path.join(staging, CACHE_FILES_DIR)
	const created = await ensureDir(filesDir)
	if (!created.ok) {
		return created
	}

	for (const file of sortedPaths(tree)) {
		const contents = tree.get(file)
		if (!contents) continue
		const target = path.join(filesDir, ...file.split("/"))
		const dir = await ensureDir(path.dirname(target))
		if (!dir.ok) {
			return dir
		}
		const written = await writeFileAtomic(target, contents)
		if (!written.ok) {
			return written
		}
	}

	const record: CacheEntryRecord = {
		files: tree.size,
		hash: hashTree(tree),
		identity,
		revision,
		version: 1,
	}
	return writeFileAtomic(
		path.join(staging, CACHE_ENTRY_FILENAME),
		`${JSON.stringify(record, null, 2)}\n`,
	)
}

async function readEntryRecord(
	dir: string,
): Promise<Result<CacheEntryRecord | null, CacheError>> {
	const entryPath = path.join(dir, CACHE_ENTRY_FILENAME)
	const contents = await readOptionalFile(entryPath)
	if (!contents.ok) {
		return contents
	}
	if (contents.value === null) {
		return { ok: true, value: null }
	}

	let raw: unknown
	try {
		raw = JSON.parse(contents.value.toString("utf8"))
	} catch (error) {
		return {
			error: {
				message: `Unable to parse cache entry ${entryPath}.`,
				path: toAbsolutePath(entryPath),
				rawError: error instanceof Error ? error : undefined,
				source: "json",
				type: "parse",
			},
			ok: false,
		}
	}

	const parsed = entrySchema.safeParse(raw)
	if (!parsed.success) {
		return {
			error: {
				field: "entry",
				message: `Invalid cache entry ${entryPath}.`,
				path: toAbsolutePath(entryPath),
				source: "zod",
				type: "validation",
				zodError: parsed.error,
			},
			ok: false,
		}
	}
	return { ok: true, value: parsed.data }
}
