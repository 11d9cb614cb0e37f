import { createHash } from "node:crypto"
import path from "node:path"

export const CACHE_BUNDLES_DIR = "bundles"
export const CACHE_ENTRY_FILENAME = "entry.json"
export const CACHE_FILES_DIR = "files"

const MAX_SLUG_TEXT = 48

/**
 * Filesystem-safe directory name: a readable prefix plus a short digest of the
 * full text, so distinct keys never share a directory.
 */
export function slugify(text: string): string {
	const readable = text
		.replace(/[^A-Za-z0-9._-]+/g, "-")
		.replace(/^[-.]+|-+$/g, "")
		.slice(0, MAX_SLUG_TEXT)
	const digest = createHash("sha256").update(text).digest("hex").slice(0, 12)
	return readable ? `${readable}-${digest}` : digest
}

export function cacheEntryDir(root: string, identity: string, revision: string): string {
	return path.join(root, CACHE_BUNDLES_DIR, slugify(identity), slugify(revision))
}
