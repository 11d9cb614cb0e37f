import path from "node:path"
import type { GitRef, LockedSource, SourceSpec } from "@quiver/core"
import { toAbsolutePath } from "@/io/fs"

/**
 * Stable cache identity of a source: where it lives, not which revision.
 * Refs are left out; the revision half of the cache key pins the content.
 */
export function sourceIdentity(spec: SourceSpec): string {
	switch (spec.type) {
		case "dir":
			return `dir:${spec.path}`
		case "git":
			return `git:${spec.url}#${spec.path ?? ""}`
	}
}

export function refKey(ref: GitRef | undefined): string {
	return ref ? `${ref.type}:${ref.value}` : ""
}

export function describeSpec(spec: SourceSpec): string {
	switch (spec.type) {
		case "dir":
			return spec.path
		case "git": {
			const subpath = spec.path ? `#${spec.path}` : ""
			const ref = spec.ref ? `@${spec.ref.value}` : ""
			return `${spec.url}${subpath}${ref}`
		}
	}
}

/** Rebuilds the spec a locked source was resolved from. */
export function specFromLocked(source: LockedSource, workspaceRoot: string): SourceSpec {
	switch (source.type) {
		case "dir":
			return {
				path: toAbsolutePath(path.resolve(workspaceRoot, ...source.path.split("/"))),
				type: "dir",
			}
		case "git":
			return {
				type: "git",
				url: source.url,
				...(source.ref ? { ref: source.ref } : {}),
				...(source.path ? { path: source.path } : {}),
			}
	}
}

/** Workspace-relative, forward-slash form of a directory source for the lockfile. */
export function lockedDirPath(absolutePath: string, workspaceRoot: string): string {
	const relative = path.relative(workspaceRoot, absolutePath)
	return relative ? relative.split(path.sep).join("/") : "."
}
