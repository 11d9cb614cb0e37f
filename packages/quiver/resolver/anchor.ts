import path from "node:path"
import {
	coerceUniversalPath,
	type Declaration,
	type GitRef,
	type GitUrl,
	type Result,
	type SourceResolutionError,
	type SourceSpec,
	type UniversalPath,
} from "@quiver/core"
import { toAbsolutePath } from "@/io/fs"

/** Where relative `path` declarations of a bundle are resolved from. */
export type Anchor =
	| { type: "dir"; root: string }
	| { type: "git"; url: GitUrl; ref?: GitRef; path?: UniversalPath }

export function anchorFor(spec: SourceSpec): Anchor {
	switch (spec.type) {
		case "dir":
			return { root: spec.path, type: "dir" }
		case "git":
			return spec
	}
}

/**
 * Turns a declaration into a concrete source. Directory declarations resolve
 * next to a directory bundle, or to a subpath of the same repository and ref
 * inside a git bundle.
 */
export function anchorDeclaration(
	declaration: Declaration,
	anchor: Anchor,
): Result<SourceSpec, SourceResolutionError> {
	if (declaration.type === "git") {
		return { ok: true, value: declaration }
	}

	if (path.isAbsolute(declaration.path)) {
		return { ok: true, value: { path: toAbsolutePath(declaration.path), type: "dir" } }
	}
	if (anchor.type === "dir") {
		return {
			ok: true,
			value: { path: toAbsolutePath(path.resolve(anchor.root, declaration.path)), type: "dir" },
		}
	}

	const joined = path.posix.normalize(
		path.posix.join(anchor.path ?? "", declaration.path.replace(/\\/g, "/")),
	)
	if (joined === "." || joined === "") {
		return {
			ok: true,
			value: { type: "git", url: anchor.url, ...(anchor.ref ? { ref: anchor.ref } : {}) },
		}
	}

	const subpath = coerceUniversalPath(joined)
	if (!subpath) {
		return {
			error: {
				message: `Path ${declaration.path} leaves the repository ${anchor.url}.`,
				source: `${anchor.url}#${anchor.path ?? ""}`,
				type: "source_resolution",
			},
			ok: false,
		}
	}

	return {
		ok: true,
		value: {
			path: subpath,
			type: "git",
			url: anchor.url,
			...(anchor.ref ? { ref: anchor.ref } : {}),
		},
	}
}
