import { coerceNonEmpty, type Declaration } from "@quiver/core"
import { describe, expect, it } from "vitest"
import { anchorDeclaration } from "@/resolver/anchor"
import { gitUrl, upath } from "@/tests/helpers"

function dir(value: string): Declaration {
	const path = coerceNonEmpty(value)
	if (!path) throw new Error("empty path")
	return { path, type: "dir" }
}

const url = gitUrl("https://example.com/team/bundles")

describe("anchorDeclaration", () => {
	it("resolves directory declarations against a directory bundle", () => {
		expect(anchorDeclaration(dir("../shared"), { root: "/work/tools", type: "dir" })).toEqual({
			ok: true,
			value: { path: "/work/shared", type: "dir" },
		})
	})

	it("keeps a sibling path inside the same repository and ref", () => {
		const tag = coerceNonEmpty("v1")
		if (!tag) throw new Error("empty ref")
		const anchor = {
			path: upath("bundles/tools"),
			ref: { type: "tag" as const, value: tag },
			type: "git" as const,
			url,
		}

		expect(anchorDeclaration(dir("../base"), anchor)).toEqual({
			ok: true,
			value: { path: "bundles/base", ref: anchor.ref, type: "git", url },
		})
	})

	it("points at the repository root when the path collapses", () => {
		expect(
			anchorDeclaration(dir(".."), { path: upath("tools"), type: "git", url }),
		).toEqual({ ok: true, value: { type: "git", url } })
	})

	it("rejects paths that leave the repository", () => {
		const anchor = { path: upath("tools"), type: "git" as const, url }
		expect(anchorDeclaration(dir("../../x"), anchor)).toBeErrOfType("source_resolution")
	})

	it("passes git declarations through", () => {
		const declaration: Declaration = { type: "git", url }
		expect(anchorDeclaration(declaration, { root: "/work", type: "dir" })).toEqual({
			ok: true,
			value: declaration,
		})
	})
})
