import { describe, expect, it } from "vitest"
import { builtinPlatforms, findPlatform } from "../platforms/builtin"
import type { UniversalPath } from "../types/branded"
import type { Platform } from "../types/platform"
import { applyExtension, resolveTransform } from "./resolve"

function platform(id: string): Platform {
	const found = findPlatform(builtinPlatforms(), id)
	if (!found) throw new Error(`missing platform ${id}`)
	return found
}

const up = (value: string) => value as UniversalPath

describe("resolveTransform", () => {
	it("maps commands into the claude commands directory", () => {
		expect(resolveTransform(up("commands/debug.md"), platform("claude"))).toEqual([
			{ merge: "replace", output: ".claude/commands/debug.md" },
		])
	})

	it("keeps nested directories captured by **", () => {
		expect(
			resolveTransform(up("commands/git/rebase.md"), platform("claude")),
		).toEqual([{ merge: "replace", output: ".claude/commands/git/rebase.md" }])
	})

	it("substitutes the captured skill name", () => {
		expect(
			resolveTransform(up("skills/pdf/SKILL.md"), platform("cursor")),
		).toEqual([{ merge: "replace", output: ".cursor/skills/pdf/SKILL.md" }])
	})

	it("applies the extension override for cursor rules", () => {
		expect(resolveTransform(up("rules/style.md"), platform("cursor"))).toEqual([
			{ merge: "replace", output: ".cursor/rules/style.mdc" },
		])
	})

	it("falls back to the file stem when the rule captures no name", () => {
		expect(
			resolveTransform(up("rules/team/review.md"), platform("copilot")),
		).toEqual([
			{ merge: "replace", output: ".github/instructions/review.instructions.md" },
		])
	})

	it("selects the merge strategy of the matching rule", () => {
		expect(resolveTransform(up("mcp.jsonc"), platform("claude"))).toEqual([
			{ merge: "deep", output: ".mcp.json" },
		])
		expect(resolveTransform(up("AGENTS.md"), platform("gemini"))).toEqual([
			{ merge: "composite", output: "GEMINI.md" },
		])
	})

	it("uses the first matching rule", () => {
		expect(resolveTransform(up("rules/a.md"), platform("junie"))).toEqual([
			{ merge: "composite", output: ".junie/guidelines.md" },
		])
	})

	it("returns nothing when no rule matches", () => {
		expect(resolveTransform(up("commands/debug.md"), platform("kiro"))).toEqual([])
		expect(resolveTransform(up("quiver.toml"), platform("claude"))).toEqual([])
	})
})

describe("applyExtension", () => {
	it("replaces the last extension", () => {
		expect(applyExtension("a/b/review.md", "mdc")).toBe("a/b/review.mdc")
	})

	it("leaves outputs that already carry the extension", () => {
		expect(applyExtension("x/review.prompt.md", "prompt.md")).toBe("x/review.prompt.md")
	})

	it("appends when the file has no extension", () => {
		expect(applyExtension("x/README", ".txt")).toBe("x/README.txt")
	})
})
