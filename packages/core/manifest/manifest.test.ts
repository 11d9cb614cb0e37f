import { describe, expect, it } from "vitest"
import type { AbsolutePath } from "../types/branded"
import { parseManifest } from "./parse"
import { serializeManifest } from "./serialize"

const manifestPath = "/workspace/.quiver/quiver.toml" as AbsolutePath

describe("parseManifest", () => {
	it("reads bundle metadata, platforms and dependencies in file order", () => {
		const result = parseManifest(
			`[bundle]
name = "app"
description = "Team setup"

[platforms]
claude = true
cursor = false

[dependencies]
zeta = { path = "../zeta" }
alpha = { git = "https://github.com/acme/alpha.git", branch = "main", path = "bundles/core" }
`,
			manifestPath,
		)

		expect(result.ok).toBe(true)
		if (!result.ok) return
		expect(result.value.bundle).toEqual({ description: "Team setup", name: "app" })
		expect([...result.value.platforms]).toEqual([
			["claude", true],
			["cursor", false],
		])
		expect([...result.value.dependencies]).toEqual([
			["zeta", { path: "../zeta", type: "dir" }],
			[
				"alpha",
				{
					path: "bundles/core",
					ref: { type: "branch", value: "main" },
					type: "git",
					url: "https://github.com/acme/alpha",
				},
			],
		])
	})

	it("rejects more than one ref", () => {
		const result = parseManifest(
			`[dependencies]
alpha = { git = "https://github.com/acme/alpha", tag = "v1", branch = "main" }
`,
			manifestPath,
		)
		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.message).toContain("Only one of tag, branch, or rev may be set.")
		}
	})

	it("rejects unknown keys", () => {
		const result = parseManifest(`[bundle]\nauthor = "someone"\n`, manifestPath)
		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.type).toBe("validation")
		}
	})

	it("rejects a repository subpath that escapes the repository", () => {
		const result = parseManifest(
			`[dependencies]\nalpha = { git = "https://github.com/acme/alpha", path = "../x" }\n`,
			manifestPath,
		)
		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error).toMatchObject({
				field: "dependencies.alpha",
				message: 'Invalid repository subpath "../x".',
			})
		}
	})

	it("reports invalid TOML as a parse error", () => {
		const result = parseManifest("[bundle\n", manifestPath)
		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.type).toBe("parse")
		}
	})

	it("accepts an empty file", () => {
		const result = parseManifest("", manifestPath)
		expect(result.ok).toBe(true)
		if (result.ok) {
			expect(result.value.dependencies.size).toBe(0)
			expect(result.value.bundle).toBeUndefined()
		}
	})
})

describe("serializeManifest", () => {
	it("writes a manifest that parses back to the same value", () => {
		const source = `[bundle]
name = "app"

[dependencies]
tools = { git = "https://github.com/acme/tools", tag = "v1.2.0" }
local = { path = "./bundles/local" }
`
		const first = parseManifest(source, manifestPath)
		if (!first.ok) throw new Error(first.error.message)

		const second = parseManifest(serializeManifest(first.value), manifestPath)
		expect(second).toEqual(first)
	})

	it("writes nothing for an empty manifest", () => {
		expect(
			serializeManifest({ dependencies: new Map(), platforms: new Map() }),
		).toBe("")
	})
})
