import { join } from "node:path"
import { describe, expect, it } from "vitest"
import { isGitSource, parseSource, resolveAdditions } from "@/commands/source"
import { DirectoryFetcher } from "@/sources/directory"
import { withTempDir, writeFiles } from "@/tests/helpers"

const interactive = { nonInteractive: false }

describe("isGitSource", () => {
	it("recognizes urls and scp-style remotes", () => {
		expect(isGitSource("https://example.com/team/tools.git")).toBe(true)
		expect(isGitSource("git@example.com:team/tools.git")).toBe(true)
		expect(isGitSource("file:///srv/tools")).toBe(true)
		expect(isGitSource("../tools")).toBe(false)
		expect(isGitSource("tools")).toBe(false)
	})
})

describe("parseSource", () => {
	it("builds a git spec with its ref and subpath", () => {
		const spec = parseSource(
			"https://example.com/team/tools.git",
			{ ...interactive, path: "bundles/lint", tag: "v1" },
			"/work/project",
		)

		expect(spec).toEqual({
			ok: true,
			value: {
				path: "bundles/lint",
				ref: { type: "tag", value: "v1" },
				type: "git",
				url: "https://example.com/team/tools",
			},
		})
	})

	it("resolves directories against the project root", () => {
		const spec = parseSource("../tools", { ...interactive, path: "lint" }, "/work/project")

		expect(spec).toEqual({ ok: true, value: { path: "/work/tools/lint", type: "dir" } })
	})

	it("rejects several refs at once", () => {
		const spec = parseSource(
			"https://example.com/team/tools",
			{ ...interactive, branch: "main", tag: "v1" },
			"/work/project",
		)

		expect(spec).toBeErrOfType("validation")
	})

	it("rejects refs on directory sources", () => {
		const spec = parseSource("../tools", { ...interactive, rev: "abc123" }, "/work/project")

		expect(spec.ok === false && spec.error.message).toBe(
			"--tag, --branch and --rev apply to git sources only.",
		)
	})

	it("rejects a --path leaving the source", () => {
		const spec = parseSource("../tools", { ...interactive, path: "../elsewhere" }, "/work/project")

		expect(spec.ok === false && spec.error.field).toBe("path")
	})
})

describe("resolveAdditions", () => {
	async function additionsFor(
		files: Record<string, string>,
		options: { path?: string; as?: string },
	) {
		return withTempDir(async (dir) => {
			await writeFiles(join(dir, "tools"), files)
			return resolveAdditions(
				"../tools",
				{ ...options, nonInteractive: true },
				{
					cacheDir: join(dir, "cache"),
					fetcher: new DirectoryFetcher(),
					lockRetries: 0,
					root: join(dir, "project"),
				},
			)
		})
	}

	it("names a bundle after its directory", async () => {
		const result = await additionsFor({ "AGENTS.md": "Use tabs.\n" }, {})

		expect(result).toEqual({
			status: "completed",
			value: [{ declaration: { path: "../tools", type: "dir" }, name: "tools" }],
		})
	})

	it("prefers the manifest name and then --as", async () => {
		const files = { "quiver.toml": '[bundle]\nname = "lint-kit"\n' }

		const named = await additionsFor(files, {})
		const renamed = await additionsFor(files, { as: "mine" })

		expect(named.status === "completed" && named.value[0]?.name).toBe("lint-kit")
		expect(renamed.status === "completed" && renamed.value[0]?.name).toBe("mine")
	})

	it("asks for --path when a source holds several bundles", async () => {
		const result = await additionsFor(
			{ "a/quiver.toml": "", "b/quiver.toml": "" },
			{},
		)

		expect(result).toEqual({
			reason: "../tools holds 2 bundles; pick one with --path: a, b",
			status: "unchanged",
		})
	})

	it("takes the bundle --path names", async () => {
		const result = await additionsFor({ "a/quiver.toml": "", "b/quiver.toml": "" }, { path: "b" })

		expect(result).toEqual({
			status: "completed",
			value: [{ declaration: { path: "../tools/b", type: "dir" }, name: "b" }],
		})
	})
})
