import { mkdir, writeFile } from "node:fs/promises"
import { join } from "node:path"
import { coerceNonEmpty } from "@quiver/core"
import lockfile from "proper-lockfile"
import { afterEach, describe, expect, it, vi } from "vitest"
import { cleanCache } from "@/cache/store"
import { install } from "@/install/install"
import { listBundles } from "@/query/list"
import { showBundle } from "@/query/show"
import { exists, name, readText, withTempDir, writeFiles } from "@/tests/helpers"
import { claudeBlock, setupProject, toolsBundle } from "@/tests/integration/setup"
import { Transaction } from "@/transaction/transaction"
import { loadWorkspaceState } from "@/workspace/state"

describe("install", () => {
	afterEach(() => {
		vi.restoreAllMocks()
	})

	it("installs a local bundle's resources for the selected platform", async () => {
		await withTempDir(async (dir) => {
			const project = await setupProject(dir, { dirs: { tools: "../tools" } }, {
				tools: toolsBundle,
			})

			const result = await install(project.options())

			expect(result.ok).toBe(true)
			if (!result.ok) return
			expect(result.value.bundles).toEqual(["tools", "project"])
			expect(result.value.platforms).toEqual(["claude"])
			expect(result.value.written).toEqual([".claude/commands/lint.md", "CLAUDE.md"])
			expect(result.value.lockfileChanged).toBe(true)
			expect(await readText(join(project.root, ".claude/commands/lint.md"))).toBe("# Lint\n")
			expect(await readText(join(project.root, "CLAUDE.md"))).toBe(claudeBlock)

			const locked = JSON.parse(await readText(join(project.root, ".quiver/quiver.lock")))
			expect(locked.workspace).toBe("project")
			expect(locked.bundles[0].source).toMatchObject({ path: "../tools", type: "dir" })
			expect(locked.bundles[0].files).toEqual(["AGENTS.md", "commands/lint.md"])
		})
	})

	it("changes nothing when run twice", async () => {
		await withTempDir(async (dir) => {
			const project = await setupProject(dir, { dirs: { tools: "../tools" } }, {
				tools: toolsBundle,
			})
			await install(project.options())
			const lockPath = join(project.root, ".quiver/quiver.lock")
			const indexPath = join(project.root, ".quiver/quiver.index.json")
			const lockBefore = await readText(lockPath)
			const indexBefore = await readText(indexPath)

			const again = await install(project.options())

			expect(again.ok).toBe(true)
			if (!again.ok) return
			expect(again.value.written).toEqual([])
			expect(again.value.removed).toEqual([])
			expect(again.value.lockfileChanged).toBe(false)
			expect(await readText(lockPath)).toBe(lockBefore)
			expect(await readText(indexPath)).toBe(indexBefore)
		})
	})

	it("adds a declaration to the manifest before installing", async () => {
		await withTempDir(async (dir) => {
			const project = await setupProject(dir, {}, { tools: toolsBundle })
			const declared = coerceNonEmpty("../tools")
			if (!declared) throw new Error("empty path")

			const result = await install(
				project.options({
					add: [{ declaration: { path: declared, type: "dir" }, name: name("tools") }],
				}),
			)

			expect(result.ok).toBe(true)
			const state = await loadWorkspaceState(project.root)
			expect(state.ok && state.value.manifest.dependencies.get(name("tools"))).toEqual({
				path: "../tools",
				type: "dir",
			})
			expect(await exists(join(project.root, ".claude/commands/lint.md"))).toBe(true)
		})
	})

	it("writes the manifest, lockfile and index after every output", async () => {
		await withTempDir(async (dir) => {
			const project = await setupProject(dir, {}, { tools: toolsBundle })
			const declared = coerceNonEmpty("../tools")
			if (!declared) throw new Error("empty path")
			const writeFileSpy = vi.spyOn(Transaction.prototype, "writeFile")
			const writeRecordSpy = vi.spyOn(Transaction.prototype, "writeRecord")

			const result = await install(
				project.options({
					add: [{ declaration: { path: declared, type: "dir" }, name: name("tools") }],
				}),
			)

			expect(result.ok).toBe(true)
			expect(writeRecordSpy.mock.calls.map(([target]) => target)).toEqual([
				join(project.root, ".quiver", "quiver.toml"),
				join(project.root, ".quiver", "quiver.lock"),
				join(project.root, ".quiver", "quiver.index.json"),
			])
			expect(writeFileSpy.mock.calls.length).toBeGreaterThan(0)
			const lastOutput = Math.max(...writeFileSpy.mock.invocationCallOrder)
			const firstRecord = Math.min(...writeRecordSpy.mock.invocationCallOrder)
			expect(firstRecord).toBeGreaterThan(lastOutput)
		})
	})

	it("returns without changes when no platform is selected", async () => {
		await withTempDir(async (dir) => {
			const project = await setupProject(dir, { dirs: { tools: "../tools" } }, {
				tools: toolsBundle,
			})

			const result = await install(project.options({ platforms: [] }))

			expect(result.ok && result.value.noOpReason).toBe("no-platforms")
			expect(await exists(join(project.root, ".quiver/quiver.lock"))).toBe(false)
		})
	})

	it("keeps edits to installed files in the workspace bundle", async () => {
		await withTempDir(async (dir) => {
			const project = await setupProject(dir, { dirs: { tools: "../tools" } }, {
				tools: toolsBundle,
			})
			await install(project.options())
			const output = join(project.root, ".claude/commands/lint.md")
			await writeFile(output, "# Lint (local)\n")

			const result = await install(project.options())

			expect(result.ok).toBe(true)
			if (!result.ok) return
			expect(result.value.migrated).toEqual(["commands/lint.md"])
			expect(await readText(join(project.root, ".quiver/commands/lint.md"))).toBe(
				"# Lint (local)\n",
			)
			expect(await readText(output)).toBe("# Lint (local)\n")

			const state = await loadWorkspaceState(project.root)
			const entry = state.ok
				? state.value.index?.entries.find((candidate) => candidate.path === "commands/lint.md")
				: undefined
			expect(entry?.bundle).toBe("project")
		})
	})

	it("deep-merges into an existing file and remembers what was there", async () => {
		await withTempDir(async (dir) => {
			const project = await setupProject(dir, { dirs: { tools: "../tools" } }, {
				tools: { "mcp.jsonc": '{ "mcpServers": { "lint": { "command": "lint" } } }' },
			})
			const original = '{"mcpServers":{"local":{"command":"serve"}}}'
			await writeFiles(project.root, { ".mcp.json": original })

			const result = await install(project.options())

			expect(result.ok).toBe(true)
			const merged = JSON.parse(await readText(join(project.root, ".mcp.json")))
			expect(merged).toEqual({
				mcpServers: { lint: { command: "lint" }, local: { command: "serve" } },
			})
			const state = await loadWorkspaceState(project.root)
			expect(state.ok && state.value.index?.baselines).toEqual({ ".mcp.json": original })
		})
	})

	it("drops merged keys a bundle stops providing", async () => {
		await withTempDir(async (dir) => {
			const project = await setupProject(dir, { dirs: { tools: "../tools" } }, {
				tools: { "mcp.jsonc": '{"mcpServers":{"old":{"command":"old"}},"list":["a"]}' },
			})
			await writeFiles(project.root, {
				".mcp.json": '{"mcpServers":{"local":{"command":"serve"}}}',
			})
			await install(project.options())
			await writeFile(
				join(dir, "tools", "mcp.jsonc"),
				'{"mcpServers":{"new":{"command":"new"}},"list":["b"]}',
			)

			const result = await install(project.options())

			expect(result.ok).toBe(true)
			const merged = JSON.parse(await readText(join(project.root, ".mcp.json")))
			expect(merged).toEqual({
				list: ["b"],
				mcpServers: { local: { command: "serve" }, new: { command: "new" } },
			})
		})
	})

	it("leaves the workspace untouched when applying fails", async () => {
		await withTempDir(async (dir) => {
			const project = await setupProject(dir, { dirs: { tools: "../tools" } }, {
				tools: toolsBundle,
			})
			await mkdir(join(project.root, "CLAUDE.md"))

			const result = await install(project.options())

			expect(result.ok).toBe(false)
			if (!result.ok) {
				expect(result.error.stage).toBe("apply")
				expect(result.error.type).toBe("io")
			}
			expect(await exists(join(project.root, ".claude"))).toBe(false)
			expect(await exists(join(project.root, ".quiver/quiver.lock"))).toBe(false)
			expect(await exists(join(project.root, ".quiver/quiver.index.json"))).toBe(false)
		})
	})

	it("fails fast while another process holds the workspace lock", async () => {
		await withTempDir(async (dir) => {
			const project = await setupProject(dir, {})
			const workspaceDir = join(project.root, ".quiver")
			const release = await lockfile.lock(workspaceDir, {
				lockfilePath: join(workspaceDir, ".lock"),
			})

			try {
				const result = await install(project.options())
				expect(result.ok).toBe(false)
				if (!result.ok) {
					expect(result.error.stage).toBe("lock")
					expect(result.error.type).toBe("lock_contention")
				}
			} finally {
				await release()
			}
		})
	})
})

describe("resolution failures", () => {
	it("rejects one name declared from two sources", async () => {
		await withTempDir(async (dir) => {
			const project = await setupProject(
				dir,
				{ dirs: { a: "../a", b: "../b" } },
				{
					a: { "quiver.toml": '[dependencies.shared]\npath = "../one"\n' },
					b: { "quiver.toml": '[dependencies.shared]\npath = "../two"\n' },
					one: { "rules/a.md": "one" },
					two: { "rules/a.md": "two" },
				},
			)

			const result = await install(project.options())

			expect(result.ok).toBe(false)
			if (!result.ok) {
				expect(result.error.stage).toBe("resolve")
				expect(result.error.cause?.message).toBe(
					`Bundle shared is declared from two sources: ${join(dir, "one")} and ${join(dir, "two")}.`,
				)
			}
		})
	})

	it("reports a dependency cycle with its chain", async () => {
		await withTempDir(async (dir) => {
			const project = await setupProject(
				dir,
				{ dirs: { a: "../a" } },
				{
					a: { "quiver.toml": '[dependencies.b]\npath = "../b"\n' },
					b: { "quiver.toml": '[dependencies.a]\npath = "../a"\n' },
				},
			)

			const result = await install(project.options())

			expect(result.ok).toBe(false)
			if (!result.ok && result.error.type === "circular_dependency") {
				expect(result.error.chain).toEqual(["a", "b", "a"])
			}
			expect(result.ok === false && result.error.type).toBe("circular_dependency")
			expect(await exists(join(project.root, ".quiver/quiver.lock"))).toBe(false)
			expect(await exists(join(project.root, ".quiver/quiver.index.json"))).toBe(false)
			expect(await exists(join(project.root, ".claude"))).toBe(false)
		})
	})
})

describe("frozen installs", () => {
	it("requires a lockfile", async () => {
		await withTempDir(async (dir) => {
			const project = await setupProject(dir, { dirs: { tools: "../tools" } }, {
				tools: toolsBundle,
			})

			const result = await install(project.options({ frozen: true }))

			expect(result.ok).toBe(false)
			if (!result.ok && result.error.type === "frozen_mismatch") {
				expect(result.error.differences).toEqual(["lockfile missing"])
			}
			expect(result.ok === false && result.error.stage).toBe("frozen")
		})
	})

	it("fails without writing when a source changed", async () => {
		await withTempDir(async (dir) => {
			const project = await setupProject(dir, { dirs: { tools: "../tools" } }, {
				tools: toolsBundle,
			})
			await install(project.options())
			const lockPath = join(project.root, ".quiver/quiver.lock")
			const lockBefore = await readText(lockPath)
			await writeFile(join(dir, "tools", "commands", "lint.md"), "# Lint v2\n")

			const result = await install(project.options({ frozen: true }))

			expect(result.ok === false && result.error.type).toBe("frozen_mismatch")
			expect(await readText(join(project.root, ".claude/commands/lint.md"))).toBe("# Lint\n")
			expect(await readText(lockPath)).toBe(lockBefore)
		})
	})

	it("checks the lockfile even when no platform is selected", async () => {
		await withTempDir(async (dir) => {
			const project = await setupProject(dir, { dirs: { tools: "../tools" } }, {
				tools: toolsBundle,
			})
			await install(project.options())

			const current = await install(project.options({ frozen: true, platforms: [] }))
			expect(current.ok && current.value.noOpReason).toBe("no-platforms")

			await writeFile(join(dir, "tools", "commands", "lint.md"), "# Lint v2\n")
			const stale = await install(project.options({ frozen: true, platforms: [] }))

			expect(stale.ok).toBe(false)
			if (!stale.ok) {
				expect(stale.error.stage).toBe("frozen")
				expect(stale.error.type).toBe("frozen_mismatch")
			}
		})
	})

	it("cannot add dependencies", async () => {
		await withTempDir(async (dir) => {
			const project = await setupProject(dir, {}, { tools: toolsBundle })
			const declared = coerceNonEmpty("../tools")
			if (!declared) throw new Error("empty path")

			const result = await install(
				project.options({
					add: [{ declaration: { path: declared, type: "dir" }, name: name("tools") }],
					frozen: true,
				}),
			)

			expect(result.ok === false && result.error.type).toBe("validation")
		})
	})
})

describe("git dependencies", () => {
	const url = "https://example.com/team/tools.git"

	it("locks the resolved commit and ref", async () => {
		await withTempDir(async (dir) => {
			const project = await setupProject(dir, { git: { tools: { tag: "v1", url } } })
			const revision = project.fetcher.commit(url, toolsBundle, { tag: "v1" })

			const result = await install(project.options())

			expect(result.ok).toBe(true)
			const locked = JSON.parse(await readText(join(project.root, ".quiver/quiver.lock")))
			expect(locked.bundles[0].source).toEqual({
				ref: { type: "tag", value: "v1" },
				revision,
				type: "git",
				url: "https://example.com/team/tools",
			})
		})
	})

	it("fails a frozen install once a tracked branch moves", async () => {
		await withTempDir(async (dir) => {
			const project = await setupProject(dir, { git: { tools: { branch: "main", url } } })
			project.fetcher.commit(url, toolsBundle, { branch: "main" })
			await install(project.options())
			const lockPath = join(project.root, ".quiver/quiver.lock")
			const lockBefore = await readText(lockPath)
			project.fetcher.commit(
				url,
				{ ...toolsBundle, "commands/lint.md": "# Lint v2\n" },
				{ branch: "main" },
			)

			const result = await install(project.options({ frozen: true }))

			expect(result.ok).toBe(false)
			if (!result.ok) {
				expect(result.error.stage).toBe("frozen")
				expect(result.error.type).toBe("frozen_mismatch")
			}
			expect(await readText(lockPath)).toBe(lockBefore)
			expect(await readText(join(project.root, ".claude/commands/lint.md"))).toBe("# Lint\n")
		})
	})

	it("detects content that changed under a locked commit", async () => {
		await withTempDir(async (dir) => {
			const project = await setupProject(dir, { git: { tools: { url } } })
			const revision = project.fetcher.commit(url, toolsBundle)
			await install(project.options())
			project.fetcher.rewrite(url, revision, { "commands/lint.md": "# Swapped\n" })
			await cleanCache(project.cacheDir)

			const result = await install(project.options())

			expect(result.ok).toBe(false)
			if (!result.ok) {
				expect(result.error.stage).toBe("integrity")
				expect(result.error.type).toBe("integrity_mismatch")
			}
		})
	})
})

describe("queries", () => {
	it("lists and shows installed bundles", async () => {
		await withTempDir(async (dir) => {
			const project = await setupProject(
				dir,
				{ dirs: { tools: "../tools" } },
				{
					tools: {
						...toolsBundle,
						"AGENTS.md": "---\ndescription: Lint helpers\n---\nUse tabs.\n",
						"quiver.toml": '[bundle]\nversion = "1.2.0"\n',
					},
				},
			)
			await install(project.options())

			const listed = await listBundles(project.root)
			expect(listed.ok).toBe(true)
			if (listed.ok) {
				expect(listed.value.map((bundle) => [bundle.name, bundle.direct, bundle.workspace])).toEqual([
					["tools", true, false],
					["project", false, true],
				])
				expect(listed.value[0]?.version).toBe("1.2.0")
				expect(listed.value[0]?.source).toBe("dir:../tools")
			}

			const shown = await showBundle(project.root, "tools", project.cacheDir)
			expect(shown.ok).toBe(true)
			if (shown.ok) {
				expect(shown.value.description).toBe("Lint helpers")
				expect(shown.value.dependents).toEqual(["project"])
				expect(shown.value.outputs.map((output) => output.output)).toEqual([
					"CLAUDE.md",
					".claude/commands/lint.md",
				])
			}

			expect(await showBundle(project.root, "missing", project.cacheDir)).toBeErrOfType(
				"not_found",
			)
		})
	})
})
