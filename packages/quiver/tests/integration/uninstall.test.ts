import { join } from "node:path"
import { describe, expect, it } from "vitest"
import { install } from "@/install/install"
import { uninstall } from "@/install/uninstall"
import { exists, name, readText, withTempDir, writeFiles } from "@/tests/helpers"
import { setupProject, toolsBundle } from "@/tests/integration/setup"

describe("uninstall", () => {
	it("removes a bundle's outputs and prunes emptied directories", async () => {
		await withTempDir(async (dir) => {
			const project = await setupProject(dir, { dirs: { tools: "../tools" } }, {
				tools: toolsBundle,
			})
			await install(project.options())

			const result = await uninstall({ ...project.options(), names: [name("tools")] })

			expect(result.ok).toBe(true)
			if (!result.ok) return
			expect(result.value.dropped).toEqual(["tools"])
			expect(result.value.bundles).toEqual(["project"])
			expect([...result.value.removed].sort()).toEqual([
				".claude/commands/lint.md",
				"CLAUDE.md",
			])
			expect(await exists(join(project.root, "CLAUDE.md"))).toBe(false)
			expect(await exists(join(project.root, ".claude/commands"))).toBe(false)
			expect(await exists(join(project.root, ".claude"))).toBe(true)
			expect(await readText(join(project.root, ".quiver/quiver.toml"))).toBe("")
		})
	})

	it("drops dependencies nothing else reaches", async () => {
		await withTempDir(async (dir) => {
			const project = await setupProject(dir, { dirs: { tools: "../tools" } }, {
				base: { "commands/base.md": "# Base\n" },
				tools: { ...toolsBundle, "quiver.toml": '[dependencies.base]\npath = "../base"\n' },
			})
			const installed = await install(project.options())
			expect(installed.ok && installed.value.bundles).toEqual(["base", "tools", "project"])

			const result = await uninstall({ ...project.options(), names: [name("tools")] })

			expect(result.ok && result.value.dropped).toEqual(["base", "tools"])
			expect(await exists(join(project.root, ".claude/commands/base.md"))).toBe(false)
		})
	})

	it("keeps the rest of a composite file", async () => {
		await withTempDir(async (dir) => {
			const project = await setupProject(dir, { dirs: { tools: "../tools" } }, {
				tools: toolsBundle,
			})
			await writeFiles(project.root, { "CLAUDE.md": "# Notes\n" })
			await install(project.options())
			expect(await readText(join(project.root, "CLAUDE.md"))).toBe(
				"# Notes\n\n<!-- quiver:begin tools -->\nUse tabs.\n<!-- quiver:end tools -->\n",
			)

			await uninstall({ ...project.options(), names: [name("tools")] })

			expect(await readText(join(project.root, "CLAUDE.md"))).toBe("# Notes\n")
		})
	})

	it("restores a merged file to what it held before install", async () => {
		await withTempDir(async (dir) => {
			const project = await setupProject(dir, { dirs: { tools: "../tools" } }, {
				tools: { "mcp.jsonc": '{ "mcpServers": { "lint": { "command": "lint" } } }' },
			})
			const original = '{"mcpServers":{"local":{"command":"serve"}}}'
			await writeFiles(project.root, { ".mcp.json": original })
			await install(project.options())

			const result = await uninstall({ ...project.options(), names: [name("tools")] })

			expect(result.ok).toBe(true)
			expect(await readText(join(project.root, ".mcp.json"))).toBe(original)
		})
	})

	it("rejects names that are not direct dependencies", async () => {
		await withTempDir(async (dir) => {
			const project = await setupProject(dir, { dirs: { tools: "../tools" } }, {
				tools: toolsBundle,
			})
			await install(project.options())

			const result = await uninstall({ ...project.options(), names: [name("other")] })

			expect(result).toBeErrOfType("not_found")
			expect(result.ok === false && result.error.cause?.message).toBe(
				"other is not a direct dependency of this workspace.",
			)
		})
	})
	it("reveals the overridden copy when the overriding bundle goes", async () => {
		await withTempDir(async (dir) => {
			const project = await setupProject(dir, { dirs: { b1: "../b1", b2: "../b2" } }, {
				b1: { "commands/debug.md": "# Debug from b1\n" },
				b2: { "commands/debug.md": "# Debug from b2\n" },
			})
			const output = join(project.root, ".claude/commands/debug.md")
			await install(project.options())
			expect(await readText(output)).toBe("# Debug from b2\n")

			const result = await uninstall({ ...project.options(), names: [name("b2")] })

			expect(result.ok && result.value.written).toEqual([".claude/commands/debug.md"])
			expect(await readText(output)).toBe("# Debug from b1\n")
		})
	})

	it("keeps a shared dependency until its last dependent goes", async () => {
		await withTempDir(async (dir) => {
			const dependsOnC = '[dependencies.c]\npath = "../c"\n'
			const project = await setupProject(dir, { dirs: { a: "../a", b: "../b" } }, {
				a: { "quiver.toml": dependsOnC },
				b: { "quiver.toml": dependsOnC },
				c: { "commands/c.md": "# C\n" },
			})
			const installed = await install(project.options())
			expect(installed.ok && installed.value.bundles).toEqual(["c", "a", "b", "project"])

			const first = await uninstall({ ...project.options(), names: [name("a")] })
			expect(first.ok && first.value.dropped).toEqual(["a"])
			expect(await exists(join(project.root, ".claude/commands/c.md"))).toBe(true)

			const second = await uninstall({ ...project.options(), names: [name("b")] })
			expect(second.ok && second.value.dropped).toEqual(["c", "b"])
			expect(await exists(join(project.root, ".claude/commands/c.md"))).toBe(false)
		})
	})
})
