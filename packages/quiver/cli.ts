#!/usr/bin/env tsx

import { Command } from "commander"
import { cacheCleanCommand, cacheListCommand } from "@/commands/cache"
import { collectPlatforms, installCommand } from "@/commands/install"
import { listCommand } from "@/commands/list"
import { showCommand } from "@/commands/show"
import { uninstallCommand } from "@/commands/uninstall"
import pkg from "./package.json" with { type: "json" }

async function main(): Promise<void> {
	const program = new Command()

	program
		.name("qv")
		.description("Install configuration bundles into coding-agent platforms")
		.version(pkg.version, "-V, --version", "Output the version number")
		.showHelpAfterError()
		.showSuggestionAfterError()

	program
		.command("install")
		.description("Add a bundle, or install everything the workspace declares")
		.argument("[source]", "Directory or git url of a bundle to add")
		.option("--tag <tag>", "Use a specific git tag")
		.option("--branch <branch>", "Use a specific git branch")
		.option("--rev <rev>", "Use a specific git commit")
		.option("--path <path>", "Use a subdirectory inside the source")
		.option("--as <name>", "Override the bundle name")
		.option("--frozen", "Fail if the lockfile would change")
		.option(
			"--platform <ids>",
			"Install for these platforms (repeatable, comma-separated)",
			collectPlatforms,
			[],
		)
		.option("--non-interactive", "Run without prompts")
		.action(
			async (
				source: string | undefined,
				options: {
					tag?: string
					branch?: string
					rev?: string
					path?: string
					as?: string
					frozen?: boolean
					platform: string[]
					nonInteractive?: boolean
				},
			) => {
				await installCommand(source, {
					as: options.as,
					branch: options.branch,
					frozen: Boolean(options.frozen),
					nonInteractive: Boolean(options.nonInteractive) || !process.stdin.isTTY,
					path: options.path,
					platforms: options.platform,
					rev: options.rev,
					tag: options.tag,
				})
			},
		)

	program
		.command("uninstall")
		.description("Remove bundles and everything only they depended on")
		.argument("<names...>", "Bundle names")
		.action(async (names: string[]) => {
			await uninstallCommand(names)
		})

	program
		.command("list")
		.description("List locked bundles in install order")
		.option("--detailed", "Include source, file count and hash")
		.action(async (options: { detailed?: boolean }) => {
			await listCommand({ detailed: Boolean(options.detailed) })
		})

	program
		.command("show")
		.description("Show one bundle's lock record and installed outputs")
		.argument("<name>", "Bundle name")
		.action(async (name: string) => {
			await showCommand(name)
		})

	const cache = program.command("cache").description("Inspect the shared bundle cache")

	cache
		.command("list")
		.description("List cached snapshots")
		.action(async () => {
			await cacheListCommand()
		})

	cache
		.command("clean")
		.description("Delete every cached snapshot")
		.action(async () => {
			await cacheCleanCommand()
		})

	if (process.argv.length <= 2) {
		program.outputHelp()
		return
	}

	await program.parseAsync(process.argv)
}

void main()
