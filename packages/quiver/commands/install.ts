import { consola } from "consola"
import { loadContext } from "@/commands/context"
import { type Addition, resolveAdditions } from "@/commands/source"
import { CommandResult, printOutcome } from "@/commands/types"
import { install } from "@/install/install"
import type { InstallSummary } from "@/install/types"

export interface InstallCommandOptions {
	tag?: string
	branch?: string
	rev?: string
	path?: string
	as?: string
	frozen: boolean
	platforms: string[]
	nonInteractive: boolean
}

const NO_PLATFORMS =
	"No platforms detected. Enable one under [platforms] in .quiver/quiver.toml or pass --platform <id>."

export async function installCommand(
	source: string | undefined,
	options: InstallCommandOptions,
): Promise<void> {
	consola.info(source ? `qv install ${source}` : "qv install")
	printOutcome(await runInstallCommand(source, options))
}

export async function runInstallCommand(
	source: string | undefined,
	options: InstallCommandOptions,
): Promise<CommandResult<void>> {
	const context = loadContext()
	if (!context.ok) {
		return CommandResult.failed(context.error)
	}

	let additions: Addition[] | undefined
	if (source !== undefined) {
		const resolved = await resolveAdditions(source, options, context.value)
		if (resolved.status !== "completed") {
			return resolved
		}
		additions = resolved.value
	}

	consola.start(options.frozen ? "Installing from the lockfile..." : "Installing...")
	const result = await install({
		...context.value,
		add: additions,
		frozen: options.frozen,
		platforms: options.platforms.length > 0 ? options.platforms : undefined,
	})
	if (!result.ok) {
		return CommandResult.failed(result.error)
	}

	if (result.value.noOpReason === "no-platforms") {
		return CommandResult.unchanged(NO_PLATFORMS)
	}

	reportSummary(result.value)
	return CommandResult.completed(undefined)
}

export function reportSummary(summary: InstallSummary): void {
	consola.success("Install complete.")
	consola.info(
		`Locked ${summary.bundles.length} bundle(s)${summary.lockfileChanged ? "" : ", lockfile unchanged"}.`,
	)
	consola.info(`Platforms: ${summary.platforms.join(", ")}`)
	consola.info(
		`Wrote ${summary.written.length} file(s), removed ${summary.removed.length} stale file(s).`,
	)
	for (const migrated of summary.migrated) {
		consola.info(`Kept your edits in .quiver/${migrated}`)
	}
	for (const warning of summary.warnings) {
		consola.warn(warning)
	}
}

/** Splits repeated and comma-separated `--platform` values. */
export function collectPlatforms(value: string, previous: string[]): string[] {
	const ids = value
		.split(",")
		.map((id) => id.trim())
		.filter((id) => id.length > 0)
	return [...previous, ...ids]
}
