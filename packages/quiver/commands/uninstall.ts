import { type BundleName, coerceBundleName } from "@quiver/core"
import { consola } from "consola"
import { loadContext } from "@/commands/context"
import { reportSummary } from "@/commands/install"
import { CommandResult, printOutcome } from "@/commands/types"
import { uninstall } from "@/install/uninstall"

export async function uninstallCommand(names: string[]): Promise<void> {
	consola.info(`qv uninstall ${names.join(" ")}`)
	printOutcome(await runUninstallCommand(names))
}

export async function runUninstallCommand(names: string[]): Promise<CommandResult<void>> {
	const context = loadContext()
	if (!context.ok) {
		return CommandResult.failed(context.error)
	}

	const bundles: BundleName[] = []
	for (const raw of names) {
		const name = coerceBundleName(raw)
		if (!name) {
			return CommandResult.failed({
				field: "name",
				message: `Invalid bundle name "${raw}".`,
				source: "manual",
				type: "validation",
			})
		}
		bundles.push(name)
	}

	consola.start("Uninstalling...")
	const result = await uninstall({ ...context.value, names: bundles })
	if (!result.ok) {
		return CommandResult.failed(result.error)
	}

	consola.info(`Dropped ${result.value.dropped.join(", ")}.`)
	reportSummary(result.value)
	return CommandResult.completed(undefined)
}
