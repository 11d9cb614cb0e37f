import { consola } from "consola"
import { loadContext } from "@/commands/context"
import { CommandResult, printOutcome } from "@/commands/types"
import { type BundleDetails, showBundle } from "@/query/show"

export async function showCommand(name: string): Promise<void> {
	const context = loadContext()
	if (!context.ok) {
		printOutcome(CommandResult.failed(context.error))
		return
	}

	const result = await showBundle(context.value.root, name, context.value.cacheDir)
	if (!result.ok) {
		printOutcome(CommandResult.failed(result.error))
		return
	}

	consola.log(formatDetails(result.value))
	for (const warning of result.value.warnings) {
		consola.warn(warning)
	}
}

export function formatDetails(details: BundleDetails): string {
	const lines = [
		`${details.name}${details.version ? `@${details.version}` : ""}${details.workspace ? " (workspace)" : ""}`,
	]
	if (details.description) lines.push(details.description)
	lines.push(`source: ${details.source}`)
	lines.push(`revision: ${details.revision}`)
	lines.push(`hash: ${details.hash}`)
	lines.push(`files: ${details.files}`)
	lines.push(`dependencies: ${listOrNone(details.dependencies)}`)
	lines.push(`dependents: ${listOrNone(details.dependents)}`)
	if (details.outputs.length > 0) {
		lines.push("outputs:")
		for (const output of details.outputs) {
			const shared = output.owner ? "" : " (shared)"
			lines.push(`  [${output.platform}] ${output.output} <- ${output.path} (${output.strategy})${shared}`)
		}
	}
	return lines.join("\n")
}

function listOrNone(values: readonly string[]): string {
	return values.length > 0 ? values.join(", ") : "none"
}
