import { consola } from "consola"
import { CommandResult, printOutcome } from "@/commands/types"
import { type ListedBundle, listBundles } from "@/query/list"

export async function listCommand(options: { detailed: boolean }): Promise<void> {
	const result = await listBundles(process.cwd())
	if (!result.ok) {
		printOutcome(CommandResult.failed(result.error))
		return
	}
	if (result.value.length === 0) {
		printOutcome(CommandResult.unchanged("No bundles installed."))
		return
	}

	for (const bundle of result.value) {
		consola.log(formatListed(bundle, options.detailed))
	}
}

export function formatListed(bundle: ListedBundle, detailed: boolean): string {
	const version = bundle.version ? `@${bundle.version}` : ""
	const marker = bundle.workspace ? " (workspace)" : bundle.direct ? "" : " (transitive)"
	const head = `${bundle.name}${version}${marker}`
	if (!detailed) {
		return head
	}

	const lines = [head, `  source: ${bundle.source}`, `  files: ${bundle.files}`]
	lines.push(`  hash: ${bundle.hash}`)
	if (bundle.description) {
		lines.push(`  ${bundle.description}`)
	}
	return lines.join("\n")
}
