import { consola } from "consola"
import { cleanCache, listCacheEntries } from "@/cache/store"
import { loadContext } from "@/commands/context"
import { CommandResult, printOutcome } from "@/commands/types"

export async function cacheListCommand(): Promise<void> {
	const context = loadContext()
	if (!context.ok) {
		printOutcome(CommandResult.failed(context.error))
		return
	}

	const entries = await listCacheEntries(context.value.cacheDir)
	if (!entries.ok) {
		printOutcome(CommandResult.failed(entries.error))
		return
	}
	if (entries.value.length === 0) {
		printOutcome(CommandResult.unchanged(`Cache at ${context.value.cacheDir} is empty.`))
		return
	}

	for (const entry of entries.value) {
		consola.log(`${entry.identity} @ ${entry.revision} (${entry.files} file(s))`)
	}
}

export async function cacheCleanCommand(): Promise<void> {
	const context = loadContext()
	if (!context.ok) {
		printOutcome(CommandResult.failed(context.error))
		return
	}

	consola.start(`Cleaning ${context.value.cacheDir}...`)
	const removed = await cleanCache(context.value.cacheDir)
	if (!removed.ok) {
		printOutcome(CommandResult.failed(removed.error))
		return
	}
	consola.success(`Removed ${removed.value} cache entr${removed.value === 1 ? "y" : "ies"}.`)
}
