import path from "node:path"
import {
	type BundleName,
	type MergeStrategy,
	mergeContent,
	type Platform,
	type Result,
	removeBlock,
	upsertBlock,
} from "@quiver/core"
import type { Contribution, InstallPlan, PlannedOutput } from "@/install/plan"
import { pruneEmptyParents } from "@/io/cleanup"
import { readOptionalFile } from "@/io/fs"
import type { IoResult } from "@/io/types"
import type { Transaction } from "@/transaction/transaction"
import type { QuiverError } from "@/types/errors"
import { isMerged, type WorkspaceIndex } from "@/workspace/index-file"
import { outputLocation, type WorkspacePaths } from "@/workspace/paths"

export interface ReconcileInput {
	paths: WorkspacePaths
	previous: WorkspaceIndex
	plan: InstallPlan
	/** Platforms the index is being written for */
	selected: ReadonlyArray<Platform>
	/** Every known platform; their roots are never pruned. */
	known: ReadonlyArray<Platform>
}

export interface ReconcileSummary {
	written: string[]
	removed: string[]
	unchanged: number
}

interface PreviousOutput {
	strategy: MergeStrategy
	contributors: Set<BundleName>
}

/**
 * Brings the workspace outputs from the previous index to the plan through
 * `tx`, and returns the index to persist. Outputs nobody provides any more are
 * removed, merged ones restored to their baseline.
 */
export async function reconcile(
	tx: Transaction,
	input: ReconcileInput,
): Promise<Result<{ index: WorkspaceIndex; summary: ReconcileSummary }, QuiverError>> {
	const { paths, plan, previous } = input
	const summary: ReconcileSummary = { removed: [], unchanged: 0, written: [] }
	const baselines: Record<string, string | null> = { ...previous.baselines }
	const before = previousOutputs(previous)
	const deleted: string[] = []

	for (const planned of plan.outputs) {
		const location = outputLocation(paths, planned.output)
		const live = await readOptionalFile(location)
		if (!live.ok) {
			return live
		}

		const prior = before.get(planned.output)
		if (prior && isMerged(prior.strategy) && !isMerged(planned.strategy)) {
			delete baselines[planned.output]
		}

		const next = renderOutput(planned, live.value, prior, baselines)
		if (!next.ok) {
			return next
		}

		const change = await applyContent(tx, location, live.value, next.value)
		if (!change.ok) {
			return change
		}
		record(summary, planned.output, change.value)
		if (change.value === "removed") deleted.push(location)
	}

	const planned = new Set(plan.outputs.map((output) => output.output))
	for (const [output, prior] of before) {
		if (planned.has(output)) continue

		const location = outputLocation(paths, output)
		const live = await readOptionalFile(location)
		if (!live.ok) {
			return live
		}

		const next = restoredContent(output, prior, live.value, baselines)
		delete baselines[output]

		const change = await applyContent(tx, location, live.value, next)
		if (!change.ok) {
			return change
		}
		record(summary, output, change.value)
		if (change.value === "removed") deleted.push(location)
	}

	const preserved = new Set<string>([paths.root, paths.dir])
	for (const platform of input.known) {
		preserved.add(path.join(paths.root, ...platform.root.split("/")))
	}
	const pruned = await pruneEmptyParents(paths.root, deleted, preserved, (dir) =>
		tx.removeDirIfEmpty(dir),
	)
	if (!pruned.ok) {
		return pruned
	}

	return {
		ok: true,
		value: {
			index: {
				baselines,
				entries: plan.entries,
				platforms: input.selected.map((platform) => platform.id),
				version: 1,
			},
			summary,
		},
	}
}

type Change = "written" | "removed" | "unchanged"

/** Content the output should have; null means the file should not exist. */
function renderOutput(
	planned: PlannedOutput,
	live: Buffer | null,
	prior: PreviousOutput | undefined,
	baselines: Record<string, string | null>,
): Result<Buffer | null, QuiverError> {
	const { contributions, output, strategy } = planned

	switch (strategy) {
		case "replace": {
			const winner = contributions.at(-1)
			return { ok: true, value: winner ? winner.contents : null }
		}
		case "composite": {
			let text = live ? live.toString("utf8") : ""
			const owners = groupByBundle(contributions)
			for (const stale of prior?.contributors ?? []) {
				if (!owners.has(stale)) text = removeBlock(text, stale)
			}
			for (const [owner, texts] of owners) {
				text = upsertBlock(text, owner, texts.join("\n\n"))
			}
			return { ok: true, value: text.trim() ? Buffer.from(text) : null }
		}
		case "shallow":
		case "deep": {
			if (!(output in baselines)) {
				baselines[output] = live ? live.toString("utf8") : null
			}

			// Rebuilt from the baseline each time, so keys a bundle stops providing go away.
			let text = baselines[output] ?? null
			for (const contribution of contributions) {
				const merged = mergeContent({
					existing: text,
					incoming: contribution.contents.toString("utf8"),
					owner: contribution.bundle,
					source: contribution.path,
					strategy,
					target: output,
				})
				if (!merged.ok) {
					return merged
				}
				text = merged.value
			}
			return { ok: true, value: text === null ? null : Buffer.from(text) }
		}
	}
}

function restoredContent(
	output: string,
	prior: PreviousOutput,
	live: Buffer | null,
	baselines: Record<string, string | null>,
): Buffer | null {
	switch (prior.strategy) {
		case "replace":
			return null
		case "composite": {
			let text = live ? live.toString("utf8") : ""
			for (const owner of prior.contributors) {
				text = removeBlock(text, owner)
			}
			return text.trim() ? Buffer.from(text) : null
		}
		case "shallow":
		case "deep": {
			const baseline = baselines[output]
			return typeof baseline === "string" ? Buffer.from(baseline) : null
		}
	}
}

async function applyContent(
	tx: Transaction,
	location: string,
	live: Buffer | null,
	next: Buffer | null,
): Promise<IoResult<Change>> {
	if (next === null) {
		if (live === null) {
			return { ok: true, value: "unchanged" }
		}
		const removed = await tx.removeFile(location)
		if (!removed.ok) {
			return removed
		}
		return { ok: true, value: "removed" }
	}

	if (live?.equals(next)) {
		return { ok: true, value: "unchanged" }
	}
	const written = await tx.writeFile(location, next)
	if (!written.ok) {
		return written
	}
	return { ok: true, value: "written" }
}

function previousOutputs(index: WorkspaceIndex): Map<string, PreviousOutput> {
	const outputs = new Map<string, PreviousOutput>()
	for (const entry of index.entries) {
		const existing = outputs.get(entry.output)
		const contributors = entry.contributors ?? [entry.bundle]
		if (existing) {
			for (const bundle of contributors) existing.contributors.add(bundle)
		} else {
			outputs.set(entry.output, {
				contributors: new Set(contributors),
				strategy: entry.strategy,
			})
		}
	}
	return outputs
}

function groupByBundle(contributions: ReadonlyArray<Contribution>): Map<BundleName, string[]> {
	const groups = new Map<BundleName, string[]>()
	for (const contribution of contributions) {
		const texts = groups.get(contribution.bundle) ?? []
		texts.push(contribution.contents.toString("utf8"))
		groups.set(contribution.bundle, texts)
	}
	return groups
}

function record(summary: ReconcileSummary, output: string, change: Change): void {
	if (change === "written") summary.written.push(output)
	else if (change === "removed") summary.removed.push(output)
	else summary.unchanged += 1
}
