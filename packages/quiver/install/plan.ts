import {
	type BundleName,
	comparePaths,
	type MergeStrategy,
	type Platform,
	RECORD_FILENAMES,
	type ResolvedBundle,
	type Result,
	resolveTransform,
	sortedPaths,
	type UniversalPath,
	type ValidationError,
} from "@quiver/core"
import { compareEntries, type IndexEntry, isMerged } from "@/workspace/index-file"

export interface Contribution {
	bundle: BundleName
	path: UniversalPath
	contents: Buffer
}

export interface PlannedOutput {
	output: string
	strategy: MergeStrategy
	/** Lock order, then path order; one per (bundle, path). */
	contributions: Contribution[]
}

export interface InstallPlan {
	entries: IndexEntry[]
	/** Sorted by output path */
	outputs: PlannedOutput[]
}

interface Provided {
	platform: string
	path: UniversalPath
	output: string
	strategy: MergeStrategy
	/** Every bundle providing the path, lock order */
	providers: Contribution[]
}

/**
 * Maps every provided file through every platform's rules. Per (platform,
 * path) the last bundle in lock order owns the entry; outputs that several
 * entries land on are grouped, and must agree on one strategy.
 */
export function planInstall(
	order: ReadonlyArray<ResolvedBundle>,
	platforms: ReadonlyArray<Platform>,
): Result<InstallPlan, ValidationError> {
	const rank = new Map(order.map((bundle, index) => [bundle.name, index]))
	const provided = new Map<string, Provided>()

	for (const bundle of order) {
		for (const file of sortedPaths(bundle.tree)) {
			const contents = bundle.tree.get(file)
			if (!contents || RECORD_FILENAMES.has(file)) continue

			for (const platform of platforms) {
				for (const target of resolveTransform(file, platform)) {
					const key = `${platform.id}\0${file}`
					const contribution = { bundle: bundle.name, contents, path: file }
					const existing = provided.get(key)
					if (existing) {
						existing.providers.push(contribution)
					} else {
						provided.set(key, {
							output: target.output,
							path: file,
							platform: platform.id,
							providers: [contribution],
							strategy: target.merge,
						})
					}
				}
			}
		}
	}

	const outputs = new Map<string, PlannedOutput>()
	for (const item of provided.values()) {
		const planned = outputs.get(item.output)
		if (planned && planned.strategy !== item.strategy) {
			return {
				error: {
					field: "platforms",
					message: `Output ${item.output} is written with both ${planned.strategy} and ${item.strategy}.`,
					source: "manual",
					type: "validation",
				},
				ok: false,
			}
		}

		const contributions = isMerged(item.strategy)
			? item.providers
			: item.providers.slice(-1)
		if (planned) {
			for (const contribution of contributions) {
				const duplicate = planned.contributions.some(
					(other) =>
						other.bundle === contribution.bundle && other.path === contribution.path,
				)
				if (!duplicate) planned.contributions.push(contribution)
			}
		} else {
			outputs.set(item.output, {
				contributions: [...contributions],
				output: item.output,
				strategy: item.strategy,
			})
		}
	}

	const byRank = (a: Contribution, b: Contribution) =>
		(rank.get(a.bundle) ?? 0) - (rank.get(b.bundle) ?? 0) || comparePaths(a.path, b.path)
	for (const planned of outputs.values()) {
		planned.contributions.sort(byRank)
	}

	const entries: IndexEntry[] = []
	for (const item of provided.values()) {
		const owner = item.providers.at(-1)
		const planned = outputs.get(item.output)
		if (!owner || !planned) continue

		const entry: IndexEntry = {
			bundle: owner.bundle,
			output: item.output,
			path: item.path,
			platform: item.platform,
			strategy: item.strategy,
		}
		if (isMerged(item.strategy)) {
			entry.contributors = uniqueBundles(planned.contributions)
		}
		entries.push(entry)
	}

	return {
		ok: true,
		value: {
			entries: entries.sort(compareEntries),
			outputs: [...outputs.values()].sort((a, b) => comparePaths(a.output, b.output)),
		},
	}
}

export function uniqueBundles(contributions: ReadonlyArray<Contribution>): BundleName[] {
	const names: BundleName[] = []
	for (const contribution of contributions) {
		if (!names.includes(contribution.bundle)) names.push(contribution.bundle)
	}
	return names
}
