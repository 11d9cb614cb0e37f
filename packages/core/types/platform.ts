export const MERGE_STRATEGIES = ["replace", "shallow", "deep", "composite"] as const

export type MergeStrategy = (typeof MERGE_STRATEGIES)[number]

export interface TransformRule {
	from: string
	to: string
	merge: MergeStrategy
	/** Replaces the output's final extension, e.g. `mdc` or `instructions.md`. */
	extension?: string
}

export interface Platform {
	id: string
	name: string
	/** Output root relative to the workspace root; never pruned. */
	root: string
	/** Workspace-relative paths whose presence marks the platform as in use. */
	detect: string[]
	rules: TransformRule[]
}

export interface TransformTarget {
	output: string
	merge: MergeStrategy
}
