import type { MergeError, Result } from "../types/error"
import type { MergeStrategy } from "../types/platform"
import { upsertBlock } from "./composite"
import { formatForPath, parseStructured, stringifyStructured } from "./format"
import { deepMerge, shallowMerge } from "./structured"

export interface MergeInput {
	strategy: MergeStrategy
	/** Current content at the target, or null when the target does not exist. */
	existing: string | null
	incoming: string
	/** Bundle the incoming content belongs to; tags composite blocks. */
	owner: string
	/** Workspace-relative output path; picks the format of `existing`. */
	target: string
	/** Universal path of the incoming file; picks its format, defaults to `target`. */
	source?: string
}

export function mergeContent(input: MergeInput): Result<string, MergeError> {
	switch (input.strategy) {
		case "replace":
			return { ok: true, value: input.incoming }
		case "composite":
			return { ok: true, value: upsertBlock(input.existing, input.owner, input.incoming) }
		case "shallow":
		case "deep":
			return mergeStructured(input)
	}
}

function mergeStructured(input: MergeInput): Result<string, MergeError> {
	const format = formatForPath(input.target)

	const existing = parseStructured(input.existing ?? "", format)
	if (!existing.ok) {
		return fail(input, `Existing content at ${input.target} is malformed.`, existing.error)
	}

	const incomingFormat = formatForPath(input.source ?? input.target)
	const incoming = parseStructured(input.incoming, incomingFormat)
	if (!incoming.ok) {
		return fail(
			input,
			`Content from ${input.owner} for ${input.target} is malformed.`,
			incoming.error,
		)
	}

	const merged =
		input.strategy === "deep"
			? deepMerge(existing.value, incoming.value)
			: shallowMerge(existing.value, incoming.value)

	const text = stringifyStructured(merged, format)
	if (!text.ok) {
		return fail(input, `Unable to write merged content for ${input.target}.`, text.error)
	}
	return text
}

function fail(
	input: MergeInput,
	message: string,
	cause: MergeError["cause"],
): Result<never, MergeError> {
	return {
		error: {
			cause,
			message,
			strategy: input.strategy,
			target: input.target,
			type: "merge",
		},
		ok: false,
	}
}
