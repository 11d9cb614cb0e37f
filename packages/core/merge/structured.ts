import { isDeepStrictEqual } from "node:util"
import { isPlainObject } from "../types/guards"

export type StructuredObject = Record<string, unknown>

/** Top-level keys from `incoming` replace those in `existing`; nothing nested merges. */
export function shallowMerge(
	existing: StructuredObject,
	incoming: StructuredObject,
): StructuredObject {
	const result: StructuredObject = { ...existing }
	for (const [key, value] of Object.entries(incoming)) {
		result[key] = value
	}
	return result
}

/**
 * Recursive merge. Objects merge key by key, arrays concatenate without
 * structural duplicates, anything else from `incoming` wins.
 *
 * An explicit `null` in `incoming` deletes the key, at any depth. A `null`
 * already present in `existing` is an ordinary value and is overwritten by
 * whatever arrives.
 */
export function deepMerge(
	existing: StructuredObject,
	incoming: StructuredObject,
): StructuredObject {
	const result: StructuredObject = { ...existing }
	for (const [key, value] of Object.entries(incoming)) {
		if (value === null) {
			delete result[key]
			continue
		}

		const current = result[key]
		if (isPlainObject(current) && isPlainObject(value)) {
			result[key] = deepMerge(current, value)
		} else if (Array.isArray(current) && Array.isArray(value)) {
			result[key] = concatUnique(current, value)
		} else if (isPlainObject(value)) {
			// Copied subtrees drop their nulls too.
			result[key] = deepMerge({}, value)
		} else {
			result[key] = value
		}
	}
	return result
}

function concatUnique(existing: unknown[], incoming: unknown[]): unknown[] {
	const result = [...existing]
	for (const item of incoming) {
		if (!result.some((present) => isDeepStrictEqual(present, item))) {
			result.push(item)
		}
	}
	return result
}
