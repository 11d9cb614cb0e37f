import {
	type ParseError as JsoncParseError,
	parse as parseJsonc,
	printParseErrorCode,
} from "jsonc-parser"
import { parse as parseToml, stringify as stringifyToml, TomlError } from "smol-toml"
import type { ParseError, Result } from "../types/error"
import { isPlainObject } from "../types/guards"
import type { StructuredObject } from "./structured"

export type StructuredFormat = "json" | "toml"

export function formatForPath(target: string): StructuredFormat {
	return target.endsWith(".toml") ? "toml" : "json"
}

/** Parses object content. JSON targets tolerate comments and trailing commas. */
export function parseStructured(
	text: string,
	format: StructuredFormat,
): Result<StructuredObject, ParseError> {
	if (text.trim().length === 0) {
		return { ok: true, value: {} }
	}

	const parsed = format === "toml" ? parseTomlText(text) : parseJsoncText(text)
	if (!parsed.ok) {
		return parsed
	}

	if (!isPlainObject(parsed.value)) {
		return {
			error: {
				message: "Expected an object at the top level.",
				source: format,
				type: "parse",
			},
			ok: false,
		}
	}

	return { ok: true, value: parsed.value }
}

export function stringifyStructured(
	value: StructuredObject,
	format: StructuredFormat,
): Result<string, ParseError> {
	if (format === "json") {
		return { ok: true, value: `${JSON.stringify(value, null, 2)}\n` }
	}

	try {
		const text = stringifyToml(value)
		return { ok: true, value: text.endsWith("\n") ? text : `${text}\n` }
	} catch (error) {
		return {
			error: {
				message: "Unable to serialize TOML.",
				rawError: error instanceof Error ? error : undefined,
				source: format,
				type: "parse",
			},
			ok: false,
		}
	}
}

function parseJsoncText(text: string): Result<unknown, ParseError> {
	const errors: JsoncParseError[] = []
	const value: unknown = parseJsonc(text, errors, { allowTrailingComma: true })
	const first = errors[0]
	if (first) {
		return {
			error: {
				message: `Invalid JSON: ${printParseErrorCode(first.error)} at offset ${first.offset}.`,
				source: "json",
				type: "parse",
			},
			ok: false,
		}
	}
	return { ok: true, value }
}

function parseTomlText(text: string): Result<unknown, ParseError> {
	try {
		return { ok: true, value: parseToml(text) }
	} catch (error) {
		return {
			error: {
				message:
					error instanceof TomlError ? `Invalid TOML: ${error.message}` : "Invalid TOML.",
				rawError: error instanceof Error ? error : undefined,
				source: "toml",
				type: "parse",
			},
			ok: false,
		}
	}
}
