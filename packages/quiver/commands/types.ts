import type { BaseError } from "@quiver/core"
import { consola } from "consola"
import type { ZodError } from "zod"
import type { QuiverError } from "@/types/errors"

// CommandResult models user-facing flow outcomes; engine operations keep { ok, value } results.
export type CommandResult<T = void> =
	| { status: "completed"; value: T }
	| { status: "unchanged"; reason: string }
	| { status: "cancelled" }
	| { status: "failed"; error: QuiverError }

export const CommandResult = {
	cancelled: (): CommandResult<never> => ({ status: "cancelled" }),
	completed: <T>(value: T): CommandResult<T> => ({ status: "completed", value }),
	failed: (error: QuiverError): CommandResult<never> => ({ error, status: "failed" }),
	unchanged: (reason: string): CommandResult<never> => ({
		reason,
		status: "unchanged",
	}),
} as const

export function printOutcome(result: CommandResult<unknown>): void {
	switch (result.status) {
		case "completed":
			consola.success("Done.")
			break
		case "unchanged":
			consola.info(result.reason)
			break
		case "cancelled":
			consola.info("Canceled.")
			break
		case "failed":
			consola.error(formatErrorChain(result.error))
			printRawErrors(result.error)
			process.exitCode = 1
			break
	}
}

/** Error fields shown inline after the message, in this order. */
const DETAIL_KEYS = [
	"stage",
	"bundle",
	"field",
	"path",
	"source",
	"operation",
	"strategy",
	"target",
] as const

/**
 * One line per error in the cause chain, most general first. Staged errors
 * copy their cause's fields, so a field or difference list the cause repeats
 * is printed only once, on the cause.
 */
export function formatErrorChain(error: BaseError): string {
	return chainLines(error, 0).join("\n")
}

function chainLines(error: BaseError, indent: number): string[] {
	const prefix = " ".repeat(indent)
	const details = detailParts(error)
	const suffix = details.length > 0 ? ` (${details.join(", ")})` : ""
	const lines = [`${prefix}[${error.type}] ${error.message}${suffix}`]

	const zodError = "zodError" in error ? error.zodError : undefined
	if (isZodError(zodError) && !repeatsCause(error, "zodError")) {
		lines.push(`${prefix}  Zod issues:`)
		for (const issue of zodError.issues) {
			const location = issue.path.length > 0 ? issue.path.join(".") : "<root>"
			lines.push(`${prefix}  - ${location}: ${issue.message}`)
		}
	}

	const differences = "differences" in error ? error.differences : undefined
	if (Array.isArray(differences) && !repeatsCause(error, "differences")) {
		for (const difference of differences) {
			lines.push(`${prefix}  - ${String(difference)}`)
		}
	}

	if (error.cause) {
		lines.push(`${prefix}Caused by:`, ...chainLines(error.cause, indent + 2))
	}
	return lines
}

function detailParts(error: BaseError): string[] {
	const parts: string[] = []
	for (const key of DETAIL_KEYS) {
		const value = key in error ? Reflect.get(error, key) : undefined
		if (typeof value === "string" && !repeatsCause(error, key)) {
			parts.push(`${key}=${value}`)
		}
	}
	return parts
}

function repeatsCause(error: BaseError, key: string): boolean {
	const { cause } = error
	return cause !== undefined && key in cause && Reflect.get(cause, key) === Reflect.get(error, key)
}

function isZodError(value: unknown): value is ZodError {
	return (
		typeof value === "object" && value !== null && "issues" in value && Array.isArray(value.issues)
	)
}

function printRawErrors(error: BaseError): void {
	if (error.rawError) {
		consola.debug(error.rawError)
	}
	if (error.cause) {
		printRawErrors(error.cause)
	}
}
