import os from "node:os"
import path from "node:path"
import type { Result } from "@quiver/core"
import { z } from "zod"
import type { ValidationError } from "@/types/errors"

const str = () => z.string().trim().min(1)

const LOG_LEVELS = {
	debug: 4,
	error: 0,
	info: 3,
	silent: -999,
	trace: 5,
	warn: 1,
} as const

export const schema = z.object({
	QUIVER_CACHE_DIR: str().optional(),
	QUIVER_LOCK_RETRIES: z.coerce.number().int().nonnegative().max(1000).optional().default(20),
	QUIVER_LOG_LEVEL: z
		.enum(["silent", "error", "warn", "info", "debug", "trace"])
		.optional()
		.default("info"),
})

export interface QuiverEnv {
	cacheDir: string
	lockRetries: number
	/** consola level */
	logLevel: number
}

export function loadEnv(
	source: Record<string, string | undefined> = process.env,
): Result<QuiverEnv, ValidationError> {
	const parsed = schema.safeParse(source)
	if (!parsed.success) {
		const issue = parsed.error.issues[0]
		const field = issue ? issue.path.join(".") : "env"
		return {
			error: {
				field,
				message: `Invalid environment: ${field}: ${issue?.message ?? "invalid value"}`,
				source: "zod",
				type: "validation",
				zodError: parsed.error,
			},
			ok: false,
		}
	}

	return {
		ok: true,
		value: {
			cacheDir: parsed.data.QUIVER_CACHE_DIR
				? path.resolve(parsed.data.QUIVER_CACHE_DIR)
				: path.join(os.homedir(), ".cache", "quiver"),
			lockRetries: parsed.data.QUIVER_LOCK_RETRIES,
			logLevel: LOG_LEVELS[parsed.data.QUIVER_LOG_LEVEL],
		},
	}
}
