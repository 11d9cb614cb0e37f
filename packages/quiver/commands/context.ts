import type { Result } from "@quiver/core"
import { consola } from "consola"
import { loadEnv } from "@/env"
import type { EngineOptions } from "@/install/types"
import { SourceFetcher } from "@/sources/fetcher"
import type { ValidationError } from "@/types/errors"

/** Engine options for a command run from the current directory. */
export function loadContext(): Result<EngineOptions, ValidationError> {
	const env = loadEnv()
	if (!env.ok) {
		return env
	}
	consola.level = env.value.logLevel

	return {
		ok: true,
		value: {
			cacheDir: env.value.cacheDir,
			fetcher: new SourceFetcher(),
			lockRetries: env.value.lockRetries,
			root: process.cwd(),
		},
	}
}
