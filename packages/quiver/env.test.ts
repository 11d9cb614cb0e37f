import os from "node:os"
import path from "node:path"
import { describe, expect, it } from "vitest"
import { loadEnv } from "@/env"

describe("loadEnv", () => {
	it("defaults the cache under the home directory", () => {
		expect(loadEnv({})).toEqual({
			ok: true,
			value: {
				cacheDir: path.join(os.homedir(), ".cache", "quiver"),
				lockRetries: 20,
				logLevel: 3,
			},
		})
	})

	it("reads overrides", () => {
		const result = loadEnv({
			QUIVER_CACHE_DIR: "/var/cache/qv",
			QUIVER_LOCK_RETRIES: "0",
			QUIVER_LOG_LEVEL: "debug",
		})

		expect(result).toEqual({
			ok: true,
			value: { cacheDir: "/var/cache/qv", lockRetries: 0, logLevel: 4 },
		})
	})

	it("rejects a negative retry count", () => {
		const result = loadEnv({ QUIVER_LOCK_RETRIES: "-1" })

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.field).toBe("QUIVER_LOCK_RETRIES")
		}
	})

	it("rejects an unknown log level", () => {
		expect(loadEnv({ QUIVER_LOG_LEVEL: "loud" })).toBeErrOfType("validation")
	})
})
