import { execFile, execSync } from "node:child_process"
import { promisify } from "node:util"
import type { Result, SourceResolutionError } from "@quiver/core"
import type { ValidationError } from "@/types/errors"

const execFileAsync = promisify(execFile)

export function ensureGitAvailable(): Result<void, ValidationError> {
	try {
		execSync("git --version", { stdio: "ignore" })
		return { ok: true, value: undefined }
	} catch (error) {
		return {
			error: {
				field: "git",
				message: "git is not installed or not in PATH.",
				rawError: error instanceof Error ? error : undefined,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}
}

/** Runs git and returns its trimmed stdout. */
export async function runGit(
	args: string[],
	source: string,
): Promise<Result<string, SourceResolutionError>> {
	try {
		const { stdout } = await execFileAsync("git", args, { encoding: "utf8" })
		return { ok: true, value: stdout.trim() }
	} catch (error) {
		return {
			error: {
				message: `git ${args.join(" ")} failed.`,
				rawError: error instanceof Error ? error : undefined,
				source,
				type: "source_resolution",
			},
			ok: false,
		}
	}
}
