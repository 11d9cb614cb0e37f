import path from "node:path"
import {
	type BaseError,
	type IoError,
	LOCK_TARGET_FILENAME,
	type LockContentionError,
	type Result,
} from "@quiver/core"
import { consola } from "consola"
import lockfile from "proper-lockfile"
import { ensureDir, errorCode, removeEmptyDir, toAbsolutePath } from "@/io/fs"
import type { IoResult } from "@/io/types"
import { toUnexpected, type UnexpectedError } from "@/types/errors"

export type WorkspaceLockError = LockContentionError | IoError | UnexpectedError

export interface WorkspaceLockOptions {
	/** Acquisition attempts after the first, 100-200ms apart. */
	retries: number
	/** Milliseconds after which a lock left by a dead process is taken over. */
	stale?: number
}

/**
 * Runs `operation` while holding the advisory lock on the workspace
 * directory. The lock lives at `<dir>/.lock` and is released on every exit
 * path; a directory created only to hold the lock is removed again if it is
 * still empty.
 */
export async function withWorkspaceLock<T, E extends BaseError>(
	workspaceDir: string,
	options: WorkspaceLockOptions,
	operation: () => Promise<Result<T, E>>,
): Promise<Result<T, E | WorkspaceLockError>> {
	const created = await ensureDir(workspaceDir)
	if (!created.ok) {
		return created
	}

	const lockPath = path.join(workspaceDir, LOCK_TARGET_FILENAME)
	const acquired = await acquireLock(workspaceDir, lockPath, options)
	if (!acquired.ok) {
		const cleanup = await removeCreatedDirs(created.value)
		if (!cleanup.ok) {
			consola.warn(cleanup.error.message)
		}
		return acquired
	}
	const release = acquired.value

	let result: Result<T, E | WorkspaceLockError>
	try {
		result = await operation()
	} catch (error) {
		result = { error: toUnexpected(error, "Workspace operation failed."), ok: false }
	}

	const released = await releaseLock(release, lockPath)
	if (!released.ok) {
		if (result.ok) {
			result = released
		} else {
			consola.warn(released.error.message)
		}
	}
	const cleanup = await removeCreatedDirs(created.value)
	if (!cleanup.ok) {
		consola.warn(cleanup.error.message)
	}
	return result
}

async function acquireLock(
	workspaceDir: string,
	lockPath: string,
	options: WorkspaceLockOptions,
): Promise<Result<() => Promise<void>, WorkspaceLockError>> {
	try {
		const release = await lockfile.lock(workspaceDir, {
			lockfilePath: lockPath,
			retries: {
				factor: 1,
				maxTimeout: 200,
				minTimeout: 100,
				retries: options.retries,
			},
			stale: options.stale ?? 10_000,
		})
		return { ok: true, value: release }
	} catch (error) {
		if (errorCode(error) === "ELOCKED") {
			return {
				error: {
					message: `Another quiver process holds the workspace lock at ${lockPath}.`,
					path: toAbsolutePath(lockPath),
					rawError: error instanceof Error ? error : undefined,
					type: "lock_contention",
				},
				ok: false,
			}
		}
		return {
			error: {
				message: `Unable to lock ${workspaceDir}.`,
				operation: "lock",
				path: toAbsolutePath(lockPath),
				rawError: error instanceof Error ? error : undefined,
				type: "io",
			},
			ok: false,
		}
	}
}

async function releaseLock(
	release: () => Promise<void>,
	lockPath: string,
): Promise<Result<void, WorkspaceLockError>> {
	try {
		await release()
		return { ok: true, value: undefined }
	} catch (error) {
		return {
			error: {
				message: `Unable to release the workspace lock at ${lockPath}.`,
				operation: "unlock",
				path: toAbsolutePath(lockPath),
				rawError: error instanceof Error ? error : undefined,
				type: "io",
			},
			ok: false,
		}
	}
}

async function removeCreatedDirs(dirs: ReadonlyArray<string>): Promise<IoResult<void>> {
	for (const dir of [...dirs].reverse()) {
		const removed = await removeEmptyDir(dir)
		if (!removed.ok) return removed
		if (!removed.value) break
	}
	return { ok: true, value: undefined }
}
