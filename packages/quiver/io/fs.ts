import { randomBytes } from "node:crypto"
import {
	lstat,
	mkdir,
	open,
	readdir,
	readFile,
	rename,
	rm,
	rmdir,
	stat,
} from "node:fs/promises"
import path from "node:path"
import type { AbsolutePath } from "@quiver/core"
import type { IoError, IoResult } from "@/io/types"

export type { IoError, IoResult } from "@/io/types"

type StatResult = IoResult<Awaited<ReturnType<typeof stat>> | null>
type LStatResult = IoResult<Awaited<ReturnType<typeof lstat>> | null>

export async function safeStat(targetPath: string): Promise<StatResult> {
	try {
		const stats = await stat(targetPath)
		return { ok: true, value: stats }
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: null }
		}
		return ioFailure("stat", `Unable to access ${targetPath}.`, targetPath, error)
	}
}

export async function safeLstat(targetPath: string): Promise<LStatResult> {
	try {
		const stats = await lstat(targetPath)
		return { ok: true, value: stats }
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: null }
		}
		return ioFailure("lstat", `Unable to access ${targetPath}.`, targetPath, error)
	}
}

/**
 * Create a directory and any missing parents. Returns the directories that
 * did not exist before, outermost first.
 */
export async function ensureDir(targetPath: string): Promise<IoResult<string[]>> {
	const missing: string[] = []
	let current = path.resolve(targetPath)
	for (;;) {
		const stats = await safeStat(current)
		if (!stats.ok) {
			return stats
		}
		if (stats.value) {
			if (!stats.value.isDirectory()) {
				return ioFailure("mkdir", `Expected directory at ${current}.`, current)
			}
			break
		}
		missing.unshift(current)
		const parent = path.dirname(current)
		if (parent === current) break
		current = parent
	}

	if (missing.length > 0) {
		try {
			await mkdir(targetPath, { recursive: true })
		} catch (error) {
			return ioFailure("mkdir", `Unable to create ${targetPath}.`, targetPath, error)
		}
	}

	return { ok: true, value: missing }
}

export async function readTextFile(targetPath: string): Promise<IoResult<string>> {
	try {
		const contents = await readFile(targetPath, "utf8")
		return { ok: true, value: contents }
	} catch (error) {
		return ioFailure("readFile", `Unable to read ${targetPath}.`, targetPath, error)
	}
}

export async function readBinaryFile(targetPath: string): Promise<IoResult<Buffer>> {
	try {
		const contents = await readFile(targetPath)
		return { ok: true, value: contents }
	} catch (error) {
		return ioFailure("readFile", `Unable to read ${targetPath}.`, targetPath, error)
	}
}

/** Reads a file, or null when it does not exist. */
export async function readOptionalFile(targetPath: string): Promise<IoResult<Buffer | null>> {
	try {
		const contents = await readFile(targetPath)
		return { ok: true, value: contents }
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: null }
		}
		return ioFailure("readFile", `Unable to read ${targetPath}.`, targetPath, error)
	}
}

/**
 * Write through a temporary sibling, fsync, then rename over the target so
 * readers see either the old or the new file.
 */
export async function writeFileAtomic(
	targetPath: string,
	contents: string | Buffer,
): Promise<IoResult<void>> {
	const dir = path.dirname(targetPath)
	const tmpPath = path.join(
		dir,
		`.${path.basename(targetPath)}.${randomBytes(6).toString("hex")}.tmp`,
	)

	try {
		const handle = await open(tmpPath, "w")
		try {
			await handle.writeFile(contents)
			await handle.sync()
		} finally {
			await handle.close()
		}
		await rename(tmpPath, targetPath)
		return { ok: true, value: undefined }
	} catch (error) {
		const cleanup = await removePath(tmpPath)
		const failure = ioFailure("writeFile", `Unable to write ${targetPath}.`, targetPath, error)
		if (!cleanup.ok) {
			failure.error.cause = cleanup.error
		}
		return failure
	}
}

export async function removePath(targetPath: string): Promise<IoResult<void>> {
	try {
		await rm(targetPath, { force: true, recursive: true })
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure("rm", `Unable to remove ${targetPath}.`, targetPath, error)
	}
}

/** Removes a directory only if it is empty; reports whether it did. */
export async function removeEmptyDir(targetPath: string): Promise<IoResult<boolean>> {
	try {
		const entries = await readdir(targetPath)
		if (entries.length > 0) {
			return { ok: true, value: false }
		}
		await rmdir(targetPath)
		return { ok: true, value: true }
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: false }
		}
		return ioFailure("rmdir", `Unable to remove ${targetPath}.`, targetPath, error)
	}
}

export async function listDir(
	targetPath: string,
): Promise<IoResult<{ name: string; isDirectory: boolean; isFile: boolean }[]>> {
	try {
		const entries = await readdir(targetPath, { withFileTypes: true })
		return {
			ok: true,
			value: entries.map((entry) => ({
				isDirectory: entry.isDirectory(),
				isFile: entry.isFile(),
				name: entry.name,
			})),
		}
	} catch (error) {
		return ioFailure("readdir", `Unable to read ${targetPath}.`, targetPath, error)
	}
}

export async function movePath(from: string, to: string): Promise<IoResult<void>> {
	try {
		await rename(from, to)
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure("rename", `Unable to move ${from} to ${to}.`, to, error)
	}
}

export function toAbsolutePath(value: string): AbsolutePath {
	const resolved = path.isAbsolute(value) ? path.normalize(value) : path.resolve(value)
	return resolved as AbsolutePath
}

export function isNotFound(error: unknown): boolean {
	return errorCode(error) === "ENOENT"
}

export function errorCode(error: unknown): string | undefined {
	if (typeof error === "object" && error !== null && "code" in error) {
		const { code } = error
		return typeof code === "string" ? code : undefined
	}
	return undefined
}

function ioFailure(
	operation: string,
	message: string,
	targetPath: string,
	error?: unknown,
): { ok: false; error: IoError } {
	return {
		error: {
			message,
			operation,
			path: toAbsolutePath(targetPath),
			rawError: error instanceof Error ? error : undefined,
			type: "io",
		},
		ok: false,
	}
}
