import path from "node:path"
import type { Result } from "@quiver/core"
import {
	ensureDir,
	readOptionalFile,
	removeEmptyDir,
	removePath,
	toAbsolutePath,
	writeFileAtomic,
} from "@/io/fs"
import type { IoError, IoResult } from "@/io/types"
import { type QuiverError, toUnexpected } from "@/types/errors"

type UndoStep =
	| { kind: "restore"; path: string; contents: Buffer }
	| { kind: "delete"; path: string }
	| { kind: "rmdir"; path: string }
	| { kind: "mkdir"; path: string }

interface RecordSnapshot {
	path: string
	contents: Buffer | null
}

export type TransactionResult<T> =
	| { status: "committed"; value: T }
	| { status: "rolled_back"; error: QuiverError; rollbackErrors: IoError[] }

/**
 * Undo log for one mutating command. Every filesystem change made through it
 * records its inverse; the persisted records are snapshotted up front and put
 * back wholesale on rollback.
 */
export class Transaction {
	private readonly undoLog: UndoStep[] = []
	private state: "open" | "committed" | "rolled_back" = "open"

	private constructor(private readonly records: ReadonlyArray<RecordSnapshot>) {}

	static async open(recordPaths: ReadonlyArray<string>): Promise<IoResult<Transaction>> {
		const records: RecordSnapshot[] = []
		for (const recordPath of recordPaths) {
			const contents = await readOptionalFile(recordPath)
			if (!contents.ok) {
				return contents
			}
			records.push({ contents: contents.value, path: recordPath })
		}
		return { ok: true, value: new Transaction(records) }
	}

	get pendingSteps(): number {
		return this.undoLog.length
	}

	async writeFile(target: string, contents: string | Buffer): Promise<IoResult<void>> {
		this.assertOpen()
		const prior = await readOptionalFile(target)
		if (!prior.ok) {
			return prior
		}

		const dirs = await this.ensureParent(target)
		if (!dirs.ok) {
			return dirs
		}

		const written = await writeFileAtomic(target, contents)
		if (!written.ok) {
			return written
		}

		this.undoLog.push(
			prior.value === null
				? { kind: "delete", path: target }
				: { contents: prior.value, kind: "restore", path: target },
		)
		return { ok: true, value: undefined }
	}

	/** Removes a file; a missing file is not an error. */
	async removeFile(target: string): Promise<IoResult<boolean>> {
		this.assertOpen()
		const prior = await readOptionalFile(target)
		if (!prior.ok) {
			return prior
		}
		if (prior.value === null) {
			return { ok: true, value: false }
		}

		const removed = await removePath(target)
		if (!removed.ok) {
			return removed
		}

		this.undoLog.push({ contents: prior.value, kind: "restore", path: target })
		return { ok: true, value: true }
	}

	async removeDirIfEmpty(target: string): Promise<IoResult<boolean>> {
		this.assertOpen()
		const removed = await removeEmptyDir(target)
		if (!removed.ok) {
			return removed
		}
		if (removed.value) {
			this.undoLog.push({ kind: "mkdir", path: target })
		}
		return removed
	}

	/** Whether `contents` differs from the record as it was when the transaction opened. */
	recordChanged(target: string, contents: string): boolean {
		const record = this.records.find((candidate) => candidate.path === target)
		if (!record?.contents) return true
		return !record.contents.equals(Buffer.from(contents))
	}

	/** Writes one of the snapshotted records; rollback restores it from the snapshot. */
	async writeRecord(target: string, contents: string): Promise<IoResult<void>> {
		this.assertOpen()
		if (!this.records.some((record) => record.path === target)) {
			return {
				error: {
					message: `${target} is not a record of this transaction.`,
					operation: "writeRecord",
					path: toAbsolutePath(target),
					type: "io",
				},
				ok: false,
			}
		}

		const dirs = await this.ensureParent(target)
		if (!dirs.ok) {
			return dirs
		}
		return writeFileAtomic(target, contents)
	}

	commit(): void {
		this.assertOpen()
		this.undoLog.length = 0
		this.state = "committed"
	}

	/**
	 * Replays the undo log newest first, then restores the records. Keeps
	 * going past failures and returns every one of them.
	 */
	async rollback(): Promise<IoError[]> {
		this.assertOpen()
		this.state = "rolled_back"
		const errors: IoError[] = []

		for (const step of this.undoLog.reverse()) {
			const result = await undo(step)
			if (!result.ok) errors.push(result.error)
		}
		this.undoLog.length = 0

		for (const record of this.records) {
			const result =
				record.contents === null
					? await removePath(record.path)
					: await restoreFile(record.path, record.contents)
			if (!result.ok) errors.push(result.error)
		}

		return errors
	}

	private async ensureParent(target: string): Promise<IoResult<void>> {
		const created = await ensureDir(path.dirname(target))
		if (!created.ok) {
			return created
		}
		for (const dir of created.value) {
			this.undoLog.push({ kind: "rmdir", path: dir })
		}
		return { ok: true, value: undefined }
	}

	private assertOpen(): void {
		if (this.state !== "open") {
			throw new Error(`Transaction already ${this.state.replace("_", " ")}.`)
		}
	}
}

/**
 * Runs `operation` inside a transaction: commit on success, roll back on an
 * error result or a thrown exception.
 */
export async function runTransaction<T>(
	recordPaths: ReadonlyArray<string>,
	operation: (tx: Transaction) => Promise<Result<T, QuiverError>>,
): Promise<TransactionResult<T>> {
	const opened = await Transaction.open(recordPaths)
	if (!opened.ok) {
		return { error: opened.error, rollbackErrors: [], status: "rolled_back" }
	}

	const tx = opened.value
	let outcome: Result<T, QuiverError>
	try {
		outcome = await operation(tx)
	} catch (error) {
		outcome = { error: toUnexpected(error, "Operation failed."), ok: false }
	}

	if (outcome.ok) {
		tx.commit()
		return { status: "committed", value: outcome.value }
	}

	const rollbackErrors = await tx.rollback()
	return { error: outcome.error, rollbackErrors, status: "rolled_back" }
}

async function undo(step: UndoStep): Promise<IoResult<void>> {
	switch (step.kind) {
		case "restore":
			return restoreFile(step.path, step.contents)
		case "delete":
			return removePath(step.path)
		case "mkdir": {
			const created = await ensureDir(step.path)
			return created.ok ? { ok: true, value: undefined } : created
		}
		case "rmdir": {
			const removed = await removeEmptyDir(step.path)
			if (!removed.ok) return removed
			return { ok: true, value: undefined }
		}
	}
}

async function restoreFile(target: string, contents: Buffer): Promise<IoResult<void>> {
	const dirs = await ensureDir(path.dirname(target))
	if (!dirs.ok) {
		return dirs
	}
	return writeFileAtomic(target, contents)
}
