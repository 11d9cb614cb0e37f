import { mkdir, writeFile } from "node:fs/promises"
import { join } from "node:path"
import { describe, expect, it } from "vitest"
import { exists, readText, withTempDir } from "@/tests/helpers"
import { runTransaction, Transaction } from "@/transaction/transaction"

describe("Transaction", () => {
	it("rolls back created files, created directories and removals", async () => {
		await withTempDir(async (dir) => {
			const kept = join(dir, "kept.md")
			await writeFile(kept, "original")

			const opened = await Transaction.open([])
			expect(opened.ok).toBe(true)
			if (!opened.ok) return
			const tx = opened.value

			expect((await tx.writeFile(join(dir, "a", "b", "new.md"), "new")).ok).toBe(true)
			expect((await tx.writeFile(kept, "changed")).ok).toBe(true)
			const removed = await tx.removeFile(kept)
			expect(removed).toEqual({ ok: true, value: true })

			const errors = await tx.rollback()

			expect(errors).toEqual([])
			expect(await readText(kept)).toBe("original")
			expect(await exists(join(dir, "a"))).toBe(false)
		})
	})

	it("restores records to their snapshot, deleting ones that did not exist", async () => {
		await withTempDir(async (dir) => {
			const lock = join(dir, "quiver.lock")
			const index = join(dir, "quiver.index.json")
			await writeFile(lock, "old lock")

			const opened = await Transaction.open([lock, index])
			if (!opened.ok) throw new Error("open failed")
			const tx = opened.value
			await tx.writeRecord(lock, "new lock")
			await tx.writeRecord(index, "{}")

			await tx.rollback()

			expect(await readText(lock)).toBe("old lock")
			expect(await exists(index)).toBe(false)
		})
	})

	it("refuses to write a file that is not a record", async () => {
		await withTempDir(async (dir) => {
			const opened = await Transaction.open([join(dir, "quiver.lock")])
			if (!opened.ok) throw new Error("open failed")

			const result = await opened.value.writeRecord(join(dir, "other.json"), "{}")

			expect(result).toBeErrOfType("io")
		})
	})

	it("compares record contents against the snapshot", async () => {
		await withTempDir(async (dir) => {
			const lock = join(dir, "quiver.lock")
			await writeFile(lock, "same")
			const opened = await Transaction.open([lock, join(dir, "missing")])
			if (!opened.ok) throw new Error("open failed")

			expect(opened.value.recordChanged(lock, "same")).toBe(false)
			expect(opened.value.recordChanged(lock, "other")).toBe(true)
			expect(opened.value.recordChanged(join(dir, "missing"), "")).toBe(true)
		})
	})

	it("recreates directories removed while pruning", async () => {
		await withTempDir(async (dir) => {
			const empty = join(dir, "empty")
			await mkdir(empty)
			const opened = await Transaction.open([])
			if (!opened.ok) throw new Error("open failed")

			expect(await opened.value.removeDirIfEmpty(empty)).toEqual({ ok: true, value: true })
			expect(await exists(empty)).toBe(false)
			await opened.value.rollback()

			expect(await exists(empty)).toBe(true)
		})
	})

	it("cannot be used after commit", async () => {
		const opened = await Transaction.open([])
		if (!opened.ok) throw new Error("open failed")
		opened.value.commit()

		await expect(opened.value.writeFile("/tmp/never", "x")).rejects.toThrow(
			"Transaction already committed.",
		)
	})
})

describe("runTransaction", () => {
	it("commits when the operation succeeds", async () => {
		await withTempDir(async (dir) => {
			const target = join(dir, "out.md")
			const result = await runTransaction<number>([], async (tx) => {
				const written = await tx.writeFile(target, "done")
				return written.ok ? { ok: true, value: 1 } : written
			})

			expect(result).toEqual({ status: "committed", value: 1 })
			expect(await readText(target)).toBe("done")
		})
	})

	it("rolls back on an error result", async () => {
		await withTempDir(async (dir) => {
			const target = join(dir, "out.md")
			const result = await runTransaction<void>([], async (tx) => {
				await tx.writeFile(target, "partial")
				return {
					error: { message: "boom", strategy: "deep", target: "x", type: "merge" },
					ok: false,
				}
			})

			expect(result.status).toBe("rolled_back")
			expect(await exists(target)).toBe(false)
		})
	})

	it("turns a thrown exception into an unexpected error and rolls back", async () => {
		await withTempDir(async (dir) => {
			const target = join(dir, "out.md")
			const result = await runTransaction<void>([], async (tx) => {
				await tx.writeFile(target, "partial")
				throw new Error("disk on fire")
			})

			expect(result.status).toBe("rolled_back")
			if (result.status === "rolled_back") {
				expect(result.error.type).toBe("unexpected")
				expect(result.error.message).toBe("Operation failed. disk on fire")
			}
			expect(await exists(target)).toBe(false)
		})
	})
})
