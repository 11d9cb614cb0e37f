import { mkdtemp } from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import type { GitRef, Result, SourceResolutionError, SourceSpec } from "@quiver/core"
import { consola } from "consola"
import { removePath, safeStat } from "@/io/fs"
import { readTree } from "@/io/tree"
import { describeSpec } from "@/sources/identity"
import { type Fetcher, type FetchResult, resolutionFailure } from "@/sources/types"
import { ensureGitAvailable, runGit } from "@/utils/git"

type GitSpec = Extract<SourceSpec, { type: "git" }>
type ActionResult = Result<string, SourceResolutionError>

const FULL_COMMIT = /^[0-9a-f]{40}$/

/**
 * Shallow clones into a scratch directory, checks out the requested ref and
 * reads the (sub)tree. The revision is the checked-out commit.
 */
export class GitFetcher implements Fetcher {
	async resolveRevision(spec: SourceSpec): Promise<Result<string | null, SourceResolutionError>> {
		if (spec.type !== "git") {
			return { ok: true, value: null }
		}
		if (spec.ref?.type === "rev") {
			return { ok: true, value: FULL_COMMIT.test(spec.ref.value) ? spec.ref.value : null }
		}

		const gitCheck = ensureGitAvailable()
		if (!gitCheck.ok) {
			return resolutionFailure(spec.url, gitCheck.error.message, gitCheck.error)
		}

		const listed = await runGit(["ls-remote", spec.url, ...remoteRefNames(spec.ref)], spec.url)
		if (!listed.ok) {
			return listed
		}
		return { ok: true, value: pickRemoteRevision(listed.value, spec.ref) }
	}

	async fetch(spec: SourceSpec): Promise<FetchResult> {
		if (spec.type !== "git") {
			return resolutionFailure(spec.path, "Git fetcher cannot fetch directory sources.")
		}

		const gitCheck = ensureGitAvailable()
		if (!gitCheck.ok) {
			return resolutionFailure(spec.url, gitCheck.error.message, gitCheck.error)
		}

		const scratch = await makeScratchDir(spec.url)
		if (!scratch.ok) {
			return scratch
		}

		const result = await fetchInto(spec, path.join(scratch.value, "repo"))
		const cleanup = await removePath(scratch.value)
		if (!cleanup.ok) {
			consola.warn(cleanup.error.message)
		}
		return result
	}
}

async function makeScratchDir(source: string): Promise<ActionResult> {
	try {
		const dir = await mkdtemp(path.join(os.tmpdir(), "quiver-git-"))
		return { ok: true, value: dir }
	} catch (error) {
		return {
			error: {
				message: "Unable to create a scratch directory for git.",
				rawError: error instanceof Error ? error : undefined,
				source,
				type: "source_resolution",
			},
			ok: false,
		}
	}
}

async function fetchInto(spec: GitSpec, repoDir: string): Promise<FetchResult> {
	const source = describeSpec(spec)

	const cloned = await runGit(["clone", "--depth", "1", spec.url, repoDir], source)
	if (!cloned.ok) {
		return cloned
	}

	const checkedOut = await checkoutRef(repoDir, spec.ref, source)
	if (!checkedOut.ok) {
		return checkedOut
	}

	const head = await runGit(["-C", repoDir, "rev-parse", "HEAD"], source)
	if (!head.ok) {
		return head
	}

	const root = spec.path ? path.join(repoDir, ...spec.path.split("/")) : repoDir
	const stats = await safeStat(root)
	if (!stats.ok) {
		return resolutionFailure(source, stats.error.message, stats.error)
	}
	if (!stats.value?.isDirectory()) {
		return resolutionFailure(
			source,
			`Path ${spec.path ?? "."} not found in ${spec.url} at ${head.value}.`,
		)
	}

	const tree = await readTree(root)
	if (!tree.ok) {
		return resolutionFailure(source, tree.error.message, tree.error)
	}

	return { ok: true, value: { revision: head.value, tree: tree.value } }
}

async function checkoutRef(
	repoDir: string,
	ref: GitRef | undefined,
	source: string,
): Promise<ActionResult> {
	if (!ref) {
		return { ok: true, value: "" }
	}

	const fetchArgs =
		ref.type === "tag"
			? ["-C", repoDir, "fetch", "--depth", "1", "origin", "tag", ref.value]
			: ["-C", repoDir, "fetch", "--depth", "1", "origin", ref.value]
	const fetched = await runGit(fetchArgs, source)
	if (!fetched.ok) {
		const fallback = await deepenFetch(repoDir, source)
		if (!fallback.ok) {
			return fallback
		}
	}

	switch (ref.type) {
		case "tag":
			return runGit(["-C", repoDir, "checkout", "--detach", `tags/${ref.value}`], source)
		case "branch":
			return runGit(
				["-C", repoDir, "checkout", "-B", ref.value, `origin/${ref.value}`],
				source,
			)
		case "rev": {
			const checkout = await runGit(["-C", repoDir, "checkout", "--detach", ref.value], source)
			if (checkout.ok) {
				return checkout
			}
			const fallback = await deepenFetch(repoDir, source)
			if (!fallback.ok) {
				return checkout
			}
			return runGit(["-C", repoDir, "checkout", "--detach", ref.value], source)
		}
	}
}

async function deepenFetch(repoDir: string, source: string): Promise<ActionResult> {
	return runGit(["-C", repoDir, "fetch", "--depth", "50", "origin"], source)
}

function remoteRefNames(ref: GitRef | undefined): string[] {
	if (!ref) return ["HEAD"]
	switch (ref.type) {
		case "tag":
			return [`refs/tags/${ref.value}`, `refs/tags/${ref.value}^{}`]
		case "branch":
			return [`refs/heads/${ref.value}`]
		case "rev":
			return []
	}
}

/** Picks the commit from `ls-remote` output, preferring a peeled tag. */
export function pickRemoteRevision(output: string, ref: GitRef | undefined): string | null {
	const lines = output
		.split("\n")
		.map((line) => line.trim().split(/\s+/))
		.filter((parts): parts is [string, string] => parts.length === 2)

	if (ref?.type === "tag") {
		const peeled = lines.find(([, name]) => name === `refs/tags/${ref.value}^{}`)
		if (peeled) return peeled[0]
	}
	const first = lines[0]
	return first && FULL_COMMIT.test(first[0]) ? first[0] : null
}
