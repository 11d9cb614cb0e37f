import { join } from "node:path"
import type { InstallOptions } from "@/install/types"
import { FakeGitFetcher, manifest, type ManifestDraft, writeFiles } from "@/tests/helpers"

export interface Project {
	dir: string
	root: string
	cacheDir: string
	fetcher: FakeGitFetcher
	options: (extra?: Partial<InstallOptions>) => InstallOptions
}

/**
 * A project at `<dir>/project` whose workspace manifest is `draft`, with
 * local bundles written beside it as `<dir>/<name>`.
 */
export async function setupProject(
	dir: string,
	draft: ManifestDraft,
	bundles: Record<string, Record<string, string>> = {},
): Promise<Project> {
	const root = join(dir, "project")
	await writeFiles(root, { ".quiver/quiver.toml": manifest(draft) })
	for (const [bundleName, files] of Object.entries(bundles)) {
		await writeFiles(join(dir, bundleName), files)
	}

	const cacheDir = join(dir, "cache")
	const fetcher = new FakeGitFetcher()
	return {
		cacheDir,
		dir,
		fetcher,
		options: (extra = {}) => ({
			cacheDir,
			fetcher,
			lockRetries: 0,
			platforms: ["claude"],
			root,
			...extra,
		}),
		root,
	}
}

export const toolsBundle = {
	"AGENTS.md": "Use tabs.\n",
	"commands/lint.md": "# Lint\n",
}

export const claudeBlock = "<!-- quiver:begin tools -->\nUse tabs.\n<!-- quiver:end tools -->\n"
