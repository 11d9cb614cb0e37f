import type { LockedBundle, LockedSource, Lockfile } from "../types/bundle"

/**
 * Writes keys in a fixed order so equal lockfiles are equal bytes.
 */
export function serializeLockfile(lockfile: Lockfile): string {
	const output = {
		version: lockfile.version,
		workspace: lockfile.workspace,
		bundles: lockfile.bundles.map(serializeBundle),
	}
	return `${JSON.stringify(output, null, 2)}\n`
}

export function serializeBundle(bundle: LockedBundle): Record<string, unknown> {
	const output: Record<string, unknown> = { name: bundle.name }
	if (bundle.description) output.description = bundle.description
	if (bundle.version) output.version = bundle.version
	output.source = serializeSource(bundle.source)
	output.hash = bundle.hash
	output.dependencies = [...bundle.dependencies]
	output.files = [...bundle.files]
	return output
}

function serializeSource(source: LockedSource): Record<string, unknown> {
	switch (source.type) {
		case "dir":
			return { type: "dir", path: source.path, revision: source.revision }
		case "git": {
			const output: Record<string, unknown> = { type: "git", url: source.url }
			if (source.path) output.path = source.path
			if (source.ref) output.ref = { type: source.ref.type, value: source.ref.value }
			output.revision = source.revision
			return output
		}
	}
}
