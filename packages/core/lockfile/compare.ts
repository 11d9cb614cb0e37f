import type { LockedBundle, LockedSource, Lockfile } from "../types/bundle"
import type { FrozenMismatchError, Result } from "../types/error"
import { serializeLockfile } from "./serialize"

/**
 * Strict comparison for frozen installs: any difference in the serialized
 * records is a mismatch.
 */
export function validateFrozen(
	existing: Lockfile,
	fresh: Lockfile,
): Result<void, FrozenMismatchError> {
	if (serializeLockfile(existing) === serializeLockfile(fresh)) {
		return { ok: true, value: undefined }
	}

	const differences = diffLockfiles(existing, fresh)
	return {
		error: {
			differences,
			message: `Lockfile is out of date: ${differences.join("; ")}.`,
			type: "frozen_mismatch",
		},
		ok: false,
	}
}

export function diffLockfiles(existing: Lockfile, fresh: Lockfile): string[] {
	const differences: string[] = []
	if (existing.workspace !== fresh.workspace) {
		differences.push(`workspace renamed ${existing.workspace} -> ${fresh.workspace}`)
	}

	const before = new Map(existing.bundles.map((bundle) => [bundle.name, bundle]))
	const after = new Map(fresh.bundles.map((bundle) => [bundle.name, bundle]))

	for (const bundle of existing.bundles) {
		if (!after.has(bundle.name)) {
			differences.push(`${bundle.name} removed`)
		}
	}

	for (const bundle of fresh.bundles) {
		const previous = before.get(bundle.name)
		if (!previous) {
			differences.push(`${bundle.name} added`)
			continue
		}
		differences.push(...diffBundle(previous, bundle))
	}

	const sharedBefore = existing.bundles
		.map((bundle) => bundle.name)
		.filter((name) => after.has(name))
	const sharedAfter = fresh.bundles
		.map((bundle) => bundle.name)
		.filter((name) => before.has(name))
	if (sharedBefore.join("\n") !== sharedAfter.join("\n")) {
		differences.push("install order changed")
	}

	if (differences.length === 0) {
		differences.push("records differ")
	}
	return differences
}

function diffBundle(previous: LockedBundle, next: LockedBundle): string[] {
	const name = next.name
	const differences: string[] = []

	if (describeSource(previous.source) !== describeSource(next.source)) {
		differences.push(
			`${name} source changed ${describeSource(previous.source)} -> ${describeSource(next.source)}`,
		)
	} else if (previous.source.revision !== next.source.revision) {
		differences.push(
			`${name} revision changed ${previous.source.revision} -> ${next.source.revision}`,
		)
	}

	if (previous.hash !== next.hash) {
		differences.push(`${name} content hash changed`)
	}

	if (previous.dependencies.join("\n") !== next.dependencies.join("\n")) {
		differences.push(`${name} dependencies changed`)
	}

	if (previous.files.join("\n") !== next.files.join("\n")) {
		differences.push(`${name} file list changed`)
	}

	if (
		previous.description !== next.description ||
		previous.version !== next.version
	) {
		differences.push(`${name} metadata changed`)
	}

	return differences
}

export function describeSource(source: LockedSource): string {
	switch (source.type) {
		case "dir":
			return `dir:${source.path}`
		case "git": {
			const ref = source.ref ? `@${source.ref.type}:${source.ref.value}` : ""
			const subpath = source.path ? `#${source.path}` : ""
			return `git:${source.url}${subpath}${ref}`
		}
	}
}
