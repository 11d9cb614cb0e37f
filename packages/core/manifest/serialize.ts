import { stringify } from "smol-toml"
import type { BundleManifest, Declaration } from "../types/bundle"

/**
 * Serialize a manifest to TOML. Sections keep the order
 * bundle, platforms, dependencies.
 */
export function serializeManifest(manifest: BundleManifest): string {
	const output: Record<string, unknown> = {}

	const bundle = manifest.bundle
	if (bundle && (bundle.name || bundle.description || bundle.version)) {
		const section: Record<string, string> = {}
		if (bundle.name) section.name = bundle.name
		if (bundle.description) section.description = bundle.description
		if (bundle.version) section.version = bundle.version
		output.bundle = section
	}

	if (manifest.platforms.size > 0) {
		output.platforms = Object.fromEntries(manifest.platforms)
	}

	if (manifest.dependencies.size > 0) {
		const dependencies: Record<string, Record<string, string>> = {}
		for (const [name, declaration] of manifest.dependencies) {
			dependencies[name] = serializeDeclaration(declaration)
		}
		output.dependencies = dependencies
	}

	const toml = stringify(output).trimEnd()
	return toml.length > 0 ? `${toml}\n` : ""
}

function serializeDeclaration(declaration: Declaration): Record<string, string> {
	if (declaration.type === "dir") {
		return { path: declaration.path }
	}

	const output: Record<string, string> = { git: declaration.url }
	if (declaration.ref) {
		output[declaration.ref.type] = declaration.ref.value
	}
	if (declaration.path) {
		output.path = declaration.path
	}
	return output
}
