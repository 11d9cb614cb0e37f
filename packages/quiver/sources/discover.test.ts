import { describe, expect, it } from "vitest"
import { findBundleRoots } from "@/sources/discover"
import { tree } from "@/tests/helpers"

describe("findBundleRoots", () => {
	it("returns nothing when the source is a bundle itself", () => {
		expect(findBundleRoots(tree({ "a/quiver.toml": "", "quiver.toml": "" }))).toEqual([])
	})

	it("returns outermost directories holding a manifest", () => {
		const roots = findBundleRoots(
			tree({
				"bundles/base/quiver.toml": "",
				"bundles/base/extra/quiver.toml": "",
				"bundles/tools/quiver.toml": "",
				"docs/readme.md": "",
			}),
		)

		expect(roots).toEqual(["bundles/base", "bundles/tools"])
	})
})
