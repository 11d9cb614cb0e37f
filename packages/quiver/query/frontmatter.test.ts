import { describe, expect, it } from "vitest"
import { readDescription } from "@/query/frontmatter"

describe("readDescription", () => {
	it("reads the description field", () => {
		const contents = "---\ndescription: Shared review rules\nowner: platform\n---\n\n# Rules\n"
		expect(readDescription(contents)).toEqual({ ok: true, value: "Shared review rules" })
	})

	it("returns null without frontmatter", () => {
		expect(readDescription("# Just text\n")).toEqual({ ok: true, value: null })
	})

	it("reports malformed YAML", () => {
		expect(readDescription("---\ndescription: [unclosed\n---\n")).toBeErrOfType("parse")
	})
})
