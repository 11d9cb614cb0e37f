import { coerceNonEmpty, type GitRef } from "@quiver/core"
import { describe, expect, it } from "vitest"
import { pickRemoteRevision } from "@/sources/git"

const commitA = "a".repeat(40)
const commitB = "b".repeat(40)

function tag(value: string): GitRef {
	const name = coerceNonEmpty(value)
	if (!name) throw new Error("empty tag")
	return { type: "tag", value: name }
}

describe("pickRemoteRevision", () => {
	it("takes the first listed commit", () => {
		expect(pickRemoteRevision(`${commitA}\tHEAD\n`, undefined)).toBe(commitA)
	})

	it("prefers the peeled commit of an annotated tag", () => {
		const output = `${commitA}\trefs/tags/v1\n${commitB}\trefs/tags/v1^{}\n`
		expect(pickRemoteRevision(output, tag("v1"))).toBe(commitB)
	})

	it("returns null when nothing matched", () => {
		expect(pickRemoteRevision("", tag("v1"))).toBeNull()
	})
})
