import { describe, expect, it } from "vitest"
import { platformSchema } from "./schema"

const platform = (merge?: string) => ({
	id: "acme",
	name: "Acme",
	root: ".acme",
	rules: [{ from: "rules/*.md", to: ".acme/rules/*.md", ...(merge ? { merge } : {}) }],
})

describe("platformSchema", () => {
	it("accepts every merge strategy and defaults to replace", () => {
		for (const merge of ["replace", "shallow", "deep", "composite"]) {
			const parsed = platformSchema.safeParse(platform(merge))
			expect(parsed.success && parsed.data.rules[0]?.merge).toBe(merge)
		}
		const defaulted = platformSchema.safeParse(platform())
		expect(defaulted.success && defaulted.data.rules[0]?.merge).toBe("replace")
	})

	it("rejects an unknown merge strategy", () => {
		expect(platformSchema.safeParse(platform("append")).success).toBe(false)
	})
})
