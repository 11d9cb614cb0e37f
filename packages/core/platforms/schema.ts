import { z } from "zod"
import { countNameCaptures } from "../transform/glob"
import { MERGE_STRATEGIES, type Platform } from "../types/platform"

const trimmedString = (label: string) =>
	z
		.string()
		.transform((value) => value.trim())
		.refine((value) => value.length > 0, {
			message: `${label} must not be empty.`,
		})

const relativePath = (label: string) =>
	trimmedString(label).refine(
		(value) => !value.startsWith("/") && !value.split("/").includes(".."),
		{ message: `${label} must stay inside the workspace.` },
	)

const ruleSchema = z
	.object({
		extension: trimmedString("extension").optional(),
		from: relativePath("from"),
		merge: z.enum(MERGE_STRATEGIES).default("replace"),
		to: relativePath("to"),
	})
	.strict()
	.superRefine((rule, ctx) => {
		if (countNameCaptures(rule.from) > 1) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: `Rule "${rule.from}" may capture {name} at most once.`,
			})
		}
	})

export const platformSchema = z
	.object({
		detect: z.array(relativePath("detect")).default([]),
		id: trimmedString("id"),
		name: trimmedString("name"),
		root: relativePath("root"),
		rules: z.array(ruleSchema),
	})
	.strict()

export const platformFileSchema = z
	.object({
		platforms: z.array(platformSchema),
	})
	.strict()
	.superRefine((file, ctx) => {
		const seen = new Set<string>()
		for (const platform of file.platforms) {
			if (seen.has(platform.id)) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					message: `Duplicate platform id "${platform.id}".`,
				})
			}
			seen.add(platform.id)
		}
	})

export type PlatformFile = { platforms: Platform[] }
