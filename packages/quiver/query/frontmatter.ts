import type { ParseError, Result } from "@quiver/core"
import matter from "gray-matter"
import { z } from "zod"

const frontmatterSchema = z
	.object({
		description: z.string().trim().min(1).optional(),
	})
	.passthrough()

/** `description` from a Markdown file's YAML frontmatter, if it has one. */
export function readDescription(contents: string): Result<string | null, ParseError> {
	let parsed: matter.GrayMatterFile<string>
	try {
		parsed = matter(contents)
	} catch (error) {
		return {
			error: {
				message: "Invalid YAML frontmatter.",
				rawError: error instanceof Error ? error : undefined,
				source: "frontmatter",
				type: "parse",
			},
			ok: false,
		}
	}

	const data = frontmatterSchema.safeParse(parsed.data)
	if (!data.success) {
		return { ok: true, value: null }
	}
	return { ok: true, value: data.data.description ?? null }
}
