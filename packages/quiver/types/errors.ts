import type { BaseError, CoreError } from "@quiver/core"

export type {
	CircularDependencyError,
	FrozenMismatchError,
	IntegrityMismatchError,
	IoError,
	LockContentionError,
	MergeError,
	NameConflictError,
	NotFoundError,
	ParseError,
	SourceResolutionError,
	ValidationError,
} from "@quiver/core"

/** A thrown exception caught at a boundary that only deals in results. */
export interface UnexpectedError extends BaseError {
	type: "unexpected"
}

export type QuiverError = CoreError | UnexpectedError

export function toUnexpected(error: unknown, message: string): UnexpectedError {
	return {
		message: error instanceof Error ? `${message} ${error.message}` : message,
		rawError: error instanceof Error ? error : undefined,
		type: "unexpected",
	}
}
