import type { ZodError } from "zod"
import type { AbsolutePath, BundleName } from "./branded"
import type { MergeStrategy } from "./platform"

export interface BaseError {
	type: string
	message: string
	cause?: BaseError
	rawError?: Error
}

export type ValidationError =
	| (BaseError & {
			type: "validation"
			source: "zod"
			field: string
			path?: AbsolutePath
			zodError: ZodError
	  })
	| (BaseError & {
			type: "validation"
			source: "manual"
			field: string
			path?: AbsolutePath
	  })

export type ParseError = BaseError & {
	type: "parse"
	source: string
	path?: AbsolutePath
}

export type IoError = BaseError & {
	type: "io"
	path: AbsolutePath
	operation: string
}

export type NotFoundError = BaseError & {
	type: "not_found"
	target: string
	path?: AbsolutePath
}

export type SourceResolutionError = BaseError & {
	type: "source_resolution"
	source: string
	bundle?: BundleName
}

export type CircularDependencyError = BaseError & {
	type: "circular_dependency"
	chain: BundleName[]
}

export type NameConflictError = BaseError & {
	type: "name_conflict"
	bundle: BundleName
	existing: string
	incoming: string
}

export type FrozenMismatchError = BaseError & {
	type: "frozen_mismatch"
	differences: string[]
}

export type IntegrityMismatchError = BaseError & {
	type: "integrity_mismatch"
	target: string
	expected: string
	actual: string
}

export type MergeError = BaseError & {
	type: "merge"
	strategy: MergeStrategy
	target: string
}

export type LockContentionError = BaseError & {
	type: "lock_contention"
	path: AbsolutePath
}

export type CoreError =
	| ValidationError
	| ParseError
	| IoError
	| NotFoundError
	| SourceResolutionError
	| CircularDependencyError
	| NameConflictError
	| FrozenMismatchError
	| IntegrityMismatchError
	| MergeError
	| LockContentionError

export type Result<T, E extends BaseError = CoreError> =
	| { ok: true; value: T }
	| { ok: false; error: E }
