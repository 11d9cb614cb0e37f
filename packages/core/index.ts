/**
 * @quiver/core
 *
 * Types and pure algorithms shared by the quiver engine: transform globs,
 * merge strategies, lockfile records, graph ordering and platform data.
 */

export {
	IGNORED_DIRS,
	INDEX_FILENAME,
	LOCK_TARGET_FILENAME,
	LOCKFILE_FILENAME,
	MANIFEST_FILENAME,
	PLATFORM_OVERRIDES_FILENAME,
	RECORD_FILENAMES,
	WORKSPACE_DIR,
} from "./constants"
export { formatChain, type GraphNode, orderGraph } from "./graph/order"
export { comparePaths, hashTree, sortedPaths } from "./hash/tree"
export { describeSource, diffLockfiles, validateFrozen } from "./lockfile/compare"
export { generateLockfile, lockBundle } from "./lockfile/generate"
export { parseLockfile } from "./lockfile/parse"
export { serializeLockfile } from "./lockfile/serialize"
export { type ManifestResult, parseManifest } from "./manifest/parse"
export { serializeManifest } from "./manifest/serialize"
export { type MergeInput, mergeContent } from "./merge/apply"
export {
	blockMarkers,
	removeBlock,
	renderBlock,
	upsertBlock,
} from "./merge/composite"
export {
	formatForPath,
	parseStructured,
	type StructuredFormat,
	stringifyStructured,
} from "./merge/format"
export { deepMerge, type StructuredObject, shallowMerge } from "./merge/structured"
export { builtinPlatforms, findPlatform, mergePlatforms } from "./platforms/builtin"
export { platformFileSchema, platformSchema } from "./platforms/schema"
export { compileGlob, matchGlob } from "./transform/glob"
export { applyExtension, resolveTransform } from "./transform/resolve"
export type {
	AbsolutePath,
	BundleName,
	ContentHash,
	GitUrl,
	NonEmptyString,
	UniversalPath,
} from "./types/branded"
export type {
	BundleManifest,
	BundleMetadata,
	Declaration,
	FileTree,
	GitRef,
	LockedBundle,
	LockedSource,
	Lockfile,
	ResolvedBundle,
	SourceSpec,
} from "./types/bundle"
export {
	coerceBundleName,
	coerceContentHash,
	coerceGitRef,
	coerceGitUrl,
	coerceNonEmpty,
	coerceUniversalPath,
} from "./types/coerce"
export type {
	BaseError,
	CircularDependencyError,
	CoreError,
	FrozenMismatchError,
	IntegrityMismatchError,
	IoError,
	LockContentionError,
	MergeError,
	NameConflictError,
	NotFoundError,
	ParseError,
	Result,
	SourceResolutionError,
	ValidationError,
} from "./types/error"
export {
	isBundleName,
	isContentHash,
	isGitUrl,
	isNonEmpty,
	isPlainObject,
	isUniversalPath,
} from "./types/guards"
export type {
	MergeStrategy,
	Platform,
	TransformRule,
	TransformTarget,
} from "./types/platform"
