import type {
	BundleName,
	Declaration,
	Result,
	UniversalPath,
} from "@quiver/core"
import type { Fetcher } from "@/sources/types"
import type { QuiverError } from "@/types/errors"

export type InstallStage =
	| "lock"
	| "state"
	| "platforms"
	| "detect"
	| "resolve"
	| "frozen"
	| "integrity"
	| "plan"
	| "snapshot"
	| "apply"

export type InstallError = QuiverError & { stage: InstallStage }

export type InstallResult<T> = Result<T, InstallError>

export interface EngineOptions {
	/** Project directory holding `.quiver/` */
	root: string
	cacheDir: string
	fetcher: Fetcher
	lockRetries: number
}

export interface InstallOptions extends EngineOptions {
	/** Declarations to add to the manifest before resolving */
	add?: ReadonlyArray<{ name: BundleName; declaration: Declaration }>
	/** Fail instead of changing the lockfile */
	frozen?: boolean
	/** Platform ids; override the manifest and detection */
	platforms?: ReadonlyArray<string>
}

export interface InstallSummary {
	/** Lock order */
	bundles: BundleName[]
	platforms: string[]
	written: string[]
	removed: string[]
	migrated: UniversalPath[]
	warnings: string[]
	lockfileChanged: boolean
	noOpReason?: "no-platforms"
}

export interface UninstallSummary extends InstallSummary {
	/** Bundles dropped from the lockfile, requested ones included */
	dropped: BundleName[]
}
