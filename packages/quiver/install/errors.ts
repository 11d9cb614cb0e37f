import type { InstallError, InstallResult, InstallStage } from "@/install/types"
import type { QuiverError } from "@/types/errors"

export function failInstall(stage: InstallStage, error: QuiverError): InstallResult<never> {
	return {
		error: {
			...error,
			cause: error,
			message: `Install failed at ${stage}.`,
			stage,
		},
		ok: false,
	}
}

export function failUninstall(stage: InstallStage, error: QuiverError): InstallResult<never> {
	return {
		error: {
			...error,
			cause: error,
			message: `Uninstall failed at ${stage}.`,
			stage,
		},
		ok: false,
	}
}

export function isStaged(error: QuiverError): error is InstallError {
	return "stage" in error
}
