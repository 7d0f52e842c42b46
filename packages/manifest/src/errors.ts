import { type DiagnosticArgs, type DiagnosticDef, interpolateMessage } from '@tomlet/diagnostics'

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

/**
 * An application manifest is missing, already present, or holds a malformed
 * dependency list.
 */
export class ManifestError extends Error {
	readonly code: string

	constructor(def: DiagnosticDef, args: DiagnosticArgs = {}) {
		super(interpolateMessage(def.message, args))
		this.name = 'ManifestError'
		this.code = def.code
	}
}

/**
 * The tool configuration file is missing, lacks its settings section,
 * or holds a setting of the wrong shape.
 */
export class ConfigurationError extends Error {
	readonly code: string

	constructor(def: DiagnosticDef, args: DiagnosticArgs = {}) {
		super(interpolateMessage(def.message, args))
		this.name = 'ConfigurationError'
		this.code = def.code
	}
}
