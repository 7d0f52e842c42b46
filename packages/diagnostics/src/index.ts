/**
 * @tomlet/diagnostics
 *
 * Shared diagnostic types and definitions for Tomlet packages.
 */

export {
	CLI_DIAGNOSTICS,
	type CliDiagnosticCode,
	TLCLI001,
	TLCLI002,
	TLCLI003,
	TLCLI004,
	TLCLI005,
	TLCLI006,
	TLCLI007,
} from './cli.ts'
export {
	ENGINE_DIAGNOSTICS,
	type EngineDiagnosticCode,
	TLDOC001,
	TLDOC002,
	TLPARSE001,
	TLPARSE002,
	TLPARSE003,
	TLPARSE004,
	TLPARSE005,
	TLPARSE006,
	TLPARSE007,
	TLPARSE008,
	TLPARSE009,
	TLPARSE010,
	TLPARSE050,
	TLPARSE051,
	TLWRITE001,
	TLWRITE002,
	TLWRITE003,
	TLWRITE004,
	TLWRITE005,
} from './engine.ts'
export { formatCodedMessage, interpolateMessage } from './interpolate.ts'
export {
	MANIFEST_DIAGNOSTICS,
	type ManifestDiagnosticCode,
	TLMAN001,
	TLMAN002,
	TLMAN003,
	TLMAN004,
	TLMAN005,
	TLMAN050,
	TLMAN051,
	TLMAN052,
	TLMAN053,
	TLMAN054,
} from './manifest.ts'
export {
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
} from './types.ts'

import { CLI_DIAGNOSTICS } from './cli.ts'
import { ENGINE_DIAGNOSTICS } from './engine.ts'
import { MANIFEST_DIAGNOSTICS } from './manifest.ts'

/**
 * All diagnostics from all packages.
 */
export const DIAGNOSTICS = {
	...ENGINE_DIAGNOSTICS,
	...MANIFEST_DIAGNOSTICS,
	...CLI_DIAGNOSTICS,
} as const

/**
 * All valid diagnostic codes.
 */
export type DiagnosticCode = keyof typeof DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof DIAGNOSTICS)[typeof code] {
	return DIAGNOSTICS[code]
}

/**
 * Check if a code is a valid diagnostic code.
 */
export function isValidDiagnosticCode(code: string): code is DiagnosticCode {
	return Object.hasOwn(DIAGNOSTICS, code)
}
