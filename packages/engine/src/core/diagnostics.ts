/**
 * Re-export diagnostic types and engine definitions from the shared package.
 */

import { ENGINE_DIAGNOSTICS } from '@tomlet/diagnostics'

export {
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	ENGINE_DIAGNOSTICS,
	type EngineDiagnosticCode,
	formatCodedMessage,
	interpolateMessage,
} from '@tomlet/diagnostics'

/**
 * All valid diagnostic codes for the engine.
 */
export type DiagnosticCode = keyof typeof ENGINE_DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof ENGINE_DIAGNOSTICS)[typeof code] {
	return ENGINE_DIAGNOSTICS[code]
}
