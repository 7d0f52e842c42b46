/**
 * Manifest and tool configuration diagnostic definitions.
 *
 * Error code format: TLMAN<NUMBER>
 * - TLMAN: Manifest errors (001-049), configuration errors (050-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// MANIFEST ERRORS (TLMAN001-049)
// =============================================================================

export const TLMAN001: DiagnosticDef = {
	code: 'TLMAN001',
	description: "Tomlet couldn't find an application manifest at this path.",
	message: 'manifest not found: {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Run the command from the application directory.',
}

export const TLMAN002: DiagnosticDef = {
	code: 'TLMAN002',
	description: 'Creating a manifest never overwrites an existing one.',
	message: 'manifest already exists: {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Remove the existing file first if you want to start over.',
}

export const TLMAN003: DiagnosticDef = {
	code: 'TLMAN003',
	description: 'An entry in a dependency list is malformed.',
	message: 'invalid dependency entry in "{list}": {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Each entry must look like `{name="pkg", new_packages=[]}`.',
}

export const TLMAN004: DiagnosticDef = {
	code: 'TLMAN004',
	description: 'The dependency is already recorded in the manifest.',
	message: 'dependency "{name}" is already in "{list}"',
	severity: DiagnosticSeverity.Error,
}

export const TLMAN005: DiagnosticDef = {
	code: 'TLMAN005',
	description: 'The dependency is not recorded in the manifest.',
	message: 'dependency "{name}" is not in "{list}"',
	severity: DiagnosticSeverity.Error,
}

// =============================================================================
// CONFIGURATION ERRORS (TLMAN050-099)
// =============================================================================

export const TLMAN050: DiagnosticDef = {
	code: 'TLMAN050',
	description: "Tomlet couldn't find the tool configuration file.",
	message: 'configuration file not found: {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Save a default configuration first.',
}

export const TLMAN051: DiagnosticDef = {
	code: 'TLMAN051',
	description: 'The configuration file must contain the reserved settings section.',
	message: 'configuration file is missing the [{section}] section',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Add a `[{section}]` section or regenerate the file.',
}

export const TLMAN052: DiagnosticDef = {
	code: 'TLMAN052',
	description: 'A setting has a value of the wrong shape.',
	message: 'setting "{key}" must be {expected}',
	severity: DiagnosticSeverity.Error,
}

export const TLMAN053: DiagnosticDef = {
	code: 'TLMAN053',
	description: 'An application record cannot share its section with the tool settings.',
	message: 'application "{name}" has the same name as the [{section}] settings section',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Rename the application or pick another settings section name.',
}

export const TLMAN054: DiagnosticDef = {
	code: 'TLMAN054',
	description: 'Each application is stored in a section named after it, so names must be unique.',
	message: 'application "{name}" is listed more than once',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Remove or rename one of the "{name}" records.',
}

// =============================================================================
// CATALOG
// =============================================================================

export const MANIFEST_DIAGNOSTICS = {
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
} as const

export type ManifestDiagnosticCode = keyof typeof MANIFEST_DIAGNOSTICS
