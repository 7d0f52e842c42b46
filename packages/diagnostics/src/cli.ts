/**
 * CLI diagnostic definitions.
 *
 * Error code format: TLCLI<NUMBER>
 * - TLCLI: CLI errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CLI ERRORS (TLCLI001-099)
// =============================================================================

export const TLCLI001: DiagnosticDef = {
	code: 'TLCLI001',
	description: "Tomlet couldn't find a file at this path.",
	message: 'file not found: {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check the path and make sure the file exists.',
}

export const TLCLI002: DiagnosticDef = {
	code: 'TLCLI002',
	description: "The file exists but Tomlet can't open it.",
	message: 'cannot read file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have read permission for this file.',
}

export const TLCLI003: DiagnosticDef = {
	code: 'TLCLI003',
	description: "Tomlet couldn't save the file.",
	message: 'cannot write file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have write permission for the directory.',
}

export const TLCLI004: DiagnosticDef = {
	code: 'TLCLI004',
	description: 'Nothing is stored at the requested path.',
	message: 'no value at "{path}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Paths are dotted section and key names, like `project.name`.',
}

export const TLCLI005: DiagnosticDef = {
	code: 'TLCLI005',
	description: 'The hand-written parser and the reference grammar disagree about this file.',
	message: 'parser {parser} the file but the reference grammar {grammar} it',
	severity: DiagnosticSeverity.Error,
	suggestion: 'This is a bug in Tomlet. Please report it with the file attached.',
}

export const TLCLI006: DiagnosticDef = {
	code: 'TLCLI006',
	description: 'Something unexpected went wrong.',
	message: 'command failed: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check your input file, or report this if it seems like a bug.',
}

export const TLCLI007: DiagnosticDef = {
	code: 'TLCLI007',
	description: 'Formatting rewrites the file without its comment lines, so Tomlet will not do it in place.',
	message: 'refusing to format {path} in place: {count} comment line(s) would be lost',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Preview the result with `--stdout`, or move the comments elsewhere first.',
}

// =============================================================================
// CATALOG
// =============================================================================

export const CLI_DIAGNOSTICS = {
	TLCLI001,
	TLCLI002,
	TLCLI003,
	TLCLI004,
	TLCLI005,
	TLCLI006,
	TLCLI007,
} as const

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
