/**
 * Engine diagnostic definitions.
 *
 * Error code format: TL<PHASE><NUMBER>
 * - TLPARSE: Parser errors (001-049), warnings (050-099)
 * - TLWRITE: Serializer errors (001-099)
 * - TLDOC: Document access errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// PARSER ERRORS (TLPARSE001-049)
// =============================================================================

export const TLPARSE001: DiagnosticDef = {
	code: 'TLPARSE001',
	description: "Tomlet found something it didn't expect at this point in the file.",
	message: 'unexpected {found}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Values are quoted strings, bare words, `[lists]` or `{inline = tables}`.',
}

export const TLPARSE002: DiagnosticDef = {
	code: 'TLPARSE002',
	description: 'Every key needs an `=` sign between it and its value.',
	message: 'expected equal sign after key "{key}", found {found}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Write the entry as `{key}=value`. Keys cannot contain spaces.',
}

export const TLPARSE003: DiagnosticDef = {
	code: 'TLPARSE003',
	description: 'A list or section header was opened with `[` but never closed.',
	message: 'expected right bracket, found {found}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Close the list with `]` and separate its items with commas.',
}

export const TLPARSE004: DiagnosticDef = {
	code: 'TLPARSE004',
	description: 'An inline table was opened with `{` but never closed.',
	message: 'expected right curly bracket, found {found}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Close the table with `}` and separate its entries with commas.',
}

export const TLPARSE005: DiagnosticDef = {
	code: 'TLPARSE005',
	description: 'Lists and inline tables cannot end with a comma.',
	message: 'unexpected comma',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Remove the comma before the closing bracket.',
}

export const TLPARSE006: DiagnosticDef = {
	code: 'TLPARSE006',
	description: 'A string was opened with {quote} but the file ended before the matching quote.',
	message: 'unterminated string',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Add the closing {quote}.',
}

export const TLPARSE007: DiagnosticDef = {
	code: 'TLPARSE007',
	description: 'A section header needs a name made of plain characters, like `[project]`.',
	message: 'expected section name, found {found}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Write the header as `[name]` without spaces inside the brackets.',
}

export const TLPARSE008: DiagnosticDef = {
	code: 'TLPARSE008',
	description: 'Every key must belong to a section. This one appears before the first header.',
	message: 'key "{key}" is outside of any section',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Add a section header such as `[project]` above this line.',
}

export const TLPARSE009: DiagnosticDef = {
	code: 'TLPARSE009',
	description: 'Tomlet expected a key (a word made of plain characters) here.',
	message: 'expected key, found {found}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Start the entry with a key, like `name="value"`.',
}

export const TLPARSE010: DiagnosticDef = {
	code: 'TLPARSE010',
	description: 'Comments are only recognized when `#` is the very first character of a line.',
	message: 'comment must start at the beginning of a line',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Move the comment onto its own line, starting in the first column.',
}

// =============================================================================
// PARSER WARNINGS (TLPARSE050-099)
// =============================================================================

export const TLPARSE050: DiagnosticDef = {
	code: 'TLPARSE050',
	description: 'This section was already declared. The earlier one is discarded.',
	message: 'duplicate section "{name}"',
	severity: DiagnosticSeverity.Warning,
	suggestion: 'Merge both `[{name}]` blocks into one.',
}

export const TLPARSE051: DiagnosticDef = {
	code: 'TLPARSE051',
	description: 'This key was already set in the same table. The last value wins.',
	message: 'duplicate key "{key}"',
	severity: DiagnosticSeverity.Warning,
	suggestion: 'Remove one of the `{key}` entries.',
}

// =============================================================================
// SERIALIZER ERRORS (TLWRITE001-099)
// =============================================================================

export const TLWRITE001: DiagnosticDef = {
	code: 'TLWRITE001',
	description: 'Only tables can appear at the top level; each one becomes a `[section]`.',
	message: 'section "{key}" must be a table, found {found}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Move the value into a section table.',
}

export const TLWRITE002: DiagnosticDef = {
	code: 'TLWRITE002',
	description: 'Strings have no escapes, so one cannot contain both kinds of quote.',
	message: 'string at "{path}" contains both quote characters',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use only one kind of quote inside the string.',
}

export const TLWRITE003: DiagnosticDef = {
	code: 'TLWRITE003',
	description: 'Strings are written on a single line.',
	message: 'string at "{path}" contains a line break',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Remove the line break or split the text into a list.',
}

export const TLWRITE004: DiagnosticDef = {
	code: 'TLWRITE004',
	description: 'Bare words are written without quotes and must be read back as one word.',
	message: 'bare value at "{path}" cannot be written unquoted: "{value}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Store the value as a string instead.',
}

export const TLWRITE005: DiagnosticDef = {
	code: 'TLWRITE005',
	description: 'Keys are written unquoted, so they must be non-empty and free of special characters.',
	message: 'invalid key "{key}" at "{path}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use letters, digits, `_`, `-` or `.` in keys.',
}

// =============================================================================
// DOCUMENT ERRORS (TLDOC001-099)
// =============================================================================

export const TLDOC001: DiagnosticDef = {
	code: 'TLDOC001',
	description: 'A path segment points at a value that is not a table, so it cannot be descended into.',
	message: '"{path}" is a {found}, not a table',
	severity: DiagnosticSeverity.Error,
}

export const TLDOC002: DiagnosticDef = {
	code: 'TLDOC002',
	description: 'A path needs at least one segment.',
	message: 'empty path',
	severity: DiagnosticSeverity.Error,
}

// =============================================================================
// CATALOG
// =============================================================================

/**
 * Central catalog of all engine diagnostics.
 */
export const ENGINE_DIAGNOSTICS = {
	// Document errors
	TLDOC001,
	TLDOC002,
	// Parser errors
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
	// Parser warnings
	TLPARSE050,
	TLPARSE051,
	// Serializer errors
	TLWRITE001,
	TLWRITE002,
	TLWRITE003,
	TLWRITE004,
	TLWRITE005,
} as const

/**
 * All valid engine diagnostic codes.
 */
export type EngineDiagnosticCode = keyof typeof ENGINE_DIAGNOSTICS
