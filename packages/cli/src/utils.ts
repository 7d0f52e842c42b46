import { join } from 'node:path'
import {
	formatCodedMessage,
	TLCLI001,
	TLCLI002,
	TLCLI003,
	TLCLI004,
	TLCLI005,
	TLCLI006,
	TLCLI007,
} from '@tomlet/diagnostics'
import { DocumentError, DocumentSyntaxError, serializeValue, toPlain, type Value, ValueKind } from '@tomlet/engine'
import { ConfigurationError, isNodeError, MANIFEST_FILE_NAME, ManifestError } from '@tomlet/manifest'

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

export function formatReadError(filePath: string, error: unknown): string {
	if (isNodeError(error) && error.code === 'ENOENT') {
		return formatCodedMessage(TLCLI001, { path: filePath })
	}
	return formatCodedMessage(TLCLI002, { reason: getErrorMessage(error) })
}

export function formatWriteError(error: unknown): string {
	return formatCodedMessage(TLCLI003, { reason: getErrorMessage(error) })
}

export function formatMissingValueError(path: string): string {
	return formatCodedMessage(TLCLI004, { path })
}

export function formatGrammarMismatch(parserAccepts: boolean): string {
	return formatCodedMessage(TLCLI005, {
		grammar: parserAccepts ? 'rejects' : 'accepts',
		parser: parserAccepts ? 'accepts' : 'rejects',
	})
}

export function formatCommentLossError(path: string, count: number): string {
	return formatCodedMessage(TLCLI007, { count, path })
}

/**
 * Syntax errors already carry the rendered diagnostic; other coded errors
 * get a `[CODE]` prefix.
 */
export function formatDocumentError(error: unknown): string {
	if (error instanceof DocumentSyntaxError) {
		return error.message
	}
	if (error instanceof DocumentError || error instanceof ManifestError || error instanceof ConfigurationError) {
		return `[${error.code}] ${error.message}`
	}
	return formatCodedMessage(TLCLI006, { reason: getErrorMessage(error) })
}

/**
 * Text shown by `get`: strings and bare words print as their text,
 * lists and tables in file syntax, or everything as JSON.
 */
export function renderValue(value: Value, path: string, json: boolean): string {
	if (json) {
		return JSON.stringify(toPlain(value, { booleans: true }))
	}
	if (value.kind === ValueKind.Str || value.kind === ValueKind.Bare) {
		return value.value
	}
	return serializeValue(value, path)
}

export function resolveManifestPath(dir: string | undefined): string {
	return join(dir ?? '.', MANIFEST_FILE_NAME)
}

/** `text` without its final line break; the logger adds one back. */
export function withoutTrailingNewline(text: string): string {
	return text.endsWith('\n') ? text.slice(0, -1) : text
}
