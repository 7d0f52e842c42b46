/**
 * Tomlet engine public API
 *
 * Read path:  source → tokenize → parse → Document
 * Write path: Document → serialize → atomic file write
 *
 * File names are always passed in by the caller; the engine has no ambient paths.
 */

import { readFileSync } from 'node:fs'
import { DocumentContext } from './core/context.ts'
import { DocumentSyntaxError } from './core/errors.ts'
import type { Document } from './core/table.ts'
import { tokenize } from './lex/index.ts'
import { type ParseResult, parse } from './parse/parser.ts'
import { serialize } from './write/writer.ts'

export { type Diagnostic, DiagnosticSeverity, DocumentContext } from './core/context.ts'
export {
	DocumentError,
	DocumentPathError,
	DocumentSyntaxError,
	DocumentTypeError,
} from './core/errors.ts'
export { type Document, type Path, splitPath, Table } from './core/table.ts'
export { describeToken, type Token, type TokenId, TokenKind, TokenStore, tokenId } from './core/tokens.ts'
export {
	type BareValue,
	describeValue,
	isTableValue,
	type ListValue,
	type StrValue,
	type TableValue,
	type Value,
	ValueKind,
} from './core/value.ts'
export {
	asBoolean,
	asList,
	asString,
	asTable,
	bare,
	bool,
	fromPlain,
	list,
	type PlainTable,
	type PlainValue,
	str,
	tableEquals,
	tableFromPlain,
	tableToPlain,
	tableValue,
	type ToPlainOptions,
	toPlain,
	valueEquals,
} from './core/values.ts'
export { match, recognize, TomletGrammar, trace } from './grammar/index.ts'
export {
	countCommentLines,
	stripCommentLines,
	type TokenizeFileOptions,
	type TokenizeResult,
	tokenize,
	tokenizeFile,
} from './lex/index.ts'
export { Cursor, normalizeKey, ParseError, type ParseResult, parse } from './parse/index.ts'
export { isBareWord, serialize, serializeValue, writeDocument } from './write/writer.ts'

/**
 * Options for reading a document.
 */
export interface LoadOptions {
	/** Name shown in diagnostics */
	filename?: string
}

export interface Analysis {
	context: DocumentContext
	result: ParseResult
}

/**
 * Tokenize and parse, keeping every diagnostic (warnings included).
 * Never throws on bad input; check `result.succeeded`.
 */
export function analyze(source: string, options: LoadOptions = {}): Analysis {
	const context = new DocumentContext(source, options.filename)
	tokenize(context)
	return { context, result: parse(context) }
}

/**
 * Parse source text into a document.
 *
 * @throws {DocumentSyntaxError} If the text does not follow the grammar
 */
export function load(source: string, options: LoadOptions = {}): Document {
	const { context, result } = analyze(source, options)
	if (!result.succeeded) {
		throw new DocumentSyntaxError(context)
	}
	return result.document
}

/**
 * Render a document as text.
 *
 * @throws {DocumentTypeError} If a value cannot be written
 */
export function dump(document: Document): string {
	return serialize(document)
}

/**
 * Read and parse a file.
 *
 * @throws The file system error unchanged if the file cannot be read
 * @throws {DocumentSyntaxError} If the file does not follow the grammar
 */
export function readDocument(path: string, options: LoadOptions = {}): Document {
	const source = readFileSync(path, 'utf-8')
	return load(source, { filename: options.filename ?? path })
}
