import type { DocumentContext } from '../core/context.ts'
import { type Document, Table } from '../core/table.ts'
import { describeToken, type TokenId, TokenKind } from '../core/tokens.ts'
import type { Value } from '../core/value.ts'
import { bare, list, str, tableValue } from '../core/values.ts'
import { Cursor, ParseError } from './cursor.ts'

export type ParseResult = { succeeded: true; document: Document } | { succeeded: false }

interface ParserState {
	readonly cursor: Cursor
	readonly context: DocumentContext
	readonly document: Document
	/** Table receiving key-values; null until the first section header */
	current: Table | null
}

export function normalizeKey(key: string): string {
	return key.replaceAll('-', '_')
}

function found(state: ParserState): { found: string } {
	return { found: describeToken(state.cursor.peek()) }
}

/** Whitespace between elements; a stray `#` is never whitespace. */
function skipTrivia(state: ParserState): void {
	state.cursor.skipWhitespace()
	if (state.cursor.at(TokenKind.Comment)) {
		state.cursor.fail('TLPARSE010')
	}
}

/** Maximal run of contiguous Char tokens. The caller checks the first one. */
function parseBareRun(state: ParserState): string {
	const chars: string[] = []
	while (state.cursor.at(TokenKind.Char)) {
		chars.push(state.cursor.advance().text)
	}
	return chars.join('')
}

function assign(state: ParserState, table: Table, rawKey: string, value: Value, keyId: TokenId): void {
	const key = normalizeKey(rawKey)
	if (table.has(key)) {
		state.context.emitAtToken('TLPARSE051', keyId, { key })
	}
	table.set(key, value)
}

/** Closing quote is the next quote of the same kind. No escapes. */
function parseString(state: ParserState): Value {
	const { cursor } = state
	const openId = cursor.position
	const quote = cursor.advance().text
	const chars: string[] = []

	for (;;) {
		const token = cursor.peek()
		if (token.kind === TokenKind.Eof) {
			cursor.failAt(openId, 'TLPARSE006', { quote: `\`${quote}\`` })
		}
		cursor.advance()
		if (token.kind === TokenKind.Quote && token.text === quote) break
		chars.push(token.text)
	}

	return str(chars.join(''))
}

function parseList(state: ParserState): Value {
	const { cursor } = state
	cursor.advance()
	skipTrivia(state)

	const items: Value[] = []
	if (cursor.at(TokenKind.RBracket)) {
		cursor.advance()
		return list(items)
	}

	for (;;) {
		items.push(parseValue(state))
		skipTrivia(state)
		if (cursor.at(TokenKind.Comma)) {
			cursor.advance()
			skipTrivia(state)
			if (cursor.at(TokenKind.RBracket)) cursor.fail('TLPARSE005')
			continue
		}
		cursor.expect(TokenKind.RBracket, 'TLPARSE003', found(state))
		return list(items)
	}
}

function parseInlineEntry(state: ParserState, table: Table): void {
	const { cursor } = state
	if (!cursor.at(TokenKind.Char)) cursor.fail('TLPARSE009', found(state))
	const keyId = cursor.position
	const key = parseBareRun(state)
	skipTrivia(state)
	cursor.expect(TokenKind.Equal, 'TLPARSE002', { key, ...found(state) })
	assign(state, table, key, parseValue(state), keyId)
}

function parseInlineTable(state: ParserState): Value {
	const { cursor } = state
	cursor.advance()
	skipTrivia(state)

	const table = new Table()
	if (cursor.at(TokenKind.RBrace)) {
		cursor.advance()
		return tableValue(table)
	}

	for (;;) {
		parseInlineEntry(state, table)
		skipTrivia(state)
		if (cursor.at(TokenKind.Comma)) {
			cursor.advance()
			skipTrivia(state)
			if (cursor.at(TokenKind.RBrace)) cursor.fail('TLPARSE005')
			continue
		}
		cursor.expect(TokenKind.RBrace, 'TLPARSE004', found(state))
		return tableValue(table)
	}
}

function parseValue(state: ParserState): Value {
	skipTrivia(state)
	const token = state.cursor.peek()
	switch (token.kind) {
		case TokenKind.Quote:
			return parseString(state)
		case TokenKind.LBracket:
			return parseList(state)
		case TokenKind.LBrace:
			return parseInlineTable(state)
		case TokenKind.Char:
			return bare(parseBareRun(state))
		default:
			return state.cursor.fail('TLPARSE001', found(state))
	}
}

function parseSection(state: ParserState): void {
	const { cursor, document } = state
	const headerId = cursor.position
	cursor.advance()
	if (!cursor.at(TokenKind.Char)) cursor.fail('TLPARSE007', found(state))
	const name = parseBareRun(state)
	cursor.expect(TokenKind.RBracket, 'TLPARSE003', found(state))

	if (document.has(name)) {
		state.context.emitAtToken('TLPARSE050', headerId, { name })
	}
	const table = new Table()
	document.set(name, tableValue(table))
	state.current = table
}

function parseKeyValue(state: ParserState): void {
	const { cursor } = state
	const keyId = cursor.position
	const key = parseBareRun(state)
	const target = state.current
	if (target === null) {
		return cursor.failAt(keyId, 'TLPARSE008', { key })
	}
	skipTrivia(state)
	cursor.expect(TokenKind.Equal, 'TLPARSE002', { key, ...found(state) })
	assign(state, target, key, parseValue(state), keyId)
}

/** Parses one section header or key-value. Returns false at end of input. */
function parseStatement(state: ParserState): boolean {
	skipTrivia(state)
	const token = state.cursor.peek()
	switch (token.kind) {
		case TokenKind.Eof:
			return false
		case TokenKind.LBracket:
			parseSection(state)
			return true
		case TokenKind.Char:
			parseKeyValue(state)
			return true
		default:
			return state.cursor.fail('TLPARSE001', found(state))
	}
}

/**
 * Parses context.tokens into a document.
 * The first syntax error is reported into context and aborts the parse;
 * no partial document is returned.
 */
export function parse(context: DocumentContext): ParseResult {
	const state: ParserState = {
		context,
		current: null,
		cursor: new Cursor(context.tokens),
		document: new Table(),
	}

	try {
		while (parseStatement(state)) {
			// one statement per iteration
		}
	} catch (error: unknown) {
		if (!(error instanceof ParseError)) throw error
		context.emitAtToken(error.code, error.tokenId, error.args)
		return { succeeded: false }
	}

	return { document: state.document, succeeded: true }
}
