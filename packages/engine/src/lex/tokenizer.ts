import { readFileSync } from 'node:fs'
import { DocumentContext } from '../core/context.ts'
import { TokenKind } from '../core/tokens.ts'

export interface TokenizeResult {
	succeeded: boolean
}

export interface TokenizeFileOptions {
	/** Name shown in diagnostics; defaults to the path */
	filename?: string
}

const UTF8_BOM = '\uFEFF'

const CHARACTER_KINDS: ReadonlyMap<string, TokenKind> = new Map<string, TokenKind>([
	['=', TokenKind.Equal],
	['[', TokenKind.LBracket],
	[']', TokenKind.RBracket],
	['{', TokenKind.LBrace],
	['}', TokenKind.RBrace],
	['"', TokenKind.Quote],
	["'", TokenKind.Quote],
	[',', TokenKind.Comma],
	['#', TokenKind.Comment],
	['\n', TokenKind.Newline],
	['\r', TokenKind.CarriageReturn],
	[' ', TokenKind.Space],
	['\t', TokenKind.Space],
])

export function classifyCharacter(char: string): TokenKind {
	return CHARACTER_KINDS.get(char) ?? TokenKind.Char
}

export function stripBom(source: string): string {
	return source.startsWith(UTF8_BOM) ? source.slice(1) : source
}

/** Comments are whole lines whose very first character is `#`. */
export function isCommentLine(line: string): boolean {
	return line.startsWith('#')
}

/** Split into lines that keep their `\n` terminator. */
export function splitLines(source: string): string[] {
	const lines: string[] = []
	let start = 0
	for (let i = 0; i < source.length; i++) {
		if (source[i] === '\n') {
			lines.push(source.slice(start, i + 1))
			start = i + 1
		}
	}
	if (start < source.length) lines.push(source.slice(start))
	return lines
}

/**
 * The source as the parser sees it: BOM removed, comment lines dropped.
 */
export function stripCommentLines(source: string): string {
	return splitLines(stripBom(source))
		.filter((line) => !isCommentLine(line))
		.join('')
}

/** Number of whole-line comments; serializing a document drops them. */
export function countCommentLines(source: string): number {
	return splitLines(stripBom(source)).filter(isCommentLine).length
}

function tokenizeLine(line: string, lineNumber: number, context: DocumentContext): void {
	let column = 1
	for (const char of line) {
		context.tokens.add({ column, kind: classifyCharacter(char), line: lineNumber, text: char })
		column++
	}
}

function eofPosition(lines: string[]): { line: number; column: number } {
	const last = lines[lines.length - 1]
	if (last === undefined) return { column: 1, line: 1 }
	if (last.endsWith('\n')) return { column: 1, line: lines.length + 1 }
	return { column: [...last].length + 1, line: lines.length }
}

/**
 * Tokenizes context.source into context.tokens, one token per character.
 * Lines starting with `#` produce no tokens; a single Eof token ends the stream.
 */
export function tokenize(context: DocumentContext): TokenizeResult {
	const lines = splitLines(stripBom(context.source))

	for (let i = 0; i < lines.length; i++) {
		const line = lines[i]
		if (line === undefined || isCommentLine(line)) continue
		tokenizeLine(line, i + 1, context)
	}

	const eof = eofPosition(lines)
	context.tokens.add({ column: eof.column, kind: TokenKind.Eof, line: eof.line, text: '' })
	return { succeeded: !context.hasErrors() }
}

/**
 * Read a file and tokenize it.
 *
 * @throws The file system error unchanged if the file cannot be read
 */
export function tokenizeFile(path: string, options: TokenizeFileOptions = {}): DocumentContext {
	const source = readFileSync(path, 'utf-8')
	const context = new DocumentContext(source, options.filename ?? path)
	tokenize(context)
	return context
}
