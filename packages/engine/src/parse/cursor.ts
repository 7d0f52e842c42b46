import type { DiagnosticArgs, DiagnosticCode } from '../core/diagnostics.ts'
import { type Token, type TokenId, TokenKind, type TokenStore, tokenId } from '../core/tokens.ts'

/**
 * Thrown by the parser to abort at the first irreducible token.
 * Caught once in `parse` and turned into a diagnostic.
 */
export class ParseError extends Error {
	readonly code: DiagnosticCode
	readonly tokenId: TokenId
	readonly args: DiagnosticArgs

	constructor(code: DiagnosticCode, tokenId: TokenId, args: DiagnosticArgs = {}) {
		super(`${code} at token ${tokenId}`)
		this.name = 'ParseError'
		this.code = code
		this.tokenId = tokenId
		this.args = args
	}
}

/**
 * Read position over a token store. Never moves past the final Eof token.
 */
export class Cursor {
	private readonly tokens: TokenStore
	private readonly last: number
	private index = 0

	constructor(tokens: TokenStore) {
		this.tokens = tokens
		this.last = tokens.count() - 1
		if (this.last < 0) {
			throw new Error('Cursor needs at least an Eof token')
		}
	}

	get position(): TokenId {
		return tokenId(this.index)
	}

	peek(): Token {
		return this.tokens.get(this.position)
	}

	at(kind: TokenKind): boolean {
		return this.peek().kind === kind
	}

	/** Returns the current token and moves past it. */
	advance(): Token {
		const token = this.peek()
		if (this.index < this.last) this.index++
		return token
	}

	/** Consume a token of `kind`, or abort with `code` at the current token. */
	expect(kind: TokenKind, code: DiagnosticCode, args: DiagnosticArgs = {}): Token {
		if (!this.at(kind)) this.fail(code, args)
		return this.advance()
	}

	isWhitespace(): boolean {
		const { kind } = this.peek()
		return kind === TokenKind.Space || kind === TokenKind.Newline || kind === TokenKind.CarriageReturn
	}

	skipWhitespace(): void {
		while (this.isWhitespace()) this.advance()
	}

	fail(code: DiagnosticCode, args: DiagnosticArgs = {}): never {
		throw new ParseError(code, this.position, args)
	}

	failAt(id: TokenId, code: DiagnosticCode, args: DiagnosticArgs = {}): never {
		throw new ParseError(code, id, args)
	}
}
