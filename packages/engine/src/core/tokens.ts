/**
 * Token storage using dense arrays with integer IDs.
 * One token per source character, so the store is append-only and never sparse.
 */

/** Token kinds - small integer discriminant. */
export const TokenKind = {
	// Whitespace (10-19)
	CarriageReturn: 11,

	// Text (100)
	Char: 100,

	// Punctuation (0-9)
	Comma: 6,
	Comment: 7,

	// Special (255)
	Eof: 255,
	Equal: 0,
	LBrace: 3,
	LBracket: 1,
	Newline: 10,
	Quote: 5,
	RBrace: 4,
	RBracket: 2,
	Space: 12,
} as const

export type TokenKind = (typeof TokenKind)[keyof typeof TokenKind]

export type TokenId = number & { readonly __brand: 'TokenId' }

export function tokenId(n: number): TokenId {
	return n as TokenId
}

/**
 * A single token.
 * `text` is the source character the token was made from; empty for Eof.
 */
export interface Token {
	readonly kind: TokenKind
	readonly line: number
	readonly column: number
	readonly text: string
}

/**
 * Human-readable name of a token for diagnostics.
 */
export function describeToken(token: Token): string {
	switch (token.kind) {
		case TokenKind.Eof:
			return 'end of file'
		case TokenKind.Newline:
			return 'end of line'
		case TokenKind.CarriageReturn:
			return 'carriage return'
		case TokenKind.Space:
			return token.text === '\t' ? 'tab' : 'space'
		case TokenKind.Equal:
		case TokenKind.LBracket:
		case TokenKind.RBracket:
		case TokenKind.LBrace:
		case TokenKind.RBrace:
		case TokenKind.Quote:
		case TokenKind.Comma:
		case TokenKind.Comment:
		case TokenKind.Char:
			return `\`${token.text}\``
		default: {
			const unreachable: never = token.kind
			return String(unreachable)
		}
	}
}

/**
 * Dense array storage for tokens.
 * Append-only during tokenization phase.
 */
export class TokenStore {
	private readonly tokens: Token[] = []

	add(token: Token): TokenId {
		const id = tokenId(this.tokens.length)
		this.tokens.push(token)
		return id
	}

	get(id: TokenId): Token {
		const token = this.tokens[id]
		if (token === undefined) {
			throw new Error(`Invalid TokenId: ${id}`)
		}
		return token
	}

	count(): number {
		return this.tokens.length
	}

	isValid(id: TokenId): boolean {
		return id >= 0 && id < this.tokens.length
	}

	*[Symbol.iterator](): Generator<[TokenId, Token]> {
		for (let i = 0; i < this.tokens.length; i++) {
			const token = this.tokens[i]
			if (token !== undefined) yield [tokenId(i), token]
		}
	}

	/** Returns tokens in range [start, end). */
	slice(start: TokenId, end: TokenId): Token[] {
		return this.tokens.slice(start, end)
	}
}
