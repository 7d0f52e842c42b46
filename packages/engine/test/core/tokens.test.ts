import assert from 'node:assert'
import { describe, it } from 'node:test'
import { describeToken, type Token, TokenKind, TokenStore, tokenId } from '../../src/core/tokens.ts'

function token(kind: TokenKind, text: string): Token {
	return { column: 1, kind, line: 1, text }
}

describe('core/tokens', () => {
	describe('TokenKind', () => {
		it('should keep Eof at 255', () => {
			assert.strictEqual(TokenKind.Eof, 255)
		})

		it('should give every kind a distinct value', () => {
			const values = Object.values(TokenKind)
			assert.strictEqual(new Set(values).size, values.length)
		})
	})

	describe('TokenStore', () => {
		it('should start empty', () => {
			const store = new TokenStore()
			assert.strictEqual(store.count(), 0)
		})

		it('should add tokens and return sequential IDs', () => {
			const store = new TokenStore()
			const id1 = store.add(token(TokenKind.Char, 'a'))
			const id2 = store.add(token(TokenKind.Equal, '='))

			assert.strictEqual(id1, 0)
			assert.strictEqual(id2, 1)
			assert.strictEqual(store.count(), 2)
		})

		it('should retrieve tokens by ID', () => {
			const store = new TokenStore()
			const id = store.add({ column: 4, kind: TokenKind.Quote, line: 2, text: "'" })
			const retrieved = store.get(id)

			assert.strictEqual(retrieved.kind, TokenKind.Quote)
			assert.strictEqual(retrieved.line, 2)
			assert.strictEqual(retrieved.column, 4)
			assert.strictEqual(retrieved.text, "'")
		})

		it('should throw on invalid ID', () => {
			const store = new TokenStore()
			assert.throws(() => store.get(tokenId(3)), /Invalid TokenId: 3/)
		})

		it('should validate IDs', () => {
			const store = new TokenStore()
			store.add(token(TokenKind.Eof, ''))
			assert.strictEqual(store.isValid(tokenId(0)), true)
			assert.strictEqual(store.isValid(tokenId(1)), false)
		})

		it('should iterate in insertion order', () => {
			const store = new TokenStore()
			store.add(token(TokenKind.Char, 'a'))
			store.add(token(TokenKind.Char, 'b'))
			const texts = [...store].map(([, t]) => t.text)
			assert.deepStrictEqual(texts, ['a', 'b'])
		})

		it('should slice a half-open range', () => {
			const store = new TokenStore()
			store.add(token(TokenKind.Char, 'a'))
			store.add(token(TokenKind.Char, 'b'))
			store.add(token(TokenKind.Char, 'c'))
			const slice = store.slice(tokenId(1), tokenId(3))
			assert.deepStrictEqual(
				slice.map((t) => t.text),
				['b', 'c']
			)
		})
	})

	describe('describeToken', () => {
		it('should name end of file and line endings', () => {
			assert.strictEqual(describeToken(token(TokenKind.Eof, '')), 'end of file')
			assert.strictEqual(describeToken(token(TokenKind.Newline, '\n')), 'end of line')
			assert.strictEqual(describeToken(token(TokenKind.CarriageReturn, '\r')), 'carriage return')
		})

		it('should tell spaces from tabs', () => {
			assert.strictEqual(describeToken(token(TokenKind.Space, ' ')), 'space')
			assert.strictEqual(describeToken(token(TokenKind.Space, '\t')), 'tab')
		})

		it('should quote visible characters in backticks', () => {
			assert.strictEqual(describeToken(token(TokenKind.Equal, '=')), '`=`')
			assert.strictEqual(describeToken(token(TokenKind.Char, 'x')), '`x`')
			assert.strictEqual(describeToken(token(TokenKind.Quote, '"')), '`"`')
		})
	})
})
