import assert from 'node:assert'
import { describe, it } from 'node:test'
import { match, recognize, TomletGrammar, trace } from '../../src/grammar/index.ts'

describe('grammar', () => {
	it('should compile', () => {
		assert.ok(TomletGrammar)
		assert.strictEqual(TomletGrammar.name, 'Tomlet')
	})

	describe('accepts', () => {
		const accepted: Array<[string, string]> = [
			['empty input', ''],
			['whitespace only', ' \n\t\n'],
			['a minimal document', '[a]\nb="c"\n'],
			['several sections', '[a]\nx=1\n\n[b]\ny=two\n'],
			['nested values', '[a]\nb=[{x="1"}, "y", [z]]\n'],
			['empty containers', '[a]\nb=[]\nc={}\n'],
			['comment lines', '# top\n[a]\n# inner\nb=1\n'],
			['single quotes around double quotes', `[a]\nb='say "hi"'\n`],
			['a # inside a string', '[a]\nb="#1"\n'],
			['CRLF line endings', '[a]\r\nb=1\r\n'],
			['a value on the next line', '[a]\nb=\n[c]\n'],
		]

		for (const [label, source] of accepted) {
			it(`should accept ${label}`, () => {
				assert.strictEqual(recognize(source), true)
			})
		}
	})

	describe('rejects', () => {
		const rejected: Array<[string, string]> = [
			['a key before any section', 'b=1\n'],
			['a missing equal sign', '[a]\nb "c"\n'],
			['a trailing comma in a list', '[a]\nb=[1,]\n'],
			['a trailing comma in a table', '[a]\nb={x=1,}\n'],
			['an unterminated string', '[a]\nb="c\n'],
			['a comment after a value', '[a]\nb=1 # note\n'],
			['an indented comment', '[a]\n  # note\n'],
			['spaces inside a section header', '[a b]\n'],
			['an empty section name', '[]\n'],
			['a missing value', '[a]\nb=\n'],
		]

		for (const [label, source] of rejected) {
			it(`should reject ${label}`, () => {
				assert.strictEqual(recognize(source), false)
			})
		}
	})

	describe('match', () => {
		it('should explain failures', () => {
			const result = match('b=1\n')
			assert.strictEqual(result.failed(), true)
			assert.match(result.message ?? '', /Line 1, col 1/)
		})
	})

	describe('trace', () => {
		it('should render a trace', () => {
			assert.strictEqual(typeof trace('[a]\n'), 'string')
			assert.ok(trace('[a]\n').length > 0)
		})
	})
})
