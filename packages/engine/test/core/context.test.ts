import assert from 'node:assert'
import { describe, it } from 'node:test'
import { DocumentContext } from '../../src/core/context.ts'
import { DiagnosticSeverity } from '../../src/core/diagnostics.ts'
import { TokenKind } from '../../src/core/tokens.ts'

describe('core/context', () => {
	describe('DocumentContext', () => {
		it('should default the filename', () => {
			const ctx = new DocumentContext('')
			assert.strictEqual(ctx.filename, '<input>')
		})

		it('should collect diagnostics by severity', () => {
			const ctx = new DocumentContext('[a]\n')
			ctx.emit('TLPARSE051', 2, 1, { key: 'b' })
			assert.strictEqual(ctx.hasErrors(), false)
			ctx.emit('TLPARSE001', 1, 1, { found: 'end of file' })

			assert.strictEqual(ctx.hasErrors(), true)
			assert.strictEqual(ctx.getErrorCount(), 1)
			assert.strictEqual(ctx.getDiagnostics().length, 2)
			assert.strictEqual(ctx.getWarnings()[0]?.def.severity, DiagnosticSeverity.Warning)
			assert.strictEqual(ctx.getErrors()[0]?.message, 'unexpected end of file')
		})

		it('should place token diagnostics at the token', () => {
			const ctx = new DocumentContext('a')
			const id = ctx.tokens.add({ column: 7, kind: TokenKind.Char, line: 3, text: 'x' })
			ctx.emitAtToken('TLPARSE008', id, { key: 'x' })

			const diagnostic = ctx.getDiagnostics()[0]
			assert.ok(diagnostic)
			assert.strictEqual(diagnostic.line, 3)
			assert.strictEqual(diagnostic.column, 7)
			assert.strictEqual(diagnostic.tokenId, id)
			assert.strictEqual(diagnostic.message, 'key "x" is outside of any section')
		})

		it('should strip carriage returns from source lines', () => {
			const ctx = new DocumentContext('[a]\r\nb=1\r\n')
			assert.strictEqual(ctx.getSourceLine(1), '[a]')
			assert.strictEqual(ctx.getSourceLine(2), 'b=1')
			assert.strictEqual(ctx.getSourceLine(9), undefined)
		})
	})

	describe('formatDiagnostic', () => {
		it('should render source context and help', () => {
			const ctx = new DocumentContext('[a]\nb "c"\n', 'app.toml')
			ctx.emit('TLPARSE002', 2, 3, { found: '`"`', key: 'b' })
			const diagnostic = ctx.getDiagnostics()[0]
			assert.ok(diagnostic)

			assert.strictEqual(
				ctx.formatDiagnostic(diagnostic),
				[
					'error[TLPARSE002]: expected equal sign after key "b", found `"`',
					'  --> app.toml:2:3',
					'   | ',
					' 2 | b "c"',
					'   |   ^',
					'   | ',
					'   = help: Write the entry as `b=value`. Keys cannot contain spaces.',
				].join('\n')
			)
		})

		it('should label warnings', () => {
			const ctx = new DocumentContext('[a]\nb=1\nb=2\n')
			ctx.emit('TLPARSE051', 3, 1, { key: 'b' })
			const diagnostic = ctx.getDiagnostics()[0]
			assert.ok(diagnostic)
			const firstLine = ctx.formatDiagnostic(diagnostic).split('\n')[0]
			assert.strictEqual(firstLine, 'warning[TLPARSE051]: duplicate key "b"')
		})

		it('should omit source context past the end of the text', () => {
			const ctx = new DocumentContext('[a]\n')
			ctx.emit('TLPARSE003', 5, 1, { found: 'end of file' })
			const diagnostic = ctx.getDiagnostics()[0]
			assert.ok(diagnostic)
			assert.strictEqual(
				ctx.formatDiagnostic(diagnostic),
				'error[TLPARSE003]: expected right bracket, found end of file\n  --> <input>:5:1'
			)
		})

		it('should widen the gutter for long line numbers', () => {
			const source = `${'\n'.repeat(11)}x`
			const ctx = new DocumentContext(source)
			ctx.emit('TLPARSE008', 12, 1, { key: 'x' })
			const diagnostic = ctx.getDiagnostics()[0]
			assert.ok(diagnostic)
			const lines = ctx.formatDiagnostic(diagnostic).split('\n')
			assert.strictEqual(lines[2], '    | ')
			assert.strictEqual(lines[3], ' 12 | x')
			assert.strictEqual(lines[4], '    | ^')
		})
	})
})
