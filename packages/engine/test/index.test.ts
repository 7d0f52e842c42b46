import assert from 'node:assert'
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { after, before, describe, it } from 'node:test'
import {
	analyze,
	DocumentSyntaxError,
	dump,
	load,
	readDocument,
	str,
	tableFromPlain,
	tableToPlain,
	writeDocument,
} from '../src/index.ts'

describe('engine api', () => {
	describe('load', () => {
		it('should parse text into a document', () => {
			const doc = load('[project]\nname="demo"\nversion=0.1.0\n')
			assert.deepStrictEqual(tableToPlain(doc), { project: { name: 'demo', version: '0.1.0' } })
			assert.deepStrictEqual(doc.getPath('project.name'), str('demo'))
		})

		it('should throw a DocumentSyntaxError with the formatted diagnostic', () => {
			assert.throws(
				() => load('[a]\nb "c"\n', { filename: 'app.toml' }),
				(error: unknown) => {
					assert.ok(error instanceof DocumentSyntaxError)
					assert.strictEqual(error.code, 'TLPARSE002')
					assert.strictEqual(error.line, 2)
					assert.strictEqual(error.column, 3)
					assert.strictEqual(
						error.message.split('\n').slice(0, 2).join('\n'),
						'error[TLPARSE002]: expected equal sign after key "b", found `"`\n  --> app.toml:2:3'
					)
					return true
				}
			)
		})

		it('should keep warnings on the error', () => {
			assert.throws(
				() => load('[a]\nb=1\nb=2\n[c\n'),
				(error: unknown) => {
					assert.ok(error instanceof DocumentSyntaxError)
					assert.deepStrictEqual(
						error.diagnostics.map((d) => d.def.code),
						['TLPARSE051', 'TLPARSE003']
					)
					return true
				}
			)
		})
	})

	describe('analyze', () => {
		it('should return warnings alongside a document', () => {
			const { context, result } = analyze('[a]\nb=1\nb=2\n')
			assert.strictEqual(result.succeeded, true)
			assert.strictEqual(context.getWarnings().length, 1)
		})

		it('should not throw on bad input', () => {
			const { context, result } = analyze('=')
			assert.strictEqual(result.succeeded, false)
			assert.strictEqual(context.getErrors()[0]?.def.code, 'TLPARSE001')
		})
	})

	describe('dump', () => {
		it('should render documents', () => {
			assert.strictEqual(dump(tableFromPlain({ a: { b: 'c' } })), '[a]\nb="c"\n')
		})

		it('should read back what it writes', () => {
			const doc = tableFromPlain({ project: { authors: [{ email: 'dev@example.com', name: 'Dev' }] } })
			assert.deepStrictEqual(tableToPlain(load(dump(doc))), tableToPlain(doc))
		})
	})

	describe('files', () => {
		let dir = ''

		before(() => {
			dir = mkdtempSync(join(tmpdir(), 'tomlet-api-'))
		})

		after(() => {
			rmSync(dir, { force: true, recursive: true })
		})

		it('should read a written document', () => {
			const path = join(dir, 'roundtrip.toml')
			writeDocument(path, tableFromPlain({ tools: { env_name: 'env' } }))
			assert.deepStrictEqual(tableToPlain(readDocument(path)), { tools: { env_name: 'env' } })
		})

		it('should name the file in syntax errors', () => {
			const path = join(dir, 'broken.toml')
			writeFileSync(path, 'key=1\n', 'utf-8')
			assert.throws(() => readDocument(path), {
				code: 'TLPARSE008',
				message: new RegExp(`--> ${path.replaceAll(/[.*+?^${}()|[\]\\]/g, '\\$&')}:1:1`),
			})
		})

		it('should propagate a missing file error', () => {
			assert.throws(() => readDocument(join(dir, 'missing.toml')), { code: 'ENOENT' })
		})
	})
})
