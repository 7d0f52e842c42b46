import assert from 'node:assert'
import { describe, it } from 'node:test'
import { Table } from '../../src/core/table.ts'
import { describeValue, ValueKind } from '../../src/core/value.ts'
import {
	asBoolean,
	asList,
	asString,
	asTable,
	bare,
	bool,
	fromPlain,
	list,
	str,
	tableEquals,
	tableFromPlain,
	tableToPlain,
	tableValue,
	toPlain,
	valueEquals,
} from '../../src/core/values.ts'

describe('core/values', () => {
	describe('constructors', () => {
		it('should write booleans as True and False bare words', () => {
			assert.deepStrictEqual(bool(true), { kind: ValueKind.Bare, value: 'True' })
			assert.deepStrictEqual(bool(false), { kind: ValueKind.Bare, value: 'False' })
		})

		it('should describe every kind', () => {
			assert.strictEqual(describeValue(str('x')), 'string')
			assert.strictEqual(describeValue(bare('x')), 'bare word')
			assert.strictEqual(describeValue(list([])), 'list')
			assert.strictEqual(describeValue(tableValue(new Table())), 'table')
		})
	})

	describe('fromPlain', () => {
		it('should map strings, numbers and booleans', () => {
			assert.deepStrictEqual(fromPlain('demo'), str('demo'))
			assert.deepStrictEqual(fromPlain(3), bare('3'))
			assert.deepStrictEqual(fromPlain(true), bare('True'))
		})

		it('should map arrays to lists and objects to tables', () => {
			const value = fromPlain([{ name: 'x', new_packages: [] }])
			assert.strictEqual(value.kind, ValueKind.List)
			const items = asList(value)
			assert.ok(items)
			const entry = asTable(items[0])
			assert.ok(entry)
			assert.deepStrictEqual(entry.keys(), ['name', 'new_packages'])
			assert.deepStrictEqual(entry.get('new_packages'), list([]))
		})
	})

	describe('toPlain', () => {
		it('should keep bare words as text by default', () => {
			assert.strictEqual(toPlain(bare('True')), 'True')
		})

		it('should convert True and False when asked', () => {
			assert.strictEqual(toPlain(bare('True'), { booleans: true }), true)
			assert.strictEqual(toPlain(bare('False'), { booleans: true }), false)
			assert.strictEqual(toPlain(bare('yes'), { booleans: true }), 'yes')
		})

		it('should reverse tableFromPlain for strings and lists', () => {
			const plain = { project: { name: 'demo', tags: ['a', 'b'] } }
			assert.deepStrictEqual(tableToPlain(tableFromPlain(plain)), plain)
		})
	})

	describe('coercions', () => {
		it('should read booleans only from True and False', () => {
			assert.strictEqual(asBoolean(bare('True')), true)
			assert.strictEqual(asBoolean(bare('False')), false)
			assert.strictEqual(asBoolean(bare('true')), undefined)
			assert.strictEqual(asBoolean(str('True')), undefined)
			assert.strictEqual(asBoolean(undefined), undefined)
		})

		it('should read text from strings and bare words', () => {
			assert.strictEqual(asString(str('a')), 'a')
			assert.strictEqual(asString(bare('b')), 'b')
			assert.strictEqual(asString(list([])), undefined)
		})

		it('should return undefined for the wrong kind', () => {
			assert.strictEqual(asList(str('a')), undefined)
			assert.strictEqual(asTable(list([])), undefined)
		})
	})

	describe('equality', () => {
		it('should tell strings from bare words', () => {
			assert.strictEqual(valueEquals(str('1'), bare('1')), false)
			assert.strictEqual(valueEquals(bare('1'), bare('1')), true)
		})

		it('should compare lists item by item', () => {
			assert.strictEqual(valueEquals(list([str('a')]), list([str('a')])), true)
			assert.strictEqual(valueEquals(list([str('a')]), list([str('a'), str('b')])), false)
		})

		it('should treat key order as significant', () => {
			const ab = new Table([
				['a', bare('1')],
				['b', bare('2')],
			])
			const ba = new Table([
				['b', bare('2')],
				['a', bare('1')],
			])
			assert.strictEqual(tableEquals(ab, ab), true)
			assert.strictEqual(tableEquals(ab, ba), false)
		})
	})
})
