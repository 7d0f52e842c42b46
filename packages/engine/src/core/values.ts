/**
 * Value constructors, conversions to and from plain data, and coercions
 * consumers use to read typed settings out of a document.
 */

import { Table } from './table.ts'
import type { BareValue, ListValue, StrValue, TableValue, Value } from './value.ts'
import { ValueKind } from './value.ts'

export function str(value: string): StrValue {
	return { kind: ValueKind.Str, value }
}

export function bare(value: string): BareValue {
	return { kind: ValueKind.Bare, value }
}

/** Booleans are the bare words `True` and `False`. */
export function bool(value: boolean): BareValue {
	return bare(value ? 'True' : 'False')
}

export function list(items: readonly Value[]): ListValue {
	return { kind: ValueKind.List, items }
}

export function tableValue(table: Table): TableValue {
	return { kind: ValueKind.Table, table }
}

// =============================================================================
// PLAIN DATA
// =============================================================================

export type PlainValue = string | number | boolean | PlainValue[] | PlainTable

export interface PlainTable {
	[key: string]: PlainValue
}

/**
 * Strings become quoted strings; numbers and booleans become bare words.
 */
export function fromPlain(value: PlainValue): Value {
	if (typeof value === 'string') return str(value)
	if (typeof value === 'boolean') return bool(value)
	if (typeof value === 'number') return bare(String(value))
	if (Array.isArray(value)) return list(value.map(fromPlain))
	return tableValue(tableFromPlain(value))
}

export function tableFromPlain(plain: PlainTable): Table {
	return new Table(Object.entries(plain).map(([key, value]) => [key, fromPlain(value)] as const))
}

export interface ToPlainOptions {
	/** Convert the bare words `True`/`False` to booleans */
	booleans?: boolean
}

export function toPlain(value: Value, options: ToPlainOptions = {}): PlainValue {
	switch (value.kind) {
		case ValueKind.Str:
			return value.value
		case ValueKind.Bare:
			return options.booleans ? (asBoolean(value) ?? value.value) : value.value
		case ValueKind.List:
			return value.items.map((item) => toPlain(item, options))
		case ValueKind.Table:
			return tableToPlain(value.table, options)
		default: {
			const unreachable: never = value
			return unreachable
		}
	}
}

export function tableToPlain(table: Table, options: ToPlainOptions = {}): PlainTable {
	return Object.fromEntries(table.entries().map(([key, value]) => [key, toPlain(value, options)]))
}

// =============================================================================
// COERCIONS
// =============================================================================

/** `True`/`False` bare words; anything else is undefined. */
export function asBoolean(value: Value | undefined): boolean | undefined {
	if (value?.kind !== ValueKind.Bare) return undefined
	if (value.value === 'True') return true
	if (value.value === 'False') return false
	return undefined
}

/** Text of a string or bare word. */
export function asString(value: Value | undefined): string | undefined {
	if (value?.kind === ValueKind.Str || value?.kind === ValueKind.Bare) return value.value
	return undefined
}

export function asList(value: Value | undefined): readonly Value[] | undefined {
	return value?.kind === ValueKind.List ? value.items : undefined
}

export function asTable(value: Value | undefined): Table | undefined {
	return value?.kind === ValueKind.Table ? value.table : undefined
}

// =============================================================================
// EQUALITY
// =============================================================================

/**
 * Structural equality. Key order is part of a table's value.
 */
export function valueEquals(a: Value, b: Value): boolean {
	switch (a.kind) {
		case ValueKind.Str:
		case ValueKind.Bare:
			return (
				(b.kind === ValueKind.Str || b.kind === ValueKind.Bare) &&
				b.kind === a.kind &&
				b.value === a.value
			)
		case ValueKind.List:
			return (
				b.kind === ValueKind.List &&
				b.items.length === a.items.length &&
				a.items.every((item, i) => {
					const other = b.items[i]
					return other !== undefined && valueEquals(item, other)
				})
			)
		case ValueKind.Table:
			return b.kind === ValueKind.Table && tableEquals(a.table, b.table)
		default: {
			const unreachable: never = a
			return unreachable
		}
	}
}

export function tableEquals(a: Table, b: Table): boolean {
	if (a.size !== b.size) return false
	const left = a.entries()
	const right = b.entries()
	return left.every((entry, i) => {
		const other = right[i]
		return other !== undefined && other[0] === entry[0] && valueEquals(entry[1], other[1])
	})
}
