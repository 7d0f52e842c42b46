import type { Table } from './table.ts'

/** Value kinds - string discriminant. */
export const ValueKind = {
	Bare: 'bare',
	List: 'list',
	Str: 'str',
	Table: 'table',
} as const

export type ValueKind = (typeof ValueKind)[keyof typeof ValueKind]

/** A quoted string. */
export interface StrValue {
	readonly kind: typeof ValueKind.Str
	readonly value: string
}

/**
 * An unquoted word. Numbers and `True`/`False` are bare words too;
 * interpreting them is left to the consumer.
 */
export interface BareValue {
	readonly kind: typeof ValueKind.Bare
	readonly value: string
}

export interface ListValue {
	readonly kind: typeof ValueKind.List
	readonly items: readonly Value[]
}

/** A nested table: a `[section]` at the top level, an inline `{...}` table below it. */
export interface TableValue {
	readonly kind: typeof ValueKind.Table
	readonly table: Table
}

export type Value = StrValue | BareValue | ListValue | TableValue

/**
 * Human-readable name of a value's kind for diagnostics.
 */
export function describeValue(value: Value): string {
	switch (value.kind) {
		case ValueKind.Str:
			return 'string'
		case ValueKind.Bare:
			return 'bare word'
		case ValueKind.List:
			return 'list'
		case ValueKind.Table:
			return 'table'
		default: {
			const unreachable: never = value
			return String(unreachable)
		}
	}
}

export function isTableValue(value: Value | undefined): value is TableValue {
	return value !== undefined && value.kind === ValueKind.Table
}
