/**
 * Ordered string-keyed map of values.
 *
 * A Document is a Table whose entries are all tables (one per `[section]`);
 * inside a section the same type holds `key=value` pairs and inline tables.
 */

import { TLDOC001, TLDOC002 } from '@tomlet/diagnostics'
import { DocumentPathError } from './errors.ts'
import { describeValue, isTableValue, type Value, ValueKind } from './value.ts'

/** A dotted string (`project.dependencies`) or an array of segments. */
export type Path = string | readonly string[]

/**
 * Split a path into segments. Array paths are taken literally,
 * so keys containing `.` are reachable through them.
 */
export function splitPath(path: Path): string[] {
	const segments = typeof path === 'string' ? (path === '' ? [] : path.split('.')) : [...path]
	if (segments.length === 0) {
		throw new DocumentPathError(TLDOC002, '')
	}
	return segments
}

export class Table implements Iterable<[string, Value]> {
	private readonly values = new Map<string, Value>()

	constructor(entries: Iterable<readonly [string, Value]> = []) {
		for (const [key, value] of entries) {
			this.values.set(key, value)
		}
	}

	get size(): number {
		return this.values.size
	}

	get(key: string): Value | undefined {
		return this.values.get(key)
	}

	has(key: string): boolean {
		return this.values.has(key)
	}

	/** Replacing an existing key keeps its original position. */
	set(key: string, value: Value): this {
		this.values.set(key, value)
		return this
	}

	delete(key: string): boolean {
		return this.values.delete(key)
	}

	keys(): string[] {
		return [...this.values.keys()]
	}

	entries(): Array<[string, Value]> {
		return [...this.values.entries()]
	}

	[Symbol.iterator](): Iterator<[string, Value]> {
		return this.values.entries()
	}

	/**
	 * Look up a value without touching the table.
	 * Returns undefined if a segment is missing or an intermediate value is not a table.
	 */
	getPath(path: Path): Value | undefined {
		const segments = splitPath(path)
		let current: Table = this
		for (let i = 0; i < segments.length - 1; i++) {
			const next = current.get(segments[i] ?? '')
			if (!isTableValue(next)) return undefined
			current = next.table
		}
		return current.get(segments[segments.length - 1] ?? '')
	}

	/** Non-mutating; the table at `path`, or undefined. */
	getTable(path: Path): Table | undefined {
		const value = this.getPath(path)
		return isTableValue(value) ? value.table : undefined
	}

	/**
	 * Return the table at `path`, creating and inserting an empty table for
	 * every missing segment. Use only when about to populate the result.
	 *
	 * @throws {DocumentPathError} If a segment holds a value that is not a table
	 */
	ensureTable(path: Path): Table {
		const segments = splitPath(path)
		let current: Table = this
		for (let i = 0; i < segments.length; i++) {
			const key = segments[i] ?? ''
			const existing = current.get(key)
			if (existing === undefined) {
				const created = new Table()
				current.set(key, { kind: ValueKind.Table, table: created })
				current = created
				continue
			}
			if (!isTableValue(existing)) {
				throw new DocumentPathError(TLDOC001, segments.slice(0, i + 1).join('.'), {
					found: describeValue(existing),
				})
			}
			current = existing.table
		}
		return current
	}

	/** Set a value, creating the parent tables as needed. */
	setPath(path: Path, value: Value): void {
		const segments = splitPath(path)
		const key = segments[segments.length - 1] ?? ''
		const parent = segments.length > 1 ? this.ensureTable(segments.slice(0, -1)) : this
		parent.set(key, value)
	}
}

/** A top-level table of sections. */
export type Document = Table
