import { chmodSync, renameSync, rmSync, statSync, writeFileSync } from 'node:fs'
import { basename, dirname, join } from 'node:path'
import { TLWRITE001, TLWRITE002, TLWRITE003, TLWRITE004, TLWRITE005 } from '@tomlet/diagnostics'
import { DocumentTypeError } from '../core/errors.ts'
import type { Document, Table } from '../core/table.ts'
import { TokenKind } from '../core/tokens.ts'
import { describeValue, type Value, ValueKind } from '../core/value.ts'
import { classifyCharacter } from '../lex/tokenizer.ts'

/** True if the text reads back as a single bare run. */
export function isBareWord(text: string): boolean {
	if (text.length === 0) return false
	for (const char of text) {
		if (classifyCharacter(char) !== TokenKind.Char) return false
	}
	return true
}

function childPath(path: string, key: string): string {
	return path === '' ? key : `${path}.${key}`
}

function writeKey(key: string, path: string): string {
	if (!isBareWord(key)) {
		throw new DocumentTypeError(TLWRITE005, path, { key })
	}
	return key
}

/** Double quotes unless the text contains one; there are no escapes. */
function writeString(text: string, path: string): string {
	if (text.includes('\n') || text.includes('\r')) {
		throw new DocumentTypeError(TLWRITE003, path)
	}
	const hasDouble = text.includes('"')
	if (hasDouble && text.includes("'")) {
		throw new DocumentTypeError(TLWRITE002, path)
	}
	return hasDouble ? `'${text}'` : `"${text}"`
}

function writeBare(text: string, path: string): string {
	if (!isBareWord(text)) {
		throw new DocumentTypeError(TLWRITE004, path, { value: text })
	}
	return text
}

function writeList(items: readonly Value[], path: string): string {
	const parts = items.map((item, i) => writeValue(item, `${path}[${i}]`))
	return `[${parts.join(', ')}]`
}

function writeInlineTable(table: Table, path: string): string {
	const parts = table.entries().map(([key, value]) => {
		const entryPath = childPath(path, key)
		return `${writeKey(key, entryPath)}=${writeValue(value, entryPath)}`
	})
	return `{${parts.join(', ')}}`
}

function writeValue(value: Value, path: string): string {
	switch (value.kind) {
		case ValueKind.Str:
			return writeString(value.value, path)
		case ValueKind.Bare:
			return writeBare(value.value, path)
		case ValueKind.List:
			return writeList(value.items, path)
		case ValueKind.Table:
			return writeInlineTable(value.table, path)
		default: {
			const unreachable: never = value
			return unreachable
		}
	}
}

/**
 * Render a single value the way it appears after `key=`.
 *
 * @throws {DocumentTypeError} If the value cannot be written
 */
export function serializeValue(value: Value, path = ''): string {
	return writeValue(value, path)
}

function writeSection(name: string, value: Value): string {
	if (value.kind !== ValueKind.Table) {
		throw new DocumentTypeError(TLWRITE001, name, { found: describeValue(value), key: name })
	}
	const lines = [`[${writeKey(name, name)}]`]
	for (const [key, entry] of value.table) {
		const entryPath = childPath(name, key)
		lines.push(`${writeKey(key, entryPath)}=${writeValue(entry, entryPath)}`)
	}
	return `${lines.join('\n')}\n`
}

/**
 * Render a document as text. Every top-level entry becomes a `[section]`;
 * sections are separated by a blank line.
 *
 * @throws {DocumentTypeError} If a value cannot be written in the file grammar
 */
export function serialize(document: Document): string {
	return document
		.entries()
		.map(([name, value]) => writeSection(name, value))
		.join('\n')
}

/**
 * Serialize and write a document. The text is rendered in memory first, then
 * written to a temporary file beside the target and renamed over it, so a
 * failure never leaves a partial file at `path`. An existing target keeps its
 * permission bits.
 *
 * @throws {DocumentTypeError} Before touching the disk, if the document cannot be written
 * @throws The file system error unchanged if writing or renaming fails
 */
export function writeDocument(path: string, document: Document): void {
	const text = serialize(document)
	const temporary = join(dirname(path), `.${basename(path)}.${process.pid}.tmp`)
	try {
		writeFileSync(temporary, text, 'utf-8')
		const existing = statSync(path, { throwIfNoEntry: false })
		if (existing !== undefined) {
			chmodSync(temporary, existing.mode & 0o7777)
		}
		renameSync(temporary, path)
	} catch (error: unknown) {
		rmSync(temporary, { force: true })
		throw error
	}
}
