/**
 * Recursive-descent parser over the character token stream.
 */

export { Cursor, ParseError } from './cursor.ts'
export { normalizeKey, type ParseResult, parse } from './parser.ts'
