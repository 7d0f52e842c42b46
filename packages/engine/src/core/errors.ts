import type { Diagnostic, DocumentContext } from './context.ts'
import { type DiagnosticArgs, type DiagnosticDef, interpolateMessage } from './diagnostics.ts'

/**
 * Base class for every error the engine raises on its own.
 * I/O errors from the file system are not wrapped.
 */
export class DocumentError extends Error {
	readonly code: string

	constructor(message: string, code: string) {
		super(message)
		this.name = 'DocumentError'
		this.code = code
	}
}

/**
 * The source could not be reduced by the grammar.
 * `message` is the formatted first error; all diagnostics (warnings included) are kept.
 */
export class DocumentSyntaxError extends DocumentError {
	readonly diagnostics: readonly Diagnostic[]
	readonly line: number
	readonly column: number

	constructor(context: DocumentContext) {
		const error = context.getErrors()[0]
		const message = error ? context.formatDiagnostic(error) : 'parse failed'
		super(message, error?.def.code ?? 'TLPARSE001')
		this.name = 'DocumentSyntaxError'
		this.diagnostics = context.getDiagnostics()
		this.line = error?.line ?? 0
		this.column = error?.column ?? 0
	}
}

/**
 * A value cannot be written where the format requires something else.
 */
export class DocumentTypeError extends DocumentError {
	/** Dotted location of the offending value */
	readonly path: string

	constructor(def: DiagnosticDef, path: string, args: DiagnosticArgs = {}) {
		super(interpolateMessage(def.message, { path, ...args }), def.code)
		this.name = 'DocumentTypeError'
		this.path = path
	}
}

/**
 * A path lookup ran into a value that cannot be descended into.
 */
export class DocumentPathError extends DocumentError {
	readonly path: string

	constructor(def: DiagnosticDef, path: string, args: DiagnosticArgs = {}) {
		super(interpolateMessage(def.message, { path, ...args }), def.code)
		this.name = 'DocumentPathError'
		this.path = path
	}
}
