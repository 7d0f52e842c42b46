/**
 * Parse context shared by the tokenizer and the parser.
 * Holds the source, the token store and the collected diagnostics.
 */

import {
	type DiagnosticArgs,
	type DiagnosticCode,
	type DiagnosticDef,
	DiagnosticSeverity,
	getDiagnostic,
	interpolateMessage,
} from './diagnostics.ts'
import { type TokenId, TokenStore } from './tokens.ts'

export { DiagnosticSeverity } from './diagnostics.ts'

/**
 * A diagnostic message with location information.
 */
export interface Diagnostic {
	/** The diagnostic definition from the catalog */
	readonly def: DiagnosticDef
	/** Interpolated message with arguments applied */
	readonly message: string
	/** Line number (1-indexed) */
	readonly line: number
	/** Column number (1-indexed) */
	readonly column: number
	/** Template arguments used for message interpolation */
	readonly args?: DiagnosticArgs
	/** Token associated with this diagnostic (if available) */
	readonly tokenId?: TokenId
}

/**
 * State for one read of one document.
 *
 * Append-only: the tokenizer fills `tokens`, the parser reads them,
 * both report into the same diagnostic list.
 */
export class DocumentContext {
	/** Original source text */
	readonly source: string

	/** Source filename for error messages */
	readonly filename: string

	/** Token storage (populated by tokenizer) */
	readonly tokens: TokenStore

	private readonly diagnostics: Diagnostic[] = []

	private errorCount = 0

	constructor(source: string, filename = '<input>') {
		this.source = source
		this.filename = filename
		this.tokens = new TokenStore()
	}

	/**
	 * Emit a diagnostic by code at a specific location.
	 */
	emit(code: DiagnosticCode, line: number, column: number, args?: DiagnosticArgs): void {
		const def = getDiagnostic(code)
		const message = interpolateMessage(def.message, args)
		this.addDiagnosticInternal({
			column,
			def,
			line,
			message,
			...(args ? { args } : {}),
		})
	}

	/**
	 * Emit a diagnostic by code at a token's location.
	 */
	emitAtToken(code: DiagnosticCode, tokenId: TokenId, args?: DiagnosticArgs): void {
		const token = this.tokens.get(tokenId)
		const def = getDiagnostic(code)
		const message = interpolateMessage(def.message, args)
		this.addDiagnosticInternal({
			column: token.column,
			def,
			line: token.line,
			message,
			tokenId,
			...(args ? { args } : {}),
		})
	}

	private addDiagnosticInternal(diagnostic: Diagnostic): void {
		this.diagnostics.push(diagnostic)
		if (diagnostic.def.severity === DiagnosticSeverity.Error) {
			this.errorCount++
		}
	}

	hasErrors(): boolean {
		return this.errorCount > 0
	}

	getErrorCount(): number {
		return this.errorCount
	}

	getDiagnostics(): readonly Diagnostic[] {
		return this.diagnostics
	}

	getErrors(): Diagnostic[] {
		return this.diagnostics.filter((d) => d.def.severity === DiagnosticSeverity.Error)
	}

	getWarnings(): Diagnostic[] {
		return this.diagnostics.filter((d) => d.def.severity === DiagnosticSeverity.Warning)
	}

	/** Source line without its terminator. */
	getSourceLine(line: number): string | undefined {
		const lines = this.source.split('\n')
		return lines[line - 1]?.replace(/\r$/, '')
	}

	private getSeverityLabel(severity: DiagnosticSeverity): string {
		const labels: Record<DiagnosticSeverity, string> = {
			[DiagnosticSeverity.Error]: 'error',
			[DiagnosticSeverity.Warning]: 'warning',
			[DiagnosticSeverity.Note]: 'note',
		}
		return labels[severity]
	}

	private buildSourceContext(
		diagnostic: Diagnostic,
		sourceLine: string
	): { emptyPrefix: string; lines: string[] } {
		const lineNumWidth = String(diagnostic.line).length
		const pad = ' '.repeat(lineNumWidth)
		const linePrefix = ` ${diagnostic.line} | `
		const emptyPrefix = ` ${pad} | `
		const pointer = `${' '.repeat(diagnostic.column - 1)}^`

		return {
			emptyPrefix,
			lines: [emptyPrefix, `${linePrefix}${sourceLine}`, `${emptyPrefix}${pointer}`],
		}
	}

	/**
	 * Format a diagnostic for display.
	 *
	 * Example:
	 * ```
	 * error[TLPARSE002]: expected equal sign after key "b", found `"`
	 *   --> app.toml:2:3
	 *    |
	 *  2 | b "c"
	 *    |   ^
	 *    |
	 *    = help: Write the entry as `b=value`. Keys cannot contain spaces.
	 * ```
	 */
	formatDiagnostic(diagnostic: Diagnostic): string {
		const { def } = diagnostic
		const severityLabel = this.getSeverityLabel(def.severity)
		const header = `${severityLabel}[${def.code}]: ${diagnostic.message}`
		const location = `  --> ${this.filename}:${diagnostic.line}:${diagnostic.column}`

		const sourceLine = this.getSourceLine(diagnostic.line)
		if (sourceLine === undefined) {
			return `${header}\n${location}`
		}

		const { emptyPrefix, lines: contextLines } = this.buildSourceContext(diagnostic, sourceLine)
		const lines = [header, location, ...contextLines]

		if (def.suggestion) {
			const suggestion = interpolateMessage(def.suggestion, diagnostic.args)
			lines.push(emptyPrefix, `   = help: ${suggestion}`)
		}

		return lines.join('\n')
	}

	formatAllDiagnostics(): string {
		return this.diagnostics.map((d) => this.formatDiagnostic(d)).join('\n\n')
	}
}
