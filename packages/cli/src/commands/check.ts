import { readFile } from 'node:fs/promises'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import { type Analysis, analyze, recognize } from '@tomlet/engine'
import { formatGrammarMismatch, formatReadError } from '../utils.ts'

export default class CheckCommand extends BaseCommand {
	static override commandName = 'check'
	static override description = 'Validate a file and report syntax errors and warnings'

	@args.string({ description: 'File to check' })
	declare file: string

	@flags.boolean({ description: 'Also match the file against the reference grammar' })
	declare grammar: boolean

	private async readSourceFile(): Promise<string | null> {
		try {
			return await readFile(this.file, 'utf-8')
		} catch (error: unknown) {
			this.logger.error(formatReadError(this.file, error))
			this.exitCode = 1
			return null
		}
	}

	private report(analysis: Analysis): void {
		for (const diagnostic of analysis.context.getDiagnostics()) {
			this.logger.logError(analysis.context.formatDiagnostic(diagnostic))
		}
		if (!analysis.result.succeeded) {
			this.exitCode = 1
		}
	}

	private compareWithGrammar(source: string, parserAccepts: boolean): boolean {
		if (recognize(source) === parserAccepts) return true
		this.logger.error(formatGrammarMismatch(parserAccepts))
		this.exitCode = 1
		return false
	}

	override async run(): Promise<void> {
		const source = await this.readSourceFile()
		if (source === null) return

		const analysis = analyze(source, { filename: this.file })
		this.report(analysis)

		if (this.grammar && !this.compareWithGrammar(source, analysis.result.succeeded)) return

		if (analysis.result.succeeded) {
			const warnings = analysis.context.getWarnings().length
			this.logger.log(warnings === 0 ? `${this.file}: ok` : `${this.file}: ok (${warnings} warning(s))`)
		}
	}
}
