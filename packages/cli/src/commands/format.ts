import { readFile } from 'node:fs/promises'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import { countCommentLines, type Document, dump, load, writeDocument } from '@tomlet/engine'
import {
	formatCommentLossError,
	formatDocumentError,
	formatReadError,
	formatWriteError,
	withoutTrailingNewline,
} from '../utils.ts'

export default class FormatCommand extends BaseCommand {
	static override commandName = 'format'
	static override description = 'Rewrite a file in canonical form'

	@args.string({ description: 'File to format' })
	declare file: string

	@flags.boolean({ description: 'Print the result instead of rewriting the file' })
	declare stdout: boolean

	private async readSourceFile(): Promise<string | null> {
		try {
			return await readFile(this.file, 'utf-8')
		} catch (error: unknown) {
			this.logger.error(formatReadError(this.file, error))
			this.exitCode = 1
			return null
		}
	}

	private parseSource(source: string): Document | null {
		try {
			return load(source, { filename: this.file })
		} catch (error: unknown) {
			this.logger.logError(formatDocumentError(error))
			this.exitCode = 1
			return null
		}
	}

	/** Values the parser accepts can still be unwritable, such as a string spanning lines. */
	private render(document: Document): string | null {
		try {
			return dump(document)
		} catch (error: unknown) {
			this.logger.logError(formatDocumentError(error))
			this.exitCode = 1
			return null
		}
	}

	private keepsComments(source: string): boolean {
		const comments = countCommentLines(source)
		if (comments === 0) return true
		this.logger.error(formatCommentLossError(this.file, comments))
		this.exitCode = 1
		return false
	}

	private writeOutput(document: Document): void {
		try {
			writeDocument(this.file, document)
			this.logger.log(`${this.file}: formatted`)
		} catch (error: unknown) {
			this.logger.error(formatWriteError(error))
			this.exitCode = 1
		}
	}

	override async run(): Promise<void> {
		const source = await this.readSourceFile()
		if (source === null) return

		const document = this.parseSource(source)
		if (document === null) return

		const text = this.render(document)
		if (text === null) return

		if (this.stdout) {
			this.logger.log(withoutTrailingNewline(text))
			return
		}

		if (!this.keepsComments(source)) return

		if (text === source) {
			this.logger.log(`${this.file}: unchanged`)
			return
		}
		this.writeOutput(document)
	}
}
