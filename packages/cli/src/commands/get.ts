import { readFile } from 'node:fs/promises'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import { type Document, load } from '@tomlet/engine'
import { formatDocumentError, formatMissingValueError, formatReadError, renderValue } from '../utils.ts'

export default class GetCommand extends BaseCommand {
	static override commandName = 'get'
	static override description = 'Print the value stored at a dotted path'

	@args.string({ description: 'File to read' })
	declare file: string

	@args.string({ description: 'Dotted path such as project.name' })
	declare path: string

	@flags.boolean({ description: 'Print the value as JSON' })
	declare json: boolean

	private async readDocumentFile(): Promise<Document | null> {
		let source: string
		try {
			source = await readFile(this.file, 'utf-8')
		} catch (error: unknown) {
			this.logger.error(formatReadError(this.file, error))
			this.exitCode = 1
			return null
		}
		try {
			return load(source, { filename: this.file })
		} catch (error: unknown) {
			this.logger.logError(formatDocumentError(error))
			this.exitCode = 1
			return null
		}
	}

	override async run(): Promise<void> {
		const document = await this.readDocumentFile()
		if (document === null) return

		try {
			const value = document.getPath(this.path)
			if (value === undefined) {
				this.logger.error(formatMissingValueError(this.path))
				this.exitCode = 1
				return
			}
			this.logger.log(renderValue(value, this.path, this.json))
		} catch (error: unknown) {
			this.logger.error(formatDocumentError(error))
			this.exitCode = 1
		}
	}
}
