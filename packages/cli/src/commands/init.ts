import { args, BaseCommand, flags } from '@adonisjs/ace'
import { createManifest, defaultSettings, loadConfiguration, type Settings } from '@tomlet/manifest'
import { formatDocumentError, resolveManifestPath } from '../utils.ts'

export default class InitCommand extends BaseCommand {
	static override commandName = 'init'
	static override description = 'Create the manifest for a new application'

	@args.string({ description: 'Application name' })
	declare appName: string

	@flags.string({ alias: 'd', description: 'Application directory (defaults to the current one)' })
	declare dir?: string

	@flags.string({ alias: 'c', description: 'Tool configuration file to take defaults from' })
	declare config?: string

	private readSettings(): Settings {
		return this.config === undefined ? defaultSettings() : loadConfiguration(this.config).settings
	}

	override async run(): Promise<void> {
		const path = resolveManifestPath(this.dir)
		try {
			createManifest(path, this.appName, this.readSettings())
			this.logger.log(`created ${path}`)
		} catch (error: unknown) {
			this.logger.logError(formatDocumentError(error))
			this.exitCode = 1
		}
	}
}
