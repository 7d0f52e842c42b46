import { BaseCommand, flags } from '@adonisjs/ace'
import { getDependencies, loadManifest } from '@tomlet/manifest'
import { formatDocumentError, resolveManifestPath } from '../utils.ts'

export default class DepsCommand extends BaseCommand {
	static override commandName = 'deps'
	static override description = 'List the dependencies recorded in an application manifest'

	@flags.string({ alias: 'd', description: 'Application directory (defaults to the current one)' })
	declare dir?: string

	@flags.boolean({ description: 'List local dependencies instead' })
	declare local: boolean

	override async run(): Promise<void> {
		try {
			const manifest = loadManifest(resolveManifestPath(this.dir))
			const dependencies = getDependencies(manifest, { local: this.local })
			for (const dependency of dependencies) {
				const extra = dependency.newPackages.length > 0 ? ` (${dependency.newPackages.join(', ')})` : ''
				this.logger.log(`${dependency.name}${extra}`)
			}
		} catch (error: unknown) {
			this.logger.logError(formatDocumentError(error))
			this.exitCode = 1
		}
	}
}
