import { args, BaseCommand, flags } from '@adonisjs/ace'
import { addDependency, loadManifest, saveManifest } from '@tomlet/manifest'
import { formatDocumentError, resolveManifestPath } from '../utils.ts'

export default class DepsAddCommand extends BaseCommand {
	static override commandName = 'deps:add'
	static override description = 'Record a dependency and the packages its installation pulled in'

	@args.string({ description: 'Dependency name' })
	declare dependency: string

	@args.spread({ description: 'Packages installed along with it', required: false })
	declare packages?: string[]

	@flags.string({ alias: 'd', description: 'Application directory (defaults to the current one)' })
	declare dir?: string

	@flags.boolean({ description: 'Record a local dependency' })
	declare local: boolean

	override async run(): Promise<void> {
		const path = resolveManifestPath(this.dir)
		try {
			const manifest = loadManifest(path)
			addDependency(manifest, { name: this.dependency, newPackages: this.packages ?? [] }, { local: this.local })
			saveManifest(path, manifest)
			this.logger.log(`added ${this.dependency}`)
		} catch (error: unknown) {
			this.logger.logError(formatDocumentError(error))
			this.exitCode = 1
		}
	}
}
