import { args, BaseCommand, flags } from '@adonisjs/ace'
import { loadManifest, removeDependency, saveManifest } from '@tomlet/manifest'
import { formatDocumentError, resolveManifestPath } from '../utils.ts'

export default class DepsRemoveCommand extends BaseCommand {
	static override commandName = 'deps:remove'
	static override description = 'Drop a recorded dependency and print the packages to uninstall'

	@args.string({ description: 'Dependency name' })
	declare dependency: string

	@flags.string({ alias: 'd', description: 'Application directory (defaults to the current one)' })
	declare dir?: string

	@flags.boolean({ description: 'Remove a local dependency' })
	declare local: boolean

	override async run(): Promise<void> {
		const path = resolveManifestPath(this.dir)
		try {
			const manifest = loadManifest(path)
			const removed = removeDependency(manifest, this.dependency, { local: this.local })
			saveManifest(path, manifest)
			this.logger.log(`removed ${removed.name}`)
			for (const pkg of removed.newPackages) {
				this.logger.log(pkg)
			}
		} catch (error: unknown) {
			this.logger.logError(formatDocumentError(error))
			this.exitCode = 1
		}
	}
}
