#!/usr/bin/env -S node --import tsx

import { HelpCommand, Kernel, ListLoader } from '@adonisjs/ace'
import { commands } from './commands/index.ts'

const version = '0.1.0'

async function main(): Promise<void> {
	const kernel = Kernel.create()

	kernel.info.set('binary', 'tomlet')
	kernel.info.set('version', version)

	kernel.defineFlag('help', {
		alias: 'h',
		description: 'Display help information',
		type: 'boolean',
	})

	kernel.defineFlag('version', {
		alias: 'v',
		description: 'Display version number',
		type: 'boolean',
	})

	kernel.on('help', async (command, $kernel, parsed) => {
		parsed.args.unshift(command.commandName)
		await new HelpCommand($kernel, parsed, kernel.ui, kernel.prompt).exec()
		return $kernel.shortcircuit()
	})

	kernel.on('version', async (_command, $kernel) => {
		console.log(`tomlet v${version}`)
		return $kernel.shortcircuit()
	})

	kernel.addLoader(new ListLoader([...commands, HelpCommand]))

	kernel.on('finding:command', async () => {
		console.log(`tomlet v${version}`)
		console.log('')
		console.log('Usage: tomlet [command] [options]')
		console.log('')
		console.log('Run "tomlet --help" for available commands and options.')
		return true
	})

	await kernel.handle(process.argv.slice(2))
	process.exitCode = kernel.exitCode ?? 0
}

main().catch((error: unknown) => {
	console.error(error)
	process.exit(1)
})
