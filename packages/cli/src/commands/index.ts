import CheckCommand from './check.ts'
import DepsCommand from './deps.ts'
import DepsAddCommand from './deps-add.ts'
import DepsRemoveCommand from './deps-remove.ts'
import FormatCommand from './format.ts'
import GetCommand from './get.ts'
import InitCommand from './init.ts'

export const commands = [
	CheckCommand,
	FormatCommand,
	GetCommand,
	DepsCommand,
	DepsAddCommand,
	DepsRemoveCommand,
	InitCommand,
]
