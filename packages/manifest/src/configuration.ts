/**
 * Tool configuration file.
 *
 * One reserved section holds the tool's own settings; every other section is
 * the record of one tracked application, keyed by its name.
 */

import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { TLMAN050, TLMAN051, TLMAN052, TLMAN053, TLMAN054 } from '@tomlet/diagnostics'
import {
	asBoolean,
	asList,
	asString,
	asTable,
	bool,
	type Document,
	list,
	readDocument,
	str,
	Table,
	tableValue,
	type Value,
	writeDocument,
} from '@tomlet/engine'
import { DEFAULT_LICENSE_FILE, DEFAULT_README_FILE, SETTINGS_SECTION } from './constants.ts'
import { ConfigurationError, isNodeError } from './errors.ts'

export interface Author {
	name: string
	email: string
}

export interface Settings {
	tempDir: string
	envCreateTool: string
	envActivateTool: string
	envDeactivateTool: string
	defaultEnvName: string
	defaultAppType: string
	defaultMainFunction: string
	envLibInstallerTool: string
	requiresPython: string
	defaultAppVersion: string
	authors: Author[]
	/** Package names every new application starts with */
	dependencies: string[]
	createVenv: boolean
	createLicense: boolean
	createReadme: boolean
	createInit: boolean
	createAbout: boolean
	createTyped: boolean
	createGitignore: boolean
	createChangelog: boolean
	runGitInit: boolean
}

export interface ApplicationRecord {
	name: string
	version: string
	description?: string
	readmeFile: string
	license?: string
	licenseFile: string
	copyright?: string
	author?: string
	dependencies: string[]
	appType: string
	module?: string
	function: string
}

export interface Configuration {
	settings: Settings
	applications: ApplicationRecord[]
}

export interface ConfigurationOptions {
	/** Name of the settings section; defaults to SETTINGS_SECTION */
	section?: string
}

type KeysOfType<T, V> = { [K in keyof T]-?: T[K] extends V ? K : never }[keyof T]

type StringSetting = KeysOfType<Settings, string>
type BooleanSetting = KeysOfType<Settings, boolean>
type OptionalApplicationField = 'author' | 'copyright' | 'description' | 'license' | 'module'

// Field name and on-disk key, in file order
const STRING_SETTINGS: ReadonlyArray<readonly [StringSetting, string]> = [
	['tempDir', 'temp_dir'],
	['envCreateTool', 'env_create_tool'],
	['envActivateTool', 'env_activate_tool'],
	['envDeactivateTool', 'env_deactivate_tool'],
	['defaultEnvName', 'default_env_name'],
	['defaultAppType', 'default_app_type'],
	['defaultMainFunction', 'default_main_function'],
	['envLibInstallerTool', 'env_lib_installer_tool'],
	['requiresPython', 'requires_python'],
	['defaultAppVersion', 'default_app_version'],
]

const BOOLEAN_SETTINGS: ReadonlyArray<readonly [BooleanSetting, string]> = [
	['createVenv', 'create_venv'],
	['createLicense', 'create_license'],
	['createReadme', 'create_readme'],
	['createInit', 'create_init'],
	['createAbout', 'create_about'],
	['createTyped', 'create_typed'],
	['createGitignore', 'create_gitignore'],
	['createChangelog', 'create_changelog'],
	['runGitInit', 'run_git_init'],
]

const OPTIONAL_APPLICATION_FIELDS: ReadonlyArray<readonly [OptionalApplicationField, string]> = [
	['description', 'description'],
	['license', 'license'],
	['copyright', 'copyright'],
	['author', 'author'],
	['module', 'module'],
]

export function defaultSettings(): Settings {
	return {
		authors: [],
		createAbout: true,
		createChangelog: true,
		createGitignore: false,
		createInit: false,
		createLicense: true,
		createReadme: true,
		createTyped: false,
		createVenv: true,
		defaultAppType: 'application',
		defaultAppVersion: '0.1.0',
		defaultEnvName: 'env',
		defaultMainFunction: 'main',
		dependencies: [],
		envActivateTool: 'source bin/activate',
		envCreateTool: 'python3 -m venv',
		envDeactivateTool: 'deactivate',
		envLibInstallerTool: 'pip3 install',
		requiresPython: '>=3.10',
		runGitInit: false,
		tempDir: join(tmpdir(), 'tomlet'),
	}
}

// =============================================================================
// READING
// =============================================================================

function invalid(key: string, expected: string): ConfigurationError {
	return new ConfigurationError(TLMAN052, { expected, key })
}

function readString(table: Table, key: string): string | undefined {
	const value = table.get(key)
	if (value === undefined) return undefined
	const text = asString(value)
	if (text === undefined) throw invalid(key, 'a string')
	return text
}

function readBoolean(table: Table, key: string): boolean | undefined {
	const value = table.get(key)
	if (value === undefined) return undefined
	const flag = asBoolean(value)
	if (flag === undefined) throw invalid(key, 'True or False')
	return flag
}

function readStringList(table: Table, key: string): string[] | undefined {
	const value = table.get(key)
	if (value === undefined) return undefined
	const items = asList(value)
	if (items === undefined) throw invalid(key, 'a list of strings')
	return items.map((item) => {
		const text = asString(item)
		if (text === undefined) throw invalid(key, 'a list of strings')
		return text
	})
}

function readAuthors(table: Table, key: string): Author[] | undefined {
	const value = table.get(key)
	if (value === undefined) return undefined
	const items = asList(value)
	if (items === undefined) throw invalid(key, 'a list of {name, email} tables')
	return items.map((item) => {
		const entry = asTable(item)
		const name = asString(entry?.get('name'))
		const email = asString(entry?.get('email'))
		if (name === undefined || email === undefined) throw invalid(key, 'a list of {name, email} tables')
		return { email, name }
	})
}

function readSettings(table: Table): Settings {
	const settings = defaultSettings()
	for (const [field, key] of STRING_SETTINGS) {
		const value = readString(table, key)
		if (value !== undefined) settings[field] = value
	}
	for (const [field, key] of BOOLEAN_SETTINGS) {
		const value = readBoolean(table, key)
		if (value !== undefined) settings[field] = value
	}
	settings.authors = readAuthors(table, 'authors') ?? settings.authors
	settings.dependencies = readStringList(table, 'dependencies') ?? settings.dependencies
	return settings
}

function readApplication(section: string, table: Table, settings: Settings): ApplicationRecord {
	const record: ApplicationRecord = {
		appType: readString(table, 'app_type') ?? settings.defaultAppType,
		dependencies: readStringList(table, 'dependencies') ?? [],
		function: readString(table, 'function') ?? settings.defaultMainFunction,
		licenseFile: readString(table, 'license_file') ?? DEFAULT_LICENSE_FILE,
		name: readString(table, 'name') ?? section,
		readmeFile: readString(table, 'readme_file') ?? DEFAULT_README_FILE,
		version: readString(table, 'version') ?? settings.defaultAppVersion,
	}
	for (const [field, key] of OPTIONAL_APPLICATION_FIELDS) {
		const value = readString(table, key)
		if (value !== undefined) record[field] = value
	}
	return record
}

/**
 * Read settings and application records out of a parsed document.
 *
 * @throws {ConfigurationError} If the settings section is missing or a value has the wrong shape
 */
export function configurationFromDocument(document: Document, options: ConfigurationOptions = {}): Configuration {
	const section = options.section ?? SETTINGS_SECTION
	const settingsTable = document.getTable([section])
	if (settingsTable === undefined) {
		throw new ConfigurationError(TLMAN051, { section })
	}

	const settings = readSettings(settingsTable)
	const applications: ApplicationRecord[] = []
	for (const [name, value] of document) {
		if (name === section) continue
		const table = asTable(value)
		if (table !== undefined) applications.push(readApplication(name, table, settings))
	}
	return { applications, settings }
}

/**
 * @throws {ConfigurationError} If the file is missing or malformed
 * @throws {DocumentSyntaxError} If the file does not parse
 */
export function loadConfiguration(path: string, options: ConfigurationOptions = {}): Configuration {
	let document: Document
	try {
		document = readDocument(path)
	} catch (error: unknown) {
		if (isNodeError(error) && error.code === 'ENOENT') {
			throw new ConfigurationError(TLMAN050, { path })
		}
		throw error
	}
	return configurationFromDocument(document, options)
}

// =============================================================================
// WRITING
// =============================================================================

export function authorValue(author: Author): Value {
	return tableValue(
		new Table([
			['name', str(author.name)],
			['email', str(author.email)],
		])
	)
}

function settingsTable(settings: Settings): Table {
	const table = new Table()
	for (const [field, key] of STRING_SETTINGS) {
		table.set(key, str(settings[field]))
	}
	table.set('authors', list(settings.authors.map(authorValue)))
	for (const [field, key] of BOOLEAN_SETTINGS) {
		table.set(key, bool(settings[field]))
	}
	table.set('dependencies', list(settings.dependencies.map((name) => str(name))))
	return table
}

function applicationTable(app: ApplicationRecord): Table {
	const table = new Table()
	const optional = (key: string, value: string | undefined): void => {
		if (value !== undefined) table.set(key, str(value))
	}
	table.set('name', str(app.name))
	table.set('version', str(app.version))
	optional('description', app.description)
	table.set('readme_file', str(app.readmeFile))
	optional('license', app.license)
	table.set('license_file', str(app.licenseFile))
	optional('copyright', app.copyright)
	optional('author', app.author)
	table.set('dependencies', list(app.dependencies.map((name) => str(name))))
	table.set('app_type', str(app.appType))
	optional('module', app.module)
	table.set('function', str(app.function))
	return table
}

/**
 * Build the document for a configuration: the settings section first,
 * then one section per application.
 *
 * @throws {ConfigurationError} If an application name is the settings section or is repeated
 */
export function configurationToDocument(config: Configuration, options: ConfigurationOptions = {}): Document {
	const section = options.section ?? SETTINGS_SECTION
	const document = new Table()
	document.set(section, tableValue(settingsTable(config.settings)))
	for (const app of config.applications) {
		if (app.name === section) {
			throw new ConfigurationError(TLMAN053, { name: app.name, section })
		}
		if (document.has(app.name)) {
			throw new ConfigurationError(TLMAN054, { name: app.name })
		}
		document.set(app.name, tableValue(applicationTable(app)))
	}
	return document
}

/**
 * @throws {ConfigurationError} If two sections would share a name
 * @throws {DocumentTypeError} If a value cannot be written
 */
export function saveConfiguration(path: string, config: Configuration, options: ConfigurationOptions = {}): void {
	writeDocument(path, configurationToDocument(config, options))
}
