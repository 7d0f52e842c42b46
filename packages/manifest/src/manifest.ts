import { existsSync } from 'node:fs'
import { TLMAN001, TLMAN002, TLMAN003, TLMAN004, TLMAN005 } from '@tomlet/diagnostics'
import {
	asList,
	asString,
	asTable,
	type Document,
	list,
	normalizeKey,
	readDocument,
	str,
	Table,
	tableValue,
	type Value,
	writeDocument,
} from '@tomlet/engine'
import { authorValue, defaultSettings, type Settings } from './configuration.ts'
import { DEFAULT_LICENSE_FILE, DEFAULT_README_FILE, EXECUTABLE_ENTRY_SUFFIX } from './constants.ts'
import { isNodeError, ManifestError } from './errors.ts'

/**
 * One recorded dependency: the package asked for and the extra packages its
 * installation pulled in, so that removal can undo both.
 */
export interface DependencyRecord {
	name: string
	newPackages: string[]
}

export interface DependencyOptions {
	/** Use `project.local_dependencies` instead of `project.dependencies` */
	local?: boolean
}

export interface ProjectInfo {
	name?: string
	version?: string
	description?: string
}

type DependencyList = 'dependencies' | 'local_dependencies'

function listKey(options: DependencyOptions): DependencyList {
	return options.local ? 'local_dependencies' : 'dependencies'
}

/**
 * @throws {ManifestError} If there is no file at `path`
 * @throws {DocumentSyntaxError} If the file does not parse
 */
export function loadManifest(path: string): Document {
	try {
		return readDocument(path)
	} catch (error: unknown) {
		if (isNodeError(error) && error.code === 'ENOENT') {
			throw new ManifestError(TLMAN001, { path })
		}
		throw error
	}
}

export function saveManifest(path: string, document: Document): void {
	writeDocument(path, document)
}

function dependencyValue(dependency: DependencyRecord): Value {
	return tableValue(
		new Table([
			['name', str(dependency.name)],
			['new_packages', list(dependency.newPackages.map((name) => str(name)))],
		])
	)
}

/**
 * The manifest a new application starts with: `[tools]`, `[project]` and
 * `[executable]` sections filled from the tool settings.
 */
export function defaultManifest(appName: string, settings: Settings = defaultSettings()): Document {
	const tools = new Table([
		['env_create_tool', str(settings.envCreateTool)],
		['env_activate_tool', str(settings.envActivateTool)],
		['env_deactivate_tool', str(settings.envDeactivateTool)],
		['env_name', str(settings.defaultEnvName)],
		['env_lib_installer', str(settings.envLibInstallerTool)],
	])

	const project = new Table([
		['name', str(appName)],
		['version', str(settings.defaultAppVersion)],
		['readme', str(DEFAULT_README_FILE)],
		['license', str(DEFAULT_LICENSE_FILE)],
		['description', str('')],
		['authors', list(settings.authors.map(authorValue))],
		['requires_python', str(settings.requiresPython)],
		['type', str(settings.defaultAppType)],
		['dependencies', list(settings.dependencies.map((name) => dependencyValue({ name, newPackages: [] })))],
		['local_dependencies', list([])],
	])

	const executable = new Table([[normalizeKey(appName), str(`${appName}:${EXECUTABLE_ENTRY_SUFFIX}`)]])

	return new Table([
		['tools', tableValue(tools)],
		['project', tableValue(project)],
		['executable', tableValue(executable)],
	])
}

/**
 * Write a default manifest to `path`. Never overwrites.
 *
 * @throws {ManifestError} If a file already exists at `path`
 */
export function createManifest(path: string, appName: string, settings: Settings = defaultSettings()): Document {
	if (existsSync(path)) {
		throw new ManifestError(TLMAN002, { path })
	}
	const document = defaultManifest(appName, settings)
	writeDocument(path, document)
	return document
}

export function getProjectInfo(document: Document): ProjectInfo {
	const info: ProjectInfo = {}
	const name = asString(document.getPath('project.name'))
	const version = asString(document.getPath('project.version'))
	const description = asString(document.getPath('project.description'))
	if (name !== undefined) info.name = name
	if (version !== undefined) info.version = version
	if (description !== undefined) info.description = description
	return info
}

function readDependency(item: Value, listName: DependencyList, index: number): DependencyRecord {
	const invalid = (reason: string) => new ManifestError(TLMAN003, { list: listName, reason })

	const entry = asTable(item)
	if (entry === undefined) throw invalid(`entry ${index} is not a table`)
	const name = asString(entry.get('name'))
	if (name === undefined) throw invalid(`entry ${index} has no name`)

	const items = asList(entry.get('new_packages') ?? list([]))
	if (items === undefined) throw invalid(`entry ${index} has an invalid new_packages list`)
	const newPackages: string[] = []
	for (const pkg of items) {
		const text = asString(pkg)
		if (text === undefined) throw invalid(`entry ${index} has an invalid new_packages list`)
		newPackages.push(text)
	}
	return { name, newPackages }
}

/**
 * Dependency records in file order. A missing list is empty.
 *
 * @throws {ManifestError} If the list or one of its entries is malformed
 */
export function getDependencies(document: Document, options: DependencyOptions = {}): DependencyRecord[] {
	const key = listKey(options)
	const value = document.getPath(['project', key])
	if (value === undefined) return []
	const items = asList(value)
	if (items === undefined) {
		throw new ManifestError(TLMAN003, { list: key, reason: 'not a list' })
	}
	return items.map((item, index) => readDependency(item, key, index))
}

export function hasDependency(document: Document, name: string, options: DependencyOptions = {}): boolean {
	return getDependencies(document, options).some((dependency) => dependency.name === name)
}

/**
 * Append a dependency record, creating `[project]` and the list if needed.
 *
 * @throws {ManifestError} If a dependency with the same name is already recorded
 */
export function addDependency(document: Document, dependency: DependencyRecord, options: DependencyOptions = {}): void {
	const key = listKey(options)
	if (hasDependency(document, dependency.name, options)) {
		throw new ManifestError(TLMAN004, { list: key, name: dependency.name })
	}
	const project = document.ensureTable('project')
	const items = asList(project.get(key)) ?? []
	project.set(key, list([...items, dependencyValue(dependency)]))
}

/**
 * Remove a dependency record and return it.
 *
 * @throws {ManifestError} If no dependency with that name is recorded
 */
export function removeDependency(document: Document, name: string, options: DependencyOptions = {}): DependencyRecord {
	const key = listKey(options)
	const dependencies = getDependencies(document, options)
	const index = dependencies.findIndex((dependency) => dependency.name === name)
	const removed = dependencies[index]
	if (removed === undefined) {
		throw new ManifestError(TLMAN005, { list: key, name })
	}
	const project = document.ensureTable('project')
	const items = asList(project.get(key)) ?? []
	project.set(key, list(items.filter((_, i) => i !== index)))
	return removed
}
