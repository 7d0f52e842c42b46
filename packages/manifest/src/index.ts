/**
 * @tomlet/manifest
 *
 * Application manifests and the tool configuration file, read and written
 * through the engine.
 */

export {
	type ApplicationRecord,
	type Author,
	authorValue,
	type Configuration,
	type ConfigurationOptions,
	configurationFromDocument,
	configurationToDocument,
	defaultSettings,
	loadConfiguration,
	type Settings,
	saveConfiguration,
} from './configuration.ts'
export {
	CONFIG_FILE_NAME,
	DEFAULT_LICENSE_FILE,
	DEFAULT_README_FILE,
	EXECUTABLE_ENTRY_SUFFIX,
	MANIFEST_FILE_NAME,
	SETTINGS_SECTION,
} from './constants.ts'
export { ConfigurationError, isNodeError, ManifestError } from './errors.ts'
export {
	addDependency,
	createManifest,
	type DependencyOptions,
	type DependencyRecord,
	defaultManifest,
	getDependencies,
	getProjectInfo,
	hasDependency,
	loadManifest,
	type ProjectInfo,
	removeDependency,
	saveManifest,
} from './manifest.ts'
