/** File name of an application manifest inside its directory. */
export const MANIFEST_FILE_NAME = 'app.toml'

/** File name of the tool configuration. */
export const CONFIG_FILE_NAME = 'tomlet.toml'

/** Section of the configuration file holding tool settings. */
export const SETTINGS_SECTION = 'tomlet'

export const DEFAULT_README_FILE = 'README.md'
export const DEFAULT_LICENSE_FILE = 'LICENSE.txt'

/** Suffix of the entry point written under `[executable]`. */
export const EXECUTABLE_ENTRY_SUFFIX = 'run'
