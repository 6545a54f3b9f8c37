import type {Effect} from 'effect';
import type {FileSystemError} from './errors.js';

/**
 * Persisted configuration of the snippet manager.
 * Either new (every field empty) or fully populated after the first load.
 */
export interface Config {
	snippetsFile: string;
	snippetsDir: string;
	editor: string;
	filterCmd: string;
}

/**
 * On-disk shape of the config file
 */
export interface ConfigFileData {
	snippets_file: string;
	snippets_dir: string;
	editor: string;
	filter_cmd: string;
}

export type ConfigField = keyof Config;

export const CONFIG_FIELDS: readonly ConfigField[] = [
	'snippetsFile',
	'snippetsDir',
	'editor',
	'filterCmd',
];

export const CONFIG_FILE_KEYS: ReadonlyArray<keyof ConfigFileData> = [
	'snippets_file',
	'snippets_dir',
	'editor',
	'filter_cmd',
];

/**
 * Fields accepted by the configure flow; omitted fields are left unchanged
 */
export type ConfigUpdate = Partial<Config>;

/**
 * Process-wide inputs every operation reads, passed explicitly
 */
export interface HostEnvironment {
	platform: NodeJS.Platform;
	env: Readonly<Record<string, string | undefined>>;
	cwd: string;
}

export type PathKind = 'file' | 'directory';

/**
 * Ensures a filesystem entry exists, creating missing parents.
 * Must do nothing when the entry is already there.
 */
export interface PathEnsurer {
	ensurePath(
		location: string,
		kind: PathKind,
		permissions: number,
	): Effect.Effect<void, FileSystemError>;
}

/**
 * Resolves an executable name to a path, or undefined when not found
 */
export interface ExecutableResolver {
	lookPath(name: string, host: HostEnvironment): string | undefined;
}

export const EMPTY_CONFIG: Readonly<Config> = {
	snippetsFile: '',
	snippetsDir: '',
	editor: '',
	filterCmd: '',
};

export function isNewConfig(config: Config): boolean {
	return (
		config.snippetsFile === '' &&
		config.snippetsDir === '' &&
		config.editor === '' &&
		config.filterCmd === ''
	);
}

export function toConfigFileData(config: Config): ConfigFileData {
	return {
		snippets_file: config.snippetsFile,
		snippets_dir: config.snippetsDir,
		editor: config.editor,
		filter_cmd: config.filterCmd,
	};
}

export function fromConfigFileData(data: Partial<ConfigFileData>): Config {
	return {
		snippetsFile: data.snippets_file ?? '',
		snippetsDir: data.snippets_dir ?? '',
		editor: data.editor ?? '',
		filterCmd: data.filter_cmd ?? '',
	};
}
