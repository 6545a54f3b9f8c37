import path from 'path';
import {Effect, Either} from 'effect';
import {
	CONFIG_FIELDS,
	CONFIG_FILE_KEYS,
	Config,
	ConfigFileData,
	ConfigUpdate,
	EMPTY_CONFIG,
	ExecutableResolver,
	HostEnvironment,
	PathEnsurer,
	fromConfigFileData,
	isNewConfig,
	toConfigFileData,
} from '../../types/index.js';
import {
	ConfigError,
	EditorNotFoundError,
	FileSystemError,
	MissingDefaultFilterCmdError,
	ValidationError,
} from '../../types/errors.js';
import {
	CONFIG_FILE_PERMISSIONS,
	DEFAULT_EDITOR,
	DEFAULT_FILTER_CMD_FZF,
	DEFAULT_FILTER_CMD_PECO,
	DEFAULT_PATH_PERMISSIONS,
	EDITOR_REMEDY_COMMAND,
} from '../../constants/defaults.js';
import {ENV_EDITOR} from '../../constants/env.js';
import {
	currentHostEnvironment,
	getConfigFileLocation,
	getDefaultConfigHome,
	getSnippetsDirLocation,
	getSnippetsFileLocation,
	isEmptyPath,
} from '../../utils/defaultPaths.js';
import {getOrCreatePath, nodePathEnsurer} from '../../utils/pathEnsurer.js';
import {pathExecutableResolver} from '../../utils/lookPath.js';
import {
	isJsonObject,
	loadJsonDataFromFile,
	writeJsonDataToFile,
} from '../../utils/jsonFile.js';
import {logger as defaultLogger, Logger} from '../../utils/logger.js';

export type LoadError = FileSystemError | ConfigError | EditorNotFoundError;
export type ConfigureError = LoadError | ValidationError;

export interface ConfigManagerOptions {
	host: HostEnvironment;
	pathEnsurer: PathEnsurer;
	resolver: ExecutableResolver;
	logger: Pick<Logger, 'info' | 'warn' | 'debug'>;
}

/**
 * Decode a parsed config document. Missing fields become empty strings,
 * unknown keys are ignored, non-string values are rejected.
 */
export function decodeConfig(
	data: unknown,
	configPath: string,
): Either.Either<Config, ConfigError> {
	if (data === undefined) {
		return Either.right({...EMPTY_CONFIG});
	}

	if (!isJsonObject(data)) {
		return Either.left(
			new ConfigError({
				configPath,
				reason: 'validation',
				details: 'expected a JSON object',
			}),
		);
	}

	const fileData: Partial<ConfigFileData> = {};
	for (const key of CONFIG_FILE_KEYS) {
		const value = data[key];
		if (value === undefined || value === null) {
			continue;
		}
		if (typeof value !== 'string') {
			return Either.left(
				new ConfigError({
					configPath,
					reason: 'validation',
					details: `${key} must be a string`,
				}),
			);
		}
		fileData[key] = value;
	}

	return Either.right(fromConfigFileData(fileData));
}

/**
 * ConfigManager locates, initializes, loads and saves corgi's config file.
 *
 * The first load on a machine finds an empty (or freshly created) config
 * file, fills in default snippet locations, editor and filter command, and
 * writes them back. Later loads only parse the file.
 *
 * Everything process-wide (environment, PATH, platform, filesystem) comes in
 * through the constructor so each operation can run against test doubles.
 */
export class ConfigManager {
	private readonly host: HostEnvironment;
	private readonly pathEnsurer: PathEnsurer;
	private readonly resolver: ExecutableResolver;
	private readonly logger: ConfigManagerOptions['logger'];

	constructor(options: Partial<ConfigManagerOptions> = {}) {
		this.host = options.host ?? currentHostEnvironment();
		this.pathEnsurer = options.pathEnsurer ?? nodePathEnsurer;
		this.resolver = options.resolver ?? pathExecutableResolver;
		this.logger = options.logger ?? defaultLogger;
	}

	getDefaultConfigHome(): string {
		return getDefaultConfigHome(this.host);
	}

	getDefaultConfigFile(
		configHome: string,
	): Effect.Effect<string, FileSystemError> {
		return getOrCreatePath(
			this.pathEnsurer,
			getConfigFileLocation(configHome),
			DEFAULT_PATH_PERMISSIONS,
			'file',
		);
	}

	getDefaultSnippetsDir(
		configHome: string,
	): Effect.Effect<string, FileSystemError> {
		return getOrCreatePath(
			this.pathEnsurer,
			getSnippetsDirLocation(configHome),
			DEFAULT_PATH_PERMISSIONS,
			'directory',
		);
	}

	getDefaultSnippetsFile(
		configHome: string,
	): Effect.Effect<string, FileSystemError> {
		return getOrCreatePath(
			this.pathEnsurer,
			getSnippetsFileLocation(configHome),
			DEFAULT_PATH_PERMISSIONS,
			'file',
		);
	}

	/**
	 * EDITOR wins whenever it is set, even to an empty value, and is not
	 * checked. Otherwise vim must be on PATH.
	 */
	getDefaultEditor(): Effect.Effect<string, EditorNotFoundError> {
		return Effect.suspend(() => {
			const fromEnv = this.host.env[ENV_EDITOR];
			if (fromEnv !== undefined) {
				return Effect.succeed(fromEnv);
			}

			const editorPath = this.resolver.lookPath(DEFAULT_EDITOR, this.host);
			if (editorPath === undefined) {
				return Effect.fail(
					new EditorNotFoundError({
						editor: DEFAULT_EDITOR,
						remedy: EDITOR_REMEDY_COMMAND,
					}),
				);
			}
			return Effect.succeed(editorPath);
		});
	}

	/**
	 * Looks up peco, then fzf. The fzf lookup decides the result on its own:
	 * a peco hit is dropped when fzf is missing.
	 */
	getDefaultFilterCmd(): Effect.Effect<string, MissingDefaultFilterCmdError> {
		return Effect.suspend(() => {
			const pecoPath = this.resolver.lookPath(
				DEFAULT_FILTER_CMD_PECO,
				this.host,
			);
			const filterCmdPath =
				this.resolver.lookPath(DEFAULT_FILTER_CMD_FZF, this.host) ?? '';

			if (pecoPath !== undefined && filterCmdPath === '') {
				this.logger.debug(
					`Ignoring ${pecoPath}: no ${DEFAULT_FILTER_CMD_FZF} on PATH`,
				);
			}

			if (filterCmdPath === '') {
				return Effect.fail(
					new MissingDefaultFilterCmdError({
						candidates: [DEFAULT_FILTER_CMD_PECO, DEFAULT_FILTER_CMD_FZF],
					}),
				);
			}
			return Effect.succeed(filterCmdPath);
		});
	}

	isNew(config: Config): boolean {
		return isNewConfig(config);
	}

	/**
	 * Load the config file, creating it and filling in defaults on first run
	 */
	load(): Effect.Effect<Config, LoadError> {
		return Effect.gen(this, function* () {
			const configHome = this.getDefaultConfigHome();
			const configFile = yield* this.getDefaultConfigFile(configHome);
			const config = yield* this.readConfigFile(configFile);

			if (!this.isNew(config)) {
				return config;
			}

			this.logger.info(`Initializing default configuration in ${configFile}`);
			const populated = yield* this.populateDefaults(configHome, {});
			yield* this.save(populated);
			return populated;
		});
	}

	/**
	 * Write the config as indented JSON over the config file's previous content
	 */
	save(config: Config): Effect.Effect<void, FileSystemError> {
		return Effect.gen(this, function* () {
			const configFile = yield* this.getDefaultConfigFile(
				this.getDefaultConfigHome(),
			);
			yield* writeJsonDataToFile(
				configFile,
				toConfigFileData(config),
				CONFIG_FILE_PERMISSIONS,
			);
			this.logger.debug(`Saved configuration to ${configFile}`);
		});
	}

	/**
	 * Apply explicit settings and save them.
	 *
	 * On a first run the given fields replace default detection, so a machine
	 * without vim can still be configured with `--editor`.
	 */
	configure(updates: ConfigUpdate): Effect.Effect<Config, ConfigureError> {
		return Effect.gen(this, function* () {
			const normalized = yield* this.validateUpdates(updates);
			const configHome = this.getDefaultConfigHome();
			const configFile = yield* this.getDefaultConfigFile(configHome);
			const current = yield* this.readConfigFile(configFile);

			const base = this.isNew(current)
				? yield* this.populateDefaults(configHome, normalized)
				: current;

			const next: Config = {...base, ...normalized};
			if (normalized.snippetsFile !== undefined) {
				yield* getOrCreatePath(
					this.pathEnsurer,
					normalized.snippetsFile,
					DEFAULT_PATH_PERMISSIONS,
					'file',
				);
			}
			if (normalized.snippetsDir !== undefined) {
				yield* getOrCreatePath(
					this.pathEnsurer,
					normalized.snippetsDir,
					DEFAULT_PATH_PERMISSIONS,
					'directory',
				);
			}

			yield* this.save(next);
			this.logger.info(
				`Updated ${Object.keys(normalized).join(', ')} in ${configFile}`,
			);
			return next;
		});
	}

	private readConfigFile(
		configFile: string,
	): Effect.Effect<Config, FileSystemError | ConfigError> {
		return Effect.flatMap(loadJsonDataFromFile(configFile), data =>
			decodeConfig(data, configFile),
		);
	}

	/**
	 * Fill every field not given in `preset` with its detected default.
	 * Only a missing filter command is tolerated.
	 */
	private populateDefaults(
		configHome: string,
		preset: ConfigUpdate,
	): Effect.Effect<Config, FileSystemError | EditorNotFoundError> {
		return Effect.gen(this, function* () {
			const snippetsFile =
				preset.snippetsFile ?? (yield* this.getDefaultSnippetsFile(configHome));
			const snippetsDir =
				preset.snippetsDir ?? (yield* this.getDefaultSnippetsDir(configHome));
			const editor = preset.editor ?? (yield* this.getDefaultEditor());
			const filterCmd =
				preset.filterCmd ??
				(yield* Effect.catchTag(
					this.getDefaultFilterCmd(),
					'MissingDefaultFilterCmdError',
					error => {
						this.logger.warn(
							`No filter command found (tried ${error.candidates.join(', ')})`,
						);
						return Effect.succeed('');
					},
				));

			return {snippetsFile, snippetsDir, editor, filterCmd};
		});
	}

	private validateUpdates(
		updates: ConfigUpdate,
	): Effect.Effect<ConfigUpdate, ValidationError> {
		const normalized: ConfigUpdate = {};

		for (const field of CONFIG_FIELDS) {
			const value = updates[field];
			if (value === undefined) {
				continue;
			}
			if (field !== 'filterCmd' && isEmptyPath(value)) {
				return Effect.fail(
					new ValidationError({
						field,
						constraint: 'must not be empty',
						receivedValue: value,
					}),
				);
			}
			normalized[field] =
				field === 'snippetsFile' || field === 'snippetsDir'
					? path.resolve(this.host.cwd, value)
					: value;
		}

		if (Object.keys(normalized).length === 0) {
			return Effect.fail(
				new ValidationError({
					field: 'updates',
					constraint: 'at least one setting is required',
					receivedValue: updates,
				}),
			);
		}

		return Effect.succeed(normalized);
	}
}

export function createConfigManager(
	options: Partial<ConfigManagerOptions> = {},
): ConfigManager {
	return new ConfigManager(options);
}
