/**
 * Config module - locates, initializes, loads and saves corgi's config file.
 *
 * Public API:
 * - ConfigManager: load / save / configure and default detection
 * - createConfigManager: factory with the real filesystem and PATH
 */
export {
	ConfigManager,
	createConfigManager,
	decodeConfig,
} from './configManager.js';
export type {
	ConfigManagerOptions,
	ConfigureError,
	LoadError,
} from './configManager.js';
