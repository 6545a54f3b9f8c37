import path from 'path';
import type {HostEnvironment} from '../types/index.js';
import {ENV_HOME, ENV_XDG_CONFIG_HOME} from '../constants/env.js';
import {
	DEFAULT_CONFIG_FILE,
	DEFAULT_SNIPPETS_DIR,
	DEFAULT_SNIPPETS_FILE,
} from '../constants/defaults.js';

/**
 * Snapshot of the running process as a HostEnvironment
 */
export function currentHostEnvironment(): HostEnvironment {
	return {
		platform: process.platform,
		env: {...process.env},
		cwd: process.cwd(),
	};
}

/**
 * Get the directory corgi keeps its files under.
 *
 * macOS uses HOME. Linux prefers XDG_CONFIG_HOME and falls back to HOME.
 * Other platforms are unsupported and get an empty string.
 */
export function getDefaultConfigHome(host: HostEnvironment): string {
	if (host.platform === 'darwin') {
		return host.env[ENV_HOME] ?? '';
	}

	if (host.platform === 'linux') {
		const xdgConfigHome = host.env[ENV_XDG_CONFIG_HOME];
		if (xdgConfigHome) {
			return xdgConfigHome;
		}
		return host.env[ENV_HOME] ?? '';
	}

	return '';
}

export function getConfigFileLocation(configHome: string): string {
	return path.join(configHome, DEFAULT_CONFIG_FILE);
}

export function getSnippetsDirLocation(configHome: string): string {
	return path.join(configHome, DEFAULT_SNIPPETS_DIR);
}

export function getSnippetsFileLocation(configHome: string): string {
	return path.join(configHome, DEFAULT_SNIPPETS_FILE);
}

/**
 * Check if a path is empty or whitespace-only
 */
export function isEmptyPath(value: string | undefined): boolean {
	return !value || value.trim() === '';
}
