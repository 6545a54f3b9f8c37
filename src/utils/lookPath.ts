import path from 'path';
import {accessSync, constants, statSync} from 'fs';
import type {ExecutableResolver, HostEnvironment} from '../types/index.js';
import {ENV_PATH} from '../constants/env.js';

/**
 * Check whether a path is a regular file the current user may execute
 */
export function isExecutableFile(candidate: string): boolean {
	try {
		if (!statSync(candidate).isFile()) {
			return false;
		}
		accessSync(candidate, constants.X_OK);
		return true;
	} catch {
		return false;
	}
}

/**
 * Search the host's PATH for an executable.
 *
 * Names containing a separator are checked as given (relative to the host's
 * cwd) without searching. An empty PATH entry stands for the cwd.
 */
export function lookPath(
	name: string,
	host: HostEnvironment,
): string | undefined {
	if (name === '') {
		return undefined;
	}

	if (name.includes('/')) {
		const candidate = path.resolve(host.cwd, name);
		return isExecutableFile(candidate) ? candidate : undefined;
	}

	const searchPath = host.env[ENV_PATH] ?? '';
	for (const entry of searchPath.split(path.delimiter)) {
		const dir = entry === '' ? host.cwd : entry;
		const candidate = path.join(dir, name);
		if (isExecutableFile(candidate)) {
			return candidate;
		}
	}

	return undefined;
}

export const pathExecutableResolver: ExecutableResolver = {lookPath};
