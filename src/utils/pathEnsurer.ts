import path from 'path';
import {existsSync, mkdirSync, writeFileSync} from 'fs';
import {Effect} from 'effect';
import {FileSystemError} from '../types/errors.js';
import type {PathEnsurer, PathKind} from '../types/index.js';

function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * PathEnsurer backed by the real filesystem.
 *
 * A missing file gets its parent chain created with `permissions` and is then
 * created empty. A missing directory is created with its parents.
 */
export const nodePathEnsurer: PathEnsurer = {
	ensurePath(
		location: string,
		kind: PathKind,
		permissions: number,
	): Effect.Effect<void, FileSystemError> {
		return Effect.gen(function* () {
			if (existsSync(location)) {
				return;
			}

			const dirPath = kind === 'directory' ? location : path.dirname(location);
			yield* Effect.try({
				try: () => {
					mkdirSync(dirPath, {recursive: true, mode: permissions});
				},
				catch: (error: unknown) =>
					new FileSystemError({
						operation: 'mkdir',
						path: dirPath,
						cause: describeError(error),
					}),
			});

			if (kind === 'file') {
				yield* Effect.try({
					try: () => writeFileSync(location, ''),
					catch: (error: unknown) =>
						new FileSystemError({
							operation: 'write',
							path: location,
							cause: describeError(error),
						}),
				});
			}
		});
	},
};

/**
 * Ensure `location` exists as the given kind, creating it when absent.
 * Safe to call repeatedly.
 */
export function getOrCreatePath(
	ensurer: PathEnsurer,
	location: string,
	permissions: number,
	kind: PathKind,
): Effect.Effect<string, FileSystemError> {
	return Effect.as(ensurer.ensurePath(location, kind, permissions), location);
}
