/**
 * Test doubles and Effect helpers shared by the test suites.
 *
 * WARNING: This file is intended for TEST USE ONLY.
 * Do not import from production code.
 */
import path from 'path';
import os from 'os';
import {mkdtempSync, rmSync} from 'fs';
import {Effect, Either} from 'effect';
import {FileSystemError} from '../types/errors.js';
import type {
	ExecutableResolver,
	HostEnvironment,
	PathEnsurer,
	PathKind,
} from '../types/index.js';

/**
 * Run an Effect synchronously and return the success value.
 * Throws the failure if the Effect fails.
 */
export function expectEffectSuccess<A, E>(effect: Effect.Effect<A, E>): A {
	const result = Effect.runSync(Effect.either(effect));
	if (Either.isLeft(result)) {
		throw new Error(`Expected success but got failure: ${String(result.left)}`);
	}
	return result.right;
}

/**
 * Run an Effect synchronously and return the failure value.
 * Throws if the Effect succeeds.
 */
export function expectEffectFailure<A, E>(effect: Effect.Effect<A, E>): E {
	const result = Effect.runSync(Effect.either(effect));
	if (Either.isRight(result)) {
		throw new Error(
			`Expected failure but got success: ${JSON.stringify(result.right)}`,
		);
	}
	return result.left;
}

export function createTempDir(prefix = 'corgi-test-'): string {
	return mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeTempDir(dir: string): void {
	rmSync(dir, {recursive: true, force: true});
}

export function createTestHost(
	overrides: Partial<HostEnvironment> = {},
): HostEnvironment {
	return {
		platform: 'linux',
		env: {},
		cwd: '/work',
		...overrides,
	};
}

interface MemoryEntry {
	kind: PathKind;
	permissions: number;
}

/**
 * PathEnsurer over an in-memory tree of absolute paths.
 * Paths listed in `failOn` fail with a mkdir FileSystemError.
 */
export class MemoryPathEnsurer implements PathEnsurer {
	readonly entries = new Map<string, MemoryEntry>();
	readonly calls: Array<{location: string; kind: PathKind}> = [];
	private readonly failOn: ReadonlySet<string>;

	constructor(failOn: Iterable<string> = []) {
		this.failOn = new Set(failOn);
	}

	ensurePath(
		location: string,
		kind: PathKind,
		permissions: number,
	): Effect.Effect<void, FileSystemError> {
		return Effect.suspend(() => {
			this.calls.push({location, kind});
			if (this.entries.has(location)) {
				return Effect.void;
			}
			if (this.failOn.has(location)) {
				return Effect.fail(
					new FileSystemError({
						operation: 'mkdir',
						path: location,
						cause: 'EACCES: permission denied',
					}),
				);
			}

			const dirPath = kind === 'directory' ? location : path.dirname(location);
			for (
				let current = dirPath;
				!this.entries.has(current) && current !== path.dirname(current);
				current = path.dirname(current)
			) {
				this.entries.set(current, {kind: 'directory', permissions});
			}
			if (kind === 'file') {
				this.entries.set(location, {kind: 'file', permissions});
			}
			return Effect.void;
		});
	}

	snapshot(): Array<[string, PathKind]> {
		return [...this.entries.entries()]
			.map(([location, entry]): [string, PathKind] => [location, entry.kind])
			.sort(([a], [b]) => a.localeCompare(b));
	}
}

/**
 * ExecutableResolver answering from a fixed name -> path table
 */
export class FakeExecutableResolver implements ExecutableResolver {
	readonly lookups: string[] = [];

	constructor(private readonly executables: Record<string, string> = {}) {}

	lookPath(name: string): string | undefined {
		this.lookups.push(name);
		return this.executables[name];
	}
}

export const silentLogger = {
	info: () => {},
	warn: () => {},
	debug: () => {},
};
