import {readFileSync, writeFileSync} from 'fs';
import {Effect, Either} from 'effect';
import {ConfigError, FileSystemError} from '../types/errors.js';
import {
	JSON_MARSHAL_INDENT,
	JSON_MARSHAL_PREFIX,
} from '../constants/defaults.js';

/**
 * Type guard to check if value is a plain JSON object
 */
export function isJsonObject(
	value: unknown,
): value is Record<string, unknown> {
	return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Parse JSON text into an object.
 * Blank text and a bare `null` are "no data" and yield undefined.
 */
export function parseJsonObject(
	content: string,
	sourcePath: string,
): Either.Either<Record<string, unknown> | undefined, ConfigError> {
	if (content.trim() === '') {
		return Either.right(undefined);
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(content);
	} catch (error) {
		return Either.left(
			new ConfigError({
				configPath: sourcePath,
				reason: 'parse',
				details: describeError(error),
			}),
		);
	}

	if (parsed === null) {
		return Either.right(undefined);
	}

	if (!isJsonObject(parsed)) {
		return Either.left(
			new ConfigError({
				configPath: sourcePath,
				reason: 'validation',
				details: 'expected a JSON object',
			}),
		);
	}

	return Either.right(parsed);
}

/**
 * Read a file and parse its content as a JSON object.
 * An empty file yields undefined.
 */
export function loadJsonDataFromFile(
	filePath: string,
): Effect.Effect<
	Record<string, unknown> | undefined,
	FileSystemError | ConfigError
> {
	return Effect.gen(function* () {
		const content = yield* Effect.try({
			try: () => readFileSync(filePath, 'utf-8'),
			catch: (error: unknown) =>
				new FileSystemError({
					operation: 'read',
					path: filePath,
					cause: describeError(error),
				}),
		});

		return yield* parseJsonObject(content, filePath);
	});
}

/**
 * Serialize with an indent per level and a prefix on every line after the first
 */
export function marshalIndent(
	value: unknown,
	prefix: string = JSON_MARSHAL_PREFIX,
	indent: string = JSON_MARSHAL_INDENT,
): string {
	const json = JSON.stringify(value, null, indent);
	return prefix === '' ? json : json.replace(/\n/g, `\n${prefix}`);
}

/**
 * Write a value as indented JSON, replacing any prior content
 */
export function writeJsonDataToFile(
	filePath: string,
	value: unknown,
	mode: number,
): Effect.Effect<void, FileSystemError> {
	return Effect.try({
		try: () => writeFileSync(filePath, marshalIndent(value), {mode}),
		catch: (error: unknown) =>
			new FileSystemError({
				operation: 'write',
				path: filePath,
				cause: describeError(error),
			}),
	});
}
