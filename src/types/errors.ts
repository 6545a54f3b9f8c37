import {Data} from 'effect';

/**
 * File system operation errors
 * Used when file system operations (read, write, mkdir, stat) fail
 */
export class FileSystemError extends Data.TaggedError('FileSystemError')<{
	readonly operation: 'read' | 'write' | 'mkdir' | 'stat';
	readonly path: string;
	readonly cause: string;
}> {}

/**
 * Configuration errors
 * Used when the config file content cannot be parsed or has the wrong shape
 */
export class ConfigError extends Data.TaggedError('ConfigError')<{
	readonly configPath: string;
	readonly reason: 'parse' | 'validation';
	readonly details: string;
}> {}

/**
 * Raised when no EDITOR is set and the fallback editor is not on PATH
 */
export class EditorNotFoundError extends Data.TaggedError(
	'EditorNotFoundError',
)<{
	readonly editor: string;
	readonly remedy: string;
}> {
	get message(): string {
		return `could not find ${this.editor} (default) in $PATH, update your editor choice with "${this.remedy}"`;
	}
}

/**
 * Sentinel for "no fallback filter command on PATH".
 * Loading tolerates it and leaves the filter command empty.
 */
export class MissingDefaultFilterCmdError extends Data.TaggedError(
	'MissingDefaultFilterCmdError',
)<{
	readonly candidates: readonly string[];
}> {
	get message(): string {
		return 'missing default filter cmd';
	}
}

/**
 * Validation errors
 * Used when configure input is rejected
 */
export class ValidationError extends Data.TaggedError('ValidationError')<{
	readonly field: string;
	readonly constraint: string;
	readonly receivedValue: unknown;
}> {}

/**
 * Union type for all config manager errors
 * Enables discriminated union type narrowing using _tag property
 */
export type ConfigManagerError =
	| FileSystemError
	| ConfigError
	| EditorNotFoundError
	| MissingDefaultFilterCmdError
	| ValidationError;
