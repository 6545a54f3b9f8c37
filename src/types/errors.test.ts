import {describe, it, expect} from 'vitest';
import {Effect, Either} from 'effect';
import {
	ConfigError,
	EditorNotFoundError,
	FileSystemError,
	MissingDefaultFilterCmdError,
	ValidationError,
} from './errors.js';
import type {ConfigManagerError} from './errors.js';

/**
 * Tests for structured error types using Effect-ts Data.TaggedError
 */
describe('Error Types', () => {
	describe('FileSystemError', () => {
		it('should create FileSystemError with required fields', () => {
			const error = new FileSystemError({
				operation: 'mkdir',
				path: '/home/t/.corgi',
				cause: 'ENOTDIR: not a directory',
			});

			expect(error).toBeInstanceOf(Error);
			expect(error._tag).toBe('FileSystemError');
			expect(error.operation).toBe('mkdir');
			expect(error.path).toBe('/home/t/.corgi');
			expect(error.cause).toBe('ENOTDIR: not a directory');
		});
	});

	describe('ConfigError', () => {
		it('should carry the reason and details', () => {
			const error = new ConfigError({
				configPath: '/home/t/.corgi/corgi_conf.json',
				reason: 'parse',
				details: 'Unexpected end of JSON input',
			});

			expect(error._tag).toBe('ConfigError');
			expect(error.reason).toBe('parse');
			expect(error.details).toBe('Unexpected end of JSON input');
		});
	});

	describe('EditorNotFoundError', () => {
		it('should build its message from the editor and remedy', () => {
			const error = new EditorNotFoundError({
				editor: 'vim',
				remedy: 'corgi configure --editor <path>',
			});

			expect(error._tag).toBe('EditorNotFoundError');
			expect(error.message).toBe(
				'could not find vim (default) in $PATH, update your editor choice with "corgi configure --editor <path>"',
			);
		});
	});

	describe('MissingDefaultFilterCmdError', () => {
		it('should list the candidates that were tried', () => {
			const error = new MissingDefaultFilterCmdError({
				candidates: ['peco', 'fzf'],
			});

			expect(error._tag).toBe('MissingDefaultFilterCmdError');
			expect(error.candidates).toEqual(['peco', 'fzf']);
			expect(error.message).toBe('missing default filter cmd');
		});
	});

	describe('ValidationError', () => {
		it('should keep the received value', () => {
			const error = new ValidationError({
				field: 'editor',
				constraint: 'must not be empty',
				receivedValue: '',
			});

			expect(error.field).toBe('editor');
			expect(error.receivedValue).toBe('');
		});
	});

	describe('ConfigManagerError union', () => {
		it('should narrow on _tag', () => {
			const summarize = (error: ConfigManagerError): string => {
				switch (error._tag) {
					case 'FileSystemError':
						return error.operation;
					case 'ConfigError':
						return error.reason;
					case 'EditorNotFoundError':
						return error.editor;
					case 'MissingDefaultFilterCmdError':
						return error.candidates.join('|');
					case 'ValidationError':
						return error.field;
				}
			};

			expect(
				summarize(new ConfigError({configPath: '/c', reason: 'validation', details: ''})),
			).toBe('validation');
			expect(summarize(new EditorNotFoundError({editor: 'vim', remedy: ''}))).toBe(
				'vim',
			);
		});

		it('should be recoverable by tag inside Effect', () => {
			const program = Effect.catchTag(
				Effect.fail(new MissingDefaultFilterCmdError({candidates: ['fzf']})),
				'MissingDefaultFilterCmdError',
				() => Effect.succeed(''),
			);

			expect(Effect.runSync(program)).toBe('');
		});

		it('should surface as Left through Effect.either', () => {
			const result = Effect.runSync(
				Effect.either(
					Effect.fail(
						new FileSystemError({operation: 'write', path: '/c', cause: 'EROFS'}),
					),
				),
			);

			expect(Either.isLeft(result)).toBe(true);
		});
	});
});
