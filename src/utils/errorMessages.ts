import type {ConfigManagerError} from '../types/errors.js';

/**
 * One-line, user-facing description of a config manager failure
 */
export const formatErrorMessage = (error: ConfigManagerError): string => {
	switch (error._tag) {
		case 'FileSystemError':
			return `File ${error.operation} failed for ${error.path}: ${error.cause}`;
		case 'ConfigError':
			return `Configuration error (${error.reason}) in ${error.configPath}: ${error.details}`;
		case 'EditorNotFoundError':
			return error.message;
		case 'MissingDefaultFilterCmdError':
			return `No filter command found on PATH (tried ${error.candidates.join(', ')})`;
		case 'ValidationError':
			return `Validation failed for ${error.field}: ${error.constraint}`;
	}
};
