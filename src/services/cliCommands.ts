import {Effect, Either} from 'effect';
import type {Config, ConfigUpdate} from '../types/index.js';
import {ValidationError} from '../types/errors.js';
import type {ConfigManager, ConfigureError} from './config/configManager.js';

export const CLI_COMMANDS = ['show', 'configure', 'path'] as const;
export type CliCommand = (typeof CLI_COMMANDS)[number];

export interface ConfigureFlags {
	snippetsFile?: string | undefined;
	snippetsDir?: string | undefined;
	editor?: string | undefined;
	filterCmd?: string | undefined;
}

export type CommandOutcome =
	| {kind: 'config'; title: string; config: Config; configFile: string}
	| {kind: 'path'; configFile: string};

function isCliCommand(value: string): value is CliCommand {
	return CLI_COMMANDS.some(command => command === value);
}

/**
 * Resolve the positional arguments to a command; no argument means `show`
 */
export function parseCliCommand(
	input: readonly string[],
): Either.Either<CliCommand, ValidationError> {
	const [first, ...rest] = input;
	if (first === undefined) {
		return Either.right('show');
	}

	if (!isCliCommand(first)) {
		return Either.left(
			new ValidationError({
				field: 'command',
				constraint: `must be one of ${CLI_COMMANDS.join(', ')}`,
				receivedValue: first,
			}),
		);
	}

	if (rest.length > 0) {
		return Either.left(
			new ValidationError({
				field: 'command',
				constraint: 'takes no positional arguments',
				receivedValue: rest,
			}),
		);
	}

	return Either.right(first);
}

/**
 * Keep only the flags the user actually passed
 */
export function toConfigUpdate(flags: ConfigureFlags): ConfigUpdate {
	const update: ConfigUpdate = {};
	if (flags.snippetsFile !== undefined) {
		update.snippetsFile = flags.snippetsFile;
	}
	if (flags.snippetsDir !== undefined) {
		update.snippetsDir = flags.snippetsDir;
	}
	if (flags.editor !== undefined) {
		update.editor = flags.editor;
	}
	if (flags.filterCmd !== undefined) {
		update.filterCmd = flags.filterCmd;
	}
	return update;
}

export function runCliCommand(
	manager: ConfigManager,
	command: CliCommand,
	flags: ConfigureFlags,
): Effect.Effect<CommandOutcome, ConfigureError> {
	return Effect.gen(function* () {
		const configFile = yield* manager.getDefaultConfigFile(
			manager.getDefaultConfigHome(),
		);

		switch (command) {
			case 'path':
				return {kind: 'path', configFile} satisfies CommandOutcome;
			case 'configure': {
				const config = yield* manager.configure(toConfigUpdate(flags));
				return {
					kind: 'config',
					title: 'corgi configuration updated',
					config,
					configFile,
				} satisfies CommandOutcome;
			}
			case 'show': {
				const config = yield* manager.load();
				return {
					kind: 'config',
					title: 'corgi configuration',
					config,
					configFile,
				} satisfies CommandOutcome;
			}
		}
	});
}
