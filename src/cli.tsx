#!/usr/bin/env node
import React from 'react';
import {render} from 'ink';
import meow from 'meow';
import {Effect, Either} from 'effect';
import ConfigSummary from './components/ConfigSummary.js';
import {createConfigManager} from './services/config/index.js';
import {parseCliCommand, runCliCommand} from './services/cliCommands.js';
import {formatErrorMessage} from './utils/errorMessages.js';
import {logger} from './utils/logger.js';

const cli = meow(
	`
	Usage
	  $ corgi-config [show]
	  $ corgi-config configure [options]
	  $ corgi-config path

	Options
	  --help              Show help
	  --version           Show version
	  --snippets-file     Snippets storage file (configure)
	  --snippets-dir      Snippets directory (configure)
	  --editor            Editor executable (configure)
	  --filter-cmd        Fuzzy filter executable, empty to unset (configure)

	Examples
	  $ corgi-config
	  $ corgi-config configure --editor /usr/bin/nvim
	  $ corgi-config configure --filter-cmd ""
`,
	{
		importMeta: import.meta,
		flags: {
			snippetsFile: {
				type: 'string',
			},
			snippetsDir: {
				type: 'string',
			},
			editor: {
				type: 'string',
			},
			filterCmd: {
				type: 'string',
			},
		},
	},
);

const command = parseCliCommand(cli.input);
if (Either.isLeft(command)) {
	console.error(`Error: ${formatErrorMessage(command.left)}`);
	process.exit(1);
}

const result = Effect.runSync(
	Effect.either(
		runCliCommand(createConfigManager(), command.right, cli.flags),
	),
);

if (Either.isLeft(result)) {
	logger.error(formatErrorMessage(result.left));
	console.error(`Error: ${formatErrorMessage(result.left)}`);
	process.exit(1);
}

const outcome = result.right;
if (outcome.kind === 'path') {
	console.log(outcome.configFile);
} else {
	render(
		<ConfigSummary
			title={outcome.title}
			config={outcome.config}
			configFile={outcome.configFile}
		/>,
	).unmount();
}
