import React from 'react';
import {Box, Text} from 'ink';
import type {Config} from '../types/index.js';

interface ConfigSummaryProps {
	config: Config;
	configFile: string;
	title?: string;
}

const ROWS: ReadonlyArray<{label: string; field: keyof Config}> = [
	{label: 'Snippets file', field: 'snippetsFile'},
	{label: 'Snippets dir', field: 'snippetsDir'},
	{label: 'Editor', field: 'editor'},
	{label: 'Filter command', field: 'filterCmd'},
];

const ConfigSummary: React.FC<ConfigSummaryProps> = ({
	config,
	configFile,
	title = 'corgi configuration',
}) => {
	return (
		<Box flexDirection="column">
			<Text bold color="green">
				{title}
			</Text>
			<Text dimColor>{configFile}</Text>
			<Box flexDirection="column" marginTop={1}>
				{ROWS.map(({label, field}) => (
					<Box key={field}>
						<Box width={16}>
							<Text>{label}</Text>
						</Box>
						{config[field] ? (
							<Text color="cyan">{config[field]}</Text>
						) : (
							<Text dimColor>(not set)</Text>
						)}
					</Box>
				))}
			</Box>
		</Box>
	);
};

export default ConfigSummary;
