import {describe, it, expect} from 'vitest';
import React from 'react';
import {render} from 'ink-testing-library';
import stripAnsi from 'strip-ansi';
import ConfigSummary from './ConfigSummary.js';

describe('ConfigSummary', () => {
	const config = {
		snippetsFile: '/home/t/.corgi/snippets.json',
		snippetsDir: '/home/t/.corgi/snippets',
		editor: '/usr/bin/vim',
		filterCmd: '/usr/bin/fzf',
	};

	it('should render the title and config file path', () => {
		const {lastFrame} = render(
			<ConfigSummary config={config} configFile="/home/t/.corgi/corgi_conf.json" />,
		);

		const lines = stripAnsi(lastFrame() ?? '').split('\n');
		expect(lines[0]).toBe('corgi configuration');
		expect(lines[1]).toBe('/home/t/.corgi/corgi_conf.json');
	});

	it('should render every field with its label', () => {
		const {lastFrame} = render(
			<ConfigSummary config={config} configFile="/c.json" />,
		);

		const output = stripAnsi(lastFrame() ?? '');
		expect(output).toContain('Snippets file   /home/t/.corgi/snippets.json');
		expect(output).toContain('Snippets dir    /home/t/.corgi/snippets');
		expect(output).toContain('Editor          /usr/bin/vim');
		expect(output).toContain('Filter command  /usr/bin/fzf');
	});

	it('should mark empty fields as not set', () => {
		const {lastFrame} = render(
			<ConfigSummary config={{...config, filterCmd: ''}} configFile="/c.json" />,
		);

		expect(stripAnsi(lastFrame() ?? '')).toContain(
			'Filter command  (not set)',
		);
	});

	it('should use a custom title', () => {
		const {lastFrame} = render(
			<ConfigSummary
				config={config}
				configFile="/c.json"
				title="corgi configuration updated"
			/>,
		);

		expect(stripAnsi(lastFrame() ?? '').split('\n')[0]).toBe(
			'corgi configuration updated',
		);
	});
});
