import {describe, it, expect} from 'vitest';
import {
	EMPTY_CONFIG,
	fromConfigFileData,
	isNewConfig,
	toConfigFileData,
} from './index.js';
import type {Config} from './index.js';

describe('Config helpers', () => {
	const populated: Config = {
		snippetsFile: '/home/t/.corgi/snippets.json',
		snippetsDir: '/home/t/.corgi/snippets',
		editor: '/usr/bin/vim',
		filterCmd: '',
	};

	describe('isNewConfig', () => {
		it('should be true for the empty config', () => {
			expect(isNewConfig({...EMPTY_CONFIG})).toBe(true);
		});

		it('should be false as soon as one field is set', () => {
			expect(isNewConfig({...EMPTY_CONFIG, snippetsDir: '/s'})).toBe(false);
			expect(isNewConfig(populated)).toBe(false);
		});
	});

	describe('toConfigFileData', () => {
		it('should use the snake_case file keys in order', () => {
			const data = toConfigFileData(populated);

			expect(Object.keys(data)).toEqual([
				'snippets_file',
				'snippets_dir',
				'editor',
				'filter_cmd',
			]);
			expect(data.snippets_dir).toBe('/home/t/.corgi/snippets');
		});
	});

	describe('fromConfigFileData', () => {
		it('should invert toConfigFileData', () => {
			expect(fromConfigFileData(toConfigFileData(populated))).toEqual(populated);
		});

		it('should fill missing keys with empty strings', () => {
			expect(fromConfigFileData({editor: 'nano'})).toEqual({
				...EMPTY_CONFIG,
				editor: 'nano',
			});
		});
	});
});
