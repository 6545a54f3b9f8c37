import os from 'os';
import path from 'path';
import {defineConfig} from 'vitest/config';

export default defineConfig({
	test: {
		watch: false,
		pool: 'threads',
		environment: 'node',
		include: ['src/**/*.test.{ts,tsx}'],
		env: {
			CORGI_LOG_FILE: path.join(os.tmpdir(), 'corgi-vitest.log'),
		},
		coverage: {
			reporter: ['text', 'json', 'html'],
			exclude: ['node_modules/', 'dist/', '**/*.d.ts', '**/*.config.*'],
		},
	},
});
