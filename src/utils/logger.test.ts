import {describe, it, expect, beforeEach, afterEach, vi} from 'vitest';
import path from 'path';
import {existsSync, readFileSync, writeFileSync} from 'fs';
import {Logger, resolveLogPath} from './logger.js';
import {createTempDir, removeTempDir} from './testHelpers.js';

describe('resolveLogPath', () => {
	it('should honour CORGI_LOG_FILE first', () => {
		expect(
			resolveLogPath(
				{CORGI_LOG_FILE: '/tmp/custom.log', XDG_STATE_HOME: '/state'},
				'linux',
				'/home/t',
			),
		).toBe('/tmp/custom.log');
	});

	it('should use XDG_STATE_HOME next', () => {
		expect(resolveLogPath({XDG_STATE_HOME: '/state'}, 'darwin', '/Users/t')).toBe(
			'/state/corgi/corgi.log',
		);
	});

	it('should use ~/Library/Logs on macOS', () => {
		expect(resolveLogPath({}, 'darwin', '/Users/t')).toBe(
			'/Users/t/Library/Logs/corgi/corgi.log',
		);
	});

	it('should use ~/.local/state elsewhere', () => {
		expect(resolveLogPath({}, 'linux', '/home/t')).toBe(
			'/home/t/.local/state/corgi/corgi.log',
		);
	});
});

describe('Logger', () => {
	let tempDir: string;
	let logFile: string;

	beforeEach(() => {
		tempDir = createTempDir();
		logFile = path.join(tempDir, 'logs', 'corgi.log');
	});

	afterEach(() => {
		removeTempDir(tempDir);
		vi.restoreAllMocks();
	});

	it('should create the log file and its directory', () => {
		const logger = new Logger({}, {CORGI_LOG_FILE: logFile});

		expect(logger.getLogPath()).toBe(logFile);
		expect(existsSync(logFile)).toBe(true);
	});

	it('should append leveled, formatted lines', () => {
		const logger = new Logger({}, {CORGI_LOG_FILE: logFile});

		logger.info('Saved configuration to %s', '/c.json');
		logger.warn('No filter command found');

		const lines = readFileSync(logFile, 'utf-8').trimEnd().split('\n');
		expect(lines).toHaveLength(2);
		expect(lines[0]).toMatch(
			/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[INFO\] Saved configuration to \/c\.json$/,
		);
		expect(lines[1]).toMatch(/\[WARN\] No filter command found$/);
	});

	it('should rotate once the size limit is reached', () => {
		const logger = new Logger(
			{maxSizeBytes: 10, maxRotatedFiles: 2},
			{CORGI_LOG_FILE: logFile},
		);
		writeFileSync(logFile, 'first generation\n');
		writeFileSync(`${logFile}.1`, 'older generation\n');

		logger.debug('fresh entry');

		expect(readFileSync(`${logFile}.1`, 'utf-8')).toBe('first generation\n');
		expect(readFileSync(`${logFile}.2`, 'utf-8')).toBe('older generation\n');
		expect(readFileSync(logFile, 'utf-8')).toMatch(/\[DEBUG\] fresh entry\n$/);
	});

	it('should echo errors to the console only when asked', () => {
		const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});

		new Logger({}, {CORGI_LOG_FILE: logFile}).error('quiet');
		expect(consoleError).not.toHaveBeenCalled();

		new Logger({logErrorsToConsole: true}, {CORGI_LOG_FILE: logFile}).error(
			'loud',
		);
		expect(consoleError).toHaveBeenCalledWith('[ERROR]', 'loud');
	});

	it('should not throw when the log location is unusable', () => {
		const blocker = path.join(tempDir, 'blocker');
		writeFileSync(blocker, '');
		const logger = new Logger({}, {CORGI_LOG_FILE: path.join(blocker, 'x.log')});

		expect(() => logger.info('dropped')).not.toThrow();
	});
});
