import * as fs from 'fs';
import * as path from 'path';
import {format} from 'util';
import os from 'os';
import {ENV_LOG_FILE, ENV_XDG_STATE_HOME} from '../constants/env.js';

export interface LoggerConfig {
	/** Rotate once the log reaches this many bytes (default: 5MB) */
	maxSizeBytes: number;
	/** Rotated files kept next to the live log (default: 3) */
	maxRotatedFiles: number;
	/** Echo ERROR entries on stderr (default: false, the CLI reports its own failures) */
	logErrorsToConsole: boolean;
}

export enum LogLevel {
	DEBUG = 'DEBUG',
	INFO = 'INFO',
	WARN = 'WARN',
	ERROR = 'ERROR',
	LOG = 'LOG',
}

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Resolve the log file: CORGI_LOG_FILE, then $XDG_STATE_HOME/corgi,
 * then the platform's per-user log directory.
 */
export function resolveLogPath(
	env: Env,
	platform: NodeJS.Platform = process.platform,
	homeDir: string = os.homedir(),
): string {
	const override = env[ENV_LOG_FILE];
	if (override) {
		return override;
	}

	const xdgStateHome = env[ENV_XDG_STATE_HOME];
	if (xdgStateHome) {
		return path.join(xdgStateHome, 'corgi', 'corgi.log');
	}

	if (platform === 'darwin') {
		return path.join(homeDir, 'Library', 'Logs', 'corgi', 'corgi.log');
	}

	return path.join(homeDir, '.local', 'state', 'corgi', 'corgi.log');
}

/**
 * Append-only file logger with size-based rotation.
 * Logging problems never reach the caller.
 */
export class Logger {
	private readonly logFile: string;
	private readonly config: LoggerConfig;

	constructor(config: Partial<LoggerConfig> = {}, env: Env = process.env) {
		this.config = {
			maxSizeBytes: config.maxSizeBytes ?? 5 * 1024 * 1024,
			maxRotatedFiles: config.maxRotatedFiles ?? 3,
			logErrorsToConsole: config.logErrorsToConsole ?? false,
		};

		this.logFile = resolveLogPath(env);
		this.initializeLogFile();
	}

	private initializeLogFile(): void {
		try {
			fs.mkdirSync(path.dirname(this.logFile), {recursive: true, mode: 0o700});
			if (!fs.existsSync(this.logFile)) {
				fs.writeFileSync(this.logFile, '', 'utf8');
			}
		} catch (_error) {
			// Unwritable log location: entries are dropped
		}
	}

	/**
	 * corgi.log.2 -> .3, corgi.log.1 -> .2, corgi.log -> .1
	 */
	private rotateLogIfNeeded(): void {
		const stats = fs.statSync(this.logFile, {throwIfNoEntry: false});
		if (!stats || stats.size < this.config.maxSizeBytes) {
			return;
		}

		const oldest = `${this.logFile}.${this.config.maxRotatedFiles}`;
		if (fs.existsSync(oldest)) {
			fs.unlinkSync(oldest);
		}

		for (let i = this.config.maxRotatedFiles - 1; i >= 0; i--) {
			const from = i === 0 ? this.logFile : `${this.logFile}.${i}`;
			if (fs.existsSync(from)) {
				fs.renameSync(from, `${this.logFile}.${i + 1}`);
			}
		}

		fs.writeFileSync(this.logFile, '', 'utf8');
	}

	private writeLog(level: LogLevel, args: unknown[]): void {
		try {
			this.rotateLogIfNeeded();
			const line = `[${new Date().toISOString()}] [${level}] ${format(...args)}\n`;
			fs.appendFileSync(this.logFile, line, 'utf8');
		} catch (_error) {
			// Same as above: a failed write loses the entry only
		}

		if (level === LogLevel.ERROR && this.config.logErrorsToConsole) {
			console.error(`[${level}]`, ...args);
		}
	}

	getLogPath(): string {
		return this.logFile;
	}

	log(...args: unknown[]): void {
		this.writeLog(LogLevel.LOG, args);
	}

	info(...args: unknown[]): void {
		this.writeLog(LogLevel.INFO, args);
	}

	warn(...args: unknown[]): void {
		this.writeLog(LogLevel.WARN, args);
	}

	error(...args: unknown[]): void {
		this.writeLog(LogLevel.ERROR, args);
	}

	/** File only, never echoed */
	debug(...args: unknown[]): void {
		this.writeLog(LogLevel.DEBUG, args);
	}
}

export const logger = new Logger();
