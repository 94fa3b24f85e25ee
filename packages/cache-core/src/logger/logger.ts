/**
 * @fileoverview Leveled console logger with named prefixes
 */

import chalk from 'chalk';

export enum LogLevel {
	SILENT = 0,
	ERROR = 1,
	WARN = 2,
	INFO = 3,
	DEBUG = 4
}

/**
 * Environment variable read once at startup for the global level
 */
export const LOG_LEVEL_ENV = 'QUERY_CACHE_LOG_LEVEL';

const LEVEL_NAMES = new Map<string, LogLevel>([
	['silent', LogLevel.SILENT],
	['error', LogLevel.ERROR],
	['warn', LogLevel.WARN],
	['info', LogLevel.INFO],
	['debug', LogLevel.DEBUG]
]);

/**
 * Parse a level name (case-insensitive). Unknown names yield undefined.
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
	if (value === undefined) return undefined;
	return LEVEL_NAMES.get(value.trim().toLowerCase());
}

let globalLevel: LogLevel = parseLogLevel(process.env[LOG_LEVEL_ENV]) ?? LogLevel.WARN;

export function setGlobalLogLevel(level: LogLevel): void {
	globalLevel = level;
}

export function getGlobalLogLevel(): LogLevel {
	return globalLevel;
}

export interface LoggerConfig {
	/** Fixed level for this logger; follows the global level when omitted */
	level?: LogLevel;
	/** Name shown as `[prefix]` before every message */
	prefix?: string;
	/** Colorize level tags */
	colors?: boolean;
	/** Prepend an ISO timestamp */
	timestamp?: boolean;
}

export class Logger {
	private readonly config: LoggerConfig;

	constructor(config: LoggerConfig = {}) {
		this.config = { colors: true, timestamp: false, ...config };
	}

	getLevel(): LogLevel {
		return this.config.level ?? globalLevel;
	}

	isLevelEnabled(level: LogLevel): boolean {
		return level !== LogLevel.SILENT && level <= this.getLevel();
	}

	error(message: string, ...args: unknown[]): void {
		if (this.isLevelEnabled(LogLevel.ERROR)) {
			console.error(this.format(LogLevel.ERROR, message), ...args);
		}
	}

	warn(message: string, ...args: unknown[]): void {
		if (this.isLevelEnabled(LogLevel.WARN)) {
			console.warn(this.format(LogLevel.WARN, message), ...args);
		}
	}

	info(message: string, ...args: unknown[]): void {
		if (this.isLevelEnabled(LogLevel.INFO)) {
			console.log(this.format(LogLevel.INFO, message), ...args);
		}
	}

	debug(message: string, ...args: unknown[]): void {
		if (this.isLevelEnabled(LogLevel.DEBUG)) {
			console.log(this.format(LogLevel.DEBUG, message), ...args);
		}
	}

	/**
	 * Create a logger whose prefix extends this one (`Parent:child`)
	 */
	child(name: string): Logger {
		const prefix = this.config.prefix ? `${this.config.prefix}:${name}` : name;
		return new Logger({ ...this.config, prefix });
	}

	private format(level: LogLevel, message: string): string {
		const parts: string[] = [];
		if (this.config.timestamp) {
			parts.push(new Date().toISOString());
		}
		parts.push(this.levelTag(level));
		if (this.config.prefix) {
			parts.push(`[${this.config.prefix}]`);
		}
		parts.push(message);
		return parts.join(' ');
	}

	private levelTag(level: LogLevel): string {
		const tag = LogLevel[level];
		if (!this.config.colors) return tag;

		switch (level) {
			case LogLevel.ERROR:
				return chalk.red(tag);
			case LogLevel.WARN:
				return chalk.yellow(tag);
			case LogLevel.INFO:
				return chalk.blue(tag);
			default:
				return chalk.gray(tag);
		}
	}
}
