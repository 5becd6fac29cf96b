/**
 * Logger - File-based logging with hourly rotation.
 *
 * Provides multiple logger implementations:
 * - createLogger: Per-service hourly log files under the symdex home dir
 * - createConsoleLogger: Writes to stderr
 * - createNullLogger: No-op for testing
 */

import fs from 'node:fs';
import {
	getServiceLogPath,
	getServiceLogsDir,
	type ServiceName,
} from './constants.js';

// ============================================================================
// Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
	debug(component: string, message: string, data?: object): void;
	info(component: string, message: string, data?: object): void;
	warn(component: string, message: string, data?: object): void;
	error(component: string, message: string, error?: Error): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

// ============================================================================
// Formatting
// ============================================================================

/**
 * Format a log entry.
 */
export function formatEntry(
	level: LogLevel,
	component: string,
	message: string,
	extra?: object | Error,
): string {
	const timestamp = new Date().toISOString();
	const levelStr = level.toUpperCase().padEnd(5);
	let entry = `[${timestamp}] [${levelStr}] ${component}: ${message}`;

	if (extra) {
		if (extra instanceof Error) {
			entry += `\n  Error: ${extra.message}`;
			if (extra.stack) {
				entry += `\n  Stack: ${extra.stack}`;
			}
		} else {
			entry += `\n  ${JSON.stringify(extra)}`;
		}
	}

	return entry;
}

/**
 * Build a Logger from a line sink, dropping entries below minLevel.
 */
function createSinkLogger(
	sink: (entry: string) => void,
	minLevel: LogLevel,
): Logger {
	const enabled = (level: LogLevel) =>
		LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];

	return {
		debug(component: string, message: string, data?: object) {
			if (enabled('debug')) sink(formatEntry('debug', component, message, data));
		},

		info(component: string, message: string, data?: object) {
			if (enabled('info')) sink(formatEntry('info', component, message, data));
		},

		warn(component: string, message: string, data?: object) {
			if (enabled('warn')) sink(formatEntry('warn', component, message, data));
		},

		error(component: string, message: string, error?: Error) {
			if (enabled('error')) sink(formatEntry('error', component, message, error));
		},
	};
}

// ============================================================================
// Logger Implementations
// ============================================================================

/**
 * Create a service-specific logger with hourly rotation.
 *
 * Logs are written to: {home}/logs/{service}/YYYY-MM-DD-HH.log
 *
 * @example
 * const logger = createLogger('indexer');
 * logger.error('Pipeline', 'Write failed', error);
 * // Writes to: ~/.local/share/symdex/logs/indexer/2024-01-11-15.log
 */
export function createLogger(
	service: ServiceName,
	minLevel: LogLevel = 'info',
): Logger {
	function write(entry: string) {
		try {
			// The home dir can be removed while the process runs
			fs.mkdirSync(getServiceLogsDir(service), {recursive: true});
			// Recalculated each write for rotation
			fs.appendFileSync(getServiceLogPath(service), entry + '\n');
		} catch (error) {
			process.stderr.write(
				`symdex: log write failed (${error instanceof Error ? error.message : String(error)})\n${entry}\n`,
			);
		}
	}

	return createSinkLogger(write, minLevel);
}

/**
 * Create a logger that writes to stderr.
 */
export function createConsoleLogger(minLevel: LogLevel = 'info'): Logger {
	return createSinkLogger(entry => {
		process.stderr.write(entry + '\n');
	}, minLevel);
}

/**
 * Create a no-op logger for testing or when logging is disabled.
 */
export function createNullLogger(): Logger {
	return {
		debug() {},
		info() {},
		warn() {},
		error() {},
	};
}

/**
 * Normalise an unknown thrown value for Logger.error.
 */
export function toError(value: unknown): Error {
	return value instanceof Error ? value : new Error(String(value));
}

export type {ServiceName};
