/**
 * Minimal leveled logger for the engine. The finder itself never logs.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';
type LogArgs = readonly unknown[];

export interface Logger {
	debug: (message: string, ...args: LogArgs) => void;
	info: (message: string, ...args: LogArgs) => void;
	warn: (message: string, ...args: LogArgs) => void;
	error: (message: string, ...args: LogArgs) => void;
}

export type LogSink = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

export interface CreateLoggerOptions {
	/** Lowest level that is written; defaults to "warn" */
	level?: LogLevel;
	/** Where lines go; defaults to the global console */
	sink?: LogSink;
	/** Prepended to every message */
	prefix?: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 100,
};

const noop = () => {};

export const noopLogger: Logger = {
	debug: noop,
	info: noop,
	warn: noop,
	error: noop,
};

export function createLogger(options: CreateLoggerOptions = {}): Logger {
	const { level = 'warn', sink = console, prefix = '[freeslot]' } = options;
	const threshold = LEVEL_ORDER[level];

	const write = (at: Exclude<LogLevel, 'silent'>) =>
		LEVEL_ORDER[at] >= threshold
			? (message: string, ...args: LogArgs) => sink[at](`${prefix} ${message}`, ...args)
			: noop;

	return {
		debug: write('debug'),
		info: write('info'),
		warn: write('warn'),
		error: write('error'),
	};
}
