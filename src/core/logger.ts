/**
 * Centralized logging system
 *
 * Named loggers share one winston logger; level filtering happens per named
 * logger so tests and callers can quiet a single component.
 */

import * as winston from 'winston';

export type LogContext = Record<string, unknown>;

export enum LogLevel {
	DEBUG = 0,
	INFO = 1,
	WARN = 2,
	ERROR = 3,
	FATAL = 4,
	SILENT = 5,
}

const WINSTON_LEVELS: Record<Exclude<LogLevel, LogLevel.SILENT>, string> = {
	[LogLevel.DEBUG]: 'debug',
	[LogLevel.INFO]: 'info',
	[LogLevel.WARN]: 'warn',
	[LogLevel.ERROR]: 'error',
	[LogLevel.FATAL]: 'error',
};

function serializeContext(context: object): string {
	return JSON.stringify(context, (_key, value: unknown) =>
		value instanceof Error ? { name: value.name, message: value.message } : value
	);
}

function createSink(): winston.Logger {
	return winston.createLogger({
		level: 'debug',
		format: winston.format.combine(
			winston.format.timestamp(),
			winston.format.printf((info) => {
				const { timestamp, level, message, component, context } = info;
				const suffix =
					context && typeof context === 'object' && Object.keys(context).length > 0
						? ` ${serializeContext(context)}`
						: '';
				return `[${String(timestamp)}] [${level.toUpperCase()}] [${String(component)}] ${String(message)}${suffix}`;
			})
		),
		transports: [new winston.transports.Console({ stderrLevels: ['error', 'warn'] })],
	});
}

export class Logger {
	constructor(
		private readonly name: string,
		private level: LogLevel,
		private readonly sink: winston.Logger
	) {}

	setLevel(level: LogLevel): void {
		this.level = level;
	}

	getLevel(): LogLevel {
		return this.level;
	}

	isEnabled(level: LogLevel): boolean {
		return level !== LogLevel.SILENT && level >= this.level;
	}

	private log(level: Exclude<LogLevel, LogLevel.SILENT>, message: string, context?: LogContext): void {
		if (!this.isEnabled(level)) return;
		this.sink.log({
			level: WINSTON_LEVELS[level],
			message,
			component: this.name,
			context,
		});
	}

	debug(message: string, context?: LogContext): void {
		this.log(LogLevel.DEBUG, message, context);
	}

	info(message: string, context?: LogContext): void {
		this.log(LogLevel.INFO, message, context);
	}

	warn(message: string, context?: LogContext): void {
		this.log(LogLevel.WARN, message, context);
	}

	error(message: string, context?: LogContext): void {
		this.log(LogLevel.ERROR, message, context);
	}

	fatal(message: string, context?: LogContext): void {
		this.log(LogLevel.FATAL, message, context);
	}

	child(name: string): Logger {
		return new Logger(`${this.name}:${name}`, this.level, this.sink);
	}
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
	switch (value?.trim().toUpperCase()) {
		case 'DEBUG':
			return LogLevel.DEBUG;
		case 'INFO':
			return LogLevel.INFO;
		case 'WARN':
			return LogLevel.WARN;
		case 'ERROR':
			return LogLevel.ERROR;
		case 'FATAL':
			return LogLevel.FATAL;
		case 'SILENT':
			return LogLevel.SILENT;
		default:
			return undefined;
	}
}

// Logger factory
class LoggerFactory {
	private loggers = new Map<string, Logger>();
	private defaultLevel: LogLevel;
	private readonly sink = createSink();

	constructor() {
		this.defaultLevel = parseLogLevel(process.env.LOG_LEVEL) ?? LogLevel.INFO;
	}

	getLogger(name: string): Logger {
		let logger = this.loggers.get(name);
		if (!logger) {
			logger = new Logger(name, this.defaultLevel, this.sink);
			this.loggers.set(name, logger);
		}
		return logger;
	}

	setGlobalLevel(level: LogLevel): void {
		this.defaultLevel = level;
		for (const logger of this.loggers.values()) {
			logger.setLevel(level);
		}
	}
}

// Global factory instance
const factory = new LoggerFactory();

export function getLogger(name: string): Logger {
	return factory.getLogger(name);
}

export function setGlobalLogLevel(level: LogLevel): void {
	factory.setGlobalLevel(level);
}
