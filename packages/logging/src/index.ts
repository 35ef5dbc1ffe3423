import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

/**
 * Log levels supported by the logger
 */
export const LogLevel = {
	TRACE: 'trace',
	DEBUG: 'debug',
	INFO: 'info',
	WARN: 'warn',
	ERROR: 'error',
	FATAL: 'fatal',
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

/**
 * Credentials that can reach log bindings through request headers, session
 * state or login payloads.
 */
export const REDACTED_PATHS = [
	'password',
	'*.password',
	'headers.authorization',
	'headers.cookie',
	'*.headers.authorization',
	'*.headers.cookie',
	'session.*',
] as const;

export interface LoggerConfig {
	level: LogLevel;
	/** Bound as `service` on every line */
	serviceName: string;
	/** pino-pretty output (dev only) */
	pretty?: boolean | undefined;
	base?: Record<string, unknown> | undefined;
	/** Paths censored in addition to REDACTED_PATHS */
	redact?: readonly string[] | undefined;
	/** Write here instead of stdout; ignored when pretty */
	stream?: DestinationStream | undefined;
}

/**
 * Create a configured Pino logger instance
 */
export function createLogger(config: LoggerConfig): Logger {
	const options: LoggerOptions = {
		level: config.level,
		base: {
			service: config.serviceName,
			...config.base,
		},
		timestamp: pino.stdTimeFunctions.isoTime,
		formatters: {
			level: (label) => ({ level: label }),
		},
		redact: {
			paths: [...REDACTED_PATHS, ...(config.redact ?? [])],
			censor: '[redacted]',
		},
	};

	if (config.pretty) {
		return pino({
			...options,
			transport: {
				target: 'pino-pretty',
				options: {
					colorize: true,
					translateTime: 'SYS:standard',
					ignore: 'pid,hostname',
				},
			},
		});
	}

	return config.stream ? pino(options, config.stream) : pino(options);
}

/**
 * Create a child logger for a pipeline component
 */
export function createComponentLogger(parent: Logger, component: string, bindings: Record<string, unknown> = {}): Logger {
	return parent.child({ component, ...bindings });
}

/**
 * Used by components built without an explicit logger, until the composition
 * root installs its own.
 */
let defaultLogger: Logger = createLogger({ level: LogLevel.INFO, serviceName: 'gatewarden-audit' });

/**
 * Set the default logger instance
 */
export function setDefaultLogger(logger: Logger): void {
	defaultLogger = logger;
}

/**
 * Get the default logger instance
 */
export function getLogger(): Logger {
	return defaultLogger;
}

/**
 * Append-only line sink for mirrored audit records (the "syslog" stream).
 */
export interface SecondaryLogAppender {
	/** Append one line; a trailing newline is added */
	append(line: string): void;
	flush(): void;
	close(): void;
}

/**
 * Secondary log configuration
 */
export interface SecondaryLogConfig {
	/** File path, or "stdout" */
	destination: string;
	/** Write synchronously (tests, short-lived CLI tools) */
	sync?: boolean | undefined;
}

/**
 * Create an append-only line writer over pino's SonicBoom destination.
 *
 * Lines are written verbatim, without pino's JSON envelope, so downstream
 * collectors see `<category> - <json>` exactly.
 */
export function createSecondaryLogAppender(config: SecondaryLogConfig): SecondaryLogAppender {
	const stream = pino.destination({
		dest: config.destination === 'stdout' ? 1 : config.destination,
		sync: config.sync ?? false,
		append: true,
		mkdir: true,
	});

	return {
		append(line: string): void {
			stream.write(`${line}\n`);
		},
		flush(): void {
			stream.flushSync();
		},
		close(): void {
			stream.end();
		},
	};
}
