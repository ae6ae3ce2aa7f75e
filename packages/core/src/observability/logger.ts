/**
 * Structured logger for workdeck.
 *
 * Level filtering, pluggable transports, child loggers and contextual
 * metadata. Entries below the active level are dropped before any
 * formatting work happens.
 */

// ─── Log Level ───────────────────────────────────────────────────────────────

export enum LogLevel {
	DEBUG = 0,
	INFO = 1,
	WARN = 2,
	ERROR = 3,
	FATAL = 4,
}

const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
	[LogLevel.DEBUG]: "DEBUG",
	[LogLevel.INFO]: "INFO",
	[LogLevel.WARN]: "WARN",
	[LogLevel.ERROR]: "ERROR",
	[LogLevel.FATAL]: "FATAL",
};

const LOG_LEVEL_PARSE: Record<string, LogLevel> = {
	debug: LogLevel.DEBUG,
	info: LogLevel.INFO,
	warn: LogLevel.WARN,
	error: LogLevel.ERROR,
	fatal: LogLevel.FATAL,
};

/** Parse a level name (`"warn"`, `"ERROR"`). Returns undefined for unknown names. */
export function parseLogLevel(name: string): LogLevel | undefined {
	return LOG_LEVEL_PARSE[name.trim().toLowerCase()];
}

// ─── Types ───────────────────────────────────────────────────────────────────

export interface LogEntry {
	/** ISO-8601 timestamp */
	timestamp: string;
	level: LogLevel;
	levelName: string;
	message: string;
	/** Structured context metadata */
	context: Record<string, unknown>;
	error?: { name: string; message: string; stack?: string };
	/** Logger name, e.g. `"config:loader"` */
	logger: string;
}

export interface LogTransport {
	write(entry: LogEntry): void;
}

export interface LoggerConfig {
	/** Minimum level to emit. */
	level?: LogLevel;
	/** Output transports. Defaults to a single {@link ConsoleTransport} on stderr. */
	transports?: LogTransport[];
	/** Context merged into every entry. */
	defaultContext?: Record<string, unknown>;
}

// ─── Global Configuration ────────────────────────────────────────────────────

let globalConfig: LoggerConfig = {};

/**
 * Configure global logging defaults. Affects loggers created after this call.
 */
export function configureLogging(config: LoggerConfig): void {
	globalConfig = { ...config };
}

/** Reset global config to defaults. Primarily for testing. */
export function resetLoggingConfig(): void {
	globalConfig = {};
}

// ─── Transports ──────────────────────────────────────────────────────────────

const ANSI_RESET = "\x1b[0m";
const ANSI_DIM = "\x1b[2m";

const LEVEL_COLORS: Record<LogLevel, string> = {
	[LogLevel.DEBUG]: "\x1b[36m",
	[LogLevel.INFO]: "\x1b[32m",
	[LogLevel.WARN]: "\x1b[33m",
	[LogLevel.ERROR]: "\x1b[31m",
	[LogLevel.FATAL]: "\x1b[35;1m",
};

/**
 * Human-readable single-line output.
 *
 * Writes to stderr so that command output on stdout stays machine-readable.
 */
export class ConsoleTransport implements LogTransport {
	private readonly useColors: boolean;
	private readonly out: (line: string) => void;

	constructor(opts?: { colors?: boolean; write?: (line: string) => void }) {
		this.useColors = opts?.colors ?? (process.stderr.isTTY ?? false);
		this.out = opts?.write ?? ((line) => process.stderr.write(line));
	}

	write(entry: LogEntry): void {
		const ts = entry.timestamp.slice(11, 23); // HH:mm:ss.SSS
		const lvl = LOG_LEVEL_NAMES[entry.level].padEnd(5);

		let line = this.useColors
			? `${ANSI_DIM}${ts}${ANSI_RESET} ${LEVEL_COLORS[entry.level]}${lvl}${ANSI_RESET} [${entry.logger}] ${entry.message}`
			: `${ts} ${lvl} [${entry.logger}] ${entry.message}`;

		const ctxKeys = Object.keys(entry.context);
		if (ctxKeys.length > 0) {
			const ctxStr = ctxKeys.map((k) => `${k}=${JSON.stringify(entry.context[k])}`).join(" ");
			line += this.useColors ? ` ${ANSI_DIM}${ctxStr}${ANSI_RESET}` : ` ${ctxStr}`;
		}
		if (entry.error) {
			line += `\n  ${entry.error.name}: ${entry.error.message}`;
		}

		this.out(line + "\n");
	}
}

/** One JSON object per line. */
export class JsonTransport implements LogTransport {
	private readonly out: (line: string) => void;

	constructor(opts?: { write?: (line: string) => void }) {
		this.out = opts?.write ?? ((line) => process.stderr.write(line));
	}

	write(entry: LogEntry): void {
		const obj: Record<string, unknown> = {
			timestamp: entry.timestamp,
			level: entry.levelName,
			logger: entry.logger,
			message: entry.message,
		};
		if (Object.keys(entry.context).length > 0) obj.context = entry.context;
		if (entry.error) obj.error = entry.error;
		this.out(JSON.stringify(obj) + "\n");
	}
}

// ─── Logger ──────────────────────────────────────────────────────────────────

/**
 * Effective level: `LOG_LEVEL` env, then explicit config, then global config,
 * then WARN. A CLI tool stays quiet unless asked.
 */
function resolveLevel(configLevel?: LogLevel): LogLevel {
	const envLevel = process.env.LOG_LEVEL ? parseLogLevel(process.env.LOG_LEVEL) : undefined;
	if (envLevel !== undefined) return envLevel;
	if (configLevel !== undefined) return configLevel;
	if (globalConfig.level !== undefined) return globalConfig.level;
	return LogLevel.WARN;
}

export class Logger {
	private readonly name: string;
	private readonly level: LogLevel;
	private readonly transports: LogTransport[];
	private readonly context: Record<string, unknown>;

	constructor(name: string, config?: LoggerConfig) {
		this.name = name;
		this.level = resolveLevel(config?.level);
		this.transports = config?.transports ?? globalConfig.transports ?? [new ConsoleTransport()];
		this.context = {
			...(globalConfig.defaultContext ?? {}),
			...(config?.defaultContext ?? {}),
		};
	}

	debug(message: string, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.DEBUG, message, undefined, ctx);
	}

	info(message: string, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.INFO, message, undefined, ctx);
	}

	warn(message: string, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.WARN, message, undefined, ctx);
	}

	error(message: string, error?: unknown, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.ERROR, message, error, ctx);
	}

	fatal(message: string, error?: unknown, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.FATAL, message, error, ctx);
	}

	/** Child logger named `parent:child`, sharing transports and context. */
	child(childName: string): Logger {
		return new Logger(`${this.name}:${childName}`, {
			level: this.level,
			transports: this.transports,
			defaultContext: { ...this.context },
		});
	}

	/** A new logger with extra context merged in. Does not mutate this one. */
	withContext(ctx: Record<string, unknown>): Logger {
		return new Logger(this.name, {
			level: this.level,
			transports: this.transports,
			defaultContext: { ...this.context, ...ctx },
		});
	}

	getLevel(): LogLevel {
		return this.level;
	}

	private emit(level: LogLevel, message: string, error?: unknown, ctx?: Record<string, unknown>): void {
		if (level < this.level) return;

		const entry: LogEntry = {
			timestamp: new Date().toISOString(),
			level,
			levelName: LOG_LEVEL_NAMES[level],
			message,
			context: { ...this.context, ...(ctx ?? {}) },
			logger: this.name,
		};

		if (error !== undefined) {
			entry.error = error instanceof Error
				? { name: error.name, message: error.message, stack: error.stack }
				: { name: "Error", message: String(error) };
		}

		for (const transport of this.transports) {
			try {
				transport.write(entry);
			} catch (transportError) {
				// Reported on stderr only; never rethrown.
				process.stderr.write(`log transport failed: ${String(transportError)}\n`);
			}
		}
	}
}

/**
 * Create a named logger with global defaults.
 *
 * @param name - Module identifier, e.g. `"config:loader"`.
 */
export function createLogger(name: string): Logger {
	return new Logger(name);
}
