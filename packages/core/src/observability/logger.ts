/**
 * Drishti Logger — Structured, pluggable logging for Pratidhvani.
 * Sanskrit: Drishti (दृष्टि) = vision, sight, observation.
 *
 * Level filtering, pluggable transports, child loggers and contextual
 * metadata. Entries below the threshold are dropped before an entry
 * object is even built.
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

/**
 * Parse a level name ("debug", "WARN", ...). Returns undefined for
 * anything that is not a known level.
 */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
	if (!name) return undefined;
	const key = name.trim().toLowerCase();
	return Object.prototype.hasOwnProperty.call(LOG_LEVEL_PARSE, key) ? LOG_LEVEL_PARSE[key] : undefined;
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
	/** Connection the entry belongs to, lifted out of the context. */
	connectionId?: string;
	error?: { name: string; message: string; code?: string; stack?: string };
	/** Logger name that produced this entry */
	package?: string;
}

export interface LogTransport {
	/** Write a log entry to the output destination. */
	write(entry: LogEntry): void;
}

export interface LoggerConfig {
	/** Minimum level to emit. Entries below this level are silently discarded. */
	level?: LogLevel;
	/** Output transports. Defaults to [ConsoleTransport]. */
	transports?: LogTransport[];
	/** Default context merged into every log entry. */
	defaultContext?: Record<string, unknown>;
}

// ─── Global Configuration ────────────────────────────────────────────────────

let globalConfig: LoggerConfig = {};

/**
 * Configure global logging defaults. Affects all loggers created after this call.
 */
export function configureLogging(config: LoggerConfig): void {
	globalConfig = { ...config };
}

/** Reset global config to defaults. Primarily for testing. */
export function resetLoggingConfig(): void {
	globalConfig = {};
}

// ─── ANSI Colors ─────────────────────────────────────────────────────────────

const ANSI_RESET = "\x1b[0m";
const ANSI_DIM = "\x1b[2m";
const ANSI_BOLD = "\x1b[1m";

const LEVEL_COLORS: Record<LogLevel, string> = {
	[LogLevel.DEBUG]: "\x1b[36m",   // cyan
	[LogLevel.INFO]: "\x1b[32m",    // green
	[LogLevel.WARN]: "\x1b[33m",    // yellow
	[LogLevel.ERROR]: "\x1b[31m",   // red
	[LogLevel.FATAL]: "\x1b[35;1m", // bold magenta
};

// ─── Transports ──────────────────────────────────────────────────────────────

/** Anything with a `write(string)`, such as process.stdout or a test sink. */
export interface WritableSink {
	write(chunk: string): unknown;
}

/**
 * Console transport — human-readable output with timestamps.
 */
export class ConsoleTransport implements LogTransport {
	private readonly useColors: boolean;
	private readonly out: WritableSink;
	private readonly err: WritableSink;

	constructor(opts?: { colors?: boolean; stdout?: WritableSink; stderr?: WritableSink }) {
		this.useColors = opts?.colors ?? (process.stdout.isTTY ?? false);
		this.out = opts?.stdout ?? process.stdout;
		this.err = opts?.stderr ?? process.stderr;
	}

	/** Render an entry as a single (possibly multi-line) string without a trailing newline. */
	format(entry: LogEntry): string {
		const ts = entry.timestamp.slice(11, 23); // HH:mm:ss.SSS
		const lvl = LOG_LEVEL_NAMES[entry.level].padEnd(5);
		const pkg = entry.package ? ` [${entry.package}]` : "";

		let line: string;
		if (this.useColors) {
			const color = LEVEL_COLORS[entry.level];
			line = `${ANSI_DIM}${ts}${ANSI_RESET} ${color}${lvl}${ANSI_RESET}${ANSI_BOLD}${pkg}${ANSI_RESET} ${entry.message}`;
		} else {
			line = `${ts} ${lvl}${pkg} ${entry.message}`;
		}

		if (entry.connectionId) {
			line += ` conn=${entry.connectionId}`;
		}

		const ctxKeys = Object.keys(entry.context);
		if (ctxKeys.length > 0) {
			const ctxStr = ctxKeys
				.map((k) => `${k}=${JSON.stringify(entry.context[k])}`)
				.join(" ");
			line += ` ${this.useColors ? ANSI_DIM : ""}${ctxStr}${this.useColors ? ANSI_RESET : ""}`;
		}

		if (entry.error) {
			line += `\n  ${entry.error.name}: ${entry.error.message}`;
			if (entry.error.stack) {
				line += `\n${entry.error.stack.split("\n").slice(1).map((l) => `  ${l.trim()}`).join("\n")}`;
			}
		}
		return line;
	}

	write(entry: LogEntry): void {
		const stream = entry.level >= LogLevel.ERROR ? this.err : this.out;
		stream.write(this.format(entry) + "\n");
	}
}

/**
 * JSON transport — one JSON object per line, for log aggregation.
 */
export class JsonTransport implements LogTransport {
	private readonly out: WritableSink;
	private readonly err: WritableSink;

	constructor(opts?: { stdout?: WritableSink; stderr?: WritableSink }) {
		this.out = opts?.stdout ?? process.stdout;
		this.err = opts?.stderr ?? process.stderr;
	}

	write(entry: LogEntry): void {
		const obj: Record<string, unknown> = {
			timestamp: entry.timestamp,
			level: LOG_LEVEL_NAMES[entry.level],
			message: entry.message,
			package: entry.package,
		};

		if (entry.connectionId) obj.connectionId = entry.connectionId;
		if (Object.keys(entry.context).length > 0) {
			obj.context = entry.context;
		}
		if (entry.error) obj.error = entry.error;

		const stream = entry.level >= LogLevel.ERROR ? this.err : this.out;
		stream.write(JSON.stringify(obj) + "\n");
	}
}

// ─── Logger ──────────────────────────────────────────────────────────────────

/**
 * Resolve the effective level: explicit config, then global config,
 * then `LOG_LEVEL`, then INFO in production and DEBUG elsewhere.
 */
function resolveLevel(configLevel?: LogLevel): LogLevel {
	if (configLevel !== undefined) return configLevel;
	if (globalConfig.level !== undefined) return globalConfig.level;

	const envLevel = parseLogLevel(process.env.LOG_LEVEL);
	if (envLevel !== undefined) return envLevel;

	return process.env.NODE_ENV === "production" ? LogLevel.INFO : LogLevel.DEBUG;
}

function serializeError(error: unknown): NonNullable<LogEntry["error"]> {
	if (error instanceof Error) {
		const code = "code" in error ? error.code : undefined;
		return {
			name: error.name,
			message: error.message,
			...(typeof code === "string" ? { code } : {}),
			stack: error.stack,
		};
	}
	return { name: "Error", message: String(error) };
}

export class Logger {
	private readonly name: string;
	private level: LogLevel;
	private readonly transports: LogTransport[];
	private readonly context: Record<string, unknown>;

	constructor(name: string, config?: LoggerConfig) {
		this.name = name;
		this.level = resolveLevel(config?.level);
		this.transports = config?.transports
			?? globalConfig.transports
			?? [new ConsoleTransport()];
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

	/** Log an ERROR message with optional Error object. */
	error(message: string, error?: unknown, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.ERROR, message, error, ctx);
	}

	/** Log a FATAL message with optional Error object. */
	fatal(message: string, error?: unknown, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.FATAL, message, error, ctx);
	}

	/**
	 * Create a child logger with a prefixed name. The child shares
	 * transports, level and context with the parent.
	 */
	child(childName: string): Logger {
		return new Logger(`${this.name}:${childName}`, {
			level: this.level,
			transports: this.transports,
			defaultContext: { ...this.context },
		});
	}

	/**
	 * Return a new logger with additional context merged in.
	 * Does not mutate the original logger.
	 */
	withContext(ctx: Record<string, unknown>): Logger {
		return new Logger(this.name, {
			level: this.level,
			transports: this.transports,
			defaultContext: { ...this.context, ...ctx },
		});
	}

	setLevel(level: LogLevel): void {
		this.level = level;
	}

	getLevel(): LogLevel {
		return this.level;
	}

	getName(): string {
		return this.name;
	}

	// ─── Internal ────────────────────────────────────────────────────────

	private emit(
		level: LogLevel,
		message: string,
		error?: unknown,
		ctx?: Record<string, unknown>,
	): void {
		if (level < this.level) return;

		const entry: LogEntry = {
			timestamp: new Date().toISOString(),
			level,
			levelName: LOG_LEVEL_NAMES[level],
			message,
			context: { ...this.context, ...(ctx ?? {}) },
			package: this.name,
		};

		if (entry.context.connectionId !== undefined) {
			entry.connectionId = String(entry.context.connectionId);
			delete entry.context.connectionId;
		}

		if (error !== undefined) {
			entry.error = serializeError(error);
		}

		for (const transport of this.transports) {
			try {
				transport.write(entry);
			} catch {
				// A failing transport does not stop the others.
			}
		}
	}
}

// ─── Factory ─────────────────────────────────────────────────────────────────

/**
 * Create a named logger with global defaults.
 *
 * @param name - Module identifier (e.g. "listener", "server:conn")
 */
export function createLogger(name: string): Logger {
	return new Logger(name);
}
