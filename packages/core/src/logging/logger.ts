/**
 * Logger
 *
 * Minimal structured logger. Library code logs through this interface so
 * a scenario can route or silence it; the default writes to the console.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LoggerMeta = Record<string, unknown>;

export interface Logger {
	debug(message: string, meta?: LoggerMeta): void;
	info(message: string, meta?: LoggerMeta): void;
	warn(message: string, meta?: LoggerMeta): void;
	error(message: string, meta?: LoggerMeta): void;
	/** Logger for one part of the run, e.g. `http`; loggers without scopes log as themselves */
	child?(scope: string): Logger;
}

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

const LEVEL_RANK: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
	return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Console-backed logger with a minimum level and a fixed prefix.
 */
export class ConsoleLogger implements Logger {
	private readonly level: LogLevel;
	private readonly prefix: string;

	constructor(options?: { level?: LogLevel; prefix?: string }) {
		this.level = options?.level ?? "info";
		this.prefix = options?.prefix ?? "[petprobe]";
	}

	debug(message: string, meta?: LoggerMeta): void {
		if (this.enabled("debug")) {
			console.debug(this.format(message), ...this.extra(meta));
		}
	}

	info(message: string, meta?: LoggerMeta): void {
		if (this.enabled("info")) {
			console.info(this.format(message), ...this.extra(meta));
		}
	}

	warn(message: string, meta?: LoggerMeta): void {
		if (this.enabled("warn")) {
			console.warn(this.format(message), ...this.extra(meta));
		}
	}

	error(message: string, meta?: LoggerMeta): void {
		if (this.enabled("error")) {
			console.error(this.format(message), ...this.extra(meta));
		}
	}

	/**
	 * Derive a logger with a nested prefix, e.g. `[petprobe] [http]`.
	 */
	child(scope: string): ConsoleLogger {
		return new ConsoleLogger({ level: this.level, prefix: `${this.prefix} [${scope}]` });
	}

	private enabled(level: LogLevel): boolean {
		return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
	}

	private format(message: string): string {
		return `${this.prefix} ${message}`;
	}

	private extra(meta?: LoggerMeta): LoggerMeta[] {
		return meta && Object.keys(meta).length > 0 ? [meta] : [];
	}
}

/**
 * Logger that drops everything.
 */
export const silentLogger: Logger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
};

export function createLogger(level: LogLevel = "info"): Logger {
	return level === "silent" ? silentLogger : new ConsoleLogger({ level });
}
