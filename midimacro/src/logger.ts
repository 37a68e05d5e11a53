/**
 * Structured logging.
 *
 * One pino root logger with a child per module. Pretty-printed through
 * pino-pretty outside production; JSON lines otherwise.
 */

import pino, { type Logger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const LOG_LEVELS: readonly string[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

export interface LoggerConfig {
	level?: LogLevel;
	pretty?: boolean;
}

let rootLogger: Logger | null = null;

export function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.includes(value);
}

function levelFromEnv(): LogLevel {
	const fromEnv = process.env.LOG_LEVEL;
	return fromEnv !== undefined && isLogLevel(fromEnv) ? fromEnv : "info";
}

/** Initialize the root logger. Call once at startup; later calls replace it. */
export function initLogger(config: LoggerConfig = {}): Logger {
	const level = config.level ?? levelFromEnv();
	const env = process.env.NODE_ENV;
	const pretty = config.pretty ?? (env !== "production" && env !== "test");

	rootLogger = pretty
		? pino({
				level,
				transport: {
					target: "pino-pretty",
					options: {
						colorize: true,
						translateTime: "HH:MM:ss",
						ignore: "pid,hostname",
						messageFormat: "[{module}] {msg}",
					},
				},
			})
		: pino({ level });
	return rootLogger;
}

export function getRootLogger(): Logger {
	return rootLogger ?? initLogger();
}

/** Scoped logger for one module. Initializes the root logger on first use. */
export function getLogger(module: string): Logger {
	return getRootLogger().child({ module });
}

export type { Logger };
