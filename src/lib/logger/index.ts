/**
 * Logger wrapper — structured JSON logging backed by pino.
 *
 * Components take a `Logger` and derive children bound to their own
 * context (`component`, `instrument`), so every line can be filtered by
 * worker and asset.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log severity levels from least to most severe, plus `silent`. */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerConfig {
	readonly level: LogLevel;
	/** Service name stamped on every line. */
	readonly name?: string;
	readonly redactPaths?: readonly string[];
	/** Alternative sink; tests pass an in-memory writer. */
	readonly destination?: { write(msg: string): void };
}

export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

type LogArg = string | Record<string, unknown> | null | undefined;
type Level = "info" | "warn" | "error" | "debug";

// ── Factory ─────────────────────────────────────────────────────────

function write(pinoLogger: pino.Logger, level: Level, msgOrObj: LogArg, msg?: string): void {
	if (typeof msgOrObj === "string" || msgOrObj === undefined || msgOrObj === null) {
		pinoLogger[level](String(msgOrObj ?? ""));
		return;
	}
	pinoLogger[level](msgOrObj, msg ?? "");
}

function wrapPino(pinoLogger: pino.Logger): Logger {
	return {
		info(msgOrObj: LogArg, msg?: string): void {
			write(pinoLogger, "info", msgOrObj, msg);
		},
		warn(msgOrObj: LogArg, msg?: string): void {
			write(pinoLogger, "warn", msgOrObj, msg);
		},
		error(msgOrObj: LogArg, msg?: string): void {
			write(pinoLogger, "error", msgOrObj, msg);
		},
		debug(msgOrObj: LogArg, msg?: string): void {
			write(pinoLogger, "debug", msgOrObj, msg);
		},
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(bindings));
		},
	};
}

/**
 * Creates a Logger backed by pino.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info", name: "spikebot" });
 * logger.child({ component: "executor" }).info({ instrument: "tok-1" }, "buy filled");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
	};
	if (config.name !== undefined) {
		pinoOptions.name = config.name;
	}
	if (config.redactPaths && config.redactPaths.length > 0) {
		pinoOptions.redact = {
			paths: [...config.redactPaths],
			censor: "[REDACTED]",
		};
	}

	const pinoLogger = config.destination
		? pino(pinoOptions, config.destination)
		: pino(pinoOptions);
	return wrapPino(pinoLogger);
}

/** A logger that drops everything. Handy default for tests and embedded use. */
export function silentLogger(): Logger {
	return createLogger({ level: "silent" });
}
