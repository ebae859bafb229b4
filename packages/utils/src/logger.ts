/**
 * File logger for leetterm.
 *
 * Logs to ~/.leetterm/logs/ with size-based rotation. Never writes to the
 * terminal: while the UI owns stdout, any stray byte corrupts the frame.
 * Each log entry includes process.pid for traceability.
 */
import * as fs from "node:fs";
import winston from "winston";
import DailyRotateFile from "winston-daily-rotate-file";
import { getLogsDir } from "./dirs";

/** Ensure logs directory exists */
function ensureLogsDir(): string {
	const logsDir = getLogsDir();
	if (!fs.existsSync(logsDir)) {
		fs.mkdirSync(logsDir, { recursive: true });
	}
	return logsDir;
}

/** Custom format that includes pid and flattens metadata */
const logFormat = winston.format.combine(
	winston.format.timestamp({ format: "YYYY-MM-DDTHH:mm:ss.SSSZ" }),
	winston.format.printf(({ timestamp, level, message, ...meta }) => {
		const entry: Record<string, unknown> = {
			timestamp,
			level,
			pid: process.pid,
			message,
		};
		for (const [key, value] of Object.entries(meta)) {
			entry[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
		}
		return JSON.stringify(entry);
	}),
);

// Created on first use so `--config` can move the logs directory before anything is written.
let winstonLogger: winston.Logger | undefined;

function getWinston(): winston.Logger {
	if (!winstonLogger) {
		const fileTransport = new DailyRotateFile({
			dirname: ensureLogsDir(),
			filename: "leetterm.%DATE%.log",
			datePattern: "YYYY-MM-DD",
			maxSize: "5m",
			maxFiles: 5,
		});
		winstonLogger = winston.createLogger({
			level: process.env.LEETTERM_LOG_LEVEL || "debug",
			format: logFormat,
			transports: [fileTransport],
			exitOnError: false,
		});
	}
	return winstonLogger;
}

type Level = "error" | "warn" | "info" | "debug";

function write(level: Level, message: string, context?: Record<string, unknown>): void {
	try {
		getWinston().log(level, message, context);
	} catch {
		// A broken log file must never take the UI down with it.
	}
}

/**
 * Log an error message.
 * @param context - Extra fields flattened into the JSON entry.
 */
export function error(message: string, context?: Record<string, unknown>): void {
	write("error", message, context);
}

/** Log a warning message. */
export function warn(message: string, context?: Record<string, unknown>): void {
	write("warn", message, context);
}

/** Log an informational message. */
export function info(message: string, context?: Record<string, unknown>): void {
	write("info", message, context);
}

/** Log a debug message. */
export function debug(message: string, context?: Record<string, unknown>): void {
	write("debug", message, context);
}

const LOGGED_TIMING_THRESHOLD_MS = 16;

function logTiming(op: string, duration: number): void {
	duration = Math.round(duration * 100) / 100;
	if (duration > LOGGED_TIMING_THRESHOLD_MS) {
		warn(`${op} slow`, { duration, op });
	} else {
		debug(`${op} done`, { duration, op });
	}
}

/**
 * Time a synchronous operation and log the duration.
 * Anything slower than one frame at 60Hz is logged as a warning.
 */
export function time<T, A extends unknown[]>(op: string, fn: (...args: A) => T, ...args: A): T {
	const start = performance.now();
	try {
		return fn(...args);
	} finally {
		logTiming(op, performance.now() - start);
	}
}

/** Time an asynchronous operation and log the duration. */
export async function timeAsync<R, A extends unknown[]>(
	op: string,
	fn: (...args: A) => R,
	...args: A
): Promise<Awaited<R>> {
	const start = performance.now();
	try {
		return await fn(...args);
	} finally {
		logTiming(op, performance.now() - start);
	}
}

/** Flush pending entries; used before process exit. */
export function close(): Promise<void> {
	const instance = winstonLogger;
	if (!instance) return Promise.resolve();
	winstonLogger = undefined;
	return new Promise(resolve => {
		instance.on("finish", () => resolve());
		instance.end();
	});
}
