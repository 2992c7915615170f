/**
 * Centralized logging with pino
 *
 * The daemon logs structured JSON (or pino-pretty output on a TTY). CLI
 * commands print user-facing lines through ui.ts and keep pino for
 * diagnostics.
 *
 * Log levels:
 * - fatal: Daemon cannot start
 * - error: Operation failed
 * - warn: Recoverable issue (skipped directory, bad config file)
 * - info: Key milestones (listening, scan finished)
 * - debug: Per-request detail (--verbose)
 * - trace: Very detailed debugging
 */

import { existsSync, mkdirSync } from "node:fs"
import { dirname } from "node:path"
import pino from "pino"

const level =
	process.env["LOG_LEVEL"] || (process.env["DEBUG"] ? "debug" : "info")

const isDev = process.stdout.isTTY && !process.env["CI"]

export interface ConfigureLoggingOptions {
	/** When set, logs go to this file instead of stdout. */
	logFilePath?: string
	/** Overrides the level picked from the environment. */
	level?: string
}

let currentLogFilePath: string | null = null

function ensureDirExists(path: string): void {
	const dir = dirname(path)
	if (!existsSync(dir)) {
		mkdirSync(dir, { recursive: true })
	}
}

function createConsoleLogger(logLevel: string) {
	return isDev
		? pino({
				level: logLevel,
				transport: {
					target: "pino-pretty",
					options: {
						colorize: true,
						translateTime: "HH:MM:ss",
						ignore: "pid,hostname",
						messageFormat: "{module}: {msg}",
					},
				},
			})
		: pino({
				level: logLevel,
				base: { pid: undefined, hostname: undefined },
			})
}

function createFileLogger(path: string, logLevel: string) {
	ensureDirExists(path)
	// The daemon exits from signal handlers; sync writes keep the tail of the log.
	const destination = pino.destination({ dest: path, sync: true })
	return pino(
		{
			level: process.env["LOG_LEVEL_FILE"] ?? logLevel,
			base: { pid: undefined, hostname: undefined },
		},
		destination,
	)
}

/**
 * Root logger instance
 * In most cases, use createLogger() to get a module-specific child logger
 */
export let logger = createConsoleLogger(level)

/** Switch between console and file output. */
export function configureLogging(options: ConfigureLoggingOptions = {}): {
	logFilePath: string | null
} {
	const nextLevel = options.level ?? level
	if (options.logFilePath) {
		currentLogFilePath = options.logFilePath
		logger = createFileLogger(options.logFilePath, nextLevel)
		return { logFilePath: currentLogFilePath }
	}

	currentLogFilePath = null
	logger = createConsoleLogger(nextLevel)
	return { logFilePath: null }
}

/** Returns the current log file path if file logging is enabled. */
export function getLogFilePath(): string | null {
	return currentLogFilePath
}

/**
 * Create a child logger for a specific module
 * @example
 * const log = createLogger("library")
 * log.debug({ root }, "walking scan root")
 */
export function createLogger(module: string) {
	return logger.child({ module })
}

/**
 * Flush pending log writes (call before process exit)
 */
export function flushLogs(): Promise<void> {
	return new Promise(resolve => {
		logger.flush(() => resolve())
	})
}

// Getters so callers follow reconfiguration
export const log = {
	get library() {
		return createLogger("library")
	},
	get ipc() {
		return createLogger("ipc")
	},
	get router() {
		return createLogger("router")
	},
	get config() {
		return createLogger("config")
	},
	get cli() {
		return createLogger("cli")
	},
} as const
