import type { ILogger } from './types'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const levelPriorities: Record<LogLevel, number> = {
	debug: 1,
	info: 2,
	warn: 3,
	error: 4,
}

/** A logger implementation that outputs to the console, above a minimum level. */
export class ConsoleLogger implements ILogger {
	private minLevel: LogLevel

	/**
	 * @param options.level The minimum level of messages to log. Defaults to 'info'.
	 */
	constructor(options: { level?: LogLevel } = {}) {
		this.minLevel = options.level ?? 'info'
	}

	private enabled(level: LogLevel): boolean {
		return levelPriorities[level] >= levelPriorities[this.minLevel]
	}

	debug(message: string, meta?: Record<string, unknown>): void {
		if (this.enabled('debug')) console.debug(`[DEBUG] ${message}`, meta || '')
	}

	info(message: string, meta?: Record<string, unknown>): void {
		if (this.enabled('info')) console.info(`[INFO] ${message}`, meta || '')
	}

	warn(message: string, meta?: Record<string, unknown>): void {
		if (this.enabled('warn')) console.warn(`[WARN] ${message}`, meta || '')
	}

	error(message: string, meta?: Record<string, unknown>): void {
		if (this.enabled('error')) console.error(`[ERROR] ${message}`, meta || '')
	}
}

/** A logger implementation that does nothing (no-op). The pipeline's default. */
export class NullLogger implements ILogger {
	debug(_message: string, _meta?: Record<string, unknown>): void {}
	info(_message: string, _meta?: Record<string, unknown>): void {}
	warn(_message: string, _meta?: Record<string, unknown>): void {}
	error(_message: string, _meta?: Record<string, unknown>): void {}
}
