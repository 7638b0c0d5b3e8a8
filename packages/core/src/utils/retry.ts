import type { ILogger } from '../types'
import { RagError } from '../errors'
import { sleep } from './sleep'

export interface RetryOptions {
	/** Total attempts, including the first. */
	maxAttempts: number
	/** Delay before the second attempt; doubles on every further attempt. */
	baseDelayMs: number
	logger: ILogger
	/** Included in every log line. */
	meta?: Record<string, unknown>
}

/**
 * Runs `executor` until it succeeds or `maxAttempts` is reached, rethrowing the last error.
 * A fatal `RagError` stops the loop immediately.
 */
export async function withRetries<T>(executor: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
	const { maxAttempts, baseDelayMs, logger, meta } = options
	let lastError: unknown
	for (let attempt = 1; attempt <= maxAttempts; attempt++) {
		try {
			const result = await executor(attempt)
			if (attempt > 1) {
				logger.info('Call succeeded after retry', { ...meta, attempt })
			}
			return result
		} catch (error) {
			lastError = error
			if (error instanceof RagError && error.isFatal) break
			const message = error instanceof Error ? error.message : String(error)
			if (attempt < maxAttempts) {
				logger.warn('Call failed, retrying', { ...meta, attempt, maxAttempts, error: message })
				await sleep(baseDelayMs * 2 ** (attempt - 1))
			} else {
				logger.error('Call failed after all retries', { ...meta, attempts: maxAttempts, error: message })
			}
		}
	}
	throw lastError
}
