import { describe, expect, it, vi } from 'vitest'
import { EmptyInputError } from '../src/errors'
import { withRetries } from '../src/utils/retry'
import { sleep } from '../src/utils/sleep'
import { TimeoutError, withTimeout } from '../src/utils/timeout'
import { cosineSimilarity, dot, l2Normalize } from '../src/utils/vector'

function spyLogger() {
	return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
}

describe('vector helpers', () => {
	it('should compute dot products and cosine similarity', () => {
		expect(dot([1, 2, 3], [4, 5, 6])).toBe(32)
		expect(cosineSimilarity([1, 0], [0, 1])).toBe(0)
		expect(cosineSimilarity([2, 0], [5, 0])).toBe(1)
		expect(cosineSimilarity([0, 0], [1, 0])).toBe(0)
	})

	it('should refuse vectors of different lengths', () => {
		expect(() => dot([1], [1, 2])).toThrow('Vectors must have the same length')
	})

	it('should normalize to unit length, or give null without a direction', () => {
		expect(l2Normalize([0, 5])).toEqual([0, 1])
		expect(l2Normalize([0, 0])).toBeNull()
		expect(l2Normalize([Number.POSITIVE_INFINITY, 1])).toBeNull()
	})
})

describe('withRetries', () => {
	it('should retry until the call succeeds', async () => {
		const logger = spyLogger()
		const executor = vi.fn(async (attempt: number) => {
			if (attempt < 3) throw new Error(`attempt ${attempt} failed`)
			return 'ok'
		})

		await expect(withRetries(executor, { maxAttempts: 3, baseDelayMs: 0, logger })).resolves.toBe('ok')
		expect(executor).toHaveBeenCalledTimes(3)
		expect(logger.warn).toHaveBeenCalledTimes(2)
		expect(logger.info).toHaveBeenCalledWith('Call succeeded after retry', { attempt: 3 })
	})

	it('should rethrow the last error once the attempts run out', async () => {
		const logger = spyLogger()
		const executor = vi.fn(async (attempt: number): Promise<string> => {
			throw new Error(`attempt ${attempt} failed`)
		})

		await expect(withRetries(executor, { maxAttempts: 2, baseDelayMs: 0, logger, meta: { op: 'embed' } })).rejects.toThrow(
			'attempt 2 failed',
		)
		expect(logger.error).toHaveBeenCalledWith('Call failed after all retries', {
			op: 'embed',
			attempts: 2,
			error: 'attempt 2 failed',
		})
	})

	it('should stop at a fatal error', async () => {
		const executor = vi.fn(async (): Promise<string> => {
			throw new EmptyInputError()
		})

		await expect(withRetries(executor, { maxAttempts: 5, baseDelayMs: 0, logger: spyLogger() })).rejects.toThrow(
			EmptyInputError,
		)
		expect(executor).toHaveBeenCalledTimes(1)
	})
})

describe('withTimeout', () => {
	it('should resolve with the result of a fast operation', async () => {
		await expect(withTimeout(async () => 'done', 1000)).resolves.toBe('done')
	})

	it('should reject and abort the signal at the deadline', async () => {
		const seen: { signal?: AbortSignal } = {}
		const pending = withTimeout((signal) => {
			seen.signal = signal
			return new Promise<string>(() => {})
		}, 10, 'Lookup')

		await expect(pending).rejects.toThrow(new TimeoutError(10, 'Lookup'))
		expect(seen.signal?.aborted).toBe(true)
		expect(seen.signal?.reason).toBeInstanceOf(TimeoutError)
	})
})

describe('sleep', () => {
	it('should reject with the reason of an aborted signal', async () => {
		const controller = new AbortController()
		const pending = sleep(10_000, controller.signal)
		controller.abort(new Error('cancelled'))

		await expect(pending).rejects.toThrow('cancelled')
	})

	it('should resolve after the delay', async () => {
		await expect(sleep(1)).resolves.toBeUndefined()
	})
})
