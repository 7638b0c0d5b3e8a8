/** Raised when an external call exceeds its time budget. */
export class TimeoutError extends Error {
	constructor(public readonly timeoutMs: number, label = 'Operation') {
		super(`${label} timed out after ${timeoutMs}ms`)
		this.name = 'TimeoutError'
	}
}

/**
 * Runs `operation` with an `AbortSignal` that fires after `timeoutMs`.
 * The returned promise settles at the deadline even if the operation ignores the signal.
 */
export async function withTimeout<T>(
	operation: (signal: AbortSignal) => Promise<T>,
	timeoutMs: number,
	label?: string,
): Promise<T> {
	const controller = new AbortController()
	let timeoutId: ReturnType<typeof setTimeout> | undefined
	const deadline = new Promise<never>((_, reject) => {
		timeoutId = setTimeout(() => {
			const error = new TimeoutError(timeoutMs, label)
			controller.abort(error)
			reject(error)
		}, timeoutMs)
	})
	try {
		return await Promise.race([operation(controller.signal), deadline])
	} finally {
		clearTimeout(timeoutId)
	}
}
