import type { EmbeddingBackend, EmbeddingVector, IEventBus, ILogger, Segment } from './types'
import { DEFAULT_PIPELINE_CONFIG } from './config'
import { EmbeddingServiceError, errorMessage } from './errors'
import { NullLogger } from './logger'
import { withRetries } from './utils/retry'
import { withTimeout } from './utils/timeout'
import { l2Normalize } from './utils/vector'

export interface EmbedderOptions {
	/** Retries after the first failed attempt. */
	retries?: number
	retryDelayMs?: number
	timeoutMs?: number
	/** Segments embedded at once by `embedSegments`. */
	concurrency?: number
	/** Vectors kept in the cache; the least recently used one is evicted first. */
	cacheSize?: number
	logger?: ILogger
	eventBus?: IEventBus
}

export interface EmbeddedSegment {
	segment: Segment
	vector: EmbeddingVector
}

export interface DroppedSegment {
	segment: Segment
	error: EmbeddingServiceError
}

export interface EmbedSegmentsResult {
	embedded: EmbeddedSegment[]
	dropped: DroppedSegment[]
}

function isNumberArray(value: unknown): value is number[] {
	return Array.isArray(value) && value.every((item: unknown) => typeof item === 'number')
}

/**
 * Turns text into unit-length vectors through an `EmbeddingBackend`.
 *
 * Recent results are cached per exact input text, up to `cacheSize` entries, so
 * repeated text is embedded once. The dimension is fixed by the backend's
 * declaration or by the first vector it returns.
 */
export class Embedder {
	private readonly cache = new Map<string, EmbeddingVector>()
	private fixedDimension: number | undefined
	private readonly retries: number
	private readonly retryDelayMs: number
	private readonly timeoutMs: number
	private readonly concurrency: number
	private readonly cacheSize: number
	private readonly logger: ILogger
	private readonly eventBus?: IEventBus

	constructor(
		private readonly backend: EmbeddingBackend,
		options: EmbedderOptions = {},
	) {
		this.fixedDimension = backend.dimension
		this.retries = options.retries ?? DEFAULT_PIPELINE_CONFIG.embeddingRetries
		this.retryDelayMs = options.retryDelayMs ?? DEFAULT_PIPELINE_CONFIG.retryDelayMs
		this.timeoutMs = options.timeoutMs ?? DEFAULT_PIPELINE_CONFIG.requestTimeoutMs
		this.concurrency = options.concurrency ?? DEFAULT_PIPELINE_CONFIG.embeddingConcurrency
		this.cacheSize = options.cacheSize ?? DEFAULT_PIPELINE_CONFIG.embeddingCacheSize
		this.logger = options.logger ?? new NullLogger()
		this.eventBus = options.eventBus
	}

	/** The vector dimension, once known. */
	get dimension(): number | undefined {
		return this.fixedDimension
	}

	/**
	 * @throws {EmbeddingServiceError} when every attempt fails or returns malformed output.
	 */
	async embed(text: string): Promise<EmbeddingVector> {
		const cached = this.cache.get(text)
		if (cached) {
			this.cache.delete(text)
			this.cache.set(text, cached)
			return cached
		}

		const vector = await withRetries(() => this.embedOnce(text), {
			maxAttempts: this.retries + 1,
			baseDelayMs: this.retryDelayMs,
			logger: this.logger,
			meta: { characters: text.length },
		})
		this.remember(text, vector)
		return vector
	}

	/** Number of cached vectors. */
	get cachedCount(): number {
		return this.cache.size
	}

	private remember(text: string, vector: EmbeddingVector): void {
		if (this.cacheSize === 0) return
		this.cache.set(text, vector)
		if (this.cache.size > this.cacheSize) {
			const oldest = this.cache.keys().next()
			if (!oldest.done) this.cache.delete(oldest.value)
		}
	}

	/**
	 * Embeds every segment, `concurrency` at a time. Segments that still fail after
	 * all retries are dropped with a warning instead of failing the batch.
	 */
	async embedSegments(segments: readonly Segment[]): Promise<EmbedSegmentsResult> {
		const result: EmbedSegmentsResult = { embedded: [], dropped: [] }
		for (let i = 0; i < segments.length; i += this.concurrency) {
			const batch = segments.slice(i, i + this.concurrency)
			const outcomes = await Promise.all(
				batch.map(async (segment): Promise<EmbeddedSegment | DroppedSegment> => {
					try {
						return { segment, vector: await this.embed(segment.text) }
					} catch (error) {
						const wrapped =
							error instanceof EmbeddingServiceError
								? error
								: new EmbeddingServiceError(errorMessage(error), { cause: error })
						return { segment, error: wrapped }
					}
				}),
			)
			for (const outcome of outcomes) {
				if ('vector' in outcome) {
					result.embedded.push(outcome)
					continue
				}
				result.dropped.push(outcome)
				this.logger.warn('Dropping segment that could not be embedded', {
					segmentId: outcome.segment.id,
					error: outcome.error.message,
				})
				await this.reportDropped(outcome)
			}
		}
		return result
	}

	private async reportDropped({ segment, error }: DroppedSegment): Promise<void> {
		try {
			await this.eventBus?.emit({
				type: 'segment:dropped',
				payload: { documentId: segment.sourceDocumentId, segmentId: segment.id, error },
			})
		} catch (listenerError) {
			this.logger.warn('Event listener failed', { type: 'segment:dropped', error: errorMessage(listenerError) })
		}
	}

	private async embedOnce(text: string): Promise<EmbeddingVector> {
		let raw: unknown
		try {
			raw = await withTimeout(signal => this.backend.embed(text, { signal }), this.timeoutMs, 'Embedding request')
		} catch (error) {
			throw new EmbeddingServiceError(`Embedding backend failed: ${errorMessage(error)}`, { cause: error })
		}
		return this.validate(raw)
	}

	private validate(raw: unknown): EmbeddingVector {
		if (!isNumberArray(raw) || raw.length === 0) {
			throw new EmbeddingServiceError('Embedding backend returned malformed output: expected a non-empty number array')
		}
		if (this.fixedDimension !== undefined && raw.length !== this.fixedDimension) {
			throw new EmbeddingServiceError(
				`Embedding backend returned malformed output: expected dimension ${this.fixedDimension}, got ${raw.length}`,
			)
		}
		const normalized = raw.every(Number.isFinite) ? l2Normalize(raw) : null
		if (!normalized) {
			throw new EmbeddingServiceError('Embedding backend returned malformed output: vector has no finite direction')
		}
		if (this.fixedDimension === undefined) this.fixedDimension = raw.length
		return Object.freeze(normalized)
	}
}
