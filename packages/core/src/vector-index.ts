import type { DroppedSegmentPolicy } from './config'
import type { Embedder } from './embedder'
import type { EmbeddingVector, ILogger, SearchResult, Segment } from './types'
import { DimensionMismatchError, EmbeddingServiceError, EmptyInputError, InvalidConfigError } from './errors'
import { NullLogger } from './logger'
import { dot } from './utils/vector'

interface IndexEntry {
	segment: Segment
	vector: EmbeddingVector
}

export interface VectorIndexOptions {
	documentId: string
	embedder: Embedder
	/** Fixed on the first `add` when omitted. */
	dimension?: number
	droppedSegmentPolicy?: DroppedSegmentPolicy
	logger?: ILogger
}

/**
 * In-memory, exact nearest-neighbour index over the segments of one document.
 * Vectors are unit length, so the dot product is the cosine similarity.
 */
export class VectorIndex {
	public readonly documentId: string
	private readonly embedder: Embedder
	private readonly entries: IndexEntry[] = []
	private fixedDimension: number | undefined
	private readonly policy: DroppedSegmentPolicy
	private readonly logger: ILogger
	private pending: Segment[] = []
	private readonly discarded: Segment[] = []

	constructor(options: VectorIndexOptions) {
		this.documentId = options.documentId
		this.embedder = options.embedder
		this.fixedDimension = options.dimension
		this.policy = options.droppedSegmentPolicy ?? 'discard'
		this.logger = options.logger ?? new NullLogger()
	}

	/**
	 * Embeds and stores every segment. Segments that cannot be embedded are dropped
	 * (or kept for a retry on the next search, depending on the policy).
	 *
	 * @throws {EmptyInputError} when `segments` is empty.
	 * @throws {EmbeddingServiceError} when not a single segment could be embedded.
	 */
	static async build(
		segments: readonly Segment[],
		embedder: Embedder,
		options: Omit<VectorIndexOptions, 'documentId' | 'embedder'> = {},
	): Promise<VectorIndex> {
		if (segments.length === 0) {
			throw new EmptyInputError('Cannot build an index without segments')
		}
		const { embedded, dropped } = await embedder.embedSegments(segments)
		if (embedded.length === 0) {
			throw new EmbeddingServiceError(`None of the ${segments.length} segments could be embedded`, {
				cause: dropped[dropped.length - 1]?.error,
				isFatal: true,
			})
		}

		const index = new VectorIndex({
			...options,
			documentId: segments[0].sourceDocumentId,
			embedder,
			dimension: options.dimension ?? embedder.dimension,
		})
		for (const { segment, vector } of embedded) index.add(segment, vector)
		index.setAside(dropped.map(({ segment }) => segment))
		return index
	}

	get size(): number {
		return this.entries.length
	}

	get dimension(): number | undefined {
		return this.fixedDimension
	}

	/** Segments that are not searchable, whether discarded or awaiting a retry. */
	get droppedSegments(): readonly Segment[] {
		return [...this.discarded, ...this.pending]
	}

	/**
	 * Appends a segment with its vector.
	 * @throws {DimensionMismatchError} when the vector's dimension differs from the index's.
	 */
	add(segment: Segment, vector: EmbeddingVector): void {
		if (this.fixedDimension === undefined) {
			this.fixedDimension = vector.length
		} else if (vector.length !== this.fixedDimension) {
			throw new DimensionMismatchError(this.fixedDimension, vector.length)
		}
		this.entries.push({ segment, vector })
	}

	/**
	 * Returns the `k` segments most similar to `query`, best first. Equal scores
	 * keep ingestion order. An empty index yields `[]`.
	 *
	 * @throws {InvalidConfigError} when `k` is not a positive integer.
	 * @throws {EmbeddingServiceError} when the query cannot be embedded.
	 */
	async search(query: string, k: number): Promise<SearchResult[]> {
		if (!Number.isInteger(k) || k < 1) {
			throw new InvalidConfigError(`k must be a positive integer, got ${k}`)
		}
		await this.retryPending()
		if (this.entries.length === 0) return []

		const queryVector = await this.embedder.embed(query)
		if (queryVector.length !== this.fixedDimension) {
			throw new DimensionMismatchError(this.fixedDimension ?? 0, queryVector.length)
		}

		return this.entries
			.map(entry => ({ entry, score: dot(queryVector, entry.vector) }))
			.sort((a, b) => b.score - a.score || a.entry.segment.ordinal - b.entry.segment.ordinal)
			.slice(0, k)
			.map(({ entry: { segment }, score }) => ({
				text: segment.text,
				sourceLabel: 'document' as const,
				score,
				segmentId: segment.id,
				...(segment.page !== undefined ? { page: segment.page } : {}),
			}))
	}

	private setAside(segments: Segment[]): void {
		if (this.policy === 'retry-on-query') this.pending.push(...segments)
		else this.discarded.push(...segments)
	}

	private async retryPending(): Promise<void> {
		if (this.pending.length === 0) return
		const retrying = this.pending
		this.pending = []
		this.logger.info('Retrying segments dropped during ingestion', { count: retrying.length })
		const { embedded, dropped } = await this.embedder.embedSegments(retrying)
		for (const { segment, vector } of embedded) this.add(segment, vector)
		this.discarded.push(...dropped.map(({ segment }) => segment))
	}
}
