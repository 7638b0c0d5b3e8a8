import type {
	AnswerRecord,
	DocumentInput,
	EmbeddingBackend,
	GenerationBackend,
	IEventBus,
	ILogger,
	RagEvent,
	SearchResult,
	SourceKind,
	SourceSelector,
	WebSearchBackend,
} from './types'
import type { PipelineConfig } from './config'
import { createDocumentId, chunkText } from './chunker'
import { AnswerComposer } from './composer'
import { resolvePipelineConfig } from './config'
import { Embedder } from './embedder'
import {
	DimensionMismatchError,
	EmbeddingServiceError,
	EmptyInputError,
	RagError,
	toRagError,
	WebSearchUnavailableError,
} from './errors'
import { NullLogger } from './logger'
import { Retriever } from './retriever'
import { VectorIndex } from './vector-index'
import { WebSearchClient } from './web-search'

export interface RagPipelineOptions {
	embeddingBackend: EmbeddingBackend
	generationBackend: GenerationBackend
	/** Omit when no search credential is configured; answers then degrade to document context. */
	searchBackend?: WebSearchBackend
	config?: Partial<PipelineConfig>
	/** Evaluated before every question. Defaults to consulting every source. */
	selectSources?: SourceSelector
	logger?: ILogger
	eventBus?: IEventBus
	now?: () => Date
}

/** The default policy: always consult the document and the web. */
export const consultAllSources: SourceSelector = () => new Set<SourceKind>(['document', 'web'])

export const NO_DOCUMENT_NOTICE = 'No document has been ingested; the answer uses no document context.'

function isRecoverable(source: SourceKind, error: unknown): error is RagError {
	if (source === 'web') return error instanceof WebSearchUnavailableError
	return error instanceof EmbeddingServiceError || error instanceof DimensionMismatchError
}

function degradationNotice(source: SourceKind, error: RagError): string {
	return source === 'web'
		? `Web search unavailable: ${error.message}`
		: `Document retrieval unavailable: ${error.message}`
}

/**
 * The retrieval-augmented answer pipeline.
 *
 * `ingest` turns document text into a `VectorIndex`; `ask` answers a question
 * against an index the caller owns, consulting the document and the web
 * concurrently. A failing source degrades the answer instead of failing it.
 */
export class RagPipeline {
	public readonly config: PipelineConfig
	private readonly embedder: Embedder
	private readonly retriever: Retriever
	private readonly webSearch: WebSearchClient
	private readonly composer: AnswerComposer
	private readonly selectSources: SourceSelector
	private readonly logger: ILogger
	private readonly eventBus: IEventBus

	constructor(options: RagPipelineOptions) {
		this.config = resolvePipelineConfig(options.config)
		this.logger = options.logger ?? new NullLogger()
		this.eventBus = options.eventBus ?? { emit: () => {} }
		this.selectSources = options.selectSources ?? consultAllSources
		this.embedder = new Embedder(options.embeddingBackend, {
			retries: this.config.embeddingRetries,
			retryDelayMs: this.config.retryDelayMs,
			timeoutMs: this.config.requestTimeoutMs,
			concurrency: this.config.embeddingConcurrency,
			cacheSize: this.config.embeddingCacheSize,
			logger: this.logger,
			eventBus: this.eventBus,
		})
		this.retriever = new Retriever(this.config.retrievalK)
		this.webSearch = new WebSearchClient(options.searchBackend, {
			timeoutMs: this.config.requestTimeoutMs,
			logger: this.logger,
		})
		this.composer = new AnswerComposer(options.generationBackend, {
			timeoutMs: this.config.requestTimeoutMs,
			logger: this.logger,
			now: options.now,
		})
	}

	get webSearchConfigured(): boolean {
		return this.webSearch.isConfigured
	}

	/**
	 * Chunks and embeds a document. Nothing is returned unless the whole index is ready.
	 * @throws {EmptyInputError} when the document has no text.
	 * @throws {EmbeddingServiceError} when no segment could be embedded.
	 */
	async ingest(input: string | DocumentInput): Promise<VectorIndex> {
		const document: DocumentInput = typeof input === 'string' ? { text: input } : input
		const documentId = document.documentId ?? createDocumentId(document.text)
		await this.emit({ type: 'ingest:start', payload: { documentId, characters: document.text.length } })

		try {
			const segments = chunkText({ ...document, documentId }, this.config)
			this.logger.info('Document split into segments', { documentId, segments: segments.length })

			const index = await VectorIndex.build(segments, this.embedder, {
				droppedSegmentPolicy: this.config.droppedSegmentPolicy,
				logger: this.logger,
			})
			const dropped = index.droppedSegments.length
			this.logger.info('Document indexed', { documentId, segments: index.size, dropped })
			await this.emit({ type: 'ingest:finish', payload: { documentId, segments: index.size, dropped } })
			return index
		} catch (error) {
			const ragError = toRagError(error, 'Document ingestion failed')
			this.logger.error('Document ingestion failed', { documentId, error: ragError.message })
			throw ragError
		}
	}

	/**
	 * Answers a question from the document index and the web.
	 *
	 * @param index The index of the current document; omit when none was ingested.
	 * @throws {EmptyInputError} when the question is blank.
	 * @throws {GenerationServiceError} when no answer could be generated. The index is unaffected.
	 */
	async ask(question: string, index?: VectorIndex): Promise<AnswerRecord> {
		if (question.trim().length === 0) {
			throw new EmptyInputError('Question is empty')
		}

		const notices: string[] = []
		let degraded = false
		const selected = this.selectSources(question)
		const sources = [...selected].filter(source => source !== 'web' || this.config.webResultCount > 0)
		if (selected.has('document') && !index) {
			notices.push(NO_DOCUMENT_NOTICE)
		}
		await this.emit({ type: 'ask:start', payload: { question, sources } })

		const gather = async (source: SourceKind, search: () => Promise<SearchResult[]>): Promise<SearchResult[]> => {
			if (!sources.includes(source)) return []
			try {
				return await search()
			} catch (error) {
				if (!isRecoverable(source, error)) throw error
				degraded = true
				notices.push(degradationNotice(source, error))
				this.logger.warn('Source unavailable, continuing without it', { source, error: error.message })
				await this.emit({ type: 'source:degraded', payload: { question, source, error } })
				return []
			}
		}

		try {
			const [documentSnippets, webSnippets] = await Promise.all([
				gather('document', async () => (index ? this.retriever.retrieve(question, index) : [])),
				gather('web', () => this.webSearch.search(question, this.config.webResultCount)),
			])
			const record = await this.composer.answer(
				question,
				documentSnippets,
				webSnippets,
				{ modelId: this.config.modelId, temperature: this.config.temperature },
				{ notices, degraded },
			)
			this.logger.info('Question answered', { sources: record.sourcesUsed, degraded: record.degraded })
			await this.emit({ type: 'ask:finish', payload: { question, record } })
			return record
		} catch (error) {
			const ragError = toRagError(error, 'Question could not be answered')
			this.logger.error('Question could not be answered', { error: ragError.message })
			await this.emit({ type: 'ask:error', payload: { question, error: ragError } })
			throw ragError
		}
	}

	private async emit(event: RagEvent): Promise<void> {
		try {
			await this.eventBus.emit(event)
		} catch (error) {
			this.logger.warn('Event listener failed', { type: event.type, error: toRagError(error).message })
		}
	}
}
