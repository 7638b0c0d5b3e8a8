import type { RagError } from './errors'

// =================================================================================
// Data Model
// =================================================================================

/** Where a snippet used to ground an answer came from. */
export type SourceKind = 'document' | 'web'

/** A bounded, contiguous slice of document text. The unit of retrieval. */
export interface Segment {
	/** Opaque identifier, unique within the source document. */
	readonly id: string
	readonly text: string
	/** Character offset of the first character of `text` in the original document. */
	readonly sourceOffset: number
	readonly sourceDocumentId: string
	/** Position in chunker output. Used to break score ties in ingestion order. */
	readonly ordinal: number
	/** 1-based page number, when the document was supplied with page offsets. */
	readonly page?: number
}

/** A fixed-dimension, L2-normalized embedding. */
export type EmbeddingVector = readonly number[]

/** A snippet handed to the answer composer, tagged with its provenance. */
export interface SearchResult {
	readonly text: string
	readonly sourceLabel: SourceKind
	readonly score?: number
	readonly url?: string
	readonly title?: string
	readonly segmentId?: string
	readonly page?: number
}

/** An answered question. Never mutated after creation. */
export interface AnswerRecord {
	readonly question: string
	readonly retrievedDocumentSnippets: readonly SearchResult[]
	readonly retrievedWebSnippets: readonly SearchResult[]
	readonly answerText: string
	readonly timestamp: Date
	/** Sources that contributed at least one snippet to the prompt. */
	readonly sourcesUsed: readonly SourceKind[]
	/** True when a consulted source was unavailable and the answer used the rest. */
	readonly degraded: boolean
	readonly notices: readonly string[]
}

/** Extracted document text, as supplied by an external text extractor. */
export interface DocumentInput {
	text: string
	documentId?: string
	/** Ascending start offsets of each page within `text`. */
	pageOffsets?: readonly number[]
}

// =================================================================================
// Backend Contracts
// =================================================================================

export interface RequestOptions {
	signal?: AbortSignal
}

/** Maps text to a vector. Implementations need not normalize. */
export interface EmbeddingBackend {
	/** The declared output dimension, when known up front. */
	readonly dimension?: number
	embed: (text: string, options?: RequestOptions) => Promise<number[]>
}

export interface WebSearchHit {
	text: string
	url?: string
	title?: string
}

export interface WebSearchBackend {
	search: (query: string, maxResults: number, options?: RequestOptions) => Promise<WebSearchHit[]>
}

export interface GenerationRequest {
	systemInstruction: string
	context: string
	question: string
	modelId: string
	temperature: number
	signal?: AbortSignal
}

export interface GenerationBackend {
	generate: (request: GenerationRequest) => Promise<string>
}

/** Model parameters threaded into the answer composer. */
export interface ModelConfig {
	modelId: string
	temperature: number
}

/** Decides which sources a question consults before the concurrent fan-out. */
export type SourceSelector = (question: string) => ReadonlySet<SourceKind>

// =================================================================================
// Observability
// =================================================================================

/** Interface for a pluggable logger. */
export interface ILogger {
	debug: (message: string, meta?: Record<string, unknown>) => void
	info: (message: string, meta?: Record<string, unknown>) => void
	warn: (message: string, meta?: Record<string, unknown>) => void
	error: (message: string, meta?: Record<string, unknown>) => void
}

/** Structured events emitted while ingesting documents and answering questions. */
export type RagEvent =
	| { type: 'ingest:start'; payload: { documentId: string; characters: number } }
	| { type: 'segment:dropped'; payload: { documentId: string; segmentId: string; error: RagError } }
	| { type: 'ingest:finish'; payload: { documentId: string; segments: number; dropped: number } }
	| { type: 'ask:start'; payload: { question: string; sources: SourceKind[] } }
	| { type: 'source:degraded'; payload: { question: string; source: SourceKind; error: RagError } }
	| { type: 'ask:finish'; payload: { question: string; record: AnswerRecord } }
	| { type: 'ask:error'; payload: { question: string; error: RagError } }

/** Interface for a pluggable event bus. */
export interface IEventBus {
	emit: (event: RagEvent) => void | Promise<void>
}
