export type RagErrorCode =
	| 'RAG_ERROR'
	| 'EMPTY_INPUT'
	| 'EMBEDDING_SERVICE'
	| 'WEB_SEARCH_UNAVAILABLE'
	| 'GENERATION_SERVICE'
	| 'INVALID_CONFIG'
	| 'DIMENSION_MISMATCH'
	| 'SESSION_BUSY'

export interface RagErrorOptions {
	cause?: unknown
	isFatal?: boolean
}

/**
 * Base class for every error the pipeline surfaces. Raw transport errors from
 * backends are wrapped in one of the subclasses and kept as `cause`.
 */
export class RagError extends Error {
	public readonly code: RagErrorCode
	public readonly isFatal: boolean

	constructor(message: string, options: RagErrorOptions = {}, code: RagErrorCode = 'RAG_ERROR') {
		super(message, { cause: options.cause })
		this.name = 'RagError'
		this.code = code
		this.isFatal = options.isFatal ?? false
	}
}

/** The document (or question) holds no text once whitespace is removed. */
export class EmptyInputError extends RagError {
	constructor(message = 'Input text is empty', options: RagErrorOptions = {}) {
		super(message, { isFatal: true, ...options }, 'EMPTY_INPUT')
		this.name = 'EmptyInputError'
	}
}

/** The embedding backend is unreachable, timed out, or returned malformed output. */
export class EmbeddingServiceError extends RagError {
	constructor(message: string, options: RagErrorOptions = {}) {
		super(message, options, 'EMBEDDING_SERVICE')
		this.name = 'EmbeddingServiceError'
	}
}

/** Web search failed, timed out, or is not configured. Recoverable per question. */
export class WebSearchUnavailableError extends RagError {
	constructor(message: string, options: RagErrorOptions = {}) {
		super(message, options, 'WEB_SEARCH_UNAVAILABLE')
		this.name = 'WebSearchUnavailableError'
	}
}

/** The text-generation backend failed for the current question. */
export class GenerationServiceError extends RagError {
	constructor(message: string, options: RagErrorOptions = {}) {
		super(message, options, 'GENERATION_SERVICE')
		this.name = 'GenerationServiceError'
	}
}

export class InvalidConfigError extends RagError {
	constructor(message: string, options: RagErrorOptions = {}) {
		super(message, { isFatal: true, ...options }, 'INVALID_CONFIG')
		this.name = 'InvalidConfigError'
	}
}

export class DimensionMismatchError extends RagError {
	constructor(
		public readonly expected: number,
		public readonly actual: number,
	) {
		super(`Expected a vector of dimension ${expected}, got ${actual}`, { isFatal: true }, 'DIMENSION_MISMATCH')
		this.name = 'DimensionMismatchError'
	}
}

/** A question arrived while a document upload was still being ingested. */
export class SessionBusyError extends RagError {
	constructor(message = 'A document is still being ingested') {
		super(message, {}, 'SESSION_BUSY')
		this.name = 'SessionBusyError'
	}
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

/** Normalizes anything thrown into a `RagError`, keeping the original as `cause`. */
export function toRagError(error: unknown, message?: string): RagError {
	if (error instanceof RagError) return error
	return new RagError(message ?? errorMessage(error), { cause: error })
}
