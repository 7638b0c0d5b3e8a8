import { InvalidConfigError } from './errors'

/** What happens to a segment whose embedding still fails after every retry. */
export type DroppedSegmentPolicy = 'discard' | 'retry-on-query'

export interface PipelineConfig {
	/** Target segment length, in characters. */
	chunkSize: number
	/** Characters shared by consecutive segments. Must be smaller than `chunkSize`. */
	chunkOverlap: number
	/** How far before the hard limit a cut may move to land on whitespace. Defaults to a quarter of `chunkSize`. */
	boundaryTolerance?: number
	/** Document segments retrieved per question. */
	retrievalK: number
	/** Web snippets requested per question. */
	webResultCount: number
	modelId: string
	temperature: number
	/** Retries after the first failed embedding attempt. */
	embeddingRetries: number
	/** Base delay of the exponential backoff between embedding attempts. */
	retryDelayMs: number
	/** Upper bound for every external call. */
	requestTimeoutMs: number
	/** Segments embedded at once during ingestion. */
	embeddingConcurrency: number
	/** Embeddings kept in memory for reuse; 0 disables the cache. */
	embeddingCacheSize: number
	droppedSegmentPolicy: DroppedSegmentPolicy
}

export const MAX_EMBEDDING_RETRIES = 10

export const DEFAULT_PIPELINE_CONFIG: Readonly<PipelineConfig> = Object.freeze({
	chunkSize: 1000,
	chunkOverlap: 200,
	retrievalK: 4,
	webResultCount: 3,
	modelId: 'openai/gpt-3.5-turbo',
	temperature: 0.3,
	embeddingRetries: 2,
	retryDelayMs: 250,
	requestTimeoutMs: 30_000,
	embeddingConcurrency: 4,
	embeddingCacheSize: 2048,
	droppedSegmentPolicy: 'discard',
})

/** Model identifiers offered to users, routed through OpenRouter. */
export const AVAILABLE_MODELS = [
	'openai/gpt-4o',
	'openai/gpt-4-turbo',
	'openai/gpt-3.5-turbo',
	'anthropic/claude-3.5-sonnet',
	'meta-llama/llama-3.1-70b-instruct',
] as const

function assertInteger(name: string, value: number, min: number, max = Number.MAX_SAFE_INTEGER): void {
	if (!Number.isInteger(value) || value < min || value > max) {
		const range = max === Number.MAX_SAFE_INTEGER ? `>= ${min}` : `between ${min} and ${max}`
		throw new InvalidConfigError(`${name} must be an integer ${range}, got ${value}`)
	}
}

export function validateChunking(chunkSize: number, chunkOverlap: number, boundaryTolerance?: number): void {
	assertInteger('chunkSize', chunkSize, 1)
	assertInteger('chunkOverlap', chunkOverlap, 1)
	if (chunkOverlap >= chunkSize) {
		throw new InvalidConfigError(`chunkOverlap (${chunkOverlap}) must be smaller than chunkSize (${chunkSize})`)
	}
	if (boundaryTolerance !== undefined) assertInteger('boundaryTolerance', boundaryTolerance, 0, chunkSize)
}

export function validateModelConfig(modelId: string, temperature: number): void {
	if (modelId.trim().length === 0) {
		throw new InvalidConfigError('modelId must not be empty')
	}
	if (!Number.isFinite(temperature) || temperature < 0 || temperature > 1) {
		throw new InvalidConfigError(`temperature must be within [0, 1], got ${temperature}`)
	}
}

/**
 * Merges overrides onto the defaults and validates the result.
 * @throws {InvalidConfigError} when any option is out of range.
 */
export function resolvePipelineConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
	const defaults = DEFAULT_PIPELINE_CONFIG
	const config: PipelineConfig = {
		chunkSize: overrides.chunkSize ?? defaults.chunkSize,
		chunkOverlap: overrides.chunkOverlap ?? defaults.chunkOverlap,
		boundaryTolerance: overrides.boundaryTolerance,
		retrievalK: overrides.retrievalK ?? defaults.retrievalK,
		webResultCount: overrides.webResultCount ?? defaults.webResultCount,
		modelId: overrides.modelId ?? defaults.modelId,
		temperature: overrides.temperature ?? defaults.temperature,
		embeddingRetries: overrides.embeddingRetries ?? defaults.embeddingRetries,
		retryDelayMs: overrides.retryDelayMs ?? defaults.retryDelayMs,
		requestTimeoutMs: overrides.requestTimeoutMs ?? defaults.requestTimeoutMs,
		embeddingConcurrency: overrides.embeddingConcurrency ?? defaults.embeddingConcurrency,
		embeddingCacheSize: overrides.embeddingCacheSize ?? defaults.embeddingCacheSize,
		droppedSegmentPolicy: overrides.droppedSegmentPolicy ?? defaults.droppedSegmentPolicy,
	}

	validateChunking(config.chunkSize, config.chunkOverlap, config.boundaryTolerance)
	assertInteger('retrievalK', config.retrievalK, 1)
	assertInteger('webResultCount', config.webResultCount, 0)
	validateModelConfig(config.modelId, config.temperature)
	assertInteger('embeddingRetries', config.embeddingRetries, 0, MAX_EMBEDDING_RETRIES)
	assertInteger('retryDelayMs', config.retryDelayMs, 0)
	assertInteger('requestTimeoutMs', config.requestTimeoutMs, 1)
	assertInteger('embeddingConcurrency', config.embeddingConcurrency, 1)
	assertInteger('embeddingCacheSize', config.embeddingCacheSize, 0)
	if (config.droppedSegmentPolicy !== 'discard' && config.droppedSegmentPolicy !== 'retry-on-query') {
		throw new InvalidConfigError(`Unknown droppedSegmentPolicy: ${String(config.droppedSegmentPolicy)}`)
	}
	return config
}
