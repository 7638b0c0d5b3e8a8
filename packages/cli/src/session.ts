import type { ResolvedCliConfig } from './config.js'
import type { EmbeddingBackend, ILogger } from 'ragbridge'
import {
	DocumentSession,
	HashingEmbeddingBackend,
	InvalidConfigError,
	OpenAIEmbeddingBackend,
	OpenAIGenerationBackend,
	RagPipeline,
	SerpApiSearchBackend,
} from 'ragbridge'

function createEmbeddingBackend(config: ResolvedCliConfig): EmbeddingBackend {
	if (config.embeddings === 'hashing') return new HashingEmbeddingBackend()
	if (!config.openAiApiKey) {
		throw new InvalidConfigError('OPENAI_API_KEY is required for OpenAI embeddings; use --embeddings hashing to embed locally')
	}
	return new OpenAIEmbeddingBackend({ apiKey: config.openAiApiKey })
}

/** Wires the configured backends into a pipeline. Web search is left out without a SerpApi key. */
export function createPipeline(config: ResolvedCliConfig, logger: ILogger): RagPipeline {
	if (!config.openRouterApiKey) {
		throw new InvalidConfigError('OPENROUTER_API_KEY is not set')
	}
	return new RagPipeline({
		embeddingBackend: createEmbeddingBackend(config),
		generationBackend: OpenAIGenerationBackend.openRouter(config.openRouterApiKey),
		searchBackend: config.serpApiKey ? new SerpApiSearchBackend(config.serpApiKey) : undefined,
		config: config.pipeline,
		logger,
	})
}

export function createSession(config: ResolvedCliConfig, logger: ILogger): DocumentSession {
	return new DocumentSession(createPipeline(config, logger))
}
