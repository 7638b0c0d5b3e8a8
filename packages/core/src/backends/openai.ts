import type { EmbeddingBackend, GenerationBackend, GenerationRequest, RequestOptions } from '../types'
import OpenAI from 'openai'

export const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1'

export interface OpenAIClientOptions {
	/** A preconfigured client. Takes precedence over the remaining options. */
	client?: OpenAI
	apiKey?: string
	baseURL?: string
	defaultHeaders?: Record<string, string>
}

function createClient(options: OpenAIClientOptions): OpenAI {
	return (
		options.client
		?? new OpenAI({
			apiKey: options.apiKey,
			baseURL: options.baseURL,
			defaultHeaders: options.defaultHeaders,
			// retries are handled by the pipeline
			maxRetries: 0,
		})
	)
}

/** Calls the Embeddings API of OpenAI or any compatible endpoint. */
export class OpenAIEmbeddingBackend implements EmbeddingBackend {
	public readonly dimension?: number
	private readonly client: OpenAI
	private readonly model: string

	constructor(options: OpenAIClientOptions & { model?: string; dimension?: number } = {}) {
		this.client = createClient(options)
		this.model = options.model ?? 'text-embedding-3-small'
		this.dimension = options.dimension
	}

	async embed(text: string, options: RequestOptions = {}): Promise<number[]> {
		const response = await this.client.embeddings.create(
			{
				model: this.model,
				input: text.replace(/\n/g, ' '),
				encoding_format: 'float',
				...(this.dimension !== undefined ? { dimensions: this.dimension } : {}),
			},
			{ signal: options.signal },
		)
		return response.data[0]?.embedding ?? []
	}
}

/** The user turn sent alongside the system instruction. */
export function formatUserMessage(context: string, question: string): string {
	return `Context:\n${context}\n\n---\n\nQuestion: ${question}`
}

/** Calls the Chat Completions API of OpenAI or any compatible endpoint. */
export class OpenAIGenerationBackend implements GenerationBackend {
	private readonly client: OpenAI

	constructor(options: OpenAIClientOptions = {}) {
		this.client = createClient(options)
	}

	/**
	 * A backend routed through OpenRouter, which serves the models in `AVAILABLE_MODELS`.
	 * @param options.referer Sent as `HTTP-Referer` for OpenRouter's app attribution.
	 * @param options.title Sent as `X-Title`.
	 */
	static openRouter(apiKey: string, options: { referer?: string; title?: string } = {}): OpenAIGenerationBackend {
		return new OpenAIGenerationBackend({
			apiKey,
			baseURL: OPENROUTER_BASE_URL,
			defaultHeaders: {
				'HTTP-Referer': options.referer ?? 'http://localhost',
				'X-Title': options.title ?? 'ragbridge',
			},
		})
	}

	async generate(request: GenerationRequest): Promise<string> {
		const response = await this.client.chat.completions.create(
			{
				model: request.modelId,
				temperature: request.temperature,
				messages: [
					{ role: 'system', content: request.systemInstruction },
					{ role: 'user', content: formatUserMessage(request.context, request.question) },
				],
			},
			{ signal: request.signal },
		)
		return response.choices[0]?.message?.content ?? ''
	}
}
