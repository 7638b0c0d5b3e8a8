import type { AnswerRecord, GenerationBackend, ILogger, ModelConfig, SearchResult, SourceKind } from './types'
import { DEFAULT_PIPELINE_CONFIG, validateModelConfig } from './config'
import { EmptyInputError, errorMessage, GenerationServiceError } from './errors'
import { NullLogger } from './logger'
import { withTimeout } from './utils/timeout'

export const GROUNDED_INSTRUCTION = `You are a helpful AI assistant. Answer the user's question using only the provided context.

RULES:
1. Use the DOCUMENT CONTENT first if it contains relevant information
2. Use the WEB SEARCH RESULTS as a supplement, or when the document does not cover the topic
3. Cite the label of the source behind every claim, e.g. [Document 1] or [Web 2]
4. If the context does not contain the answer, say so clearly
5. Keep answers concise but comprehensive`

export const UNGROUNDED_INSTRUCTION = `You are a helpful AI assistant. No grounding context was found for this question: neither the document nor the web search returned any relevant text.

RULES:
1. Say clearly that no supporting context was found
2. Do not cite any source and do not invent citations
3. If you answer from general knowledge, say so explicitly`

export const NO_CONTEXT = 'No context available.'

const ENTRY_SEPARATOR = '\n\n---\n\n'

export interface Prompt {
	systemInstruction: string
	context: string
	question: string
}

function documentHeading(result: SearchResult, position: number): string {
	return result.page !== undefined ? `[Document ${position}] (page ${result.page})` : `[Document ${position}]`
}

function webHeading(result: SearchResult, position: number): string {
	const details = [result.title, result.url].filter(Boolean).join(' - ')
	return details ? `[Web ${position}] ${details}` : `[Web ${position}]`
}

/** Lays out the labelled snippets and picks the instruction that matches them. */
export function buildPrompt(
	question: string,
	documentSnippets: readonly SearchResult[],
	webSnippets: readonly SearchResult[],
): Prompt {
	const sections: string[] = []
	if (documentSnippets.length > 0) {
		const entries = documentSnippets.map((result, i) => `${documentHeading(result, i + 1)}\n${result.text}`)
		sections.push(`=== DOCUMENT CONTENT ===\n${entries.join(ENTRY_SEPARATOR)}`)
	}
	if (webSnippets.length > 0) {
		const entries = webSnippets.map((result, i) => `${webHeading(result, i + 1)}\n${result.text}`)
		sections.push(`=== WEB SEARCH RESULTS ===\n${entries.join(ENTRY_SEPARATOR)}`)
	}
	return {
		systemInstruction: sections.length > 0 ? GROUNDED_INSTRUCTION : UNGROUNDED_INSTRUCTION,
		context: sections.length > 0 ? sections.join('\n\n') : NO_CONTEXT,
		question,
	}
}

/** The provenance tag shown under an answer. */
export function formatSourceLabel(record: Pick<AnswerRecord, 'sourcesUsed'>): string {
	const hasDocument = record.sourcesUsed.includes('document')
	const hasWeb = record.sourcesUsed.includes('web')
	if (hasDocument && hasWeb) return 'Document & Web'
	if (hasDocument) return 'Document'
	if (hasWeb) return 'Web'
	return 'Model only'
}

export interface AnswerComposerOptions {
	timeoutMs?: number
	logger?: ILogger
	now?: () => Date
}

export interface ComposeOptions {
	/** Degradation notices collected while gathering the snippets. */
	notices?: readonly string[]
	/** Defaults to whether any notice was given. */
	degraded?: boolean
}

/** Merges document and web snippets into one prompt and asks the model. */
export class AnswerComposer {
	private readonly timeoutMs: number
	private readonly logger: ILogger
	private readonly now: () => Date

	constructor(
		private readonly backend: GenerationBackend,
		options: AnswerComposerOptions = {},
	) {
		this.timeoutMs = options.timeoutMs ?? DEFAULT_PIPELINE_CONFIG.requestTimeoutMs
		this.logger = options.logger ?? new NullLogger()
		this.now = options.now ?? (() => new Date())
	}

	/**
	 * @throws {EmptyInputError} when the question is blank.
	 * @throws {InvalidConfigError} for an empty model id or a temperature outside [0, 1].
	 * @throws {GenerationServiceError} when the backend fails, times out, or returns nothing.
	 */
	async answer(
		question: string,
		documentSnippets: readonly SearchResult[],
		webSnippets: readonly SearchResult[],
		model: ModelConfig,
		options: ComposeOptions = {},
	): Promise<AnswerRecord> {
		if (question.trim().length === 0) {
			throw new EmptyInputError('Question is empty')
		}
		validateModelConfig(model.modelId, model.temperature)

		const prompt = buildPrompt(question, documentSnippets, webSnippets)
		this.logger.debug('Sending prompt to generation backend', {
			modelId: model.modelId,
			documentSnippets: documentSnippets.length,
			webSnippets: webSnippets.length,
		})

		let answerText: string
		try {
			answerText = await withTimeout(
				signal => this.backend.generate({ ...prompt, modelId: model.modelId, temperature: model.temperature, signal }),
				this.timeoutMs,
				'Generation request',
			)
		} catch (error) {
			throw new GenerationServiceError(`Generation backend failed: ${errorMessage(error)}`, { cause: error })
		}
		if (typeof answerText !== 'string' || answerText.trim().length === 0) {
			throw new GenerationServiceError('Generation backend returned an empty completion')
		}

		const sourcesUsed: SourceKind[] = []
		if (documentSnippets.length > 0) sourcesUsed.push('document')
		if (webSnippets.length > 0) sourcesUsed.push('web')
		const notices = [...(options.notices ?? [])]

		return Object.freeze({
			question,
			retrievedDocumentSnippets: documentSnippets,
			retrievedWebSnippets: webSnippets,
			answerText,
			timestamp: this.now(),
			sourcesUsed,
			degraded: options.degraded ?? notices.length > 0,
			notices,
		})
	}
}
