import type { SearchResult } from './types'
import type { VectorIndex } from './vector-index'
import { DEFAULT_PIPELINE_CONFIG } from './config'
import { EmptyInputError } from './errors'

/** Finds the document segments most relevant to a question. */
export class Retriever {
	constructor(private readonly k: number = DEFAULT_PIPELINE_CONFIG.retrievalK) {}

	/**
	 * @throws {EmptyInputError} when the question is blank.
	 * @throws {EmbeddingServiceError} when the question cannot be embedded.
	 */
	async retrieve(question: string, index: VectorIndex): Promise<SearchResult[]> {
		if (question.trim().length === 0) {
			throw new EmptyInputError('Question is empty')
		}
		return index.search(question, this.k)
	}
}
