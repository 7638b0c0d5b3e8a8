import type { RagPipeline } from './pipeline'
import type { AnswerRecord, DocumentInput } from './types'
import type { VectorIndex } from './vector-index'
import { SessionBusyError } from './errors'

/**
 * One user's conversation: the index of the current document and the answers
 * given so far. Each session owns its own index; nothing is shared between sessions.
 */
export class DocumentSession {
	private index: VectorIndex | undefined
	private readonly records: AnswerRecord[] = []
	private ingesting = false

	constructor(private readonly pipeline: RagPipeline) {}

	get hasDocument(): boolean {
		return this.index !== undefined
	}

	get documentId(): string | undefined {
		return this.index?.documentId
	}

	get segmentCount(): number {
		return this.index?.size ?? 0
	}

	get history(): readonly AnswerRecord[] {
		return [...this.records]
	}

	/**
	 * Ingests a new document and replaces the current index with it.
	 * If ingestion fails the previous index stays in place and the error is rethrown.
	 */
	async upload(input: string | DocumentInput): Promise<VectorIndex> {
		if (this.ingesting) throw new SessionBusyError()
		this.ingesting = true
		try {
			const index = await this.pipeline.ingest(input)
			this.index = index
			return index
		} finally {
			this.ingesting = false
		}
	}

	/**
	 * Answers a question against the current document and appends the record.
	 * A failed question leaves the index and the history untouched.
	 */
	async ask(question: string): Promise<AnswerRecord> {
		if (this.ingesting) throw new SessionBusyError()
		const record = await this.pipeline.ask(question, this.index)
		this.records.push(record)
		return record
	}

	clearHistory(): void {
		this.records.length = 0
	}
}
