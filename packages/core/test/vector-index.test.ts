import type { EmbeddingBackend } from '../src/types'
import { describe, expect, it } from 'vitest'
import { chunkText } from '../src/chunker'
import { Embedder } from '../src/embedder'
import { DimensionMismatchError, EmbeddingServiceError, EmptyInputError, InvalidConfigError } from '../src/errors'
import { Retriever } from '../src/retriever'
import { VocabularyEmbeddingBackend } from '../src/testing'
import { VectorIndex } from '../src/vector-index'

const VOCABULARY = ['prompt', 'instruction', 'model', 'output', 'guide']
const PROMPT_DOC = 'Prompts are instructions given to a model. They guide output.'

function promptSegments() {
	return chunkText({ text: PROMPT_DOC, documentId: 'doc' }, { chunkSize: 40, chunkOverlap: 10 })
}

/** Fails for texts containing `marker` until `recover()` is called. */
class FlakyBackend implements EmbeddingBackend {
	private failing = true
	private readonly inner = new VocabularyEmbeddingBackend(VOCABULARY)
	public readonly dimension = this.inner.dimension

	constructor(private readonly marker: string) {}

	recover(): void {
		this.failing = false
	}

	async embed(text: string): Promise<number[]> {
		if (this.failing && text.includes(this.marker)) throw new Error('temporarily unavailable')
		return this.inner.embed(text)
	}
}

describe('VectorIndex', () => {
	it('should rank the segment sharing the question terms first', async () => {
		const embedder = new Embedder(new VocabularyEmbeddingBackend(VOCABULARY))
		const index = await VectorIndex.build(promptSegments(), embedder)

		const results = await index.search('What is a prompt?', 2)

		expect(results.map(r => r.text)).toEqual(['Prompts are instructions given to a ', 'iven to a model. They guide output.'])
		expect(results[0]).toMatchObject({ sourceLabel: 'document', segmentId: 'doc:0' })
		expect(results[0].score).toBeCloseTo(Math.SQRT1_2, 10)
		expect(results[1].score).toBe(0)
	})

	it('should return at most k results', async () => {
		const embedder = new Embedder(new VocabularyEmbeddingBackend(VOCABULARY))
		const index = await VectorIndex.build(promptSegments(), embedder)

		await expect(index.search('model output', 1)).resolves.toHaveLength(1)
		await expect(index.search('model output', 10)).resolves.toHaveLength(2)
	})

	it('should keep ingestion order for equal scores', async () => {
		const embedder = new Embedder(new VocabularyEmbeddingBackend(VOCABULARY))
		const segments = chunkText({ text: 'model one. model two.', documentId: 'tie' }, { chunkSize: 11, chunkOverlap: 1 })
		const index = await VectorIndex.build(segments, embedder)

		const results = await index.search('model', 2)

		expect(results.map(r => r.segmentId)).toEqual(['tie:0', 'tie:1'])
	})

	it('should return nothing from an empty index without embedding the query', async () => {
		const backend = new VocabularyEmbeddingBackend(VOCABULARY)
		const index = new VectorIndex({ documentId: 'empty', embedder: new Embedder(backend) })

		await expect(index.search('anything', 3)).resolves.toEqual([])
		expect(backend.calls).toBe(0)
	})

	it('should reject a k below one', async () => {
		const index = new VectorIndex({ documentId: 'empty', embedder: new Embedder(new VocabularyEmbeddingBackend(VOCABULARY)) })

		await expect(index.search('anything', 0)).rejects.toThrow(InvalidConfigError)
	})

	it('should reject a vector of another dimension', () => {
		const index = new VectorIndex({
			documentId: 'doc',
			embedder: new Embedder(new VocabularyEmbeddingBackend(VOCABULARY)),
			dimension: 6,
		})

		expect(() => index.add(promptSegments()[0], [1, 0])).toThrow(DimensionMismatchError)
		expect(() => index.add(promptSegments()[0], [1, 0])).toThrow('Expected a vector of dimension 6, got 2')
	})

	it('should refuse to build from no segments', async () => {
		const embedder = new Embedder(new VocabularyEmbeddingBackend(VOCABULARY))

		await expect(VectorIndex.build([], embedder)).rejects.toThrow(EmptyInputError)
	})

	it('should fail when not a single segment could be embedded', async () => {
		const embedder = new Embedder(new FlakyBackend(' '), { retries: 0 })

		const error = await VectorIndex.build(promptSegments(), embedder).catch((e: unknown) => e)

		expect(error).toBeInstanceOf(EmbeddingServiceError)
		expect(error).toMatchObject({ message: 'None of the 2 segments could be embedded', isFatal: true })
	})

	it('should discard segments that failed during ingestion', async () => {
		const backend = new FlakyBackend('model')
		const index = await VectorIndex.build(promptSegments(), new Embedder(backend, { retries: 0 }))
		backend.recover()

		await index.search('prompt', 4)

		expect(index.size).toBe(1)
		expect(index.droppedSegments.map(s => s.id)).toEqual(['doc:1'])
	})

	it('should retry dropped segments on the next search when asked to', async () => {
		const backend = new FlakyBackend('model')
		const index = await VectorIndex.build(promptSegments(), new Embedder(backend, { retries: 0 }), {
			droppedSegmentPolicy: 'retry-on-query',
		})
		expect(index.droppedSegments).toHaveLength(1)
		backend.recover()

		const results = await index.search('model output', 4)

		expect(index.size).toBe(2)
		expect(index.droppedSegments).toEqual([])
		expect(results[0].segmentId).toBe('doc:1')
	})

	it('should discard segments that fail their retry', async () => {
		const backend = new FlakyBackend('model')
		const index = await VectorIndex.build(promptSegments(), new Embedder(backend, { retries: 0 }), {
			droppedSegmentPolicy: 'retry-on-query',
		})

		await index.search('prompt', 4)
		await index.search('prompt', 4)

		expect(index.size).toBe(1)
		expect(index.droppedSegments.map(s => s.id)).toEqual(['doc:1'])
	})
})

describe('Retriever', () => {
	it('should search the index with its k', async () => {
		const embedder = new Embedder(new VocabularyEmbeddingBackend(VOCABULARY))
		const index = await VectorIndex.build(promptSegments(), embedder)

		const results = await new Retriever(1).retrieve('What is a prompt?', index)

		expect(results.map(r => r.segmentId)).toEqual(['doc:0'])
	})

	it('should reject a blank question', async () => {
		const embedder = new Embedder(new VocabularyEmbeddingBackend(VOCABULARY))
		const index = await VectorIndex.build(promptSegments(), embedder)

		await expect(new Retriever().retrieve('  ', index)).rejects.toThrow(EmptyInputError)
	})
})
