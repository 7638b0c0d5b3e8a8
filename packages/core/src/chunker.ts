import type { DocumentInput, Segment } from './types'
import { createHash } from 'node:crypto'
import { validateChunking } from './config'
import { EmptyInputError } from './errors'

export interface ChunkOptions {
	chunkSize: number
	chunkOverlap: number
	/** Defaults to a quarter of `chunkSize`. */
	boundaryTolerance?: number
}

/** Derives a stable document id from its content. */
export function createDocumentId(text: string): string {
	return `doc_${createHash('sha256').update(text).digest('hex').slice(0, 12)}`
}

function isWhitespace(char: string | undefined): boolean {
	return char !== undefined && /\s/.test(char)
}

/**
 * Picks the end (exclusive) of the segment starting at `start`. Candidates lie in
 * `[windowStart, hardEnd]`; a paragraph break wins over a line break, which wins
 * over any whitespace. Without a candidate the cut is hard.
 */
function findBoundary(text: string, start: number, hardEnd: number, overlap: number, tolerance: number): number {
	const windowStart = Math.max(start + overlap + 1, hardEnd - tolerance)
	const matchers: ((end: number) => boolean)[] = [
		end => end - 2 >= start && text.slice(end - 2, end) === '\n\n',
		end => text[end - 1] === '\n',
		end => isWhitespace(text[end - 1]),
	]
	for (const matches of matchers) {
		for (let end = hardEnd; end >= windowStart; end--) {
			if (matches(end)) return end
		}
	}
	return hardEnd
}

function pageAt(pageOffsets: readonly number[] | undefined, offset: number): number | undefined {
	if (!pageOffsets || pageOffsets.length === 0) return undefined
	let page = 1
	for (let i = 0; i < pageOffsets.length; i++) {
		if (pageOffsets[i] <= offset) page = i + 1
		else break
	}
	return page
}

/**
 * Splits document text into overlapping segments of at most `chunkSize` characters.
 *
 * Leading and trailing whitespace of the document is skipped; everything between
 * is sliced verbatim, so consecutive segments share exactly `chunkOverlap`
 * characters and dropping that prefix from every segment after the first
 * reconstructs the text.
 *
 * @throws {EmptyInputError} when the text holds nothing but whitespace.
 * @throws {InvalidConfigError} when the sizes are not positive integers or overlap >= size.
 */
export function chunkText(input: string | DocumentInput, options: ChunkOptions): Segment[] {
	const { chunkSize, chunkOverlap } = options
	validateChunking(chunkSize, chunkOverlap, options.boundaryTolerance)
	const tolerance = options.boundaryTolerance ?? Math.floor(chunkSize / 4)

	const document: DocumentInput = typeof input === 'string' ? { text: input } : input
	const { text } = document
	const first = text.search(/\S/)
	if (first === -1) {
		throw new EmptyInputError('Document contains no text')
	}
	let last = text.length
	while (isWhitespace(text[last - 1])) last--

	const documentId = document.documentId ?? createDocumentId(text)
	const segments: Segment[] = []
	let start = first
	for (;;) {
		const hardEnd = start + chunkSize
		const end = hardEnd >= last ? last : findBoundary(text, start, hardEnd, chunkOverlap, tolerance)
		const ordinal = segments.length
		const page = pageAt(document.pageOffsets, start)
		segments.push(
			Object.freeze({
				id: `${documentId}:${ordinal}`,
				text: text.slice(start, end),
				sourceOffset: start,
				sourceDocumentId: documentId,
				ordinal,
				...(page !== undefined ? { page } : {}),
			}),
		)
		if (end >= last) break
		start = end - chunkOverlap
	}
	return segments
}
