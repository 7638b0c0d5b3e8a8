import type { EmbeddingBackend } from '../types'

const DEFAULT_DIMENSION = 384

/** FNV-1a, 32 bit. */
function fnv1a(token: string): number {
	let hash = 0x811c9dc5
	for (const char of token) {
		hash ^= char.codePointAt(0) ?? 0
		hash = Math.imul(hash, 0x01000193) >>> 0
	}
	return hash
}

/** Lowercased word tokens with a plural `s` stripped, so "Prompts" matches "prompt". */
export function tokenize(text: string): string[] {
	const words = text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? []
	return words.map(word => (word.length > 3 && word.endsWith('s') && !word.endsWith('ss') ? word.slice(0, -1) : word))
}

/**
 * A local, deterministic embedder based on signed feature hashing of word tokens.
 * Needs no model download or network access; similarity reflects shared vocabulary
 * rather than meaning.
 */
export class HashingEmbeddingBackend implements EmbeddingBackend {
	public readonly dimension: number

	constructor(options: { dimension?: number } = {}) {
		this.dimension = options.dimension ?? DEFAULT_DIMENSION
	}

	async embed(text: string): Promise<number[]> {
		const vector = new Array<number>(this.dimension).fill(0)
		for (const token of tokenize(text)) {
			const hash = fnv1a(token)
			const sign = (hash >>> 16) & 1 ? -1 : 1
			vector[hash % this.dimension] += sign
		}
		return vector
	}
}
