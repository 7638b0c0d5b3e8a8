/** Dot product of two equal-length vectors. */
export function dot(a: readonly number[], b: readonly number[]): number {
	if (a.length !== b.length) {
		throw new Error('Vectors must have the same length')
	}
	let sum = 0
	for (let i = 0; i < a.length; i++) sum += a[i] * b[i]
	return sum
}

export function magnitude(vector: readonly number[]): number {
	return Math.sqrt(dot(vector, vector))
}

/** Cosine similarity; 0 when either vector has no magnitude. */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
	const normA = magnitude(a)
	const normB = magnitude(b)
	if (normA === 0 || normB === 0) return 0
	return dot(a, b) / (normA * normB)
}

/**
 * Scales a vector to unit length.
 * Returns `null` for a zero or non-finite vector, which has no direction.
 */
export function l2Normalize(vector: readonly number[]): number[] | null {
	const norm = magnitude(vector)
	if (norm === 0 || !Number.isFinite(norm)) return null
	return vector.map(value => value / norm)
}
