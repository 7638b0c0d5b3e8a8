import { describe, expect, it } from 'vitest'
import { DEFAULT_PIPELINE_CONFIG, resolvePipelineConfig, validateModelConfig } from '../src/config'
import { InvalidConfigError } from '../src/errors'

describe('resolvePipelineConfig', () => {
	it('should fall back to the defaults', () => {
		expect(resolvePipelineConfig()).toEqual({ ...DEFAULT_PIPELINE_CONFIG, boundaryTolerance: undefined })
	})

	it('should apply overrides field by field', () => {
		const config = resolvePipelineConfig({ chunkSize: 500, chunkOverlap: 50, modelId: 'openai/gpt-4o' })

		expect(config.chunkSize).toBe(500)
		expect(config.chunkOverlap).toBe(50)
		expect(config.modelId).toBe('openai/gpt-4o')
		expect(config.retrievalK).toBe(DEFAULT_PIPELINE_CONFIG.retrievalK)
	})

	it('should accept zero web results', () => {
		expect(resolvePipelineConfig({ webResultCount: 0 }).webResultCount).toBe(0)
	})

	it.each([
		[{ chunkSize: 0 }, 'chunkSize must be an integer >= 1, got 0'],
		[{ chunkOverlap: 1000 }, 'chunkOverlap (1000) must be smaller than chunkSize (1000)'],
		[{ retrievalK: 0 }, 'retrievalK must be an integer >= 1, got 0'],
		[{ webResultCount: -1 }, 'webResultCount must be an integer >= 0, got -1'],
		[{ embeddingRetries: 11 }, 'embeddingRetries must be an integer between 0 and 10, got 11'],
		[{ requestTimeoutMs: 0 }, 'requestTimeoutMs must be an integer >= 1, got 0'],
		[{ embeddingConcurrency: 1.5 }, 'embeddingConcurrency must be an integer >= 1, got 1.5'],
		[{ embeddingCacheSize: -1 }, 'embeddingCacheSize must be an integer >= 0, got -1'],
		[{ temperature: -0.1 }, 'temperature must be within [0, 1], got -0.1'],
		[{ boundaryTolerance: 2000 }, 'boundaryTolerance must be an integer between 0 and 1000, got 2000'],
	])('should reject %o', (overrides, message) => {
		expect(() => resolvePipelineConfig(overrides)).toThrow(new InvalidConfigError(message))
	})
})

describe('validateModelConfig', () => {
	it('should accept the bounds of the temperature range', () => {
		expect(() => validateModelConfig('m', 0)).not.toThrow()
		expect(() => validateModelConfig('m', 1)).not.toThrow()
	})

	it('should reject a blank model id', () => {
		expect(() => validateModelConfig('  ', 0.5)).toThrow('modelId must not be empty')
	})
})
