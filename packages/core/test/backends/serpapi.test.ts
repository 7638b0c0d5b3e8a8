import type { SerpApiParameters } from '../../src/backends/serpapi'
import { describe, expect, it, vi } from 'vitest'
import { parseOrganicResults, SerpApiSearchBackend } from '../../src/backends/serpapi'

const response = {
	search_metadata: { status: 'Success' },
	organic_results: [
		{ position: 1, title: 'Prompt engineering', link: 'https://example.com/prompts', snippet: 'Prompts guide a model.' },
		{ position: 2, title: 'No snippet here', link: 'https://example.com/empty' },
		{ position: 3, snippet: 'Bare snippet.' },
		{ position: 4, title: 'Later', link: 'https://example.com/later', snippet: 'Another snippet.' },
	],
}

describe('parseOrganicResults', () => {
	it('should keep results with a snippet', () => {
		expect(parseOrganicResults(response)).toEqual([
			{ text: 'Prompts guide a model.', url: 'https://example.com/prompts', title: 'Prompt engineering' },
			{ text: 'Bare snippet.' },
			{ text: 'Another snippet.', url: 'https://example.com/later', title: 'Later' },
		])
	})

	it('should read nothing from an unexpected shape', () => {
		expect(parseOrganicResults(null)).toEqual([])
		expect(parseOrganicResults({ organic_results: 'none' })).toEqual([])
		expect(parseOrganicResults({ organic_results: [42, null] })).toEqual([])
	})
})

describe('SerpApiSearchBackend', () => {
	it('should query Google with the key and cap the results', async () => {
		const request = vi.fn(async (_parameters: SerpApiParameters): Promise<unknown> => response)
		const backend = new SerpApiSearchBackend('test-secret', { request })

		const hits = await backend.search('what is a prompt', 2)

		expect(request).toHaveBeenCalledWith({ engine: 'google', q: 'what is a prompt', num: 2, api_key: 'test-secret' })
		expect(hits.map(hit => hit.text)).toEqual(['Prompts guide a model.', 'Bare snippet.'])
	})

	it('should raise the error reported in the response', async () => {
		const backend = new SerpApiSearchBackend('test-secret', {
			request: async () => ({ error: 'Invalid API key.' }),
		})

		await expect(backend.search('q', 3)).rejects.toThrow('SerpApi error: Invalid API key.')
	})

	it('should not send a request once the signal is aborted', async () => {
		const request = vi.fn(async (): Promise<unknown> => response)
		const controller = new AbortController()
		controller.abort(new Error('stopped'))

		await expect(new SerpApiSearchBackend('test-secret', { request }).search('q', 3, { signal: controller.signal })).rejects.toThrow(
			'stopped',
		)
		expect(request).not.toHaveBeenCalled()
	})
})
