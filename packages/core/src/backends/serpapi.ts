import type { RequestOptions, WebSearchBackend, WebSearchHit } from '../types'
import { getJson } from 'serpapi'

export interface SerpApiParameters {
	engine: 'google'
	q: string
	num: number
	api_key: string
}

/** Performs one SerpApi request and resolves with the decoded JSON body. */
export type SerpApiRequest = (parameters: SerpApiParameters) => Promise<unknown>

const defaultRequest: SerpApiRequest = parameters => getJson({ ...parameters })

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null
}

function nonEmptyString(value: unknown): string | undefined {
	return typeof value === 'string' && value.trim().length > 0 ? value : undefined
}

/** Extracts `{ text, url, title }` from the organic results of a Google response. */
export function parseOrganicResults(response: unknown): WebSearchHit[] {
	if (!isRecord(response) || !Array.isArray(response.organic_results)) return []
	const hits: WebSearchHit[] = []
	for (const result of response.organic_results) {
		if (!isRecord(result)) continue
		const text = nonEmptyString(result.snippet)
		if (!text) continue
		const url = nonEmptyString(result.link)
		const title = nonEmptyString(result.title)
		hits.push({ text, ...(url ? { url } : {}), ...(title ? { title } : {}) })
	}
	return hits
}

/** Google web search through SerpApi. */
export class SerpApiSearchBackend implements WebSearchBackend {
	private readonly request: SerpApiRequest

	constructor(
		private readonly apiKey: string,
		options: { request?: SerpApiRequest } = {},
	) {
		this.request = options.request ?? defaultRequest
	}

	async search(query: string, maxResults: number, options: RequestOptions = {}): Promise<WebSearchHit[]> {
		options.signal?.throwIfAborted()
		const response = await this.request({ engine: 'google', q: query, num: maxResults, api_key: this.apiKey })
		if (isRecord(response) && typeof response.error === 'string') {
			throw new Error(`SerpApi error: ${response.error}`)
		}
		return parseOrganicResults(response).slice(0, maxResults)
	}
}
