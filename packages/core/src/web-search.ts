import type { ILogger, SearchResult, WebSearchBackend, WebSearchHit } from './types'
import { DEFAULT_PIPELINE_CONFIG } from './config'
import { errorMessage, WebSearchUnavailableError } from './errors'
import { NullLogger } from './logger'
import { withTimeout } from './utils/timeout'

function isHit(value: unknown): value is WebSearchHit {
	return typeof value === 'object' && value !== null && 'text' in value && typeof value.text === 'string'
}

/** The hits of a backend reply, or `undefined` when it is not a list of hits. */
function parseHits(reply: unknown): WebSearchHit[] | undefined {
	if (!Array.isArray(reply)) return undefined
	const items: unknown[] = reply
	const hits: WebSearchHit[] = []
	for (const item of items) {
		if (!isHit(item)) return undefined
		hits.push(item)
	}
	return hits
}

export interface WebSearchClientOptions {
	timeoutMs?: number
	logger?: ILogger
}

/**
 * Queries an external search service for snippets. Every failure, including a
 * missing backend, surfaces as `WebSearchUnavailableError`.
 */
export class WebSearchClient {
	private readonly timeoutMs: number
	private readonly logger: ILogger

	/**
	 * @param backend The search backend, or `undefined` when no credential is configured.
	 */
	constructor(
		private readonly backend: WebSearchBackend | undefined,
		options: WebSearchClientOptions = {},
	) {
		this.timeoutMs = options.timeoutMs ?? DEFAULT_PIPELINE_CONFIG.requestTimeoutMs
		this.logger = options.logger ?? new NullLogger()
	}

	get isConfigured(): boolean {
		return this.backend !== undefined
	}

	/**
	 * Returns at most `maxResults` snippets, in the order the service ranked them.
	 * A reply that is not a list of hits with a string `text` is malformed.
	 * @throws {WebSearchUnavailableError}
	 */
	async search(query: string, maxResults: number): Promise<SearchResult[]> {
		const backend = this.backend
		if (!backend) {
			throw new WebSearchUnavailableError('Web search is not configured')
		}
		if (maxResults < 1) return []

		let reply: unknown
		try {
			reply = await withTimeout(signal => backend.search(query, maxResults, { signal }), this.timeoutMs, 'Web search')
		} catch (error) {
			this.logger.warn('Web search failed', { error: errorMessage(error) })
			throw new WebSearchUnavailableError(`Web search failed: ${errorMessage(error)}`, { cause: error })
		}
		const hits = parseHits(reply)
		if (!hits) {
			this.logger.warn('Web search returned malformed output')
			throw new WebSearchUnavailableError('Web search returned malformed output')
		}

		const results: SearchResult[] = []
		for (const hit of hits) {
			const text = hit.text.trim()
			if (text.length === 0) continue
			results.push({
				text,
				sourceLabel: 'web',
				...(typeof hit.url === 'string' && hit.url ? { url: hit.url } : {}),
				...(typeof hit.title === 'string' && hit.title ? { title: hit.title } : {}),
			})
			if (results.length === maxResults) break
		}
		this.logger.debug('Web search returned snippets', { count: results.length })
		return results
	}
}
