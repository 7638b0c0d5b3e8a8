/* eslint-disable perfectionist/sort-exports */

// Pipeline
export * from './pipeline'
export * from './session'
export * from './config'
export * from './errors'
export * from './logger'
export * from './types'

// Components
export * from './chunker'
export * from './embedder'
export * from './vector-index'
export * from './retriever'
export * from './web-search'
export * from './composer'

// Backends
export * from './backends/hashing'
export * from './backends/openai'
export * from './backends/serpapi'

// Utils
export { cosineSimilarity, l2Normalize } from './utils/vector'
export { TimeoutError } from './utils/timeout'
