import type { PipelineConfig } from 'ragbridge'
import { readFileSync } from 'node:fs'
import { homedir } from 'node:os'
import { join } from 'node:path'
import { InvalidConfigError } from 'ragbridge'

export type EmbeddingsKind = 'openai' | 'hashing'

export interface CliConfig {
	openRouterApiKey?: string
	serpApiKey?: string
	openAiApiKey?: string
	embeddings?: EmbeddingsKind
	model?: string
	pipeline?: Partial<PipelineConfig>
}

/** Command-line flags that take precedence over every other source. */
export interface CliFlags {
	model?: string
	embeddings?: string
}

export interface ResolvedCliConfig {
	openRouterApiKey?: string
	serpApiKey?: string
	openAiApiKey?: string
	embeddings: EmbeddingsKind
	pipeline: Partial<PipelineConfig>
}

const PIPELINE_NUMBER_KEYS = [
	'chunkSize',
	'chunkOverlap',
	'boundaryTolerance',
	'retrievalK',
	'webResultCount',
	'temperature',
	'embeddingRetries',
	'retryDelayMs',
	'requestTimeoutMs',
	'embeddingConcurrency',
	'embeddingCacheSize',
] as const

function configFilePaths(): string[] {
	return [process.env.RAGBRIDGE_CONFIG, join(process.cwd(), '.ragbridge.json'), join(homedir(), '.ragbridge', 'config.json')].filter(
		(path): path is string => Boolean(path),
	)
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function optionalString(source: Record<string, unknown>, key: string, path: string): string | undefined {
	const value = source[key]
	if (value === undefined) return undefined
	if (typeof value !== 'string') throw new InvalidConfigError(`${path}: "${key}" must be a string`)
	return value
}

export function parseEmbeddingsKind(value: string, origin: string): EmbeddingsKind {
	if (value === 'openai' || value === 'hashing') return value
	throw new InvalidConfigError(`${origin}: embeddings must be "openai" or "hashing", got "${value}"`)
}

function parsePipeline(value: unknown, path: string): Partial<PipelineConfig> {
	if (value === undefined) return {}
	if (!isRecord(value)) throw new InvalidConfigError(`${path}: "pipeline" must be an object`)
	const pipeline: Partial<PipelineConfig> = {}
	for (const key of PIPELINE_NUMBER_KEYS) {
		const entry = value[key]
		if (entry === undefined) continue
		if (typeof entry !== 'number') throw new InvalidConfigError(`${path}: "pipeline.${key}" must be a number`)
		pipeline[key] = entry
	}
	const modelId = optionalString(value, 'modelId', path)
	if (modelId !== undefined) pipeline.modelId = modelId
	const policy = optionalString(value, 'droppedSegmentPolicy', path)
	if (policy === 'discard' || policy === 'retry-on-query') pipeline.droppedSegmentPolicy = policy
	else if (policy !== undefined) throw new InvalidConfigError(`${path}: unknown droppedSegmentPolicy "${policy}"`)
	return pipeline
}

/** Checks the shape of a decoded config file. */
export function parseConfig(value: unknown, path: string): CliConfig {
	if (!isRecord(value)) throw new InvalidConfigError(`${path}: expected a JSON object`)
	const embeddings = optionalString(value, 'embeddings', path)
	const config: CliConfig = {
		openRouterApiKey: optionalString(value, 'openRouterApiKey', path),
		serpApiKey: optionalString(value, 'serpApiKey', path),
		openAiApiKey: optionalString(value, 'openAiApiKey', path),
		embeddings: embeddings === undefined ? undefined : parseEmbeddingsKind(embeddings, path),
		model: optionalString(value, 'model', path),
		pipeline: parsePipeline(value.pipeline, path),
	}
	return config
}

function readConfigFile(path: string): CliConfig | null {
	let content: string
	try {
		content = readFileSync(path, 'utf-8')
	} catch {
		return null
	}
	let decoded: unknown
	try {
		decoded = JSON.parse(content)
	} catch (error) {
		throw new InvalidConfigError(`${path}: invalid JSON`, { cause: error })
	}
	return parseConfig(decoded, path)
}

/** Reads the first config file found, or `null` when there is none. */
export function loadConfig(): CliConfig | null {
	for (const configPath of configFilePaths()) {
		const config = readConfigFile(configPath)
		if (config) return config
	}
	return null
}

/**
 * Merges the config file, the environment and the flags, in rising precedence.
 * Without an OpenAI key, documents are embedded locally.
 */
export function resolveCliConfig(flags: CliFlags = {}): ResolvedCliConfig {
	const file = loadConfig() ?? {}
	const openAiApiKey = process.env.OPENAI_API_KEY || file.openAiApiKey
	const embeddingsSetting = flags.embeddings ?? process.env.RAGBRIDGE_EMBEDDINGS
	const embeddings = embeddingsSetting
		? parseEmbeddingsKind(embeddingsSetting, flags.embeddings ? '--embeddings' : 'RAGBRIDGE_EMBEDDINGS')
		: (file.embeddings ?? (openAiApiKey ? 'openai' : 'hashing'))

	const modelId = flags.model ?? file.model
	return {
		openRouterApiKey: process.env.OPENROUTER_API_KEY || file.openRouterApiKey,
		serpApiKey: process.env.SERP_API_KEY || file.serpApiKey,
		openAiApiKey,
		embeddings,
		pipeline: { ...file.pipeline, ...(modelId ? { modelId } : {}) },
	}
}
