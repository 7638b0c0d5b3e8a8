import chalk from 'chalk'
import { Command } from 'commander'
import { errorMessage, resolvePipelineConfig } from 'ragbridge'
import { table } from 'table'
import { resolveCliConfig } from '../config.js'

const configured = (value: string | undefined) => (value ? chalk.green('configured') : chalk.red('missing'))

export const statusCommand = new Command('status')
	.description('Show which services are configured')
	.action(() => {
		try {
			const config = resolveCliConfig()
			const pipeline = resolvePipelineConfig(config.pipeline)
			const rows = [
				['Setting', 'Value'],
				['OpenRouter (answers)', configured(config.openRouterApiKey)],
				['SerpApi (web search)', configured(config.serpApiKey)],
				['OpenAI (embeddings)', configured(config.openAiApiKey)],
				['Embeddings', config.embeddings],
				['Model', pipeline.modelId],
				['Chunk size / overlap', `${pipeline.chunkSize} / ${pipeline.chunkOverlap}`],
				['Segments per question', String(pipeline.retrievalK)],
				['Web results per question', String(pipeline.webResultCount)],
			]
			console.log(table(rows, { columns: { 0: { alignment: 'left' }, 1: { alignment: 'left' } } }))
		} catch (error) {
			console.error(chalk.red(`Invalid configuration: ${errorMessage(error)}`))
			process.exitCode = 1
		}
	})
