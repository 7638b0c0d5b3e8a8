import chalk from 'chalk'
import { Command } from 'commander'
import { readFile } from 'node:fs/promises'
import ora from 'ora'
import { errorMessage } from 'ragbridge'
import { resolveCliConfig } from '../config.js'
import { createLogger } from '../logging.js'
import { formatAnswer } from '../render.js'
import { createSession } from '../session.js'

interface AskOptions {
	model?: string
	embeddings?: string
	json?: boolean
	verbose?: boolean
}

export const askCommand = new Command('ask')
	.description('Answer one question about a text document')
	.argument('<file>', 'Text file to index')
	.argument('<question>', 'Question to answer')
	.option('-m, --model <id>', 'Model used to generate the answer')
	.option('-e, --embeddings <kind>', 'Embedding backend: openai or hashing')
	.option('--json', 'Output the answer record as JSON')
	.option('-v, --verbose', 'Log pipeline activity')
	.action(async (file: string, question: string, options: AskOptions) => {
		const spinner = ora(`Indexing ${file}...`).start()

		try {
			const config = resolveCliConfig({ model: options.model, embeddings: options.embeddings })
			const session = createSession(config, createLogger(options.verbose))
			const text = await readFile(file, 'utf-8')
			await session.upload(text)
			spinner.text = 'Thinking...'
			const record = await session.ask(question)
			spinner.succeed(`Indexed ${session.segmentCount} segments`)

			if (options.json) {
				console.log(JSON.stringify(record, null, 2))
				return
			}
			console.log(`\n${chalk.bold.blue(question)}\n`)
			console.log(formatAnswer(record))
		} catch (error) {
			spinner.fail(`Error answering question: ${errorMessage(error)}`)
			process.exitCode = 1
		}
	})
