import type { ChatIO } from '../chat-loop.js'
import chalk from 'chalk'
import { Command } from 'commander'
import { readFile } from 'node:fs/promises'
import { createInterface } from 'node:readline'
import ora from 'ora'
import { errorMessage } from 'ragbridge'
import { loadDocument, runChat } from '../chat-loop.js'
import { resolveCliConfig } from '../config.js'
import { createLogger } from '../logging.js'
import { createSession } from '../session.js'

interface ChatOptions {
	model?: string
	embeddings?: string
	verbose?: boolean
}

export const chatCommand = new Command('chat')
	.description('Ask questions about a text document interactively')
	.argument('<file>', 'Text file to index')
	.option('-m, --model <id>', 'Model used to generate answers')
	.option('-e, --embeddings <kind>', 'Embedding backend: openai or hashing')
	.option('-v, --verbose', 'Log pipeline activity')
	.action(async (file: string, options: ChatOptions) => {
		const rl = createInterface({ input: process.stdin, output: process.stdout })
		rl.setPrompt(chalk.bold('> '))
		const io: ChatIO = {
			print: text => console.log(text),
			prompt: () => rl.prompt(),
			progress: text => ora(text).start(),
			readDocument: path => readFile(path, 'utf-8'),
		}

		try {
			const config = resolveCliConfig({ model: options.model, embeddings: options.embeddings })
			const session = createSession(config, createLogger(options.verbose))
			if (!(await loadDocument(session, file, io))) {
				process.exitCode = 1
				return
			}
			// the line iterator ends when stdin closes, so Ctrl-D leaves the loop
			await runChat(session, rl, io)
		} catch (error) {
			console.error(chalk.red(errorMessage(error)))
			process.exitCode = 1
		} finally {
			rl.close()
		}
	})
