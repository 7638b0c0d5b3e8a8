import type { DocumentSession } from 'ragbridge'
import chalk from 'chalk'
import { errorMessage } from 'ragbridge'
import { formatAnswer, formatHistory } from './render.js'

export const CHAT_HELP = chalk.gray('Commands: /load <file>, /history, /clear, /exit')

/** What a line typed at the prompt asks for. */
export type ChatInput =
	| { kind: 'exit' }
	| { kind: 'clear' }
	| { kind: 'history' }
	| { kind: 'help' }
	| { kind: 'empty' }
	| { kind: 'load'; path: string }
	| { kind: 'question'; question: string }

export function parseChatInput(line: string): ChatInput {
	const input = line.trim()
	if (input.length === 0) return { kind: 'empty' }
	const load = /^\/load(?:\s+(.*))?$/i.exec(input)
	if (load) {
		const path = load[1]?.trim() ?? ''
		return path ? { kind: 'load', path } : { kind: 'help' }
	}
	switch (input.toLowerCase()) {
		case '/exit':
		case '/quit':
			return { kind: 'exit' }
		case '/clear':
			return { kind: 'clear' }
		case '/history':
			return { kind: 'history' }
		case '/help':
			return { kind: 'help' }
		default:
			return { kind: 'question', question: input }
	}
}

/** A running progress indicator, as `ora` returns. */
export interface Progress {
	stop: () => void
	succeed: (text: string) => void
	fail: (text: string) => void
}

export interface ChatIO {
	print: (text: string) => void
	/** Shows the prompt for the next line. */
	prompt: () => void
	progress: (text: string) => Progress
	readDocument: (path: string) => Promise<string>
}

/**
 * Indexes the file at `path` into the session. On failure the previous
 * document stays loaded.
 * @returns whether the document was loaded.
 */
export async function loadDocument(session: DocumentSession, path: string, io: ChatIO): Promise<boolean> {
	const progress = io.progress(`Indexing ${path}...`)
	try {
		await session.upload(await io.readDocument(path))
		progress.succeed(`Indexed ${session.segmentCount} segments from ${path}`)
		return true
	} catch (error) {
		progress.fail(`Error indexing document: ${errorMessage(error)}`)
		return false
	}
}

async function answer(session: DocumentSession, question: string, io: ChatIO): Promise<void> {
	const progress = io.progress('Thinking...')
	try {
		const record = await session.ask(question)
		progress.stop()
		io.print(`\n${formatAnswer(record)}\n`)
	} catch (error) {
		progress.fail(errorMessage(error))
	}
}

/** Handles lines until `/exit` or the end of input. */
export async function runChat(session: DocumentSession, lines: AsyncIterable<string>, io: ChatIO): Promise<void> {
	io.print(CHAT_HELP)
	io.prompt()
	for await (const line of lines) {
		const input = parseChatInput(line)
		if (input.kind === 'exit') return
		switch (input.kind) {
			case 'help':
				io.print(CHAT_HELP)
				break
			case 'history':
				io.print(formatHistory(session.history))
				break
			case 'clear':
				session.clearHistory()
				io.print(chalk.gray('History cleared.'))
				break
			case 'load':
				await loadDocument(session, input.path, io)
				break
			case 'question':
				await answer(session, input.question, io)
				break
			case 'empty':
				break
		}
		io.prompt()
	}
}
