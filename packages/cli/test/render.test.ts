import type { AnswerRecord } from 'ragbridge'
import chalk from 'chalk'
import { beforeAll, describe, expect, it } from 'vitest'
import { formatAnswer, formatHistory } from '../src/render.js'

function record(overrides: Partial<AnswerRecord> = {}): AnswerRecord {
	return {
		question: 'What is a prompt?',
		retrievedDocumentSnippets: [{ text: 'Prompts are instructions.', sourceLabel: 'document' }],
		retrievedWebSnippets: [],
		answerText: 'An answer.',
		timestamp: new Date('2024-05-01T12:00:00Z'),
		sourcesUsed: ['document'],
		degraded: false,
		notices: [],
		...overrides,
	}
}

describe('formatAnswer', () => {
	beforeAll(() => {
		chalk.level = 0
	})

	it('should show the answer with its sources and notices', () => {
		const output = formatAnswer(record({ degraded: true, notices: ['Web search unavailable: down'] }))

		expect(output).toBe('An answer.\n\nSources: Document\n! Web search unavailable: down')
	})

	it('should list the web pages that have a link', () => {
		const output = formatAnswer(
			record({
				sourcesUsed: ['document', 'web'],
				retrievedWebSnippets: [
					{ text: 'Snippet without link.', sourceLabel: 'web' },
					{ text: 'Snippet.', sourceLabel: 'web', url: 'https://example.com/a', title: 'Prompting' },
				],
			}),
		)

		expect(output).toBe('An answer.\n\nSources: Document & Web\n\nWeb\n  [Web 2] Prompting https://example.com/a')
	})
})

describe('formatHistory', () => {
	beforeAll(() => {
		chalk.level = 0
	})

	it('should say when nothing was asked', () => {
		expect(formatHistory([])).toBe('No questions asked yet.')
	})

	it('should tabulate the questions in order', () => {
		const long = `${'Why '.repeat(20)}?`
		const output = formatHistory([record(), record({ question: long, degraded: true, sourcesUsed: [] })])
		const lines = output.split('\n')

		expect(lines[1]).toContain('Question')
		expect(lines[3]).toContain('What is a prompt?')
		expect(lines[3]).toContain('Document')
		expect(lines[5]).toContain(`${'Why '.repeat(14)}W...`)
		expect(lines[5]).toContain('Model only')
		expect(lines[5]).toContain('yes')
	})
})
