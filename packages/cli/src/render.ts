import type { AnswerRecord } from 'ragbridge'
import chalk from 'chalk'
import { formatSourceLabel } from 'ragbridge'
import { table } from 'table'

const PREVIEW_LENGTH = 60

function preview(text: string): string {
	const flat = text.replace(/\s+/g, ' ').trim()
	return flat.length > PREVIEW_LENGTH ? `${flat.substring(0, PREVIEW_LENGTH - 3)}...` : flat
}

/** The answer followed by its provenance, notices and cited web pages. */
export function formatAnswer(record: AnswerRecord): string {
	const lines = [record.answerText, '', chalk.gray(`Sources: ${formatSourceLabel(record)}`)]
	for (const notice of record.notices) {
		lines.push(chalk.yellow(`! ${notice}`))
	}
	const links: string[] = []
	record.retrievedWebSnippets.forEach((snippet, i) => {
		if (snippet.url) links.push(`  [Web ${i + 1}] ${snippet.title ?? snippet.url} ${chalk.cyan(snippet.url)}`)
	})
	if (links.length > 0) lines.push('', chalk.bold('Web'), ...links)
	return lines.join('\n')
}

/** One row per answered question, oldest first. */
export function formatHistory(records: readonly AnswerRecord[]): string {
	if (records.length === 0) return chalk.gray('No questions asked yet.')
	const rows = [['#', 'Question', 'Sources', 'Degraded']]
	records.forEach((record, i) => {
		rows.push([String(i + 1), preview(record.question), formatSourceLabel(record), record.degraded ? 'yes' : 'no'])
	})
	return table(rows, {
		columns: {
			0: { alignment: 'right' },
			1: { alignment: 'left' },
			2: { alignment: 'center' },
			3: { alignment: 'center' },
		},
	})
}
