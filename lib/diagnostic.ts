import chalk from 'chalk'

import { ParseError } from './errors'
import { is_printable } from './bytes'

const err = chalk.red.bold
const bold = chalk.white.bold
const info = chalk.blue.bold

// printable ascii stays as is, other bytes become \xNN so the caret can be lined up
function display_bytes(bytes: Uint8Array): [string, number[]] {
	let text = ''
	const offsets = [] as number[]
	for (const byte of bytes) {
		offsets.push(text.length)
		text += is_printable(byte)
			? String.fromCharCode(byte)
			: `\\x${byte.toString(16).padStart(2, '0')}`
	}
	offsets.push(text.length)
	return [text, offsets]
}

/**
 * Formats a parse error with the pattern and a caret under the failing byte:
 *
 * ```
 * error: UnclosedParentheses
 *  |  ab(xy
 *  |    ^ '(' has no matching ')'
 * ```
 */
export function format_parse_error(pattern: string | Uint8Array, error: ParseError, colors = true): string {
	const bytes = typeof pattern === 'string' ? new TextEncoder().encode(pattern) : pattern
	const [text, offsets] = display_bytes(bytes)
	const column = offsets[Math.min(error.index, bytes.length)]

	const paint = (style: chalk.Chalk, value: string) => colors ? style(value) : value
	const margin = paint(info, '\n |  ')

	return paint(err, 'error') + paint(bold, `: ${error.kind}`)
		+ margin + text
		+ margin + ' '.repeat(column) + paint(err, `^ ${error.description}`)
}
