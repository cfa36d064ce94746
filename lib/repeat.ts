import { Result, Ok } from '@ts-std/monads'

import { Cursor } from './cursor'
import { ParseError, ParseErrorKind } from './errors'
import { c, COMMA, RIGHT_BRACE, is_digit, is_blank } from './bytes'

export type RepeatBounds = Readonly<{ min: number, max: number | undefined }>

type Count = Readonly<{ value: number, index: number }>

/**
 * Parses the body of a brace repeat count such as `{2}`, `{2,}` or `{ 2, 5 }`.
 * The cursor must be positioned just after the `{`.
 *
 * Syntax errors are found before the counts are checked against `max_repeat_count`,
 * so `{99999999999` is unclosed rather than excessive.
 */
export function parse_repeat(cursor: Cursor, max_repeat_count: number): Result<RepeatBounds, ParseError> {
	const start = cursor.index - 1

	cursor.skip_while(is_blank)
	const first = cursor.peek()
	if (first === undefined)
		return cursor.fail(ParseErrorKind.UnclosedRepeat, start)
	if (!is_digit(first))
		return cursor.fail(ParseErrorKind.InvalidRepeatArgument)

	const min = read_count(cursor)
	cursor.skip_while(is_blank)

	let max: Count | undefined = min
	if (cursor.eat(COMMA)) {
		cursor.skip_while(is_blank)
		const second = cursor.peek()
		if (second === undefined)
			return cursor.fail(ParseErrorKind.UnclosedRepeat, start)

		if (is_digit(second)) {
			max = read_count(cursor)
			cursor.skip_while(is_blank)
		}
		else if (second === RIGHT_BRACE)
			max = undefined
		else
			return cursor.fail(ParseErrorKind.InvalidRepeatArgument)
	}

	if (cursor.done())
		return cursor.fail(ParseErrorKind.UnclosedRepeat, start)
	if (!cursor.eat(RIGHT_BRACE))
		return cursor.fail(ParseErrorKind.UnclosedRepeat)

	for (const count of [min, max])
		if (count !== undefined && count.value > max_repeat_count)
			return cursor.fail(ParseErrorKind.ExcessiveRepeatCount, count.index)

	if (max !== undefined && min.value > max.value)
		return cursor.fail(ParseErrorKind.InvalidRepeatArgument, start)

	return Ok({ min: min.value, max: max === undefined ? undefined : max.value })
}

function read_count(cursor: Cursor): Count {
	const index = cursor.index
	let value = 0
	let byte
	while ((byte = cursor.peek()) !== undefined && is_digit(byte)) {
		cursor.next()
		// saturates, anything this large is rejected later anyway
		value = Math.min(value * 10 + (byte - c('0')), Number.MAX_SAFE_INTEGER)
	}
	return { value, index }
}
