import { Result, Ok, Err } from '@ts-std/monads'

import { Cursor } from './cursor'
import { decode_escape } from './escape'
import { ParseError, ParseErrorKind } from './errors'
import { ByteSet, ByteRange, range } from './byte_set'
import { BACKSLASH, CARET, DASH, RIGHT_BRACKET } from './bytes'

/**
 * Parses a bracket expression into its byte set.
 * The cursor must be positioned just after the `[`.
 *
 * A `]` directly after `[` or `[^` is a member, not the terminator,
 * and a `-` directly before the terminator is a member, not a range.
 */
export function parse_class(cursor: Cursor): Result<ByteSet, ParseError> {
	const start = cursor.index - 1
	const negated = cursor.eat(CARET)

	const ranges = [] as ByteRange[]
	let first = true
	while (true) {
		const byte = cursor.peek()
		if (byte === undefined)
			return cursor.fail(ParseErrorKind.UnclosedBrackets, start)
		if (byte === RIGHT_BRACKET && !first)
			break
		first = false

		const low_index = cursor.index
		const low = read_endpoint(cursor)
		if (low.is_err())
			return Err(low.error)

		if (cursor.peek() !== DASH || cursor.peek(1) === RIGHT_BRACKET) {
			ranges.push(range(low.value, low.value))
			continue
		}

		cursor.next()
		if (cursor.done())
			return cursor.fail(ParseErrorKind.UnclosedBrackets, start)

		const high = read_endpoint(cursor)
		if (high.is_err())
			return Err(high.error)
		if (low.value > high.value)
			return cursor.fail(ParseErrorKind.InvalidClassRange, low_index)

		ranges.push(range(low.value, high.value))
	}
	cursor.next()

	const set = ByteSet.from_ranges(ranges)
	return Ok(negated ? set.negate() : set)
}

function read_endpoint(cursor: Cursor): Result<number, ParseError> {
	const byte = cursor.next()
	if (byte === undefined)
		return cursor.fail(ParseErrorKind.UnclosedBrackets)

	return byte === BACKSLASH
		? decode_escape(cursor)
		: Ok(byte)
}
