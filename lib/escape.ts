import { Result, Ok } from '@ts-std/monads'

import { Cursor } from './cursor'
import { ParseError, ParseErrorKind } from './errors'
import { c, MAX_BYTE, LEFT_BRACE, RIGHT_BRACE, is_octal, is_hex, hex_value, is_ascii_punctuation } from './bytes'

const MAX_SCALAR = 0x10FFFF
const SURROGATE_MIN = 0xD800
const SURROGATE_MAX = 0xDFFF

const control_escapes = new Map<number, number>([
	[c('a'), 0x07],
	[c('f'), 0x0C],
	[c('t'), 0x09],
	[c('n'), 0x0A],
	[c('r'), 0x0D],
	[c('v'), 0x0B],
])

/**
 * Decodes one escape sequence into a byte value.
 * The cursor must be positioned just after the backslash.
 */
export function decode_escape(cursor: Cursor): Result<number, ParseError> {
	const start = cursor.index - 1
	const byte = cursor.next()
	if (byte === undefined)
		return cursor.fail(ParseErrorKind.OpenEscapeCode, start)

	const control = control_escapes.get(byte)
	if (control !== undefined)
		return Ok(control)

	if (is_ascii_punctuation(byte))
		return Ok(byte)

	if (is_octal(byte))
		return decode_octal(cursor, byte, start)

	if (byte === c('x'))
		return cursor.eat(LEFT_BRACE)
			? decode_braced_hex(cursor, start)
			: decode_fixed_hex(cursor)

	return cursor.fail(ParseErrorKind.UnrecognizedEscapeCode, start)
}

function decode_octal(cursor: Cursor, first: number, start: number): Result<number, ParseError> {
	let value = first - c('0')
	for (let count = 1; count < 3; count++) {
		const digit = cursor.peek()
		if (digit === undefined || !is_octal(digit))
			break
		cursor.next()
		value = value * 8 + (digit - c('0'))
	}

	return to_byte(cursor, value, start)
}

function decode_fixed_hex(cursor: Cursor): Result<number, ParseError> {
	let value = 0
	for (let count = 0; count < 2; count++) {
		const digit = hex_value_at(cursor)
		if (digit === undefined)
			return cursor.fail(ParseErrorKind.InvalidHexDigit)
		cursor.next()
		value = value * 16 + digit
	}
	return Ok(value)
}

function decode_braced_hex(cursor: Cursor, start: number): Result<number, ParseError> {
	const first = cursor.peek()
	if (first === undefined || !is_hex(first))
		return cursor.fail(ParseErrorKind.InvalidHexDigit)

	// once past the scalar range the digits can only be rejected, but they are
	// still consumed so an unclosed code is reported as such
	let value = 0
	let digit
	while ((digit = hex_value_at(cursor)) !== undefined) {
		cursor.next()
		if (value <= MAX_SCALAR)
			value = value * 16 + digit
	}

	if (!cursor.eat(RIGHT_BRACE))
		return cursor.fail(ParseErrorKind.UnclosedHexCharacterCode)

	if (value > MAX_SCALAR || (value >= SURROGATE_MIN && value <= SURROGATE_MAX))
		return cursor.fail(ParseErrorKind.InvalidHexDigit, start)

	return to_byte(cursor, value, start)
}

function hex_value_at(cursor: Cursor) {
	const byte = cursor.peek()
	return byte === undefined ? undefined : hex_value(byte)
}

function to_byte(cursor: Cursor, value: number, start: number): Result<number, ParseError> {
	return value > MAX_BYTE
		? cursor.fail(ParseErrorKind.CharacterCodeOutOfRange, start)
		: Ok(value)
}
