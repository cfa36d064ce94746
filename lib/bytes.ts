export function c(char: string): number {
	return char.charCodeAt(0)
}

export const BACKSLASH = c('\\')
export const DOT = c('.')
export const STAR = c('*')
export const PLUS = c('+')
export const QUESTION = c('?')
export const LEFT_PAREN = c('(')
export const RIGHT_PAREN = c(')')
export const PIPE = c('|')
export const LEFT_BRACKET = c('[')
export const RIGHT_BRACKET = c(']')
export const LEFT_BRACE = c('{')
export const RIGHT_BRACE = c('}')
export const CARET = c('^')
export const DOLLAR = c('$')
export const DASH = c('-')
export const COMMA = c(',')

export const MAX_BYTE = 0xFF

export function is_digit(byte: number) {
	return byte >= c('0') && byte <= c('9')
}

export function is_octal(byte: number) {
	return byte >= c('0') && byte <= c('7')
}

export function is_hex(byte: number) {
	return hex_value(byte) !== undefined
}

export function hex_value(byte: number): number | undefined {
	if (is_digit(byte)) return byte - c('0')
	if (byte >= c('a') && byte <= c('f')) return byte - c('a') + 10
	if (byte >= c('A') && byte <= c('F')) return byte - c('A') + 10
	return undefined
}

// space or tab, the only blanks allowed inside a repeat count
export function is_blank(byte: number) {
	return byte === c(' ') || byte === c('\t')
}

export function is_ascii_punctuation(byte: number) {
	return (byte >= 0x21 && byte <= 0x2F)
		|| (byte >= 0x3A && byte <= 0x40)
		|| (byte >= 0x5B && byte <= 0x60)
		|| (byte >= 0x7B && byte <= 0x7E)
}

export function is_printable(byte: number) {
	return byte >= 0x20 && byte <= 0x7E
}
