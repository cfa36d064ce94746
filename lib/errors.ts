export enum ParseErrorKind {
	MissingRepeatOperand = 'MissingRepeatOperand',
	InvalidRepeatArgument = 'InvalidRepeatArgument',
	UnclosedRepeat = 'UnclosedRepeat',
	ExcessiveRepeatCount = 'ExcessiveRepeatCount',
	EmptyAlternate = 'EmptyAlternate',
	UnopenedParentheses = 'UnopenedParentheses',
	UnclosedParentheses = 'UnclosedParentheses',
	OpenEscapeCode = 'OpenEscapeCode',
	UnrecognizedEscapeCode = 'UnrecognizedEscapeCode',
	InvalidHexDigit = 'InvalidHexDigit',
	UnclosedHexCharacterCode = 'UnclosedHexCharacterCode',
	UnclosedBrackets = 'UnclosedBrackets',
	CharacterCodeOutOfRange = 'CharacterCodeOutOfRange',
	InvalidClassRange = 'InvalidClassRange',
}

const messages: { [K in ParseErrorKind]: string } = {
	[ParseErrorKind.MissingRepeatOperand]: `repeat operator has nothing to repeat`,
	[ParseErrorKind.InvalidRepeatArgument]: `repeat count must be a number or a pair of numbers in ascending order`,
	[ParseErrorKind.UnclosedRepeat]: `repeat count is missing its closing '}'`,
	[ParseErrorKind.ExcessiveRepeatCount]: `repeat count is larger than the allowed maximum`,
	[ParseErrorKind.EmptyAlternate]: `alternation branch is empty`,
	[ParseErrorKind.UnopenedParentheses]: `')' has no matching '('`,
	[ParseErrorKind.UnclosedParentheses]: `'(' has no matching ')'`,
	[ParseErrorKind.OpenEscapeCode]: `pattern ends with an unfinished escape`,
	[ParseErrorKind.UnrecognizedEscapeCode]: `unrecognized escape code`,
	[ParseErrorKind.InvalidHexDigit]: `invalid hexadecimal character code`,
	[ParseErrorKind.UnclosedHexCharacterCode]: `hexadecimal character code is missing its closing '}'`,
	[ParseErrorKind.UnclosedBrackets]: `character class is missing its closing ']'`,
	[ParseErrorKind.CharacterCodeOutOfRange]: `character code does not fit in a single byte`,
	[ParseErrorKind.InvalidClassRange]: `character class range is out of order`,
}

export class ParseError extends Error {
	constructor(
		readonly kind: ParseErrorKind,
		// byte offset into the encoded pattern
		readonly index: number,
	) {
		super(`${messages[kind]} (at byte ${index})`)
		this.name = 'ParseError'
	}

	get description(): string {
		return messages[this.kind]
	}
}
