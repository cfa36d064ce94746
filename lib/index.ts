export {
	Expr, Assertion,
	AnyCharNotNL, EmptyMatch, Literal, ByteClass, Capture, Repeat, Concat, Alternate,
	dot, empty, lit, bclass, cap, rep, maybe, many, maybe_many, cat, alt,
} from './ast'
export { ByteSet, range } from './byte_set'
export type { ByteRange } from './byte_set'
export { ParseError, ParseErrorKind } from './errors'
export { Parser, DEFAULT_OPTIONS, MAX_REPEAT_CEILING, parse, parse_or_throw } from './parser'
export { repr, render_pattern } from './render'
export { format_parse_error } from './diagnostic'
export type { ParserOptions } from './parser'
export type { RepeatBounds } from './repeat'
