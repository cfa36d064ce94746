import { Result, Ok, Err } from '@ts-std/monads'

import { Cursor } from './cursor'
import { parse_class } from './class'
import { parse_repeat } from './repeat'
import { decode_escape } from './escape'
import { ParseError, ParseErrorKind } from './errors'
import { LogError, NonLone, log } from './utils'
import {
	Expr, Assertion, AnyCharNotNL, EmptyMatch, Literal, ByteClass, Capture, Repeat, Concat, Alternate,
} from './ast'
import {
	BACKSLASH, DOT, STAR, PLUS, QUESTION, LEFT_PAREN, RIGHT_PAREN, PIPE,
	LEFT_BRACKET, LEFT_BRACE, CARET, DOLLAR,
} from './bytes'

export type ParserOptions = {
	// largest bound accepted in a `{m,n}` repeat
	max_repeat_count?: number,
	// log every token and the resulting working stack
	trace?: boolean,
}

export const MAX_REPEAT_CEILING = 0xFFFFFFFF
export const DEFAULT_OPTIONS: Readonly<Required<ParserOptions>> = {
	max_repeat_count: 1000,
	trace: false,
}

type NodeEntry = Readonly<{
	kind: 'node',
	expr: Expr,
	// set when the node came straight from a repeat operator,
	// which forbids chaining another one onto it
	repeated: boolean,
}>
type GroupMarker = Readonly<{ kind: 'group', capture_index: number, index: number }>
type AlternationMarker = Readonly<{ kind: 'alternation' }>

type StackEntry =
	| NodeEntry
	| GroupMarker
	| AlternationMarker

export class Parser {
	readonly options: Readonly<Required<ParserOptions>>
	constructor(options: ParserOptions = {}) {
		const resolved = {
			max_repeat_count: options.max_repeat_count ?? DEFAULT_OPTIONS.max_repeat_count,
			trace: options.trace ?? DEFAULT_OPTIONS.trace,
		}
		const { max_repeat_count } = resolved
		if (!Number.isInteger(max_repeat_count) || max_repeat_count < 0 || max_repeat_count > MAX_REPEAT_CEILING)
			throw new LogError([`max_repeat_count must be an integer between 0 and ${MAX_REPEAT_CEILING}, got:`, max_repeat_count])

		this.options = resolved
	}

	parse(pattern: string | Uint8Array): Result<Expr, ParseError> {
		return new ParseRun(Cursor.from(pattern), this.options).run()
	}
}

export function parse(pattern: string | Uint8Array, options: ParserOptions = {}): Result<Expr, ParseError> {
	return new Parser(options).parse(pattern)
}

export function parse_or_throw(pattern: string | Uint8Array, options: ParserOptions = {}): Expr {
	return parse(pattern, options).match({
		ok: expr => expr,
		err: error => { throw error },
	})
}


class ParseRun {
	protected readonly stack = [] as StackEntry[]
	protected capture_count = 0
	protected open_groups = 0

	constructor(
		protected readonly cursor: Cursor,
		protected readonly options: Readonly<Required<ParserOptions>>,
	) {}

	run(): Result<Expr, ParseError> {
		let byte: number | undefined
		while ((byte = this.cursor.next()) !== undefined) {
			const index = this.cursor.index - 1
			const result = this.step(byte, index)
			if (result.is_err())
				return Err(result.error)

			if (this.options.trace)
				log({ index, byte: String.fromCharCode(byte), stack: this.stack })
		}

		return this.finish()
	}

	protected step(byte: number, index: number): Result<void, ParseError> {
		switch (byte) {
			case LEFT_PAREN:
				this.capture_count++
				this.open_groups++
				this.stack.push({ kind: 'group', capture_index: this.capture_count, index })
				return Ok(undefined)

			case RIGHT_PAREN:
				return this.close_group(index)

			case PIPE:
				return this.alternate(index)

			case STAR:
				return this.apply_repeat(0, undefined, index)
			case PLUS:
				return this.apply_repeat(1, undefined, index)
			case QUESTION:
				return this.apply_repeat(0, 1, index)
			case LEFT_BRACE: {
				const bounds = parse_repeat(this.cursor, this.options.max_repeat_count)
				if (bounds.is_err())
					return Err(bounds.error)
				return this.apply_repeat(bounds.value.min, bounds.value.max, index)
			}

			case DOT:
				return this.push(new AnyCharNotNL())
			case CARET:
				return this.push(new EmptyMatch(Assertion.BeginLine))
			case DOLLAR:
				return this.push(new EmptyMatch(Assertion.EndLine))

			case LEFT_BRACKET: {
				const set = parse_class(this.cursor)
				if (set.is_err())
					return Err(set.error)
				return this.push(new ByteClass(set.value))
			}

			case BACKSLASH: {
				const decoded = decode_escape(this.cursor)
				if (decoded.is_err())
					return Err(decoded.error)
				return this.push(new Literal(decoded.value))
			}

			default:
				return this.push(new Literal(byte))
		}
	}

	protected push(expr: Expr, repeated = false): Result<void, ParseError> {
		this.stack.push({ kind: 'node', expr, repeated })
		return Ok(undefined)
	}

	protected fail<T>(kind: ParseErrorKind, index: number): Result<T, ParseError> {
		return this.cursor.fail(kind, index)
	}

	protected apply_repeat(min: number, max: number | undefined, index: number): Result<void, ParseError> {
		const greedy = !this.cursor.eat(QUESTION)

		const top = this.stack[this.stack.length - 1]
		if (top === undefined || top.kind !== 'node' || top.repeated)
			return this.fail(ParseErrorKind.MissingRepeatOperand, index)

		this.stack.pop()
		return this.push(new Repeat(top.expr, min, max, greedy), true)
	}

	protected alternate(index: number): Result<void, ParseError> {
		const folded = this.fold_concat()
		if (folded === undefined)
			return this.fail(ParseErrorKind.EmptyAlternate, index)

		this.stack.push({ kind: 'node', expr: folded, repeated: false })
		this.stack.push({ kind: 'alternation' })
		return Ok(undefined)
	}

	protected close_group(index: number): Result<void, ParseError> {
		if (this.open_groups === 0)
			return this.fail(ParseErrorKind.UnopenedParentheses, index)

		const reduced = this.reduce_level(index)
		if (reduced.is_err())
			return Err(reduced.error)

		const marker = this.stack.pop()
		if (marker === undefined || marker.kind !== 'group')
			throw new LogError([`expected a group marker beneath the reduced group, found:`, marker, 'stack:', this.stack])

		this.open_groups--
		return this.push(new Capture(marker.capture_index, reduced.value))
	}

	protected finish(): Result<Expr, ParseError> {
		if (this.open_groups !== 0) {
			const unclosed = this.stack.find((entry): entry is GroupMarker => entry.kind === 'group')
			return this.fail(ParseErrorKind.UnclosedParentheses, unclosed !== undefined ? unclosed.index : this.cursor.index)
		}

		const reduced = this.reduce_level(this.cursor.index)
		if (reduced.is_ok() && this.stack.length !== 0)
			throw new LogError([`working stack not fully reduced:`, this.stack], 4)

		return reduced
	}

	// pops the run of nodes above the nearest marker and joins them
	protected fold_concat(): Expr | undefined {
		const exprs = [] as Expr[]
		let top: StackEntry | undefined
		while ((top = this.stack[this.stack.length - 1]) !== undefined && top.kind === 'node') {
			this.stack.pop()
			exprs.push(top.expr)
		}
		exprs.reverse()

		if (exprs.length === 0)
			return undefined
		return NonLone.from_array(exprs).match({
			some: (exprs): Expr => new Concat(exprs),
			none: () => exprs[0],
		})
	}

	// reduces everything above the nearest group marker (or the whole stack) to one node
	protected reduce_level(index: number): Result<Expr, ParseError> {
		let folded = this.fold_concat()
		if (folded === undefined) {
			const below = this.stack[this.stack.length - 1]
			if (below !== undefined && below.kind === 'alternation')
				return this.fail(ParseErrorKind.EmptyAlternate, index)
			folded = new EmptyMatch(Assertion.None)
		}

		const branches = [folded]
		let top: StackEntry | undefined
		while ((top = this.stack[this.stack.length - 1]) !== undefined && top.kind === 'alternation') {
			this.stack.pop()
			const branch = this.stack.pop()
			if (branch === undefined || branch.kind !== 'node')
				throw new LogError([`alternation marker without a preceding branch:`, this.stack])
			branches.push(branch.expr)
		}
		branches.reverse()

		return Ok(NonLone.from_array(branches).match({
			some: (branches): Expr => new Alternate(branches),
			none: () => branches[0],
		}))
	}
}
