import 'mocha'
import { expect } from 'chai'

import { parse, parse_or_throw, Parser, DEFAULT_OPTIONS } from './parser'
import { ParseError, ParseErrorKind } from './errors'
import { repr } from './render'
import { Assertion, lit, dot, empty, cap, cat, alt, rep, maybe_many, bclass } from './ast'

function check(re: string | Uint8Array, ...expected: string[]) {
	expect(repr(parse_or_throw(re))).eql(expected.join('\n'))
}

function check_error(re: string, kind: ParseErrorKind, index?: number) {
	const found = parse(re).match({
		ok: (expr): string | ParseError => repr(expr),
		err: error => error,
	})
	expect(found).instanceof(ParseError)
	if (!(found instanceof ParseError)) return

	expect(found.kind).eql(kind)
	if (index !== undefined)
		expect(found.index).eql(index)
}

describe('parse simple', () => {
	it('empty and single literals', () => {
		check('', 'empty(None)')
		check('a', 'lit(a)')
		check('.', 'dot')
		check('ab', 'cat', ' lit(a)', ' lit(b)')
	})

	it('anchors', () => {
		check('^a', 'cat', ' empty(BeginLine)', ' lit(a)')
		check('a$', 'cat', ' lit(a)', ' empty(EndLine)')
	})

	it('repeats', () => {
		check('a?', 'rep(?)', ' lit(a)')
		check('ab?', 'cat', ' lit(a)', ' rep(?)', '  lit(b)')
		check('a??', 'rep(??)', ' lit(a)')
		check('a+', 'rep(+)', ' lit(a)')
		check('a+?', 'rep(+?)', ' lit(a)')
		check('a*?', 'rep(*?)', ' lit(a)')
		check('a{5}', 'rep({5,5})', ' lit(a)')
		check('a{5,}', 'rep({5,})', ' lit(a)')
		check('a{5,10}', 'rep({5,10})', ' lit(a)')
		check('a{5}?', 'rep({5,5}?)', ' lit(a)')
		check('a{5,}?', 'rep({5,}?)', ' lit(a)')
		check('a{ 5     }', 'rep({5,5})', ' lit(a)')
		check('a{\t2 ,\t3 }', 'rep({2,3})', ' lit(a)')
	})

	it('groups and alternation', () => {
		check('(a)', 'cap', ' lit(a)')
		check('(ab)', 'cap', ' cat', '  lit(a)', '  lit(b)')
		check('a|b', 'alt', ' lit(a)', ' lit(b)')
		check('a|b|c', 'alt', ' lit(a)', ' lit(b)', ' lit(c)')
		check('(a|b)', 'cap', ' alt', '  lit(a)', '  lit(b)')
		check('(a|b|c)', 'cap', ' alt', '  lit(a)', '  lit(b)', '  lit(c)')
		check('(ab|bc|cd)',
			'cap',
			' alt',
			'  cat',
			'   lit(a)',
			'   lit(b)',
			'  cat',
			'   lit(b)',
			'   lit(c)',
			'  cat',
			'   lit(c)',
			'   lit(d)',
		)
		check('(ab|(bc|(cd)))',
			'cap',
			' alt',
			'  cat',
			'   lit(a)',
			'   lit(b)',
			'  cap',
			'   alt',
			'    cat',
			'     lit(b)',
			'     lit(c)',
			'    cap',
			'     cat',
			'      lit(c)',
			'      lit(d)',
		)
	})

	it('empty group', () => {
		check('()', 'cap', ' empty(None)')
		check('a()', 'cat', ' lit(a)', ' cap', '  empty(None)')
	})

	it('bare closing brackets and braces are literals', () => {
		check(']', 'lit(])')
		check('}', 'lit(})')
		check('-', 'lit(-)')
	})

	it('encodes strings as utf-8 and takes raw bytes as they are', () => {
		check('é', 'cat', ' lit(0xc3)', ' lit(0xa9)')
		check(new Uint8Array([0x61, 0xFF]), 'cat', ' lit(a)', ' lit(0xff)')
	})
})

describe('capture indices', () => it('works', () => {
	expect(parse_or_throw('(a)(b(c))')).eql(cat(
		cap(1, lit('a')),
		cap(2, cat(lit('b'), cap(3, lit('c')))),
	))

	expect(parse_or_throw('((a)|b)')).eql(cap(1, alt(cap(2, lit('a')), lit('b'))))
}))

describe('repeat chaining', () => it('works', () => {
	expect(parse_or_throw('(a*)*')).eql(maybe_many(cap(1, maybe_many(lit('a')))))
	expect(parse_or_throw('(a{2})+?')).eql(rep(cap(1, rep(lit('a'), 2, 2)), 1, undefined, false))
	expect(parse_or_throw('.^*')).eql(cat(dot(), maybe_many(empty(Assertion.BeginLine))))
	expect(parse_or_throw('[ab]{0,1}')).eql(rep(bclass(['a', 'b']), 0, 1))
}))

describe('parse escape', () => {
	it('control and metacharacter escapes', () => {
		check('\\a\\f\\t\\n\\r\\v',
			'cat',
			' lit(0x7)',
			' lit(0xc)',
			' lit(\\t)',
			' lit(\\n)',
			' lit(\\r)',
			' lit(0xb)',
		)

		check('\\\\\\.\\+\\*\\?\\(\\)\\|\\[\\]\\{\\}\\^\\$',
			'cat',
			' lit(\\)',
			' lit(.)',
			' lit(+)',
			' lit(*)',
			' lit(?)',
			' lit(()',
			' lit())',
			' lit(|)',
			' lit([)',
			' lit(])',
			' lit({)',
			' lit(})',
			' lit(^)',
			' lit($)',
		)

		check('\\-\\/', 'cat', ' lit(-)', ' lit(/)')
	})

	it('octal and hex', () => {
		check('\\123', 'lit(S)')
		check('\\1234', 'cat', ' lit(S)', ' lit(4)')
		check('\\0', 'lit(0x0)')
		check('\\x53', 'lit(S)')
		check('\\x534', 'cat', ' lit(S)', ' lit(4)')
		check('\\x{53}', 'lit(S)')
		check('\\x{53}4', 'cat', ' lit(S)', ' lit(4)')
		check('\\x{0000053}', 'lit(S)')
	})
})

describe('parse character classes', () => it('works', () => {
	check('[a]', 'bset([a-a])')
	check('[\\x00]', 'bset([0x0-0x0])')
	check('[\\n]', 'bset([\\n-\\n])')
	check('[^a]', 'bset([0x0-`][b-0xff])')
	check('[^\\x00]', 'bset([0x1-0xff])')
	check('[^\\n]', 'bset([0x0-\\t][0xb-0xff])')
	check('[]]', 'bset([]-]])')
	check('[]\\[]', 'bset([[-[][]-]])')
	check('[\\[]]', 'cat', ' bset([[-[])', ' lit(])')
	check('[]-]', 'bset([---][]-]])')
	check('[-]]', 'cat', ' bset([---])', ' lit(])')
	check('[a-cb-e]', 'bset([a-e])')
	check('[a-\\x63d]', 'bset([a-d])')
}))

describe('parse errors repeat', () => it('works', () => {
	check_error('*', ParseErrorKind.MissingRepeatOperand, 0)
	check_error('(*', ParseErrorKind.MissingRepeatOperand, 1)
	check_error('({5}', ParseErrorKind.MissingRepeatOperand, 1)
	check_error('{5}', ParseErrorKind.MissingRepeatOperand, 0)
	check_error('a**', ParseErrorKind.MissingRepeatOperand, 2)
	check_error('a*?*', ParseErrorKind.MissingRepeatOperand, 3)
	check_error('a|*', ParseErrorKind.MissingRepeatOperand, 2)
	check_error('a*{5}', ParseErrorKind.MissingRepeatOperand, 2)
	check_error('a|{5}', ParseErrorKind.MissingRepeatOperand, 2)

	check_error('a{}', ParseErrorKind.InvalidRepeatArgument, 2)
	check_error('a{5', ParseErrorKind.UnclosedRepeat, 1)
	check_error('a{xyz', ParseErrorKind.InvalidRepeatArgument)
	check_error('a{12,xyz', ParseErrorKind.InvalidRepeatArgument)
	check_error('a{,5}', ParseErrorKind.InvalidRepeatArgument)
	check_error('a{999999999999}', ParseErrorKind.ExcessiveRepeatCount, 2)
	check_error('a{1,999999999999}', ParseErrorKind.ExcessiveRepeatCount, 4)
	check_error('a{12x}', ParseErrorKind.UnclosedRepeat, 4)
	check_error('a{1,12x}', ParseErrorKind.UnclosedRepeat, 6)
	check_error('a{5,2}', ParseErrorKind.InvalidRepeatArgument, 1)
	check_error('{}', ParseErrorKind.InvalidRepeatArgument)

	// a well-formed brace is checked before its operand
	check_error('{1001}', ParseErrorKind.ExcessiveRepeatCount, 1)
	check_error('{5,2}', ParseErrorKind.InvalidRepeatArgument, 0)
}))

describe('parse errors alternate', () => it('works', () => {
	check_error('|a', ParseErrorKind.EmptyAlternate, 0)
	check_error('(|a)', ParseErrorKind.EmptyAlternate, 1)
	check_error('a||', ParseErrorKind.EmptyAlternate, 2)
	check_error('a|', ParseErrorKind.EmptyAlternate)
	check_error('(a|)', ParseErrorKind.EmptyAlternate, 3)

	check_error(')', ParseErrorKind.UnopenedParentheses, 0)
	check_error('ab)', ParseErrorKind.UnopenedParentheses, 2)
	check_error('a|b)', ParseErrorKind.UnopenedParentheses, 3)
	check_error('(a))', ParseErrorKind.UnopenedParentheses, 3)

	check_error('(a|b', ParseErrorKind.UnclosedParentheses, 0)
	check_error('ab(xy', ParseErrorKind.UnclosedParentheses, 2)
	check_error('(a|', ParseErrorKind.UnclosedParentheses, 0)
}))

describe('parse errors escape', () => it('works', () => {
	check_error('\\', ParseErrorKind.OpenEscapeCode, 0)
	check_error('a\\', ParseErrorKind.OpenEscapeCode, 1)
	check_error('\\m', ParseErrorKind.UnrecognizedEscapeCode, 0)
	check_error('\\8', ParseErrorKind.UnrecognizedEscapeCode)
	check_error('\\x', ParseErrorKind.InvalidHexDigit)
	check_error('\\xA', ParseErrorKind.InvalidHexDigit)
	check_error('\\xAG', ParseErrorKind.InvalidHexDigit, 3)
	check_error('\\x{', ParseErrorKind.InvalidHexDigit)
	check_error('\\x{}', ParseErrorKind.InvalidHexDigit)
	check_error('\\x{A', ParseErrorKind.UnclosedHexCharacterCode, 4)
	check_error('\\x{AG}', ParseErrorKind.UnclosedHexCharacterCode, 4)
	check_error('\\x{D800}', ParseErrorKind.InvalidHexDigit)
	check_error('\\x{DFFF}', ParseErrorKind.InvalidHexDigit)
	check_error('\\x{110000}', ParseErrorKind.InvalidHexDigit)
	check_error('\\x{99999999999999}', ParseErrorKind.InvalidHexDigit)

	check_error('\\x{100}', ParseErrorKind.CharacterCodeOutOfRange, 0)
	check_error('\\777', ParseErrorKind.CharacterCodeOutOfRange, 0)
}))

describe('parse errors character class', () => it('works', () => {
	check_error('[', ParseErrorKind.UnclosedBrackets, 0)
	check_error('[^', ParseErrorKind.UnclosedBrackets)
	check_error('[a', ParseErrorKind.UnclosedBrackets)
	check_error('[^a', ParseErrorKind.UnclosedBrackets)
	check_error('[a-', ParseErrorKind.UnclosedBrackets)
	check_error('[^a-', ParseErrorKind.UnclosedBrackets)
	check_error('[---', ParseErrorKind.UnclosedBrackets)
	check_error('x[]', ParseErrorKind.UnclosedBrackets, 1)
	check_error('[]', ParseErrorKind.UnclosedBrackets)
	check_error('[^]', ParseErrorKind.UnclosedBrackets)

	check_error('[\\A]', ParseErrorKind.UnrecognizedEscapeCode, 1)
	check_error('[\\A-a]', ParseErrorKind.UnrecognizedEscapeCode)
	check_error('[a-\\A]', ParseErrorKind.UnrecognizedEscapeCode, 3)
	check_error('[z-a]', ParseErrorKind.InvalidClassRange, 1)
}))

describe('Parser options', () => {
	it('defaults', () => {
		expect(new Parser().options).eql(DEFAULT_OPTIONS)
		check_error('a{1001}', ParseErrorKind.ExcessiveRepeatCount)
		check('a{1000}', 'rep({1000,1000})', ' lit(a)')
	})

	it('max_repeat_count', () => {
		const parser = new Parser({ max_repeat_count: 5000 })
		expect(parser.parse('a{1001}').is_ok()).true
		expect(parser.parse('a{5001}').match({ ok: () => undefined, err: e => e.kind }))
			.eql(ParseErrorKind.ExcessiveRepeatCount)
	})

	it('falls back to the defaults for undefined fields', () => {
		expect(new Parser({ max_repeat_count: undefined, trace: undefined }).options).eql(DEFAULT_OPTIONS)
		expect(parse('a{1000}', { max_repeat_count: undefined }).is_ok()).true
		expect(new Parser({ trace: undefined, max_repeat_count: 7 }).options).eql({ max_repeat_count: 7, trace: false })
	})

	it('rejects an invalid ceiling', () => {
		expect(() => new Parser({ max_repeat_count: -1 })).throw()
		expect(() => new Parser({ max_repeat_count: 1.5 })).throw()
		expect(() => new Parser({ max_repeat_count: 2 ** 32 })).throw()
	})

	it('can be reused', () => {
		const parser = new Parser()
		expect(parser.parse('(a)').match({ ok: repr, err: e => e.kind })).eql('cap\n lit(a)')
		expect(parser.parse('(b)').match({ ok: repr, err: e => e.kind })).eql('cap\n lit(b)')
	})
})

describe('parse_or_throw', () => it('throws the parse error', () => {
	expect(() => parse_or_throw('(a')).throw(ParseError, `'(' has no matching ')' (at byte 0)`)
}))

describe('deep nesting', () => it('does not exhaust the call stack', () => {
	const depth = 100000
	const pattern = '('.repeat(depth) + 'a' + ')'.repeat(depth)
	const found = parse(pattern).match({
		ok: (expr): string => expr.type,
		err: (error): string => error.kind,
	})
	expect(found).eql('Capture')
	check_error('('.repeat(depth), ParseErrorKind.UnclosedParentheses, 0)
}))
