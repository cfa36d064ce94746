import {
	Parser, ParseError, ParseErrorKind, Expr, Assertion,
	parse, parse_or_throw, repr, render_pattern, format_parse_error,
	lit, cat, alt, cap, many, maybe_many, bclass, dot, empty,
} from '../lib'
import { expect } from 'chai'

describe("the top level api", () => {

	it("parses a realistic pattern", () => {
		const expr = parse_or_throw('^([a-z_][a-z0-9_]*)=(.*)$')
		const expected = cat(
			empty(Assertion.BeginLine),
			cap(1, cat(
				bclass(['a', 'z'], '_'),
				maybe_many(bclass(['a', 'z'], ['0', '9'], '_')),
			)),
			lit('='),
			cap(2, maybe_many(dot())),
			empty(Assertion.EndLine),
		)
		expect(Expr.equals(expr, expected)).true
		expect(render_pattern(expr)).eql('^([_a-z][0-9_a-z]*)=(.*)$')
	})

	it("reports errors as values", () => {
		const result = parse('(a|b')
		expect(result.is_err()).true
		if (!result.is_err()) return

		expect(result.error).instanceof(ParseError)
		expect(result.error.kind).eql(ParseErrorKind.UnclosedParentheses)
		expect(result.error.index).eql(0)
		expect(format_parse_error('(a|b', result.error, false)).eql([
			'error: UnclosedParentheses',
			' |  (a|b',
			` |  ^ '(' has no matching ')'`,
		].join('\n'))
	})

	it("throws from parse_or_throw", () => {
		expect(() => parse_or_throw('a**')).throw(ParseError)
	})

	it("shares options across runs of one parser", () => {
		const parser = new Parser({ max_repeat_count: 3 })
		expect(parser.parse('a{3}').is_ok()).true
		expect(parser.parse('a{4}').match({
			ok: (): ParseErrorKind | undefined => undefined,
			err: error => error.kind,
		})).eql(ParseErrorKind.ExcessiveRepeatCount)
		expect(() => new Parser({ max_repeat_count: -1 })).throw()
	})

	it("prints trees", () => {
		expect(repr(parse_or_throw('a+|b'))).eql([
			'alt',
			' rep(+)',
			'  lit(a)',
			' lit(b)',
		].join('\n'))
		expect(Expr.equals(parse_or_throw('a+|b'), alt(many(lit('a')), lit('b')))).true
	})
})
