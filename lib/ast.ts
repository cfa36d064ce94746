import { ByteSet, ByteRange, range } from './byte_set'
import { c } from './bytes'
import { NonLone, exhaustive } from './utils'

export enum Assertion {
	None = 'None',
	BeginLine = 'BeginLine',
	EndLine = 'EndLine',
	BeginText = 'BeginText',
	EndText = 'EndText',
	WordBoundary = 'WordBoundary',
	NotWordBoundary = 'NotWordBoundary',
}

export type Expr =
	| AnyCharNotNL
	| EmptyMatch
	| Literal
	| ByteClass
	| Capture
	| Repeat
	| Concat
	| Alternate

export namespace Expr {
	type Pair = [Expr, Expr]

	export function equals(left: Expr, right: Expr): boolean {
		const pairs: Pair[] = [[left, right]]
		let pair: Pair | undefined
		while ((pair = pairs.pop()) !== undefined) {
			const children = matching_children(pair[0], pair[1])
			if (children === undefined)
				return false
			for (const child of children)
				pairs.push(child)
		}
		return true
	}

	// compares the nodes themselves, giving the child pairs still to compare
	function matching_children(left: Expr, right: Expr): Pair[] | undefined {
		switch (left.type) {
			case 'AnyCharNotNL':
				return right.type === 'AnyCharNotNL' ? [] : undefined
			case 'EmptyMatch':
				return right.type === 'EmptyMatch' && left.assertion === right.assertion ? [] : undefined
			case 'Literal':
				return right.type === 'Literal' && left.byte === right.byte ? [] : undefined
			case 'ByteClass':
				return right.type === 'ByteClass' && left.set.equals(right.set) ? [] : undefined
			case 'Capture':
				return right.type === 'Capture' && left.index === right.index
					? [[left.expr, right.expr]]
					: undefined
			case 'Repeat':
				return right.type === 'Repeat'
					&& left.min === right.min
					&& left.max === right.max
					&& left.greedy === right.greedy
					? [[left.expr, right.expr]]
					: undefined
			case 'Concat':
				return right.type === 'Concat' ? zip(left.exprs, right.exprs) : undefined
			case 'Alternate':
				return right.type === 'Alternate' ? zip(left.exprs, right.exprs) : undefined
			default:
				return exhaustive(left)
		}
	}

	function zip(left: Expr[], right: Expr[]): Pair[] | undefined {
		return left.length === right.length
			? left.map((expr, index): Pair => [expr, right[index]])
			: undefined
	}
}

export class AnyCharNotNL {
	readonly type: 'AnyCharNotNL' = 'AnyCharNotNL'
}
export function dot() { return new AnyCharNotNL() }

export class EmptyMatch {
	readonly type: 'EmptyMatch' = 'EmptyMatch'
	constructor(readonly assertion: Assertion) {}
}
export function empty(assertion = Assertion.None) { return new EmptyMatch(assertion) }

export class Literal {
	readonly type: 'Literal' = 'Literal'
	constructor(readonly byte: number) {}
}
export function lit(value: string | number) {
	return new Literal(typeof value === 'string' ? c(value) : value)
}

export class ByteClass {
	readonly type: 'ByteClass' = 'ByteClass'
	constructor(readonly set: ByteSet) {}
}
// bclass(['a', 'z'], '_') is the class [a-z_]
export function bclass(...members: (string | number | [string | number, string | number])[]) {
	const byte = (value: string | number) => typeof value === 'string' ? c(value) : value
	const ranges: ByteRange[] = members.map(member => Array.isArray(member)
		? range(byte(member[0]), byte(member[1]))
		: range(byte(member), byte(member))
	)
	return new ByteClass(ByteSet.from_ranges(ranges))
}

export class Capture {
	readonly type: 'Capture' = 'Capture'
	constructor(
		readonly index: number,
		readonly expr: Expr,
	) {}
}
export function cap(index: number, expr: Expr) { return new Capture(index, expr) }

export class Repeat {
	readonly type: 'Repeat' = 'Repeat'
	constructor(
		readonly expr: Expr,
		readonly min: number,
		readonly max: number | undefined,
		readonly greedy: boolean,
	) {}
}
export function rep(expr: Expr, min: number, max: number | undefined, greedy = true) {
	return new Repeat(expr, min, max, greedy)
}
export function maybe(expr: Expr, greedy = true) { return new Repeat(expr, 0, 1, greedy) }
export function many(expr: Expr, greedy = true) { return new Repeat(expr, 1, undefined, greedy) }
export function maybe_many(expr: Expr, greedy = true) { return new Repeat(expr, 0, undefined, greedy) }

export class Concat {
	readonly type: 'Concat' = 'Concat'
	constructor(readonly exprs: NonLone<Expr>) {}
}
export function cat(...exprs: NonLone<Expr>) { return new Concat(exprs) }

export class Alternate {
	readonly type: 'Alternate' = 'Alternate'
	constructor(readonly exprs: NonLone<Expr>) {}
}
export function alt(...exprs: NonLone<Expr>) { return new Alternate(exprs) }
