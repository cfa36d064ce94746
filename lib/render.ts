import { Expr, Assertion, Repeat } from './ast'
import { ByteSet, ByteRange } from './byte_set'
import { c, is_printable } from './bytes'
import { LogError, exhaustive } from './utils'

function repr_byte(byte: number) {
	switch (byte) {
		case c('\t'): return '\\t'
		case c('\r'): return '\\r'
		case c('\n'): return '\\n'
		default: return is_printable(byte)
			? String.fromCharCode(byte)
			: `0x${byte.toString(16)}`
	}
}

function repr_repeat({ min, max, greedy }: Repeat) {
	const operator =
		min === 0 && max === undefined ? '*'
		: min === 1 && max === undefined ? '+'
		: min === 0 && max === 1 ? '?'
		: `{${min},${max === undefined ? '' : max}}`
	return greedy ? operator : operator + '?'
}

/**
 * Renders the tree one node per line, children indented by one space:
 *
 * ```
 * cat
 *  lit(a)
 *  rep(*)
 *   dot
 * ```
 */
export function repr(expr: Expr): string {
	const lines = [] as string[]
	const stack: [Expr, number][] = [[expr, 0]]
	let item: [Expr, number] | undefined
	while (item = stack.pop()) {
		const [node, depth] = item
		const indent = ' '.repeat(depth)
		const push_children = (children: Expr[]) => {
			for (let index = children.length - 1; index >= 0; index--)
				stack.push([children[index], depth + 1])
		}

		switch (node.type) {
			case 'AnyCharNotNL':
				lines.push(indent + 'dot')
				break
			case 'EmptyMatch':
				lines.push(indent + `empty(${node.assertion})`)
				break
			case 'Literal':
				lines.push(indent + `lit(${repr_byte(node.byte)})`)
				break
			case 'ByteClass': {
				const ranges = node.set.ranges.map(r => `[${repr_byte(r.min)}-${repr_byte(r.max)}]`)
				lines.push(indent + `bset(${ranges.join('')})`)
				break
			}
			case 'Capture':
				lines.push(indent + 'cap')
				push_children([node.expr])
				break
			case 'Repeat':
				lines.push(indent + `rep(${repr_repeat(node)})`)
				push_children([node.expr])
				break
			case 'Concat':
				lines.push(indent + 'cat')
				push_children(node.exprs)
				break
			case 'Alternate':
				lines.push(indent + 'alt')
				push_children(node.exprs)
				break
			default:
				return exhaustive(node)
		}
	}

	return lines.join('\n')
}


const control_names = new Map<number, string>([
	[0x07, '\\a'],
	[0x0C, '\\f'],
	[0x09, '\\t'],
	[0x0A, '\\n'],
	[0x0D, '\\r'],
	[0x0B, '\\v'],
])

const metacharacters = new Set('\\.+*?()|[]{}^$'.split('').map(c))
const class_metacharacters = new Set('\\[]^-'.split('').map(c))

function render_byte(byte: number, special: Set<number>) {
	const control = control_names.get(byte)
	if (control !== undefined) return control
	if (special.has(byte)) return '\\' + String.fromCharCode(byte)
	if (is_printable(byte)) return String.fromCharCode(byte)
	return `\\x${byte.toString(16).padStart(2, '0')}`
}

function render_class(set: ByteSet) {
	// an empty set has no positive spelling
	if (set.is_empty())
		return `[^\\x00-\\xff]`

	const render_range = ({ min, max }: ByteRange) => min === max
		? render_byte(min, class_metacharacters)
		: render_byte(min, class_metacharacters) + '-' + render_byte(max, class_metacharacters)

	const negated = set.negate()
	// prefer the negated spelling when it is shorter, as in [^\n]
	return negated.ranges.length < set.ranges.length && !negated.is_empty()
		? `[^${negated.ranges.map(render_range).join('')}]`
		: `[${set.ranges.map(render_range).join('')}]`
}

function render_quantifier({ min, max, greedy }: Repeat) {
	const operator =
		min === 0 && max === undefined ? '*'
		: min === 1 && max === undefined ? '+'
		: min === 0 && max === 1 ? '?'
		: min === max ? `{${min}}`
		: `{${min},${max === undefined ? '' : max}}`
	return greedy ? operator : operator + '?'
}

function is_atomic(expr: Expr) {
	switch (expr.type) {
		case 'AnyCharNotNL':
		case 'Literal':
		case 'ByteClass':
		case 'Capture':
			return true
		case 'EmptyMatch':
			return expr.assertion !== Assertion.None
		default:
			return false
	}
}

/**
 * Renders the tree back into pattern text which parses to an equal tree.
 * There are no non-capturing groups, so a tree that would need one to keep its
 * shape (such as a repeat of a concatenation) can't be rendered.
 */
export function render_pattern(expr: Expr): string {
	const chunks = [] as string[]
	// plain strings on the stack are emitted as they are popped
	const stack: (Expr | string)[] = [expr]
	const push_reversed = (items: (Expr | string)[]) => {
		for (let index = items.length - 1; index >= 0; index--)
			stack.push(items[index])
	}

	let item: Expr | string | undefined
	while ((item = stack.pop()) !== undefined) {
		if (typeof item === 'string') {
			chunks.push(item)
			continue
		}

		switch (item.type) {
			case 'AnyCharNotNL':
				chunks.push('.')
				break
			case 'EmptyMatch':
				chunks.push(render_assertion(item.assertion))
				break
			case 'Literal':
				chunks.push(render_byte(item.byte, metacharacters))
				break
			case 'ByteClass':
				chunks.push(render_class(item.set))
				break
			case 'Capture':
				push_reversed(['(', item.expr, ')'])
				break
			case 'Repeat':
				if (!is_atomic(item.expr))
					throw new LogError([`can't render a repeat of this node without a non-capturing group:`, item.expr])
				push_reversed([item.expr, render_quantifier(item)])
				break
			case 'Concat':
				for (const child of item.exprs)
					if (child.type === 'Alternate' || child.type === 'Concat' || is_empty(child))
						throw new LogError([`can't render this node inside a concatenation:`, child])
				push_reversed(item.exprs)
				break
			case 'Alternate': {
				const branches = [] as (Expr | string)[]
				for (const child of item.exprs) {
					if (child.type === 'Alternate' || is_empty(child))
						throw new LogError([`can't render this node as an alternation branch:`, child])
					if (branches.length > 0)
						branches.push('|')
					branches.push(child)
				}
				push_reversed(branches)
				break
			}
			default:
				return exhaustive(item)
		}
	}

	return chunks.join('')
}

function render_assertion(assertion: Assertion) {
	switch (assertion) {
		case Assertion.None: return ''
		case Assertion.BeginLine: return '^'
		case Assertion.EndLine: return '$'
		default:
			throw new LogError([`the ${assertion} assertion has no pattern syntax`])
	}
}

function is_empty(expr: Expr) {
	return expr.type === 'EmptyMatch' && expr.assertion === Assertion.None
}
