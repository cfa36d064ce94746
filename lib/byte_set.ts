import { MAX_BYTE } from './bytes'
import { LogError } from './utils'

export type ByteRange = Readonly<{ min: number, max: number }>
export function range(min: number, max: number): ByteRange {
	return { min, max }
}

function is_byte(value: number) {
	return Number.isInteger(value) && value >= 0 && value <= MAX_BYTE
}

// a set of bytes kept as sorted, non-overlapping, non-adjacent inclusive ranges
export class ByteSet {
	private constructor(readonly ranges: readonly ByteRange[]) {}

	static from_ranges(ranges: readonly ByteRange[]): ByteSet {
		for (const r of ranges)
			if (!is_byte(r.min) || !is_byte(r.max) || r.min > r.max)
				throw new LogError([`invalid byte range:`, r])

		const sorted = ranges.slice().sort((a, b) => a.min - b.min || a.max - b.max)

		const merged = [] as ByteRange[]
		for (const r of sorted) {
			const last = merged[merged.length - 1]
			if (last !== undefined && r.min <= last.max + 1) {
				merged[merged.length - 1] = range(last.min, Math.max(last.max, r.max))
				continue
			}
			merged.push(r)
		}

		return new ByteSet(merged)
	}

	static of(...bytes: number[]): ByteSet {
		return ByteSet.from_ranges(bytes.map(byte => range(byte, byte)))
	}

	static empty(): ByteSet {
		return new ByteSet([])
	}

	static full(): ByteSet {
		return new ByteSet([range(0, MAX_BYTE)])
	}

	negate(): ByteSet {
		const gaps = [] as ByteRange[]
		let next = 0
		for (const r of this.ranges) {
			if (r.min > next)
				gaps.push(range(next, r.min - 1))
			next = r.max + 1
		}
		if (next <= MAX_BYTE)
			gaps.push(range(next, MAX_BYTE))

		return new ByteSet(gaps)
	}

	union(other: ByteSet): ByteSet {
		return ByteSet.from_ranges([...this.ranges, ...other.ranges])
	}

	contains(byte: number): boolean {
		let low = 0
		let high = this.ranges.length - 1
		while (low <= high) {
			const middle = (low + high) >> 1
			const r = this.ranges[middle]
			if (byte < r.min) high = middle - 1
			else if (byte > r.max) low = middle + 1
			else return true
		}
		return false
	}

	is_empty(): boolean {
		return this.ranges.length === 0
	}

	size(): number {
		return this.ranges.reduce((total, r) => total + r.max - r.min + 1, 0)
	}

	equals(other: ByteSet): boolean {
		return this.ranges.length === other.ranges.length
			&& this.ranges.every((r, index) => r.min === other.ranges[index].min && r.max === other.ranges[index].max)
	}
}
