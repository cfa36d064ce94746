import { Result, Err } from '@ts-std/monads'

import { ParseError, ParseErrorKind } from './errors'

export class Cursor {
	index = 0
	constructor(readonly bytes: Uint8Array) {}

	static from(pattern: string | Uint8Array) {
		return new Cursor(typeof pattern === 'string' ? new TextEncoder().encode(pattern) : pattern)
	}

	done() {
		return this.index >= this.bytes.length
	}

	peek(offset = 0): number | undefined {
		const index = this.index + offset
		return index < this.bytes.length ? this.bytes[index] : undefined
	}

	next(): number | undefined {
		const byte = this.peek()
		if (byte !== undefined)
			this.index++
		return byte
	}

	eat(byte: number): boolean {
		if (this.peek() !== byte)
			return false
		this.index++
		return true
	}

	skip_while(test: (byte: number) => boolean) {
		let byte
		while ((byte = this.peek()) !== undefined && test(byte))
			this.index++
	}

	fail<T>(kind: ParseErrorKind, index = this.index): Result<T, ParseError> {
		return Err(new ParseError(kind, index))
	}
}
