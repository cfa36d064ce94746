import * as util from 'util'
import { Maybe, Some, None } from '@ts-std/monads'

export function debug(obj: unknown, depth = null as number | null) {
	return util.inspect(obj, { depth, colors: true })
}
export function log(obj: unknown, depth = null as number | null) {
	console.log(debug(obj, depth))
}

export class LogError extends Error {
	constructor(lines: unknown[], depth = null as number | null) {
		const message = lines.map(line => {
			return typeof line === 'string'
				? line
				: debug(line, depth)
		}).join('\n')
		super(message)
	}
}


export type NonLone<T> = [T, T, ...T[]]
export namespace NonLone {
	export function from_array<T>(array: T[]): Maybe<NonLone<T>> {
		return array.length >= 2 ? Some(array as NonLone<T>) : None
	}
}


export function exhaustive(v: never): never {
	throw new LogError(['unhandled variant:', v])
}
