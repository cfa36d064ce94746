#!/usr/bin/env node
import { parse } from './parser'
import { repr, render_pattern } from './render'
import { format_parse_error } from './diagnostic'

const args = process.argv.slice(2)
const flags = args.filter(arg => arg.startsWith('--'))
const [pattern] = args.filter(arg => !arg.startsWith('--'))
if (pattern === undefined)
	throw new Error("no pattern provided, usage: rexparse <pattern> [--pattern] [--trace]")

const result = parse(pattern, { trace: flags.includes('--trace') })
if (result.is_err()) {
	process.stderr.write(format_parse_error(pattern, result.error, process.stderr.isTTY === true) + '\n')
	process.exitCode = 1
}
else
	process.stdout.write((flags.includes('--pattern') ? render_pattern(result.value) : repr(result.value)) + '\n')
