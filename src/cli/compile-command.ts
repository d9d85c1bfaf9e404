/**
 * Command-line front end: `compile`, `check` and `example`.
 *
 * All file and console access goes through a {@link CliIo} so the command can
 * run against an in-memory file system in tests.
 */

import { join } from "node:path"
import { createCompileLog, formatCompileMessage } from "../compiler/compile-log"
import { type Diagnostic, formatDiagnostic } from "../compiler/errors"
import { check, compile } from "../compiler/pipeline"
import { type MapPolicy, type TargetId, parseTargetList } from "../compiler/targets"
import { typeToString } from "../compiler/types"

export interface CliIo {
	/** Throws when the file cannot be read. */
	readFile(path: string): string
	writeFile(path: string, text: string): void
	mkdir(path: string): void
	out(line: string): void
	err(line: string): void
	/** Source of the bundled example contract. */
	example(): string
}

export const ExitCode = {
	Ok: 0,
	SourceErrors: 1,
	TargetFailed: 2,
	Usage: 64,
	NoInput: 66,
	Internal: 70,
} as const

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode]

export const USAGE = `usage: ccdsl <command> [options]

commands:
  compile --input <file> --target <solana|aptos|sui|all>[,...] --output <dir>
  check --input <file>
  example [--output <file>]

options:
  --verbose                       print stage events and optimizer statistics
  --map-policy <bounded|reject>   how solana stores maps (default bounded)
  --map-capacity <n>              entries per solana map (default 64)`

const VALUE_FLAGS = new Set(["input", "target", "output", "map-policy", "map-capacity"])
const BOOLEAN_FLAGS = new Set(["verbose", "help"])

interface ParsedArgs {
	readonly command: string | null
	readonly flags: ReadonlyMap<string, string>
	readonly verbose: boolean
	readonly help: boolean
}

class UsageError extends Error {
	constructor(message: string) {
		super(message)
		this.name = "UsageError"
	}
}

function parseArgs(argv: readonly string[]): ParsedArgs {
	let command: string | null = null
	const flags = new Map<string, string>()
	const switches = new Set<string>()
	for (let i = 0; i < argv.length; i++) {
		const arg = argv[i]!
		if (!arg.startsWith("--")) {
			if (command !== null) throw new UsageError(`unexpected argument '${arg}'`)
			command = arg
			continue
		}
		const eq = arg.indexOf("=")
		const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq)
		if (BOOLEAN_FLAGS.has(name)) {
			if (eq !== -1) throw new UsageError(`--${name} takes no value`)
			switches.add(name)
			continue
		}
		if (!VALUE_FLAGS.has(name)) throw new UsageError(`unknown option '--${name}'`)
		let value: string | undefined
		if (eq !== -1) {
			value = arg.slice(eq + 1)
		} else {
			value = argv[i + 1]
			i++
		}
		if (value === undefined || value === "") throw new UsageError(`--${name} needs a value`)
		flags.set(name, value)
	}
	return { command, flags, verbose: switches.has("verbose"), help: switches.has("help") }
}

function required(args: ParsedArgs, name: string): string {
	const value = args.flags.get(name)
	if (value === undefined) throw new UsageError(`${args.command ?? "command"} needs --${name}`)
	return value
}

function mapPolicyFlag(args: ParsedArgs): MapPolicy | undefined {
	const value = args.flags.get("map-policy")
	if (value === undefined) return undefined
	if (value !== "bounded" && value !== "reject") {
		throw new UsageError(`--map-policy must be 'bounded' or 'reject', got '${value}'`)
	}
	return value
}

function mapCapacityFlag(args: ParsedArgs): number | undefined {
	const value = args.flags.get("map-capacity")
	if (value === undefined) return undefined
	if (!/^[1-9][0-9]*$/.test(value)) throw new UsageError(`--map-capacity must be a positive integer`)
	return Number(value)
}

/** Runs one command and returns the process exit code. */
export function runCli(argv: readonly string[], io: CliIo): ExitCode {
	let args: ParsedArgs
	try {
		args = parseArgs(argv)
		if (args.help) {
			io.out(USAGE)
			return ExitCode.Ok
		}
		switch (args.command) {
			case "compile":
				return runCompile(args, io)
			case "check":
				return runCheck(args, io)
			case "example":
				return runExample(args, io)
			case null:
				throw new UsageError("no command given")
			default:
				throw new UsageError(`unknown command '${args.command}'`)
		}
	} catch (e) {
		if (!(e instanceof UsageError)) throw e
		io.err(`error: ${e.message}`)
		io.err(USAGE)
		return ExitCode.Usage
	}
}

function readInput(path: string, io: CliIo): string | null {
	try {
		return io.readFile(path)
	} catch (e) {
		const reason = e instanceof Error ? e.message : String(e)
		io.err(`error: cannot read ${path}: ${reason}`)
		return null
	}
}

function printDiagnostics(diagnostics: readonly Diagnostic[], file: string, io: CliIo): void {
	for (const d of diagnostics) io.err(formatDiagnostic(d, file))
}

function runCompile(args: ParsedArgs, io: CliIo): ExitCode {
	const input = required(args, "input")
	const targetFlag = required(args, "target")
	const output = required(args, "output")
	const targetList = parseTargetList(targetFlag)
	if (!targetList.ok) throw new UsageError(targetList.error)
	const solana = { mapPolicy: mapPolicyFlag(args), mapCapacity: mapCapacityFlag(args) }

	const source = readInput(input, io)
	if (source === null) return ExitCode.NoInput

	const log = createCompileLog()
	const result = compile(source, targetList.targets, { log, solana })

	const written = new Set<TargetId>()
	for (const job of result.jobs) {
		for (const t of job.targets) {
			if (t.status !== "generated") continue
			if (!written.has(t.target)) {
				io.mkdir(join(output, t.target))
				written.add(t.target)
			}
			const path = join(output, t.artifact.path)
			io.writeFile(path, t.artifact.text)
			io.out(`wrote ${path}`)
		}
	}

	printDiagnostics(result.diagnostics, input, io)
	if (args.verbose) {
		for (const m of log.getMessages()) io.out(formatCompileMessage(m))
	}
	return exitCodeFor(result.diagnostics)
}

function runCheck(args: ParsedArgs, io: CliIo): ExitCode {
	const input = required(args, "input")
	const source = readInput(input, io)
	if (source === null) return ExitCode.NoInput

	const result = check(source)
	printDiagnostics(result.diagnostics, input, io)
	if (args.verbose) {
		for (const c of result.contracts) {
			for (const fn of c.info.functions.values()) {
				const params = fn.params.map((p) => `${p.name}: ${typeToString(p.type)}`).join(", ")
				io.out(`${c.info.name}.${fn.name}(${params}) -> ${typeToString(fn.returnType)}`)
			}
		}
	}
	const code = exitCodeFor(result.diagnostics)
	if (code === ExitCode.Ok) io.out(`${input}: ok (${result.contracts.length} contracts)`)
	return code
}

/** Prints the example contract, or writes it to `--output` when given. */
function runExample(args: ParsedArgs, io: CliIo): ExitCode {
	const output = args.flags.get("output")
	if (output === undefined) {
		io.out(io.example())
		return ExitCode.Ok
	}
	io.writeFile(output, io.example())
	io.out(`wrote ${output}`)
	return ExitCode.Ok
}

function exitCodeFor(diagnostics: readonly Diagnostic[]): ExitCode {
	const errors = diagnostics.filter((d) => d.severity === "error")
	if (errors.some((d) => d.kind === "internal")) return ExitCode.Internal
	if (errors.some((d) => d.kind === "lex" || d.kind === "parse" || d.kind === "semantic")) {
		return ExitCode.SourceErrors
	}
	if (errors.some((d) => d.kind === "codegen")) return ExitCode.TargetFailed
	return ExitCode.Ok
}
