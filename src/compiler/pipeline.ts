/**
 * Drives source text through lex → parse → analyze → optimize → generate.
 *
 * Each contract in a file is its own job. Lex and parse problems fail every job;
 * semantic errors fail only their contract; codegen errors fail only their target.
 * Compiler defects are caught at the job (or target) boundary and reported as
 * `internal` diagnostics instead of escaping to the caller.
 */

import { type ContractAnalysis, type FileAnalysis, analyze } from "./analyzer"
import type { Span } from "./ast"
import type { CompileLog, JobStage } from "./compile-log"
import { type Diagnostic, DiagnosticList } from "./errors"
import { Lexer } from "./lexer"
import { type OptimizeOptions, type OptimizerStats, optimize } from "./optimizer"
import { parse } from "./parser"
import { type TargetOptions, createTarget } from "./targets"
import type { Artifact, TargetId } from "./targets/target"
import type { SemType } from "./types"

export interface CompileOptions extends TargetOptions {
	readonly log?: CompileLog
	readonly optimizer?: OptimizeOptions
}

export type TargetResult =
	| { readonly status: "generated"; readonly target: TargetId; readonly artifact: Artifact }
	| { readonly status: "failed"; readonly target: TargetId; readonly diagnostics: readonly Diagnostic[] }

export interface ContractJob {
	readonly contract: string
	/** The last stage the job reached; `failed` when it stopped before code generation. */
	readonly stage: JobStage
	readonly stats: OptimizerStats | null
	/** Empty unless the job reached code generation. */
	readonly targets: readonly TargetResult[]
	readonly diagnostics: readonly Diagnostic[]
}

export interface CompileResult {
	readonly jobs: readonly ContractJob[]
	/** Every diagnostic of the batch: lex, parse, semantic and each target's codegen. */
	readonly diagnostics: readonly Diagnostic[]
}

export function compile(
	source: string,
	targets: readonly TargetId[],
	options: CompileOptions = {},
): CompileResult {
	const front = frontEnd(source)
	if (front.diagnostics.hasErrors() || !front.analysis) {
		return { jobs: [], diagnostics: front.diagnostics.items }
	}

	const diagnostics: Diagnostic[] = [...front.diagnostics.items, ...front.analysis.diagnostics.items]
	const jobs: ContractJob[] = []
	const fileFailed = front.analysis.diagnostics.hasErrors()
	// artifact path → the contract that produced it
	const claimed = new Map<string, string>()
	for (const analysis of front.analysis.contracts) {
		const job = runJob(analysis, targets, options, fileFailed, claimed)
		jobs.push(job)
		diagnostics.push(...job.diagnostics)
	}
	return { jobs, diagnostics }
}

/** Lexes, parses and (when parsing succeeded) analyzes. `diagnostics` holds lex and parse problems only. */
function frontEnd(source: string): { diagnostics: DiagnosticList; analysis: FileAnalysis | null } {
	const diagnostics = new DiagnosticList()
	const lexer = new Lexer(source)
	const tokens = lexer.tokenize()
	diagnostics.push(...lexer.diagnostics.items)
	const parsed = parse(tokens)
	diagnostics.push(...parsed.diagnostics.items)
	if (diagnostics.hasErrors()) return { diagnostics, analysis: null }

	return { diagnostics, analysis: analyze(parsed.file) }
}

function runJob(
	analysis: ContractAnalysis,
	targetIds: readonly TargetId[],
	options: CompileOptions,
	fileFailed: boolean,
	claimed: Map<string, string>,
): ContractJob {
	const log = options.log
	const contract = analysis.contract.name
	const diagnostics: Diagnostic[] = [...analysis.diagnostics.items]
	log?.stage(contract, "parsed")

	if (fileFailed || analysis.diagnostics.hasErrors()) {
		log?.stage(contract, "failed")
		return { contract, stage: "failed", stats: null, targets: [], diagnostics }
	}
	log?.stage(contract, "analyzed")

	let optimized: ContractAnalysis
	let stats: OptimizerStats
	try {
		const result = optimize(analysis, options.optimizer)
		optimized = result.analysis
		stats = result.stats
	} catch (error) {
		diagnostics.push(internalDiagnostic(error, analysis.contract.span))
		log?.internal(contract, error)
		log?.stage(contract, "failed")
		return { contract, stage: "failed", stats: null, targets: [], diagnostics }
	}
	log?.stage(contract, "optimized")
	log?.optimizer(contract, stats)

	const targets: TargetResult[] = []
	for (const id of targetIds) {
		const result = generateTarget(optimized, id, options, claimed)
		if (result.status === "generated") {
			log?.target(contract, id, "generated", 0)
		} else {
			diagnostics.push(...result.diagnostics)
			log?.target(contract, id, "failed", result.diagnostics.length)
		}
		targets.push(result)
	}
	return { contract, stage: "optimized", stats, targets, diagnostics }
}

function generateTarget(
	analysis: ContractAnalysis,
	id: TargetId,
	options: CompileOptions,
	claimed: Map<string, string>,
): TargetResult {
	try {
		const result = createTarget(id, options).generate(analysis)
		if (!result.artifact) return { status: "failed", target: id, diagnostics: result.diagnostics }
		const path = result.artifact.path
		const owner = claimed.get(path)
		if (owner !== undefined) {
			const diagnostic: Diagnostic = {
				kind: "codegen",
				code: "TargetConstraintViolation",
				severity: "error",
				message: `artifact path '${path}' is already used by contract '${owner}'`,
				span: analysis.contract.span,
				target: id,
			}
			return { status: "failed", target: id, diagnostics: [diagnostic] }
		}
		claimed.set(path, analysis.contract.name)
		return { status: "generated", target: id, artifact: result.artifact }
	} catch (error) {
		options.log?.internal(analysis.contract.name, error)
		const diagnostic = { ...internalDiagnostic(error, analysis.contract.span), target: id }
		return { status: "failed", target: id, diagnostics: [diagnostic] }
	}
}

function internalDiagnostic(error: unknown, span: Span): Diagnostic {
	const message = error instanceof Error ? error.message : String(error)
	return {
		kind: "internal",
		code: "InternalInvariantViolation",
		severity: "error",
		message: `internal compiler error: ${message}`,
		span,
	}
}

// --- Check ---

export interface CheckResult {
	readonly diagnostics: readonly Diagnostic[]
	/** Empty when lexing or parsing failed. */
	readonly contracts: readonly ContractAnalysis[]
	/** The type of the innermost expression at a 1-based position, if any. */
	typeAt(line: number, column: number): SemType | null
}

/** Parses and analyzes without generating code. */
export function check(source: string): CheckResult {
	const front = frontEnd(source)
	const contracts = front.analysis?.contracts ?? []
	const diagnostics = [...front.diagnostics.items, ...(front.analysis?.diagnostics.items ?? [])]
	for (const c of contracts) diagnostics.push(...c.diagnostics.items)
	return {
		diagnostics,
		contracts,
		typeAt: (line, column) => typeAt(contracts, line, column),
	}
}

function typeAt(contracts: readonly ContractAnalysis[], line: number, column: number): SemType | null {
	let best: { span: Span; type: SemType } | null = null
	for (const analysis of contracts) {
		for (const [expr, type] of analysis.types) {
			const span = expr.span
			if (!contains(span, line, column)) continue
			if (!best || isInside(span, best.span)) best = { span, type }
		}
	}
	return best?.type ?? null
}

function contains(span: Span, line: number, column: number): boolean {
	const afterStart = line > span.line || (line === span.line && column >= span.column)
	const beforeEnd = line < span.endLine || (line === span.endLine && column < span.endColumn)
	return afterStart && beforeEnd
}

/** True when `a` starts later than `b`, or starts with it and ends sooner. */
function isInside(a: Span, b: Span): boolean {
	if (a.line !== b.line) return a.line > b.line
	if (a.column !== b.column) return a.column > b.column
	if (a.endLine !== b.endLine) return a.endLine < b.endLine
	return a.endColumn < b.endColumn
}
