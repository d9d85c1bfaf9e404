import type { ContractAnalysis } from "../analyzer"
import type { DeclNode, Expr, Ident, IndexAccess, Span } from "../ast"
import { type Diagnostic, type DiagnosticCode, InternalCompilerError } from "../errors"
import { collectErrorCodes, type ErrorCodeTable, modifierLocalNames } from "../lowering"
import type { SymbolInfo } from "../scopes"
import type { SemType } from "../types"

export const TARGET_IDS = ["solana", "aptos", "sui"] as const

export type TargetId = (typeof TARGET_IDS)[number]

export function isTargetId(name: string): name is TargetId {
	return TARGET_IDS.some((t) => t === name)
}

export interface Artifact {
	readonly target: TargetId
	/** Relative to the output directory, e.g. `aptos/token_vault.move`. */
	readonly path: string
	readonly text: string
}

export interface GenerateResult {
	readonly artifact: Artifact | null
	readonly diagnostics: readonly Diagnostic[]
}

export interface Target {
	readonly id: TargetId
	generate(analysis: ContractAnalysis): GenerateResult
}

export interface WriterMark {
	readonly index: number
	readonly depth: number
}

/** Line-oriented source writer with a fixed indent unit. */
export class CodeWriter {
	private lines: string[] = []
	private depth = 0

	constructor(private readonly unit = "    ") {}

	line(text = ""): this {
		this.lines.push(text === "" ? "" : this.unit.repeat(this.depth) + text)
		return this
	}

	/** A blank line, unless the previous line is already blank or opens a block. */
	blank(): this {
		const last = this.lines[this.lines.length - 1]
		if (last !== undefined && last !== "" && !last.endsWith("{")) this.lines.push("")
		return this
	}

	indent(): this {
		this.depth++
		return this
	}

	dedent(): this {
		if (this.depth === 0) throw new InternalCompilerError("unbalanced indentation in code writer")
		this.depth--
		return this
	}

	/** `header {`, the body one level deeper, then `footer`. */
	block(header: string, body: () => void, footer = "}"): this {
		this.line(header === "" ? "{" : `${header} {`)
		this.indent()
		body()
		this.dedent()
		this.line(footer)
		return this
	}

	/** Remembers the current position so lines can be inserted there later. */
	mark(): WriterMark {
		return { index: this.lines.length, depth: this.depth }
	}

	insert(at: WriterMark, texts: readonly string[]): this {
		const indented = texts.map((t) => (t === "" ? "" : this.unit.repeat(at.depth) + t))
		this.lines.splice(at.index, 0, ...indented)
		return this
	}

	toString(): string {
		while (this.lines[this.lines.length - 1] === "") this.lines.pop()
		return `${this.lines.join("\n")}\n`
	}
}

/**
 * A place rooted in an indexed state map, e.g. `balances[k]` or `accounts[k].limit`.
 * `entry` is the map index expression; `nested` is set when the place continues past it.
 */
export interface MapPlace {
	readonly map: SymbolInfo
	readonly entry: IndexAccess
	readonly nested: boolean
}

/** Shared state and helpers of one generation run. */
export abstract class Generator {
	protected readonly w: CodeWriter
	protected readonly errors: ErrorCodeTable
	private readonly diagnostics: Diagnostic[] = []
	private readonly reported = new Set<string>()
	private readonly modifierLocals: ReadonlyMap<SymbolInfo, string>
	private tempCounter = 0

	constructor(
		protected readonly analysis: ContractAnalysis,
		protected readonly target: TargetId,
		indentUnit = "    ",
	) {
		this.w = new CodeWriter(indentUnit)
		this.errors = collectErrorCodes(analysis.contract)
		this.modifierLocals = modifierLocalNames(analysis.contract, analysis.declarations)
	}

	protected abstract emit(): void

	/** A source identifier made safe for the target language. */
	protected abstract local(name: string): string

	protected abstract get artifactPath(): string

	run(): GenerateResult {
		this.emit()
		if (this.diagnostics.length > 0) {
			return { artifact: null, diagnostics: this.diagnostics }
		}
		return {
			artifact: { target: this.target, path: this.artifactPath, text: this.w.toString() },
			diagnostics: [],
		}
	}

	protected fail(code: DiagnosticCode, span: Span, message: string, hint?: string): void {
		const key = `${code}:${span.line}:${span.column}:${message}`
		if (this.reported.has(key)) return
		this.reported.add(key)
		this.diagnostics.push({
			kind: "codegen",
			code,
			severity: "error",
			message,
			span,
			hint,
			target: this.target,
		})
	}

	protected unsupported(span: Span, message: string): void {
		this.fail("UnsupportedConstruct", span, message)
	}

	protected typeOf(expr: Expr): SemType {
		const type = this.analysis.types.get(expr)
		if (!type) {
			throw new InternalCompilerError(
				`expression at ${expr.span.line}:${expr.span.column} has no resolved type`,
			)
		}
		return type
	}

	protected symbolOf(ident: Ident): SymbolInfo {
		const symbol = this.analysis.references.get(ident)
		if (!symbol) throw new InternalCompilerError(`unresolved name '${ident.name}'`)
		return symbol
	}

	/** Emitted name of a parameter, local or loop variable. */
	protected bindingName(symbol: SymbolInfo, name: string): string {
		return this.modifierLocals.get(symbol) ?? this.local(name)
	}

	/** Emitted name for the variable a declaration introduces. */
	protected declaredName(node: DeclNode, name: string): string {
		const symbol = this.analysis.declarations.get(node)
		if (!symbol) throw new InternalCompilerError(`no symbol for '${name}'`)
		return this.bindingName(symbol, name)
	}

	protected fresh(prefix: string): string {
		return `__${prefix}${this.tempCounter++}`
	}

	protected resetTemps(): void {
		this.tempCounter = 0
	}

	/** True for an identifier that names a state variable. */
	protected isStateRef(expr: Expr): boolean {
		return expr.kind === "Ident" && this.symbolOf(expr).kind === "state"
	}

	/** Splits a place into the state map entry it is rooted at, if any. */
	protected mapPlace(place: Expr): MapPlace | null {
		let current = place
		let nested = false
		for (;;) {
			if (current.kind === "GroupExpr") {
				current = current.expr
				continue
			}
			if (current.kind === "IndexAccess") {
				const object = current.object
				if (object.kind === "Ident" && this.typeOf(object).kind === "map") {
					return { map: this.symbolOf(object), entry: current, nested }
				}
				current = object
				nested = true
				continue
			}
			if (current.kind === "FieldAccess") {
				current = current.object
				nested = true
				continue
			}
			return null
		}
	}
}

/** Expressions that are cheap to repeat and never touch state. */
export function isSimple(expr: Expr, isState: (e: Expr) => boolean): boolean {
	switch (expr.kind) {
		case "IntLiteral":
		case "BoolLiteral":
		case "IntrinsicExpr":
			return true
		case "Ident":
			return !isState(expr)
		case "GroupExpr":
			return isSimple(expr.expr, isState)
		default:
			return false
	}
}

/** Escapes text for a double-quoted literal in any of the target languages. */
export function escapeString(value: string): string {
	let out = ""
	for (const ch of value) {
		switch (ch) {
			case "\\":
				out += "\\\\"
				break
			case '"':
				out += '\\"'
				break
			case "\n":
				out += "\\n"
				break
			case "\t":
				out += "\\t"
				break
			case "\0":
				out += "\\0"
				break
			default:
				out += ch
		}
	}
	return out
}

export function intLiteralText(value: bigint): string {
	return value < 0n ? `(${value})` : `${value}`
}
