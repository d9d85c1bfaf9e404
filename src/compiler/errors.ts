import type { Span } from "./ast"

export type DiagnosticKind = "lex" | "parse" | "semantic" | "codegen" | "internal"

export type DiagnosticCode =
	// lex
	| "UnknownCharacter"
	| "UnterminatedString"
	| "UnterminatedComment"
	| "InvalidLiteral"
	// parse
	| "UnexpectedToken"
	// semantic
	| "UndefinedSymbol"
	| "DuplicateDeclaration"
	| "TypeMismatch"
	| "MissingReturn"
	| "ImmutableAssignment"
	| "ArityMismatch"
	| "NonExhaustiveMatch"
	| "InvalidModifier"
	| "InterfaceMismatch"
	| "InvalidType"
	| "InvalidInitializer"
	| "InvalidLambda"
	| "UnreachableCode"
	// codegen
	| "UnsupportedConstruct"
	| "TargetConstraintViolation"
	// internal
	| "InternalInvariantViolation"

export interface Diagnostic {
	readonly kind: DiagnosticKind
	readonly code: DiagnosticCode
	readonly severity: "error" | "warning"
	readonly message: string
	readonly span: Span
	readonly hint?: string
	/** Set for codegen diagnostics: the target that produced it. */
	readonly target?: string
}

export class DiagnosticList {
	readonly items: Diagnostic[] = []

	add(
		kind: DiagnosticKind,
		code: DiagnosticCode,
		span: Span,
		message: string,
		hint?: string,
	): void {
		this.items.push({ kind, code, severity: "error", message, span, hint })
	}

	warn(kind: DiagnosticKind, code: DiagnosticCode, span: Span, message: string): void {
		this.items.push({ kind, code, severity: "warning", message, span })
	}

	push(...diagnostics: readonly Diagnostic[]): void {
		this.items.push(...diagnostics)
	}

	get errors(): Diagnostic[] {
		return this.items.filter((d) => d.severity === "error")
	}

	get warnings(): Diagnostic[] {
		return this.items.filter((d) => d.severity === "warning")
	}

	hasErrors(): boolean {
		return this.items.some((d) => d.severity === "error")
	}
}

/**
 * A compiler defect: optimizer non-termination, a type-changing rewrite, or an
 * overlay lookup that the analyzer should have guaranteed. Never caused by user input.
 */
export class InternalCompilerError extends Error {
	constructor(message: string) {
		super(message)
		this.name = "InternalCompilerError"
	}
}

export function formatDiagnostic(d: Diagnostic, file?: string): string {
	const where = `${file ? `${file}:` : ""}${d.span.line}:${d.span.column}`
	const target = d.target ? ` [${d.target}]` : ""
	const hint = d.hint ? ` (hint: ${d.hint})` : ""
	return `${where} ${d.severity} ${d.code}${target}: ${d.message}${hint}`
}
