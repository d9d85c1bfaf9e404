// Target-independent lowering shared by the evaluator and every code generator:
// modifier expansion, require error codes, and identifier case conversion.

import type { Block, ContractDecl, DeclNode, FunctionDecl, ModifierDecl, Stmt } from "./ast"
import type { SymbolInfo } from "./scopes"

/**
 * Returns the function body with its modifiers wrapped around it, first modifier outermost.
 * Each modifier's `_;` is replaced by the enclosed body as a nested block. Nothing is mutated.
 */
export function expandModifiers(
	fn: FunctionDecl,
	modifiers: ReadonlyMap<string, ModifierDecl>,
): Block {
	let body = fn.body
	for (let i = fn.modifiers.length - 1; i >= 0; i--) {
		const ref = fn.modifiers[i]!
		const modifier = modifiers.get(ref.name)
		if (!modifier) continue
		body = spliceBody(modifier.body, body)
	}
	return body
}

function spliceBody(modifierBody: Block, inner: Block): Block {
	const stmts: Stmt[] = modifierBody.stmts.map((s) => (s.kind === "PlaceholderStmt" ? inner : s))
	return { kind: "Block", stmts, span: modifierBody.span }
}

/**
 * Emitted names for the locals and loop variables declared in modifier bodies, e.g.
 * `__m0_amount` for `let amount` in the first modifier. The function body is spliced into the
 * modifier's block, where a modifier local under its source name would hide a parameter.
 */
export function modifierLocalNames(
	contract: ContractDecl,
	declarations: ReadonlyMap<DeclNode, SymbolInfo>,
): Map<SymbolInfo, string> {
	const names = new Map<SymbolInfo, string>()
	contract.modifiers.forEach((modifier, index) => {
		const bind = (node: DeclNode, name: string): void => {
			const symbol = declarations.get(node)
			if (symbol) names.set(symbol, `__m${index}_${name}`)
		}
		const visit = (stmts: readonly Stmt[]): void => {
			for (const stmt of stmts) {
				switch (stmt.kind) {
					case "LetStmt":
						bind(stmt, stmt.name)
						break
					case "Block":
						visit(stmt.stmts)
						break
					case "IfStmt":
						visit(stmt.then.stmts)
						if (stmt.else_) visit([stmt.else_])
						break
					case "WhileStmt":
						visit(stmt.body.stmts)
						break
					case "ForRangeStmt":
					case "ForEachStmt":
						bind(stmt, stmt.variable)
						visit(stmt.body.stmts)
						break
					case "MatchStmt":
						for (const arm of stmt.arms) visit(arm.body.stmts)
						break
					default:
						break
				}
			}
		}
		visit(modifier.body.stmts)
	})
	return names
}

// --- Error codes ---

export interface ErrorCode {
	/** Move constant name, e.g. `E_INSUFFICIENT_BALANCE`. */
	readonly constName: string
	/** Rust enum variant, e.g. `InsufficientBalance`. */
	readonly variant: string
	/** 1-based, in order of first appearance. */
	readonly code: number
	/** Message of the first `require` that produced this code. */
	readonly message: string
}

export class ErrorCodeTable {
	private byName = new Map<string, ErrorCode>()

	/** Returns the code for a `require` message, registering it on first sight. */
	intern(message: string | null): ErrorCode {
		const words = message === null ? [] : splitWords(message)
		const base = words.length === 0 ? ["require", "failed"] : words
		const constName = `E_${base.map((w) => w.toUpperCase()).join("_")}`
		const existing = this.byName.get(constName)
		if (existing) return existing
		let variant = base.map(capitalize).join("")
		if (/^[0-9]/.test(variant)) variant = `Error${variant}`
		const code: ErrorCode = {
			constName,
			variant,
			code: this.byName.size + 1,
			message: message ?? "requirement failed",
		}
		this.byName.set(constName, code)
		return code
	}

	get codes(): ErrorCode[] {
		return [...this.byName.values()]
	}
}

/** Collects the error codes of every `require` in the contract, in source order. */
export function collectErrorCodes(contract: ContractDecl): ErrorCodeTable {
	const table = new ErrorCodeTable()
	const visit = (stmts: readonly Stmt[]): void => {
		for (const stmt of stmts) {
			switch (stmt.kind) {
				case "RequireStmt":
					table.intern(stmt.message)
					break
				case "Block":
					visit(stmt.stmts)
					break
				case "IfStmt":
					visit(stmt.then.stmts)
					if (stmt.else_) visit([stmt.else_])
					break
				case "WhileStmt":
				case "ForRangeStmt":
				case "ForEachStmt":
					visit(stmt.body.stmts)
					break
				case "MatchStmt":
					for (const arm of stmt.arms) visit(arm.body.stmts)
					break
				default:
					break
			}
		}
	}
	// Modifiers first: they run before the bodies they wrap
	for (const m of contract.modifiers) visit(m.body.stmts)
	for (const fn of contract.functions) visit(fn.body.stmts)
	return table
}

// --- Identifier case ---

function splitWords(text: string): string[] {
	return text
		.replace(/([a-z0-9])([A-Z])/g, "$1 $2")
		.split(/[^A-Za-z0-9]+/)
		.filter((w) => w.length > 0)
		.map((w) => w.toLowerCase())
}

function capitalize(word: string): string {
	return word.charAt(0).toUpperCase() + word.slice(1)
}

/** `TokenVault` → `token_vault` */
export function toSnakeCase(name: string): string {
	return splitWords(name).join("_")
}

/** `transfer_from` → `TransferFrom` */
export function toPascalCase(name: string): string {
	return splitWords(name).map(capitalize).join("")
}
