// Scope arena for one contract's analysis. Scopes refer to their parents by integer handle,
// so the whole table is a flat array that is dropped when analysis of the contract ends.

import type { SemType } from "./types"

export type ScopeId = number

export type SymbolKind = "state" | "const" | "param" | "local" | "loop"

export interface SymbolInfo {
	readonly name: string
	readonly type: SemType
	readonly kind: SymbolKind
	readonly mutable: boolean
	readonly scope: ScopeId
	/** Unique within the contract; stable for the lifetime of the analysis result. */
	readonly id: number
	/** Literal value of a contract constant, once evaluated. */
	readonly constValue?: bigint | boolean
}

interface Scope {
	readonly parent: ScopeId | null
	readonly symbols: Map<string, SymbolInfo>
	/** Lambda bodies may only see immutable bindings declared outside them. */
	readonly lambdaBoundary: boolean
}

export class ScopeArena {
	private scopes: Scope[] = []
	private nextSymbolId = 0

	push(parent: ScopeId | null, lambdaBoundary = false): ScopeId {
		this.scopes.push({ parent, symbols: new Map(), lambdaBoundary })
		return this.scopes.length - 1
	}

	/**
	 * Declares a symbol in `scope`. Returns the existing symbol instead when the name is already
	 * declared in that same scope; shadowing a name from an enclosing scope is allowed.
	 */
	declare(
		scope: ScopeId,
		name: string,
		type: SemType,
		kind: SymbolKind,
		mutable: boolean,
		constValue?: bigint | boolean,
	): { symbol: SymbolInfo; duplicate: boolean } {
		const table = this.scopes[scope]
		if (!table) throw new RangeError(`unknown scope ${scope}`)
		const existing = table.symbols.get(name)
		if (existing) return { symbol: existing, duplicate: true }
		const symbol: SymbolInfo = {
			name,
			type,
			kind,
			mutable,
			scope,
			id: this.nextSymbolId++,
			...(constValue !== undefined ? { constValue } : {}),
		}
		table.symbols.set(name, symbol)
		return { symbol, duplicate: false }
	}

	/**
	 * Resolves `name` from `scope` outwards. `crossedLambda` reports whether the lookup left a
	 * lambda body on the way to the symbol.
	 */
	lookup(scope: ScopeId, name: string): { symbol: SymbolInfo; crossedLambda: boolean } | null {
		let current: ScopeId | null = scope
		let crossedLambda = false
		while (current !== null) {
			const table: Scope | undefined = this.scopes[current]
			if (!table) return null
			const symbol = table.symbols.get(name)
			if (symbol) return { symbol, crossedLambda }
			if (table.lambdaBoundary) crossedLambda = true
			current = table.parent
		}
		return null
	}

	/** Whether `scope` lies inside a lambda body. */
	insideLambda(scope: ScopeId): boolean {
		let current: ScopeId | null = scope
		while (current !== null) {
			const table: Scope | undefined = this.scopes[current]
			if (!table) return false
			if (table.lambdaBoundary) return true
			current = table.parent
		}
		return false
	}
}
