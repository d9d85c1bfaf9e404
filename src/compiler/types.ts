// Resolved type system, used by the analyzer, optimizer, evaluator and code generators.

export const INT_KINDS = [
	"u8",
	"u16",
	"u32",
	"u64",
	"u128",
	"u256",
	"i8",
	"i16",
	"i32",
	"i64",
	"i128",
] as const

export type IntKind = (typeof INT_KINDS)[number]

export function isIntKind(name: string): name is IntKind {
	return INT_KINDS.some((k) => k === name)
}

export type SemType =
	| { readonly kind: "int"; readonly int: IntKind }
	| { readonly kind: "bool" }
	| { readonly kind: "address" }
	| { readonly kind: "string" }
	| { readonly kind: "bytes" }
	| { readonly kind: "map"; readonly key: SemType; readonly value: SemType }
	| { readonly kind: "vector"; readonly element: SemType }
	| { readonly kind: "array"; readonly element: SemType; readonly size: number }
	| { readonly kind: "tuple"; readonly elements: readonly SemType[] }
	| { readonly kind: "struct"; readonly name: string; readonly fields: readonly StructField[] }
	| { readonly kind: "option"; readonly inner: SemType }
	| { readonly kind: "result"; readonly ok: SemType; readonly err: SemType }
	| { readonly kind: "fn"; readonly params: readonly SemType[]; readonly ret: SemType }
	| { readonly kind: "void" }
	// Produced after an error has been reported; compatible with everything so one
	// mistake does not cascade into many diagnostics.
	| { readonly kind: "error" }

export interface StructField {
	readonly name: string
	readonly type: SemType
}

export type IntType = Extract<SemType, { kind: "int" }>
export type StructType = Extract<SemType, { kind: "struct" }>

export const BOOL: SemType = { kind: "bool" }
export const ADDRESS: SemType = { kind: "address" }
export const STRING: SemType = { kind: "string" }
export const BYTES: SemType = { kind: "bytes" }
export const VOID: SemType = { kind: "void" }
export const ERROR: SemType = { kind: "error" }

const INT_TYPES = new Map<IntKind, IntType>(INT_KINDS.map((k) => [k, { kind: "int", int: k }]))

export function intType(kind: IntKind): IntType {
	return INT_TYPES.get(kind) ?? { kind: "int", int: kind }
}

export const U64 = intType("u64")

export function isSigned(kind: IntKind): boolean {
	return kind.startsWith("i")
}

export function intBits(kind: IntKind): number {
	return Number(kind.slice(1))
}

export function intRange(kind: IntKind): { min: bigint; max: bigint } {
	const bits = BigInt(intBits(kind))
	if (isSigned(kind)) {
		return { min: -(1n << (bits - 1n)), max: (1n << (bits - 1n)) - 1n }
	}
	return { min: 0n, max: (1n << bits) - 1n }
}

export function fitsInt(value: bigint, kind: IntKind): boolean {
	const { min, max } = intRange(kind)
	return value >= min && value <= max
}

export function typeEq(a: SemType, b: SemType): boolean {
	if (a.kind === "error" || b.kind === "error") return true
	switch (a.kind) {
		case "int":
			return b.kind === "int" && a.int === b.int
		case "map":
			return b.kind === "map" && typeEq(a.key, b.key) && typeEq(a.value, b.value)
		case "vector":
			return b.kind === "vector" && typeEq(a.element, b.element)
		case "array":
			return b.kind === "array" && a.size === b.size && typeEq(a.element, b.element)
		case "tuple":
			return (
				b.kind === "tuple" &&
				a.elements.length === b.elements.length &&
				a.elements.every((t, i) => typeEq(t, b.elements[i]!))
			)
		case "struct":
			return (
				b.kind === "struct" &&
				a.name === b.name &&
				a.fields.length === b.fields.length &&
				a.fields.every((f, i) => f.name === b.fields[i]!.name && typeEq(f.type, b.fields[i]!.type))
			)
		case "option":
			return b.kind === "option" && typeEq(a.inner, b.inner)
		case "result":
			return b.kind === "result" && typeEq(a.ok, b.ok) && typeEq(a.err, b.err)
		case "fn":
			return (
				b.kind === "fn" &&
				a.params.length === b.params.length &&
				a.params.every((p, i) => typeEq(p, b.params[i]!)) &&
				typeEq(a.ret, b.ret)
			)
		default:
			return a.kind === b.kind
	}
}

export function typeToString(t: SemType): string {
	switch (t.kind) {
		case "int":
			return t.int
		case "map":
			return `map<${typeToString(t.key)}, ${typeToString(t.value)}>`
		case "vector":
			return `vec<${typeToString(t.element)}>`
		case "array":
			return `[${typeToString(t.element)}; ${t.size}]`
		case "tuple":
			return `(${t.elements.map(typeToString).join(", ")})`
		case "struct":
			return t.name
		case "option":
			return `Option<${typeToString(t.inner)}>`
		case "result":
			return `Result<${typeToString(t.ok)}, ${typeToString(t.err)}>`
		case "fn":
			return `fn(${t.params.map(typeToString).join(", ")}) -> ${typeToString(t.ret)}`
		default:
			return t.kind
	}
}

export function isUnsignedInt(t: SemType): boolean {
	return t.kind === "int" && !isSigned(t.int)
}

/** True when the type, or any type nested in it, satisfies `pred`. */
export function containsType(t: SemType, pred: (t: SemType) => boolean): boolean {
	if (pred(t)) return true
	switch (t.kind) {
		case "map":
			return containsType(t.key, pred) || containsType(t.value, pred)
		case "vector":
		case "array":
			return containsType(t.element, pred)
		case "tuple":
			return t.elements.some((e) => containsType(e, pred))
		case "struct":
			return t.fields.some((f) => containsType(f.type, pred))
		case "option":
			return containsType(t.inner, pred)
		case "result":
			return containsType(t.ok, pred) || containsType(t.err, pred)
		case "fn":
			return t.params.some((p) => containsType(p, pred)) || containsType(t.ret, pred)
		default:
			return false
	}
}
