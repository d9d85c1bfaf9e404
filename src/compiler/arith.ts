// Checked integer arithmetic shared by the optimizer (constant folding) and the evaluator.
// Every target traps on overflow, so an operation that leaves the width's range is a trap,
// never a wrapped value.

import { type IntKind, fitsInt, intRange, isSigned } from "./types"

export type TrapReason = "overflow" | "division by zero" | "conversion out of range"

export type ArithResult =
	| { readonly ok: true; readonly value: bigint }
	| { readonly ok: false; readonly trap: TrapReason }

export type ArithOp = "+" | "-" | "*" | "/" | "%"

function checked(value: bigint, kind: IntKind): ArithResult {
	return fitsInt(value, kind) ? { ok: true, value } : { ok: false, trap: "overflow" }
}

export function applyArith(op: ArithOp, a: bigint, b: bigint, kind: IntKind): ArithResult {
	switch (op) {
		case "+":
			return checked(a + b, kind)
		case "-":
			return checked(a - b, kind)
		case "*":
			return checked(a * b, kind)
		case "/":
			if (b === 0n) return { ok: false, trap: "division by zero" }
			// BigInt division truncates toward zero, as Rust and Move do
			return checked(a / b, kind)
		case "%":
			if (b === 0n) return { ok: false, trap: "division by zero" }
			// MIN % -1 traps on the targets even though the remainder is 0
			if (isSigned(kind) && b === -1n && a === intRange(kind).min) {
				return { ok: false, trap: "overflow" }
			}
			return { ok: true, value: a % b }
	}
}

export function negate(a: bigint, kind: IntKind): ArithResult {
	if (!isSigned(kind)) return a === 0n ? { ok: true, value: 0n } : { ok: false, trap: "overflow" }
	return checked(-a, kind)
}

export function convertInt(a: bigint, to: IntKind): ArithResult {
	return fitsInt(a, to) ? { ok: true, value: a } : { ok: false, trap: "conversion out of range" }
}

export type CompareOp = "==" | "!=" | "<" | ">" | "<=" | ">="

export function compare(op: CompareOp, a: bigint, b: bigint): boolean {
	switch (op) {
		case "==":
			return a === b
		case "!=":
			return a !== b
		case "<":
			return a < b
		case ">":
			return a > b
		case "<=":
			return a <= b
		case ">=":
			return a >= b
	}
}

export function isArithOp(op: string): op is ArithOp {
	return op === "+" || op === "-" || op === "*" || op === "/" || op === "%"
}

export function isCompareOp(op: string): op is CompareOp {
	return op === "==" || op === "!=" || op === "<" || op === ">" || op === "<=" || op === ">="
}
