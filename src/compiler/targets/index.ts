import { createAptosTarget } from "./aptos"
import { type SolanaOptions, createSolanaTarget } from "./solana"
import { createSuiTarget } from "./sui"
import { TARGET_IDS, type Target, type TargetId, isTargetId } from "./target"

export interface TargetOptions {
	readonly solana?: SolanaOptions
}

export function createTarget(id: TargetId, options: TargetOptions = {}): Target {
	switch (id) {
		case "solana":
			return createSolanaTarget(options.solana)
		case "aptos":
			return createAptosTarget()
		case "sui":
			return createSuiTarget()
	}
}

export type TargetListResult =
	| { readonly ok: true; readonly targets: readonly TargetId[] }
	| { readonly ok: false; readonly error: string }

/**
 * Parses a comma-separated target list such as `solana,sui` or `all`.
 * Duplicates are dropped; the result keeps the canonical target order.
 */
export function parseTargetList(text: string): TargetListResult {
	const names = text
		.split(",")
		.map((n) => n.trim())
		.filter((n) => n.length > 0)
	if (names.length === 0) return { ok: false, error: "no target given" }
	const wanted = new Set<TargetId>()
	for (const name of names) {
		if (name === "all") {
			for (const id of TARGET_IDS) wanted.add(id)
			continue
		}
		if (!isTargetId(name)) {
			return { ok: false, error: `unknown target '${name}' (expected ${TARGET_IDS.join(", ")} or all)` }
		}
		wanted.add(name)
	}
	return { ok: true, targets: TARGET_IDS.filter((id) => wanted.has(id)) }
}

export { TARGET_IDS, isTargetId } from "./target"
export type { Artifact, GenerateResult, Target, TargetId } from "./target"
export type { MapPolicy, SolanaOptions } from "./solana"
export { DEFAULT_MAP_CAPACITY, DEFAULT_MAX_LENGTH } from "./solana"
