/**
 * Compile log collector.
 *
 * Records stage transitions, optimizer statistics and per-target outcomes
 * for each contract job. Entirely opt-in: the pipeline only writes to a log
 * it is handed, and the CLI prints it under `--verbose`.
 */

import type { OptimizerStats } from "./optimizer"
import type { TargetId } from "./targets/target"

export type CompileMessageType = "stage" | "optimizer" | "target" | "internal"

export type JobStage = "parsed" | "analyzed" | "optimized" | "failed"

export interface StageMessage {
	readonly type: "stage"
	readonly contract: string
	readonly stage: JobStage
}

export interface OptimizerMessage {
	readonly type: "optimizer"
	readonly contract: string
	readonly stats: OptimizerStats
}

export interface TargetMessage {
	readonly type: "target"
	readonly contract: string
	readonly target: TargetId
	readonly outcome: "generated" | "failed"
	readonly diagnostics: number
}

export interface InternalMessage {
	readonly type: "internal"
	readonly contract: string
	readonly error: string
}

export type CompileMessage = StageMessage | OptimizerMessage | TargetMessage | InternalMessage

export interface CompileLog {
	stage(contract: string, stage: JobStage): void
	optimizer(contract: string, stats: OptimizerStats): void
	target(contract: string, target: TargetId, outcome: "generated" | "failed", diagnostics: number): void
	internal(contract: string, error: unknown): void
	getMessages(): readonly CompileMessage[]
}

export function createCompileLog(): CompileLog {
	const messages: CompileMessage[] = []

	return {
		stage(contract: string, stage: JobStage) {
			messages.push({ type: "stage", contract, stage })
		},

		optimizer(contract: string, stats: OptimizerStats) {
			messages.push({ type: "optimizer", contract, stats: { ...stats } })
		},

		target(contract: string, target: TargetId, outcome: "generated" | "failed", diagnostics: number) {
			messages.push({ type: "target", contract, target, outcome, diagnostics })
		},

		internal(contract: string, error: unknown) {
			const errorString = error instanceof Error ? error.message : String(error)
			messages.push({ type: "internal", contract, error: errorString })
		},

		getMessages(): readonly CompileMessage[] {
			return messages
		},
	}
}

/** One line per message, as printed by `--verbose`. */
export function formatCompileMessage(m: CompileMessage): string {
	switch (m.type) {
		case "stage":
			return `[${m.contract}] ${m.stage}`
		case "optimizer": {
			const s = m.stats
			return `[${m.contract}] optimizer: ${s.iterations} iterations, ${s.folded} folded, ${s.simplified} simplified, ${s.eliminated} eliminated, ${s.propagated} propagated`
		}
		case "target":
			return m.outcome === "generated"
				? `[${m.contract}] ${m.target}: generated`
				: `[${m.contract}] ${m.target}: failed (${m.diagnostics} diagnostics)`
		case "internal":
			return `[${m.contract}] internal error: ${m.error}`
	}
}
