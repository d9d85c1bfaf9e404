import { describe, expect, it } from "vitest"
import { createCompileLog, formatCompileMessage } from "../compile-log"

describe("compile log", () => {
	it("records messages in order", () => {
		const log = createCompileLog()
		log.stage("Vault", "parsed")
		log.target("Vault", "aptos", "failed", 2)
		expect(log.getMessages()).toEqual([
			{ type: "stage", contract: "Vault", stage: "parsed" },
			{ type: "target", contract: "Vault", target: "aptos", outcome: "failed", diagnostics: 2 },
		])
	})

	it("copies optimizer stats", () => {
		const log = createCompileLog()
		const stats = { iterations: 3, folded: 4, simplified: 1, eliminated: 0, propagated: 2 }
		log.optimizer("Vault", stats)
		stats.folded = 99
		expect(log.getMessages()).toEqual([
			{
				type: "optimizer",
				contract: "Vault",
				stats: { iterations: 3, folded: 4, simplified: 1, eliminated: 0, propagated: 2 },
			},
		])
	})

	it("stores the message of an internal error", () => {
		const log = createCompileLog()
		log.internal("Vault", new Error("no type for x"))
		log.internal("Vault", "plain")
		expect(log.getMessages()).toEqual([
			{ type: "internal", contract: "Vault", error: "no type for x" },
			{ type: "internal", contract: "Vault", error: "plain" },
		])
	})

	it("formats one line per message", () => {
		expect(formatCompileMessage({ type: "stage", contract: "Vault", stage: "analyzed" })).toBe("[Vault] analyzed")
		expect(
			formatCompileMessage({
				type: "optimizer",
				contract: "Vault",
				stats: { iterations: 2, folded: 1, simplified: 0, eliminated: 3, propagated: 0 },
			}),
		).toBe("[Vault] optimizer: 2 iterations, 1 folded, 0 simplified, 3 eliminated, 0 propagated")
		expect(
			formatCompileMessage({ type: "target", contract: "Vault", target: "sui", outcome: "generated", diagnostics: 0 }),
		).toBe("[Vault] sui: generated")
		expect(
			formatCompileMessage({ type: "target", contract: "Vault", target: "sui", outcome: "failed", diagnostics: 2 }),
		).toBe("[Vault] sui: failed (2 diagnostics)")
		expect(formatCompileMessage({ type: "internal", contract: "Vault", error: "boom" })).toBe(
			"[Vault] internal error: boom",
		)
	})
})
