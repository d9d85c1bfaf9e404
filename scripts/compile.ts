#!/usr/bin/env tsx
/**
 * Command-line entry point.
 *
 * Usage:
 *   tsx scripts/compile.ts compile --input token.ccdsl --target all --output build
 *   tsx scripts/compile.ts check --input token.ccdsl
 *   tsx scripts/compile.ts example --output starter.ccdsl
 */
import { mkdirSync, readFileSync, writeFileSync } from "node:fs"
import { runCli } from "../src/cli/compile-command"

const exampleUrl = new URL("../examples/token.ccdsl", import.meta.url)

process.exitCode = runCli(process.argv.slice(2), {
	readFile: (path) => readFileSync(path, "utf-8"),
	writeFile: (path, text) => writeFileSync(path, text),
	mkdir: (path) => {
		mkdirSync(path, { recursive: true })
	},
	out: (line) => console.log(line),
	err: (line) => console.error(line),
	example: () => readFileSync(exampleUrl, "utf-8"),
})
