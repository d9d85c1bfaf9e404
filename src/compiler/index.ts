export { Lexer } from "./lexer"
export { Parser, parse } from "./parser"
export { TokenKind } from "./token"
export type { Token } from "./token"
export type {
	SourceFile,
	ContractDecl,
	StructDecl,
	StateVarDecl,
	FunctionDecl,
	ModifierDecl,
	EventDecl,
	Expr,
	Stmt,
	Block,
	TypeNode,
	Span,
} from "./ast"
export type { Diagnostic, DiagnosticCode, DiagnosticKind } from "./errors"
export { DiagnosticList, InternalCompilerError, formatDiagnostic } from "./errors"
export { analyze } from "./analyzer"
export type { ContractAnalysis, ContractInfo, FileAnalysis, FunctionInfo } from "./analyzer"
export { optimize, DEFAULT_MAX_ITERATIONS } from "./optimizer"
export type { OptimizeOptions, OptimizerStats } from "./optimizer"
export { deploy, ContractInstance } from "./evaluator"
export type { Value, ExecEnv, CallOutcome } from "./evaluator"
export { compile, check } from "./pipeline"
export type { CheckResult, CompileOptions, CompileResult, ContractJob, TargetResult } from "./pipeline"
export { createCompileLog, formatCompileMessage } from "./compile-log"
export type { CompileLog, CompileMessage, JobStage } from "./compile-log"
export { TARGET_IDS, createTarget, isTargetId, parseTargetList } from "./targets"
export type { Artifact, MapPolicy, SolanaOptions, Target, TargetId } from "./targets"
export type { SemType } from "./types"
export { typeToString } from "./types"
