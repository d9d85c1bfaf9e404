import type {
	AssignOp,
	BinaryOp,
	Block,
	ConstDecl,
	ContractDecl,
	EventDecl,
	Expr,
	FieldDef,
	FunctionDecl,
	FunctionSig,
	IfStmt,
	InterfaceDecl,
	MatchExprArm,
	MatchStmtArm,
	ModifierDecl,
	ModifierRef,
	ParamDef,
	Pattern,
	SourceFile,
	Span,
	StateVarDecl,
	Stmt,
	StructDecl,
	StructFieldInit,
	TypeNode,
	Visibility,
} from "./ast"
import { DiagnosticList } from "./errors"
import { splitIntLiteral } from "./lexer"
import type { Token } from "./token"
import { TokenKind, isIntrinsicName } from "./token"
import { isIntKind } from "./types"

// Operator precedence levels (lowest to highest). The ternary sits below all of them.
const PREC_OR = 1
const PREC_AND = 2
const PREC_EQUALITY = 3
const PREC_RELATIONAL = 4
const PREC_ADD = 5
const PREC_MUL = 6

function binaryPrecedence(kind: TokenKind): number {
	switch (kind) {
		case TokenKind.Or:
			return PREC_OR
		case TokenKind.And:
			return PREC_AND
		case TokenKind.Eq:
		case TokenKind.NotEq:
			return PREC_EQUALITY
		case TokenKind.Lt:
		case TokenKind.Gt:
		case TokenKind.LtEq:
		case TokenKind.GtEq:
			return PREC_RELATIONAL
		case TokenKind.Plus:
		case TokenKind.Minus:
			return PREC_ADD
		case TokenKind.Star:
		case TokenKind.Slash:
		case TokenKind.Percent:
			return PREC_MUL
		default:
			return 0
	}
}

function tokenToBinaryOp(kind: TokenKind): BinaryOp | null {
	switch (kind) {
		case TokenKind.Plus:
			return "+"
		case TokenKind.Minus:
			return "-"
		case TokenKind.Star:
			return "*"
		case TokenKind.Slash:
			return "/"
		case TokenKind.Percent:
			return "%"
		case TokenKind.Eq:
			return "=="
		case TokenKind.NotEq:
			return "!="
		case TokenKind.Lt:
			return "<"
		case TokenKind.Gt:
			return ">"
		case TokenKind.LtEq:
			return "<="
		case TokenKind.GtEq:
			return ">="
		case TokenKind.And:
			return "&&"
		case TokenKind.Or:
			return "||"
		default:
			return null
	}
}

function tokenToAssignOp(kind: TokenKind): AssignOp | null {
	switch (kind) {
		case TokenKind.Assign:
			return "="
		case TokenKind.PlusAssign:
			return "+="
		case TokenKind.MinusAssign:
			return "-="
		case TokenKind.StarAssign:
			return "*="
		case TokenKind.SlashAssign:
			return "/="
		default:
			return null
	}
}

const TOKEN_LABELS: Partial<Record<TokenKind, string>> = {
	[TokenKind.LParen]: "'('",
	[TokenKind.RParen]: "')'",
	[TokenKind.LBrace]: "'{'",
	[TokenKind.RBrace]: "'}'",
	[TokenKind.LBracket]: "'['",
	[TokenKind.RBracket]: "']'",
	[TokenKind.Comma]: "','",
	[TokenKind.Colon]: "':'",
	[TokenKind.Semicolon]: "';'",
	[TokenKind.Assign]: "'='",
	[TokenKind.Gt]: "'>'",
	[TokenKind.Lt]: "'<'",
	[TokenKind.FatArrow]: "'=>'",
	[TokenKind.Pipe]: "'|'",
	[TokenKind.In]: "'in'",
	[TokenKind.Fn]: "'fn'",
	[TokenKind.Ident]: "identifier",
	[TokenKind.Int]: "integer literal",
	[TokenKind.String]: "string literal",
}

function tokenLabel(kind: TokenKind): string {
	return TOKEN_LABELS[kind] ?? kind.toLowerCase()
}

const STATEMENT_KEYWORDS = new Set<TokenKind>([
	TokenKind.Let,
	TokenKind.If,
	TokenKind.While,
	TokenKind.For,
	TokenKind.Match,
	TokenKind.Require,
	TokenKind.Emit,
	TokenKind.Return,
])

const MEMBER_KEYWORDS = new Set<TokenKind>([
	TokenKind.State,
	TokenKind.Struct,
	TokenKind.Const,
	TokenKind.Event,
	TokenKind.Modifier,
	TokenKind.Fn,
	TokenKind.Public,
	TokenKind.Private,
])

const TOP_LEVEL_KEYWORDS = new Set<TokenKind>([
	TokenKind.Contract,
	TokenKind.Struct,
	TokenKind.Interface,
])

const NO_KEYWORDS = new Set<TokenKind>()

/** Thrown to unwind to the nearest recovery point; the diagnostic is already recorded. */
class ParseFailure extends Error {}

export class Parser {
	private tokens: Token[]
	private pos = 0
	private diagnostics = new DiagnosticList()
	private structNames = new Set<string>()
	// Set while parsing `if`/`while`/`for`/`match` heads, where `{` opens the body
	private noStruct = false

	constructor(tokens: Token[]) {
		this.tokens = tokens
	}

	parse(): { file: SourceFile; diagnostics: DiagnosticList } {
		this.preScanStructNames()

		const start = this.peek()
		const contracts: ContractDecl[] = []
		const structs: StructDecl[] = []
		const interfaces: InterfaceDecl[] = []

		while (!this.isAtEnd()) {
			const before = this.pos
			try {
				switch (this.peekKind()) {
					case TokenKind.Contract:
						contracts.push(this.parseContract())
						break
					case TokenKind.Struct:
						structs.push(this.parseStruct())
						break
					case TokenKind.Interface:
						interfaces.push(this.parseInterface())
						break
					default:
						throw this.error(
							`unexpected '${this.peek().value}', expected 'contract', 'struct' or 'interface'`,
						)
				}
			} catch (e) {
				if (!(e instanceof ParseFailure)) throw e
				this.recoverTo(TOP_LEVEL_KEYWORDS, before)
			}
		}

		const file: SourceFile = {
			kind: "SourceFile",
			contracts,
			structs,
			interfaces,
			span: this.finish(start),
		}
		return { file, diagnostics: this.diagnostics }
	}

	// --- Pre-scan ---

	private preScanStructNames(): void {
		for (let i = 0; i < this.tokens.length; i++) {
			if (this.tokens[i]!.kind !== TokenKind.Struct) continue
			const next = this.tokens[i + 1]
			if (next && next.kind === TokenKind.Ident) {
				this.structNames.add(next.value)
			}
		}
	}

	// --- Token helpers ---

	private peek(offset = 0): Token {
		const last = this.tokens[this.tokens.length - 1]
		return (
			this.tokens[this.pos + offset] ??
			last ?? { kind: TokenKind.EOF, value: "", line: 1, column: 1, length: 0 }
		)
	}

	private peekKind(): TokenKind {
		return this.peek().kind
	}

	private advance(): Token {
		const tok = this.peek()
		if (this.pos < this.tokens.length - 1) {
			this.pos++
		}
		return tok
	}

	private expect(kind: TokenKind): Token {
		const tok = this.peek()
		if (tok.kind !== kind) {
			throw this.error(`expected ${tokenLabel(kind)}, got '${tok.value || "end of file"}'`)
		}
		return this.advance()
	}

	private check(kind: TokenKind): boolean {
		return this.peekKind() === kind
	}

	private match(kind: TokenKind): Token | null {
		if (this.check(kind)) {
			return this.advance()
		}
		return null
	}

	private isAtEnd(): boolean {
		return this.peekKind() === TokenKind.EOF
	}

	/** Span from `start` to the end of the last consumed token. */
	private finish(start: Token): Span {
		const prev = this.tokens[this.pos - 1]
		if (!prev || this.pos === 0 || prev.line < start.line) {
			return {
				line: start.line,
				column: start.column,
				endLine: start.line,
				endColumn: start.column + start.length,
			}
		}
		return {
			line: start.line,
			column: start.column,
			endLine: prev.line,
			endColumn: prev.column + prev.length,
		}
	}

	private tokenSpan(tok: Token): Span {
		return {
			line: tok.line,
			column: tok.column,
			endLine: tok.line,
			endColumn: tok.column + Math.max(tok.length, 1),
		}
	}

	private error(message: string): ParseFailure {
		this.diagnostics.add("parse", "UnexpectedToken", this.tokenSpan(this.peek()), message)
		return new ParseFailure(message)
	}

	private withNoStruct<T>(value: boolean, fn: () => T): T {
		const saved = this.noStruct
		this.noStruct = value
		try {
			return fn()
		} finally {
			this.noStruct = saved
		}
	}

	// --- Recovery ---

	/**
	 * Skips tokens until a `;` (consumed), a `}` closing the enclosing block (left in place),
	 * or one of `keywords` at nesting depth zero. Always makes progress past `from`.
	 */
	private recoverTo(keywords: ReadonlySet<TokenKind>, from: number): void {
		if (this.pos === from && !this.isAtEnd()) {
			this.advance()
		}
		let depth = 0
		while (!this.isAtEnd()) {
			const kind = this.peekKind()
			if (depth === 0) {
				if (kind === TokenKind.Semicolon) {
					this.advance()
					return
				}
				if (kind === TokenKind.RBrace || keywords.has(kind)) return
			}
			if (kind === TokenKind.LBrace) depth++
			if (kind === TokenKind.RBrace) {
				depth--
				if (depth === 0) {
					this.advance()
					return
				}
			}
			this.advance()
		}
	}

	// --- Declarations ---

	private parseContract(): ContractDecl {
		const start = this.expect(TokenKind.Contract)
		const name = this.expect(TokenKind.Ident).value

		const implemented: string[] = []
		if (this.match(TokenKind.Implements)) {
			implemented.push(this.expect(TokenKind.Ident).value)
			while (this.match(TokenKind.Comma)) {
				implemented.push(this.expect(TokenKind.Ident).value)
			}
		}

		this.expect(TokenKind.LBrace)

		const state: StateVarDecl[] = []
		const structs: StructDecl[] = []
		const consts: ConstDecl[] = []
		const events: EventDecl[] = []
		const modifiers: ModifierDecl[] = []
		const functions: FunctionDecl[] = []

		while (!this.check(TokenKind.RBrace) && !this.isAtEnd()) {
			const before = this.pos
			try {
				switch (this.peekKind()) {
					case TokenKind.State:
						state.push(...this.parseStateBlock())
						break
					case TokenKind.Struct:
						structs.push(this.parseStruct())
						break
					case TokenKind.Const:
						consts.push(this.parseConst())
						break
					case TokenKind.Event:
						events.push(this.parseEvent())
						break
					case TokenKind.Modifier:
						modifiers.push(this.parseModifier())
						break
					case TokenKind.Fn:
					case TokenKind.Public:
					case TokenKind.Private:
						functions.push(this.parseFunction())
						break
					default:
						throw this.error(`unexpected '${this.peek().value}' in contract body`)
				}
			} catch (e) {
				if (!(e instanceof ParseFailure)) throw e
				this.recoverTo(MEMBER_KEYWORDS, before)
			}
		}

		this.expect(TokenKind.RBrace)
		return {
			kind: "ContractDecl",
			name,
			implements: implemented,
			state,
			structs,
			consts,
			events,
			modifiers,
			functions,
			span: this.finish(start),
		}
	}

	private parseStateBlock(): StateVarDecl[] {
		this.expect(TokenKind.State)
		this.expect(TokenKind.LBrace)
		const vars: StateVarDecl[] = []
		while (!this.check(TokenKind.RBrace) && !this.isAtEnd()) {
			const start = this.peek()
			const before = this.pos
			try {
				const name = this.expect(TokenKind.Ident).value
				this.expect(TokenKind.Colon)
				const typeNode = this.parseType()
				const init = this.match(TokenKind.Assign) ? this.parseExpr() : null
				this.expect(TokenKind.Semicolon)
				vars.push({ kind: "StateVarDecl", name, typeNode, init, span: this.finish(start) })
			} catch (e) {
				if (!(e instanceof ParseFailure)) throw e
				this.recoverTo(NO_KEYWORDS, before)
			}
		}
		this.expect(TokenKind.RBrace)
		return vars
	}

	private parseStruct(): StructDecl {
		const start = this.expect(TokenKind.Struct)
		const name = this.expect(TokenKind.Ident).value
		this.expect(TokenKind.LBrace)

		const fields: FieldDef[] = []
		while (!this.check(TokenKind.RBrace) && !this.isAtEnd()) {
			const fieldStart = this.peek()
			const fieldName = this.expect(TokenKind.Ident).value
			this.expect(TokenKind.Colon)
			const typeNode = this.parseType()
			fields.push({ name: fieldName, typeNode, span: this.finish(fieldStart) })
			// Fields may be separated by `,` or `;`
			if (!this.match(TokenKind.Comma) && !this.match(TokenKind.Semicolon)) break
		}

		this.expect(TokenKind.RBrace)
		return { kind: "StructDecl", name, fields, span: this.finish(start) }
	}

	private parseConst(): ConstDecl {
		const start = this.expect(TokenKind.Const)
		const name = this.expect(TokenKind.Ident).value
		this.expect(TokenKind.Colon)
		const typeNode = this.parseType()
		this.expect(TokenKind.Assign)
		const value = this.parseExpr()
		this.expect(TokenKind.Semicolon)
		return { kind: "ConstDecl", name, typeNode, value, span: this.finish(start) }
	}

	private parseEvent(): EventDecl {
		const start = this.expect(TokenKind.Event)
		const name = this.expect(TokenKind.Ident).value
		const fields = this.parseParams()
		this.expect(TokenKind.Semicolon)
		return { kind: "EventDecl", name, fields, span: this.finish(start) }
	}

	private parseModifier(): ModifierDecl {
		const start = this.expect(TokenKind.Modifier)
		const name = this.expect(TokenKind.Ident).value
		if (this.match(TokenKind.LParen)) {
			this.expect(TokenKind.RParen)
		}
		const body = this.parseBlock()
		return { kind: "ModifierDecl", name, body, span: this.finish(start) }
	}

	private parseFunction(): FunctionDecl {
		const start = this.peek()
		let visibility: Visibility = "private"
		if (this.match(TokenKind.Public)) {
			visibility = "public"
		} else if (this.match(TokenKind.Private)) {
			visibility = "private"
		}
		this.expect(TokenKind.Fn)
		const name = this.expect(TokenKind.Ident).value
		const params = this.parseParams()
		const returnType = this.match(TokenKind.Arrow) ? this.parseType() : null

		const modifiers: ModifierRef[] = []
		while (this.check(TokenKind.Ident)) {
			const tok = this.advance()
			// Modifiers may be written with or without an empty argument list
			if (this.match(TokenKind.LParen)) this.expect(TokenKind.RParen)
			modifiers.push({ name: tok.value, span: this.finish(tok) })
		}

		const body = this.parseBlock()
		return {
			kind: "FunctionDecl",
			name,
			visibility,
			params,
			returnType,
			modifiers,
			body,
			span: this.finish(start),
		}
	}

	private parseInterface(): InterfaceDecl {
		const start = this.expect(TokenKind.Interface)
		const name = this.expect(TokenKind.Ident).value
		this.expect(TokenKind.LBrace)

		const functions: FunctionSig[] = []
		while (!this.check(TokenKind.RBrace) && !this.isAtEnd()) {
			const sigStart = this.peek()
			this.match(TokenKind.Public)
			this.expect(TokenKind.Fn)
			const fnName = this.expect(TokenKind.Ident).value
			const params = this.parseParams()
			const returnType = this.match(TokenKind.Arrow) ? this.parseType() : null
			this.expect(TokenKind.Semicolon)
			functions.push({ name: fnName, params, returnType, span: this.finish(sigStart) })
		}

		this.expect(TokenKind.RBrace)
		return { kind: "InterfaceDecl", name, functions, span: this.finish(start) }
	}

	private parseParams(): ParamDef[] {
		this.expect(TokenKind.LParen)
		const params: ParamDef[] = []
		if (!this.check(TokenKind.RParen)) {
			params.push(this.parseParam())
			while (this.match(TokenKind.Comma)) {
				if (this.check(TokenKind.RParen)) break
				params.push(this.parseParam())
			}
		}
		this.expect(TokenKind.RParen)
		return params
	}

	private parseParam(): ParamDef {
		const start = this.peek()
		const name = this.expect(TokenKind.Ident).value
		this.expect(TokenKind.Colon)
		const typeNode = this.parseType()
		return { kind: "ParamDef", name, typeNode, span: this.finish(start) }
	}

	// --- Types ---

	private parseType(): TypeNode {
		const start = this.peek()
		switch (start.kind) {
			case TokenKind.Ident: {
				this.advance()
				const name = start.value
				if (
					isIntKind(name) ||
					name === "bool" ||
					name === "address" ||
					name === "string" ||
					name === "bytes"
				) {
					return { kind: "PrimitiveType", name, span: this.finish(start) }
				}
				return { kind: "NamedType", name, span: this.finish(start) }
			}
			case TokenKind.Map: {
				this.advance()
				this.expect(TokenKind.Lt)
				const key = this.parseType()
				this.expect(TokenKind.Comma)
				const value = this.parseType()
				this.expect(TokenKind.Gt)
				return { kind: "MapType", key, value, span: this.finish(start) }
			}
			case TokenKind.Vec: {
				this.advance()
				this.expect(TokenKind.Lt)
				const element = this.parseType()
				this.expect(TokenKind.Gt)
				return { kind: "VecType", element, span: this.finish(start) }
			}
			case TokenKind.Option: {
				this.advance()
				this.expect(TokenKind.Lt)
				const inner = this.parseType()
				this.expect(TokenKind.Gt)
				return { kind: "OptionType", inner, span: this.finish(start) }
			}
			case TokenKind.Result: {
				this.advance()
				this.expect(TokenKind.Lt)
				const ok = this.parseType()
				this.expect(TokenKind.Comma)
				const err = this.parseType()
				this.expect(TokenKind.Gt)
				return { kind: "ResultType", ok, err, span: this.finish(start) }
			}
			case TokenKind.LBracket: {
				this.advance()
				const element = this.parseType()
				this.expect(TokenKind.Semicolon)
				const sizeTok = this.expect(TokenKind.Int)
				this.expect(TokenKind.RBracket)
				const size = Number(splitIntLiteral(sizeTok.value).value)
				return { kind: "ArrayType", element, size, span: this.finish(start) }
			}
			case TokenKind.LParen: {
				this.advance()
				const elements = [this.parseType()]
				while (this.match(TokenKind.Comma)) {
					if (this.check(TokenKind.RParen)) break
					elements.push(this.parseType())
				}
				this.expect(TokenKind.RParen)
				if (elements.length === 1) {
					return elements[0]!
				}
				return { kind: "TupleType", elements, span: this.finish(start) }
			}
			default:
				throw this.error(`expected a type, got '${start.value || "end of file"}'`)
		}
	}

	// --- Statements ---

	private parseBlock(): Block {
		const start = this.expect(TokenKind.LBrace)
		const stmts: Stmt[] = []

		while (!this.check(TokenKind.RBrace) && !this.isAtEnd()) {
			const before = this.pos
			try {
				stmts.push(this.parseStmt())
			} catch (e) {
				if (!(e instanceof ParseFailure)) throw e
				this.recoverTo(STATEMENT_KEYWORDS, before)
			}
		}

		this.expect(TokenKind.RBrace)
		return { kind: "Block", stmts, span: this.finish(start) }
	}

	private parseStmt(): Stmt {
		switch (this.peekKind()) {
			case TokenKind.Let:
				return this.parseLet()
			case TokenKind.If:
				return this.parseIf()
			case TokenKind.While:
				return this.parseWhile()
			case TokenKind.For:
				return this.parseFor()
			case TokenKind.Match:
				return this.parseMatchStmt()
			case TokenKind.Require:
				return this.parseRequire()
			case TokenKind.Emit:
				return this.parseEmit()
			case TokenKind.Return:
				return this.parseReturn()
			case TokenKind.Underscore: {
				const start = this.advance()
				this.expect(TokenKind.Semicolon)
				return { kind: "PlaceholderStmt", span: this.finish(start) }
			}
			case TokenKind.LBrace:
				return this.parseBlock()
			default:
				return this.parseExprOrAssign()
		}
	}

	private parseLet(): Stmt {
		const start = this.expect(TokenKind.Let)
		const mutable = this.match(TokenKind.Mut) !== null
		const name = this.expect(TokenKind.Ident).value
		const typeNode = this.match(TokenKind.Colon) ? this.parseType() : null
		this.expect(TokenKind.Assign)
		const init = this.parseExpr()
		this.expect(TokenKind.Semicolon)
		return { kind: "LetStmt", name, mutable, typeNode, init, span: this.finish(start) }
	}

	private parseIf(): IfStmt {
		const start = this.expect(TokenKind.If)
		const condition = this.withNoStruct(true, () => this.parseExpr())
		const then = this.parseBlock()
		let else_: Block | IfStmt | null = null
		if (this.match(TokenKind.Else)) {
			else_ = this.check(TokenKind.If) ? this.parseIf() : this.parseBlock()
		}
		return { kind: "IfStmt", condition, then, else_, span: this.finish(start) }
	}

	private parseWhile(): Stmt {
		const start = this.expect(TokenKind.While)
		const condition = this.withNoStruct(true, () => this.parseExpr())
		const body = this.parseBlock()
		return { kind: "WhileStmt", condition, body, span: this.finish(start) }
	}

	private parseFor(): Stmt {
		const start = this.expect(TokenKind.For)
		const variable = this.expect(TokenKind.Ident).value
		this.expect(TokenKind.In)
		const first = this.withNoStruct(true, () => this.parseExpr())
		if (this.match(TokenKind.DotDot)) {
			const end = this.withNoStruct(true, () => this.parseExpr())
			const body = this.parseBlock()
			return {
				kind: "ForRangeStmt",
				variable,
				start: first,
				end,
				body,
				span: this.finish(start),
			}
		}
		const body = this.parseBlock()
		return { kind: "ForEachStmt", variable, iterable: first, body, span: this.finish(start) }
	}

	private parseMatchStmt(): Stmt {
		const start = this.expect(TokenKind.Match)
		const subject = this.withNoStruct(true, () => this.parseExpr())
		this.expect(TokenKind.LBrace)
		const arms: MatchStmtArm[] = []
		while (!this.check(TokenKind.RBrace) && !this.isAtEnd()) {
			const armStart = this.peek()
			const patterns = this.parsePatterns()
			this.expect(TokenKind.FatArrow)
			const body = this.parseBlock()
			this.match(TokenKind.Comma)
			arms.push({ patterns, body, span: this.finish(armStart) })
		}
		this.expect(TokenKind.RBrace)
		return { kind: "MatchStmt", subject, arms, span: this.finish(start) }
	}

	private parseRequire(): Stmt {
		const start = this.expect(TokenKind.Require)
		this.expect(TokenKind.LParen)
		const condition = this.parseExpr()
		let message: string | null = null
		if (this.match(TokenKind.Comma)) {
			message = this.expect(TokenKind.String).value
		}
		this.expect(TokenKind.RParen)
		this.expect(TokenKind.Semicolon)
		return { kind: "RequireStmt", condition, message, span: this.finish(start) }
	}

	private parseEmit(): Stmt {
		const start = this.expect(TokenKind.Emit)
		const event = this.expect(TokenKind.Ident).value
		const args = this.parseArgs()
		this.expect(TokenKind.Semicolon)
		return { kind: "EmitStmt", event, args, span: this.finish(start) }
	}

	private parseReturn(): Stmt {
		const start = this.expect(TokenKind.Return)
		const value = this.check(TokenKind.Semicolon) ? null : this.parseExpr()
		this.expect(TokenKind.Semicolon)
		return { kind: "ReturnStmt", value, span: this.finish(start) }
	}

	private parseExprOrAssign(): Stmt {
		const start = this.peek()
		const target = this.parseExpr()
		const op = tokenToAssignOp(this.peekKind())
		if (op) {
			this.advance()
			const value = this.parseExpr()
			this.expect(TokenKind.Semicolon)
			return { kind: "AssignStmt", target, op, value, span: this.finish(start) }
		}
		this.expect(TokenKind.Semicolon)
		return { kind: "ExprStmt", expr: target, span: this.finish(start) }
	}

	private parsePatterns(): Pattern[] {
		const patterns = [this.parsePattern()]
		while (this.match(TokenKind.Pipe)) {
			patterns.push(this.parsePattern())
		}
		return patterns
	}

	private parsePattern(): Pattern {
		const start = this.peek()
		switch (start.kind) {
			case TokenKind.Underscore:
				this.advance()
				return { kind: "WildcardPattern", span: this.finish(start) }
			case TokenKind.Minus: {
				this.advance()
				const tok = this.expect(TokenKind.Int)
				const { value, suffix } = splitIntLiteral(tok.value)
				return {
					kind: "LiteralPattern",
					value: { kind: "IntLiteral", value: -value, suffix, span: this.finish(start) },
				}
			}
			case TokenKind.Int: {
				this.advance()
				const { value, suffix } = splitIntLiteral(start.value)
				return {
					kind: "LiteralPattern",
					value: { kind: "IntLiteral", value, suffix, span: this.finish(start) },
				}
			}
			case TokenKind.True:
			case TokenKind.False:
				this.advance()
				return {
					kind: "LiteralPattern",
					value: {
						kind: "BoolLiteral",
						value: start.kind === TokenKind.True,
						span: this.finish(start),
					},
				}
			case TokenKind.String:
				this.advance()
				return {
					kind: "LiteralPattern",
					value: { kind: "StringLiteral", value: start.value, span: this.finish(start) },
				}
			default:
				throw this.error(`expected a pattern, got '${start.value || "end of file"}'`)
		}
	}

	// --- Expressions (precedence climbing) ---

	private parseExpr(): Expr {
		const start = this.peek()
		const condition = this.parseBinary(1)
		if (!this.match(TokenKind.Question)) return condition
		const then = this.withNoStruct(false, () => this.parseExpr())
		this.expect(TokenKind.Colon)
		const else_ = this.parseExpr()
		return { kind: "TernaryExpr", condition, then, else_, span: this.finish(start) }
	}

	private parseBinary(minPrec: number): Expr {
		const start = this.peek()
		let left = this.parseUnary()

		while (true) {
			const prec = binaryPrecedence(this.peekKind())
			if (prec < minPrec || prec === 0) break
			const op = tokenToBinaryOp(this.advance().kind)
			if (!op) break
			const right = this.parseBinary(prec + 1)
			left = { kind: "BinaryExpr", op, left, right, span: this.finish(start) }
		}

		return left
	}

	private parseUnary(): Expr {
		const start = this.peek()
		if (this.match(TokenKind.Minus)) {
			const operand = this.parseUnary()
			return { kind: "UnaryExpr", op: "-", operand, span: this.finish(start) }
		}
		if (this.match(TokenKind.Not)) {
			const operand = this.parseUnary()
			return { kind: "UnaryExpr", op: "!", operand, span: this.finish(start) }
		}
		return this.parsePostfix()
	}

	private parsePostfix(): Expr {
		const start = this.peek()
		let expr = this.parsePrimary()

		while (true) {
			if (this.match(TokenKind.Dot)) {
				if (this.check(TokenKind.Int)) {
					const index = this.advance().value
					expr = { kind: "FieldAccess", object: expr, field: index, span: this.finish(start) }
					continue
				}
				const name = this.expect(TokenKind.Ident).value
				if (this.check(TokenKind.LParen)) {
					const args = this.parseArgs()
					expr = {
						kind: "MethodCallExpr",
						receiver: expr,
						method: name,
						args,
						span: this.finish(start),
					}
				} else {
					expr = { kind: "FieldAccess", object: expr, field: name, span: this.finish(start) }
				}
			} else if (this.match(TokenKind.LBracket)) {
				const index = this.withNoStruct(false, () => this.parseExpr())
				this.expect(TokenKind.RBracket)
				expr = { kind: "IndexAccess", object: expr, index, span: this.finish(start) }
			} else {
				break
			}
		}

		return expr
	}

	private parseArgs(): Expr[] {
		this.expect(TokenKind.LParen)
		const args: Expr[] = []
		this.withNoStruct(false, () => {
			if (!this.check(TokenKind.RParen)) {
				args.push(this.parseExpr())
				while (this.match(TokenKind.Comma)) {
					if (this.check(TokenKind.RParen)) break
					args.push(this.parseExpr())
				}
			}
		})
		this.expect(TokenKind.RParen)
		return args
	}

	private parsePrimary(): Expr {
		const start = this.peek()

		switch (start.kind) {
			case TokenKind.Int: {
				this.advance()
				const { value, suffix } = splitIntLiteral(start.value)
				return { kind: "IntLiteral", value, suffix, span: this.finish(start) }
			}

			case TokenKind.True:
			case TokenKind.False:
				this.advance()
				return {
					kind: "BoolLiteral",
					value: start.kind === TokenKind.True,
					span: this.finish(start),
				}

			case TokenKind.String:
				this.advance()
				return { kind: "StringLiteral", value: start.value, span: this.finish(start) }

			case TokenKind.Bytes:
				this.advance()
				return { kind: "BytesLiteral", value: start.value, span: this.finish(start) }

			case TokenKind.Intrinsic: {
				this.advance()
				// `msg_sender()` and `msg_sender` are the same thing
				if (this.match(TokenKind.LParen)) this.expect(TokenKind.RParen)
				const name = start.value
				if (!isIntrinsicName(name)) {
					throw this.error(`unknown intrinsic '${name}'`)
				}
				return { kind: "IntrinsicExpr", name, span: this.finish(start) }
			}

			case TokenKind.Ident: {
				this.advance()
				if (this.check(TokenKind.LParen)) {
					const args = this.parseArgs()
					return { kind: "CallExpr", callee: start.value, args, span: this.finish(start) }
				}
				if (this.structNames.has(start.value) && this.check(TokenKind.LBrace) && !this.noStruct) {
					return this.parseStructLiteral(start)
				}
				return { kind: "Ident", name: start.value, span: this.finish(start) }
			}

			case TokenKind.LParen: {
				this.advance()
				const first = this.withNoStruct(false, () => this.parseExpr())
				if (this.match(TokenKind.RParen)) {
					return { kind: "GroupExpr", expr: first, span: this.finish(start) }
				}
				const elements = [first]
				while (this.match(TokenKind.Comma)) {
					if (this.check(TokenKind.RParen)) break
					elements.push(this.withNoStruct(false, () => this.parseExpr()))
				}
				this.expect(TokenKind.RParen)
				return { kind: "TupleLiteral", elements, span: this.finish(start) }
			}

			case TokenKind.LBracket: {
				this.advance()
				const elements: Expr[] = []
				this.withNoStruct(false, () => {
					if (!this.check(TokenKind.RBracket)) {
						elements.push(this.parseExpr())
						while (this.match(TokenKind.Comma)) {
							if (this.check(TokenKind.RBracket)) break
							elements.push(this.parseExpr())
						}
					}
				})
				this.expect(TokenKind.RBracket)
				return { kind: "ArrayLiteral", elements, span: this.finish(start) }
			}

			case TokenKind.Pipe:
			case TokenKind.Or:
				return this.parseLambda()

			case TokenKind.Match:
				return this.parseMatchExpr()

			case TokenKind.Some:
			case TokenKind.Ok:
			case TokenKind.Err: {
				this.advance()
				this.expect(TokenKind.LParen)
				const arg = this.withNoStruct(false, () => this.parseExpr())
				this.expect(TokenKind.RParen)
				const ctor = start.kind === TokenKind.Some ? "Some" : start.kind === TokenKind.Ok ? "Ok" : "Err"
				return { kind: "ConstructorExpr", ctor, arg, span: this.finish(start) }
			}

			case TokenKind.None:
				this.advance()
				return { kind: "ConstructorExpr", ctor: "None", arg: null, span: this.finish(start) }

			default:
				throw this.error(`unexpected '${start.value || "end of file"}' in expression`)
		}
	}

	private parseLambda(): Expr {
		const start = this.peek()
		const params: ParamDef[] = []
		if (!this.match(TokenKind.Or)) {
			this.expect(TokenKind.Pipe)
			if (!this.check(TokenKind.Pipe)) {
				params.push(this.parseParam())
				while (this.match(TokenKind.Comma)) {
					params.push(this.parseParam())
				}
			}
			this.expect(TokenKind.Pipe)
		}
		const body = this.parseExpr()
		return { kind: "LambdaExpr", params, body, span: this.finish(start) }
	}

	private parseMatchExpr(): Expr {
		const start = this.expect(TokenKind.Match)
		const subject = this.withNoStruct(true, () => this.parseExpr())
		this.expect(TokenKind.LBrace)
		const arms: MatchExprArm[] = []
		this.withNoStruct(false, () => {
			while (!this.check(TokenKind.RBrace) && !this.isAtEnd()) {
				const armStart = this.peek()
				const patterns = this.parsePatterns()
				this.expect(TokenKind.FatArrow)
				const value = this.parseExpr()
				arms.push({ patterns, value, span: this.finish(armStart) })
				if (!this.match(TokenKind.Comma)) break
			}
		})
		this.expect(TokenKind.RBrace)
		return { kind: "MatchExpr", subject, arms, span: this.finish(start) }
	}

	private parseStructLiteral(nameTok: Token): Expr {
		this.expect(TokenKind.LBrace)

		const fields: StructFieldInit[] = []
		while (!this.check(TokenKind.RBrace) && !this.isAtEnd()) {
			const fieldStart = this.peek()
			const name = this.expect(TokenKind.Ident).value
			this.expect(TokenKind.Colon)
			const value = this.parseExpr()
			fields.push({ name, value, span: this.finish(fieldStart) })
			if (!this.match(TokenKind.Comma)) break
		}

		this.expect(TokenKind.RBrace)
		return { kind: "StructLiteral", typeName: nameTok.value, fields, span: this.finish(nameTok) }
	}
}

export function parse(tokens: Token[]): { file: SourceFile; diagnostics: DiagnosticList } {
	const parser = new Parser(tokens)
	return parser.parse()
}
