import { DiagnosticList } from "./errors"
import { type Token, TokenKind, isIntrinsicName, keywordKind } from "./token"
import { type IntKind, isIntKind } from "./types"

export class Lexer {
	private source: string
	private pos = 0
	private line = 1
	private column = 1
	private tokens: Token[] = []
	readonly diagnostics = new DiagnosticList()

	constructor(source: string) {
		this.source = source
	}

	tokenize(): Token[] {
		while (this.pos < this.source.length) {
			this.skipWhitespaceAndComments()
			if (this.pos >= this.source.length) break

			const ch = this.source[this.pos]!

			if (isDigit(ch)) {
				this.readNumber()
				continue
			}

			if (ch === '"') {
				this.readString(TokenKind.String, this.column)
				continue
			}

			if (ch === "b" && this.peekNext() === '"') {
				const startCol = this.column
				this.advance()
				this.readString(TokenKind.Bytes, startCol)
				continue
			}

			if (isIdentStart(ch)) {
				this.readIdentOrKeyword()
				continue
			}

			this.readOperatorOrDelimiter()
		}

		this.tokens.push({
			kind: TokenKind.EOF,
			value: "",
			line: this.line,
			column: this.column,
			length: 0,
		})
		return this.tokens
	}

	private peek(): string {
		return this.pos < this.source.length ? this.source[this.pos]! : "\0"
	}

	private peekNext(): string {
		return this.pos + 1 < this.source.length ? this.source[this.pos + 1]! : "\0"
	}

	private advance(): string {
		const ch = this.source[this.pos]!
		this.pos++
		if (ch === "\n") {
			this.line++
			this.column = 1
		} else {
			this.column++
		}
		return ch
	}

	private push(kind: TokenKind, value: string, line: number, column: number) {
		this.tokens.push({ kind, value, line, column, length: this.column - column })
	}

	private report(
		code: "UnknownCharacter" | "UnterminatedString" | "UnterminatedComment" | "InvalidLiteral",
		line: number,
		column: number,
		message: string,
	) {
		this.diagnostics.add(
			"lex",
			code,
			{ line, column, endLine: this.line, endColumn: Math.max(this.column, column + 1) },
			message,
		)
	}

	private skipWhitespaceAndComments() {
		while (this.pos < this.source.length) {
			const ch = this.peek()

			if (ch === " " || ch === "\t" || ch === "\r" || ch === "\n") {
				this.advance()
				continue
			}

			if (ch === "/" && this.peekNext() === "/") {
				while (this.pos < this.source.length && this.peek() !== "\n") {
					this.advance()
				}
				continue
			}

			if (ch === "/" && this.peekNext() === "*") {
				const line = this.line
				const startCol = this.column
				this.advance()
				this.advance()
				let closed = false
				while (this.pos < this.source.length) {
					if (this.peek() === "*" && this.peekNext() === "/") {
						this.advance()
						this.advance()
						closed = true
						break
					}
					this.advance()
				}
				if (!closed) this.report("UnterminatedComment", line, startCol, "unterminated block comment")
				continue
			}

			break
		}
	}

	private readNumber() {
		const line = this.line
		const startCol = this.column
		let text = ""

		if (this.peek() === "0" && (this.peekNext() === "x" || this.peekNext() === "X")) {
			text += this.advance()
			text += this.advance()
			while (isHexDigit(this.peek()) || this.peek() === "_") {
				text += this.advance()
			}
			if (text.replaceAll("_", "").length === 2) {
				this.report("InvalidLiteral", line, startCol, "hex literal has no digits")
				this.push(TokenKind.Int, "0", line, startCol)
				return
			}
		} else {
			while (isDigit(this.peek()) || this.peek() === "_") {
				text += this.advance()
			}
		}

		// Width suffix, e.g. 10u64
		let suffix = ""
		while (isIdentPart(this.peek())) {
			suffix += this.advance()
		}
		if (suffix !== "" && !isIntKind(suffix)) {
			this.report(
				"InvalidLiteral",
				line,
				startCol,
				`invalid integer suffix '${suffix}', expected one of u8..u256 or i8..i128`,
			)
			this.push(TokenKind.Int, text, line, startCol)
			return
		}

		this.push(TokenKind.Int, text + suffix, line, startCol)
	}

	private readString(kind: TokenKind.String | TokenKind.Bytes, startCol: number) {
		const line = this.line
		this.advance() // opening quote
		let value = ""

		while (this.pos < this.source.length && this.peek() !== '"') {
			if (this.peek() === "\n") break
			if (this.peek() === "\\") {
				this.advance()
				const esc = this.advance()
				switch (esc) {
					case "n":
						value += "\n"
						break
					case "t":
						value += "\t"
						break
					case "0":
						value += "\0"
						break
					case "\\":
						value += "\\"
						break
					case '"':
						value += '"'
						break
					default:
						value += esc
				}
			} else {
				value += this.advance()
			}
		}

		if (this.peek() === '"') {
			this.advance()
		} else {
			this.report("UnterminatedString", line, startCol, "unterminated string literal")
		}

		if (kind === TokenKind.Bytes && /[^\x00-\x7f]/.test(value)) {
			this.report("InvalidLiteral", line, startCol, "byte string literals must be ASCII")
		}

		this.push(kind, value, line, startCol)
	}

	private readIdentOrKeyword() {
		const line = this.line
		const startCol = this.column
		let value = ""

		while (this.pos < this.source.length && isIdentPart(this.peek())) {
			value += this.advance()
		}

		if (value === "_") {
			this.push(TokenKind.Underscore, value, line, startCol)
			return
		}

		if (isIntrinsicName(value)) {
			this.push(TokenKind.Intrinsic, value, line, startCol)
			return
		}

		this.push(keywordKind(value) ?? TokenKind.Ident, value, line, startCol)
	}

	private readOperatorOrDelimiter() {
		const ch = this.peek()
		const line = this.line
		const startCol = this.column

		const two = ch + this.peekNext()
		const twoCharOp = TWO_CHAR_OPS[two]
		if (twoCharOp !== undefined) {
			this.advance()
			this.advance()
			this.push(twoCharOp, two, line, startCol)
			return
		}

		const oneCharOp = ONE_CHAR_OPS[ch]
		if (oneCharOp !== undefined) {
			this.advance()
			this.push(oneCharOp, ch, line, startCol)
			return
		}

		// Unknown character: report it, then resume at the next whitespace
		while (this.pos < this.source.length && !isWhitespace(this.peek())) {
			this.advance()
		}
		this.report("UnknownCharacter", line, startCol, `unexpected character '${ch}'`)
	}
}

/** Splits an Int token's text into its value and optional width suffix. */
export function splitIntLiteral(text: string): { value: bigint; suffix: IntKind | null } {
	const match = /^(0[xX][0-9a-fA-F_]+|[0-9_]+)([ui][0-9]+)?$/.exec(text)
	const digits = (match?.[1] ?? "0").replaceAll("_", "")
	const suffix = match?.[2] ?? ""
	return { value: BigInt(digits), suffix: isIntKind(suffix) ? suffix : null }
}

const TWO_CHAR_OPS: Record<string, TokenKind> = {
	"+=": TokenKind.PlusAssign,
	"-=": TokenKind.MinusAssign,
	"*=": TokenKind.StarAssign,
	"/=": TokenKind.SlashAssign,
	"==": TokenKind.Eq,
	"!=": TokenKind.NotEq,
	"<=": TokenKind.LtEq,
	">=": TokenKind.GtEq,
	"&&": TokenKind.And,
	"||": TokenKind.Or,
	"->": TokenKind.Arrow,
	"=>": TokenKind.FatArrow,
	"..": TokenKind.DotDot,
}

const ONE_CHAR_OPS: Record<string, TokenKind> = {
	"+": TokenKind.Plus,
	"-": TokenKind.Minus,
	"*": TokenKind.Star,
	"/": TokenKind.Slash,
	"%": TokenKind.Percent,
	"=": TokenKind.Assign,
	"<": TokenKind.Lt,
	">": TokenKind.Gt,
	"!": TokenKind.Not,
	"|": TokenKind.Pipe,
	"?": TokenKind.Question,
	"(": TokenKind.LParen,
	")": TokenKind.RParen,
	"{": TokenKind.LBrace,
	"}": TokenKind.RBrace,
	"[": TokenKind.LBracket,
	"]": TokenKind.RBracket,
	",": TokenKind.Comma,
	".": TokenKind.Dot,
	":": TokenKind.Colon,
	";": TokenKind.Semicolon,
}

function isDigit(ch: string): boolean {
	return ch >= "0" && ch <= "9"
}

function isHexDigit(ch: string): boolean {
	return isDigit(ch) || (ch >= "a" && ch <= "f") || (ch >= "A" && ch <= "F")
}

function isIdentStart(ch: string): boolean {
	return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z") || ch === "_"
}

function isIdentPart(ch: string): boolean {
	return isIdentStart(ch) || isDigit(ch)
}

function isWhitespace(ch: string): boolean {
	return ch === " " || ch === "\t" || ch === "\r" || ch === "\n"
}
