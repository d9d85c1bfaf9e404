export enum TokenKind {
	// Literals
	Int = "Int",
	String = "String",
	Bytes = "Bytes",
	True = "True",
	False = "False",

	// Identifiers
	Ident = "Ident",
	Intrinsic = "Intrinsic",
	Underscore = "Underscore",

	// Declarations
	Contract = "Contract",
	Interface = "Interface",
	Implements = "Implements",
	State = "State",
	Struct = "Struct",
	Const = "Const",
	Event = "Event",
	Modifier = "Modifier",
	Fn = "Fn",
	Public = "Public",
	Private = "Private",

	// Statements
	Let = "Let",
	Mut = "Mut",
	If = "If",
	Else = "Else",
	While = "While",
	For = "For",
	In = "In",
	Match = "Match",
	Require = "Require",
	Emit = "Emit",
	Return = "Return",

	// Type and value constructors
	Map = "Map",
	Vec = "Vec",
	Option = "Option",
	Result = "Result",
	Some = "Some",
	None = "None",
	Ok = "Ok",
	Err = "Err",

	// Operators
	Plus = "Plus",
	Minus = "Minus",
	Star = "Star",
	Slash = "Slash",
	Percent = "Percent",
	Assign = "Assign",
	PlusAssign = "PlusAssign",
	MinusAssign = "MinusAssign",
	StarAssign = "StarAssign",
	SlashAssign = "SlashAssign",
	Eq = "Eq",
	NotEq = "NotEq",
	Lt = "Lt",
	Gt = "Gt",
	LtEq = "LtEq",
	GtEq = "GtEq",
	And = "And",
	Or = "Or",
	Not = "Not",
	Pipe = "Pipe",
	Question = "Question",
	Arrow = "Arrow", // ->
	FatArrow = "FatArrow", // =>
	DotDot = "DotDot",

	// Delimiters
	LParen = "LParen",
	RParen = "RParen",
	LBrace = "LBrace",
	RBrace = "RBrace",
	LBracket = "LBracket",
	RBracket = "RBracket",
	Comma = "Comma",
	Dot = "Dot",
	Colon = "Colon",
	Semicolon = "Semicolon",

	EOF = "EOF",
}

export interface Token {
	readonly kind: TokenKind
	readonly value: string
	readonly line: number
	readonly column: number
	/** Source characters the token covers, used for span ends. */
	readonly length: number
}

const KEYWORDS: Record<string, TokenKind> = {
	contract: TokenKind.Contract,
	interface: TokenKind.Interface,
	implements: TokenKind.Implements,
	state: TokenKind.State,
	struct: TokenKind.Struct,
	const: TokenKind.Const,
	event: TokenKind.Event,
	modifier: TokenKind.Modifier,
	fn: TokenKind.Fn,
	public: TokenKind.Public,
	private: TokenKind.Private,
	let: TokenKind.Let,
	mut: TokenKind.Mut,
	if: TokenKind.If,
	else: TokenKind.Else,
	while: TokenKind.While,
	for: TokenKind.For,
	in: TokenKind.In,
	match: TokenKind.Match,
	require: TokenKind.Require,
	emit: TokenKind.Emit,
	return: TokenKind.Return,
	true: TokenKind.True,
	false: TokenKind.False,
	map: TokenKind.Map,
	vec: TokenKind.Vec,
	Option: TokenKind.Option,
	Result: TokenKind.Result,
	Some: TokenKind.Some,
	None: TokenKind.None,
	Ok: TokenKind.Ok,
	Err: TokenKind.Err,
}

export const INTRINSIC_NAMES = ["msg_sender", "block_height", "block_timestamp"] as const

export type IntrinsicName = (typeof INTRINSIC_NAMES)[number]

export function isIntrinsicName(word: string): word is IntrinsicName {
	return INTRINSIC_NAMES.some((name) => name === word)
}

export function keywordKind(word: string): TokenKind | undefined {
	if (Object.hasOwn(KEYWORDS, word)) return KEYWORDS[word]
	return undefined
}
