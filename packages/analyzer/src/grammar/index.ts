import * as ohm from 'ohm-js'

/**
 * Javalite Grammar Source
 *
 * Two start rules share the lexical layer:
 *   tokens   the token stream (whitespace and comments skipped)
 *   Program  the syntax tree
 *
 * Comment syntax (treated as whitespace): `// line` and `/* block *\/`.
 */
const grammarSource = String.raw`
Javalite {
  Program = ClassDecl*

  // Declarations
  ClassDecl = modifier* kw<"class"> ident "{" Member* "}"
  Member = MethodDecl | FieldDecl
  FieldDecl = modifier* Type ident ("=" Expr)? ";"
  MethodDecl = modifier* ReturnType ident "(" ListOf<Param, ","> ")" "{" Statement* "}"
  ReturnType = kw<"void">  -- void
             | Type
  Param = Type ident
  Type = BaseType ("[" "]")*
  BaseType = primitiveType | ident

  // Statements
  Statement = Block
            | LocalVarDecl ";"  -- local
            | IfStmt
            | WhileStmt
            | DoWhileStmt
            | ForStmt
            | ReturnStmt
            | SimpleStmt ";"  -- simple
            | CallStmt
  Block = "{" Statement* "}"
  LocalVarDecl = Type ident ("=" Expr)?
  IfStmt = kw<"if"> "(" Expr ")" Statement ElseClause?
  ElseClause = kw<"else"> Statement
  WhileStmt = kw<"while"> "(" Expr ")" Statement
  DoWhileStmt = kw<"do"> Statement kw<"while"> "(" Expr ")" ";"
  ForStmt = kw<"for"> "(" ForInit? ";" Expr? ";" ForUpdate? ")" Statement
  ForInit = LocalVarDecl | AssignExpr
  ForUpdate = AssignExpr | IncDecExpr
  ReturnStmt = kw<"return"> Expr? ";"
  SimpleStmt = AssignExpr | IncDecExpr
  CallStmt = PrimaryExpr (Selector ~";")* CallSelector ";"  -- chained
           | ident Arguments ";"  -- plain

  AssignExpr = ident assignOp Expr
  IncDecExpr = incDecOp ident  -- prefix
             | ident incDecOp  -- postfix

  // Expressions, lowest precedence first
  Expr = OrExpr
  OrExpr = OrExpr "||" AndExpr  -- binary
         | AndExpr
  AndExpr = AndExpr "&&" EqExpr  -- binary
          | EqExpr
  EqExpr = EqExpr eqOp RelExpr  -- binary
         | RelExpr
  RelExpr = RelExpr relOp AddExpr  -- binary
          | AddExpr
  AddExpr = AddExpr addOp MulExpr  -- binary
          | MulExpr
  MulExpr = MulExpr mulOp UnaryExpr  -- binary
          | UnaryExpr
  UnaryExpr = IncDecExpr
            | unaryOp UnaryExpr  -- prefix
            | PostfixExpr
  PostfixExpr = PrimaryExpr Selector*
  PrimaryExpr = "(" Expr ")"  -- paren
              | literal
              | ident Arguments  -- call
              | ident  -- ident
  Selector = CallSelector | MemberSelector
  CallSelector = "." ident Arguments
  MemberSelector = "." ident
  Arguments = "(" ListOf<Expr, ","> ")"

  // Token stream
  tokens = (space | token)* end
  token = literal | keyword | ident | operator | separator

  // Operators
  assignOp = ("=" ~"=") | "+=" | "-=" | "*=" | "/=" | "%="
  incDecOp = "++" | "--"
  eqOp = "==" | "!="
  relOp = "<=" | ">=" | "<" | ">"
  addOp = ("+" ~("+" | "=")) | ("-" ~("-" | "="))
  mulOp = ("*" | "/" | "%") ~"="
  unaryOp = ("!" ~"=") | "-" | "+"
  operator = "++" | "--" | "+=" | "-=" | "*=" | "/=" | "%=" | "==" | "!=" | "<=" | ">="
           | "&&" | "||" | "+" | "-" | "*" | "/" | "%" | "=" | "<" | ">" | "!"
  separator = "(" | ")" | "{" | "}" | "[" | "]" | ";" | "," | "."

  // Literals
  literal = floatLiteral | longLiteral | intLiteral | charLiteral | stringLiteral | booleanLiteral
  floatLiteral = digit+ "." digit+ floatSuffix?  -- fraction
               | digit+ floatSuffix  -- suffixed
  floatSuffix = "f" | "F" | "d" | "D"
  longLiteral = digit+ ("L" | "l")
  intLiteral = digit+
  charLiteral = "'" charChar "'"
  charChar = escape | ~("'" | "\\" | "\n") any
  stringLiteral = "\"" stringChar* "\""
  stringChar = escape | ~("\"" | "\\" | "\n") any
  escape = "\\" any
  booleanLiteral = kw<"true"> | kw<"false">

  // Names
  primitiveType = kw<"boolean"> | kw<"byte"> | kw<"char"> | kw<"short">
                | kw<"int"> | kw<"long"> | kw<"float"> | kw<"double">
  modifier = kw<"public"> | kw<"private"> | kw<"protected"> | kw<"static">
           | kw<"final"> | kw<"abstract">
  keyword = primitiveType | modifier | kw<"class"> | kw<"void"> | kw<"if"> | kw<"else">
          | kw<"while"> | kw<"do"> | kw<"for"> | kw<"return"> | kw<"new"> | kw<"null">
          | kw<"this"> | kw<"break"> | kw<"continue"> | booleanLiteral
  kw<word> = word ~identPart
  ident = ~keyword identStart identPart*
  identStart = letter | "_" | "$"
  identPart = alnum | "_" | "$"

  space += comment
  comment = "//" (~"\n" any)*  -- line
          | "/*" (~"*/" any)* "*/"  -- block
}
`

/**
 * The compiled Javalite grammar.
 */
export const JavaliteGrammar = ohm.grammar(grammarSource)

/** Start rules of the grammar. */
export type StartRule = 'Program' | 'tokens'

/**
 * Match input against the grammar without extracting semantics.
 */
export function match(input: string, startRule: StartRule = 'Program'): ohm.MatchResult {
	return JavaliteGrammar.match(input, startRule)
}

/**
 * 1-based line a CST node starts on.
 */
export function lineOf(node: ohm.Node): number {
	return node.source.getLineAndColumn().lineNum
}

/**
 * 1-based line and column a CST node starts on.
 */
export function positionOf(node: ohm.Node): { line: number; column: number } {
	const { colNum, lineNum } = node.source.getLineAndColumn()
	return { column: colNum, line: lineNum }
}

const FAILURE_PREFIX = /^Line (\d+), col (\d+): /

export interface MatchFailure {
	line: number
	column: number
	/** What the grammar expected at that point */
	detail: string
}

/**
 * Where and why a match failed, read from the short message
 * (`Line 3, col 7: expected ...`).
 */
export function describeFailure(matchResult: ohm.MatchResult): MatchFailure {
	const message = matchResult.shortMessage ?? 'unexpected input'
	const found = FAILURE_PREFIX.exec(message)
	if (found === null) return { column: 1, detail: message, line: 1 }
	return {
		column: Number(found[2]),
		detail: message.slice(found[0].length),
		line: Number(found[1]),
	}
}
