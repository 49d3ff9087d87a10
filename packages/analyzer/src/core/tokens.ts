/**
 * Token records produced by the tokenizer.
 * The log is append-only; insertion order is recognition order.
 */

/** Token kinds, named the way they appear in the token table. */
export const TokenKind = {
	BooleanLiteral: 'BOOLEAN_LITERAL',
	CharacterLiteral: 'CHARACTER_LITERAL',
	FloatingLiteral: 'FLOATING_LITERAL',
	Identifier: 'IDENTIFIER',
	IntegerLiteral: 'INTEGER_LITERAL',
	Keyword: 'KEYWORD',
	Operator: 'OPERATOR',
	Separator: 'SEPARATOR',
	StringLiteral: 'STRING_LITERAL',
} as const

export type TokenKind = (typeof TokenKind)[keyof typeof TokenKind]

/**
 * A single recognized token.
 * Line and column are 1-based.
 */
export interface Token {
	readonly kind: TokenKind
	readonly lexeme: string
	readonly line: number
	readonly column: number
}
