import type { Node, Semantics } from 'ohm-js'
import { createDiagnostic, type Diagnostic } from '../core/diagnostics.ts'
import { type Token, TokenKind } from '../core/tokens.ts'
import { describeFailure, JavaliteGrammar, match, positionOf } from '../grammar/index.ts'
import type { SymbolTable } from '../scope/symbol-table.ts'

export interface TokenizeResult {
	succeeded: boolean
	tokens: readonly Token[]
	diagnostic?: Diagnostic
}

const LITERAL_KINDS: Readonly<Record<string, TokenKind>> = {
	booleanLiteral: TokenKind.BooleanLiteral,
	charLiteral: TokenKind.CharacterLiteral,
	floatLiteral: TokenKind.FloatingLiteral,
	intLiteral: TokenKind.IntegerLiteral,
	longLiteral: TokenKind.IntegerLiteral,
	stringLiteral: TokenKind.StringLiteral,
}

function createToken(kind: TokenKind, node: Node): Token {
	const { column, line } = positionOf(node)
	return { column, kind, lexeme: node.sourceString, line }
}

function createTokenSemantics(): Semantics {
	const semantics = JavaliteGrammar.createSemantics()

	semantics.addOperation<Token[]>('toTokens', {
		tokens(items: Node, _end: Node) {
			return items.children
				.filter((item: Node) => item.ctorName === 'token')
				.map((item: Node): Token => item['toToken']())
		},
	})

	semantics.addOperation<Token>('toToken', {
		ident(_start: Node, _rest: Node) {
			return createToken(TokenKind.Identifier, this)
		},
		keyword(_word: Node) {
			return createToken(TokenKind.Keyword, this)
		},
		literal(value: Node) {
			return createToken(LITERAL_KINDS[value.ctorName] ?? TokenKind.IntegerLiteral, this)
		},
		operator(_op: Node) {
			return createToken(TokenKind.Operator, this)
		},
		separator(_sep: Node) {
			return createToken(TokenKind.Separator, this)
		},
		token(inner: Node) {
			return inner['toToken']()
		},
	})

	return semantics
}

/**
 * Token semantics instance, shared by every tokenize call.
 */
const semantics = createTokenSemantics()

/**
 * Recognize every token in `source` and append it to the table's token log
 * in source order. Whitespace and comments produce no tokens.
 */
export function tokenize(source: string, symbols: SymbolTable): TokenizeResult {
	const matchResult = match(source, 'tokens')

	if (matchResult.failed()) {
		const { line, column, detail } = describeFailure(matchResult)
		return {
			diagnostic: createDiagnostic('JLLEX001', line, { detail }, column),
			succeeded: false,
			tokens: symbols.getTokens(),
		}
	}

	const tokens: Token[] = semantics(matchResult)['toTokens']()
	for (const token of tokens) {
		symbols.addToken(token)
	}

	return { succeeded: true, tokens: symbols.getTokens() }
}
