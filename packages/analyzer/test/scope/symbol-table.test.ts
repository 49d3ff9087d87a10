import assert from 'node:assert'
import { describe, it } from 'node:test'
import { TokenKind } from '../../src/core/tokens.ts'
import { RedeclarationError, SemanticError, UseBeforeDeclarationError } from '../../src/scope/errors.ts'
import { SymbolTable } from '../../src/scope/symbol-table.ts'

describe('scope/symbol-table', () => {
	describe('tokens', () => {
		it('should keep tokens in insertion order', () => {
			const symbols = new SymbolTable()
			symbols.addToken({ column: 1, kind: TokenKind.Keyword, lexeme: 'int', line: 1 })
			symbols.addToken({ column: 5, kind: TokenKind.Identifier, lexeme: 'x', line: 1 })

			assert.deepStrictEqual(
				symbols.getTokens().map((t) => t.lexeme),
				['int', 'x']
			)
		})
	})

	describe('scopes', () => {
		it('should start at the global level', () => {
			assert.strictEqual(new SymbolTable().getScopeLevel(), 0)
		})

		it('should track depth through enter and exit', () => {
			const symbols = new SymbolTable()
			symbols.enterScope()
			symbols.enterScope()
			assert.strictEqual(symbols.getScopeLevel(), 2)
			symbols.exitScope()
			assert.strictEqual(symbols.getScopeLevel(), 1)
		})

		it('should never pop the global frame', () => {
			const symbols = new SymbolTable()
			symbols.declare('x', 'int', 1)
			symbols.exitScope()
			symbols.exitScope()

			assert.strictEqual(symbols.getScopeLevel(), 0)
			assert.strictEqual(symbols.lookup('x')?.type, 'int')
		})
	})

	describe('declare', () => {
		it('should record the frame depth at declaration', () => {
			const symbols = new SymbolTable()
			symbols.enterScope()
			const info = symbols.declare('count', 'int', 3)

			assert.deepStrictEqual(info, { line: 3, name: 'count', scopeLevel: 1, type: 'int', used: false })
		})

		it('should reject a second declaration in the same frame', () => {
			const symbols = new SymbolTable()
			symbols.declare('x', 'int', 1)

			assert.throws(
				() => symbols.declare('x', 'double', 2),
				(error: unknown) => {
					assert.ok(error instanceof RedeclarationError)
					assert.ok(error instanceof SemanticError)
					assert.strictEqual(error.variableName, 'x')
					assert.strictEqual(error.previousLine, 1)
					assert.strictEqual(error.line, 2)
					assert.strictEqual(error.diagnostic.def.code, 'JLSEM001')
					assert.strictEqual(error.message, "line 2: variable 'x' is already declared in this scope")
					return true
				}
			)
		})

		it('should allow shadowing after entering a scope', () => {
			const symbols = new SymbolTable()
			symbols.declare('x', 'int', 1)
			symbols.enterScope()
			symbols.declare('x', 'double', 2)

			assert.strictEqual(symbols.lookup('x')?.type, 'double')
			symbols.exitScope()
			assert.strictEqual(symbols.lookup('x')?.type, 'int')
		})

		it('should allow the same name again once its frame has closed', () => {
			const symbols = new SymbolTable()
			symbols.enterScope()
			symbols.declare('i', 'int', 1)
			symbols.exitScope()
			symbols.enterScope()

			assert.doesNotThrow(() => symbols.declare('i', 'int', 4))
		})
	})

	describe('lookup', () => {
		it('should return null for unknown names', () => {
			const symbols = new SymbolTable()
			assert.strictEqual(symbols.lookup('missing'), null)
			assert.strictEqual(symbols.isDeclared('missing'), false)
		})

		it('should see outer names from inner frames', () => {
			const symbols = new SymbolTable()
			symbols.declare('total', 'long', 1)
			symbols.enterScope()

			assert.strictEqual(symbols.isDeclared('total'), true)
			assert.strictEqual(symbols.existsInCurrentScope('total'), false)
		})
	})

	describe('markUsed', () => {
		it('should flag the innermost binding only', () => {
			const symbols = new SymbolTable()
			const outer = symbols.declare('x', 'int', 1)
			symbols.enterScope()
			const inner = symbols.declare('x', 'int', 2)
			symbols.markUsed('x', 3)

			assert.strictEqual(inner.used, true)
			assert.strictEqual(outer.used, false)
		})

		it('should throw for a name with no declaration in scope', () => {
			const symbols = new SymbolTable()

			assert.throws(
				() => symbols.markUsed('y', 7),
				(error: unknown) => {
					assert.ok(error instanceof UseBeforeDeclarationError)
					assert.strictEqual(error.variableName, 'y')
					assert.strictEqual(error.message, "line 7: variable 'y' is used before it is declared")
					return true
				}
			)
		})

		it('should default the line to 0 when none is given', () => {
			const symbols = new SymbolTable()
			symbols.declare('z', 'boolean', 1)

			assert.strictEqual(symbols.markUsed('z').used, true)
			assert.throws(
				() => symbols.markUsed('w'),
				(error: unknown) => error instanceof UseBeforeDeclarationError && error.line === 0
			)
		})
	})

	describe('getUnusedVariables', () => {
		it('should list unused names from open frames, global first', () => {
			const symbols = new SymbolTable()
			symbols.declare('a', 'int', 1)
			symbols.declare('b', 'int', 2)
			symbols.enterScope()
			symbols.declare('c', 'int', 3)
			symbols.markUsed('b', 4)

			assert.deepStrictEqual(
				symbols.getUnusedVariables().map((v) => v.name),
				['a', 'c']
			)
		})

		it('should not report names from closed frames', () => {
			const symbols = new SymbolTable()
			symbols.enterScope()
			symbols.declare('temp', 'int', 1)
			symbols.exitScope()

			assert.deepStrictEqual(symbols.getUnusedVariables(), [])
			assert.strictEqual(symbols.getDeclaredVariables().length, 1)
		})
	})

	describe('reset', () => {
		it('should drop tokens, declarations and frames', () => {
			const symbols = new SymbolTable()
			symbols.addToken({ column: 1, kind: TokenKind.Identifier, lexeme: 'x', line: 1 })
			symbols.declare('x', 'int', 1)
			symbols.enterScope()
			symbols.reset()

			assert.strictEqual(symbols.getScopeLevel(), 0)
			assert.strictEqual(symbols.getTokens().length, 0)
			assert.strictEqual(symbols.getDeclaredVariables().length, 0)
			assert.strictEqual(symbols.lookup('x'), null)
		})
	})
})
