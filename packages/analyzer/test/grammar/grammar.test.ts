import assert from 'node:assert'
import { describe, it } from 'node:test'
import { describeFailure, match } from '../../src/grammar/index.ts'

function accepts(source: string): boolean {
	return match(source).succeeded()
}

describe('grammar', () => {
	describe('Program', () => {
		it('should accept an empty class', () => {
			assert.ok(accepts('class Empty { }'))
		})

		it('should accept a small program with comments', () => {
			const source = `
				// entry point
				public class Main {
					private static int limit = 10;

					public static void main(String[] args) {
						/* count up */
						int total = 0;
						for (int i = 0; i < limit; i++) {
							total += i;
						}
						if (total > 20) System.out.println("big"); else total = 0;
						do { total--; } while (total > 0);
						return;
					}
				}
			`
			assert.ok(accepts(source))
		})

		it('should reject a keyword used as a name', () => {
			assert.strictEqual(accepts('class A { int class; }'), false)
			assert.strictEqual(accepts('class while { }'), false)
		})

		it('should accept names that start with a keyword', () => {
			assert.ok(accepts('class A { int doubleValue; boolean iffy; }'))
		})

		it('should reject statements outside a class', () => {
			assert.strictEqual(accepts('int x = 1;'), false)
		})

		it('should reject a bare expression statement', () => {
			assert.strictEqual(accepts('class A { void m() { 1 + 2; } }'), false)
		})

		it('should reject an unterminated block comment', () => {
			assert.strictEqual(accepts('class A { } /* open'), false)
		})
	})

	describe('tokens', () => {
		it('should accept any sequence of valid tokens, grammatical or not', () => {
			assert.ok(match('} x 1 + ( ;', 'tokens').succeeded())
		})
	})

	describe('describeFailure', () => {
		it('should locate the failure', () => {
			const failure = describeFailure(match('class A {\n  int = 1;\n}'))
			assert.strictEqual(failure.line, 2)
			assert.ok(failure.detail.startsWith('expected'), failure.detail)
		})
	})
})
