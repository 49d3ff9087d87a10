import assert from 'node:assert'
import { describe, it } from 'node:test'
import { type AnalysisResult, analyze, formatDiagnostic } from '../src/index.ts'

function codes(result: AnalysisResult): { errors: string[]; warnings: string[] } {
	return {
		errors: result.errors.map((d) => d.def.code),
		warnings: result.warnings.map((d) => d.def.code),
	}
}

describe('analyze', () => {
	it('should succeed on a well-typed program', () => {
		const source = [
			'class Main {',
			'  static void main(String[] args) {',
			'    int total = 0;',
			'    for (int i = 0; i < 10; i++) {',
			'      total += i;',
			'    }',
			'    double average = total / 10;',
			'    if (average > 2.5) {',
			'      System.out.println(average);',
			'    }',
			'  }',
			'}',
		].join('\n')

		const result = analyze(source)

		assert.strictEqual(result.succeeded, true)
		assert.strictEqual(result.failure, undefined)
		assert.deepStrictEqual(codes(result), { errors: [], warnings: [] })
		assert.strictEqual(result.symbols.getScopeLevel(), 0)
		assert.deepStrictEqual(
			result.symbols.getDeclaredVariables().map((v) => [v.name, v.type, v.scopeLevel, v.used]),
			[
				['args', 'String[]', 1, false],
				['total', 'int', 1, true],
				['i', 'int', 2, true],
				['average', 'double', 1, true],
			]
		)
	})

	it('should resolve local types after their frames have closed', () => {
		const source = 'class A {\n  void m() {\n    boolean done = false;\n    int n = 0;\n    n = done;\n  }\n}'
		const result = analyze(source)

		assert.strictEqual(result.succeeded, false)
		assert.deepStrictEqual(
			result.errors.map((d) => [d.line, d.message]),
			[[5, "type mismatch: cannot assign boolean to int in variable 'n'"]]
		)
	})

	it('should collect every type error in tree order', () => {
		const source = [
			'class A {',
			'  void m() {',
			'    int x = 1.5;',
			'    while (x) { x--; }',
			'    boolean b = x && true;',
			'  }',
			'}',
		].join('\n')

		assert.deepStrictEqual(codes(analyze(source)), {
			errors: ['JLTYPE003', 'JLTYPE004', 'JLTYPE006'],
			warnings: [],
		})
	})

	it('should succeed with warnings only', () => {
		const source = 'class A {\n  void m() {\n    int n = 0;\n    n = read();\n  }\n}'
		const result = analyze(source)

		assert.strictEqual(result.succeeded, true)
		assert.deepStrictEqual(codes(result), { errors: [], warnings: ['JLTYPE050'] })
	})

	it('should stop at a scope error', () => {
		const result = analyze('class A {\n  void m() {\n    y = 2;\n  }\n}')

		assert.strictEqual(result.succeeded, false)
		assert.strictEqual(result.program, undefined)
		assert.strictEqual(result.failure?.def.code, 'JLSEM002')
		assert.strictEqual(result.failure?.line, 3)
	})

	it('should stop at a syntax error', () => {
		const result = analyze('class A {')
		assert.strictEqual(result.failure?.def.code, 'JLPARSE001')
	})

	it('should stop at unrecognized input before parsing', () => {
		const result = analyze('class A { int x = 1 # 2; }')
		assert.strictEqual(result.failure?.def.code, 'JLLEX001')
		assert.strictEqual(result.symbols.getTokens().length, 0)
	})

	it('should skip the checker when asked', () => {
		const result = analyze('class A {\n  int x = true;\n}', { typeCheck: false })

		assert.strictEqual(result.succeeded, true)
		assert.ok(result.program !== undefined)
		assert.deepStrictEqual(codes(result), { errors: [], warnings: [] })
	})

	it('should report unused variables from the global frame', () => {
		const result = analyze('class A {\n  int a;\n  int b = 2;\n  void m() {\n    int c = b;\n  }\n}')

		assert.deepStrictEqual(
			result.unusedVariables.map((d) => d.message),
			["variable 'a' is declared but never used"]
		)
	})

	it('should carry the filename into formatted output', () => {
		const source = 'class A {\n  int x = true;\n}'
		const result = analyze(source, { filename: 'A.java' })
		const [error] = result.errors
		assert.ok(error !== undefined)

		assert.strictEqual(
			formatDiagnostic(error, source, result.filename),
			[
				"error[JLTYPE003]: type mismatch in initialization of 'x': cannot assign boolean to int",
				'  --> A.java:2',
				'   |',
				' 2 |   int x = true;',
				'   |',
				'   = help: Change the declared type or the initializer.',
			].join('\n')
		)
	})
})
