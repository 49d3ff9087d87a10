/**
 * Javalite Analyzer Public API
 *
 * Phases, each feeding the next:
 * 1. Tokenization (source → token log on the symbol table)
 * 2. Parsing (source → tree, declaring and resolving names as it goes)
 * 3. Checking (type inference and compatibility over the finished tree)
 */

import { TypeChecker } from './check/checker.ts'
import { createDiagnostic, type Diagnostic } from './core/diagnostics.ts'
import type { ProgramNode } from './core/nodes.ts'
import { tokenize } from './lex/tokenizer.ts'
import { parse } from './parse/parser.ts'
import { SemanticError } from './scope/errors.ts'
import { SymbolTable, type VariableInfo } from './scope/symbol-table.ts'

export {
	type ConditionKind,
	getWiderType,
	isAssignmentCompatible,
	isBooleanOperator,
	isNumericType,
	TypeChecker,
} from './check/index.ts'
export {
	type AnalyzerDiagnosticCode,
	createDiagnostic,
	type Diagnostic,
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	formatDiagnostic,
	isError,
} from './core/diagnostics.ts'
export * from './core/nodes.ts'
export { printTree } from './core/print.ts'
export { type Token, TokenKind } from './core/tokens.ts'
export { JavaliteGrammar, match, type StartRule } from './grammar/index.ts'
export { type TokenizeResult, tokenize } from './lex/tokenizer.ts'
export { type ParseResult, parse } from './parse/parser.ts'
export {
	RedeclarationError,
	SemanticError,
	SymbolTable,
	UseBeforeDeclarationError,
	type VariableInfo,
} from './scope/index.ts'

/**
 * Options for the analyze function.
 */
export interface AnalyzeOptions {
	/** Path to the source file (for error messages) */
	filename?: string
	/** Run the type checker after parsing (default true) */
	typeCheck?: boolean
}

export interface AnalysisResult {
	/** False on a syntax error, a scope error or any type error */
	succeeded: boolean
	program?: ProgramNode
	symbols: SymbolTable
	/** Type errors, in tree order */
	errors: readonly Diagnostic[]
	warnings: readonly Diagnostic[]
	/** JLSEM050 warnings for variables never read, from the frames still open */
	unusedVariables: readonly Diagnostic[]
	/** The error that stopped the run before checking */
	failure?: Diagnostic
	filename: string
}

function failed(symbols: SymbolTable, filename: string, failure: Diagnostic): AnalysisResult {
	return { errors: [], failure, filename, succeeded: false, symbols, unusedVariables: [], warnings: [] }
}

function reportUnused(variables: readonly VariableInfo[]): Diagnostic[] {
	return variables.map((v) => createDiagnostic('JLSEM050', v.line, { name: v.name }))
}

/**
 * Analyze Javalite source.
 *
 * Chains tokenization, parsing and checking. Syntax and scope errors stop
 * the run and come back as `failure`; type errors are collected in full.
 */
export function analyze(source: string, options: AnalyzeOptions = {}): AnalysisResult {
	const filename = options.filename ?? '<input>'
	const symbols = new SymbolTable()

	// Phase 1: Tokenization
	const tokenResult = tokenize(source, symbols)
	if (tokenResult.diagnostic !== undefined) {
		return failed(symbols, filename, tokenResult.diagnostic)
	}

	// Phase 2: Parsing
	let program: ProgramNode
	try {
		const parseResult = parse(source, symbols)
		if (parseResult.program === undefined) {
			const failure = parseResult.diagnostic ?? createDiagnostic('JLPARSE001', 1, { detail: 'unexpected input' })
			return failed(symbols, filename, failure)
		}
		program = parseResult.program
	} catch (error: unknown) {
		if (error instanceof SemanticError) {
			return failed(symbols, filename, error.diagnostic)
		}
		throw error
	}

	const unusedVariables = reportUnused(symbols.getUnusedVariables())

	// Phase 3: Checking
	if (options.typeCheck === false) {
		return { errors: [], filename, program, succeeded: true, symbols, unusedVariables, warnings: [] }
	}

	const checker = new TypeChecker(symbols)
	checker.analyze(program)

	return {
		errors: checker.getErrors(),
		filename,
		program,
		succeeded: !checker.hasErrors(),
		symbols,
		unusedVariables,
		warnings: checker.getWarnings(),
	}
}
