import { type Diagnostic, createDiagnostic } from '../core/diagnostics.ts'

/**
 * Fatal scope error raised while the tree is being built.
 * Carries the catalog diagnostic so callers can render it like any other.
 */
export class SemanticError extends Error {
	readonly diagnostic: Diagnostic

	constructor(diagnostic: Diagnostic) {
		super(`line ${diagnostic.line}: ${diagnostic.message}`)
		this.name = 'SemanticError'
		this.diagnostic = diagnostic
	}

	get line(): number {
		return this.diagnostic.line
	}
}

/** A name was declared twice in the same open frame. */
export class RedeclarationError extends SemanticError {
	readonly variableName: string
	readonly previousLine: number

	constructor(name: string, line: number, previousLine: number) {
		super(createDiagnostic('JLSEM001', line, { name, previousLine }))
		this.name = 'RedeclarationError'
		this.variableName = name
		this.previousLine = previousLine
	}
}

/** A name was referenced with no declaration in any open frame. */
export class UseBeforeDeclarationError extends SemanticError {
	readonly variableName: string

	constructor(name: string, line: number) {
		super(createDiagnostic('JLSEM002', line, { name }))
		this.name = 'UseBeforeDeclarationError'
		this.variableName = name
	}
}
