/**
 * Analyzer diagnostic definitions.
 *
 * Error code format: JL<PHASE><NUMBER>
 * - JLLEX: Tokenizer errors (001-099)
 * - JLPARSE: Parser errors (001-099)
 * - JLSEM: Scope errors (001-049), warnings (050-099)
 * - JLTYPE: Type errors (001-049), warnings (050-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// TOKENIZER ERRORS (JLLEX001-099)
// =============================================================================

export const JLLEX001: DiagnosticDef = {
	code: 'JLLEX001',
	description: "Javalite found a character it doesn't know how to read.",
	message: 'unrecognized input: {detail}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Look for a stray symbol or an unclosed string, character literal or comment.',
}

// =============================================================================
// PARSER ERRORS (JLPARSE001-099)
// =============================================================================

export const JLPARSE001: DiagnosticDef = {
	code: 'JLPARSE001',
	description: "Javalite couldn't understand this part of your code.",
	message: 'syntax error: {detail}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check for typos, missing semicolons or unbalanced braces.',
}

// =============================================================================
// SCOPE ERRORS (JLSEM001-049)
// =============================================================================

export const JLSEM001: DiagnosticDef = {
	code: 'JLSEM001',
	description: 'A name can only be declared once in the same block.',
	message: "variable '{name}' is already declared in this scope",
	severity: DiagnosticSeverity.Error,
	suggestion: "'{name}' was first declared on line {previousLine}. Rename one of them.",
}

export const JLSEM002: DiagnosticDef = {
	code: 'JLSEM002',
	description: 'Variables have to be declared before the code that reads or writes them.',
	message: "variable '{name}' is used before it is declared",
	severity: DiagnosticSeverity.Error,
	suggestion: "Declare '{name}' above this line, or check the spelling.",
}

// =============================================================================
// SCOPE WARNINGS (JLSEM050-099)
// =============================================================================

export const JLSEM050: DiagnosticDef = {
	code: 'JLSEM050',
	description: 'This variable is declared but nothing ever reads it.',
	message: "variable '{name}' is declared but never used",
	severity: DiagnosticSeverity.Warning,
	suggestion: 'Remove it, or use it somewhere.',
}

// =============================================================================
// TYPE ERRORS (JLTYPE001-049)
// =============================================================================

export const JLTYPE001: DiagnosticDef = {
	code: 'JLTYPE001',
	description: 'The assignment target does not resolve to any declared variable.',
	message: "variable '{name}' not declared",
	severity: DiagnosticSeverity.Error,
}

export const JLTYPE002: DiagnosticDef = {
	code: 'JLTYPE002',
	description: "The value's type can't be widened to the variable's type.",
	message: "type mismatch: cannot assign {from} to {to} in variable '{name}'",
	severity: DiagnosticSeverity.Error,
	suggestion: 'Change the declared type of the variable or the expression.',
}

export const JLTYPE003: DiagnosticDef = {
	code: 'JLTYPE003',
	description: "The initializer's type can't be widened to the declared type.",
	message: "type mismatch in initialization of '{name}': cannot assign {from} to {to}",
	severity: DiagnosticSeverity.Error,
	suggestion: 'Change the declared type or the initializer.',
}

export const JLTYPE004: DiagnosticDef = {
	code: 'JLTYPE004',
	description: 'Conditions of if, while, do-while and for have to be boolean.',
	message: '{statement} condition must be boolean, got {found}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Compare the value instead, for example `x != 0`.',
}

export const JLTYPE005: DiagnosticDef = {
	code: 'JLTYPE005',
	description: 'Ordering comparisons only work on numbers and characters.',
	message: "relational operator '{operator}' requires numeric operands, got {left} and {right}",
	severity: DiagnosticSeverity.Error,
}

export const JLTYPE006: DiagnosticDef = {
	code: 'JLTYPE006',
	description: '`&&` and `||` combine boolean values only.',
	message: "logical operator '{operator}' requires boolean operands, {side} operand is {found}",
	severity: DiagnosticSeverity.Error,
}

export const JLTYPE007: DiagnosticDef = {
	code: 'JLTYPE007',
	description: 'Arithmetic operators work on numbers, characters and strings.',
	message: "arithmetic operator '{operator}' requires numeric operands, {side} operand is {found}",
	severity: DiagnosticSeverity.Error,
}

// =============================================================================
// TYPE WARNINGS (JLTYPE050-099)
// =============================================================================

export const JLTYPE050: DiagnosticDef = {
	code: 'JLTYPE050',
	description: "Javalite couldn't work out the type of this expression, so it wasn't checked.",
	message: "cannot determine type of expression in assignment to '{name}'",
	severity: DiagnosticSeverity.Warning,
}

export const JLTYPE051: DiagnosticDef = {
	code: 'JLTYPE051',
	description: "Javalite couldn't work out the type of this condition, so it wasn't checked.",
	message: 'cannot determine type of {statement} condition',
	severity: DiagnosticSeverity.Warning,
}

export const JLTYPE052: DiagnosticDef = {
	code: 'JLTYPE052',
	description: 'These two values can never be equal because their types are unrelated.',
	message: 'comparing incompatible types: {left} and {right}',
	severity: DiagnosticSeverity.Warning,
}

export const JLTYPE053: DiagnosticDef = {
	code: 'JLTYPE053',
	description: 'Part of the tree could not be inspected and was skipped.',
	message: 'error analyzing node: {reason}',
	severity: DiagnosticSeverity.Warning,
}

// =============================================================================
// CATALOG
// =============================================================================

/**
 * Central catalog of all analyzer diagnostics.
 */
export const ANALYZER_DIAGNOSTICS = {
	JLLEX001,
	JLPARSE001,
	JLSEM001,
	JLSEM002,
	JLSEM050,
	JLTYPE001,
	JLTYPE002,
	JLTYPE003,
	JLTYPE004,
	JLTYPE005,
	JLTYPE006,
	JLTYPE007,
	JLTYPE050,
	JLTYPE051,
	JLTYPE052,
	JLTYPE053,
} as const

/**
 * All valid analyzer diagnostic codes.
 */
export type AnalyzerDiagnosticCode = keyof typeof ANALYZER_DIAGNOSTICS
