/**
 * Diagnostic records and their text rendering.
 * Definitions live in the shared @javalite/diagnostics catalog.
 */

import {
	type AnalyzerDiagnosticCode,
	ANALYZER_DIAGNOSTICS,
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	interpolateMessage,
} from '@javalite/diagnostics'

export {
	type AnalyzerDiagnosticCode,
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	interpolateMessage,
} from '@javalite/diagnostics'

/**
 * A diagnostic message with location information.
 */
export interface Diagnostic {
	/** The diagnostic definition from the catalog */
	readonly def: DiagnosticDef
	/** Interpolated message with arguments applied */
	readonly message: string
	/** Line number (1-indexed) */
	readonly line: number
	/** Column number (1-indexed), when the reporter knows it */
	readonly column?: number
	/** Template arguments used for message interpolation */
	readonly args?: DiagnosticArgs
}

/**
 * Build a diagnostic from a catalog code.
 */
export function createDiagnostic(
	code: AnalyzerDiagnosticCode,
	line: number,
	args?: DiagnosticArgs,
	column?: number
): Diagnostic {
	const def = ANALYZER_DIAGNOSTICS[code]
	return {
		def,
		line,
		message: interpolateMessage(def.message, args),
		...(args ? { args } : {}),
		...(column !== undefined ? { column } : {}),
	}
}

export function isError(diagnostic: Diagnostic): boolean {
	return diagnostic.def.severity === DiagnosticSeverity.Error
}

function getSeverityLabel(severity: DiagnosticSeverity): string {
	return severity === DiagnosticSeverity.Error ? 'error' : 'warning'
}

/**
 * Format a diagnostic for display.
 *
 * Example:
 * ```
 * error[JLTYPE002]: type mismatch: cannot assign boolean to int in variable 'x'
 *   --> Main.java:4
 *    |
 *  4 |         x = true;
 *    |
 *    = help: Change the declared type of the variable or the expression.
 * ```
 */
export function formatDiagnostic(diagnostic: Diagnostic, source: string, filename = '<input>'): string {
	const { def } = diagnostic
	const header = `${getSeverityLabel(def.severity)}[${def.code}]: ${diagnostic.message}`
	const position =
		diagnostic.column !== undefined ? `${diagnostic.line}:${diagnostic.column}` : `${diagnostic.line}`
	const location = `  --> ${filename}:${position}`

	const sourceLine = source.split(/\r?\n/)[diagnostic.line - 1]
	if (sourceLine === undefined) {
		return `${header}\n${location}`
	}

	const pad = ' '.repeat(String(diagnostic.line).length)
	const emptyPrefix = ` ${pad} |`
	const lines = [header, location, emptyPrefix, ` ${diagnostic.line} | ${sourceLine}`]
	if (diagnostic.column !== undefined) {
		lines.push(`${emptyPrefix} ${' '.repeat(diagnostic.column - 1)}^`)
	}

	if (def.suggestion) {
		const suggestion = interpolateMessage(def.suggestion, diagnostic.args)
		lines.push(emptyPrefix, `${' '.repeat(pad.length + 2)}= help: ${suggestion}`)
	}

	return lines.join('\n')
}
