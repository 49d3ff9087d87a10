import {
	type AnalysisResult,
	type Diagnostic,
	formatDiagnostic,
	type Token,
	type VariableInfo,
} from '@javalite/analyzer'
import { interpolateMessage, JLCLI001, JLCLI002, JLCLI003 } from '@javalite/diagnostics'

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

export function formatReadError(filePath: string, error: unknown): string {
	if (isNodeError(error) && error.code === 'ENOENT') {
		const message = interpolateMessage(JLCLI001.message, { path: filePath })
		return `[${JLCLI001.code}] ${message}`
	}
	const message = interpolateMessage(JLCLI002.message, { reason: getErrorMessage(error) })
	return `[${JLCLI002.code}] ${message}`
}

export function formatAnalysisError(error: unknown): string {
	const message = interpolateMessage(JLCLI003.message, { reason: getErrorMessage(error) })
	return `[${JLCLI003.code}] ${message}`
}

export function formatUsed(used: boolean): string {
	return used ? 'Yes' : 'No'
}

export const TOKEN_COLUMNS = ['Line', 'Column', 'Kind', 'Lexeme']

export function tokenRows(tokens: readonly Token[]): string[][] {
	return tokens.map((t) => [String(t.line), String(t.column), t.kind, t.lexeme])
}

export const VARIABLE_COLUMNS = ['Name', 'Type', 'Line', 'Scope', 'Used']

export function variableRows(variables: readonly VariableInfo[]): string[][] {
	return variables.map((v) => [v.name, v.type, String(v.line), String(v.scopeLevel), formatUsed(v.used)])
}

function plural(count: number, noun: string): string {
	return `${count} ${noun}${count === 1 ? '' : 's'}`
}

/** One line such as `Main.java: 2 errors, 1 warning`. */
export function summarize(result: AnalysisResult): string {
	const errors = result.errors.length + (result.failure === undefined ? 0 : 1)
	const warnings = result.warnings.length + result.unusedVariables.length
	return `${result.filename}: ${plural(errors, 'error')}, ${plural(warnings, 'warning')}`
}

/** Render diagnostics against the source, separated by blank lines. */
export function renderDiagnostics(diagnostics: readonly Diagnostic[], source: string, filename: string): string[] {
	return diagnostics.map((d) => `${formatDiagnostic(d, source, filename)}\n`)
}

const CHECK_USAGE = 'check <file> [--tokens] [--variables] [--ast] [--no-typecheck]'

/** Banner printed when `javalite` runs without a command. */
export function usageLines(binary: string, version: string): string[] {
	return [
		`Javalite v${version}`,
		'',
		`Usage: ${binary} ${CHECK_USAGE}`,
		'',
		`Run "${binary} --help" for available commands and options.`,
	]
}
