/**
 * @javalite/diagnostics
 *
 * Shared diagnostic types and definitions for Javalite packages.
 */

export {
	ANALYZER_DIAGNOSTICS,
	type AnalyzerDiagnosticCode,
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
} from './analyzer.ts'
export { CLI_DIAGNOSTICS, type CliDiagnosticCode, JLCLI001, JLCLI002, JLCLI003 } from './cli.ts'
export { type ParsedDiagnosticCode, parseDiagnosticCode, severityOfCode } from './codes.ts'
export { interpolateMessage } from './interpolate.ts'
export {
	type DiagnosticArgs,
	type DiagnosticCodeFormat,
	type DiagnosticDef,
	type DiagnosticPhase,
	DiagnosticSeverity,
	FIRST_WARNING_NUMBER,
} from './types.ts'

import { ANALYZER_DIAGNOSTICS } from './analyzer.ts'
import { CLI_DIAGNOSTICS } from './cli.ts'

/**
 * All diagnostics from all packages.
 */
export const DIAGNOSTICS = {
	...ANALYZER_DIAGNOSTICS,
	...CLI_DIAGNOSTICS,
} as const

/**
 * All valid diagnostic codes.
 */
export type DiagnosticCode = keyof typeof DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof DIAGNOSTICS)[typeof code] {
	return DIAGNOSTICS[code]
}

/**
 * Check if a code is a valid diagnostic code.
 */
export function isValidDiagnosticCode(code: string): code is DiagnosticCode {
	return code in DIAGNOSTICS
}
