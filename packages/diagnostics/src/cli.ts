/**
 * CLI diagnostic definitions.
 *
 * Error code format: JLCLI<NUMBER>
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

export const JLCLI001: DiagnosticDef = {
	code: 'JLCLI001',
	description: "Javalite couldn't find a file at this path.",
	message: 'file not found: {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check the path and make sure the file exists.',
}

export const JLCLI002: DiagnosticDef = {
	code: 'JLCLI002',
	description: "The file exists but Javalite can't open it.",
	message: 'cannot read file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have read permission for this file.',
}

export const JLCLI003: DiagnosticDef = {
	code: 'JLCLI003',
	description: 'Something unexpected went wrong during analysis.',
	message: 'analysis failed: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check your source file, or report this if it seems like a bug.',
}

export const CLI_DIAGNOSTICS = {
	JLCLI001,
	JLCLI002,
	JLCLI003,
} as const

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
