import { type DiagnosticPhase, DiagnosticSeverity, FIRST_WARNING_NUMBER } from './types.ts'

const CODE_PATTERN = /^JL(LEX|PARSE|SEM|TYPE|CLI)(\d{3})$/

export interface ParsedDiagnosticCode {
	readonly phase: DiagnosticPhase
	readonly number: number
}

function isPhase(text: string): text is DiagnosticPhase {
	return text === 'LEX' || text === 'PARSE' || text === 'SEM' || text === 'TYPE' || text === 'CLI'
}

/**
 * Split a code into its phase and number. Returns null for anything that is
 * not `JL<PHASE>` followed by three digits.
 */
export function parseDiagnosticCode(code: string): ParsedDiagnosticCode | null {
	const match = CODE_PATTERN.exec(code)
	const phase = match?.[1]
	const digits = match?.[2]
	if (phase === undefined || digits === undefined || !isPhase(phase)) return null
	return { number: Number(digits), phase }
}

/**
 * Severity implied by a code's number. CLI codes are always errors.
 */
export function severityOfCode(code: ParsedDiagnosticCode): DiagnosticSeverity {
	if (code.phase === 'CLI' || code.number < FIRST_WARNING_NUMBER) {
		return DiagnosticSeverity.Error
	}
	return DiagnosticSeverity.Warning
}
