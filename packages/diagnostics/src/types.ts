/**
 * Diagnostic severity levels.
 */
export const DiagnosticSeverity = {
	Error: 0,
	Warning: 1,
} as const

export type DiagnosticSeverity = (typeof DiagnosticSeverity)[keyof typeof DiagnosticSeverity]

/** Pipeline stage a code belongs to: the part between `JL` and the number. */
export type DiagnosticPhase = 'LEX' | 'PARSE' | 'SEM' | 'TYPE' | 'CLI'

/** `JL<PHASE><NNN>`, e.g. `JLTYPE052` */
export type DiagnosticCodeFormat = `JL${DiagnosticPhase}${string}`

/** Numbers from here up are warnings in every analyzer phase */
export const FIRST_WARNING_NUMBER = 50

export interface DiagnosticDef {
	readonly code: DiagnosticCodeFormat
	readonly severity: DiagnosticSeverity
	/** Message template; `{name}` placeholders are filled from DiagnosticArgs */
	readonly message: string
	readonly description: string
	readonly suggestion?: string
}

export type DiagnosticArgs = Readonly<Record<string, string | number>>
