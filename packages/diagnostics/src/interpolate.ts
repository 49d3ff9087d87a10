import type { DiagnosticArgs } from './types.ts'

const PLACEHOLDER = /\{(\w+)\}/g

/**
 * Fill `{key}` placeholders in a message template.
 * Placeholders without a matching argument are left in place.
 */
export function interpolateMessage(template: string, args?: DiagnosticArgs): string {
	if (args === undefined) return template
	return template.replace(PLACEHOLDER, (placeholder, key: string) => {
		const value = args[key]
		return value === undefined ? placeholder : String(value)
	})
}
