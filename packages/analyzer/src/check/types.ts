/**
 * Type rules for the Check phase: the assignment-compatibility matrix,
 * the widening order used for arithmetic results, and operator groups.
 */

import { type TypeName, UNKNOWN_TYPE } from '../core/nodes.ts'

/**
 * Directed compatibility: a value of the key type may be stored in a
 * variable of any type in its set. Pairs not listed are incompatible.
 */
const COMPATIBLE_TYPES: ReadonlyMap<TypeName, ReadonlySet<TypeName>> = new Map([
	['byte', new Set(['byte', 'short', 'int', 'long', 'float', 'double'])],
	['short', new Set(['short', 'int', 'long', 'float', 'double'])],
	['int', new Set(['int', 'long', 'float', 'double'])],
	['long', new Set(['long', 'float', 'double'])],
	['float', new Set(['float', 'double'])],
	['double', new Set(['double'])],
	['char', new Set(['char', 'int', 'long', 'float', 'double'])],
	['boolean', new Set(['boolean'])],
	['String', new Set(['String'])],
])

/**
 * Result order for arithmetic. `char` sits between `short` and `int`,
 * which is not how the language promotes operands but is what this checker
 * reports.
 */
const WIDENING_ORDER: readonly TypeName[] = ['byte', 'short', 'char', 'int', 'long', 'float', 'double']

const NUMERIC_TYPES: ReadonlySet<TypeName> = new Set(WIDENING_ORDER)

export const RELATIONAL_OPERATORS: ReadonlySet<string> = new Set(['<', '>', '<=', '>='])
export const EQUALITY_OPERATORS: ReadonlySet<string> = new Set(['==', '!='])
export const LOGICAL_OPERATORS: ReadonlySet<string> = new Set(['&&', '||'])
export const ARITHMETIC_OPERATORS: ReadonlySet<string> = new Set(['+', '-', '*', '/', '%'])

function isKnown(type: TypeName | null | undefined): type is TypeName {
	return type !== null && type !== undefined && type !== UNKNOWN_TYPE
}

/**
 * Whether a value of `from` can be assigned to a variable of `to`.
 * Unknown or missing types are never compatible.
 */
export function isAssignmentCompatible(
	from: TypeName | null | undefined,
	to: TypeName | null | undefined
): boolean {
	if (!isKnown(from) || !isKnown(to)) return false
	if (from === to) return true
	return COMPATIBLE_TYPES.get(from)?.has(to) ?? false
}

/**
 * The wider of two numeric types per WIDENING_ORDER, or `unknown` if either
 * is not numeric.
 */
export function getWiderType(a: TypeName | null | undefined, b: TypeName | null | undefined): TypeName {
	if (!isKnown(a) || !isKnown(b)) return UNKNOWN_TYPE
	const indexA = WIDENING_ORDER.indexOf(a)
	const indexB = WIDENING_ORDER.indexOf(b)
	if (indexA === -1 || indexB === -1) return UNKNOWN_TYPE
	return WIDENING_ORDER[Math.max(indexA, indexB)] ?? UNKNOWN_TYPE
}

/** `byte`, `short`, `char`, `int`, `long`, `float` or `double`. */
export function isNumericType(type: TypeName): boolean {
	return NUMERIC_TYPES.has(type)
}

/** Operators whose result is always `boolean`. */
export function isBooleanOperator(operator: string): boolean {
	return (
		RELATIONAL_OPERATORS.has(operator) ||
		EQUALITY_OPERATORS.has(operator) ||
		LOGICAL_OPERATORS.has(operator)
	)
}
