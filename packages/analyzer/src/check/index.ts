/**
 * Check phase: type inference and compatibility checks over a finished tree.
 */

export { type ConditionKind, TypeChecker } from './checker.ts'
export {
	getWiderType,
	isAssignmentCompatible,
	isBooleanOperator,
	isNumericType,
} from './types.ts'
