import assert from 'node:assert'
import { describe, it } from 'node:test'
import fc from 'fast-check'
import {
	getWiderType,
	isAssignmentCompatible,
	isBooleanOperator,
	isNumericType,
} from '../../src/check/types.ts'

const NUMERIC = ['byte', 'short', 'char', 'int', 'long', 'float', 'double'] as const
const ALL_TYPES = [...NUMERIC, 'boolean', 'String'] as const

const numericArb = fc.constantFrom(...NUMERIC)
const typeArb = fc.constantFrom(...ALL_TYPES)

describe('check/types', () => {
	describe('isAssignmentCompatible', () => {
		it('should allow widening but not narrowing', () => {
			assert.strictEqual(isAssignmentCompatible('int', 'double'), true)
			assert.strictEqual(isAssignmentCompatible('double', 'int'), false)
			assert.strictEqual(isAssignmentCompatible('byte', 'short'), true)
			assert.strictEqual(isAssignmentCompatible('long', 'int'), false)
		})

		it('should let char widen to int but not to short', () => {
			assert.strictEqual(isAssignmentCompatible('char', 'int'), true)
			assert.strictEqual(isAssignmentCompatible('char', 'short'), false)
			assert.strictEqual(isAssignmentCompatible('short', 'char'), false)
		})

		it('should keep boolean and String apart from numbers', () => {
			assert.strictEqual(isAssignmentCompatible('boolean', 'int'), false)
			assert.strictEqual(isAssignmentCompatible('int', 'String'), false)
			assert.strictEqual(isAssignmentCompatible('String', 'String'), true)
		})

		it('should accept identical class types', () => {
			assert.strictEqual(isAssignmentCompatible('Point', 'Point'), true)
			assert.strictEqual(isAssignmentCompatible('Point', 'String'), false)
		})

		it('should reject unknown or missing types', () => {
			assert.strictEqual(isAssignmentCompatible('unknown', 'unknown'), false)
			assert.strictEqual(isAssignmentCompatible(null, 'int'), false)
			assert.strictEqual(isAssignmentCompatible('int', undefined), false)
		})

		it('should be reflexive for every known type', () => {
			fc.assert(fc.property(typeArb, (type) => isAssignmentCompatible(type, type)))
		})

		it('should only hold both ways for identical types', () => {
			fc.assert(
				fc.property(typeArb, typeArb, (a, b) => {
					if (a === b) return true
					return !(isAssignmentCompatible(a, b) && isAssignmentCompatible(b, a))
				})
			)
		})
	})

	describe('getWiderType', () => {
		it('should follow the widening order', () => {
			assert.strictEqual(getWiderType('int', 'double'), 'double')
			assert.strictEqual(getWiderType('byte', 'long'), 'long')
			assert.strictEqual(getWiderType('short', 'char'), 'char')
			assert.strictEqual(getWiderType('char', 'int'), 'int')
		})

		it('should return unknown for non-numeric or missing operands', () => {
			assert.strictEqual(getWiderType('String', 'int'), 'unknown')
			assert.strictEqual(getWiderType('boolean', 'boolean'), 'unknown')
			assert.strictEqual(getWiderType(null, 'int'), 'unknown')
			assert.strictEqual(getWiderType('int', 'unknown'), 'unknown')
		})

		it('should be commutative and return one of its operands', () => {
			fc.assert(
				fc.property(numericArb, numericArb, (a, b) => {
					const wider = getWiderType(a, b)
					return wider === getWiderType(b, a) && (wider === a || wider === b)
				})
			)
		})
	})

	describe('operator groups', () => {
		it('should classify numeric types', () => {
			assert.strictEqual(isNumericType('char'), true)
			assert.strictEqual(isNumericType('boolean'), false)
			assert.strictEqual(isNumericType('String'), false)
		})

		it('should classify boolean-result operators', () => {
			for (const op of ['<', '>', '<=', '>=', '==', '!=', '&&', '||']) {
				assert.strictEqual(isBooleanOperator(op), true, op)
			}
			for (const op of ['+', '-', '*', '/', '%']) {
				assert.strictEqual(isBooleanOperator(op), false, op)
			}
		})
	})
})
