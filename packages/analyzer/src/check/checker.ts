/**
 * Type checker: a pre-order pass over a finished tree.
 *
 * Infers expression types, validates assignments, initializers, conditions
 * and operators, and collects errors and warnings. Nothing here stops the
 * walk; a node that cannot be inspected becomes a warning and the walk moves
 * on to its next sibling.
 */

import {
	type AnalyzerDiagnosticCode,
	createDiagnostic,
	type Diagnostic,
	type DiagnosticArgs,
	isError,
} from '../core/diagnostics.ts'
import {
	type AstNode,
	type Expression,
	NodeKind,
	type TypeName,
	UNKNOWN_TYPE,
	type VariableDeclarationNode,
} from '../core/nodes.ts'
import type { SymbolTable } from '../scope/symbol-table.ts'
import {
	ARITHMETIC_OPERATORS,
	EQUALITY_OPERATORS,
	getWiderType,
	isAssignmentCompatible,
	isBooleanOperator,
	isNumericType,
	LOGICAL_OPERATORS,
	RELATIONAL_OPERATORS,
} from './types.ts'

/** Statement kinds whose condition is checked, as named in messages. */
export type ConditionKind = 'if' | 'while' | 'do-while' | 'for'

type OperandSide = 'left' | 'right'

function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

function describeUnexpected(node: never): string {
	const value: unknown = node
	if (typeof value === 'object' && value !== null && 'kind' in value) {
		return `unsupported node kind '${String(value.kind)}'`
	}
	return `unsupported node ${String(value)}`
}

export class TypeChecker {
	private readonly symbols: SymbolTable
	private readonly errors: Diagnostic[] = []
	private readonly warnings: Diagnostic[] = []

	constructor(symbols: SymbolTable) {
		this.symbols = symbols
	}

	// ===========================================================================
	// TYPE RULES
	// ===========================================================================

	isAssignmentCompatible(from: TypeName | null | undefined, to: TypeName | null | undefined): boolean {
		return isAssignmentCompatible(from, to)
	}

	getWiderType(a: TypeName | null | undefined, b: TypeName | null | undefined): TypeName {
		return getWiderType(a, b)
	}

	/**
	 * Infer the type of an expression. Calls and member accesses are never
	 * resolved and come back as `unknown`.
	 */
	getExpressionType(node: Expression): TypeName {
		switch (node.kind) {
			case NodeKind.Literal:
				return node.type
			case NodeKind.Identifier:
				return node.resolvedType ?? this.symbols.lookup(node.name)?.type ?? UNKNOWN_TYPE
			case NodeKind.BinaryOp:
				if (isBooleanOperator(node.operator)) return 'boolean'
				return getWiderType(this.getExpressionType(node.left), this.getExpressionType(node.right))
			case NodeKind.UnaryOp:
				if (node.operator === '!') return 'boolean'
				return this.getExpressionType(node.operand)
			case NodeKind.MethodCall:
			case NodeKind.MemberAccess:
				return UNKNOWN_TYPE
			default:
				throw new Error(describeUnexpected(node))
		}
	}

	// ===========================================================================
	// CHECKS
	// ===========================================================================

	/**
	 * Check `variableName = expression`. The target's type comes from
	 * `targetType` when the parser recorded one, otherwise from the table.
	 */
	checkAssignment(variableName: string, expression: Expression, line: number, targetType?: TypeName): void {
		const variableType = targetType ?? this.symbols.lookup(variableName)?.type
		if (variableType === undefined) {
			this.report('JLTYPE001', line, { name: variableName })
			return
		}

		const expressionType = this.getExpressionType(expression)
		if (expressionType === UNKNOWN_TYPE) {
			this.report('JLTYPE050', line, { name: variableName })
			return
		}

		if (!isAssignmentCompatible(expressionType, variableType)) {
			this.report('JLTYPE002', line, { from: expressionType, name: variableName, to: variableType })
		}
	}

	/**
	 * Check operand types of a binary operator. Skipped when either side's
	 * type is unknown. Each operator group is checked on its own.
	 */
	checkBinaryOperation(operator: string, left: Expression, right: Expression, line: number): void {
		const leftType = this.getExpressionType(left)
		const rightType = this.getExpressionType(right)
		if (leftType === UNKNOWN_TYPE || rightType === UNKNOWN_TYPE) return

		if (RELATIONAL_OPERATORS.has(operator)) {
			if (!isNumericType(leftType) || !isNumericType(rightType)) {
				this.report('JLTYPE005', line, { left: leftType, operator, right: rightType })
			}
		}

		if (EQUALITY_OPERATORS.has(operator)) {
			if (
				leftType !== rightType &&
				!isAssignmentCompatible(leftType, rightType) &&
				!isAssignmentCompatible(rightType, leftType)
			) {
				this.report('JLTYPE052', line, { left: leftType, right: rightType })
			}
		}

		if (LOGICAL_OPERATORS.has(operator)) {
			this.checkOperand('JLTYPE006', operator, 'left', leftType, line, (type) => type === 'boolean')
			this.checkOperand('JLTYPE006', operator, 'right', rightType, line, (type) => type === 'boolean')
		}

		// String passes for every arithmetic operator, not only `+`
		if (ARITHMETIC_OPERATORS.has(operator)) {
			const isArithmeticOperand = (type: TypeName): boolean => isNumericType(type) || type === 'String'
			this.checkOperand('JLTYPE007', operator, 'left', leftType, line, isArithmeticOperand)
			this.checkOperand('JLTYPE007', operator, 'right', rightType, line, isArithmeticOperand)
		}
	}

	/**
	 * Check that a condition is exactly `boolean`.
	 */
	checkCondition(condition: Expression, statement: ConditionKind, line: number): void {
		const conditionType = this.getExpressionType(condition)

		if (conditionType === UNKNOWN_TYPE) {
			this.report('JLTYPE051', line, { statement })
			return
		}

		if (conditionType !== 'boolean') {
			this.report('JLTYPE004', line, { found: conditionType, statement })
		}
	}

	private checkVariableDeclaration(node: VariableDeclarationNode): void {
		if (node.initializer === undefined) return

		const initializerType = this.getExpressionType(node.initializer)
		if (initializerType !== UNKNOWN_TYPE && !isAssignmentCompatible(initializerType, node.type)) {
			this.report('JLTYPE003', node.line, { from: initializerType, name: node.name, to: node.type })
		}
	}

	private checkOperand(
		code: AnalyzerDiagnosticCode,
		operator: string,
		side: OperandSide,
		type: TypeName,
		line: number,
		accepts: (type: TypeName) => boolean
	): void {
		if (!accepts(type)) {
			this.report(code, line, { found: type, operator, side })
		}
	}

	// ===========================================================================
	// TREE WALK
	// ===========================================================================

	/**
	 * Walk the tree rooted at `root`, accumulating diagnostics.
	 */
	analyze(root: AstNode): void {
		this.visit(root)
	}

	private visitAll(nodes: readonly AstNode[]): void {
		for (const node of nodes) {
			this.visit(node)
		}
	}

	private visit(node: AstNode | undefined): void {
		if (node === undefined || node === null) return

		try {
			this.visitNode(node)
		} catch (error: unknown) {
			this.report('JLTYPE053', node.line, { reason: getErrorMessage(error) })
		}
	}

	private visitNode(node: AstNode): void {
		switch (node.kind) {
			case NodeKind.Program:
				this.visitAll(node.classes)
				return
			case NodeKind.Class:
				this.visitAll(node.members)
				return
			case NodeKind.Method:
			case NodeKind.Block:
				this.visitAll(node.statements)
				return
			case NodeKind.VariableDeclaration:
				this.checkVariableDeclaration(node)
				this.visit(node.initializer)
				return
			case NodeKind.Assignment:
				this.checkAssignment(node.variableName, node.expression, node.line, node.targetType)
				this.visit(node.expression)
				return
			case NodeKind.If:
				this.checkCondition(node.condition, 'if', node.line)
				this.visit(node.condition)
				this.visit(node.then)
				this.visit(node.else)
				return
			case NodeKind.While:
				this.checkCondition(node.condition, 'while', node.line)
				this.visit(node.condition)
				this.visit(node.body)
				return
			case NodeKind.DoWhile:
				this.checkCondition(node.condition, 'do-while', node.line)
				this.visit(node.condition)
				this.visit(node.body)
				return
			case NodeKind.For:
				this.visit(node.init)
				if (node.condition !== undefined) {
					this.checkCondition(node.condition, 'for', node.line)
					this.visit(node.condition)
				}
				this.visit(node.update)
				this.visit(node.body)
				return
			case NodeKind.Return:
				this.visit(node.value)
				return
			case NodeKind.BinaryOp:
				this.checkBinaryOperation(node.operator, node.left, node.right, node.line)
				this.visit(node.left)
				this.visit(node.right)
				return
			case NodeKind.UnaryOp:
				this.visit(node.operand)
				return
			case NodeKind.MethodCall:
				this.visit(node.target)
				this.visitAll(node.args)
				return
			case NodeKind.MemberAccess:
				this.visit(node.target)
				return
			case NodeKind.Literal:
			case NodeKind.Identifier:
				return
			default:
				throw new Error(describeUnexpected(node))
		}
	}

	// ===========================================================================
	// DIAGNOSTICS
	// ===========================================================================

	private report(code: AnalyzerDiagnosticCode, line: number, args: DiagnosticArgs): void {
		const diagnostic = createDiagnostic(code, line, args)
		if (isError(diagnostic)) {
			this.errors.push(diagnostic)
		} else {
			this.warnings.push(diagnostic)
		}
	}

	getErrors(): readonly Diagnostic[] {
		return this.errors
	}

	getWarnings(): readonly Diagnostic[] {
		return this.warnings
	}

	hasErrors(): boolean {
		return this.errors.length > 0
	}
}
