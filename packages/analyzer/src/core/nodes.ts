/**
 * AST node model.
 *
 * A closed set of variants discriminated by `kind`. Every node carries the
 * 1-based source line it starts on. Composite nodes own their children; the
 * tree is never mutated once the parser hands it over.
 */

/** Names of types as written in source (`int`, `String`, `Point`, `int[]`). */
export type TypeName = string

/** Type of an expression the checker cannot resolve. */
export const UNKNOWN_TYPE: TypeName = 'unknown'

export const NodeKind = {
	Assignment: 'Assignment',
	BinaryOp: 'BinaryOp',
	Block: 'Block',
	Class: 'Class',
	DoWhile: 'DoWhile',
	For: 'For',
	Identifier: 'Identifier',
	If: 'If',
	Literal: 'Literal',
	MemberAccess: 'MemberAccess',
	Method: 'Method',
	MethodCall: 'MethodCall',
	Program: 'Program',
	Return: 'Return',
	UnaryOp: 'UnaryOp',
	VariableDeclaration: 'VariableDeclaration',
	While: 'While',
} as const

export type NodeKind = (typeof NodeKind)[keyof typeof NodeKind]

interface NodeBase<K extends NodeKind> {
	readonly kind: K
	readonly line: number
}

// ============================================================================
// Expressions
// ============================================================================

/** `long` literals are kept as `bigint` so values past 2^53 survive */
export type LiteralValue = string | number | bigint | boolean

export interface LiteralNode extends NodeBase<typeof NodeKind.Literal> {
	readonly type: TypeName
	readonly value: LiteralValue
}

export interface IdentifierNode extends NodeBase<typeof NodeKind.Identifier> {
	readonly name: string
	/** Declared type of the binding the name resolved to while the tree was built */
	readonly resolvedType?: TypeName
}

export interface BinaryOpNode extends NodeBase<typeof NodeKind.BinaryOp> {
	readonly operator: string
	readonly left: Expression
	readonly right: Expression
}

export interface UnaryOpNode extends NodeBase<typeof NodeKind.UnaryOp> {
	readonly operator: string
	readonly operand: Expression
	/** false for postfix `x++` / `x--` */
	readonly prefix: boolean
}

export interface MethodCallNode extends NodeBase<typeof NodeKind.MethodCall> {
	/** Receiver expression; absent for unqualified calls such as `foo(1)` */
	readonly target?: Expression
	readonly methodName: string
	readonly args: readonly Expression[]
}

export interface MemberAccessNode extends NodeBase<typeof NodeKind.MemberAccess> {
	readonly target: Expression
	readonly memberName: string
}

export type Expression =
	| LiteralNode
	| IdentifierNode
	| BinaryOpNode
	| UnaryOpNode
	| MethodCallNode
	| MemberAccessNode

// ============================================================================
// Statements
// ============================================================================

export interface VariableDeclarationNode extends NodeBase<typeof NodeKind.VariableDeclaration> {
	readonly name: string
	readonly type: TypeName
	readonly initializer?: Expression
}

export interface AssignmentNode extends NodeBase<typeof NodeKind.Assignment> {
	readonly variableName: string
	readonly expression: Expression
	/** Declared type of the target, recorded while the tree was built */
	readonly targetType?: TypeName
}

export interface BlockNode extends NodeBase<typeof NodeKind.Block> {
	readonly statements: readonly Statement[]
}

export interface IfNode extends NodeBase<typeof NodeKind.If> {
	readonly condition: Expression
	readonly then: Statement
	readonly else?: Statement
}

export interface WhileNode extends NodeBase<typeof NodeKind.While> {
	readonly condition: Expression
	readonly body: Statement
}

export interface DoWhileNode extends NodeBase<typeof NodeKind.DoWhile> {
	readonly condition: Expression
	readonly body: Statement
}

export interface ForNode extends NodeBase<typeof NodeKind.For> {
	readonly init?: Statement
	readonly condition?: Expression
	readonly update?: Statement
	readonly body: Statement
}

export interface ReturnNode extends NodeBase<typeof NodeKind.Return> {
	readonly value?: Expression
}

/** Expression statements are limited to calls and increments. */
export type Statement =
	| BlockNode
	| VariableDeclarationNode
	| AssignmentNode
	| IfNode
	| WhileNode
	| DoWhileNode
	| ForNode
	| ReturnNode
	| MethodCallNode
	| UnaryOpNode

// ============================================================================
// Declarations
// ============================================================================

export interface Parameter {
	readonly name: string
	readonly type: TypeName
	readonly line: number
}

export interface MethodNode extends NodeBase<typeof NodeKind.Method> {
	readonly name: string
	readonly returnType: TypeName
	readonly params: readonly Parameter[]
	readonly statements: readonly Statement[]
}

export type ClassMember = MethodNode | VariableDeclarationNode

export interface ClassNode extends NodeBase<typeof NodeKind.Class> {
	readonly name: string
	readonly members: readonly ClassMember[]
}

export interface ProgramNode extends NodeBase<typeof NodeKind.Program> {
	readonly classes: readonly ClassNode[]
}

export type AstNode = ProgramNode | ClassNode | MethodNode | Statement | Expression

// ============================================================================
// Factories
// ============================================================================

export function literal(type: TypeName, value: LiteralValue, line: number): LiteralNode {
	return { kind: NodeKind.Literal, line, type, value }
}

export function identifier(name: string, line: number, resolvedType?: TypeName): IdentifierNode {
	return {
		kind: NodeKind.Identifier,
		line,
		name,
		...(resolvedType !== undefined ? { resolvedType } : {}),
	}
}

export function binaryOp(
	operator: string,
	left: Expression,
	right: Expression,
	line: number
): BinaryOpNode {
	return { kind: NodeKind.BinaryOp, left, line, operator, right }
}

export function unaryOp(
	operator: string,
	operand: Expression,
	line: number,
	prefix = true
): UnaryOpNode {
	return { kind: NodeKind.UnaryOp, line, operand, operator, prefix }
}

export function variableDeclaration(
	name: string,
	type: TypeName,
	line: number,
	initializer?: Expression
): VariableDeclarationNode {
	return {
		kind: NodeKind.VariableDeclaration,
		line,
		name,
		type,
		...(initializer !== undefined ? { initializer } : {}),
	}
}

export function assignment(
	variableName: string,
	expression: Expression,
	line: number,
	targetType?: TypeName
): AssignmentNode {
	return {
		expression,
		kind: NodeKind.Assignment,
		line,
		variableName,
		...(targetType !== undefined ? { targetType } : {}),
	}
}

export function methodCall(
	methodName: string,
	args: readonly Expression[],
	line: number,
	target?: Expression
): MethodCallNode {
	return {
		args,
		kind: NodeKind.MethodCall,
		line,
		methodName,
		...(target !== undefined ? { target } : {}),
	}
}

export function memberAccess(target: Expression, memberName: string, line: number): MemberAccessNode {
	return { kind: NodeKind.MemberAccess, line, memberName, target }
}

export function block(statements: readonly Statement[], line: number): BlockNode {
	return { kind: NodeKind.Block, line, statements }
}
