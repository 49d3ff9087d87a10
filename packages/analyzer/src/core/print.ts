import { type AstNode, NodeKind } from './nodes.ts'

const INDENT = '  '

function describe(node: AstNode): string {
	switch (node.kind) {
		case NodeKind.Program:
			return 'Program'
		case NodeKind.Class:
			return `Class ${node.name}`
		case NodeKind.Method: {
			const params = node.params.map((p) => `${p.type} ${p.name}`).join(', ')
			return `Method ${node.name}(${params}): ${node.returnType}`
		}
		case NodeKind.Block:
			return 'Block'
		case NodeKind.VariableDeclaration:
			return `VariableDeclaration ${node.type} ${node.name}`
		case NodeKind.Assignment:
			return `Assignment ${node.variableName}`
		case NodeKind.If:
			return node.else === undefined ? 'If' : 'If/Else'
		case NodeKind.While:
			return 'While'
		case NodeKind.DoWhile:
			return 'DoWhile'
		case NodeKind.For:
			return 'For'
		case NodeKind.Return:
			return 'Return'
		case NodeKind.BinaryOp:
			return `BinaryOp ${node.operator}`
		case NodeKind.UnaryOp:
			return `UnaryOp ${node.operator} (${node.prefix ? 'prefix' : 'postfix'})`
		case NodeKind.Literal:
			return `Literal ${node.type} ${String(node.value)}`
		case NodeKind.Identifier:
			return node.resolvedType === undefined
				? `Identifier ${node.name}`
				: `Identifier ${node.name}: ${node.resolvedType}`
		case NodeKind.MethodCall:
			return `MethodCall ${node.methodName}`
		case NodeKind.MemberAccess:
			return `MemberAccess ${node.memberName}`
	}
}

function childrenOf(node: AstNode): readonly (AstNode | undefined)[] {
	switch (node.kind) {
		case NodeKind.Program:
			return node.classes
		case NodeKind.Class:
			return node.members
		case NodeKind.Method:
		case NodeKind.Block:
			return node.statements
		case NodeKind.VariableDeclaration:
			return [node.initializer]
		case NodeKind.Assignment:
			return [node.expression]
		case NodeKind.If:
			return [node.condition, node.then, node.else]
		case NodeKind.While:
		case NodeKind.DoWhile:
			return [node.condition, node.body]
		case NodeKind.For:
			return [node.init, node.condition, node.update, node.body]
		case NodeKind.Return:
			return [node.value]
		case NodeKind.BinaryOp:
			return [node.left, node.right]
		case NodeKind.UnaryOp:
			return [node.operand]
		case NodeKind.MethodCall:
			return [node.target, ...node.args]
		case NodeKind.MemberAccess:
			return [node.target]
		case NodeKind.Literal:
		case NodeKind.Identifier:
			return []
	}
}

/**
 * Render a tree one node per line, children indented two spaces under
 * their parent. Absent optional children are skipped.
 */
export function printTree(root: AstNode): string {
	const lines: string[] = []

	const walk = (node: AstNode, depth: number): void => {
		lines.push(INDENT.repeat(depth) + describe(node))
		for (const child of childrenOf(node)) {
			if (child !== undefined) walk(child, depth + 1)
		}
	}

	walk(root, 0)
	return lines.join('\n')
}
