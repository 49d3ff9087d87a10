import type { Node, Semantics } from 'ohm-js'
import { createDiagnostic, type Diagnostic } from '../core/diagnostics.ts'
import {
	assignment,
	binaryOp,
	block,
	type ClassMember,
	type ClassNode,
	type Expression,
	type ForNode,
	identifier,
	type IdentifierNode,
	literal,
	memberAccess,
	methodCall,
	type MethodNode,
	NodeKind,
	type Parameter,
	type ProgramNode,
	type Statement,
	type TypeName,
	type UnaryOpNode,
	unaryOp,
	variableDeclaration,
	type VariableDeclarationNode,
} from '../core/nodes.ts'
import { describeFailure, JavaliteGrammar, lineOf, match } from '../grammar/index.ts'
import { UseBeforeDeclarationError } from '../scope/errors.ts'
import type { SymbolTable } from '../scope/symbol-table.ts'

export interface ParseResult {
	succeeded: boolean
	program?: ProgramNode
	diagnostic?: Diagnostic
}

/** One `.name` or `.name(args)` step after a primary expression. */
interface SelectorPart {
	readonly name: string
	readonly args?: readonly Expression[]
	readonly line: number
}

function optional<T>(iter: Node, build: (node: Node) => T): T | undefined {
	const node = iter.children[0]
	return node === undefined ? undefined : build(node)
}

function applySelector(target: Expression, selector: SelectorPart): Expression {
	if (selector.args === undefined) {
		return memberAccess(target, selector.name, selector.line)
	}
	return methodCall(selector.name, selector.args, selector.line, target)
}

function parseLiteral(node: Node, line: number): Expression {
	const text = node.sourceString
	switch (node.ctorName) {
		case 'floatLiteral':
			return literal(/[fF]$/.test(text) ? 'float' : 'double', Number.parseFloat(text), line)
		case 'longLiteral':
			return literal('long', BigInt(text.slice(0, -1)), line)
		case 'intLiteral':
			return literal('int', Number(text), line)
		case 'charLiteral':
			return literal('char', text.slice(1, -1), line)
		case 'stringLiteral':
			return literal('String', text.slice(1, -1), line)
		case 'booleanLiteral':
			return literal('boolean', text === 'true', line)
		default:
			throw new Error(`unexpected literal '${text}'`)
	}
}

/**
 * Semantics that build the tree and drive the symbol table in source order.
 * Created per parse so the actions close over that parse's table.
 */
function createTreeSemantics(symbols: SymbolTable): Semantics {
	const semantics = JavaliteGrammar.createSemantics()

	function scoped<T>(build: () => T): T {
		symbols.enterScope()
		try {
			return build()
		} finally {
			symbols.exitScope()
		}
	}

	/** Bodies of if/while/do get a frame of their own unless they are a block, which pushes one itself. */
	function toBody(statement: Node): Statement {
		if (statement.child(0).ctorName === 'Block') {
			return statement['toStatement']()
		}
		return scoped((): Statement => statement['toStatement']())
	}

	function declareVariable(typeNode: Node, nameNode: Node, init: Node, line: number): VariableDeclarationNode {
		const type: TypeName = typeNode['toType']()
		const initializer = optional(init, (expr): Expression => expr['toExpr']())
		symbols.declare(nameNode.sourceString, type, line)
		return variableDeclaration(nameNode.sourceString, type, line, initializer)
	}

	function readVariable(name: string, line: number): IdentifierNode {
		const info = symbols.markUsed(name, line)
		return identifier(name, line, info.type)
	}

	function incDec(operator: string, name: string, line: number, prefix: boolean): UnaryOpNode {
		return unaryOp(operator, readVariable(name, line), line, prefix)
	}

	/** An undeclared bare name in receiver position is a qualified name such as `System`. */
	function toReceiver(primary: Node): Expression {
		const name = primary.sourceString
		if (primary.child(0).ctorName === 'PrimaryExpr_ident' && !symbols.isDeclared(name)) {
			return identifier(name, lineOf(primary))
		}
		return primary['toExpr']()
	}

	/** Receiver first, then each selector, in source order. */
	function foldSelectors(primary: Node, selectors: Node): Expression {
		const receiver = toReceiver(primary)
		return selectors.children
			.map((s: Node): SelectorPart => s['toSelector']())
			.reduce(applySelector, receiver)
	}

	function toArgs(args: Node): Expression[] {
		return args['toArgs']()
	}

	semantics.addOperation<ProgramNode>('toProgram', {
		Program(classes: Node) {
			return {
				classes: classes.children.map((c: Node): ClassNode => c['toClass']()),
				kind: NodeKind.Program,
				line: lineOf(this),
			}
		},
	})

	semantics.addOperation<ClassNode>('toClass', {
		ClassDecl(_modifiers: Node, _kw: Node, name: Node, _open: Node, members: Node, _close: Node) {
			return {
				kind: NodeKind.Class,
				line: lineOf(this),
				members: members.children.map((m: Node): ClassMember => m['toMember']()),
				name: name.sourceString,
			}
		},
	})

	semantics.addOperation<ClassMember>('toMember', {
		FieldDecl(_modifiers: Node, type: Node, name: Node, _eq: Node, init: Node, _semi: Node) {
			return declareVariable(type, name, init, lineOf(this))
		},
		MethodDecl(
			_modifiers: Node,
			returnType: Node,
			name: Node,
			_open: Node,
			params: Node,
			_close: Node,
			_bodyOpen: Node,
			body: Node,
			_bodyClose: Node
		) {
			const line = lineOf(this)
			return scoped((): MethodNode => {
				const parameters = params.asIteration().children.map((p: Node): Parameter => p['toParam']())
				for (const param of parameters) {
					symbols.declare(param.name, param.type, param.line)
				}
				return {
					kind: NodeKind.Method,
					line,
					name: name.sourceString,
					params: parameters,
					returnType: returnType['toType'](),
					statements: body.children.map((s: Node): Statement => s['toStatement']()),
				}
			})
		},
	})

	semantics.addOperation<Parameter>('toParam', {
		Param(type: Node, name: Node) {
			return { line: lineOf(this), name: name.sourceString, type: type['toType']() }
		},
	})

	semantics.addOperation<TypeName>('toType', {
		ReturnType_void(_kw: Node) {
			return 'void'
		},
		Type(base: Node, brackets: Node, _close: Node) {
			return base.sourceString + '[]'.repeat(brackets.numChildren)
		},
	})

	semantics.addOperation<Statement>('toStatement', {
		Statement_local(decl: Node, _semi: Node) {
			return decl['toStatement']()
		},
		Statement_simple(stmt: Node, _semi: Node) {
			return stmt['toStatement']()
		},
		Block(_open: Node, statements: Node, _close: Node) {
			const line = lineOf(this)
			return scoped(() =>
				block(
					statements.children.map((s: Node): Statement => s['toStatement']()),
					line
				)
			)
		},
		LocalVarDecl(type: Node, name: Node, _eq: Node, init: Node) {
			return declareVariable(type, name, init, lineOf(this))
		},
		IfStmt(_kw: Node, _open: Node, condition: Node, _close: Node, then: Node, elseClause: Node) {
			const cond: Expression = condition['toExpr']()
			const thenBranch = toBody(then)
			const elseBranch = optional(elseClause, (clause) => toBody(clause.child(1)))
			return {
				condition: cond,
				kind: NodeKind.If,
				line: lineOf(this),
				then: thenBranch,
				...(elseBranch !== undefined ? { else: elseBranch } : {}),
			}
		},
		WhileStmt(_kw: Node, _open: Node, condition: Node, _close: Node, body: Node) {
			const cond: Expression = condition['toExpr']()
			return { body: toBody(body), condition: cond, kind: NodeKind.While, line: lineOf(this) }
		},
		DoWhileStmt(
			_do: Node,
			body: Node,
			_while: Node,
			_open: Node,
			condition: Node,
			_close: Node,
			_semi: Node
		) {
			const loopBody = toBody(body)
			return { body: loopBody, condition: condition['toExpr'](), kind: NodeKind.DoWhile, line: lineOf(this) }
		},
		ForStmt(
			_kw: Node,
			_open: Node,
			init: Node,
			_semi1: Node,
			condition: Node,
			_semi2: Node,
			update: Node,
			_close: Node,
			body: Node
		) {
			const line = lineOf(this)
			// The loop variable lives in a frame that closes with the loop
			return scoped((): ForNode => {
				const initStmt = optional(init, (s): Statement => s['toStatement']())
				const cond = optional(condition, (e): Expression => e['toExpr']())
				const updateStmt = optional(update, (s): Statement => s['toStatement']())
				const loopBody: Statement = body['toStatement']()
				return {
					body: loopBody,
					kind: NodeKind.For,
					line,
					...(initStmt !== undefined ? { init: initStmt } : {}),
					...(cond !== undefined ? { condition: cond } : {}),
					...(updateStmt !== undefined ? { update: updateStmt } : {}),
				}
			})
		},
		ReturnStmt(_kw: Node, value: Node, _semi: Node) {
			const result = optional(value, (e): Expression => e['toExpr']())
			return {
				kind: NodeKind.Return,
				line: lineOf(this),
				...(result !== undefined ? { value: result } : {}),
			}
		},
		CallStmt_chained(primary: Node, selectors: Node, call: Node, _semi: Node) {
			const target = foldSelectors(primary, selectors)
			const last: SelectorPart = call['toSelector']()
			return methodCall(last.name, last.args ?? [], last.line, target)
		},
		CallStmt_plain(name: Node, args: Node, _semi: Node) {
			return methodCall(name.sourceString, toArgs(args), lineOf(this))
		},
		AssignExpr(name: Node, op: Node, value: Node) {
			const line = lineOf(this)
			const variableName = name.sourceString
			const operator = op.sourceString

			if (operator === '=') {
				const target = symbols.lookup(variableName)
				if (target === null) {
					throw new UseBeforeDeclarationError(variableName, line)
				}
				return assignment(variableName, value['toExpr'](), line, target.type)
			}

			// x op= e  =>  x = x op e
			const current = readVariable(variableName, line)
			const expression = binaryOp(operator.slice(0, -1), current, value['toExpr'](), line)
			return assignment(variableName, expression, line, current.resolvedType)
		},
		IncDecExpr_prefix(op: Node, name: Node) {
			return incDec(op.sourceString, name.sourceString, lineOf(this), true)
		},
		IncDecExpr_postfix(name: Node, op: Node) {
			return incDec(op.sourceString, name.sourceString, lineOf(this), false)
		},
	})

	semantics.addOperation<Expression>('toExpr', {
		OrExpr_binary(left: Node, op: Node, right: Node) {
			return binaryOp(op.sourceString, left['toExpr'](), right['toExpr'](), lineOf(this))
		},
		AndExpr_binary(left: Node, op: Node, right: Node) {
			return binaryOp(op.sourceString, left['toExpr'](), right['toExpr'](), lineOf(this))
		},
		EqExpr_binary(left: Node, op: Node, right: Node) {
			return binaryOp(op.sourceString, left['toExpr'](), right['toExpr'](), lineOf(this))
		},
		RelExpr_binary(left: Node, op: Node, right: Node) {
			return binaryOp(op.sourceString, left['toExpr'](), right['toExpr'](), lineOf(this))
		},
		AddExpr_binary(left: Node, op: Node, right: Node) {
			return binaryOp(op.sourceString, left['toExpr'](), right['toExpr'](), lineOf(this))
		},
		MulExpr_binary(left: Node, op: Node, right: Node) {
			return binaryOp(op.sourceString, left['toExpr'](), right['toExpr'](), lineOf(this))
		},
		UnaryExpr_prefix(op: Node, operand: Node) {
			return unaryOp(op.sourceString, operand['toExpr'](), lineOf(this))
		},
		IncDecExpr_prefix(op: Node, name: Node) {
			return incDec(op.sourceString, name.sourceString, lineOf(this), true)
		},
		IncDecExpr_postfix(name: Node, op: Node) {
			return incDec(op.sourceString, name.sourceString, lineOf(this), false)
		},
		PostfixExpr(primary: Node, selectors: Node) {
			if (selectors.numChildren === 0) {
				return primary['toExpr']()
			}
			return foldSelectors(primary, selectors)
		},
		PrimaryExpr_paren(_open: Node, expr: Node, _close: Node) {
			return expr['toExpr']()
		},
		PrimaryExpr_call(name: Node, args: Node) {
			return methodCall(name.sourceString, toArgs(args), lineOf(this))
		},
		PrimaryExpr_ident(name: Node) {
			return readVariable(name.sourceString, lineOf(this))
		},
		literal(value: Node) {
			return parseLiteral(value, lineOf(this))
		},
	})

	semantics.addOperation<SelectorPart>('toSelector', {
		CallSelector(_dot: Node, name: Node, args: Node) {
			return { args: toArgs(args), line: lineOf(this), name: name.sourceString }
		},
		MemberSelector(_dot: Node, name: Node) {
			return { line: lineOf(this), name: name.sourceString }
		},
	})

	semantics.addOperation<Expression[]>('toArgs', {
		Arguments(_open: Node, list: Node, _close: Node) {
			return list.asIteration().children.map((e: Node): Expression => e['toExpr']())
		},
	})

	return semantics
}

/**
 * Parse `source` into a tree, declaring and resolving names in `symbols` as
 * they appear.
 *
 * A syntax error comes back as a failed result. Scope errors are thrown.
 *
 * @throws {RedeclarationError} A name declared twice in one frame
 * @throws {UseBeforeDeclarationError} A name read or assigned with no declaration in scope
 */
export function parse(source: string, symbols: SymbolTable): ParseResult {
	const matchResult = match(source, 'Program')

	if (matchResult.failed()) {
		const { line, column, detail } = describeFailure(matchResult)
		return {
			diagnostic: createDiagnostic('JLPARSE001', line, { detail }, column),
			succeeded: false,
		}
	}

	const program: ProgramNode = createTreeSemantics(symbols)(matchResult)['toProgram']()
	return { program, succeeded: true }
}
