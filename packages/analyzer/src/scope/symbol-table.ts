/**
 * Scoped symbol table.
 *
 * A stack of frames, innermost last. Frame 0 is the global frame and is never
 * popped. The parser mutates the table while it builds the tree: frames are
 * pushed and popped in step with the source structure, and every declaration
 * and reference goes through `declare` / `markUsed` as it is recognized.
 *
 * The table also keeps the token log for the compilation unit.
 */

import type { TypeName } from '../core/nodes.ts'
import type { Token } from '../core/tokens.ts'
import { RedeclarationError, UseBeforeDeclarationError } from './errors.ts'

export interface VariableInfo {
	readonly name: string
	readonly type: TypeName
	/** Line of the declaration */
	readonly line: number
	used: boolean
	/** Depth of the frame the name was declared in (0 = global) */
	readonly scopeLevel: number
}

type Frame = Map<string, VariableInfo>

export class SymbolTable {
	private readonly tokens: Token[] = []
	private readonly frames: Frame[] = [new Map()]
	/** Every declaration in order, including ones whose frame has closed */
	private readonly declarations: VariableInfo[] = []

	// ===========================================================================
	// TOKENS
	// ===========================================================================

	addToken(token: Token): void {
		this.tokens.push(token)
	}

	getTokens(): readonly Token[] {
		return this.tokens
	}

	// ===========================================================================
	// SCOPES
	// ===========================================================================

	enterScope(): void {
		this.frames.push(new Map())
	}

	/**
	 * Pop the innermost frame. Does nothing when only the global frame is left,
	 * so an unbalanced exit goes unnoticed.
	 */
	exitScope(): void {
		if (this.frames.length > 1) {
			this.frames.pop()
		}
	}

	/** 0 while only the global frame is open. */
	getScopeLevel(): number {
		return this.frames.length - 1
	}

	// ===========================================================================
	// VARIABLES
	// ===========================================================================

	/**
	 * Declare a name in the innermost frame.
	 * Shadowing a name from an outer frame is allowed.
	 *
	 * @throws {RedeclarationError} If the innermost frame already holds the name
	 */
	declare(name: string, type: TypeName, line: number): VariableInfo {
		const frame = this.currentFrame()
		const existing = frame.get(name)
		if (existing !== undefined) {
			throw new RedeclarationError(name, line, existing.line)
		}

		const info: VariableInfo = { line, name, scopeLevel: this.getScopeLevel(), type, used: false }
		frame.set(name, info)
		this.declarations.push(info)
		return info
	}

	/** Resolve a name, innermost frame first. */
	lookup(name: string): VariableInfo | null {
		for (let i = this.frames.length - 1; i >= 0; i--) {
			const info = this.frames[i]?.get(name)
			if (info !== undefined) return info
		}
		return null
	}

	isDeclared(name: string): boolean {
		return this.lookup(name) !== null
	}

	existsInCurrentScope(name: string): boolean {
		return this.currentFrame().has(name)
	}

	/**
	 * Record a read of `name`. `line` is 0 when the caller has no position.
	 *
	 * @throws {UseBeforeDeclarationError} If no open frame declares the name
	 */
	markUsed(name: string, line = 0): VariableInfo {
		const info = this.lookup(name)
		if (info === null) {
			throw new UseBeforeDeclarationError(name, line)
		}
		info.used = true
		return info
	}

	/**
	 * Unused variables in the frames open right now.
	 * Names from frames that were already popped are not reported.
	 */
	getUnusedVariables(): VariableInfo[] {
		const unused: VariableInfo[] = []
		for (const frame of this.frames) {
			for (const info of frame.values()) {
				if (!info.used) unused.push(info)
			}
		}
		return unused
	}

	/** Every variable declared so far, in declaration order. */
	getDeclaredVariables(): readonly VariableInfo[] {
		return this.declarations
	}

	/** Drop tokens, declarations and all frames but a fresh global one. */
	reset(): void {
		this.tokens.length = 0
		this.declarations.length = 0
		this.frames.length = 0
		this.frames.push(new Map())
	}

	private currentFrame(): Frame {
		const frame = this.frames.at(-1)
		if (frame === undefined) {
			throw new Error('Scope stack is empty')
		}
		return frame
	}
}
