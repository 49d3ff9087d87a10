/**
 * Scope phase: the symbol table the parser drives while it builds the tree.
 */

export { RedeclarationError, SemanticError, UseBeforeDeclarationError } from './errors.ts'
export { SymbolTable, type VariableInfo } from './symbol-table.ts'
