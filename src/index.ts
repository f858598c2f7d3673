// Main exports for the Novella compiler analysis stage

export { Analyzer, analyzeProgram, checkTopLevelItems } from './analysis/analyzer';
export type { AnalyzerOptions } from './analysis/analyzer';
export { resolveTypes, resolveTypeSpecifier, defineStruct } from './analysis/type-resolver';
export type { TypeResolutionContext } from './analysis/type-resolver';
export { registerDeclarations, registerFunction, registerGlobal, collectFunctionVariables } from './analysis/declaration-registrar';
export { Scope } from './analysis/scope';
export type { LocalBinding, ResolvedVariable, FunctionFrame } from './analysis/scope';
export { analyzeExpression, binaryResultType } from './analysis/expression-analyzer';
export { simplify, isLiteral } from './analysis/constant-folding';
export { isAssignable, checkType, coerceToType } from './analysis/type-checker';
export { analyzeBlock, analyzeStatement } from './analysis/statement-analyzer';
export { visitBlock, visitBlockItem, DeclarationVisitor } from './analysis/traversal';
export type { BlockItemVisitor, ExpressionSite, ExpressionRole } from './analysis/traversal';
export { BytecodeObject, DEFAULT_OBJECT_VERSION } from './object-model';
export type { Variable, Structure, FunctionRecord, InitialValue, BytecodeObjectOptions } from './object-model';
export { logger, Logger, LogLevel } from './logger';
export * from './type-utils';
export * from './ast-factory';
export * from './types';
