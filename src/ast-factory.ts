// Helper functions for building syntax trees, used by front ends and tests

import type {
  AssignmentExpression, AssignmentOperator, BinaryExpression, BinaryOperator, Block, BlockItem, BreakStatement,
  CallExpression, CaseStatement, CastExpression, CastTarget, CompoundStatement, ConditionalExpression,
  ContinueStatement, Declaration, DefaultStatement, DoWhileStatement, Expression, ExpressionStatement, FloatLiteral,
  ForStatement, FunctionDeclaration, GotoStatement, Identifier, IfStatement, IntegerLiteral, LabeledStatement,
  MemberExpression, ReturnStatement, SourceLocation, StringLiteral, SwitchStatement, TypedefDeclaration,
  TypeSpecifier, TypeSpecifierKind, UnaryExpression, UnaryOperator, WhileStatement
} from './types';

// Type specifiers

export function createTypeSpecifier(kind: TypeSpecifierKind, name?: string, location?: SourceLocation): TypeSpecifier {
  return { kind, name, location };
}

export function createStructDefinition(name: string | undefined, members: Declaration[], location?: SourceLocation): TypeSpecifier {
  return { kind: 'struct', name, definition: createBlock(members), location };
}

// Expressions

export function createIntLiteral(value: number, location?: SourceLocation): IntegerLiteral {
  return { kind: 'int', value, location };
}

export function createFloatLiteral(value: number, location?: SourceLocation): FloatLiteral {
  return { kind: 'float', value, location };
}

export function createStringLiteral(value: string, location?: SourceLocation): StringLiteral {
  return { kind: 'string', value, location };
}

export function createIdentifier(name: string, location?: SourceLocation): Identifier {
  return { kind: 'identifier', name, location };
}

export function createUnary(operator: UnaryOperator, operand: Expression, prefix = true, location?: SourceLocation): UnaryExpression {
  return { kind: 'unary', operator, operand, prefix, location };
}

export function createBinary(operator: BinaryOperator, left: Expression, right: Expression, location?: SourceLocation): BinaryExpression {
  return { kind: 'binary', operator, left, right, location };
}

export function createAssignment(operator: AssignmentOperator, left: Expression, right: Expression, location?: SourceLocation): AssignmentExpression {
  return { kind: 'assign', operator, left, right, location };
}

export function createConditional(test: Expression, consequent: Expression, alternative: Expression, location?: SourceLocation): ConditionalExpression {
  return { kind: 'conditional', test, consequent, alternative, location };
}

export function createCall(callee: string, args: Expression[], location?: SourceLocation): CallExpression {
  return { kind: 'call', callee, arguments: args, location };
}

export function createCast(targetType: CastTarget, expression: Expression, location?: SourceLocation): CastExpression {
  return { kind: 'cast', targetType, expression, location };
}

export function createMember(object: Expression, member: string, location?: SourceLocation): MemberExpression {
  return { kind: 'member', object, member, location };
}

// Declarations

export function createDeclaration(type: TypeSpecifier, name?: string, initializer?: Expression, location?: SourceLocation): Declaration {
  return { kind: 'declaration', type, name, initializer, location };
}

export function createFunctionDeclaration(
  type: TypeSpecifier,
  name: string,
  params: Declaration[],
  body: BlockItem[],
  location?: SourceLocation
): FunctionDeclaration {
  return { kind: 'function', type, name, params, body: createBlock(body), location };
}

export function createTypedef(name: string, type: TypeSpecifier, location?: SourceLocation): TypedefDeclaration {
  return { kind: 'typedef', name, type, location };
}

// Statements

export function createBlock(items: BlockItem[], location?: SourceLocation): Block {
  return { items, location };
}

export function createCompound(items: BlockItem[], location?: SourceLocation): CompoundStatement {
  return { kind: 'compound', block: createBlock(items), location };
}

export function createExpressionStatement(expression?: Expression, location?: SourceLocation): ExpressionStatement {
  return { kind: 'expression', expression, location };
}

export function createIf(test: Expression, consequent: BlockItem, alternative?: BlockItem, location?: SourceLocation): IfStatement {
  return { kind: 'if', test, consequent, alternative, location };
}

export function createSwitch(discriminant: Expression, body: BlockItem[], location?: SourceLocation): SwitchStatement {
  return { kind: 'switch', discriminant, body: createBlock(body), location };
}

export function createWhile(test: Expression, body: BlockItem, location?: SourceLocation): WhileStatement {
  return { kind: 'while', test, body, location };
}

export function createDoWhile(body: BlockItem, test: Expression, location?: SourceLocation): DoWhileStatement {
  return { kind: 'doWhile', test, body, location };
}

export function createFor(
  init: BlockItem[],
  test: Expression | undefined,
  update: Expression | undefined,
  body: BlockItem,
  location?: SourceLocation
): ForStatement {
  return { kind: 'for', init: createBlock(init), test, update, body, location };
}

export function createReturn(argument?: Expression, location?: SourceLocation): ReturnStatement {
  return { kind: 'return', argument, location };
}

export function createCase(test: Expression, statement: BlockItem, location?: SourceLocation): CaseStatement {
  return { kind: 'case', test, statement, location };
}

export function createDefault(statement: BlockItem, location?: SourceLocation): DefaultStatement {
  return { kind: 'default', statement, location };
}

export function createLabeled(label: string, statement: BlockItem, location?: SourceLocation): LabeledStatement {
  return { kind: 'labeled', label, statement, location };
}

export function createGoto(label: string, location?: SourceLocation): GotoStatement {
  return { kind: 'goto', label, location };
}

export function createContinue(location?: SourceLocation): ContinueStatement {
  return { kind: 'continue', location };
}

export function createBreak(location?: SourceLocation): BreakStatement {
  return { kind: 'break', location };
}
