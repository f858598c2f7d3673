// Core type definitions for the Novella compiler

export interface Position {
  line: number;
  column: number;
}

export interface SourceLocation {
  start: Position;
  end: Position;
  filename?: string;
}

export function formatLocation(location?: SourceLocation): string {
  if (!location) {
    return '';
  }
  const file = location.filename ?? 'input';
  return `${file}:${location.start.line}:${location.start.column}`;
}

// Errors. The analysis stage is fail-fast: the first error thrown aborts the pass.

export type SemanticErrorCategory = 'unsupported' | 'redefinition' | 'resolution' | 'type';

export class SemanticError extends Error {
  constructor(message: string, public readonly category: SemanticErrorCategory, public readonly location?: SourceLocation) {
    super(location ? `${formatLocation(location)}: ${message}` : message);
    this.name = 'SemanticError';
  }
}

export class UnsupportedError extends SemanticError {
  constructor(message: string, location?: SourceLocation) {
    super(message, 'unsupported', location);
    this.name = 'UnsupportedError';
  }
}

export class RedefinitionError extends SemanticError {
  constructor(message: string, location?: SourceLocation) {
    super(message, 'redefinition', location);
    this.name = 'RedefinitionError';
  }
}

export class ResolutionError extends SemanticError {
  constructor(message: string, location?: SourceLocation) {
    super(message, 'resolution', location);
    this.name = 'ResolutionError';
  }
}

export class TypeCheckError extends SemanticError {
  constructor(message: string, location?: SourceLocation) {
    super(message, 'type', location);
    this.name = 'TypeCheckError';
  }
}

// Raised when a tree or table violates an invariant that an earlier stage
// (or an earlier pass) is responsible for.
export class InternalError extends Error {
  constructor(message: string) {
    super(`Internal error: ${message}`);
    this.name = 'InternalError';
  }
}

// Value types, as stored in the bytecode object and attached to expressions

export type PrimitiveType = 'void' | 'int' | 'float' | 'string';

export interface PrimitiveTypeNode {
  kind: 'primitive';
  type: PrimitiveType;
}

export interface StructTypeNode {
  kind: 'struct';
  structNo: number;
  name: string;
}

export type Type = PrimitiveTypeNode | StructTypeNode;

// AST Node base
export interface ASTNode {
  kind: string;
  location?: SourceLocation;
}

// Type specifiers as written in the source. The resolver rewrites `typedef`
// specifiers to `struct` and fills in `structNo`.

export type TypeSpecifierKind = 'void' | 'int' | 'float' | 'string' | 'struct' | 'enum' | 'typedef';

export interface TypeSpecifier {
  kind: TypeSpecifierKind;
  name?: string;
  definition?: Block;
  structNo?: number;
  location?: SourceLocation;
}

// Expressions

export type Expression =
  | IntegerLiteral
  | FloatLiteral
  | StringLiteral
  | Identifier
  | UnaryExpression
  | BinaryExpression
  | AssignmentExpression
  | ConditionalExpression
  | CallExpression
  | CastExpression
  | MemberExpression;

export interface ExpressionNode extends ASTNode {
  inferredType?: Type;
}

export interface IntegerLiteral extends ExpressionNode {
  kind: 'int';
  value: number;
}

export interface FloatLiteral extends ExpressionNode {
  kind: 'float';
  value: number;
}

export interface StringLiteral extends ExpressionNode {
  kind: 'string';
  value: string;
}

export type Literal = IntegerLiteral | FloatLiteral | StringLiteral;

export type VariableBinding =
  | { kind: 'local'; varNo: number }
  | { kind: 'global'; varNo: number };

export interface Identifier extends ExpressionNode {
  kind: 'identifier';
  name: string;
  binding?: VariableBinding;
}

export type UnaryOperator = '+' | '-' | '~' | '!' | '++' | '--';

export interface UnaryExpression extends ExpressionNode {
  kind: 'unary';
  operator: UnaryOperator;
  operand: Expression;
  // Only meaningful for ++ and --
  prefix: boolean;
}

export type ArithmeticOperator = '*' | '/' | '%' | '+' | '-';
export type BitwiseOperator = '<<' | '>>' | '&' | '^' | '|';
export type ComparisonOperator = '<' | '>' | '<=' | '>=' | '==' | '!=';
export type LogicalOperator = '&&' | '||';
export type BinaryOperator = ArithmeticOperator | BitwiseOperator | ComparisonOperator | LogicalOperator | ',';

export interface BinaryExpression extends ExpressionNode {
  kind: 'binary';
  operator: BinaryOperator;
  left: Expression;
  right: Expression;
}

export type AssignmentOperator = '=' | '+=' | '-=' | '*=' | '/=' | '%=' | '<<=' | '>>=' | '&=' | '^=' | '|=';

export interface AssignmentExpression extends ExpressionNode {
  kind: 'assign';
  operator: AssignmentOperator;
  left: Expression;
  right: Expression;
}

export interface ConditionalExpression extends ExpressionNode {
  kind: 'conditional';
  test: Expression;
  consequent: Expression;
  alternative: Expression;
}

export interface CallExpression extends ExpressionNode {
  kind: 'call';
  callee: string;
  arguments: Expression[];
  funcNo?: number;
}

export type CastTarget = 'int' | 'float' | 'string';

export interface CastExpression extends ExpressionNode {
  kind: 'cast';
  targetType: CastTarget;
  expression: Expression;
}

export interface MemberExpression extends ExpressionNode {
  kind: 'member';
  object: Expression;
  member: string;
  memberNo?: number;
}

// Declarations

export interface Block {
  items: BlockItem[];
  location?: SourceLocation;
}

export interface Declaration extends ASTNode {
  kind: 'declaration';
  // Absent for struct-only declarations such as `struct Foo { int a; };`
  name?: string;
  type: TypeSpecifier;
  initializer?: Expression;
  // Local slot inside a function, or global slot at the top level
  varNo?: number;
}

export interface FunctionDeclaration extends ASTNode {
  kind: 'function';
  name: string;
  type: TypeSpecifier;
  params: Declaration[];
  body: Block;
  funcNo?: number;
}

export interface TypedefDeclaration extends ASTNode {
  kind: 'typedef';
  name: string;
  type: TypeSpecifier;
}

// Statements

export interface LabeledStatement extends ASTNode {
  kind: 'labeled';
  label: string;
  statement: BlockItem;
}

export interface CompoundStatement extends ASTNode {
  kind: 'compound';
  block: Block;
}

export interface ExpressionStatement extends ASTNode {
  kind: 'expression';
  // Absent for the empty statement `;`
  expression?: Expression;
}

export interface IfStatement extends ASTNode {
  kind: 'if';
  test: Expression;
  consequent: BlockItem;
  alternative?: BlockItem;
}

export interface SwitchStatement extends ASTNode {
  kind: 'switch';
  discriminant: Expression;
  body: Block;
}

export interface WhileStatement extends ASTNode {
  kind: 'while';
  test: Expression;
  body: BlockItem;
}

export interface DoWhileStatement extends ASTNode {
  kind: 'doWhile';
  test: Expression;
  body: BlockItem;
}

export interface ForStatement extends ASTNode {
  kind: 'for';
  init: Block;
  test?: Expression;
  update?: Expression;
  body: BlockItem;
}

export interface ReturnStatement extends ASTNode {
  kind: 'return';
  argument?: Expression;
}

export interface CaseStatement extends ASTNode {
  kind: 'case';
  test: Expression;
  statement: BlockItem;
}

export interface DefaultStatement extends ASTNode {
  kind: 'default';
  statement: BlockItem;
}

export interface GotoStatement extends ASTNode {
  kind: 'goto';
  label: string;
}

export interface ContinueStatement extends ASTNode {
  kind: 'continue';
}

export interface BreakStatement extends ASTNode {
  kind: 'break';
}

export type Statement =
  | LabeledStatement
  | CompoundStatement
  | ExpressionStatement
  | IfStatement
  | SwitchStatement
  | WhileStatement
  | DoWhileStatement
  | ForStatement
  | ReturnStatement
  | CaseStatement
  | DefaultStatement
  | GotoStatement
  | ContinueStatement
  | BreakStatement;

export type BlockItem = Declaration | FunctionDeclaration | TypedefDeclaration | Statement;
