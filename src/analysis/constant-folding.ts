// Constant folding over typed expressions.
//
// Expects types to have been derived; every node produced here carries its
// inferred type. Folding an already folded tree returns an equivalent tree.

import type {
  BinaryExpression, CastExpression, ConditionalExpression, Expression, FloatLiteral, IntegerLiteral, Literal,
  SourceLocation, StringLiteral, UnaryExpression
} from '../types';
import { commonTypes } from '../type-utils';

export function isLiteral(expr: Expression): expr is Literal {
  return expr.kind === 'int' || expr.kind === 'float' || expr.kind === 'string';
}

function isNumericLiteral(expr: Expression): expr is IntegerLiteral | FloatLiteral {
  return expr.kind === 'int' || expr.kind === 'float';
}

export function intConstant(value: number, location?: SourceLocation): IntegerLiteral {
  return { kind: 'int', value: value | 0, location, inferredType: commonTypes.int };
}

export function floatConstant(value: number, location?: SourceLocation): FloatLiteral {
  return { kind: 'float', value: Math.fround(value), location, inferredType: commonTypes.float };
}

export function stringConstant(value: string, location?: SourceLocation): StringLiteral {
  return { kind: 'string', value, location, inferredType: commonTypes.string };
}

function boolConstant(value: boolean, location?: SourceLocation): IntegerLiteral {
  return intConstant(value ? 1 : 0, location);
}

export function simplify(expr: Expression): Expression {
  switch (expr.kind) {
    case 'int':
    case 'float':
    case 'string':
    case 'identifier':
      return expr;
    case 'unary':
      expr.operand = simplify(expr.operand);
      return foldUnary(expr);
    case 'binary':
      expr.left = simplify(expr.left);
      expr.right = simplify(expr.right);
      return foldBinary(expr);
    case 'assign':
      expr.left = simplify(expr.left);
      expr.right = simplify(expr.right);
      return expr;
    case 'conditional':
      expr.test = simplify(expr.test);
      expr.consequent = simplify(expr.consequent);
      expr.alternative = simplify(expr.alternative);
      return foldConditional(expr);
    case 'call':
      expr.arguments = expr.arguments.map(simplify);
      return expr;
    case 'cast':
      expr.expression = simplify(expr.expression);
      return foldCast(expr);
    case 'member':
      expr.object = simplify(expr.object);
      return expr;
  }
}

function foldUnary(expr: UnaryExpression): Expression {
  const operand = expr.operand;
  if (!isNumericLiteral(operand)) {
    return expr;
  }
  switch (expr.operator) {
    case '+':
      return operand;
    case '-':
      return operand.kind === 'int'
        ? intConstant(-operand.value, expr.location)
        : floatConstant(-operand.value, expr.location);
    case '~':
      return operand.kind === 'int' ? intConstant(~operand.value, expr.location) : expr;
    case '!':
      return boolConstant(operand.value === 0, expr.location);
    case '++':
    case '--':
      return expr;
  }
}

function foldBinary(expr: BinaryExpression): Expression {
  const { left, right, location } = expr;

  // A constant left operand decides these without looking at the right one
  if (isNumericLiteral(left)) {
    if (expr.operator === '&&' && left.value === 0) {
      return boolConstant(false, location);
    }
    if (expr.operator === '||' && left.value !== 0) {
      return boolConstant(true, location);
    }
  }
  if (expr.operator === ',' && isLiteral(left)) {
    return right;
  }

  if (left.kind === 'int' && right.kind === 'int') {
    return foldIntBinary(expr, left.value, right.value);
  }
  if (isNumericLiteral(left) && isNumericLiteral(right)) {
    return foldFloatBinary(expr, left.value, right.value);
  }
  if (left.kind === 'string' && right.kind === 'string') {
    return foldStringBinary(expr, left.value, right.value);
  }
  return expr;
}

function foldIntBinary(expr: BinaryExpression, a: number, b: number): Expression {
  const location = expr.location;
  switch (expr.operator) {
    case '+': return intConstant(a + b, location);
    case '-': return intConstant(a - b, location);
    case '*': return intConstant(Math.imul(a, b), location);
    // Division by zero is left for the runtime to report
    case '/': return b === 0 ? expr : intConstant(Math.trunc(a / b), location);
    case '%': return b === 0 ? expr : intConstant(a % b, location);
    case '<<': return intConstant(a << (b & 31), location);
    case '>>': return intConstant(a >> (b & 31), location);
    case '&': return intConstant(a & b, location);
    case '^': return intConstant(a ^ b, location);
    case '|': return intConstant(a | b, location);
    case '&&': return boolConstant(a !== 0 && b !== 0, location);
    case '||': return boolConstant(a !== 0 || b !== 0, location);
    case ',': return expr.right;
    default: return foldComparison(expr, a < b, a > b, a === b);
  }
}

function foldFloatBinary(expr: BinaryExpression, a: number, b: number): Expression {
  const location = expr.location;
  switch (expr.operator) {
    case '+': return floatConstant(a + b, location);
    case '-': return floatConstant(a - b, location);
    case '*': return floatConstant(a * b, location);
    case '/': return b === 0 ? expr : floatConstant(a / b, location);
    case '&&': return boolConstant(a !== 0 && b !== 0, location);
    case '||': return boolConstant(a !== 0 || b !== 0, location);
    default: return foldComparison(expr, a < b, a > b, a === b);
  }
}

// Ordering of strings depends on the runtime's text encoding, so only
// concatenation and equality are folded.
function foldStringBinary(expr: BinaryExpression, a: string, b: string): Expression {
  switch (expr.operator) {
    case '+': return stringConstant(a + b, expr.location);
    case '==': return boolConstant(a === b, expr.location);
    case '!=': return boolConstant(a !== b, expr.location);
    default: return expr;
  }
}

function foldComparison(expr: BinaryExpression, less: boolean, greater: boolean, equal: boolean): Expression {
  const location = expr.location;
  switch (expr.operator) {
    case '<': return boolConstant(less, location);
    case '>': return boolConstant(greater, location);
    case '<=': return boolConstant(less || equal, location);
    case '>=': return boolConstant(greater || equal, location);
    case '==': return boolConstant(equal, location);
    case '!=': return boolConstant(!equal, location);
    default: return expr;
  }
}

function foldConditional(expr: ConditionalExpression): Expression {
  if (!isNumericLiteral(expr.test)) {
    return expr;
  }
  return expr.test.value !== 0 ? expr.consequent : expr.alternative;
}

function foldCast(expr: CastExpression): Expression {
  const operand = expr.expression;
  if (operand.kind === expr.targetType) {
    return operand;
  }
  if (operand.inferredType?.kind === 'primitive' && operand.inferredType.type === expr.targetType) {
    return operand;
  }
  switch (operand.kind) {
    case 'int':
      if (expr.targetType === 'float') {
        return floatConstant(operand.value, expr.location);
      }
      return stringConstant(String(operand.value), expr.location);
    case 'float':
      // float -> string formatting is left to the runtime
      if (expr.targetType === 'int') {
        return intConstant(Math.trunc(operand.value), expr.location);
      }
      return expr;
    default:
      return expr;
  }
}
