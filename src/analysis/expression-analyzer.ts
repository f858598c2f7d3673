// Bottom-up type derivation for expressions

import { InternalError, ResolutionError, TypeCheckError } from '../types';
import type {
  AssignmentExpression, AssignmentOperator, BinaryExpression, BinaryOperator, CallExpression, CastExpression,
  ConditionalExpression, Expression, MemberExpression, Type, UnaryExpression
} from '../types';
import {
  commonTypes, createPrimitiveType, getCommonNumericType, isFloatType, isIntType, isNumericType, isStringType,
  isTypeEqual, typeToString
} from '../type-utils';
import { simplify } from './constant-folding';
import { coerceToType, isAssignable } from './type-checker';
import type { Scope } from './scope';

const INT_MIN = -2147483648;
const INT_MAX = 2147483647;

const compoundOperators: Record<Exclude<AssignmentOperator, '='>, BinaryOperator> = {
  '+=': '+',
  '-=': '-',
  '*=': '*',
  '/=': '/',
  '%=': '%',
  '<<=': '<<',
  '>>=': '>>',
  '&=': '&',
  '^=': '^',
  '|=': '|'
};

/**
 * Derives the type of `expr` and returns its folded equivalent.
 * Absent expressions (an omitted loop test, for instance) pass through.
 */
export function analyzeExpression(scope: Scope, expr: Expression): Expression;
export function analyzeExpression(scope: Scope, expr: Expression | undefined): Expression | undefined;
export function analyzeExpression(scope: Scope, expr: Expression | undefined): Expression | undefined {
  if (!expr) {
    return expr;
  }
  deriveTypes(scope, expr);
  return simplify(expr);
}

export function deriveTypes(scope: Scope, expr: Expression): Type {
  expr.inferredType = deriveExpressionType(scope, expr);
  return expr.inferredType;
}

function deriveExpressionType(scope: Scope, expr: Expression): Type {
  switch (expr.kind) {
    case 'int':
      if (!Number.isInteger(expr.value) || expr.value < INT_MIN || expr.value > INT_MAX) {
        throw new TypeCheckError(`Integer literal out of range: ${expr.value}`, expr.location);
      }
      return commonTypes.int;
    case 'float':
      // Floats are single precision at run time
      expr.value = Math.fround(expr.value);
      return commonTypes.float;
    case 'string':
      return commonTypes.string;
    case 'identifier': {
      const resolved = scope.lookup(expr.name);
      if (!resolved) {
        throw new ResolutionError(`Undefined variable '${expr.name}'`, expr.location);
      }
      expr.binding = resolved.kind === 'local'
        ? { kind: 'local', varNo: resolved.varNo }
        : { kind: 'global', varNo: resolved.varNo };
      return resolved.variable.type;
    }
    case 'unary':
      return deriveUnary(scope, expr);
    case 'binary':
      return deriveBinary(scope, expr);
    case 'assign':
      return deriveAssignment(scope, expr);
    case 'conditional':
      return deriveConditional(scope, expr);
    case 'call':
      return deriveCall(scope, expr);
    case 'cast':
      return deriveCast(scope, expr);
    case 'member':
      return deriveMember(scope, expr);
    default: {
      const unknown: never = expr;
      throw new InternalError(`unknown expression kind: ${JSON.stringify(unknown)}`);
    }
  }
}

export function isLValue(expr: Expression): boolean {
  return expr.kind === 'identifier' || expr.kind === 'member';
}

function deriveUnary(scope: Scope, expr: UnaryExpression): Type {
  const operandType = deriveTypes(scope, expr.operand);
  const invalid = () =>
    new TypeCheckError(`Invalid operand type '${typeToString(operandType)}' for unary '${expr.operator}'`, expr.location);

  switch (expr.operator) {
    case '+':
    case '-':
      if (!isNumericType(operandType)) throw invalid();
      return operandType;
    case '~':
      if (!isIntType(operandType)) throw invalid();
      return commonTypes.int;
    case '!':
      if (!isNumericType(operandType)) throw invalid();
      return commonTypes.int;
    case '++':
    case '--':
      if (!isLValue(expr.operand)) {
        throw new TypeCheckError(`Operand of '${expr.operator}' is not assignable`, expr.location);
      }
      if (!isNumericType(operandType)) throw invalid();
      return operandType;
  }
}

/**
 * Result type of a binary operator, or undefined when the operand types are
 * not accepted.
 */
export function binaryResultType(operator: BinaryOperator, left: Type, right: Type): Type | undefined {
  const bothNumeric = isNumericType(left) && isNumericType(right);
  const bothStrings = isStringType(left) && isStringType(right);
  switch (operator) {
    case ',':
      return right;
    case '+':
      if (bothStrings) return commonTypes.string;
      return bothNumeric ? getCommonNumericType(left, right) : undefined;
    case '-':
    case '*':
    case '/':
      return bothNumeric ? getCommonNumericType(left, right) : undefined;
    case '%':
    case '<<':
    case '>>':
    case '&':
    case '^':
    case '|':
      return isIntType(left) && isIntType(right) ? commonTypes.int : undefined;
    case '<':
    case '>':
    case '<=':
    case '>=':
    case '==':
    case '!=':
      return bothNumeric || bothStrings ? commonTypes.int : undefined;
    case '&&':
    case '||':
      return bothNumeric ? commonTypes.int : undefined;
  }
}

// Operators whose int operand is widened when the other side is float
function promotesOperands(operator: BinaryOperator): boolean {
  return operator !== ',' && operator !== '&&' && operator !== '||';
}

function deriveBinary(scope: Scope, expr: BinaryExpression): Type {
  const leftType = deriveTypes(scope, expr.left);
  const rightType = deriveTypes(scope, expr.right);
  const result = binaryResultType(expr.operator, leftType, rightType);
  if (!result) {
    throw new TypeCheckError(
      `Invalid operand types '${typeToString(leftType)}' and '${typeToString(rightType)}' for binary '${expr.operator}'`,
      expr.location
    );
  }
  if (promotesOperands(expr.operator) && (isFloatType(leftType) || isFloatType(rightType))) {
    expr.left = coerceToType(expr.left, commonTypes.float);
    expr.right = coerceToType(expr.right, commonTypes.float);
  }
  return result;
}

function deriveAssignment(scope: Scope, expr: AssignmentExpression): Type {
  const leftType = deriveTypes(scope, expr.left);
  if (!isLValue(expr.left)) {
    throw new TypeCheckError('Left side of assignment is not assignable', expr.location);
  }
  const rightType = deriveTypes(scope, expr.right);

  if (expr.operator !== '=') {
    const operator = compoundOperators[expr.operator];
    const result = binaryResultType(operator, leftType, rightType);
    if (!result || !isAssignable(result, leftType)) {
      throw new TypeCheckError(
        `Invalid operand types '${typeToString(leftType)}' and '${typeToString(rightType)}' for '${expr.operator}'`,
        expr.location
      );
    }
    if (isFloatType(leftType)) {
      expr.right = coerceToType(expr.right, leftType, `'${expr.operator}'`);
    }
    return leftType;
  }

  expr.right = coerceToType(expr.right, leftType);
  return leftType;
}

function deriveConditional(scope: Scope, expr: ConditionalExpression): Type {
  const testType = deriveTypes(scope, expr.test);
  if (!isNumericType(testType)) {
    throw new TypeCheckError(`Condition must be numeric, got '${typeToString(testType)}'`, expr.test.location);
  }
  const consequentType = deriveTypes(scope, expr.consequent);
  const alternativeType = deriveTypes(scope, expr.alternative);
  if (isTypeEqual(consequentType, alternativeType)) {
    return consequentType;
  }
  if (isNumericType(consequentType) && isNumericType(alternativeType)) {
    expr.consequent = coerceToType(expr.consequent, commonTypes.float);
    expr.alternative = coerceToType(expr.alternative, commonTypes.float);
    return commonTypes.float;
  }
  throw new TypeCheckError(
    `Incompatible branch types '${typeToString(consequentType)}' and '${typeToString(alternativeType)}' in conditional expression`,
    expr.location
  );
}

function deriveCall(scope: Scope, expr: CallExpression): Type {
  const funcNo = scope.object.getFunctionNo(expr.callee);
  if (funcNo === undefined) {
    throw new ResolutionError(`Undefined function '${expr.callee}'`, expr.location);
  }
  const fn = scope.object.getFunction(funcNo);
  if (expr.arguments.length !== fn.nrArgs) {
    throw new TypeCheckError(
      `Function '${fn.name}' expects ${fn.nrArgs} argument(s), got ${expr.arguments.length}`,
      expr.location
    );
  }
  expr.arguments = expr.arguments.map((arg, i) => {
    deriveTypes(scope, arg);
    return coerceToType(arg, fn.variables[i].type, `argument ${i + 1} of '${fn.name}'`);
  });
  expr.funcNo = funcNo;
  return fn.returnType;
}

function deriveCast(scope: Scope, expr: CastExpression): Type {
  const sourceType = deriveTypes(scope, expr.expression);
  const targetType = createPrimitiveType(expr.targetType);
  // Numbers convert to anything; strings only to themselves
  if (!isTypeEqual(sourceType, targetType) && !isNumericType(sourceType)) {
    throw new TypeCheckError(`Cannot cast '${typeToString(sourceType)}' to '${expr.targetType}'`, expr.location);
  }
  return targetType;
}

function deriveMember(scope: Scope, expr: MemberExpression): Type {
  const objectType = deriveTypes(scope, expr.object);
  if (objectType.kind !== 'struct') {
    throw new TypeCheckError(`Member access on non-struct type '${typeToString(objectType)}'`, expr.location);
  }
  const struct = scope.object.getStruct(objectType.structNo);
  const memberNo = struct.members.findIndex(member => member.name === expr.member);
  if (memberNo < 0) {
    throw new ResolutionError(`Struct '${struct.name}' has no member '${expr.member}'`, expr.location);
  }
  expr.memberNo = memberNo;
  return struct.members[memberNo].type;
}
