import { InternalError, TypeCheckError } from '../types';
import type { CastExpression, Expression, Type } from '../types';
import { commonTypes, isFloatType, isIntType, isTypeEqual, isVoidType, typeToString } from '../type-utils';
import { simplify } from './constant-folding';

// Identical types, or an int widened to float. Nothing converts to or from void.
export function isAssignable(source: Type, target: Type): boolean {
  if (isVoidType(source) || isVoidType(target)) {
    return false;
  }
  if (isTypeEqual(source, target)) {
    return true;
  }
  return isIntType(source) && isFloatType(target);
}

export function getInferredType(expr: Expression): Type {
  if (!expr.inferredType) {
    throw new InternalError(`type of ${expr.kind} expression requested before derivation`);
  }
  return expr.inferredType;
}

export function checkType(expr: Expression, target: Type, context = 'assignment'): void {
  const source = getInferredType(expr);
  if (!isAssignable(source, target)) {
    throw new TypeCheckError(
      `Type mismatch in ${context}: cannot convert '${typeToString(source)}' to '${typeToString(target)}'`,
      expr.location
    );
  }
}

/**
 * Checks `expr` against `target` and makes an implicit int -> float
 * conversion explicit, folding it when the operand is constant.
 */
export function coerceToType(expr: Expression, target: Type, context?: string): Expression {
  checkType(expr, target, context);
  if (isIntType(expr.inferredType) && isFloatType(target)) {
    const cast: CastExpression = {
      kind: 'cast',
      targetType: 'float',
      expression: expr,
      location: expr.location,
      inferredType: commonTypes.float
    };
    return simplify(cast);
  }
  return expr;
}
