// Pass 3: scope-aware type checking, folding and global initial values

import { InternalError, TypeCheckError, UnsupportedError } from '../types';
import type {
  Block, BlockItem, Declaration, Expression, FunctionDeclaration, ReturnStatement, Statement, TypedefDeclaration
} from '../types';
import type { InitialValue } from '../object-model';
import { isIntType, isNumericType, isStringType, isVoidType, typeToString } from '../type-utils';
import { logger } from '../logger';
import { visitBlock, visitBlockItem } from './traversal';
import type { BlockItemVisitor, ExpressionSite } from './traversal';
import { analyzeExpression } from './expression-analyzer';
import { coerceToType, getInferredType } from './type-checker';
import type { Scope } from './scope';

function requireFunctionScope(scope: Scope, stmt: Statement): void {
  if (!scope.frame) {
    throw new UnsupportedError(`Statement '${stmt.kind}' is not allowed outside of a function`, stmt.location);
  }
}

function toInitialValue(globalIndex: number, name: string, init: Expression): InitialValue {
  switch (init.kind) {
    case 'int':
      return { globalIndex, dataType: 'int', value: init.value };
    case 'float':
      return { globalIndex, dataType: 'float', value: init.value };
    case 'string':
      return { globalIndex, dataType: 'string', value: init.value };
    default:
      throw new TypeCheckError(`Initializer of global '${name}' is not constant`, init.location);
  }
}

export function analyzeGlobalDeclaration(scope: Scope, decl: Declaration): void {
  if (!decl.initializer || decl.name === undefined) {
    return;
  }
  if (decl.varNo === undefined) {
    throw new InternalError(`global '${decl.name}' was not registered`);
  }
  const global = scope.object.getGlobal(decl.varNo);
  const init = coerceToType(analyzeExpression(scope, decl.initializer), global.type, `initializer of '${decl.name}'`);
  decl.initializer = init;
  scope.object.addInitialValue(toInitialValue(decl.varNo, decl.name, init));
}

export function analyzeLocalDeclaration(scope: Scope, decl: Declaration): void {
  if (decl.name === undefined) {
    return;
  }
  // The initializer is analyzed before the name becomes visible
  const init = decl.initializer ? analyzeExpression(scope, decl.initializer) : undefined;
  const binding = scope.declareLocal(decl);
  if (init) {
    decl.initializer = coerceToType(init, binding.variable.type, `initializer of '${decl.name}'`);
  }
}

export function analyzeFunction(scope: Scope, decl: FunctionDeclaration): void {
  const functionScope = scope.enterFunction(decl);
  analyzeBlock(functionScope, decl.body);
  functionScope.finishFunction();
  logger.debug(`[Analyzer] analyzed function ${decl.name}`);
}

function checkExpressionSite(expr: Expression, site: ExpressionSite): void {
  const type = getInferredType(expr);
  switch (site.role) {
    case 'condition':
    case 'forTest':
      if (!isNumericType(type)) {
        throw new TypeCheckError(`Condition must be numeric, got '${typeToString(type)}'`, expr.location);
      }
      break;
    case 'discriminant':
      if (!isIntType(type) && !isStringType(type)) {
        throw new TypeCheckError(`Switch expression must be int or string, got '${typeToString(type)}'`, expr.location);
      }
      break;
    case 'caseLabel':
      if (expr.kind !== 'int' && expr.kind !== 'string') {
        throw new TypeCheckError('Case label must be a constant int or string', expr.location);
      }
      break;
    case 'statement':
    case 'forUpdate':
    case 'return':
      break;
  }
}

class AnalysisVisitor implements BlockItemVisitor<Scope> {
  declaration(scope: Scope, decl: Declaration): void {
    if (scope.isGlobal) {
      analyzeGlobalDeclaration(scope, decl);
    } else {
      analyzeLocalDeclaration(scope, decl);
    }
  }

  functionDeclaration(scope: Scope, decl: FunctionDeclaration): void {
    if (!scope.isGlobal) {
      throw new UnsupportedError(`Nested functions not supported: '${decl.name}'`, decl.location);
    }
    analyzeFunction(scope, decl);
  }

  typedef(_scope: Scope, _decl: TypedefDeclaration): void {
    // resolved in pass 1
  }

  expression(scope: Scope, expr: Expression, site: ExpressionSite): Expression {
    requireFunctionScope(scope, site.statement);
    const result = analyzeExpression(scope, expr);
    checkExpressionSite(result, site);
    return result;
  }

  enterBlock(scope: Scope, owner: Statement): Scope {
    requireFunctionScope(scope, owner);
    return scope.createChild();
  }

  afterReturn(scope: Scope, stmt: ReturnStatement): void {
    const decl = scope.functionDeclaration;
    if (!decl || decl.funcNo === undefined) {
      throw new UnsupportedError('Return statement outside of function', stmt.location);
    }
    const returnType = scope.object.getFunction(decl.funcNo).returnType;
    if (stmt.argument) {
      if (isVoidType(returnType)) {
        throw new TypeCheckError(`Cannot return a value from void function '${decl.name}'`, stmt.location);
      }
      stmt.argument = coerceToType(stmt.argument, returnType, `return from '${decl.name}'`);
    } else if (!isVoidType(returnType)) {
      throw new TypeCheckError(`Function '${decl.name}' must return a value`, stmt.location);
    }
  }
}

const analysisVisitor = new AnalysisVisitor();

export function analyzeBlock(scope: Scope, block: Block): void {
  visitBlock(analysisVisitor, scope, block);
}

export function analyzeStatement(scope: Scope, item: BlockItem): void {
  visitBlockItem(analysisVisitor, scope, item);
}
