import { describe, it, expect } from 'vitest';
import { BytecodeObject } from '../src/object-model';
import { Scope } from '../src/analysis/scope';
import { analyzeExpression, binaryResultType } from '../src/analysis/expression-analyzer';
import {
  createAssignment, createBinary, createCall, createCast, createConditional, createFloatLiteral, createIdentifier,
  createIntLiteral, createMember, createStringLiteral, createUnary
} from '../src/ast-factory';
import { commonTypes, createStructType } from '../src/type-utils';
import { ResolutionError, TypeCheckError } from '../src/types';
import type { Expression } from '../src/types';

function createTestScope(): Scope {
  const object = new BytecodeObject();
  const point = object.addStruct('Point', [
    object.createVariable('x', commonTypes.int),
    object.createVariable('y', commonTypes.float)
  ]);
  object.addGlobal('count', commonTypes.int);
  object.addGlobal('name', commonTypes.string);
  object.addGlobal('ratio', commonTypes.float);
  object.addGlobal('p', createStructType(point, 'Point'));
  object.addFunction({
    name: 'add',
    returnType: commonTypes.float,
    nrArgs: 2,
    variables: [object.createVariable('a', commonTypes.float), object.createVariable('b', commonTypes.int)]
  });
  object.addFunction({ name: 'noop', returnType: commonTypes.void, nrArgs: 0, variables: [] });
  return Scope.global(object);
}

function analyze(expr: Expression): Expression {
  return analyzeExpression(createTestScope(), expr);
}

const id = createIdentifier;

describe('Expression analyzer', () => {
  describe('literals and identifiers', () => {
    it('should type literals', () => {
      expect(analyze(createIntLiteral(1)).inferredType).toEqual(commonTypes.int);
      expect(analyze(createFloatLiteral(1)).inferredType).toEqual(commonTypes.float);
      expect(analyze(createStringLiteral('s')).inferredType).toEqual(commonTypes.string);
    });

    it('should reject integer literals outside 32 bits', () => {
      expect(() => analyze(createIntLiteral(2147483648))).toThrow('Integer literal out of range: 2147483648');
      expect(() => analyze(createIntLiteral(1.5))).toThrow(TypeCheckError);
      expect(analyze(createIntLiteral(-2147483648)).inferredType).toEqual(commonTypes.int);
    });

    it('should bind identifiers to their global slot', () => {
      const result = analyze(id('name'));
      expect(result).toMatchObject({ kind: 'identifier', binding: { kind: 'global', varNo: 1 } });
      expect(result.inferredType).toEqual(commonTypes.string);
    });

    it('should reject undefined variables', () => {
      expect(() => analyze(id('nope'))).toThrow(ResolutionError);
      expect(() => analyze(id('nope'))).toThrow("Undefined variable 'nope'");
    });
  });

  describe('member access', () => {
    it('should resolve the member index and type', () => {
      const result = analyze(createMember(id('p'), 'y'));
      expect(result).toMatchObject({ kind: 'member', memberNo: 1 });
      expect(result.inferredType).toEqual(commonTypes.float);
    });

    it('should reject unknown members and non-struct objects', () => {
      expect(() => analyze(createMember(id('p'), 'z'))).toThrow("Struct 'Point' has no member 'z'");
      expect(() => analyze(createMember(id('count'), 'x'))).toThrow("Member access on non-struct type 'int'");
    });
  });

  describe('calls', () => {
    it('should bind the callee and coerce arguments', () => {
      const result = analyze(createCall('add', [createIntLiteral(1), createIntLiteral(2)]));
      expect(result.inferredType).toEqual(commonTypes.float);
      expect(result).toMatchObject({
        kind: 'call',
        funcNo: 0,
        arguments: [{ kind: 'float', value: 1 }, { kind: 'int', value: 2 }]
      });
    });

    it('should check arity and argument types', () => {
      expect(() => analyze(createCall('add', [createIntLiteral(1)])))
        .toThrow("Function 'add' expects 2 argument(s), got 1");
      expect(() => analyze(createCall('add', [createStringLiteral('s'), createIntLiteral(1)])))
        .toThrow("Type mismatch in argument 1 of 'add': cannot convert 'string' to 'float'");
      expect(() => analyze(createCall('missing', []))).toThrow("Undefined function 'missing'");
    });

    it('should type a void call as void', () => {
      expect(analyze(createCall('noop', [])).inferredType).toEqual(commonTypes.void);
      expect(() => analyze(createBinary('+', createCall('noop', []), createIntLiteral(1))))
        .toThrow("Invalid operand types 'void' and 'int' for binary '+'");
    });
  });

  describe('assignments', () => {
    it('should widen an int assigned to a float', () => {
      const result = analyze(createAssignment('=', id('ratio'), createIntLiteral(2)));
      expect(result.inferredType).toEqual(commonTypes.float);
      expect(result).toMatchObject({ kind: 'assign', right: { kind: 'float', value: 2 } });
    });

    it('should reject narrowing and non-assignable targets', () => {
      expect(() => analyze(createAssignment('=', id('count'), createFloatLiteral(1.5))))
        .toThrow("Type mismatch in assignment: cannot convert 'float' to 'int'");
      expect(() => analyze(createAssignment('=', createIntLiteral(1), createIntLiteral(2))))
        .toThrow('Left side of assignment is not assignable');
    });

    it('should check compound assignment operands', () => {
      expect(analyze(createAssignment('+=', id('name'), createStringLiteral('x'))).inferredType).toEqual(commonTypes.string);
      expect(() => analyze(createAssignment('-=', id('name'), createStringLiteral('x'))))
        .toThrow("Invalid operand types 'string' and 'string' for '-='");
      expect(() => analyze(createAssignment('+=', id('count'), createFloatLiteral(1.5))))
        .toThrow("Invalid operand types 'int' and 'float' for '+='");
      expect(analyze(createAssignment('+=', id('ratio'), createIntLiteral(1)))).toMatchObject({
        right: { kind: 'float', value: 1 }
      });
    });
  });

  describe('operators', () => {
    it('should check unary operand types', () => {
      expect(() => analyze(createUnary('-', createStringLiteral('s')))).toThrow("Invalid operand type 'string' for unary '-'");
      expect(() => analyze(createUnary('~', createFloatLiteral(1)))).toThrow(TypeCheckError);
      expect(() => analyze(createUnary('++', createIntLiteral(5)))).toThrow("Operand of '++' is not assignable");
      expect(analyze(createUnary('++', id('count'), false)).inferredType).toEqual(commonTypes.int);
    });

    it('should check binary operand types', () => {
      expect(() => analyze(createBinary('+', createStringLiteral('a'), createIntLiteral(1))))
        .toThrow("Invalid operand types 'string' and 'int' for binary '+'");
      expect(() => analyze(createBinary('%', createFloatLiteral(1.5), createIntLiteral(2)))).toThrow(TypeCheckError);
      expect(() => analyze(createBinary('+', id('p'), createIntLiteral(1))))
        .toThrow("Invalid operand types 'struct Point' and 'int' for binary '+'");
    });

    it('should widen the int side of a mixed operation', () => {
      const result = analyze(createBinary('*', id('count'), id('ratio')));
      expect(result.inferredType).toEqual(commonTypes.float);
      expect(result).toMatchObject({
        kind: 'binary',
        left: { kind: 'cast', targetType: 'float', expression: { kind: 'identifier', name: 'count' } }
      });
    });

    it('should expose result types of operators', () => {
      expect(binaryResultType('+', commonTypes.string, commonTypes.string)).toEqual(commonTypes.string);
      expect(binaryResultType('<', commonTypes.float, commonTypes.int)).toEqual(commonTypes.int);
      expect(binaryResultType('&', commonTypes.float, commonTypes.int)).toBeUndefined();
      expect(binaryResultType(',', commonTypes.int, commonTypes.string)).toEqual(commonTypes.string);
    });
  });

  describe('conditionals and casts', () => {
    it('should unify numeric branch types to float', () => {
      const result = analyze(createConditional(id('count'), createIntLiteral(1), id('ratio')));
      expect(result.inferredType).toEqual(commonTypes.float);
      expect(result).toMatchObject({ consequent: { kind: 'float', value: 1 } });
    });

    it('should reject non-numeric tests and mismatched branches', () => {
      expect(() => analyze(createConditional(id('name'), createIntLiteral(1), createIntLiteral(2))))
        .toThrow("Condition must be numeric, got 'string'");
      expect(() => analyze(createConditional(id('count'), createIntLiteral(1), createStringLiteral('a'))))
        .toThrow("Incompatible branch types 'int' and 'string' in conditional expression");
    });

    it('should only cast strings to string', () => {
      expect(() => analyze(createCast('int', createStringLiteral('1')))).toThrow("Cannot cast 'string' to 'int'");
      expect(analyze(createCast('string', id('name')))).toMatchObject({ kind: 'identifier', name: 'name' });
    });
  });
});
