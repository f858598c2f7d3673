import { describe, it, expect } from 'vitest';
import { BytecodeObject } from '../src/object-model';
import { resolveTypes } from '../src/analysis/type-resolver';
import { collectFunctionVariables, registerDeclarations } from '../src/analysis/declaration-registrar';
import {
  createBinary, createBlock, createCase, createCompound, createDeclaration, createFloatLiteral, createFor,
  createFunctionDeclaration, createIdentifier, createIf, createIntLiteral, createLabeled, createReturn,
  createStructDefinition, createSwitch, createUnary
} from '../src/ast-factory';
import { commonTypes, createStructType } from '../src/type-utils';
import { InternalError, RedefinitionError, UnsupportedError } from '../src/types';
import type { BlockItem } from '../src/types';
import { param, spec } from './helpers/analysis';

function register(items: BlockItem[]) {
  const object = new BytecodeObject();
  const block = createBlock(items);
  resolveTypes(object, block);
  registerDeclarations(object, block);
  return { object, block };
}

describe('Declaration registrar', () => {
  describe('functions', () => {
    it('should record parameters followed by locals in textual order', () => {
      const y = param('int', 'y');
      const z = param('string', 'z');
      const i = createDeclaration(spec('int'), 'i', createIntLiteral(0));
      const w = param('int', 'w');
      const s = param('float', 's');
      const t = param('int', 't');
      const fn = createFunctionDeclaration(spec('int'), 'f', [param('int', 'a'), param('float', 'b')], [
        param('int', 'x'),
        createIf(createIdentifier('a'), createCompound([y]), createCompound([z])),
        createFor(
          [i],
          createBinary('<', createIdentifier('i'), createIntLiteral(3)),
          createUnary('++', createIdentifier('i'), false),
          createCompound([w])
        ),
        createSwitch(createIdentifier('a'), [createCase(createIntLiteral(1), createCompound([s]))]),
        createLabeled('done', createCompound([t])),
        createReturn(createIntLiteral(0))
      ]);
      const { object } = register([fn]);

      const record = object.getFunction(0);
      expect(record.name).toBe('f');
      expect(record.returnType).toEqual(commonTypes.int);
      expect(record.nrArgs).toBe(2);
      expect(record.variables.map(v => v.name)).toEqual(['a', 'b', 'x', 'y', 'z', 'i', 'w', 's', 't']);
      expect(record.variables.map(v => v.type)).toEqual([
        commonTypes.int, commonTypes.float, commonTypes.int, commonTypes.int, commonTypes.string,
        commonTypes.int, commonTypes.int, commonTypes.float, commonTypes.int
      ]);
      expect([y.varNo, z.varNo, i.varNo, w.varNo, s.varNo, t.varNo]).toEqual([3, 4, 5, 6, 7, 8]);
      expect(fn.funcNo).toBe(0);
    });

    it('should record struct-typed locals with their struct index', () => {
      const foo = createDeclaration(createStructDefinition('Foo', [param('int', 'a')]));
      const fn = createFunctionDeclaration(spec('void'), 'g', [], [param('struct', 'v', 'Foo')]);
      const { object } = register([foo, fn]);

      expect(object.getFunction(0).variables).toEqual([{ name: 'v', type: createStructType(0, 'Foo') }]);
    });

    it('should skip struct-only declarations inside bodies', () => {
      const fn = createFunctionDeclaration(spec('void'), 'g', [], [
        createDeclaration(createStructDefinition('Local', [param('int', 'n')])),
        param('int', 'k')
      ]);
      const { object } = register([fn]);
      expect(object.getFunction(0).variables.map(v => v.name)).toEqual(['k']);
    });

    it('should reject nested functions', () => {
      const inner = createFunctionDeclaration(spec('void'), 'g', [], []);
      const outer = createFunctionDeclaration(spec('void'), 'f', [], [createCompound([inner])]);
      expect(() => register([outer])).toThrow(UnsupportedError);
      expect(() => register([createFunctionDeclaration(spec('void'), 'f', [], [
        createFunctionDeclaration(spec('void'), 'g', [], [])
      ])])).toThrow("Nested functions not supported: 'g'");
    });

    it('should reject duplicate function names', () => {
      const first = createFunctionDeclaration(spec('void'), 'f', [], []);
      const second = createFunctionDeclaration(spec('int'), 'f', [], []);
      expect(() => register([first, second])).toThrow(RedefinitionError);
    });

    it('should refuse to collect a function with an unnamed parameter', () => {
      const object = new BytecodeObject();
      const fn = createFunctionDeclaration(spec('void'), 'f', [createDeclaration(spec('int'))], []);
      expect(() => collectFunctionVariables(object, fn)).toThrow(InternalError);
    });
  });

  describe('globals', () => {
    it('should assign global indices in order, independent of functions', () => {
      const g1 = param('int', 'g1');
      const fn = createFunctionDeclaration(spec('void'), 'main', [], []);
      const g2 = createDeclaration(spec('float'), 'g2', createFloatLiteral(1.5));
      const { object } = register([g1, fn, g2]);

      expect(object.globals).toEqual([
        { name: 'g1', type: commonTypes.int },
        { name: 'g2', type: commonTypes.float }
      ]);
      expect(g1.varNo).toBe(0);
      expect(g2.varNo).toBe(1);
      expect(fn.funcNo).toBe(0);
    });

    it('should not register struct-only declarations as globals', () => {
      const { object } = register([createDeclaration(createStructDefinition('Foo', [param('int', 'a')]))]);
      expect(object.globals).toEqual([]);
    });

    it('should reject duplicate globals', () => {
      expect(() => register([param('int', 'x'), param('int', 'x')])).toThrow("Global variable 'x' is already defined");
    });
  });
});
