import { describe, it, expect } from 'vitest';
import { BytecodeObject, DEFAULT_OBJECT_VERSION } from '../src/object-model';
import { commonTypes } from '../src/type-utils';
import { InternalError, RedefinitionError } from '../src/types';

describe('BytecodeObject', () => {
  describe('structures', () => {
    it('should assign indices in insertion order', () => {
      const object = new BytecodeObject();
      expect(object.addStruct('A')).toBe(0);
      expect(object.addStruct('B')).toBe(1);
      expect(object.hasStruct('B')).toBe(true);
      expect(object.hasStruct('C')).toBe(false);
      expect(object.getStructNo('A')).toBe(0);
      expect(object.getStructNo('C')).toBeUndefined();
    });

    it('should reject a second struct with the same name and keep the first', () => {
      const object = new BytecodeObject();
      object.addStruct('Foo', [object.createVariable('a', commonTypes.int)]);
      expect(() => object.addStruct('Foo')).toThrow(RedefinitionError);
      expect(object.structures).toHaveLength(1);
      expect(object.getStruct(0).members.map(m => m.name)).toEqual(['a']);
    });

    it('should fill members only once', () => {
      const object = new BytecodeObject();
      const index = object.addStruct('Foo');
      object.setStructMembers(index, []);
      expect(() => object.setStructMembers(index, [])).toThrow(InternalError);
    });

    it('should report an out of range struct index as an internal error', () => {
      const object = new BytecodeObject();
      expect(() => object.getStruct(3)).toThrow('Internal error: struct index 3 out of range');
    });
  });

  describe('functions', () => {
    it('should register a function and look it up by name', () => {
      const object = new BytecodeObject();
      const index = object.addFunction({
        name: 'main',
        returnType: commonTypes.void,
        nrArgs: 0,
        variables: []
      });
      expect(index).toBe(0);
      expect(object.getFunctionNo('main')).toBe(0);
      expect(object.getFunction(0).name).toBe('main');
    });

    it('should reject duplicate function names', () => {
      const object = new BytecodeObject();
      const record = { name: 'f', returnType: commonTypes.int, nrArgs: 0, variables: [] };
      object.addFunction(record);
      expect(() => object.addFunction({ ...record })).toThrow("Function 'f' is already defined");
    });

    it('should reject more arguments than variables', () => {
      const object = new BytecodeObject();
      expect(() => object.addFunction({ name: 'f', returnType: commonTypes.int, nrArgs: 1, variables: [] }))
        .toThrow(InternalError);
    });
  });

  describe('globals', () => {
    it('should return the assigned index directly', () => {
      const object = new BytecodeObject();
      expect(object.addGlobal('x', commonTypes.int)).toBe(0);
      expect(object.addGlobal('y', commonTypes.string)).toBe(1);
      expect(object.getGlobalNo('y')).toBe(1);
      expect(object.getGlobal(1)).toEqual({ name: 'y', type: commonTypes.string });
    });

    it('should reject duplicate globals', () => {
      const object = new BytecodeObject();
      object.addGlobal('x', commonTypes.int);
      expect(() => object.addGlobal('x', commonTypes.float)).toThrow(RedefinitionError);
      expect(object.globals).toHaveLength(1);
    });

    it('should validate the target of an initial value', () => {
      const object = new BytecodeObject();
      expect(() => object.addInitialValue({ globalIndex: 0, dataType: 'int', value: 1 })).toThrow(InternalError);
      object.addGlobal('x', commonTypes.int);
      object.addInitialValue({ globalIndex: 0, dataType: 'int', value: 1 });
      expect(object.initialValues).toEqual([{ globalIndex: 0, dataType: 'int', value: 1 }]);
    });
  });

  describe('format version', () => {
    it('should default to version 4 without secondary names', () => {
      const object = new BytecodeObject();
      expect(object.version).toBe(DEFAULT_OBJECT_VERSION);
      expect(object.createVariable('a', commonTypes.int)).toEqual({ name: 'a', type: commonTypes.int });
    });

    it('should give every variable an empty secondary name from version 12', () => {
      const object = new BytecodeObject({ version: 12 });
      expect(object.createVariable('a', commonTypes.int)).toEqual({ name: 'a', name2: '', type: commonTypes.int });
    });
  });
});
