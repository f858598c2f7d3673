import { InternalError, ResolutionError, UnsupportedError } from './types';
import type { PrimitiveType, PrimitiveTypeNode, StructTypeNode, Type, TypeSpecifier } from './types';
import type { BytecodeObject } from './object-model';

// Cache commonly used types to avoid repeated creation
export const commonTypes = {
  void: { kind: 'primitive', type: 'void' },
  int: { kind: 'primitive', type: 'int' },
  float: { kind: 'primitive', type: 'float' },
  string: { kind: 'primitive', type: 'string' }
} as const;

export function createPrimitiveType(type: PrimitiveType): PrimitiveTypeNode {
  return commonTypes[type];
}

export function createStructType(structNo: number, name: string): StructTypeNode {
  return { kind: 'struct', structNo, name };
}

export function typeToString(type: Type): string {
  switch (type.kind) {
    case 'primitive':
      return type.type;
    case 'struct':
      return `struct ${type.name}`;
  }
}

export function isTypeEqual(type1: Type, type2: Type): boolean {
  if (type1.kind === 'primitive' && type2.kind === 'primitive') {
    return type1.type === type2.type;
  }
  if (type1.kind === 'struct' && type2.kind === 'struct') {
    return type1.structNo === type2.structNo;
  }
  return false;
}

export function isPrimitive(type: Type | undefined, primitive: PrimitiveType): boolean {
  return type !== undefined && type.kind === 'primitive' && type.type === primitive;
}

export function isIntType(type: Type | undefined): boolean {
  return isPrimitive(type, 'int');
}

export function isFloatType(type: Type | undefined): boolean {
  return isPrimitive(type, 'float');
}

export function isStringType(type: Type | undefined): boolean {
  return isPrimitive(type, 'string');
}

export function isVoidType(type: Type | undefined): boolean {
  return isPrimitive(type, 'void');
}

export function isNumericType(type: Type | undefined): boolean {
  return isIntType(type) || isFloatType(type);
}

// int op float => float, int op int => int
export function getCommonNumericType(type1: Type, type2: Type): PrimitiveTypeNode {
  if (isFloatType(type1) || isFloatType(type2)) {
    return commonTypes.float;
  }
  return commonTypes.int;
}

/**
 * Converts a resolved type specifier to the type stored in the bytecode object.
 * Typedefs must already have been rewritten by the type resolver.
 */
export function specifierToType(object: BytecodeObject, spec: TypeSpecifier): Type {
  switch (spec.kind) {
    case 'void':
    case 'int':
    case 'float':
    case 'string':
      return createPrimitiveType(spec.kind);
    case 'struct': {
      if (spec.structNo === undefined) {
        throw new InternalError(`struct '${spec.name ?? '<anonymous>'}' used before resolution`);
      }
      return createStructType(spec.structNo, object.getStruct(spec.structNo).name);
    }
    case 'enum':
      throw new UnsupportedError('Enums not supported', spec.location);
    case 'typedef':
      throw new InternalError(`typedef '${spec.name ?? ''}' survived type resolution`);
    default: {
      const unknownKind: never = spec.kind;
      throw new ResolutionError(`Unknown type: ${String(unknownKind)}`, spec.location);
    }
  }
}
