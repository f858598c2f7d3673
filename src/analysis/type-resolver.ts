// Pass 1: resolve typedef names and materialize inline struct definitions

import { InternalError, RedefinitionError, ResolutionError, TypeCheckError, UnsupportedError } from '../types';
import type { Block, Declaration, FunctionDeclaration, TypedefDeclaration, TypeSpecifier } from '../types';
import type { BytecodeObject, Variable } from '../object-model';
import { specifierToType } from '../type-utils';
import { DeclarationVisitor, visitBlock } from './traversal';

export interface TypeResolutionContext {
  object: BytecodeObject;
  // typedef name -> declaration, in the order they were seen
  aliases: Map<string, TypedefDeclaration>;
}

export function createTypeResolutionContext(object: BytecodeObject): TypeResolutionContext {
  return { object, aliases: new Map() };
}

class TypeResolvingVisitor extends DeclarationVisitor<TypeResolutionContext> {
  declaration(context: TypeResolutionContext, decl: Declaration): void {
    resolveTypeSpecifier(context, decl.type);
    if (decl.name !== undefined) {
      checkNotVoid(decl.type, `Variable '${decl.name}'`);
    }
  }

  functionDeclaration(context: TypeResolutionContext, decl: FunctionDeclaration): void {
    resolveTypeSpecifier(context, decl.type);
    for (const param of decl.params) {
      this.declaration(context, param);
    }
    visitBlock(this, context, decl.body);
  }

  typedef(context: TypeResolutionContext, decl: TypedefDeclaration): void {
    if (context.aliases.has(decl.name)) {
      throw new RedefinitionError(`Typedef '${decl.name}' is already defined`, decl.location);
    }
    // Only inline definitions are materialized here; a plain reference such as
    // `typedef struct Foo Bar;` is resolved where the alias is used.
    if (decl.type.kind === 'struct' && decl.type.definition) {
      defineStruct(context, decl.type);
    } else if (decl.type.kind === 'enum') {
      throw new UnsupportedError('Enums not supported', decl.type.location ?? decl.location);
    }
    context.aliases.set(decl.name, decl);
  }
}

const typeResolver = new TypeResolvingVisitor();

export function resolveTypes(object: BytecodeObject, block: Block): TypeResolutionContext {
  const context = createTypeResolutionContext(object);
  visitBlock(typeResolver, context, block);
  return context;
}

export function resolveTypeSpecifier(context: TypeResolutionContext, spec: TypeSpecifier): void {
  switch (spec.kind) {
    case 'void':
    case 'int':
    case 'float':
    case 'string':
      return;
    case 'typedef':
      resolveTypedef(context, spec);
      return;
    case 'struct':
      if (spec.definition) {
        defineStruct(context, spec);
      } else if (spec.structNo === undefined) {
        resolveStructReference(context, spec);
      }
      return;
    case 'enum':
      throw new UnsupportedError('Enums not supported', spec.location);
    default: {
      const unknownKind: never = spec.kind;
      throw new ResolutionError(`Unknown type: ${String(unknownKind)}`, spec.location);
    }
  }
}

function resolveStructReference(context: TypeResolutionContext, spec: TypeSpecifier): void {
  if (!spec.name) {
    throw new UnsupportedError('Anonymous structs not supported', spec.location);
  }
  const structNo = context.object.getStructNo(spec.name);
  if (structNo === undefined) {
    throw new ResolutionError(`Undefined struct '${spec.name}'`, spec.location);
  }
  spec.structNo = structNo;
}

function resolveTypedef(context: TypeResolutionContext, spec: TypeSpecifier): void {
  const name = spec.name;
  if (name === undefined) {
    throw new InternalError('typedef specifier without a name');
  }

  // Follow alias chains down to a primitive or a struct name
  let target = name;
  const seen = new Set<string>();
  let alias = context.aliases.get(target);
  while (alias) {
    if (seen.has(target)) {
      throw new ResolutionError(`Circular typedef "${name}"`, spec.location);
    }
    seen.add(target);

    const aliased = alias.type;
    if (aliased.kind === 'void' || aliased.kind === 'int' || aliased.kind === 'float' || aliased.kind === 'string') {
      spec.kind = aliased.kind;
      return;
    }
    if (aliased.kind === 'enum') {
      throw new UnsupportedError('Enums not supported', spec.location);
    }
    if (aliased.kind === 'struct' && aliased.structNo !== undefined) {
      spec.kind = 'struct';
      spec.structNo = aliased.structNo;
      return;
    }
    if (aliased.name === undefined) {
      throw new UnsupportedError('Anonymous structs not supported', aliased.location ?? alias.location);
    }
    target = aliased.name;
    alias = aliased.kind === 'typedef' ? context.aliases.get(target) : undefined;
  }

  const structNo = context.object.getStructNo(target);
  if (structNo === undefined) {
    throw new ResolutionError(`Failed to resolve typedef "${name}"`, spec.location);
  }
  spec.kind = 'struct';
  spec.structNo = structNo;
}

/**
 * Registers a struct with an inline member list. The entry and its index
 * exist before the members are resolved, so a member may refer to the struct
 * itself and nested definitions are numbered after their enclosing struct.
 */
export function defineStruct(context: TypeResolutionContext, spec: TypeSpecifier): number {
  const definition = spec.definition;
  if (!definition) {
    throw new InternalError('struct definition without members');
  }
  if (!spec.name) {
    throw new UnsupportedError('Anonymous structs not supported', spec.location);
  }
  if (spec.structNo !== undefined) {
    return spec.structNo;
  }
  const { object } = context;
  if (object.hasStruct(spec.name)) {
    throw new RedefinitionError(`Redefining structs not supported: '${spec.name}'`, spec.location);
  }
  const structNo = object.addStruct(spec.name);
  spec.structNo = structNo;

  const members: Variable[] = [];
  const memberNames = new Set<string>();
  for (const item of definition.items) {
    if (item.kind !== 'declaration') {
      throw new UnsupportedError(`Unexpected ${item.kind} in definition of struct '${spec.name}'`, item.location);
    }
    resolveTypeSpecifier(context, item.type);
    // A nested struct-only declaration defines a type but adds no member
    if (item.name === undefined) {
      continue;
    }
    checkNotVoid(item.type, `Member '${spec.name}.${item.name}'`);
    if (memberNames.has(item.name)) {
      throw new RedefinitionError(`Duplicate member '${item.name}' in struct '${spec.name}'`, item.location);
    }
    memberNames.add(item.name);
    members.push(object.createVariable(item.name, specifierToType(object, item.type)));
  }

  object.setStructMembers(structNo, members);
  return structNo;
}

function checkNotVoid(spec: TypeSpecifier, what: string): void {
  if (spec.kind === 'void') {
    throw new TypeCheckError(`${what} declared void`, spec.location);
  }
}
