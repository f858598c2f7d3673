// Pass 2: register functions and globals in the bytecode object

import { InternalError, UnsupportedError } from '../types';
import type { Block, Declaration, FunctionDeclaration } from '../types';
import type { BytecodeObject, Variable } from '../object-model';
import { specifierToType } from '../type-utils';
import { logger } from '../logger';
import { DeclarationVisitor, visitBlock } from './traversal';

interface VariableCollection {
  object: BytecodeObject;
  variables: Variable[];
}

function assignVarNo(decl: Declaration, varNo: number): void {
  if (decl.varNo !== undefined) {
    throw new InternalError(`variable '${decl.name ?? ''}' assigned a slot twice`);
  }
  decl.varNo = varNo;
}

// Appends every named declaration of a function body, in walk order.
class VariableCollector extends DeclarationVisitor<VariableCollection> {
  declaration(context: VariableCollection, decl: Declaration): void {
    if (decl.name === undefined) {
      return;
    }
    assignVarNo(decl, context.variables.length);
    context.variables.push(context.object.createVariable(decl.name, specifierToType(context.object, decl.type)));
  }

  functionDeclaration(_context: VariableCollection, decl: FunctionDeclaration): void {
    throw new UnsupportedError(`Nested functions not supported: '${decl.name}'`, decl.location);
  }
}

const variableCollector = new VariableCollector();

export function collectFunctionVariables(object: BytecodeObject, decl: FunctionDeclaration): Variable[] {
  const context: VariableCollection = { object, variables: [] };
  for (const param of decl.params) {
    if (param.name === undefined) {
      throw new InternalError(`unnamed parameter in function '${decl.name}'`);
    }
    variableCollector.declaration(context, param);
  }
  visitBlock(variableCollector, context, decl.body);
  return context.variables;
}

export function registerFunction(object: BytecodeObject, decl: FunctionDeclaration): number {
  if (decl.funcNo !== undefined) {
    throw new InternalError(`function '${decl.name}' registered twice`);
  }
  const returnType = specifierToType(object, decl.type);
  const variables = collectFunctionVariables(object, decl);
  decl.funcNo = object.addFunction({
    name: decl.name,
    returnType,
    nrArgs: decl.params.length,
    variables
  });
  logger.debug(`[Analyzer] function ${decl.name} -> #${decl.funcNo} (${decl.params.length} args, ${variables.length} vars)`);
  return decl.funcNo;
}

export function registerGlobal(object: BytecodeObject, decl: Declaration): number {
  if (decl.name === undefined) {
    throw new InternalError('cannot register an unnamed global');
  }
  const varNo = object.addGlobal(decl.name, specifierToType(object, decl.type));
  assignVarNo(decl, varNo);
  logger.debug(`[Analyzer] global ${decl.name} -> #${varNo}`);
  return varNo;
}

export function registerDeclarations(object: BytecodeObject, block: Block): void {
  for (const item of block.items) {
    if (item.kind === 'function') {
      registerFunction(object, item);
    } else if (item.kind === 'declaration' && item.name !== undefined) {
      registerGlobal(object, item);
    }
  }
}
