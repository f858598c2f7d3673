// Lexical scope chain used by the analysis pass.
//
// Scopes never own variables: local bindings point at the entries of the
// enclosing function's variable table in the bytecode object, which were
// allocated by the declaration registrar.

import { InternalError, RedefinitionError } from '../types';
import type { Declaration, FunctionDeclaration, VariableBinding } from '../types';
import type { BytecodeObject, FunctionRecord, Variable } from '../object-model';

export interface LocalBinding {
  name: string;
  varNo: number;
  variable: Variable;
}

export type ResolvedVariable = VariableBinding & { variable: Variable };

export interface FunctionFrame {
  funcNo: number;
  declaration: FunctionDeclaration;
  record: FunctionRecord;
  // Slot the next local declaration must carry
  nextVarNo: number;
}

export class Scope {
  private readonly locals: LocalBinding[] = [];

  private constructor(
    public readonly object: BytecodeObject,
    public readonly parent: Scope | undefined,
    public readonly frame: FunctionFrame | undefined
  ) {}

  static global(object: BytecodeObject): Scope {
    return new Scope(object, undefined, undefined);
  }

  get isGlobal(): boolean {
    return this.parent === undefined;
  }

  get funcNo(): number | undefined {
    return this.frame?.funcNo;
  }

  get functionDeclaration(): FunctionDeclaration | undefined {
    return this.frame?.declaration;
  }

  getLocals(): readonly LocalBinding[] {
    return this.locals;
  }

  // Function-level scope, seeded with the parameters.
  enterFunction(decl: FunctionDeclaration): Scope {
    if (decl.funcNo === undefined) {
      throw new InternalError(`function '${decl.name}' was not registered`);
    }
    const record = this.object.getFunction(decl.funcNo);
    if (record.nrArgs !== decl.params.length) {
      throw new InternalError(`function '${decl.name}' has ${decl.params.length} parameters but ${record.nrArgs} argument slots`);
    }
    const scope = new Scope(this.object, this, {
      funcNo: decl.funcNo,
      declaration: decl,
      record,
      nextVarNo: record.nrArgs
    });
    decl.params.forEach((param, i) => {
      if (param.name === undefined || param.varNo !== i) {
        throw new InternalError(`parameter ${i} of '${decl.name}' does not match its argument slot`);
      }
      scope.bind(param.name, i, param);
    });
    return scope;
  }

  createChild(): Scope {
    return new Scope(this.object, this, this.frame);
  }

  declareLocal(decl: Declaration): LocalBinding {
    const frame = this.frame;
    if (!frame) {
      throw new InternalError(`local '${decl.name ?? ''}' declared outside of a function`);
    }
    if (decl.name === undefined) {
      throw new InternalError('cannot bind an unnamed declaration');
    }
    const varNo = decl.varNo;
    if (varNo === undefined || varNo < 0 || varNo >= frame.record.variables.length) {
      throw new InternalError(`variable '${decl.name}' has no valid slot in '${frame.record.name}'`);
    }
    // Slots were handed out in walk order; consuming them out of order means
    // the two walks disagree.
    if (varNo !== frame.nextVarNo) {
      throw new InternalError(`variable '${decl.name}' has slot ${varNo}, expected ${frame.nextVarNo}`);
    }
    frame.nextVarNo++;
    return this.bind(decl.name, varNo, decl);
  }

  // Checks that every local slot of the function was consumed.
  finishFunction(): void {
    const frame = this.frame;
    if (!frame) {
      throw new InternalError('not inside a function');
    }
    if (frame.nextVarNo !== frame.record.variables.length) {
      throw new InternalError(
        `function '${frame.record.name}' has ${frame.record.variables.length} variables but analysis bound ${frame.nextVarNo}`
      );
    }
  }

  lookup(name: string): ResolvedVariable | undefined {
    for (let scope: Scope | undefined = this; scope; scope = scope.parent) {
      for (let i = scope.locals.length - 1; i >= 0; i--) {
        const binding = scope.locals[i];
        if (binding.name === name) {
          return { kind: 'local', varNo: binding.varNo, variable: binding.variable };
        }
      }
    }
    const globalNo = this.object.getGlobalNo(name);
    if (globalNo !== undefined) {
      return { kind: 'global', varNo: globalNo, variable: this.object.getGlobal(globalNo) };
    }
    return undefined;
  }

  private bind(name: string, varNo: number, decl: Declaration): LocalBinding {
    if (this.locals.some(binding => binding.name === name)) {
      throw new RedefinitionError(`Redeclaration of '${name}'`, decl.location);
    }
    const frame = this.frame;
    if (!frame) {
      throw new InternalError(`cannot bind '${name}' outside of a function`);
    }
    const binding: LocalBinding = { name, varNo, variable: frame.record.variables[varNo] };
    this.locals.push(binding);
    return binding;
  }
}
