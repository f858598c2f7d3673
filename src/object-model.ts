// In-memory bytecode object populated by the analysis stage.
// Serialization to the runtime's binary format happens elsewhere.

import { InternalError, RedefinitionError } from './types';
import type { Type } from './types';

export const DEFAULT_OBJECT_VERSION = 4;

// From this format version on, every variable carries a secondary name.
const SECONDARY_NAME_VERSION = 12;

export interface Variable {
  name: string;
  name2?: string;
  type: Type;
}

export interface Structure {
  name: string;
  members: Variable[];
}

export interface FunctionRecord {
  name: string;
  returnType: Type;
  // The first nrArgs entries of `variables` are the parameters
  nrArgs: number;
  variables: Variable[];
}

export type InitialValue =
  | { globalIndex: number; dataType: 'int'; value: number }
  | { globalIndex: number; dataType: 'float'; value: number }
  | { globalIndex: number; dataType: 'string'; value: string };

export interface BytecodeObjectOptions {
  version?: number;
}

export class BytecodeObject {
  public readonly version: number;
  public readonly structures: Structure[] = [];
  public readonly functions: FunctionRecord[] = [];
  public readonly globals: Variable[] = [];
  public readonly initialValues: InitialValue[] = [];

  private structIndex: Map<string, number> = new Map();
  private functionIndex: Map<string, number> = new Map();
  private globalIndex: Map<string, number> = new Map();
  private populatedStructs: Set<number> = new Set();

  constructor(opts?: BytecodeObjectOptions) {
    this.version = opts?.version ?? DEFAULT_OBJECT_VERSION;
  }

  createVariable(name: string, type: Type): Variable {
    const variable: Variable = { name, type };
    if (this.version >= SECONDARY_NAME_VERSION) {
      variable.name2 = '';
    }
    return variable;
  }

  addStruct(name: string, members?: Variable[]): number {
    if (this.structIndex.has(name)) {
      throw new RedefinitionError(`Redefining structs not supported: '${name}'`);
    }
    const index = this.structures.length;
    this.structures.push({ name, members: [] });
    this.structIndex.set(name, index);
    if (members) {
      this.setStructMembers(index, members);
    }
    return index;
  }

  hasStruct(name: string): boolean {
    return this.structIndex.has(name);
  }

  getStructNo(name: string): number | undefined {
    return this.structIndex.get(name);
  }

  getStruct(index: number): Structure {
    const struct = this.structures[index];
    if (!struct) {
      throw new InternalError(`struct index ${index} out of range`);
    }
    return struct;
  }

  setStructMembers(index: number, members: Variable[]): void {
    const struct = this.getStruct(index);
    if (this.populatedStructs.has(index)) {
      throw new InternalError(`members of struct '${struct.name}' assigned twice`);
    }
    struct.members = members;
    this.populatedStructs.add(index);
  }

  addFunction(record: FunctionRecord): number {
    if (this.functionIndex.has(record.name)) {
      throw new RedefinitionError(`Function '${record.name}' is already defined`);
    }
    if (record.nrArgs > record.variables.length) {
      throw new InternalError(`function '${record.name}' declares more arguments than variables`);
    }
    const index = this.functions.length;
    this.functions.push(record);
    this.functionIndex.set(record.name, index);
    return index;
  }

  getFunctionNo(name: string): number | undefined {
    return this.functionIndex.get(name);
  }

  getFunction(index: number): FunctionRecord {
    const fn = this.functions[index];
    if (!fn) {
      throw new InternalError(`function index ${index} out of range`);
    }
    return fn;
  }

  addGlobal(name: string, type: Type): number {
    if (this.globalIndex.has(name)) {
      throw new RedefinitionError(`Global variable '${name}' is already defined`);
    }
    const index = this.globals.length;
    this.globals.push(this.createVariable(name, type));
    this.globalIndex.set(name, index);
    return index;
  }

  getGlobalNo(name: string): number | undefined {
    return this.globalIndex.get(name);
  }

  getGlobal(index: number): Variable {
    const global = this.globals[index];
    if (!global) {
      throw new InternalError(`global index ${index} out of range`);
    }
    return global;
  }

  addInitialValue(entry: InitialValue): void {
    // Validates the index
    this.getGlobal(entry.globalIndex);
    this.initialValues.push(entry);
  }
}
