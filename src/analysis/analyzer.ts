// Semantic analysis for Novella syntax trees

import { UnsupportedError } from '../types';
import type { Block } from '../types';
import type { BytecodeObject } from '../object-model';
import { logger } from '../logger';
import { resolveTypes } from './type-resolver';
import { registerDeclarations } from './declaration-registrar';
import { analyzeBlock } from './statement-analyzer';
import { Scope } from './scope';

export interface AnalyzerOptions {
  verbose?: boolean;
}

export class Analyzer {
  public verbose: boolean;

  constructor(public readonly object: BytecodeObject, opts?: AnalyzerOptions) {
    this.verbose = opts?.verbose ?? false;
    if (this.verbose) {
      logger.info('[Analyzer] Initialized with verbose mode');
    }
  }

  /**
   * Runs all three passes over `block`, mutating it in place, and returns it
   * for code generation. The first error aborts the whole analysis.
   */
  analyze(block: Block): Block {
    checkTopLevelItems(block);

    // Pass 1: typedefs and struct definitions
    this.log('Pass 1: resolving types');
    resolveTypes(this.object, block);
    this.log(`Resolved ${this.object.structures.length} struct(s)`);

    // Pass 2: register functions and globals (names, types, variable tables)
    this.log('Pass 2: registering declarations');
    registerDeclarations(this.object, block);
    this.log(`Registered ${this.object.functions.length} function(s), ${this.object.globals.length} global(s)`);

    // Pass 3: type analysis, simplification and global initial values
    this.log('Pass 3: analyzing statements');
    analyzeBlock(Scope.global(this.object), block);
    this.log(`Recorded ${this.object.initialValues.length} initial value(s)`);

    return block;
  }

  private log(message: string): void {
    if (this.verbose) {
      logger.info(`[Analyzer] ${message}`);
    }
  }
}

// Only declarations are permitted at the root level.
export function checkTopLevelItems(block: Block): void {
  for (const item of block.items) {
    if (item.kind !== 'declaration' && item.kind !== 'function' && item.kind !== 'typedef') {
      throw new UnsupportedError(
        `Top-level '${item.kind}' statements are not allowed. Only declarations (functions, variables, structs, typedefs) are permitted at the root level.`,
        item.location
      );
    }
  }
}

export function analyzeProgram(object: BytecodeObject, block: Block, options?: AnalyzerOptions): Block {
  return new Analyzer(object, options).analyze(block);
}
