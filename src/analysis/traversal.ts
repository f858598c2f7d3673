// Structural walk over blocks and statements shared by every analysis pass.
//
// Each pass supplies a visitor with its own per-node actions; the walk order
// lives only here, so the pass that assigns variable slots and the pass that
// consumes them always see declarations in the same order.

import { InternalError } from '../types';
import type {
  Block, BlockItem, CompoundStatement, Declaration, Expression, ForStatement, FunctionDeclaration,
  ReturnStatement, Statement, SwitchStatement, TypedefDeclaration
} from '../types';

export type ExpressionRole =
  | 'statement'
  | 'condition'
  | 'discriminant'
  | 'caseLabel'
  | 'forTest'
  | 'forUpdate'
  | 'return';

export interface ExpressionSite {
  role: ExpressionRole;
  statement: Statement;
}

export type BlockOwner = CompoundStatement | SwitchStatement | ForStatement;

export interface BlockItemVisitor<C> {
  declaration(context: C, decl: Declaration): void;
  // Function bodies are not entered by the walk; the visitor decides.
  functionDeclaration(context: C, decl: FunctionDeclaration): void;
  typedef(context: C, decl: TypedefDeclaration): void;
  // The returned expression replaces the one in the owning slot.
  expression(context: C, expr: Expression, site: ExpressionSite): Expression;
  enterBlock(context: C, owner: BlockOwner): C;
  afterReturn?(context: C, stmt: ReturnStatement): void;
}

export function visitBlock<C>(visitor: BlockItemVisitor<C>, context: C, block: Block): void {
  for (const item of block.items) {
    visitBlockItem(visitor, context, item);
  }
}

export function visitBlockItem<C>(visitor: BlockItemVisitor<C>, context: C, item: BlockItem | undefined): void {
  if (!item) {
    return;
  }
  switch (item.kind) {
    case 'declaration':
      visitor.declaration(context, item);
      break;
    case 'function':
      visitor.functionDeclaration(context, item);
      break;
    case 'typedef':
      visitor.typedef(context, item);
      break;
    case 'labeled':
      visitBlockItem(visitor, context, item.statement);
      break;
    case 'compound':
      visitBlock(visitor, visitor.enterBlock(context, item), item.block);
      break;
    case 'expression':
      if (item.expression) {
        item.expression = visitor.expression(context, item.expression, { role: 'statement', statement: item });
      }
      break;
    case 'if':
      item.test = visitor.expression(context, item.test, { role: 'condition', statement: item });
      visitBlockItem(visitor, context, item.consequent);
      visitBlockItem(visitor, context, item.alternative);
      break;
    case 'switch':
      item.discriminant = visitor.expression(context, item.discriminant, { role: 'discriminant', statement: item });
      visitBlock(visitor, visitor.enterBlock(context, item), item.body);
      break;
    case 'while':
    case 'doWhile':
      item.test = visitor.expression(context, item.test, { role: 'condition', statement: item });
      visitBlockItem(visitor, context, item.body);
      break;
    case 'for': {
      // The init clause gets its own block context; test, update and body
      // are visited inside it so loop variables stay visible there.
      const loopContext = visitor.enterBlock(context, item);
      visitBlock(visitor, loopContext, item.init);
      if (item.test) {
        item.test = visitor.expression(loopContext, item.test, { role: 'forTest', statement: item });
      }
      if (item.update) {
        item.update = visitor.expression(loopContext, item.update, { role: 'forUpdate', statement: item });
      }
      visitBlockItem(visitor, loopContext, item.body);
      break;
    }
    case 'return':
      if (item.argument) {
        item.argument = visitor.expression(context, item.argument, { role: 'return', statement: item });
      }
      visitor.afterReturn?.(context, item);
      break;
    case 'case':
      item.test = visitor.expression(context, item.test, { role: 'caseLabel', statement: item });
      visitBlockItem(visitor, context, item.statement);
      break;
    case 'default':
      visitBlockItem(visitor, context, item.statement);
      break;
    case 'goto':
    case 'continue':
    case 'break':
      break;
    default: {
      const unknown: never = item;
      throw new InternalError(`unknown statement kind: ${JSON.stringify(unknown)}`);
    }
  }
}

/**
 * Visitor base for passes that only care about declarations: expressions are
 * kept as they are and nested blocks share the parent context.
 */
export abstract class DeclarationVisitor<C> implements BlockItemVisitor<C> {
  abstract declaration(context: C, decl: Declaration): void;
  abstract functionDeclaration(context: C, decl: FunctionDeclaration): void;

  typedef(_context: C, _decl: TypedefDeclaration): void {
    // no-op
  }

  expression(_context: C, expr: Expression): Expression {
    return expr;
  }

  enterBlock(context: C): C {
    return context;
  }
}
