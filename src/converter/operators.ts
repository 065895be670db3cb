import type { BinOp, BinOpKind, UnOp, UnOpKind } from '../types';
import { renderSlice } from './opaque';

const BIN_OP_SYMBOLS: Record<BinOpKind, string> = {
  Add: '+',
  Sub: '-',
  Mul: '*',
  Div: '/',
  Rem: '%',
  And: '&&',
  Or: '||',
  BitXor: '^',
  BitAnd: '&',
  BitOr: '|',
  Shl: '<<',
  Shr: '>>',
  Eq: '==',
  Lt: '<',
  Le: '<=',
  Ne: '!=',
  Ge: '>=',
  Gt: '>',
  AddAssign: '+=',
  SubAssign: '-=',
  MulAssign: '*=',
  DivAssign: '/=',
  RemAssign: '%=',
  BitXorAssign: '^=',
  BitAndAssign: '&=',
  BitOrAssign: '|=',
  ShlAssign: '<<=',
  ShrAssign: '>>='
};

const UN_OP_SYMBOLS: Record<UnOpKind, string> = {
  Deref: '*',
  Not: '!',
  Neg: '-'
};

// Looked up by string so that an operator kind added to the grammar later
// falls back to its own tokens.
const binOpSymbols = new Map<string, string>(Object.entries(BIN_OP_SYMBOLS));
const unOpSymbols = new Map<string, string>(Object.entries(UN_OP_SYMBOLS));

/**
 * The source symbol of a binary or compound-assignment operator.
 */
export function binOpSymbol(op: BinOp): string {
  return binOpSymbols.get(op.kind) ?? renderSlice(op.tokens);
}

/**
 * The source symbol of a prefix operator.
 */
export function unOpSymbol(op: UnOp): string {
  return unOpSymbols.get(op.kind) ?? renderSlice(op.tokens);
}
