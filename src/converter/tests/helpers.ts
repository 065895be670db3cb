import { exprToValue } from '..';
import { parseExpr } from '../../syntax';
import type { CanonicalNode, CanonicalObject, Expr, Lit } from '../../types';

/**
 * Parses and converts `code`.
 */
export function convert(code: string): CanonicalNode {
  return exprToValue(parseExpr(code));
}

/**
 * Canonical value of a single-segment path expression.
 */
export function path(name: string): CanonicalObject {
  return { kind: 'Path', attrs: [], qself: null, path: name };
}

/**
 * Canonical value of an unsuffixed integer literal expression.
 */
export function int(value: string): CanonicalObject {
  return { kind: 'Lit', attrs: [], lit: { kind: 'Int', value, suffix: '' } };
}

export function binary(
  left: CanonicalObject,
  op: string,
  right: CanonicalObject
): CanonicalObject {
  return { kind: 'Binary', attrs: [], left, op, right };
}

/**
 * The literal of a literal expression.
 */
export function literalOf(code: string): Lit {
  const expr = parseExpr(code);
  if (expr.kind !== 'Lit') {
    throw new Error(`expected a literal, found ${expr.kind}`);
  }
  return expr.lit;
}

/**
 * Shallow copy of `expr` relabeled with a `kind` this grammar does not
 * know, as a newer parser could produce.
 */
export function withForeignKind(expr: Expr, kind: string): Expr {
  const copy = { ...expr };
  Reflect.set(copy, 'kind', kind);
  return copy;
}
