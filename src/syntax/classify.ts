import type { Expr } from '../types';

/**
 * Expression kinds that end a statement or match arm without `;` or `,`.
 */
const BLOCK_LIKE_KINDS = new Set([
  'Block',
  'Const',
  'ForLoop',
  'If',
  'Loop',
  'Match',
  'TryBlock',
  'Unsafe',
  'While'
]);

/**
 * Whether `expr` may be followed by another statement (or match arm)
 * without a separator. Macro invocations qualify when their arguments are
 * brace-delimited (`m! { .. }`).
 */
export function isBlockLike(expr: Expr): boolean {
  if (expr.kind === 'Macro') {
    const { stream, end } = expr.mac.tokens;
    const last = stream[end - 1];
    return last?.type === 'group' && last.delimiter === 'brace';
  }
  return BLOCK_LIKE_KINDS.has(expr.kind);
}
