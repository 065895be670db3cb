import type { Attribute, Block, Expr, LocalStmt, Stmt } from '../types';
import { parseOuterAttrs } from './attr-parser';
import { isBlockLike } from './classify';
import { describeToken, type Cursor } from './cursor';
import type { ExprParser } from './expr-parser';
import { parsePatSingle } from './pat-parser';
import { parseType } from './type-parser';

/**
 * Parses the statements of a block body.
 *
 * Items (`fn`, `struct`, `use`, ...) are not modeled: they are skipped up
 * to their terminating `;` or body and kept as tokens.
 *
 * @param c
 *   A cursor over the block's contents, after any inner attributes.
 * @param parser
 *   The expression parser, for `let` initializers and expression
 *   statements.
 */
export function parseStmts(c: Cursor, parser: ExprParser): Stmt[] {
  const stmts: Stmt[] = [];

  while (!c.eof) {
    if (c.eatPunct(';')) continue;

    const start = c.position;
    const attrs = parseOuterAttrs(c);

    if (c.isKeyword('let')) {
      stmts.push(parseLocal(c, parser, attrs));
      continue;
    }

    if (isItemStart(c)) {
      skipItem(c);
      stmts.push({ kind: 'Item', tokens: c.slice(start) });
      continue;
    }

    const expr = parser.parseEarlyExpr(c, start, attrs);

    if (expr.kind === 'Macro' && (c.eof || c.isPunct(';') || isBlockLike(expr))) {
      stmts.push({
        kind: 'Macro',
        attrs: expr.attrs,
        mac: expr.mac,
        semi: c.eatPunct(';')
      });
      continue;
    }

    const semi = c.eatPunct(';');
    if (!semi && !c.eof && !isBlockLike(expr)) {
      throw c.error(`expected \`;\`, found ${describeToken(c.peek())}`);
    }
    stmts.push({ kind: 'Expr', expr, semi });
  }

  return stmts;
}

function parseLocal(c: Cursor, parser: ExprParser, attrs: Attribute[]): LocalStmt {
  c.expectKeyword('let');

  const patStart = c.position;
  parsePatSingle(c);
  if (c.eatPunct(':')) parseType(c);
  const pat = { tokens: c.slice(patStart) };

  let init: Expr | null = null;
  let diverge: Block | null = null;
  if (c.eatPunct('=')) {
    init = parser.parseExpr(c);
    if (c.eatKeyword('else')) diverge = parser.parseBlock(c);
  }
  c.expectPunct(';');

  return { kind: 'Local', attrs, pat, init, diverge };
}

const ITEM_KEYWORDS = new Set([
  'enum',
  'extern',
  'fn',
  'impl',
  'mod',
  'pub',
  'struct',
  'trait',
  'type',
  'use'
]);

function isItemStart(c: Cursor): boolean {
  const token = c.ident();
  if (!token || token.raw) return false;
  if (ITEM_KEYWORDS.has(token.name)) return true;

  switch (token.name) {
    case 'union':
      return c.plainIdent(1) !== undefined;
    case 'macro_rules':
      return c.isPunct('!', 1);
    case 'unsafe':
      return ['fn', 'impl', 'trait', 'extern'].some(name => c.isKeyword(name, 1));
    case 'async':
      return c.isKeyword('fn', 1) || (c.isKeyword('unsafe', 1) && c.isKeyword('fn', 2));
    case 'const':
      return (
        ['fn', 'unsafe', 'async', 'extern'].some(name => c.isKeyword(name, 1)) ||
        (c.ident(1) !== undefined && c.isPunct(':', 2))
      );
    case 'static':
      return c.isKeyword('mut', 1) || (c.plainIdent(1) !== undefined && c.isPunct(':', 2));
    default:
      return false;
  }
}

/**
 * Consumes an item up to and including its `;` or its brace-delimited
 * body, whichever comes first.
 */
function skipItem(c: Cursor): void {
  while (!c.eof) {
    const token = c.bump();
    if (token.type === 'punct' && token.char === ';') return;
    if (token.type === 'group' && token.delimiter === 'brace') return;
  }
  throw c.error('expected `;` or `{` to end the item');
}
