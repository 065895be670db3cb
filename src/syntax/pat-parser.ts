import type { Pat } from '../types';
import { parseOuterAttrs } from './attr-parser';
import { describeToken, type Cursor } from './cursor';
import { parsePath, parseQPath } from './type-parser';

/**
 * Patterns are validated and kept as tokens.
 *
 * {@link parsePatMulti} accepts top-level alternatives (`A | B`) and a
 * leading `|`, as in `match` arms, `let` scrutinees and `for` loops.
 * {@link parsePatSingle} does not, as in closure parameters and `let`
 * statements.
 */
export function parsePatMulti(c: Cursor): Pat {
  const start = c.position;
  c.eatPunct('|');
  parsePatInner(c);
  while (c.eatPunct('|')) {
    parsePatInner(c);
  }
  return { tokens: c.slice(start) };
}

export function parsePatSingle(c: Cursor): Pat {
  const start = c.position;
  parsePatInner(c);
  return { tokens: c.slice(start) };
}

function parsePatInner(c: Cursor): void {
  const token = c.peek();
  if (!token) throw c.error('expected pattern, found end of input');

  if (token.type === 'group') {
    if (token.delimiter === 'brace') {
      throw c.error(`expected pattern, found ${describeToken(token)}`);
    }
    c.bump();
    parsePatList(c.enter(token));
    return;
  }

  if (token.type === 'ident' && !token.raw && token.name === '_') {
    c.bump();
    return;
  }
  if (c.eatPunct('..=') || c.eatPunct('...')) {
    parseRangeBound(c);
    return;
  }
  if (c.eatPunct('..')) {
    if (canBeginRangeBound(c)) parseRangeBound(c);
    return;
  }
  if (c.startsWithPunct('&')) {
    c.splitPunct('&');
    c.eatKeyword('mut');
    parsePatInner(c);
    return;
  }
  if (token.type === 'literal' || c.isPunct('-') || c.isKeyword('true') || c.isKeyword('false')) {
    parseRangeBound(c);
    parseRangeTail(c);
    return;
  }
  if (c.eatKeyword('box')) {
    parsePatInner(c);
    return;
  }
  if (c.isKeyword('ref') || c.isKeyword('mut')) {
    c.eatKeyword('ref');
    c.eatKeyword('mut');
    if (!c.plainIdent()) {
      throw c.error(`expected identifier, found ${describeToken(c.peek())}`);
    }
    c.bump();
    if (c.eatPunct('@')) parsePatInner(c);
    return;
  }
  if (c.isKeyword('const') && c.group('brace', 1)) {
    c.bump();
    c.bump();
    return;
  }
  if (c.startsWithPunct('<')) {
    parseQPath(c, 'expr');
    parsePathPatTail(c);
    return;
  }
  if (c.plainIdent() && c.isPunct('@', 1)) {
    c.bump();
    c.bump();
    parsePatInner(c);
    return;
  }
  if (c.isPunct('::') || c.pathIdent()) {
    parsePath(c, 'expr');
    parsePathPatTail(c);
    return;
  }
  throw c.error(`expected pattern, found ${describeToken(token)}`);
}

function parsePathPatTail(c: Cursor): void {
  const tuple = c.group('parenthesis');
  if (tuple) {
    c.bump();
    parsePatList(c.enter(tuple));
    return;
  }
  const fields = c.group('brace');
  if (fields) {
    c.bump();
    parseFieldPats(c.enter(fields));
    return;
  }
  if (c.isPunct('!') && c.peek(1)?.type === 'group') {
    c.bump();
    c.bump();
    return;
  }
  parseRangeTail(c);
}

function parseRangeTail(c: Cursor): void {
  if (c.eatPunct('..=') || c.eatPunct('...')) {
    parseRangeBound(c);
  } else if (c.eatPunct('..') && canBeginRangeBound(c)) {
    parseRangeBound(c);
  }
}

function canBeginRangeBound(c: Cursor): boolean {
  return (
    c.literal() !== undefined ||
    (c.isPunct('-') && c.literal(1) !== undefined) ||
    c.isKeyword('true') ||
    c.isKeyword('false') ||
    c.isPunct('::') ||
    c.startsWithPunct('<') ||
    c.pathIdent() !== undefined
  );
}

function parseRangeBound(c: Cursor): void {
  if (c.eatPunct('-')) {
    if (!c.literal()) {
      throw c.error(`expected literal, found ${describeToken(c.peek())}`);
    }
    c.bump();
    return;
  }
  if (c.literal() || c.isKeyword('true') || c.isKeyword('false')) {
    c.bump();
    return;
  }
  if (c.isKeyword('const') && c.group('brace', 1)) {
    c.bump();
    c.bump();
    return;
  }
  if (c.startsWithPunct('<')) {
    parseQPath(c, 'expr');
    return;
  }
  parsePath(c, 'expr');
}

function parsePatList(c: Cursor): void {
  while (!c.eof) {
    parsePatMulti(c);
    if (c.eof) return;
    c.expectPunct(',');
  }
}

function parseFieldPats(c: Cursor): void {
  while (!c.eof) {
    parseOuterAttrs(c);
    if (c.eatPunct('..')) {
      c.expectEof();
      return;
    }
    if (c.literal() && c.isPunct(':', 1)) {
      c.bump();
      c.bump();
      parsePatMulti(c);
    } else if (c.plainIdent() && c.isPunct(':', 1)) {
      c.bump();
      c.bump();
      parsePatMulti(c);
    } else {
      c.eatKeyword('box');
      c.eatKeyword('ref');
      c.eatKeyword('mut');
      if (!c.plainIdent()) {
        throw c.error(`expected identifier, found ${describeToken(c.peek())}`);
      }
      c.bump();
    }
    if (c.eof) return;
    c.expectPunct(',');
  }
}
