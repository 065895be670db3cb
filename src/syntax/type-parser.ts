import type {
  IdentToken,
  Path,
  PathSegment,
  QSelf,
  TokenSlice,
  Type
} from '../types';
import { describeToken, type Cursor } from './cursor';

/**
 * How generic arguments are written after a path segment: expressions and
 * patterns need a turbofish (`Vec::<u8>`), types take them directly
 * (`Vec<u8>`, `Fn(u8) -> u8`).
 */
export type PathStyle = 'expr' | 'type';

export type QualifiedPath = {
  qself: QSelf;
  path: Path;
};

/**
 * Identifier text as written, `r#` prefix included.
 */
export function identText(token: IdentToken): string {
  return token.raw ? `r#${token.name}` : token.name;
}

/**
 * Parses a type and returns the tokens it spans.
 *
 * Types are only validated; nothing but their tokens is kept.
 *
 * @param allowPlus
 *   Whether `A + B` bounds may follow (`false` after `as`, `&` and `->`).
 */
export function parseType(c: Cursor, allowPlus = true): Type {
  const start = c.position;
  parseTypeInner(c, allowPlus);
  return { tokens: c.slice(start) };
}

function parseTypeInner(c: Cursor, allowPlus: boolean): void {
  const token = c.peek();
  if (!token) throw c.error('expected type, found end of input');

  if (token.type === 'group') {
    if (token.delimiter === 'parenthesis') {
      c.bump();
      parseTypeList(c.enter(token));
      return;
    }
    if (token.delimiter === 'bracket') {
      c.bump();
      const inner = c.enter(token);
      parseType(inner);
      // The array length is an expression; it stays as tokens.
      if (inner.eatPunct(';')) {
        if (inner.eof) throw inner.error('expected array length');
        return;
      }
      inner.expectEof();
      return;
    }
    throw c.error(`expected type, found ${describeToken(token)}`);
  }

  if (token.type === 'ident' && !token.raw && token.name === '_') {
    c.bump();
    return;
  }
  if (c.isPunct('!')) {
    c.bump();
    return;
  }
  if (c.startsWithPunct('*')) {
    c.splitPunct('*');
    if (!c.eatKeyword('const') && !c.eatKeyword('mut')) {
      throw c.error('expected `mut` or `const` keyword in raw pointer type');
    }
    parseTypeInner(c, false);
    return;
  }
  if (c.startsWithPunct('&')) {
    c.splitPunct('&');
    if (c.peek()?.type === 'lifetime') c.bump();
    c.eatKeyword('mut');
    parseTypeInner(c, false);
    return;
  }
  if (c.startsWithPunct('<')) {
    parseQPath(c, 'type');
    return;
  }
  if (c.isKeyword('impl') || c.isKeyword('dyn')) {
    c.bump();
    parseBounds(c, allowPlus);
    return;
  }
  if (c.isKeyword('for') || c.isKeyword('fn') || c.isKeyword('unsafe') || c.isKeyword('extern')) {
    if (c.eatKeyword('for')) parseGenericParams(c);
    if (c.isKeyword('fn') || c.isKeyword('unsafe') || c.isKeyword('extern')) {
      parseFnPointer(c);
      return;
    }
    // `for<'a> Trait<'a>` bound without `dyn`.
    parsePath(c, 'type');
    return;
  }

  parsePath(c, 'type');
  if (c.isPunct('!') && c.peek(1)?.type === 'group') {
    c.bump();
    c.bump();
    return;
  }
  if (allowPlus) {
    while (c.eatPunct('+')) {
      if (!canBeginBound(c)) break;
      parseBound(c);
    }
  }
}

function parseTypeList(c: Cursor): void {
  while (!c.eof) {
    parseType(c);
    if (c.eof) return;
    c.expectPunct(',');
  }
}

function parseFnPointer(c: Cursor): void {
  c.eatKeyword('unsafe');
  if (c.eatKeyword('extern') && c.literal()) c.bump();
  c.expectKeyword('fn');
  const args = c.group('parenthesis');
  if (!args) throw c.error(`expected \`(\`, found ${describeToken(c.peek())}`);
  c.bump();

  const inner = c.enter(args);
  while (!inner.eof) {
    if (inner.eatPunct('...')) {
      inner.expectEof();
      break;
    }
    if (inner.plainIdent() && inner.isPunct(':', 1)) {
      inner.bump();
      inner.bump();
    }
    parseType(inner);
    if (inner.eof) break;
    inner.expectPunct(',');
  }
  parseReturnType(c);
}

function parseReturnType(c: Cursor): void {
  if (c.eatPunct('->')) parseType(c, false);
}

function canBeginBound(c: Cursor): boolean {
  const token = c.peek();
  return (
    token?.type === 'lifetime' ||
    c.group('parenthesis') !== undefined ||
    c.isPunct('?') ||
    c.isPunct('::') ||
    c.isKeyword('for') ||
    c.pathIdent() !== undefined
  );
}

function parseBound(c: Cursor): void {
  if (c.peek()?.type === 'lifetime') {
    c.bump();
    return;
  }
  if (c.group('parenthesis')) {
    c.bump();
    return;
  }
  c.eatPunct('?');
  if (c.eatKeyword('for')) parseGenericParams(c);
  parsePath(c, 'type');
}

function parseBounds(c: Cursor, allowPlus: boolean): void {
  parseBound(c);
  while (allowPlus && c.isPunct('+')) {
    c.bump();
    if (!canBeginBound(c)) break;
    parseBound(c);
  }
}

/**
 * Skips the `<...>` parameter list of a `for<'a>` binder.
 */
export function parseGenericParams(c: Cursor): void {
  if (!c.splitPunct('<')) {
    throw c.error(`expected \`<\`, found ${describeToken(c.peek())}`);
  }
  let depth = 1;
  let arrow = false;
  while (depth > 0) {
    const token = c.bump();
    if (token.type !== 'punct') {
      arrow = false;
      continue;
    }
    if (token.char === '<') depth++;
    if (token.char === '>' && !arrow) depth--;
    arrow = token.char === '-' && token.spacing === 'joint';
  }
}

/**
 * Parses `<...>` generic arguments. The closing `>` may be the first half
 * of `>>`, `>=` or `>>=`; only that half is consumed.
 */
export function parseGenericArgs(c: Cursor): void {
  if (!c.splitPunct('<')) {
    throw c.error(`expected \`<\`, found ${describeToken(c.peek())}`);
  }
  while (!c.splitPunct('>')) {
    parseGenericArg(c);
    if (c.splitPunct('>')) return;
    if (!c.eatPunct(',')) {
      throw c.error(`expected \`,\` or \`>\`, found ${describeToken(c.peek())}`);
    }
  }
}

function parseGenericArg(c: Cursor): void {
  const token = c.peek();
  if (token?.type === 'lifetime' || token?.type === 'literal') {
    c.bump();
    return;
  }
  if (c.group('brace')) {
    c.bump();
    return;
  }
  if (c.isPunct('-') && c.literal(1)) {
    c.bump();
    c.bump();
    return;
  }
  // Associated item binding (`Item = u8`) or constraint (`Item: Copy`).
  if (c.plainIdent() && (c.isPunct('=', 1) || c.isPunct(':', 1))) {
    c.bump();
    if (c.eatPunct('=')) {
      parseGenericArg(c);
    } else {
      c.bump();
      parseBounds(c, true);
    }
    return;
  }
  parseType(c);
}

function parsePathArguments(c: Cursor, style: PathStyle): TokenSlice | null {
  const start = c.position;

  if (c.isPunct('::') && c.startsWithPunct('<', 2)) {
    c.bump();
    c.bump();
    parseGenericArgs(c);
    return c.slice(start);
  }
  if (style === 'expr') return null;

  if (c.startsWithPunct('<') && !c.isPunct('<=') && !c.isPunct('<<=')) {
    parseGenericArgs(c);
    return c.slice(start);
  }
  // `Fn(A, B) -> C`
  const args = c.group('parenthesis');
  if (args) {
    c.bump();
    parseTypeList(c.enter(args));
    parseReturnType(c);
    return c.slice(start);
  }
  return null;
}

function parsePathSegments(c: Cursor, style: PathStyle): PathSegment[] {
  const segments: PathSegment[] = [];
  for (;;) {
    const ident = c.pathIdent();
    if (!ident) {
      throw c.error(`expected identifier, found ${describeToken(c.peek())}`);
    }
    c.bump();
    segments.push({
      ident: identText(ident),
      arguments: parsePathArguments(c, style)
    });
    if (!(c.isPunct('::') && c.pathIdent(2))) return segments;
    c.bump();
    c.bump();
  }
}

/**
 * Parses `a::b::<T>::c`, with an optional leading `::`.
 */
export function parsePath(c: Cursor, style: PathStyle): Path {
  const leadingColon = c.eatPunct('::');
  return { leadingColon, segments: parsePathSegments(c, style) };
}

/**
 * Parses `<T as Trait>::rest` or `<T>::rest`.
 *
 * Without `as`, the returned path has a leading `::` and only the segments
 * after the `>`.
 */
export function parseQPath(c: Cursor, style: PathStyle): QualifiedPath {
  c.splitPunct('<');
  const ty = parseType(c);
  const path: Path = c.eatKeyword('as')
    ? parsePath(c, 'type')
    : { leadingColon: true, segments: [] };
  if (!c.splitPunct('>')) {
    throw c.error(`expected \`>\`, found ${describeToken(c.peek())}`);
  }
  c.expectPunct('::');
  path.segments.push(...parsePathSegments(c, style));
  return { qself: { ty }, path };
}
