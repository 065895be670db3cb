import type { Expr, TokenStream } from '../types';
import { Cursor } from './cursor';
import { ExprParser } from './expr-parser';
import { tokenize } from './lexer';
import { ParseError, locateParseError } from './parse-error';

export { ParseError } from './parse-error';
export { tokenize } from './lexer';

/**
 * Parses `source` as exactly one Rust expression.
 *
 * @param source
 *   Source text of the expression. Surrounding whitespace and comments
 *   are allowed; any other trailing token is an error.
 * @returns
 *   The expression tree.
 * @throws {ParseError}
 *   With the 1-based line and column of the offending token, or without a
 *   location when nesting exhausts the call stack.
 */
export function parseExpr(source: string): Expr {
  try {
    return parseTokens(tokenize(source), source.length);
  } catch (error) {
    if (error instanceof ParseError) throw locateParseError(error, source);
    // The parser recurses once per nesting level.
    if (error instanceof RangeError) throw new ParseError('expression nesting too deep', 0);
    throw error;
  }
}

function parseTokens(tokens: TokenStream, endOffset: number): Expr {
  const cursor = new Cursor(tokens, endOffset);
  const expr = new ExprParser().parseExpr(cursor);
  cursor.expectEof();
  return expr;
}
