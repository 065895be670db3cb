import type { TokenStream, TokenTree } from '../../types';
import { ParseError } from '../parse-error';
import type { ErrorShape, TokenShape } from './types';

export function shapeOf(token: TokenTree): TokenShape {
  switch (token.type) {
    case 'ident':
      return `ident ${token.raw ? 'r#' : ''}${token.name}`;
    case 'lifetime':
      return `lifetime ${token.name}`;
    case 'punct':
      return `punct ${token.char} ${token.spacing}`;
    case 'literal':
      return `literal ${token.text}`;
    case 'group':
      return { group: token.delimiter, stream: shapesOf(token.stream) };
  }
}

export function shapesOf(stream: TokenStream): TokenShape[] {
  return stream.map(shapeOf);
}

/**
 * Runs `fn` and returns the location of the `ParseError` it throws.
 * Fails the test when nothing, or something else, is thrown.
 */
export function captureParseError(fn: () => unknown): ErrorShape {
  try {
    fn();
  } catch (error) {
    if (error instanceof ParseError && error.line !== null && error.column !== null) {
      return { reason: error.reason, line: error.line, column: error.column };
    }
    throw error;
  }
  throw new Error('expected a ParseError');
}
