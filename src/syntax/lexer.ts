import type {
  Delimiter,
  GroupToken,
  TokenStream,
  TokenTree
} from '../types';
import { LiteralError, validateLiteral } from './literal';
import { ParseError } from './parse-error';

/**
 * Operators lexed by maximal munch, longest first.
 * Each one becomes a run of joint puncts.
 */
const OPERATORS = [
  '<<=',
  '>>=',
  '...',
  '..=',
  '::',
  '->',
  '=>',
  '==',
  '!=',
  '<=',
  '>=',
  '&&',
  '||',
  '+=',
  '-=',
  '*=',
  '/=',
  '%=',
  '^=',
  '&=',
  '|=',
  '<<',
  '>>',
  '..'
] as const;

const PUNCT_CHARS = new Set('~!@#$%^&*-=+|;:,<.>/?');

const OPENERS: Record<string, Delimiter> = {
  '(': 'parenthesis',
  '[': 'bracket',
  '{': 'brace'
};

const CLOSERS: Record<string, Delimiter> = {
  ')': 'parenthesis',
  ']': 'bracket',
  '}': 'brace'
};

const IDENT_START = /[\p{XID_Start}_]/u;
const IDENT_CONTINUE = /\p{XID_Continue}/u;
const WHITESPACE = /\s/u;

type OpenGroup = {
  delimiter: Delimiter;
  offset: number;
  stream: TokenTree[];
};

/**
 * Lexes Rust source text into token trees.
 *
 * Comments and whitespace are dropped. Delimiters must balance.
 *
 * @param source
 *   The source text.
 * @returns
 *   The top-level token stream.
 * @throws {ParseError}
 *   On unterminated literals or comments, unbalanced delimiters and
 *   characters that start no token.
 */
export function tokenize(source: string): TokenStream {
  return new Lexer(source).run();
}

class Lexer {
  private pos = 0;
  private readonly stack: OpenGroup[] = [];
  private current: TokenTree[] = [];

  constructor(private readonly source: string) {}

  run(): TokenStream {
    while (this.skipTrivia()) {
      this.lexToken();
    }

    const unclosed = this.stack.at(-1);
    if (unclosed) {
      throw new ParseError('this file contains an unclosed delimiter', unclosed.offset);
    }
    return this.current;
  }

  private peek(ahead = 0): string {
    return this.source[this.pos + ahead] ?? '';
  }

  /**
   * Reads the code point at `index` (surrogate pairs joined).
   */
  private charAt(index: number): string {
    const codePoint = this.source.codePointAt(index);
    return codePoint === undefined ? '' : String.fromCodePoint(codePoint);
  }

  /**
   * Skips whitespace and comments.
   *
   * @returns `true` when input remains.
   */
  private skipTrivia(): boolean {
    while (this.pos < this.source.length) {
      const ch = this.peek();
      if (WHITESPACE.test(ch)) {
        this.pos++;
      } else if (ch === '/' && this.peek(1) === '/') {
        const newline = this.source.indexOf('\n', this.pos);
        this.pos = newline < 0 ? this.source.length : newline + 1;
      } else if (ch === '/' && this.peek(1) === '*') {
        this.skipBlockComment();
      } else {
        return true;
      }
    }
    return false;
  }

  /**
   * Block comments nest, so an inner `/*` needs its own closing delimiter.
   */
  private skipBlockComment(): void {
    const start = this.pos;
    let depth = 0;
    while (this.pos < this.source.length) {
      if (this.peek() === '/' && this.peek(1) === '*') {
        depth++;
        this.pos += 2;
      } else if (this.peek() === '*' && this.peek(1) === '/') {
        depth--;
        this.pos += 2;
        if (depth === 0) return;
      } else {
        this.pos++;
      }
    }
    throw new ParseError('unterminated block comment', start);
  }

  private lexToken(): void {
    const start = this.pos;
    const ch = this.charAt(start);

    const opener = OPENERS[ch];
    if (opener) {
      this.stack.push({ delimiter: opener, offset: start, stream: this.current });
      this.current = [];
      this.pos++;
      return;
    }

    const closer = CLOSERS[ch];
    if (closer) {
      this.closeGroup(closer, start);
      return;
    }

    if (/[0-9]/.test(ch)) {
      this.lexNumber(start);
    } else if (ch === "'") {
      this.lexQuote(start);
    } else if (ch === '"') {
      this.lexString(start, start);
    } else if (IDENT_START.test(ch)) {
      this.lexIdentOrPrefixed(start);
    } else if (PUNCT_CHARS.has(ch)) {
      this.lexPunct(start);
    } else {
      throw new ParseError(`unknown start of token: ${ch}`, start);
    }
  }

  private closeGroup(delimiter: Delimiter, offset: number): void {
    const open = this.stack.pop();
    if (!open) {
      throw new ParseError('unexpected closing delimiter', offset);
    }
    if (open.delimiter !== delimiter) {
      throw new ParseError('mismatched closing delimiter', offset);
    }
    const group: GroupToken = {
      type: 'group',
      delimiter,
      stream: this.current,
      offset: open.offset,
      closeOffset: offset
    };
    this.current = open.stream;
    this.current.push(group);
    this.pos++;
  }

  private lexPunct(start: number): void {
    const operator = OPERATORS.find(op => this.source.startsWith(op, start));
    const text = operator ?? this.peek();
    [...text].forEach((char, index) => {
      this.current.push({
        type: 'punct',
        char,
        spacing: index < text.length - 1 ? 'joint' : 'alone',
        offset: start + index
      });
    });
    this.pos += text.length;
  }

  private readIdentChars(): string {
    const start = this.pos;
    let ch = this.charAt(this.pos);
    if (!IDENT_START.test(ch)) return '';
    while (ch !== '' && IDENT_CONTINUE.test(ch)) {
      this.pos += ch.length;
      ch = this.charAt(this.pos);
    }
    return this.source.slice(start, this.pos);
  }

  /**
   * Identifiers, raw identifiers and the prefixed literals
   * `r"…"`, `b'…'`, `b"…"`, `br"…"`, `c"…"` and `cr"…"`.
   */
  private lexIdentOrPrefixed(start: number): void {
    const rest = this.source.slice(start);

    if (rest.startsWith('r#') && IDENT_START.test(this.charAt(start + 2))) {
      this.pos += 2;
      const name = this.readIdentChars();
      this.current.push({ type: 'ident', name, raw: true, offset: start });
      return;
    }
    if (/^(r|br|cr)#*"/.test(rest)) {
      this.lexRawString(start);
      return;
    }
    if (rest.startsWith("b'")) {
      this.pos++;
      this.lexChar(start);
      return;
    }
    if (rest.startsWith('b"') || rest.startsWith('c"')) {
      this.lexString(start, start + 1);
      return;
    }

    const name = this.readIdentChars();
    this.current.push({ type: 'ident', name, raw: false, offset: start });
  }

  /**
   * Reads an optional suffix and emits the literal token.
   */
  private finishLiteral(start: number): void {
    this.readIdentChars();
    const text = this.source.slice(start, this.pos);
    try {
      validateLiteral(text);
    } catch (error) {
      if (error instanceof LiteralError) {
        throw new ParseError(error.message, start);
      }
      throw error;
    }
    this.current.push({ type: 'literal', text, offset: start });
  }

  private lexString(start: number, quote: number): void {
    let index = quote + 1;
    while (index < this.source.length && this.source[index] !== '"') {
      index += this.source[index] === '\\' ? 2 : 1;
    }
    if (index >= this.source.length) {
      throw new ParseError('unterminated double quote string', start);
    }
    this.pos = index + 1;
    this.finishLiteral(start);
  }

  private lexRawString(start: number): void {
    let index = this.source.indexOf('r', start) + 1;
    let hashes = 0;
    while (this.source[index] === '#') {
      hashes++;
      index++;
    }
    const terminator = '"' + '#'.repeat(hashes);
    const close = this.source.indexOf(terminator, index + 1);
    if (close < 0) {
      throw new ParseError('unterminated raw string', start);
    }
    this.pos = close + terminator.length;
    this.finishLiteral(start);
  }

  /**
   * Lexes a char literal whose opening quote is at the current position.
   */
  private lexChar(start: number): void {
    let index = this.pos + 1;
    if (this.source[index] === '\\') {
      index += 2;
      while (index < this.source.length && !/['\n]/.test(this.source[index] ?? '')) {
        index++;
      }
    } else {
      index += this.charAt(index).length;
    }
    if (this.source[index] !== "'") {
      throw new ParseError('unterminated character literal', start);
    }
    this.pos = index + 1;
    this.finishLiteral(start);
  }

  /**
   * A quote starts either a char literal (`'a'`, `'\n'`) or a lifetime
   * (`'a`, `'static`).
   */
  private lexQuote(start: number): void {
    const next = this.charAt(start + 1);
    const afterNext = this.source[start + 1 + next.length];

    if (next === '\\' || (next !== '' && afterNext === "'")) {
      this.lexChar(start);
      return;
    }

    if (IDENT_START.test(next)) {
      this.pos++;
      const name = this.readIdentChars();
      this.current.push({ type: 'lifetime', name, offset: start });
      return;
    }

    throw new ParseError('unterminated character literal', start);
  }

  /**
   * Numbers: decimal, `0x`, `0o`, `0b`, fractions, exponents and suffixes.
   *
   * A `.` only continues the literal when it is not followed by another `.`
   * (a range) or by an identifier (a field or method), so `1..2`, `1.max(2)`
   * and `x.0.1` lex as the parser expects.
   */
  private lexNumber(start: number): void {
    const radix = /^0[xob]/.exec(this.source.slice(start, start + 2));
    if (radix) {
      // Letters past the digits form the suffix, so `0x1Fu8` ends in `u8`.
      const digit = radix[0] === '0x' ? /[0-9a-fA-F_]/ : /[0-9_]/;
      this.pos += 2;
      while (digit.test(this.peek())) this.pos++;
      this.finishLiteral(start);
      return;
    }

    this.skipDigits();

    const next = this.charAt(this.pos + 1);
    if (this.peek() === '.' && next !== '.' && !IDENT_START.test(next)) {
      this.pos++;
      if (/[0-9]/.test(this.peek())) this.skipDigits();
    }

    if (/[eE]/.test(this.peek())) {
      const exponent = /^[eE][+-]?_*[0-9]/.exec(this.source.slice(this.pos));
      if (exponent) {
        this.pos += exponent[0].length;
        this.skipDigits();
      }
    }

    this.finishLiteral(start);
  }

  private skipDigits(): void {
    while (/[0-9_]/.test(this.peek())) this.pos++;
  }
}
