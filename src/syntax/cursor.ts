import type {
  Delimiter,
  GroupToken,
  IdentToken,
  LiteralToken,
  TokenSlice,
  TokenStream,
  TokenTree
} from '../types';
import { ParseError } from './parse-error';
import keywords from './keywords.json';

const KEYWORDS = new Set<string>([...keywords.strict, ...keywords.reserved]);

/**
 * Keywords that may still begin a path (`self::x`, `crate::y`).
 */
const PATH_KEYWORDS = new Set(['self', 'Self', 'super', 'crate']);

/**
 * Whether `name` is a keyword when written without the `r#` prefix.
 */
export function isKeywordName(name: string): boolean {
  return KEYWORDS.has(name);
}

/**
 * Describes a token for diagnostics.
 */
export function describeToken(token: TokenTree | undefined): string {
  if (!token) return 'end of input';
  switch (token.type) {
    case 'ident':
      return `\`${token.raw ? 'r#' : ''}${token.name}\``;
    case 'lifetime':
      return `\`'${token.name}\``;
    case 'punct':
      return `\`${token.char}\``;
    case 'literal':
      return `literal \`${token.text}\``;
    case 'group':
      return token.delimiter === 'parenthesis'
        ? '`(`'
        : token.delimiter === 'bracket'
          ? '`[`'
          : token.delimiter === 'brace'
            ? '`{`'
            : 'group';
  }
}

/**
 * Read position over one nesting level of a token stream.
 *
 * Groups are single tokens at this level; parsers descend into one by
 * opening a new cursor over its stream with {@link Cursor.enter}.
 * Multi-character operators are matched across runs of joint puncts.
 */
export class Cursor {
  private index = 0;

  /**
   * @param stream
   *   The tokens of this nesting level.
   * @param endOffset
   *   Source offset reported for errors at the end of the stream (the
   *   closing delimiter, or the end of the source at top level).
   * @param detached
   *   Puncts split off a longer operator, shared by every cursor of one
   *   parse.
   */
  constructor(
    readonly stream: TokenStream,
    private readonly endOffset: number,
    private readonly detached: Set<TokenTree> = new Set()
  ) {}

  /**
   * A cursor over the contents of `group`.
   */
  enter(group: GroupToken): Cursor {
    return new Cursor(group.stream, group.closeOffset, this.detached);
  }

  get position(): number {
    return this.index;
  }

  get eof(): boolean {
    return this.index >= this.stream.length;
  }

  peek(ahead = 0): TokenTree | undefined {
    return this.stream[this.index + ahead];
  }

  /**
   * Consumes one token tree.
   *
   * @throws {ParseError} At the end of the stream.
   */
  bump(): TokenTree {
    const token = this.stream[this.index];
    if (!token) throw this.error('unexpected end of input');
    this.index++;
    return token;
  }

  /**
   * The tokens consumed since `start`.
   */
  slice(start: number): TokenSlice {
    return { stream: this.stream, start, end: this.index, detached: this.detached };
  }

  ident(ahead = 0): IdentToken | undefined {
    const token = this.peek(ahead);
    return token?.type === 'ident' ? token : undefined;
  }

  /**
   * An identifier usable as a name: raw, or not a keyword.
   */
  plainIdent(ahead = 0): IdentToken | undefined {
    const token = this.ident(ahead);
    return token && (token.raw || !KEYWORDS.has(token.name)) ? token : undefined;
  }

  /**
   * An identifier that may begin or continue a path.
   */
  pathIdent(ahead = 0): IdentToken | undefined {
    const token = this.ident(ahead);
    if (!token) return undefined;
    return token.raw || !KEYWORDS.has(token.name) || PATH_KEYWORDS.has(token.name)
      ? token
      : undefined;
  }

  literal(ahead = 0): LiteralToken | undefined {
    const token = this.peek(ahead);
    return token?.type === 'literal' ? token : undefined;
  }

  group(delimiter: Delimiter, ahead = 0): GroupToken | undefined {
    const token = this.peek(ahead);
    return token?.type === 'group' && token.delimiter === delimiter
      ? token
      : undefined;
  }

  isKeyword(name: string, ahead = 0): boolean {
    const token = this.ident(ahead);
    return token !== undefined && !token.raw && token.name === name;
  }

  eatKeyword(name: string): boolean {
    if (!this.isKeyword(name)) return false;
    this.index++;
    return true;
  }

  expectKeyword(name: string): void {
    if (!this.eatKeyword(name)) {
      throw this.error(`expected \`${name}\`, found ${describeToken(this.peek())}`);
    }
  }

  /**
   * Whether the operator `op` is next, written exactly: `<` does not
   * match the start of `<=` or `<<`.
   */
  isPunct(op: string, ahead = 0): boolean {
    return this.matchPunct(op, ahead, true);
  }

  /**
   * Whether `op` begins the next operator, whatever follows it: `&`
   * matches the start of `&&` and `>` the start of `>>`.
   */
  startsWithPunct(op: string, ahead = 0): boolean {
    return this.matchPunct(op, ahead, false);
  }

  private matchPunct(op: string, ahead: number, exact: boolean): boolean {
    const last = op.length - 1;
    for (let i = 0; i <= last; i++) {
      const token = this.peek(ahead + i);
      if (token?.type !== 'punct' || token.char !== op[i]) return false;
      if (i < last && token.spacing !== 'joint') return false;
      if (i === last && exact && token.spacing === 'joint') return false;
    }
    return true;
  }

  eatPunct(op: string): boolean {
    if (!this.isPunct(op)) return false;
    this.index += op.length;
    return true;
  }

  expectPunct(op: string): void {
    if (!this.eatPunct(op)) {
      throw this.error(`expected \`${op}\`, found ${describeToken(this.peek())}`);
    }
  }

  /**
   * Consumes a single `char` punct even when it is the first half of a
   * longer operator (closing `>` of `Vec<Vec<u8>>`).
   */
  splitPunct(char: string): boolean {
    const token = this.peek();
    if (!token || !this.startsWithPunct(char)) return false;
    if (!this.isPunct(char)) this.detached.add(token);
    this.index++;
    return true;
  }

  expectEof(): void {
    if (!this.eof) {
      throw this.error(`unexpected token ${describeToken(this.peek())}`);
    }
  }

  /**
   * A parse error positioned at the next token, or at the end of the
   * stream.
   */
  error(message: string): ParseError {
    return new ParseError(message, this.peek()?.offset ?? this.endOffset);
  }
}
