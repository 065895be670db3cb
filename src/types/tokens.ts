/**
 * Token tree model produced by the lexer.
 *
 * The lexer groups balanced delimiters into {@link GroupToken} nodes, so a
 * token stream is a tree: parsers walk one nesting level at a time and treat
 * each group as an atomic token until they descend into it.
 *
 * Multi-character operators (`+=`, `::`, `..=`, ...) are not single tokens.
 * They are stored as a run of one-character {@link PunctToken}s where every
 * punct but the last is `joint`. This lets the parser split `>>` into two
 * closing angle brackets without re-lexing.
 */

export type Spacing = 'alone' | 'joint';

export type Delimiter = 'parenthesis' | 'bracket' | 'brace' | 'none';

/**
 * Fields shared by every token tree.
 */
type TokenBase = {
  /**
   * Offset of the token's first character in the source text. Used for
   * diagnostics only; it never reaches the converted value.
   */
  offset: number;
};

export type IdentToken = TokenBase & {
  type: 'ident';
  /**
   * The identifier without any `r#` prefix.
   */
  name: string;
  /**
   * Whether the identifier was written as a raw identifier (`r#match`).
   */
  raw: boolean;
};

export type LifetimeToken = TokenBase & {
  type: 'lifetime';
  /**
   * The lifetime or label name without the leading quote (`'outer` -> `outer`).
   */
  name: string;
};

export type PunctToken = TokenBase & {
  type: 'punct';
  char: string;
  spacing: Spacing;
};

export type LiteralToken = TokenBase & {
  type: 'literal';
  /**
   * The literal exactly as written in the source, including prefix,
   * quotes and suffix.
   */
  text: string;
};

export type GroupToken = TokenBase & {
  type: 'group';
  delimiter: Delimiter;
  stream: TokenStream;
  /**
   * Offset of the closing delimiter.
   */
  closeOffset: number;
};

export type TokenTree =
  | IdentToken
  | LifetimeToken
  | PunctToken
  | LiteralToken
  | GroupToken;

export type TokenStream = readonly TokenTree[];

/**
 * A contiguous run of token trees at one nesting level.
 *
 * Slices reference the stream they were cut from instead of copying it, so
 * attaching one to every node keeps parsing linear.
 */
export type TokenSlice = {
  stream: TokenStream;
  start: number;
  end: number;
  /**
   * Joint puncts the parser split off a longer operator, such as the first
   * `>` of a `>>` that closes two generic argument lists. They render as
   * standalone tokens.
   */
  detached: ReadonlySet<TokenTree>;
};
