import type {
  Attribute,
  Block,
  Delimiter,
  Macro,
  Pat,
  Path,
  SyntaxNode,
  TokenSlice,
  TokenStream,
  TokenTree,
  Type
} from '../types';

/**
 * Opaque rendering.
 *
 * Sub-trees the canonical value does not decompose (blocks, patterns,
 * types, macro invocations, generic arguments, attributes, and nodes of
 * unknown kind) are emitted as text re-derived from their tokens:
 *
 * - tokens are separated by one space, except after a joint punct, so
 *   multi-character operators stay whole (`::`, `->`, `..=`); a punct the
 *   parser split off a longer operator counts as alone (`Vec<Vec<u8>>`
 *   renders `Vec < Vec < u8 > >`);
 * - groups render as `(inner)`, `[inner]` and `{ inner }` (`{ }` when
 *   empty);
 * - literals keep their source text, lifetimes render as `'name` and raw
 *   identifiers as `r#name`.
 *
 * Comments and source whitespace are not reproduced. The output is a
 * pure function of the token trees, so equal input renders byte-identical
 * text.
 */

const NONE_DETACHED: ReadonlySet<TokenTree> = new Set();

function renderTree(token: TokenTree, detached: ReadonlySet<TokenTree>): string {
  switch (token.type) {
    case 'ident':
      return token.raw ? `r#${token.name}` : token.name;
    case 'lifetime':
      return `'${token.name}`;
    case 'punct':
      return token.char;
    case 'literal':
      return token.text;
    case 'group':
      return wrapGroup(token.delimiter, renderTokens(token.stream, detached));
  }
}

function wrapGroup(delimiter: Delimiter, inner: string): string {
  switch (delimiter) {
    case 'parenthesis':
      return `(${inner})`;
    case 'bracket':
      return `[${inner}]`;
    case 'brace':
      return inner === '' ? '{ }' : `{ ${inner} }`;
    case 'none':
      return inner;
  }
}

/**
 * @param detached
 *   Joint puncts to render as if they were alone.
 */
export function renderTokens(
  stream: TokenStream,
  detached: ReadonlySet<TokenTree> = NONE_DETACHED
): string {
  let out = '';
  stream.forEach((token, index) => {
    const previous = stream[index - 1];
    const joint =
      previous?.type === 'punct' && previous.spacing === 'joint' && !detached.has(previous);
    if (index > 0 && !joint) out += ' ';
    out += renderTree(token, detached);
  });
  return out;
}

export function renderSlice(slice: TokenSlice): string {
  return renderTokens(slice.stream.slice(slice.start, slice.end), slice.detached);
}

export function typeToString(ty: Type): string {
  return renderSlice(ty.tokens);
}

export function patToString(pat: Pat): string {
  return renderSlice(pat.tokens);
}

/**
 * Renders a path segment by segment: `std :: collections :: HashMap`,
 * `Vec :: < i32 > :: new`. A leading `::` renders as `:: `.
 */
export function pathToString(path: Path): string {
  const segments = path.segments.map(segment =>
    segment.arguments
      ? `${segment.ident} ${renderSlice(segment.arguments)}`
      : segment.ident
  );
  const text = segments.join(' :: ');
  return path.leadingColon ? `:: ${text}` : text;
}

export function blockToString(block: Block): string {
  return renderSlice(block.tokens);
}

export function attributeToString(attr: Attribute): string {
  return renderSlice(attr.tokens);
}

export function macroToString(mac: Macro): string {
  return renderSlice(mac.tokens);
}

/**
 * Renders a whole node; the text of `Verbatim` and `Unknown` values.
 */
export function renderExpr(node: SyntaxNode): string {
  return renderSlice(node.tokens);
}
