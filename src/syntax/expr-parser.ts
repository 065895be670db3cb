import type {
  Arm,
  Attribute,
  BinOpKind,
  Block,
  Expr,
  FieldValue,
  GroupToken,
  Label,
  LifetimeToken,
  Pat,
  Path,
  QSelf,
  TokenSlice,
  UnOpKind
} from '../types';
import { parseInnerAttrs, parseOuterAttrs } from './attr-parser';
import { isBlockLike } from './classify';
import { describeToken, isKeywordName, type Cursor } from './cursor';
import { literalKind } from './literal';
import { ParseError } from './parse-error';
import { parsePatMulti, parsePatSingle } from './pat-parser';
import { parseStmts } from './stmt-parser';
import {
  identText,
  parseGenericArgs,
  parseGenericParams,
  parsePath,
  parseQPath,
  parseType
} from './type-parser';

/**
 * Context flags threaded through expression parsing.
 */
export type Restrictions = {
  /**
   * Set in `if`, `while` and `match` heads and `for` iterables, where
   * `{` opens the body and cannot start a struct literal.
   */
  noStruct: boolean;
};

const DEFAULT: Restrictions = { noStruct: false };
const NO_STRUCT: Restrictions = { noStruct: true };

/**
 * Binding power of binary operators, loosest first.
 */
export const Precedence = {
  Assign: 1,
  Range: 2,
  Or: 3,
  And: 4,
  Compare: 5,
  BitOr: 6,
  BitXor: 7,
  BitAnd: 8,
  Shift: 9,
  Sum: 10,
  Product: 11,
  Cast: 12
} as const;

type Operator = {
  op: string;
  kind: BinOpKind;
  precedence: number;
};

const BINARY_OPERATORS: readonly Operator[] = [
  { op: '||', kind: 'Or', precedence: Precedence.Or },
  { op: '&&', kind: 'And', precedence: Precedence.And },
  { op: '==', kind: 'Eq', precedence: Precedence.Compare },
  { op: '!=', kind: 'Ne', precedence: Precedence.Compare },
  { op: '<', kind: 'Lt', precedence: Precedence.Compare },
  { op: '<=', kind: 'Le', precedence: Precedence.Compare },
  { op: '>', kind: 'Gt', precedence: Precedence.Compare },
  { op: '>=', kind: 'Ge', precedence: Precedence.Compare },
  { op: '|', kind: 'BitOr', precedence: Precedence.BitOr },
  { op: '^', kind: 'BitXor', precedence: Precedence.BitXor },
  { op: '&', kind: 'BitAnd', precedence: Precedence.BitAnd },
  { op: '<<', kind: 'Shl', precedence: Precedence.Shift },
  { op: '>>', kind: 'Shr', precedence: Precedence.Shift },
  { op: '+', kind: 'Add', precedence: Precedence.Sum },
  { op: '-', kind: 'Sub', precedence: Precedence.Sum },
  { op: '*', kind: 'Mul', precedence: Precedence.Product },
  { op: '/', kind: 'Div', precedence: Precedence.Product },
  { op: '%', kind: 'Rem', precedence: Precedence.Product }
];

const COMPOUND_ASSIGN: readonly Omit<Operator, 'precedence'>[] = [
  { op: '+=', kind: 'AddAssign' },
  { op: '-=', kind: 'SubAssign' },
  { op: '*=', kind: 'MulAssign' },
  { op: '/=', kind: 'DivAssign' },
  { op: '%=', kind: 'RemAssign' },
  { op: '^=', kind: 'BitXorAssign' },
  { op: '&=', kind: 'BitAndAssign' },
  { op: '|=', kind: 'BitOrAssign' },
  { op: '<<=', kind: 'ShlAssign' },
  { op: '>>=', kind: 'ShrAssign' }
];

const UNARY_OPERATORS: readonly (readonly [string, UnOpKind])[] = [
  ['*', 'Deref'],
  ['!', 'Not'],
  ['-', 'Neg']
];

/**
 * Keywords that can begin an expression.
 */
const EXPR_KEYWORDS = new Set([
  'async',
  'become',
  'break',
  'const',
  'continue',
  'crate',
  'false',
  'for',
  'if',
  'let',
  'loop',
  'match',
  'move',
  'return',
  'self',
  'Self',
  'static',
  'super',
  'true',
  'try',
  'unsafe',
  'while',
  'yield'
]);

const EXPR_START_PUNCTS = new Set(['-', '!', '*', '&', '|', '<', '#']);

/**
 * Prepends `attrs` to the node's own attributes and widens its tokens.
 */
function withAttrs(expr: Expr, attrs: Attribute[], tokens: TokenSlice): Expr {
  if (attrs.length === 0) return expr;
  return { ...expr, attrs: [...attrs, ...expr.attrs], tokens };
}

type BlockWithAttrs = {
  block: Block;
  inner: Attribute[];
};

/**
 * Recursive-descent parser for Rust expressions over token trees.
 *
 * Binary operators are parsed by precedence climbing
 * ({@link ExprParser.parseBinary}); everything tighter than a cast goes
 * through unary, postfix and atom parsing. The parser keeps no state
 * between calls: all position lives in the {@link Cursor}.
 */
export class ExprParser {
  /**
   * Parses one expression, assignments included.
   */
  parseExpr(c: Cursor, r: Restrictions = DEFAULT): Expr {
    return this.parseOperand(c, r, Precedence.Assign);
  }

  /**
   * Parses an expression in statement position: a block-like expression
   * (`if`, `match`, `loop`, a block, ...) ends the expression unless a
   * `.` or `?` follows it.
   *
   * @param start
   *   Position before `attrs`.
   * @param attrs
   *   Outer attributes the caller already consumed.
   */
  parseEarlyExpr(c: Cursor, start: number, attrs: Attribute[]): Expr {
    const bodyStart = c.position;

    if (!this.startsBlockLike(c)) {
      const lhs = withAttrs(this.parsePrefix(c, DEFAULT), attrs, c.slice(start));
      return this.parseBinary(c, DEFAULT, lhs, start, Precedence.Assign);
    }

    const atom = this.parseAtom(c, DEFAULT);
    if (!c.isPunct('.') && !c.isPunct('?')) {
      return withAttrs(atom, attrs, c.slice(start));
    }
    const trailer = this.parsePostfix(c, DEFAULT, atom, bodyStart);
    const lhs = withAttrs(trailer, attrs, c.slice(start));
    return this.parseBinary(c, DEFAULT, lhs, start, Precedence.Assign);
  }

  /**
   * Parses a brace-delimited block. Inner attributes are not allowed.
   */
  parseBlock(c: Cursor): Block {
    const { block, inner } = this.parseBlockWithAttrs(c);
    const [attr] = inner;
    if (attr) {
      throw new ParseError(
        'an inner attribute is not permitted in this context',
        attr.tokens.stream[attr.tokens.start]?.offset ?? 0
      );
    }
    return block;
  }

  private parseBlockWithAttrs(c: Cursor): BlockWithAttrs {
    const group = c.group('brace');
    if (!group) {
      throw c.error(`expected \`{\`, found ${describeToken(c.peek())}`);
    }
    const start = c.position;
    c.bump();
    const body = c.enter(group);
    const inner = parseInnerAttrs(body);
    const stmts = parseStmts(body, this);
    return { block: { stmts, tokens: c.slice(start) }, inner };
  }

  /**
   * Unary operand followed by binary operators binding at least as
   * tightly as `minPrecedence`.
   */
  private parseOperand(c: Cursor, r: Restrictions, minPrecedence: number): Expr {
    const start = c.position;
    const lhs = this.parseUnary(c, r);
    return this.parseBinary(c, r, lhs, start, minPrecedence);
  }

  /**
   * Precedence climbing over assignment, range, `as` and binary operators.
   *
   * Assignment is right-associative; comparisons and ranges do not chain.
   */
  parseBinary(
    c: Cursor,
    r: Restrictions,
    lhs: Expr,
    start: number,
    minPrecedence: number
  ): Expr {
    let left = lhs;
    let lastCompare = false;
    let lastRange = false;

    for (;;) {
      if (c.isPunct('=')) {
        if (Precedence.Assign < minPrecedence) break;
        c.bump();
        const right = this.parseOperand(c, r, Precedence.Assign);
        left = { kind: 'Assign', attrs: [], tokens: c.slice(start), left, right };
        continue;
      }

      const compound = COMPOUND_ASSIGN.find(({ op }) => c.isPunct(op));
      if (compound) {
        if (Precedence.Assign < minPrecedence) break;
        const opStart = c.position;
        c.eatPunct(compound.op);
        const op = { kind: compound.kind, tokens: c.slice(opStart) };
        const right = this.parseOperand(c, r, Precedence.Assign);
        left = { kind: 'Binary', attrs: [], tokens: c.slice(start), left, op, right };
        continue;
      }

      if (c.isPunct('..') || c.isPunct('..=')) {
        if (Precedence.Range < minPrecedence) break;
        if (lastRange) throw c.error('range operators cannot be chained');
        const closed = c.eatPunct('..=');
        if (!closed) c.eatPunct('..');
        const end =
          closed || this.canBeginExpr(c, r)
            ? this.parseOperand(c, r, Precedence.Range + 1)
            : null;
        left = {
          kind: 'Range',
          attrs: [],
          tokens: c.slice(start),
          start: left,
          limits: closed ? 'Closed' : 'HalfOpen',
          end
        };
        lastRange = true;
        continue;
      }

      if (c.isKeyword('as')) {
        if (Precedence.Cast < minPrecedence) break;
        c.bump();
        const ty = parseType(c, false);
        left = { kind: 'Cast', attrs: [], tokens: c.slice(start), expr: left, ty };
        continue;
      }

      const binary = BINARY_OPERATORS.find(({ op }) => c.isPunct(op));
      if (!binary || binary.precedence < minPrecedence) break;

      const isCompare = binary.precedence === Precedence.Compare;
      if (isCompare && lastCompare) {
        throw c.error('comparison operators cannot be chained');
      }
      const opStart = c.position;
      c.eatPunct(binary.op);
      const op = { kind: binary.kind, tokens: c.slice(opStart) };
      const right = this.parseOperand(c, r, binary.precedence + 1);
      left = { kind: 'Binary', attrs: [], tokens: c.slice(start), left, op, right };
      lastCompare = isCompare;
    }

    return left;
  }

  private parseUnary(c: Cursor, r: Restrictions): Expr {
    const start = c.position;
    const attrs = parseOuterAttrs(c);
    const expr = this.parsePrefix(c, r);
    return withAttrs(expr, attrs, c.slice(start));
  }

  private parsePrefix(c: Cursor, r: Restrictions): Expr {
    const start = c.position;

    // `&&x` is two references; the second `&` is left for the operand.
    if (c.splitPunct('&')) {
      if (c.isKeyword('raw') && (c.isKeyword('const', 1) || c.isKeyword('mut', 1))) {
        c.bump();
        const mutability = c.isKeyword('mut');
        c.bump();
        const expr = this.parseUnary(c, r);
        return { kind: 'RawAddr', attrs: [], tokens: c.slice(start), mutability, expr };
      }
      const mutability = c.eatKeyword('mut');
      const expr = this.parseUnary(c, r);
      return { kind: 'Reference', attrs: [], tokens: c.slice(start), mutability, expr };
    }

    for (const [symbol, kind] of UNARY_OPERATORS) {
      if (c.eatPunct(symbol)) {
        const op = { kind, tokens: c.slice(start) };
        const expr = this.parseUnary(c, r);
        return { kind: 'Unary', attrs: [], tokens: c.slice(start), op, expr };
      }
    }

    return this.parsePostfix(c, r, this.parseAtom(c, r), start);
  }

  /**
   * Calls, method calls, field and tuple-index access, indexing, `?` and
   * `.await`.
   */
  private parsePostfix(c: Cursor, r: Restrictions, atom: Expr, start: number): Expr {
    let expr = atom;
    for (;;) {
      const args = c.group('parenthesis');
      if (args) {
        c.bump();
        expr = {
          kind: 'Call',
          attrs: [],
          tokens: c.slice(start),
          func: expr,
          args: this.parseCommaList(c.enter(args))
        };
        continue;
      }

      const index = c.group('bracket');
      if (index) {
        c.bump();
        const inner = c.enter(index);
        const value = this.parseExpr(inner);
        inner.expectEof();
        expr = { kind: 'Index', attrs: [], tokens: c.slice(start), expr, index: value };
        continue;
      }

      if (c.eatPunct('?')) {
        expr = { kind: 'Try', attrs: [], tokens: c.slice(start), expr };
        continue;
      }

      if (c.isPunct('.')) {
        expr = this.parseDotTrailer(c, expr, start);
        continue;
      }

      return expr;
    }
  }

  private parseDotTrailer(c: Cursor, base: Expr, start: number): Expr {
    c.bump();

    if (c.eatKeyword('await')) {
      return { kind: 'Await', attrs: [], tokens: c.slice(start), base };
    }

    // `t.0`, and `t.0.1`, which lexes as the float `0.1`.
    const literal = c.literal();
    if (literal) {
      const tuple = /^(\d+)(?:\.(\d+))?$/.exec(literal.text);
      if (!tuple) {
        throw c.error(`unexpected token ${describeToken(literal)} after \`.\``);
      }
      c.bump();
      const [, first, second] = tuple;
      const field: Expr = {
        kind: 'Field',
        attrs: [],
        tokens: c.slice(start),
        base,
        member: { kind: 'Unnamed', index: Number(first) }
      };
      if (second === undefined) return field;
      return {
        kind: 'Field',
        attrs: [],
        tokens: c.slice(start),
        base: field,
        member: { kind: 'Unnamed', index: Number(second) }
      };
    }

    const ident = c.ident();
    if (!ident || (!ident.raw && isKeywordName(ident.name))) {
      throw c.error(`expected identifier or integer, found ${describeToken(c.peek())}`);
    }
    c.bump();
    const name = identText(ident);

    let turbofish: TokenSlice | null = null;
    if (c.isPunct('::')) {
      const turbofishStart = c.position;
      c.eatPunct('::');
      parseGenericArgs(c);
      turbofish = c.slice(turbofishStart);
    }

    const args = c.group('parenthesis');
    if (args) {
      c.bump();
      return {
        kind: 'MethodCall',
        attrs: [],
        tokens: c.slice(start),
        receiver: base,
        method: name,
        turbofish,
        args: this.parseCommaList(c.enter(args))
      };
    }
    if (turbofish) {
      throw c.error('field expressions cannot have generic arguments');
    }
    return {
      kind: 'Field',
      attrs: [],
      tokens: c.slice(start),
      base,
      member: { kind: 'Named', name }
    };
  }

  private parseCommaList(c: Cursor): Expr[] {
    const items: Expr[] = [];
    while (!c.eof) {
      items.push(this.parseExpr(c));
      if (c.eof) break;
      c.expectPunct(',');
    }
    return items;
  }

  private parseAtom(c: Cursor, r: Restrictions): Expr {
    const start = c.position;
    const token = c.peek();
    if (!token) throw c.error('expected an expression, found end of input');

    switch (token.type) {
      case 'literal':
        c.bump();
        return {
          kind: 'Lit',
          attrs: [],
          tokens: c.slice(start),
          lit: { kind: literalKind(token.text), text: token.text }
        };
      case 'lifetime':
        return this.parseLabeled(c, token, start);
      case 'group':
        return this.parseGroupAtom(c, token, start);
      case 'ident':
        return this.parseIdentAtom(c, r, start);
      case 'punct':
        break;
    }

    if (c.startsWithPunct('|')) return this.parseClosure(c, r, start);

    if (c.isPunct('..') || c.isPunct('..=')) {
      const closed = c.eatPunct('..=');
      if (!closed) c.eatPunct('..');
      const end =
        closed || this.canBeginExpr(c, r)
          ? this.parseOperand(c, r, Precedence.Range + 1)
          : null;
      return {
        kind: 'Range',
        attrs: [],
        tokens: c.slice(start),
        start: null,
        limits: closed ? 'Closed' : 'HalfOpen',
        end
      };
    }

    if (c.startsWithPunct('<') || c.isPunct('::')) {
      return this.parsePathLike(c, r, start);
    }

    throw c.error(`expected an expression, found ${describeToken(token)}`);
  }

  private parseGroupAtom(c: Cursor, group: GroupToken, start: number): Expr {
    if (group.delimiter === 'brace') {
      const { block, inner } = this.parseBlockWithAttrs(c);
      return { kind: 'Block', attrs: inner, tokens: c.slice(start), label: null, block };
    }
    if (group.delimiter === 'none') {
      throw c.error('unexpected invisible group');
    }

    c.bump();
    const inner = c.enter(group);

    if (group.delimiter === 'parenthesis') {
      if (inner.eof) {
        return { kind: 'Tuple', attrs: [], tokens: c.slice(start), elems: [] };
      }
      const first = this.parseExpr(inner);
      if (inner.eof) {
        return { kind: 'Paren', attrs: [], tokens: c.slice(start), expr: first };
      }
      inner.expectPunct(',');
      const elems = [first, ...this.parseCommaList(inner)];
      return { kind: 'Tuple', attrs: [], tokens: c.slice(start), elems };
    }

    if (inner.eof) {
      return { kind: 'Array', attrs: [], tokens: c.slice(start), elems: [] };
    }
    const first = this.parseExpr(inner);
    if (inner.eatPunct(';')) {
      const len = this.parseExpr(inner);
      inner.expectEof();
      return { kind: 'Repeat', attrs: [], tokens: c.slice(start), expr: first, len };
    }
    if (inner.eof) {
      return { kind: 'Array', attrs: [], tokens: c.slice(start), elems: [first] };
    }
    inner.expectPunct(',');
    const elems = [first, ...this.parseCommaList(inner)];
    return { kind: 'Array', attrs: [], tokens: c.slice(start), elems };
  }

  private parseIdentAtom(c: Cursor, r: Restrictions, start: number): Expr {
    const token = c.ident();
    if (!token || token.raw) return this.parsePathLike(c, r, start);

    switch (token.name) {
      case 'true':
      case 'false':
        c.bump();
        return {
          kind: 'Lit',
          attrs: [],
          tokens: c.slice(start),
          lit: { kind: 'Bool', text: token.name, value: token.name === 'true' }
        };
      case '_':
        c.bump();
        return { kind: 'Infer', attrs: [], tokens: c.slice(start) };
      case 'if':
        return this.parseIf(c, start);
      case 'match':
        return this.parseMatch(c, start);
      case 'loop':
      case 'while':
        return this.parseLoopLike(c, null, start);
      case 'for':
        return c.startsWithPunct('<', 1)
          ? this.parseClosure(c, r, start)
          : this.parseLoopLike(c, null, start);
      case 'unsafe': {
        c.bump();
        const { block, inner } = this.parseBlockWithAttrs(c);
        return { kind: 'Unsafe', attrs: inner, tokens: c.slice(start), block };
      }
      case 'async':
        if (c.group('brace', 1) || (c.isKeyword('move', 1) && c.group('brace', 2))) {
          c.bump();
          const capture = c.eatKeyword('move');
          const { block, inner } = this.parseBlockWithAttrs(c);
          return { kind: 'Async', attrs: inner, tokens: c.slice(start), capture, block };
        }
        return this.parseClosure(c, r, start);
      case 'const':
        if (c.group('brace', 1)) {
          c.bump();
          const { block, inner } = this.parseBlockWithAttrs(c);
          return { kind: 'Const', attrs: inner, tokens: c.slice(start), block };
        }
        return this.parseClosure(c, r, start);
      case 'move':
      case 'static':
        return this.parseClosure(c, r, start);
      case 'try':
        if (c.group('brace', 1)) {
          c.bump();
          const block = this.parseBlock(c);
          return { kind: 'TryBlock', attrs: [], tokens: c.slice(start), block };
        }
        break;
      case 'return': {
        c.bump();
        const expr = this.canBeginExpr(c, r) ? this.parseExpr(c, r) : null;
        return { kind: 'Return', attrs: [], tokens: c.slice(start), expr };
      }
      case 'yield': {
        c.bump();
        const expr = this.canBeginExpr(c, r) ? this.parseExpr(c, r) : null;
        return { kind: 'Yield', attrs: [], tokens: c.slice(start), expr };
      }
      case 'break': {
        c.bump();
        const label = this.parseOptionalLabel(c);
        const expr = this.canBeginExpr(c, r) ? this.parseExpr(c, r) : null;
        return { kind: 'Break', attrs: [], tokens: c.slice(start), label, expr };
      }
      case 'continue': {
        c.bump();
        const label = this.parseOptionalLabel(c);
        return { kind: 'Continue', attrs: [], tokens: c.slice(start), label };
      }
      case 'let': {
        c.bump();
        const pat = parsePatMulti(c);
        c.expectPunct('=');
        const expr = this.parseOperand(c, r, Precedence.Compare);
        return { kind: 'Let', attrs: [], tokens: c.slice(start), pat, expr };
      }
      case 'become':
        c.bump();
        this.parseExpr(c, r);
        return { kind: 'Verbatim', attrs: [], tokens: c.slice(start) };
      case 'builtin':
        if (c.isPunct('#', 1)) {
          c.bump();
          c.bump();
          if (!c.plainIdent()) {
            throw c.error(`expected identifier, found ${describeToken(c.peek())}`);
          }
          c.bump();
          if (!c.group('parenthesis')) {
            throw c.error(`expected \`(\`, found ${describeToken(c.peek())}`);
          }
          c.bump();
          return { kind: 'Verbatim', attrs: [], tokens: c.slice(start) };
        }
        break;
    }

    if (isKeywordName(token.name) && !c.pathIdent()) {
      throw c.error(`expected an expression, found keyword ${describeToken(token)}`);
    }
    return this.parsePathLike(c, r, start);
  }

  private parseOptionalLabel(c: Cursor): Label | null {
    const token = c.peek();
    if (token?.type !== 'lifetime') return null;
    c.bump();
    return { name: token.name };
  }

  private parseLabeled(c: Cursor, token: LifetimeToken, start: number): Expr {
    c.bump();
    c.expectPunct(':');
    const label: Label = { name: token.name };

    if (c.isKeyword('loop') || c.isKeyword('while') || c.isKeyword('for')) {
      return this.parseLoopLike(c, label, start);
    }
    if (c.group('brace')) {
      const { block, inner } = this.parseBlockWithAttrs(c);
      return { kind: 'Block', attrs: inner, tokens: c.slice(start), label, block };
    }
    throw c.error(
      `expected \`loop\`, \`while\`, \`for\` or a block after a label, found ${describeToken(c.peek())}`
    );
  }

  private parseLoopLike(c: Cursor, label: Label | null, start: number): Expr {
    if (c.eatKeyword('loop')) {
      const { block, inner } = this.parseBlockWithAttrs(c);
      return { kind: 'Loop', attrs: inner, tokens: c.slice(start), label, body: block };
    }

    if (c.eatKeyword('while')) {
      const cond = this.parseExpr(c, NO_STRUCT);
      const { block, inner } = this.parseBlockWithAttrs(c);
      return {
        kind: 'While',
        attrs: inner,
        tokens: c.slice(start),
        label,
        cond,
        body: block
      };
    }

    c.expectKeyword('for');
    const pat = parsePatMulti(c);
    c.expectKeyword('in');
    const expr = this.parseExpr(c, NO_STRUCT);
    const { block, inner } = this.parseBlockWithAttrs(c);
    return {
      kind: 'ForLoop',
      attrs: inner,
      tokens: c.slice(start),
      label,
      pat,
      expr,
      body: block
    };
  }

  private parseIf(c: Cursor, start: number): Expr {
    c.expectKeyword('if');
    const cond = this.parseExpr(c, NO_STRUCT);
    const thenBranch = this.parseBlock(c);

    let elseBranch: Expr | null = null;
    if (c.eatKeyword('else')) {
      const elseStart = c.position;
      if (c.isKeyword('if')) {
        elseBranch = this.parseIf(c, elseStart);
      } else if (c.group('brace')) {
        const block = this.parseBlock(c);
        elseBranch = {
          kind: 'Block',
          attrs: [],
          tokens: c.slice(elseStart),
          label: null,
          block
        };
      } else {
        throw c.error(
          `expected \`{\` or \`if\` after \`else\`, found ${describeToken(c.peek())}`
        );
      }
    }

    return { kind: 'If', attrs: [], tokens: c.slice(start), cond, thenBranch, elseBranch };
  }

  private parseMatch(c: Cursor, start: number): Expr {
    c.expectKeyword('match');
    const expr = this.parseExpr(c, NO_STRUCT);
    const group = c.group('brace');
    if (!group) {
      throw c.error(`expected \`{\`, found ${describeToken(c.peek())}`);
    }
    c.bump();

    const body = c.enter(group);
    const attrs = parseInnerAttrs(body);
    const arms: Arm[] = [];
    while (!body.eof) {
      const armAttrs = parseOuterAttrs(body);
      const pat = parsePatMulti(body);
      const guard = body.eatKeyword('if') ? this.parseExpr(body) : null;
      body.expectPunct('=>');
      const armBody = this.parseEarlyExpr(body, body.position, parseOuterAttrs(body));
      arms.push({ attrs: armAttrs, pat, guard, body: armBody });

      if (body.eof) break;
      if (!body.eatPunct(',') && !isBlockLike(armBody)) {
        throw body.error(
          `expected \`,\` following \`match\` arm, found ${describeToken(body.peek())}`
        );
      }
    }

    return { kind: 'Match', attrs, tokens: c.slice(start), expr, arms };
  }

  private parseClosure(c: Cursor, r: Restrictions, start: number): Expr {
    let lifetimes: TokenSlice | null = null;
    if (c.isKeyword('for')) {
      const binderStart = c.position;
      c.bump();
      parseGenericParams(c);
      lifetimes = c.slice(binderStart);
    }
    const constness = c.eatKeyword('const');
    const movability = c.eatKeyword('static');
    const asyncness = c.eatKeyword('async');
    const capture = c.eatKeyword('move');

    const inputs: Pat[] = [];
    if (!c.eatPunct('||')) {
      if (!c.splitPunct('|')) {
        throw c.error(`expected \`|\`, found ${describeToken(c.peek())}`);
      }
      while (!c.splitPunct('|')) {
        inputs.push(this.parseClosureParam(c));
        if (c.splitPunct('|')) break;
        c.expectPunct(',');
      }
    }

    let output: TokenSlice | null = null;
    let body: Expr;
    if (c.isPunct('->')) {
      const outputStart = c.position;
      c.eatPunct('->');
      parseType(c, false);
      output = c.slice(outputStart);
      const bodyStart = c.position;
      const block = this.parseBlock(c);
      body = { kind: 'Block', attrs: [], tokens: c.slice(bodyStart), label: null, block };
    } else {
      body = this.parseExpr(c, r);
    }

    return {
      kind: 'Closure',
      attrs: [],
      tokens: c.slice(start),
      lifetimes,
      constness,
      movability,
      asyncness,
      capture,
      inputs,
      output,
      body
    };
  }

  private parseClosureParam(c: Cursor): Pat {
    const start = c.position;
    parseOuterAttrs(c);
    parsePatSingle(c);
    if (c.eatPunct(':')) parseType(c);
    return { tokens: c.slice(start) };
  }

  /**
   * Paths, qualified paths, macro invocations and struct literals.
   */
  private parsePathLike(c: Cursor, r: Restrictions, start: number): Expr {
    const { qself, path }: { qself: QSelf | null; path: Path } = c.startsWithPunct('<')
      ? parseQPath(c, 'expr')
      : { qself: null, path: parsePath(c, 'expr') };

    if (!qself && c.isPunct('!') && c.peek(1)?.type === 'group') {
      c.bump();
      c.bump();
      return {
        kind: 'Macro',
        attrs: [],
        tokens: c.slice(start),
        mac: { path, tokens: c.slice(start) }
      };
    }

    const fields = c.group('brace');
    if (fields && !r.noStruct) {
      c.bump();
      return this.parseStructBody(c.enter(fields), qself, path, c, start);
    }

    return { kind: 'Path', attrs: [], tokens: c.slice(start), qself, path };
  }

  private parseStructBody(
    body: Cursor,
    qself: QSelf | null,
    path: Path,
    c: Cursor,
    start: number
  ): Expr {
    const fields: FieldValue[] = [];
    let dot2 = false;
    let rest: Expr | null = null;

    while (!body.eof) {
      if (body.eatPunct('..')) {
        dot2 = true;
        if (!body.eof) rest = this.parseExpr(body);
        body.expectEof();
        break;
      }
      fields.push(this.parseFieldValue(body));
      if (body.eof) break;
      body.expectPunct(',');
    }

    return {
      kind: 'Struct',
      attrs: [],
      tokens: c.slice(start),
      qself,
      path,
      fields,
      dot2,
      rest
    };
  }

  private parseFieldValue(c: Cursor): FieldValue {
    const attrs = parseOuterAttrs(c);

    const literal = c.literal();
    if (literal) {
      if (!/^\d+$/.test(literal.text)) {
        throw c.error(`expected identifier, found ${describeToken(literal)}`);
      }
      c.bump();
      c.expectPunct(':');
      return {
        attrs,
        member: { kind: 'Unnamed', index: Number(literal.text) },
        expr: this.parseExpr(c)
      };
    }

    const ident = c.plainIdent();
    if (!ident) {
      throw c.error(`expected identifier, found ${describeToken(c.peek())}`);
    }
    const memberStart = c.position;
    c.bump();
    const name = identText(ident);

    if (c.eatPunct(':')) {
      return { attrs, member: { kind: 'Named', name }, expr: this.parseExpr(c) };
    }

    // Shorthand `S { x }` stands for `S { x: x }`.
    return {
      attrs,
      member: { kind: 'Named', name },
      expr: {
        kind: 'Path',
        attrs: [],
        tokens: c.slice(memberStart),
        qself: null,
        path: { leadingColon: false, segments: [{ ident: name, arguments: null }] }
      }
    };
  }

  /**
   * Whether the next token can begin an operand (the optional operand of
   * `return`, `break`, `yield` and the end of a range).
   */
  private canBeginExpr(c: Cursor, r: Restrictions): boolean {
    const token = c.peek();
    if (!token) return false;
    switch (token.type) {
      case 'literal':
      case 'lifetime':
        return true;
      case 'group':
        return token.delimiter !== 'brace' || !r.noStruct;
      case 'ident':
        return token.raw || !isKeywordName(token.name) || EXPR_KEYWORDS.has(token.name);
      case 'punct':
        return (
          EXPR_START_PUNCTS.has(token.char) ||
          c.isPunct('::') ||
          c.isPunct('..') ||
          c.isPunct('..=')
        );
    }
  }

  private startsBlockLike(c: Cursor): boolean {
    const token = c.peek();
    if (!token) return false;
    if (token.type === 'group') return token.delimiter === 'brace';
    if (token.type === 'lifetime') return c.isPunct(':', 1);
    return (
      c.isKeyword('if') ||
      c.isKeyword('match') ||
      c.isKeyword('loop') ||
      c.isKeyword('while') ||
      c.isKeyword('unsafe') ||
      (c.isKeyword('for') && !c.startsWithPunct('<', 1)) ||
      ((c.isKeyword('const') || c.isKeyword('try')) && c.group('brace', 1) !== undefined)
    );
  }
}
