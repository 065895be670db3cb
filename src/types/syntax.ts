import type { TokenSlice } from './tokens';

/**
 * Rust expression tree.
 *
 * One interface per syntactic expression form, discriminated on `kind`.
 * Each node owns its children (the tree never shares or cycles) and records
 * the tokens it was parsed from so that un-modeled parts can be rendered
 * back to text.
 *
 * The grammar is open-ended: a newer parser may hand the converter a `kind`
 * that is not listed in {@link Expr}. Consumers must therefore treat the
 * union as "known today" rather than "complete"; see {@link SyntaxNode}.
 */

/**
 * Fields shared by every expression node.
 */
export type SyntaxNode = {
  kind: string;
  /**
   * Outer attributes written before the expression (`#[allow(unused)]`).
   */
  attrs: Attribute[];
  /**
   * The tokens spanning the whole node, attributes included.
   */
  tokens: TokenSlice;
};

export type Attribute = {
  style: 'outer' | 'inner';
  /**
   * `#`, the optional `!` and the bracket group.
   */
  tokens: TokenSlice;
};

export type Label = {
  /**
   * Label name without its quote (`'outer` -> `outer`).
   */
  name: string;
};

export type Member =
  | { kind: 'Named'; name: string }
  | { kind: 'Unnamed'; index: number };

export type RangeLimits = 'HalfOpen' | 'Closed';

export type BinOpKind =
  | 'Add'
  | 'Sub'
  | 'Mul'
  | 'Div'
  | 'Rem'
  | 'And'
  | 'Or'
  | 'BitXor'
  | 'BitAnd'
  | 'BitOr'
  | 'Shl'
  | 'Shr'
  | 'Eq'
  | 'Lt'
  | 'Le'
  | 'Ne'
  | 'Ge'
  | 'Gt'
  | 'AddAssign'
  | 'SubAssign'
  | 'MulAssign'
  | 'DivAssign'
  | 'RemAssign'
  | 'BitXorAssign'
  | 'BitAndAssign'
  | 'BitOrAssign'
  | 'ShlAssign'
  | 'ShrAssign';

export type UnOpKind = 'Deref' | 'Not' | 'Neg';

/**
 * A binary operator together with the tokens it was written with.
 * The tokens are the fallback rendering for operator kinds added later.
 */
export type BinOp = {
  kind: BinOpKind;
  tokens: TokenSlice;
};

export type UnOp = {
  kind: UnOpKind;
  tokens: TokenSlice;
};

/**
 * Literal tokens are kept undecoded; `src/syntax/literal.ts` turns the
 * source text into values on demand. `text` is the token as written.
 */
export type Lit =
  | { kind: 'Str'; text: string }
  | { kind: 'ByteStr'; text: string }
  | { kind: 'CStr'; text: string }
  | { kind: 'Byte'; text: string }
  | { kind: 'Char'; text: string }
  | { kind: 'Int'; text: string }
  | { kind: 'Float'; text: string }
  | { kind: 'Bool'; text: string; value: boolean }
  | { kind: 'Verbatim'; text: string };

/**
 * Patterns are validated by the parser but only kept as tokens.
 */
export type Pat = {
  tokens: TokenSlice;
};

/**
 * Types are validated by the parser but only kept as tokens.
 */
export type Type = {
  tokens: TokenSlice;
};

export type PathSegment = {
  ident: string;
  /**
   * Generic arguments after the identifier (`::<T>` in expressions,
   * `<T>` or `(A) -> B` in types), or `null`.
   */
  arguments: TokenSlice | null;
};

export type Path = {
  leadingColon: boolean;
  segments: PathSegment[];
};

/**
 * The `<T as Trait>` prefix of a qualified path.
 */
export type QSelf = {
  ty: Type;
};

export type LocalStmt = {
  kind: 'Local';
  attrs: Attribute[];
  pat: Pat;
  init: Expr | null;
  diverge: Block | null;
};

export type ItemStmt = {
  kind: 'Item';
  tokens: TokenSlice;
};

export type ExprStmt = {
  kind: 'Expr';
  expr: Expr;
  semi: boolean;
};

export type MacroStmt = {
  kind: 'Macro';
  attrs: Attribute[];
  mac: Macro;
  semi: boolean;
};

export type Stmt = LocalStmt | ItemStmt | ExprStmt | MacroStmt;

export type Block = {
  stmts: Stmt[];
  /**
   * The brace group, delimiters included.
   */
  tokens: TokenSlice;
};

export type Macro = {
  path: Path;
  /**
   * Path, `!` and the delimited argument group.
   */
  tokens: TokenSlice;
};

export type Arm = {
  attrs: Attribute[];
  pat: Pat;
  guard: Expr | null;
  body: Expr;
};

export type FieldValue = {
  attrs: Attribute[];
  member: Member;
  expr: Expr;
};

export interface ExprArray extends SyntaxNode {
  kind: 'Array';
  elems: Expr[];
}

export interface ExprAssign extends SyntaxNode {
  kind: 'Assign';
  left: Expr;
  right: Expr;
}

export interface ExprAsync extends SyntaxNode {
  kind: 'Async';
  capture: boolean;
  block: Block;
}

export interface ExprAwait extends SyntaxNode {
  kind: 'Await';
  base: Expr;
}

export interface ExprBinary extends SyntaxNode {
  kind: 'Binary';
  left: Expr;
  op: BinOp;
  right: Expr;
}

export interface ExprBlock extends SyntaxNode {
  kind: 'Block';
  label: Label | null;
  block: Block;
}

export interface ExprBreak extends SyntaxNode {
  kind: 'Break';
  label: Label | null;
  expr: Expr | null;
}

export interface ExprCall extends SyntaxNode {
  kind: 'Call';
  func: Expr;
  args: Expr[];
}

export interface ExprCast extends SyntaxNode {
  kind: 'Cast';
  expr: Expr;
  ty: Type;
}

export interface ExprClosure extends SyntaxNode {
  kind: 'Closure';
  /**
   * The `for<'a>` binder, when present.
   */
  lifetimes: TokenSlice | null;
  constness: boolean;
  /**
   * `static` closures (coroutines that cannot move).
   */
  movability: boolean;
  asyncness: boolean;
  /**
   * `move` closures.
   */
  capture: boolean;
  inputs: Pat[];
  /**
   * `-> Type`, or `null` for the default return type.
   */
  output: TokenSlice | null;
  body: Expr;
}

export interface ExprConst extends SyntaxNode {
  kind: 'Const';
  block: Block;
}

export interface ExprContinue extends SyntaxNode {
  kind: 'Continue';
  label: Label | null;
}

export interface ExprField extends SyntaxNode {
  kind: 'Field';
  base: Expr;
  member: Member;
}

export interface ExprForLoop extends SyntaxNode {
  kind: 'ForLoop';
  label: Label | null;
  pat: Pat;
  expr: Expr;
  body: Block;
}

/**
 * An expression wrapped in invisible delimiters. Only produced by macro
 * expansion, never by parsing source text.
 */
export interface ExprGroup extends SyntaxNode {
  kind: 'Group';
  expr: Expr;
}

export interface ExprIf extends SyntaxNode {
  kind: 'If';
  cond: Expr;
  thenBranch: Block;
  /**
   * Either an `If` (for `else if`) or a `Block`.
   */
  elseBranch: Expr | null;
}

export interface ExprIndex extends SyntaxNode {
  kind: 'Index';
  expr: Expr;
  index: Expr;
}

export interface ExprInfer extends SyntaxNode {
  kind: 'Infer';
}

export interface ExprLet extends SyntaxNode {
  kind: 'Let';
  pat: Pat;
  expr: Expr;
}

export interface ExprLit extends SyntaxNode {
  kind: 'Lit';
  lit: Lit;
}

export interface ExprLoop extends SyntaxNode {
  kind: 'Loop';
  label: Label | null;
  body: Block;
}

export interface ExprMacro extends SyntaxNode {
  kind: 'Macro';
  mac: Macro;
}

export interface ExprMatch extends SyntaxNode {
  kind: 'Match';
  expr: Expr;
  arms: Arm[];
}

export interface ExprMethodCall extends SyntaxNode {
  kind: 'MethodCall';
  receiver: Expr;
  method: string;
  /**
   * `::<T>` between the method name and the argument list.
   */
  turbofish: TokenSlice | null;
  args: Expr[];
}

export interface ExprParen extends SyntaxNode {
  kind: 'Paren';
  expr: Expr;
}

export interface ExprPath extends SyntaxNode {
  kind: 'Path';
  qself: QSelf | null;
  path: Path;
}

export interface ExprRange extends SyntaxNode {
  kind: 'Range';
  start: Expr | null;
  limits: RangeLimits;
  end: Expr | null;
}

export interface ExprRawAddr extends SyntaxNode {
  kind: 'RawAddr';
  mutability: boolean;
  expr: Expr;
}

export interface ExprReference extends SyntaxNode {
  kind: 'Reference';
  mutability: boolean;
  expr: Expr;
}

export interface ExprRepeat extends SyntaxNode {
  kind: 'Repeat';
  expr: Expr;
  len: Expr;
}

export interface ExprReturn extends SyntaxNode {
  kind: 'Return';
  expr: Expr | null;
}

export interface ExprStruct extends SyntaxNode {
  kind: 'Struct';
  qself: QSelf | null;
  path: Path;
  fields: FieldValue[];
  dot2: boolean;
  rest: Expr | null;
}

export interface ExprTry extends SyntaxNode {
  kind: 'Try';
  expr: Expr;
}

export interface ExprTryBlock extends SyntaxNode {
  kind: 'TryBlock';
  block: Block;
}

export interface ExprTuple extends SyntaxNode {
  kind: 'Tuple';
  elems: Expr[];
}

export interface ExprUnary extends SyntaxNode {
  kind: 'Unary';
  op: UnOp;
  expr: Expr;
}

export interface ExprUnsafe extends SyntaxNode {
  kind: 'Unsafe';
  block: Block;
}

/**
 * Syntax the parser accepts but does not model (`become f()`,
 * `builtin # offset_of(..)`).
 */
export interface ExprVerbatim extends SyntaxNode {
  kind: 'Verbatim';
}

export interface ExprWhile extends SyntaxNode {
  kind: 'While';
  label: Label | null;
  cond: Expr;
  body: Block;
}

export interface ExprYield extends SyntaxNode {
  kind: 'Yield';
  expr: Expr | null;
}

export type Expr =
  | ExprArray
  | ExprAssign
  | ExprAsync
  | ExprAwait
  | ExprBinary
  | ExprBlock
  | ExprBreak
  | ExprCall
  | ExprCast
  | ExprClosure
  | ExprConst
  | ExprContinue
  | ExprField
  | ExprForLoop
  | ExprGroup
  | ExprIf
  | ExprIndex
  | ExprInfer
  | ExprLet
  | ExprLit
  | ExprLoop
  | ExprMacro
  | ExprMatch
  | ExprMethodCall
  | ExprParen
  | ExprPath
  | ExprRange
  | ExprRawAddr
  | ExprReference
  | ExprRepeat
  | ExprReturn
  | ExprStruct
  | ExprTry
  | ExprTryBlock
  | ExprTuple
  | ExprUnary
  | ExprUnsafe
  | ExprVerbatim
  | ExprWhile
  | ExprYield;

export type ExprKind = Expr['kind'];
