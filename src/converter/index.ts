import type {
  Arm,
  Attribute,
  CanonicalNode,
  CanonicalObject,
  CanonicalValue,
  Expr,
  FieldValue,
  Label,
  Member,
  QSelf,
  RangeLimits,
  SyntaxNode
} from '../types';
import { litToValue } from './literals';
import {
  attributeToString,
  blockToString,
  macroToString,
  pathToString,
  patToString,
  renderExpr,
  renderSlice,
  typeToString
} from './opaque';
import { binOpSymbol, unOpSymbol } from './operators';

export { litToValue } from './literals';
export { binOpSymbol, unOpSymbol } from './operators';
export {
  attributeToString,
  blockToString,
  macroToString,
  pathToString,
  patToString,
  renderExpr,
  renderSlice,
  renderTokens,
  typeToString
} from './opaque';

export function exprsToValues(exprs: readonly Expr[]): CanonicalValue[] {
  return exprs.map(exprToValue);
}

export function attrsToValue(attrs: readonly Attribute[]): CanonicalValue[] {
  return attrs.map(attributeToString);
}

export function labelToValue(label: Label | null): CanonicalValue {
  return label ? label.name : null;
}

export function memberToValue(member: Member): CanonicalObject {
  return member.kind === 'Named'
    ? { kind: 'Named', name: member.name }
    : { kind: 'Unnamed', index: member.index };
}

export function rangeLimitsToValue(limits: RangeLimits): CanonicalValue {
  return limits;
}

export function armToValue(arm: Arm): CanonicalObject {
  return {
    attrs: attrsToValue(arm.attrs),
    pat: patToString(arm.pat),
    guard: arm.guard ? exprToValue(arm.guard) : null,
    body: exprToValue(arm.body)
  };
}

export function fieldValueToValue(field: FieldValue): CanonicalObject {
  return {
    attrs: attrsToValue(field.attrs),
    member: memberToValue(field.member),
    expr: exprToValue(field.expr)
  };
}

function optionalExpr(expr: Expr | null): CanonicalValue {
  return expr ? exprToValue(expr) : null;
}

function qselfToValue(qself: QSelf | null): CanonicalValue {
  return qself ? typeToString(qself.ty) : null;
}

/**
 * Converts the `else` branch of an `if`.
 *
 * An `else` block holding nothing but one tail expression (no statements,
 * attributes or label) converts to that expression, so
 * `if x > 0 { x } else { -x }` has the `Unary` negation as its
 * `else_branch`. Any other block converts as a `Block`, `else if` as an
 * `If`.
 */
function elseBranchToValue(expr: Expr | null): CanonicalValue {
  if (!expr) return null;
  if (expr.kind === 'Block' && expr.attrs.length === 0 && !expr.label) {
    const { stmts } = expr.block;
    const [stmt] = stmts;
    if (stmts.length === 1 && stmt?.kind === 'Expr' && !stmt.semi) {
      return exprToValue(stmt.expr);
    }
  }
  return exprToValue(expr);
}

/**
 * Converts an expression tree into its canonical value.
 *
 * Every node becomes an object whose first key is `kind`, followed by
 * `attrs` and the variant's fields in a fixed order. Sub-expressions are
 * converted recursively; blocks, patterns, types, paths, macro
 * invocations and attributes become opaque text.
 *
 * The conversion is total: a node whose `kind` is not part of the
 * grammar known here becomes `{ kind: "Unknown", tokens }`, and
 * `Verbatim` nodes become `{ kind: "Verbatim", tokens }`, both rendered
 * from the node's tokens.
 *
 * @param expr
 *   The expression to convert. It is not modified.
 * @returns
 *   A JSON-compatible value; equal trees always produce equal values.
 */
export function exprToValue(expr: Expr): CanonicalNode {
  // Kept for the fallback arm, where `expr` narrows to `never`.
  const node: SyntaxNode = expr;

  switch (expr.kind) {
    case 'Array':
      return {
        kind: 'Array',
        attrs: attrsToValue(expr.attrs),
        elems: exprsToValues(expr.elems)
      };
    case 'Assign':
      return {
        kind: 'Assign',
        attrs: attrsToValue(expr.attrs),
        left: exprToValue(expr.left),
        right: exprToValue(expr.right)
      };
    case 'Async':
      return {
        kind: 'Async',
        attrs: attrsToValue(expr.attrs),
        capture: expr.capture,
        block: blockToString(expr.block)
      };
    case 'Await':
      return {
        kind: 'Await',
        attrs: attrsToValue(expr.attrs),
        base: exprToValue(expr.base)
      };
    case 'Binary':
      return {
        kind: 'Binary',
        attrs: attrsToValue(expr.attrs),
        left: exprToValue(expr.left),
        op: binOpSymbol(expr.op),
        right: exprToValue(expr.right)
      };
    case 'Block':
      return {
        kind: 'Block',
        attrs: attrsToValue(expr.attrs),
        label: labelToValue(expr.label),
        block: blockToString(expr.block)
      };
    case 'Break':
      return {
        kind: 'Break',
        attrs: attrsToValue(expr.attrs),
        label: labelToValue(expr.label),
        expr: optionalExpr(expr.expr)
      };
    case 'Call':
      return {
        kind: 'Call',
        attrs: attrsToValue(expr.attrs),
        func: exprToValue(expr.func),
        args: exprsToValues(expr.args)
      };
    case 'Cast':
      return {
        kind: 'Cast',
        attrs: attrsToValue(expr.attrs),
        expr: exprToValue(expr.expr),
        ty: typeToString(expr.ty)
      };
    case 'Closure':
      return {
        kind: 'Closure',
        attrs: attrsToValue(expr.attrs),
        lifetimes: expr.lifetimes ? renderSlice(expr.lifetimes) : null,
        constness: expr.constness,
        movability: expr.movability,
        asyncness: expr.asyncness,
        capture: expr.capture,
        inputs: expr.inputs.map(patToString),
        output: expr.output ? renderSlice(expr.output) : '',
        body: exprToValue(expr.body)
      };
    case 'Const':
      return {
        kind: 'Const',
        attrs: attrsToValue(expr.attrs),
        block: blockToString(expr.block)
      };
    case 'Continue':
      return {
        kind: 'Continue',
        attrs: attrsToValue(expr.attrs),
        label: labelToValue(expr.label)
      };
    case 'Field':
      return {
        kind: 'Field',
        attrs: attrsToValue(expr.attrs),
        base: exprToValue(expr.base),
        member: memberToValue(expr.member)
      };
    case 'ForLoop':
      return {
        kind: 'ForLoop',
        attrs: attrsToValue(expr.attrs),
        label: labelToValue(expr.label),
        pat: patToString(expr.pat),
        expr: exprToValue(expr.expr),
        body: blockToString(expr.body)
      };
    case 'Group':
      return {
        kind: 'Group',
        attrs: attrsToValue(expr.attrs),
        expr: exprToValue(expr.expr)
      };
    case 'If':
      return {
        kind: 'If',
        attrs: attrsToValue(expr.attrs),
        cond: exprToValue(expr.cond),
        then_branch: blockToString(expr.thenBranch),
        else_branch: elseBranchToValue(expr.elseBranch)
      };
    case 'Index':
      return {
        kind: 'Index',
        attrs: attrsToValue(expr.attrs),
        expr: exprToValue(expr.expr),
        index: exprToValue(expr.index)
      };
    case 'Infer':
      return { kind: 'Infer', attrs: attrsToValue(expr.attrs) };
    case 'Let':
      return {
        kind: 'Let',
        attrs: attrsToValue(expr.attrs),
        pat: patToString(expr.pat),
        expr: exprToValue(expr.expr)
      };
    case 'Lit':
      return {
        kind: 'Lit',
        attrs: attrsToValue(expr.attrs),
        lit: litToValue(expr.lit)
      };
    case 'Loop':
      return {
        kind: 'Loop',
        attrs: attrsToValue(expr.attrs),
        label: labelToValue(expr.label),
        body: blockToString(expr.body)
      };
    case 'Macro':
      return {
        kind: 'Macro',
        attrs: attrsToValue(expr.attrs),
        mac: macroToString(expr.mac)
      };
    case 'Match':
      return {
        kind: 'Match',
        attrs: attrsToValue(expr.attrs),
        expr: exprToValue(expr.expr),
        arms: expr.arms.map(armToValue)
      };
    case 'MethodCall':
      return {
        kind: 'MethodCall',
        attrs: attrsToValue(expr.attrs),
        receiver: exprToValue(expr.receiver),
        method: expr.method,
        turbofish: expr.turbofish ? renderSlice(expr.turbofish) : null,
        args: exprsToValues(expr.args)
      };
    case 'Paren':
      return {
        kind: 'Paren',
        attrs: attrsToValue(expr.attrs),
        expr: exprToValue(expr.expr)
      };
    case 'Path':
      return {
        kind: 'Path',
        attrs: attrsToValue(expr.attrs),
        qself: qselfToValue(expr.qself),
        path: pathToString(expr.path)
      };
    case 'Range':
      return {
        kind: 'Range',
        attrs: attrsToValue(expr.attrs),
        start: optionalExpr(expr.start),
        limits: rangeLimitsToValue(expr.limits),
        end: optionalExpr(expr.end)
      };
    case 'RawAddr':
      return {
        kind: 'RawAddr',
        attrs: attrsToValue(expr.attrs),
        mutability: expr.mutability,
        expr: exprToValue(expr.expr)
      };
    case 'Reference':
      return {
        kind: 'Reference',
        attrs: attrsToValue(expr.attrs),
        mutability: expr.mutability,
        expr: exprToValue(expr.expr)
      };
    case 'Repeat':
      return {
        kind: 'Repeat',
        attrs: attrsToValue(expr.attrs),
        expr: exprToValue(expr.expr),
        len: exprToValue(expr.len)
      };
    case 'Return':
      return {
        kind: 'Return',
        attrs: attrsToValue(expr.attrs),
        expr: optionalExpr(expr.expr)
      };
    case 'Struct':
      return {
        kind: 'Struct',
        attrs: attrsToValue(expr.attrs),
        qself: qselfToValue(expr.qself),
        path: pathToString(expr.path),
        fields: expr.fields.map(fieldValueToValue),
        dot2_token: expr.dot2,
        rest: optionalExpr(expr.rest)
      };
    case 'Try':
      return {
        kind: 'Try',
        attrs: attrsToValue(expr.attrs),
        expr: exprToValue(expr.expr)
      };
    case 'TryBlock':
      return {
        kind: 'TryBlock',
        attrs: attrsToValue(expr.attrs),
        block: blockToString(expr.block)
      };
    case 'Tuple':
      return {
        kind: 'Tuple',
        attrs: attrsToValue(expr.attrs),
        elems: exprsToValues(expr.elems)
      };
    case 'Unary':
      return {
        kind: 'Unary',
        attrs: attrsToValue(expr.attrs),
        op: unOpSymbol(expr.op),
        expr: exprToValue(expr.expr)
      };
    case 'Unsafe':
      return {
        kind: 'Unsafe',
        attrs: attrsToValue(expr.attrs),
        block: blockToString(expr.block)
      };
    case 'Verbatim':
      return { kind: 'Verbatim', tokens: renderExpr(expr) };
    case 'While':
      return {
        kind: 'While',
        attrs: attrsToValue(expr.attrs),
        label: labelToValue(expr.label),
        cond: exprToValue(expr.cond),
        body: blockToString(expr.body)
      };
    case 'Yield':
      return {
        kind: 'Yield',
        attrs: attrsToValue(expr.attrs),
        expr: optionalExpr(expr.expr)
      };
    default:
      return { kind: 'Unknown', tokens: renderExpr(node) };
  }
}
