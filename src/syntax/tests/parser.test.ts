import { describe, expect, test } from 'vitest';
import { parseExpr } from '..';
import type { TestScenario } from './types';

/**
 * Test suite: expression parsing.
 *
 * Expectations are partial trees (`toMatchObject`); token slices and
 * unlisted fields are not compared.
 *
 * Coverage:
 * - Operator precedence and associativity.
 * - Prefix and postfix forms.
 * - Struct literals and the no-struct restriction.
 * - Control flow, closures and blocks.
 */
describe('Expression Parser', () => {
  describe('Binary Operators', () => {
    const scenarios: TestScenario<object>[] = [
      {
        id: 'Precedence',
        description: '`*` binds tighter than `+`',
        code: '1 + 2 * 3',
        expected: {
          kind: 'Binary',
          op: { kind: 'Add' },
          left: { kind: 'Lit', lit: { kind: 'Int', text: '1' } },
          right: {
            kind: 'Binary',
            op: { kind: 'Mul' },
            left: { kind: 'Lit', lit: { text: '2' } },
            right: { kind: 'Lit', lit: { text: '3' } }
          }
        }
      },
      {
        id: 'Left Associative',
        description: 'Arithmetic groups to the left',
        code: 'a - b - c',
        expected: {
          kind: 'Binary',
          op: { kind: 'Sub' },
          left: { kind: 'Binary', op: { kind: 'Sub' } },
          right: { kind: 'Path' }
        }
      },
      {
        id: 'Right Associative Assign',
        description: 'Assignment groups to the right',
        code: 'a = b = c',
        expected: {
          kind: 'Assign',
          left: { kind: 'Path' },
          right: { kind: 'Assign', left: { kind: 'Path' }, right: { kind: 'Path' } }
        }
      },
      {
        id: 'Compound Assign',
        description: 'Compound assignment is a binary node',
        code: 'x += 1',
        expected: { kind: 'Binary', op: { kind: 'AddAssign' } }
      },
      {
        id: 'Shift Right',
        description: '`>>` is one shift operator',
        code: 'a >> b',
        expected: { kind: 'Binary', op: { kind: 'Shr' } }
      },
      {
        id: 'Cast Before Sum',
        description: '`as` binds tighter than `+`',
        code: 'x as u8 + 1',
        expected: {
          kind: 'Binary',
          op: { kind: 'Add' },
          left: { kind: 'Cast', expr: { kind: 'Path' } }
        }
      },
      {
        id: 'Logical Mix',
        description: '`&&` binds tighter than `||`, comparisons tighter still',
        code: 'a || b == c && d',
        expected: {
          kind: 'Binary',
          op: { kind: 'Or' },
          right: {
            kind: 'Binary',
            op: { kind: 'And' },
            left: { kind: 'Binary', op: { kind: 'Eq' } }
          }
        }
      }
    ];

    test.for(scenarios)('[$id] $description', ({ code, expected }) => {
      expect(parseExpr(code)).toMatchObject(expected);
    });
  });

  describe('Prefix And Postfix', () => {
    const scenarios: TestScenario<object>[] = [
      {
        id: 'Negated Method Call',
        description: 'Postfix binds tighter than prefix',
        code: '-x.len()',
        expected: {
          kind: 'Unary',
          op: { kind: 'Neg' },
          expr: { kind: 'MethodCall', method: 'len', args: [] }
        }
      },
      {
        id: 'Double Reference',
        description: '`&&mut x` is a reference to a mutable reference',
        code: '&&mut x',
        expected: {
          kind: 'Reference',
          mutability: false,
          expr: { kind: 'Reference', mutability: true, expr: { kind: 'Path' } }
        }
      },
      {
        id: 'Raw Address',
        description: '`&raw const` takes a raw address',
        code: '&raw const x',
        expected: { kind: 'RawAddr', mutability: false, expr: { kind: 'Path' } }
      },
      {
        id: 'Nested Tuple Index',
        description: '`t.0.1` is two unnamed field accesses',
        code: 't.0.1',
        expected: {
          kind: 'Field',
          member: { kind: 'Unnamed', index: 1 },
          base: {
            kind: 'Field',
            member: { kind: 'Unnamed', index: 0 },
            base: { kind: 'Path' }
          }
        }
      },
      {
        id: 'Turbofish',
        description: 'Generic arguments on a method call, closed by `>>`',
        code: 'iter.collect::<Vec<_>>()',
        expected: { kind: 'MethodCall', method: 'collect', args: [] }
      },
      {
        id: 'Await Then Try',
        description: 'Postfix operators apply left to right',
        code: 'f().await?',
        expected: {
          kind: 'Try',
          expr: { kind: 'Await', base: { kind: 'Call', args: [] } }
        }
      },
      {
        id: 'Index',
        description: 'Brackets after an operand index it',
        code: 'a[0]',
        expected: { kind: 'Index', expr: { kind: 'Path' }, index: { kind: 'Lit' } }
      },
      {
        id: 'Qualified Path Call',
        description: '`<T as Trait>::f()` has a qualified self type',
        code: '<Vec<u8> as Default>::default()',
        expected: {
          kind: 'Call',
          func: {
            kind: 'Path',
            path: { leadingColon: false, segments: [{ ident: 'Default' }, { ident: 'default' }] }
          }
        }
      }
    ];

    test.for(scenarios)('[$id] $description', ({ code, expected }) => {
      expect(parseExpr(code)).toMatchObject(expected);
    });
  });

  describe('Ranges And Literals', () => {
    const scenarios: TestScenario<object>[] = [
      {
        id: 'Half Open',
        description: 'Both bounds present',
        code: '1..2',
        expected: {
          kind: 'Range',
          limits: 'HalfOpen',
          start: { kind: 'Lit' },
          end: { kind: 'Lit' }
        }
      },
      {
        id: 'Closed Without Start',
        description: '`..=5` has no start',
        code: '..=5',
        expected: { kind: 'Range', limits: 'Closed', start: null, end: { kind: 'Lit' } }
      },
      {
        id: 'Open End',
        description: '`a..` has no end',
        code: 'a..',
        expected: { kind: 'Range', limits: 'HalfOpen', start: { kind: 'Path' }, end: null }
      },
      {
        id: 'Booleans',
        description: '`true` is a boolean literal, not a path',
        code: 'true',
        expected: { kind: 'Lit', lit: { kind: 'Bool', value: true } }
      },
      {
        id: 'Infer',
        description: '`_` is the inferred expression',
        code: '_',
        expected: { kind: 'Infer', attrs: [] }
      }
    ];

    test.for(scenarios)('[$id] $description', ({ code, expected }) => {
      expect(parseExpr(code)).toMatchObject(expected);
    });
  });

  describe('Aggregates', () => {
    const scenarios: TestScenario<object>[] = [
      {
        id: 'Struct Literal',
        description: 'Named fields and shorthand keep source order',
        code: 'Point { x: 1, y }',
        expected: {
          kind: 'Struct',
          qself: null,
          fields: [
            { member: { kind: 'Named', name: 'x' }, expr: { kind: 'Lit' } },
            { member: { kind: 'Named', name: 'y' }, expr: { kind: 'Path' } }
          ],
          dot2: false,
          rest: null
        }
      },
      {
        id: 'Struct Base',
        description: '`..base` fills the remaining fields',
        code: 'S { a: 1, ..base }',
        expected: { kind: 'Struct', dot2: true, rest: { kind: 'Path' } }
      },
      {
        id: 'Struct Rest Without Base',
        description: '`S { .. }` has `..` but no base',
        code: 'S { .. }',
        expected: { kind: 'Struct', fields: [], dot2: true, rest: null }
      },
      {
        id: 'Array',
        description: 'Bracketed list',
        code: '[1, 2, 3]',
        expected: { kind: 'Array', elems: [{ kind: 'Lit' }, { kind: 'Lit' }, { kind: 'Lit' }] }
      },
      {
        id: 'Repeat',
        description: '`[x; n]` repeats a value',
        code: '[0; 4]',
        expected: { kind: 'Repeat', expr: { kind: 'Lit' }, len: { kind: 'Lit' } }
      },
      {
        id: 'One Tuple',
        description: 'A trailing comma makes a one-element tuple',
        code: '(1,)',
        expected: { kind: 'Tuple', elems: [{ kind: 'Lit' }] }
      },
      {
        id: 'Unit',
        description: 'Empty parentheses are the empty tuple',
        code: '()',
        expected: { kind: 'Tuple', elems: [] }
      },
      {
        id: 'Paren',
        description: 'A single parenthesized expression',
        code: '(1)',
        expected: { kind: 'Paren', expr: { kind: 'Lit' } }
      },
      {
        id: 'Macro',
        description: 'A path followed by `!` and a group',
        code: 'vec![1, 2]',
        expected: { kind: 'Macro', mac: { path: { segments: [{ ident: 'vec' }] } } }
      }
    ];

    test.for(scenarios)('[$id] $description', ({ code, expected }) => {
      expect(parseExpr(code)).toMatchObject(expected);
    });
  });

  describe('Control Flow', () => {
    const scenarios: TestScenario<object>[] = [
      {
        id: 'If Without Else',
        description: 'The struct restriction leaves `{` to the body',
        code: 'if x { 1 }',
        expected: { kind: 'If', cond: { kind: 'Path' }, elseBranch: null }
      },
      {
        id: 'Else If',
        description: '`else if` nests an `If`',
        code: 'if a { 1 } else if b { 2 } else { 3 }',
        expected: {
          kind: 'If',
          elseBranch: { kind: 'If', elseBranch: { kind: 'Block', label: null } }
        }
      },
      {
        id: 'If Let',
        description: '`let` scrutinee in a condition',
        code: 'if let Some(x) = opt { x }',
        expected: { kind: 'If', cond: { kind: 'Let', expr: { kind: 'Path' } } }
      },
      {
        id: 'Let Chain',
        description: '`let` binds tighter than `&&`',
        code: 'if let Some(x) = a && x > 0 {}',
        expected: {
          kind: 'If',
          cond: {
            kind: 'Binary',
            op: { kind: 'And' },
            left: { kind: 'Let' },
            right: { kind: 'Binary', op: { kind: 'Gt' } }
          }
        }
      },
      {
        id: 'Match',
        description: 'Arms with a guard and a block body',
        code: 'match v { n if n > 0 => a, _ => { b } }',
        expected: {
          kind: 'Match',
          arms: [
            { guard: { kind: 'Binary' }, body: { kind: 'Path' } },
            { guard: null, body: { kind: 'Block' } }
          ]
        }
      },
      {
        id: 'Labeled Loop',
        description: 'A label before `loop`; `break` carries label and value',
        code: "'outer: loop { break 'outer 1; }",
        expected: {
          kind: 'Loop',
          label: { name: 'outer' },
          body: {
            stmts: [
              {
                kind: 'Expr',
                semi: true,
                expr: { kind: 'Break', label: { name: 'outer' }, expr: { kind: 'Lit' } }
              }
            ]
          }
        }
      },
      {
        id: 'For Loop',
        description: 'Pattern, iterable and body',
        code: 'for (i, x) in xs.iter().enumerate() {}',
        expected: { kind: 'ForLoop', label: null, expr: { kind: 'MethodCall' } }
      },
      {
        id: 'While',
        description: 'Condition under the struct restriction',
        code: 'while i < n { i += 1; }',
        expected: { kind: 'While', cond: { kind: 'Binary', op: { kind: 'Lt' } } }
      },
      {
        id: 'Bare Return',
        description: '`return` without a value',
        code: 'return',
        expected: { kind: 'Return', expr: null }
      },
      {
        id: 'Continue',
        description: '`continue` with a label',
        code: "continue 'a",
        expected: { kind: 'Continue', label: { name: 'a' } }
      }
    ];

    test.for(scenarios)('[$id] $description', ({ code, expected }) => {
      expect(parseExpr(code)).toMatchObject(expected);
    });
  });

  describe('Closures And Blocks', () => {
    const scenarios: TestScenario<object>[] = [
      {
        id: 'Closure',
        description: 'Typed and untyped parameters; expression body',
        code: '|a, b: u8| a + b',
        expected: {
          kind: 'Closure',
          capture: false,
          output: null,
          inputs: [{}, {}],
          body: { kind: 'Binary', op: { kind: 'Add' } }
        }
      },
      {
        id: 'Move Closure',
        description: '`move ||` captures by value',
        code: 'move || 1',
        expected: { kind: 'Closure', capture: true, inputs: [] }
      },
      {
        id: 'Closure Return Type',
        description: 'A return type requires a block body',
        code: '|x| -> u8 { x }',
        expected: { kind: 'Closure', body: { kind: 'Block' } }
      },
      {
        id: 'Block Statements',
        description: '`let` statement followed by a tail expression',
        code: '{ let x = 1; x }',
        expected: {
          kind: 'Block',
          block: {
            stmts: [
              { kind: 'Local', init: { kind: 'Lit' }, diverge: null },
              { kind: 'Expr', semi: false, expr: { kind: 'Path' } }
            ]
          }
        }
      },
      {
        id: 'Statement Position',
        description: 'A block-like statement ends before `-1`',
        code: '{ if a { b } -1 }',
        expected: {
          kind: 'Block',
          block: {
            stmts: [
              { kind: 'Expr', semi: false, expr: { kind: 'If' } },
              { kind: 'Expr', semi: false, expr: { kind: 'Unary' } }
            ]
          }
        }
      },
      {
        id: 'Items',
        description: 'Items inside a block are kept as tokens',
        code: '{ fn f() {} f() }',
        expected: {
          kind: 'Block',
          block: { stmts: [{ kind: 'Item' }, { kind: 'Expr', expr: { kind: 'Call' } }] }
        }
      },
      {
        id: 'Macro Statement',
        description: 'A macro followed by `;` is a macro statement',
        code: '{ println!("hi"); }',
        expected: {
          kind: 'Block',
          block: { stmts: [{ kind: 'Macro', semi: true }] }
        }
      },
      {
        id: 'Inner Attribute',
        description: '`#![...]` at the start of a block is an inner attribute',
        code: '{ #![allow(x)] 1 }',
        expected: { kind: 'Block', attrs: [{ style: 'inner' }] }
      },
      {
        id: 'Outer Attribute',
        description: '`#[...]` before an operand attaches to it',
        code: '#[inline] || 1',
        expected: { kind: 'Closure', attrs: [{ style: 'outer' }] }
      },
      {
        id: 'Async Move',
        description: '`async move` block',
        code: 'async move { 1 }',
        expected: { kind: 'Async', capture: true }
      },
      {
        id: 'Unsafe',
        description: '`unsafe` block',
        code: 'unsafe { f() }',
        expected: { kind: 'Unsafe' }
      },
      {
        id: 'Const',
        description: '`const` block',
        code: 'const { 1 }',
        expected: { kind: 'Const' }
      },
      {
        id: 'Try Block',
        description: '`try` block',
        code: 'try { x? }',
        expected: { kind: 'TryBlock' }
      },
      {
        id: 'Become',
        description: '`become` is kept as verbatim tokens',
        code: 'become f()',
        expected: { kind: 'Verbatim' }
      },
      {
        id: 'Builtin',
        description: '`builtin #` syntax is kept as verbatim tokens',
        code: 'builtin # offset_of(S, f)',
        expected: { kind: 'Verbatim' }
      }
    ];

    test.for(scenarios)('[$id] $description', ({ code, expected }) => {
      expect(parseExpr(code)).toMatchObject(expected);
    });
  });
});
