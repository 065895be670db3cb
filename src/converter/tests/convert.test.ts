import { describe, expect, it, test } from 'vitest';
import { exprToValue } from '..';
import { parseExpr } from '../../syntax';
import type { CanonicalValue, ExprGroup } from '../../types';
import { binary, convert, int, path, withForeignKind } from './helpers';
import type { TestScenario } from './types';

/**
 * Test suite: expression tree to canonical value.
 *
 * Coverage:
 * - End-to-end conversions of whole expressions.
 * - One minimal instance per variant, compared in full.
 * - Optional fields, ordering, nesting and the `else` rule.
 * - Fallback for node kinds outside the grammar.
 */
describe('Node Converter', () => {
  describe('End To End', () => {
    const scenarios: TestScenario<CanonicalValue>[] = [
      {
        id: 'Arithmetic',
        description: 'Product nests under the sum',
        code: '1 + 2 * 3',
        expected: binary(int('1'), '+', binary(int('2'), '*', int('3')))
      },
      {
        id: 'Method Call',
        description: 'Receiver, method name and arguments',
        code: 'foo.bar(baz)',
        expected: {
          kind: 'MethodCall',
          attrs: [],
          receiver: path('foo'),
          method: 'bar',
          turbofish: null,
          args: [path('baz')]
        }
      },
      {
        id: 'If Else',
        description: 'Opaque then-branch; single-expression else unwrapped',
        code: 'if x > 0 { x } else { -x }',
        expected: {
          kind: 'If',
          attrs: [],
          cond: binary(path('x'), '>', int('0')),
          then_branch: '{ x }',
          else_branch: { kind: 'Unary', attrs: [], op: '-', expr: path('x') }
        }
      }
    ];

    test.for(scenarios)('[$id] $description', ({ code, expected }) => {
      expect(convert(code)).toStrictEqual(expected);
    });
  });

  describe('Variants', () => {
    const scenarios: TestScenario<CanonicalValue>[] = [
      {
        id: 'Array',
        description: 'Elements in source order',
        code: '[1, 2]',
        expected: { kind: 'Array', attrs: [], elems: [int('1'), int('2')] }
      },
      {
        id: 'Assign',
        description: 'Left and right operands',
        code: 'x = 1',
        expected: { kind: 'Assign', attrs: [], left: path('x'), right: int('1') }
      },
      {
        id: 'Async',
        description: 'Capture flag and opaque block',
        code: 'async move { 1 }',
        expected: { kind: 'Async', attrs: [], capture: true, block: '{ 1 }' }
      },
      {
        id: 'Await',
        description: 'Awaited base',
        code: 'fut.await',
        expected: { kind: 'Await', attrs: [], base: path('fut') }
      },
      {
        id: 'Block',
        description: 'Labeled block',
        code: "'a: { 1 }",
        expected: { kind: 'Block', attrs: [], label: 'a', block: '{ 1 }' }
      },
      {
        id: 'Break',
        description: 'Bare `break` has null label and value',
        code: 'break',
        expected: { kind: 'Break', attrs: [], label: null, expr: null }
      },
      {
        id: 'Break Value',
        description: '`break 42` carries its value',
        code: 'break 42',
        expected: { kind: 'Break', attrs: [], label: null, expr: int('42') }
      },
      {
        id: 'Call',
        description: 'Arguments keep their count and order',
        code: 'foo(1, 2, 3)',
        expected: {
          kind: 'Call',
          attrs: [],
          func: path('foo'),
          args: [int('1'), int('2'), int('3')]
        }
      },
      {
        id: 'Cast',
        description: 'Target type as opaque text',
        code: 'x as u64',
        expected: { kind: 'Cast', attrs: [], expr: path('x'), ty: 'u64' }
      },
      {
        id: 'Closure',
        description: 'Flags, parameter patterns and empty return type',
        code: 'move |a, b: u8| a + b',
        expected: {
          kind: 'Closure',
          attrs: [],
          lifetimes: null,
          constness: false,
          movability: false,
          asyncness: false,
          capture: true,
          inputs: ['a', 'b : u8'],
          output: '',
          body: binary(path('a'), '+', path('b'))
        }
      },
      {
        id: 'Closure Output',
        description: 'Return type and block body',
        code: '|x| -> u8 { x }',
        expected: {
          kind: 'Closure',
          attrs: [],
          lifetimes: null,
          constness: false,
          movability: false,
          asyncness: false,
          capture: false,
          inputs: ['x'],
          output: '-> u8',
          body: { kind: 'Block', attrs: [], label: null, block: '{ x }' }
        }
      },
      {
        id: 'Const',
        description: 'Const block',
        code: 'const { 1 }',
        expected: { kind: 'Const', attrs: [], block: '{ 1 }' }
      },
      {
        id: 'Continue',
        description: 'Label without its quote',
        code: "continue 'outer",
        expected: { kind: 'Continue', attrs: [], label: 'outer' }
      },
      {
        id: 'Field',
        description: 'Named member',
        code: 'p.x',
        expected: {
          kind: 'Field',
          attrs: [],
          base: path('p'),
          member: { kind: 'Named', name: 'x' }
        }
      },
      {
        id: 'Tuple Field',
        description: 'Unnamed member with a numeric index',
        code: 't.0',
        expected: {
          kind: 'Field',
          attrs: [],
          base: path('t'),
          member: { kind: 'Unnamed', index: 0 }
        }
      },
      {
        id: 'ForLoop',
        description: 'Pattern, iterable and opaque body',
        code: 'for i in 0..10 { sum += i; }',
        expected: {
          kind: 'ForLoop',
          attrs: [],
          label: null,
          pat: 'i',
          expr: {
            kind: 'Range',
            attrs: [],
            start: int('0'),
            limits: 'HalfOpen',
            end: int('10')
          },
          body: '{ sum += i ; }'
        }
      },
      {
        id: 'Index',
        description: 'Indexed expression and index',
        code: 'a[i]',
        expected: { kind: 'Index', attrs: [], expr: path('a'), index: path('i') }
      },
      {
        id: 'Infer',
        description: 'The `_` expression',
        code: '_',
        expected: { kind: 'Infer', attrs: [] }
      },
      {
        id: 'Let',
        description: '`let` scrutinee with an opaque pattern',
        code: 'if let Some(x) = opt { x }',
        expected: {
          kind: 'If',
          attrs: [],
          cond: { kind: 'Let', attrs: [], pat: 'Some (x)', expr: path('opt') },
          then_branch: '{ x }',
          else_branch: null
        }
      },
      {
        id: 'Loop',
        description: 'Unlabeled loop',
        code: 'loop { break; }',
        expected: { kind: 'Loop', attrs: [], label: null, body: '{ break ; }' }
      },
      {
        id: 'Macro',
        description: 'Invocation as opaque text',
        code: 'vec![1, 2]',
        expected: { kind: 'Macro', attrs: [], mac: 'vec ! [1 , 2]' }
      },
      {
        id: 'Match',
        description: 'Arms with pattern, guard and body',
        code: 'match v { Some(n) if n > 0 => n, _ => 0 }',
        expected: {
          kind: 'Match',
          attrs: [],
          expr: path('v'),
          arms: [
            {
              attrs: [],
              pat: 'Some (n)',
              guard: binary(path('n'), '>', int('0')),
              body: path('n')
            },
            { attrs: [], pat: '_', guard: null, body: int('0') }
          ]
        }
      },
      {
        id: 'Paren',
        description: 'Parenthesized expression',
        code: '(x)',
        expected: { kind: 'Paren', attrs: [], expr: path('x') }
      },
      {
        id: 'Qualified Path',
        description: 'Self type and trait path',
        code: '<T as Trait>::f',
        expected: { kind: 'Path', attrs: [], qself: 'T', path: 'Trait :: f' }
      },
      {
        id: 'Self Type Path',
        description: 'Qualified path without a trait',
        code: '<T>::f',
        expected: { kind: 'Path', attrs: [], qself: 'T', path: ':: f' }
      },
      {
        id: 'Global Path',
        description: 'Leading `::` and several segments',
        code: '::std::mem::swap',
        expected: { kind: 'Path', attrs: [], qself: null, path: ':: std :: mem :: swap' }
      },
      {
        id: 'Turbofish Path',
        description: 'Generic arguments inside a path',
        code: 'Vec::<u8>::new',
        expected: { kind: 'Path', attrs: [], qself: null, path: 'Vec :: < u8 > :: new' }
      },
      {
        id: 'Range',
        description: 'Closed range without a start',
        code: '..=5',
        expected: { kind: 'Range', attrs: [], start: null, limits: 'Closed', end: int('5') }
      },
      {
        id: 'RawAddr',
        description: '`&raw mut`',
        code: '&raw mut x',
        expected: { kind: 'RawAddr', attrs: [], mutability: true, expr: path('x') }
      },
      {
        id: 'Reference',
        description: '`&mut`',
        code: '&mut x',
        expected: { kind: 'Reference', attrs: [], mutability: true, expr: path('x') }
      },
      {
        id: 'Repeat',
        description: 'Value and length',
        code: '[0; 4]',
        expected: { kind: 'Repeat', attrs: [], expr: int('0'), len: int('4') }
      },
      {
        id: 'Return',
        description: 'Bare `return`',
        code: 'return',
        expected: { kind: 'Return', attrs: [], expr: null }
      },
      {
        id: 'Struct',
        description: 'Fields in source order',
        code: 'Point { x: 1, y: 2 }',
        expected: {
          kind: 'Struct',
          attrs: [],
          qself: null,
          path: 'Point',
          fields: [
            { attrs: [], member: { kind: 'Named', name: 'x' }, expr: int('1') },
            { attrs: [], member: { kind: 'Named', name: 'y' }, expr: int('2') }
          ],
          dot2_token: false,
          rest: null
        }
      },
      {
        id: 'Struct Update',
        description: 'Base expression after `..`',
        code: 'S { ..base }',
        expected: {
          kind: 'Struct',
          attrs: [],
          qself: null,
          path: 'S',
          fields: [],
          dot2_token: true,
          rest: path('base')
        }
      },
      {
        id: 'Try',
        description: 'The `?` operator',
        code: 'x?',
        expected: { kind: 'Try', attrs: [], expr: path('x') }
      },
      {
        id: 'TryBlock',
        description: '`try` block',
        code: 'try { x? }',
        expected: { kind: 'TryBlock', attrs: [], block: '{ x ? }' }
      },
      {
        id: 'Tuple',
        description: 'Elements in order',
        code: '(1, 2)',
        expected: { kind: 'Tuple', attrs: [], elems: [int('1'), int('2')] }
      },
      {
        id: 'Unit',
        description: 'The empty tuple',
        code: '()',
        expected: { kind: 'Tuple', attrs: [], elems: [] }
      },
      {
        id: 'Unsafe',
        description: '`unsafe` block',
        code: 'unsafe { f() }',
        expected: { kind: 'Unsafe', attrs: [], block: '{ f () }' }
      },
      {
        id: 'Verbatim',
        description: 'Tokens kept as text',
        code: 'become f()',
        expected: { kind: 'Verbatim', tokens: 'become f ()' }
      },
      {
        id: 'While',
        description: 'Label, condition and opaque body',
        code: "'outer: while running { tick(); }",
        expected: {
          kind: 'While',
          attrs: [],
          label: 'outer',
          cond: path('running'),
          body: '{ tick () ; }'
        }
      },
      {
        id: 'Yield',
        description: 'Yielded value',
        code: 'yield 1',
        expected: { kind: 'Yield', attrs: [], expr: int('1') }
      }
    ];

    test.for(scenarios)('[$id] $description', ({ code, expected }) => {
      expect(convert(code)).toStrictEqual(expected);
    });
  });

  describe('Attributes', () => {
    const scenarios: TestScenario<CanonicalValue>[] = [
      {
        id: 'Outer',
        description: 'Attributes before an operand',
        code: '#[cfg(test)] f()',
        expected: { kind: 'Call', attrs: ['# [cfg (test)]'], func: path('f'), args: [] }
      },
      {
        id: 'Inner',
        description: 'Inner attributes attach to the block and stay in its text',
        code: '{ #![allow(unused)] 1 }',
        expected: {
          kind: 'Block',
          attrs: ['# ! [allow (unused)]'],
          label: null,
          block: '{ # ! [allow (unused)] 1 }'
        }
      }
    ];

    test.for(scenarios)('[$id] $description', ({ code, expected }) => {
      expect(convert(code)).toStrictEqual(expected);
    });
  });

  describe('Else Branch', () => {
    const scenarios: TestScenario<CanonicalValue>[] = [
      {
        id: 'Single Tail',
        description: 'A lone tail expression is unwrapped',
        code: 'if a { 1 } else { 2 }',
        expected: int('2')
      },
      {
        id: 'Statements',
        description: 'A block with statements stays a block',
        code: 'if a { 1 } else { f(); 2 }',
        expected: { kind: 'Block', attrs: [], label: null, block: '{ f () ; 2 }' }
      },
      {
        id: 'Terminated',
        description: 'A tail followed by `;` is a statement',
        code: 'if a { 1 } else { 2; }',
        expected: { kind: 'Block', attrs: [], label: null, block: '{ 2 ; }' }
      },
      {
        id: 'Else If',
        description: '`else if` converts as an `If`',
        code: 'if a { 1 } else if b { 2 }',
        expected: {
          kind: 'If',
          attrs: [],
          cond: path('b'),
          then_branch: '{ 2 }',
          else_branch: null
        }
      }
    ];

    test.for(scenarios)('[$id] $description', ({ code, expected }) => {
      const value = convert(code);
      expect(value.else_branch).toStrictEqual(expected);
    });
  });

  describe('Structure', () => {
    it('keeps nested parentheses', () => {
      const inner = binary(path('a'), '+', path('b'));
      const wrap = (expr: CanonicalValue): CanonicalValue => ({
        kind: 'Paren',
        attrs: [],
        expr
      });
      expect(convert('((((a + b))))')).toStrictEqual(wrap(wrap(wrap(wrap(inner)))));
    });

    it('emits `kind` first and then the schema order', () => {
      expect(Object.keys(convert('p.x'))).toStrictEqual(['kind', 'attrs', 'base', 'member']);
      expect(Object.keys(convert('|x| x'))).toStrictEqual([
        'kind',
        'attrs',
        'lifetimes',
        'constness',
        'movability',
        'asyncness',
        'capture',
        'inputs',
        'output',
        'body'
      ]);
      expect(Object.keys(convert('S { a: 1 }'))).toStrictEqual([
        'kind',
        'attrs',
        'qself',
        'path',
        'fields',
        'dot2_token',
        'rest'
      ]);
    });

    it('produces equal values for repeated conversions', () => {
      const expr = parseExpr('match x { Some(v) => v.iter().map(|y| y * 2).sum(), None => 0 }');
      expect(exprToValue(expr)).toStrictEqual(exprToValue(expr));
      expect(JSON.stringify(exprToValue(expr))).toBe(JSON.stringify(exprToValue(expr)));
    });

    it('renders differently formatted input identically', () => {
      expect(convert('{f(a,b)}')).toStrictEqual(convert('{ f( a , b ) }'));
    });
  });

  describe('Fallback', () => {
    it('renders a node of unknown kind as its tokens', () => {
      const expr = withForeignKind(parseExpr('a + b'), 'Frobnicate');
      expect(exprToValue(expr)).toStrictEqual({ kind: 'Unknown', tokens: 'a + b' });
    });

    it('converts the invisible group node', () => {
      const inner = parseExpr('x');
      const group: ExprGroup = { kind: 'Group', attrs: [], tokens: inner.tokens, expr: inner };
      expect(exprToValue(group)).toStrictEqual({ kind: 'Group', attrs: [], expr: path('x') });
    });

    it('falls back inside a known parent', () => {
      const call = parseExpr('f(g)');
      if (call.kind !== 'Call') throw new Error('expected a call');
      const [arg] = call.args;
      if (!arg) throw new Error('expected an argument');
      const value = exprToValue({ ...call, args: [withForeignKind(arg, 'Frobnicate')] });
      expect(value).toStrictEqual({
        kind: 'Call',
        attrs: [],
        func: path('f'),
        args: [{ kind: 'Unknown', tokens: 'g' }]
      });
    });
  });
});
