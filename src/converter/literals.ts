import {
  LiteralError,
  decodeByte,
  decodeByteStr,
  decodeCStr,
  decodeChar,
  decodeFloat,
  decodeInt,
  decodeStr
} from '../syntax/literal';
import type { CanonicalNode, Lit } from '../types';

const utf8 = new TextDecoder('utf-8');

/**
 * Converts a literal to its canonical value.
 *
 * | Lit      | value                                  |
 * | -------- | -------------------------------------- |
 * | Str      | decoded text                           |
 * | ByteStr  | array of byte numbers                  |
 * | CStr     | bytes decoded as UTF-8 (lossy)         |
 * | Byte     | byte number                            |
 * | Char     | one-character string                   |
 * | Int      | base-10 digit text                     |
 * | Float    | digit text without `_`                 |
 * | Bool     | boolean (no `suffix` key)              |
 *
 * Numbers are never routed through a binary float: `Int` and `Float`
 * values are digit strings, so `u128::MAX` survives unchanged.
 *
 * `Verbatim` literals render their tokens; a literal kind not listed above
 * becomes `{ kind: "Unknown", tokens }`. Malformed literal text (which the
 * parser never produces) is reported the same way.
 */
export function litToValue(lit: Lit): CanonicalNode {
  const node: { kind: string; text: string } = lit;
  try {
    switch (lit.kind) {
      case 'Str': {
        const { value, suffix } = decodeStr(lit.text);
        return { kind: 'Str', value, suffix };
      }
      case 'ByteStr': {
        const { value, suffix } = decodeByteStr(lit.text);
        return { kind: 'ByteStr', value, suffix };
      }
      case 'CStr': {
        const { value, suffix } = decodeCStr(lit.text);
        return { kind: 'CStr', value: utf8.decode(Uint8Array.from(value)), suffix };
      }
      case 'Byte': {
        const { value, suffix } = decodeByte(lit.text);
        return { kind: 'Byte', value, suffix };
      }
      case 'Char': {
        const { value, suffix } = decodeChar(lit.text);
        return { kind: 'Char', value, suffix };
      }
      case 'Int': {
        const { value, suffix } = decodeInt(lit.text);
        return { kind: 'Int', value, suffix };
      }
      case 'Float': {
        const { value, suffix } = decodeFloat(lit.text);
        return { kind: 'Float', value, suffix };
      }
      case 'Bool':
        return { kind: 'Bool', value: lit.value };
      case 'Verbatim':
        return { kind: 'Verbatim', tokens: lit.text };
      default:
        return { kind: 'Unknown', tokens: node.text };
    }
  } catch (error) {
    if (error instanceof LiteralError) {
      return { kind: 'Unknown', tokens: node.text };
    }
    throw error;
  }
}
