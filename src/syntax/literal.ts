/**
 * Literal token decoding.
 *
 * The lexer only finds where a literal token ends. This module reads the
 * token text back: it classifies the token, splits off its suffix and
 * decodes escapes. The lexer runs the decoders once to reject malformed
 * literals; the literal normalizer runs them again to produce values.
 *
 * Numeric literals are never converted to a binary number. Integers are
 * rewritten to base-10 digit text through `BigInt`, floats keep their digit
 * text with `_` separators removed.
 */

export type LiteralKind =
  | 'Str'
  | 'ByteStr'
  | 'CStr'
  | 'Byte'
  | 'Char'
  | 'Int'
  | 'Float';

/**
 * Raised when a literal token is malformed (bad escape, empty char, ...).
 * The lexer rethrows it as a `ParseError` at the token's position.
 */
export class LiteralError extends Error {}

export type Decoded<T> = {
  value: T;
  suffix: string;
};

type EscapeMode = 'str' | 'char' | 'byte' | 'cstr';

const IDENT_START = /[\p{XID_Start}_]/u;
const IDENT_CONTINUE = /\p{XID_Continue}/u;

const SIMPLE_ESCAPES: Record<string, number> = {
  n: 0x0a,
  r: 0x0d,
  t: 0x09,
  '\\': 0x5c,
  '0': 0x00,
  "'": 0x27,
  '"': 0x22
};

const FLOAT_SUFFIXES = new Set(['f16', 'f32', 'f64', 'f128']);

/**
 * Determines the literal kind from the token text alone.
 */
export function literalKind(text: string): LiteralKind {
  if (text.startsWith('"') || text.startsWith('r')) return 'Str';
  if (text.startsWith("b'")) return 'Byte';
  if (text.startsWith('b')) return 'ByteStr';
  if (text.startsWith('c')) return 'CStr';
  if (text.startsWith("'")) return 'Char';
  return isFloatText(text) ? 'Float' : 'Int';
}

function isFloatText(text: string): boolean {
  if (/^0[xob]/.test(text)) return false;
  const { mantissa, suffix } = splitNumber(text);
  return (
    mantissa.includes('.') ||
    /[eE]/.test(mantissa) ||
    FLOAT_SUFFIXES.has(suffix)
  );
}

/**
 * Splits a suffix (an identifier glued to the closing quote or the last
 * digit) off the end of a literal.
 */
function readSuffix(text: string, from: number): string {
  const suffix = text.slice(from);
  if (suffix === '') return '';
  const chars = [...suffix];
  const [first, ...rest] = chars;
  if (
    first === undefined ||
    !IDENT_START.test(first) ||
    !rest.every(ch => IDENT_CONTINUE.test(ch))
  ) {
    throw new LiteralError(`invalid literal suffix \`${suffix}\``);
  }
  return suffix;
}

type QuotedParts = {
  raw: boolean;
  body: string;
  suffix: string;
};

/**
 * Separates prefix, delimiters, body and suffix of a quoted literal.
 *
 * @param text
 *   The literal token text.
 * @param prefixLength
 *   Length of the `b`/`c` prefix (0 for plain strings and chars).
 * @param quote
 *   The quote character delimiting the body.
 */
function splitQuoted(
  text: string,
  prefixLength: number,
  quote: '"' | "'"
): QuotedParts {
  let index = prefixLength;
  const raw = text[index] === 'r';

  if (raw) {
    index++;
    let hashes = 0;
    while (text[index] === '#') {
      hashes++;
      index++;
    }
    if (text[index] !== '"') {
      throw new LiteralError('expected `"` to open raw string');
    }
    const terminator = '"' + '#'.repeat(hashes);
    const close = text.indexOf(terminator, index + 1);
    if (close < 0) throw new LiteralError('unterminated raw string');
    return {
      raw,
      body: text.slice(index + 1, close),
      suffix: readSuffix(text, close + terminator.length)
    };
  }

  if (text[index] !== quote) {
    throw new LiteralError(`expected \`${quote}\` to open literal`);
  }

  let cursor = index + 1;
  while (cursor < text.length && text[cursor] !== quote) {
    cursor += text[cursor] === '\\' ? 2 : 1;
  }
  if (cursor >= text.length) throw new LiteralError('unterminated literal');

  return {
    raw,
    body: text.slice(index + 1, cursor),
    suffix: readSuffix(text, cursor + 1)
  };
}

function parseHex(digits: string, what: string): number {
  if (!/^[0-9a-fA-F]+$/.test(digits)) {
    throw new LiteralError(`invalid character in ${what}`);
  }
  return Number.parseInt(digits, 16);
}

function encodeUtf8(codePoint: number): number[] {
  return [...new TextEncoder().encode(String.fromCodePoint(codePoint))];
}

/**
 * Decodes the escapes of a cooked literal body.
 *
 * Every decoded unit is reported as a code point (`str`, `char`) or as a
 * byte (`byte`, `cstr`).
 */
function unescape(body: string, mode: EscapeMode): number[] {
  const units: number[] = [];
  const isBytes = mode === 'byte' || mode === 'cstr';
  let index = 0;

  while (index < body.length) {
    const codePoint = body.codePointAt(index) ?? 0;
    const width = codePoint > 0xffff ? 2 : 1;

    if (codePoint !== 0x5c) {
      if (mode === 'byte' && codePoint > 0x7f) {
        throw new LiteralError('non-ASCII character in byte literal');
      }
      if (codePoint === 0x0d && body[index + 1] !== '\n') {
        throw new LiteralError('bare CR not allowed in literal');
      }
      units.push(...(mode === 'cstr' ? encodeUtf8(codePoint) : [codePoint]));
      index += width;
      continue;
    }

    const escape = body[index + 1];
    if (escape === undefined) throw new LiteralError('unterminated escape');

    const simple = SIMPLE_ESCAPES[escape];
    if (simple !== undefined) {
      units.push(simple);
      index += 2;
      continue;
    }

    if (escape === 'x') {
      const value = parseHex(body.slice(index + 2, index + 4), 'hex escape');
      if (!isBytes && value > 0x7f) {
        throw new LiteralError('out of range hex escape');
      }
      units.push(value);
      index += 4;
      continue;
    }

    if (escape === 'u') {
      if (mode === 'byte') {
        throw new LiteralError('unicode escape in byte literal');
      }
      if (body[index + 2] !== '{') {
        throw new LiteralError('incorrect unicode escape sequence');
      }
      const close = body.indexOf('}', index + 3);
      if (close < 0) throw new LiteralError('unterminated unicode escape');
      const digits = body.slice(index + 3, close).replaceAll('_', '');
      if (digits.length === 0 || digits.length > 6) {
        throw new LiteralError('invalid unicode escape');
      }
      const value = parseHex(digits, 'unicode escape');
      if (value > 0x10ffff || (value >= 0xd800 && value <= 0xdfff)) {
        throw new LiteralError('invalid unicode character escape');
      }
      units.push(...(mode === 'cstr' ? encodeUtf8(value) : [value]));
      index = close + 1;
      continue;
    }

    if (escape === '\n' && mode !== 'char') {
      index += 2;
      while (index < body.length && /\s/.test(body[index] ?? '')) index++;
      continue;
    }

    throw new LiteralError(`unknown character escape: \`${escape}\``);
  }

  if (mode === 'cstr' && units.includes(0)) {
    throw new LiteralError('null characters in C string literals are not supported');
  }

  return units;
}

function rawUnits(body: string, mode: EscapeMode): number[] {
  if (body.includes('\r')) {
    throw new LiteralError('bare CR not allowed in raw string');
  }
  if (mode === 'cstr') {
    const bytes = [...new TextEncoder().encode(body)];
    if (bytes.includes(0)) {
      throw new LiteralError('null characters in C string literals are not supported');
    }
    return bytes;
  }
  const units = [...body].map(ch => ch.codePointAt(0) ?? 0);
  if (mode === 'byte' && units.some(unit => unit > 0x7f)) {
    throw new LiteralError('non-ASCII character in raw byte string');
  }
  return units;
}

export function decodeStr(text: string): Decoded<string> {
  const { raw, body, suffix } = splitQuoted(text, 0, '"');
  const units = raw ? rawUnits(body, 'str') : unescape(body, 'str');
  return { value: units.map(unit => String.fromCodePoint(unit)).join(''), suffix };
}

export function decodeByteStr(text: string): Decoded<number[]> {
  const { raw, body, suffix } = splitQuoted(text, 1, '"');
  return { value: raw ? rawUnits(body, 'byte') : unescape(body, 'byte'), suffix };
}

/**
 * Decodes a C string literal to its bytes, without the implicit nul.
 */
export function decodeCStr(text: string): Decoded<number[]> {
  const { raw, body, suffix } = splitQuoted(text, 1, '"');
  return { value: raw ? rawUnits(body, 'cstr') : unescape(body, 'cstr'), suffix };
}

export function decodeByte(text: string): Decoded<number> {
  const { body, suffix } = splitQuoted(text, 1, "'");
  const units = unescape(body, 'byte');
  const [value] = units;
  if (value === undefined || units.length !== 1) {
    throw new LiteralError('byte literal must contain exactly one byte');
  }
  return { value, suffix };
}

export function decodeChar(text: string): Decoded<string> {
  const { body, suffix } = splitQuoted(text, 0, "'");
  const units = unescape(body, 'char');
  const [value] = units;
  if (value === undefined || units.length !== 1) {
    throw new LiteralError('character literal must contain exactly one character');
  }
  return { value: String.fromCodePoint(value), suffix };
}

type NumberParts = {
  mantissa: string;
  suffix: string;
};

/**
 * Splits a numeric literal into its number part and its suffix.
 */
function splitNumber(text: string): NumberParts {
  const radix = /^0[xob]/.exec(text);
  if (radix) {
    const digitClass =
      radix[0] === '0x' ? /[0-9a-fA-F_]/ : radix[0] === '0o' ? /[0-7_]/ : /[01_]/;
    let index = 2;
    while (index < text.length && digitClass.test(text[index] ?? '')) index++;
    return { mantissa: text.slice(0, index), suffix: text.slice(index) };
  }

  const match = /^[0-9][0-9_]*(\.(?![._\p{XID_Start}])[0-9_]*)?([eE][+-]?_*[0-9][0-9_]*)?/u.exec(
    text
  );
  const mantissa = match?.[0] ?? '';
  return { mantissa, suffix: text.slice(mantissa.length) };
}

/**
 * Decodes an integer literal to its base-10 digits.
 *
 * Hexadecimal, octal and binary digits are rewritten to base 10 with
 * arbitrary precision, so `0xFF_FF` becomes `"65535"`.
 */
export function decodeInt(text: string): Decoded<string> {
  const { mantissa, suffix } = splitNumber(text);
  const digits = mantissa.replaceAll('_', '');
  const body = /^0[xob]/.test(digits) ? digits.slice(2) : digits;
  if (body.length === 0) {
    throw new LiteralError('no valid digits found for number');
  }
  if (/^0[ob]/.test(digits) && /[0-9]/.test(suffix.charAt(0))) {
    throw new LiteralError('invalid digit for a base 2 or 8 literal');
  }
  return { value: BigInt(digits).toString(), suffix: readSuffix(suffix, 0) };
}

/**
 * Decodes a float literal to its digit text with `_` separators removed.
 */
export function decodeFloat(text: string): Decoded<string> {
  const { mantissa, suffix } = splitNumber(text);
  if (mantissa.length === 0 || /^0[xob]/.test(mantissa)) {
    throw new LiteralError('invalid float literal');
  }
  return { value: mantissa.replaceAll('_', ''), suffix: readSuffix(suffix, 0) };
}

/**
 * Runs the decoder matching the token's kind and discards the result.
 *
 * @throws {LiteralError} When the literal is malformed.
 */
export function validateLiteral(text: string): LiteralKind {
  const kind = literalKind(text);
  switch (kind) {
    case 'Str':
      decodeStr(text);
      break;
    case 'ByteStr':
      decodeByteStr(text);
      break;
    case 'CStr':
      decodeCStr(text);
      break;
    case 'Byte':
      decodeByte(text);
      break;
    case 'Char':
      decodeChar(text);
      break;
    case 'Int':
      decodeInt(text);
      break;
    case 'Float':
      decodeFloat(text);
      break;
  }
  return kind;
}
