import type { Expression } from 'estree';
import { valueToEstree } from 'estree-util-value-to-estree';
import { exprToValue } from '../converter';
import { parseExpr } from '../syntax';
import type { CanonicalValue } from '../types';
import {
  isArray,
  isBigInt,
  isBoolean,
  isFiniteValue,
  isFunction,
  isNull,
  isNumber,
  isPlainObject,
  isString,
  isSymbol,
  isUndefined
} from '../utils/type-guards';

/**
 * Raised when a value cannot be encoded as JSON.
 */
export class EmitError extends Error {
  /**
   * Location of the offending value, as `$`, `$.key` or `$[index]`.
   */
  readonly path: string;

  constructor(message: string, path: string) {
    super(`${message} at ${path}`);
    this.name = 'EmitError';
    this.path = path;
  }
}

export type EmitOptions = {
  /**
   * Spaces per indentation level.
   *
   * @default 2
   */
  indent?: number;
};

function checkValue(value: unknown, path: string, ancestors: Set<object>): void {
  if (isNull(value) || isString(value) || isBoolean(value)) return;

  if (isNumber(value)) {
    if (!isFiniteValue(value)) {
      throw new EmitError(`non-finite number ${String(value)}`, path);
    }
    return;
  }
  if (isUndefined(value)) throw new EmitError('undefined is not a JSON value', path);
  if (isBigInt(value)) throw new EmitError('bigint is not a JSON value', path);
  if (isSymbol(value)) throw new EmitError('symbol is not a JSON value', path);
  if (isFunction(value)) throw new EmitError('function is not a JSON value', path);

  if (isArray(value) || isPlainObject(value)) {
    if (ancestors.has(value)) throw new EmitError('cyclic structure', path);
    ancestors.add(value);
    if (isArray(value)) {
      value.forEach((item, index) => checkValue(item, `${path}[${index}]`, ancestors));
    } else {
      for (const [key, child] of Object.entries(value)) {
        checkValue(child, `${path}.${key}`, ancestors);
      }
    }
    ancestors.delete(value);
    return;
  }

  throw new EmitError('only plain objects and arrays can be encoded', path);
}

/**
 * Asserts that `value` is a {@link CanonicalValue}: `null`, a boolean, a
 * finite number, a string, or arrays and plain objects of those, without
 * cycles. Shared (non-cyclic) references are allowed.
 *
 * @throws {EmitError}
 */
export function assertCanonical(value: unknown): asserts value is CanonicalValue {
  try {
    checkValue(value, '$', new Set());
  } catch (error) {
    if (error instanceof RangeError) throw new EmitError('value nested too deeply', '$');
    throw error;
  }
}

/**
 * Encodes a canonical value as pretty-printed JSON text.
 *
 * Keys keep their insertion order.
 *
 * @throws {EmitError} When the value is not encodable.
 */
export function emitJson(value: unknown, options: EmitOptions = {}): string {
  assertCanonical(value);
  return JSON.stringify(value, null, options.indent ?? 2);
}

/**
 * Encodes a canonical value as an ESTree expression, for embedding
 * converted trees into generated JavaScript.
 *
 * @throws {EmitError} When the value is not encodable.
 */
export function emitEstree(value: unknown): Expression {
  assertCanonical(value);
  return valueToEstree(value);
}

/**
 * Parses `source` as a Rust expression and returns its canonical value as
 * JSON text.
 *
 * @throws {ParseError} When `source` is not a single expression.
 */
export function toJson(source: string, options: EmitOptions = {}): string {
  return emitJson(exprToValue(parseExpr(source)), options);
}
