import type { Attribute } from '../types';
import type { Cursor } from './cursor';

/**
 * Parses `#[...]` attributes.
 */
export function parseOuterAttrs(c: Cursor): Attribute[] {
  const attrs: Attribute[] = [];
  while (c.isPunct('#') && c.group('bracket', 1)) {
    const start = c.position;
    c.bump();
    c.bump();
    attrs.push({ style: 'outer', tokens: c.slice(start) });
  }
  return attrs;
}

/**
 * Parses `#![...]` attributes at the start of a block body.
 */
export function parseInnerAttrs(c: Cursor): Attribute[] {
  const attrs: Attribute[] = [];
  while (c.isPunct('#') && c.isPunct('!', 1) && c.group('bracket', 2)) {
    const start = c.position;
    c.bump();
    c.bump();
    c.bump();
    attrs.push({ style: 'inner', tokens: c.slice(start) });
  }
  return attrs;
}
