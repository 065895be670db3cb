/**
 * The canonical, JSON-isomorphic value every conversion produces.
 *
 * Objects are plain records whose key order is the insertion order; the
 * converter always inserts `kind` first, then `attrs`, then the variant's
 * fields in schema order.
 */
export type CanonicalValue =
  | null
  | boolean
  | number
  | string
  | CanonicalValue[]
  | CanonicalObject;

export type CanonicalObject = { [key: string]: CanonicalValue };

/**
 * Tagged object shape shared by every converted node.
 */
export type CanonicalNode = CanonicalObject & { kind: string };

/**
 * Shape produced for syntax that is rendered as text instead of being
 * decomposed: `Verbatim` for tokens the parser kept as-is, `Unknown` for a
 * node kind the converter does not recognize.
 */
export type OpaqueNode = {
  kind: 'Verbatim' | 'Unknown';
  tokens: string;
};
