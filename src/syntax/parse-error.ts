/**
 * Parse error definitions.
 *
 * Errors are raised with the UTF-16 offset of the offending token and
 * located (line and column) once, at the public entry point, where the
 * source text is known.
 */
export class ParseError extends Error {
  /**
   * Offset of the offending token in the source text.
   */
  readonly offset: number;

  /**
   * 1-based position, filled in by {@link locateParseError}.
   */
  readonly line: number | null;
  readonly column: number | null;

  constructor(
    message: string,
    offset: number,
    location: { line: number; column: number } | null = null
  ) {
    super(
      location
        ? `${message} (line ${location.line}, column ${location.column})`
        : message
    );
    this.name = 'ParseError';
    this.offset = offset;
    this.line = location?.line ?? null;
    this.column = location?.column ?? null;
  }

  /**
   * The message without the location suffix.
   */
  get reason(): string {
    return this.line === null
      ? this.message
      : this.message.slice(0, this.message.lastIndexOf(' (line '));
  }
}

/**
 * Returns a copy of `error` carrying the line and column of its offset.
 *
 * @param error
 *   An error raised while lexing or parsing `source`.
 * @param source
 *   The complete source text.
 */
export function locateParseError(error: ParseError, source: string): ParseError {
  if (error.line !== null) return error;

  const before = source.slice(0, Math.min(error.offset, source.length));
  const lines = before.split('\n');
  const line = lines.length;
  const column = [...(lines.at(-1) ?? '')].length + 1;

  return new ParseError(error.reason, error.offset, { line, column });
}
