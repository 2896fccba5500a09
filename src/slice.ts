import type { Token } from './tokens';

/**
 * Half-open UTF-8 byte range into the buffer of a {@link TokenizedSql}.
 */
export interface BufferSlice {
  readonly start: number;
  readonly end: number;
}

export function bufferSlice(start: number, end: number): BufferSlice {
  return { start, end };
}

/**
 * The source text of one statement together with its token sequence.
 *
 * The buffer never changes after construction. The sanitizer rewrites
 * `tokens` in place (replace or tombstone, never reorder); the writer only
 * reads it.
 */
export class TokenizedSql {
  /** Original input text. */
  readonly source: string;
  /** UTF-8 encoding of `source`; token slices index into this. */
  readonly buffer: Buffer;
  tokens: Token[];

  constructor(source: string, tokens: Token[] = []) {
    this.source = source;
    this.buffer = Buffer.from(source, 'utf8');
    this.tokens = tokens;
  }

  /**
   * Text covered by `slice`, or an empty string when the slice is inverted or
   * falls outside the buffer.
   */
  content(slice: BufferSlice): string {
    const { start, end } = slice;
    if (!Number.isInteger(start) || !Number.isInteger(end)) return '';
    if (start < 0 || end > this.buffer.length || start > end) return '';
    return this.buffer.toString('utf8', start, end);
  }
}

export function bufferContent(sql: TokenizedSql, slice: BufferSlice): string {
  return sql.content(slice);
}
