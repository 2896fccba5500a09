import type { BufferSlice } from './slice';

export type Keyword =
  | 'SELECT'
  | 'FROM'
  | 'WHERE'
  | 'AND'
  | 'OR'
  | 'UPDATE'
  | 'SET'
  | 'INSERT'
  | 'INTO'
  | 'VALUES'
  | 'INNER'
  | 'JOIN'
  | 'ON'
  | 'LIMIT'
  | 'OFFSET'
  | 'BETWEEN'
  | 'ARRAY'
  // Any word not in the fixed table: function, table and column names.
  | 'OTHER';

export type ArithmeticOperator = '*' | '/' | '%' | '+' | '-';

export type LogicalOperator =
  | 'IN'
  | 'NOT'
  | 'LIKE'
  | 'ILIKE'
  | 'RLIKE'
  | 'GLOB'
  | 'MATCH'
  | 'REGEXP'
  | 'THEN'
  | 'ELSE';

export type ComparisonOperator = '=' | '==' | '<=>' | '>=' | '<=' | '=>' | '=<' | '<>' | '!=' | '>' | '<';

export type BitwiseOperator = '<<' | '>>' | '&' | '|';

export type JsonOperator = '#>' | '#>>';

export type Operator =
  | { readonly kind: 'arithmetic'; readonly op: ArithmeticOperator }
  | { readonly kind: 'logical'; readonly op: LogicalOperator }
  | { readonly kind: 'comparison'; readonly op: ComparisonOperator }
  | { readonly kind: 'bitwise'; readonly op: BitwiseOperator }
  | { readonly kind: 'json'; readonly op: JsonOperator };

/**
 * Prefixes that mark the next token as a literal even though no operator
 * precedes it, e.g. `DATE '2020-01-01'`, `x'42'`, `_utf8'abc'`.
 */
export type LiteralValueTypeIndicator =
  | 'BINARY'
  | 'DATE'
  | 'TIME'
  | 'TIMESTAMP'
  | 'X'
  | '0X'
  | 'B'
  | '0B'
  | 'N'
  | 'CHARSET';

export type QuotedTokenType = 'backticked' | 'double_quoted' | 'single_quoted';

export interface QuotedToken {
  readonly type: QuotedTokenType;
  readonly slice: BufferSlice;
  /** False when the input ended before the closing delimiter. */
  readonly terminated: boolean;
}

export type Token =
  | QuotedToken
  | { readonly type: 'numeric'; readonly slice: BufferSlice }
  | { readonly type: 'comment'; readonly slice: BufferSlice }
  | { readonly type: 'numbered_placeholder'; readonly slice: BufferSlice }
  | { readonly type: 'keyword'; readonly keyword: Keyword; readonly slice: BufferSlice }
  | { readonly type: 'operator'; readonly operator: Operator; readonly slice: BufferSlice }
  | { readonly type: 'literal_type_indicator'; readonly indicator: LiteralValueTypeIndicator; readonly slice: BufferSlice }
  | { readonly type: 'null'; readonly slice: BufferSlice }
  | { readonly type: 'true'; readonly slice: BufferSlice }
  | { readonly type: 'false'; readonly slice: BufferSlice }
  | { readonly type: 'space' }
  | { readonly type: 'newline'; readonly char: '\n' | '\r' }
  | { readonly type: 'dot' }
  | { readonly type: 'comma' }
  | { readonly type: 'wildcard' }
  | { readonly type: 'paren_open' }
  | { readonly type: 'paren_close' }
  | { readonly type: 'bracket_open' }
  | { readonly type: 'bracket_close' }
  | { readonly type: 'colon' }
  | { readonly type: 'semicolon' }
  | { readonly type: 'placeholder' }
  | { readonly type: 'unknown'; readonly char: string }
  // Only produced by the sanitizer.
  | { readonly type: 'ellipsis' }
  | { readonly type: 'removed' };

export type TokenType = Token['type'];

/** Tokens whose value may carry user data. */
export type SensitiveToken =
  | (QuotedToken & { readonly type: 'single_quoted' | 'double_quoted' })
  | Extract<Token, { type: 'numeric' | 'null' | 'true' | 'false' }>;

const SENSITIVE_TYPES: ReadonlySet<TokenType> = new Set<TokenType>([
  'single_quoted',
  'double_quoted',
  'numeric',
  'null',
  'true',
  'false',
]);

export function isSensitive(token: Token): token is SensitiveToken {
  return SENSITIVE_TYPES.has(token.type);
}

export const PLACEHOLDER: Token = Object.freeze({ type: 'placeholder' });
export const ELLIPSIS: Token = Object.freeze({ type: 'ellipsis' });
export const REMOVED: Token = Object.freeze({ type: 'removed' });
