export { sanitizeText } from './scrub';
export { lex } from './tokenizer';
export { sanitize, step } from './sanitizer';
export type { SanitizerAction, SanitizerState, SanitizerStep } from './sanitizer';
export { render, renderToken } from './writer';
export { TokenizedSql, bufferContent, bufferSlice } from './slice';
export type { BufferSlice } from './slice';
export { isSensitive } from './tokens';
export type {
  Token,
  TokenType,
  QuotedToken,
  QuotedTokenType,
  SensitiveToken,
  Keyword,
  Operator,
  ArithmeticOperator,
  LogicalOperator,
  ComparisonOperator,
  BitwiseOperator,
  JsonOperator,
  LiteralValueTypeIndicator,
} from './tokens';

// Injected at build time by tsup's `define` option from package.json.
declare const __SQLSCRUB_VERSION__: string | undefined;
export const version: string =
  typeof __SQLSCRUB_VERSION__ !== 'undefined'
    ? __SQLSCRUB_VERSION__
    : '0.0.0-dev';
