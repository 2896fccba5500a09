import type {
  ComparisonOperator,
  BitwiseOperator,
  JsonOperator,
  Keyword,
  LiteralValueTypeIndicator,
  LogicalOperator,
  Operator,
} from './tokens';

// Lookup tables for the tokenizer. Keys are upper-case ASCII; the tokenizer
// upper-cases a word only when it is pure ASCII, so non-ASCII letters never
// fold into a keyword.

const KEYWORD_LIST = [
  'SELECT', 'FROM', 'WHERE', 'AND', 'OR', 'UPDATE', 'SET', 'INSERT', 'INTO',
  'VALUES', 'INNER', 'JOIN', 'ON', 'LIMIT', 'OFFSET', 'BETWEEN', 'ARRAY',
] as const satisfies readonly Exclude<Keyword, 'OTHER'>[];

const LOGICAL_OPERATOR_LIST = [
  'IN', 'NOT', 'LIKE', 'ILIKE', 'RLIKE', 'GLOB', 'MATCH', 'REGEXP', 'THEN', 'ELSE',
] as const satisfies readonly LogicalOperator[];

const KEYWORDS: ReadonlyMap<string, Exclude<Keyword, 'OTHER'>> = new Map<string, Exclude<Keyword, 'OTHER'>>(
  KEYWORD_LIST.map(k => [k, k] as const)
);

const LOGICAL_OPERATORS: ReadonlyMap<string, LogicalOperator> = new Map<string, LogicalOperator>(
  LOGICAL_OPERATOR_LIST.map(op => [op, op] as const)
);

// Word-shaped indicators. `0X`/`0B` come out of the numeric branch and
// `CHARSET` out of the underscore branch.
const WORD_LITERAL_TYPE_INDICATORS: ReadonlyMap<string, LiteralValueTypeIndicator> = new Map<string, LiteralValueTypeIndicator>([
  ['BINARY', 'BINARY'],
  ['DATE', 'DATE'],
  ['TIME', 'TIME'],
  ['TIMESTAMP', 'TIMESTAMP'],
  ['X', 'X'],
  ['B', 'B'],
  ['N', 'N'],
]);

export const NUMERIC_LITERAL_TYPE_INDICATORS: ReadonlyMap<string, LiteralValueTypeIndicator> = new Map<string, LiteralValueTypeIndicator>([
  ['0X', '0X'],
  ['0B', '0B'],
]);

const COMPARISON_OPERATOR_LIST = [
  '<=>', '>=', '<=', '=>', '=<', '<>', '!=', '==', '=', '>', '<',
] as const satisfies readonly ComparisonOperator[];

const BITWISE_OPERATOR_LIST = ['<<', '>>', '&', '|'] as const satisfies readonly BitwiseOperator[];

const JSON_OPERATOR_LIST = ['#>', '#>>'] as const satisfies readonly JsonOperator[];

/** Operators spelled with the characters `= ! > < & | #`. */
export const SYMBOL_OPERATORS: ReadonlyMap<string, Operator> = new Map<string, Operator>([
  ...COMPARISON_OPERATOR_LIST.map(op => [op, { kind: 'comparison', op }] as const),
  ...BITWISE_OPERATOR_LIST.map(op => [op, { kind: 'bitwise', op }] as const),
  ...JSON_OPERATOR_LIST.map(op => [op, { kind: 'json', op }] as const),
]);

type WordClass =
  | { readonly type: 'keyword'; readonly keyword: Keyword }
  | { readonly type: 'operator'; readonly operator: Operator }
  | { readonly type: 'literal_type_indicator'; readonly indicator: LiteralValueTypeIndicator }
  | { readonly type: 'null' | 'true' | 'false' };

const ASCII_WORD_RE = /^[A-Za-z0-9_-]+$/;

/**
 * Classify a scanned word. Anything that is not a fixed keyword, word
 * operator, literal-type indicator or `NULL`/`TRUE`/`FALSE` is an `OTHER`
 * keyword.
 */
export function classifyWord(word: string): WordClass {
  if (!ASCII_WORD_RE.test(word)) return { type: 'keyword', keyword: 'OTHER' };
  const upper = word.toUpperCase();

  const keyword = KEYWORDS.get(upper);
  if (keyword) return { type: 'keyword', keyword };

  const logical = LOGICAL_OPERATORS.get(upper);
  if (logical) return { type: 'operator', operator: { kind: 'logical', op: logical } };

  const indicator = WORD_LITERAL_TYPE_INDICATORS.get(upper);
  if (indicator) return { type: 'literal_type_indicator', indicator };

  if (upper === 'NULL') return { type: 'null' };
  if (upper === 'TRUE') return { type: 'true' };
  if (upper === 'FALSE') return { type: 'false' };

  return { type: 'keyword', keyword: 'OTHER' };
}
