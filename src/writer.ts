import type { TokenizedSql } from './slice';
import type { Token } from './tokens';

const QUOTE_DELIMITERS = {
  backticked: '`',
  double_quoted: '"',
  single_quoted: "'",
} as const;

/** Text of a single token. Content tokens read their slice from `sql`. */
export function renderToken(sql: TokenizedSql, token: Token): string {
  switch (token.type) {
    case 'backticked':
    case 'double_quoted':
    case 'single_quoted': {
      const delimiter = QUOTE_DELIMITERS[token.type];
      return delimiter + sql.content(token.slice) + (token.terminated ? delimiter : '');
    }
    case 'numeric':
    case 'comment':
    case 'numbered_placeholder':
    case 'keyword':
    case 'operator':
    case 'literal_type_indicator':
    case 'null':
    case 'true':
    case 'false':
      return sql.content(token.slice);
    case 'space':
      return ' ';
    case 'newline':
      return token.char;
    case 'dot':
      return '.';
    case 'comma':
      return ',';
    case 'wildcard':
      return '*';
    case 'paren_open':
      return '(';
    case 'paren_close':
      return ')';
    case 'bracket_open':
      return '[';
    case 'bracket_close':
      return ']';
    case 'colon':
      return ':';
    case 'semicolon':
      return ';';
    case 'placeholder':
      return '?';
    case 'unknown':
      return token.char;
    case 'ellipsis':
      return '...';
    case 'removed':
      return '';
    default: {
      const exhaustive: never = token;
      throw new Error(`Unhandled token: ${JSON.stringify(exhaustive)}`);
    }
  }
}

/**
 * Serialize a token sequence back to SQL text.
 *
 * Without sanitizing, `render(lex(text))` reproduces `text` exactly.
 */
export function render(sql: TokenizedSql): string {
  let out = '';
  for (const token of sql.tokens) {
    out += renderToken(sql, token);
  }
  return out;
}
