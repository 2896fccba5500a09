import type { TokenizedSql } from './slice';
import { ELLIPSIS, isSensitive, PLACEHOLDER, REMOVED, type Token } from './tokens';

/**
 * Clause context inferred from the tokens seen so far.
 *
 * There is no syntax tree: the sanitizer only tracks enough context to decide
 * whether the literal it is looking at is a value.
 */
export type SanitizerState =
  | 'default'
  | 'after_operator'
  | 'scope_opened'
  | 'insert_values'
  | 'insert_row_closed'
  | 'join_on_clause'
  | 'offset_clause'
  | 'between_clause'
  | 'generic_keyword_scope'
  | 'generic_keyword_scope_opened'
  | 'array_clause'
  | 'array_scope_opened'
  | 'literal_type_indicator';

/**
 * Rewrite requested for the current token.
 *
 * - `placeholder`: replace the token with `?`
 * - `placeholder_unless_qualified`: same, unless a `.` touches the token
 *   (`"table"."column"` is an identifier, not a value)
 * - `collapse_list`: replace everything up to the closing bracket with one `?`
 * - `collapse_row`: replace a repeated `VALUES` row with `...`
 * - `strip_comment`: drop the comment and a space directly before it
 */
export type SanitizerAction =
  | 'none'
  | 'placeholder'
  | 'placeholder_unless_qualified'
  | 'collapse_list'
  | 'collapse_row'
  | 'strip_comment';

export interface SanitizerStep {
  readonly state: SanitizerState;
  readonly action: SanitizerAction;
}

// States in which a literal on its own is a value.
const VALUE_STATES: ReadonlySet<SanitizerState> = new Set<SanitizerState>([
  'after_operator',
  'insert_values',
  'offset_clause',
  'generic_keyword_scope_opened',
  'between_clause',
  'literal_type_indicator',
]);

// States in which a literal starts a bracketed list of values.
const LIST_STATES: ReadonlySet<SanitizerState> = new Set<SanitizerState>([
  'scope_opened',
  'array_scope_opened',
]);

// Identifiers, commas and operators inside a column list or a function's
// arguments keep these states.
const STICKY_STATES: ReadonlySet<SanitizerState> = new Set<SanitizerState>([
  'insert_values',
  'generic_keyword_scope_opened',
]);

function to(state: SanitizerState, action: SanitizerAction = 'none'): SanitizerStep {
  return { state, action };
}

/**
 * Transition function of the sanitizer. Pure: given the current state and
 * token it returns the next state and the rewrite to apply. Rules are checked
 * in order and the first match wins.
 */
export function step(state: SanitizerState, token: Token): SanitizerStep {
  // Every operator (comparison, logical, arithmetic...) makes the next
  // literal a value. Join conditions compare columns, so they are exempt.
  if (token.type === 'operator' && state !== 'join_on_clause') {
    return to('after_operator');
  }

  if (token.type === 'keyword') {
    switch (token.keyword) {
      case 'VALUES':
        return to('insert_values');
      case 'ON':
        return to('join_on_clause');
      case 'OFFSET':
        return to('offset_clause');
      case 'BETWEEN':
        return to('between_clause');
      case 'ARRAY':
        return to('array_clause');
      case 'AND':
        // BETWEEN x AND y: both bounds stay values.
        if (state === 'between_clause') return to(state);
        if (state === 'generic_keyword_scope') return to('generic_keyword_scope_opened');
        break;
      case 'OR':
        if (state === 'generic_keyword_scope') return to('generic_keyword_scope_opened');
        break;
      case 'INSERT':
      case 'INTO':
        return to(state);
      default:
        break;
    }
    // Unrecognized words land here too, so a function name opens a scope
    // without knowing any function.
    return to(state === 'generic_keyword_scope_opened' ? state : 'generic_keyword_scope');
  }

  if (token.type === 'literal_type_indicator') {
    return to('literal_type_indicator');
  }

  if (token.type === 'paren_open') {
    if (state === 'after_operator') return to('scope_opened');
    if (state === 'generic_keyword_scope') return to('generic_keyword_scope_opened');
    if (state === 'insert_values') return to(state);
    if (state === 'insert_row_closed') return to(state, 'collapse_row');
  }

  if (token.type === 'bracket_open' && state === 'array_clause') {
    return to('array_scope_opened');
  }

  if (token.type === 'paren_close' && state === 'insert_values') {
    return to('insert_row_closed');
  }

  if (token.type === 'comma' && state === 'insert_row_closed') {
    return to(state);
  }

  if (token.type === 'paren_close' || token.type === 'bracket_close') {
    return to('default');
  }

  if (token.type === 'dot' && state === 'join_on_clause') {
    return to(state);
  }

  if (isSensitive(token)) {
    if (VALUE_STATES.has(state)) {
      return to(state, token.type === 'double_quoted' ? 'placeholder_unless_qualified' : 'placeholder');
    }
    if (LIST_STATES.has(state)) return to(state, 'collapse_list');
    return to(state);
  }

  if (token.type === 'comment') {
    return to(state, 'strip_comment');
  }

  if (token.type === 'space' || token.type === 'newline') {
    return to(state);
  }

  if (STICKY_STATES.has(state)) {
    return to(state);
  }

  return to('default');
}

function isOpening(token: Token): boolean {
  return token.type === 'paren_open' || token.type === 'bracket_open';
}

function isClosing(token: Token): boolean {
  return token.type === 'paren_close' || token.type === 'bracket_close';
}

/**
 * Index of the bracket that closes the scope `from` is in, skipping nested
 * scopes. Returns `tokens.length` when the scope never closes.
 */
function findScopeEnd(tokens: Token[], from: number): number {
  let depth = 0;
  for (let i = from; i < tokens.length; i++) {
    const token = tokens[i];
    if (isOpening(token)) {
      depth++;
    } else if (isClosing(token)) {
      if (depth === 0) return i;
      depth--;
    }
  }
  return tokens.length;
}

function previousKept(tokens: Token[], from: number): number {
  for (let i = from - 1; i >= 0; i--) {
    if (tokens[i].type !== 'removed') return i;
  }
  return -1;
}

function removeRange(tokens: Token[], start: number, end: number): void {
  for (let i = start; i < end; i++) tokens[i] = REMOVED;
}

/**
 * Replace values in a token sequence with placeholders, in place.
 *
 * One left-to-right pass: single literals become `?`, bracketed value lists
 * collapse to `(?)` / `[?]`, the second and later rows of `INSERT ... VALUES`
 * collapse to one `...`, and comments are dropped. Removed tokens are
 * tombstoned so indices stay stable. Existing `?` and `$1` placeholders are
 * left alone, which makes sanitizing idempotent.
 *
 * @example
 * ```typescript
 * render(sanitize(lex("SELECT * FROM t WHERE id IN (1, 2, 3)")));
 * // 'SELECT * FROM t WHERE id IN (?)'
 * ```
 */
export function sanitize(sql: TokenizedSql): TokenizedSql {
  const tokens = sql.tokens;
  let state: SanitizerState = 'default';
  // Last token of the previous VALUES row: its `)`, or the `...` that
  // replaced the rows after the first one.
  let rowEnd = -1;

  let pos = 0;
  while (pos < tokens.length) {
    const token = tokens[pos];
    const next = step(state, token);

    if (state === 'insert_values' && next.state === 'insert_row_closed') {
      rowEnd = pos;
    }
    state = next.state;

    switch (next.action) {
      case 'none':
        break;

      case 'placeholder':
        tokens[pos] = PLACEHOLDER;
        break;

      case 'placeholder_unless_qualified': {
        const before = previousKept(tokens, pos);
        const qualified = (before >= 0 && tokens[before].type === 'dot') || tokens[pos + 1]?.type === 'dot';
        if (!qualified) tokens[pos] = PLACEHOLDER;
        break;
      }

      case 'collapse_list': {
        const end = findScopeEnd(tokens, pos + 1);
        tokens[pos] = PLACEHOLDER;
        removeRange(tokens, pos + 1, end);
        // Resume at the closing bracket so it resets the state.
        pos = end;
        continue;
      }

      case 'collapse_row': {
        const end = findScopeEnd(tokens, pos + 1);
        const rowStop = Math.min(end + 1, tokens.length);
        if (rowEnd >= 0 && tokens[rowEnd].type === 'ellipsis') {
          // Merge into the `...` already emitted, separators included.
          removeRange(tokens, rowEnd + 1, rowStop);
        } else {
          tokens[pos] = ELLIPSIS;
          removeRange(tokens, pos + 1, rowStop);
          rowEnd = pos;
        }
        pos = rowStop;
        continue;
      }

      case 'strip_comment': {
        tokens[pos] = REMOVED;
        const before = previousKept(tokens, pos);
        if (before >= 0 && tokens[before].type === 'space') tokens[before] = REMOVED;
        break;
      }

      default: {
        const exhaustive: never = next.action;
        throw new Error(`Unhandled sanitizer action: ${String(exhaustive)}`);
      }
    }

    pos++;
  }

  return sql;
}
