import { classifyWord, NUMERIC_LITERAL_TYPE_INDICATORS, SYMBOL_OPERATORS } from './keywords';
import { bufferSlice, TokenizedSql, type BufferSlice } from './slice';
import type { ArithmeticOperator, QuotedTokenType, Token } from './tokens';

// \p{Alphabetic} and \p{N} follow the Unicode properties, so letters and
// digits from any script start words and numbers.
const ALPHABETIC_RE = /\p{Alphabetic}/u;
const NUMERIC_RE = /\p{N}/u;

// Characters that start a comparison, bitwise or JSON operator, and the ones
// that may continue it.
const OPERATOR_START_CHARS = '=!><&|#';
const OPERATOR_CONT_CHARS = '=!><';

function isAlphabetic(ch: string): boolean {
  return ALPHABETIC_RE.test(ch);
}

function isNumeric(ch: string | undefined): boolean {
  return ch !== undefined && NUMERIC_RE.test(ch);
}

function isWordContinuation(ch: string): boolean {
  return ch === '_' || ch === '-' || isAlphabetic(ch) || isNumeric(ch);
}

function isNumberContinuation(ch: string): boolean {
  return ch === '.' || ch === 'x' || ch === 'X' || ch === 'b' || ch === 'B' || isNumeric(ch);
}

function isLineEnd(ch: string): boolean {
  return ch === '\n' || ch === '\r';
}

/** UTF-8 length of one code point (lone surrogates encode as U+FFFD). */
function utf8Length(ch: string): number {
  const cp = ch.codePointAt(0) ?? 0;
  if (cp <= 0x7f) return 1;
  if (cp <= 0x7ff) return 2;
  if (cp <= 0xffff) return 3;
  return 4;
}

const QUOTE_TYPES: Readonly<Record<string, QuotedTokenType>> = {
  '`': 'backticked',
  '"': 'double_quoted',
  "'": 'single_quoted',
};

const SINGLE_CHAR_TOKENS: Readonly<Record<string, Token>> = {
  ' ': { type: 'space' },
  '\n': { type: 'newline', char: '\n' },
  '\r': { type: 'newline', char: '\r' },
  '.': { type: 'dot' },
  ',': { type: 'comma' },
  '(': { type: 'paren_open' },
  ')': { type: 'paren_close' },
  '[': { type: 'bracket_open' },
  ']': { type: 'bracket_close' },
  ':': { type: 'colon' },
  ';': { type: 'semicolon' },
  '?': { type: 'placeholder' },
};

const ARITHMETIC_CHARS: Readonly<Record<string, ArithmeticOperator>> = {
  '/': '/',
  '%': '%',
  '+': '+',
  '-': '-',
};

/**
 * Split SQL text into tokens.
 *
 * Never throws: unterminated quotes and comments run to the end of the input,
 * and characters the tokenizer does not recognize become `unknown` tokens.
 * Content tokens reference UTF-8 byte ranges of the input instead of copying
 * it.
 *
 * @example
 * ```typescript
 * const sql = lex("SELECT * FROM users WHERE id = 1");
 * sql.tokens.map(t => t.type);
 * // ['keyword', 'space', 'wildcard', 'space', 'keyword', ...]
 * ```
 */
export function lex(input: string): TokenizedSql {
  // Work on code points so multi-byte characters are never split; `offsets`
  // maps a code point index to its UTF-8 byte offset.
  const chars = Array.from(input);
  const len = chars.length;
  const offsets = new Array<number>(len + 1);
  let byteOffset = 0;
  for (let i = 0; i < len; i++) {
    offsets[i] = byteOffset;
    byteOffset += utf8Length(chars[i]);
  }
  offsets[len] = byteOffset;

  const tokens: Token[] = [];
  let pos = 0;
  // Set by SELECT, cleared by FROM: decides whether `*` is a wildcard.
  let pastSelect = false;

  function sliceOf(start: number, end: number): BufferSlice {
    return bufferSlice(offsets[start], offsets[end]);
  }

  function charAt(p: number): string | undefined {
    return p < len ? chars[p] : undefined;
  }

  /** First index after `start` whose character fails `accept`. */
  function scanWhile(start: number, accept: (ch: string) => boolean): number {
    let p = start + 1;
    while (p < len && accept(chars[p])) p++;
    return p;
  }

  // An even run of backslashes before the delimiter leaves it unescaped.
  function scanQuoted(start: number, delimiter: string): { end: number; terminated: boolean } {
    let escapes = 0;
    let p = start + 1;
    while (p < len) {
      const ch = chars[p];
      if (ch === delimiter && escapes % 2 === 0) return { end: p, terminated: true };
      escapes = ch === '\\' ? escapes + 1 : 0;
      p++;
    }
    return { end: len, terminated: false };
  }

  function scanBlockComment(start: number): number {
    let p = start + 2;
    while (p < len) {
      // The `*` of the opener cannot double as the `*` of the closer.
      if (p - 1 >= start + 2 && chars[p - 1] === '*' && chars[p] === '/') return p + 1;
      p++;
    }
    return len;
  }

  function lexWord(start: number): void {
    const end = scanWhile(start, isWordContinuation);
    const slice = sliceOf(start, end);
    const word = classifyWord(chars.slice(start, end).join(''));
    switch (word.type) {
      case 'keyword':
        if (word.keyword === 'SELECT') pastSelect = true;
        else if (word.keyword === 'FROM') pastSelect = false;
        tokens.push({ type: 'keyword', keyword: word.keyword, slice });
        break;
      case 'operator':
        tokens.push({ type: 'operator', operator: word.operator, slice });
        break;
      case 'literal_type_indicator':
        tokens.push({ type: 'literal_type_indicator', indicator: word.indicator, slice });
        break;
      case 'null':
        tokens.push({ type: 'null', slice });
        break;
      case 'true':
        tokens.push({ type: 'true', slice });
        break;
      case 'false':
        tokens.push({ type: 'false', slice });
        break;
    }
    pos = end;
  }

  function lexNumber(start: number): void {
    const end = scanWhile(start, isNumberContinuation);
    const slice = sliceOf(start, end);
    const indicator = NUMERIC_LITERAL_TYPE_INDICATORS.get(chars.slice(start, end).join('').toUpperCase());
    if (indicator) {
      tokens.push({ type: 'literal_type_indicator', indicator, slice });
    } else {
      tokens.push({ type: 'numeric', slice });
    }
    pos = end;
  }

  // Maximal run of operator characters resolved against the operator table.
  // A run the table does not know becomes one `unknown` token per character.
  function lexSymbolOperator(start: number): void {
    const end = scanWhile(start, ch => OPERATOR_CONT_CHARS.includes(ch));
    const operator = SYMBOL_OPERATORS.get(chars.slice(start, end).join(''));
    if (operator) {
      tokens.push({ type: 'operator', operator, slice: sliceOf(start, end) });
    } else {
      for (let p = start; p < end; p++) {
        tokens.push({ type: 'unknown', char: chars[p] });
      }
    }
    pos = end;
  }

  while (pos < len) {
    const ch = chars[pos];
    const next = charAt(pos + 1);

    const quoteType = QUOTE_TYPES[ch];
    if (quoteType !== undefined) {
      const { end, terminated } = scanQuoted(pos, ch);
      tokens.push({ type: quoteType, slice: sliceOf(pos + 1, end), terminated });
      pos = terminated ? end + 1 : end;
      continue;
    }

    // `#` is a comment unless it starts the JSON path operators `#>` / `#>>`.
    if ((ch === '#' && next !== '>') || (ch === '-' && next === '-')) {
      const end = scanWhile(pos, c => !isLineEnd(c));
      tokens.push({ type: 'comment', slice: sliceOf(pos, end) });
      pos = end;
      continue;
    }

    if (ch === '/' && next === '*') {
      const end = scanBlockComment(pos);
      tokens.push({ type: 'comment', slice: sliceOf(pos, end) });
      pos = end;
      continue;
    }

    const single = SINGLE_CHAR_TOKENS[ch];
    if (single !== undefined) {
      tokens.push(single);
      pos++;
      continue;
    }

    if (ch === '$' && isNumeric(next)) {
      const end = scanWhile(pos, isNumeric);
      tokens.push({ type: 'numbered_placeholder', slice: sliceOf(pos, end) });
      pos = end;
      continue;
    }

    if (ch === '*') {
      if (pastSelect) {
        tokens.push({ type: 'wildcard' });
      } else {
        tokens.push({ type: 'operator', operator: { kind: 'arithmetic', op: '*' }, slice: sliceOf(pos, pos + 1) });
      }
      pos++;
      continue;
    }

    // A `-` directly before a digit belongs to a negative number.
    const arithmetic = ARITHMETIC_CHARS[ch];
    if (arithmetic !== undefined && !(ch === '-' && isNumeric(next))) {
      tokens.push({ type: 'operator', operator: { kind: 'arithmetic', op: arithmetic }, slice: sliceOf(pos, pos + 1) });
      pos++;
      continue;
    }

    if (OPERATOR_START_CHARS.includes(ch)) {
      lexSymbolOperator(pos);
      continue;
    }

    if (ch === '_') {
      const end = scanWhile(pos, c => isAlphabetic(c) || isNumeric(c));
      tokens.push({ type: 'literal_type_indicator', indicator: 'CHARSET', slice: sliceOf(pos, end) });
      pos = end;
      continue;
    }

    if (isAlphabetic(ch)) {
      lexWord(pos);
      continue;
    }

    if (ch === '-' || isNumeric(ch)) {
      lexNumber(pos);
      continue;
    }

    tokens.push({ type: 'unknown', char: ch });
    pos++;
  }

  return new TokenizedSql(input, tokens);
}
