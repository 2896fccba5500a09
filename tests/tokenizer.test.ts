import { describe, expect, it } from 'vitest';
import { lex } from '../src/tokenizer';
import type { Token } from '../src/tokens';

// `type:text` for every token, reading content tokens from the buffer.
function summarize(sql: string): string[] {
  const tokenized = lex(sql);
  return tokenized.tokens.map(t => ('slice' in t ? `${t.type}:${tokenized.content(t.slice)}` : t.type));
}

function nonSpace(sql: string): Token[] {
  return lex(sql).tokens.filter(t => t.type !== 'space');
}

describe('tokenizer basics', () => {
  it('handles empty input', () => {
    expect(lex('').tokens).toEqual([]);
  });

  it('keeps the source text and its UTF-8 bytes', () => {
    const sql = lex('SELECT 1');
    expect(sql.source).toBe('SELECT 1');
    expect(sql.buffer.length).toBe(8);
  });

  it('emits byte slices for a backticked query', () => {
    const sql = "SELECT `table`.* FROM `table` WHERE `id` = 'secret' and `other` = 'something';";
    expect(lex(sql).tokens).toEqual([
      { type: 'keyword', keyword: 'SELECT', slice: { start: 0, end: 6 } },
      { type: 'space' },
      { type: 'backticked', slice: { start: 8, end: 13 }, terminated: true },
      { type: 'dot' },
      { type: 'wildcard' },
      { type: 'space' },
      { type: 'keyword', keyword: 'FROM', slice: { start: 17, end: 21 } },
      { type: 'space' },
      { type: 'backticked', slice: { start: 23, end: 28 }, terminated: true },
      { type: 'space' },
      { type: 'keyword', keyword: 'WHERE', slice: { start: 30, end: 35 } },
      { type: 'space' },
      { type: 'backticked', slice: { start: 37, end: 39 }, terminated: true },
      { type: 'space' },
      { type: 'operator', operator: { kind: 'comparison', op: '=' }, slice: { start: 41, end: 42 } },
      { type: 'space' },
      { type: 'single_quoted', slice: { start: 44, end: 50 }, terminated: true },
      { type: 'space' },
      { type: 'keyword', keyword: 'AND', slice: { start: 52, end: 55 } },
      { type: 'space' },
      { type: 'backticked', slice: { start: 57, end: 62 }, terminated: true },
      { type: 'space' },
      { type: 'operator', operator: { kind: 'comparison', op: '=' }, slice: { start: 64, end: 65 } },
      { type: 'space' },
      { type: 'single_quoted', slice: { start: 67, end: 76 }, terminated: true },
      { type: 'semicolon' },
    ]);
  });

  it('tokenizes without any whitespace between tokens', () => {
    expect(summarize('SELECT"table".*FROM"table"WHERE"id"=18AND"number"=18.0;')).toEqual([
      'keyword:SELECT',
      'double_quoted:table',
      'dot',
      'wildcard',
      'keyword:FROM',
      'double_quoted:table',
      'keyword:WHERE',
      'double_quoted:id',
      'operator:=',
      'numeric:18',
      'keyword:AND',
      'double_quoted:number',
      'operator:=',
      'numeric:18.0',
      'semicolon',
    ]);
  });

  it('tokenizes punctuation and placeholders', () => {
    expect(summarize('.,()[]:;?')).toEqual([
      'dot', 'comma', 'paren_open', 'paren_close', 'bracket_open', 'bracket_close', 'colon', 'semicolon', 'placeholder',
    ]);
  });

  it('records which line-break character was used', () => {
    expect(lex('a\r\nb').tokens.filter(t => t.type === 'newline')).toEqual([
      { type: 'newline', char: '\r' },
      { type: 'newline', char: '\n' },
    ]);
  });
});

describe('tokenizer operators', () => {
  it('treats * as a wildcard after SELECT and as multiplication after FROM', () => {
    const tokens = nonSpace('SELECT a * b FROM t WHERE c * 2');
    expect(tokens[2]).toEqual({ type: 'wildcard' });
    expect(tokens[8]).toEqual({ type: 'operator', operator: { kind: 'arithmetic', op: '*' }, slice: { start: 28, end: 29 } });
  });

  it('tokenizes arithmetic operators', () => {
    const ops = nonSpace('* / % + -').map(t => (t.type === 'operator' ? t.operator : t.type));
    expect(ops).toEqual([
      { kind: 'arithmetic', op: '*' },
      { kind: 'arithmetic', op: '/' },
      { kind: 'arithmetic', op: '%' },
      { kind: 'arithmetic', op: '+' },
      { kind: 'arithmetic', op: '-' },
    ]);
  });

  it('tokenizes logical operators in any case and keeps their spelling', () => {
    const sql = 'In Not Like Ilike Rlike Glob Match Regexp tHen ElsE';
    const tokens = nonSpace(sql);
    expect(tokens.map(t => (t.type === 'operator' ? t.operator.op : t.type))).toEqual([
      'IN', 'NOT', 'LIKE', 'ILIKE', 'RLIKE', 'GLOB', 'MATCH', 'REGEXP', 'THEN', 'ELSE',
    ]);
    expect(summarize(sql).filter(s => s !== 'space')[8]).toBe('operator:tHen');
  });

  it('tokenizes comparison operators', () => {
    const tokens = nonSpace('= == <=> >= <= => =< <> != > <;');
    expect(tokens.map(t => (t.type === 'operator' ? `${t.operator.kind}:${t.operator.op}` : t.type))).toEqual([
      'comparison:=',
      'comparison:==',
      'comparison:<=>',
      'comparison:>=',
      'comparison:<=',
      'comparison:=>',
      'comparison:=<',
      'comparison:<>',
      'comparison:!=',
      'comparison:>',
      'comparison:<',
      'semicolon',
    ]);
  });

  it('tokenizes comparison operators at the end of input', () => {
    expect(summarize('a <')).toEqual(['keyword:a', 'space', 'operator:<']);
  });

  it('tokenizes bitwise and JSON path operators', () => {
    const tokens = nonSpace('<< >> & | #> #>>');
    expect(tokens.map(t => (t.type === 'operator' ? `${t.operator.kind}:${t.operator.op}` : t.type))).toEqual([
      'bitwise:<<',
      'bitwise:>>',
      'bitwise:&',
      'bitwise:|',
      'json:#>',
      'json:#>>',
    ]);
  });

  it('does not let & and | continue an operator', () => {
    expect(summarize('x&&y')).toEqual(['keyword:x', 'operator:&', 'operator:&', 'keyword:y']);
  });

  it('emits unknown tokens for an operator run it does not know', () => {
    expect(summarize('a !! b')).toEqual(['keyword:a', 'space', 'unknown', 'unknown', 'space', 'keyword:b']);
    expect(lex('=!').tokens).toEqual([
      { type: 'unknown', char: '=' },
      { type: 'unknown', char: '!' },
    ]);
  });
});

describe('tokenizer numbers', () => {
  it('tokenizes integers, decimals and negative numbers', () => {
    expect(summarize('1 1.0 -1 -1.0')).toEqual([
      'numeric:1', 'space', 'numeric:1.0', 'space', 'numeric:-1', 'space', 'numeric:-1.0',
    ]);
  });

  it('folds a minus into the number only when a digit follows it', () => {
    expect(summarize('a - 1')).toEqual(['keyword:a', 'space', 'operator:-', 'space', 'numeric:1']);
    expect(summarize('a -1')).toEqual(['keyword:a', 'space', 'numeric:-1']);
  });

  it('keeps a dash between letters and digits inside one word', () => {
    expect(summarize('a-1')).toEqual(['keyword:a-1']);
  });

  it('treats 0x and 0b on their own as literal type indicators', () => {
    const tokens = nonSpace("0x'1F' 0B'01' 0x1");
    expect(tokens.map(t => (t.type === 'literal_type_indicator' ? t.indicator : t.type))).toEqual([
      '0X', 'single_quoted', '0B', 'single_quoted', 'numeric',
    ]);
  });
});

describe('tokenizer keywords', () => {
  it('recognizes the fixed keywords in any case', () => {
    const tokens = nonSpace('Select From Where And Or Update Set Insert Into Values Inner Join On Limit Offset Between Array;');
    expect(tokens.map(t => (t.type === 'keyword' ? t.keyword : t.type))).toEqual([
      'SELECT', 'FROM', 'WHERE', 'AND', 'OR', 'UPDATE', 'SET', 'INSERT', 'INTO', 'VALUES',
      'INNER', 'JOIN', 'ON', 'LIMIT', 'OFFSET', 'BETWEEN', 'ARRAY', 'semicolon',
    ]);
  });

  it('classifies unknown words as OTHER keywords', () => {
    expect(lex('OBSCURE').tokens).toEqual([{ type: 'keyword', keyword: 'OTHER', slice: { start: 0, end: 7 } }]);
    expect(summarize('user_id created-at')).toEqual(['keyword:user_id', 'space', 'keyword:created-at']);
  });

  it('does not fold non-ASCII letters into keywords', () => {
    // U+017F LATIN SMALL LETTER LONG S upper-cases to "S".
    const tokens = lex('ſelect').tokens;
    expect(tokens).toHaveLength(1);
    expect(tokens[0]).toMatchObject({ type: 'keyword', keyword: 'OTHER' });
  });

  it('recognizes literal type indicators', () => {
    const tokens = nonSpace('binary Date TIME timestamp x 0x B 0b n _utf8');
    expect(tokens.map(t => (t.type === 'literal_type_indicator' ? t.indicator : t.type))).toEqual([
      'BINARY', 'DATE', 'TIME', 'TIMESTAMP', 'X', '0X', 'B', '0B', 'N', 'CHARSET',
    ]);
    expect(summarize('_utf8mb4')).toEqual(['literal_type_indicator:_utf8mb4']);
  });

  it('recognizes NULL, TRUE and FALSE in any case', () => {
    expect(summarize('NULL null True false')).toEqual([
      'null:NULL', 'space', 'null:null', 'space', 'true:True', 'space', 'false:false',
    ]);
  });
});

describe('tokenizer quoting', () => {
  it('honours backslash escapes in single quotes', () => {
    expect(summarize("'val\\'ue' FROM 'sec\nret\\\\';")).toEqual([
      "single_quoted:val\\'ue",
      'space',
      'keyword:FROM',
      'space',
      'single_quoted:sec\nret\\\\',
      'semicolon',
    ]);
  });

  it('honours backslash escapes in double quotes and backticks', () => {
    expect(summarize('"val\\"ue" `tab\\`le`')).toEqual([
      'double_quoted:val\\"ue',
      'space',
      'backticked:tab\\`le',
    ]);
  });

  it('runs an unterminated quote to the end of input', () => {
    expect(lex('"val\\"ue').tokens).toEqual([
      { type: 'double_quoted', slice: { start: 1, end: 8 }, terminated: false },
    ]);
    expect(lex("'").tokens).toEqual([{ type: 'single_quoted', slice: { start: 1, end: 1 }, terminated: false }]);
  });

  it('tokenizes an empty string literal', () => {
    expect(lex("''").tokens).toEqual([{ type: 'single_quoted', slice: { start: 1, end: 1 }, terminated: true }]);
  });

  it('measures slices in UTF-8 bytes', () => {
    const sql = lex('"hæld" ; \'jæld\' ; `tæld`');
    expect(sql.tokens.filter(t => t.type !== 'space' && t.type !== 'semicolon')).toEqual([
      { type: 'double_quoted', slice: { start: 1, end: 6 }, terminated: true },
      { type: 'single_quoted', slice: { start: 11, end: 16 }, terminated: true },
      { type: 'backticked', slice: { start: 21, end: 26 }, terminated: true },
    ]);

    const first = sql.tokens[0];
    if (first.type !== 'double_quoted') throw new Error('expected a double-quoted token');
    const text = sql.content(first.slice);
    expect(text).toBe('hæld');
    expect(first.slice.end - first.slice.start).toBe(text.length + 1);
  });

  it('keeps astral characters whole', () => {
    expect(lex("'😀'").tokens).toEqual([{ type: 'single_quoted', slice: { start: 1, end: 5 }, terminated: true }]);
    expect(summarize('naïve_😀')).toEqual(['keyword:naïve_', 'unknown']);
  });
});

describe('tokenizer placeholders and unknown characters', () => {
  it('tokenizes ? and numbered placeholders', () => {
    expect(summarize('? $1 $2 $23;')).toEqual([
      'placeholder', 'space',
      'numbered_placeholder:$1', 'space',
      'numbered_placeholder:$2', 'space',
      'numbered_placeholder:$23',
      'semicolon',
    ]);
  });

  it('treats a dollar sign without digits as unknown', () => {
    expect(lex('$a').tokens[0]).toEqual({ type: 'unknown', char: '$' });
  });

  it('emits unknown tokens for unrecognized characters', () => {
    expect(lex('~ ^\t').tokens).toEqual([
      { type: 'unknown', char: '~' },
      { type: 'space' },
      { type: 'unknown', char: '^' },
      { type: 'unknown', char: '\t' },
    ]);
  });
});

describe('tokenizer comments', () => {
  it('tokenizes pound comments up to the line break', () => {
    expect(summarize('SELECT * FROM table # This is a comment\n SELECT')).toEqual([
      'keyword:SELECT', 'space', 'wildcard', 'space', 'keyword:FROM', 'space', 'keyword:table', 'space',
      'comment:# This is a comment', 'newline', 'space', 'keyword:SELECT',
    ]);
  });

  it('tokenizes a lone # at the end of input as a comment', () => {
    expect(summarize('a #')).toEqual(['keyword:a', 'space', 'comment:#']);
  });

  it('tokenizes double dash comments', () => {
    expect(summarize('SELECT 1 -- trailing\r\nSELECT 2')).toEqual([
      'keyword:SELECT', 'space', 'numeric:1', 'space', 'comment:-- trailing', 'newline', 'newline',
      'keyword:SELECT', 'space', 'numeric:2',
    ]);
  });

  it('tokenizes multi-line comments', () => {
    expect(summarize('SELECT /* a\n b */ 1')).toEqual([
      'keyword:SELECT', 'space', 'comment:/* a\n b */', 'space', 'numeric:1',
    ]);
    expect(summarize('/**/x')).toEqual(['comment:/**/', 'keyword:x']);
  });

  it('runs an unterminated multi-line comment to the end of input', () => {
    expect(summarize('SELECT /* open')).toEqual(['keyword:SELECT', 'space', 'comment:/* open']);
    expect(summarize('/*/ x')).toEqual(['comment:/*/ x']);
  });
});
