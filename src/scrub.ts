import { sanitize } from './sanitizer';
import { lex } from './tokenizer';
import { render } from './writer';

/**
 * De-identify a SQL statement: literal values become `?`, value lists
 * collapse to one `?`, repeated `INSERT` rows collapse to `...` and comments
 * are dropped. Keywords, identifiers and existing placeholders are kept as
 * written.
 *
 * Never throws; input the tokenizer does not understand passes through.
 *
 * @example
 * ```typescript
 * import { sanitizeText } from 'sqlscrub';
 *
 * sanitizeText("SELECT * FROM users WHERE email = 'a@example.com'");
 * // "SELECT * FROM users WHERE email = ?"
 * ```
 */
export function sanitizeText(input: string): string {
  return render(sanitize(lex(input)));
}
