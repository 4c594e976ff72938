/**
 * Statement Splitter & Tokenizer
 *
 * Shallow, quote-aware scanning of schema text. This is not a lexer: it only
 * needs to find statement boundaries and the handful of keywords the
 * catalog extractor looks at.
 *
 * @module packages/core/schema/statements
 */

/**
 * Drop whole lines whose trimmed start is `--` or `//`.
 * Inline comments are left untouched.
 */
export function stripLineComments(sql: string): string {
  return sql
    .split(/\r?\n/)
    .filter((line) => {
      const trimmed = line.trimStart();
      return !(trimmed.startsWith('--') || trimmed.startsWith('//'));
    })
    .join('\n');
}

type QuoteKind = "'" | '"' | '`';

/**
 * Split schema text on `;` outside single, double and backtick quotes.
 *
 * A backslash escapes the next character, so an escaped quote never toggles
 * quote state. It has no effect on `;`, which still ends a statement outside
 * quotes. Empty statements are dropped and a trailing statement without `;`
 * is kept.
 */
export function splitStatements(sql: string): string[] {
  const out: string[] = [];
  let buffer = '';
  let quote: QuoteKind | null = null;
  let escapePending = false;

  for (const ch of sql) {
    if (ch === ';' && quote === null) {
      const statement = buffer.trim();
      if (statement.length > 0) {
        out.push(statement);
      }
      buffer = '';
      escapePending = false;
      continue;
    }

    if ((ch === "'" || ch === '"' || ch === '`') && !escapePending) {
      if (quote === null) {
        quote = ch;
      } else if (quote === ch) {
        quote = null;
      }
    }

    escapePending = ch === '\\' && !escapePending;
    buffer += ch;
  }

  const tail = buffer.trim();
  if (tail.length > 0) {
    out.push(tail);
  }

  return out;
}

/**
 * Split a statement on whitespace
 */
export function tokenize(statement: string): string[] {
  return statement.split(/\s+/).filter((token) => token.length > 0);
}
