/**
 * Rewrites `?` parameter markers outside string literals and quoted identifiers.
 *
 * @param sql - Statement using `?` markers
 * @param marker - Produces the replacement for the n-th marker (1-based)
 * @param identifierQuote - Identifier quote of the dialect, if any
 */
export function rewritePlaceholders(
  sql: string,
  marker: (index: number) => string,
  identifierQuote: string | null
): string {
  let out = '';
  let index = 0;
  let i = 0;

  while (i < sql.length) {
    const ch = sql.charAt(i);
    if (ch === "'" || (identifierQuote !== null && ch === identifierQuote)) {
      const end = findClosingQuote(sql, i, ch);
      out += sql.slice(i, end);
      i = end;
    } else if (ch === '?') {
      index++;
      out += marker(index);
      i++;
    } else {
      out += ch;
      i++;
    }
  }
  return out;
}

/**
 * Index just past the quote closing the quoted section opened at `start`.
 * Backslash escapes are skipped.
 */
function findClosingQuote(sql: string, start: number, quote: string): number {
  let i = start + 1;
  while (i < sql.length) {
    const ch = sql.charAt(i);
    if (ch === '\\') {
      i += 2;
    } else if (ch === quote) {
      return i + 1;
    } else {
      i++;
    }
  }
  return sql.length;
}
