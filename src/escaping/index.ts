/**
 * Identifier and Literal Escaping
 *
 * Validates and quotes identifiers, escapes literal values for embedding in
 * SQL, and checks names against the reserved word list.
 * @module sql-table-insert/escaping
 */

import { QuotingUnsupportedError } from '../errors/index.js';

export { findReservedWords, isReservedWord } from './reserved-words.js';

/** Identifiers matching this pattern are embedded as they are */
export const PLAIN_IDENTIFIER_PATTERN = /^[A-Za-z][A-Za-z0-9_]*$/;

/**
 * Checks whether an identifier can be embedded without quoting.
 */
export function needsQuoting(identifier: string): boolean {
  return !PLAIN_IDENTIFIER_PATTERN.test(identifier);
}

/**
 * Escapes backslashes, then every quote character, then wraps the value in
 * the quote character.
 *
 * @example
 * ```typescript
 * quoteValue('my "col"', '"'); // "my \"col\""
 * ```
 */
export function quoteValue(value: string, quote: string): string {
  const escaped = value.replace(/\\/g, '\\\\').split(quote).join(`\\${quote}`);
  return `${quote}${escaped}${quote}`;
}

/**
 * Reverses {@link quoteValue}.
 */
export function unescapeQuoted(quoted: string, quote: string): string {
  let inner = quoted;
  if (quoted.length >= 2 * quote.length && quoted.startsWith(quote) && quoted.endsWith(quote)) {
    inner = quoted.slice(quote.length, quoted.length - quote.length);
  }

  let result = '';
  for (let i = 0; i < inner.length; i++) {
    const ch = inner.charAt(i);
    if (ch === '\\' && i + 1 < inner.length) {
      i++;
      result += inner.charAt(i);
    } else {
      result += ch;
    }
  }
  return result;
}

/**
 * Escapes a text value as a single-quoted SQL literal.
 */
export function escapeLiteral(value: string): string {
  return quoteValue(value, "'");
}

/**
 * Makes identifiers safe to embed. Plain identifiers pass through unchanged,
 * all others are quoted.
 *
 * @param identifiers - Identifiers to escape
 * @param quote - Identifier quote of the connection, or `null` when the
 *   connection supports no quoting
 * @throws {QuotingUnsupportedError} If quoting is needed but unsupported
 */
export function escapeIdentifiers(identifiers: readonly string[], quote: string | null): string[] {
  const needing = identifiers.filter(needsQuoting);
  if (needing.length > 0 && quote === null) {
    throw new QuotingUnsupportedError(needing);
  }
  return identifiers.map((identifier) =>
    quote !== null && needsQuoting(identifier) ? quoteValue(identifier, quote) : identifier
  );
}

/**
 * Escapes a single identifier.
 */
export function escapeIdentifier(identifier: string, quote: string | null): string {
  const [escaped] = escapeIdentifiers([identifier], quote);
  return escaped ?? identifier;
}

/**
 * Converts a camelCase name to snake_case.
 *
 * @example
 * ```typescript
 * camelCaseToSnakeCase('personId'); // 'person_id'
 * ```
 */
export function camelCaseToSnakeCase(name: string): string {
  return name.replace(/([A-Z])/g, '_$1').toLowerCase();
}
