/**
 * SQL reserved word lookup backed by data/reserved-words.json.
 */

import { readFileSync } from 'fs';

let reservedWords: ReadonlySet<string> | undefined;

function loadReservedWords(): ReadonlySet<string> {
  if (!reservedWords) {
    const file = new URL('../../data/reserved-words.json', import.meta.url);
    const parsed: unknown = JSON.parse(readFileSync(file, 'utf8'));
    const words = Array.isArray(parsed) ? parsed.filter((w): w is string => typeof w === 'string') : [];
    reservedWords = new Set(words.map((w) => w.toUpperCase()));
  }
  return reservedWords;
}

/**
 * Checks whether a name is a SQL reserved word (case-insensitive).
 */
export function isReservedWord(name: string): boolean {
  return loadReservedWords().has(name.toUpperCase());
}

/**
 * Returns the names that are reserved words, in input order.
 */
export function findReservedWords(names: readonly string[]): string[] {
  return names.filter(isReservedWord);
}
