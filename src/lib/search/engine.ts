import { splitLines } from './lines.js';
import { createLineMatcher } from './match-strategy.js';

export function searchLines(
  query: string,
  lines: readonly string[],
  caseSensitive: boolean
): string[] {
  const matches = createLineMatcher(query, caseSensitive);
  const results: string[] = [];

  for (const line of lines) {
    if (matches(line)) {
      results.push(line);
    }
  }

  return results;
}

/**
 * Returns every line of `contents` containing `query` as a literal
 * substring, in file order. An empty query matches every line.
 */
export function search(
  query: string,
  contents: string,
  caseSensitive: boolean
): string[] {
  return searchLines(query, splitLines(contents), caseSensitive);
}

export function searchCaseSensitive(query: string, contents: string): string[] {
  return search(query, contents, true);
}

export function searchCaseInsensitive(
  query: string,
  contents: string
): string[] {
  return search(query, contents, false);
}
