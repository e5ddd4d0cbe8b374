export type LineMatcher = (line: string) => boolean;

export function createLineMatcher(
  query: string,
  caseSensitive: boolean
): LineMatcher {
  if (caseSensitive) {
    return (line: string): boolean => line.includes(query);
  }

  const needle = query.toLowerCase();
  return (line: string): boolean => line.toLowerCase().includes(needle);
}
