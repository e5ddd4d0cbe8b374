const LINE_BREAK = /\r?\n/;

/**
 * Splits text into lines on `\n`, dropping a `\r` that directly precedes it.
 * A trailing line ending does not start an extra empty line.
 */
export function splitLines(contents: string): string[] {
  if (contents.length === 0) return [];

  const lines = contents.split(LINE_BREAK);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}
