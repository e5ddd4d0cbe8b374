import type { ExecutionConfig, SearchSummary } from '../config/types.js';
import { readTextFile } from './fs-helpers.js';
import { traceOp, traceOpAsync } from './observability.js';
import { searchLines, splitLines } from './search.js';

export type LineWriter = (line: string) => void;

export function writeStdoutLine(line: string): void {
  process.stdout.write(`${line}\n`);
}

/**
 * Loads `config.filename`, searches it and writes each matching line to
 * `output` in file order. Read failures reject with a `MinigrepError`.
 */
export async function run(
  config: ExecutionConfig,
  output: LineWriter = writeStdoutLine
): Promise<SearchSummary> {
  const contents = await traceOpAsync(
    { op: 'readFile', path: config.filename },
    () => readTextFile(config.filename),
    (text) => ({ length: text.length })
  );

  const lines = splitLines(contents);
  const matches = traceOp(
    { op: 'search', caseSensitive: config.caseSensitive },
    () => searchLines(config.query, lines, config.caseSensitive),
    (found) => ({ linesScanned: lines.length, matchCount: found.length })
  );

  for (const line of matches) {
    output(line);
  }

  return { linesScanned: lines.length, matchCount: matches.length };
}
