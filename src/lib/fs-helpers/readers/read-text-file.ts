import * as fs from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';

import {
  classifyError,
  formatUnknownErrorMessage,
  MinigrepError,
} from '../../errors.js';

const INVALID_UTF8_REASON = 'stream did not contain valid UTF-8';

// ignoreBOM keeps a leading U+FEFF so lines come back as they are on disk.
function decodeUtf8(buffer: Buffer, filePath: string): string {
  try {
    return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(
      buffer
    );
  } catch (error: unknown) {
    throw MinigrepError.fromError(
      classifyError(error),
      formatReadFailure(filePath, INVALID_UTF8_REASON),
      error,
      filePath,
      { size: buffer.length }
    );
  }
}

function formatReadFailure(filePath: string, reason: string): string {
  return `Something went wrong reading the file ${filePath}: ${reason}`;
}

function toReadError(error: unknown, filePath: string): MinigrepError {
  if (error instanceof MinigrepError) return error;
  return MinigrepError.fromError(
    classifyError(error),
    formatReadFailure(filePath, formatUnknownErrorMessage(error)),
    error,
    filePath
  );
}

/** Reads a whole file as strict UTF-8. The handle is closed on every path. */
export async function readTextFile(filePath: string): Promise<string> {
  let handle: FileHandle | undefined;
  try {
    handle = await fs.open(filePath, 'r');
    const buffer = await handle.readFile();
    return decodeUtf8(buffer, filePath);
  } catch (error: unknown) {
    throw toReadError(error, filePath);
  } finally {
    await handle?.close();
  }
}
