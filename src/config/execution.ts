import { z } from 'zod';

import { ErrorCode, MinigrepError } from '../lib/errors.js';
import type { ExecutionConfig } from './types.js';

/** Any value, including the empty string, turns off case-sensitive matching. */
export const CASE_INSENSITIVE_ENV = 'CASE_INSENSITIVE';

export const MISSING_ARGUMENTS_MESSAGE = 'Some arguments appear to be missing';

export type EnvLookup = Readonly<Record<string, string | undefined>>;

export interface ConfigOverrides {
  ignoreCase?: boolean;
}

const ExecutionConfigSchema = z
  .object({
    query: z.string(),
    filename: z.string(),
    caseSensitive: z.boolean(),
  })
  .strict();

function isEnvPresent(env: EnvLookup, key: string): boolean {
  return env[key] !== undefined;
}

function resolveCaseSensitive(
  env: EnvLookup,
  overrides: ConfigOverrides
): boolean {
  if (overrides.ignoreCase === true) return false;
  return !isEnvPresent(env, CASE_INSENSITIVE_ENV);
}

/**
 * Builds the immutable execution config from a raw argument vector
 * (`[program, query, filename, ...rest]`). Elements after the filename are
 * ignored.
 *
 * The environment is only consulted here; nothing downstream reads it.
 */
export function buildConfig(
  args: readonly string[],
  env: EnvLookup = process.env,
  overrides: ConfigOverrides = {}
): ExecutionConfig {
  const [, query, filename] = args;
  if (query === undefined || filename === undefined) {
    throw new MinigrepError(
      ErrorCode.E_MISSING_ARGUMENTS,
      MISSING_ARGUMENTS_MESSAGE,
      undefined,
      { received: Math.max(args.length - 1, 0) }
    );
  }

  return Object.freeze(
    ExecutionConfigSchema.parse({
      query,
      filename,
      caseSensitive: resolveCaseSensitive(env, overrides),
    })
  );
}
