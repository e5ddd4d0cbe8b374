#!/usr/bin/env node
import { CliExitError, parseArgs } from './cli.js';
import type { ExecutionConfig } from './config/types.js';
import { formatUnknownErrorMessage } from './lib/errors.js';
import { run } from './lib/runner.js';

function resolveConfig(): ExecutionConfig {
  try {
    return parseArgs();
  } catch (error: unknown) {
    if (error instanceof CliExitError && error.exitCode === 0) {
      console.log(error.message);
      process.exit(0);
    }
    console.error(
      `Problem parsing arguments: ${formatUnknownErrorMessage(error)}`
    );
    process.exit(1);
  }
}

function reportApplicationError(error: unknown): never {
  console.error(`Application error: ${formatUnknownErrorMessage(error)}`);
  process.exit(1);
}

async function main(): Promise<void> {
  // Write failures (EPIPE once a reader like `head` exits) arrive as events.
  process.stdout.on('error', reportApplicationError);

  const config = resolveConfig();

  console.log(`Searching for ${config.query}`);
  console.log(`In file ${config.filename}`);

  await run(config);
}

main().catch(reportApplicationError);
