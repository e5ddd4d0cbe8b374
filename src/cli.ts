import { Command, CommanderError } from 'commander';

import { buildConfig } from './config/execution.js';
import type { EnvLookup } from './config/execution.js';
import type { ExecutionConfig } from './config/types.js';
import { pkgInfo } from './pkg-info.js';

const { name: PROGRAM_NAME, version: PROGRAM_VERSION } = pkgInfo;

export class CliExitError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode: number) {
    super(message);
    this.name = 'CliExitError';
    this.exitCode = exitCode;
  }
}

function createCliProgram(output: string[]): Command {
  const cli = new Command();
  cli
    .name(PROGRAM_NAME)
    .usage('[options] <query> <filename>')
    .description('Print every line of a file that contains the query.')
    // Optional here so that a missing operand reaches buildConfig.
    .argument('[query]', 'Literal text to look for')
    .argument('[filename]', 'File to search')
    // Long forms only: any other dash-prefixed word is a literal operand.
    .option('--ignore-case', 'Match without regard to letter case')
    .helpOption('--help', 'Display command help')
    .version(PROGRAM_VERSION, '--version', 'Display version')
    .addHelpText(
      'after',
      `
Environment:
  CASE_INSENSITIVE  When set (to any value), search case-insensitively.

Examples:
  $ ${PROGRAM_NAME} body poem.txt
  $ CASE_INSENSITIVE=1 ${PROGRAM_NAME} to poem.txt
  $ ${PROGRAM_NAME} -1 scores.txt
  $ ${PROGRAM_NAME} -- --help notes.txt
`
    );

  cli.allowUnknownOption(true);
  cli.allowExcessArguments(true);
  cli.showHelpAfterError('(run with --help for usage)');
  cli.exitOverride();
  cli.configureOutput({
    writeOut(text: string): void {
      output.push(text);
    },
    writeErr(text: string): void {
      output.push(text);
    },
    outputError(text: string, write: (str: string) => void): void {
      write(text);
    },
  });

  return cli;
}

function formatCliOutput(output: readonly string[], fallback: string): string {
  const joined = output.join('').trimEnd();
  if (joined.length > 0) return joined;
  return fallback.trimEnd();
}

/**
 * Parses a node-style argv (`[node, script, ...operands]`). Unrecognized
 * dash-prefixed words stay in place as operands, so `-x` or `-1` can be the
 * query. `--help`, `--version`, `--ignore-case` and `--` are reserved; a query
 * equal to one of them goes after `--`.
 *
 * Help and version surface as `CliExitError`; a missing query or filename
 * surfaces as the `MinigrepError` thrown by `buildConfig`.
 */
export function parseArgs(
  argv: readonly string[] = process.argv,
  env: EnvLookup = process.env
): ExecutionConfig {
  const output: string[] = [];
  const cli = createCliProgram(output);
  try {
    cli.parse([...argv], { from: 'node' });
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      throw new CliExitError(
        formatCliOutput(output, error.message),
        error.exitCode
      );
    }
    throw error;
  }

  const options = cli.opts<{ ignoreCase?: boolean }>();
  return buildConfig([argv[1] ?? PROGRAM_NAME, ...cli.args], env, {
    ignoreCase: options.ignoreCase === true,
  });
}
