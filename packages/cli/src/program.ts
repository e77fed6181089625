import { Command, CommanderError } from 'commander';
import { AppError, exitCodeFor } from '@diffwatch/shared';
import { createScanRuntime } from '@diffwatch/core';
import { registerHistoryCommand, registerScanCommand } from './commands';
import type { CliDeps, GlobalOptions } from './commands';

export const VERSION = '0.1.0';

const defaultDeps: CliDeps = {
  env: process.env,
  createRuntime: createScanRuntime,
};

export function createProgram(deps: CliDeps = defaultDeps): Command {
  const program = new Command();

  program
    .name('diffwatch')
    .description('Watch a repository for new commits and email a security-relevance analysis')
    .version(VERSION)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to a YAML configuration file')
    .option('--env-file <path>', 'Read settings from this dotenv file; real environment variables win', '.env')
    .option('--verbose', 'Enable verbose logging')
    .option('--log-file <path>', 'Append structured events to this JSONL file')
    .exitOverride();

  registerScanCommand(program, deps);
  registerHistoryCommand(program, deps);

  return program;
}

function reportError(e: unknown, opts: GlobalOptions): void {
  if (opts.json) {
    if (e instanceof AppError) {
      console.log(
        JSON.stringify({
          error: {
            code: e.code,
            message: e.message,
            details: e.details,
          },
        }),
      );
    } else {
      console.log(
        JSON.stringify({
          error: {
            code: 'UnknownError',
            message: e instanceof Error ? e.message : String(e),
          },
        }),
      );
    }
    return;
  }

  // Human-readable output
  console.error(`❌ Error: ${(e instanceof Error && e.message) || String(e)}`);
  if (e instanceof AppError && e.details) {
    console.error(
      `  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`,
    );
  }
  if (opts.verbose && e instanceof Error && e.stack) {
    console.error(`\nStack Trace:\n${e.stack}`);
  } else {
    console.error(`\nFor more details, run with the --verbose flag.`);
  }
}

/**
 * Parses `argv`, runs the selected command and resolves to the process exit code.
 */
export async function run(argv: string[], deps: CliDeps = defaultDeps): Promise<number> {
  const program = createProgram(deps);
  try {
    await program.parseAsync(argv);
    return 0;
  } catch (e) {
    if (e instanceof CommanderError) {
      // commander has already printed help, the version or the usage error
      return e.exitCode === 0 ? 0 : 2;
    }
    reportError(e, program.opts<GlobalOptions>());
    return exitCodeFor(e);
  }
}
