/**
 * routewright command line
 *
 * Compiles controller decorators into route registration code.
 */

import { Command } from 'commander';
import pc from 'picocolors';
import { GENERATOR_VERSION } from '@routewright/compiler';
import { generateCommand } from './commands/generate.js';
import type { GenerateCommandOptions } from './commands/generate.js';
import { checkCommand } from './commands/check.js';
import type { CheckCommandOptions } from './commands/check.js';
import { explainCommand } from './commands/explain.js';
import type { ExplainOptions } from './commands/explain.js';
import { initCommand } from './commands/init.js';
import type { InitOptions } from './commands/init.js';
import { ErrorCodes, wrapError } from './lib/errors.js';
import { logger } from './lib/logger.js';

interface OutputOptions {
  json?: boolean;
  quiet?: boolean;
  verbose?: boolean;
}

/**
 * Runs a command and records its exit code; errors become coded CLI errors
 */
export async function runCommand(command: () => number | Promise<number>, options: OutputOptions = {}): Promise<number> {
  let exitCode: number;
  try {
    exitCode = await command();
  } catch (error) {
    const cliError = wrapError(error, ErrorCodes.GEN_FAILED);
    if (options.json) {
      console.log(JSON.stringify({ error: cliError.toJSON() }, null, 2));
    } else if (options.verbose) {
      console.error(pc.red(cliError.toUserString(true)));
    } else {
      console.error(pc.red(cliError.toUserStringWithRemediation()));
    }
    exitCode = 1;
  }
  process.exitCode = exitCode;
  return exitCode;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('routewright')
    .description('Compile controller decorators into route registration code')
    .version(GENERATOR_VERSION);

  program
    .command('generate')
    .description('Rewrite the generated region of every controller file')
    .option('-p, --path <path>', 'Target path (default: current directory)')
    .option('--dry-run', 'Report what would change without writing')
    .option('--json', 'Output the report as JSON')
    .option('--quiet', 'Suppress output except errors')
    .option('-v, --verbose', 'Enable verbose output')
    .action(async (options: GenerateCommandOptions) => {
      logger.configure({ verbose: options.verbose, silent: options.quiet, json: options.json });
      await runCommand(() => generateCommand(options), options);
    });

  program
    .command('check')
    .description('Exit non-zero when generated code is out of date or decorators have errors')
    .option('-p, --path <path>', 'Target path (default: current directory)')
    .option('--json', 'Output the report as JSON')
    .option('--quiet', 'Suppress output except errors')
    .option('-v, --verbose', 'Enable verbose output')
    .action(async (options: CheckCommandOptions) => {
      logger.configure({ verbose: options.verbose, silent: options.quiet, json: options.json });
      await runCommand(() => checkCommand(options), options);
    });

  program
    .command('explain [code]')
    .description('Explain a diagnostic code and how to fix it')
    .option('--list', 'List every diagnostic code')
    .action(async (code: string | undefined, options: ExplainOptions) => {
      await runCommand(() => explainCommand(code, options));
    });

  program
    .command('init')
    .description('Write a default routewright.config.yaml')
    .option('-p, --path <path>', 'Target path (default: current directory)')
    .option('-f, --force', 'Overwrite an existing configuration file')
    .action(async (options: InitOptions) => {
      await runCommand(() => initCommand(options));
    });

  return program;
}
