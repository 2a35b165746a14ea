/**
 * Generate command - rewrite the generated region of every controller file
 */

import { existsSync } from 'fs';
import pc from 'picocolors';
import {
  ConfigError,
  generate,
  hasErrors,
  resolveTargetPath,
  sortDiagnostics,
  writeExpansions,
} from '@routewright/compiler';
import type { GenerationReport } from '@routewright/compiler';
import { CLIError, ErrorCodes, wrapError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { countBySeverity, formatControllers, formatDiagnostic, reportToJSON } from '../lib/format.js';

export interface GenerateCommandOptions {
  path?: string;
  dryRun?: boolean;
  json?: boolean;
  quiet?: boolean;
  verbose?: boolean;
}

/**
 * Runs generation for a target path, turning failures into CLI errors
 */
export async function runGeneration(path?: string): Promise<GenerationReport> {
  const targetPath = resolveTargetPath(path);
  if (!existsSync(targetPath)) {
    throw new CLIError(ErrorCodes.IO_PATH_NOT_FOUND, `Path not found: ${targetPath}`);
  }

  try {
    return await generate({ targetPath });
  } catch (error) {
    if (error instanceof ConfigError) {
      throw new CLIError(ErrorCodes.CONFIG_INVALID, error.message, { cause: error });
    }
    throw wrapError(error, ErrorCodes.GEN_FAILED);
  }
}

/**
 * Prints diagnostics; warnings are hidden under --quiet
 */
export function printDiagnostics(report: GenerationReport, quiet: boolean): void {
  for (const diagnostic of sortDiagnostics(report.diagnostics)) {
    if (quiet && diagnostic.severity !== 'error') continue;
    const line = formatDiagnostic(diagnostic, report.targetPath);
    if (diagnostic.severity === 'error') {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}

export async function generateCommand(options: GenerateCommandOptions): Promise<number> {
  logger.debug('Loading configuration', { path: resolveTargetPath(options.path) });
  const report = await runGeneration(options.path);
  const failed = hasErrors(report.diagnostics);

  let written: string[] = [];
  if (!options.dryRun) {
    try {
      written = await writeExpansions(report.files);
    } catch (error) {
      throw wrapError(error, ErrorCodes.IO_WRITE_ERROR);
    }
  }

  if (options.json) {
    console.log(JSON.stringify(reportToJSON(report, written), null, 2));
    return failed ? 1 : 0;
  }

  printDiagnostics(report, options.quiet ?? false);

  if (!options.quiet) {
    for (const file of report.files) {
      for (const line of formatControllers(file, report.targetPath)) {
        console.log(`  ${line}`);
      }
    }
  }

  const changed = report.files.filter((file) => file.changed).length;
  const { errors, warnings } = countBySeverity(report.diagnostics);
  const verb = options.dryRun ? 'would change' : 'changed';
  const summary = `${report.filesScanned} file(s) scanned, ${changed} ${verb}, ${errors} error(s), ${warnings} warning(s)`;

  if (failed) {
    logger.fail(pc.red(summary));
    return 1;
  }
  logger.success(summary);
  return 0;
}
