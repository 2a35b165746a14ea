/**
 * Check command - fail when generated regions are stale, without writing
 */

import { hasErrors, toRelativePath } from '@routewright/compiler';
import { CLIError, ErrorCodes } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { reportToJSON } from '../lib/format.js';
import { printDiagnostics, runGeneration } from './generate.js';

export interface CheckCommandOptions {
  path?: string;
  json?: boolean;
  quiet?: boolean;
  verbose?: boolean;
}

export async function checkCommand(options: CheckCommandOptions): Promise<number> {
  const report = await runGeneration(options.path);
  const stale = report.files.filter((file) => file.changed);
  const failed = stale.length > 0 || hasErrors(report.diagnostics);

  if (options.json) {
    console.log(JSON.stringify({ ok: !failed, ...reportToJSON(report, []) }, null, 2));
    return failed ? 1 : 0;
  }

  printDiagnostics(report, options.quiet ?? false);

  for (const file of stale) {
    logger.fail(`${toRelativePath(file.file, report.targetPath)} is out of date`);
  }
  if (stale.length > 0) {
    console.error(new CLIError(ErrorCodes.GEN_STALE_OUTPUT).toUserStringWithRemediation());
  }

  if (failed) return 1;
  logger.success(`${report.filesScanned} file(s) up to date`);
  return 0;
}
