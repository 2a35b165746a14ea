/**
 * Terminal formatting for diagnostics and generation summaries
 */

import pc from 'picocolors';
import { toRelativePath } from '@routewright/compiler';
import type { Diagnostic, FileExpansion, GenerationReport } from '@routewright/compiler';

export type Colors = ReturnType<typeof pc.createColors>;

/**
 * `file:line:column code message`, with the suggested fix on the next line
 */
export function formatDiagnostic(diagnostic: Diagnostic, targetPath: string, colors: Colors = pc): string {
  const location = `${toRelativePath(diagnostic.file, targetPath)}:${diagnostic.line}:${diagnostic.column}`;
  const paint = diagnostic.severity === 'error' ? colors.red : colors.yellow;
  const lines = [`${colors.bold(location)} ${paint(diagnostic.code)} ${diagnostic.message}`];

  const suggestion = diagnostic.suggestion;
  if (suggestion) {
    const replacement = suggestion.replacement ? `: ${suggestion.replacement}` : '';
    lines.push(colors.dim(`  fix: ${suggestion.message}${replacement}`));
  }
  return lines.join('\n');
}

export function formatControllers(file: FileExpansion, targetPath: string, colors: Colors = pc): string[] {
  const relative = toRelativePath(file.file, targetPath);
  return file.controllers.map((controller) => {
    const builders = controller.routeBuilders.length;
    const counts = `${controller.routes.length} route(s)` + (builders > 0 ? `, ${builders} builder(s)` : '');
    return `${colors.cyan(controller.registrationName)} ${colors.dim(`${relative} (${counts})`)}`;
  });
}

export function countBySeverity(diagnostics: readonly Diagnostic[]): { errors: number; warnings: number } {
  const errors = diagnostics.filter((d) => d.severity === 'error').length;
  return { errors, warnings: diagnostics.length - errors };
}

/**
 * JSON form of a report: source text is left out, paths are relative
 */
export function reportToJSON(report: GenerationReport, written: readonly string[]): Record<string, unknown> {
  const relative = (file: string): string => toRelativePath(file, report.targetPath);
  return {
    version: report.version,
    generatedAt: report.generatedAt,
    filesScanned: report.filesScanned,
    changed: report.files.filter((file) => file.changed).map((file) => relative(file.file)),
    written: written.map(relative),
    controllers: report.files.flatMap((file) =>
      file.controllers.map((controller) => ({ file: relative(file.file), ...controller }))
    ),
    diagnostics: report.diagnostics.map((diagnostic) => ({ ...diagnostic, file: relative(diagnostic.file) })),
  };
}
