/**
 * Explain command - describe a diagnostic code and how to fix it
 */

import pc from 'picocolors';
import { DIAGNOSTIC_CATALOG, isDiagnosticCode } from '@routewright/compiler';
import type { DiagnosticCode } from '@routewright/compiler';
import { CLIError, ErrorCodes } from '../lib/errors.js';

export interface ExplainOptions {
  list?: boolean;
}

function severityColor(code: DiagnosticCode): (text: string) => string {
  return DIAGNOSTIC_CATALOG[code].severity === 'error' ? pc.red : pc.yellow;
}

function listCodes(): void {
  console.log(pc.bold('\nDiagnostic codes:\n'));
  for (const code of Object.keys(DIAGNOSTIC_CATALOG).filter(isDiagnosticCode)) {
    const definition = DIAGNOSTIC_CATALOG[code];
    console.log(`  ${severityColor(code)(`[${definition.severity}]`)} ${code}`);
    console.log(pc.dim(`       ${definition.title}`));
  }
  console.log('');
}

export function explainCommand(code: string | undefined, options: ExplainOptions = {}): number {
  if (options.list || !code) {
    listCodes();
    return 0;
  }

  const normalized = code.trim().toUpperCase();
  if (!isDiagnosticCode(normalized)) {
    throw new CLIError(ErrorCodes.CLI_UNKNOWN_DIAGNOSTIC, `Unknown diagnostic code: ${code}`);
  }

  const definition = DIAGNOSTIC_CATALOG[normalized];
  console.log('');
  console.log(severityColor(normalized)(pc.bold(`[${definition.severity}] ${normalized}`)));
  console.log(pc.bold(definition.title));
  console.log('');

  console.log(pc.bold('Description:'));
  console.log(wrapText(definition.description, 80, 2));
  console.log('');

  console.log(pc.bold('How to fix:'));
  console.log(wrapText(definition.remediation, 80, 2));
  console.log('');
  return 0;
}

export function wrapText(text: string, maxWidth: number, indent: number): string {
  const words = text.split(' ');
  const lines: string[] = [];
  let currentLine = '';
  const prefix = ' '.repeat(indent);

  for (const word of words) {
    if (currentLine && currentLine.length + word.length + 1 > maxWidth - indent) {
      lines.push(prefix + currentLine);
      currentLine = word;
    } else {
      currentLine += (currentLine ? ' ' : '') + word;
    }
  }

  if (currentLine) {
    lines.push(prefix + currentLine);
  }

  return lines.join('\n');
}
