/**
 * The generated region at the end of an annotated file.
 *
 * Regenerating strips the old region first, so the output depends only on
 * the hand-written part of the file.
 */

import { IndentationText, NewLineKind, Project, QuoteKind } from 'ts-morph';
import type { ControllerSpec } from '../types.js';
import { buildRegistrationFunction } from './registration.js';

export const REGION_START = '// #region routewright generated';
export const REGION_END = '// #endregion routewright generated';
const REGION_NOTICE = '// Written by `routewright generate` from the decorators above. Do not edit.';

export interface StrippedSource {
  text: string;
  hadRegion: boolean;
}

export function stripGeneratedRegion(text: string): StrippedSource {
  const start = text.indexOf(REGION_START);
  if (start === -1) return { text, hadRegion: false };

  const endMarker = text.indexOf(REGION_END, start);
  const end = endMarker === -1 ? text.length : endMarker + REGION_END.length;
  const before = text.slice(0, start).trimEnd();
  const after = text.slice(end).replace(/^[^\S\n]*\n?/, '');
  return { text: after.length > 0 ? `${before}\n\n${after}` : `${before}\n`, hadRegion: true };
}

export function appendRegion(text: string, region: string): string {
  return `${text.trimEnd()}\n\n${region}`;
}

let printerProject: Project | undefined;

function getPrinterProject(): Project {
  printerProject ??= new Project({
    useInMemoryFileSystem: true,
    manipulationSettings: {
      indentationText: IndentationText.TwoSpaces,
      quoteKind: QuoteKind.Single,
      newLineKind: NewLineKind.LineFeed,
    },
  });
  return printerProject;
}

export interface RegionOptions {
  runtimeModule: string;
  runtimeAlias: string;
}

/**
 * Prints the runtime import, then each controller's registration function
 * followed by its adapters
 */
export function renderRegion(specs: readonly ControllerSpec[], options: RegionOptions): string {
  const project = getPrinterProject();
  const file = project.createSourceFile('__routewright_region.ts', '', { overwrite: true });
  try {
    file.addImportDeclaration({ namespaceImport: options.runtimeAlias, moduleSpecifier: options.runtimeModule });
    for (const spec of specs) {
      file.addFunction(buildRegistrationFunction(spec, options.runtimeAlias));
      for (const endpoint of spec.endpoints) {
        if (endpoint.adapter) file.addFunction(endpoint.adapter);
      }
    }
    return `${REGION_START}\n${REGION_NOTICE}\n${file.getFullText().trim()}\n${REGION_END}\n`;
  } finally {
    project.removeSourceFile(file);
  }
}
