import { Project, type ClassDeclaration, type SourceFile } from 'ts-morph';
import { DEFAULT_CONFIG } from '../src/config.js';
import type { ExpansionContext } from '../src/context.js';
import { MarkerResolver } from '../src/markers.js';
import { UniqueNameScope } from '../src/naming.js';
import type { GeneratorConfig } from '../src/types.js';

const project = new Project({ useInMemoryFileSystem: true, compilerOptions: { strict: true } });

export const RUNTIME_IMPORT =
  "import { AuthContent, Controller, CustomEndPoint, CustomRouteBuilder, EndPoint, Get, PathParam, Post, QueryContent, QueryParam, Req, ReqContent, ReqURL, RequestBody, RequestKeyPath, type Request, type RoutesBuilder } from '@routewright/runtime';";

export function source(...lines: string[]): string {
  return `${lines.join('\n')}\n`;
}

export function parseSource(text: string, filePath = '/src/controller.ts'): SourceFile {
  return project.createSourceFile(filePath, text, { overwrite: true });
}

/** Parses a file holding one class, prefixed with the runtime import */
export function parseClass(...lines: string[]): ClassDeclaration {
  const sourceFile = parseSource(source(RUNTIME_IMPORT, ...lines));
  const [first] = sourceFile.getClasses();
  if (!first) throw new Error('fixture has no class');
  return first;
}

export function makeContext(sourceFile: SourceFile, config: GeneratorConfig = DEFAULT_CONFIG): ExpansionContext {
  const names = UniqueNameScope.fromSourceFile(sourceFile);
  return {
    config,
    resolver: MarkerResolver.forSourceFile(sourceFile, config.runtimeModule),
    names,
    runtimeAlias: names.claim('__routewright'),
  };
}
