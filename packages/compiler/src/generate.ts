/**
 * Expansion of annotated source files.
 *
 * `expandSource` is pure: text in, text and diagnostics out. `generate`
 * runs it over the configured files and `writeExpansions` persists the
 * changed ones.
 */

import { readFile, writeFile } from 'fs/promises';
import { Project, type SourceFile } from 'ts-morph';
import { loadConfig, resolveTargetPath } from './config.js';
import type { ExpansionContext } from './context.js';
import { assembleController } from './controllers/assembler.js';
import { validateAttachTargets } from './controllers/attach-targets.js';
import { sortDiagnostics } from './diagnostics.js';
import { appendRegion, REGION_START, renderRegion, stripGeneratedRegion } from './emit/region.js';
import { collectFilePaths } from './files/source-files.js';
import { CONTROLLER_MARKER, MarkerResolver } from './markers.js';
import { UniqueNameScope } from './naming.js';
import type {
  ControllerSpec,
  ControllerSummary,
  Diagnostic,
  FileExpansion,
  GenerationReport,
  GeneratorConfig,
  RouteSummary,
} from './types.js';

export const GENERATOR_VERSION = '1.0.0';
export const RUNTIME_ALIAS = '__routewright';

const DEBUG = process.env['ROUTEWRIGHT_DEBUG'] === '1';

let analysisProject: Project | undefined;

function getAnalysisProject(): Project {
  analysisProject ??= new Project({
    useInMemoryFileSystem: true,
    compilerOptions: {
      strict: true,
      experimentalDecorators: true,
    },
  });
  return analysisProject;
}

export function summarizeController(spec: ControllerSpec): ControllerSummary {
  return {
    className: spec.className,
    registrationName: spec.registrationName,
    routes: spec.endpoints.map(
      (endpoint): RouteSummary => ({
        kind: endpoint.isCustomRequestHandler ? 'custom-endpoint' : 'endpoint',
        handler: endpoint.handlerName,
        method: endpoint.httpMethod,
        path: [...spec.globalPathSegments, ...endpoint.pathSegments],
        ...(endpoint.adapter ? { adapter: endpoint.adapterName } : {}),
      })
    ),
    routeBuilders: spec.routeBuilders.map((builder) => builder.name),
  };
}

function expandParsedFile(sourceFile: SourceFile, config: GeneratorConfig): {
  specs: ControllerSpec[];
  diagnostics: Diagnostic[];
  runtimeAlias: string;
} {
  const resolver = MarkerResolver.forSourceFile(sourceFile, config.runtimeModule);
  const names = UniqueNameScope.fromSourceFile(sourceFile);
  const runtimeAlias = names.claim(RUNTIME_ALIAS);
  if (!resolver.hasMarkers()) {
    return { specs: [], diagnostics: [], runtimeAlias };
  }

  const context: ExpansionContext = { config, resolver, names, runtimeAlias };
  const diagnostics = validateAttachTargets(sourceFile, context);
  const specs: ControllerSpec[] = [];

  for (const classDeclaration of sourceFile.getClasses()) {
    const marker = resolver.findMarker(classDeclaration.getDecorators(), CONTROLLER_MARKER);
    if (!marker) continue;

    const assembly = assembleController(classDeclaration, marker, context);
    diagnostics.push(...assembly.diagnostics);
    if (assembly.spec) specs.push(assembly.spec);
  }

  return { specs, diagnostics: sortDiagnostics(diagnostics), runtimeAlias };
}

/**
 * Regenerates the routewright region of one file
 */
export function expandSource(filePath: string, text: string, config: GeneratorConfig): FileExpansion {
  const stripped = stripGeneratedRegion(text);
  const project = getAnalysisProject();
  const sourceFile = project.createSourceFile(filePath, stripped.text, { overwrite: true });

  try {
    const { specs, diagnostics, runtimeAlias } = expandParsedFile(sourceFile, config);
    const baseText = stripped.hadRegion ? stripped.text : text;
    const updated =
      specs.length === 0
        ? baseText
        : appendRegion(stripped.text, renderRegion(specs, { runtimeModule: config.runtimeModule, runtimeAlias }));

    return {
      file: filePath,
      originalText: text,
      text: updated,
      changed: updated !== text,
      controllers: specs.map(summarizeController),
      diagnostics,
    };
  } finally {
    project.removeSourceFile(sourceFile);
  }
}

/** Files that can neither hold markers nor a stale region are skipped unparsed */
function mayNeedExpansion(text: string, config: GeneratorConfig): boolean {
  return text.includes(config.runtimeModule) || text.includes(REGION_START);
}

export interface GenerateOptions {
  targetPath?: string;
  /** Overrides the config file */
  config?: GeneratorConfig;
}

export async function generate(options: GenerateOptions = {}): Promise<GenerationReport> {
  const targetPath = resolveTargetPath(options.targetPath);
  const config = options.config ?? (await loadConfig(targetPath));
  const filePaths = await collectFilePaths({ targetPath, config });

  const files: FileExpansion[] = [];
  for (const filePath of filePaths) {
    const text = await readFile(filePath, 'utf-8');
    if (!mayNeedExpansion(text, config)) continue;

    const start = Date.now();
    const expansion = expandSource(filePath, text, config);
    if (DEBUG) {
      console.log(
        `[routewright] ${filePath}: ${expansion.controllers.length} controller(s), ` +
          `${expansion.diagnostics.length} diagnostic(s) in ${Date.now() - start}ms`
      );
    }
    if (expansion.changed || expansion.controllers.length > 0 || expansion.diagnostics.length > 0) {
      files.push(expansion);
    }
  }

  return {
    version: GENERATOR_VERSION,
    targetPath,
    generatedAt: new Date().toISOString(),
    filesScanned: filePaths.length,
    files,
    diagnostics: files.flatMap((file) => file.diagnostics),
  };
}

/**
 * Writes every changed file; returns the paths written
 */
export async function writeExpansions(files: readonly FileExpansion[]): Promise<string[]> {
  const written: string[] = [];
  for (const file of files) {
    if (!file.changed) continue;
    await writeFile(file.file, file.text, 'utf-8');
    written.push(file.file);
  }
  return written;
}
