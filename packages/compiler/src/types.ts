/**
 * Core types for the routewright route compiler
 */

import type { FunctionDeclarationStructure } from 'ts-morph';

// ============================================================================
// Configuration
// ============================================================================

export interface GeneratorConfig {
  version: string;
  include: string[];
  exclude: string[];
  /** Module the generated region imports the host contract from */
  runtimeModule: string;
  /** Parameter types accepted by custom request endpoints */
  requestTypeNames: string[];
  /** Parameter types accepted by custom route builders */
  routesBuilderTypeNames: string[];
  testFileHandling: {
    mode: 'exclude' | 'include';
  };
}

// ============================================================================
// Argument Matching
// ============================================================================

export interface ParsingRule {
  /** Required label; undefined matches only unlabeled arguments */
  readonly label?: string;
  /** Also consumes the unlabeled arguments that follow the first match */
  readonly isVariadic: boolean;
  readonly isSkippable: boolean;
}

export interface CallArgument<E> {
  label?: string;
  value: E;
}

export type ArgumentBucket<E> = CallArgument<E>[];

export type ArgumentMatchError =
  | { kind: 'argument-mismatch'; ruleIndex: number; argumentIndex: number; rule: ParsingRule }
  | { kind: 'extra-arguments'; argumentIndex: number };

export type ArgumentMatchResult<E> =
  | { ok: true; buckets: ArgumentBucket<E>[] }
  | { ok: false; error: ArgumentMatchError };

// ============================================================================
// Parameter Sources
// ============================================================================

/**
 * Where a handler parameter's value comes from.
 * `key` holds expression text, e.g. `'id'` or `KEYS.id`.
 */
export type ParameterSource =
  | { kind: 'path-param'; key: string }
  | { kind: 'body' }
  | { kind: 'query-param'; key: string }
  | { kind: 'query-content' }
  | { kind: 'auth-content' }
  | { kind: 'request-field'; path: string[] }
  | { kind: 'raw-request'; path: string[] };

export type ParameterSourceKind = ParameterSource['kind'];

/** Runtime decoder for a path or query value, chosen from the resolved type */
export type ValueDecoder = 'number' | 'boolean' | 'bigint' | 'date';

export interface ParameterPlan {
  source: ParameterSource;
  isOptional: boolean;
  /** Initializer expression text */
  defaultValue?: string;
  /**
   * Value type with undefined/null removed; for auth-content, the principal
   * class. Absent when the type could not be resolved.
   */
  declaredType?: string;
  decoder?: ValueDecoder;
  bindingName: string;
}

// ============================================================================
// Endpoints and Controllers
// ============================================================================

export type BuildStage =
  | 'unparsed'
  | 'rules-matched'
  | 'parameters-classified'
  | 'adapter-synthesized';

export type BuildResult<T> =
  | { ok: true; value: T; diagnostics: Diagnostic[] }
  | { ok: false; diagnostics: Diagnostic[]; failedAt: BuildStage };

export interface HandlerSignature {
  name: string;
  isAsync: boolean;
  returnType?: string;
}

export interface EndpointSpec {
  adapterName: string;
  handlerName: string;
  /** Expression text, e.g. `'GET'` */
  httpMethod: string;
  pathSegments: string[];
  middleware: string[];
  bodyPolicy: string;
  parameterPlans: ParameterPlan[];
  /** Absent for custom request endpoints */
  adapter?: FunctionDeclarationStructure;
  isCustomRequestHandler: boolean;
  line: number;
}

export type GroupingFlag =
  | { kind: 'known'; value: boolean }
  | { kind: 'deferred'; expression: string };

export interface RouteBuilderSpec {
  name: string;
  grouping: GroupingFlag;
  line: number;
}

export interface ControllerSpec {
  className: string;
  isExported: boolean;
  registrationName: string;
  globalPathSegments: string[];
  globalMiddleware: string[];
  /** Declared and custom endpoints, in source order */
  endpoints: EndpointSpec[];
  routeBuilders: RouteBuilderSpec[];
}

// ============================================================================
// Diagnostics
// ============================================================================

export type DiagnosticSeverity = 'error' | 'warning';

export interface Suggestion {
  message: string;
  replacement?: string;
}

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  file: string;
  line: number;
  column: number;
  suggestion?: Suggestion;
}

// ============================================================================
// Generation Output
// ============================================================================

export interface RouteSummary {
  kind: 'endpoint' | 'custom-endpoint';
  handler: string;
  method: string;
  path: string[];
  adapter?: string;
}

export interface ControllerSummary {
  className: string;
  registrationName: string;
  routes: RouteSummary[];
  routeBuilders: string[];
}

export interface FileExpansion {
  file: string;
  originalText: string;
  text: string;
  changed: boolean;
  controllers: ControllerSummary[];
  diagnostics: Diagnostic[];
}

export interface GenerationReport {
  version: string;
  targetPath: string;
  generatedAt: string;
  filesScanned: number;
  files: FileExpansion[];
  diagnostics: Diagnostic[];
}
