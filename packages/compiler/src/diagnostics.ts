/**
 * Diagnostic catalog
 *
 * Generation problems are reported as diagnostics tied to a source node,
 * never thrown. Codes are stable:
 * - RW_ARGS_*: marker argument shape
 * - RW_PARAM_*: parameter classification
 * - RW_CONTRACT_*: handler signature contracts
 * - RW_TARGET_*: marker attachment
 */

import type { Node } from 'ts-morph';
import type { Diagnostic, DiagnosticSeverity, Suggestion } from './types.js';

export const DiagnosticCodes = {
  ARGUMENT_MISMATCH: 'RW_ARGS_001',
  EXTRA_ARGUMENTS: 'RW_ARGS_002',

  MULTIPLE_SOURCE_MARKERS: 'RW_PARAM_101',
  UNSUPPORTED_PARAMETER: 'RW_PARAM_102',
  UNRESOLVED_MARKER_ARGUMENT: 'RW_PARAM_103',
  AUTH_TYPE_REQUIRED: 'RW_PARAM_104',
  DEPRECATED_MARKER: 'RW_PARAM_105',
  UNRESOLVED_PARAMETER_TYPE: 'RW_PARAM_106',

  CUSTOM_ENDPOINT_SIGNATURE: 'RW_CONTRACT_201',
  ROUTE_BUILDER_SIGNATURE: 'RW_CONTRACT_202',
  ROUTE_BUILDER_ASYNC: 'RW_CONTRACT_203',
  MULTIPLE_ROUTE_MARKERS: 'RW_CONTRACT_204',

  INVALID_ATTACH_TARGET: 'RW_TARGET_301',
  ENDPOINT_OUTSIDE_CONTROLLER: 'RW_TARGET_302',
} as const;

export type DiagnosticCode = (typeof DiagnosticCodes)[keyof typeof DiagnosticCodes];

export interface DiagnosticDefinition {
  title: string;
  severity: DiagnosticSeverity;
  description: string;
  remediation: string;
}

export const DIAGNOSTIC_CATALOG: Record<DiagnosticCode, DiagnosticDefinition> = {
  [DiagnosticCodes.ARGUMENT_MISMATCH]: {
    title: 'Marker argument mismatch',
    severity: 'error',
    description:
      'A required marker argument is missing, or an argument carries a label the marker does not expect at that position.',
    remediation:
      'Pass options in the documented order, e.g. @EndPoint({ method, path, middleware, body }). Unknown option names are rejected.',
  },
  [DiagnosticCodes.EXTRA_ARGUMENTS]: {
    title: 'Extra marker arguments',
    severity: 'error',
    description: 'The marker received more arguments than its rules accept.',
    remediation:
      'Remove the trailing arguments. Markers such as @ReqContent() take no arguments. Options written out of order are also left over: @EndPoint takes { method, path, middleware, body } in that order.',
  },
  [DiagnosticCodes.MULTIPLE_SOURCE_MARKERS]: {
    title: 'Multiple parameter source markers',
    severity: 'error',
    description: 'A handler parameter carries more than one source marker, so its value has no single source.',
    remediation: 'Keep exactly one of @PathParam, @ReqContent, @QueryParam, @QueryContent, @AuthContent, @ReqURL or @Req.',
  },
  [DiagnosticCodes.UNSUPPORTED_PARAMETER]: {
    title: 'Unsupported handler parameter',
    severity: 'error',
    description: 'Destructured and rest parameters cannot be bound to a single request value.',
    remediation: 'Declare a plain named parameter and destructure inside the handler body.',
  },
  [DiagnosticCodes.UNRESOLVED_MARKER_ARGUMENT]: {
    title: 'Unresolved marker argument',
    severity: 'error',
    description: 'A request path given to @Req or @RequestKeyPath must be a string literal known at build time.',
    remediation: "Write the path inline, e.g. @Req('user.id').",
  },
  [DiagnosticCodes.AUTH_TYPE_REQUIRED]: {
    title: 'Principal type required',
    severity: 'error',
    description: '@AuthContent looks the principal up by class, so the parameter needs a class type annotation.',
    remediation: 'Annotate the parameter with the principal class, e.g. @AuthContent() user: User.',
  },
  [DiagnosticCodes.DEPRECATED_MARKER]: {
    title: 'Deprecated marker',
    severity: 'warning',
    description: 'The marker still works but has a replacement.',
    remediation: 'Use @ReqContent instead of @RequestBody and @Req instead of @RequestKeyPath.',
  },
  [DiagnosticCodes.UNRESOLVED_PARAMETER_TYPE]: {
    title: 'Unresolved parameter type',
    severity: 'warning',
    description:
      'The type of a path or query parameter could not be resolved within its file, so no decoder is chosen and the handler receives the raw string.',
    remediation:
      'Annotate the parameter with a type the file can resolve, e.g. `page: number = PAGE`, or annotate it `string` if the raw value is wanted.',
  },
  [DiagnosticCodes.CUSTOM_ENDPOINT_SIGNATURE]: {
    title: 'Custom endpoint signature',
    severity: 'error',
    description: 'A @CustomEndPoint handler receives the raw request and must take exactly one request parameter.',
    remediation: 'Declare the handler as handle(req: Request).',
  },
  [DiagnosticCodes.ROUTE_BUILDER_SIGNATURE]: {
    title: 'Route builder signature',
    severity: 'error',
    description: 'A @CustomRouteBuilder method must take exactly one routes builder parameter.',
    remediation: 'Declare the method as build(routes: RoutesBuilder).',
  },
  [DiagnosticCodes.ROUTE_BUILDER_ASYNC]: {
    title: 'Async route builder',
    severity: 'error',
    description: 'Route registration is synchronous, so a @CustomRouteBuilder method cannot be async.',
    remediation: 'Remove the async modifier and register routes synchronously.',
  },
  [DiagnosticCodes.MULTIPLE_ROUTE_MARKERS]: {
    title: 'Multiple route markers',
    severity: 'error',
    description: 'A method carries more than one route-producing marker.',
    remediation: 'Keep one of @EndPoint, a method shorthand such as @Get, @CustomEndPoint or @CustomRouteBuilder.',
  },
  [DiagnosticCodes.INVALID_ATTACH_TARGET]: {
    title: 'Invalid marker target',
    severity: 'error',
    description:
      '@Controller belongs on a named class, route markers on instance methods that are not private, and source markers on method parameters.',
    remediation: 'Move the marker to a supported declaration.',
  },
  [DiagnosticCodes.ENDPOINT_OUTSIDE_CONTROLLER]: {
    title: 'Endpoint outside a controller',
    severity: 'warning',
    description: 'Route markers on a class without @Controller generate nothing.',
    remediation: 'Add @Controller() to the class, or remove the route markers.',
  },
};

export function isDiagnosticCode(value: string): value is DiagnosticCode {
  return Object.prototype.hasOwnProperty.call(DIAGNOSTIC_CATALOG, value);
}

export interface DiagnosticOptions {
  message?: string;
  suggestion?: Suggestion;
}

/**
 * Create a diagnostic positioned at a node's start
 */
export function createDiagnostic(node: Node, code: DiagnosticCode, options: DiagnosticOptions = {}): Diagnostic {
  const sourceFile = node.getSourceFile();
  const { line, column } = sourceFile.getLineAndColumnAtPos(node.getStart());
  const definition = DIAGNOSTIC_CATALOG[code];

  const diagnostic: Diagnostic = {
    code,
    severity: definition.severity,
    message: options.message ?? definition.title,
    file: sourceFile.getFilePath(),
    line,
    column,
  };
  if (options.suggestion) {
    diagnostic.suggestion = options.suggestion;
  }
  return diagnostic;
}

export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((diagnostic) => diagnostic.severity === 'error');
}

export function sortDiagnostics(diagnostics: Diagnostic[]): Diagnostic[] {
  return [...diagnostics].sort((a, b) => {
    if (a.file !== b.file) return a.file.localeCompare(b.file);
    if (a.line !== b.line) return a.line - b.line;
    return a.column - b.column;
  });
}
