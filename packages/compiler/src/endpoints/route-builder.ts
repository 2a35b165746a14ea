/**
 * @CustomRouteBuilder: a method that registers routes itself on the builder
 * it receives. The builder is either the controller's grouped builder or the
 * plain one, per `useControllerGlobalSetting`.
 */

import { SyntaxKind, type Node } from 'ts-morph';
import type { ExpansionContext } from '../context.js';
import { createDiagnostic, DiagnosticCodes } from '../diagnostics.js';
import { formatArgumentMatchError, matchArguments } from '../matching/argument-matcher.js';
import { bucketAt, flattenDecoratorArguments } from '../matching/decorator-arguments.js';
import { ROUTE_BUILDER_RULES } from '../matching/rules.js';
import type { BuildResult, Diagnostic, GroupingFlag, RouteBuilderSpec } from '../types.js';
import type { EndpointTarget } from './endpoint-builder.js';
import { asyncModifierOrName, hasTypeNamed, isAsyncMethod } from './handler.js';

export function groupingFlag(value: Node | undefined): GroupingFlag {
  if (!value) return { kind: 'known', value: false };
  if (value.getKind() === SyntaxKind.TrueKeyword) return { kind: 'known', value: true };
  if (value.getKind() === SyntaxKind.FalseKeyword) return { kind: 'known', value: false };
  return { kind: 'deferred', expression: value.getText() };
}

export function buildRouteBuilder(target: EndpointTarget, context: ExpansionContext): BuildResult<RouteBuilderSpec> {
  const match = matchArguments(ROUTE_BUILDER_RULES, flattenDecoratorArguments(target.marker));
  if (!match.ok) {
    const code =
      match.error.kind === 'extra-arguments' ? DiagnosticCodes.EXTRA_ARGUMENTS : DiagnosticCodes.ARGUMENT_MISMATCH;
    return {
      ok: false,
      diagnostics: [
        createDiagnostic(target.marker, code, {
          message: `@CustomRouteBuilder: ${formatArgumentMatchError(match.error)}`,
        }),
      ],
      failedAt: 'unparsed',
    };
  }

  const diagnostics: Diagnostic[] = [];
  const parameters = target.method.getParameters();
  const [only] = parameters;
  if (parameters.length !== 1 || !only || !hasTypeNamed(only, context.config.routesBuilderTypeNames)) {
    const builderType = context.config.routesBuilderTypeNames[0] ?? 'RoutesBuilder';
    diagnostics.push(
      createDiagnostic(only ?? target.method.getNameNode(), DiagnosticCodes.ROUTE_BUILDER_SIGNATURE, {
        message: `@CustomRouteBuilder method "${target.handlerName}" must take exactly one ${builderType} parameter`,
        suggestion: { message: 'replace the parameter list', replacement: `(routes: ${builderType})` },
      })
    );
  }
  if (isAsyncMethod(target.method)) {
    diagnostics.push(
      createDiagnostic(asyncModifierOrName(target.method), DiagnosticCodes.ROUTE_BUILDER_ASYNC, {
        message: `@CustomRouteBuilder method "${target.handlerName}" cannot be async`,
        suggestion: { message: 'remove the async modifier' },
      })
    );
  }
  if (diagnostics.length > 0) {
    return { ok: false, diagnostics, failedAt: 'rules-matched' };
  }

  return {
    ok: true,
    value: {
      name: target.handlerName,
      grouping: groupingFlag(bucketAt(match.buckets, 0)[0]?.value),
      line: target.method.getStartLineNumber(),
    },
    diagnostics: [],
  };
}
