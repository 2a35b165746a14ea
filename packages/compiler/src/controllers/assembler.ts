/**
 * Controller Assembler
 *
 * Builds the ControllerSpec for one @Controller class: global grouping from
 * the controller marker, then one spec per route-marked method in
 * declaration order. A failed endpoint contributes diagnostics only; its
 * siblings are still generated.
 */

import { Scope, type ClassDeclaration, type Decorator, type MethodDeclaration } from 'ts-morph';
import type { ExpansionContext } from '../context.js';
import { createDiagnostic, DiagnosticCodes } from '../diagnostics.js';
import { buildCustomEndpoint, buildEndpoint, type EndpointTarget } from '../endpoints/endpoint-builder.js';
import { handlerName } from '../endpoints/handler.js';
import { buildRouteBuilder } from '../endpoints/route-builder.js';
import { formatArgumentMatchError, labelOrder, matchArguments } from '../matching/argument-matcher.js';
import { bucketAt, flattenDecoratorArguments, variadicTexts } from '../matching/decorator-arguments.js';
import { CONTROLLER_RULES } from '../matching/rules.js';
import { routeMarkerKind } from '../markers.js';
import type { ControllerSpec, Diagnostic, EndpointSpec, RouteBuilderSpec } from '../types.js';

export interface ControllerAssembly {
  /** Absent when the controller marker itself is malformed */
  spec?: ControllerSpec;
  diagnostics: Diagnostic[];
}

export function assembleController(
  classDeclaration: ClassDeclaration,
  controllerMarker: Decorator,
  context: ExpansionContext
): ControllerAssembly {
  const diagnostics: Diagnostic[] = [];
  const className = classDeclaration.getName();
  if (className === undefined) {
    // Reported by attach-target validation
    return { diagnostics };
  }

  const match = matchArguments(CONTROLLER_RULES, flattenDecoratorArguments(controllerMarker));
  if (!match.ok) {
    const code =
      match.error.kind === 'extra-arguments' ? DiagnosticCodes.EXTRA_ARGUMENTS : DiagnosticCodes.ARGUMENT_MISMATCH;
    diagnostics.push(
      createDiagnostic(controllerMarker, code, {
        message: `@Controller: ${formatArgumentMatchError(match.error)}`,
        suggestion: { message: `write the options in the order ${labelOrder(CONTROLLER_RULES)}` },
      })
    );
    return { diagnostics };
  }

  const endpoints: EndpointSpec[] = [];
  const routeBuilders: RouteBuilderSpec[] = [];

  for (const method of classDeclaration.getMethods()) {
    const markers = routeMarkersOf(method, context);
    const [marker, second] = markers;
    if (!marker) continue;
    if (second) {
      diagnostics.push(
        createDiagnostic(second.decorator, DiagnosticCodes.MULTIPLE_ROUTE_MARKERS, {
          message: `Method "${method.getName()}" has more than one route marker: ${markers.map((m) => `@${m.name}`).join(', ')}`,
        })
      );
      continue;
    }

    const name = handlerName(method);
    if (name === undefined || method.isStatic() || method.getScope() === Scope.Private) {
      diagnostics.push(
        createDiagnostic(marker.decorator, DiagnosticCodes.INVALID_ATTACH_TARGET, {
          message: `@${marker.name} must be attached to a named instance method that is not private`,
        })
      );
      continue;
    }

    const target: EndpointTarget = { marker: marker.decorator, method, handlerName: name, className };
    const kind = routeMarkerKind(marker.name);
    if (kind === 'route-builder') {
      const result = buildRouteBuilder(target, context);
      diagnostics.push(...result.diagnostics);
      if (result.ok) routeBuilders.push(result.value);
      continue;
    }

    const result = kind === 'custom-endpoint' ? buildCustomEndpoint(target, context) : buildEndpoint(target, marker.name, context);
    diagnostics.push(...result.diagnostics);
    if (result.ok) endpoints.push(result.value);
  }

  return {
    spec: {
      className,
      isExported: classDeclaration.isExported(),
      registrationName: context.names.claim(`register${className}Routes`),
      globalPathSegments: variadicTexts(bucketAt(match.buckets, 0)),
      globalMiddleware: variadicTexts(bucketAt(match.buckets, 1)),
      endpoints,
      routeBuilders,
    },
    diagnostics,
  };
}

interface AttachedRouteMarker {
  name: string;
  decorator: Decorator;
}

function routeMarkersOf(method: MethodDeclaration, context: ExpansionContext): AttachedRouteMarker[] {
  const attached: AttachedRouteMarker[] = [];
  for (const decorator of method.getDecorators()) {
    const name = context.resolver.markerName(decorator);
    if (name !== undefined && routeMarkerKind(name) !== undefined) {
      attached.push({ name, decorator });
    }
  }
  return attached;
}
