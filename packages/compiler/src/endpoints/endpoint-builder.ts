/**
 * Endpoint Spec Builder
 *
 * Turns one route-marked handler into an EndpointSpec. The build walks
 * `unparsed → rules-matched → parameters-classified → adapter-synthesized`;
 * a failure stops this endpoint only and records the stage it stopped in.
 */

import type { Decorator, MethodDeclaration } from 'ts-morph';
import type { ExpansionContext } from '../context.js';
import { createDiagnostic, DiagnosticCodes } from '../diagnostics.js';
import { formatArgumentMatchError, labelOrder, matchArguments } from '../matching/argument-matcher.js';
import {
  bucketAt,
  flattenDecoratorArguments,
  singleText,
  variadicTexts,
} from '../matching/decorator-arguments.js';
import { ENDPOINT_RULES, METHOD_SHORTHAND_RULES } from '../matching/rules.js';
import { METHOD_SHORTHANDS } from '../markers.js';
import { quoteString, sanitizeIdentifier } from '../naming.js';
import { classifyParameter } from '../parameters/classifier.js';
import { buildParameterPlan } from '../parameters/plan.js';
import { synthesizeAdapter } from '../synthesis/adapter.js';
import type { BuildResult, Diagnostic, EndpointSpec, ParameterPlan } from '../types.js';
import { handlerSignature, hasTypeNamed } from './handler.js';

const DEFAULT_METHOD = quoteString('GET');
const DEFAULT_BODY_POLICY = quoteString('collect');

interface RoutingOptions {
  httpMethod: string;
  pathSegments: string[];
  middleware: string[];
  bodyPolicy: string;
}

export interface EndpointTarget {
  marker: Decorator;
  method: MethodDeclaration;
  handlerName: string;
  className: string;
}

/**
 * Reads method, path, middleware and body policy off the marker
 */
function matchRouting(target: EndpointTarget, markerName: string): BuildResult<RoutingOptions> {
  const shorthandMethod = METHOD_SHORTHANDS[markerName];
  const rules = shorthandMethod === undefined ? ENDPOINT_RULES : METHOD_SHORTHAND_RULES;
  const match = matchArguments(rules, flattenDecoratorArguments(target.marker));
  if (!match.ok) {
    const code =
      match.error.kind === 'extra-arguments' ? DiagnosticCodes.EXTRA_ARGUMENTS : DiagnosticCodes.ARGUMENT_MISMATCH;
    return {
      ok: false,
      diagnostics: [
        createDiagnostic(target.marker, code, {
          message: `@${markerName}: ${formatArgumentMatchError(match.error)}`,
          suggestion: { message: `write the options in the order ${labelOrder(rules)}` },
        }),
      ],
      failedAt: 'unparsed',
    };
  }

  const { buckets } = match;
  const offset = shorthandMethod === undefined ? 1 : 0;
  const path = variadicTexts(bucketAt(buckets, offset));

  return {
    ok: true,
    value: {
      httpMethod:
        shorthandMethod === undefined
          ? singleText(bucketAt(buckets, 0)) ?? DEFAULT_METHOD
          : quoteString(shorthandMethod),
      pathSegments: path.length > 0 ? path : [quoteString(target.handlerName)],
      middleware: variadicTexts(bucketAt(buckets, offset + 1)),
      bodyPolicy: shorthandMethod === undefined ? singleText(bucketAt(buckets, 3)) ?? DEFAULT_BODY_POLICY : DEFAULT_BODY_POLICY,
    },
    diagnostics: [],
  };
}

/**
 * @EndPoint and the method shorthands
 */
export function buildEndpoint(
  target: EndpointTarget,
  markerName: string,
  context: ExpansionContext
): BuildResult<EndpointSpec> {
  const routing = matchRouting(target, markerName);
  if (!routing.ok) return routing;

  const diagnostics: Diagnostic[] = [];
  const plans: ParameterPlan[] = [];
  let failed = false;

  // Every parameter is checked so one build reports all parameter problems
  for (const parameter of target.method.getParameters()) {
    const source = classifyParameter(parameter, context);
    diagnostics.push(...source.diagnostics);
    if (!source.ok) {
      failed = true;
      continue;
    }
    const plan = buildParameterPlan(parameter, source.value);
    diagnostics.push(...plan.diagnostics);
    if (!plan.ok) {
      failed = true;
      continue;
    }
    plans.push(plan.value);
  }
  if (failed) {
    return { ok: false, diagnostics, failedAt: 'rules-matched' };
  }

  const adapterName = context.names.claim(`${target.className}$${sanitizeIdentifier(target.handlerName)}`);
  const adapter = synthesizeAdapter({
    adapterName,
    className: target.className,
    handler: handlerSignature(target.method, target.handlerName),
    plans,
    runtimeAlias: context.runtimeAlias,
  });

  return {
    ok: true,
    value: {
      ...routing.value,
      adapterName,
      handlerName: target.handlerName,
      parameterPlans: plans,
      adapter,
      isCustomRequestHandler: false,
      line: target.method.getStartLineNumber(),
    },
    diagnostics,
  };
}

/**
 * @CustomEndPoint: the handler receives the request itself, so there is no adapter
 */
export function buildCustomEndpoint(target: EndpointTarget, context: ExpansionContext): BuildResult<EndpointSpec> {
  const routing = matchRouting(target, 'CustomEndPoint');
  if (!routing.ok) return routing;

  const parameters = target.method.getParameters();
  const [only] = parameters;
  if (parameters.length !== 1 || !only || !hasTypeNamed(only, context.config.requestTypeNames)) {
    const requestType = context.config.requestTypeNames[0] ?? 'Request';
    return {
      ok: false,
      diagnostics: [
        createDiagnostic(only ?? target.method.getNameNode(), DiagnosticCodes.CUSTOM_ENDPOINT_SIGNATURE, {
          message: `@CustomEndPoint handler "${target.handlerName}" must take exactly one ${requestType} parameter`,
          suggestion: { message: 'replace the parameter list', replacement: `(req: ${requestType})` },
        }),
      ],
      failedAt: 'rules-matched',
    };
  }

  return {
    ok: true,
    value: {
      ...routing.value,
      adapterName: target.handlerName,
      handlerName: target.handlerName,
      parameterPlans: [],
      isCustomRequestHandler: true,
      line: target.method.getStartLineNumber(),
    },
    diagnostics: [],
  };
}
