/**
 * Extraction/Forwarding Synthesizer
 *
 * One `const` statement per parameter plan. Required values use the host's
 * throwing lookups; optional values use the lenient ones; a default applies
 * through `??` when the lenient lookup yields nothing.
 */

import { memberAccess } from '../naming.js';
import type { ParameterPlan } from '../types.js';

export interface ExtractionNames {
  /** Adapter parameter holding the request */
  request: string;
  /** Runtime namespace alias */
  runtime: string;
}

// Identifiers, member chains, numbers and plain string literals
const SIMPLE_EXPRESSION = /^(?:[\w$.]+|'[^'\\]*'|"[^"\\]*")$/;

/** Right operand of `??`, parenthesized unless it is a single token */
export function fallback(defaultValue: string): string {
  return SIMPLE_EXPRESSION.test(defaultValue) ? ` ?? ${defaultValue}` : ` ?? (${defaultValue})`;
}

export function emitExtraction(plan: ParameterPlan, names: ExtractionNames): string {
  return `const ${plan.bindingName} = ${extractionExpression(plan, names)};`;
}

export function extractionExpression(plan: ParameterPlan, names: ExtractionNames): string {
  const req = names.request;
  const { source } = plan;

  switch (source.kind) {
    case 'path-param':
      return keyedLookup(`${req}.parameters`, source.key, plan, names);

    case 'query-param':
      return keyedLookup(`${req}.query`, source.key, plan, names);

    case 'body': {
      const decode = `${req}.content.decode${typeArgument(plan.declaredType)}()`;
      if (plan.defaultValue !== undefined) {
        return `(await ${decode}.catch(() => undefined))${fallback(plan.defaultValue)}`;
      }
      return plan.isOptional ? `await ${decode}.catch(() => undefined)` : `await ${decode}`;
    }

    case 'query-content': {
      const decode = `${req}.query.decode${typeArgument(plan.declaredType)}()`;
      const lenient = `${names.runtime}.attempt(() => ${decode})`;
      if (plan.defaultValue !== undefined) return `${lenient}${fallback(plan.defaultValue)}`;
      return plan.isOptional ? lenient : decode;
    }

    case 'auth-content': {
      const principal = plan.declaredType;
      if (principal === undefined) {
        throw new Error(`Auth parameter "${plan.bindingName}" has no principal type`);
      }
      if (plan.defaultValue !== undefined) return `${req}.auth.get(${principal})${fallback(plan.defaultValue)}`;
      return plan.isOptional ? `${req}.auth.get(${principal})` : `${req}.auth.require(${principal})`;
    }

    case 'request-field':
    case 'raw-request':
      return projectPath(req, source.path);
  }
}

/** Forwarding argument for the handler call; always positional */
export function forwardingArgument(plan: ParameterPlan): string {
  return plan.bindingName;
}

/** Whether the extraction awaits */
export function isSuspending(plan: ParameterPlan): boolean {
  return plan.source.kind === 'body';
}

function keyedLookup(container: string, key: string, plan: ParameterPlan, names: ExtractionNames): string {
  const { decoder } = plan;
  const args = decoder === undefined ? key : `${key}, ${names.runtime}.decoders.${decoder}`;
  const typeArgs = decoder === undefined && plan.declaredType !== 'string' ? typeArgument(plan.declaredType) : '';

  if (plan.defaultValue !== undefined) return `${container}.get${typeArgs}(${args})${fallback(plan.defaultValue)}`;
  return plan.isOptional ? `${container}.get${typeArgs}(${args})` : `${container}.require${typeArgs}(${args})`;
}

function typeArgument(declaredType: string | undefined): string {
  return declaredType === undefined ? '' : `<${declaredType}>`;
}

function projectPath(root: string, path: readonly string[]): string {
  return path.reduce((expression, segment) => `${expression}${memberAccess(segment)}`, root);
}
