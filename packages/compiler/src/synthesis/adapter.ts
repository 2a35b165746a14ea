/**
 * Adapter synthesis: one module-level function per endpoint that extracts
 * every parameter from the request, in declaration order, and forwards them
 * to the handler.
 */

import { StructureKind, type FunctionDeclarationStructure } from 'ts-morph';
import { memberAccess, pickLocalName, referencedIdentifiers } from '../naming.js';
import type { HandlerSignature, ParameterPlan } from '../types.js';
import { emitExtraction, forwardingArgument, isSuspending } from './extraction.js';

export interface AdapterInput {
  adapterName: string;
  className: string;
  handler: HandlerSignature;
  plans: ParameterPlan[];
  runtimeAlias: string;
}

export function synthesizeAdapter(input: AdapterInput): FunctionDeclarationStructure {
  const { adapterName, className, handler, plans, runtimeAlias } = input;

  const reserved = referencedIdentifiers(
    plans.flatMap((plan) => [
      plan.bindingName,
      plan.defaultValue ?? '',
      plan.declaredType ?? '',
      'key' in plan.source ? plan.source.key : '',
    ])
  );
  reserved.add(runtimeAlias);
  const controller = pickLocalName('controller', reserved);
  reserved.add(controller);
  const request = pickLocalName('req', reserved);

  const isAsync = handler.isAsync || plans.some(isSuspending);
  const statements = plans.map((plan) => emitExtraction(plan, { request, runtime: runtimeAlias }));
  const forwarded = plans.map(forwardingArgument).join(', ');
  statements.push(`return ${controller}${memberAccess(handler.name)}(${forwarded});`);

  const adapter: FunctionDeclarationStructure = {
    kind: StructureKind.Function,
    name: adapterName,
    isAsync,
    parameters: [
      { name: controller, type: className },
      { name: request, type: `${runtimeAlias}.Request` },
    ],
    statements,
  };

  const returnType = adapterReturnType(handler, isAsync);
  if (returnType !== undefined) adapter.returnType = returnType;
  return adapter;
}

/**
 * Mirrors the handler's annotation; a sync handler behind an async adapter
 * gets its type wrapped in a Promise.
 */
export function adapterReturnType(handler: HandlerSignature, adapterIsAsync: boolean): string | undefined {
  if (handler.returnType === undefined) return undefined;
  if (adapterIsAsync && !handler.isAsync) return `Promise<${handler.returnType}>`;
  return handler.returnType;
}
