/**
 * Registration function emission.
 *
 * Statement order: global group, declared endpoints, custom request
 * endpoints, route builder calls. Each group keeps source order.
 */

import { StructureKind, type FunctionDeclarationStructure } from 'ts-morph';
import { memberAccess, pickLocalName, referencedIdentifiers } from '../naming.js';
import type { ControllerSpec, EndpointSpec, RouteBuilderSpec } from '../types.js';

interface RegistrationNames {
  controller: string;
  routes: string;
  globalRoutes: string;
  request: string;
}

export function hasGlobalGrouping(spec: ControllerSpec): boolean {
  return spec.globalPathSegments.length > 0 || spec.globalMiddleware.length > 0;
}

/**
 * Local names that do not shadow anything the embedded expressions reference
 */
function registrationNames(spec: ControllerSpec): RegistrationNames {
  const reserved = referencedIdentifiers([
    ...spec.globalPathSegments,
    ...spec.globalMiddleware,
    ...spec.endpoints.flatMap((endpoint) => [
      endpoint.httpMethod,
      endpoint.bodyPolicy,
      endpoint.adapterName,
      ...endpoint.pathSegments,
      ...endpoint.middleware,
    ]),
    ...spec.routeBuilders.map((builder) => (builder.grouping.kind === 'deferred' ? builder.grouping.expression : '')),
  ]);
  reserved.add(spec.className);

  const pick = (preferred: string): string => {
    const name = pickLocalName(preferred, reserved);
    reserved.add(name);
    return name;
  };
  return {
    controller: pick('controller'),
    routes: pick('routes'),
    globalRoutes: pick('globalRoutes'),
    request: pick('req'),
  };
}

export function globalGroupStatement(spec: ControllerSpec, names: RegistrationNames): string {
  let expression = names.routes;
  if (spec.globalPathSegments.length > 0) expression += `.grouped(${spec.globalPathSegments.join(', ')})`;
  if (spec.globalMiddleware.length > 0) expression += `.using(${spec.globalMiddleware.join(', ')})`;
  return `const ${names.globalRoutes} = ${expression};`;
}

function registrationLine(endpoint: EndpointSpec, target: string, names: RegistrationNames): string {
  const builder = endpoint.middleware.length > 0 ? `${target}.using(${endpoint.middleware.join(', ')})` : target;
  const handler = endpoint.isCustomRequestHandler
    ? `${names.controller}${memberAccess(endpoint.handlerName)}(${names.request})`
    : `${endpoint.adapterName}(${names.controller}, ${names.request})`;
  return (
    `${builder}.on(${endpoint.httpMethod}, [${endpoint.pathSegments.join(', ')}], ` +
    `{ body: ${endpoint.bodyPolicy}, use: (${names.request}) => ${handler} });`
  );
}

function routeBuilderArgument(builder: RouteBuilderSpec, grouped: boolean, names: RegistrationNames): string {
  if (!grouped) return names.routes;
  const { grouping } = builder;
  if (grouping.kind === 'known') return grouping.value ? names.globalRoutes : names.routes;
  return `${grouping.expression} ? ${names.globalRoutes} : ${names.routes}`;
}

export function buildRegistrationFunction(spec: ControllerSpec, runtimeAlias: string): FunctionDeclarationStructure {
  const names = registrationNames(spec);
  const grouped = hasGlobalGrouping(spec);
  const target = grouped ? names.globalRoutes : names.routes;

  const statements: string[] = [];
  if (grouped) statements.push(globalGroupStatement(spec, names));

  for (const endpoint of spec.endpoints) {
    if (!endpoint.isCustomRequestHandler) statements.push(registrationLine(endpoint, target, names));
  }
  for (const endpoint of spec.endpoints) {
    if (endpoint.isCustomRequestHandler) statements.push(registrationLine(endpoint, target, names));
  }
  for (const builder of spec.routeBuilders) {
    statements.push(
      `${names.controller}${memberAccess(builder.name)}(${routeBuilderArgument(builder, grouped, names)});`
    );
  }

  return {
    kind: StructureKind.Function,
    name: spec.registrationName,
    isExported: spec.isExported,
    parameters: [
      { name: names.controller, type: spec.className },
      { name: names.routes, type: `${runtimeAlias}.RoutesBuilder` },
    ],
    returnType: 'void',
    statements,
  };
}
