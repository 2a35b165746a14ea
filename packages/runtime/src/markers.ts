/**
 * Marker decorators
 *
 * Every marker is a no-op at runtime. `routewright generate` reads them from
 * source and writes the route registration code; the decorators only exist so
 * annotated controllers type-check. They are legacy decorators and need
 * `experimentalDecorators` in the consumer's tsconfig.
 */

import type { BodyStreamStrategy, HTTPMethod, Middleware, PathComponent } from './host.js';

/** Options are read in declaration order: `path`, then `middleware`. */
export interface ControllerOptions {
  path?: PathComponent[];
  middleware?: Middleware[];
}

/**
 * Options for @EndPoint and @CustomEndPoint.
 *
 * The generator reads the object literal positionally, so the properties must
 * be written in this order: `method`, `path`, `middleware`, `body`. Any of them
 * may be left out. `{ path: ['a'], method: 'POST' }` is rejected with
 * RW_ARGS_002; write `{ method: 'POST', path: ['a'] }`.
 */
export interface EndPointOptions {
  method?: HTTPMethod;
  path?: PathComponent[];
  middleware?: Middleware[];
  body?: BodyStreamStrategy;
}

/** Options for @Get, @Post and the other method shorthands, in the order `path`, `middleware`. */
export interface MethodShorthandOptions {
  path?: PathComponent[];
  middleware?: Middleware[];
}

export interface CustomRouteBuilderOptions {
  useControllerGlobalSetting?: boolean;
}

const noopClassDecorator: ClassDecorator = () => undefined;
const noopMethodDecorator: MethodDecorator = () => undefined;
const noopParameterDecorator: ParameterDecorator = () => undefined;

// ============================================================================
// Class and method markers
// ============================================================================

export function Controller(_options?: ControllerOptions): ClassDecorator {
  return noopClassDecorator;
}

export function EndPoint(_options?: EndPointOptions): MethodDecorator {
  return noopMethodDecorator;
}

/** The handler takes the raw request: `handle(req: Request)`. */
export function CustomEndPoint(_options?: EndPointOptions): MethodDecorator {
  return noopMethodDecorator;
}

/** The handler registers routes itself: `build(routes: RoutesBuilder)`. Must not be async. */
export function CustomRouteBuilder(_options?: CustomRouteBuilderOptions): MethodDecorator {
  return noopMethodDecorator;
}

function methodShorthand(): (options?: MethodShorthandOptions) => MethodDecorator {
  return () => noopMethodDecorator;
}

export const Get = methodShorthand();
export const Post = methodShorthand();
export const Put = methodShorthand();
export const Delete = methodShorthand();
export const Patch = methodShorthand();
export const Head = methodShorthand();
export const Options = methodShorthand();
export const Move = methodShorthand();
export const Copy = methodShorthand();

// ============================================================================
// Parameter markers
// ============================================================================

/** Path parameter; the key defaults to the parameter name */
export function PathParam(_name?: string | { name: string }): ParameterDecorator {
  return noopParameterDecorator;
}

/** Decoded request body */
export function ReqContent(): ParameterDecorator {
  return noopParameterDecorator;
}

/** @deprecated Use {@link ReqContent}. */
export function RequestBody(): ParameterDecorator {
  return noopParameterDecorator;
}

/** Single query value; the key defaults to the parameter name */
export function QueryParam(_name?: string | { name: string }): ParameterDecorator {
  return noopParameterDecorator;
}

/** Whole query string decoded into one value */
export function QueryContent(): ParameterDecorator {
  return noopParameterDecorator;
}

/** Authenticated principal; the parameter type names the principal class */
export function AuthContent(): ParameterDecorator {
  return noopParameterDecorator;
}

/** @deprecated Use {@link Req} with the same path. */
export function RequestKeyPath(_path?: string): ParameterDecorator {
  return noopParameterDecorator;
}

export function ReqURL(): ParameterDecorator {
  return noopParameterDecorator;
}

/**
 * The request itself, or a field of it given as a dotted path: `@Req('user.id')`.
 */
export function Req(_path?: string): ParameterDecorator {
  return noopParameterDecorator;
}
