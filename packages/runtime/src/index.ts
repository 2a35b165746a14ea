/**
 * @routewright/runtime
 *
 * Marker decorators for annotated controllers and the host contract used by
 * generated route code.
 */

export * from './markers.js';
export * from './decoders.js';
export * from './attempt.js';
export type {
  AuthContainer,
  BodyStreamStrategy,
  ContentContainer,
  Decoder,
  HTTPMethod,
  Middleware,
  ParameterContainer,
  PathComponent,
  PrincipalType,
  QueryContainer,
  Request,
  RouteHandler,
  RouteOptions,
  RoutesBuilder,
} from './host.js';
