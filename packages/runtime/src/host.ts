/**
 * Host contract
 *
 * routewright never handles HTTP itself. Generated adapters and registration
 * functions call into these interfaces, which the host framework implements.
 * Hosts add fields to `Request` through interface merging:
 *
 * ```ts
 * declare module '@routewright/runtime' {
 *   interface Request {
 *     db: Database;
 *   }
 * }
 * ```
 */

export type HTTPMethod =
  | 'GET'
  | 'POST'
  | 'PUT'
  | 'DELETE'
  | 'PATCH'
  | 'HEAD'
  | 'OPTIONS'
  | 'MOVE'
  | 'COPY'
  | (string & {});

/** One route path segment, e.g. `'books'` or `':id'` */
export type PathComponent = string;

/**
 * How the host reads a request body before the handler runs.
 */
export type BodyStreamStrategy = 'collect' | 'stream' | { maxSize: number };

/** Converts one raw string value (path or query) into a typed value. */
export type Decoder<T> = (raw: string) => T;

/** Constructor used to look up an authenticated principal. */
export type PrincipalType<T> = abstract new (...args: never[]) => T;

export interface ParameterContainer {
  /** Returns undefined when the value is missing or fails to decode */
  get<T = string>(name: string, decoder?: Decoder<T>): T | undefined;
  /** Throws (the host answers 400) when the value is missing or fails to decode */
  require<T = string>(name: string, decoder?: Decoder<T>): T;
}

export interface QueryContainer extends ParameterContainer {
  /** Decodes the whole query string; throws on failure */
  decode<T>(): T;
}

export interface ContentContainer {
  /** Decodes the request body; rejects on failure */
  decode<T>(): Promise<T>;
}

export interface AuthContainer {
  get<T>(type: PrincipalType<T>): T | undefined;
  /** Throws (the host answers 401) when no principal of this type is logged in */
  require<T>(type: PrincipalType<T>): T;
}

export interface Request {
  readonly parameters: ParameterContainer;
  readonly content: ContentContainer;
  readonly query: QueryContainer;
  readonly auth: AuthContainer;
  readonly url: URL;
}

export type RouteHandler = (req: Request) => unknown;

export interface RouteOptions {
  body: BodyStreamStrategy;
  use: RouteHandler;
}

export type Middleware = (req: Request, next: () => Promise<unknown>) => Promise<unknown>;

export interface RoutesBuilder {
  on(method: HTTPMethod, path: PathComponent[], options: RouteOptions): void;
  grouped(...path: PathComponent[]): RoutesBuilder;
  using(...middleware: Middleware[]): RoutesBuilder;
}
