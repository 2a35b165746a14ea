/**
 * Marker vocabulary and marker resolution.
 *
 * A decorator counts as a marker only when it is imported from the runtime
 * module, either by name (`import { Get as HttpGet }`) or through a namespace
 * import (`@rw.Get()`). Same-named decorators from other libraries are ignored.
 */

import { Node, type Decorator, type SourceFile } from 'ts-morph';

export const CONTROLLER_MARKER = 'Controller';

export const METHOD_SHORTHANDS: Readonly<Record<string, string>> = {
  Get: 'GET',
  Post: 'POST',
  Put: 'PUT',
  Delete: 'DELETE',
  Patch: 'PATCH',
  Head: 'HEAD',
  Options: 'OPTIONS',
  Move: 'MOVE',
  Copy: 'COPY',
};

export type RouteMarkerKind = 'endpoint' | 'method-shorthand' | 'custom-endpoint' | 'route-builder';

export function routeMarkerKind(name: string | undefined): RouteMarkerKind | undefined {
  if (name === undefined) return undefined;
  if (name === 'EndPoint') return 'endpoint';
  if (name === 'CustomEndPoint') return 'custom-endpoint';
  if (name === 'CustomRouteBuilder') return 'route-builder';
  if (Object.prototype.hasOwnProperty.call(METHOD_SHORTHANDS, name)) return 'method-shorthand';
  return undefined;
}

export type SourceMarkerName =
  | 'PathParam'
  | 'ReqContent'
  | 'RequestBody'
  | 'QueryParam'
  | 'QueryContent'
  | 'AuthContent'
  | 'RequestKeyPath'
  | 'ReqURL'
  | 'Req';

export interface SourceMarkerDefinition {
  /** What the single optional argument means */
  argument: 'key' | 'path' | 'none';
  replacedBy?: SourceMarkerName;
}

export const SOURCE_MARKERS: Readonly<Record<SourceMarkerName, SourceMarkerDefinition>> = {
  PathParam: { argument: 'key' },
  ReqContent: { argument: 'none' },
  RequestBody: { argument: 'none', replacedBy: 'ReqContent' },
  QueryParam: { argument: 'key' },
  QueryContent: { argument: 'none' },
  AuthContent: { argument: 'none' },
  RequestKeyPath: { argument: 'path', replacedBy: 'Req' },
  ReqURL: { argument: 'none' },
  Req: { argument: 'path' },
};

export function isSourceMarkerName(name: string | undefined): name is SourceMarkerName {
  return name !== undefined && Object.prototype.hasOwnProperty.call(SOURCE_MARKERS, name);
}

export class MarkerResolver {
  private readonly namedImports: Map<string, string>;
  private readonly namespaceImports: Set<string>;

  private constructor(namedImports: Map<string, string>, namespaceImports: Set<string>) {
    this.namedImports = namedImports;
    this.namespaceImports = namespaceImports;
  }

  static forSourceFile(sourceFile: SourceFile, runtimeModule: string): MarkerResolver {
    const namedImports = new Map<string, string>();
    const namespaceImports = new Set<string>();

    for (const declaration of sourceFile.getImportDeclarations()) {
      if (declaration.getModuleSpecifierValue() !== runtimeModule) continue;

      const namespaceImport = declaration.getNamespaceImport();
      if (namespaceImport) {
        namespaceImports.add(namespaceImport.getText());
      }
      for (const specifier of declaration.getNamedImports()) {
        const exported = specifier.getName();
        const local = specifier.getAliasNode()?.getText() ?? exported;
        namedImports.set(local, exported);
      }
    }

    return new MarkerResolver(namedImports, namespaceImports);
  }

  hasMarkers(): boolean {
    return this.namedImports.size > 0 || this.namespaceImports.size > 0;
  }

  /**
   * Exported runtime name of the marker a decorator applies, if any
   */
  markerName(decorator: Decorator): string | undefined {
    const expression = decorator.getExpression();
    const callee = Node.isCallExpression(expression) ? expression.getExpression() : expression;

    if (Node.isIdentifier(callee)) {
      return this.namedImports.get(callee.getText());
    }
    if (Node.isPropertyAccessExpression(callee)) {
      const target = callee.getExpression();
      if (Node.isIdentifier(target) && this.namespaceImports.has(target.getText())) {
        return callee.getName();
      }
    }
    return undefined;
  }

  findMarker(decorators: readonly Decorator[], name: string): Decorator | undefined {
    return decorators.find((decorator) => this.markerName(decorator) === name);
  }
}
