/**
 * Checks that markers sit on declarations the generator can use.
 * Static and private methods inside a controller are checked by the assembler.
 */

import { Node, SyntaxKind, type Decorator, type SourceFile } from 'ts-morph';
import type { ExpansionContext } from '../context.js';
import { createDiagnostic, DiagnosticCodes } from '../diagnostics.js';
import { CONTROLLER_MARKER, isSourceMarkerName, routeMarkerKind } from '../markers.js';
import type { Diagnostic } from '../types.js';

export function validateAttachTargets(sourceFile: SourceFile, context: ExpansionContext): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];

  for (const decorator of sourceFile.getDescendantsOfKind(SyntaxKind.Decorator)) {
    const name = context.resolver.markerName(decorator);
    if (name === undefined) continue;

    if (name === CONTROLLER_MARKER) {
      const parent = decorator.getParent();
      if (!Node.isClassDeclaration(parent) || parent.getName() === undefined) {
        diagnostics.push(invalidTarget(decorator, name, 'a named class'));
      }
      continue;
    }

    if (routeMarkerKind(name) !== undefined) {
      const diagnostic = checkRouteMarker(decorator, name, context);
      if (diagnostic) diagnostics.push(diagnostic);
      continue;
    }

    if (isSourceMarkerName(name)) {
      const parameter = decorator.getParent();
      if (!Node.isParameterDeclaration(parameter) || !Node.isMethodDeclaration(parameter.getParent())) {
        diagnostics.push(invalidTarget(decorator, name, 'a method parameter'));
      }
    }
  }

  return diagnostics;
}

function checkRouteMarker(decorator: Decorator, name: string, context: ExpansionContext): Diagnostic | undefined {
  const method = decorator.getParent();
  if (!Node.isMethodDeclaration(method)) {
    return invalidTarget(decorator, name, 'an instance method');
  }

  const owner = method.getParent();
  const isController =
    Node.isClassDeclaration(owner) && context.resolver.findMarker(owner.getDecorators(), CONTROLLER_MARKER) !== undefined;
  if (isController) return undefined;

  const ownerName = Node.isClassDeclaration(owner) ? owner.getName() : undefined;
  return createDiagnostic(decorator, DiagnosticCodes.ENDPOINT_OUTSIDE_CONTROLLER, {
    message: `@${name} on "${method.getName()}" is ignored: ${ownerName ? `class "${ownerName}"` : 'the class'} has no @Controller marker`,
    suggestion: { message: 'add @Controller() to the class', replacement: '@Controller()' },
  });
}

function invalidTarget(decorator: Decorator, name: string, expected: string): Diagnostic {
  return createDiagnostic(decorator, DiagnosticCodes.INVALID_ATTACH_TARGET, {
    message: `@${name} can only be attached to ${expected}`,
  });
}
