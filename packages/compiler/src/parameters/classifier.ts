/**
 * Parameter Source Classifier
 *
 * Maps each handler parameter to exactly one request-value source. A
 * parameter without a source marker is a path parameter keyed by its own
 * name; two markers on one parameter are rejected whatever the pair.
 */

import { Node, type Decorator, type ParameterDeclaration } from 'ts-morph';
import type { ExpansionContext } from '../context.js';
import { createDiagnostic, DiagnosticCodes } from '../diagnostics.js';
import { formatArgumentMatchError, matchArguments } from '../matching/argument-matcher.js';
import { flattenDecoratorArguments } from '../matching/decorator-arguments.js';
import { KEY_MARKER_RULES, NO_ARGUMENT_MARKER_RULES, PATH_MARKER_RULES } from '../matching/rules.js';
import { isSourceMarkerName, SOURCE_MARKERS, type SourceMarkerName } from '../markers.js';
import { quoteString } from '../naming.js';
import type { BuildResult, Diagnostic, ParameterSource } from '../types.js';

interface AttachedMarker {
  name: SourceMarkerName;
  decorator: Decorator;
}

export function attachedSourceMarkers(parameter: ParameterDeclaration, context: ExpansionContext): AttachedMarker[] {
  const attached: AttachedMarker[] = [];
  for (const decorator of parameter.getDecorators()) {
    const name = context.resolver.markerName(decorator);
    if (isSourceMarkerName(name)) {
      attached.push({ name, decorator });
    }
  }
  return attached;
}

export function classifyParameter(
  parameter: ParameterDeclaration,
  context: ExpansionContext
): BuildResult<ParameterSource> {
  const nameNode = parameter.getNameNode();
  if (!Node.isIdentifier(nameNode) || parameter.isRestParameter()) {
    return fail(
      createDiagnostic(parameter, DiagnosticCodes.UNSUPPORTED_PARAMETER, {
        message: `Parameter "${parameter.getText()}" must be a plain named parameter`,
      })
    );
  }
  const bindingName = nameNode.getText();

  const markers = attachedSourceMarkers(parameter, context);
  const [marker, second] = markers;
  if (second) {
    return fail(
      createDiagnostic(second.decorator, DiagnosticCodes.MULTIPLE_SOURCE_MARKERS, {
        message: `Parameter "${bindingName}" has more than one source marker: ${markers.map((m) => `@${m.name}`).join(', ')}`,
      })
    );
  }
  if (!marker) {
    return { ok: true, value: { kind: 'path-param', key: quoteString(bindingName) }, diagnostics: [] };
  }

  const definition = SOURCE_MARKERS[marker.name];
  const rules =
    definition.argument === 'key'
      ? KEY_MARKER_RULES
      : definition.argument === 'path'
        ? PATH_MARKER_RULES
        : NO_ARGUMENT_MARKER_RULES;
  const match = matchArguments(rules, flattenDecoratorArguments(marker.decorator));
  if (!match.ok) {
    const code =
      match.error.kind === 'extra-arguments' ? DiagnosticCodes.EXTRA_ARGUMENTS : DiagnosticCodes.ARGUMENT_MISMATCH;
    return fail(
      createDiagnostic(marker.decorator, code, {
        message: `@${marker.name}: ${formatArgumentMatchError(match.error)}`,
      })
    );
  }
  const argument = match.buckets[0]?.[0]?.value ?? match.buckets[1]?.[0]?.value;

  const warnings: Diagnostic[] = [];
  if (definition.replacedBy) {
    warnings.push(
      createDiagnostic(marker.decorator, DiagnosticCodes.DEPRECATED_MARKER, {
        message: `@${marker.name} is deprecated`,
        suggestion: { message: `replace with @${definition.replacedBy}`, replacement: `@${definition.replacedBy}` },
      })
    );
  }

  const succeed = (source: ParameterSource): BuildResult<ParameterSource> => ({
    ok: true,
    value: source,
    diagnostics: warnings,
  });

  switch (marker.name) {
    case 'PathParam':
      return succeed({ kind: 'path-param', key: argument?.getText() ?? quoteString(bindingName) });
    case 'QueryParam':
      return succeed({ kind: 'query-param', key: argument?.getText() ?? quoteString(bindingName) });
    case 'ReqContent':
    case 'RequestBody':
      return succeed({ kind: 'body' });
    case 'QueryContent':
      return succeed({ kind: 'query-content' });
    case 'AuthContent':
      return succeed({ kind: 'auth-content' });
    case 'ReqURL':
      return succeed({ kind: 'request-field', path: ['url'] });
    case 'RequestKeyPath':
    case 'Req': {
      const path = argument ? parseRequestPath(argument) : [];
      if (path === undefined) {
        return fail(
          createDiagnostic(marker.decorator, DiagnosticCodes.UNRESOLVED_MARKER_ARGUMENT, {
            message: `@${marker.name} needs a string literal path, got ${argument?.getText() ?? 'nothing'}`,
          })
        );
      }
      return succeed(marker.name === 'Req' ? { kind: 'raw-request', path } : { kind: 'request-field', path });
    }
  }
}

/** `'user.id'` → `['user', 'id']`; undefined when not a literal */
function parseRequestPath(argument: Node): string[] | undefined {
  if (!Node.isStringLiteral(argument) && !Node.isNoSubstitutionTemplateLiteral(argument)) {
    return undefined;
  }
  return argument
    .getLiteralText()
    .split('.')
    .filter((segment) => segment.length > 0);
}

function fail(diagnostic: Diagnostic): BuildResult<ParameterSource> {
  return { ok: false, diagnostics: [diagnostic], failedAt: 'rules-matched' };
}
