/**
 * Builds a ParameterPlan from a classified parameter: optionality, default
 * value and value type.
 */

import { Node, SyntaxKind, ts, type ParameterDeclaration, type Type, type TypeNode } from 'ts-morph';
import { createDiagnostic, DiagnosticCodes } from '../diagnostics.js';
import type { BuildResult, Diagnostic, ParameterPlan, ParameterSource, ValueDecoder } from '../types.js';

const NULLISH_TYPES = new Set(['undefined', 'null']);

interface ValueType {
  text: string;
  /** Set when exactly one non-nullish member remains */
  node?: TypeNode;
  nullable: boolean;
}

/** Strips `undefined` and `null` members from a union type annotation */
export function splitNullable(typeNode: TypeNode): ValueType {
  if (!Node.isUnionTypeNode(typeNode)) {
    return { text: typeNode.getText(), node: typeNode, nullable: false };
  }

  const members = typeNode.getTypeNodes();
  const kept = members.filter((member) => !NULLISH_TYPES.has(member.getText()));
  const [only] = kept;
  return {
    text: kept.map((member) => member.getText()).join(' | '),
    node: kept.length === 1 ? only : undefined,
    nullable: kept.length < members.length,
  };
}

const EXPLICIT_UNTYPED = new Set([SyntaxKind.AnyKeyword, SyntaxKind.UnknownKeyword]);

function isUnresolved(type: Type): boolean {
  return type.isAny() || type.isUnknown();
}

/**
 * Decoder for a resolved parameter type. Aliases and literal unions resolve
 * to their primitive, e.g. `type Id = number` or `1 | 2` decode as numbers.
 */
export function decoderForType(type: Type): ValueDecoder | undefined {
  const valueType = type.getNonNullableType();
  const members = valueType.isUnion() ? valueType.getUnionTypes() : [valueType];
  if (members.length === 0 || members.some(isUnresolved)) return undefined;

  const every = (flag: ts.TypeFlags): boolean => members.every((member) => (member.getFlags() & flag) !== 0);
  if (every(ts.TypeFlags.NumberLike)) return 'number';
  if (every(ts.TypeFlags.BooleanLike)) return 'boolean';
  if (every(ts.TypeFlags.BigIntLike)) return 'bigint';
  if (members.every((member) => member.getSymbol()?.getName() === 'Date')) return 'date';
  return undefined;
}

export function buildParameterPlan(
  parameter: ParameterDeclaration,
  source: ParameterSource
): BuildResult<ParameterPlan> {
  const bindingName = parameter.getName();
  const initializer = parameter.getInitializer();
  const typeNode = parameter.getTypeNode();

  const resolvedType = parameter.getType().getNonNullableType();
  const decoder = decoderForType(resolvedType);

  let isOptional = parameter.hasQuestionToken();
  let declaredType: string | undefined;
  let valueTypeNode: TypeNode | undefined;

  if (typeNode) {
    const valueType = splitNullable(typeNode);
    declaredType = valueType.text;
    valueTypeNode = valueType.node;
    isOptional = isOptional || valueType.nullable;
  } else if (decoder !== undefined || resolvedType.isString()) {
    // Widened primitive of the initializer, e.g. `page = 1` is a number
    declaredType = resolvedType.getText(parameter);
  }

  const diagnostics: Diagnostic[] = [];
  const isKeyed = source.kind === 'path-param' || source.kind === 'query-param';
  const isExplicitlyUntyped = valueTypeNode !== undefined && EXPLICIT_UNTYPED.has(valueTypeNode.getKind());
  if (isKeyed && isUnresolved(resolvedType) && !isExplicitlyUntyped) {
    diagnostics.push(
      createDiagnostic(parameter, DiagnosticCodes.UNRESOLVED_PARAMETER_TYPE, {
        message: `Type of parameter "${bindingName}" could not be resolved; it is passed through as a string`,
        suggestion: { message: 'annotate the parameter with a type declared or built in' },
      })
    );
  }

  if (source.kind === 'auth-content') {
    if (!valueTypeNode || !Node.isTypeReference(valueTypeNode)) {
      return {
        ok: false,
        diagnostics: [
          createDiagnostic(parameter, DiagnosticCodes.AUTH_TYPE_REQUIRED, {
            message: `@AuthContent parameter "${bindingName}" needs a principal class type`,
          }),
        ],
        failedAt: 'rules-matched',
      };
    }
    declaredType = valueTypeNode.getTypeName().getText();
  }

  const plan: ParameterPlan = { source, isOptional, bindingName };
  if (initializer) plan.defaultValue = initializer.getText();
  if (declaredType !== undefined) plan.declaredType = declaredType;
  if (decoder !== undefined && isKeyed) plan.decoder = decoder;
  return { ok: true, value: plan, diagnostics };
}
