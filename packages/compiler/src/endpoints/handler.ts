import { Node, SyntaxKind, type MethodDeclaration, type ParameterDeclaration } from 'ts-morph';
import type { HandlerSignature } from '../types.js';

/**
 * Handler name as written; undefined for computed and private (`#name`) names
 */
export function handlerName(method: MethodDeclaration): string | undefined {
  const nameNode = method.getNameNode();
  if (Node.isIdentifier(nameNode)) return nameNode.getText();
  if (Node.isStringLiteral(nameNode)) return nameNode.getLiteralText();
  return undefined;
}

export function isAsyncMethod(method: MethodDeclaration): boolean {
  if (method.isAsync()) return true;
  const returnType = method.getReturnTypeNode()?.getText();
  return returnType !== undefined && /^Promise\s*</.test(returnType);
}

export function asyncModifierOrName(method: MethodDeclaration): Node {
  return method.getModifiers().find((modifier) => modifier.getKind() === SyntaxKind.AsyncKeyword) ?? method.getNameNode();
}

export function handlerSignature(method: MethodDeclaration, name: string): HandlerSignature {
  const signature: HandlerSignature = { name, isAsync: isAsyncMethod(method) };
  const returnType = method.getReturnTypeNode()?.getText();
  if (returnType !== undefined) signature.returnType = returnType;
  return signature;
}

/**
 * Whether the parameter is annotated with one of the accepted type names,
 * either bare (`Request`) or qualified (`rw.Request`)
 */
export function hasTypeNamed(parameter: ParameterDeclaration, typeNames: readonly string[]): boolean {
  const typeNode = parameter.getTypeNode();
  if (!typeNode || !Node.isTypeReference(typeNode)) return false;
  const written = typeNode.getTypeName().getText();
  const lastSegment = written.split('.').pop() ?? written;
  return typeNames.includes(written) || typeNames.includes(lastSegment);
}
