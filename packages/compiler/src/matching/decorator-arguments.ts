/**
 * Flattens decorator call arguments into labeled call arguments.
 *
 * `@EndPoint({ method: 'POST', path: ['books', ':id'] })` becomes
 * `method: 'POST'`, `path: 'books'`, `':id'`: each object property is labeled
 * with its name, and an array value is spread so that only its first element
 * carries the label.
 */

import { Node, type Decorator, type ObjectLiteralElementLike } from 'ts-morph';
import type { CallArgument } from '../types.js';

export function flattenDecoratorArguments(decorator: Decorator): CallArgument<Node>[] {
  if (!decorator.isDecoratorFactory()) return [];

  const flattened: CallArgument<Node>[] = [];
  for (const argument of decorator.getArguments()) {
    if (!Node.isObjectLiteralExpression(argument)) {
      flattened.push({ value: argument });
      continue;
    }

    for (const property of argument.getProperties()) {
      flattenProperty(property, flattened);
    }
  }
  return flattened;
}

function flattenProperty(property: ObjectLiteralElementLike, target: CallArgument<Node>[]): void {
  if (Node.isPropertyAssignment(property)) {
    const initializer = property.getInitializer();
    if (!initializer) return;
    const nameNode = property.getNameNode();
    const label = Node.isStringLiteral(nameNode) ? nameNode.getLiteralText() : nameNode.getText();
    pushLabeled(target, label, initializer);
    return;
  }

  if (Node.isShorthandPropertyAssignment(property)) {
    target.push({ label: property.getName(), value: property.getNameNode() });
    return;
  }

  // Spread assignments and methods have no label; the matcher rejects them
  target.push({ value: property });
}

function pushLabeled(target: CallArgument<Node>[], label: string, value: Node): void {
  if (!Node.isArrayLiteralExpression(value)) {
    target.push({ label, value });
    return;
  }

  value.getElements().forEach((element, index) => {
    target.push(index === 0 ? { label, value: element } : { value: element });
  });
}

/**
 * Text of one element of a variadic option. A whole-array value such as
 * `{ path: segments }` is spread into the emitted list.
 */
export function variadicElementText(node: Node): string {
  const parent = node.getParent();
  if (parent && (Node.isPropertyAssignment(parent) || Node.isShorthandPropertyAssignment(parent))) {
    return `...${node.getText()}`;
  }
  return node.getText();
}

export function bucketAt<E>(buckets: readonly CallArgument<E>[][], index: number): CallArgument<E>[] {
  return buckets[index] ?? [];
}

export function variadicTexts(bucket: readonly CallArgument<Node>[]): string[] {
  return bucket.map((argument) => variadicElementText(argument.value));
}

export function singleText(bucket: readonly CallArgument<Node>[]): string | undefined {
  return bucket[0]?.value.getText();
}
