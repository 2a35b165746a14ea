/**
 * Tests for decorator argument flattening
 */

import { describe, it, expect } from 'vitest';
import {
  flattenDecoratorArguments,
  variadicElementText,
  variadicTexts,
} from '../src/matching/decorator-arguments.js';
import { parseClass } from './helpers.js';

function flattenFirstMethodMarker(...classLines: string[]): Array<{ label?: string; text: string }> {
  const method = parseClass(...classLines).getMethods()[0];
  const decorator = method?.getDecorators()[0];
  if (!decorator) throw new Error('fixture has no decorated method');
  return flattenDecoratorArguments(decorator).map((argument) =>
    argument.label === undefined ? { text: argument.value.getText() } : { label: argument.label, text: argument.value.getText() }
  );
}

describe('flattenDecoratorArguments', () => {
  it('labels object properties and spreads array values', () => {
    const flattened = flattenFirstMethodMarker(
      'class Books {',
      "  @EndPoint({ method: 'POST', path: ['books', ':id'], middleware: [] })",
      '  add(): void {}',
      '}'
    );

    expect(flattened).toEqual([
      { label: 'method', text: "'POST'" },
      { label: 'path', text: "'books'" },
      { text: "':id'" },
    ]);
  });

  it('keeps shorthand properties and spread elements', () => {
    const flattened = flattenFirstMethodMarker(
      'class Books {',
      '  @Get({ path: [...base, "list"], middleware })',
      '  list(): void {}',
      '}'
    );

    expect(flattened).toEqual([
      { label: 'path', text: '...base' },
      { text: '"list"' },
      { label: 'middleware', text: 'middleware' },
    ]);
  });

  it('reads quoted property names without quotes', () => {
    const flattened = flattenFirstMethodMarker(
      'class Books {',
      "  @Get({ 'path': ['x'] })",
      '  list(): void {}',
      '}'
    );

    expect(flattened).toEqual([{ label: 'path', text: "'x'" }]);
  });

  it('passes positional arguments through unlabeled', () => {
    const classDeclaration = parseClass('class Books {', "  find(@PathParam('bookId') id: string): void {}", '}');
    const decorator = classDeclaration.getMethods()[0]?.getParameters()[0]?.getDecorators()[0];
    expect(decorator).toBeDefined();
    if (!decorator) return;

    const flattened = flattenDecoratorArguments(decorator);
    expect(flattened).toHaveLength(1);
    expect(flattened[0]?.label).toBeUndefined();
    expect(flattened[0]?.value.getText()).toBe("'bookId'");
  });
});

describe('variadicElementText', () => {
  it('spreads a whole-array option value', () => {
    const classDeclaration = parseClass('class Books {', '  @Get({ path: segments, middleware: [auth] })', '  list(): void {}', '}');
    const decorator = classDeclaration.getMethods()[0]?.getDecorators()[0];
    if (!decorator) throw new Error('fixture has no decorator');

    const [path, middleware] = flattenDecoratorArguments(decorator);
    expect(path && variadicElementText(path.value)).toBe('...segments');
    expect(middleware && variadicElementText(middleware.value)).toBe('auth');
    expect(variadicTexts(flattenDecoratorArguments(decorator))).toEqual(['...segments', 'auth']);
  });
});
