/**
 * Identifier helpers for emitted code.
 */

import { SyntaxKind, type SourceFile } from 'ts-morph';

const IDENTIFIER_NAME = /^[A-Za-z_$][\w$]*$/;
const IDENTIFIER_TOKEN = /[A-Za-z_$][\w$]*/g;
const STRING_LITERAL = /'(?:[^'\\\n]|\\.)*'|"(?:[^"\\\n]|\\.)*"|`(?:[^`\\]|\\.)*`/g;

export function isIdentifierName(value: string): boolean {
  return IDENTIFIER_NAME.test(value);
}

export function quoteString(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

/** `.name` when `name` is an identifier, `['name']` otherwise */
export function memberAccess(name: string): string {
  return isIdentifierName(name) ? `.${name}` : `[${quoteString(name)}]`;
}

export function sanitizeIdentifier(value: string): string {
  const replaced = value.replace(/[^\w$]/g, '_');
  return /^\d/.test(replaced) ? `_${replaced}` : replaced;
}

/**
 * Identifiers referenced by expression texts, ignoring string literal contents.
 * Over-approximates (property names count too).
 */
export function referencedIdentifiers(expressions: Iterable<string>): Set<string> {
  const found = new Set<string>();
  for (const expression of expressions) {
    const withoutStrings = expression.replace(STRING_LITERAL, '""');
    for (const match of withoutStrings.matchAll(IDENTIFIER_TOKEN)) {
      const [token] = match;
      if (token) found.add(token);
    }
  }
  return found;
}

/** `preferred`, or `preferred2`, `preferred3`... when taken */
export function pickLocalName(preferred: string, reserved: ReadonlySet<string>): string {
  if (!reserved.has(preferred)) return preferred;
  for (let counter = 2; ; counter += 1) {
    const candidate = `${preferred}${counter}`;
    if (!reserved.has(candidate)) return candidate;
  }
}

/**
 * Module-level names claimed by generated declarations. Seeded with every
 * identifier in the file, so a claim never shadows or redeclares user code.
 */
export class UniqueNameScope {
  private readonly taken: Set<string>;

  constructor(reserved: Iterable<string> = []) {
    this.taken = new Set(reserved);
  }

  static fromSourceFile(sourceFile: SourceFile): UniqueNameScope {
    const identifiers = sourceFile
      .getDescendantsOfKind(SyntaxKind.Identifier)
      .map((identifier) => identifier.getText());
    return new UniqueNameScope(identifiers);
  }

  /** Claim `base`, or `base$2`, `base$3`... on collision */
  claim(base: string): string {
    let candidate = base;
    let counter = 2;
    while (this.taken.has(candidate)) {
      candidate = `${base}$${counter}`;
      counter += 1;
    }
    this.taken.add(candidate);
    return candidate;
  }
}
