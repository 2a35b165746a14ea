/**
 * Tests for the generated region and name helpers
 */

import { describe, it, expect } from 'vitest';
import { appendRegion, REGION_END, REGION_START, stripGeneratedRegion } from '../src/emit/region.js';
import { memberAccess, pickLocalName, quoteString, referencedIdentifiers, UniqueNameScope } from '../src/naming.js';

describe('stripGeneratedRegion', () => {
  it('leaves files without a region alone', () => {
    expect(stripGeneratedRegion('const a = 1;\n')).toEqual({ text: 'const a = 1;\n', hadRegion: false });
  });

  it('undoes appendRegion', () => {
    const base = 'const a = 1;\n';
    const withRegion = appendRegion(base, `${REGION_START}\nfunction generated() {}\n${REGION_END}\n`);

    expect(withRegion).toBe(`const a = 1;\n\n${REGION_START}\nfunction generated() {}\n${REGION_END}\n`);
    expect(stripGeneratedRegion(withRegion)).toEqual({ text: base, hadRegion: true });
  });

  it('keeps code written after the region', () => {
    const text = `const a = 1;\n\n${REGION_START}\nx\n${REGION_END}\nconst b = 2;\n`;
    expect(stripGeneratedRegion(text).text).toBe('const a = 1;\n\nconst b = 2;\n');
  });

  it('drops an unterminated region to the end of the file', () => {
    expect(stripGeneratedRegion(`const a = 1;\n${REGION_START}\nhalf`).text).toBe('const a = 1;\n');
  });
});

describe('naming', () => {
  it('claims suffixed names on collision', () => {
    const scope = new UniqueNameScope(['Books$list']);
    expect(scope.claim('Books$list')).toBe('Books$list$2');
    expect(scope.claim('Books$list')).toBe('Books$list$3');
    expect(scope.claim('Books$show')).toBe('Books$show');
  });

  it('picks numbered local names', () => {
    expect(pickLocalName('req', new Set(['req', 'req2']))).toBe('req3');
    expect(pickLocalName('routes', new Set())).toBe('routes');
  });

  it('collects identifiers outside string literals', () => {
    expect([...referencedIdentifiers(["'routes'", 'guard(controller)', '"req"'])]).toEqual(['guard', 'controller']);
  });

  it('quotes and accesses members', () => {
    expect(quoteString("it's")).toBe("'it\\'s'");
    expect(memberAccess('list')).toBe('.list');
    expect(memberAccess('x-trace')).toBe("['x-trace']");
  });
});
