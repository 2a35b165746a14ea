import { describe, it, expect } from 'vitest';
import pc from 'picocolors';
import type { Diagnostic, FileExpansion, GenerationReport } from '@routewright/compiler';
import { countBySeverity, formatControllers, formatDiagnostic, reportToJSON } from '../src/lib/format.js';

const plain = pc.createColors(false);

const asyncBuilder: Diagnostic = {
  code: 'RW_CONTRACT_203',
  severity: 'error',
  message: '@CustomRouteBuilder method "build" cannot be async',
  file: '/work/src/mixed.ts',
  line: 6,
  column: 3,
  suggestion: { message: 'remove the async modifier' },
};

const outsideController: Diagnostic = {
  code: 'RW_TARGET_302',
  severity: 'warning',
  message: 'Route markers on "Loose" are ignored without @Controller',
  file: '/work/src/loose.ts',
  line: 4,
  column: 1,
};

const expansion: FileExpansion = {
  file: '/work/src/books.ts',
  originalText: 'before',
  text: 'after',
  changed: true,
  controllers: [
    {
      className: 'BookController',
      registrationName: 'registerBookControllerRoutes',
      routes: [
        { kind: 'endpoint', handler: 'list', method: 'GET', path: ['books'], adapter: 'BookController$list' },
        { kind: 'custom-endpoint', handler: 'raw', method: 'POST', path: ['raw'] },
      ],
      routeBuilders: ['build'],
    },
  ],
  diagnostics: [],
};

describe('formatDiagnostic', () => {
  it('prints a relative location, code and message', () => {
    expect(formatDiagnostic(outsideController, '/work', plain)).toBe(
      'src/loose.ts:4:1 RW_TARGET_302 Route markers on "Loose" are ignored without @Controller'
    );
  });

  it('prints the suggestion on its own line', () => {
    expect(formatDiagnostic(asyncBuilder, '/work', plain)).toBe(
      'src/mixed.ts:6:3 RW_CONTRACT_203 @CustomRouteBuilder method "build" cannot be async\n' +
        '  fix: remove the async modifier'
    );
  });

  it('shows the replacement when there is one', () => {
    const diagnostic: Diagnostic = {
      ...asyncBuilder,
      code: 'RW_CONTRACT_201',
      message: '@CustomEndPoint method "raw" must take a single Request',
      suggestion: { message: 'replace the parameter list', replacement: '(req: Request)' },
    };
    expect(formatDiagnostic(diagnostic, '/work', plain).split('\n')[1]).toBe(
      '  fix: replace the parameter list: (req: Request)'
    );
  });
});

describe('formatControllers', () => {
  it('summarizes each controller of a file', () => {
    expect(formatControllers(expansion, '/work', plain)).toEqual([
      'registerBookControllerRoutes src/books.ts (2 route(s), 1 builder(s))',
    ]);
  });
});

describe('countBySeverity', () => {
  it('splits errors from warnings', () => {
    expect(countBySeverity([asyncBuilder, outsideController, asyncBuilder])).toEqual({ errors: 2, warnings: 1 });
  });
});

describe('reportToJSON', () => {
  it('drops source text and relativizes paths', () => {
    const report: GenerationReport = {
      version: '1.0.0',
      targetPath: '/work',
      generatedAt: '2026-01-01T00:00:00.000Z',
      filesScanned: 3,
      files: [expansion],
      diagnostics: [asyncBuilder],
    };

    const json = reportToJSON(report, ['/work/src/books.ts']);
    expect(json['changed']).toEqual(['src/books.ts']);
    expect(json['written']).toEqual(['src/books.ts']);
    expect(json['controllers']).toEqual([{ file: 'src/books.ts', ...expansion.controllers[0] }]);
    expect(json['diagnostics']).toEqual([{ ...asyncBuilder, file: 'src/mixed.ts' }]);
    expect(JSON.stringify(json)).not.toContain('originalText');
  });
});
