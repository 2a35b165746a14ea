/**
 * Tests for in-place expansion of annotated files
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG } from '../src/config.js';
import { REGION_END, REGION_START } from '../src/emit/region.js';
import { expandSource } from '../src/generate.js';
import { source } from './helpers.js';

const FILE = '/project/src/controller.ts';

function expand(text: string) {
  return expandSource(FILE, text, DEFAULT_CONFIG);
}

describe('expandSource', () => {
  describe('plain endpoint with path parameters', () => {
    const text = source(
      "import { Controller, EndPoint } from '@routewright/runtime';",
      '',
      '@Controller()',
      'export class GreetingController {',
      "  @EndPoint({ path: ['greet'] })",
      '  greet(name: string, age: number): string {',
      '    return `${name} is ${age}`;',
      '  }',
      '}'
    );

    it('registers the route without grouping', () => {
      const result = expand(text);

      expect(result.diagnostics).toEqual([]);
      expect(result.changed).toBe(true);
      expect(result.text).toContain(
        'export function registerGreetingControllerRoutes(controller: GreetingController, routes: __routewright.RoutesBuilder): void {'
      );
      expect(result.text).toContain(
        "routes.on('GET', ['greet'], { body: 'collect', use: (req) => GreetingController$greet(controller, req) });"
      );
    });

    it('requires both path parameters and forwards them in order', () => {
      const result = expand(text);

      expect(result.text).toContain(
        'function GreetingController$greet(controller: GreetingController, req: __routewright.Request): string {'
      );
      expect(result.text).toContain("const name = req.parameters.require('name');");
      expect(result.text).toContain("const age = req.parameters.require('age', __routewright.decoders.number);");
      expect(result.text).toContain('return controller.greet(name, age);');
    });

    it('appends the region after the hand-written code', () => {
      const result = expand(text);

      expect(result.text.startsWith(text.trimEnd())).toBe(true);
      expect(result.text).toContain(`${REGION_START}\n`);
      expect(result.text).toContain("import * as __routewright from '@routewright/runtime';");
      expect(result.text.endsWith(`${REGION_END}\n`)).toBe(true);
    });

    it('summarizes the routing table', () => {
      expect(expand(text).controllers).toEqual([
        {
          className: 'GreetingController',
          registrationName: 'registerGreetingControllerRoutes',
          routes: [
            {
              kind: 'endpoint',
              handler: 'greet',
              method: "'GET'",
              path: ["'greet'"],
              adapter: 'GreetingController$greet',
            },
          ],
          routeBuilders: [],
        },
      ]);
    });
  });

  it('decodes an optional body leniently inside an async adapter', () => {
    const result = expand(
      source(
        "import { Controller, EndPoint, ReqContent } from '@routewright/runtime';",
        '',
        'interface Book {',
        '  title: string;',
        '}',
        '',
        '@Controller()',
        'export class BookController {',
        "  @EndPoint({ method: 'POST', path: ['books'] })",
        '  add(@ReqContent() book?: Book): string {',
        "    return book?.title ?? 'none';",
        '  }',
        '}'
      )
    );

    expect(result.text).toContain(
      "routes.on('POST', ['books'], { body: 'collect', use: (req) => BookController$add(controller, req) });"
    );
    expect(result.text).toContain(
      'async function BookController$add(controller: BookController, req: __routewright.Request): Promise<string> {'
    );
    expect(result.text).toContain('const book = await req.content.decode<Book>().catch(() => undefined);');
  });

  it('routes every endpoint through the controller group in declaration order', () => {
    const result = expand(
      source(
        "import { Controller, Get } from '@routewright/runtime';",
        "import { requireUser } from './middleware.js';",
        '',
        "@Controller({ path: ['api'] })",
        'export class ApiController {',
        "  @Get({ path: ['secure'], middleware: [requireUser] })",
        '  secure(): string {',
        "    return 'secret';",
        '  }',
        '',
        '  @Get()',
        '  open(): string {',
        "    return 'open';",
        '  }',
        '}'
      )
    );

    const group = "const globalRoutes = routes.grouped('api');";
    const secure =
      "globalRoutes.using(requireUser).on('GET', ['secure'], { body: 'collect', use: (req) => ApiController$secure(controller, req) });";
    const open = "globalRoutes.on('GET', ['open'], { body: 'collect', use: (req) => ApiController$open(controller, req) });";

    expect(result.text).toContain(group);
    expect(result.text).toContain(secure);
    expect(result.text).toContain(open);
    expect(result.text.indexOf(group)).toBeLessThan(result.text.indexOf(secure));
    expect(result.text.indexOf(secure)).toBeLessThan(result.text.indexOf(open));
    expect(result.controllers[0]?.routes.map((route) => route.path)).toEqual([
      ["'api'", "'secure'"],
      ["'api'", "'open'"],
    ]);
  });

  it('reports an async route builder and still generates its siblings', () => {
    const result = expand(
      source(
        "import { Controller, CustomRouteBuilder, Get, type RoutesBuilder } from '@routewright/runtime';",
        '',
        '@Controller()',
        'export class MixedController {',
        '  @CustomRouteBuilder()',
        '  async build(routes: RoutesBuilder): Promise<void> {}',
        '',
        '  @Get()',
        '  ping(): string {',
        "    return 'pong';",
        '  }',
        '}'
      )
    );

    expect(result.diagnostics).toEqual([
      {
        code: 'RW_CONTRACT_203',
        severity: 'error',
        message: '@CustomRouteBuilder method "build" cannot be async',
        file: FILE,
        line: 6,
        column: 3,
        suggestion: { message: 'remove the async modifier' },
      },
    ]);
    expect(result.text).not.toContain('controller.build(');
    expect(result.text).toContain(
      "routes.on('GET', ['ping'], { body: 'collect', use: (req) => MixedController$ping(controller, req) });"
    );
  });

  describe('mixed controller', () => {
    const text = source(
      "import { Controller, CustomEndPoint, CustomRouteBuilder, Post, QueryParam, type Request, type RoutesBuilder } from '@routewright/runtime';",
      "import { audit } from './audit.js';",
      '',
      'const USE_GLOBAL = process.env.USE_GLOBAL === "1";',
      '',
      '@Controller({ middleware: [audit] })',
      'class AdminController {',
      '  @CustomRouteBuilder({ useControllerGlobalSetting: USE_GLOBAL })',
      '  extra(routes: RoutesBuilder): void {}',
      '',
      "  @CustomEndPoint({ method: 'PUT', path: ['raw'] })",
      '  raw(req: Request): string {',
      "    return 'raw';",
      '  }',
      '',
      '  @CustomRouteBuilder({ useControllerGlobalSetting: true })',
      '  grouped(routes: RoutesBuilder): void {}',
      '',
      "  @Post({ path: ['items'] })",
      '  create(@QueryParam() page: number = 1): number {',
      '    return page;',
      '  }',
      '',
      '  @CustomRouteBuilder()',
      '  plain(routes: RoutesBuilder): void {}',
      '}'
    );

    it('emits groups in order: grouping, endpoints, custom endpoints, builders', () => {
      const result = expand(text);
      const expected = [
        'function registerAdminControllerRoutes(controller: AdminController, routes: __routewright.RoutesBuilder): void {',
        'const globalRoutes = routes.using(audit);',
        "globalRoutes.on('POST', ['items'], { body: 'collect', use: (req) => AdminController$create(controller, req) });",
        "globalRoutes.on('PUT', ['raw'], { body: 'collect', use: (req) => controller.raw(req) });",
        'controller.extra(USE_GLOBAL ? globalRoutes : routes);',
        'controller.grouped(globalRoutes);',
        'controller.plain(routes);',
      ];

      expect(result.diagnostics).toEqual([]);
      const positions = expected.map((line) => result.text.indexOf(line));
      expect(positions.every((position) => position >= 0)).toBe(true);
      expect([...positions].sort((a, b) => a - b)).toEqual(positions);
    });

    it('does not export the registration of a private class', () => {
      expect(expand(text).text).not.toContain('export function registerAdminControllerRoutes');
    });

    it('applies the default through the lenient lookup', () => {
      expect(expand(text).text).toContain(
        "const page = req.query.get('page', __routewright.decoders.number) ?? 1;"
      );
    });

    it('is idempotent', () => {
      const first = expand(text);
      const second = expand(first.text);

      expect(second.text).toBe(first.text);
      expect(second.changed).toBe(false);
    });
  });

  it('passes the route builder the plain builder when there is no grouping', () => {
    const result = expand(
      source(
        "import { Controller, CustomRouteBuilder, type RoutesBuilder } from '@routewright/runtime';",
        '',
        '@Controller()',
        'export class Hooks {',
        '  @CustomRouteBuilder({ useControllerGlobalSetting: flag })',
        '  register(routes: RoutesBuilder): void {}',
        '}'
      )
    );

    expect(result.text).toContain('controller.register(routes);');
  });

  it('suffixes an adapter name already declared in the file', () => {
    const result = expand(
      source(
        "import { Controller, Get } from '@routewright/runtime';",
        '',
        'const Status$check = 1;',
        '',
        '@Controller()',
        'export class Status {',
        '  @Get()',
        '  check(): number {',
        '    return Status$check;',
        '  }',
        '}'
      )
    );

    expect(result.text).toContain('function Status$check$2(controller: Status, req: __routewright.Request): number {');
    expect(result.text).toContain('use: (req) => Status$check$2(controller, req)');
  });

  it('resolves aliased and namespace imports of the markers', () => {
    const result = expand(
      source(
        "import * as rw from '@routewright/runtime';",
        "import { Controller as Routes } from '@routewright/runtime';",
        '',
        '@Routes()',
        'export class Health {',
        "  @rw.Head({ path: ['health'] })",
        '  head(): void {}',
        '}'
      )
    );

    expect(result.text).toContain(
      "routes.on('HEAD', ['health'], { body: 'collect', use: (req) => Health$head(controller, req) });"
    );
  });

  it('ignores same-named decorators from other modules', () => {
    const text = source(
      "import { Controller, Get } from '@nestjs/common';",
      '',
      '@Controller()',
      'export class Cats {',
      '  @Get()',
      '  list(): string[] {',
      '    return [];',
      '  }',
      '}'
    );

    const result = expand(text);
    expect(result.text).toBe(text);
    expect(result.changed).toBe(false);
    expect(result.diagnostics).toEqual([]);
  });

  it('removes a stale region when no controller is left', () => {
    const text = source('export const answer = 42;', '', REGION_START, 'function stale() {}', REGION_END);

    const result = expand(text);
    expect(result.text).toBe('export const answer = 42;\n');
    expect(result.changed).toBe(true);
  });

  it('keeps failed endpoints out while reporting every parameter problem', () => {
    const result = expand(
      source(
        "import { Controller, Get, PathParam, QueryParam, Req } from '@routewright/runtime';",
        '',
        '@Controller()',
        'export class Broken {',
        '  @Get()',
        '  find(@PathParam() @QueryParam() id: string, @Req(field) value: string): string {',
        '    return id + value;',
        '  }',
        '}'
      )
    );

    expect(result.diagnostics.map((d) => d.code)).toEqual(['RW_PARAM_101', 'RW_PARAM_103']);
    expect(result.text).not.toContain('Broken$find');
    expect(result.text).toContain(
      'export function registerBrokenRoutes(controller: Broken, routes: __routewright.RoutesBuilder): void {'
    );
  });

  it('rejects a custom endpoint without a request parameter', () => {
    const result = expand(
      source(
        "import { Controller, CustomEndPoint } from '@routewright/runtime';",
        '',
        '@Controller()',
        'export class Raw {',
        '  @CustomEndPoint()',
        '  handle(id: string): string {',
        '    return id;',
        '  }',
        '}'
      )
    );

    expect(result.diagnostics).toHaveLength(1);
    expect(result.diagnostics[0]).toMatchObject({
      code: 'RW_CONTRACT_201',
      line: 6,
      column: 10,
      suggestion: { message: 'replace the parameter list', replacement: '(req: Request)' },
    });
  });

  it('reports invalid targets and endpoints outside controllers', () => {
    const result = expand(
      source(
        "import { Controller, Get, PathParam } from '@routewright/runtime';",
        '',
        'export class Plain {',
        '  @Get()',
        '  list(): void {}',
        '}',
        '',
        '@Controller()',
        'export class Static {',
        '  @Get()',
        '  static ping(): void {}',
        '',
        '  constructor(@PathParam() id: string) {}',
        '}'
      )
    );

    expect(result.diagnostics.map((d) => [d.code, d.severity, d.line])).toEqual([
      ['RW_TARGET_302', 'warning', 4],
      ['RW_TARGET_301', 'error', 10],
      ['RW_TARGET_301', 'error', 13],
    ]);
  });

  it('rejects two route markers on one method', () => {
    const result = expand(
      source(
        "import { Controller, Get, Post } from '@routewright/runtime';",
        '',
        '@Controller()',
        'export class Twice {',
        '  @Get()',
        '  @Post()',
        '  both(): void {}',
        '}'
      )
    );

    expect(result.diagnostics.map((d) => [d.code, d.line])).toEqual([['RW_CONTRACT_204', 6]]);
  });

  describe('lookup values', () => {
    it('parenthesizes a conditional default', () => {
      const result = expand(
        source(
          "import { Controller, Get, QueryParam } from '@routewright/runtime';",
          '',
          'const DEBUG = false;',
          '',
          '@Controller()',
          'export class Books {',
          '  @Get()',
          '  list(@QueryParam() limit: number = DEBUG ? 100 : 10): number {',
          '    return limit;',
          '  }',
          '}'
        )
      );

      expect(result.diagnostics).toEqual([]);
      expect(result.text).toContain(
        "const limit = req.query.get('limit', __routewright.decoders.number) ?? (DEBUG ? 100 : 10);"
      );
    });

    it('decodes a parameter typed through an alias by the aliased type', () => {
      const result = expand(
        source(
          "import { Controller, Get } from '@routewright/runtime';",
          '',
          'type Id = number;',
          '',
          '@Controller()',
          'export class Books {',
          '  @Get()',
          '  find(id: Id): Id {',
          '    return id;',
          '  }',
          '}'
        )
      );

      expect(result.diagnostics).toEqual([]);
      expect(result.text).toContain("const id = req.parameters.require('id', __routewright.decoders.number);");
    });

    it('passes an unresolved default type through untyped and warns', () => {
      const result = expand(
        source(
          "import { Controller, Get, QueryParam } from '@routewright/runtime';",
          "import { PAGE } from './settings.js';",
          '',
          '@Controller()',
          'export class Books {',
          '  @Get()',
          '  list(@QueryParam() page = PAGE): string {',
          '    return String(page);',
          '  }',
          '}'
        )
      );

      expect(result.diagnostics.map((d) => [d.code, d.severity, d.line])).toEqual([['RW_PARAM_106', 'warning', 7]]);
      expect(result.text).toContain("const page = req.query.get('page') ?? PAGE;");
      expect(result.text).not.toContain('<any>');
    });
  });

  it('rejects endpoint options written out of order and names the order', () => {
    const result = expand(
      source(
        "import { Controller, EndPoint } from '@routewright/runtime';",
        '',
        '@Controller()',
        'export class Books {',
        "  @EndPoint({ path: ['books'], method: 'POST' })",
        '  add(): void {}',
        '}'
      )
    );

    expect(result.diagnostics).toEqual([
      {
        code: 'RW_ARGS_002',
        severity: 'error',
        message: '@EndPoint: Unexpected extra arguments starting at argument 1',
        file: FILE,
        line: 5,
        column: 3,
        suggestion: { message: 'write the options in the order method, path, middleware, body' },
      },
    ]);
    expect(result.text).not.toContain('Books$add');
  });
});
