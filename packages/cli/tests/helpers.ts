import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';

export function createFile(basePath: string, relativePath: string, content: string): void {
  const fullPath = join(basePath, relativePath);
  mkdirSync(join(fullPath, '..'), { recursive: true });
  writeFileSync(fullPath, content);
}

const ANSI = /\u001b\[[0-9;]*m/g;

export function stripAnsi(text: string): string {
  return text.replace(ANSI, '');
}

/**
 * Every string a console spy received, one entry per call
 */
export function printed(spy: { mock: { calls: unknown[][] } }): string[] {
  return spy.mock.calls.map((args) => stripAnsi(args.map(String).join(' ')));
}

export const PING_CONTROLLER = [
  "import { Controller, Get } from '@routewright/runtime';",
  '',
  '@Controller()',
  'export class PingController {',
  '  @Get()',
  '  ping(): string {',
  "    return 'pong';",
  '  }',
  '}',
  '',
].join('\n');

export const ASYNC_BUILDER_CONTROLLER = [
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
  '}',
  '',
].join('\n');
