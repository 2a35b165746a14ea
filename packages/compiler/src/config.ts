/**
 * Default configuration and config loading for routewright
 */

import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { resolve, join } from 'path';
import { parse as parseYaml } from 'yaml';
import type { GeneratorConfig } from './types.js';

export const DEFAULT_CONFIG: GeneratorConfig = {
  version: '1.0',

  // Simple projects and monorepos (packages/, apps/)
  include: ['src/**/*.ts', 'lib/**/*.ts', 'app/**/*.ts', 'packages/**/*.ts', 'apps/**/*.ts'],
  exclude: [
    '**/node_modules/**',
    '**/dist/**',
    '**/build/**',
    '**/coverage/**',
    '**/*.d.ts',
    '**/generated/**',
  ],

  runtimeModule: '@routewright/runtime',
  requestTypeNames: ['Request'],
  routesBuilderTypeNames: ['RoutesBuilder'],

  // Test files are never rewritten unless asked for
  testFileHandling: {
    mode: 'exclude',
  },
};

export const CONFIG_FILE_NAMES = [
  'routewright.config.yaml',
  'routewright.config.yml',
  'routewright.config.json',
  '.routewrightrc',
  '.routewrightrc.yaml',
  '.routewrightrc.json',
];

export class ConfigError extends Error {
  readonly configPath: string;

  constructor(configPath: string, message: string, options?: { cause?: unknown }) {
    super(`${configPath}: ${message}`, options);
    this.name = 'ConfigError';
    this.configPath = configPath;
  }
}

export async function findConfigFile(targetPath: string): Promise<string | undefined> {
  for (const fileName of CONFIG_FILE_NAMES) {
    const configPath = join(targetPath, fileName);
    if (existsSync(configPath)) return configPath;
  }
  return undefined;
}

export async function loadConfig(targetPath: string): Promise<GeneratorConfig> {
  const configPath = await findConfigFile(targetPath);
  if (!configPath) {
    return DEFAULT_CONFIG;
  }

  const content = await readFile(configPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = configPath.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
  } catch (cause) {
    throw new ConfigError(configPath, 'could not be parsed', { cause });
  }
  return mergeConfig(DEFAULT_CONFIG, readOverride(configPath, parsed));
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((entry) => typeof entry === 'string');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Narrows a parsed config document to the known keys, rejecting wrong types
 */
function readOverride(configPath: string, parsed: unknown): Partial<GeneratorConfig> {
  // An empty YAML document parses to null
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ConfigError(configPath, 'must contain a mapping of options');
  }

  const override: Partial<GeneratorConfig> = {};

  const version = parsed['version'];
  if (version !== undefined) {
    if (typeof version !== 'string' && typeof version !== 'number') {
      throw new ConfigError(configPath, '"version" must be a string');
    }
    override.version = String(version);
  }

  for (const key of ['include', 'exclude', 'requestTypeNames', 'routesBuilderTypeNames'] as const) {
    const value = parsed[key];
    if (value === undefined) continue;
    if (!isStringArray(value)) {
      throw new ConfigError(configPath, `"${key}" must be a list of strings`);
    }
    override[key] = value;
  }

  const runtimeModule = parsed['runtimeModule'];
  if (runtimeModule !== undefined) {
    if (typeof runtimeModule !== 'string' || runtimeModule.length === 0) {
      throw new ConfigError(configPath, '"runtimeModule" must be a module specifier');
    }
    override.runtimeModule = runtimeModule;
  }

  const testFileHandling = parsed['testFileHandling'];
  if (testFileHandling !== undefined) {
    const mode = isRecord(testFileHandling) ? testFileHandling['mode'] : undefined;
    if (mode !== 'exclude' && mode !== 'include') {
      throw new ConfigError(configPath, '"testFileHandling.mode" must be "exclude" or "include"');
    }
    override.testFileHandling = { mode };
  }

  return override;
}

export function mergeConfig(base: GeneratorConfig, override: Partial<GeneratorConfig>): GeneratorConfig {
  return {
    ...base,
    ...override,
    include: override.include ?? base.include,
    // Exclusions accumulate so node_modules stays excluded
    exclude: override.exclude ? [...new Set([...base.exclude, ...override.exclude])] : base.exclude,
    requestTypeNames: override.requestTypeNames ?? base.requestTypeNames,
    routesBuilderTypeNames: override.routesBuilderTypeNames ?? base.routesBuilderTypeNames,
    testFileHandling: override.testFileHandling
      ? { ...base.testFileHandling, ...override.testFileHandling }
      : base.testFileHandling,
  };
}

export function resolveTargetPath(input?: string): string {
  if (!input) {
    return process.cwd();
  }
  return resolve(input);
}
