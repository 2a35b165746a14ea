import type { GeneratorConfig } from '../types.js';

const TEST_PATH_PATTERNS = [
  /(^|\/)__tests__(\/|$)/,
  /(^|\/)tests?(\/|$)/,
  /(^|\/)specs?(\/|$)/,
  /(^|\/)e2e(\/|$)/,
  /\.(spec|test|e2e)\.tsx?$/i,
];

export function isLikelyTestPath(relativePath: string): boolean {
  const normalized = relativePath.replace(/\\/g, '/');
  return TEST_PATH_PATTERNS.some((pattern) => pattern.test(normalized));
}

export function shouldSkipTestPath(relativePath: string, config: GeneratorConfig): boolean {
  if (config.testFileHandling.mode !== 'exclude') return false;
  return isLikelyTestPath(relativePath);
}
