import { glob } from 'glob';
import type { GeneratorConfig } from '../types.js';
import { shouldSkipTestPath } from './test-file.js';

// ============================================================================
// SCALABILITY LIMITS
// ============================================================================

const DEFAULT_MAX_SOURCE_FILES = 20000;

/**
 * Maximum number of source files scanned in one run
 */
export function maxSourceFiles(): number {
  const parsed = parseInt(process.env['ROUTEWRIGHT_MAX_FILES'] || `${DEFAULT_MAX_SOURCE_FILES}`, 10);
  return Number.isNaN(parsed) || parsed <= 0 ? DEFAULT_MAX_SOURCE_FILES : parsed;
}

export interface SourceFileDiscoveryOptions {
  targetPath: string;
  config: GeneratorConfig;
}

export function toRelativePath(filePath: string, targetPath: string): string {
  const prefix = targetPath.endsWith('/') ? targetPath : `${targetPath}/`;
  return filePath.startsWith(prefix) ? filePath.slice(prefix.length) : filePath;
}

function normalizePattern(pattern: string): string {
  return pattern.replace(/\\/g, '/').replace(/^\.\//, '');
}

/**
 * Absolute paths of the files to expand, sorted so runs are deterministic
 */
export async function collectFilePaths(options: SourceFileDiscoveryOptions): Promise<string[]> {
  const { targetPath, config } = options;
  if (config.include.length === 0) return [];

  const files = await glob(config.include.map(normalizePattern), {
    cwd: targetPath,
    absolute: true,
    nodir: true,
    ignore: config.exclude.map(normalizePattern),
  });

  const unique = Array.from(new Set(files))
    .filter((file) => !shouldSkipTestPath(toRelativePath(file, targetPath), config))
    .sort();

  const limit = maxSourceFiles();
  if (unique.length > limit) {
    console.warn(
      `[routewright] Warning: ${unique.length} files exceed limit (${limit}). ` +
        `Only the first ${limit} will be scanned. Set ROUTEWRIGHT_MAX_FILES to increase.`
    );
    return unique.slice(0, limit);
  }

  return unique;
}
