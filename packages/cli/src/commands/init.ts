/**
 * Init command - write a default routewright.config.yaml
 */

import { writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import pc from 'picocolors';
import { resolveTargetPath } from '@routewright/compiler';
import { CLIError, ErrorCodes, wrapError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';

export interface InitOptions {
  path?: string;
  force?: boolean;
}

export const CONFIG_FILE_NAME = 'routewright.config.yaml';

export const CONFIG_TEMPLATE = `# routewright configuration

version: "1.0"

# Files that may contain controllers
include:
  - "src/**/*.ts"
  - "lib/**/*.ts"
  - "app/**/*.ts"
  - "packages/**/*.ts"
  - "apps/**/*.ts"

# Added to the built-in exclusions (node_modules, dist, build, coverage, *.d.ts)
exclude: []

# Markers only count when imported from this module
runtimeModule: "@routewright/runtime"

# Type names accepted for a custom endpoint's request and a route builder's argument
requestTypeNames:
  - "Request"
routesBuilderTypeNames:
  - "RoutesBuilder"

# "exclude" leaves test files untouched
testFileHandling:
  mode: exclude
`;

export async function initCommand(options: InitOptions): Promise<number> {
  const targetPath = resolveTargetPath(options.path);
  if (!existsSync(targetPath)) {
    throw new CLIError(ErrorCodes.IO_PATH_NOT_FOUND, `Path not found: ${targetPath}`);
  }

  const configPath = join(targetPath, CONFIG_FILE_NAME);
  if (existsSync(configPath) && !options.force) {
    throw new CLIError(ErrorCodes.CONFIG_EXISTS, `${CONFIG_FILE_NAME} already exists`, {
      details: { path: configPath },
    });
  }

  try {
    await writeFile(configPath, CONFIG_TEMPLATE, 'utf-8');
  } catch (error) {
    throw wrapError(error, ErrorCodes.IO_WRITE_ERROR, `Could not write ${configPath}`);
  }

  logger.success(`Created ${pc.bold(CONFIG_FILE_NAME)}`);
  logger.info(`Next: run ${pc.cyan('routewright generate')} to write routes`);
  return 0;
}
