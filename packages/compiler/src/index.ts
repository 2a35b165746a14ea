/**
 * @routewright/compiler
 *
 * Build-time route compiler. Reads marker decorators from controller classes
 * and writes route registration functions and request adapters into the same
 * files.
 */

// Types
export * from './types.js';

// Diagnostics
export {
  DiagnosticCodes,
  DIAGNOSTIC_CATALOG,
  createDiagnostic,
  hasErrors,
  isDiagnosticCode,
  sortDiagnostics,
} from './diagnostics.js';
export type { DiagnosticCode, DiagnosticDefinition } from './diagnostics.js';

// Configuration
export {
  loadConfig,
  mergeConfig,
  findConfigFile,
  resolveTargetPath,
  DEFAULT_CONFIG,
  CONFIG_FILE_NAMES,
  ConfigError,
} from './config.js';

// File discovery
export { collectFilePaths, toRelativePath } from './files/source-files.js';
export { isLikelyTestPath } from './files/test-file.js';

// Argument matching
export { matchArguments, defineRules, Rules, formatArgumentMatchError } from './matching/argument-matcher.js';

// Generation
export { expandSource, generate, writeExpansions, GENERATOR_VERSION } from './generate.js';
export type { GenerateOptions } from './generate.js';
export { REGION_START, REGION_END } from './emit/region.js';
