import type { MarkerResolver } from './markers.js';
import type { UniqueNameScope } from './naming.js';
import type { GeneratorConfig } from './types.js';

/** State shared by one file's expansion pass */
export interface ExpansionContext {
  config: GeneratorConfig;
  resolver: MarkerResolver;
  names: UniqueNameScope;
  /** Local name of the runtime namespace import inside the generated region */
  runtimeAlias: string;
}
