/**
 * Rule tables for every marker kind. Every option is optional, so all rules
 * are skippable; object-literal options must follow the table order.
 */

import { Rules, defineRules } from './argument-matcher.js';

export const CONTROLLER_RULES = defineRules([
  Rules.labeledVariadic('path', true),
  Rules.labeledVariadic('middleware', true),
]);

/** Shared by @EndPoint and @CustomEndPoint */
export const ENDPOINT_RULES = defineRules([
  Rules.labeled('method', true),
  Rules.labeledVariadic('path', true),
  Rules.labeledVariadic('middleware', true),
  Rules.labeled('body', true),
]);

export const METHOD_SHORTHAND_RULES = defineRules([
  Rules.labeledVariadic('path', true),
  Rules.labeledVariadic('middleware', true),
]);

export const ROUTE_BUILDER_RULES = defineRules([Rules.labeled('useControllerGlobalSetting', true)]);

/** @PathParam(key?) and @QueryParam(key?); the key may also be given as `{ name }` */
export const KEY_MARKER_RULES = defineRules([Rules.positional(true), Rules.labeled('name', true)]);

/** @Req(path?) and @RequestKeyPath(path?) */
export const PATH_MARKER_RULES = defineRules([Rules.positional(true)]);

export const NO_ARGUMENT_MARKER_RULES = defineRules([]);
