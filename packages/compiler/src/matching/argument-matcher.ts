/**
 * Argument Matcher
 *
 * Assigns call arguments to an ordered list of rules in a single left-to-right
 * pass. A rule consumes the argument at the cursor when the labels agree (an
 * unlabeled rule only takes unlabeled arguments); a variadic rule then keeps
 * taking the unlabeled arguments that follow. There is no backtracking.
 */

import type {
  ArgumentBucket,
  ArgumentMatchError,
  ArgumentMatchResult,
  CallArgument,
  ParsingRule,
} from '../types.js';

export const Rules = {
  labeled(label: string, isSkippable = false): ParsingRule {
    return { label, isVariadic: false, isSkippable };
  },
  labeledVariadic(label: string, isSkippable = false): ParsingRule {
    return { label, isVariadic: true, isSkippable };
  },
  positional(isSkippable = false): ParsingRule {
    return { isVariadic: false, isSkippable };
  },
  variadic(isSkippable = false): ParsingRule {
    return { isVariadic: true, isSkippable };
  },
};

/**
 * Freeze a rule table after checking it can be matched without backtracking.
 * A variadic rule followed by an unlabeled rule would swallow that rule's
 * argument, so such a table is a programming error.
 */
export function defineRules(rules: ParsingRule[]): readonly ParsingRule[] {
  rules.forEach((rule, index) => {
    const next = rules[index + 1];
    if (rule.isVariadic && next && next.label === undefined) {
      throw new Error(`Ambiguous rule table: variadic rule ${index} is followed by an unlabeled rule`);
    }
  });
  return Object.freeze(rules.map((rule) => Object.freeze({ ...rule })));
}

export function matchArguments<E>(
  rules: readonly ParsingRule[],
  args: readonly CallArgument<E>[]
): ArgumentMatchResult<E> {
  const buckets: ArgumentBucket<E>[] = [];
  let cursor = 0;

  for (const [ruleIndex, rule] of rules.entries()) {
    const bucket: ArgumentBucket<E> = [];
    buckets.push(bucket);

    const current = args[cursor];
    if (!current || current.label !== rule.label) {
      if (rule.isSkippable) continue;
      return { ok: false, error: { kind: 'argument-mismatch', ruleIndex, argumentIndex: cursor, rule } };
    }

    bucket.push(current);
    cursor += 1;
    if (!rule.isVariadic) continue;

    let next = args[cursor];
    while (next && next.label === undefined) {
      bucket.push(next);
      cursor += 1;
      next = args[cursor];
    }
  }

  if (cursor < args.length) {
    return { ok: false, error: { kind: 'extra-arguments', argumentIndex: cursor } };
  }

  return { ok: true, buckets };
}

function describeRule(rule: ParsingRule): string {
  const what = rule.label === undefined ? 'an unlabeled argument' : `"${rule.label}"`;
  return rule.isVariadic ? `${what} (variadic)` : what;
}

/** Labels in the order a rule table accepts them, e.g. `method, path, middleware, body` */
export function labelOrder(rules: readonly ParsingRule[]): string {
  return rules.flatMap((rule) => (rule.label === undefined ? [] : [rule.label])).join(', ');
}

export function formatArgumentMatchError(error: ArgumentMatchError): string {
  switch (error.kind) {
    case 'argument-mismatch':
      return `Expected ${describeRule(error.rule)} for rule ${error.ruleIndex} at argument ${error.argumentIndex}`;
    case 'extra-arguments':
      return `Unexpected extra arguments starting at argument ${error.argumentIndex}`;
  }
}
