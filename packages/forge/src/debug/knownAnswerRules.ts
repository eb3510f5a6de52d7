/**
 * Known-answer cases keyed on function-name prefixes. Each rule states the parameter names its
 * answers were written for.
 */

export interface KnownAnswerCase {
  values: unknown[];
  /** Absent for cases whose outcome is recorded but not asserted. */
  expected?: unknown;
}

export interface KnownAnswerRule {
  prefixes: string[];
  assumedParameters: string[];
  cases: KnownAnswerCase[];
}

export const KNOWN_ANSWER_RULES: readonly KnownAnswerRule[] = [
  {
    prefixes: ['add', 'sum', 'calculate'],
    assumedParameters: ['a', 'b'],
    cases: [
      { values: [5, 3], expected: 8 },
      { values: [-1, 1], expected: 0 },
    ],
  },
  {
    prefixes: ['subtract', 'minus'],
    assumedParameters: ['a', 'b'],
    cases: [
      { values: [5, 3], expected: 2 },
      { values: [3, 5], expected: -2 },
    ],
  },
  {
    prefixes: ['multiply', 'times'],
    assumedParameters: ['a', 'b'],
    cases: [
      { values: [5, 3], expected: 15 },
      { values: [-2, 3], expected: -6 },
    ],
  },
  {
    prefixes: ['divide', 'div'],
    assumedParameters: ['a', 'b'],
    cases: [
      { values: [6, 3], expected: 2 },
      { values: [5, 2], expected: 2.5 },
      { values: [1, 0] },
    ],
  },
];

export function findRule(
  functionName: string,
  rules: readonly KnownAnswerRule[] = KNOWN_ANSWER_RULES
): KnownAnswerRule | undefined {
  const lowered = functionName.toLowerCase();
  return rules.find((rule) => rule.prefixes.some((prefix) => lowered.startsWith(prefix)));
}
