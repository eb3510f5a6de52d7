import { cloneDeep } from 'lodash';
import { log } from '@toolsmith/common';
import type { FunctionSignature, ParameterSignature, TestCase } from '../types';
import { findRule, KNOWN_ANSWER_RULES, type KnownAnswerRule } from './knownAnswerRules';

export const LONG_STRING = 'a'.repeat(100);
export const NUMERIC_EDGES = [0, -1, 1000000] as const;

export function representativeValue(param: ParameterSignature): unknown {
  switch (param.type) {
    case 'string':
      return `test_${param.name}`;
    case 'integer':
      return 1;
    case 'float':
      return 1.0;
    case 'boolean':
      return true;
    case 'list':
      return [];
    case 'mapping':
      return {};
    case 'unknown':
      return null;
  }
}

/**
 * Declared literal default when there is one. A default written as an expression is passed as
 * undefined so the function applies it itself.
 */
function basicValue(param: ParameterSignature): unknown {
  if (param.hasDefault) return cloneDeep(param.defaultValue);
  return representativeValue(param);
}

function edgeCases(param: ParameterSignature): Array<{ label: string; value: unknown }> {
  switch (param.type) {
    case 'string':
      return [
        { label: `${param.name} empty string`, value: '' },
        { label: `${param.name} long string`, value: LONG_STRING },
      ];
    case 'integer':
    case 'float':
      return NUMERIC_EDGES.map((value) => ({ label: `${param.name} = ${value}`, value }));
    case 'list':
      return [
        { label: `${param.name} empty list`, value: [] },
        { label: `${param.name} small list`, value: [1, 2, 3] },
      ];
    case 'mapping':
      return [
        { label: `${param.name} empty mapping`, value: {} },
        { label: `${param.name} small mapping`, value: { a: 1, b: 2 } },
      ];
    default:
      return [];
  }
}

/**
 * Binds a rule's values to the signature: by the rule's own parameter names when the signature has
 * them all, positionally when the signature has the same number of parameters under other names.
 * Any other shape skips the rule.
 */
export function knownAnswerCases(
  signature: FunctionSignature,
  rules: readonly KnownAnswerRule[] = KNOWN_ANSWER_RULES
): TestCase[] {
  const rule = findRule(signature.name, rules);
  if (!rule) return [];

  const names = signature.parameters.map((param) => param.name);
  let bound: string[];
  if (rule.assumedParameters.every((name) => names.includes(name))) {
    bound = rule.assumedParameters;
  } else if (names.length === rule.assumedParameters.length) {
    bound = names;
  } else {
    log(
      `[TestCases] Skipping known answers for ${signature.name}: expected parameters ${rule.assumedParameters.join(', ')}, found ${names.join(', ') || 'none'}`
    );
    return [];
  }

  return rule.cases.map((knownCase) => {
    const args: Record<string, unknown> = {};
    bound.forEach((name, i) => {
      args[name] = knownCase.values[i];
    });
    const label = `known answer ${signature.name}(${knownCase.values.map((v) => JSON.stringify(v)).join(', ')})`;
    return 'expected' in knownCase ? { label, args, expected: knownCase.expected } : { label, args };
  });
}

/**
 * Ordered cases for one function: a basic case, per-parameter edge cases derived from it, then
 * known-answer cases chosen by the function name.
 */
export function synthesizeTestCases(
  signature: FunctionSignature,
  rules: readonly KnownAnswerRule[] = KNOWN_ANSWER_RULES
): TestCase[] {
  const basicArgs: Record<string, unknown> = {};
  for (const param of signature.parameters) {
    basicArgs[param.name] = basicValue(param);
  }

  const cases: TestCase[] = [{ label: 'basic', args: basicArgs }];
  for (const param of signature.parameters) {
    for (const edge of edgeCases(param)) {
      cases.push({ label: edge.label, args: { ...cloneDeep(basicArgs), [param.name]: edge.value } });
    }
  }

  return [...cases, ...knownAnswerCases(signature, rules)];
}
