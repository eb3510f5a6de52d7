import { describe, expect, it } from 'vitest';
import { knownAnswerCases, LONG_STRING, synthesizeTestCases } from '../debug/testCaseSynthesizer';
import type { FunctionSignature, ParameterSignature, TypeTag } from '../types';

const param = (name: string, type: TypeTag, extra: Partial<ParameterSignature> = {}): ParameterSignature => ({
  name,
  type,
  declaredType: type,
  hasDefault: false,
  ...extra,
});

const signature = (name: string, parameters: ParameterSignature[]): FunctionSignature => ({
  name,
  parameters,
  returnType: 'unknown',
});

describe('synthesizeTestCases', () => {
  it('should order the basic case, numeric edges, then known answers', () => {
    const cases = synthesizeTestCases(signature('add', [param('a', 'float'), param('b', 'float')]));

    expect(cases.map((testCase) => testCase.label)).toEqual([
      'basic',
      'a = 0',
      'a = -1',
      'a = 1000000',
      'b = 0',
      'b = -1',
      'b = 1000000',
      'known answer add(5, 3)',
      'known answer add(-1, 1)',
    ]);
    expect(cases[0].args).toEqual({ a: 1, b: 1 });
    expect(cases[2].args).toEqual({ a: -1, b: 1 });
    expect(cases[7]).toEqual({ label: 'known answer add(5, 3)', args: { a: 5, b: 3 }, expected: 8 });
  });

  it('should derive string, list and mapping edges from the basic case', () => {
    const cases = synthesizeTestCases(
      signature('describe', [param('title', 'string'), param('items', 'list'), param('options', 'mapping')])
    );

    expect(cases.map((testCase) => testCase.label)).toEqual([
      'basic',
      'title empty string',
      'title long string',
      'items empty list',
      'items small list',
      'options empty mapping',
      'options small mapping',
    ]);
    expect(cases[0].args).toEqual({ title: 'test_title', items: [], options: {} });
    expect(cases[2].args).toEqual({ title: LONG_STRING, items: [], options: {} });
    expect(cases[4].args).toEqual({ title: 'test_title', items: [1, 2, 3], options: {} });
    expect(cases[6].args).toEqual({ title: 'test_title', items: [], options: { a: 1, b: 2 } });
  });

  it('should use literal defaults in the basic case', () => {
    const cases = synthesizeTestCases(
      signature('repeat', [param('word', 'string'), param('times', 'integer', { hasDefault: true, defaultValue: 2 })])
    );
    expect(cases[0].args).toEqual({ word: 'test_word', times: 2 });
  });

  it('should pass null for untyped parameters and add no edges for them', () => {
    const cases = synthesizeTestCases(signature('inspect', [param('value', 'unknown'), param('flag', 'boolean')]));
    expect(cases).toEqual([{ label: 'basic', args: { value: null, flag: true } }]);
  });

  it('should give independent argument objects to every case', () => {
    const cases = synthesizeTestCases(signature('merge', [param('items', 'list')]));
    expect(cases[0].args.items).not.toBe(cases[1].args.items);
  });

  it('should bind a rule positionally when parameter names differ', () => {
    const cases = knownAnswerCases(signature('multiplyValues', [param('x', 'float'), param('y', 'float')]));
    expect(cases).toEqual([
      { label: 'known answer multiplyValues(5, 3)', args: { x: 5, y: 3 }, expected: 15 },
      { label: 'known answer multiplyValues(-2, 3)', args: { x: -2, y: 3 }, expected: -6 },
    ]);
  });

  it('should bind a rule by name when the signature has the assumed names', () => {
    const cases = knownAnswerCases(
      signature('calculate', [param('op', 'string'), param('b', 'float'), param('a', 'float')])
    );
    expect(cases[0]).toEqual({ label: 'known answer calculate(5, 3)', args: { a: 5, b: 3 }, expected: 8 });
  });

  it('should skip a rule the signature cannot take', () => {
    expect(knownAnswerCases(signature('sumAll', [param('values', 'list')]))).toEqual([]);
  });

  it('should leave the expectation off a case that only records its outcome', () => {
    const cases = knownAnswerCases(signature('divide', [param('a', 'float'), param('b', 'float')]));
    expect(cases[2]).toEqual({ label: 'known answer divide(1, 0)', args: { a: 1, b: 0 } });
    expect('expected' in cases[2]).toBe(false);
  });

  it('should add nothing for functions no rule names', () => {
    expect(knownAnswerCases(signature('greet', [param('a', 'string'), param('b', 'string')]))).toEqual([]);
  });
});
