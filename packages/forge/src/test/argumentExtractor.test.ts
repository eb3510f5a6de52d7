import { describe, expect, it } from 'vitest';
import {
  coerceArgument,
  extractArguments,
  GatewayArgumentStage,
  PatternArgumentStage,
} from '../invocation/argumentExtractor';
import { ScriptedGateway } from './helpers';

describe('PatternArgumentStage', () => {
  const stage = new PatternArgumentStage();

  it.each([
    ['convert amount=100 to euros', 'amount', '100'],
    ['greet name: "Ada Lovelace"', 'name', 'ada lovelace'],
    ["greet name='Bob'", 'name', 'bob'],
    ['the city is Paris, please', 'city', 'paris'],
    ['set celsius to 25', 'celsius', '25'],
    ['use unit as kelvin', 'unit', 'kelvin'],
  ])('should read %s', (instruction, parameter, expected) => {
    expect(stage.match(instruction, parameter)).toBe(expected);
  });

  it('should only match the parameter as a whole word', () => {
    expect(stage.match('userid=7, id=3', 'id')).toBe('3');
  });

  it('should report no match', () => {
    expect(stage.match('what is the weather', 'city')).toBeUndefined();
  });
});

describe('extractArguments', () => {
  it('should coerce pattern matches by declared type', async () => {
    const result = await extractArguments(
      'add a=2, b=4',
      [
        { name: 'a', type: 'integer' },
        { name: 'b', type: 'float' },
      ],
      'add'
    );
    expect(result).toEqual({ values: { a: 2, b: 4 }, missing: [] });
  });

  it('should ask the fallback stage for required parameters the patterns miss', async () => {
    const gateway = new ScriptedGateway().on('argument_extractor', '{"value": "Paris"}');
    const result = await extractArguments('what is the weather in Paris', [{ name: 'city' }], 'lookup', {
      fallback: new GatewayArgumentStage(gateway),
    });

    expect(result).toEqual({ values: { city: 'Paris' }, missing: [] });
    expect(gateway.calls[0].messages[0].content).toContain('Extract the value of the parameter "city" for the function lookup.');
  });

  it('should report a parameter missing when the fallback has no value', async () => {
    const gateway = new ScriptedGateway().on('argument_extractor', '{"value": null}');
    const result = await extractArguments('add a=2', [{ name: 'a' }, { name: 'b' }], 'add', {
      fallback: new GatewayArgumentStage(gateway),
    });

    expect(result).toEqual({ values: { a: 2 }, missing: ['b'] });
    expect(gateway.calls).toHaveLength(1);
  });

  it('should treat an unreachable fallback as a missing value', async () => {
    const result = await extractArguments('hello', [{ name: 'city' }], 'lookup', {
      fallback: new GatewayArgumentStage(new ScriptedGateway()),
    });
    expect(result).toEqual({ values: {}, missing: ['city'] });
  });

  it('should ask the fallback for optional parameters and keep what it finds', async () => {
    const gateway = new ScriptedGateway().on('argument_extractor', '{"value": 5}');
    const result = await extractArguments(
      'repeat word=ha five times',
      [{ name: 'word' }, { name: 'times', optional: true, type: 'integer' }],
      'repeat',
      { fallback: new GatewayArgumentStage(gateway) }
    );

    expect(result).toEqual({ values: { word: 'ha', times: 5 }, missing: [] });
    expect(gateway.calls).toHaveLength(1);
    expect(gateway.calls[0].messages[0].content).toContain('Extract the value of the parameter "times" for the function repeat.');
  });

  it('should never report optional parameters missing', async () => {
    const gateway = new ScriptedGateway().on('argument_extractor', '{"value": null}');
    const result = await extractArguments('repeat word=ha', [{ name: 'word' }, { name: 'times', optional: true }], 'repeat', {
      fallback: new GatewayArgumentStage(gateway),
    });

    expect(result).toEqual({ values: { word: 'ha' }, missing: [] });
    expect(gateway.calls).toHaveLength(1);
  });
});

describe('coerceArgument', () => {
  it.each([
    ['yes', 'boolean', true],
    ['off', 'boolean', false],
    ['[1, 2]', 'list', [1, 2]],
    ['{"a": 1}', 'mapping', { a: 1 }],
    ['abc', 'integer', 'abc'],
    ['42', 'string', '42'],
    ['-3.5', 'unknown', -3.5],
    ['false', 'unknown', false],
    ['not json', 'list', 'not json'],
  ] as const)('should coerce %s as %s', (value, type, expected) => {
    expect(coerceArgument(value, type)).toEqual(expected);
  });

  it('should pass non-string values through', () => {
    expect(coerceArgument(7, 'string')).toBe(7);
  });
});
