import { log, logError } from '@toolsmith/common';
import type { Gateway } from '../llm/types';
import type { TypeTag } from '../types';
import { extractErrorMessage, parseJsonObject } from '../utils';

export type ArgumentLookup = { found: true; value: unknown } | { found: false };

export interface ArgumentRequest {
  instruction: string;
  parameter: string;
  functionName: string;
}

export interface ArgumentStage {
  resolve(request: ArgumentRequest): Promise<ArgumentLookup>;
}

const MISSING: ArgumentLookup = { found: false };

const escapeRegExp = (text: string) => text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * The value shapes tried for a parameter, in order. Each captures the value in group 1.
 */
export function argumentPatterns(parameter: string): RegExp[] {
  const p = escapeRegExp(parameter.toLowerCase());
  return [
    new RegExp(`\\b${p}\\s*[:=]\\s*"([^"]+)"`),
    new RegExp(`\\b${p}\\s*[:=]\\s*'([^']+)'`),
    new RegExp(`\\b${p}\\s*[:=]\\s*(\\w+)`),
    new RegExp(`\\b${p}\\s+(?:is|as|of|for|to)\\s+([^,.]+)`),
    new RegExp(`(?:use|with|set)\\s+${p}\\s+(?:as|to|of)\\s+([^,.]+)`),
    new RegExp(`([^,.]+?)\\s+(?:for|as)\\s+(?:the\\s+)?${p}\\b`),
  ];
}

/**
 * Pure pattern matching against the lowercased instruction.
 */
export class PatternArgumentStage implements ArgumentStage {
  match(instruction: string, parameter: string): string | undefined {
    const lowered = instruction.toLowerCase();
    for (const pattern of argumentPatterns(parameter)) {
      const value = lowered.match(pattern)?.[1]?.trim();
      if (value) return value;
    }
    return undefined;
  }

  async resolve({ instruction, parameter }: ArgumentRequest): Promise<ArgumentLookup> {
    const value = this.match(instruction, parameter);
    return value === undefined ? MISSING : { found: true, value };
  }
}

/**
 * Asks the gateway for one parameter's value as {"value": ...}. Null, unparseable replies and
 * transport failures all leave the value missing.
 */
export class GatewayArgumentStage implements ArgumentStage {
  constructor(private readonly gateway: Gateway) {}

  async resolve({ instruction, parameter, functionName }: ArgumentRequest): Promise<ArgumentLookup> {
    let response: string;
    try {
      response = await this.gateway.complete(
        [
          {
            role: 'user',
            content: [
              `Instruction: ${instruction}`,
              '',
              `Extract the value of the parameter "${parameter}" for the function ${functionName}.`,
              'Answer with JSON only: {"value": <the value>}, or {"value": null} when the instruction does not give it.',
            ].join('\n'),
          },
        ],
        {
          component: 'argument_extractor',
          systemInstructions: 'You extract function arguments from instructions. Never guess a value.',
        }
      );
    } catch (error) {
      logError(`[ArgumentExtractor] ${parameter}: ${extractErrorMessage(error)}`);
      return MISSING;
    }

    const parsed = parseJsonObject(response);
    if (!parsed || !('value' in parsed) || parsed.value === null || parsed.value === undefined) {
      return MISSING;
    }
    return { found: true, value: parsed.value };
  }
}

export interface ArgumentParameter {
  name: string;
  /** Optional parameters go through every stage but are never reported missing. */
  optional?: boolean;
  type?: TypeTag;
}

export interface ExtractedArguments {
  values: Record<string, unknown>;
  missing: string[];
}

/**
 * Converts pattern-matched text to the parameter's declared type. Untyped values that read as a
 * number or boolean are converted too.
 */
export function coerceArgument(value: unknown, type: TypeTag = 'unknown'): unknown {
  if (typeof value !== 'string') return value;
  const text = value.trim();
  switch (type) {
    case 'string':
      return value;
    case 'integer':
    case 'float': {
      const parsed = Number(text);
      return text !== '' && !Number.isNaN(parsed) ? parsed : value;
    }
    case 'boolean':
      if (/^(true|yes|on)$/i.test(text)) return true;
      if (/^(false|no|off)$/i.test(text)) return false;
      return value;
    case 'list':
    case 'mapping':
      try {
        const parsed: unknown = JSON.parse(text);
        return parsed;
      } catch {
        return value;
      }
    case 'unknown':
      if (/^-?\d+(\.\d+)?$/.test(text)) return Number(text);
      if (text === 'true' || text === 'false') return text === 'true';
      return value;
  }
}

export interface ExtractionStages {
  pattern?: PatternArgumentStage;
  fallback?: ArgumentStage;
}

/**
 * Resolves every parameter independently: patterns first, then the fallback stage. An optional
 * parameter no stage resolves is left out so its default applies. The caller must not invoke
 * anything while `missing` is non-empty.
 */
export async function extractArguments(
  instruction: string,
  parameters: ArgumentParameter[],
  functionName: string,
  { pattern = new PatternArgumentStage(), fallback }: ExtractionStages = {}
): Promise<ExtractedArguments> {
  const values: Record<string, unknown> = {};
  const missing: string[] = [];

  for (const parameter of parameters) {
    const request = { instruction, parameter: parameter.name, functionName };
    let lookup = await pattern.resolve(request);
    if (!lookup.found && fallback) {
      lookup = await fallback.resolve(request);
    }
    if (lookup.found) {
      values[parameter.name] = coerceArgument(lookup.value, parameter.type);
    } else if (!parameter.optional) {
      missing.push(parameter.name);
    }
  }

  log(
    `[ArgumentExtractor] ${functionName}: resolved ${Object.keys(values).join(', ') || 'nothing'}${missing.length ? `, missing ${missing.join(', ')}` : ''}`
  );
  return { values, missing };
}
