import { log, logError } from '@toolsmith/common';
import { FixRejectedError } from '../errors';
import type { Gateway } from '../llm/types';
import { extractCode } from '../synthesis/codeExtractor';
import { INVALID_INPUT_RULE } from '../synthesis/codeSynthesizer';
import type { TestCaseResult, TestReport } from '../types';
import { extractErrorMessage } from '../utils';
import { stringifyResult } from './executionHarness';

const FUNCTION_DEFINITION = /\bfunction\b\s*\*?\s*[\w$]*\s*\(|=>/;

export interface FixRequest {
  toolName: string;
  source: string;
  report: TestReport;
  summary: string;
  catalog: string;
}

export type FixResult = { ok: true; source: string } | { ok: false; error: FixRejectedError };

const renderValue = (value: unknown) =>
  typeof value === 'string' ? JSON.stringify(value) : stringifyResult(value);

export function renderCall(name: string, args: Record<string, unknown>): string {
  const rendered = Object.entries(args).map(([key, value]) => `${key}=${renderValue(value)}`);
  return `${name}(${rendered.join(', ')})`;
}

function renderCase(name: string, index: number, result: TestCaseResult): string[] {
  const head = `  Test case ${index + 1}: ${renderCall(name, result.args)}`;
  if ('errorKind' in result) {
    const trace = result.trace
      .split('\n')
      .map((line) => `    ${line}`)
      .join('\n');
    return [`${head} raised ${result.errorKind}: ${result.errorMessage}`, trace];
  }
  if (!result.success) {
    return [`${head} returned ${result.result}, expected ${result.expected}`];
  }
  return [];
}

/**
 * Every failing case of every failing function, with its call shape and error or mismatch.
 */
export function buildFailureDigest(report: TestReport): string {
  const lines: string[] = [];
  for (const [name, outcome] of Object.entries(report)) {
    if (outcome.success) continue;
    lines.push(`Function '${name}' failed:`);
    outcome.cases.forEach((result, index) => {
      if (!result.success) lines.push(...renderCase(name, index, result));
    });
  }
  return lines.join('\n');
}

export const containsFunctionDefinition = (source: string): boolean => FUNCTION_DEFINITION.test(source);

const SYSTEM_INSTRUCTIONS =
  'You repair JavaScript (CommonJS) modules. Return only the complete corrected module source, with no prose.';

/**
 * Asks the gateway for a corrected module. A failed call or a reply without any function
 * definition is a rejected fix; nothing is written here.
 */
export async function synthesizeFix(request: FixRequest, gateway: Gateway): Promise<FixResult> {
  const digest = buildFailureDigest(request.report);
  const prompt = [
    `The module tool.js of the tool "${request.toolName}" fails its tests.`,
    '',
    `Test failures:\n${digest}`,
    '',
    `Current source:\n\`\`\`javascript\n${request.source}\n\`\`\``,
    '',
    `Summary:\n${request.summary}`,
    '',
    `Function catalog:\n${request.catalog}`,
    '',
    'Instructions:',
    '- Fix only what is broken.',
    '- Keep every function name, parameter name and parameter order exactly as they are.',
    '- Keep the documented behavior of every function.',
    '- Add the input handling the failures show is missing.',
    `- ${INVALID_INPUT_RULE}`,
    '- Keep the JSDoc blocks and the module.exports statement.',
    '- Return the complete corrected module.',
  ].join('\n');

  let response: string;
  try {
    response = await gateway.complete([{ role: 'user', content: prompt }], {
      component: 'fix_synthesizer',
      systemInstructions: SYSTEM_INSTRUCTIONS,
    });
  } catch (error) {
    const rejected = new FixRejectedError(request.toolName, extractErrorMessage(error));
    logError(`[FixSynthesizer] ${rejected.message}`);
    return { ok: false, error: rejected };
  }

  const source = extractCode(response);
  if (!containsFunctionDefinition(source)) {
    const rejected = new FixRejectedError(request.toolName, 'the proposed module defines no functions');
    logError(`[FixSynthesizer] ${rejected.message}`);
    return { ok: false, error: rejected };
  }

  log(`[FixSynthesizer] Accepted fix for ${request.toolName} (${source.length} chars)`);
  return { ok: true, source };
}
