import { isEqual } from 'lodash';
import { performance } from 'perf_hooks';
import type {
  FunctionSignature,
  FunctionTestOutcome,
  TestCase,
  TestCaseResult,
  TestReport,
} from '../types';
import { describeError } from '../utils';
import { exportedFunctions } from './introspector';
import { DEFAULT_CALL_TIMEOUT_MS, invokeInContext, type LoadedModule, type ToolFunction } from './sandbox';

export type TestCaseProvider = (signature: FunctionSignature) => TestCase[];

/**
 * `String` for primitives, JSON for objects and arrays.
 */
export function stringifyResult(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'function') return `[Function ${value.name || 'anonymous'}]`;
  if (typeof value !== 'object' || value === null) return String(value);
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

const safeEqual = (actual: unknown, expected: unknown): boolean => {
  try {
    return isEqual(actual, expected);
  } catch {
    return false;
  }
};

const argumentError = (testCase: TestCase, message: string): TestCaseResult => ({
  label: testCase.label,
  args: testCase.args,
  success: false,
  errorKind: 'TypeError',
  errorMessage: message,
  trace: `TypeError: ${message}`,
});

/**
 * Positional arguments in signature order, or the message of the argument error the call would hit.
 */
export function bindArguments(
  signature: FunctionSignature,
  args: Record<string, unknown>
): { ok: true; values: unknown[] } | { ok: false; message: string } {
  const names = signature.parameters.map((param) => param.name);
  const unknown = Object.keys(args).find((key) => !names.includes(key));
  if (unknown !== undefined) {
    return { ok: false, message: `${signature.name}() got an unexpected argument '${unknown}'` };
  }
  const missing = signature.parameters.find((param) => !(param.name in args) && !param.hasDefault);
  if (missing) {
    return { ok: false, message: `${signature.name}() missing required argument '${missing.name}'` };
  }
  return { ok: true, values: signature.parameters.map((param) => args[param.name]) };
}

export async function runTestCase(
  loaded: LoadedModule,
  fn: ToolFunction,
  signature: FunctionSignature,
  testCase: TestCase,
  timeoutMs: number = DEFAULT_CALL_TIMEOUT_MS
): Promise<TestCaseResult> {
  const bound = bindArguments(signature, testCase.args);
  if (!bound.ok) return argumentError(testCase, bound.message);

  const started = performance.now();
  let result: unknown;
  try {
    result = await invokeInContext(loaded, fn, bound.values, timeoutMs);
  } catch (error) {
    const { kind, message, trace } = describeError(error);
    return {
      label: testCase.label,
      args: testCase.args,
      success: false,
      errorKind: kind,
      errorMessage: message,
      trace,
    };
  }
  const elapsedMs = Math.round((performance.now() - started) * 1000) / 1000;

  if (!('expected' in testCase)) {
    return { label: testCase.label, args: testCase.args, success: true, result: stringifyResult(result), elapsedMs };
  }
  if (safeEqual(result, testCase.expected)) {
    return {
      label: testCase.label,
      args: testCase.args,
      success: true,
      result: stringifyResult(result),
      elapsedMs,
      matchesExpected: true,
    };
  }
  return {
    label: testCase.label,
    args: testCase.args,
    success: false,
    result: stringifyResult(result),
    expected: stringifyResult(testCase.expected),
    elapsedMs,
    matchesExpected: false,
  };
}

export function summarizeFailure(result: TestCaseResult): string | undefined {
  if (result.success) return undefined;
  if ('errorKind' in result) return `${result.errorKind}: ${result.errorMessage}`;
  return `returned ${result.result}, expected ${result.expected}`;
}

/**
 * Runs every case of every function. Failures are recorded, never thrown, and no case is dropped.
 */
export async function runFunctionTests(
  loaded: LoadedModule,
  signatures: FunctionSignature[],
  testCasesFor: TestCaseProvider,
  timeoutMs: number = DEFAULT_CALL_TIMEOUT_MS
): Promise<TestReport> {
  const functions = new Map(exportedFunctions(loaded.exports));
  const report: TestReport = {};

  for (const signature of signatures) {
    const fn = functions.get(signature.name);
    const cases: TestCaseResult[] = [];
    for (const testCase of testCasesFor(signature)) {
      cases.push(
        fn
          ? await runTestCase(loaded, fn, signature, testCase, timeoutMs)
          : argumentError(testCase, `${signature.name} is not an exported function`)
      );
    }
    const firstFailure = cases.find((result) => !result.success);
    const outcome: FunctionTestOutcome = { success: firstFailure === undefined, cases };
    if (firstFailure) outcome.error = summarizeFailure(firstFailure);
    report[signature.name] = outcome;
  }

  return report;
}

export const reportPassed = (report: TestReport): boolean =>
  Object.values(report).every((outcome) => outcome.success);
