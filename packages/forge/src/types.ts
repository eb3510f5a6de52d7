/**
 * Shared types for the tool lifecycle: documents, signatures, test reports and run results.
 */

export type DocumentName = 'documentation' | 'functions' | 'summary';

export interface ToolDocuments {
  documentation: string;
  functions: string;
  summary: string;
}

export type TypeTag = 'string' | 'integer' | 'float' | 'boolean' | 'list' | 'mapping' | 'unknown';

export interface ParameterSignature {
  name: string;
  type: TypeTag;
  /** Declared type text as written in the JSDoc block, or 'any'. */
  declaredType: string;
  hasDefault: boolean;
  /** Literal default value; undefined when the default is an expression. */
  defaultValue?: unknown;
}

export interface FunctionSignature {
  name: string;
  parameters: ParameterSignature[];
  returnType: TypeTag;
}

export interface TestCase {
  label: string;
  args: Record<string, unknown>;
  expected?: unknown;
}

interface CaseBase {
  label: string;
  args: Record<string, unknown>;
}

export interface PassedCase extends CaseBase {
  success: true;
  result: string;
  elapsedMs: number;
  matchesExpected?: true;
}

export interface RaisedCase extends CaseBase {
  success: false;
  errorKind: string;
  errorMessage: string;
  trace: string;
}

export interface MismatchedCase extends CaseBase {
  success: false;
  result: string;
  expected: string;
  elapsedMs: number;
  matchesExpected: false;
}

export type TestCaseResult = PassedCase | RaisedCase | MismatchedCase;

export interface FunctionTestOutcome {
  success: boolean;
  cases: TestCaseResult[];
  /** First failure, summarized. */
  error?: string;
}

export type TestReport = Record<string, FunctionTestOutcome>;

export type DebugState = 'ANALYZE' | 'TEST' | 'FIX' | 'PASS' | 'EXHAUSTED' | 'ABORTED';

export interface DebugResult {
  success: boolean;
  state: 'PASS' | 'EXHAUSTED' | 'ABORTED';
  /** Number of fixes applied during the session. */
  iterations: number;
  reason?: string;
  lastReport?: TestReport;
}

export interface CatalogFunction {
  name: string;
  description: string;
  parameters: string[];
}

export interface ToolMetadata {
  name: string;
  description: string;
  version: string;
  author: string;
  tags: string[];
  createdAt: string;
  updatedAt: string;
  functions: CatalogFunction[];
}

export type RunToolResult =
  | { kind: 'completed'; tool: string; functionName: string; args: unknown[]; result: string }
  | { kind: 'not-found'; tool: string }
  | { kind: 'no-function'; tool: string; catalog: CatalogFunction[] }
  | { kind: 'missing-arguments'; tool: string; functionName: string; missing: string[] }
  | { kind: 'not-implemented'; tool: string; functionName: string }
  | { kind: 'failed'; tool: string; message: string; functionName?: string; trace?: string };
