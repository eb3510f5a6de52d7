import { log, logError } from '@toolsmith/common';
import { exportedFunctions, introspectModule } from '../debug/introspector';
import { DEFAULT_CALL_TIMEOUT_MS, invokeInContext } from '../debug/sandbox';
import { stringifyResult } from '../debug/executionHarness';
import type { Gateway } from '../llm/types';
import type { FileToolStore } from '../store/toolStore';
import type { CatalogFunction, ParameterSignature, RunToolResult } from '../types';
import { describeError } from '../utils';
import { extractArguments, GatewayArgumentStage, type ArgumentParameter } from './argumentExtractor';
import { formatCatalog, parseCatalog } from './catalogParser';
import { selectFunction } from './functionSelector';

export interface ToolRunnerDeps {
  gateway: Gateway;
  store: FileToolStore;
  callTimeoutMs?: number;
}

/**
 * A tool's function catalog, from metadata.json when it lists functions, else from functions.md.
 */
export async function loadCatalog(store: FileToolStore, toolName: string): Promise<CatalogFunction[]> {
  const metadata = await store.readMetadata(toolName);
  if (metadata && metadata.functions.length > 0) return metadata.functions;
  const catalog = await store.readDocument(toolName, 'functions');
  return catalog === null ? [] : parseCatalog(catalog);
}

function toArgumentParameters(
  selected: CatalogFunction,
  signatureParams: ParameterSignature[] | undefined
): ArgumentParameter[] {
  if (!signatureParams) return selected.parameters.map((name) => ({ name }));
  return signatureParams.map((param) => ({
    name: param.name,
    optional: param.hasDefault,
    type: param.type,
  }));
}

/**
 * Selects a function for the instruction, resolves its arguments, and calls it. Never invokes a
 * function while any required argument is unresolved.
 */
export async function runTool(
  toolName: string,
  instruction: string,
  { gateway, store, callTimeoutMs = DEFAULT_CALL_TIMEOUT_MS }: ToolRunnerDeps
): Promise<RunToolResult> {
  if (!(await store.exists(toolName))) {
    return { kind: 'not-found', tool: toolName };
  }

  const catalog = await loadCatalog(store, toolName);
  const selection = await selectFunction(instruction, catalog, gateway);
  if (!selection) {
    return { kind: 'no-function', tool: toolName, catalog };
  }
  const functionName = selection.function.name;

  const introspection = await introspectModule(store.sourcePath(toolName), callTimeoutMs);
  if (!introspection.module) {
    return { kind: 'failed', tool: toolName, functionName, message: 'tool module failed to load' };
  }
  const fn = new Map(exportedFunctions(introspection.module.exports)).get(functionName);
  if (!fn) {
    return { kind: 'not-implemented', tool: toolName, functionName };
  }

  const signature = introspection.functions.find((candidate) => candidate.name === functionName);
  const parameters = toArgumentParameters(selection.function, signature?.parameters);
  const extracted = await extractArguments(instruction, parameters, functionName, {
    fallback: new GatewayArgumentStage(gateway),
  });
  if (extracted.missing.length > 0) {
    return { kind: 'missing-arguments', tool: toolName, functionName, missing: extracted.missing };
  }

  const args = parameters.map((param) => extracted.values[param.name]);
  try {
    const result = await invokeInContext(introspection.module, fn, args, callTimeoutMs);
    log(`[ToolRunner] ${toolName}.${functionName} completed`);
    return { kind: 'completed', tool: toolName, functionName, args, result: stringifyResult(result) };
  } catch (error) {
    const { kind, message, trace } = describeError(error);
    logError(`[ToolRunner] ${toolName}.${functionName} raised ${kind}: ${message}`);
    return { kind: 'failed', tool: toolName, functionName, message: `${kind}: ${message}`, trace };
  }
}

export function formatRunToolResult(result: RunToolResult): string {
  switch (result.kind) {
    case 'completed':
      return `Result of ${result.functionName}: ${result.result}`;
    case 'not-found':
      return `Tool '${result.tool}' not found. Please check the tool name or install it first.`;
    case 'no-function':
      return result.catalog.length > 0
        ? `Could not determine which function of ${result.tool} to run. Available functions:\n${formatCatalog(result.catalog)}`
        : `Tool ${result.tool} has no documented functions.`;
    case 'missing-arguments':
      return `Cannot run ${result.functionName}: missing values for ${result.missing.join(', ')}.`;
    case 'not-implemented':
      return `Function '${result.functionName}' is defined in the catalog but not implemented in ${result.tool}.`;
    case 'failed':
      return `Error running ${result.functionName ? `${result.functionName} of ` : ''}${result.tool}: ${result.message}`;
  }
}
