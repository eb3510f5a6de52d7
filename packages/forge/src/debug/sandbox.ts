/**
 * Isolated loading and invocation of generated tool modules.
 */

import fs from 'fs-extra';
import { createRequire } from 'module';
import path from 'path';
import vm from 'vm';
import { log, logError, withTimeout } from '@toolsmith/common';
import { ModuleLoadError } from '../errors';
import { extractErrorMessage } from '../utils';

export const DEFAULT_CALL_TIMEOUT_MS = 5000;

export interface LoadedModule {
  path: string;
  source: string;
  exports: unknown;
  context: vm.Context;
}

export type ToolFunction = (...args: unknown[]) => unknown;

export const isToolFunction = (value: unknown): value is ToolFunction => typeof value === 'function';

interface ModuleRecord {
  exports: unknown;
}

const CALL_SLOT = '__toolsmithCall';
const CALL_SCRIPT = new vm.Script(`${CALL_SLOT}.fn.apply(null, ${CALL_SLOT}.args)`, {
  filename: 'toolsmith-harness.js',
});

/**
 * Create a sandboxed context for a tool module. Console output is routed to the host logger and
 * `require` resolves relative to the module's own directory.
 */
export function createToolContext(modulePath: string): { context: vm.Context; module: ModuleRecord } {
  const moduleRecord: ModuleRecord = { exports: {} };
  const hostRequire = createRequire(modulePath);

  const sandbox = {
    console: {
      log: (...args: unknown[]) => log('[Tool Output]', ...args),
      info: (...args: unknown[]) => log('[Tool Info]', ...args),
      warn: (...args: unknown[]) => log('[Tool Warning]', ...args),
      error: (...args: unknown[]) => logError('[Tool Error]', ...args),
      debug: (...args: unknown[]) => log('[Tool Debug]', ...args),
    },
    module: moduleRecord,
    exports: moduleRecord.exports,
    require: (specifier: string): unknown => hostRequire(specifier),
    __filename: modulePath,
    __dirname: path.dirname(modulePath),
    process: { env: {}, argv: [], platform: process.platform },
    Buffer,
    URL,
    URLSearchParams,
    TextEncoder,
    TextDecoder,
    setTimeout,
    clearTimeout,
    setInterval,
    clearInterval,
    setImmediate,
    clearImmediate,
  };

  return { context: vm.createContext(sandbox), module: moduleRecord };
}

/**
 * Reads and evaluates a module in a fresh context. Top-level code runs under the synchronous timeout.
 */
export async function loadModule(
  modulePath: string,
  timeoutMs: number = DEFAULT_CALL_TIMEOUT_MS
): Promise<LoadedModule> {
  const resolved = path.resolve(modulePath);
  let source: string;
  try {
    source = await fs.readFile(resolved, 'utf8');
  } catch (error) {
    throw new ModuleLoadError(resolved, extractErrorMessage(error));
  }

  const { context, module } = createToolContext(resolved);
  try {
    const script = new vm.Script(source, { filename: resolved });
    script.runInContext(context, { timeout: timeoutMs });
  } catch (error) {
    throw new ModuleLoadError(resolved, extractErrorMessage(error));
  }

  return { path: resolved, source, exports: module.exports, context };
}

const isThenable = (value: unknown): value is PromiseLike<unknown> => {
  if ((typeof value !== 'object' && typeof value !== 'function') || value === null) return false;
  return typeof Reflect.get(value, 'then') === 'function';
};

/**
 * Calls an exported function inside its own context. Synchronous work is cut off by the vm timeout,
 * a returned promise by a timer of the same length.
 */
export async function invokeInContext(
  loaded: LoadedModule,
  fn: ToolFunction,
  args: unknown[],
  timeoutMs: number = DEFAULT_CALL_TIMEOUT_MS
): Promise<unknown> {
  loaded.context[CALL_SLOT] = { fn, args };
  let result: unknown;
  try {
    result = CALL_SCRIPT.runInContext(loaded.context, { timeout: timeoutMs });
  } finally {
    delete loaded.context[CALL_SLOT];
  }

  if (isThenable(result)) {
    return withTimeout(Promise.resolve(result), timeoutMs, `${fn.name || 'tool function'} call`);
  }
  return result;
}
