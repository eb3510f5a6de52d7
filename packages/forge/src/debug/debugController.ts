import { log, logError } from '@toolsmith/common';
import { DebugSessionBusyError } from '../errors';
import type { Gateway } from '../llm/types';
import type { FileToolStore } from '../store/toolStore';
import type { DebugResult, DebugState, FunctionSignature, TestReport } from '../types';
import { reportPassed, runFunctionTests } from './executionHarness';
import { synthesizeFix } from './fixSynthesizer';
import { introspectModule } from './introspector';
import { KNOWN_ANSWER_RULES, type KnownAnswerRule } from './knownAnswerRules';
import { DEFAULT_CALL_TIMEOUT_MS, type LoadedModule } from './sandbox';
import { synthesizeTestCases } from './testCaseSynthesizer';

export const DEFAULT_MAX_ATTEMPTS = 5;

export interface DebugControllerDeps {
  gateway: Gateway;
  store: FileToolStore;
  maxAttempts?: number;
  callTimeoutMs?: number;
  rules?: readonly KnownAnswerRule[];
}

export interface DebugSessionOptions {
  maxAttempts?: number;
  signal?: AbortSignal;
}

/**
 * Bounded repair loop over a tool's module:
 * ANALYZE -> TEST -> (PASS | FIX -> ANALYZE | EXHAUSTED), with ABORTED on load failure,
 * rejected fix or cancellation. Holds a per-tool lock for the session's duration.
 */
export class DebugLoopController {
  private readonly activeSessions = new Set<string>();
  private readonly gateway: Gateway;
  private readonly store: FileToolStore;
  private readonly maxAttempts: number;
  private readonly callTimeoutMs: number;
  private readonly rules: readonly KnownAnswerRule[];

  constructor(deps: DebugControllerDeps) {
    this.gateway = deps.gateway;
    this.store = deps.store;
    this.maxAttempts = deps.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.callTimeoutMs = deps.callTimeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;
    this.rules = deps.rules ?? KNOWN_ANSWER_RULES;
  }

  isActive(toolName: string): boolean {
    return this.activeSessions.has(this.store.namespacePath(toolName));
  }

  async run(toolName: string, options: DebugSessionOptions = {}): Promise<DebugResult> {
    const key = this.store.namespacePath(toolName);
    if (this.activeSessions.has(key)) {
      throw new DebugSessionBusyError(toolName);
    }
    this.activeSessions.add(key);
    try {
      return await this.session(toolName, options.maxAttempts ?? this.maxAttempts, options.signal);
    } finally {
      this.activeSessions.delete(key);
    }
  }

  private async session(toolName: string, maxAttempts: number, signal?: AbortSignal): Promise<DebugResult> {
    const modulePath = this.store.sourcePath(toolName);
    let state: DebugState = 'ANALYZE';
    let iterations = 0;
    let loaded: LoadedModule | null = null;
    let signatures: FunctionSignature[] = [];
    let report: TestReport | undefined;

    const finish = (
      terminal: DebugResult['state'],
      reason?: string
    ): DebugResult => {
      const success = terminal === 'PASS';
      (success ? log : logError)(
        `[DebugLoop] ${toolName} ended ${terminal} after ${iterations} fix(es)${reason ? `: ${reason}` : ''}`
      );
      return { success, state: terminal, iterations, reason, lastReport: report };
    };

    log(`[DebugLoop] Starting session for ${toolName} (budget ${maxAttempts})`);

    for (;;) {
      if (signal?.aborted) {
        return finish('ABORTED', 'session cancelled');
      }

      switch (state) {
        case 'ANALYZE': {
          const introspection = await introspectModule(modulePath, this.callTimeoutMs);
          if (!introspection.module || introspection.functions.length === 0) {
            return finish(
              'ABORTED',
              introspection.module ? 'module exports no public functions' : 'module failed to load'
            );
          }
          loaded = introspection.module;
          signatures = introspection.functions;
          state = 'TEST';
          break;
        }

        case 'TEST': {
          if (!loaded) return finish('ABORTED', 'no module loaded');
          report = await runFunctionTests(
            loaded,
            signatures,
            (signature) => synthesizeTestCases(signature, this.rules),
            this.callTimeoutMs
          );
          if (reportPassed(report)) {
            state = 'PASS';
          } else if (iterations >= maxAttempts) {
            state = 'EXHAUSTED';
          } else {
            state = 'FIX';
          }
          log(`[DebugLoop] ${toolName} iteration ${iterations}: ${state}`);
          break;
        }

        case 'FIX': {
          if (!loaded || !report) return finish('ABORTED', 'no test report to fix');
          const [summary, catalog] = await Promise.all([
            this.store.readDocument(toolName, 'summary'),
            this.store.readDocument(toolName, 'functions'),
          ]);
          const fix = await synthesizeFix(
            {
              toolName,
              source: loaded.source,
              report,
              summary: summary ?? '',
              catalog: catalog ?? '',
            },
            this.gateway
          );
          if (!fix.ok) {
            return finish('ABORTED', fix.error.message);
          }
          await this.store.writeSource(toolName, fix.source);
          iterations += 1;
          state = 'ANALYZE';
          break;
        }

        case 'PASS':
          return finish('PASS');

        case 'EXHAUSTED':
          return finish('EXHAUSTED', `tests still failing after ${iterations} fix(es)`);
      }
    }
  }
}
