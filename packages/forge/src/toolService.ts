import { log, logError, logWarn, normalizeToolName, type ForgeConfig } from '@toolsmith/common';
import { DebugLoopController } from './debug/debugController';
import { InvalidToolNameError, ToolNotFoundError, toStatusMessage } from './errors';
import {
  detectIntent,
  handleIntent,
  type IntentActions,
  type IntentDetection,
  type IntentOutcome,
} from './intent/intentRouter';
import { formatRunToolResult, loadCatalog, runTool } from './invocation/toolRunner';
import { findAndInstallTool, installToolByName, type InstallOutcome } from './library/installer';
import { autoTagTool, generateMetadata } from './library/metadata';
import type { LibraryOperationResult, ToolLibrary } from './library/types';
import { ToolListingCache, type Clock, type ToolListing } from './listing/toolListingCache';
import { LangChainGateway } from './llm/gateway';
import type { Gateway } from './llm/types';
import { FileToolStore } from './store/toolStore';
import { synthesizeCode } from './synthesis/codeSynthesizer';
import { generateSpecification } from './synthesis/specGenerator';
import type { CatalogFunction, DebugResult, RunToolResult, ToolMetadata } from './types';

export interface ToolServiceDeps {
  config: ForgeConfig;
  gateway?: Gateway;
  store?: FileToolStore;
  library?: ToolLibrary | null;
  clock?: Clock;
  /** node_modules directories consulted for dependency versions. */
  searchDirs?: string[];
}

export interface DebugToolOptions {
  maxAttempts?: number;
  signal?: AbortSignal;
}

/**
 * Owns the collaborators of the tool lifecycle and exposes its operations.
 */
export class ToolService implements IntentActions {
  readonly config: ForgeConfig;
  readonly gateway: Gateway;
  readonly store: FileToolStore;
  readonly library: ToolLibrary | null;
  readonly listing: ToolListingCache;
  private readonly debugLoop: DebugLoopController;
  private readonly searchDirs?: string[];

  constructor(deps: ToolServiceDeps) {
    this.config = deps.config;
    this.gateway = deps.gateway ?? new LangChainGateway(deps.config);
    this.store = deps.store ?? new FileToolStore(deps.config.TOOLS_DIR);
    this.library = deps.library ?? null;
    this.listing = new ToolListingCache(
      this.store,
      deps.config.TOOL_LIST_CACHE_TTL_SECONDS * 1000,
      deps.clock
    );
    this.debugLoop = new DebugLoopController({
      gateway: this.gateway,
      store: this.store,
      maxAttempts: deps.config.DEBUG_MAX_ATTEMPTS,
      callTimeoutMs: deps.config.TOOL_CALL_TIMEOUT_MS,
    });
    this.searchDirs = deps.searchDirs;
  }

  hasLibrary(): boolean {
    return this.library !== null;
  }

  /**
   * Specification, code and debug session for a new tool, then metadata and publication. Resolves
   * to a readable outcome on every path.
   */
  async createTool(name: string, details: string): Promise<string> {
    const toolName = normalizeToolName(name);
    if (!toolName) return 'Error creating tool: a tool name is required.';

    try {
      const fromLibrary = await this.installExactMatch(toolName);
      if (fromLibrary) return fromLibrary;

      await generateSpecification(toolName, details, { gateway: this.gateway, store: this.store });

      const synthesis = await synthesizeCode(toolName, {
        gateway: this.gateway,
        store: this.store,
        searchDirs: this.searchDirs,
      });
      if (!synthesis.ok) {
        return `Error creating tool '${toolName}': ${synthesis.error.message}`;
      }

      const debug = await this.debugLoop.run(toolName);
      const metadata = await this.refreshMetadata(toolName);

      let outcome = debug.success
        ? `Tool '${toolName}' created and passed its tests after ${debug.iterations} fix(es).`
        : `Tool '${toolName}' was created, but its tests did not pass (${debug.state}${debug.reason ? `: ${debug.reason}` : ''}).`;

      if (debug.success && this.library) {
        const published = await this.publish(toolName, metadata);
        if (published.success) outcome += '\n\nTool has been uploaded to the library for future use.';
      }
      return outcome;
    } catch (error) {
      const { message } = toStatusMessage(error);
      logError(`[ToolService] createTool ${toolName} failed: ${message}`);
      return `Error creating tool '${toolName}': ${message}`;
    } finally {
      this.listing.invalidate();
    }
  }

  async runTool(name: string, instruction: string): Promise<RunToolResult> {
    const toolName = normalizeToolName(name);
    try {
      return await runTool(toolName, instruction, {
        gateway: this.gateway,
        store: this.store,
        callTimeoutMs: this.config.TOOL_CALL_TIMEOUT_MS,
      });
    } catch (error) {
      const { message } = toStatusMessage(error);
      logError(`[ToolService] runTool ${toolName} failed: ${message}`);
      return { kind: 'failed', tool: toolName, message };
    }
  }

  async runToolText(name: string, instruction: string): Promise<string> {
    return formatRunToolResult(await this.runTool(name, instruction));
  }

  async debugTool(name: string, maxAttempts?: number): Promise<boolean> {
    try {
      const result = await this.debugToolDetailed(name, { maxAttempts });
      return result.success;
    } catch (error) {
      logError(`[ToolService] debugTool ${name} failed: ${toStatusMessage(error).message}`);
      return false;
    }
  }

  /**
   * Rejects with InvalidToolNameError for a name that normalizes to nothing, ToolNotFoundError for
   * an unknown tool and DebugSessionBusyError while another session holds the tool.
   */
  async debugToolDetailed(name: string, options: DebugToolOptions = {}): Promise<DebugResult> {
    const toolName = this.requireName(name);
    if (!(await this.store.exists(toolName))) throw new ToolNotFoundError(toolName);
    const result = await this.debugLoop.run(toolName, options);
    if (result.iterations > 0) await this.refreshMetadata(toolName);
    return result;
  }

  async listTools(forceRefresh = false): Promise<ToolListing[]> {
    return this.listing.list(forceRefresh);
  }

  async getToolFunctions(name: string): Promise<CatalogFunction[]> {
    const toolName = this.requireName(name);
    if (!(await this.store.exists(toolName))) throw new ToolNotFoundError(toolName);
    return loadCatalog(this.store, toolName);
  }

  async searchLibrary(query: string, tags?: string[]): Promise<ToolMetadata[]> {
    return this.library ? this.library.search(query, tags) : [];
  }

  async installToolByName(name: string): Promise<LibraryOperationResult> {
    if (!this.library) return { success: false, message: 'No tool library is configured.' };
    const result = await installToolByName(normalizeToolName(name), { library: this.library, store: this.store });
    this.listing.invalidate();
    return result;
  }

  async findAndInstallTool(query: string, tags?: string[]): Promise<InstallOutcome> {
    if (!this.library) return { message: 'No tool library is configured.', toolName: null };
    const outcome = await findAndInstallTool(query, tags, {
      library: this.library,
      store: this.store,
      gateway: this.gateway,
    });
    this.listing.invalidate();
    return outcome;
  }

  async detectIntent(message: string): Promise<IntentDetection> {
    return detectIntent(message, await this.listing.describe(), this.gateway);
  }

  /** Detects the intent of a chat message and carries it out. */
  async handleMessage(message: string): Promise<IntentOutcome> {
    const detection = await this.detectIntent(message);
    if (!detection.ok) {
      return {
        intentType: 'ERROR',
        toolName: null,
        content: `Error processing your request: ${detection.error}`,
        executionTime: 0,
      };
    }
    return handleIntent(detection.intent, message, this);
  }

  private requireName(name: string): string {
    const toolName = normalizeToolName(name);
    if (!toolName) throw new InvalidToolNameError(name);
    return toolName;
  }

  private async installExactMatch(toolName: string): Promise<string | null> {
    if (!this.library) return null;
    const candidates = await this.library.search(toolName);
    const match = candidates.find((tool) => normalizeToolName(tool.name) === toolName);
    if (!match) return null;
    const installed = await installToolByName(toolName, { library: this.library, store: this.store });
    if (!installed.success) {
      logWarn(`[ToolService] Library copy of ${toolName} unavailable, creating it: ${installed.message}`);
      return null;
    }
    return `Installed tool '${toolName}' from the library: ${match.description}`;
  }

  private async refreshMetadata(toolName: string): Promise<ToolMetadata> {
    const metadata = await generateMetadata(this.store, toolName, { author: this.config.TOOL_AUTHOR });
    metadata.tags = Array.from(new Set([...metadata.tags, ...(await autoTagTool(this.store, toolName))])).sort();
    await this.store.writeMetadata(toolName, metadata);
    return metadata;
  }

  private async publish(toolName: string, metadata: ToolMetadata): Promise<LibraryOperationResult> {
    if (!this.library) return { success: false, message: 'No tool library is configured.' };
    try {
      const result = await this.library.publish(this.store.namespacePath(toolName), metadata);
      log(`[ToolService] Publish ${toolName}: ${result.message}`);
      return result;
    } catch (error) {
      const { message } = toStatusMessage(error);
      logError(`[ToolService] Publish ${toolName} failed: ${message}`);
      return { success: false, message };
    }
  }
}
