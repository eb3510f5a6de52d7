import { log } from '@toolsmith/common';
import type { FileToolStore } from '../store/toolStore';

export interface ToolListing {
  name: string;
  summary: string | null;
}

export type Clock = () => number;

const copyListing = (entries: ToolListing[]): ToolListing[] => entries.map((entry) => ({ ...entry }));

/**
 * Installed tools with their summaries, cached for a fixed time. Summaries are read concurrently
 * and concurrent callers share one refresh. Callers get copies of the cached entries.
 */
export class ToolListingCache {
  private entries: ToolListing[] | null = null;
  private loadedAt = 0;
  private pending: Promise<ToolListing[]> | null = null;
  /** Bumped by `invalidate`; a load started under an older generation is not cached. */
  private generation = 0;

  constructor(
    private readonly store: FileToolStore,
    private readonly ttlMs: number,
    private readonly clock: Clock = Date.now
  ) {}

  async list(forceRefresh = false): Promise<ToolListing[]> {
    if (!forceRefresh && this.entries && this.clock() - this.loadedAt < this.ttlMs) {
      return copyListing(this.entries);
    }
    if (!this.pending) {
      const pending = this.load(this.generation).finally(() => {
        if (this.pending === pending) this.pending = null;
      });
      this.pending = pending;
    }
    return copyListing(await this.pending);
  }

  invalidate(): void {
    this.generation += 1;
    this.entries = null;
    this.loadedAt = 0;
    this.pending = null;
  }

  /** Numbered listing for prompts. */
  async describe(): Promise<string> {
    const tools = await this.list();
    if (tools.length === 0) return 'No tools are installed.';
    return tools
      .map((tool, i) => `${i + 1}. ${tool.name}:\n${tool.summary ?? 'No summary available.'}`)
      .join('\n---\n');
  }

  private async load(generation: number): Promise<ToolListing[]> {
    const names = await this.store.listTools();
    const entries = await Promise.all(
      names.map(async (name) => {
        const summary = await this.store.readDocument(name, 'summary');
        return { name, summary: summary === null ? null : summary.trim() };
      })
    );
    if (generation !== this.generation) {
      log(`[ToolListing] Discarded a listing loaded before invalidation`);
      return entries;
    }
    this.entries = entries;
    this.loadedAt = this.clock();
    log(`[ToolListing] Loaded ${entries.length} tools`);
    return entries;
  }
}
