import path from 'path';
import type { ForgeConfig } from '@toolsmith/common';
import type { ToolLibrary } from '@toolsmith/forge';
import { GitHubToolLibrary, type FetchLike } from './githubLibrary';
import type { Clock } from './indexCache';
import { LocalToolLibrary } from './localLibrary';

export interface LibraryFactoryOverrides {
  fetch?: FetchLike;
  clock?: Clock;
}

/**
 * The library selected by TOOL_LIBRARY, or null when none is configured.
 */
export function createLibrary(config: ForgeConfig, overrides: LibraryFactoryOverrides = {}): ToolLibrary | null {
  switch (config.TOOL_LIBRARY) {
    case 'none':
      return null;
    case 'local':
      return new LocalToolLibrary(path.resolve(config.TOOL_LIBRARY_DIR));
    case 'github':
      if (!config.GITHUB_LIBRARY_OWNER || !config.GITHUB_LIBRARY_REPO) {
        throw new Error('GITHUB_LIBRARY_OWNER and GITHUB_LIBRARY_REPO are required when TOOL_LIBRARY=github');
      }
      return new GitHubToolLibrary({
        owner: config.GITHUB_LIBRARY_OWNER,
        repo: config.GITHUB_LIBRARY_REPO,
        token: config.GITHUB_TOKEN || undefined,
        apiUrl: config.GITHUB_API_URL,
        cacheTtlMs: config.GITHUB_CACHE_TTL_SECONDS * 1000,
        fetch: overrides.fetch,
        clock: overrides.clock,
      });
  }
}
