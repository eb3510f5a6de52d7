import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import { log, logError, normalizeToolName } from '@toolsmith/common';
import {
  extractErrorMessage,
  LibraryError,
  matchesQuery,
  toolMetadataSchema,
  type LibraryOperationResult,
  type ToolLibrary,
  type ToolMetadata,
} from '@toolsmith/forge';
import { copyFilter } from './localLibrary';
import { TtlCache, type Clock } from './indexCache';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface GitHubLibraryOptions {
  owner: string;
  repo: string;
  token?: string;
  apiUrl?: string;
  /** Directory inside the repository that holds the tool namespaces. */
  toolsPath?: string;
  cacheTtlMs?: number;
  fetch?: FetchLike;
  clock?: Clock;
}

const contentsEntrySchema = z.object({
  name: z.string(),
  path: z.string(),
  type: z.string(),
  sha: z.string().optional(),
});

const contentsListingSchema = z.array(contentsEntrySchema);

const fileContentSchema = z.object({
  path: z.string(),
  sha: z.string().optional(),
  content: z.string(),
  encoding: z.string().optional(),
});

type ContentsEntry = z.infer<typeof contentsEntrySchema>;

const decodeContent = (content: string, encoding?: string) =>
  encoding === 'base64' || encoding === undefined
    ? Buffer.from(content.replace(/\n/g, ''), 'base64')
    : Buffer.from(content, 'utf8');

/**
 * Tool library stored in a GitHub repository, one directory per tool under `tools/`, read and
 * written through the contents API.
 */
export class GitHubToolLibrary implements ToolLibrary {
  readonly kind = 'github';
  private readonly options: Required<Omit<GitHubLibraryOptions, 'token' | 'fetch' | 'clock'>> & {
    token?: string;
  };
  private readonly fetchImpl: FetchLike;
  readonly indexCache: TtlCache<ToolMetadata[]>;

  constructor(options: GitHubLibraryOptions) {
    this.options = {
      owner: options.owner,
      repo: options.repo,
      token: options.token,
      apiUrl: (options.apiUrl ?? 'https://api.github.com').replace(/\/$/, ''),
      toolsPath: options.toolsPath ?? 'tools',
      cacheTtlMs: options.cacheTtlMs ?? 3600 * 1000,
    };
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.indexCache = new TtlCache(this.options.cacheTtlMs, options.clock);
  }

  private contentsUrl(repoPath: string): string {
    const { apiUrl, owner, repo } = this.options;
    const encodedPath = repoPath.split('/').map(encodeURIComponent).join('/');
    return `${apiUrl}/repos/${owner}/${repo}/contents/${encodedPath}`;
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'application/vnd.github.v3+json',
      'User-Agent': 'toolsmith-library',
    };
    if (this.options.token) headers.Authorization = `token ${this.options.token}`;
    return headers;
  }

  /** Parsed JSON body, or null on 404. */
  private async request(url: string, init: RequestInit = {}): Promise<unknown> {
    const response = await this.fetchImpl(url, {
      ...init,
      headers: { ...this.headers(), ...(init.body ? { 'Content-Type': 'application/json' } : {}) },
    });
    if (response.status === 404) return null;
    if (!response.ok) {
      const body = await response.text().catch(() => '');
      throw new LibraryError('GitHub', `HTTP ${response.status}: ${body.slice(0, 200)}`, response.status);
    }
    return response.json();
  }

  private async listDirectory(repoPath: string): Promise<ContentsEntry[] | null> {
    const body = await this.request(this.contentsUrl(repoPath));
    if (body === null) return null;
    const parsed = contentsListingSchema.safeParse(body);
    if (!parsed.success) throw new LibraryError('GitHub', `${repoPath} is not a directory`);
    return parsed.data;
  }

  private async readFile(repoPath: string): Promise<{ content: Buffer; sha?: string } | null> {
    const body = await this.request(this.contentsUrl(repoPath));
    if (body === null) return null;
    const parsed = fileContentSchema.safeParse(body);
    if (!parsed.success) throw new LibraryError('GitHub', `${repoPath} is not a file`);
    return { content: decodeContent(parsed.data.content, parsed.data.encoding), sha: parsed.data.sha };
  }

  async getToolMetadata(toolName: string): Promise<ToolMetadata | null> {
    const file = await this.readFile(`${this.options.toolsPath}/${toolName}/metadata.json`);
    if (!file) return null;
    try {
      const parsed = toolMetadataSchema.safeParse(JSON.parse(file.content.toString('utf8')));
      if (parsed.success) return parsed.data;
      logError(`[GitHubLibrary] Invalid metadata for ${toolName}: ${parsed.error.message}`);
    } catch (error) {
      logError(`[GitHubLibrary] Unreadable metadata for ${toolName}: ${extractErrorMessage(error)}`);
    }
    return null;
  }

  async getToolIndex(): Promise<ToolMetadata[]> {
    const cached = this.indexCache.get();
    if (cached) {
      log('[GitHubLibrary] Using cached tool index');
      return cached;
    }
    const entries = (await this.listDirectory(this.options.toolsPath)) ?? [];
    const directories = entries.filter((entry) => entry.type === 'dir');
    const metadata = await Promise.all(directories.map((entry) => this.getToolMetadata(entry.name)));
    const index = metadata.filter((tool): tool is ToolMetadata => tool !== null);
    this.indexCache.set(index);
    return index;
  }

  async search(query: string, tags?: string[]): Promise<ToolMetadata[]> {
    try {
      const index = await this.getToolIndex();
      return index.filter((tool) => matchesQuery(tool, query, tags));
    } catch (error) {
      logError(`[GitHubLibrary] Error fetching tool index: ${extractErrorMessage(error)}`);
      return [];
    }
  }

  private async downloadDirectory(repoPath: string, targetDir: string): Promise<boolean> {
    const entries = await this.listDirectory(repoPath);
    if (!entries) return false;
    await fs.ensureDir(targetDir);
    for (const entry of entries) {
      const target = path.join(targetDir, entry.name);
      if (entry.type === 'dir') {
        await this.downloadDirectory(entry.path, target);
      } else if (entry.type === 'file') {
        const file = await this.readFile(entry.path);
        if (file) await fs.writeFile(target, file.content);
      }
    }
    return true;
  }

  async fetch(toolName: string, destinationRoot: string): Promise<LibraryOperationResult> {
    const name = normalizeToolName(toolName);
    if (!name) return { success: false, message: `'${toolName}' is not a valid tool name.` };
    const destination = path.join(path.resolve(destinationRoot), name);
    if (await fs.pathExists(destination)) {
      return { success: true, message: `Tool '${name}' is already installed.` };
    }

    const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'toolsmith-'));
    try {
      const found = await this.downloadDirectory(`${this.options.toolsPath}/${name}`, tempDir);
      if (!found) return { success: false, message: `Failed to download tool '${name}'` };
      await fs.move(tempDir, destination);
      log(`[GitHubLibrary] Installed ${name} into ${destination}`);
      return { success: true, message: `Tool '${name}' installed successfully.` };
    } catch (error) {
      return { success: false, message: `Failed to download tool '${name}': ${extractErrorMessage(error)}` };
    } finally {
      await fs.remove(tempDir);
    }
  }

  private async listLocalFiles(dir: string): Promise<string[]> {
    const files: string[] = [];
    for (const entry of await fs.readdir(dir, { withFileTypes: true })) {
      const full = path.join(dir, entry.name);
      if (!copyFilter(full)) continue;
      if (entry.isDirectory()) files.push(...(await this.listLocalFiles(full)));
      else if (entry.isFile()) files.push(full);
    }
    return files;
  }

  private async putFile(repoPath: string, content: Buffer, message: string): Promise<void> {
    const existing = await this.readFile(repoPath);
    await this.request(this.contentsUrl(repoPath), {
      method: 'PUT',
      body: JSON.stringify({
        message,
        content: content.toString('base64'),
        ...(existing?.sha ? { sha: existing.sha } : {}),
      }),
    });
  }

  async publish(
    namespaceDir: string,
    metadata: ToolMetadata,
    commitMessage?: string
  ): Promise<LibraryOperationResult> {
    const name = path.basename(namespaceDir);
    const message = commitMessage ?? `Add/update tool: ${name}`;
    try {
      const files = await this.listLocalFiles(namespaceDir);
      for (const file of files) {
        const relative = path.relative(namespaceDir, file).split(path.sep).join('/');
        if (relative === 'metadata.json') continue;
        await this.putFile(`${this.options.toolsPath}/${name}/${relative}`, await fs.readFile(file), message);
      }
      await this.putFile(
        `${this.options.toolsPath}/${name}/metadata.json`,
        Buffer.from(JSON.stringify(metadata, null, 2)),
        message
      );
      this.indexCache.invalidate();
      log(`[GitHubLibrary] Published ${name} (${files.length} files)`);
      return { success: true, message: `Tool '${name}' uploaded successfully.` };
    } catch (error) {
      const detail = extractErrorMessage(error);
      logError(`[GitHubLibrary] Upload of ${name} failed: ${detail}`);
      return { success: false, message: `Error uploading tool: ${detail}` };
    }
  }
}
