import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { logError, normalizeToolName } from '@toolsmith/common';
import { InvalidToolNameError } from '../errors';
import type { DocumentName, ToolMetadata } from '../types';
import { extractErrorMessage } from '../utils';

export const SOURCE_FILE = 'tool.js';
export const MANIFEST_FILE = 'package.json';
export const METADATA_FILE = 'metadata.json';

const catalogFunctionSchema = z.object({
  name: z.string(),
  description: z.string().default(''),
  parameters: z.array(z.string()).default([]),
});

export const toolMetadataSchema = z.object({
  name: z.string(),
  description: z.string().default(''),
  version: z.string().default('1.0.0'),
  author: z.string().default(''),
  tags: z.array(z.string()).default([]),
  createdAt: z.string().default(''),
  updatedAt: z.string().default(''),
  functions: z.array(catalogFunctionSchema).default([]),
});

export interface DependencyManifest {
  name: string;
  version: string;
  private: true;
  dependencies: Record<string, string>;
}

/**
 * File-system persistence for tool namespaces: one directory per tool under the tools root.
 */
export class FileToolStore {
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  /** Throws InvalidToolNameError unless the namespace is a direct child of the root. */
  namespacePath(toolName: string): string {
    const name = normalizeToolName(toolName);
    const dir = path.join(this.root, name);
    if (!name || path.dirname(dir) !== this.root) throw new InvalidToolNameError(toolName);
    return dir;
  }

  sourcePath(toolName: string): string {
    return path.join(this.namespacePath(toolName), SOURCE_FILE);
  }

  async exists(toolName: string): Promise<boolean> {
    return fs.pathExists(this.namespacePath(toolName));
  }

  async ensureNamespace(toolName: string): Promise<string> {
    const dir = this.namespacePath(toolName);
    await fs.ensureDir(dir);
    return dir;
  }

  async readDocument(toolName: string, document: DocumentName): Promise<string | null> {
    return this.readText(path.join(this.namespacePath(toolName), `${document}.md`));
  }

  async writeDocument(toolName: string, document: DocumentName, content: string): Promise<void> {
    const dir = await this.ensureNamespace(toolName);
    await fs.writeFile(path.join(dir, `${document}.md`), content, 'utf8');
  }

  async readSource(toolName: string): Promise<string | null> {
    return this.readText(this.sourcePath(toolName));
  }

  async writeSource(toolName: string, source: string): Promise<void> {
    await this.ensureNamespace(toolName);
    await fs.writeFile(this.sourcePath(toolName), source, 'utf8');
  }

  async writeManifest(toolName: string, manifest: DependencyManifest): Promise<void> {
    const dir = await this.ensureNamespace(toolName);
    await fs.writeJson(path.join(dir, MANIFEST_FILE), manifest, { spaces: 2 });
  }

  /** Null when absent or malformed. */
  async readMetadata(toolName: string): Promise<ToolMetadata | null> {
    const file = path.join(this.namespacePath(toolName), METADATA_FILE);
    const raw = await this.readText(file);
    if (raw === null) return null;
    try {
      const parsed = toolMetadataSchema.safeParse(JSON.parse(raw));
      if (parsed.success) return parsed.data;
      logError(`[ToolStore] Invalid metadata in ${file}: ${parsed.error.message}`);
    } catch (error) {
      logError(`[ToolStore] Unreadable metadata in ${file}: ${extractErrorMessage(error)}`);
    }
    return null;
  }

  async writeMetadata(toolName: string, metadata: ToolMetadata): Promise<void> {
    const dir = await this.ensureNamespace(toolName);
    await fs.writeJson(path.join(dir, METADATA_FILE), metadata, { spaces: 2 });
  }

  /** Installed tool names, sorted. */
  async listTools(): Promise<string[]> {
    if (!(await fs.pathExists(this.root))) return [];
    const entries = await fs.readdir(this.root, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isDirectory() && !entry.name.startsWith('.'))
      .map((entry) => entry.name)
      .sort();
  }

  private async readText(file: string): Promise<string | null> {
    if (!(await fs.pathExists(file))) return null;
    return fs.readFile(file, 'utf8');
  }
}
