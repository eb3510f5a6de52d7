import fs from 'fs-extra';
import path from 'path';
import { log, normalizeToolName } from '@toolsmith/common';
import {
  FileToolStore,
  generateMetadata,
  matchesQuery,
  type LibraryOperationResult,
  type ToolLibrary,
  type ToolMetadata,
} from '@toolsmith/forge';

const SKIPPED_ENTRIES = new Set(['node_modules']);

export const copyFilter = (src: string) => {
  const base = path.basename(src);
  return !base.startsWith('.') && !SKIPPED_ENTRIES.has(base);
};

/**
 * A shared directory of tool namespaces, laid out like the tools directory itself.
 */
export class LocalToolLibrary implements ToolLibrary {
  readonly kind = 'local';
  private readonly store: FileToolStore;

  constructor(root: string) {
    this.store = new FileToolStore(root);
  }

  get root(): string {
    return this.store.root;
  }

  async search(query: string, tags?: string[]): Promise<ToolMetadata[]> {
    const names = await this.store.listTools();
    const index = await Promise.all(
      names.map(
        async (name) =>
          (await this.store.readMetadata(name)) ?? generateMetadata(this.store, name, { author: '' })
      )
    );
    return index.filter((tool) => matchesQuery(tool, query, tags));
  }

  async fetch(toolName: string, destinationRoot: string): Promise<LibraryOperationResult> {
    const name = normalizeToolName(toolName);
    if (!name) return { success: false, message: `'${toolName}' is not a valid tool name.` };
    const source = this.store.namespacePath(name);
    const destination = path.join(path.resolve(destinationRoot), name);

    if (await fs.pathExists(destination)) {
      return { success: true, message: `Tool '${name}' is already installed.` };
    }
    if (!(await fs.pathExists(source))) {
      return { success: false, message: `Tool '${name}' not found in the library.` };
    }

    await fs.copy(source, destination, { filter: copyFilter });
    log(`[LocalLibrary] Installed ${name} into ${destination}`);
    return { success: true, message: `Tool '${name}' installed successfully.` };
  }

  async publish(namespaceDir: string, metadata: ToolMetadata): Promise<LibraryOperationResult> {
    const name = path.basename(namespaceDir);
    if (!(await fs.pathExists(namespaceDir))) {
      return { success: false, message: `Tool directory ${namespaceDir} does not exist.` };
    }
    const destination = this.store.namespacePath(name);
    await fs.copy(namespaceDir, destination, { overwrite: true, filter: copyFilter });
    await this.store.writeMetadata(name, metadata);
    log(`[LocalLibrary] Published ${name} to ${destination}`);
    return { success: true, message: `Tool '${name}' published to ${this.root}.` };
  }
}
