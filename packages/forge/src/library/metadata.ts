import { nowIso } from '@toolsmith/common';
import { parseCatalog } from '../invocation/catalogParser';
import type { FileToolStore } from '../store/toolStore';
import { scanSpecifiers } from '../synthesis/dependencyManifest';
import type { ToolMetadata } from '../types';
import tagKeywords from './tagKeywords.json';

export interface MetadataOptions {
  author: string;
  version?: string;
  now?: () => string;
}

/**
 * Metadata derived from the tool's files: the summary as description and the parsed catalog.
 * Keeps createdAt, version and tags from existing metadata.
 */
export async function generateMetadata(
  store: FileToolStore,
  toolName: string,
  { author, version = '1.0.0', now = nowIso }: MetadataOptions
): Promise<ToolMetadata> {
  const [summary, catalog, existing] = await Promise.all([
    store.readDocument(toolName, 'summary'),
    store.readDocument(toolName, 'functions'),
    store.readMetadata(toolName),
  ]);
  const timestamp = now();

  return {
    name: existing?.name ?? toolName,
    description: summary?.trim() ?? '',
    version: existing?.version ?? version,
    author: existing?.author || author,
    tags: existing?.tags ?? [],
    createdAt: existing?.createdAt || timestamp,
    updatedAt: timestamp,
    functions: catalog === null ? [] : parseCatalog(catalog),
  };
}

/**
 * Category tags from summary keywords plus tags implied by the packages tool.js loads. Sorted and
 * without duplicates.
 */
export async function autoTagTool(store: FileToolStore, toolName: string): Promise<string[]> {
  const tags = new Set<string>();

  const summary = await store.readDocument(toolName, 'summary');
  if (summary) {
    const lowered = summary.toLowerCase();
    for (const [category, keywords] of Object.entries(tagKeywords.categories)) {
      if (keywords.some((keyword) => lowered.includes(keyword))) tags.add(category);
    }
  }

  const source = await store.readSource(toolName);
  if (source) {
    const packageTags = new Map(Object.entries(tagKeywords.packages));
    for (const specifier of scanSpecifiers(source)) {
      const tag = packageTags.get(specifier);
      if (tag) tags.add(tag);
    }
  }

  return Array.from(tags).sort();
}
