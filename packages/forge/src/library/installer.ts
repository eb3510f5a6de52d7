import { log, logError } from '@toolsmith/common';
import type { Gateway } from '../llm/types';
import type { FileToolStore } from '../store/toolStore';
import { extractErrorMessage } from '../utils';
import type { LibraryOperationResult, ToolLibrary } from './types';

export interface InstallerDeps {
  library: ToolLibrary;
  store: FileToolStore;
  gateway: Gateway;
}

export interface InstallOutcome {
  message: string;
  toolName: string | null;
}

const SEARCH_TERMS_INSTRUCTIONS = [
  'You are a tool search optimizer. Given what a user wants a tool to do, reply with two to five',
  'short search terms that would match the tool name or description, separated by spaces.',
  'Reply with the terms only.',
].join(' ');

/**
 * Search terms rewritten by the gateway; the original query when the call fails or returns nothing.
 */
export async function improveSearchTerms(query: string, gateway: Gateway): Promise<string> {
  try {
    const response = await gateway.complete([{ role: 'user', content: query }], {
      component: 'library_search',
      systemInstructions: SEARCH_TERMS_INSTRUCTIONS,
    });
    const terms = response.replace(/["'`]/g, '').replace(/\s+/g, ' ').trim();
    return terms || query;
  } catch (error) {
    logError(`[Installer] Could not improve search terms: ${extractErrorMessage(error)}`);
    return query;
  }
}

async function searchWithTerms(library: ToolLibrary, query: string, tags?: string[]) {
  const direct = await library.search(query, tags);
  if (direct.length > 0) return direct;

  // one term at a time
  const terms = query.split(/\s+/).filter((term) => term.length > 2);
  if (terms.length < 2) return direct;
  for (const term of terms) {
    const matches = await library.search(term, tags);
    if (matches.length > 0) return matches;
  }
  return [];
}

/**
 * Finds a library tool for the query and installs the best match. A query with no direct match is
 * retried once with gateway-improved search terms.
 */
export async function findAndInstallTool(
  query: string,
  tags: string[] | undefined,
  { library, store, gateway }: InstallerDeps
): Promise<InstallOutcome> {
  let matches = await library.search(query, tags);
  if (matches.length === 0) {
    const improved = await improveSearchTerms(query, gateway);
    log(`[Installer] Improved search query: ${improved}`);
    matches = await searchWithTerms(library, improved, tags);
  }

  if (matches.length === 0) {
    return { message: 'No matching tools found in the library.', toolName: null };
  }

  const best = matches[0];
  const installed = await installToolByName(best.name, { library, store });
  if (!installed.success) {
    return { message: `Error installing tool: ${installed.message}`, toolName: null };
  }
  return {
    message: `Successfully installed tool '${best.name}': ${best.description}`,
    toolName: best.name,
  };
}

/**
 * Installs one tool by name. Succeeds without fetching when it is already installed.
 */
export async function installToolByName(
  toolName: string,
  { library, store }: Pick<InstallerDeps, 'library' | 'store'>
): Promise<LibraryOperationResult> {
  if (await store.exists(toolName)) {
    return { success: true, message: `Tool '${toolName}' is already installed.` };
  }
  try {
    const result = await library.fetch(toolName, store.root);
    log(`[Installer] ${library.kind} fetch of ${toolName}: ${result.message}`);
    return result;
  } catch (error) {
    const message = extractErrorMessage(error);
    logError(`[Installer] Failed to install ${toolName}: ${message}`);
    return { success: false, message };
  }
}
