import type { ToolMetadata } from '../types';

export interface LibraryOperationResult {
  success: boolean;
  message: string;
}

/**
 * A remote or shared collection of tools. The forge only calls it before creating a tool and after
 * a tool passes its debug session.
 */
export interface ToolLibrary {
  readonly kind: string;
  search(query: string, tags?: string[]): Promise<ToolMetadata[]>;
  /** Materializes the named tool as `<destinationRoot>/<name>`. */
  fetch(toolName: string, destinationRoot: string): Promise<LibraryOperationResult>;
  /** Uploads a local namespace directory. */
  publish(namespaceDir: string, metadata: ToolMetadata): Promise<LibraryOperationResult>;
}

/**
 * Case-insensitive match on name or description, and at least one shared tag when tags are given.
 */
export function matchesQuery(tool: ToolMetadata, query: string, tags: string[] = []): boolean {
  const needle = query.trim().toLowerCase();
  if (
    needle &&
    !tool.name.toLowerCase().includes(needle) &&
    !tool.description.toLowerCase().includes(needle)
  ) {
    return false;
  }
  if (tags.length > 0) {
    const toolTags = tool.tags.map((tag) => tag.toLowerCase());
    return tags.some((tag) => toolTags.includes(tag.toLowerCase()));
  }
  return true;
}
