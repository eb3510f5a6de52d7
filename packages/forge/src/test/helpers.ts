import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { TransportError } from '../errors';
import type { ToolLibrary } from '../library/types';
import type { ChatMessage, CompletionOptions, ComponentType, Gateway } from '../llm/types';
import { FileToolStore } from '../store/toolStore';
import type { ToolMetadata } from '../types';

export type ScriptedReply =
  | string
  | Error
  | ((messages: ChatMessage[], options: CompletionOptions) => string);

export interface RecordedCall {
  messages: ChatMessage[];
  options: CompletionOptions;
}

/**
 * Replies per component, in order. The last reply of a component repeats; a component with no
 * replies fails like an unreachable model.
 */
export class ScriptedGateway implements Gateway {
  readonly calls: RecordedCall[] = [];
  private readonly replies = new Map<ComponentType, ScriptedReply[]>();

  on(component: ComponentType, ...replies: ScriptedReply[]): this {
    this.replies.set(component, [...(this.replies.get(component) ?? []), ...replies]);
    return this;
  }

  callsFor(component: ComponentType): RecordedCall[] {
    return this.calls.filter((call) => call.options.component === component);
  }

  async complete(messages: ChatMessage[], options: CompletionOptions): Promise<string> {
    this.calls.push({ messages, options });
    const queue = this.replies.get(options.component) ?? [];
    const reply = queue.length > 1 ? queue.shift() : queue[0];
    if (reply === undefined) throw new TransportError(options.component, 'no scripted reply');
    if (reply instanceof Error) throw reply;
    return typeof reply === 'function' ? reply(messages, options) : reply;
  }
}

export interface TempStore {
  root: string;
  store: FileToolStore;
  cleanup: () => Promise<void>;
}

export async function createTempStore(): Promise<TempStore> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'toolsmith-forge-'));
  return { root, store: new FileToolStore(path.join(root, 'tools')), cleanup: () => fs.remove(root) };
}

export async function writeTool(
  store: FileToolStore,
  name: string,
  source: string,
  documents: { functions?: string; summary?: string; documentation?: string } = {}
): Promise<void> {
  await store.writeSource(name, source);
  if (documents.functions !== undefined) await store.writeDocument(name, 'functions', documents.functions);
  if (documents.summary !== undefined) await store.writeDocument(name, 'summary', documents.summary);
  if (documents.documentation !== undefined) {
    await store.writeDocument(name, 'documentation', documents.documentation);
  }
}

export const CALCULATOR_SOURCE = `/**
 * Adds two numbers.
 * @param {number} a - first addend
 * @param {number} b - second addend
 * @returns {number}
 */
function add(a, b) {
  console.log('adding', a, b);
  return a + b;
}

/**
 * Repeats a word.
 * @param {string} word
 * @param {integer} [times=2]
 * @returns {string}
 */
function repeat(word, times = 2) {
  return word.repeat(times);
}

function _helper() {
  return null;
}

module.exports = { add, repeat, _helper };
`;

export const BROKEN_ADD_SOURCE = `/**
 * Adds two numbers.
 * @param {number} a
 * @param {number} b
 * @returns {number}
 */
function add(a, b) {
  return a - b;
}

module.exports = { add };
`;

export const FIXED_ADD_SOURCE = `/**
 * Adds two numbers.
 * @param {number} a
 * @param {number} b
 * @returns {number}
 */
function add(a, b) {
  return a + b;
}

module.exports = { add };
`;

export const CALCULATOR_CATALOG = `## add
Purpose: Adds two numbers.
Parameters: a, b

## repeat
Purpose: Repeats a word.
Parameters: word, times
`;

export const fenced = (source: string) => `Here is the module:\n\`\`\`javascript\n${source}\`\`\`\n`;

/** In-memory library over a list of metadata; fetch writes a stub namespace. */
export class InMemoryLibrary implements ToolLibrary {
  readonly kind = 'memory';
  readonly searches: string[] = [];
  readonly fetched: string[] = [];
  readonly published: ToolMetadata[] = [];

  constructor(
    private readonly tools: ToolMetadata[],
    private readonly sources: Record<string, string> = {}
  ) {}

  async search(query: string, tags?: string[]): Promise<ToolMetadata[]> {
    this.searches.push(query);
    const needle = query.toLowerCase();
    return this.tools.filter(
      (tool) =>
        (tool.name.toLowerCase().includes(needle) || tool.description.toLowerCase().includes(needle)) &&
        (!tags || tags.length === 0 || tags.some((tag) => tool.tags.includes(tag)))
    );
  }

  async fetch(toolName: string, destinationRoot: string) {
    this.fetched.push(toolName);
    if (!this.tools.some((tool) => tool.name === toolName)) {
      return { success: false, message: `Tool '${toolName}' not found in the library.` };
    }
    await fs.outputFile(path.join(destinationRoot, toolName, 'tool.js'), this.sources[toolName] ?? 'module.exports = {};\n');
    return { success: true, message: `Tool '${toolName}' installed successfully.` };
  }

  async publish(_namespaceDir: string, metadata: ToolMetadata) {
    this.published.push(metadata);
    return { success: true, message: `Tool '${metadata.name}' published.` };
  }
}

export const libraryEntry = (name: string, description: string, tags: string[] = []): ToolMetadata => ({
  name,
  description,
  version: '1.0.0',
  author: 'tester',
  tags,
  createdAt: '2026-01-01T00:00:00.000Z',
  updatedAt: '2026-01-01T00:00:00.000Z',
  functions: [],
});
