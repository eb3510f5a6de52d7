import { log, logError } from '@toolsmith/common';
import type { Gateway } from '../llm/types';
import type { FileToolStore } from '../store/toolStore';
import type { DocumentName, ToolDocuments } from '../types';
import { extractErrorMessage } from '../utils';

export const PLACEHOLDER_CONTENT = 'No content generated';

export interface SpecGeneratorDeps {
  gateway: Gateway;
  store: FileToolStore;
}

const systemFraming = (name: string) =>
  [
    `You are a senior engineer writing the specification of a Node.js tool named "${name}".`,
    'The tool is a single CommonJS JavaScript module whose functions are called directly by other programs.',
    'Functions take explicit parameters, never prompt for input, and return plain values.',
    'Write Markdown only. Do not wrap the answer in code fences and do not add commentary about the task.',
  ].join(' ');

const CATALOG_LAYOUT = [
  'List every function the tool exposes, one section per function, using exactly this layout:',
  '',
  '## function_name',
  'Parameters: first_param, second_param',
  'Purpose: one sentence describing what the function does.',
  'Returns: what the function returns.',
  'Errors: what the function does on invalid input.',
  '',
  'Function and parameter names must be valid JavaScript identifiers.',
  'Write "Parameters: none" for a function without parameters.',
].join('\n');

const detailsLine = (details: string) =>
  details.trim() ? `Details: ${details.trim()}` : 'No further details were given; infer the scope from the name.';

/**
 * Strips a fence that wraps the whole document and substitutes the placeholder for empty output.
 */
export function cleanDocument(raw: string): string {
  const fenced = raw.trim().match(/^```[\w-]*\s*\n([\s\S]*?)\n?```$/);
  const text = (fenced ? fenced[1] : raw).trim();
  return text || PLACEHOLDER_CONTENT;
}

async function requestDocument(
  gateway: Gateway,
  name: string,
  document: DocumentName,
  prompt: string
): Promise<string> {
  try {
    const response = await gateway.complete([{ role: 'user', content: prompt }], {
      component: 'spec_generator',
      systemInstructions: systemFraming(name),
    });
    return cleanDocument(response);
  } catch (error) {
    logError(`[SpecGenerator] ${document}.md for ${name} failed: ${extractErrorMessage(error)}`);
    return PLACEHOLDER_CONTENT;
  }
}

/**
 * Produces the overview, function catalog and summary for a tool and persists them. Never throws on
 * gateway failures; a missing document becomes the placeholder text.
 */
export async function generateSpecification(
  name: string,
  details: string,
  { gateway, store }: SpecGeneratorDeps
): Promise<ToolDocuments> {
  log(`[SpecGenerator] Generating documents for ${name}`);
  await store.ensureNamespace(name);

  const documentation = await requestDocument(
    gateway,
    name,
    'documentation',
    [
      `Write the overview documentation for the tool "${name}".`,
      detailsLine(details),
      'Cover its purpose, the functions it offers, typical usage, and its limitations.',
    ].join('\n')
  );
  await store.writeDocument(name, 'documentation', documentation);

  const functions = await requestDocument(
    gateway,
    name,
    'functions',
    [
      `Write the function catalog for the tool "${name}".`,
      detailsLine(details),
      '',
      `Overview:\n${documentation}`,
      '',
      CATALOG_LAYOUT,
    ].join('\n')
  );
  await store.writeDocument(name, 'functions', functions);

  const summary = await requestDocument(
    gateway,
    name,
    'summary',
    [
      `Summarize the tool "${name}" in at most five sentences for a tool listing.`,
      '',
      `Overview:\n${documentation}`,
      '',
      `Function catalog:\n${functions}`,
    ].join('\n')
  );
  await store.writeDocument(name, 'summary', summary);

  return { documentation, functions, summary };
}
