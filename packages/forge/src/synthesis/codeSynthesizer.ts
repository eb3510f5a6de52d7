import { log } from '@toolsmith/common';
import { SpecificationIncompleteError } from '../errors';
import type { Gateway } from '../llm/types';
import type { DependencyManifest, FileToolStore } from '../store/toolStore';
import { extractCode } from './codeExtractor';
import { writeDependencyManifest } from './dependencyManifest';

export interface CodeSynthesizerDeps {
  gateway: Gateway;
  store: FileToolStore;
  /** node_modules directories consulted for dependency versions. */
  searchDirs?: string[];
}

export type SynthesisResult =
  | { ok: true; source: string; manifest: DependencyManifest | null }
  | { ok: false; error: SpecificationIncompleteError };

const SYSTEM_INSTRUCTIONS = [
  'You write complete, working Node.js modules in plain JavaScript (CommonJS).',
  'Return only the source code of the module. No explanations, no Markdown outside a single code block.',
].join(' ');

/**
 * Tests feed empty strings, zero, negative numbers and empty collections, and any thrown error
 * fails a case. Generated and repaired modules both follow this rule.
 */
export const INVALID_INPUT_RULE =
  'Never throw on invalid or edge-case input (empty strings, zero, negative numbers, empty collections): return a descriptive error string starting with "Error: " instead.';

const CODE_REQUIREMENTS = [
  'Requirements:',
  '1. Implement EVERY function from the catalog as a top-level function declaration with the exact name and parameters listed.',
  '2. Every function is public and directly callable with explicit parameters. Never read from stdin or prompt the user.',
  '3. Report progress with console.log inside each function.',
  `4. Validate inputs. ${INVALID_INPUT_RULE}`,
  '5. Precede every function with a JSDoc block using @param {type} name and @returns {type}.',
  '   Use string, number, integer, boolean, Array or Object as types.',
  '6. Helpers that are not in the catalog start with an underscore.',
  '7. Export the catalog functions with module.exports = { ... }.',
  '8. Define a debugTesting() function that calls every catalog function once with valid input and once with invalid input,',
  '   logging what each call returns. Do not export it; call it only under if (require.main === module).',
  '9. Use only Node.js built-in modules unless a third-party package is clearly required.',
].join('\n');

/**
 * Generates tool.js from the catalog and overview, then records its third-party dependencies.
 * Missing documents are returned as a failed result; gateway failures propagate as TransportError.
 */
export async function synthesizeCode(
  name: string,
  { gateway, store, searchDirs }: CodeSynthesizerDeps
): Promise<SynthesisResult> {
  const functions = await store.readDocument(name, 'functions');
  if (functions === null) {
    return { ok: false, error: new SpecificationIncompleteError(name, 'functions') };
  }
  const documentation = await store.readDocument(name, 'documentation');
  if (documentation === null) {
    return { ok: false, error: new SpecificationIncompleteError(name, 'documentation') };
  }

  log(`[CodeSynthesizer] Generating source for ${name}`);
  const prompt = [
    `Write the module tool.js for the tool "${name}".`,
    '',
    `Function catalog:\n${functions}`,
    '',
    `Overview:\n${documentation}`,
    '',
    CODE_REQUIREMENTS,
  ].join('\n');

  const response = await gateway.complete([{ role: 'user', content: prompt }], {
    component: 'code_synthesizer',
    systemInstructions: SYSTEM_INSTRUCTIONS,
  });

  const source = extractCode(response);
  await store.writeSource(name, source);
  log(`[CodeSynthesizer] Wrote ${source.length} chars to ${store.sourcePath(name)}`);

  const manifest = await writeDependencyManifest(name, source, store, searchDirs);
  return { ok: true, source, manifest };
}
