import { log, logError, logWarn } from '@toolsmith/common';
import type { Gateway } from '../llm/types';
import type { CatalogFunction } from '../types';
import { extractErrorMessage, parseJsonObject } from '../utils';
import { formatCatalog } from './catalogParser';

export interface FunctionSelection {
  function: CatalogFunction;
  reason: string;
  method: 'classifier' | 'substring';
}

const SYSTEM_INSTRUCTIONS = [
  'You are a strict classifier that maps a user instruction to exactly one function of a tool.',
  'Answer with JSON only: {"function_name": string | null, "reason": string}.',
  'Use null when no function fits. Never invent a function name.',
].join(' ');

/**
 * First catalog function whose name appears in the instruction, ignoring case.
 */
export function matchBySubstring(instruction: string, catalog: CatalogFunction[]): CatalogFunction | null {
  const lowered = instruction.toLowerCase();
  return catalog.find((fn) => lowered.includes(fn.name.toLowerCase())) ?? null;
}

async function classify(
  instruction: string,
  catalog: CatalogFunction[],
  gateway: Gateway
): Promise<{ name: string; reason: string } | null> {
  try {
    const response = await gateway.complete(
      [
        {
          role: 'user',
          content: [`Available functions:\n${formatCatalog(catalog)}`, '', `Instruction: ${instruction}`].join('\n'),
        },
      ],
      { component: 'function_selector', systemInstructions: SYSTEM_INSTRUCTIONS }
    );
    const parsed = parseJsonObject(response);
    if (!parsed) {
      logWarn('[FunctionSelector] Classifier reply was not JSON, using substring match');
      return null;
    }
    const name = parsed.function_name;
    if (typeof name !== 'string' || !name.trim()) return null;
    return { name: name.trim(), reason: typeof parsed.reason === 'string' ? parsed.reason : '' };
  } catch (error) {
    logError(`[FunctionSelector] Classifier unavailable: ${extractErrorMessage(error)}`);
    return null;
  }
}

/**
 * Picks the function an instruction refers to: the classifier's choice when it names a catalog
 * function, otherwise the substring fallback. Null when neither finds one.
 */
export async function selectFunction(
  instruction: string,
  catalog: CatalogFunction[],
  gateway: Gateway
): Promise<FunctionSelection | null> {
  if (catalog.length === 0) return null;

  const choice = await classify(instruction, catalog, gateway);
  if (choice) {
    const chosen = catalog.find((fn) => fn.name.toLowerCase() === choice.name.toLowerCase());
    if (chosen) {
      log(`[FunctionSelector] Classifier selected ${chosen.name}`);
      return { function: chosen, reason: choice.reason, method: 'classifier' };
    }
    logWarn(`[FunctionSelector] Classifier named unknown function '${choice.name}'`);
  }

  const matched = matchBySubstring(instruction, catalog);
  if (matched) {
    log(`[FunctionSelector] Substring match selected ${matched.name}`);
    return { function: matched, reason: 'function name appears in the instruction', method: 'substring' };
  }
  return null;
}
