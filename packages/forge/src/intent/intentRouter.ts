import { z } from 'zod';
import { log, logError, normalizeToolName } from '@toolsmith/common';
import type { Gateway } from '../llm/types';
import { extractErrorMessage, parseJsonObject } from '../utils';

export const INTENT_TYPES = [
  'USE_INSTALLED_TOOL',
  'REQUEST_TOOL_CREATION',
  'INSTALL_TOOL',
  'REQUEST_UNINSTALLED_TOOL',
  'NO_TOOL_INTENT',
] as const;

export type IntentType = (typeof INTENT_TYPES)[number];

const intentSchema = z.object({
  intent_type: z.enum(INTENT_TYPES),
  tool_name: z
    .string()
    .nullish()
    .transform((value) => (value && value.trim() && value.trim() !== 'null' ? value.trim() : null)),
  details: z.string().nullish().transform((value) => value ?? ''),
  run_after_install: z.boolean().nullish().transform((value) => value ?? false),
});

export interface DetectedIntent {
  intentType: IntentType;
  toolName: string | null;
  details: string;
  runAfterInstall: boolean;
}

export type IntentDetection = { ok: true; intent: DetectedIntent } | { ok: false; error: string };

export interface IntentOutcome {
  intentType: IntentType | 'INSTALL_AND_RUN' | 'ERROR';
  toolName: string | null;
  content: string;
  /** Seconds. */
  executionTime: number;
}

/**
 * What the router needs from the tool service.
 */
export interface IntentActions {
  runToolText(toolName: string, instruction: string): Promise<string>;
  installToolByName(toolName: string): Promise<{ success: boolean; message: string }>;
  findAndInstallTool(query: string, tags?: string[]): Promise<{ message: string; toolName: string | null }>;
  createTool(toolName: string, details: string): Promise<string>;
  hasLibrary(): boolean;
}

const systemInstructions = (toolsList: string) =>
  [
    'You detect whether a message asks to use, install or create a tool.',
    '',
    'Intent types:',
    '- USE_INSTALLED_TOOL: the user explicitly asks to use or run one of the available tools.',
    '- REQUEST_TOOL_CREATION: the user explicitly asks to create, make or build a new tool.',
    '- INSTALL_TOOL: the user explicitly asks to install, find or get a tool.',
    '- REQUEST_UNINSTALLED_TOOL: the user asks for an action no available tool performs, but a tool could.',
    '- NO_TOOL_INTENT: general conversation or questions.',
    '',
    'Default to NO_TOOL_INTENT unless the message clearly asks to use, install or create a tool.',
    '',
    `Available tools:\n${toolsList}`,
    '',
    'Return ONLY a JSON object:',
    '{"intent_type": string, "tool_name": string | null, "details": string, "run_after_install": boolean}',
  ].join('\n');

export async function detectIntent(
  message: string,
  toolsList: string,
  gateway: Gateway
): Promise<IntentDetection> {
  let response: string;
  try {
    response = await gateway.complete([{ role: 'user', content: message }], {
      component: 'intent_router',
      systemInstructions: systemInstructions(toolsList),
    });
  } catch (error) {
    return { ok: false, error: extractErrorMessage(error) };
  }

  const parsed = intentSchema.safeParse(parseJsonObject(response));
  if (!parsed.success) {
    logError(`[IntentRouter] Unusable classification: ${response.slice(0, 200)}`);
    return { ok: false, error: 'could not understand the intent classification' };
  }
  const { intent_type, tool_name, details, run_after_install } = parsed.data;
  log(`[IntentRouter] ${intent_type}${tool_name ? ` (${tool_name})` : ''}`);
  return {
    ok: true,
    intent: { intentType: intent_type, toolName: tool_name, details, runAfterInstall: run_after_install },
  };
}

/** A tool name derived from free-text details when the classifier gave none. */
export function deriveToolName(details: string): string {
  const words = details
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, ' ')
    .split(/\s+/)
    .filter(Boolean)
    .slice(0, 4);
  return normalizeToolName(words.join(' ')) || 'new_tool';
}

const secondsSince = (start: number) => (Date.now() - start) / 1000;

async function installThenMaybeRun(
  installed: { message: string; toolName: string },
  intent: DetectedIntent,
  message: string,
  actions: IntentActions,
  start: number
): Promise<IntentOutcome> {
  if (!intent.runAfterInstall) {
    return {
      intentType: 'INSTALL_TOOL',
      toolName: installed.toolName,
      content: installed.message,
      executionTime: secondsSince(start),
    };
  }
  const output = await actions.runToolText(installed.toolName, message);
  return {
    intentType: 'INSTALL_AND_RUN',
    toolName: installed.toolName,
    content: `${installed.message}\n\nTool output:\n${output}`,
    executionTime: secondsSince(start),
  };
}

/**
 * Carries out a detected intent: run, install, or install-else-create.
 */
export async function handleIntent(
  intent: DetectedIntent,
  message: string,
  actions: IntentActions
): Promise<IntentOutcome> {
  const start = Date.now();

  switch (intent.intentType) {
    case 'NO_TOOL_INTENT':
      return { intentType: 'NO_TOOL_INTENT', toolName: null, content: '', executionTime: 0 };

    case 'USE_INSTALLED_TOOL': {
      if (!intent.toolName) {
        return { intentType: 'ERROR', toolName: null, content: 'No tool name was given.', executionTime: 0 };
      }
      const content = await actions.runToolText(intent.toolName, message);
      return { intentType: 'USE_INSTALLED_TOOL', toolName: intent.toolName, content, executionTime: secondsSince(start) };
    }

    case 'INSTALL_TOOL': {
      let installed: { message: string; toolName: string | null } = { message: '', toolName: null };
      if (intent.toolName) {
        const direct = await actions.installToolByName(intent.toolName);
        if (direct.success) {
          installed = { message: `Successfully installed tool '${intent.toolName}'`, toolName: intent.toolName };
        }
      }
      if (!installed.toolName) {
        installed = await actions.findAndInstallTool(intent.details || intent.toolName || message);
      }
      if (!installed.toolName) {
        return { intentType: 'INSTALL_TOOL', toolName: null, content: installed.message, executionTime: secondsSince(start) };
      }
      return installThenMaybeRun({ message: installed.message, toolName: installed.toolName }, intent, message, actions, start);
    }

    case 'REQUEST_TOOL_CREATION':
    case 'REQUEST_UNINSTALLED_TOOL': {
      if (actions.hasLibrary()) {
        const found = await actions.findAndInstallTool(intent.details || message);
        if (found.toolName) {
          return installThenMaybeRun({ message: found.message, toolName: found.toolName }, intent, message, actions, start);
        }
      }
      const toolName = intent.toolName ?? deriveToolName(intent.details || message);
      const content = await actions.createTool(toolName, intent.details);
      return { intentType: intent.intentType, toolName, content, executionTime: secondsSince(start) };
    }
  }
}
