/**
 * LLM Configuration Parser and Resolution
 */

import { getComponentConfigString, type LLMEnvConfig } from '@toolsmith/common';
import type { ComponentType, LLMConfig, LLMProviderType, ParsedLLMConfig } from './types';

const PROVIDERS: readonly LLMProviderType[] = ['vertex', 'ollama', 'auto'];

const isProvider = (value: string): value is LLMProviderType =>
  PROVIDERS.some((provider) => provider === value);

/**
 * Parses component-specific LLM configuration string
 * Format: "provider:model:temperature:maxTokens"
 * Examples:
 *   "ollama:llama3.2:7b:0.8:2000"       (Ollama model with parameter size)
 *   "vertex:gemini-1.5-pro:0.9:4000"    (Vertex AI model)
 *   "auto:qwen2.5-coder:7b:0.1:"        (Auto with empty maxTokens)
 *
 * Parses right-to-left so Ollama model names with colons (e.g. "llama3.2:7b") survive.
 */
export function parseComponentConfig(configString: string): ParsedLLMConfig {
  const parts = configString.split(':');
  const parsed: ParsedLLMConfig = {};

  if (parts[0] && isProvider(parts[0])) {
    parsed.provider = parts[0];
  }

  if (parts.length === 1) {
    return parsed;
  }

  let rightIndex = parts.length - 1;

  // Only attempt to parse tokens and temperature with at least provider:model:temperature:tokens
  if (parts.length >= 4) {
    if (parts[rightIndex] !== '') {
      const tokens = parseInt(parts[rightIndex], 10);
      if (!isNaN(tokens)) {
        parsed.maxOutputTokens = tokens;
        rightIndex--;
      }
    } else {
      // Empty maxTokens field (trailing colon)
      rightIndex--;
    }

    if (rightIndex >= 1 && parts[rightIndex] !== '') {
      const temp = parseFloat(parts[rightIndex]);
      if (!isNaN(temp) && temp >= 0 && temp <= 2) {
        parsed.temperature = temp;
        rightIndex--;
      }
    }
  }

  if (rightIndex >= 1) {
    parsed.model = parts.slice(1, rightIndex + 1).join(':');
  }

  return parsed;
}

function getDefaultTemperature(component: ComponentType): number {
  switch (component) {
    case 'spec_generator':
      return 0.7;
    case 'code_synthesizer':
      return 0.3; // Lower temperature for more consistent code
    case 'fix_synthesizer':
      return 0.2;
    case 'function_selector':
    case 'intent_router':
      return 0.1; // Classification
    case 'argument_extractor':
      return 0;
    case 'library_search':
      return 0.5;
  }
}

/**
 * "auto" picks Vertex AI when a Google Cloud project is configured, Ollama otherwise.
 */
function concreteProvider(provider: LLMProviderType, config: LLMEnvConfig): LLMConfig['provider'] {
  if (provider === 'auto') {
    return config.GOOGLE_CLOUD_PROJECT ? 'vertex' : 'ollama';
  }
  return provider;
}

function getDefaultModel(provider: LLMConfig['provider'], config: LLMEnvConfig): string {
  return provider === 'vertex' ? config.VERTEX_AI_MODEL : config.OLLAMA_MODEL;
}

/**
 * Resolves complete LLM configuration for a component:
 * component override > global provider > provider default.
 */
export function resolveLLMConfig(
  component: ComponentType,
  config: LLMEnvConfig,
  modelId?: string
): LLMConfig {
  const componentConfigString = getComponentConfigString(config, component);
  const parsedConfig = componentConfigString ? parseComponentConfig(componentConfigString) : {};

  const provider = concreteProvider(parsedConfig.provider || config.LLM_PROVIDER || 'ollama', config);

  return {
    provider,
    model: modelId || parsedConfig.model || getDefaultModel(provider, config),
    temperature: parsedConfig.temperature ?? getDefaultTemperature(component),
    maxOutputTokens: parsedConfig.maxOutputTokens ?? config.LLM_MAX_OUTPUT_TOKENS,
  };
}
