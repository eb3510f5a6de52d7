/**
 * LLM Provider Factory - Main entry point for creating LLM providers
 */

import { log, logError, type LLMEnvConfig } from '@toolsmith/common';
import { extractErrorMessage } from '../utils';
import { resolveLLMConfig } from './configParser';
import { OllamaProvider } from './ollamaProvider';
import type { ComponentType, LLMProvider } from './types';
import { VertexAIProvider } from './vertexProvider';

export type ProviderFactory = (
  component: ComponentType,
  config: LLMEnvConfig,
  modelId?: string
) => LLMProvider;

/**
 * Creates an LLM provider for a specific component
 */
export const createLLMProvider: ProviderFactory = (component, envConfig, modelId) => {
  try {
    const config = resolveLLMConfig(component, envConfig, modelId);

    log(
      `[LLMFactory] Creating ${config.provider} provider for ${component}: ${config.model} (temp=${config.temperature})`
    );

    switch (config.provider) {
      case 'vertex':
        return new VertexAIProvider(config, {
          projectId: envConfig.GOOGLE_CLOUD_PROJECT,
          location: envConfig.GOOGLE_CLOUD_LOCATION,
          credentials: envConfig.GOOGLE_CLOUD_CREDENTIALS,
          applicationCredentials: envConfig.GOOGLE_APPLICATION_CREDENTIALS,
        });
      case 'ollama':
        return new OllamaProvider(config, envConfig.OLLAMA_URL);
    }
  } catch (error) {
    const errorMsg = extractErrorMessage(error, 'Unknown factory error');
    logError(`[LLMFactory] Failed to create provider for ${component}: ${errorMsg}`);
    throw new Error(`LLM provider creation failed for ${component}: ${errorMsg}`);
  }
};
