/**
 * Ollama Provider Implementation
 */

import type { BaseMessage } from '@langchain/core/messages';
import { ChatOllama } from '@langchain/ollama';
import { log } from '@toolsmith/common';
import { toStringContent } from '../utils';
import type { LLMConfig, LLMProvider, LLMResponse } from './types';

export class OllamaProvider implements LLMProvider {
  private config: LLMConfig;
  private ollamaUrl: string;
  private langChainModel?: ChatOllama;

  constructor(config: LLMConfig, ollamaUrl = 'http://localhost:11434') {
    this.config = config;
    this.ollamaUrl = ollamaUrl.replace(/\/$/, '');
  }

  async invoke(messages: BaseMessage[], signal?: AbortSignal): Promise<LLMResponse> {
    const requestId = Math.random().toString(36).substring(2, 8);
    const startTime = Date.now();
    log(
      `[OllamaProvider:${requestId}] Invoking ${this.config.model} at ${this.ollamaUrl} with ${messages.length} messages`
    );

    const response = await this.getLangChainModel().invoke(messages, { signal });
    const content = toStringContent(response.content);
    log(
      `[OllamaProvider:${requestId}] Response of ${content.length} chars after ${Date.now() - startTime}ms`
    );
    return { content };
  }

  getModel(): string {
    return this.config.model;
  }

  getProvider() {
    return 'ollama' as const;
  }

  getConfig(): LLMConfig {
    return { ...this.config };
  }

  getLangChainModel(): ChatOllama {
    if (!this.langChainModel) {
      this.langChainModel = new ChatOllama({
        baseUrl: this.ollamaUrl,
        model: this.config.model,
        temperature: this.config.temperature,
        numPredict: this.config.maxOutputTokens,
      });
    }
    return this.langChainModel;
  }
}
