/**
 * Vertex AI Provider Implementation
 */

import type { BaseMessage } from '@langchain/core/messages';
import { ChatVertexAI } from '@langchain/google-vertexai';
import { log } from '@toolsmith/common';
import { toStringContent } from '../utils';
import type { LLMConfig, LLMProvider, LLMResponse } from './types';

export interface VertexAIOptions {
  projectId: string;
  location: string;
  /** Base64-encoded service account JSON. */
  credentials?: string;
  /** Path to a key file; when set, the client library reads it and `credentials` is ignored. */
  applicationCredentials?: string;
}

/** The base64 service account to pass inline, if any. */
export function inlineServiceAccount(options: VertexAIOptions): string | undefined {
  if (options.applicationCredentials || !options.credentials) return undefined;
  return options.credentials;
}

export class VertexAIProvider implements LLMProvider {
  private llm: ChatVertexAI;
  private config: LLMConfig;

  constructor(config: LLMConfig, options: VertexAIOptions) {
    this.config = config;
    this.llm = this.createVertexAI(options);
  }

  private createVertexAI(options: VertexAIOptions): ChatVertexAI {
    if (!options.projectId) {
      throw new Error('GOOGLE_CLOUD_PROJECT environment variable is required for Vertex AI provider');
    }

    const serviceAccount = inlineServiceAccount(options);
    return new ChatVertexAI({
      model: this.config.model,
      temperature: this.config.temperature,
      maxOutputTokens: this.config.maxOutputTokens,
      location: options.location,
      authOptions: {
        projectId: options.projectId,
        credentials: serviceAccount ? JSON.parse(Buffer.from(serviceAccount, 'base64').toString()) : undefined,
      },
    });
  }

  async invoke(messages: BaseMessage[], signal?: AbortSignal): Promise<LLMResponse> {
    log(`[VertexAIProvider] Invoking ${this.config.model} with ${messages.length} messages`);
    const response = await this.llm.invoke(messages, { signal });
    return { content: toStringContent(response.content) };
  }

  getModel(): string {
    return this.config.model;
  }

  getProvider() {
    return 'vertex' as const;
  }

  getConfig(): LLMConfig {
    return { ...this.config };
  }
}
