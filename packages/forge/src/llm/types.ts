/**
 * LLM Provider Abstraction - Core Types and Interfaces
 */

import type { BaseMessage } from '@langchain/core/messages';

export type LLMProviderType = 'vertex' | 'ollama' | 'auto';

export interface LLMConfig {
  provider: Exclude<LLMProviderType, 'auto'>;
  model: string;
  temperature: number;
  maxOutputTokens?: number;
}

export interface LLMResponse {
  content: string;
}

export interface LLMProvider {
  invoke(messages: BaseMessage[], signal?: AbortSignal): Promise<LLMResponse>;
  getModel(): string;
  getProvider(): LLMConfig['provider'];
  getConfig(): LLMConfig;
}

export type ComponentType =
  | 'spec_generator'
  | 'code_synthesizer'
  | 'fix_synthesizer'
  | 'function_selector'
  | 'argument_extractor'
  | 'intent_router'
  | 'library_search';

export interface ParsedLLMConfig {
  provider?: LLMProviderType;
  model?: string;
  temperature?: number;
  maxOutputTokens?: number;
}

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface CompletionOptions {
  component: ComponentType;
  systemInstructions?: string;
  persona?: string;
  /** Overrides the model resolved for the component. */
  modelId?: string;
}

/**
 * Role-tagged messages in, generated text out. Implementations reject with TransportError.
 */
export interface Gateway {
  complete(messages: ChatMessage[], options: CompletionOptions): Promise<string>;
}
