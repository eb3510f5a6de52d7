export type {
  ChatMessage,
  CompletionOptions,
  ComponentType,
  Gateway,
  LLMConfig,
  LLMProvider,
  LLMProviderType,
  LLMResponse,
  ParsedLLMConfig,
} from './types';

export { OllamaProvider } from './ollamaProvider';
export { VertexAIProvider } from './vertexProvider';
export { parseComponentConfig, resolveLLMConfig } from './configParser';
export { createLLMProvider } from './factory';
export type { ProviderFactory } from './factory';
export { LangChainGateway, buildSystemText, toLangChainMessages } from './gateway';
