import { AIMessage, HumanMessage, SystemMessage, type BaseMessage } from '@langchain/core/messages';
import { log, logError, withTimeout, type LLMEnvConfig } from '@toolsmith/common';
import { TransportError } from '../errors';
import { extractErrorMessage } from '../utils';
import { createLLMProvider, type ProviderFactory } from './factory';
import type { ChatMessage, CompletionOptions, Gateway, LLMProvider } from './types';

export function buildSystemText(systemInstructions?: string, persona?: string): string {
  let text = systemInstructions ?? '';
  if (persona) {
    text += ` Your personality: ${persona}`;
  }
  return text.trim();
}

export function toLangChainMessages(
  messages: ChatMessage[],
  systemText: string
): BaseMessage[] {
  const converted: BaseMessage[] = [];
  if (systemText) converted.push(new SystemMessage(systemText));
  for (const message of messages) {
    converted.push(
      message.role === 'assistant' ? new AIMessage(message.content) : new HumanMessage(message.content)
    );
  }
  return converted;
}

/**
 * Gateway backed by LangChain chat models. One provider per component and model, created lazily.
 * Calls are bounded by LLM_CALL_TIMEOUT_MS and never retried.
 */
export class LangChainGateway implements Gateway {
  private readonly providers = new Map<string, LLMProvider>();

  constructor(
    private readonly config: LLMEnvConfig,
    private readonly providerFactory: ProviderFactory = createLLMProvider
  ) {}

  async complete(messages: ChatMessage[], options: CompletionOptions): Promise<string> {
    const { component } = options;
    const startTime = Date.now();
    const controller = new AbortController();

    try {
      const provider = this.providerFor(options);
      const prompt = toLangChainMessages(
        messages,
        buildSystemText(options.systemInstructions, options.persona)
      );
      const response = await withTimeout(
        provider.invoke(prompt, controller.signal),
        this.config.LLM_CALL_TIMEOUT_MS,
        `${component} LLM call`
      );
      log(`[Gateway] ${component} completed in ${Date.now() - startTime}ms`);
      return response.content;
    } catch (error) {
      controller.abort();
      const detail = extractErrorMessage(error);
      logError(`[Gateway] ${component} failed after ${Date.now() - startTime}ms: ${detail}`);
      throw new TransportError(component, detail);
    }
  }

  private providerFor({ component, modelId }: CompletionOptions): LLMProvider {
    const key = `${component}:${modelId ?? ''}`;
    let provider = this.providers.get(key);
    if (!provider) {
      provider = this.providerFactory(component, this.config, modelId);
      this.providers.set(key, provider);
    }
    return provider;
  }
}
