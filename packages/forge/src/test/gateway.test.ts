import { SystemMessage, type BaseMessage } from '@langchain/core/messages';
import { describe, expect, it } from 'vitest';
import { loadConfig } from '@toolsmith/common';
import { TransportError } from '../errors';
import { buildSystemText, LangChainGateway } from '../llm/gateway';
import type { ComponentType, LLMConfig, LLMProvider, LLMResponse } from '../llm/types';

class FakeProvider implements LLMProvider {
  readonly received: BaseMessage[][] = [];
  readonly signals: Array<AbortSignal | undefined> = [];

  constructor(private readonly reply: (messages: BaseMessage[]) => Promise<LLMResponse>) {}

  invoke(messages: BaseMessage[], signal?: AbortSignal): Promise<LLMResponse> {
    this.received.push(messages);
    this.signals.push(signal);
    return this.reply(messages);
  }

  getModel(): string {
    return 'fake-model';
  }

  getProvider(): LLMConfig['provider'] {
    return 'ollama';
  }

  getConfig(): LLMConfig {
    return { provider: 'ollama', model: 'fake-model', temperature: 0 };
  }
}

describe('LangChainGateway', () => {
  it('should send the system text first and return the reply content', async () => {
    const provider = new FakeProvider(async () => ({ content: 'done' }));
    const created: ComponentType[] = [];
    const gateway = new LangChainGateway(loadConfig({}), (component) => {
      created.push(component);
      return provider;
    });

    const reply = await gateway.complete(
      [
        { role: 'user', content: 'hi' },
        { role: 'assistant', content: 'hello' },
        { role: 'user', content: 'add 1 and 2' },
      ],
      { component: 'function_selector', systemInstructions: 'Be strict.', persona: 'terse' }
    );
    await gateway.complete([{ role: 'user', content: 'again' }], { component: 'function_selector' });

    expect(reply).toBe('done');
    expect(created).toEqual(['function_selector']);
    const [first] = provider.received;
    expect(first).toHaveLength(4);
    expect(first[0]).toBeInstanceOf(SystemMessage);
    expect(first[0].content).toBe('Be strict. Your personality: terse');
    expect(first.slice(1).map((message) => message.content)).toEqual(['hi', 'hello', 'add 1 and 2']);
    expect(provider.received[1]).toHaveLength(1);
  });

  it('should turn provider failures into transport errors', async () => {
    const provider = new FakeProvider(async () => {
      throw new Error('connection refused');
    });
    const gateway = new LangChainGateway(loadConfig({}), () => provider);

    const call = gateway.complete([{ role: 'user', content: 'x' }], { component: 'spec_generator' });
    await expect(call).rejects.toBeInstanceOf(TransportError);
    await expect(call).rejects.toThrow('LLM call for spec_generator failed: connection refused');
  });

  it('should abort a call that outlives the timeout', async () => {
    const provider = new FakeProvider(() => new Promise<LLMResponse>(() => {}));
    const gateway = new LangChainGateway(loadConfig({ LLM_CALL_TIMEOUT_MS: '20' }), () => provider);

    await expect(
      gateway.complete([{ role: 'user', content: 'x' }], { component: 'code_synthesizer' })
    ).rejects.toThrow('LLM call for code_synthesizer failed: code_synthesizer LLM call timed out after 20ms');
    expect(provider.signals[0]?.aborted).toBe(true);
  });
});

describe('buildSystemText', () => {
  it('should return the persona alone when there are no instructions', () => {
    expect(buildSystemText(undefined, 'cheerful')).toBe('Your personality: cheerful');
    expect(buildSystemText()).toBe('');
  });
});
