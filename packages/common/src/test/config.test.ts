import { describe, expect, it } from 'vitest';
import { getComponentConfigString, loadConfig, loadServerConfig } from '../config';
import { normalizeToolName, TimeoutError, withTimeout } from '../util';

describe('loadConfig', () => {
  it('should fall back to defaults for an empty environment', () => {
    const config = loadConfig({});
    expect(config).toMatchObject({
      LLM_PROVIDER: 'ollama',
      OLLAMA_URL: 'http://localhost:11434',
      LLM_CALL_TIMEOUT_MS: 120000,
      TOOLS_DIR: './tools',
      DEBUG_MAX_ATTEMPTS: 5,
      TOOL_CALL_TIMEOUT_MS: 5000,
      TOOL_LIST_CACHE_TTL_SECONDS: 300,
      TOOL_LIBRARY: 'none',
      GOOGLE_APPLICATION_CREDENTIALS: '',
    });
    expect(config.LLM_MAX_OUTPUT_TOKENS).toBeUndefined();
  });

  it('should coerce numeric settings from strings', () => {
    const config = loadConfig({ DEBUG_MAX_ATTEMPTS: '2', LLM_MAX_OUTPUT_TOKENS: '512', GITHUB_CACHE_TTL_SECONDS: '0' });
    expect(config.DEBUG_MAX_ATTEMPTS).toBe(2);
    expect(config.LLM_MAX_OUTPUT_TOKENS).toBe(512);
    expect(config.GITHUB_CACHE_TTL_SECONDS).toBe(0);
  });

  it('should reject an unknown provider and a non-positive budget', () => {
    expect(() => loadConfig({ LLM_PROVIDER: 'openai' })).toThrow();
    expect(() => loadConfig({ DEBUG_MAX_ATTEMPTS: '0' })).toThrow();
  });

  it('should add the server settings', () => {
    const config = loadServerConfig({ TOOL_SERVER_PORT: '9100', TOOLS_DIR: '/tmp/tools' });
    expect(config.TOOL_SERVER_PORT).toBe(9100);
    expect(config.TOOL_SERVER_HOST).toBe('0.0.0.0');
    expect(config.TOOLS_DIR).toBe('/tmp/tools');
  });
});

describe('getComponentConfigString', () => {
  it('should return the override for a component and ignore empty ones', () => {
    const config = loadConfig({ LLM_CONFIG_CODE_SYNTHESIZER: 'ollama:codellama:0.2:4096', LLM_CONFIG_INTENT_ROUTER: '' });
    expect(getComponentConfigString(config, 'code_synthesizer')).toBe('ollama:codellama:0.2:4096');
    expect(getComponentConfigString(config, 'intent_router')).toBeUndefined();
    expect(getComponentConfigString(config, 'spec_generator')).toBeUndefined();
  });
});

describe('withTimeout', () => {
  it('should resolve with the value of work that settles in time', async () => {
    await expect(withTimeout(Promise.resolve(7), 50, 'quick')).resolves.toBe(7);
  });

  it('should reject with a TimeoutError when the work outlasts the limit', async () => {
    const slow = new Promise<number>((resolve) => setTimeout(() => resolve(1), 200));
    const outcome = withTimeout(slow, 10, 'slow call');
    await expect(outcome).rejects.toBeInstanceOf(TimeoutError);
    await expect(outcome).rejects.toThrow('slow call timed out after 10ms');
  });
});

describe('normalizeToolName', () => {
  it('should lowercase and underscore tool names', () => {
    expect(normalizeToolName('  Text  Stats ')).toBe('text_stats');
    expect(normalizeToolName('calc')).toBe('calc');
  });

  it('should leave no path separators or leading dots', () => {
    expect(normalizeToolName('../escaped')).toBe('_escaped');
    expect(normalizeToolName('a/b\\c')).toBe('a_b_c');
    expect(normalizeToolName('..')).toBe('');
    expect(normalizeToolName('.hidden')).toBe('hidden');
  });
});
