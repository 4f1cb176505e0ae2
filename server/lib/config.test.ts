import { describe, expect, it } from 'vitest';
import { parseConfig } from './config.js';
import { ConfigError } from './errors.js';

const AZURE = { LLM_API_KEY: 'test-key', LLM_ENDPOINT: 'https://example.openai.azure.com' };

describe('parseConfig', () => {
  it('applies defaults', () => {
    const config = parseConfig(AZURE);
    expect(config.port).toBe(3002);
    expect(config.historyWindow).toBe(10);
    expect(config.llm).toEqual({
      provider: 'azure',
      apiKey: 'test-key',
      endpoint: 'https://example.openai.azure.com',
      apiVersion: '2024-02-15-preview',
      deployment: 'gpt-4.1',
      temperature: 0.7,
      maxTokens: 800,
      timeoutMs: 30000,
    });
  });

  it('coerces numeric settings', () => {
    const config = parseConfig({ ...AZURE, HISTORY_WINDOW: '4', LLM_TIMEOUT_MS: '5000', PORT: '8080' });
    expect(config.historyWindow).toBe(4);
    expect(config.llm.timeoutMs).toBe(5000);
    expect(config.port).toBe(8080);
  });

  it('requires an API key', () => {
    expect(() => parseConfig({ LLM_ENDPOINT: AZURE.LLM_ENDPOINT })).toThrow(ConfigError);
    expect(() => parseConfig({ LLM_ENDPOINT: AZURE.LLM_ENDPOINT })).toThrow(/LLM_API_KEY/);
  });

  it('requires an endpoint for azure but not for openai', () => {
    expect(() => parseConfig({ LLM_API_KEY: 'test-key' })).toThrow(/LLM_ENDPOINT/);
    expect(parseConfig({ LLM_API_KEY: 'test-key', LLM_PROVIDER: 'openai' }).llm.endpoint).toBeUndefined();
  });

  it('rejects values of the wrong shape', () => {
    expect(() => parseConfig({ ...AZURE, HISTORY_WINDOW: 'lots' })).toThrow(/HISTORY_WINDOW/);
    expect(() => parseConfig({ ...AZURE, LLM_PROVIDER: 'bedrock' })).toThrow(/LLM_PROVIDER/);
  });
});
