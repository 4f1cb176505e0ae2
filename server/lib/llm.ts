import OpenAI, { AzureOpenAI, APIConnectionTimeoutError, APIError, APIUserAbortError } from 'openai';
import type { LlmConfig } from './config.js';
import { ProviderError } from './errors.js';

/**
 * LLM client using the OpenAI SDK.
 *
 * Defaults to an Azure OpenAI deployment. With LLM_PROVIDER=openai it talks
 * to any OpenAI-compatible endpoint (OpenAI, Groq, Together, OpenRouter...).
 */

export interface ModelConfig {
  model: string;
  temperature: number;
  maxTokens: number;
}

/** Prompt text in, completion text out. */
export type CompletionFn = (prompt: string, config: ModelConfig, signal?: AbortSignal) => Promise<string>;

export function createLlmClient(config: LlmConfig): OpenAI {
  // Retries are the caller's decision, never the SDK's.
  if (config.provider === 'azure') {
    return new AzureOpenAI({
      apiKey: config.apiKey,
      endpoint: config.endpoint,
      apiVersion: config.apiVersion,
      deployment: config.deployment,
      maxRetries: 0,
    });
  }
  return new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.endpoint,
    maxRetries: 0,
  });
}

export function modelConfigFrom(config: LlmConfig): ModelConfig {
  return {
    model: config.deployment,
    temperature: config.temperature,
    maxTokens: config.maxTokens,
  };
}

/** Turn SDK failures into ProviderError. */
export function toProviderError(error: unknown): ProviderError {
  if (error instanceof ProviderError) return error;
  if (error instanceof APIConnectionTimeoutError || error instanceof APIUserAbortError) {
    return new ProviderError('LLM request timed out or was aborted', 'timeout', { cause: error });
  }
  if (error instanceof APIError) {
    if (error.status === 401) {
      return new ProviderError('LLM rejected the API key. Check LLM_API_KEY.', 'failed', { cause: error });
    }
    if (error.status === 429) {
      return new ProviderError('LLM rate limited the request', 'failed', { cause: error });
    }
    return new ProviderError(`LLM request failed with status ${error.status ?? 'unknown'}`, 'failed', { cause: error });
  }
  return new ProviderError('LLM request failed', 'failed', { cause: error });
}

/**
 * Send one prompt and get the complete response.
 */
export function createCompletion(client: OpenAI): CompletionFn {
  return async (prompt, config, signal) => {
    let content: string | null | undefined;
    try {
      const response = await client.chat.completions.create(
        {
          model: config.model,
          messages: [{ role: 'user', content: prompt }],
          max_tokens: config.maxTokens,
          temperature: config.temperature,
        },
        { signal }
      );
      content = response.choices[0]?.message?.content;
    } catch (error: unknown) {
      throw toProviderError(error);
    }

    const text = content?.trim();
    if (!text) {
      throw new ProviderError('LLM returned an empty completion');
    }
    return text;
  };
}

/**
 * Check if the LLM is configured and reachable. Gives up after `timeoutMs`.
 */
export async function checkLLM(
  complete: CompletionFn,
  config: ModelConfig,
  timeoutMs: number
): Promise<{ ok: boolean; error?: string }> {
  try {
    await complete('Hi', { ...config, maxTokens: 5 }, AbortSignal.timeout(timeoutMs));
    return { ok: true };
  } catch (error: unknown) {
    return { ok: false, error: error instanceof ProviderError ? error.message : String(error) };
  }
}
