import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors.js';

/**
 * Process configuration, read once at startup.
 *
 * The LLM settings follow Azure OpenAI naming (endpoint, API version,
 * deployment). With LLM_PROVIDER=openai any OpenAI-compatible endpoint works:
 * LLM_ENDPOINT becomes the base URL and LLM_DEPLOYMENT the model name.
 */
const envSchema = z
  .object({
    NODE_ENV: z.string().default('development'),
    PORT: z.coerce.number().int().positive().default(3002),
    DB_PATH: z.string().min(1).default(path.resolve(process.cwd(), 'data', 'mentor.db')),
    PROMPTS_PATH: z.string().min(1).default(path.resolve(process.cwd(), 'config', 'prompts.json')),

    LLM_PROVIDER: z.enum(['azure', 'openai']).default('azure'),
    LLM_API_KEY: z.string().min(1, 'LLM_API_KEY is required'),
    LLM_ENDPOINT: z.string().url().optional(),
    LLM_API_VERSION: z.string().min(1).default('2024-02-15-preview'),
    LLM_DEPLOYMENT: z.string().min(1).default('gpt-4.1'),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
    LLM_MAX_TOKENS: z.coerce.number().int().positive().default(800),
    LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

    HISTORY_WINDOW: z.coerce.number().int().positive().default(10),
  })
  .refine((env) => env.LLM_PROVIDER !== 'azure' || env.LLM_ENDPOINT !== undefined, {
    message: 'LLM_ENDPOINT is required when LLM_PROVIDER is azure',
    path: ['LLM_ENDPOINT'],
  });

export interface LlmConfig {
  provider: 'azure' | 'openai';
  apiKey: string;
  endpoint?: string;
  apiVersion: string;
  deployment: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

export interface AppConfig {
  env: string;
  port: number;
  dbPath: string;
  promptsPath: string;
  historyWindow: number;
  llm: LlmConfig;
}

/** Validate an environment map. Throws ConfigError naming every bad key. */
export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid environment: ${problems.join('; ')}`);
  }

  const e = result.data;
  return {
    env: e.NODE_ENV,
    port: e.PORT,
    dbPath: e.DB_PATH,
    promptsPath: e.PROMPTS_PATH,
    historyWindow: e.HISTORY_WINDOW,
    llm: {
      provider: e.LLM_PROVIDER,
      apiKey: e.LLM_API_KEY,
      endpoint: e.LLM_ENDPOINT,
      apiVersion: e.LLM_API_VERSION,
      deployment: e.LLM_DEPLOYMENT,
      temperature: e.LLM_TEMPERATURE,
      maxTokens: e.LLM_MAX_TOKENS,
      timeoutMs: e.LLM_TIMEOUT_MS,
    },
  };
}

/** Load .env (if present) into process.env, then validate. */
export function loadConfig(): AppConfig {
  dotenv.config();
  return parseConfig(process.env);
}
