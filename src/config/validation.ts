import { z } from 'zod';

export const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
export const nodeEnvSchema = z.enum(['development', 'production', 'test']);
export const llmProviderSchema = z.enum(['openai', 'anthropic', 'openrouter']);

export const DEFAULT_MODELS: Record<z.infer<typeof llmProviderSchema>, string> = {
  openai: 'gpt-4o-mini',
  anthropic: 'claude-3-5-haiku-latest',
  openrouter: 'openai/gpt-4o-mini',
};

export const configSchema = z.object({
  server: z.object({
    nodeEnv: nodeEnvSchema.default('development'),
    logLevel: logLevelSchema.default('info'),
  }),
  llm: z.object({
    provider: llmProviderSchema.default('openai'),
    apiKey: z.string().min(1),
    model: z.string().min(1),
    maxTokens: z.number().int().positive().default(4000),
    temperature: z.number().min(0).max(2).default(0),
    timeoutMs: z.number().int().positive().default(60_000),
  }),
  extraction: z.object({
    maxConcurrentRequests: z.number().int().positive().default(5),
    maxAttempts: z.number().int().positive().default(3),
    maxCorpusChars: z.number().int().positive().default(15_000),
    retryInitialDelayMs: z.number().int().nonnegative().default(1_000),
    retryMaxDelayMs: z.number().int().nonnegative().default(60_000),
    repromptOnMalformed: z.boolean().default(false),
  }),
  database: z.object({
    path: z.string().min(1).default('./data/records.db'),
  }),
  extractionLog: z.object({
    enabled: z.boolean().default(true),
    dbPath: z.string().min(1).default('./data/extraction.db'),
  }),
});

export type Config = z.infer<typeof configSchema>;
