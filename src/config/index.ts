import { ZodError } from 'zod';
import { ConfigurationError } from '../utils/errors.js';
import { configSchema, DEFAULT_MODELS, llmProviderSchema, type Config } from './validation.js';

export type { Config } from './validation.js';

type Env = Record<string, string | undefined>;

const int = (value: string | undefined): number | undefined =>
  value ? parseInt(value, 10) : undefined;

const float = (value: string | undefined): number | undefined =>
  value ? parseFloat(value) : undefined;

const apiKeyFor = (env: Env): string => {
  switch (env.LLM_PROVIDER) {
    case 'anthropic':
      return env.ANTHROPIC_API_KEY || '';
    case 'openrouter':
      return env.OPENROUTER_API_KEY || '';
    default:
      return env.OPENAI_API_KEY || '';
  }
};

// Unknown providers keep the OpenAI default; the schema then reports the provider itself.
const modelFor = (env: Env): string => {
  if (env.LLM_MODEL) return env.LLM_MODEL;
  const provider = llmProviderSchema.safeParse(env.LLM_PROVIDER || 'openai');
  return DEFAULT_MODELS[provider.success ? provider.data : 'openai'];
};

/**
 * Builds the runtime settings from environment variables. The CLI loads `.env`
 * through dotenv first; everything below the CLI receives the parsed value.
 */
export function loadConfig(env: Env = process.env): Config {
  const rawConfig = {
    server: {
      nodeEnv: env.NODE_ENV || undefined,
      logLevel: env.LOG_LEVEL || undefined,
    },
    llm: {
      provider: env.LLM_PROVIDER || undefined,
      apiKey: apiKeyFor(env),
      model: modelFor(env),
      maxTokens: int(env.LLM_MAX_TOKENS),
      temperature: float(env.LLM_TEMPERATURE),
      timeoutMs: int(env.LLM_TIMEOUT_MS),
    },
    extraction: {
      maxConcurrentRequests: int(env.MAX_CONCURRENT_REQUESTS),
      maxAttempts: int(env.MAX_RETRIES),
      maxCorpusChars: int(env.MAX_CORPUS_CHARS),
      retryInitialDelayMs: int(env.RETRY_INITIAL_DELAY_MS),
      retryMaxDelayMs: int(env.RETRY_MAX_DELAY_MS),
      repromptOnMalformed: env.REPROMPT_ON_MALFORMED === 'true',
    },
    database: {
      path: env.DATABASE_PATH || undefined,
    },
    extractionLog: {
      enabled: env.EXTRACTION_LOG_ENABLED !== 'false',
      dbPath: env.EXTRACTION_LOG_DB || undefined,
    },
  };

  try {
    return configSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
    }
    throw error;
  }
}
