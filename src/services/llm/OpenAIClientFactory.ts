import OpenAI from 'openai';
import type { Config } from '../../config/index.js';

const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';

export class OpenAIClientFactory {
  static create(llm: Config['llm']): OpenAI {
    const clientConfig: { apiKey: string; baseURL?: string; timeout?: number; maxRetries?: number } = {
      apiKey: llm.apiKey,
      timeout: llm.timeoutMs,
      // ExtractionClient owns retries and backoff.
      maxRetries: 0,
    };

    if (llm.provider === 'openrouter') {
      clientConfig.baseURL = OPENROUTER_BASE_URL;
    }

    return new OpenAI(clientConfig);
  }
}
