import OpenAI from 'openai';
import type { Config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import type { Completion, CompletionRequest, LLMService } from './LLMService.interface.js';
import { OpenAIClientFactory } from './OpenAIClientFactory.js';
import { toTransportError } from './transportErrors.js';

/** Serves both OpenAI and OpenRouter, which speaks the same chat completions API. */
export class OpenAILLMService implements LLMService {
  readonly provider: string;
  private client: OpenAI;

  constructor(
    private settings: Config['llm'],
    client?: OpenAI
  ) {
    this.provider = settings.provider;
    this.client = client ?? OpenAIClientFactory.create(settings);
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.client.models.list();
      return true;
    } catch (error) {
      logger.warn({ error, provider: this.provider }, 'LLM connection test failed');
      return false;
    }
  }

  async complete(request: CompletionRequest): Promise<Completion> {
    logger.debug(
      { provider: this.provider, model: this.settings.model, promptLength: request.prompt.length },
      'Sending completion request'
    );

    try {
      const completion = await this.client.chat.completions.create(
        {
          model: this.settings.model,
          messages: [
            { role: 'system', content: request.systemPrompt },
            { role: 'user', content: request.prompt },
          ],
          temperature: this.settings.temperature,
          max_tokens: this.settings.maxTokens,
          response_format: { type: 'json_object' },
        },
        { signal: request.signal }
      );

      const content = completion.choices[0]?.message?.content ?? '';
      if (!content) {
        logger.warn({ provider: this.provider, model: completion.model }, 'Empty completion content');
      }

      return {
        text: content,
        model: completion.model,
        tokensUsed: completion.usage?.total_tokens,
      };
    } catch (error) {
      const status = error instanceof OpenAI.APIError ? error.status : undefined;
      throw toTransportError(this.provider, error, status);
    }
  }
}
