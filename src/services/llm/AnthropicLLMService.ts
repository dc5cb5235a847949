import Anthropic from '@anthropic-ai/sdk';
import type { Config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import type { Completion, CompletionRequest, LLMService } from './LLMService.interface.js';
import { toTransportError } from './transportErrors.js';

export class AnthropicLLMService implements LLMService {
  readonly provider = 'anthropic';
  private client: Anthropic;

  constructor(
    private settings: Config['llm'],
    client?: Anthropic
  ) {
    this.client =
      client ??
      new Anthropic({
        apiKey: settings.apiKey,
        timeout: settings.timeoutMs,
        maxRetries: 0,
      });
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.client.messages.create({
        model: this.settings.model,
        max_tokens: 10,
        messages: [{ role: 'user', content: 'test' }],
      });
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
      const message = await this.client.messages.create(
        {
          model: this.settings.model,
          max_tokens: this.settings.maxTokens,
          temperature: this.settings.temperature,
          system: request.systemPrompt,
          messages: [{ role: 'user', content: request.prompt }],
        },
        { signal: request.signal }
      );

      const text = message.content
        .map(block => (block.type === 'text' ? block.text : ''))
        .join('');

      return {
        text,
        model: message.model,
        tokensUsed: message.usage.input_tokens + message.usage.output_tokens,
      };
    } catch (error) {
      const status = error instanceof Anthropic.APIError ? error.status : undefined;
      throw toTransportError(this.provider, error, status);
    }
  }
}
