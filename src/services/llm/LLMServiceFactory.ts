import type { Config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import type { LLMService } from './LLMService.interface.js';
import { OpenAILLMService } from './OpenAILLMService.js';
import { AnthropicLLMService } from './AnthropicLLMService.js';

export class LLMServiceFactory {
  static createLLMService(llm: Config['llm']): LLMService {
    switch (llm.provider) {
      case 'openai':
      case 'openrouter':
        logger.info({ provider: llm.provider, model: llm.model }, 'Initializing OpenAI-compatible LLM service');
        return new OpenAILLMService(llm);
      case 'anthropic':
        logger.info({ provider: llm.provider, model: llm.model }, 'Initializing Anthropic LLM service');
        return new AnthropicLLMService(llm);
      default: {
        const unsupported: never = llm.provider;
        throw new Error(`Unsupported LLM provider: ${String(unsupported)}`);
      }
    }
  }
}
