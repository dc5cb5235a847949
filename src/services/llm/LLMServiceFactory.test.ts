import { describe, it, expect } from 'vitest';
import { LLMServiceFactory } from './LLMServiceFactory.js';
import { OpenAILLMService } from './OpenAILLMService.js';
import { AnthropicLLMService } from './AnthropicLLMService.js';
import { loadConfig } from '../../config/index.js';

describe('LLMServiceFactory', () => {
  it('serves OpenAI and OpenRouter through the OpenAI client', () => {
    const openai = LLMServiceFactory.createLLMService(loadConfig({ OPENAI_API_KEY: 'test-secret' }).llm);
    const openrouter = LLMServiceFactory.createLLMService(
      loadConfig({ LLM_PROVIDER: 'openrouter', OPENROUTER_API_KEY: 'test-secret' }).llm
    );

    expect(openai).toBeInstanceOf(OpenAILLMService);
    expect(openai.provider).toBe('openai');
    expect(openrouter).toBeInstanceOf(OpenAILLMService);
    expect(openrouter.provider).toBe('openrouter');
  });

  it('creates the Anthropic service', () => {
    const service = LLMServiceFactory.createLLMService(
      loadConfig({ LLM_PROVIDER: 'anthropic', ANTHROPIC_API_KEY: 'test-secret' }).llm
    );

    expect(service).toBeInstanceOf(AnthropicLLMService);
    expect(service.provider).toBe('anthropic');
  });
});
