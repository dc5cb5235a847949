import { describe, it, expect } from 'vitest';
import { isRetryableStatus, toTransportError } from './transportErrors.js';
import { LLMTransportError } from '../../utils/errors.js';

describe('isRetryableStatus', () => {
  it('retries network failures, throttling and server errors', () => {
    expect(isRetryableStatus(undefined)).toBe(true);
    expect(isRetryableStatus(429)).toBe(true);
    expect(isRetryableStatus(408)).toBe(true);
    expect(isRetryableStatus(503)).toBe(true);
  });

  it('gives up on other client errors', () => {
    expect(isRetryableStatus(400)).toBe(false);
    expect(isRetryableStatus(401)).toBe(false);
    expect(isRetryableStatus(404)).toBe(false);
  });
});

describe('toTransportError', () => {
  it('wraps provider errors with their status', () => {
    const cause = new Error('Unauthorized');
    const error = toTransportError('openai', cause, 401);

    expect(error).toBeInstanceOf(LLMTransportError);
    expect(error.message).toBe('openai request failed: Unauthorized');
    expect(error.retryable).toBe(false);
    expect(error.status).toBe(401);
    expect(error.details).toBe(cause);
  });

  it('passes transport errors through unchanged', () => {
    const original = new LLMTransportError('LLM call timed out after 10ms');
    expect(toTransportError('anthropic', original)).toBe(original);
  });

  it('describes non-error values', () => {
    expect(toTransportError('openrouter', 'socket hang up').message).toBe('openrouter request failed: socket hang up');
  });
});
