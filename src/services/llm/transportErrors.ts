import { LLMTransportError } from '../../utils/errors.js';

const RETRYABLE_CLIENT_STATUSES = new Set([408, 409, 429]);

export const isRetryableStatus = (status: number | undefined): boolean =>
  status === undefined || status >= 500 || RETRYABLE_CLIENT_STATUSES.has(status);

export function toTransportError(provider: string, error: unknown, status?: number): LLMTransportError {
  if (error instanceof LLMTransportError) return error;
  const reason = error instanceof Error ? error.message : String(error);
  return new LLMTransportError(`${provider} request failed: ${reason}`, isRetryableStatus(status), status, error);
}
