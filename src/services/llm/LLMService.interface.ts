export interface CompletionRequest {
  prompt: string;
  systemPrompt: string;
  signal?: AbortSignal;
}

export interface Completion {
  text: string;
  model: string;
  tokensUsed?: number;
}

/**
 * One prompt in, one text out. Implementations raise `LLMTransportError` for
 * anything that went wrong on the wire and never retry on their own.
 */
export interface LLMService {
  readonly provider: string;
  complete(request: CompletionRequest): Promise<Completion>;
  testConnection(): Promise<boolean>;
}
