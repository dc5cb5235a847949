import { logger } from '../../utils/logger.js';
import { LLMTransportError } from '../../utils/errors.js';
import { formatFieldErrors, type RecordTypeContract } from '../../domain/schema/RecordTypeContract.js';
import { isPlainObject } from '../../domain/schema/types.js';
import type { Completion, LLMService } from '../llm/LLMService.interface.js';
import { toTransportError } from '../llm/transportErrors.js';
import { JSON_EXTRACTION_SYSTEM_PROMPT, JSON_REPROMPT_SUFFIX } from '../llm/prompts/json-extraction.js';
import type { PromptTemplate } from '../prompt/PromptTemplate.js';
import type { BatchItem, ExtractionFailure, ExtractionResult, FailureKind } from '../../types/extraction.types.js';

export interface BackoffOptions {
  initialDelayMs: number;
  maxDelayMs: number;
}

export interface ExtractionClientOptions {
  maxCorpusChars: number;
  maxAttempts: number;
  timeoutMs: number;
  backoff: BackoffOptions;
  repromptOnMalformed: boolean;
  now?: () => Date;
}

type CallOutcome =
  | { ok: true; completion: Completion; attempts: number }
  | { ok: false; error: LLMTransportError; attempts: number };

type ParseOutcome = { ok: true; value: unknown } | { ok: false; message: string };

/** Fields filled from the batch item when the model leaves them out. */
const ITEM_FIELDS: Record<string, (item: BatchItem) => string | null> = {
  chat_id: item => item.id,
  user_email: item => item.email,
};

const EXTRACTED_AT_FIELD = 'extracted_at';

const FENCED_BLOCK = /^```(?:json)?\s*([\s\S]*?)\s*```$/i;

const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/** Keeps the opening of the conversation; later messages are dropped first. */
export const truncateCorpus = (corpus: string, maxChars: number): string =>
  corpus.length > maxChars ? corpus.slice(0, maxChars) : corpus;

/** Exponential growth capped at maxDelayMs, with full jitter. */
export const backoffDelay = (attempt: number, backoff: BackoffOptions, random: () => number = Math.random): number =>
  Math.floor(random() * Math.min(backoff.maxDelayMs, backoff.initialDelayMs * 2 ** (attempt - 1)));

export const parseJsonResponse = (text: string): ParseOutcome => {
  const trimmed = text.trim();
  const fenced = FENCED_BLOCK.exec(trimmed);
  const body = fenced ? fenced[1] : trimmed;
  if (!body) {
    return { ok: false, message: 'Empty response' };
  }
  try {
    return { ok: true, value: JSON.parse(body) };
  } catch (error) {
    return { ok: false, message: `Response is not valid JSON: ${error instanceof Error ? error.message : String(error)}` };
  }
};

/**
 * Runs one batch item through the LLM: render, call with timeout and retry,
 * parse, validate. Every outcome is returned as a value; only a broken template
 * escapes as an exception.
 */
export class ExtractionClient {
  private readonly now: () => Date;

  constructor(
    private readonly llm: LLMService,
    private readonly options: ExtractionClientOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /** The exact prompt `extract` sends for this item. */
  buildPrompt(item: BatchItem, contract: RecordTypeContract, template: PromptTemplate): string {
    const corpus = truncateCorpus(item.corpus, this.options.maxCorpusChars);
    if (corpus.length < item.corpus.length) {
      logger.debug(
        { itemId: item.id, originalLength: item.corpus.length, maxChars: this.options.maxCorpusChars },
        'Corpus truncated'
      );
    }
    return template.render({ chat_id: item.id, user_email: item.email ?? '', corpus }, contract);
  }

  async extract(item: BatchItem, contract: RecordTypeContract, template: PromptTemplate): Promise<ExtractionResult> {
    const prompt = this.buildPrompt(item, contract, template);

    let outcome = await this.completeWithRetry(item, prompt);
    let attempts = outcome.attempts;
    if (!outcome.ok) {
      return this.failure(item, 'TransportError', outcome.error.message, attempts);
    }

    let parsed = parseJsonResponse(outcome.completion.text);
    if (!parsed.ok && this.options.repromptOnMalformed) {
      logger.info({ itemId: item.id, reason: parsed.message }, 'Malformed response, reprompting once');
      outcome = await this.completeWithRetry(item, prompt + JSON_REPROMPT_SUFFIX);
      attempts += outcome.attempts;
      if (!outcome.ok) {
        return this.failure(item, 'TransportError', outcome.error.message, attempts);
      }
      parsed = parseJsonResponse(outcome.completion.text);
    }

    const rawOutput = outcome.completion.text;
    if (!parsed.ok) {
      return this.failure(item, 'MalformedResponse', parsed.message, attempts, { rawOutput });
    }

    const validation = contract.validate(this.withItemFields(parsed.value, item, contract));
    if (!validation.success) {
      return this.failure(item, 'SchemaViolation', formatFieldErrors(validation.errors), attempts, {
        errors: validation.errors,
        rawOutput,
      });
    }

    logger.debug({ itemId: item.id, attempts, model: outcome.completion.model }, 'Extraction succeeded');
    return {
      status: 'success',
      item,
      record: validation.data,
      attempts,
      model: outcome.completion.model,
      rawOutput,
    };
  }

  private async completeWithRetry(item: BatchItem, prompt: string): Promise<CallOutcome> {
    for (let attempt = 1; ; attempt++) {
      try {
        const completion = await this.completeWithTimeout(prompt);
        return { ok: true, completion, attempts: attempt };
      } catch (error) {
        const transportError = toTransportError(this.llm.provider, error);
        if (!transportError.retryable || attempt >= this.options.maxAttempts) {
          return { ok: false, error: transportError, attempts: attempt };
        }
        const delayMs = backoffDelay(attempt, this.options.backoff);
        logger.warn(
          { itemId: item.id, attempt, delayMs, status: transportError.status, error: transportError.message },
          'LLM call failed, retrying'
        );
        await sleep(delayMs);
      }
    }
  }

  private async completeWithTimeout(prompt: string): Promise<Completion> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new LLMTransportError(`LLM call timed out after ${this.options.timeoutMs}ms`));
      }, this.options.timeoutMs);
    });

    try {
      return await Promise.race([
        this.llm.complete({ prompt, systemPrompt: JSON_EXTRACTION_SYSTEM_PROMPT, signal: controller.signal }),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  private withItemFields(candidate: unknown, item: BatchItem, contract: RecordTypeContract): unknown {
    if (!isPlainObject(candidate)) return candidate;

    const merged: Record<string, unknown> = { ...candidate };
    for (const [field, pick] of Object.entries(ITEM_FIELDS)) {
      const current = merged[field];
      const blank = current === undefined || current === null || (typeof current === 'string' && !current.trim());
      if (blank && contract.describePath(field)) {
        merged[field] = pick(item);
      }
    }
    if (contract.describePath(EXTRACTED_AT_FIELD)) {
      merged[EXTRACTED_AT_FIELD] = this.now().toISOString();
    }
    return merged;
  }

  private failure(
    item: BatchItem,
    kind: FailureKind,
    message: string,
    attempts: number,
    extra: Pick<ExtractionFailure, 'errors' | 'rawOutput'> = {}
  ): ExtractionFailure {
    logger.warn({ itemId: item.id, kind, attempts, message }, 'Extraction failed');
    return { status: 'failure', item, kind, message, attempts, ...extra };
  }
}
