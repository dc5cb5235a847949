import { describe, it, expect } from 'vitest';
import { BatchOrchestrator } from './BatchOrchestrator.js';
import { ExtractionClient, type ExtractionClientOptions } from './ExtractionClient.js';
import { compileSchema } from '../../domain/schema/RecordTypeContract.js';
import { PromptTemplate } from '../prompt/PromptTemplate.js';
import { FakeLLMService } from '../../testing/FakeLLMService.js';
import type { BatchItem } from '../../types/extraction.types.js';

const options: ExtractionClientOptions = {
  maxCorpusChars: 1000,
  maxAttempts: 2,
  timeoutMs: 1000,
  backoff: { initialDelayMs: 0, maxDelayMs: 0 },
  repromptOnMalformed: false,
};

const contract = compileSchema({ n: 'int' });
const template = PromptTemplate.parse('{chat_id}');

const makeItems = (count: number): BatchItem[] =>
  Array.from({ length: count }, (_, i) => ({ id: String(i), email: null, corpus: `chat ${i}` }));

describe('BatchOrchestrator', () => {
  it('returns one result per item in input order, whatever order calls finish in', async () => {
    const items = makeItems(10);
    const failing = new Set(['1', '4', '5', '8']);
    const llm = new FakeLLMService(
      request => {
        if (failing.has(request.prompt)) throw new Error('socket hang up');
        return JSON.stringify({ n: Number(request.prompt) * 10 });
      },
      // Later items answer first.
      request => (10 - Number(request.prompt)) * 2
    );
    const orchestrator = new BatchOrchestrator(new ExtractionClient(llm, options));

    const results = await orchestrator.run(items, contract, template, 4);

    expect(results).toHaveLength(10);
    expect(results.map(result => result.item.id)).toEqual(items.map(item => item.id));
    results.forEach((result, index) => {
      if (failing.has(String(index))) {
        expect(result).toMatchObject({ status: 'failure', kind: 'TransportError', attempts: 2 });
      } else {
        expect(result).toMatchObject({ status: 'success', record: { n: index * 10 } });
      }
    });
  });

  it('keeps in-flight calls at or below the concurrency limit', async () => {
    const llm = new FakeLLMService(() => '{"n": 1}', () => 10);
    const orchestrator = new BatchOrchestrator(new ExtractionClient(llm, options));

    const results = await orchestrator.run(makeItems(12), contract, template, 3);

    expect(results.every(result => result.status === 'success')).toBe(true);
    expect(llm.peakInFlight).toBe(3);
    expect(llm.requests).toHaveLength(12);
  });

  it('reports each settled item', async () => {
    const llm = new FakeLLMService(request => `{"n": ${request.prompt}}`);
    const orchestrator = new BatchOrchestrator(new ExtractionClient(llm, options));
    const settled: number[] = [];

    await orchestrator.run(makeItems(5), contract, template, 2, { onSettled: (_, index) => settled.push(index) });

    expect([...settled].sort()).toEqual([0, 1, 2, 3, 4]);
  });

  it('resolves every item when the settled hook throws', async () => {
    const llm = new FakeLLMService(request => `{"n": ${request.prompt}}`);
    const orchestrator = new BatchOrchestrator(new ExtractionClient(llm, options));
    const settled: number[] = [];

    const results = await orchestrator.run(makeItems(5), contract, template, 2, {
      onSettled: (_, index) => {
        if (index === 0) throw new Error('SQLITE_BUSY: database is locked');
        settled.push(index);
      },
    });

    expect(results).toHaveLength(5);
    expect(results.map(result => result.status)).toEqual(['success', 'success', 'success', 'success', 'success']);
    expect(results.map(result => (result.status === 'success' ? result.record.n : null))).toEqual([0, 1, 2, 3, 4]);
    expect([...settled].sort()).toEqual([1, 2, 3, 4]);
    expect(llm.requests).toHaveLength(5);
  });

  it('marks items that never started as cancelled once aborted', async () => {
    const controller = new AbortController();
    const llm = new FakeLLMService(() => {
      controller.abort();
      return '{"n": 7}';
    });
    const orchestrator = new BatchOrchestrator(new ExtractionClient(llm, options));

    const results = await orchestrator.run(makeItems(3), contract, template, 1, { signal: controller.signal });

    expect(results[0]).toMatchObject({ status: 'success', record: { n: 7 } });
    expect(results[1]).toMatchObject({ status: 'failure', kind: 'Cancelled', attempts: 0 });
    expect(results[2]).toMatchObject({ status: 'failure', kind: 'Cancelled', attempts: 0 });
    expect(llm.requests).toHaveLength(1);
  });

  it('makes no calls when the run is aborted up front', async () => {
    const controller = new AbortController();
    controller.abort();
    const llm = new FakeLLMService(() => '{"n": 1}');
    const orchestrator = new BatchOrchestrator(new ExtractionClient(llm, options));

    const results = await orchestrator.run(makeItems(4), contract, template, 2, { signal: controller.signal });

    expect(results.every(result => result.status === 'failure' && result.kind === 'Cancelled')).toBe(true);
    expect(llm.requests).toHaveLength(0);
  });
});
