import { logger } from '../../utils/logger.js';
import type { RecordTypeContract } from '../../domain/schema/RecordTypeContract.js';
import type { PromptTemplate } from '../prompt/PromptTemplate.js';
import type { BatchItem, ExtractionResult } from '../../types/extraction.types.js';
import { ConcurrencyGate } from './ConcurrencyGate.js';

/** The part of ExtractionClient the orchestrator depends on. */
export interface ItemExtractor {
  extract(item: BatchItem, contract: RecordTypeContract, template: PromptTemplate): Promise<ExtractionResult>;
}

export interface BatchRunOptions {
  /** Once aborted, items that have not started resolve as `Cancelled`. */
  signal?: AbortSignal;
  /** Called as each item settles. A throwing hook is logged and never fails the run. */
  onSettled?: (result: ExtractionResult, index: number) => void;
}

export class BatchOrchestrator {
  constructor(private readonly extractor: ItemExtractor) {}

  /**
   * Extracts every item with at most `concurrencyLimit` in flight. The returned
   * array is aligned with `items`, whatever order the calls complete in.
   */
  async run(
    items: readonly BatchItem[],
    contract: RecordTypeContract,
    template: PromptTemplate,
    concurrencyLimit: number,
    options: BatchRunOptions = {}
  ): Promise<ExtractionResult[]> {
    const gate = new ConcurrencyGate(concurrencyLimit);
    const results = new Array<ExtractionResult>(items.length);
    const startedAt = Date.now();

    logger.info({ contract: contract.name, items: items.length, concurrencyLimit }, 'Starting batch extraction');

    await Promise.all(
      items.map(async (item, index) => {
        const result = await gate.run(async (): Promise<ExtractionResult> => {
          if (options.signal?.aborted) {
            return {
              status: 'failure',
              item,
              kind: 'Cancelled',
              message: 'Run cancelled before extraction started',
              attempts: 0,
            };
          }
          return this.extractor.extract(item, contract, template);
        });
        results[index] = result;
        try {
          options.onSettled?.(result, index);
        } catch (error) {
          logger.warn({ error, index, itemId: item.id }, 'Settled-item hook failed');
        }
      })
    );

    const succeeded = results.filter(result => result.status === 'success').length;
    logger.info(
      {
        contract: contract.name,
        total: results.length,
        succeeded,
        failed: results.length - succeeded,
        peakConcurrency: gate.getStats().peak,
        durationMs: Date.now() - startedAt,
      },
      'Batch extraction complete'
    );

    return results;
  }
}
