import type { Config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { generateId } from '../../utils/uuid.js';
import { LLMServiceFactory } from '../../services/llm/LLMServiceFactory.js';
import type { LLMService } from '../../services/llm/LLMService.interface.js';
import { ExtractionClient } from '../../services/extraction/ExtractionClient.js';
import { BatchOrchestrator } from '../../services/extraction/BatchOrchestrator.js';
import { ExtractionLogService } from '../../services/extraction/ExtractionLogService.js';
import { loadExtractionConfig, type LoadedExtractionConfig } from '../../services/ingestion/ExtractionConfigLoader.js';
import { readChatExport } from '../../services/ingestion/ChatExportReader.js';
import { projectRecord } from '../../services/projection/FieldProjector.js';
import { CsvRecordWriter } from '../../services/storage/CsvRecordWriter.js';
import { SQLiteRecordStore } from '../../services/storage/SQLiteRecordStore.js';
import type { ProjectedRecord, RecordSink } from '../../services/storage/RecordSink.interface.js';
import type { ExtractionResult } from '../../types/extraction.types.js';
import type { ProgressReporter } from './reporters/ProgressReporter.js';
import type { EtlResult, EtlRunConfig, EtlSummary, FailureSummary } from './types.js';

export interface TranscriptEtlDependencies {
  llm?: LLMService;
  extractionLog?: ExtractionLogService | null;
}

const summarize = (results: ExtractionResult[], stored: number): EtlSummary => {
  const summary: EtlSummary = { total: results.length, succeeded: 0, failed: 0, stored, byKind: {} };
  for (const result of results) {
    if (result.status === 'success') {
      summary.succeeded++;
    } else {
      summary.failed++;
      summary.byKind[result.kind] = (summary.byKind[result.kind] ?? 0) + 1;
    }
  }
  return summary;
};

const listFailures = (results: ExtractionResult[]): FailureSummary[] =>
  results.flatMap(result =>
    result.status === 'failure'
      ? [{ itemId: result.item.id, kind: result.kind, message: result.message, attempts: result.attempts }]
      : []
  );

/**
 * One run of the pipeline: read the chat export, extract every chat under the
 * concurrency limit, project the successes and hand them to the record sink.
 */
export class TranscriptEtl {
  private llm: LLMService;
  private extractionLog: ExtractionLogService | null;
  private client: ExtractionClient;
  private orchestrator: BatchOrchestrator;

  constructor(
    private readonly settings: Config,
    dependencies: TranscriptEtlDependencies = {}
  ) {
    this.llm = dependencies.llm ?? LLMServiceFactory.createLLMService(settings.llm);
    this.extractionLog =
      dependencies.extractionLog !== undefined
        ? dependencies.extractionLog
        : settings.extractionLog.enabled
          ? new ExtractionLogService(settings.extractionLog.dbPath)
          : null;
    this.client = new ExtractionClient(this.llm, {
      maxCorpusChars: settings.extraction.maxCorpusChars,
      maxAttempts: settings.extraction.maxAttempts,
      timeoutMs: settings.llm.timeoutMs,
      backoff: {
        initialDelayMs: settings.extraction.retryInitialDelayMs,
        maxDelayMs: settings.extraction.retryMaxDelayMs,
      },
      repromptOnMalformed: settings.extraction.repromptOnMalformed,
    });
    this.orchestrator = new BatchOrchestrator(this.client);
  }

  async run(config: EtlRunConfig, reporter: ProgressReporter, signal?: AbortSignal): Promise<EtlResult> {
    const runId = generateId('run');
    const loaded = await loadExtractionConfig(config.configPath);
    const { contract, template } = loaded;

    reporter.update({ phase: 'reading', current: 0, total: 0 });
    const items = await readChatExport(config.input);
    reporter.complete(`Read ${items.length} chats from ${config.input}`);

    const result: EtlResult = {
      runId,
      configName: loaded.config.name,
      config,
      summary: summarize([], 0),
      failures: [],
    };

    if (config.dryRun) {
      result.summary.total = items.length;
      if (items.length > 0) {
        result.previewPrompt = this.client.buildPrompt(items[0], contract, template);
      }
      return result;
    }

    const sink = this.createSink(loaded, config);
    result.target = sink.target;
    try {
      logger.info({ runId, config: loaded.config.name, items: items.length, target: sink.target }, 'Starting extraction run');

      let settled = 0;
      const results = await this.orchestrator.run(items, contract, template, config.concurrency, {
        signal,
        onSettled: (extraction: ExtractionResult) => {
          settled++;
          reporter.update({ phase: 'extracting', current: settled, total: items.length, currentItem: extraction.item.id });
          this.extractionLog?.log(runId, loaded.config.name, extraction);
        },
      });
      reporter.complete(`Extracted ${items.length} chats`);

      const records: ProjectedRecord[] = results.flatMap(extraction =>
        extraction.status === 'success'
          ? [{ record: extraction.record, row: projectRecord(extraction.record, loaded.config.pathMapping) }]
          : []
      );
      reporter.update({ phase: 'storing', current: records.length, total: records.length });
      const stored = await sink.write(records);
      reporter.complete(`Stored ${stored} records in ${sink.target}`);

      result.summary = summarize(results, stored);
      result.failures = listFailures(results);
      if (result.summary.failed > 0) {
        reporter.warn(`${result.summary.failed} chats failed extraction`);
      }
      logger.info({ runId, ...result.summary }, 'Extraction run complete');
      return result;
    } finally {
      await sink.close();
    }
  }

  /** Checks the provider credentials and the extraction log before a run. */
  async testConnections(): Promise<{ llm: boolean; extractionLog: boolean | null }> {
    return {
      llm: await this.llm.testConnection(),
      extractionLog: this.extractionLog ? this.extractionLog.testConnection() : null,
    };
  }

  close(): void {
    this.extractionLog?.close();
    logger.info('TranscriptEtl closed');
  }

  private createSink(loaded: LoadedExtractionConfig, config: EtlRunConfig): RecordSink {
    if (config.outputCsv) {
      return new CsvRecordWriter(config.outputCsv, loaded.config.pathMapping);
    }
    return new SQLiteRecordStore(this.settings.database.path, loaded.config, loaded.contract);
  }
}
