import type { FailureKind } from '../../types/extraction.types.js';

export interface EtlRunConfig {
  input: string;
  configPath: string;
  /** Writes CSV here instead of upserting into the record database. */
  outputCsv?: string;
  concurrency: number;
  format: 'table' | 'json';
  /** Compile the config and render the first prompt without calling the LLM. */
  dryRun: boolean;
}

export interface EtlProgress {
  phase: 'reading' | 'extracting' | 'storing';
  current: number;
  total: number;
  currentItem?: string;
}

export interface FailureSummary {
  itemId: string;
  kind: FailureKind;
  message: string;
  attempts: number;
}

export interface EtlSummary {
  total: number;
  succeeded: number;
  failed: number;
  stored: number;
  byKind: Partial<Record<FailureKind, number>>;
}

export interface EtlResult {
  runId: string;
  configName: string;
  config: EtlRunConfig;
  target?: string;
  summary: EtlSummary;
  failures: FailureSummary[];
  previewPrompt?: string;
}
