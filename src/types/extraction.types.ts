import type { FieldError } from '../utils/errors.js';
import type { RecordInstance } from '../domain/schema/types.js';

/** One chat transcript, as handed over by the reader. */
export interface BatchItem {
  readonly id: string;
  readonly email: string | null;
  readonly corpus: string;
}

export type FailureKind = 'TransportError' | 'MalformedResponse' | 'SchemaViolation' | 'Cancelled';

export interface ExtractionSuccess {
  status: 'success';
  item: BatchItem;
  record: RecordInstance;
  attempts: number;
  model: string;
  rawOutput: string;
}

export interface ExtractionFailure {
  status: 'failure';
  item: BatchItem;
  kind: FailureKind;
  message: string;
  attempts: number;
  errors?: FieldError[];
  rawOutput?: string;
}

export type ExtractionResult = ExtractionSuccess | ExtractionFailure;

export interface PathMappingEntry {
  column: string;
  path: string;
}

/** Output columns in header order, each pointing at a dot-path into the record. */
export type PathMapping = readonly PathMappingEntry[];

export interface ExtractionConfig {
  readonly name: string;
  /** The `schema` mapping as written: field names to type strings such as `"rating | None"` or nested mappings. */
  readonly schema: Readonly<Record<string, unknown>>;
  readonly promptTemplate: string;
  readonly pathMapping: PathMapping;
  readonly keyColumn: string;
}
