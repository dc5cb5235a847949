import type { RecordInstance } from '../../domain/schema/types.js';
import type { ProjectedRow } from '../projection/FieldProjector.js';

export interface ProjectedRecord {
  row: ProjectedRow;
  record: RecordInstance;
}

/** Destination for the successful records of one run. */
export interface RecordSink {
  readonly target: string;
  /** Returns how many records were stored. */
  write(records: ProjectedRecord[]): Promise<number>;
  close(): Promise<void>;
}
