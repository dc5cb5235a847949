import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import * as XLSX from 'xlsx';
import { logger } from '../../utils/logger.js';
import { RecordStoreError } from '../../utils/errors.js';
import type { FlatValue, ProjectedRow } from '../projection/FieldProjector.js';
import type { PathMapping } from '../../types/extraction.types.js';
import type { ProjectedRecord, RecordSink } from './RecordSink.interface.js';

const cellText = (value: FlatValue | undefined): string =>
  value === null || value === undefined ? '' : String(value);

/** Header from the mapping columns, then one line per row; always ends with a newline. */
export function formatCsv(mapping: PathMapping, rows: ProjectedRow[]): string {
  const columns = mapping.map(entry => entry.column);
  const table = [columns, ...rows.map(row => columns.map(column => cellText(row.get(column))))];
  const sheet = XLSX.utils.aoa_to_sheet(table);
  return `${XLSX.utils.sheet_to_csv(sheet, { blankrows: true })}\n`;
}

export class CsvRecordWriter implements RecordSink {
  constructor(
    readonly target: string,
    private readonly mapping: PathMapping
  ) {}

  async write(records: ProjectedRecord[]): Promise<number> {
    try {
      await mkdir(dirname(this.target), { recursive: true });
      await writeFile(this.target, formatCsv(this.mapping, records.map(record => record.row)), 'utf-8');
    } catch (error) {
      logger.error({ error, path: this.target }, 'Failed to write CSV output');
      throw new RecordStoreError(`Cannot write CSV output ${this.target}`, error);
    }
    logger.info({ path: this.target, rows: records.length }, 'CSV output written');
    return records.length;
  }

  async close(): Promise<void> {}
}
