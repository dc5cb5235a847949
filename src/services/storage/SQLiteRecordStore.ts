import { mkdirSync } from 'fs';
import { dirname } from 'path';
import Database from 'better-sqlite3';
import { z } from 'zod';
import { logger } from '../../utils/logger.js';
import { RecordStoreError } from '../../utils/errors.js';
import type { RecordTypeContract } from '../../domain/schema/RecordTypeContract.js';
import type { TypeNode } from '../../domain/schema/types.js';
import type { FlatValue } from '../projection/FieldProjector.js';
import type { ExtractionConfig } from '../../types/extraction.types.js';
import type { ProjectedRecord, RecordSink } from './RecordSink.interface.js';

type ColumnType = 'INTEGER' | 'REAL' | 'TEXT';
type SqlValue = string | number | null;

interface TableColumn {
  name: string;
  type: ColumnType;
}

const PAYLOAD_COLUMN = 'payload';
const UPDATED_AT_COLUMN = 'updated_at';

const tableInfoSchema = z.array(z.object({ name: z.string() }));

/** `StudentProfile` becomes `student_profile`. */
export const toTableName = (modelName: string): string =>
  modelName
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/[^A-Za-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .toLowerCase() || 'records';

const quote = (identifier: string): string => `"${identifier.replace(/"/g, '""')}"`;

const columnType = (node: TypeNode | undefined): ColumnType => {
  if (!node || node.kind === 'object') return 'TEXT';
  switch (node.tag) {
    case 'int':
    case 'rating':
    case 'bool':
      return 'INTEGER';
    case 'float':
      return 'REAL';
    default:
      return 'TEXT';
  }
};

const toSqlValue = (value: FlatValue | undefined): SqlValue => {
  if (value === undefined) return null;
  if (typeof value === 'boolean') return value ? 1 : 0;
  return value;
};

const openDatabase = (path: string): Database.Database => {
  try {
    if (path !== ':memory:') mkdirSync(dirname(path), { recursive: true });
    return new Database(path);
  } catch (error) {
    throw new RecordStoreError(`Cannot open record store ${path}`, error);
  }
};

export interface SQLiteRecordStoreOptions {
  now?: () => Date;
}

/**
 * Upserts projected rows into a table named after the config. One column per mapping
 * column plus the full record as JSON; the key column decides which row is replaced.
 */
export class SQLiteRecordStore implements RecordSink {
  readonly table: string;
  private db: Database.Database;
  private columns: TableColumn[];
  private keyColumn: string;
  private now: () => Date;

  constructor(
    readonly target: string,
    config: ExtractionConfig,
    contract: RecordTypeContract,
    options: SQLiteRecordStoreOptions = {}
  ) {
    this.table = toTableName(config.name);
    this.keyColumn = config.keyColumn;
    this.now = options.now ?? (() => new Date());
    this.columns = config.pathMapping.map(({ column, path }) => ({
      name: column,
      type: columnType(contract.describePath(path)),
    }));

    const reserved = this.columns.filter(
      column => column.name === PAYLOAD_COLUMN || column.name === UPDATED_AT_COLUMN
    );
    if (reserved.length > 0) {
      throw new RecordStoreError(`Column names reserved by the record store: ${reserved.map(c => c.name).join(', ')}`);
    }

    this.db = openDatabase(target);
    try {
      this.initSchema();
    } catch (error) {
      this.db.close();
      if (error instanceof RecordStoreError) throw error;
      throw new RecordStoreError(`Cannot prepare table ${this.table} in ${target}`, error);
    }
    logger.info({ dbPath: target, table: this.table }, 'SQLite record store initialized');
  }

  private initSchema(): void {
    const definitions = this.columns.map(
      column => `${quote(column.name)} ${column.type}${column.name === this.keyColumn ? ' PRIMARY KEY' : ''}`
    );
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS ${quote(this.table)} (
        ${[...definitions, `${PAYLOAD_COLUMN} TEXT NOT NULL`, `${UPDATED_AT_COLUMN} TEXT NOT NULL`].join(',\n        ')}
      )
    `);

    // Tables created by an earlier config version get the columns added since.
    const existing = new Set(
      tableInfoSchema.parse(this.db.prepare(`PRAGMA table_info(${quote(this.table)})`).all()).map(row => row.name)
    );
    for (const column of this.columns) {
      if (!existing.has(column.name)) {
        this.db.exec(`ALTER TABLE ${quote(this.table)} ADD COLUMN ${quote(column.name)} ${column.type}`);
        logger.info({ table: this.table, column: column.name }, 'Added column to record table');
      }
    }

    // The upsert conflicts on the key column, which a table created under another key lacks.
    const index = quote(`${this.table}_${this.keyColumn}_key`);
    try {
      this.db.exec(`CREATE UNIQUE INDEX IF NOT EXISTS ${index} ON ${quote(this.table)} (${quote(this.keyColumn)})`);
    } catch (error) {
      throw new RecordStoreError(
        `Existing rows in ${this.table} repeat values of key column "${this.keyColumn}"`,
        error
      );
    }
  }

  async write(records: ProjectedRecord[]): Promise<number> {
    const names = [...this.columns.map(column => column.name), PAYLOAD_COLUMN, UPDATED_AT_COLUMN];
    const updates = names
      .filter(name => name !== this.keyColumn)
      .map(name => `${quote(name)} = excluded.${quote(name)}`);
    const sql = `
      INSERT INTO ${quote(this.table)} (${names.map(quote).join(', ')})
      VALUES (${names.map(() => '?').join(', ')})
      ON CONFLICT(${quote(this.keyColumn)}) DO UPDATE SET ${updates.join(', ')}
    `;

    const upsertAll = this.db.transaction((batch: ProjectedRecord[]): number => {
      const statement = this.db.prepare(sql);
      const updatedAt = this.now().toISOString();
      let stored = 0;
      for (const { row, record } of batch) {
        const key = toSqlValue(row.get(this.keyColumn));
        if (key === null) {
          logger.warn({ table: this.table, keyColumn: this.keyColumn }, 'Skipping record without a key');
          continue;
        }
        const values = this.columns.map(column => toSqlValue(row.get(column.name)));
        statement.run(...values, JSON.stringify(record), updatedAt);
        stored++;
      }
      return stored;
    });

    try {
      const stored = upsertAll(records);
      logger.info({ table: this.table, stored, received: records.length }, 'Records upserted');
      return stored;
    } catch (error) {
      logger.error({ error, table: this.table }, 'Record upsert failed');
      throw new RecordStoreError(`Failed to upsert records into ${this.table}`, error);
    }
  }

  /** Stored rows by key, payload parsed; used to inspect a run. */
  find(key: string | number): Record<string, unknown> | undefined {
    const row = z
      .record(z.unknown())
      .optional()
      .parse(this.db.prepare(`SELECT * FROM ${quote(this.table)} WHERE ${quote(this.keyColumn)} = ?`).get(key));
    if (!row) return undefined;
    const payload = row[PAYLOAD_COLUMN];
    return { ...row, [PAYLOAD_COLUMN]: typeof payload === 'string' ? JSON.parse(payload) : payload };
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
