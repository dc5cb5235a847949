import { mkdirSync } from 'fs';
import { dirname } from 'path';
import Database from 'better-sqlite3';
import { z } from 'zod';
import { generateId } from '../../utils/uuid.js';
import { logger } from '../../utils/logger.js';
import type { ExtractionResult } from '../../types/extraction.types.js';

const extractionLogRowSchema = z.object({
  id: z.string(),
  run_id: z.string(),
  item_id: z.string(),
  config_name: z.string(),
  model: z.string().nullable(),
  timestamp: z.string(),
  status: z.enum(['SUCCESS', 'FAILED']),
  failure_kind: z.string().nullable(),
  message: z.string().nullable(),
  raw_output: z.string().nullable(),
  attempts: z.number().int(),
});

export type ExtractionLogEntry = z.infer<typeof extractionLogRowSchema>;

/**
 * One row per item outcome, kept apart from the record store so failed items and
 * raw model output can be inspected after a run.
 */
export class ExtractionLogService {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') mkdirSync(dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.initSchema();
    logger.info({ dbPath }, 'SQLite extraction log initialized');
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS extraction_log (
        id TEXT PRIMARY KEY,
        run_id TEXT NOT NULL,
        item_id TEXT NOT NULL,
        config_name TEXT NOT NULL,
        model TEXT,
        timestamp TEXT NOT NULL,
        status TEXT NOT NULL,
        failure_kind TEXT,
        message TEXT,
        raw_output TEXT,
        attempts INTEGER DEFAULT 0
      )
    `);
    this.db.exec(`CREATE INDEX IF NOT EXISTS idx_extraction_run_id ON extraction_log(run_id)`);
    this.db.exec(`CREATE INDEX IF NOT EXISTS idx_extraction_item_id ON extraction_log(item_id)`);
  }

  log(runId: string, configName: string, result: ExtractionResult, timestamp: Date = new Date()): string {
    const id = generateId('extlog');
    const stmt = this.db.prepare(`
      INSERT INTO extraction_log (id, run_id, item_id, config_name, model, timestamp, status, failure_kind, message, raw_output, attempts)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    if (result.status === 'success') {
      stmt.run(id, runId, result.item.id, configName, result.model, timestamp.toISOString(), 'SUCCESS', null, null, result.rawOutput, result.attempts);
    } else {
      stmt.run(id, runId, result.item.id, configName, null, timestamp.toISOString(), 'FAILED', result.kind, result.message, result.rawOutput ?? null, result.attempts);
    }
    return id;
  }

  getByRunId(runId: string): ExtractionLogEntry[] {
    const rows = this.db.prepare(`SELECT * FROM extraction_log WHERE run_id = ? ORDER BY rowid`).all(runId);
    return z.array(extractionLogRowSchema).parse(rows);
  }

  getByItemId(itemId: string): ExtractionLogEntry[] {
    const rows = this.db.prepare(`SELECT * FROM extraction_log WHERE item_id = ? ORDER BY rowid`).all(itemId);
    return z.array(extractionLogRowSchema).parse(rows);
  }

  testConnection(): boolean {
    try {
      this.db.prepare('SELECT 1').get();
      return true;
    } catch (error) {
      logger.warn({ error }, 'Extraction log connection check failed');
      return false;
    }
  }

  close(): void {
    this.db.close();
  }
}
