import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { CsvRecordWriter, formatCsv } from './CsvRecordWriter.js';
import type { ProjectedRow } from '../projection/FieldProjector.js';
import type { PathMapping } from '../../types/extraction.types.js';

const mapping: PathMapping = [
  { column: 'chat_id', path: 'chat_id' },
  { column: 'consent', path: 'consent' },
  { column: 'note', path: 'note' },
  { column: 'score', path: 'score' },
];

const row = (values: [string, string | number | boolean | null][]): ProjectedRow => new Map(values);

describe('formatCsv', () => {
  it('writes the header and one line per row', () => {
    const csv = formatCsv(mapping, [
      row([['chat_id', 1], ['consent', true], ['note', 'hi, "there"'], ['score', null]]),
      row([['chat_id', 2], ['consent', false], ['note', 'plain'], ['score', 2.5]]),
    ]);

    expect(csv).toBe('chat_id,consent,note,score\n1,true,"hi, ""there""",\n2,false,plain,2.5\n');
  });

  it('writes only the header for an empty run', () => {
    expect(formatCsv(mapping, [])).toBe('chat_id,consent,note,score\n');
  });
});

describe('CsvRecordWriter', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'csv-writer-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('creates the output directory and file', async () => {
    const path = join(dir, 'out', 'records.csv');
    const writer = new CsvRecordWriter(path, mapping);

    const written = await writer.write([
      { row: row([['chat_id', 7], ['consent', null], ['note', 'ok'], ['score', 1]]), record: { chat_id: 7 } },
    ]);

    expect(written).toBe(1);
    expect(await readFile(path, 'utf-8')).toBe('chat_id,consent,note,score\n7,,ok,1\n');
  });
});
