import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { ExtractionLogService } from './ExtractionLogService.js';
import type { BatchItem } from '../../types/extraction.types.js';

const item = (id: string): BatchItem => ({ id, email: null, corpus: 'text' });
const at = new Date('2024-05-01T12:00:00Z');

describe('ExtractionLogService', () => {
  let log: ExtractionLogService;

  beforeEach(() => {
    log = new ExtractionLogService(':memory:');
  });

  afterEach(() => {
    log.close();
  });

  it('records successes and failures per run', () => {
    const successId = log.log(
      'run-1',
      'StudentProfile',
      { status: 'success', item: item('1'), record: { chat_id: 1 }, attempts: 2, model: 'gpt-4o-mini', rawOutput: '{"chat_id":1}' },
      at
    );
    log.log(
      'run-1',
      'StudentProfile',
      { status: 'failure', item: item('2'), kind: 'MalformedResponse', message: 'Empty response', attempts: 1, rawOutput: '' },
      at
    );
    log.log('run-2', 'StudentProfile', { status: 'failure', item: item('3'), kind: 'Cancelled', message: 'stopped', attempts: 0 }, at);

    expect(successId.startsWith('extlog-')).toBe(true);
    expect(log.getByRunId('run-1')).toEqual([
      {
        id: successId,
        run_id: 'run-1',
        item_id: '1',
        config_name: 'StudentProfile',
        model: 'gpt-4o-mini',
        timestamp: '2024-05-01T12:00:00.000Z',
        status: 'SUCCESS',
        failure_kind: null,
        message: null,
        raw_output: '{"chat_id":1}',
        attempts: 2,
      },
      expect.objectContaining({
        item_id: '2',
        model: null,
        status: 'FAILED',
        failure_kind: 'MalformedResponse',
        message: 'Empty response',
        raw_output: '',
        attempts: 1,
      }),
    ]);
    expect(log.getByItemId('3')).toEqual([expect.objectContaining({ run_id: 'run-2', failure_kind: 'Cancelled', raw_output: null })]);
  });

  it('answers a connection check', () => {
    expect(log.testConnection()).toBe(true);
  });
});
