import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { parseChatExport, readChatExport } from './ChatExportReader.js';
import { InputError } from '../../utils/errors.js';

const HEADER = 'chat_id,user_email,message_author,message_content,message_timestamp';

const exportText = [
  HEADER,
  '2,b@x.com,HUMAN,second chat,2024-01-01T10:00:00Z',
  '1,a@x.com,AI,How was it?,2024-01-01T09:00:00Z',
  '1,a@x.com,human,"It was great, thanks",2024-01-01T09:02:00Z',
  '1,a@x.com,HUMAN,Hello,2024-01-01T09:01:00Z',
  '2,b@x.com,HUMAN,later,not a date',
  '2,b@x.com,HUMAN,first,2024-01-01T09:59:00Z',
].join('\n');

describe('parseChatExport', () => {
  it('groups messages per chat in first-appearance order', () => {
    const items = parseChatExport(exportText);

    expect(items).toEqual([
      { id: '2', email: 'b@x.com', corpus: 'first\nsecond chat\nlater' },
      { id: '1', email: 'a@x.com', corpus: 'Hello\nIt was great, thanks' },
    ]);
  });

  it('keeps chats without participant messages', () => {
    const items = parseChatExport([HEADER, '9,,AI,Anyone there?,2024-01-01T09:00:00Z'].join('\n'));
    expect(items).toEqual([{ id: '9', email: null, corpus: '' }]);
  });

  it('skips rows without a chat id', () => {
    const items = parseChatExport([HEADER, ',a@x.com,HUMAN,orphan,2024-01-01T09:00:00Z', '3,c@x.com,HUMAN,hi,2024-01-01T09:00:00Z'].join('\n'));
    expect(items).toEqual([{ id: '3', email: 'c@x.com', corpus: 'hi' }]);
  });

  it('names the missing columns', () => {
    const text = 'chat_id,user_email,message_content\n1,a@x.com,hello';
    expect(() => parseChatExport(text)).toThrow(InputError);
    expect(() => parseChatExport(text)).toThrow('<inline> is missing columns: message_author, message_timestamp');
  });

  it('rejects an empty export', () => {
    expect(() => parseChatExport('  \n', 'chats.csv')).toThrow('chats.csv is empty');
  });
});

describe('readChatExport', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'chat-export-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads the export from disk', async () => {
    const path = join(dir, 'chats.csv');
    await writeFile(path, exportText, 'utf-8');

    const items = await readChatExport(path);
    expect(items.map(item => item.id)).toEqual(['2', '1']);
  });

  it('raises an input error for a missing file', async () => {
    await expect(readChatExport(join(dir, 'missing.csv'))).rejects.toThrow(InputError);
  });
});
