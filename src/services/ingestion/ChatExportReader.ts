import { readFile } from 'fs/promises';
import * as XLSX from 'xlsx';
import { InputError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { BatchItem } from '../../types/extraction.types.js';

export const CHAT_EXPORT_COLUMNS = [
  'chat_id',
  'user_email',
  'message_author',
  'message_content',
  'message_timestamp',
] as const;

type ChatExportColumn = (typeof CHAT_EXPORT_COLUMNS)[number];

/** Author label of the person being surveyed; every other author is the agent. */
export const PARTICIPANT_AUTHOR = 'HUMAN';

interface ChatMessage {
  author: string;
  content: string;
  time: number;
  line: number;
}

interface ChatThread {
  id: string;
  email: string | null;
  messages: ChatMessage[];
}

const cellText = (cell: unknown): string => (cell === undefined || cell === null ? '' : String(cell));

const columnIndexes = (header: string[], source: string): Record<ChatExportColumn, number> => {
  const positions = new Map(header.map((name, index) => [name.trim(), index]));
  const missing = CHAT_EXPORT_COLUMNS.filter(column => !positions.has(column));
  if (missing.length > 0) {
    throw new InputError(`${source} is missing columns: ${missing.join(', ')}`, { missing });
  }
  return {
    chat_id: positions.get('chat_id') ?? -1,
    user_email: positions.get('user_email') ?? -1,
    message_author: positions.get('message_author') ?? -1,
    message_content: positions.get('message_content') ?? -1,
    message_timestamp: positions.get('message_timestamp') ?? -1,
  };
};

/** Messages with a readable timestamp first, by time; the rest after them in file order. */
const byTimestamp = (a: ChatMessage, b: ChatMessage): number => {
  const aKnown = !Number.isNaN(a.time);
  const bKnown = !Number.isNaN(b.time);
  if (aKnown && bKnown && a.time !== b.time) return a.time - b.time;
  if (aKnown !== bKnown) return aKnown ? -1 : 1;
  return a.line - b.line;
};

const toBatchItem = (thread: ChatThread): BatchItem => ({
  id: thread.id,
  email: thread.email,
  corpus: [...thread.messages]
    .sort(byTimestamp)
    .filter(message => message.author.toUpperCase() === PARTICIPANT_AUTHOR)
    .map(message => message.content)
    .join('\n'),
});

/**
 * Turns a chat export (one row per message) into one batch item per chat. Chats keep
 * the order of their first row; the corpus holds only the participant's messages.
 */
export function parseChatExport(text: string, source: string = '<inline>'): BatchItem[] {
  if (!text.trim()) {
    throw new InputError(`${source} is empty`);
  }

  const workbook = XLSX.read(text, { type: 'string', raw: true });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) {
    throw new InputError(`${source} contains no rows`);
  }

  const [header = [], ...rows] = XLSX.utils
    .sheet_to_json<unknown[]>(sheet, { header: 1, raw: false, defval: '', blankrows: false })
    .map(row => row.map(cellText));
  const columns = columnIndexes(header, source);

  const threads = new Map<string, ChatThread>();
  rows.forEach((row, index) => {
    const id = (row[columns.chat_id] ?? '').trim();
    if (!id) {
      logger.warn({ source, line: index + 2 }, 'Skipping message without chat_id');
      return;
    }

    let thread = threads.get(id);
    if (!thread) {
      thread = { id, email: null, messages: [] };
      threads.set(id, thread);
    }
    const email = (row[columns.user_email] ?? '').trim();
    if (!thread.email && email) thread.email = email;

    thread.messages.push({
      author: (row[columns.message_author] ?? '').trim(),
      content: row[columns.message_content] ?? '',
      time: Date.parse(row[columns.message_timestamp] ?? ''),
      line: index,
    });
  });

  const items = [...threads.values()].map(toBatchItem);
  logger.info({ source, messages: rows.length, chats: items.length }, 'Chat export read');
  return items;
}

export async function readChatExport(path: string): Promise<BatchItem[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new InputError(`Cannot read chat export ${path}`, error);
  }
  return parseChatExport(text, path);
}
