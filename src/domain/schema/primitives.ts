import { z } from 'zod';
import type { ExampleValue, PrimitiveTag, PrimitiveValue } from './types.js';

export type Coercion = { ok: true; value: PrimitiveValue } | { ok: false; message: string };

const INTEGER_TEXT = /^[+-]?\d+$/;
const DECIMAL_TEXT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const RATING_TEXT = /^[1-5]$/;
const ISO_TIMESTAMP = /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

const TRUE_WORDS = new Set(['true', 'yes', '1']);
const FALSE_WORDS = new Set(['false', 'no', '0']);

const emailSchema = z.string().email();

const ok = (value: PrimitiveValue): Coercion => ({ ok: true, value });
const fail = (message: string): Coercion => ({ ok: false, message });

const describe = (value: unknown): string =>
  typeof value === 'string' ? `"${value}"` : Array.isArray(value) ? 'array' : typeof value === 'object' ? 'object' : String(value);

const coerceInt = (value: unknown): Coercion => {
  if (typeof value === 'number' && Number.isSafeInteger(value)) return ok(value);
  if (typeof value === 'string' && INTEGER_TEXT.test(value.trim())) {
    const parsed = Number(value.trim());
    if (Number.isSafeInteger(parsed)) return ok(parsed);
  }
  return fail(`Expected an integer, received ${describe(value)}`);
};

const coerceFloat = (value: unknown): Coercion => {
  if (typeof value === 'number' && Number.isFinite(value)) return ok(value);
  if (typeof value === 'string' && DECIMAL_TEXT.test(value.trim())) {
    const parsed = Number(value.trim());
    if (Number.isFinite(parsed)) return ok(parsed);
  }
  return fail(`Expected a number, received ${describe(value)}`);
};

const coerceBool = (value: unknown): Coercion => {
  if (typeof value === 'boolean') return ok(value);
  if (value === 0 || value === 1) return ok(value === 1);
  if (typeof value === 'string') {
    const word = value.trim().toLowerCase();
    if (TRUE_WORDS.has(word)) return ok(true);
    if (FALSE_WORDS.has(word)) return ok(false);
  }
  return fail(`Expected a boolean, received ${describe(value)}`);
};

const coerceString = (value: unknown): Coercion =>
  typeof value === 'string' ? ok(value) : fail(`Expected a string, received ${describe(value)}`);

const coerceEmail = (value: unknown): Coercion => {
  if (typeof value === 'string') {
    const parsed = emailSchema.safeParse(value.trim());
    if (parsed.success) return ok(parsed.data);
  }
  return fail(`Expected an email address, received ${describe(value)}`);
};

const coerceTimestamp = (value: unknown): Coercion => {
  let date: Date | undefined;
  if (value instanceof Date) {
    date = value;
  } else if (typeof value === 'number' && Number.isFinite(value)) {
    date = new Date(value);
  } else if (typeof value === 'string' && ISO_TIMESTAMP.test(value.trim())) {
    date = new Date(value.trim());
  }
  if (date && !Number.isNaN(date.getTime())) return ok(date);
  return fail(`Expected an ISO-8601 timestamp, received ${describe(value)}`);
};

// Closed 1-5 scale: no rounding, no clamping, no word mapping.
const coerceRating = (value: unknown): Coercion => {
  if (typeof value === 'number' && Number.isInteger(value) && value >= 1 && value <= 5) return ok(value);
  if (typeof value === 'string' && RATING_TEXT.test(value.trim())) return ok(Number(value.trim()));
  return fail(`Expected an integer rating from 1 to 5, received ${describe(value)}`);
};

const COERCERS: Record<PrimitiveTag, (value: unknown) => Coercion> = {
  int: coerceInt,
  float: coerceFloat,
  bool: coerceBool,
  string: coerceString,
  email: coerceEmail,
  timestamp: coerceTimestamp,
  rating: coerceRating,
};

export const coercePrimitive = (tag: PrimitiveTag, value: unknown): Coercion => COERCERS[tag](value);

export const EXAMPLE_VALUES: Record<PrimitiveTag, ExampleValue> = {
  int: 0,
  float: 0.5,
  bool: false,
  string: 'text',
  email: 'name@example.com',
  timestamp: '2024-01-31T12:00:00Z',
  rating: 3,
};
