import { SchemaError } from '../../utils/errors.js';
import { isPrimitiveTag, type PrimitiveNode, type PrimitiveTag } from './types.js';

const TYPE_ALIASES: ReadonlyMap<string, PrimitiveTag> = new Map([
  ['str', 'string'],
  ['boolean', 'bool'],
  ['integer', 'int'],
  ['number', 'float'],
  ['datetime', 'timestamp'],
  ['EmailStr', 'email'],
  ['Likert', 'rating'],
]);

const NONE_LITERALS = new Set(['None', 'null']);
const OPTIONAL_WRAPPER = /^Optional\[(.*)\]$/;
const MARKER_CHARS = /[|?[\]]/;

const malformed = (fieldPath: string, raw: string): SchemaError =>
  new SchemaError(`Field "${fieldPath}" has malformed optional syntax: "${raw}"`, { field: fieldPath, type: raw });

/**
 * Parses a field's type string into its primitive tag and optionality.
 *
 * Accepted optional spellings are `T | None`, `None | T`, `T | null`,
 * `Optional[T]` and `T?`. Anything else carrying a union bar, a question mark or
 * brackets is rejected rather than guessed at.
 */
export function parseTypeString(raw: string, fieldPath: string): PrimitiveNode {
  const text = raw.trim();
  if (!text) {
    throw new SchemaError(`Field "${fieldPath}" has an empty type`, { field: fieldPath });
  }

  let optional = false;
  let core = text;

  const wrapped = OPTIONAL_WRAPPER.exec(text);
  if (wrapped) {
    optional = true;
    core = wrapped[1].trim();
  } else if (text.includes('|')) {
    const operands = text.split('|').map(operand => operand.trim());
    const types = operands.filter(operand => !NONE_LITERALS.has(operand));
    if (operands.length !== 2 || types.length !== 1) {
      throw malformed(fieldPath, raw);
    }
    optional = true;
    core = types[0];
  } else if (text.endsWith('?')) {
    optional = true;
    core = text.slice(0, -1).trim();
  }

  if (!core || MARKER_CHARS.test(core)) {
    throw malformed(fieldPath, raw);
  }

  const tag = TYPE_ALIASES.get(core) ?? (isPrimitiveTag(core) ? core : undefined);
  if (!tag) {
    throw new SchemaError(`Field "${fieldPath}" has unknown type "${core}"`, { field: fieldPath, type: raw });
  }

  return { kind: 'primitive', tag, optional };
}
