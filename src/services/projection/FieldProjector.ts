import type { RecordTypeContract } from '../../domain/schema/RecordTypeContract.js';
import type { RecordInstance, RecordValue } from '../../domain/schema/types.js';
import type { PathMapping } from '../../types/extraction.types.js';

export type FlatValue = string | number | boolean | null;

/** Column name to value, iterated in mapping order. */
export type ProjectedRow = Map<string, FlatValue>;

const resolvePath = (record: RecordInstance, path: string): RecordValue | undefined => {
  let current: RecordValue | undefined = record;
  for (const segment of path.split('.')) {
    if (current === null || current === undefined || typeof current !== 'object' || current instanceof Date) {
      return undefined;
    }
    current = Object.hasOwn(current, segment) ? current[segment] : undefined;
  }
  return current;
};

const flatten = (value: RecordValue | undefined): FlatValue => {
  if (value === undefined || value === null) return null;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'object') return JSON.stringify(value);
  return value;
};

/**
 * Flattens a validated record into one output row. Runs after validation, so an
 * unresolvable path yields null instead of an error.
 */
export function projectRecord(record: RecordInstance, mapping: PathMapping): ProjectedRow {
  const row: ProjectedRow = new Map();
  for (const { column, path } of mapping) {
    row.set(column, flatten(resolvePath(record, path)));
  }
  return row;
}

/** One column per primitive field; nested columns are named `parent__child`. */
export function defaultPathMapping(contract: RecordTypeContract): PathMapping {
  return contract.leafPaths().map(path => ({ column: path.split('.').join('__'), path }));
}
