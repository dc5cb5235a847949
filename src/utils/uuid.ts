import { v4 as uuidv4 } from 'uuid';

/** `run` tags one ETL invocation; `extlog` one extraction-log row. */
export type IdPrefix = 'run' | 'extlog';

export const generateId = (prefix: IdPrefix): string => `${prefix}-${uuidv4()}`;
