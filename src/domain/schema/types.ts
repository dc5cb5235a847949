export const PRIMITIVE_TAGS = ['int', 'string', 'bool', 'float', 'timestamp', 'email', 'rating'] as const;

export type PrimitiveTag = (typeof PRIMITIVE_TAGS)[number];

export interface PrimitiveNode {
  kind: 'primitive';
  tag: PrimitiveTag;
  optional: boolean;
}

export interface ObjectNode {
  kind: 'object';
  fields: ReadonlyMap<string, TypeNode>;
  /** True when every child is optional; such an object may be absent. */
  optional: boolean;
}

export type TypeNode = PrimitiveNode | ObjectNode;

export type PrimitiveValue = string | number | boolean | Date;

export type RecordValue = PrimitiveValue | null | RecordInstance;

export interface RecordInstance {
  [field: string]: RecordValue;
}

export type ExampleValue = string | number | boolean | { [field: string]: ExampleValue };

export const isPrimitiveTag = (value: string): value is PrimitiveTag =>
  (PRIMITIVE_TAGS as readonly string[]).includes(value);

export const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
