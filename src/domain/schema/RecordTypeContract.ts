import { z } from 'zod';
import { SchemaError, type FieldError } from '../../utils/errors.js';
import { parseTypeString } from './parseTypeString.js';
import { coercePrimitive, EXAMPLE_VALUES } from './primitives.js';
import {
  isPlainObject,
  type ExampleValue,
  type ObjectNode,
  type PrimitiveNode,
  type RecordInstance,
  type RecordValue,
  type TypeNode,
} from './types.js';

export type ValidationResult =
  | { success: true; data: RecordInstance }
  | { success: false; errors: FieldError[] };

type NodeSchema = z.ZodType<RecordValue, z.ZodTypeDef, unknown>;

const blankToNull = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? null : value;

const requiredIssue = (ctx: z.RefinementCtx, value: unknown): void => {
  ctx.addIssue({
    code: z.ZodIssueCode.custom,
    message: value === undefined ? 'Required field is missing' : 'Required field must not be null',
  });
};

const emptyInstance = (node: ObjectNode): RecordInstance => {
  const instance: RecordInstance = {};
  for (const [name, child] of node.fields) {
    instance[name] = child.kind === 'object' ? emptyInstance(child) : null;
  }
  return instance;
};

const primitiveSchema = (node: PrimitiveNode): NodeSchema =>
  z.unknown().transform((raw, ctx): RecordValue => {
    const value = blankToNull(raw);
    if (value === null || value === undefined) {
      if (node.optional) return null;
      requiredIssue(ctx, raw);
      return z.NEVER;
    }
    const coerced = coercePrimitive(node.tag, value);
    if (!coerced.ok) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: coerced.message });
      return z.NEVER;
    }
    return coerced.value;
  });

const objectShape = (node: ObjectNode) => {
  const shape: Record<string, NodeSchema> = {};
  for (const [name, child] of node.fields) {
    shape[name] = nodeSchema(child);
  }
  // z.object strips keys that are not in the shape.
  return z.object(shape).transform((value): RecordInstance => value);
};

const nestedSchema = (node: ObjectNode): NodeSchema => {
  const shape = objectShape(node);
  return z.unknown().transform((raw, ctx): RecordValue => {
    const value = blankToNull(raw);
    if (value === null || value === undefined) {
      if (node.optional) return emptyInstance(node);
      requiredIssue(ctx, raw);
      return z.NEVER;
    }
    const parsed = shape.safeParse(value);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: issue.message, path: issue.path });
      }
      return z.NEVER;
    }
    return parsed.data;
  });
};

const nodeSchema = (node: TypeNode): NodeSchema =>
  node.kind === 'primitive' ? primitiveSchema(node) : nestedSchema(node);

const exampleFor = (node: TypeNode): ExampleValue => {
  if (node.kind === 'primitive') return EXAMPLE_VALUES[node.tag];
  const example: { [field: string]: ExampleValue } = {};
  for (const [name, child] of node.fields) {
    example[name] = exampleFor(child);
  }
  return example;
};

const compileNode = (declaration: unknown, fieldPath: string): TypeNode => {
  if (typeof declaration === 'string') {
    return parseTypeString(declaration, fieldPath);
  }
  if (isPlainObject(declaration)) {
    return compileObject(declaration, fieldPath);
  }
  throw new SchemaError(`Field "${fieldPath}" must be a type string or a mapping of fields`, {
    field: fieldPath,
  });
};

const compileObject = (declaration: Record<string, unknown>, fieldPath: string): ObjectNode => {
  const entries = Object.entries(declaration);
  if (entries.length === 0) {
    throw new SchemaError(
      fieldPath ? `Field "${fieldPath}" declares an empty mapping` : 'Schema declares no fields',
      { field: fieldPath }
    );
  }

  const fields = new Map<string, TypeNode>();
  for (const [name, child] of entries) {
    const childPath = fieldPath ? `${fieldPath}.${name}` : name;
    if (!name.trim() || name.includes('.')) {
      throw new SchemaError(`Invalid field name "${childPath}"`, { field: childPath });
    }
    fields.set(name, compileNode(child, childPath));
  }

  return {
    kind: 'object',
    fields,
    optional: [...fields.values()].every(child => child.optional),
  };
};

export const formatFieldErrors = (errors: FieldError[]): string =>
  errors.map(error => `${error.path || '(root)'}: ${error.message}`).join('; ');

/**
 * The compiled form of a schema declaration. Immutable once built, so one instance
 * is shared by every concurrent extraction of a run.
 */
export class RecordTypeContract {
  private readonly schema: z.ZodType<RecordInstance, z.ZodTypeDef, unknown>;

  constructor(
    readonly name: string,
    private readonly root: ObjectNode
  ) {
    this.schema = objectShape(root);
  }

  get fieldNames(): string[] {
    return [...this.root.fields.keys()];
  }

  validate(candidate: unknown): ValidationResult {
    if (!isPlainObject(candidate)) {
      return {
        success: false,
        errors: [{ path: '', message: 'Expected a JSON object' }],
      };
    }

    const parsed = this.schema.safeParse(candidate);
    if (parsed.success) {
      return { success: true, data: parsed.data };
    }
    return {
      success: false,
      errors: parsed.error.issues.map(issue => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    };
  }

  renderExample(): { [field: string]: ExampleValue } {
    const example: { [field: string]: ExampleValue } = {};
    for (const [name, child] of this.root.fields) {
      example[name] = exampleFor(child);
    }
    return example;
  }

  describePath(path: string): TypeNode | undefined {
    let node: TypeNode = this.root;
    for (const segment of path.split('.')) {
      if (node.kind !== 'object') return undefined;
      const child = node.fields.get(segment);
      if (!child) return undefined;
      node = child;
    }
    return node;
  }

  /** Dot-paths of every primitive field, in declaration order. */
  leafPaths(): string[] {
    const paths: string[] = [];
    const walk = (node: ObjectNode, prefix: string): void => {
      for (const [name, child] of node.fields) {
        const path = prefix ? `${prefix}.${name}` : name;
        if (child.kind === 'object') walk(child, path);
        else paths.push(path);
      }
    };
    walk(this.root, '');
    return paths;
  }
}

export function compileSchema(declaration: unknown, name: string = 'Record'): RecordTypeContract {
  if (!isPlainObject(declaration)) {
    throw new SchemaError('Schema must be a mapping of field names to types');
  }
  return new RecordTypeContract(name, compileObject(declaration, ''));
}
