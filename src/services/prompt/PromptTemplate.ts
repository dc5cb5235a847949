import { TemplateError } from '../../utils/errors.js';
import type { RecordTypeContract } from '../../domain/schema/RecordTypeContract.js';

/** Reserved slot, always filled from the contract's example rendering. */
export const SCHEMA_EXAMPLE_SLOT = '_SCHEMA_EXAMPLE';

/** Slots a chat transcript supplies to its prompt. */
export const ITEM_SLOTS = ['chat_id', 'user_email', 'corpus'] as const;

export type PromptVariables = Record<string, string | number | null | undefined>;

type Segment = { type: 'text'; value: string } | { type: 'slot'; name: string };

const SLOT_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

const tokenize = (template: string): Segment[] => {
  const segments: Segment[] = [];
  let text = '';
  let i = 0;

  while (i < template.length) {
    const char = template[i];

    if (char === '{' && template[i + 1] === '{') {
      text += '{';
      i += 2;
      continue;
    }
    if (char === '}' && template[i + 1] === '}') {
      text += '}';
      i += 2;
      continue;
    }
    if (char === '}') {
      throw new TemplateError(`Unmatched "}" at position ${i}`, { position: i });
    }
    if (char !== '{') {
      text += char;
      i++;
      continue;
    }

    const close = template.indexOf('}', i + 1);
    if (close === -1) {
      throw new TemplateError(`Unmatched "{" at position ${i}`, { position: i });
    }
    const name = template.slice(i + 1, close).trim();
    if (!name) {
      throw new TemplateError(`Empty placeholder at position ${i}`, { position: i });
    }
    if (!SLOT_NAME.test(name)) {
      throw new TemplateError(`Invalid placeholder "{${name}}" at position ${i}`, { position: i, placeholder: name });
    }

    if (text) segments.push({ type: 'text', value: text });
    text = '';
    segments.push({ type: 'slot', name });
    i = close + 1;
  }

  if (text) segments.push({ type: 'text', value: text });
  return segments;
};

/**
 * A prompt template with `{name}` placeholders, parsed once per run. Rendering is
 * literal substitution; `{{` and `}}` produce single braces.
 */
export class PromptTemplate {
  private constructor(
    readonly source: string,
    private readonly segments: Segment[]
  ) {}

  static parse(source: string): PromptTemplate {
    return new PromptTemplate(source, tokenize(source));
  }

  get placeholders(): string[] {
    const names = new Set<string>();
    for (const segment of this.segments) {
      if (segment.type === 'slot') names.add(segment.name);
    }
    return [...names];
  }

  /** Fails fast when the template names a slot nothing will ever fill. */
  assertSlots(allowed: readonly string[]): void {
    const known = new Set([...allowed, SCHEMA_EXAMPLE_SLOT]);
    const unknown = this.placeholders.filter(name => !known.has(name));
    if (unknown.length > 0) {
      throw new TemplateError(`Unknown placeholders: ${unknown.map(name => `{${name}}`).join(', ')}`, {
        unknown,
        allowed: [...known],
      });
    }
  }

  render(variables: PromptVariables, contract: RecordTypeContract): string {
    const values = new Map<string, string>();
    for (const [name, value] of Object.entries(variables)) {
      if (value !== undefined && value !== null) values.set(name, String(value));
    }
    values.set(SCHEMA_EXAMPLE_SLOT, JSON.stringify(contract.renderExample(), null, 2));

    const missing = this.placeholders.filter(name => !values.has(name));
    if (missing.length > 0) {
      throw new TemplateError(`No value for placeholders: ${missing.map(name => `{${name}}`).join(', ')}`, {
        missing,
      });
    }

    return this.segments.map(segment => (segment.type === 'text' ? segment.value : values.get(segment.name) ?? '')).join('');
  }
}

export function renderPrompt(template: string, variables: PromptVariables, contract: RecordTypeContract): string {
  return PromptTemplate.parse(template).render(variables, contract);
}
