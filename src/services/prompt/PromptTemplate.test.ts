import { describe, it, expect } from 'vitest';
import { PromptTemplate, renderPrompt, ITEM_SLOTS } from './PromptTemplate.js';
import { compileSchema } from '../../domain/schema/RecordTypeContract.js';
import { TemplateError } from '../../utils/errors.js';

const contract = compileSchema({ a: 'int', b: 'str | None' });

describe('PromptTemplate', () => {
  it('renders item slots and the schema example', () => {
    const prompt = renderPrompt(
      'Chat {chat_id}\n{corpus}\nSchema:\n{_SCHEMA_EXAMPLE}',
      { chat_id: 12, corpus: 'hello there' },
      contract
    );

    expect(prompt).toBe('Chat 12\nhello there\nSchema:\n{\n  "a": 0,\n  "b": "text"\n}');
  });

  it('embeds an example holding only the schema keys', () => {
    const prompt = renderPrompt('{_SCHEMA_EXAMPLE}', {}, contract);
    expect(Object.keys(JSON.parse(prompt))).toEqual(['a', 'b']);
  });

  it('always supplies the schema example itself', () => {
    const prompt = renderPrompt('{_SCHEMA_EXAMPLE}', { _SCHEMA_EXAMPLE: 'caller value' }, contract);
    expect(prompt).toBe('{\n  "a": 0,\n  "b": "text"\n}');
  });

  it('substitutes literally without evaluating values', () => {
    const prompt = renderPrompt('[{corpus}]', { corpus: '{chat_id} ${process.env.HOME}' }, contract);
    expect(prompt).toBe('[{chat_id} ${process.env.HOME}]');
  });

  it('treats doubled braces as literal braces', () => {
    const prompt = renderPrompt('{{"id": {chat_id}}}', { chat_id: 3 }, contract);
    expect(prompt).toBe('{"id": 3}');
  });

  it('fails when a placeholder has no value', () => {
    const template = PromptTemplate.parse('{chat_id} {corpus}');
    expect(() => template.render({ chat_id: 1 }, contract)).toThrow(TemplateError);
    expect(() => template.render({ chat_id: 1, corpus: null }, contract)).toThrow('No value for placeholders: {corpus}');
  });

  it('lists placeholders once each, in order of appearance', () => {
    expect(PromptTemplate.parse('{corpus} {chat_id} {corpus}').placeholders).toEqual(['corpus', 'chat_id']);
  });

  it('rejects unknown slots up front', () => {
    const template = PromptTemplate.parse('{chat_id} {age} {_SCHEMA_EXAMPLE}');
    expect(() => template.assertSlots(ITEM_SLOTS)).toThrow('Unknown placeholders: {age}');
    expect(() => PromptTemplate.parse('{corpus}{_SCHEMA_EXAMPLE}').assertSlots(ITEM_SLOTS)).not.toThrow();
  });

  it('rejects malformed templates', () => {
    expect(() => PromptTemplate.parse('open { brace')).toThrow('Unmatched "{" at position 5');
    expect(() => PromptTemplate.parse('close } brace')).toThrow('Unmatched "}" at position 6');
    expect(() => PromptTemplate.parse('empty {}')).toThrow('Empty placeholder at position 6');
    expect(() => PromptTemplate.parse('{name:>10}')).toThrow('Invalid placeholder "{name:>10}"');
    expect(() => PromptTemplate.parse('{a.b}')).toThrow(TemplateError);
  });
});
