import { readFile } from 'fs/promises';
import { isMap, isScalar, parseDocument, type Document } from 'yaml';
import { z } from 'zod';
import { compileSchema, type RecordTypeContract } from '../../domain/schema/RecordTypeContract.js';
import { ITEM_SLOTS, PromptTemplate } from '../prompt/PromptTemplate.js';
import { defaultPathMapping } from '../projection/FieldProjector.js';
import { ConfigurationError, SchemaError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { ExtractionConfig, PathMapping, PathMappingEntry } from '../../types/extraction.types.js';

const extractionConfigSchema = z.object({
  model_name: z.string().trim().min(1).default('DynamicSurveyModel'),
  schema: z.record(z.unknown()),
  prompt_template: z.string().min(1),
  csv_mapping: z.record(z.string().trim().min(1)).nullish(),
  key_column: z.string().trim().min(1).optional(),
});

export interface LoadedExtractionConfig {
  config: ExtractionConfig;
  contract: RecordTypeContract;
  template: PromptTemplate;
}

const scalarText = (node: unknown): string =>
  String(isScalar(node) ? node.value : node);

/**
 * Column names of `csv_mapping` as they appear in the document. Plain objects move
 * integer-like keys to the front, so the order is read off the YAML node instead.
 */
const mappingColumnOrder = (document: Document): string[] => {
  const node = document.get('csv_mapping', true);
  if (!isMap(node)) return [];
  return node.items.map(pair => scalarText(pair.key));
};

const buildPathMapping = (
  columns: string[],
  raw: Record<string, string>,
  contract: RecordTypeContract
): PathMapping => {
  const mapping: PathMappingEntry[] = [];
  for (const column of columns) {
    const path = raw[column];
    if (path === undefined) continue;
    if (!contract.describePath(path)) {
      throw new SchemaError(`csv_mapping column "${column}" points at undeclared field "${path}"`, {
        column,
        path,
      });
    }
    mapping.push({ column, path });
  }
  return mapping;
};

const resolveKeyColumn = (mapping: PathMapping, requested: string | undefined): string => {
  const columns = mapping.map(entry => entry.column);
  if (requested !== undefined) {
    if (!columns.includes(requested)) {
      throw new SchemaError(`key_column "${requested}" is not a csv_mapping column`, {
        keyColumn: requested,
        columns,
      });
    }
    return requested;
  }
  return columns.includes('chat_id') ? 'chat_id' : columns[0];
};

/**
 * Parses one extraction config document: compiles the schema, parses the prompt
 * template and checks every mapping path against the compiled contract.
 */
export function parseExtractionConfig(text: string, source: string = '<inline>'): LoadedExtractionConfig {
  const document = parseDocument(text);
  if (document.errors.length > 0) {
    const messages = document.errors.map(error => error.message);
    throw new ConfigurationError(`${source} is not valid YAML: ${messages.join('; ')}`, messages);
  }

  const parsed = extractionConfigSchema.safeParse(document.toJS());
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid extraction config ${source}: ${issues.join('; ')}`, issues);
  }
  const raw = parsed.data;

  const contract = compileSchema(raw.schema, raw.model_name);
  const template = PromptTemplate.parse(raw.prompt_template);
  template.assertSlots(ITEM_SLOTS);

  let pathMapping: PathMapping;
  if (raw.csv_mapping && Object.keys(raw.csv_mapping).length > 0) {
    pathMapping = buildPathMapping(mappingColumnOrder(document), raw.csv_mapping, contract);
  } else {
    pathMapping = defaultPathMapping(contract);
    logger.warn({ source, columns: pathMapping.length }, 'No csv_mapping declared, using one column per field');
  }

  const config: ExtractionConfig = {
    name: raw.model_name,
    schema: raw.schema,
    promptTemplate: raw.prompt_template,
    pathMapping,
    keyColumn: resolveKeyColumn(pathMapping, raw.key_column),
  };

  logger.debug({ source, name: config.name, fields: contract.fieldNames }, 'Extraction config loaded');
  return { config, contract, template };
}

export async function loadExtractionConfig(path: string): Promise<LoadedExtractionConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read extraction config ${path}`, error);
  }
  return parseExtractionConfig(text, path);
}
