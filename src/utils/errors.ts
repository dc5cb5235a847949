export interface FieldError {
  path: string;
  message: string;
}

export class ConfigurationError extends Error {
  code = 'CONFIGURATION_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class SchemaError extends Error {
  code = 'SCHEMA_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'SchemaError';
  }
}

export class TemplateError extends Error {
  code = 'TEMPLATE_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'TemplateError';
  }
}

export class InputError extends Error {
  code = 'INPUT_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'InputError';
  }
}

export class LLMTransportError extends Error {
  code = 'LLM_TRANSPORT_ERROR';
  constructor(
    message: string,
    public retryable: boolean = true,
    public status?: number,
    public details?: unknown
  ) {
    super(message);
    this.name = 'LLMTransportError';
  }
}

export class RecordStoreError extends Error {
  code = 'RECORD_STORE_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'RecordStoreError';
  }
}

/**
 * Errors that describe a broken run setup rather than a bad record. Any of these
 * aborts the run before the first LLM call.
 */
export const isConfigurationLevelError = (error: unknown): error is Error =>
  error instanceof ConfigurationError ||
  error instanceof SchemaError ||
  error instanceof TemplateError ||
  error instanceof InputError;

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
