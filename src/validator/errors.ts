import type { ValidationResult } from './validation-result.js';

export type ValuesCheckErrorCode =
  | 'VALUES_PARSE_FAILED'
  | 'VALUES_ALIAS_CYCLE'
  | 'VALUES_NOT_MAPPING'
  | 'VALUES_FILE_TOO_LARGE'
  | 'VALUES_CONVERSION_FAILED'
  | 'SCHEMA_PARSE_FAILED'
  | 'SCHEMA_INVALID'
  | 'SCHEMA_COMPILE_FAILED'
  | 'CHART_LOAD_FAILED';

export type ValuesCheckErrorContext = Readonly<Record<string, unknown>>;

function formatMessage(message: string, context?: ValuesCheckErrorContext): string {
  if (context === undefined) {
    return message;
  }

  return `${message} context=${JSON.stringify(context)}`;
}

export class ValuesCheckError extends Error {
  readonly code: ValuesCheckErrorCode;
  readonly context?: ValuesCheckErrorContext;

  constructor(code: ValuesCheckErrorCode, message: string, context?: ValuesCheckErrorContext, options?: ErrorOptions) {
    super(formatMessage(message, context), options);
    this.name = 'ValuesCheckError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }
  }
}

/**
 * A validation run that could not complete its schema stage. The unknown-key and
 * type-mismatch passes have already run; their findings are kept on `partial`.
 */
export class ValidationRunError extends Error {
  readonly code: ValuesCheckErrorCode;
  readonly partial: ValidationResult;

  constructor(cause: ValuesCheckError, partial: ValidationResult) {
    super(`Validation of ${partial.sourceId} failed: ${cause.message}`, { cause });
    this.name = 'ValidationRunError';
    this.code = cause.code;
    this.partial = partial;
  }
}

export function isValuesCheckError(error: unknown): error is ValuesCheckError {
  return error instanceof ValuesCheckError;
}

export function valuesParseError(message: string, context?: ValuesCheckErrorContext): ValuesCheckError {
  return new ValuesCheckError('VALUES_PARSE_FAILED', message, context);
}

export function aliasCycleError(message: string, context?: ValuesCheckErrorContext): ValuesCheckError {
  return new ValuesCheckError('VALUES_ALIAS_CYCLE', message, context);
}

export function schemaParseError(message: string, cause: unknown): ValuesCheckError {
  return new ValuesCheckError('SCHEMA_PARSE_FAILED', message, undefined, { cause });
}

export function schemaCompileError(message: string, cause: unknown): ValuesCheckError {
  return new ValuesCheckError('SCHEMA_COMPILE_FAILED', message, undefined, { cause });
}

export function chartLoadError(message: string, context?: ValuesCheckErrorContext, cause?: unknown): ValuesCheckError {
  return new ValuesCheckError('CHART_LOAD_FAILED', message, context, cause === undefined ? undefined : { cause });
}
