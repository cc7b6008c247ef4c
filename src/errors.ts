export type PipelineErrorCode =
  | 'VALIDATION'
  | 'PARSE'
  | 'EMBEDDING_BACKEND'
  | 'MODEL_INVOCATION'
  | 'CONFIG_LOAD'
  | 'RECEIPT_NOT_FOUND';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Malformed input rejected before any parsing happens. */
export class ValidationError extends PipelineError {
  constructor(message: string) {
    super('VALIDATION', message);
  }
}

/** Receipt markup is missing a required section or field. */
export class ParseError extends PipelineError {
  readonly section: string;

  constructor(section: string, message: string, options?: { cause?: unknown }) {
    super('PARSE', message, options);
    this.section = section;
  }
}

export class EmbeddingBackendError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('EMBEDDING_BACKEND', message, options);
  }
}

export type ModelInvocationErrorKind =
  | 'timeout'
  | 'rate-limit'
  | 'malformed-response'
  | 'credential-missing'
  | 'request-failed';

export class ModelInvocationError extends PipelineError {
  readonly kind: ModelInvocationErrorKind;
  readonly modelName: string;

  constructor(
    kind: ModelInvocationErrorKind,
    modelName: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super('MODEL_INVOCATION', message, options);
    this.kind = kind;
    this.modelName = modelName;
  }

  get retryable(): boolean {
    return this.kind !== 'credential-missing';
  }
}

export class ConfigLoadError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG_LOAD', message, options);
  }
}

export class ReceiptNotFoundError extends PipelineError {
  readonly accessKey: string;

  constructor(accessKey: string, message: string, options?: { cause?: unknown }) {
    super('RECEIPT_NOT_FOUND', message, options);
    this.accessKey = accessKey;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
