export const ErrorCodes = {
  STORE_UNAVAILABLE: 'store_unavailable',
  INVALID_WEIGHTS: 'invalid_weights',
  VALIDATION_FAILED: 'validation_failed',
  REQUEST_CANCELLED: 'request_cancelled',
  INVALID_CONFIG: 'invalid_config',
  INVALID_REQUEST: 'invalid_request',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export type StoreSource = 'vector' | 'graph';

export class RouterError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RouterError';
    this.code = code;
  }
}

/**
 * Connectivity loss or a timeout talking to a store (or to the embedding
 * service that feeds the vector store). Executors retry this once; any other
 * error is not retried.
 */
export class StoreUnavailableError extends RouterError {
  readonly source: StoreSource;
  readonly reason: 'connectivity' | 'timeout';

  constructor(source: StoreSource, message: string, options?: { cause?: unknown; reason?: 'connectivity' | 'timeout' }) {
    super(ErrorCodes.STORE_UNAVAILABLE, message, options);
    this.name = 'StoreUnavailableError';
    this.source = source;
    this.reason = options?.reason ?? 'connectivity';
  }
}

export class InvalidWeightsError extends RouterError {
  constructor(message: string) {
    super(ErrorCodes.INVALID_WEIGHTS, message);
    this.name = 'InvalidWeightsError';
  }
}

export class ValidationFailedError extends RouterError {
  readonly confidence: number;
  readonly issueCount: number;

  constructor(confidence: number, issueCount: number) {
    super(
      ErrorCodes.VALIDATION_FAILED,
      `Generated answer failed validation (confidence ${confidence.toFixed(2)}, ${issueCount} issue(s))`
    );
    this.name = 'ValidationFailedError';
    this.confidence = confidence;
    this.issueCount = issueCount;
  }
}

export class RequestCancelledError extends RouterError {
  constructor(stage: string) {
    super(ErrorCodes.REQUEST_CANCELLED, `Request cancelled before ${stage}`);
    this.name = 'RequestCancelledError';
  }
}

export class InvalidConfigError extends RouterError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(ErrorCodes.INVALID_CONFIG, `Invalid configuration: ${issues.join('; ')}`);
    this.name = 'InvalidConfigError';
    this.issues = issues;
  }
}

export class InvalidRequestError extends RouterError {
  constructor(message: string) {
    super(ErrorCodes.INVALID_REQUEST, message);
    this.name = 'InvalidRequestError';
  }
}

export function isStoreUnavailable(e: unknown): e is StoreUnavailableError {
  return e instanceof StoreUnavailableError;
}

export const NO_RELIABLE_INFORMATION_MESSAGE =
  'No reliable information was found for this question in the available property and market data.';
