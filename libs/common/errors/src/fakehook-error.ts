import { ErrorCode } from './error-codes';

export interface FakehookErrorOptions {
  code: ErrorCode;
  message: string;
  httpStatusCode: number;
  resource?: string;
  originalError?: Error;
  metadata?: Record<string, unknown>;
}

export class FakehookError extends Error {
  readonly code: ErrorCode;
  readonly httpStatusCode: number;
  readonly resource?: string;
  readonly originalError?: Error;
  readonly metadata?: Record<string, unknown>;

  constructor(options: FakehookErrorOptions) {
    super(options.message);
    this.name = 'FakehookError';
    this.code = options.code;
    this.httpStatusCode = options.httpStatusCode;
    this.resource = options.resource;
    this.originalError = options.originalError;
    this.metadata = options.metadata;

    // Capture stack trace
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      error: this.code,
      message: this.message,
      statusCode: this.httpStatusCode,
      ...(this.resource ? { resource: this.resource } : {}),
      ...(this.metadata ? { details: this.metadata } : {}),
    };
  }
}
