import { ZodError } from 'zod';

const BODY_EXCERPT_LENGTH = 500;

export type ErrorCode =
  | 'CONFIG_ERROR'
  | 'USAGE_ERROR'
  | 'HTTP_STATUS_ERROR'
  | 'RESPONSE_FORMAT_ERROR'
  | 'OCR_ERROR'
  | 'SCRATCH_NOT_PREPARED';

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode
  ) {
    super(message);
    this.name = 'AppError';
    Object.setPrototypeOf(this, AppError.prototype);
  }
}

export class ConfigError extends AppError {
  constructor(public readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`, 'CONFIG_ERROR');
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }

  static fromZodError(error: ZodError): ConfigError {
    return new ConfigError(
      error.errors.map((e) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message))
    );
  }
}

export class UsageError extends AppError {
  constructor(message: string) {
    super(message, 'USAGE_ERROR');
    this.name = 'UsageError';
    Object.setPrototypeOf(this, UsageError.prototype);
  }
}

export class HttpStatusError extends AppError {
  public readonly bodyExcerpt: string;

  constructor(
    public readonly status: number,
    public readonly url: string,
    body: string
  ) {
    super(`HTTP ${status} from ${url}`, 'HTTP_STATUS_ERROR');
    this.name = 'HttpStatusError';
    this.bodyExcerpt = body.slice(0, BODY_EXCERPT_LENGTH);
    Object.setPrototypeOf(this, HttpStatusError.prototype);
  }
}

/**
 * A response arrived but does not have the shape its contract promises,
 * e.g. an LLM reply that is not JSON or lacks a required key.
 */
export class ResponseFormatError extends AppError {
  constructor(message: string) {
    super(message, 'RESPONSE_FORMAT_ERROR');
    this.name = 'ResponseFormatError';
    Object.setPrototypeOf(this, ResponseFormatError.prototype);
  }
}

export class OcrError extends AppError {
  constructor(
    message: string,
    public readonly filePath: string
  ) {
    super(message, 'OCR_ERROR');
    this.name = 'OcrError';
    Object.setPrototypeOf(this, OcrError.prototype);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof HttpStatusError) {
    return error.bodyExcerpt ? `${error.message}: ${error.bodyExcerpt}` : error.message;
  }

  if (error instanceof ZodError) {
    return error.errors.map((e) => `${e.path.join('.') || '<root>'}: ${e.message}`).join('; ');
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}
