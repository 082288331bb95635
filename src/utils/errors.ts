/**
 * @fileoverview Error taxonomy for the knowledge layer
 *
 * Not-found is deliberately absent: an empty lookup is a normal `null` or
 * empty array that the routing policy reads as "try the next source".
 */

export enum ErrorCode {
  PROVIDER_ERROR = 'PROVIDER_ERROR',
  TIMEOUT = 'TIMEOUT',
  MALFORMED_DATA = 'MALFORMED_DATA',
  CONFIGURATION = 'CONFIGURATION',
  VALIDATION = 'VALIDATION',
  INTERNAL = 'INTERNAL',
}

export class SlateError extends Error {
  public readonly code: ErrorCode;
  public readonly details: Record<string, unknown> | undefined;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'SlateError';
    this.code = code;
    this.details = details;
  }
}

/**
 * Embedding, vector store or network failure
 */
export class ProviderError extends SlateError {
  public readonly provider: string;

  constructor(
    provider: string,
    message: string,
    details?: Record<string, unknown>,
    code: ErrorCode = ErrorCode.PROVIDER_ERROR
  ) {
    super(code, message, { provider, ...details });
    this.name = 'ProviderError';
    this.provider = provider;
  }
}

export class TimeoutError extends ProviderError {
  public readonly timeoutMs: number;

  constructor(provider: string, timeoutMs: number) {
    super(provider, `${provider} did not respond within ${timeoutMs}ms`, { timeoutMs }, ErrorCode.TIMEOUT);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * A data file that failed to parse at load time
 */
export class MalformedDataError extends SlateError {
  public readonly path: string;

  constructor(path: string, message: string) {
    super(ErrorCode.MALFORMED_DATA, `${path}: ${message}`, { path });
    this.name = 'MalformedDataError';
    this.path = path;
  }
}

/**
 * Missing credential or unreachable required service
 */
export class ConfigurationError extends SlateError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.CONFIGURATION, message, details);
    this.name = 'ConfigurationError';
  }
}

export class ValidationError extends SlateError {
  constructor(field: string, message: string) {
    super(ErrorCode.VALIDATION, `Invalid ${field}: ${message}`, { field });
    this.name = 'ValidationError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return String(error);
}

/**
 * In-character sentence for the user. Never a stack trace or an error code.
 */
export function toUserMessage(error: unknown): string {
  if (error instanceof TimeoutError) {
    return 'The archives are slow to answer me just now. Please ask again in a moment.';
  }
  if (error instanceof ConfigurationError) {
    return 'That part of my archives is sealed at the moment, so I cannot consult it.';
  }
  if (error instanceof ProviderError) {
    return 'I could not reach my archives to find that. Let us try again shortly.';
  }
  if (error instanceof ValidationError) {
    return 'I did not quite understand that request. Could you phrase it another way?';
  }
  return 'Something went wrong while I searched my memories. Please ask me again.';
}
