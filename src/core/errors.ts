// src/core/errors.ts
export enum ErrorCode {
  INVALID_URL = 'invalid_url',
  UNRESOLVABLE_URL = 'unresolvable_url',
  UNKNOWN_SUITE = 'unknown_suite',
  FETCH_FAILED = 'fetch_failed',
  TIMEOUT = 'timeout',
  PARSE_FAILED = 'parse_failed',
  ITERATOR_CONSUMED = 'iterator_consumed',
  INVALID_OPTION = 'invalid_option',
}

export class VidError extends Error {
  code: ErrorCode;
  retryable: boolean;
  suggestion?: string;
  context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    retryable: boolean = false,
    suggestion?: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'VidError';
    this.code = code;
    this.retryable = retryable;
    this.suggestion = suggestion;
    this.context = context;
    Object.setPrototypeOf(this, VidError.prototype);
  }
}

export function unresolvableUrl(url: string, kind: 'video' | 'feed'): VidError {
  return new VidError(
    ErrorCode.UNRESOLVABLE_URL,
    `No suite handles ${kind} URL: ${url}`,
    false,
    'Check the URL or register a suite for this provider',
    { url, kind }
  );
}

export function parseFailed(message: string, cause?: unknown): VidError {
  const detail = cause instanceof Error ? cause.message : cause === undefined ? undefined : String(cause);
  return new VidError(
    ErrorCode.PARSE_FAILED,
    detail ? `${message}: ${detail}` : message,
    false,
    undefined,
    detail ? { cause: detail } : undefined
  );
}
