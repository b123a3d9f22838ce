/**
 * Typed error classes for the relay
 */

export class RelayError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'RelayError';
    this.code = code;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

export class DecodeError extends RelayError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, 'DECODE_ERROR');
    this.name = 'DecodeError';
    this.issues = issues;
  }
}

export class SecurityDeniedError extends RelayError {
  public readonly reason: string;

  constructor(reason: string) {
    super(`Blocked: ${reason}`, 'SECURITY_DENIED');
    this.name = 'SecurityDeniedError';
    this.reason = reason;
  }
}

export class IntegrityMismatchError extends RelayError {
  public readonly requestId: string;

  constructor(requestId: string) {
    super(`Integrity check failed for ${requestId}`, 'INTEGRITY_MISMATCH');
    this.name = 'IntegrityMismatchError';
    this.requestId = requestId;
  }
}

export class RelayTimeoutError extends RelayError {
  public readonly requestId: string;
  public readonly timeoutMs: number;

  constructor(requestId: string, timeoutMs: number) {
    super(`Timeout waiting for response ${requestId} after ${timeoutMs}ms`, 'RELAY_TIMEOUT');
    this.name = 'RelayTimeoutError';
    this.requestId = requestId;
    this.timeoutMs = timeoutMs;
  }
}

export class TransportError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'TRANSPORT_FAILURE');
    this.name = 'TransportError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class ConfigError extends RelayError {
  public readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Invalid configuration in ${source}: ${issues.join('; ')}`, 'CONFIG_ERROR');
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}
