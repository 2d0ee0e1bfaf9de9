export type AgentErrorCode =
  | 'unknown_destination'
  | 'send_failed'
  | 'transport_closed'
  | 'malformed_message'
  | 'persistence_failed'
  | 'invalid_config';

export class AgentError extends Error {
  public readonly code: AgentErrorCode;
  public readonly isOperational: boolean;

  constructor(message: string, code: AgentErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.isOperational = true;

    // Capture stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

export class TransportError extends AgentError {
  public readonly destination?: string;

  constructor(
    message: string,
    code: Extract<AgentErrorCode, 'unknown_destination' | 'send_failed' | 'transport_closed'> = 'send_failed',
    destination?: string,
    options?: { cause?: unknown }
  ) {
    super(message, code, options);
    this.name = 'TransportError';
    this.destination = destination;
  }
}

export class MalformedMessageError extends AgentError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, 'malformed_message');
    this.name = 'MalformedMessageError';
    this.issues = issues;
  }
}

export class PersistenceError extends AgentError {
  public readonly operation: string;

  constructor(operation: string, cause?: unknown) {
    const detail = cause instanceof Error ? cause.message : cause != null ? String(cause) : 'unknown failure';
    super(`Persistence operation "${operation}" failed: ${detail}`, 'persistence_failed', { cause });
    this.name = 'PersistenceError';
    this.operation = operation;
  }
}

export class ConfigError extends AgentError {
  public readonly issues: string[];

  constructor(message: string = 'Invalid configuration', issues: string[] = []) {
    super(message, 'invalid_config');
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
