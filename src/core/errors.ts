import { CommanderError } from 'commander';
import { ZodError } from 'zod';

export type ErrorCode =
  | 'E_USAGE'
  | 'E_CONFIG'
  | 'E_IO'
  | 'E_CONNECTIVITY'
  | 'E_INTERNAL';

// Every failure is terminal and reported the same way to CI.
export const exitCodeByError: Record<ErrorCode, number> = {
  E_USAGE: 1,
  E_CONFIG: 1,
  E_IO: 1,
  E_CONNECTIVITY: 1,
  E_INTERNAL: 1,
};

export class SwaggerPubError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'SwaggerPubError';
    this.code = code;
    this.details = details;
  }
}

/** Missing or malformed arguments. */
export class UsageError extends SwaggerPubError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('E_USAGE', message, details);
    this.name = 'UsageError';
  }
}

/** A required field is missing, or a resolved value has the wrong shape. */
export class ConfigError extends SwaggerPubError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('E_CONFIG', message, details);
    this.name = 'ConfigError';
  }
}

/** The definition file could not be read. */
export class IOError extends SwaggerPubError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('E_IO', message, details);
    this.name = 'IOError';
  }
}

/** The request could not be sent or no response arrived. */
export class ConnectivityError extends SwaggerPubError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('E_CONNECTIVITY', message, details);
    this.name = 'ConnectivityError';
  }
}

const INTERNAL_ERROR_MESSAGE = 'internal error';

export function isErrnoException(value: unknown): value is NodeJS.ErrnoException {
  return (
    value instanceof Error &&
    'code' in value &&
    typeof value.code === 'string'
  );
}

export function normalizeError(error: unknown): SwaggerPubError {
  if (error instanceof SwaggerPubError) {
    return error;
  }
  if (error instanceof CommanderError) {
    return new UsageError(error.message, { reason: error.code });
  }
  if (error instanceof ZodError) {
    const message = error.issues
      .map((issue) => `${issue.path.join('.') || 'value'}: ${issue.message}`)
      .join('; ');
    return new ConfigError(message);
  }
  if (error instanceof Error) {
    return new SwaggerPubError('E_INTERNAL', INTERNAL_ERROR_MESSAGE, {
      name: error.name,
    });
  }
  return new SwaggerPubError('E_INTERNAL', INTERNAL_ERROR_MESSAGE);
}
