import { StatusCodes } from 'http-status-codes';
import type { IExtensionCompileIssue } from '@enfyra/types';

export class EnfyraError extends Error {
  constructor(
    public readonly message: string,
    public readonly code = 'INTERNAL_ERROR',
    public readonly status: number = StatusCodes.INTERNAL_SERVER_ERROR,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'EnfyraError';
  }
}

export class NotFoundError extends EnfyraError {
  constructor(message = 'Resource not found', details?: unknown) {
    super(message, 'NOT_FOUND', StatusCodes.NOT_FOUND, details);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends EnfyraError {
  constructor(message = 'Validation failed', details?: unknown) {
    super(message, 'VALIDATION_ERROR', StatusCodes.BAD_REQUEST, details);
    this.name = 'ValidationError';
  }
}

export class ForbiddenError extends EnfyraError {
  constructor(message = 'Forbidden', details?: unknown) {
    super(message, 'FORBIDDEN', StatusCodes.FORBIDDEN, details);
    this.name = 'ForbiddenError';
  }
}

export class ConflictError extends EnfyraError {
  constructor(message = 'Resource conflict', details?: unknown) {
    super(message, 'CONFLICT', StatusCodes.CONFLICT, details);
    this.name = 'ConflictError';
  }
}

export class CompileError extends EnfyraError {
  constructor(public readonly issues: IExtensionCompileIssue[]) {
    super(
      issues.length === 1
        ? `Extension failed to compile: ${issues[0].message}`
        : `Extension failed to compile (${issues.length} issues)`,
      'COMPILE_ERROR',
      StatusCodes.UNPROCESSABLE_ENTITY,
      issues
    );
    this.name = 'CompileError';
  }
}

/**
 * Fields of the unique index a driver write violated (E11000), or null for any
 * other error. The list is empty when the driver did not report `keyPattern`.
 */
export function duplicateKeyFields(error: unknown): string[] | null {
  if (typeof error !== 'object' || error === null || !('code' in error) || error.code !== 11000) {
    return null;
  }
  const keyPattern = 'keyPattern' in error ? error.keyPattern : undefined;
  return typeof keyPattern === 'object' && keyPattern !== null ? Object.keys(keyPattern) : [];
}
