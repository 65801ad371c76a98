import type { ZodIssue } from 'zod';

/**
 * Base class for programming errors raised by the server package. Expected
 * operating conditions (bad peer input, connection failures, policy
 * rejections) are returned as values instead.
 */
export class CotMeshError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CotMeshError';
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Thrown when a configuration object or the environment fails validation.
 */
export class ConfigValidationError extends CotMeshError {
  public readonly issues: ZodIssue[];

  constructor(subject: string, issues: ZodIssue[]) {
    const details = issues
      .map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n');
    super(`Invalid ${subject}:\n${details}`);
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

export class DuplicateServerError extends CotMeshError {
  public readonly serverId: string;

  constructor(serverId: string) {
    super(`Server ${serverId} is already registered`);
    this.name = 'DuplicateServerError';
    this.serverId = serverId;
  }
}

export class UnknownServerError extends CotMeshError {
  public readonly serverId: string;

  constructor(serverId: string) {
    super(`Server ${serverId} is not registered`);
    this.name = 'UnknownServerError';
    this.serverId = serverId;
  }
}
