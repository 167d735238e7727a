// packages/core/src/utils/errors.ts

import type { ErrorCode } from '../types/errors.js';

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * The single failure kind of the compile pipeline. The first fault aborts the parse;
 * nothing is recovered locally.
 */
export class WorkflowError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly nodeName?: string,
  ) {
    super(message);
    this.name = 'WorkflowError';
  }
}

export function isWorkflowError(error: unknown): error is WorkflowError {
  return error instanceof WorkflowError;
}
