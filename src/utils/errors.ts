export type SchedulingErrorCode =
  | 'TIMELINE_OVERLAP'
  | 'OUTSIDE_WORKING_DAY'
  | 'UNKNOWN_UNIT'
  | 'OPERATOR_POOL_EXCEEDED'
  | 'DISPATCHER_REUSED'
  | 'RUN_NOT_FOUND';

export class SchedulingError extends Error {
  constructor(message: string, public code: SchedulingErrorCode, public details?: Record<string, unknown>) {
    super(message);
    this.name = 'SchedulingError';
  }
}

export class ValidationError extends Error {
  constructor(message: string, public field: string, public value?: unknown) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string, public key: string, public originalError?: Error) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

// Domain errors describe bad input or broken invariants; repeating the call cannot fix them.
export function isRetryableError(error: Error): boolean {
  if (error instanceof SchedulingError || error instanceof ValidationError || error instanceof ConfigurationError) {
    return false;
  }
  return true;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
