/**
 * Engine error classes
 *
 * Collaborator boundaries convert these into typed attempt outcomes; they never
 * reach the caller of the orchestrator.
 */

export type RepairGateErrorCode =
  | 'OPERATION_TIMEOUT'
  | 'OPERATION_CANCELLED'
  | 'RESPONSE_PARSE_FAILED'
  | 'PATCH_REJECTED'
  | 'CONFIG_INVALID';

export class RepairGateError extends Error {
  constructor(
    public readonly code: RepairGateErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'RepairGateError';
  }
}

export class OperationTimeoutError extends RepairGateError {
  constructor(
    public readonly timeoutMs: number,
    operation = 'operation'
  ) {
    super('OPERATION_TIMEOUT', `${operation} timed out after ${timeoutMs}ms`, { timeoutMs });
    this.name = 'OperationTimeoutError';
  }
}

export class OperationCancelledError extends RepairGateError {
  constructor(message = 'Operation cancelled') {
    super('OPERATION_CANCELLED', message);
    this.name = 'OperationCancelledError';
  }
}

export class ResponseParseError extends RepairGateError {
  constructor(message: string) {
    super('RESPONSE_PARSE_FAILED', message);
    this.name = 'ResponseParseError';
  }
}

/**
 * Format any thrown value for logs and reports (no stack traces)
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
