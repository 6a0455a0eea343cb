export type AgentErrorCode =
  | 'VALIDATION_FAILED'
  | 'ADMISSION_REJECTED'
  | 'THREAD_ACCESS_DENIED'
  | 'THREAD_BUSY'
  | 'NODE_FAILURE'
  | 'STORE_UNAVAILABLE'
  | 'CHECKPOINT_CONFLICT'
  | 'JUDGE_FAILURE';

export class AgentCoreError extends Error {
  constructor(
    public readonly code: AgentErrorCode,
    message: string,
    public readonly cause?: unknown,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AgentCoreError';
  }
}

export class ValidationError extends AgentCoreError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('VALIDATION_FAILED', message, undefined, details);
    this.name = 'ValidationError';
  }
}

export class AdmissionRejectedError extends AgentCoreError {
  constructor(
    public readonly scope: string,
    public readonly retryAfterSeconds: number,
    public readonly limit: number
  ) {
    super(
      'ADMISSION_REJECTED',
      `Rate limit exceeded for ${scope}. Retry after ${retryAfterSeconds}s.`,
      undefined,
      { scope, retryAfterSeconds, limit }
    );
    this.name = 'AdmissionRejectedError';
  }
}

export class ThreadAccessDeniedError extends AgentCoreError {
  constructor(threadId: string) {
    super(
      'THREAD_ACCESS_DENIED',
      `Thread ${threadId} belongs to another user`
    );
    this.name = 'ThreadAccessDeniedError';
  }
}

export class ThreadBusyError extends AgentCoreError {
  constructor(threadId: string, waitedMs: number) {
    super(
      'THREAD_BUSY',
      `Thread ${threadId} is locked by another turn (waited ${waitedMs}ms)`
    );
    this.name = 'ThreadBusyError';
  }
}

/** A planner or executor step failed; the run is recorded with status `error`. */
export class NodeFailureError extends AgentCoreError {
  constructor(
    public readonly node: 'planner' | 'executor',
    message: string,
    cause?: unknown
  ) {
    super('NODE_FAILURE', `${node} failed: ${message}`, cause, { node });
    this.name = 'NodeFailureError';
  }
}

export class StoreUnavailableError extends AgentCoreError {
  constructor(
    public readonly store: 'checkpoint' | 'recorder' | 'admission' | 'trace',
    cause?: unknown
  ) {
    super(
      'STORE_UNAVAILABLE',
      `${store} store unavailable: ${errorMessage(cause)}`,
      cause,
      { store }
    );
    this.name = 'StoreUnavailableError';
  }
}

export class CheckpointConflictError extends AgentCoreError {
  constructor(threadId: string, expectedVersion: number) {
    super(
      'CHECKPOINT_CONFLICT',
      `Thread ${threadId} moved past version ${expectedVersion} during the turn`,
      undefined,
      { threadId, expectedVersion }
    );
    this.name = 'CheckpointConflictError';
  }
}

export class JudgeFailureError extends AgentCoreError {
  constructor(metricName: string, attempts: number, cause?: unknown) {
    super(
      'JUDGE_FAILURE',
      `Judge for ${metricName} failed after ${attempts} attempt(s): ${errorMessage(cause)}`,
      cause,
      { metricName, attempts }
    );
    this.name = 'JudgeFailureError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (error === undefined) return 'unknown error';
  return String(error);
}
