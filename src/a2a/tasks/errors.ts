import type { ZodIssue } from 'zod';

export type BackendErrorKind = 'transient' | 'permanent';

export abstract class QuoteAgentError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Malformed inbound message; no task is created.
 */
export class InvalidRequestError extends QuoteAgentError {
  readonly code = 'INVALID_REQUEST';

  constructor(
    message: string,
    readonly issues: ZodIssue[] = [],
  ) {
    super(message);
  }
}

export class UnknownTaskError extends QuoteAgentError {
  readonly code = 'UNKNOWN_TASK';

  constructor(readonly taskId: string) {
    super(`Task ${taskId} not found`);
  }
}

export class InvalidTransitionError extends QuoteAgentError {
  readonly code = 'INVALID_TRANSITION';

  constructor(
    readonly taskId: string,
    readonly from: string,
    readonly to: string,
  ) {
    super(`Invalid task transition ${from} -> ${to} for ${taskId}`);
  }
}

export class BackendError extends QuoteAgentError {
  readonly code = 'BACKEND_ERROR';

  constructor(
    readonly kind: BackendErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }

  get retryable(): boolean {
    return this.kind === 'transient';
  }
}

/**
 * A subscriber channel could not take an event. Logged, never propagated.
 */
export class DeliveryError extends QuoteAgentError {
  readonly code = 'DELIVERY_ERROR';

  constructor(
    readonly taskId: string,
    readonly channelName: string,
    options?: { cause?: unknown },
  ) {
    super(`Failed to deliver event for task ${taskId} to ${channelName}`, options);
  }
}

export function getErrorMessage(error: unknown): string {
  if (typeof error === 'string') {
    return error;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return 'Unknown error';
}
