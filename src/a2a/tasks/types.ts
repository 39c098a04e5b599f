import type { TaskState } from '@a2a-js/sdk';

import type { Intent } from '../../intent/classifier.js';

/**
 * The subset of A2A task states a quote task can occupy
 */
export type QuoteTaskState = Extract<
  TaskState,
  'submitted' | 'working' | 'input-required' | 'completed' | 'failed' | 'canceled'
>;

export type TerminalTaskState = Extract<QuoteTaskState, 'completed' | 'failed' | 'canceled'>;

export const TERMINAL_STATES: readonly TerminalTaskState[] = ['completed', 'failed', 'canceled'];

export function isTerminalState(state: QuoteTaskState): state is TerminalTaskState {
  return state === 'completed' || state === 'failed' || state === 'canceled';
}

export type MessageRole = 'user' | 'agent';

export interface InboundMessage {
  role: MessageRole;
  text: string;
  messageId: string;
}

export type QuoteSource = 'model' | 'fallback';

export interface TaskResult {
  text: string;
  source: QuoteSource;
  attempts: number;
}

export interface TaskError {
  code: string;
  message: string;
  kind?: 'transient' | 'permanent';
}

export interface QuoteTask {
  readonly id: string;
  readonly contextId: string;
  readonly state: QuoteTaskState;
  readonly request: InboundMessage;
  readonly intent?: Intent;
  readonly result?: TaskResult;
  readonly error?: TaskError;
  readonly createdAt: number;
  readonly updatedAt: number;
  readonly terminalAt?: number;
}

export type TaskEventPayload =
  | { kind: 'text'; text: string; source: QuoteSource }
  | { kind: 'error'; error: TaskError };

/**
 * Immutable notification emitted once per state change
 */
export interface TaskEvent {
  readonly taskId: string;
  readonly contextId: string;
  readonly sequenceNumber: number;
  readonly fromState: QuoteTaskState | null;
  readonly toState: QuoteTaskState;
  readonly payload?: TaskEventPayload;
  readonly timestamp: string;
}

/**
 * Anything that can receive task events. Transport bindings implement this and
 * nothing else to get fan-out from the engine.
 */
export interface TaskChannel {
  send(event: TaskEvent): void | Promise<void>;
  /** Set once the underlying connection is gone */
  readonly closed?: boolean;
  readonly name?: string;
}

export interface SubscriptionHandle {
  readonly id: string;
  readonly taskId: string;
  readonly channel: TaskChannel;
}

export type TransitionRequest =
  | { to: 'working' | 'input-required' | 'canceled' }
  | { to: 'completed'; result: TaskResult }
  | { to: 'failed'; error: TaskError };
