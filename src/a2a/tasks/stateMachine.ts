import { InvalidTransitionError } from './errors.js';
import type { QuoteTaskState } from './types.js';

export const validTransitions: Record<QuoteTaskState, readonly QuoteTaskState[]> = {
  submitted: ['working', 'input-required', 'canceled'],
  working: ['input-required', 'completed', 'failed', 'canceled'],
  'input-required': ['working', 'canceled'], // reserved for multi-turn skills
  completed: [],
  failed: [],
  canceled: [],
} as const;

export function canTransition(from: QuoteTaskState, to: QuoteTaskState): boolean {
  return validTransitions[from].includes(to);
}

export function ensureTransition(taskId: string, from: QuoteTaskState, to: QuoteTaskState): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(taskId, from, to);
  }
}
