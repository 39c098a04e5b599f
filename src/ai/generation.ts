import { setTimeout as sleep } from 'node:timers/promises';

import type { GenerationConfig } from '../config.js';
import { BackendError } from '../a2a/tasks/errors.js';
import type { TaskResult } from '../a2a/tasks/types.js';
import { describeIntent, type Intent } from '../intent/classifier.js';
import { notify, type BackendCallOutcome, type TaskObserver } from '../observability/hooks.js';
import { Logger } from '../utils/logger.js';

import { FallbackQuoteSet } from './fallback-quotes.js';
import { buildQuotePrompt } from './prompts.js';
import { classifyBackendError, type CompletionBackend } from './service.js';

export interface GenerateOptions {
  taskId?: string;
  signal?: AbortSignal;
}

export interface GenerationAdapterOptions {
  fallbackQuotes?: FallbackQuoteSet;
  observer?: TaskObserver;
}

/**
 * Delay before retry number `retry` (1-based)
 */
export function backoffDelay(config: GenerationConfig, retry: number): number {
  const delay = config.initialBackoffMs * config.backoffMultiplier ** (retry - 1);
  return Math.min(delay, config.maxBackoffMs);
}

/**
 * Wraps the completion backend with per-attempt timeouts, bounded retries on
 * transient failures and an offline fallback quote set.
 */
export class GenerationAdapter {
  private readonly logger = Logger.getInstance('GenerationAdapter');
  private readonly fallbackQuotes: FallbackQuoteSet;
  private readonly observer?: TaskObserver;

  constructor(
    private readonly backend: CompletionBackend,
    private readonly config: GenerationConfig,
    options: GenerationAdapterOptions = {},
  ) {
    this.fallbackQuotes = options.fallbackQuotes ?? new FallbackQuoteSet();
    this.observer = options.observer;
  }

  async generate(intent: Intent, options: GenerateOptions = {}): Promise<TaskResult> {
    const { taskId, signal } = options;
    const prompt = buildQuotePrompt(intent, { maxTopicLength: this.config.maxTopicLength });
    const maxAttempts = this.config.maxRetries + 1;
    let lastError: BackendError | undefined;
    let attempt = 0;

    while (attempt < maxAttempts) {
      signal?.throwIfAborted();
      attempt += 1;
      const startedAt = Date.now();

      try {
        const text = await this.backend.complete(prompt, {
          timeoutMs: this.config.attemptTimeoutMs,
          signal,
        });
        if (text.trim().length === 0) {
          throw new BackendError('transient', 'Model returned an empty completion');
        }
        this.report(taskId, attempt, startedAt, 'success');
        return { text: text.trim(), source: 'model', attempts: attempt };
      } catch (error) {
        signal?.throwIfAborted();
        lastError = classifyBackendError(error);
        this.report(taskId, attempt, startedAt, lastError.kind);
        this.logger.warn(`Generation attempt ${attempt}/${maxAttempts} failed`, {
          taskId,
          intent: describeIntent(intent),
          kind: lastError.kind,
          reason: lastError.message,
        });
        if (!lastError.retryable) {
          break;
        }
      }

      if (attempt < maxAttempts) {
        await sleep(backoffDelay(this.config, attempt), undefined, { signal });
      }
    }

    const failure = lastError ?? new BackendError('permanent', 'No generation attempts were made');

    if (!this.config.fallbackEnabled) {
      throw failure;
    }

    const quote = this.fallbackQuotes.pick(intent);
    if (quote === undefined) {
      this.logger.error('Fallback quote set is empty', failure, { taskId });
      throw failure;
    }

    this.logger.warn('Serving fallback quote', {
      taskId,
      intent: describeIntent(intent),
      attempts: attempt,
    });
    return { text: quote, source: 'fallback', attempts: attempt };
  }

  private report(
    taskId: string | undefined,
    attempt: number,
    startedAt: number,
    outcome: BackendCallOutcome,
  ): void {
    notify(
      this.observer?.onBackendCall?.bind(this.observer),
      { taskId, attempt, latencyMs: Date.now() - startedAt, outcome },
      'onBackendCall',
    );
  }
}
