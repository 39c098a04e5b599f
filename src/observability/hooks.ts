/**
 * Observability hooks for the task engine.
 *
 * The engine and the generation adapter report through a TaskObserver; exporting
 * to a tracing backend is left to whoever implements the interface.
 */

import type { QuoteTask } from '../a2a/tasks/types.js';
import { describeIntent } from '../intent/classifier.js';
import { Logger } from '../utils/logger.js';

export type BackendCallOutcome = 'success' | 'transient' | 'permanent';

export interface BackendCallReport {
  taskId?: string;
  attempt: number;
  latencyMs: number;
  outcome: BackendCallOutcome;
}

export interface TaskObserver {
  onTaskCreated?(task: QuoteTask): void | Promise<void>;
  onBackendCall?(report: BackendCallReport): void | Promise<void>;
  onTaskTerminal?(task: QuoteTask): void | Promise<void>;
}

const hookLogger = Logger.getInstance('Observability');

/**
 * Invokes a hook without waiting on it. Throws and rejections are logged and dropped.
 */
export function notify<A>(
  hook: ((arg: A) => void | Promise<void>) | undefined,
  arg: A,
  hookName: string,
): void {
  if (!hook) {
    return;
  }
  try {
    const pending = hook(arg);
    if (pending instanceof Promise) {
      pending.catch((error: unknown) => {
        hookLogger.warn(`Observer hook ${hookName} rejected`, { error: String(error) });
      });
    }
  } catch (error) {
    hookLogger.warn(`Observer hook ${hookName} threw`, { error: String(error) });
  }
}

/**
 * Default observer: writes each hook as a log line
 */
export class LoggingTaskObserver implements TaskObserver {
  private readonly logger = Logger.getInstance('TaskObserver');

  onTaskCreated(task: QuoteTask): void {
    this.logger.info('Task created', {
      taskId: task.id,
      contextId: task.contextId,
      event: 'task.created',
    });
  }

  onBackendCall(report: BackendCallReport): void {
    const context = {
      taskId: report.taskId,
      event: 'backend.call',
      attempt: report.attempt,
      latencyMs: report.latencyMs,
      outcome: report.outcome,
    };
    if (report.outcome === 'success') {
      this.logger.debug('Backend call finished', context);
    } else {
      this.logger.warn('Backend call failed', context);
    }
  }

  onTaskTerminal(task: QuoteTask): void {
    this.logger.info(`Task ${task.state}`, {
      taskId: task.id,
      contextId: task.contextId,
      intent: task.intent ? describeIntent(task.intent) : undefined,
      event: 'task.terminal',
      source: task.result?.source,
      errorCode: task.error?.code,
    });
  }
}
