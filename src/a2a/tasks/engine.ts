import { v7 as uuidv7 } from 'uuid';
import { z } from 'zod';

import type { TaskRetentionConfig } from '../../config.js';
import type { GenerationAdapter } from '../../ai/generation.js';
import { classify, describeIntent, type Intent } from '../../intent/classifier.js';
import { notify, type TaskObserver } from '../../observability/hooks.js';
import { Logger } from '../../utils/logger.js';

import { BackendError, InvalidRequestError, getErrorMessage } from './errors.js';
import { EventMultiplexer } from './multiplexer.js';
import { TaskRegistry } from './registry.js';
import {
  isTerminalState,
  type InboundMessage,
  type QuoteTask,
  type SubscriptionHandle,
  type TaskChannel,
  type TaskError,
  type TaskResult,
  type TransitionRequest,
} from './types.js';

export const InboundMessageSchema = z.object({
  role: z.enum(['user', 'agent']),
  text: z.string().refine((text) => text.trim().length > 0, {
    message: 'Message text must not be empty',
  }),
  messageId: z.string().min(1).optional(),
});

export interface SubmitOptions {
  /** Id chosen by the transport binding; generated when absent */
  taskId?: string;
  contextId?: string;
}

export interface TaskEngineOptions {
  registry?: TaskRegistry;
  observer?: TaskObserver;
}

/**
 * Drives each quote task from intake to a terminal state and publishes every
 * transition through the multiplexer.
 */
export class TaskEngine {
  readonly registry: TaskRegistry;
  private readonly multiplexer: EventMultiplexer;
  private readonly observer?: TaskObserver;
  private readonly activeTasks = new Map<string, AbortController>();
  private readonly logger = Logger.getInstance('TaskEngine');

  constructor(
    private readonly generator: Pick<GenerationAdapter, 'generate'>,
    retention: TaskRetentionConfig,
    options: TaskEngineOptions = {},
  ) {
    this.registry = options.registry ?? new TaskRegistry(retention);
    this.multiplexer = new EventMultiplexer(this.registry);
    this.observer = options.observer;
  }

  start(): void {
    this.registry.startSweeper();
  }

  /**
   * Stops the sweeper and aborts in-flight backend calls
   */
  stop(): void {
    this.registry.stopSweeper();
    for (const controller of this.activeTasks.values()) {
      controller.abort(new Error('Task engine stopped'));
    }
    this.activeTasks.clear();
  }

  /**
   * Accepts a message and returns the new task id. The task is already
   * `working` when this returns; the backend call starts on a later microtask,
   * so no terminal event can reach a subscriber before the caller has the id.
   */
  submit(message: unknown, options: SubmitOptions = {}): string {
    const parsed = InboundMessageSchema.safeParse(message);
    if (!parsed.success) {
      throw new InvalidRequestError(
        parsed.error.issues.map((issue) => issue.message).join('; '),
        parsed.error.issues,
      );
    }

    const taskId = options.taskId || uuidv7();
    if (this.registry.isKnown(taskId)) {
      throw new InvalidRequestError(`Task ${taskId} already exists`);
    }

    const request: InboundMessage = {
      role: parsed.data.role,
      text: parsed.data.text,
      messageId: parsed.data.messageId ?? uuidv7(),
    };
    const { task, event: created } = this.registry.create({
      id: taskId,
      contextId: options.contextId || uuidv7(),
      request,
    });
    notify(this.observer?.onTaskCreated?.bind(this.observer), task, 'onTaskCreated');
    this.multiplexer.publish(created);
    this.transition(taskId, { to: 'working' });

    const intent = classify(request.text);
    this.registry.setIntent(taskId, intent);
    this.logger.info('Task accepted', {
      taskId,
      contextId: task.contextId,
      intent: describeIntent(intent),
    });

    const controller = new AbortController();
    this.activeTasks.set(taskId, controller);
    queueMicrotask(() => {
      this.run(taskId, intent, controller.signal)
        .catch((error: unknown) => {
          this.logger.error('Task run failed unexpectedly', error, { taskId });
          this.finish(taskId, {
            to: 'failed',
            error: { code: 'INTERNAL_ERROR', message: getErrorMessage(error) },
          });
        })
        .finally(() => {
          this.activeTasks.delete(taskId);
        });
    });

    return taskId;
  }

  /**
   * Attaches a channel; it first receives the task's buffered events
   */
  subscribe(taskId: string, channel: TaskChannel): SubscriptionHandle {
    return this.multiplexer.subscribe(taskId, channel);
  }

  unsubscribe(handle: SubscriptionHandle): boolean {
    return this.multiplexer.unsubscribe(handle);
  }

  /**
   * Cooperative cancel: flips the state and signals the in-flight call, whose
   * result is then discarded. False when the task already finished.
   */
  cancel(taskId: string): boolean {
    const task = this.registry.require(taskId);
    if (isTerminalState(task.state)) {
      return false;
    }
    this.activeTasks.get(taskId)?.abort(new Error(`Task ${taskId} canceled`));
    this.activeTasks.delete(taskId);
    return this.finish(taskId, { to: 'canceled' });
  }

  getTask(taskId: string): QuoteTask | undefined {
    return this.registry.get(taskId);
  }

  private async run(taskId: string, intent: Intent, signal: AbortSignal): Promise<void> {
    let result: TaskResult;
    try {
      result = await this.generator.generate(intent, { taskId, signal });
    } catch (error) {
      if (signal.aborted) {
        this.logger.debug('Discarding outcome of canceled task', { taskId });
        return;
      }
      this.finish(taskId, { to: 'failed', error: toTaskError(error) });
      return;
    }

    if (signal.aborted) {
      this.logger.debug('Discarding result of canceled task', { taskId });
      return;
    }
    this.finish(taskId, { to: 'completed', result });
  }

  /**
   * Applies a terminal transition unless the task already reached one
   */
  private finish(taskId: string, request: TransitionRequest): boolean {
    const current = this.registry.get(taskId);
    if (!current || isTerminalState(current.state)) {
      return false;
    }
    this.transition(taskId, request);
    const task = this.registry.require(taskId);
    notify(this.observer?.onTaskTerminal?.bind(this.observer), task, 'onTaskTerminal');
    return true;
  }

  private transition(taskId: string, request: TransitionRequest): void {
    const event = this.registry.applyTransition(taskId, request);
    this.multiplexer.publish(event);
  }
}

function toTaskError(error: unknown): TaskError {
  if (error instanceof BackendError) {
    return { code: error.code, kind: error.kind, message: error.message };
  }
  return { code: 'INTERNAL_ERROR', message: getErrorMessage(error) };
}
