import { v7 as uuidv7 } from 'uuid';

import type { TaskRetentionConfig } from '../../config.js';
import type { Intent } from '../../intent/classifier.js';
import { Logger } from '../../utils/logger.js';

import { UnknownTaskError } from './errors.js';
import { ensureTransition } from './stateMachine.js';
import {
  isTerminalState,
  type InboundMessage,
  type QuoteTask,
  type SubscriptionHandle,
  type TaskChannel,
  type TaskEvent,
  type TaskEventPayload,
  type TransitionRequest,
} from './types.js';

export interface Subscription extends SubscriptionHandle {
  /** Highest sequence number handed to this channel */
  lastSequence: number;
}

interface RegistryEntry {
  task: QuoteTask;
  subscriptions: Map<string, Subscription>;
  events: TaskEvent[];
  nextSequence: number;
}

export interface TaskRegistryOptions {
  now?: () => number;
}

export interface NewTask {
  id: string;
  contextId: string;
  request: InboundMessage;
}

/**
 * In-memory table of live tasks with their subscribers and a bounded replay
 * buffer of recent events.
 *
 * Every method runs to completion without yielding, so a reader can never
 * observe a half-applied transition. Task snapshots are frozen and replaced
 * wholesale on each change.
 */
export class TaskRegistry {
  private readonly entries = new Map<string, RegistryEntry>();
  // Insertion-ordered, oldest evicted first
  private readonly retiredIds = new Set<string>();
  private readonly logger = Logger.getInstance('TaskRegistry');
  private readonly now: () => number;
  private sweepTimer?: NodeJS.Timeout;

  constructor(
    private readonly config: TaskRetentionConfig,
    options: TaskRegistryOptions = {},
  ) {
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  has(taskId: string): boolean {
    return this.entries.has(taskId);
  }

  /**
   * True for live tasks and for swept ones still in the retired-id history
   */
  isKnown(taskId: string): boolean {
    return this.entries.has(taskId) || this.retiredIds.has(taskId);
  }

  /**
   * Registers a task in `submitted` and returns its creation event (sequence 1)
   */
  create(init: NewTask): { task: QuoteTask; event: TaskEvent } {
    if (this.isKnown(init.id)) {
      throw new Error(`Task ${init.id} already exists`);
    }
    const timestamp = this.now();
    const task: QuoteTask = Object.freeze({
      id: init.id,
      contextId: init.contextId,
      state: 'submitted',
      request: Object.freeze({ ...init.request }),
      createdAt: timestamp,
      updatedAt: timestamp,
    });
    const entry: RegistryEntry = {
      task,
      subscriptions: new Map(),
      events: [],
      nextSequence: 1,
    };
    this.entries.set(init.id, entry);
    const event = this.recordEvent(entry, null, timestamp);
    return { task, event };
  }

  get(taskId: string): QuoteTask | undefined {
    return this.entries.get(taskId)?.task;
  }

  require(taskId: string): QuoteTask {
    return this.entryOf(taskId).task;
  }

  /**
   * Records the classification result. Intent is write-once.
   */
  setIntent(taskId: string, intent: Intent): QuoteTask {
    const entry = this.entryOf(taskId);
    if (entry.task.intent) {
      throw new Error(`Task ${taskId} already has an intent`);
    }
    entry.task = Object.freeze({ ...entry.task, intent: Object.freeze({ ...intent }) });
    return entry.task;
  }

  /**
   * The only writer of task state. Validates the transition, swaps the task
   * snapshot, buffers the resulting event and returns it.
   */
  applyTransition(taskId: string, request: TransitionRequest): TaskEvent {
    const entry = this.entryOf(taskId);
    const from = entry.task.state;
    ensureTransition(taskId, from, request.to);

    const timestamp = this.now();
    let payload: TaskEventPayload | undefined;
    const next: { -readonly [K in keyof QuoteTask]: QuoteTask[K] } = {
      ...entry.task,
      state: request.to,
      updatedAt: timestamp,
    };

    if (request.to === 'completed') {
      next.result = Object.freeze({ ...request.result });
      payload = { kind: 'text', text: request.result.text, source: request.result.source };
    } else if (request.to === 'failed') {
      const error = Object.freeze({ ...request.error });
      next.error = error;
      payload = { kind: 'error', error };
    }
    if (isTerminalState(request.to)) {
      next.terminalAt = timestamp;
    }

    entry.task = Object.freeze(next);
    return this.recordEvent(entry, from, timestamp, payload);
  }

  /**
   * Attaches a channel and returns the buffered events it should be replayed,
   * in sequence order.
   */
  attachSubscriber(
    taskId: string,
    channel: TaskChannel,
  ): { subscription: Subscription; replay: TaskEvent[] } {
    const entry = this.entryOf(taskId);
    const subscription: Subscription = {
      id: uuidv7(),
      taskId,
      channel,
      lastSequence: 0,
    };
    entry.subscriptions.set(subscription.id, subscription);
    this.logger.debug('Subscriber attached', {
      taskId,
      channel: channel.name,
      subscribers: entry.subscriptions.size,
    });
    return { subscription, replay: [...entry.events] };
  }

  detachSubscriber(taskId: string, subscriptionId: string): boolean {
    const entry = this.entries.get(taskId);
    if (!entry) {
      return false;
    }
    const removed = entry.subscriptions.delete(subscriptionId);
    if (removed) {
      this.logger.debug('Subscriber detached', {
        taskId,
        subscribers: entry.subscriptions.size,
      });
    }
    return removed;
  }

  subscriptionsOf(taskId: string): Subscription[] {
    const entry = this.entries.get(taskId);
    return entry ? Array.from(entry.subscriptions.values()) : [];
  }

  /**
   * Marks an event as handed to a subscription; false when it was already seen
   */
  recordDelivery(subscription: Subscription, sequenceNumber: number): boolean {
    if (sequenceNumber <= subscription.lastSequence) {
      return false;
    }
    subscription.lastSequence = sequenceNumber;
    return true;
  }

  /**
   * Removes terminal tasks past the grace period that nobody is watching
   */
  sweepExpired(now: number = this.now()): string[] {
    const removed: string[] = [];
    for (const [taskId, entry] of this.entries) {
      const { terminalAt } = entry.task;
      if (
        terminalAt !== undefined &&
        now - terminalAt >= this.config.gracePeriodMs &&
        entry.subscriptions.size === 0
      ) {
        this.entries.delete(taskId);
        this.retire(taskId);
        removed.push(taskId);
      }
    }
    if (removed.length > 0) {
      this.logger.debug(`Swept ${removed.length} expired task(s)`, { remaining: this.entries.size });
    }
    return removed;
  }

  startSweeper(): void {
    if (this.sweepTimer) {
      return;
    }
    this.sweepTimer = setInterval(() => {
      this.sweepExpired();
    }, this.config.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  stopSweeper(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
  }

  private retire(taskId: string): void {
    if (this.config.retiredIdHistory === 0) {
      return;
    }
    this.retiredIds.add(taskId);
    if (this.retiredIds.size > this.config.retiredIdHistory) {
      const oldest = this.retiredIds.values().next();
      if (!oldest.done) {
        this.retiredIds.delete(oldest.value);
      }
    }
  }

  private entryOf(taskId: string): RegistryEntry {
    const entry = this.entries.get(taskId);
    if (!entry) {
      throw new UnknownTaskError(taskId);
    }
    return entry;
  }

  private recordEvent(
    entry: RegistryEntry,
    fromState: TaskEvent['fromState'],
    timestamp: number,
    payload?: TaskEventPayload,
  ): TaskEvent {
    const event: TaskEvent = Object.freeze({
      taskId: entry.task.id,
      contextId: entry.task.contextId,
      sequenceNumber: entry.nextSequence,
      fromState,
      toState: entry.task.state,
      ...(payload ? { payload } : {}),
      timestamp: new Date(timestamp).toISOString(),
    });
    entry.nextSequence += 1;
    entry.events.push(event);
    if (entry.events.length > this.config.eventBufferSize) {
      entry.events.splice(0, entry.events.length - this.config.eventBufferSize);
    }
    return event;
  }
}
