import { Logger } from '../../utils/logger.js';

import { DeliveryError } from './errors.js';
import type { Subscription, TaskRegistry } from './registry.js';
import {
  isTerminalState,
  type SubscriptionHandle,
  type TaskChannel,
  type TaskEvent,
} from './types.js';

/**
 * Delivers task events to every channel attached to the task, whatever
 * transport the channel belongs to.
 *
 * A channel that throws, rejects or reports itself closed is detached; the
 * other subscribers of the task keep receiving events. Subscriptions are also
 * released after the terminal event has been handed over.
 */
export class EventMultiplexer {
  private readonly logger = Logger.getInstance('EventMultiplexer');
  // Events published from inside a channel's send wait here until the current delivery ends
  private readonly queue: TaskEvent[] = [];
  private delivering = false;

  constructor(private readonly registry: TaskRegistry) {}

  /**
   * Attaches a channel and replays the task's buffered events to it before returning
   */
  subscribe(taskId: string, channel: TaskChannel): SubscriptionHandle {
    const { subscription, replay } = this.registry.attachSubscriber(taskId, channel);
    this.exclusive(() => {
      for (const event of replay) {
        if (!this.deliver(subscription, event)) {
          break;
        }
      }
    });
    return { id: subscription.id, taskId: subscription.taskId, channel: subscription.channel };
  }

  unsubscribe(handle: SubscriptionHandle): boolean {
    return this.registry.detachSubscriber(handle.taskId, handle.id);
  }

  /**
   * Delivers an event to every subscriber. Called re-entrantly, the event is
   * queued so every subscriber sees the same order.
   */
  publish(event: TaskEvent): void {
    this.queue.push(event);
    if (this.delivering) {
      return;
    }
    this.exclusive(() => undefined);
  }

  /**
   * Runs a delivery, then drains whatever was published meanwhile
   */
  private exclusive(delivery: () => void): void {
    if (this.delivering) {
      delivery();
      return;
    }
    this.delivering = true;
    try {
      delivery();
      let next = this.queue.shift();
      while (next) {
        this.fanOut(next);
        next = this.queue.shift();
      }
    } finally {
      this.delivering = false;
    }
  }

  private fanOut(event: TaskEvent): void {
    const subscriptions = this.registry.subscriptionsOf(event.taskId);
    this.logger.debug('Publishing event', {
      taskId: event.taskId,
      event: `${event.fromState ?? 'none'}->${event.toState}`,
      sequenceNumber: event.sequenceNumber,
      subscribers: subscriptions.length,
    });
    for (const subscription of subscriptions) {
      this.deliver(subscription, event);
    }
  }

  /**
   * Returns false once the subscription is no longer attached
   */
  private deliver(subscription: Subscription, event: TaskEvent): boolean {
    const { channel } = subscription;
    if (channel.closed) {
      this.drop(subscription, new DeliveryError(event.taskId, channelName(channel)));
      return false;
    }
    if (!this.registry.recordDelivery(subscription, event.sequenceNumber)) {
      return true;
    }

    try {
      const pending = channel.send(event);
      if (pending instanceof Promise) {
        pending.catch((error: unknown) => {
          this.drop(
            subscription,
            new DeliveryError(event.taskId, channelName(channel), { cause: error }),
          );
        });
      }
    } catch (error) {
      this.drop(subscription, new DeliveryError(event.taskId, channelName(channel), { cause: error }));
      return false;
    }

    // Nothing follows a terminal event, so the subscription is released
    if (isTerminalState(event.toState)) {
      this.registry.detachSubscriber(subscription.taskId, subscription.id);
      return false;
    }
    return true;
  }

  private drop(subscription: Subscription, error: DeliveryError): void {
    this.registry.detachSubscriber(subscription.taskId, subscription.id);
    this.logger.warn(error.message, {
      taskId: subscription.taskId,
      event: 'delivery.failed',
      subscriptionId: subscription.id,
      cause: error.cause instanceof Error ? error.cause.message : undefined,
    });
  }
}

function channelName(channel: TaskChannel): string {
  return channel.name ?? 'anonymous channel';
}
