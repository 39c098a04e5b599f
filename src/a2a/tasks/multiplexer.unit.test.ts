import { describe, it, expect } from 'vitest';

import { BrokenChannel, RecordingChannel } from '../../../tests/utils/mocks/recording-channel.js';

import { EventMultiplexer } from './multiplexer.js';
import { TaskRegistry } from './registry.js';
import type { TaskChannel, TaskEvent } from './types.js';

const request = { role: 'user' as const, text: 'random quote', messageId: 'msg-1' };

function setup(): { registry: TaskRegistry; multiplexer: EventMultiplexer } {
  const registry = new TaskRegistry({
    gracePeriodMs: 0,
    sweepIntervalMs: 1_000,
    eventBufferSize: 16,
    retiredIdHistory: 100,
  });
  registry.create({ id: 'task-1', contextId: 'ctx-1', request });
  return { registry, multiplexer: new EventMultiplexer(registry) };
}

function advance(registry: TaskRegistry, multiplexer: EventMultiplexer, to: 'working' | 'canceled'): TaskEvent {
  const event = registry.applyTransition('task-1', { to });
  multiplexer.publish(event);
  return event;
}

describe('EventMultiplexer', () => {
  it('replays buffered events on subscribe', () => {
    const { registry, multiplexer } = setup();
    registry.applyTransition('task-1', { to: 'working' });
    const channel = new RecordingChannel();

    multiplexer.subscribe('task-1', channel);

    expect(channel.states).toEqual(['submitted', 'working']);
  });

  it('delivers each event to every subscriber in order', () => {
    const { registry, multiplexer } = setup();
    const first = new RecordingChannel('first');
    const second = new RecordingChannel('second');
    multiplexer.subscribe('task-1', first);
    multiplexer.subscribe('task-1', second);

    advance(registry, multiplexer, 'working');
    advance(registry, multiplexer, 'canceled');

    expect(first.sequenceNumbers).toEqual([1, 2, 3]);
    expect(second.sequenceNumbers).toEqual([1, 2, 3]);
  });

  it('keeps the order for everyone when a subscriber publishes from send', () => {
    const { registry, multiplexer } = setup();
    const first = new RecordingChannel('first');
    const cancelling: TaskChannel = {
      name: 'cancelling',
      send: (event) => {
        first.send(event);
        if (event.toState === 'input-required') {
          multiplexer.publish(registry.applyTransition('task-1', { to: 'canceled' }));
        }
      },
    };
    const second = new RecordingChannel('second');
    multiplexer.subscribe('task-1', cancelling);
    multiplexer.subscribe('task-1', second);

    advance(registry, multiplexer, 'working');
    multiplexer.publish(registry.applyTransition('task-1', { to: 'input-required' }));

    expect(first.sequenceNumbers).toEqual([1, 2, 3, 4]);
    expect(second.sequenceNumbers).toEqual([1, 2, 3, 4]);
    expect(second.states).toEqual(['submitted', 'working', 'input-required', 'canceled']);
  });

  it('delivers events published during a replay after the replay', () => {
    const { registry, multiplexer } = setup();
    const received: number[] = [];
    const channel: TaskChannel = {
      name: 'reacting',
      send: (event) => {
        received.push(event.sequenceNumber);
        if (event.toState === 'submitted') {
          multiplexer.publish(registry.applyTransition('task-1', { to: 'working' }));
        }
      },
    };

    multiplexer.subscribe('task-1', channel);

    expect(received).toEqual([1, 2]);
  });

  it('does not deliver an event twice to the same subscriber', () => {
    const { registry, multiplexer } = setup();
    const channel = new RecordingChannel();
    multiplexer.subscribe('task-1', channel);
    const event = registry.applyTransition('task-1', { to: 'working' });

    multiplexer.publish(event);
    multiplexer.publish(event);

    expect(channel.sequenceNumbers).toEqual([1, 2]);
  });

  it('drops a throwing channel and keeps serving the others', () => {
    const { registry, multiplexer } = setup();
    const broken = new BrokenChannel();
    const healthy = new RecordingChannel();
    multiplexer.subscribe('task-1', broken);
    multiplexer.subscribe('task-1', healthy);

    advance(registry, multiplexer, 'working');
    advance(registry, multiplexer, 'canceled');

    expect(broken.attempts).toBe(1);
    expect(healthy.states).toEqual(['submitted', 'working', 'canceled']);
  });

  it('drops a channel whose send rejects', async () => {
    const { registry, multiplexer } = setup();
    let calls = 0;
    const rejecting: TaskChannel = {
      name: 'rejecting',
      send: () => {
        calls += 1;
        return Promise.reject(new Error('stream reset'));
      },
    };
    multiplexer.subscribe('task-1', rejecting);
    await Promise.resolve();

    expect(registry.subscriptionsOf('task-1')).toHaveLength(0);
    advance(registry, multiplexer, 'working');
    expect(calls).toBe(1);
  });

  it('drops channels that report themselves closed', () => {
    const { registry, multiplexer } = setup();
    const channel = new RecordingChannel();
    multiplexer.subscribe('task-1', channel);
    channel.closed = true;

    advance(registry, multiplexer, 'working');

    expect(channel.states).toEqual(['submitted']);
    expect(registry.subscriptionsOf('task-1')).toHaveLength(0);
  });

  it('releases subscriptions after the terminal event', () => {
    const { registry, multiplexer } = setup();
    multiplexer.subscribe('task-1', new RecordingChannel());

    advance(registry, multiplexer, 'canceled');

    expect(registry.subscriptionsOf('task-1')).toHaveLength(0);
  });

  it('hands a late subscriber the full history of a finished task', () => {
    const { registry, multiplexer } = setup();
    advance(registry, multiplexer, 'working');
    advance(registry, multiplexer, 'canceled');
    const late = new RecordingChannel();

    multiplexer.subscribe('task-1', late);

    expect(late.states).toEqual(['submitted', 'working', 'canceled']);
    expect(registry.subscriptionsOf('task-1')).toHaveLength(0);
  });

  it('stops delivering after unsubscribe', () => {
    const { registry, multiplexer } = setup();
    const channel = new RecordingChannel();
    const handle = multiplexer.subscribe('task-1', channel);

    expect(multiplexer.unsubscribe(handle)).toBe(true);
    advance(registry, multiplexer, 'working');

    expect(channel.states).toEqual(['submitted']);
  });
});
