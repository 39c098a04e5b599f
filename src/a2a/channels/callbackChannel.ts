import type { TaskChannel, TaskEvent } from '../tasks/types.js';

export type PushCallback = (event: TaskEvent) => void | Promise<void>;

/**
 * Channel around a plain push callback, for in-process consumers and
 * transports that already own their connection handling.
 */
export function createCallbackChannel(name: string, callback: PushCallback): TaskChannel {
  return {
    name,
    send: (event) => callback(event),
  };
}
