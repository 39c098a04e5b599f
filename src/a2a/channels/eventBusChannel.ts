import type {
  Message,
  Task,
  TaskArtifactUpdateEvent,
  TaskStatusUpdateEvent,
} from '@a2a-js/sdk';
import type { ExecutionEventBus } from '@a2a-js/sdk/server';
import { v7 as uuidv7 } from 'uuid';

import { isTerminalState, type TaskChannel, type TaskEvent } from '../tasks/types.js';

/**
 * Bridges engine events onto an A2A execution event bus: the creation event
 * becomes a `task`, later events become `status-update`s, and a completed quote
 * is also published as an artifact. The bus is finished after the terminal event.
 */
export class ExecutionEventBusChannel implements TaskChannel {
  readonly name = 'a2a-event-bus';
  readonly done: Promise<TaskEvent>;
  private readonly resolveDone: (event: TaskEvent) => void;
  private finished = false;

  constructor(
    private readonly eventBus: ExecutionEventBus,
    private readonly userMessage?: Message,
  ) {
    let resolveDone: (event: TaskEvent) => void = () => undefined;
    this.done = new Promise<TaskEvent>((resolve) => {
      resolveDone = resolve;
    });
    this.resolveDone = resolveDone;
  }

  get closed(): boolean {
    return this.finished;
  }

  send(event: TaskEvent): void {
    if (event.fromState === null) {
      this.eventBus.publish(this.toTask(event));
      return;
    }

    const final = isTerminalState(event.toState);
    if (event.toState === 'completed' && event.payload?.kind === 'text') {
      this.eventBus.publish(this.toArtifactUpdate(event, event.payload.text, event.payload.source));
    }
    this.eventBus.publish(this.toStatusUpdate(event, final));

    if (final) {
      this.finished = true;
      this.eventBus.finished();
      this.resolveDone(event);
    }
  }

  private toTask(event: TaskEvent): Task {
    return {
      kind: 'task',
      id: event.taskId,
      contextId: event.contextId,
      status: {
        state: event.toState,
        timestamp: event.timestamp,
      },
      ...(this.userMessage ? { history: [this.userMessage] } : {}),
    };
  }

  private toStatusUpdate(event: TaskEvent, final: boolean): TaskStatusUpdateEvent {
    const text = statusText(event);
    return {
      kind: 'status-update',
      taskId: event.taskId,
      contextId: event.contextId,
      status: {
        state: event.toState,
        timestamp: event.timestamp,
        ...(text !== undefined ? { message: this.agentMessage(event, text) } : {}),
      },
      final,
      metadata: { sequenceNumber: event.sequenceNumber },
    };
  }

  private toArtifactUpdate(
    event: TaskEvent,
    text: string,
    source: string,
  ): TaskArtifactUpdateEvent {
    return {
      kind: 'artifact-update',
      taskId: event.taskId,
      contextId: event.contextId,
      artifact: {
        artifactId: `quote-${event.taskId}`,
        name: 'quote',
        parts: [{ kind: 'text', text }],
        metadata: { source },
      },
      lastChunk: true,
    };
  }

  private agentMessage(event: TaskEvent, text: string): Message {
    return {
      kind: 'message',
      messageId: uuidv7(),
      role: 'agent',
      taskId: event.taskId,
      contextId: event.contextId,
      parts: [{ kind: 'text', text }],
    };
  }
}

function statusText(event: TaskEvent): string | undefined {
  if (event.payload?.kind === 'text') {
    return event.payload.text;
  }
  if (event.payload?.kind === 'error') {
    return `Sorry, I couldn't generate a quote: ${event.payload.error.message}`;
  }
  return undefined;
}
