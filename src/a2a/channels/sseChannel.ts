import { isTerminalState, type TaskChannel, type TaskEvent } from '../tasks/types.js';

/**
 * The part of an HTTP response a server-sent event stream writes to
 */
export interface SseSink {
  write(chunk: string): boolean;
  end(): void;
  readonly writableEnded: boolean;
  readonly destroyed: boolean;
}

export const SSE_HEADERS = {
  'Content-Type': 'text/event-stream',
  'Cache-Control': 'no-cache',
  Connection: 'keep-alive',
} as const;

export function formatSseFrame(event: TaskEvent): string {
  return `id: ${event.sequenceNumber}\nevent: task-event\ndata: ${JSON.stringify(event)}\n\n`;
}

/**
 * Streams engine events to one HTTP client as server-sent events and ends the
 * response after the terminal event.
 */
export class ServerSentEventsChannel implements TaskChannel {
  readonly name = 'server-sent-events';

  constructor(private readonly sink: SseSink) {}

  get closed(): boolean {
    return this.sink.writableEnded || this.sink.destroyed;
  }

  send(event: TaskEvent): void {
    this.sink.write(formatSseFrame(event));
    if (isTerminalState(event.toState)) {
      this.sink.end();
    }
  }
}
