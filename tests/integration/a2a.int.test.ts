import type { Server } from 'http';

import { afterAll, beforeAll, describe, it, expect, vi } from 'vitest';
import { z } from 'zod';

import { createA2AServer, shutdownServer } from '../../src/a2a/server.js';
import { TaskEngine } from '../../src/a2a/tasks/engine.js';
import type { TaskEvent } from '../../src/a2a/tasks/types.js';
import { GenerationAdapter } from '../../src/ai/generation.js';
import { createTestServiceConfig } from '../utils/factories/index.js';
import { waitForTerminal } from '../utils/lifecycle.js';
import { StubCompletionBackend } from '../utils/mocks/completion-backend.mock.js';

const STUB_QUOTE = '"Courage is contagious." - Test';

const TaskResultSchema = z.object({ result: z.object({ id: z.string() }) });

function parseDataLines(body: string): unknown[] {
  return body
    .split('\n')
    .filter((line) => line.startsWith('data: '))
    .map((line): unknown => JSON.parse(line.slice('data: '.length)));
}

describe('A2A server', () => {
  let httpServer: Server;
  let engine: TaskEngine;
  let backend: StubCompletionBackend;
  let baseUrl: string;

  const rpc = (id: number, method: string, params: Record<string, unknown>): Promise<Response> =>
    fetch(`${baseUrl}/a2a`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ jsonrpc: '2.0', id, method, params }),
    });

  const userMessage = (messageId: string, text: string) => ({
    kind: 'message',
    messageId,
    role: 'user',
    parts: [{ kind: 'text', text }],
  });

  beforeAll(async () => {
    const serviceConfig = createTestServiceConfig();
    backend = new StubCompletionBackend(STUB_QUOTE);
    const generator = new GenerationAdapter(backend, serviceConfig.generation);
    engine = new TaskEngine(generator, serviceConfig.tasks);
    httpServer = await createA2AServer({ serviceConfig, engine });

    const address = httpServer.address();
    if (!address || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await shutdownServer(httpServer, engine);
  });

  it('answers the health check', async () => {
    const response = await fetch(`${baseUrl}/health`);

    expect(response.status).toBe(200);
    expect(await response.text()).toBe('ok');
  });

  it.each(['/.well-known/agent-card.json', '/.well-known/agent.json'])(
    'serves the agent card at %s',
    async (path) => {
      const response = await fetch(`${baseUrl}${path}`);
      const card: unknown = await response.json();

      expect(response.status).toBe(200);
      expect(card).toMatchObject({
        name: 'Quote Generator Agent',
        url: `${baseUrl}/a2a`,
        capabilities: { streaming: true },
      });
    },
  );

  it('completes a quote task over message/send', async () => {
    const response = await fetch(`${baseUrl}/a2a`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        jsonrpc: '2.0',
        id: 1,
        method: 'message/send',
        params: {
          message: {
            kind: 'message',
            messageId: 'msg-int-1',
            role: 'user',
            parts: [{ kind: 'text', text: 'Generate a quote about courage' }],
          },
        },
      }),
    });
    const body: unknown = await response.json();

    expect(response.status).toBe(200);
    expect(body).toMatchObject({
      jsonrpc: '2.0',
      id: 1,
      result: {
        kind: 'task',
        status: {
          state: 'completed',
          message: { role: 'agent', parts: [{ kind: 'text', text: STUB_QUOTE }] },
        },
        artifacts: [{ name: 'quote', parts: [{ kind: 'text', text: STUB_QUOTE }] }],
      },
    });
  });

  it('streams the buffered events of a task as server-sent events', async () => {
    const taskId = engine.submit({ role: 'user', text: 'random quote' });
    await waitForTerminal(engine, taskId);

    const response = await fetch(`${baseUrl}/tasks/${taskId}/events`);
    const frames = (await response.text()).split('\n\n').filter((frame) => frame.length > 0);

    expect(response.headers.get('content-type')).toBe('text/event-stream');
    const events = frames.map((frame): TaskEvent => {
      const data = frame.split('\n').find((line) => line.startsWith('data: '));
      return JSON.parse(data?.slice('data: '.length) ?? 'null');
    });
    expect(events.map((event) => event.toState)).toEqual(['submitted', 'working', 'completed']);
    expect(frames[0]?.startsWith('id: 1\nevent: task-event\n')).toBe(true);
  });

  it('answers an empty message with an agent message instead of a JSON-RPC error', async () => {
    const response = await rpc(2, 'message/send', { message: userMessage('msg-int-empty', '') });
    const body: unknown = await response.json();

    expect(response.status).toBe(200);
    expect(body).toMatchObject({
      jsonrpc: '2.0',
      id: 2,
      result: {
        kind: 'message',
        role: 'agent',
        parts: [{ kind: 'text', text: 'Invalid request: Message text must not be empty' }],
        metadata: { error: { code: 'INVALID_REQUEST' } },
      },
    });
    expect(body).not.toHaveProperty('error');
  });

  it('ends a message/stream response with a final completed status update', async () => {
    const response = await rpc(3, 'message/stream', {
      message: userMessage('msg-int-stream', 'Give me a random quote'),
    });
    const frames = parseDataLines(await response.text());

    expect(response.headers.get('content-type')).toContain('text/event-stream');
    expect(frames[0]).toMatchObject({ id: 3, result: { kind: 'task' } });
    expect(frames.at(-1)).toMatchObject({
      jsonrpc: '2.0',
      id: 3,
      result: {
        kind: 'status-update',
        final: true,
        status: { state: 'completed', message: { parts: [{ kind: 'text', text: STUB_QUOTE }] } },
      },
    });
  });

  it('cancels a non-blocking task while the model call is pending', async () => {
    const held = backend.hold();
    const sendResponse = await rpc(4, 'message/send', {
      message: userMessage('msg-int-cancel', 'random quote'),
      configuration: { blocking: false },
    });
    const taskId = TaskResultSchema.parse(await sendResponse.json()).result.id;

    const cancelResponse = await rpc(5, 'tasks/cancel', { id: taskId });
    const cancelBody: unknown = await cancelResponse.json();

    expect(cancelBody).not.toHaveProperty('error');
    expect(cancelBody).toMatchObject({ id: 5, result: { id: taskId } });
    expect(engine.getTask(taskId)?.state).toBe('canceled');
    await vi.waitFor(async () => {
      const getResponse = await rpc(6, 'tasks/get', { id: taskId });
      expect(await getResponse.json()).toMatchObject({
        result: { id: taskId, status: { state: 'canceled' } },
      });
    });

    held.resolve('"Too late." - Test');
    await Promise.resolve();
    expect(engine.getTask(taskId)?.state).toBe('canceled');
  });

  it('delivers the terminal event to a stream attached while the task runs', async () => {
    const held = backend.hold();
    const taskId = engine.submit({ role: 'user', text: 'random quote' });

    const response = await fetch(`${baseUrl}/tasks/${taskId}/events`);
    expect(response.status).toBe(200);
    expect(engine.getTask(taskId)?.state).toBe('working');

    held.resolve('"Live quote." - Test');
    const events = parseDataLines(await response.text());

    expect(events.map((event) => z.object({ toState: z.string() }).parse(event).toState)).toEqual([
      'submitted',
      'working',
      'completed',
    ]);
    expect(events.at(-1)).toMatchObject({ toState: 'completed', payload: { text: '"Live quote." - Test' } });
  });

  it('responds 404 for the event stream of an unknown task', async () => {
    const response = await fetch(`${baseUrl}/tasks/missing/events`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: 'Task missing not found' });
  });
});
