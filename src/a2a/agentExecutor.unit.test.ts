import type { Task } from '@a2a-js/sdk';
import { describe, it, expect } from 'vitest';

import { GenerationAdapter } from '../ai/generation.js';
import {
  createRequestContext,
  createSimpleRequestContext,
  createTestServiceConfig,
  createUserMessage,
} from '../../tests/utils/factories/index.js';
import { StubCompletionBackend } from '../../tests/utils/mocks/completion-backend.mock.js';
import { RecordingEventBus } from '../../tests/utils/mocks/event-bus.mock.js';

import { createAgentExecutor, extractMessageText } from './agentExecutor.js';
import { TaskEngine } from './tasks/engine.js';

function createEngine(backend: StubCompletionBackend): TaskEngine {
  const config = createTestServiceConfig();
  return new TaskEngine(new GenerationAdapter(backend, config.generation), config.tasks);
}

describe('extractMessageText', () => {
  it('joins the text parts and skips the others', () => {
    const message = createUserMessage('ctx-1', '', {
      parts: [
        { kind: 'text', text: 'a quote' },
        { kind: 'data', data: { mood: 'calm' } },
        { kind: 'text', text: 'about calm' },
      ],
    });
    expect(extractMessageText(message)).toBe('a quote\nabout calm');
  });
});

describe('QuoteAgentExecutor', () => {
  it('bridges a completed task onto the event bus', async () => {
    const engine = createEngine(new StubCompletionBackend());
    const executor = createAgentExecutor(engine);
    const bus = new RecordingEventBus();

    await executor.execute(createSimpleRequestContext('Give me a quote about focus', 'task-1', 'ctx-1'), bus);

    expect(bus.kinds).toEqual(['task', 'status-update', 'artifact-update', 'status-update']);
    const statuses = bus.findEventsByKind('status-update');
    expect(statuses.map((update) => update.status.state)).toEqual(['working', 'completed']);
    expect(statuses[1]?.status.message?.parts).toEqual([{ kind: 'text', text: '"Stub quote." - Test' }]);
    expect(bus.finishedCount).toBe(1);
    expect(engine.getTask('task-1')?.intent).toEqual({ kind: 'topic', topic: 'focus' });
  });

  it('answers empty messages with an agent message and creates no task', async () => {
    const engine = createEngine(new StubCompletionBackend());
    const executor = createAgentExecutor(engine);
    const bus = new RecordingEventBus();

    await executor.execute(createSimpleRequestContext('  ', 'task-1', 'ctx-1'), bus);

    expect(bus.kinds).toEqual(['message']);
    const [reply] = bus.findEventsByKind('message');
    expect(reply?.role).toBe('agent');
    expect(reply?.contextId).toBe('ctx-1');
    expect(reply?.parts).toEqual([
      { kind: 'text', text: 'Invalid request: Message text must not be empty' },
    ]);
    expect(reply?.metadata).toMatchObject({ error: { code: 'INVALID_REQUEST' } });
    expect(bus.finishedCount).toBe(1);
    expect(engine.getTask('task-1')).toBeUndefined();
  });

  it('refuses follow-up messages on an existing task', async () => {
    const engine = createEngine(new StubCompletionBackend());
    const executor = createAgentExecutor(engine);
    const bus = new RecordingEventBus();
    const existing: Task = {
      kind: 'task',
      id: 'task-1',
      contextId: 'ctx-1',
      status: { state: 'working' },
    };

    await executor.execute(
      createRequestContext(createUserMessage('ctx-1', 'another one'), 'task-1', 'ctx-1', existing),
      bus,
    );

    const [reply] = bus.findEventsByKind('message');
    expect(reply?.parts).toEqual([
      {
        kind: 'text',
        text: 'Task task-1 is in state working and does not accept follow-up messages.',
      },
    ]);
    expect(bus.finishedCount).toBe(1);
    expect(engine.getTask('task-1')).toBeUndefined();
  });

  it('cancels a running task and finishes the bus', async () => {
    const backend = new StubCompletionBackend();
    backend.hold();
    const engine = createEngine(backend);
    const executor = createAgentExecutor(engine);
    const bus = new RecordingEventBus();

    const execution = executor.execute(createSimpleRequestContext('random quote', 'task-1', 'ctx-1'), bus);
    await executor.cancelTask('task-1', new RecordingEventBus());
    await execution;

    const statuses = bus.findEventsByKind('status-update');
    expect(statuses[statuses.length - 1]?.status.state).toBe('canceled');
    expect(statuses[statuses.length - 1]?.final).toBe(true);
    expect(bus.finishedCount).toBe(1);
  });

  it('ignores cancel requests for unknown tasks', async () => {
    const executor = createAgentExecutor(createEngine(new StubCompletionBackend()));
    await expect(executor.cancelTask('missing', new RecordingEventBus())).resolves.toBeUndefined();
  });
});
