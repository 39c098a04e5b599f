import type { Message, Part } from '@a2a-js/sdk';
import type { AgentExecutor, ExecutionEventBus, RequestContext } from '@a2a-js/sdk/server';
import { v7 as uuidv7 } from 'uuid';

import { Logger } from '../utils/logger.js';

import { ExecutionEventBusChannel } from './channels/eventBusChannel.js';
import type { TaskEngine } from './tasks/engine.js';
import { InvalidRequestError, UnknownTaskError } from './tasks/errors.js';

/**
 * Creates the A2A executor that hands every inbound message to the task engine
 */
export function createAgentExecutor(engine: TaskEngine): AgentExecutor {
  return new QuoteAgentExecutor(engine);
}

/**
 * Extracts the concatenated text parts of an A2A message
 */
export function extractMessageText(message: Message): string {
  return message.parts
    .filter((part: Part): part is Extract<Part, { kind: 'text' }> => part.kind === 'text')
    .map((part) => part.text)
    .join('\n');
}

/**
 * A2A binding of the task engine. The SDK's request handler owns the JSON-RPC
 * and SSE transports; this class only submits and bridges events onto the bus.
 */
class QuoteAgentExecutor implements AgentExecutor {
  private readonly logger = Logger.getInstance('AgentExecutor');

  constructor(private readonly engine: TaskEngine) {}

  async execute(requestContext: RequestContext, eventBus: ExecutionEventBus): Promise<void> {
    const { userMessage, taskId, contextId } = requestContext;

    if (requestContext.task) {
      const state = requestContext.task.status.state;
      this.logger.warn('Follow-up message refused', { taskId, contextId, state });
      this.reject(
        eventBus,
        contextId,
        `Task ${taskId} is in state ${state} and does not accept follow-up messages.`,
        { code: 'INVALID_REQUEST', taskId, state },
      );
      return;
    }

    let submittedId: string;
    try {
      submittedId = this.engine.submit(
        {
          role: userMessage.role,
          text: extractMessageText(userMessage),
          messageId: userMessage.messageId,
        },
        { taskId, contextId },
      );
    } catch (error) {
      if (error instanceof InvalidRequestError) {
        this.logger.warn('Message rejected', { taskId, contextId, reason: error.message });
        this.reject(eventBus, contextId, `Invalid request: ${error.message}`, {
          code: error.code,
          issues: error.issues.map((issue) => ({ path: issue.path, message: issue.message })),
        });
        return;
      }
      throw error;
    }

    const channel = new ExecutionEventBusChannel(eventBus, userMessage);
    this.engine.subscribe(submittedId, channel);

    const terminal = await channel.done;
    this.logger.debug('Execution finished', {
      taskId: submittedId,
      contextId,
      state: terminal.toState,
    });
  }

  /**
   * Answers with a plain agent message and no task, then closes the bus
   */
  private reject(
    eventBus: ExecutionEventBus,
    contextId: string,
    text: string,
    metadata: Record<string, unknown>,
  ): void {
    const reply: Message = {
      kind: 'message',
      messageId: uuidv7(),
      role: 'agent',
      contextId,
      parts: [{ kind: 'text', text }],
      metadata: { error: metadata },
    };
    eventBus.publish(reply);
    eventBus.finished();
  }

  cancelTask(taskId: string, _eventBus: ExecutionEventBus): Promise<void> {
    try {
      const canceled = this.engine.cancel(taskId);
      this.logger.info(canceled ? 'Task canceled' : 'Cancel ignored for finished task', { taskId });
    } catch (error) {
      if (!(error instanceof UnknownTaskError)) {
        throw error;
      }
      this.logger.warn('Cancel requested for unknown task', { taskId });
    }
    return Promise.resolve();
  }
}
