import {
  APICallError,
  InvalidPromptError,
  LoadAPIKeyError,
  NoSuchModelError,
  generateText,
  type LanguageModel,
} from 'ai';

import type { ServiceConfig } from '../config.js';
import { BackendError, getErrorMessage } from '../a2a/tasks/errors.js';
import { Logger } from '../utils/logger.js';

import type { QuotePrompt } from './prompts.js';
import {
  createProviderSelector,
  getAvailableProviders,
  DEFAULT_MODELS,
  type ProviderSelector,
} from './providers/index.js';

export interface CompletionOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * The single external call the generation adapter depends on
 */
export interface CompletionBackend {
  complete(prompt: QuotePrompt, options: CompletionOptions): Promise<string>;
}

const PERMANENT_STATUS_CODES = new Set([400, 401, 403, 404, 422]);

/**
 * Maps whatever the AI SDK or the network threw into a transient or permanent BackendError
 */
export function classifyBackendError(error: unknown): BackendError {
  if (error instanceof BackendError) {
    return error;
  }

  if (APICallError.isInstance(error)) {
    const status = error.statusCode;
    const permanent =
      (status !== undefined && PERMANENT_STATUS_CODES.has(status)) || !error.isRetryable;
    return new BackendError(
      permanent ? 'permanent' : 'transient',
      `Model API call failed${status !== undefined ? ` with status ${status}` : ''}: ${error.message}`,
      { cause: error },
    );
  }

  if (
    LoadAPIKeyError.isInstance(error) ||
    InvalidPromptError.isInstance(error) ||
    NoSuchModelError.isInstance(error)
  ) {
    return new BackendError('permanent', error.message, { cause: error });
  }

  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return new BackendError('transient', `Model call aborted: ${error.message}`, { cause: error });
  }

  // fetch failures, socket resets and anything unrecognised are worth another attempt
  return new BackendError('transient', getErrorMessage(error), { cause: error });
}

export interface AIServiceOptions {
  /** Pre-built selector, mainly for tests */
  providerSelector?: ProviderSelector;
}

/**
 * Completion backend on top of the Vercel AI SDK. Retries are owned by the
 * generation adapter, so the SDK's own retry loop is disabled.
 */
export class AIService implements CompletionBackend {
  private readonly logger = Logger.getInstance('AIService');
  private readonly model?: LanguageModel;
  readonly provider: ServiceConfig['ai']['provider'];
  readonly modelName: string;

  constructor(config: ServiceConfig['ai'], options: AIServiceOptions = {}) {
    const selector =
      options.providerSelector ??
      createProviderSelector({
        openaiApiKey: config.openaiApiKey,
        openRouterApiKey: config.openRouterApiKey,
        xaiApiKey: config.xaiApiKey,
      });

    this.logger.debug(`Available AI providers: ${getAvailableProviders(selector).join(', ')}`);

    this.provider = config.provider;
    this.modelName = config.model ?? DEFAULT_MODELS[config.provider];

    const providerFn = selector[config.provider];
    if (providerFn) {
      this.model = providerFn(this.modelName);
    } else {
      // Every call fails permanently; the adapter decides between fallback and failure
      this.logger.error(`${unavailableMessage(config.provider)} Model calls will fail.`);
    }
  }

  get available(): boolean {
    return this.model !== undefined;
  }

  async complete(prompt: QuotePrompt, options: CompletionOptions): Promise<string> {
    if (!this.model) {
      throw new BackendError('permanent', unavailableMessage(this.provider));
    }

    const timeout = AbortSignal.timeout(options.timeoutMs);
    const abortSignal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

    try {
      const result = await generateText({
        model: this.model,
        system: prompt.system,
        prompt: prompt.user,
        temperature: prompt.temperature,
        maxOutputTokens: prompt.maxOutputTokens,
        maxRetries: 0,
        abortSignal,
      });

      this.logger.debug('Completion received', {
        provider: this.provider,
        model: this.modelName,
        totalTokens: result.usage.totalTokens,
      });
      return result.text.trim();
    } catch (error) {
      throw classifyBackendError(error);
    }
  }
}

function unavailableMessage(provider: ServiceConfig['ai']['provider']): string {
  return (
    `Provider "${provider}" not configured. ` +
    `Ensure ${provider.toUpperCase()}_API_KEY is configured in environment.`
  );
}
