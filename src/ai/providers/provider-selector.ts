/**
 * Provider Selector
 * Builds model factories for every provider that has an API key configured
 */

import type { LanguageModel } from 'ai';
import { createOpenAI } from '@ai-sdk/openai';
import { createOpenRouter } from '@openrouter/ai-sdk-provider';
import { createXai } from '@ai-sdk/xai';

import { AI_PROVIDERS, type AIProviderName } from '../../config.js';

// ============================================================================
// Types
// ============================================================================

export interface ProviderSelectorConfig {
  openaiApiKey?: string;
  openRouterApiKey?: string;
  xaiApiKey?: string;
}

export type ProviderSelector = Partial<Record<AIProviderName, (model?: string) => LanguageModel>>;

// ============================================================================
// Default Models
// ============================================================================

export const DEFAULT_MODELS: Record<AIProviderName, string> = {
  openai: 'gpt-4o-mini',
  openrouter: 'openai/gpt-4o-mini',
  xai: 'grok-3-mini',
};

// ============================================================================
// Provider Selector
// ============================================================================

/**
 * Creates a provider selector with initialized providers based on available API keys
 *
 * @example
 * ```typescript
 * const selector = createProviderSelector({ openaiApiKey: config.ai.openaiApiKey });
 * const model = selector.openai?.('gpt-4o-mini');
 * ```
 */
export function createProviderSelector(config: ProviderSelectorConfig): ProviderSelector {
  const selector: ProviderSelector = {};

  if (config.openaiApiKey) {
    const openai = createOpenAI({ apiKey: config.openaiApiKey });
    selector.openai = (model?: string) => openai.chat(model || DEFAULT_MODELS.openai);
  }

  if (config.openRouterApiKey) {
    const openRouter = createOpenRouter({ apiKey: config.openRouterApiKey });
    selector.openrouter = (model?: string) => openRouter(model || DEFAULT_MODELS.openrouter);
  }

  if (config.xaiApiKey) {
    const xai = createXai({ apiKey: config.xaiApiKey });
    selector.xai = (model?: string) => xai(model || DEFAULT_MODELS.xai);
  }

  return selector;
}

/**
 * Lists the providers a selector can serve
 */
export function getAvailableProviders(selector: ProviderSelector): AIProviderName[] {
  return AI_PROVIDERS.filter((name) => selector[name] !== undefined);
}
