/**
 * Provider Selector Exports
 */

export {
  createProviderSelector,
  getAvailableProviders,
  DEFAULT_MODELS,
  type ProviderSelector,
  type ProviderSelectorConfig,
} from './provider-selector.js';
