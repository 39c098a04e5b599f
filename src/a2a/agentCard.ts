import type { AgentCard, AgentSkill } from '@a2a-js/sdk';

import type { ServiceConfig } from '../config.js';

export const GENERATE_QUOTE_SKILL: AgentSkill = {
  id: 'generate_quote',
  name: 'Generate Quote',
  description: 'Generate an inspirational quote on a given topic or theme',
  tags: ['quotes', 'inspiration', 'motivation', 'wisdom'],
  examples: [
    'Generate a quote about success',
    'Give me an inspirational quote about perseverance',
    'Create a motivational quote about teamwork',
  ],
};

export const RANDOM_QUOTE_SKILL: AgentSkill = {
  id: 'random_quote',
  name: 'Random Quote',
  description: 'Generate a completely random inspirational quote on any topic',
  tags: ['quotes', 'inspiration', 'motivation', 'random', 'surprise'],
  examples: ['Give me a random quote', 'Surprise me with a quote', 'Random inspirational quote'],
};

/**
 * Resolves the public base URL of the agent, falling back to host and port
 */
export function resolveBaseUrl(server: ServiceConfig['server']): string {
  if (server.baseUrl) {
    return server.baseUrl.replace(/\/$/, '');
  }
  const host = server.host === '0.0.0.0' ? 'localhost' : server.host;
  return `http://${host}:${server.port}`;
}

export function normalizePath(path: string): string {
  let normalized = path.trim();
  if (!normalized.startsWith('/')) {
    normalized = `/${normalized}`;
  }
  normalized = normalized.replace(/\/{2,}/g, '/');
  if (normalized.length > 1 && normalized.endsWith('/')) {
    normalized = normalized.slice(0, -1);
  }
  return normalized;
}

export function buildAgentCard(config: Pick<ServiceConfig, 'server' | 'a2a'>, baseUrl?: string): AgentCard {
  const origin = baseUrl ?? resolveBaseUrl(config.server);
  const path = normalizePath(config.a2a.path);
  return {
    protocolVersion: '0.3.0',
    name: 'Quote Generator Agent',
    description: 'Generates inspirational quotes on any topic, or at random, using a language model',
    url: path === '/' ? origin : `${origin}${path}`,
    version: '1.0.0',
    capabilities: {
      streaming: true,
      pushNotifications: false,
      stateTransitionHistory: false,
    },
    defaultInputModes: ['text'],
    defaultOutputModes: ['text'],
    skills: [GENERATE_QUOTE_SKILL, RANDOM_QUOTE_SKILL],
  };
}
