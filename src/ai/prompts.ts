import type { Intent } from '../intent/classifier.js';

export interface QuotePrompt {
  system: string;
  user: string;
  temperature: number;
  maxOutputTokens: number;
}

export const SYSTEM_PROMPT =
  'You are a wise quote generator that creates original, inspirational quotes.';

const QUOTE_REQUIREMENTS = [
  '- Meaningful and thought-provoking',
  '- Concise (1-2 sentences maximum)',
  '- Suitable for motivation or reflection',
  '- Original (not a famous existing quote)',
];

const FORMAT_LINE =
  'Format: return only the quote, optionally followed by an attribution like "Quote" - Anonymous';

// C0 and C1 control characters, including newlines and tabs
// eslint-disable-next-line no-control-regex
const CONTROL_CHARACTERS = /[\u0000-\u001f\u007f-\u009f]/g;

/**
 * Strips control characters, collapses whitespace and bounds the length of a topic
 */
export function sanitizeTopic(topic: string, maxLength: number): string {
  const cleaned = topic.replace(CONTROL_CHARACTERS, ' ').replace(/\s+/g, ' ').trim();
  // Length in code points so surrogate pairs are never split
  const codePoints = Array.from(cleaned);
  return codePoints.length > maxLength ? codePoints.slice(0, maxLength).join('').trimEnd() : cleaned;
}

export function buildQuotePrompt(intent: Intent, options: { maxTopicLength: number }): QuotePrompt {
  if (intent.kind === 'random') {
    return {
      system: SYSTEM_PROMPT,
      user: [
        'Generate a single, original inspirational quote on any topic you choose.',
        'The quote should be:',
        ...QUOTE_REQUIREMENTS,
        '- On a randomly chosen topic (success, courage, love, growth, wisdom, etc.)',
        '',
        FORMAT_LINE,
      ].join('\n'),
      temperature: 0.9,
      maxOutputTokens: 150,
    };
  }

  const topic = sanitizeTopic(intent.topic, options.maxTopicLength) || 'general inspiration';
  return {
    system: SYSTEM_PROMPT,
    user: [
      `Generate a single, original inspirational quote about ${topic}.`,
      'The quote should be:',
      ...QUOTE_REQUIREMENTS,
      '',
      FORMAT_LINE,
      '',
      `Topic: ${topic}`,
    ].join('\n'),
    temperature: 0.8,
    maxOutputTokens: 150,
  };
}
