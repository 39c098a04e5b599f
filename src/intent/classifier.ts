/**
 * Intent classification for inbound quote requests.
 *
 * This is a keyword heuristic, not a parser. It never fails: text that matches
 * no trigger and no connector becomes a topic request for the whole message.
 */

export type Intent = { kind: 'random' } | { kind: 'topic'; topic: string };

export const RANDOM_TRIGGERS: readonly string[] = ['random', 'surprise me', 'any quote', 'any topic'];

const TOPIC_CONNECTOR = /\b(about|regarding|on)\b/i;
const TRAILING_PUNCTUATION = /[\s?.!]+$/;

export function classify(text: string): Intent {
  const normalized = text.toLowerCase();
  if (RANDOM_TRIGGERS.some((trigger) => normalized.includes(trigger))) {
    return { kind: 'random' };
  }
  return { kind: 'topic', topic: extractTopic(text) };
}

function extractTopic(text: string): string {
  const whole = text.trim();
  const match = TOPIC_CONNECTOR.exec(text);
  if (!match) {
    return whole;
  }
  const remainder = text
    .slice(match.index + match[0].length)
    .trim()
    .replace(TRAILING_PUNCTUATION, '');
  return remainder.length > 0 ? remainder : whole;
}

export function describeIntent(intent: Intent): string {
  return intent.kind === 'random' ? 'random' : `topic:${intent.topic}`;
}
