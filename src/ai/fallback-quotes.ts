import { createHash } from 'node:crypto';

import type { Intent } from '../intent/classifier.js';

/**
 * Offline quotes served when the model backend is unavailable
 */
export const DEFAULT_FALLBACK_QUOTES: readonly string[] = [
  '"Courage is not the absence of doubt, but the decision to walk forward with it." - Anonymous',
  '"Small steps taken daily outlast the giant leap never made." - Anonymous',
  '"Growth begins where comfort quietly ends." - Anonymous',
  '"Patience is the soil in which every lasting thing takes root." - Anonymous',
  '"Kindness costs nothing and still returns more than it gives." - Anonymous',
  '"The path clears for those who keep walking." - Anonymous',
  '"Wisdom is knowing which battles deserve your peace." - Anonymous',
  '"Every setback carries the outline of a comeback." - Anonymous',
  '"Hope is the light you carry for the next person in the dark." - Anonymous',
  '"What you practice in silence, you will perform in storms." - Anonymous',
];

export class FallbackQuoteSet {
  private cursor = 0;

  constructor(private readonly quotes: readonly string[] = DEFAULT_FALLBACK_QUOTES) {}

  get size(): number {
    return this.quotes.length;
  }

  /**
   * Topic requests hash to a fixed quote; random requests rotate through the set.
   */
  pick(intent: Intent): string | undefined {
    if (this.quotes.length === 0) {
      return undefined;
    }
    if (intent.kind === 'random') {
      const quote = this.quotes[this.cursor % this.quotes.length];
      this.cursor = (this.cursor + 1) % this.quotes.length;
      return quote;
    }
    return this.quotes[topicIndex(intent.topic, this.quotes.length)];
  }
}

export function topicIndex(topic: string, size: number): number {
  const digest = createHash('sha256').update(topic.trim().toLowerCase()).digest();
  return digest.readUInt32BE(0) % size;
}
