/**
 * Whale Classifier
 *
 * Flags information-dense ("whale") reviews: long ones, or ones written with
 * domain vocabulary. One instance is created per run and shared by every
 * stage that weights reviews, so the predicate is never re-derived.
 */

import type { Settings } from '../config';

export type WhalePolicy = Settings['whale'];

export class WhaleClassifier {
  private readonly wordThreshold: number;
  private readonly multiplier: number;
  private readonly vocabulary: readonly string[];

  constructor(policy: WhalePolicy) {
    this.wordThreshold = policy.wordThreshold;
    this.multiplier = policy.multiplier;
    this.vocabulary = Object.freeze(policy.domainVocab.map((term) => term.toLowerCase()));
  }

  isWhale(text: string): boolean {
    if (!text) {
      return false;
    }
    if (countWords(text) > this.wordThreshold) {
      return true;
    }
    const lowerText = text.toLowerCase();
    return this.vocabulary.some((term) => lowerText.includes(term));
  }

  /**
   * Contribution of one review to weighted pain counts
   */
  painWeight(hasPain: boolean, isWhale: boolean): number {
    if (!hasPain) {
      return 0;
    }
    return isWhale ? this.multiplier : 1;
  }

  /**
   * Weight of a review regardless of pain, used for churn counting
   */
  reviewWeight(isWhale: boolean): number {
    return isWhale ? this.multiplier : 1;
  }
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}
