/**
 * Semantic Cluster Extractor
 *
 * Surfaces recurring 2-3 word phrases in low-rated reviews, catching pain
 * points the keyword taxonomy does not know about yet.
 */

import type { NgramCluster, Review } from '../types';
import vocabulary from './stop-words.json';

const TOKEN_PATTERN = /[\p{L}\p{N}]+(?:['’]\p{L}+)?/gu;
const MAX_NEGATIVE_RATING = 2;
const MIN_TEXT_LENGTH = 4;

export interface ClusterOptions {
  appName: string;
  topN: number;
  minPhraseCount: number;
}

export class SemanticClusterExtractor {
  private stopWords: ReadonlySet<string>;
  private genericPhrases: ReadonlySet<string>;
  private topN: number;
  private minPhraseCount: number;

  constructor(options: ClusterOptions) {
    const appTokens = tokenize(options.appName);
    this.stopWords = new Set([...vocabulary.stopWords, ...appTokens]);
    this.genericPhrases = new Set(vocabulary.genericPhrases);
    this.topN = options.topN;
    this.minPhraseCount = options.minPhraseCount;
  }

  /**
   * Top phrases across reviews rated 2 stars or lower
   */
  extract(reviews: Review[]): NgramCluster[] {
    const texts = reviews
      .filter((review) => review.rating <= MAX_NEGATIVE_RATING)
      .map((review) => review.text.trim())
      .filter((text) => text.length >= MIN_TEXT_LENGTH);

    return this.extractFromTexts(texts);
  }

  extractFromTexts(texts: string[]): NgramCluster[] {
    const counts = new Map<string, number>();

    for (const text of texts) {
      const words = tokenize(text).filter((word) => word.length > 1 && !this.stopWords.has(word));
      for (const phrase of ngrams(words, 2, 3)) {
        if (!this.genericPhrases.has(phrase)) {
          counts.set(phrase, (counts.get(phrase) ?? 0) + 1);
        }
      }
    }

    // Array.prototype.sort is stable: ties keep first-seen order
    return Array.from(counts, ([phrase, count]) => ({ phrase, count }))
      .filter((cluster) => cluster.count >= this.minPhraseCount)
      .sort((a, b) => b.count - a.count)
      .slice(0, this.topN);
  }
}

export function tokenize(text: string): string[] {
  return (text.toLowerCase().match(TOKEN_PATTERN) ?? []).map((token) => token.replace('’', "'"));
}

export function ngrams(words: string[], minN: number, maxN: number): string[] {
  const phrases: string[] = [];
  for (let n = minN; n <= maxN; n++) {
    for (let i = 0; i + n <= words.length; i++) {
      phrases.push(words.slice(i, i + n).join(' '));
    }
  }
  return phrases;
}
