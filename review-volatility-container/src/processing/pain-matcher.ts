/**
 * Pain Matcher
 *
 * Case-insensitive keyword matching of every review against every taxonomy
 * category. A review counts as pain-bearing when it matches any category,
 * whatever its star rating ("5 stars but it crashes" is still pain).
 */

import type { PainMatrix, Pillar, Review, ReviewMatch } from '../types';
import { PILLARS } from '../types';
import { KeywordTaxonomy } from './taxonomy';
import { WhaleClassifier } from './whale-classifier';

export class PainMatcher {
  private taxonomy: KeywordTaxonomy;
  private whales: WhaleClassifier;

  constructor(taxonomy: KeywordTaxonomy, whales: WhaleClassifier) {
    this.taxonomy = taxonomy;
    this.whales = whales;
  }

  match(reviews: Review[]): PainMatrix {
    const categories = this.taxonomy.list();
    const categoryCounts: Record<string, number> = {};
    for (const category of categories) {
      categoryCounts[category.name] = 0;
    }

    const matches = reviews.map((review) => {
      const lowerText = review.text.toLowerCase();
      const matched = categories
        .filter((category) => category.keywords.some((keyword) => lowerText.includes(keyword)))
        .map((category) => category.name);

      for (const name of matched) {
        categoryCounts[name] = (categoryCounts[name] ?? 0) + 1;
      }

      const hasPain = matched.length > 0;
      const isWhale = this.whales.isWhale(review.text);

      const result: ReviewMatch = {
        review,
        categories: matched,
        hasPain,
        isWhale,
        painWeight: this.whales.painWeight(hasPain, isWhale),
        dominantPillar: this.dominantPillar(matched),
      };
      return result;
    });

    return { matches, categoryCounts };
  }

  /**
   * Pillar with the largest summed weight of matched categories.
   * Ties resolve in pillar order: Functional, Economic, Experience.
   */
  dominantPillar(categoryNames: string[]): Pillar | null {
    if (categoryNames.length === 0) {
      return null;
    }

    const totals = new Map<Pillar, number>();
    for (const name of categoryNames) {
      const pillar = this.taxonomy.pillarOf(name);
      totals.set(pillar, (totals.get(pillar) ?? 0) + this.taxonomy.weightOf(name));
    }

    let best: Pillar | null = null;
    let bestTotal = -1;
    for (const pillar of PILLARS) {
      const total = totals.get(pillar);
      if (total !== undefined && total > bestTotal) {
        best = pillar;
        bestTotal = total;
      }
    }
    return best;
  }
}
