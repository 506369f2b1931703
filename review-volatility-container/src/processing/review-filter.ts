/**
 * Review Filter
 *
 * Fetch-side thrift filter applied to raw records before normalization.
 * Reviews carrying a `critical` keyword survive the length and generic
 * 5-star rules; reviews without a rating are always kept.
 */

import type { Settings } from '../config';
import type { FilterReport, RawReview } from '../types';
import { extractRating, extractText } from './normalizer';
import { KeywordTaxonomy } from './taxonomy';
import { countWords } from './whale-classifier';

export type FilterPolicy = Settings['filters'];

export interface FilterResult {
  reviews: RawReview[];
  report: FilterReport;
}

export class ReviewFilter {
  private policy: FilterPolicy;
  private criticalKeywords: readonly string[];

  constructor(policy: FilterPolicy, taxonomy: KeywordTaxonomy) {
    this.policy = policy;
    this.criticalKeywords = taxonomy.keywordsOf('critical');
  }

  filter(rawReviews: RawReview[]): FilterResult {
    const { minStarRating, minReviewLengthWords, dropGeneric5Star } = this.policy;
    const report: FilterReport = {
      kept: 0,
      droppedLowRating: 0,
      droppedTooShort: 0,
      droppedGeneric5Star: 0,
    };
    const kept: RawReview[] = [];

    for (const raw of rawReviews) {
      const rating = extractRating(raw);
      if (rating === null) {
        kept.push(raw);
        continue;
      }

      if (rating < minStarRating) {
        report.droppedLowRating++;
        continue;
      }

      const text = extractText(raw);
      const hasCritical = this.hasCriticalKeyword(text);

      if (countWords(text) < minReviewLengthWords && !hasCritical) {
        report.droppedTooShort++;
        continue;
      }

      // A 5-only filter wants every 5-star review, generic or not
      const dropsGeneric = dropGeneric5Star && minStarRating >= 4 && minStarRating !== 5;
      if (rating === 5 && dropsGeneric && !hasCritical) {
        report.droppedGeneric5Star++;
        continue;
      }

      kept.push(raw);
    }

    report.kept = kept.length;
    const dropped = rawReviews.length - kept.length;
    console.log(
      `Filtered reviews: ${kept.length} kept, ${dropped} dropped ` +
        `(min_rating=${minStarRating}, drop_5star=${dropGeneric5Star})`
    );

    return { reviews: kept, report };
  }

  private hasCriticalKeyword(text: string): boolean {
    const lowerText = text.toLowerCase();
    return this.criticalKeywords.some((keyword) => lowerText.includes(keyword));
  }
}
