/**
 * Central export for all review sources
 */

export * from './review-source';
export * from './apify-review-source';
export * from './file-review-source';

import type { RuntimeConfig } from '../config';
import { ApifyReviewSource } from './apify-review-source';
import type { ReviewSource } from './review-source';

/**
 * Factory function to create the live review source
 */
export function createReviewSource(config: RuntimeConfig, country: string): ReviewSource {
  return new ApifyReviewSource(config.apify, { country });
}
