/**
 * Review Source contract shared by the Apify and file-backed sources
 */

import type { RawReview } from '../types';

export interface ReviewRequest {
  appName: string;
  appUrl: string;
  maxReviews: number;
}

export interface ReviewSource {
  readonly name: string;
  fetchReviews(request: ReviewRequest): Promise<RawReview[]>;
}
