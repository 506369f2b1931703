/**
 * File Review Source
 *
 * Reads reviews saved by an earlier run. Accepts either a bare JSON array or
 * an object with a `reviews` array.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { ReviewSourceError, errorMessage } from '../errors';
import type { RawReview } from '../types';
import type { ReviewRequest, ReviewSource } from './review-source';

const reviewsSchema = z.array(z.record(z.string(), z.unknown()));
const fileSchema = z.union([reviewsSchema, z.object({ reviews: reviewsSchema })]);

export class FileReviewSource implements ReviewSource {
  readonly name = 'file';
  private filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async fetchReviews(request: ReviewRequest): Promise<RawReview[]> {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(this.filePath, 'utf-8'));
    } catch (error) {
      throw new ReviewSourceError(this.filePath, 1, errorMessage(error));
    }

    const parsed = fileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ReviewSourceError(this.filePath, 1, 'expected an array of reviews or { "reviews": [...] }');
    }

    const reviews = Array.isArray(parsed.data) ? parsed.data : parsed.data.reviews;
    console.log(`📂 Loaded ${reviews.length} reviews for ${request.appName} from ${this.filePath}`);
    return reviews.slice(0, request.maxReviews);
  }
}
