/**
 * Review Normalizer
 *
 * Coerces heterogeneous scraper output into the canonical Review shape.
 * Alternate field names are accepted, missing values get safe defaults, and
 * every coercion or drop is counted in a NormalizationReport.
 */

import type { NormalizationReport, RawReview, Review } from '../types';
import { windowStart } from './dates';

const TEXT_FIELDS = ['text', 'reviewText', 'content', 'body', 'comment'];
const RATING_FIELDS = ['rating', 'score', 'stars', 'starRating'];
const DATE_FIELDS = ['date', 'reviewDate', 'createdAt', 'updatedAt'];
const VERSION_FIELDS = ['version', 'appVersion', 'reviewedVersion'];
const ID_FIELDS = ['id', 'reviewId'];

export const DEFAULT_RATING = 3;

export interface NormalizerOptions {
  daysBack: number;
  clock?: () => Date;
}

export interface NormalizationResult {
  reviews: Review[];
  report: NormalizationReport;
}

export class ReviewNormalizer {
  private readonly daysBack: number;
  private readonly clock: () => Date;

  constructor(options: NormalizerOptions) {
    this.daysBack = options.daysBack;
    this.clock = options.clock ?? (() => new Date());
  }

  normalize(rawReviews: RawReview[]): NormalizationResult {
    const now = this.clock();
    const cutoff = windowStart(now, this.daysBack).getTime();
    const report: NormalizationReport = {
      received: rawReviews.length,
      kept: 0,
      defaultedRating: 0,
      defaultedDate: 0,
      emptyText: 0,
      droppedInvalidDate: 0,
      droppedOutsideWindow: 0,
      droppedFutureDate: 0,
    };
    const reviews: Review[] = [];

    rawReviews.forEach((raw, index) => {
      const text = extractText(raw);
      if (!text) {
        report.emptyText++;
      }

      const rating = extractRating(raw);
      if (rating === null) {
        report.defaultedRating++;
      }

      const date = extractDate(raw);
      if (date === 'invalid') {
        report.droppedInvalidDate++;
        return;
      }
      if (date === null) {
        report.defaultedDate++;
      }
      const reviewDate = date ?? now;
      if (reviewDate.getTime() < cutoff) {
        report.droppedOutsideWindow++;
        return;
      }
      if (reviewDate.getTime() > now.getTime()) {
        report.droppedFutureDate++;
        return;
      }

      reviews.push({
        id: firstString(raw, ID_FIELDS) ?? `review-${index + 1}`,
        text,
        rating: rating ?? DEFAULT_RATING,
        date: reviewDate,
        version: extractVersion(raw),
        source: firstString(raw, ['source']) ?? 'unknown',
      });
    });

    report.kept = reviews.length;
    if (report.kept < report.received) {
      console.log(
        `Normalized ${report.kept}/${report.received} reviews ` +
          `(invalid date: ${report.droppedInvalidDate}, outside ${this.daysBack}d: ${report.droppedOutsideWindow}, future: ${report.droppedFutureDate})`
      );
    }

    return { reviews, report };
  }
}

function firstString(raw: RawReview, fields: string[]): string | null {
  for (const field of fields) {
    const value = raw[field];
    if (typeof value === 'string' && value.trim()) {
      return value.trim();
    }
    if (typeof value === 'number' && Number.isFinite(value)) {
      return String(value);
    }
  }
  return null;
}

export function extractText(raw: RawReview): string {
  const body = firstString(raw, TEXT_FIELDS) ?? '';
  const title = firstString(raw, ['title']) ?? '';
  return [title, body].filter(Boolean).join(' ');
}

/**
 * Rating clipped to 1-5, or null when no usable rating exists
 */
export function extractRating(raw: RawReview): number | null {
  for (const field of RATING_FIELDS) {
    const value = raw[field];
    const numeric = typeof value === 'string' && value.trim() ? Number(value) : value;
    if (typeof numeric === 'number' && Number.isFinite(numeric)) {
      return Math.min(5, Math.max(1, Math.trunc(numeric)));
    }
  }
  return null;
}

/**
 * Parsed date, null when no date field exists, 'invalid' when one exists but cannot be parsed
 */
export function extractDate(raw: RawReview): Date | null | 'invalid' {
  let sawField = false;

  for (const field of DATE_FIELDS) {
    const value = raw[field];
    if (value === undefined || value === null || value === '') {
      continue;
    }
    sawField = true;

    let parsed: Date | null = null;
    if (value instanceof Date) {
      parsed = value;
    } else if (typeof value === 'number') {
      // Unix seconds vs milliseconds
      parsed = new Date(value < 1e12 ? value * 1000 : value);
    } else if (typeof value === 'string') {
      parsed = new Date(value);
    }

    if (parsed && !Number.isNaN(parsed.getTime())) {
      return parsed;
    }
  }

  return sawField ? 'invalid' : null;
}

function extractVersion(raw: RawReview): string | null {
  return firstString(raw, VERSION_FIELDS);
}
