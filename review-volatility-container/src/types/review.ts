/**
 * Review Types
 *
 * Shapes of review records as they arrive from a review source and after
 * normalization into the canonical form the analysis engine works on.
 */

/**
 * A review record as delivered by a review source. Field names vary between
 * scrapers (`rating` / `score` / `stars`, `date` / `reviewDate` / `createdAt`),
 * so nothing is assumed about its shape.
 */
export type RawReview = Record<string, unknown>;

export interface Review {
  id: string;
  /** Title and body joined with a space when both exist. */
  text: string;
  rating: number; // 1 - 5
  date: Date;
  version: string | null;
  source: string;
}

export interface NormalizationReport {
  received: number;
  kept: number;
  defaultedRating: number;
  defaultedDate: number;
  emptyText: number;
  droppedInvalidDate: number;
  droppedOutsideWindow: number;
  /** Dated after the analysis clock. */
  droppedFutureDate: number;
}

export interface FilterReport {
  kept: number;
  droppedLowRating: number;
  droppedTooShort: number;
  droppedGeneric5Star: number;
}
