import { beforeEach, describe, it, expect, vi } from 'vitest';
import { ReviewFilter } from './review-filter';
import { testSettings, testTaxonomy } from '../testing/fixtures';
import type { FilterPolicy } from './review-filter';

function filterWith(overrides: Partial<FilterPolicy>): ReviewFilter {
  return new ReviewFilter({ ...testSettings().filters, ...overrides }, testTaxonomy());
}

describe('ReviewFilter', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  it('drops ratings below the minimum', () => {
    const { reviews, report } = filterWith({ minStarRating: 3 }).filter([
      { id: 'low', text: 'Not for me at all', rating: 2 },
      { id: 'mid', text: 'Fine for what it is', rating: 3 },
    ]);

    expect(reviews.map((r) => r.id)).toEqual(['mid']);
    expect(report.droppedLowRating).toBe(1);
  });

  it('drops short reviews unless they carry a critical keyword', () => {
    const { reviews, report } = filterWith({ minReviewLengthWords: 3 }).filter([
      { id: 'short', text: 'ok', rating: 4 },
      { id: 'crash', text: 'crash', rating: 1 },
    ]);

    expect(reviews.map((r) => r.id)).toEqual(['crash']);
    expect(report.droppedTooShort).toBe(1);
  });

  it('drops generic 5-star reviews when filtering for high ratings', () => {
    const { reviews, report } = filterWith({ minStarRating: 4, dropGeneric5Star: true }).filter([
      { id: 'generic', text: 'Love this app so much', rating: 5 },
      { id: 'critical', text: 'Great but it crashed once', rating: 5 },
      { id: 'four', text: 'Pretty good overall honestly', rating: 4 },
    ]);

    expect(reviews.map((r) => r.id)).toEqual(['critical', 'four']);
    expect(report.droppedGeneric5Star).toBe(1);
  });

  it('keeps every 5-star review when only 5-star reviews are wanted', () => {
    const { reviews } = filterWith({ minStarRating: 5, dropGeneric5Star: true }).filter([
      { id: 'generic', text: 'Love this app so much', rating: 5 },
    ]);
    expect(reviews).toHaveLength(1);
  });

  it('keeps reviews that have no rating', () => {
    const { reviews, report } = filterWith({ minStarRating: 5 }).filter([{ id: 'unrated', text: 'x' }]);
    expect(reviews).toHaveLength(1);
    expect(report.kept).toBe(1);
  });
});
