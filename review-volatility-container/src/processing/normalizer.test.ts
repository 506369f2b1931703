import { beforeEach, describe, it, expect, vi } from 'vitest';
import { ReviewNormalizer, extractDate, extractRating } from './normalizer';
import { FIXED_NOW, fixedClock } from '../testing/fixtures';

describe('ReviewNormalizer', () => {
  const normalizer = new ReviewNormalizer({ daysBack: 90, clock: fixedClock });

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  it('accepts alternate field names', () => {
    const { reviews } = normalizer.normalize([
      {
        reviewId: 'abc',
        title: 'Title',
        reviewText: 'Body',
        score: '4',
        reviewDate: '2026-02-20T00:00:00Z',
        appVersion: '2.1',
        source: 'appstore',
      },
    ]);

    expect(reviews).toEqual([
      {
        id: 'abc',
        text: 'Title Body',
        rating: 4,
        date: new Date('2026-02-20T00:00:00Z'),
        version: '2.1',
        source: 'appstore',
      },
    ]);
  });

  it('defaults a missing rating to 3 and a missing date to now, and counts both', () => {
    const { reviews, report } = normalizer.normalize([{ text: 'No rating, no date' }]);

    expect(reviews[0].rating).toBe(3);
    expect(reviews[0].date.toISOString()).toBe(FIXED_NOW.toISOString());
    expect(reviews[0].id).toBe('review-1');
    expect(reviews[0].source).toBe('unknown');
    expect(reviews[0].version).toBeNull();
    expect(report.defaultedRating).toBe(1);
    expect(report.defaultedDate).toBe(1);
    expect(report.kept).toBe(1);
  });

  it('drops unparseable dates and reviews outside the window, counting each', () => {
    const { reviews, report } = normalizer.normalize([
      { id: 'bad', text: 'x', rating: 2, date: 'not a date' },
      { id: 'old', text: 'x', rating: 2, date: '2025-11-01T00:00:00Z' },
      { id: 'ok', text: 'x', rating: 2, date: '2026-01-15T00:00:00Z' },
    ]);

    expect(reviews.map((review) => review.id)).toEqual(['ok']);
    expect(report).toEqual({
      received: 3,
      kept: 1,
      defaultedRating: 0,
      defaultedDate: 0,
      emptyText: 0,
      droppedInvalidDate: 1,
      droppedOutsideWindow: 1,
      droppedFutureDate: 0,
    });
  });

  it('drops reviews dated after the clock', () => {
    const { reviews, report } = normalizer.normalize([
      { id: 'now', text: 'x', rating: 2, date: FIXED_NOW.toISOString() },
      { id: 'tomorrow', text: 'x', rating: 2, date: '2026-03-03T12:00:00Z' },
    ]);

    expect(reviews.map((review) => review.id)).toEqual(['now']);
    expect(report.droppedFutureDate).toBe(1);
    expect(report.kept).toBe(1);
  });

  it('keeps empty text but counts it', () => {
    const { reviews, report } = normalizer.normalize([{ rating: 1, date: '2026-02-01T00:00:00Z' }]);
    expect(reviews[0].text).toBe('');
    expect(report.emptyText).toBe(1);
  });

  it('numbers generated ids by input position', () => {
    const { reviews } = normalizer.normalize([
      { id: 'first', text: 'a' },
      { text: 'b' },
    ]);
    expect(reviews.map((review) => review.id)).toEqual(['first', 'review-2']);
  });
});

describe('extractRating', () => {
  it('clips and truncates to 1-5', () => {
    expect(extractRating({ rating: 7 })).toBe(5);
    expect(extractRating({ rating: 0 })).toBe(1);
    expect(extractRating({ stars: 2.9 })).toBe(2);
    expect(extractRating({ starRating: '5' })).toBe(5);
  });

  it('returns null without a usable rating', () => {
    expect(extractRating({ rating: 'five' })).toBeNull();
    expect(extractRating({})).toBeNull();
  });
});

describe('extractDate', () => {
  it('reads unix seconds and milliseconds', () => {
    expect(extractDate({ createdAt: 1772000000 })).toEqual(new Date('2026-02-25T06:13:20.000Z'));
    expect(extractDate({ createdAt: 1772000000000 })).toEqual(new Date('2026-02-25T06:13:20.000Z'));
  });

  it('distinguishes a missing date from an invalid one', () => {
    expect(extractDate({})).toBeNull();
    expect(extractDate({ date: 'yesterday-ish' })).toBe('invalid');
  });
});
