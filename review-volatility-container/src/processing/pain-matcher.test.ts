import { describe, it, expect } from 'vitest';
import { PainMatcher } from './pain-matcher';
import { makeReview, testTaxonomy, testWhales } from '../testing/fixtures';

const matcher = new PainMatcher(testTaxonomy(), testWhales());

describe('PainMatcher', () => {
  it('treats a keyword hit as pain regardless of star rating', () => {
    const { matches } = matcher.match([makeReview({ text: '5 stars but the app CRASHED, loved it before', rating: 5 })]);

    expect(matches[0].categories).toEqual(['critical']);
    expect(matches[0].hasPain).toBe(true);
    expect(matches[0].painWeight).toBe(1);
    expect(matches[0].dominantPillar).toBe('Functional');
  });

  it('leaves reviews without keywords pain-free', () => {
    const { matches } = matcher.match([makeReview({ text: 'Calm and lovely', rating: 1 })]);

    expect(matches[0].categories).toEqual([]);
    expect(matches[0].hasPain).toBe(false);
    expect(matches[0].painWeight).toBe(0);
    expect(matches[0].dominantPillar).toBeNull();
  });

  it('counts matching reviews per category', () => {
    const { categoryCounts } = matcher.match([
      makeReview({ text: 'crash after crash' }),
      makeReview({ text: 'Broken and slow' }),
      makeReview({ text: 'Charged me twice' }),
    ]);

    expect(categoryCounts.critical).toBe(2);
    expect(categoryCounts.performance).toBe(1);
    expect(categoryCounts.scam_financial).toBe(1);
    expect(categoryCounts.usability).toBe(0);
  });

  it('weights whale pain reviews by the multiplier', () => {
    const { matches } = matcher.match([makeReview({ text: 'Export is broken since the update' })]);
    expect(matches[0].isWhale).toBe(true);
    expect(matches[0].painWeight).toBe(3);
  });

  it('picks the pillar with the largest matched weight', () => {
    // scam_financial 1.0 (Economic) beats performance 0.8 (Functional)
    const { matches } = matcher.match([makeReview({ text: 'Charged twice and it is slow' })]);
    expect(matches[0].dominantPillar).toBe('Economic');
  });

  it('resolves pillar ties toward Functional', () => {
    expect(matcher.dominantPillar(['scam_financial', 'critical'])).toBe('Functional');
    expect(matcher.dominantPillar(['usability', 'competitor_mention', 'ads'])).toBe('Experience');
  });
});
