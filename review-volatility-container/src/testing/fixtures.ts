/**
 * Shared test fixtures. Dates are UTC; FIXED_NOW is Monday 2026-03-02 (ISO week 2026-W10).
 */

import { AnalysisEngine } from '../analysis/engine';
import { defaultSettings } from '../config';
import type { Settings, TaxonomyConfig } from '../config';
import { KeywordTaxonomy } from '../processing/taxonomy';
import { WhaleClassifier } from '../processing/whale-classifier';
import type { AppAnalysis, RawReview, Review, ReviewMatch } from '../types';

export const FIXED_NOW = new Date('2026-03-02T12:00:00.000Z');
export const fixedClock = (): Date => new Date(FIXED_NOW.getTime());

/** Monday 2026-01-05 (ISO week 2026-W02) plus `offset` weeks, at the given UTC hour. */
export function weekDate(offset: number, hour = 12): Date {
  return new Date(Date.UTC(2026, 0, 5 + offset * 7, hour));
}

export const TEST_TAXONOMY: TaxonomyConfig = {
  categories: {
    critical: { keywords: ['crash', 'broken'], weight: 1 },
    performance: { keywords: ['slow'], weight: 0.8 },
    privacy: { keywords: ['tracking'], weight: 0.9 },
    ai_quality: { keywords: ['hallucinat'], weight: 0.7 },
    scam_financial: { keywords: ['charged', 'refund'], weight: 1 },
    subscription: { keywords: ['subscription', 'paywall'], weight: 0.8 },
    broken_promise: { keywords: ['misleading'], weight: 0.7 },
    ads: { keywords: ['too many ads'], weight: 0.5 },
    usability: { keywords: ['confusing'], weight: 0.4 },
    competitor_mention: { keywords: ['switched to'], weight: 0.3 },
    generic_pain: { keywords: ['annoying'], weight: 0.3 },
  },
};

export function testTaxonomy(): KeywordTaxonomy {
  return KeywordTaxonomy.fromConfig(TEST_TAXONOMY);
}

export function testSettings(): Settings {
  return defaultSettings();
}

export function testWhales(): WhaleClassifier {
  return new WhaleClassifier(testSettings().whale);
}

let sequence = 0;

export function makeReview(overrides: Partial<Review> = {}): Review {
  sequence++;
  return {
    id: `r-${sequence}`,
    text: 'Plain review text',
    rating: 3,
    date: weekDate(0),
    version: null,
    source: 'test',
    ...overrides,
  };
}

export function makeMatch(overrides: Partial<ReviewMatch> = {}, review: Partial<Review> = {}): ReviewMatch {
  return {
    review: makeReview(review),
    categories: [],
    hasPain: false,
    isWhale: false,
    painWeight: 0,
    dominantPillar: null,
    ...overrides,
  };
}

/** `total` matches in one week, the first `pain` of them pain-bearing with weight 1. */
export function weekOfMatches(offset: number, total: number, pain: number, review: Partial<Review> = {}): ReviewMatch[] {
  return Array.from({ length: total }, (_, i) =>
    i < pain
      ? makeMatch({ hasPain: true, painWeight: 1, categories: ['critical'], dominantPillar: 'Functional' }, { date: weekDate(offset), ...review })
      : makeMatch({}, { date: weekDate(offset) })
  );
}

/** Four reviews across ISO weeks 2026-W08 and W09: two crashes, one double charge, one happy user. */
export const SAMPLE_BATCH: RawReview[] = [
  { id: 'a', text: 'Crash on launch every time', rating: 1, date: '2026-02-23T10:00:00Z', version: '3.1' },
  { id: 'b', text: 'Charged twice, want a refund', rating: 1, date: '2026-02-24T10:00:00Z', version: '3.1' },
  { id: 'c', text: 'Lovely calm design overall', rating: 5, date: '2026-02-16T10:00:00Z' },
  { id: 'd', text: 'Switched to Opal after the crash', rating: 2, date: '2026-02-17T10:00:00Z', version: '3.0' },
];

export function testEngine(): AnalysisEngine {
  return new AnalysisEngine(testTaxonomy(), testSettings(), { clock: fixedClock });
}

/** SAMPLE_BATCH analyzed as Forest at $1 with Opal as competitor (risk 100, leakage $300). */
export function sampleAnalysis(): AppAnalysis {
  return testEngine().analyze(SAMPLE_BATCH, { name: 'Forest', price: 1, competitors: ['Opal'] });
}

/** Analysis of an app without reviews (risk 0, Low). */
export function emptyAnalysis(name: string): AppAnalysis {
  return testEngine().analyze([], { name });
}
