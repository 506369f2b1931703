import { describe, it, expect } from 'vitest';
import { detectBrokenUpdate, selectEvidence, topPainCategories } from './signals';
import { makeMatch, testTaxonomy } from '../testing/fixtures';

const taxonomy = testTaxonomy();

describe('detectBrokenUpdate', () => {
  it('flags a version holding more than the share of pain reviews', () => {
    const matches = [
      makeMatch({ hasPain: true }, { version: '3.1' }),
      makeMatch({ hasPain: true }, { version: '3.1' }),
      makeMatch({ hasPain: true }, { version: '3.0' }),
      makeMatch({ hasPain: true }, { version: null }),
      makeMatch({ hasPain: false }, { version: '3.0' }),
    ];
    expect(detectBrokenUpdate(matches, 0.3)).toEqual({ brokenUpdateDetected: true, suspectedVersion: '3.1' });
  });

  it('stays quiet when pain is spread across versions', () => {
    const matches = ['1.0', '1.1', '1.2', '1.3'].map((version) => makeMatch({ hasPain: true }, { version }));
    expect(detectBrokenUpdate(matches, 0.3)).toEqual({ brokenUpdateDetected: false, suspectedVersion: null });
  });

  it('stays quiet without versions', () => {
    expect(detectBrokenUpdate([makeMatch({ hasPain: true })], 0.3).brokenUpdateDetected).toBe(false);
  });
});

describe('topPainCategories', () => {
  it('orders categories by count times weight', () => {
    const top = topPainCategories({ critical: 1, scam_financial: 3, usability: 5, ads: 0 }, taxonomy);
    expect(top).toEqual([
      { category: 'scam_financial', pillar: 'Economic', count: 3, weight: 1 },
      { category: 'usability', pillar: 'Experience', count: 5, weight: 0.4 },
      { category: 'critical', pillar: 'Functional', count: 1, weight: 1 },
    ]);
  });

  it('keeps at most five', () => {
    const counts = { critical: 6, performance: 5, privacy: 4, scam_financial: 3, subscription: 2, ads: 1 };
    expect(topPainCategories(counts, taxonomy).map((c) => c.category)).toEqual([
      'critical',
      'performance',
      'privacy',
      'scam_financial',
      'subscription',
    ]);
  });
});

describe('selectEvidence', () => {
  it('ranks whales first, then matched weight, then length', () => {
    const matches = [
      makeMatch({ hasPain: true, categories: ['usability'] }, { text: 'Confusing menus everywhere' }),
      makeMatch({ hasPain: true, categories: ['critical', 'scam_financial'] }, { text: 'Crash, then charged' }),
      makeMatch({ hasPain: true, isWhale: true, categories: ['usability'] }, { text: 'The sync screen is confusing' }),
      makeMatch({ hasPain: true, categories: ['usability'] }, { text: 'Confusing' }),
      makeMatch({ hasPain: false }, { text: 'Lovely' }),
    ];

    expect(selectEvidence(matches, taxonomy, 3).map((item) => item.text)).toEqual([
      'The sync screen is confusing',
      'Crash, then charged',
      'Confusing menus everywhere',
    ]);
  });

  it('truncates excerpts to 200 characters', () => {
    const text = 'slow '.repeat(60);
    const [item] = selectEvidence([makeMatch({ hasPain: true, categories: ['performance'] }, { text })], taxonomy, 5);
    expect(item.text).toHaveLength(200);
  });
});
