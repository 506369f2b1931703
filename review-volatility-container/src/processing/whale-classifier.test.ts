import { describe, it, expect } from 'vitest';
import { WhaleClassifier, countWords } from './whale-classifier';
import { testSettings } from '../testing/fixtures';

const whales = new WhaleClassifier(testSettings().whale);

function words(n: number): string {
  return Array.from({ length: n }, () => 'word').join(' ');
}

describe('WhaleClassifier', () => {
  it('flags reviews longer than 40 words', () => {
    expect(whales.isWhale(words(41))).toBe(true);
    expect(whales.isWhale(words(40))).toBe(false);
  });

  it('flags domain vocabulary regardless of case', () => {
    expect(whales.isWhale('Sync failed again')).toBe(true);
    expect(whales.isWhale('Terrible LATENCY on every tap')).toBe(true);
    expect(whales.isWhale('Frame rate drops to nothing')).toBe(true);
  });

  it('does not flag short plain reviews', () => {
    expect(whales.isWhale('Short and fine')).toBe(false);
    expect(whales.isWhale('')).toBe(false);
  });

  it('weights pain 0, 1 or 3', () => {
    expect(whales.painWeight(false, true)).toBe(0);
    expect(whales.painWeight(true, false)).toBe(1);
    expect(whales.painWeight(true, true)).toBe(3);
  });

  it('weights any review by whale status', () => {
    expect(whales.reviewWeight(true)).toBe(3);
    expect(whales.reviewWeight(false)).toBe(1);
  });

  it('honors a configured threshold and multiplier', () => {
    const strict = new WhaleClassifier({ wordThreshold: 3, multiplier: 5, domainVocab: [] });
    expect(strict.isWhale('one two three four')).toBe(true);
    expect(strict.isWhale('sync sync')).toBe(false);
    expect(strict.painWeight(true, true)).toBe(5);
  });
});

describe('countWords', () => {
  it('splits on runs of whitespace', () => {
    expect(countWords('  a  b\tc \n')).toBe(3);
    expect(countWords('   ')).toBe(0);
  });
});
