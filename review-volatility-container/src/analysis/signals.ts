/**
 * Secondary signals derived from the pain matrix: broken-update detection,
 * top pain categories and the ranked evidence excerpts.
 */

import { KeywordTaxonomy } from '../processing/taxonomy';
import type { EvidenceItem, ReviewMatch, TopPainCategory } from '../types';

const EXCERPT_LENGTH = 200;
const TOP_CATEGORY_LIMIT = 5;

export interface BrokenUpdateSignal {
  brokenUpdateDetected: boolean;
  suspectedVersion: string | null;
}

/**
 * Flags a version holding more than `share` of all pain reviews
 */
export function detectBrokenUpdate(matches: ReviewMatch[], share: number): BrokenUpdateSignal {
  const pain = matches.filter((match) => match.hasPain);
  const byVersion = new Map<string, number>();
  for (const match of pain) {
    const version = match.review.version;
    if (version) {
      byVersion.set(version, (byVersion.get(version) ?? 0) + 1);
    }
  }

  let topVersion: string | null = null;
  let topCount = 0;
  for (const [version, count] of byVersion) {
    if (count > topCount) {
      topVersion = version;
      topCount = count;
    }
  }

  if (topVersion !== null && topCount > pain.length * share) {
    return { brokenUpdateDetected: true, suspectedVersion: topVersion };
  }
  return { brokenUpdateDetected: false, suspectedVersion: null };
}

export function topPainCategories(
  categoryCounts: Record<string, number>,
  taxonomy: KeywordTaxonomy
): TopPainCategory[] {
  return Object.entries(categoryCounts)
    .filter(([, count]) => count > 0)
    .map(([category, count]) => ({
      category,
      pillar: taxonomy.pillarOf(category),
      count,
      weight: taxonomy.weightOf(category),
    }))
    .sort((a, b) => b.count * b.weight - a.count * a.weight)
    .slice(0, TOP_CATEGORY_LIMIT);
}

/**
 * Pain-bearing excerpts ranked whale first, then by matched category weight,
 * then by text length
 */
export function selectEvidence(matches: ReviewMatch[], taxonomy: KeywordTaxonomy, limit: number): EvidenceItem[] {
  const matchedWeight = (match: ReviewMatch) =>
    match.categories.reduce((sum, name) => sum + taxonomy.weightOf(name), 0);

  return matches
    .filter((match) => match.hasPain && match.review.text.length > 0)
    .map((match) => ({ match, weight: matchedWeight(match) }))
    .sort(
      (a, b) =>
        Number(b.match.isWhale) - Number(a.match.isWhale) ||
        b.weight - a.weight ||
        b.match.review.text.length - a.match.review.text.length
    )
    .slice(0, limit)
    .map(({ match }) => ({
      text: match.review.text.slice(0, EXCERPT_LENGTH),
      rating: match.review.rating,
      isWhale: match.isWhale,
      categories: match.categories,
      version: match.review.version,
    }));
}
