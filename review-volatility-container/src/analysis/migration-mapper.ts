/**
 * Migration Mapper
 *
 * Finds competitor mentions in review text and splits them into churn
 * ("switched to X") and comparison ("better than X"). Only churn feeds
 * competitive-loss signals; mentions in neither frame are ignored.
 */

import type { MigrationEvent, Review } from '../types';

const CHURN_VERBS = '(?:switched|moved|migrated|changed)';
const COMPARATIVES = '(?:better|worse)';
const NAME_END = '(?![\\p{L}\\p{N}])';

interface CompetitorPatterns {
  name: string;
  churn: RegExp;
  comparison: RegExp;
}

export class MigrationMapper {
  map(reviews: Review[], competitors: string[], ownAppName?: string): MigrationEvent[] {
    const patterns = this.buildPatterns(competitors, ownAppName);
    if (patterns.length === 0) {
      return [];
    }

    const churn = new Map<string, number>();
    const comparison = new Map<string, number>();

    for (const review of reviews) {
      const text = review.text;
      if (!text) {
        continue;
      }
      for (const competitor of patterns) {
        if (competitor.churn.test(text)) {
          churn.set(competitor.name, (churn.get(competitor.name) ?? 0) + 1);
        }
        if (competitor.comparison.test(text)) {
          comparison.set(competitor.name, (comparison.get(competitor.name) ?? 0) + 1);
        }
      }
    }

    const events: MigrationEvent[] = [];
    for (const { name } of patterns) {
      const churnCount = churn.get(name);
      if (churnCount) {
        events.push({ competitorName: name, type: 'churn', count: churnCount });
      }
      const comparisonCount = comparison.get(name);
      if (comparisonCount) {
        events.push({ competitorName: name, type: 'comparison', count: comparisonCount });
      }
    }
    return events;
  }

  private buildPatterns(competitors: string[], ownAppName?: string): CompetitorPatterns[] {
    const own = ownAppName ? displayName(ownAppName).toLowerCase() : null;
    const seen = new Set<string>();
    const patterns: CompetitorPatterns[] = [];

    for (const competitor of competitors) {
      const name = displayName(competitor);
      const key = name.toLowerCase();
      if (!name || key === own || seen.has(key)) {
        continue;
      }
      seen.add(key);

      const escaped = escapeRegExp(name).replace(/ /g, '\\s+');
      patterns.push({
        name,
        churn: new RegExp(`\\b${CHURN_VERBS}\\s+to\\s+${escaped}${NAME_END}`, 'iu'),
        comparison: new RegExp(`\\b${COMPARATIVES}\\s+than\\s+${escaped}${NAME_END}`, 'iu'),
      });
    }
    return patterns;
  }
}

/**
 * Target names use underscores for spaces ("Forest_Focus" is "Forest Focus")
 */
export function displayName(name: string): string {
  return name.replace(/_/g, ' ').trim();
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
