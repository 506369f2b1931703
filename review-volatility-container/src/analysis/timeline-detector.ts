/**
 * Timeline Anomaly Detector
 *
 * Buckets reviews into ISO weeks, computes whale-weighted pain density per
 * week and flags weeks whose density exceeds the rolling mean by more than
 * `sigma` standard deviations of the preceding confident weeks. Anomalous
 * weeks are named after the dominant app version, or failing that the top
 * phrase of that week.
 */

import { isoWeekOf, isoWeekRange } from '../processing/dates';
import type { ReviewMatch, WeeklyBucket } from '../types';
import { SemanticClusterExtractor } from './cluster-extractor';

export interface TimelineOptions {
  minWeeklySample: number;
  sigma: number;
  /** Number of prior confident weeks in the rolling window. */
  windowWeeks: number;
}

const MIN_PRIOR_WEEKS = 2;

export class TimelineAnomalyDetector {
  private options: TimelineOptions;
  private clusters: SemanticClusterExtractor;

  constructor(options: TimelineOptions, clusters: SemanticClusterExtractor) {
    this.options = options;
    this.clusters = clusters;
  }

  detect(matches: ReviewMatch[]): WeeklyBucket[] {
    if (matches.length === 0) {
      return [];
    }

    const byWeek = new Map<string, ReviewMatch[]>();
    let first = matches[0].review.date;
    let last = matches[0].review.date;
    for (const match of matches) {
      const date = match.review.date;
      const label = isoWeekOf(date).label;
      const bucket = byWeek.get(label);
      if (bucket) {
        bucket.push(match);
      } else {
        byWeek.set(label, [match]);
      }
      if (date < first) first = date;
      if (date > last) last = date;
    }

    const buckets: WeeklyBucket[] = isoWeekRange(first, last).map((week) => {
      const weekMatches = byWeek.get(week.label) ?? [];
      const totalReviews = weekMatches.length;
      const weightedPainCount = weekMatches.reduce((sum, match) => sum + match.painWeight, 0);

      return {
        weekLabel: week.label,
        weekStart: week.start.toISOString(),
        totalReviews,
        painReviews: weekMatches.filter((match) => match.hasPain).length,
        weightedPainCount,
        density: totalReviews > 0 ? weightedPainCount / totalReviews : 0,
        lowConfidence: totalReviews < this.options.minWeeklySample,
        isAnomaly: false,
        namedLabel: null,
        version: null,
      };
    });

    this.flagAnomalies(buckets);

    for (const bucket of buckets) {
      if (bucket.isAnomaly) {
        const pain = (byWeek.get(bucket.weekLabel) ?? []).filter((match) => match.hasPain);
        const { label, version } = this.nameSpike(pain);
        bucket.namedLabel = label;
        bucket.version = version;
      }
    }

    return buckets;
  }

  /**
   * Mark confident weeks whose density exceeds mean + sigma × std of the
   * preceding confident weeks. Low-confidence weeks never enter the
   * statistics and are never flagged.
   */
  flagAnomalies(buckets: WeeklyBucket[]): void {
    const history: number[] = [];

    for (const bucket of buckets) {
      if (bucket.lowConfidence) {
        continue;
      }

      const prior = history.slice(-this.options.windowWeeks);
      if (prior.length >= MIN_PRIOR_WEEKS) {
        const { mean, std } = meanAndStd(prior);
        bucket.isAnomaly = bucket.density > mean + this.options.sigma * std;
      }
      history.push(bucket.density);
    }
  }

  nameSpike(painMatches: ReviewMatch[]): { label: string; version: string | null } {
    const version = pluralityVersion(painMatches);
    if (version) {
      return { label: `The Version ${version} Spike`, version };
    }

    const [topCluster] = this.clusters.extractFromTexts(painMatches.map((match) => match.review.text));
    if (topCluster) {
      return { label: `The "${topCluster.phrase}" Spike`, version: null };
    }

    return { label: 'Critical Spike', version: null };
  }
}

/**
 * Most frequent version string, or null when absent or tied
 */
export function pluralityVersion(matches: ReviewMatch[]): string | null {
  const tally = new Map<string, number>();
  for (const match of matches) {
    const version = match.review.version;
    if (version) {
      tally.set(version, (tally.get(version) ?? 0) + 1);
    }
  }

  let best: string | null = null;
  let bestCount = 0;
  let tied = false;
  for (const [version, count] of tally) {
    if (count > bestCount) {
      best = version;
      bestCount = count;
      tied = false;
    } else if (count === bestCount) {
      tied = true;
    }
  }
  return tied ? null : best;
}

/**
 * Mean and sample standard deviation (n - 1)
 */
export function meanAndStd(values: number[]): { mean: number; std: number } {
  const mean = values.reduce((sum, value) => sum + value, 0) / values.length;
  if (values.length < 2) {
    return { mean, std: 0 };
  }
  const variance = values.reduce((sum, value) => sum + (value - mean) ** 2, 0) / (values.length - 1);
  return { mean, std: Math.sqrt(variance) };
}
