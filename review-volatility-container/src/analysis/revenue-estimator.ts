/**
 * Revenue Leakage Estimator
 *
 * Fermi estimate of monthly revenue lost to churn: whale-weighted count of
 * reviews dominated by Economic or Functional pain, times a niche
 * multiplier (silent users per complaining user), times the app price.
 */

import type { Settings } from '../config';
import { WhaleClassifier } from '../processing/whale-classifier';
import type { ReviewMatch, RevenueLeakageEstimate } from '../types';

export type RevenuePolicy = Settings['revenue'];

export interface AppPricing {
  price?: number;
  nicheCategory?: string;
}

export class RevenueLeakageEstimator {
  private policy: RevenuePolicy;
  private whales: WhaleClassifier;

  constructor(policy: RevenuePolicy, whales: WhaleClassifier) {
    this.policy = policy;
    this.whales = whales;
  }

  estimate(matches: ReviewMatch[], app: AppPricing = {}): RevenueLeakageEstimate {
    const churnReviewCount = matches
      .filter((match) => match.dominantPillar === 'Economic' || match.dominantPillar === 'Functional')
      .reduce((sum, match) => sum + this.whales.reviewWeight(match.isWhale), 0);

    const nicheCategory = (app.nicheCategory || this.policy.defaultNiche).toLowerCase();
    const multiplier = this.multiplierFor(nicheCategory);
    const avgPrice = app.price !== undefined && Number.isFinite(app.price) ? app.price : this.policy.defaultPrice;

    const monthly = churnReviewCount * multiplier * avgPrice;

    return {
      churnReviewCount,
      nicheCategory,
      multiplier,
      avgPrice,
      monthlyUsd: Number.isFinite(monthly) && monthly > 0 ? monthly : 0,
    };
  }

  private multiplierFor(nicheCategory: string): number {
    const multipliers = this.policy.nicheMultipliers;
    const known = multipliers[nicheCategory];
    if (known !== undefined) {
      return known;
    }

    const fallback = multipliers[this.policy.defaultNiche.toLowerCase()] ?? 0;
    console.warn(`⚠️  Unknown niche category '${nicheCategory}', using ${this.policy.defaultNiche} multiplier (${fallback})`);
    return fallback;
  }
}
