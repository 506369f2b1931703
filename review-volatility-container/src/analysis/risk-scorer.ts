/**
 * Risk Scorer
 *
 * Severity-first risk scoring. Pillar densities set the base score, the
 * volatility slope scales it, and a critical floor applied after the scaling
 * keeps an improving trend from hiding scams or crashes.
 */

import type { Settings } from '../config';
import { KeywordTaxonomy } from '../processing/taxonomy';
import type { Pillar, PillarDensities, PillarScores, RiskBand, RiskScore } from '../types';
import { PILLARS } from '../types';

export type RiskPolicy = Settings['risk'];

export class RiskScorer {
  private policy: RiskPolicy;

  constructor(policy: RiskPolicy) {
    this.policy = policy;
  }

  score(densities: PillarDensities, slope: number): RiskScore {
    const { scalers, floors } = this.policy;

    const baseScore =
      densities.functional * scalers.functional +
      densities.economic * scalers.economic +
      densities.experience * scalers.experience;

    const slopeMultiplier = this.slopeMultiplier(slope);

    let criticalFloor = 0;
    if (densities.economic > floors.economicDensity) {
      criticalFloor = floors.economicFloor;
    } else if (densities.functional > floors.functionalDensity) {
      criticalFloor = floors.functionalFloor;
    }

    const scaled = baseScore * slopeMultiplier;
    const final = clamp(Math.max(scaled, criticalFloor), 0, 100);

    return {
      baseScore,
      slopeMultiplier,
      criticalFloor,
      final,
      band: scoreToBand(final),
    };
  }

  slopeMultiplier(slope: number): number {
    if (!Number.isFinite(slope)) {
      return 1;
    }
    if (slope > 0) {
      return Math.min(this.policy.maxSlopeMultiplier, 1 + slope);
    }
    return Math.max(this.policy.minSlopeMultiplier, 1 + slope * this.policy.negativeSlopeDamping);
  }

  /**
   * Pillar densities scaled to 0-100 for cross-app comparison
   */
  normalizedScores(densities: PillarDensities): PillarScores {
    const { scalers } = this.policy;
    return {
      Functional: clamp(densities.functional * scalers.functional, 0, 100),
      Economic: clamp(densities.economic * scalers.economic, 0, 100),
      Experience: clamp(densities.experience * scalers.experience, 0, 100),
    };
  }
}

/**
 * Σ(category weight × matching review count) / total reviews, per pillar
 */
export function computePillarDensities(
  categoryCounts: Record<string, number>,
  totalReviews: number,
  taxonomy: KeywordTaxonomy
): PillarDensities {
  const densities: PillarDensities = { functional: 0, economic: 0, experience: 0 };
  if (totalReviews <= 0) {
    return densities;
  }

  for (const [name, count] of Object.entries(categoryCounts)) {
    const contribution = (taxonomy.weightOf(name) * count) / totalReviews;
    densities[pillarKey(taxonomy.pillarOf(name))] += contribution;
  }
  return densities;
}

/**
 * Pillar with the highest density; ties resolve Functional, Economic, Experience.
 */
export function primaryPillar(densities: PillarDensities): Pillar | 'None' {
  let best: Pillar | 'None' = 'None';
  let bestValue = 0;
  for (const pillar of PILLARS) {
    const value = densities[pillarKey(pillar)];
    if (value > bestValue) {
      best = pillar;
      bestValue = value;
    }
  }
  return best;
}

export function scoreToBand(score: number): RiskBand {
  if (score <= 25) return 'Low';
  if (score <= 50) return 'Moderate';
  if (score <= 75) return 'High';
  return 'Critical';
}

export function pillarKey(pillar: Pillar): keyof PillarDensities {
  switch (pillar) {
    case 'Functional':
      return 'functional';
    case 'Economic':
      return 'economic';
    case 'Experience':
      return 'experience';
  }
}

function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) {
    return min;
  }
  return Math.min(max, Math.max(min, value));
}
