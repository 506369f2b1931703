/**
 * Niche Matrix
 *
 * Cross-app comparison of normalized pillar scores (0-100) and the
 * safe-harbor verdict: an app qualifies only when Functional and Economic
 * both stay under their limits AND the overall risk score does.
 */

import type { Settings } from '../config';
import type { AppAnalysis, NicheMatrix, PillarScores, SafeHarborVerdict } from '../types';
import { RiskScorer } from './risk-scorer';

export type SafeHarborPolicy = Settings['safeHarbor'];

export function buildNicheMatrix(analyses: AppAnalysis[], scorer: RiskScorer): NicheMatrix {
  const matrix: NicheMatrix = {};
  for (const analysis of analyses) {
    matrix[analysis.appName] = scorer.normalizedScores(analysis.pillarDensities);
  }
  return matrix;
}

export function isSafeHarbor(scores: PillarScores, riskScore: number, policy: SafeHarborPolicy): boolean {
  return scores.Functional < policy.maxFunctional && scores.Economic < policy.maxEconomic && riskScore < policy.maxRiskScore;
}

export function safeHarborVerdicts(
  analyses: AppAnalysis[],
  matrix: NicheMatrix,
  policy: SafeHarborPolicy
): SafeHarborVerdict[] {
  return analyses.map((analysis) => {
    const scores = matrix[analysis.appName] ?? { Functional: 0, Economic: 0, Experience: 0 };
    const riskScore = analysis.metrics.riskScore;
    return {
      appName: analysis.appName,
      scores,
      riskScore,
      safeHarbor: isSafeHarbor(scores, riskScore, policy),
    };
  });
}
