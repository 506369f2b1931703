/**
 * Analysis Types
 *
 * Every structure the analysis engine produces. All of it is plain data:
 * dates are ISO strings so a result serializes without loss.
 */

import type { NormalizationReport, Review } from './review';

export type Pillar = 'Functional' | 'Economic' | 'Experience';

export const PILLARS: readonly Pillar[] = ['Functional', 'Economic', 'Experience'];

export interface KeywordCategory {
  name: string;
  keywords: readonly string[];
  weight: number;
  pillar: Pillar;
}

export interface ReviewMatch {
  review: Review;
  categories: string[];
  hasPain: boolean;
  isWhale: boolean;
  /** 0 without pain, 1 for a normal pain review, the whale multiplier otherwise. */
  painWeight: number;
  /** Pillar carrying the most matched category weight, null without a match. */
  dominantPillar: Pillar | null;
}

export interface PainMatrix {
  matches: ReviewMatch[];
  categoryCounts: Record<string, number>;
}

export interface PillarDensities {
  functional: number;
  economic: number;
  experience: number;
}

export type RiskBand = 'Low' | 'Moderate' | 'High' | 'Critical';

export interface RiskScore {
  baseScore: number;
  slopeMultiplier: number;
  criticalFloor: number;
  final: number;
  band: RiskBand;
}

export type MomentumLabel = 'Accelerating' | 'Decelerating' | 'Stabilizing' | 'Improving' | 'Drifting';

export interface VolatilitySignal {
  slope: number;
  slopeDelta: number;
  recentSlope: number;
  priorSlope: number;
  momentum: MomentumLabel;
  insight: string;
}

export interface WeeklyBucket {
  weekLabel: string; // ISO week, e.g. 2026-W07
  weekStart: string;
  totalReviews: number;
  painReviews: number;
  weightedPainCount: number;
  density: number;
  lowConfidence: boolean;
  isAnomaly: boolean;
  namedLabel: string | null;
  version: string | null;
}

export interface NgramCluster {
  phrase: string;
  count: number;
}

export type MigrationType = 'churn' | 'comparison';

export interface MigrationEvent {
  competitorName: string;
  type: MigrationType;
  count: number;
}

export interface RevenueLeakageEstimate {
  churnReviewCount: number;
  nicheCategory: string;
  multiplier: number;
  avgPrice: number;
  monthlyUsd: number;
}

export interface TopPainCategory {
  category: string;
  pillar: Pillar;
  count: number;
  weight: number;
}

export interface EvidenceItem {
  text: string;
  rating: number;
  isWhale: boolean;
  categories: string[];
  version: string | null;
}

export interface AppAnalysis {
  appName: string;
  analysisDate: string;
  metrics: {
    totalReviews: number;
    painReviews: number;
    negativeRatio: number;
    riskScore: number;
    riskBand: RiskBand;
    volatilitySlope: number;
    slopeDelta: number;
    momentum: MomentumLabel;
  };
  normalization: NormalizationReport;
  pillarDensities: PillarDensities;
  primaryPillar: Pillar | 'None';
  risk: RiskScore;
  volatility: VolatilitySignal;
  signals: {
    brokenUpdateDetected: boolean;
    suspectedVersion: string | null;
    topPainCategories: TopPainCategory[];
  };
  timeline: WeeklyBucket[];
  clusters: NgramCluster[];
  migration: MigrationEvent[];
  revenueLeakage: RevenueLeakageEstimate;
  evidence: EvidenceItem[];
}

export interface PillarScores {
  Functional: number;
  Economic: number;
  Experience: number;
}

export type NicheMatrix = Record<string, PillarScores>;

export interface SafeHarborVerdict {
  appName: string;
  scores: PillarScores;
  riskScore: number;
  safeHarbor: boolean;
}
