/**
 * Analysis Engine
 *
 * Pure function from (raw reviews, immutable config) to an AppAnalysis.
 * Every component is built once per engine from the injected taxonomy and
 * settings; the same WhaleClassifier instance is shared by every stage that
 * weights reviews. The clock is injectable so repeated runs on the same
 * batch produce identical output.
 */

import type { Settings } from '../config';
import { isoDate } from '../processing/dates';
import { ReviewNormalizer } from '../processing/normalizer';
import { PainMatcher } from '../processing/pain-matcher';
import { KeywordTaxonomy } from '../processing/taxonomy';
import { WhaleClassifier } from '../processing/whale-classifier';
import type { AppAnalysis, NormalizationReport, RawReview } from '../types';
import { SemanticClusterExtractor } from './cluster-extractor';
import { MigrationMapper } from './migration-mapper';
import { RevenueLeakageEstimator } from './revenue-estimator';
import { RiskScorer, computePillarDensities, primaryPillar } from './risk-scorer';
import { detectBrokenUpdate, selectEvidence, topPainCategories } from './signals';
import { TimelineAnomalyDetector } from './timeline-detector';
import { VolatilityEngine } from './volatility-engine';

export interface AppContext {
  name: string;
  price?: number;
  nicheCategory?: string;
  /** Other app names in the niche, scanned for churn and comparison mentions. */
  competitors?: string[];
}

export interface EngineOptions {
  clock?: () => Date;
  /** Overrides settings.analysis.daysBack (e.g. from targets.json params). */
  daysBack?: number;
}

export class AnalysisEngine {
  private taxonomy: KeywordTaxonomy;
  private settings: Settings;
  private clock: () => Date;
  private whales: WhaleClassifier;
  private normalizer: ReviewNormalizer;
  private matcher: PainMatcher;
  private volatility: VolatilityEngine;
  private scorer: RiskScorer;
  private migration: MigrationMapper;
  private revenue: RevenueLeakageEstimator;

  constructor(taxonomy: KeywordTaxonomy, settings: Settings, options: EngineOptions = {}) {
    this.taxonomy = taxonomy;
    this.settings = settings;
    this.clock = options.clock ?? (() => new Date());

    this.whales = new WhaleClassifier(settings.whale);
    this.normalizer = new ReviewNormalizer({
      daysBack: options.daysBack ?? settings.analysis.daysBack,
      clock: this.clock,
    });
    this.matcher = new PainMatcher(taxonomy, this.whales);
    this.volatility = new VolatilityEngine({ windowWeeks: settings.analysis.slopeWindowWeeks });
    this.scorer = new RiskScorer(settings.risk);
    this.migration = new MigrationMapper();
    this.revenue = new RevenueLeakageEstimator(settings.revenue, this.whales);
  }

  get riskScorer(): RiskScorer {
    return this.scorer;
  }

  analyze(rawReviews: RawReview[], app: AppContext): AppAnalysis {
    const analysisDate = isoDate(this.clock());
    const { reviews, report } = this.normalizer.normalize(rawReviews);

    if (reviews.length === 0) {
      console.warn(`⚠️  No reviews to analyze for ${app.name}`);
      return this.emptyResult(app, analysisDate, report);
    }

    const { analysis } = this.settings;
    const clusters = new SemanticClusterExtractor({
      appName: app.name,
      topN: analysis.topClusters,
      minPhraseCount: analysis.minPhraseCount,
    });
    const timeline = new TimelineAnomalyDetector(
      {
        minWeeklySample: analysis.minWeeklySample,
        sigma: analysis.anomalySigma,
        windowWeeks: analysis.anomalyWindowWeeks,
      },
      clusters
    );

    const { matches, categoryCounts } = this.matcher.match(reviews);
    const totalReviews = reviews.length;
    const painReviews = matches.filter((match) => match.hasPain).length;

    const pillarDensities = computePillarDensities(categoryCounts, totalReviews, this.taxonomy);
    const volatility = this.volatility.analyze(matches);
    const risk = this.scorer.score(pillarDensities, volatility.slope);
    const brokenUpdate = detectBrokenUpdate(matches, analysis.brokenUpdateShare);

    const result: AppAnalysis = {
      appName: app.name,
      analysisDate,
      metrics: {
        totalReviews,
        painReviews,
        negativeRatio: round(painReviews / totalReviews, 3),
        riskScore: round(risk.final, 2),
        riskBand: risk.band,
        volatilitySlope: round(volatility.slope, 4),
        slopeDelta: round(volatility.slopeDelta, 4),
        momentum: volatility.momentum,
      },
      normalization: report,
      pillarDensities,
      primaryPillar: primaryPillar(pillarDensities),
      risk,
      volatility,
      signals: {
        ...brokenUpdate,
        topPainCategories: topPainCategories(categoryCounts, this.taxonomy),
      },
      timeline: timeline.detect(matches),
      clusters: clusters.extract(reviews),
      migration: this.migration.map(reviews, app.competitors ?? [], app.name),
      revenueLeakage: this.revenue.estimate(matches, app),
      evidence: selectEvidence(matches, this.taxonomy, analysis.topEvidence),
    };

    console.log(
      `Analysis complete for ${app.name}: risk=${result.metrics.riskScore} (${risk.band}), ` +
        `slope=${result.metrics.volatilitySlope}, momentum=${volatility.momentum}`
    );

    return result;
  }

  private emptyResult(app: AppContext, analysisDate: string, report: NormalizationReport): AppAnalysis {
    const pillarDensities = { functional: 0, economic: 0, experience: 0 };
    const volatility = this.volatility.analyze([]);
    const risk = this.scorer.score(pillarDensities, 0);

    return {
      appName: app.name,
      analysisDate,
      metrics: {
        totalReviews: 0,
        painReviews: 0,
        negativeRatio: 0,
        riskScore: risk.final,
        riskBand: risk.band,
        volatilitySlope: 0,
        slopeDelta: 0,
        momentum: volatility.momentum,
      },
      normalization: report,
      pillarDensities,
      primaryPillar: 'None',
      risk,
      volatility,
      signals: { brokenUpdateDetected: false, suspectedVersion: null, topPainCategories: [] },
      timeline: [],
      clusters: [],
      migration: [],
      revenueLeakage: this.revenue.estimate([], app),
      evidence: [],
    };
  }
}

export function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
