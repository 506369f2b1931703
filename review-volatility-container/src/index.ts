#!/usr/bin/env node
/**
 * Review Volatility Bot - Main Entry Point
 *
 * Orchestrates one batch run:
 * 1. Ingestion: Fetch reviews for every target app
 * 2. Filtering: Drop reviews the thrift filter rejects and save the rest
 * 3. Analysis: Score each app with the deterministic engine
 * 4. Narrative: Optional prose brief per app
 * 5. Reports: Per-app reports, leaderboard and niche matrix to the report store
 *
 * Apps are processed in small concurrent batches. A failure in one app is
 * recorded and the batch continues; a configuration error stops the run
 * before any app starts.
 */

import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import {
  AnalysisEngine,
  buildNicheMatrix,
  flattenAnalysis,
  safeHarborVerdicts,
} from './analysis';
import { AnalysisConfig, AppTarget, RuntimeConfig, loadAnalysisConfig, loadConfig } from './config';
import { ConfigurationError, errorMessage } from './errors';
import { FileReviewSource, ReviewSource, createReviewSource } from './ingestion';
import { KeywordTaxonomy, ReviewFilter, isoDate } from './processing';
import { ReportStore, createReportStore } from './storage';
import {
  NarrativeGenerator,
  placeholderBrief,
  renderAppReport,
  renderLeaderboard,
  renderNicheReport,
} from './synthesis';
import type { AppAnalysis, NarrativeBrief } from './types';

export interface BotDependencies {
  analysisConfig: AnalysisConfig;
  source: ReviewSource;
  store: ReportStore;
  narrator: NarrativeGenerator;
  clock?: () => Date;
  runId?: string;
}

export interface RunOptions {
  /** First app only, `forceFetchCount` reviews, stop at the first failure. */
  smokeTest?: boolean;
}

export interface AppFailure {
  name: string;
  error: string;
}

export interface RunSummary {
  runId: string;
  succeeded: string[];
  failed: AppFailure[];
  analyses: AppAnalysis[];
  artifacts: string[];
  /** Run-level report writes that failed (leaderboard, niche report). */
  reportErrors: string[];
}

type AppOutcome = { ok: true; analysis: AppAnalysis; artifacts: string[] } | { ok: false; failure: AppFailure };

export class ReviewVolatilityBot {
  private config: AnalysisConfig;
  private source: ReviewSource;
  private store: ReportStore;
  private narrator: NarrativeGenerator;
  private engine: AnalysisEngine;
  private filter: ReviewFilter;
  private runId: string;

  constructor(deps: BotDependencies) {
    const { taxonomy, settings, targets } = deps.analysisConfig;
    const keywordTaxonomy = KeywordTaxonomy.fromConfig(taxonomy);
    const clock = deps.clock ?? (() => new Date());

    this.config = deps.analysisConfig;
    this.source = deps.source;
    this.store = deps.store;
    this.narrator = deps.narrator;
    this.engine = new AnalysisEngine(keywordTaxonomy, settings, { clock, daysBack: targets.params.daysBack });
    this.filter = new ReviewFilter(settings.filters, keywordTaxonomy);
    this.runId = deps.runId ?? `${isoDate(clock())}-${uuidv4().slice(0, 8)}`;
  }

  static fromConfig(runtime: RuntimeConfig, analysisConfig: AnalysisConfig): ReviewVolatilityBot {
    return new ReviewVolatilityBot({
      analysisConfig,
      source: createReviewSource(runtime, analysisConfig.settings.filters.country),
      store: createReportStore(runtime.storage),
      narrator: NarrativeGenerator.fromConfig(runtime.anthropic),
    });
  }

  /**
   * Run the complete pipeline over every target app
   */
  async run(options: RunOptions = {}): Promise<RunSummary> {
    const { settings, targets } = this.config;
    const smokeTest = options.smokeTest ?? false;

    console.log('\n╔════════════════════════════════════════════════════════╗');
    console.log('║        REVIEW VOLATILITY BOT - STARTING                ║');
    console.log('╚════════════════════════════════════════════════════════╝\n');
    console.log(`Run: ${this.runId} | Niche: ${targets.nicheName} | Apps: ${targets.apps.length}`);

    const startTime = Date.now();
    const apps = smokeTest ? targets.apps.slice(0, 1) : targets.apps;
    const maxReviews = smokeTest ? settings.filters.forceFetchCount : targets.params.maxReviews;
    if (smokeTest) {
      console.log(`🔥 SMOKE TEST MODE: ${apps[0]?.name ?? 'no app'}, ${maxReviews} reviews`);
    }

    const summary = emptySummary(this.runId);
    const batchSize = settings.processing.maxConcurrentApps;

    for (let i = 0; i < apps.length; i += batchSize) {
      const batch = apps.slice(i, i + batchSize);
      console.log(`\n📦 Batch ${Math.floor(i / batchSize) + 1}/${Math.ceil(apps.length / batchSize)}: ${batch.map((a) => a.name).join(', ')}`);

      const outcomes = await Promise.all(batch.map((app) => this.processApp(app, this.source, maxReviews)));

      for (const outcome of outcomes) {
        if (outcome.ok) {
          summary.succeeded.push(outcome.analysis.appName);
          summary.analyses.push(outcome.analysis);
          summary.artifacts.push(...outcome.artifacts);
        } else {
          summary.failed.push(outcome.failure);
        }
      }

      if (smokeTest && summary.failed.length > 0) {
        console.error('❌ Smoke test failed, stopping');
        break;
      }
    }

    if (summary.analyses.length > 0) {
      try {
        summary.artifacts.push(...(await this.storeRunReports(summary.analyses)));
      } catch (error) {
        console.error('❌ Run reports failed:', errorMessage(error));
        summary.reportErrors.push(errorMessage(error));
      }
    }

    const duration = ((Date.now() - startTime) / 1000).toFixed(1);
    printSummary(summary, duration);
    return summary;
  }

  /**
   * Analyze one saved review file offline
   */
  async analyzeFile(filePath: string, appName?: string): Promise<RunSummary> {
    const name = appName || path.basename(filePath, path.extname(filePath));
    const target: AppTarget = this.config.targets.apps.find((app) => app.name === name) ?? {
      name,
      url: `file://${path.resolve(filePath)}`,
    };

    const outcome = await this.processApp(target, new FileReviewSource(filePath), this.config.targets.params.maxReviews);
    const summary = emptySummary(this.runId);
    if (outcome.ok) {
      summary.succeeded.push(name);
      summary.analyses.push(outcome.analysis);
      summary.artifacts.push(...outcome.artifacts);
    } else {
      summary.failed.push(outcome.failure);
    }

    printSummary(summary, '0.0');
    return summary;
  }

  /**
   * Fetch, filter, analyze and report one app. Never throws.
   */
  private async processApp(app: AppTarget, source: ReviewSource, maxReviews: number): Promise<AppOutcome> {
    try {
      const raw = await source.fetchReviews({ appName: app.name, appUrl: app.url, maxReviews });
      const { reviews } = this.filter.filter(raw);
      const reviewsLocation = await this.store.put(
        `${this.appBase(app.name)}.reviews.json`,
        JSON.stringify({ appName: app.name, reviews }, null, 2),
        'application/json'
      );

      const analysis = this.engine.analyze(reviews, {
        name: app.name,
        price: app.price,
        nicheCategory: app.nicheCategory ?? this.config.targets.nicheCategory,
        competitors: this.config.targets.apps.map((target) => target.name).filter((name) => name !== app.name),
      });

      const narrative = await this.narrate(analysis);
      const artifacts = [reviewsLocation, ...(await this.storeAppReports(analysis, narrative))];

      console.log(`✓ ${app.name}: risk ${analysis.metrics.riskScore} (${analysis.metrics.riskBand})`);
      return { ok: true, analysis, artifacts };
    } catch (error) {
      console.error(`✗ ${app.name} failed:`, errorMessage(error));
      return { ok: false, failure: { name: app.name, error: errorMessage(error) } };
    }
  }

  private async narrate(analysis: AppAnalysis): Promise<NarrativeBrief> {
    try {
      return await this.narrator.generate(analysis);
    } catch (error) {
      console.warn(`⚠️  Narrative skipped for ${analysis.appName}: ${errorMessage(error)}`);
      return placeholderBrief(analysis);
    }
  }

  private async storeAppReports(analysis: AppAnalysis, narrative: NarrativeBrief): Promise<string[]> {
    const base = this.appBase(analysis.appName);
    return Promise.all([
      this.store.put(`${base}.md`, renderAppReport(analysis, narrative), 'text/markdown'),
      this.store.put(`${base}.json`, JSON.stringify(analysis, null, 2), 'application/json'),
      this.store.put(`${base}.flat.json`, JSON.stringify(flattenAnalysis(analysis), null, 2), 'application/json'),
      this.store.put(`${base}.narrative.json`, JSON.stringify(narrative, null, 2), 'application/json'),
    ]);
  }

  private appBase(appName: string): string {
    return `runs/${this.runId}/apps/${slugify(appName)}`;
  }

  private async storeRunReports(analyses: AppAnalysis[]): Promise<string[]> {
    const { settings, targets } = this.config;
    const matrix = buildNicheMatrix(analyses, this.engine.riskScorer);
    const verdicts = safeHarborVerdicts(analyses, matrix, settings.safeHarbor);
    const base = `runs/${this.runId}`;

    return Promise.all([
      this.store.put(`${base}/leaderboard.md`, renderLeaderboard(analyses), 'text/markdown'),
      this.store.put(`${base}/niche_report.md`, renderNicheReport(targets.nicheName, matrix, verdicts), 'text/markdown'),
      this.store.put(`${base}/niche_matrix.json`, JSON.stringify({ matrix, verdicts }, null, 2), 'application/json'),
    ]);
  }
}

export function slugify(name: string): string {
  return (
    name
      .toLowerCase()
      .replace(/[^\p{L}\p{N}]+/gu, '-')
      .replace(/^-+|-+$/g, '') || 'app'
  );
}

function emptySummary(runId: string): RunSummary {
  return { runId, succeeded: [], failed: [], analyses: [], artifacts: [], reportErrors: [] };
}

export function exitCode(summary: RunSummary): number {
  return summary.failed.length > 0 || summary.reportErrors.length > 0 ? 1 : 0;
}

function printSummary(summary: RunSummary, duration: string): void {
  console.log('\n╔════════════════════════════════════════════════════════╗');
  console.log('║        REVIEW VOLATILITY BOT - COMPLETE                ║');
  console.log('╚════════════════════════════════════════════════════════╝\n');
  console.log('Summary:');
  console.log(`  ⏱️  Duration: ${duration}s`);
  console.log(`  ✅ Succeeded (${summary.succeeded.length}): ${summary.succeeded.join(', ') || '-'}`);
  console.log(`  ❌ Failed (${summary.failed.length}): ${summary.failed.map((f) => f.name).join(', ') || '-'}`);
  for (const failure of summary.failed) {
    console.log(`     ${failure.name}: ${failure.error}`);
  }
  for (const error of summary.reportErrors) {
    console.log(`  ⚠️  Run report: ${error}`);
  }
  console.log('');
}

/**
 * CLI Entry Point
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const smokeTest = argv.includes('--smoke-test');
  const args = argv.filter((arg) => !arg.startsWith('--'));
  const command = args[0] || 'run';

  const runtime = loadConfig();

  let analysisConfig: AnalysisConfig;
  try {
    analysisConfig = loadAnalysisConfig(runtime.configDir);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`❌ ${error.message}`);
      return 1;
    }
    throw error;
  }

  switch (command) {
    case 'validate': {
      const { taxonomy, targets } = analysisConfig;
      console.log(`✓ Configuration valid: ${Object.keys(taxonomy.categories).length} categories, ${targets.apps.length} apps`);
      return 0;
    }
    case 'run': {
      const summary = await ReviewVolatilityBot.fromConfig(runtime, analysisConfig).run({ smokeTest });
      return exitCode(summary);
    }
    case 'analyze': {
      const filePath = args[1];
      if (!filePath) {
        console.log('Usage: analyze <reviews.json> [app name]');
        return 1;
      }
      const summary = await ReviewVolatilityBot.fromConfig(runtime, analysisConfig).analyzeFile(filePath, args[2]);
      return exitCode(summary);
    }
    default:
      console.log('Unknown command. Available commands: run [--smoke-test], analyze <file> [app name], validate');
      return 1;
  }
}

// Run if called directly
if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      console.error('Fatal error:', error);
      process.exitCode = 1;
    });
}

export default ReviewVolatilityBot;
