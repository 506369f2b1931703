/**
 * Configuration Management
 *
 * Two layers:
 * - Runtime settings (API keys, storage targets) from environment variables.
 * - Analysis configuration (keyword taxonomy, settings, targets) from JSON files,
 *   validated once at load time. Anything malformed fails the run immediately.
 */

import fs from 'fs';
import path from 'path';
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from './errors';

export interface ApifyConfig {
  apiKey: string;
  actorId: string;
  baseUrl: string;
  timeoutMs: number;
  maxAttempts: number;
}

export interface AnthropicConfig {
  apiKey: string;
  model: string;
  enabled: boolean;
}

export interface StorageConfig {
  reportStore: 'local' | 's3';
  reportsDir: string;
  s3Bucket: string;
  s3Prefix: string;
}

export interface RuntimeConfig {
  configDir: string;
  apify: ApifyConfig;
  anthropic: AnthropicConfig;
  storage: StorageConfig;
}

/**
 * Load runtime configuration from environment variables (and `.env`, if present)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  if (env === process.env) {
    loadDotenv();
  }

  return {
    configDir: env.CONFIG_DIR || path.resolve(__dirname, '..', 'config'),
    apify: {
      apiKey: env.APIFY_API_KEY || '',
      actorId: env.APIFY_ACTOR_ID || 'agents/appstore-reviews',
      baseUrl: env.APIFY_BASE_URL || 'https://api.apify.com/v2',
      timeoutMs: parseInt(env.APIFY_TIMEOUT_MS || '300000', 10),
      maxAttempts: parseInt(env.APIFY_MAX_ATTEMPTS || '3', 10),
    },
    anthropic: {
      apiKey: env.ANTHROPIC_API_KEY || '',
      model: env.ANTHROPIC_MODEL || 'claude-sonnet-4-20250514',
      enabled: (env.NARRATIVE_ENABLED || 'true') !== 'false',
    },
    storage: {
      reportStore: env.REPORT_STORE === 's3' ? 's3' : 'local',
      reportsDir: env.REPORTS_DIR || path.resolve(process.cwd(), 'reports'),
      s3Bucket: env.S3_BUCKET || 'review-volatility-reports',
      s3Prefix: env.S3_PREFIX || 'reports',
    },
  };
}

// ---------------------------------------------------------------------------
// File-based analysis configuration
// ---------------------------------------------------------------------------

const categorySchema = z.object({
  keywords: z.array(z.string().min(1)).min(1),
  weight: z.number().positive(),
});

export const taxonomySchema = z.object({
  categories: z.record(z.string(), categorySchema).refine((value) => Object.keys(value).length > 0, {
    message: 'at least one category is required',
  }),
});

export const settingsSchema = z.object({
  filters: z
    .object({
      minStarRating: z.number().int().min(1).max(5).default(1),
      minReviewLengthWords: z.number().int().min(0).default(3),
      dropGeneric5Star: z.boolean().default(false),
      forceFetchCount: z.number().int().positive().default(10),
      country: z.string().min(2).default('us'),
    })
    .default({}),
  analysis: z
    .object({
      daysBack: z.number().int().positive().default(90),
      minWeeklySample: z.number().int().positive().default(5),
      anomalySigma: z.number().positive().default(2),
      anomalyWindowWeeks: z.number().int().min(2).default(4),
      slopeWindowWeeks: z.number().int().min(2).default(4),
      brokenUpdateShare: z.number().min(0).max(1).default(0.3),
      topClusters: z.number().int().positive().default(5),
      minPhraseCount: z.number().int().positive().default(2),
      topEvidence: z.number().int().min(0).default(5),
    })
    .default({}),
  whale: z
    .object({
      wordThreshold: z.number().int().positive().default(40),
      multiplier: z.number().positive().default(3),
      domainVocab: z
        .array(z.string().min(1))
        .default([
          'latency',
          'vector',
          'workflow',
          'pipeline',
          'integration',
          'api',
          'batch',
          'export',
          'sync',
          'credits',
          'quota',
          'render',
          '4k',
          'resolution',
          'frame rate',
        ]),
    })
    .default({}),
  risk: z
    .object({
      scalers: z
        .object({
          functional: z.number().positive().default(200),
          economic: z.number().positive().default(250),
          experience: z.number().positive().default(150),
        })
        .default({}),
      maxSlopeMultiplier: z.number().min(1).default(2),
      minSlopeMultiplier: z.number().positive().max(1).default(0.5),
      negativeSlopeDamping: z.number().min(0).default(0.1),
      floors: z
        .object({
          economicDensity: z.number().min(0).default(0.1),
          economicFloor: z.number().min(0).max(100).default(60),
          functionalDensity: z.number().min(0).default(0.15),
          functionalFloor: z.number().min(0).max(100).default(50),
        })
        .default({}),
    })
    .default({}),
  revenue: z
    .object({
      defaultPrice: z.number().min(0).default(4.99),
      defaultNiche: z.string().default('consumer'),
      // Keys are matched against the lowercased niche category
      nicheMultipliers: z
        .record(z.string(), z.number().min(0))
        .transform((multipliers) =>
          Object.fromEntries(Object.entries(multipliers).map(([niche, value]) => [niche.toLowerCase(), value]))
        )
        .default({ b2b: 50, consumer: 100, games: 200 }),
    })
    .refine((revenue) => revenue.defaultNiche.toLowerCase() in revenue.nicheMultipliers, {
      message: 'defaultNiche must be one of the nicheMultipliers keys',
      path: ['defaultNiche'],
    })
    .default({}),
  safeHarbor: z
    .object({
      maxFunctional: z.number().default(30),
      maxEconomic: z.number().default(30),
      maxRiskScore: z.number().default(50),
    })
    .default({}),
  processing: z
    .object({
      maxConcurrentApps: z.number().int().positive().default(2),
    })
    .default({}),
});

const appTargetSchema = z.object({
  name: z.string().min(1),
  url: z.string().url(),
  price: z.number().min(0).optional(),
  nicheCategory: z.string().optional(),
});

export const targetsSchema = z.object({
  nicheName: z.string().default('default'),
  nicheCategory: z.string().optional(),
  params: z.object({
    daysBack: z.number().int().positive(),
    maxReviews: z.number().int().positive(),
  }),
  apps: z.array(appTargetSchema).min(1),
});

export type TaxonomyConfig = z.infer<typeof taxonomySchema>;
export type Settings = z.infer<typeof settingsSchema>;
export type TargetsConfig = z.infer<typeof targetsSchema>;
export type AppTarget = z.infer<typeof appTargetSchema>;

export interface AnalysisConfig {
  taxonomy: TaxonomyConfig;
  settings: Settings;
  targets: TargetsConfig;
}

/**
 * Read a JSON file and validate it against a schema
 */
export function loadJsonConfig<T extends z.ZodTypeAny>(filePath: string, schema: T): z.infer<T> {
  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError(filePath, ['file not found']);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(filePath, [`invalid JSON: ${detail}`]);
  }

  return parseConfig(filePath, raw, schema);
}

export function parseConfig<T extends z.ZodTypeAny>(label: string, raw: unknown, schema: T): z.infer<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${where}: ${issue.message}`;
    });
    throw new ConfigurationError(label, issues);
  }
  return result.data;
}

/**
 * Load and validate pain_keywords.json, settings.json and targets.json
 */
export function loadAnalysisConfig(configDir: string): AnalysisConfig {
  return {
    taxonomy: loadJsonConfig(path.join(configDir, 'pain_keywords.json'), taxonomySchema),
    settings: loadJsonConfig(path.join(configDir, 'settings.json'), settingsSchema),
    targets: loadJsonConfig(path.join(configDir, 'targets.json'), targetsSchema),
  };
}

export function defaultSettings(): Settings {
  return settingsSchema.parse({});
}
