/**
 * Apify Review Source
 *
 * Runs the App Store reviews actor synchronously and returns its dataset
 * items. Network failures, 429 and 5xx responses are retried with
 * exponential backoff; anything else fails the app immediately.
 */

import axios, { AxiosRequestConfig } from 'axios';
import { z } from 'zod';
import type { ApifyConfig } from '../config';
import { ReviewSourceError, errorMessage } from '../errors';
import type { RawReview } from '../types';
import type { ReviewRequest, ReviewSource } from './review-source';

const datasetSchema = z.array(z.record(z.string(), z.unknown()));

/**
 * The one HTTP call the source makes; an axios instance satisfies it
 */
export interface HttpClient {
  post(url: string, data: unknown, config: AxiosRequestConfig): Promise<{ data: unknown }>;
}

export interface ApifySourceOptions {
  country: string;
  /** First retry delay; doubles on each further attempt. */
  baseDelayMs?: number;
  client?: HttpClient;
}

export class ApifyReviewSource implements ReviewSource {
  readonly name = 'apify';
  private config: ApifyConfig;
  private country: string;
  private baseDelayMs: number;
  private client: HttpClient;

  constructor(config: ApifyConfig, options: ApifySourceOptions) {
    this.config = config;
    this.country = options.country;
    this.baseDelayMs = options.baseDelayMs ?? 1000;
    this.client = options.client ?? axios.create({ timeout: config.timeoutMs });
  }

  async fetchReviews(request: ReviewRequest): Promise<RawReview[]> {
    if (!this.config.apiKey) {
      throw new ReviewSourceError(request.appUrl, 0, 'APIFY_API_KEY is not set');
    }

    console.log(`📥 Fetching up to ${request.maxReviews} reviews for ${request.appName} (country=${this.country})`);

    const url = `${this.config.baseUrl}/acts/${this.config.actorId.replace('/', '~')}/run-sync-get-dataset-items`;
    const input = this.buildInput(request);

    for (let attempt = 1; ; attempt++) {
      try {
        const response = await this.client.post(url, input, {
          params: { token: this.config.apiKey },
          timeout: this.config.timeoutMs,
        });
        return this.parseItems(request, response.data);
      } catch (error) {
        if (error instanceof ReviewSourceError) {
          throw error;
        }
        if (!isRetryable(error) || attempt >= this.config.maxAttempts) {
          throw new ReviewSourceError(request.appUrl, attempt, describe(error));
        }

        const delay = this.baseDelayMs * 2 ** (attempt - 1);
        console.warn(`⚠️  Apify request failed (${describe(error)}), retrying in ${delay}ms [${attempt}/${this.config.maxAttempts}]`);
        await sleep(delay);
      }
    }
  }

  buildInput(request: ReviewRequest): Record<string, unknown> {
    const input: Record<string, unknown> = {
      maxItems: request.maxReviews,
      country: this.country,
    };

    const appId = extractAppId(request.appUrl);
    if (appId) {
      input.appIds = [appId];
    } else {
      console.warn(`⚠️  Could not extract App ID from ${request.appUrl}, falling back to URL`);
      input.startUrls = [request.appUrl.trim()];
    }
    return input;
  }

  private parseItems(request: ReviewRequest, data: unknown): RawReview[] {
    const parsed = datasetSchema.safeParse(data);
    if (!parsed.success) {
      throw new ReviewSourceError(request.appUrl, 1, 'actor returned a non-array dataset');
    }

    const reviews: RawReview[] = [];
    for (const item of parsed.data) {
      if (item.error || item.noResults) {
        console.warn(`⚠️  Apify returned error item: ${typeof item.message === 'string' ? item.message : 'Unknown error'}`);
        continue;
      }
      reviews.push(item);
    }

    console.log(`✓ ${request.appName}: ${reviews.length} reviews received`);
    return reviews;
  }
}

/**
 * Numeric App Store id from a URL such as https://apps.apple.com/us/app/name/id123456
 */
export function extractAppId(appUrl: string): string | null {
  const match = /\/id(\d+)/.exec(appUrl);
  return match ? match[1] : null;
}

export function isRetryable(error: unknown): boolean {
  if (!axios.isAxiosError(error)) {
    return false;
  }
  const status = error.response?.status;
  return status === undefined || status === 429 || status >= 500;
}

function describe(error: unknown): string {
  if (axios.isAxiosError(error) && error.response) {
    return `HTTP ${error.response.status}`;
  }
  return errorMessage(error);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
