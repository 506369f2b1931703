import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AxiosError, AxiosHeaders } from 'axios';
import { ApifyReviewSource, extractAppId, isRetryable } from './apify-review-source';
import type { ApifyConfig } from '../config';
import { ReviewSourceError } from '../errors';

const config: ApifyConfig = {
  apiKey: 'test-token',
  actorId: 'agents/appstore-reviews',
  baseUrl: 'https://apify.test/v2',
  timeoutMs: 1000,
  maxAttempts: 3,
};

const request = { appName: 'Forest', appUrl: 'https://apps.apple.com/us/app/forest/id1000000001', maxReviews: 50 };

function httpError(status: number): AxiosError {
  const headers = new AxiosHeaders();
  return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', { headers }, undefined, {
    data: {},
    status,
    statusText: 'error',
    headers: {},
    config: { headers },
  });
}

describe('ApifyReviewSource', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('posts the actor input and returns dataset items', async () => {
    const post = vi.fn().mockResolvedValue({ data: [{ id: '1', text: 'Crash' }, { id: '2', text: 'Fine' }] });
    const source = new ApifyReviewSource(config, { country: 'us', client: { post } });

    const reviews = await source.fetchReviews(request);

    expect(reviews).toEqual([{ id: '1', text: 'Crash' }, { id: '2', text: 'Fine' }]);
    expect(post).toHaveBeenCalledWith(
      'https://apify.test/v2/acts/agents~appstore-reviews/run-sync-get-dataset-items',
      { maxItems: 50, country: 'us', appIds: ['1000000001'] },
      { params: { token: 'test-token' }, timeout: 1000 }
    );
  });

  it('skips error items', async () => {
    const post = vi.fn().mockResolvedValue({
      data: [{ error: true, message: 'blocked' }, { noResults: true }, { id: '3', text: 'Slow' }],
    });
    const source = new ApifyReviewSource(config, { country: 'us', client: { post } });

    expect(await source.fetchReviews(request)).toEqual([{ id: '3', text: 'Slow' }]);
  });

  it('retries server errors and network failures', async () => {
    const post = vi
      .fn()
      .mockRejectedValueOnce(httpError(503))
      .mockRejectedValueOnce(new AxiosError('socket hang up', 'ECONNRESET'))
      .mockResolvedValueOnce({ data: [{ id: '1' }] });
    const source = new ApifyReviewSource(config, { country: 'us', client: { post }, baseDelayMs: 0 });

    expect(await source.fetchReviews(request)).toEqual([{ id: '1' }]);
    expect(post).toHaveBeenCalledTimes(3);
  });

  it('gives up after the last attempt', async () => {
    const post = vi.fn().mockRejectedValue(httpError(429));
    const source = new ApifyReviewSource(config, { country: 'us', client: { post }, baseDelayMs: 0 });

    await expect(source.fetchReviews(request)).rejects.toThrow(
      'Review fetch failed for https://apps.apple.com/us/app/forest/id1000000001 after 3 attempt(s): HTTP 429'
    );
    expect(post).toHaveBeenCalledTimes(3);
  });

  it('fails immediately on client errors', async () => {
    const post = vi.fn().mockRejectedValue(httpError(401));
    const source = new ApifyReviewSource(config, { country: 'us', client: { post }, baseDelayMs: 0 });

    await expect(source.fetchReviews(request)).rejects.toBeInstanceOf(ReviewSourceError);
    expect(post).toHaveBeenCalledTimes(1);
  });

  it('rejects a dataset that is not an array', async () => {
    const post = vi.fn().mockResolvedValue({ data: { message: 'actor failed' } });
    const source = new ApifyReviewSource(config, { country: 'us', client: { post } });

    await expect(source.fetchReviews(request)).rejects.toThrow(/non-array dataset/);
  });

  it('refuses to run without an API key', async () => {
    const post = vi.fn();
    const source = new ApifyReviewSource({ ...config, apiKey: '' }, { country: 'us', client: { post } });

    await expect(source.fetchReviews(request)).rejects.toThrow(/APIFY_API_KEY is not set/);
    expect(post).not.toHaveBeenCalled();
  });

  it('falls back to start URLs without an app id', () => {
    const source = new ApifyReviewSource(config, { country: 'gb', client: { post: vi.fn() } });
    expect(source.buildInput({ ...request, appUrl: ' https://apps.apple.com/gb/app/forest ' })).toEqual({
      maxItems: 50,
      country: 'gb',
      startUrls: ['https://apps.apple.com/gb/app/forest'],
    });
  });
});

describe('extractAppId', () => {
  it('reads the numeric id', () => {
    expect(extractAppId('https://apps.apple.com/us/app/opal/id1000000002?l=en')).toBe('1000000002');
    expect(extractAppId('https://example.test/app')).toBeNull();
  });
});

describe('isRetryable', () => {
  it('retries network errors, 429 and 5xx only', () => {
    expect(isRetryable(new AxiosError('timeout', 'ECONNABORTED'))).toBe(true);
    expect(isRetryable(httpError(429))).toBe(true);
    expect(isRetryable(httpError(500))).toBe(true);
    expect(isRetryable(httpError(404))).toBe(false);
    expect(isRetryable(new Error('boom'))).toBe(false);
  });
});
