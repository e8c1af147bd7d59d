import { describe, it, expect, vi } from 'vitest';

import type { ChartsConfig, ThresholdsConfig } from '../../config';
import { SearchAnalyticsFetchError } from '../../gsc/errors';
import type { SearchAnalyticsPage, SearchAnalyticsQueryFn, SearchAnalyticsRequest } from '../../gsc/types';
import { Logger, type LogLevel } from '../../utils/logger';
import { ZeroClickPipeline, processSearchAnalyticsPage } from '../zero-click-pipeline';

const thresholds: ThresholdsConfig = { min_impressions: 500, max_ctr: 2.0, min_zero_click_score: 90 };
const charts: ChartsConfig = { top_n: 20, distribution_bins: 10 };

const request: SearchAnalyticsRequest = {
  siteUrl: 'https://example.com/',
  startDate: '2026-09-16',
  endDate: '2026-10-16',
  dimensions: ['query']
};

const page: SearchAnalyticsPage = {
  rows: [
    { keys: ['boil eggs'], clicks: 10, impressions: 1000, ctr: 0.01, position: 2.1 },
    { keys: ['egg timer'], clicks: 5, impressions: 100, ctr: 0.05, position: 5.3 },
    { keys: ['soft boiled eggs'], clicks: 0, impressions: 800, ctr: 0, position: 7.9 }
  ]
};

function createLogger() {
  const lines: { level: LogLevel; line: string }[] = [];
  const logger = new Logger({
    level: 'debug',
    format: 'json',
    sink: (line, level) => lines.push({ level, line })
  });
  return { logger, lines };
}

function createPipeline(query: SearchAnalyticsQueryFn) {
  const { logger, lines } = createLogger();
  return { pipeline: new ZeroClickPipeline({ logger, query, thresholds, charts }), lines };
}

describe('processSearchAnalyticsPage', () => {
  it('normalizes, scores and filters a page of rows', () => {
    const result = processSearchAnalyticsPage(page, thresholds, charts);

    expect(result.derived.map((record) => record.zeroClickScore)).toEqual([99, 95, 100]);
    expect(result.derived[0].ctr).toBeCloseTo(1.0, 10);
    expect(result.filtered.map((record) => record.keys[0])).toEqual(['soft boiled eggs', 'boil eggs']);
  });

  it('produces well-formed empty outputs for an empty page', () => {
    const result = processSearchAnalyticsPage({}, thresholds, charts);

    expect(result.derived).toEqual([]);
    expect(result.filtered).toEqual([]);
    expect(result.charts).toEqual({
      scatter: { status: 'no-data', title: 'CTR vs Impressions' },
      distribution: { status: 'no-data', title: 'Distribution of Zero-Click Scores' },
      ranked: { status: 'no-data', title: 'Top 20 Zero-Click Keywords' }
    });
  });
});

describe('ZeroClickPipeline', () => {
  it('fetches once and returns every stage of the run', async () => {
    const query = vi.fn<SearchAnalyticsQueryFn>().mockResolvedValue(page);
    const { pipeline } = createPipeline(query);

    const outcome = await pipeline.run(request);

    expect(query).toHaveBeenCalledTimes(1);
    expect(query).toHaveBeenCalledWith(request);
    if (outcome.status !== 'ok') throw new Error('expected a successful run');
    expect(outcome.request).toBe(request);
    expect(outcome.derived).toHaveLength(3);
    expect(outcome.filtered.map((record) => record.keys[0])).toEqual(['soft boiled eggs', 'boil eggs']);
    expect(outcome.charts.ranked.status).toBe('ready');
  });

  it('treats a page without rows as an empty success and warns about it', async () => {
    const { pipeline, lines } = createPipeline(vi.fn<SearchAnalyticsQueryFn>().mockResolvedValue({}));

    const outcome = await pipeline.run(request);

    if (outcome.status !== 'ok') throw new Error('expected a successful run');
    expect(outcome.derived).toEqual([]);
    expect(outcome.filtered).toEqual([]);
    expect(outcome.charts.ranked.status).toBe('no-data');
    const warnings = lines.filter((entry) => entry.level === 'warn').map((entry) => JSON.parse(entry.line).message);
    expect(warnings).toEqual(['No data found for the selected date range']);
  });

  it('reports a failed fetch instead of throwing', async () => {
    const failure = new SearchAnalyticsFetchError('quota exceeded', { status: 429 });
    const query = vi.fn<SearchAnalyticsQueryFn>().mockRejectedValue(failure);
    const { pipeline, lines } = createPipeline(query);

    const outcome = await pipeline.run(request);

    expect(outcome).toEqual({ status: 'fetch-failed', request, error: failure });
    expect(query).toHaveBeenCalledTimes(1);
    const errors = lines.filter((entry) => entry.level === 'error').map((entry) => JSON.parse(entry.line));
    expect(errors).toHaveLength(1);
    expect(errors[0].scope).toBe('pipeline');
    expect(errors[0].metadata).toEqual({ siteUrl: 'https://example.com/', status: 429, error: 'quota exceeded' });
  });

  it('wraps any other rejection in a fetch error', async () => {
    const { pipeline } = createPipeline(vi.fn<SearchAnalyticsQueryFn>().mockRejectedValue(new Error('socket hang up')));

    const outcome = await pipeline.run(request);

    if (outcome.status !== 'fetch-failed') throw new Error('expected a failed run');
    expect(outcome.error).toBeInstanceOf(SearchAnalyticsFetchError);
    expect(outcome.error.message).toBe('Error fetching Search Console data: socket hang up');
  });

  it('returns an empty success without fetching when the date range is inverted', async () => {
    const query = vi.fn<SearchAnalyticsQueryFn>().mockResolvedValue(page);
    const { pipeline } = createPipeline(query);

    const outcome = await pipeline.run({ ...request, startDate: '2026-10-16', endDate: '2026-09-16' });

    expect(query).not.toHaveBeenCalled();
    if (outcome.status !== 'ok') throw new Error('expected a successful run');
    expect(outcome.derived).toEqual([]);
    expect(outcome.charts.scatter.status).toBe('no-data');
  });
});
