import { buildChartData, type ChartData } from '../charts/chart-data';
import type { ChartsConfig, ThresholdsConfig } from '../config';
import { filterZeroClickKeywords } from '../filtering/zero-click-filter';
import { SearchAnalyticsFetchError } from '../gsc/errors';
import type { SearchAnalyticsPage, SearchAnalyticsQueryFn, SearchAnalyticsRequest } from '../gsc/types';
import { normalizeSearchAnalyticsRows } from '../normalization/row-normalizer';
import type { ScoredKeywordRecord } from '../records/types';
import { deriveZeroClickScores } from '../scoring/zero-click';
import { isOrderedRange } from '../utils/dates';
import { Logger } from '../utils/logger';

interface ZeroClickPipelineDependencies {
  logger: Logger;
  query: SearchAnalyticsQueryFn;
  thresholds: ThresholdsConfig;
  charts: ChartsConfig;
}

export interface PipelineResult {
  /** Every fetched keyword with its zero-click score, in API row order. */
  derived: ScoredKeywordRecord[];
  /** Keywords passing the thresholds, highest score first. */
  filtered: ScoredKeywordRecord[];
  charts: ChartData;
}

export type PipelineOutcome =
  | ({ status: 'ok'; request: SearchAnalyticsRequest } & PipelineResult)
  | { status: 'fetch-failed'; request: SearchAnalyticsRequest; error: SearchAnalyticsFetchError };

/** Normalize, score, filter and shape one page of rows. */
export function processSearchAnalyticsPage(
  page: SearchAnalyticsPage,
  thresholds: ThresholdsConfig,
  charts: ChartsConfig
): PipelineResult {
  const derived = deriveZeroClickScores(normalizeSearchAnalyticsRows(page));
  const filtered = filterZeroClickKeywords(derived, thresholds);
  return {
    derived,
    filtered,
    charts: buildChartData(derived, filtered, charts)
  };
}

export class ZeroClickPipeline {
  private readonly logger: Logger;

  constructor(private readonly deps: ZeroClickPipelineDependencies) {
    this.logger = deps.logger.child('pipeline');
  }

  async run(request: SearchAnalyticsRequest): Promise<PipelineOutcome> {
    if (!isOrderedRange(request)) {
      this.logger.warn('Start date is not before end date; skipping fetch', {
        startDate: request.startDate,
        endDate: request.endDate
      });
      return { status: 'ok', request, ...processSearchAnalyticsPage({}, this.deps.thresholds, this.deps.charts) };
    }

    const fetchStart = Date.now();
    let page: SearchAnalyticsPage;
    try {
      page = await this.deps.query(request);
    } catch (error) {
      const fetchError = SearchAnalyticsFetchError.fromUnknown(error);
      this.logger.error('Search analytics fetch failed', {
        siteUrl: request.siteUrl,
        status: fetchError.status ?? null,
        error: fetchError.message
      });
      return { status: 'fetch-failed', request, error: fetchError };
    }

    const rowCount = page.rows?.length ?? 0;
    this.logger.info('Fetched search analytics rows', {
      siteUrl: request.siteUrl,
      rows: rowCount,
      durationMs: Date.now() - fetchStart
    });
    if (rowCount === 0) {
      this.logger.warn('No data found for the selected date range', {
        startDate: request.startDate,
        endDate: request.endDate
      });
    }

    const result = processSearchAnalyticsPage(page, this.deps.thresholds, this.deps.charts);

    this.logger.info('Zero-click keyword filter complete', {
      keywords: result.derived.length,
      matched: result.filtered.length,
      thresholds: this.deps.thresholds
    });

    return { status: 'ok', request, ...result };
  }
}
