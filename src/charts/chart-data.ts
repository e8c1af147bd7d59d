import type { ChartsConfig } from '../config';
import { recordLabel, type ScoredKeywordRecord } from '../records/types';

export type AxisScale = 'linear' | 'log';

export interface AxisHint {
  field: 'impressions' | 'ctr' | 'zeroClickScore' | 'label';
  label: string;
  scale: AxisScale;
}

export interface NoDataView {
  status: 'no-data';
  title: string;
}

export type ChartView<T> = NoDataView | ({ status: 'ready'; title: string } & T);

export interface ScatterPoint {
  x: number;
  y: number;
  label: string;
}

export interface HistogramBin {
  start: number;
  end: number;
  count: number;
}

export interface RankedBar {
  label: string;
  value: number;
}

export type ScatterView = ChartView<{
  xAxis: AxisHint;
  yAxis: AxisHint;
  points: ScatterPoint[];
}>;

export type DistributionView = ChartView<{
  xAxis: AxisHint;
  /** Scores in record order. */
  values: number[];
  bins: HistogramBin[];
}>;

export type RankedView = ChartView<{
  orientation: 'horizontal';
  xAxis: AxisHint;
  yAxis: AxisHint;
  bars: RankedBar[];
}>;

export interface ChartData {
  scatter: ScatterView;
  distribution: DistributionView;
  ranked: RankedView;
}

function scoreAxis(): AxisHint {
  return { field: 'zeroClickScore', label: 'Zero-Click Score (%)', scale: 'linear' };
}

/**
 * CTR against impressions for every derived record. Impressions span orders
 * of magnitude, so the x axis is log scaled.
 */
export function buildScatterView(records: readonly ScoredKeywordRecord[]): ScatterView {
  const title = 'CTR vs Impressions';
  if (records.length === 0) {
    return { status: 'no-data', title };
  }

  return {
    status: 'ready',
    title,
    xAxis: { field: 'impressions', label: 'Impressions', scale: 'log' },
    yAxis: { field: 'ctr', label: 'Click-Through Rate (%)', scale: 'linear' },
    points: records.map((record) => ({ x: record.impressions, y: record.ctr, label: recordLabel(record) }))
  };
}

/** Equal-width bins over 0-100. Out-of-range scores land in the nearest edge bin; NaN and infinities are skipped. */
export function binScores(values: readonly number[], binCount: number): HistogramBin[] {
  const count = Math.max(1, Math.floor(binCount));
  const width = 100 / count;
  const bins: HistogramBin[] = Array.from({ length: count }, (_, index) => ({
    start: index * width,
    end: (index + 1) * width,
    count: 0
  }));

  for (const value of values) {
    if (!Number.isFinite(value)) continue;
    const index = Math.min(count - 1, Math.max(0, Math.floor(value / width)));
    bins[index].count += 1;
  }

  return bins;
}

export function buildDistributionView(records: readonly ScoredKeywordRecord[], binCount: number): DistributionView {
  const title = 'Distribution of Zero-Click Scores';
  if (records.length === 0) {
    return { status: 'no-data', title };
  }

  const values = records.map((record) => record.zeroClickScore);
  return {
    status: 'ready',
    title,
    xAxis: scoreAxis(),
    values,
    bins: binScores(values, binCount)
  };
}

/** Takes the first `topN` records as given; expects them already filtered and sorted. */
export function buildRankedView(filtered: readonly ScoredKeywordRecord[], topN: number): RankedView {
  const title = `Top ${topN} Zero-Click Keywords`;
  if (filtered.length === 0) {
    return { status: 'no-data', title };
  }

  return {
    status: 'ready',
    title,
    orientation: 'horizontal',
    xAxis: scoreAxis(),
    yAxis: { field: 'label', label: 'Query', scale: 'linear' },
    bars: filtered.slice(0, topN).map((record) => ({ label: recordLabel(record), value: record.zeroClickScore }))
  };
}

export function buildChartData(
  derived: readonly ScoredKeywordRecord[],
  filtered: readonly ScoredKeywordRecord[],
  config: ChartsConfig
): ChartData {
  return {
    scatter: buildScatterView(derived),
    distribution: buildDistributionView(derived, config.distribution_bins),
    ranked: buildRankedView(filtered, config.top_n)
  };
}
