import { recordLabel, type ScoredKeywordRecord } from '../records/types';

function sum(values: number[]): number {
  return values.reduce((acc, value) => acc + value, 0);
}

function median(values: number[]): number | null {
  if (values.length === 0) {
    return null;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

export interface RunSummary {
  keywords: number;
  matched: number;
  totalClicks: number;
  totalImpressions: number;
  /** Clicks over impressions across all keywords, as a percentage. */
  overallCtr: number;
  medianZeroClickScore: number | null;
  meanZeroClickScore: number | null;
  topKeywords: string[];
}

export function summarizeRun(
  derived: readonly ScoredKeywordRecord[],
  filtered: readonly ScoredKeywordRecord[],
  topN: number
): RunSummary {
  const totalClicks = sum(derived.map((record) => record.clicks));
  const totalImpressions = sum(derived.map((record) => record.impressions));
  const scores = derived.map((record) => record.zeroClickScore);

  return {
    keywords: derived.length,
    matched: filtered.length,
    totalClicks,
    totalImpressions,
    overallCtr: totalImpressions > 0 ? (totalClicks * 100) / totalImpressions : 0,
    medianZeroClickScore: median(scores),
    meanZeroClickScore: scores.length > 0 ? sum(scores) / scores.length : null,
    topKeywords: filtered.slice(0, topN).map((record, index) => `${index + 1}. ${recordLabel(record)}`)
  };
}
