import type { KeywordRecord, ScoredKeywordRecord } from '../records/types';

/**
 * Percentage of impressions that did not turn into a click. Keywords with no
 * impressions score 0 rather than being treated as fully zero-click.
 */
export function zeroClickScore(clicks: number, impressions: number): number {
  if (impressions > 0) {
    return ((impressions - clicks) * 100) / impressions;
  }
  return 0;
}

export function deriveZeroClickScores(records: readonly KeywordRecord[]): ScoredKeywordRecord[] {
  return records.map((record) => ({
    ...record,
    keys: [...record.keys],
    zeroClickScore: zeroClickScore(record.clicks, record.impressions)
  }));
}
