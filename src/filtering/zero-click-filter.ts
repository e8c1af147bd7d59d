import type { ThresholdsConfig } from '../config';
import type { ScoredKeywordRecord } from '../records/types';

export function matchesThresholds(record: ScoredKeywordRecord, thresholds: ThresholdsConfig): boolean {
  return (
    record.impressions >= thresholds.min_impressions &&
    record.ctr <= thresholds.max_ctr &&
    record.zeroClickScore >= thresholds.min_zero_click_score
  );
}

/**
 * Keeps the records that pass every threshold, highest zero-click score first.
 * Equal scores keep their input order. Thresholds are applied as given.
 */
export function filterZeroClickKeywords(
  records: readonly ScoredKeywordRecord[],
  thresholds: ThresholdsConfig
): ScoredKeywordRecord[] {
  return records
    .filter((record) => matchesThresholds(record, thresholds))
    .sort((a, b) => b.zeroClickScore - a.zeroClickScore);
}
