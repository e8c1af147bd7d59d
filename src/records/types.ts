/**
 * One row of search performance for a single keyword, or a tuple of
 * dimension values, over the queried date range.
 */
export interface KeywordRecord {
  /** Dimension values in the order the dimensions were requested. */
  keys: string[];
  clicks: number;
  impressions: number;
  /** Click-through rate as a percentage, 0-100. */
  ctr: number;
  /** Average ranking position, 1 is the top result. */
  position: number;
}

export interface ScoredKeywordRecord extends KeywordRecord {
  /** Share of impressions that produced no click, as a percentage. */
  zeroClickScore: number;
}

export const KEY_SEPARATOR = ' | ';

export function recordLabel(record: Pick<KeywordRecord, 'keys'>): string {
  return record.keys.length === 1 ? record.keys[0] : record.keys.join(KEY_SEPARATOR);
}
