import { mkdirSync, writeFileSync } from 'node:fs';
import { resolve } from 'node:path';

import type { ChartData } from '../charts/chart-data';
import type { ExporterConfig } from '../config';
import { recordLabel, type ScoredKeywordRecord } from '../records/types';
import { formatDate } from '../utils/dates';
import { Logger } from '../utils/logger';

interface CsvExporterDependencies {
  logger: Logger;
  config: ExporterConfig;
  outputDir: string;
}

const HEADER = ['keyword', 'clicks', 'impressions', 'ctr', 'position', 'zero_click_score'];

function formatNumber(value: number, digits = 2): string {
  if (!Number.isFinite(value)) {
    return '';
  }
  return value.toFixed(digits);
}

export function escapeCsv(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function toCsv(records: readonly ScoredKeywordRecord[]): string {
  const rows = [HEADER.join(',')];

  for (const record of records) {
    rows.push(
      [
        escapeCsv(recordLabel(record)),
        String(record.clicks),
        String(record.impressions),
        formatNumber(record.ctr),
        formatNumber(record.position),
        formatNumber(record.zeroClickScore)
      ].join(',')
    );
  }

  return `${rows.join('\n')}\n`;
}

export class CsvExporter {
  constructor(private readonly deps: CsvExporterDependencies) {}

  private outputPath(suffix: string, extension: string, now: Date): string {
    return resolve(this.deps.outputDir, `${this.deps.config.output_basename}${suffix}_${formatDate(now)}.${extension}`);
  }

  export(records: readonly ScoredKeywordRecord[], now: Date = new Date()): string | null {
    if (!this.deps.config.enabled || records.length === 0) {
      return null;
    }

    mkdirSync(this.deps.outputDir, { recursive: true });
    const outputPath = this.outputPath('', 'csv', now);
    writeFileSync(outputPath, toCsv(records), 'utf-8');

    this.deps.logger.info('Exported zero-click keywords CSV', {
      outputPath,
      rows: records.length
    });

    return outputPath;
  }

  /** Writes the chart views as JSON for an external renderer. */
  exportCharts(charts: ChartData, now: Date = new Date()): string | null {
    if (!this.deps.config.enabled || !this.deps.config.write_charts) {
      return null;
    }

    mkdirSync(this.deps.outputDir, { recursive: true });
    const outputPath = this.outputPath('_charts', 'json', now);
    writeFileSync(outputPath, `${JSON.stringify(charts, null, 2)}\n`, 'utf-8');

    this.deps.logger.info('Exported chart data', {
      outputPath,
      scatter: charts.scatter.status,
      distribution: charts.distribution.status,
      ranked: charts.ranked.status
    });

    return outputPath;
  }
}
