#!/usr/bin/env node
import { mkdirSync } from 'node:fs';
import { resolve } from 'node:path';

import { loadEnvConfig, loadSettings, requireSearchConsoleCredentials } from './config';
import { CsvExporter } from './export';
import { createSearchAnalyticsQuery, createSearchConsoleClient, listSites } from './gsc';
import { ZeroClickPipeline, summarizeRun } from './pipeline';
import { resolveDateRange } from './utils/dates';
import { Logger, describeError } from './utils/logger';

async function bootstrap() {
  const settings = loadSettings();
  const env = loadEnvConfig();

  const outputsDir = resolve(process.cwd(), settings.paths.outputs_dir);
  mkdirSync(outputsDir, { recursive: true });

  const logger = new Logger({ level: settings.logging.level, format: settings.logging.format });

  try {
    const client = createSearchConsoleClient(requireSearchConsoleCredentials(env));

    if (!settings.query.site_url) {
      const sites = await listSites(client);
      logger.warn('No query.site_url configured; pick one of the available properties', { sites });
      return;
    }

    const range = resolveDateRange(settings.query);
    logger.info('Zero-click keyword run starting', {
      siteUrl: settings.query.site_url,
      dimensions: settings.query.dimensions,
      ...range,
      thresholds: settings.thresholds
    });

    const pipeline = new ZeroClickPipeline({
      logger,
      query: createSearchAnalyticsQuery(client, logger.child('gsc')),
      thresholds: settings.thresholds,
      charts: settings.charts
    });

    const outcome = await pipeline.run({
      siteUrl: settings.query.site_url,
      dimensions: settings.query.dimensions,
      ...range
    });

    if (outcome.status === 'fetch-failed') {
      logger.error('Run finished without data', { error: outcome.error.message });
      process.exitCode = 1;
      return;
    }

    logger.info('Run summary', { ...summarizeRun(outcome.derived, outcome.filtered, settings.observability.summary_top_n) });

    const exporter = new CsvExporter({
      logger,
      config: settings.exporter,
      outputDir: outputsDir
    });

    const csvPath = exporter.export(outcome.filtered);
    if (!csvPath) {
      logger.info('CSV export skipped', {
        enabled: settings.exporter.enabled,
        matched: outcome.filtered.length
      });
    }
    exporter.exportCharts(outcome.charts);
  } catch (error) {
    logger.error('Zero-click run failed', { error: describeError(error) });
    throw error;
  }
}

bootstrap().catch((error) => {
  process.stderr.write(`Bootstrap failed: ${describeError(error)}\n`);
  process.exitCode = 1;
});
