import { z } from 'zod';

const isoDate = z.string().date('expected a YYYY-MM-DD date');

export const searchDimensionSchema = z.enum(['query', 'page', 'country', 'device', 'date', 'searchAppearance']);

export const queryConfigSchema = z.object({
  site_url: z.string().default(''),
  dimensions: z.array(searchDimensionSchema).min(1).default(['query']),
  lookback_days: z.number().int().positive().default(30),
  lag_days: z.number().int().nonnegative().default(3),
  start_date: isoDate.optional(),
  end_date: isoDate.optional()
});

// Thresholds are only type-checked; out-of-range values are the caller's call.
export const thresholdsConfigSchema = z.object({
  min_impressions: z.number().default(5000),
  max_ctr: z.number().default(1),
  min_zero_click_score: z.number().default(50)
});

export const chartsConfigSchema = z.object({
  top_n: z.number().int().positive().default(20),
  distribution_bins: z.number().int().positive().default(10)
});

export const pathsConfigSchema = z.object({
  outputs_dir: z.string().min(1).default('outputs')
});

export const loggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  format: z.enum(['json', 'pretty']).default('pretty')
});

export const exporterConfigSchema = z.object({
  enabled: z.boolean().default(true),
  output_basename: z.string().min(1).default('zero_click_keywords'),
  write_charts: z.boolean().default(true)
});

export const observabilityConfigSchema = z.object({
  summary_top_n: z.number().int().nonnegative().default(10)
});

export const settingsSchema = z.object({
  query: queryConfigSchema.default({}),
  thresholds: thresholdsConfigSchema.default({}),
  charts: chartsConfigSchema.default({}),
  paths: pathsConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
  exporter: exporterConfigSchema.default({}),
  observability: observabilityConfigSchema.default({})
});
