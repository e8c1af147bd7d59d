import type { z } from 'zod';

import type {
  chartsConfigSchema,
  exporterConfigSchema,
  loggingConfigSchema,
  observabilityConfigSchema,
  pathsConfigSchema,
  queryConfigSchema,
  searchDimensionSchema,
  settingsSchema,
  thresholdsConfigSchema
} from './schema';

export type SearchDimension = z.infer<typeof searchDimensionSchema>;
export type QueryConfig = z.infer<typeof queryConfigSchema>;
export type ThresholdsConfig = z.infer<typeof thresholdsConfigSchema>;
export type ChartsConfig = z.infer<typeof chartsConfigSchema>;
export type PathsConfig = z.infer<typeof pathsConfigSchema>;
export type LoggingConfig = z.infer<typeof loggingConfigSchema>;
export type ExporterConfig = z.infer<typeof exporterConfigSchema>;
export type ObservabilityConfig = z.infer<typeof observabilityConfigSchema>;
export type Settings = z.infer<typeof settingsSchema>;

export interface EnvConfig {
  gscClientId?: string;
  gscClientSecret?: string;
  gscRefreshToken?: string;
  gscRedirectUri?: string;
}
