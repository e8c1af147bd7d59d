export { loadSettings, clearSettingsCache, defaultSettingsPath } from './settings';
export { loadEnvConfig, requireSearchConsoleCredentials } from './env';
export { ConfigurationError } from './errors';
export type { SearchConsoleCredentials } from './env';
export type {
  Settings,
  SearchDimension,
  QueryConfig,
  ThresholdsConfig,
  ChartsConfig,
  PathsConfig,
  LoggingConfig,
  ExporterConfig,
  ObservabilityConfig,
  EnvConfig
} from './types';
