export {
  createSearchConsoleClient,
  createSearchAnalyticsQuery,
  listSites,
  SEARCH_ANALYTICS_ROW_LIMIT,
  SEARCH_CONSOLE_SCOPES
} from './search-console';
export { SearchAnalyticsFetchError } from './errors';
export type { SearchConsoleClient } from './search-console';
export type {
  RawSearchAnalyticsRow,
  SearchAnalyticsPage,
  SearchAnalyticsRequest,
  SearchAnalyticsQueryFn
} from './types';
