import { google, type searchconsole_v1 } from 'googleapis';

import type { SearchConsoleCredentials } from '../config';
import { Logger } from '../utils/logger';
import { SearchAnalyticsFetchError } from './errors';
import type { SearchAnalyticsQueryFn } from './types';

export const SEARCH_CONSOLE_SCOPES = ['https://www.googleapis.com/auth/webmasters.readonly'];

/** Largest page the Search Analytics API returns; anything beyond it is silently dropped. */
export const SEARCH_ANALYTICS_ROW_LIMIT = 25000;

export type SearchConsoleClient = searchconsole_v1.Searchconsole;

export function createSearchConsoleClient(credentials: SearchConsoleCredentials): SearchConsoleClient {
  const auth = new google.auth.OAuth2(credentials.clientId, credentials.clientSecret, credentials.redirectUri);
  auth.setCredentials({ refresh_token: credentials.refreshToken, scope: SEARCH_CONSOLE_SCOPES.join(' ') });
  return google.searchconsole({ version: 'v1', auth });
}

export function createSearchAnalyticsQuery(client: SearchConsoleClient, logger: Logger): SearchAnalyticsQueryFn {
  return async (request) => {
    const requestBody: searchconsole_v1.Schema$SearchAnalyticsQueryRequest = {
      startDate: request.startDate,
      endDate: request.endDate,
      dimensions: [...request.dimensions],
      rowLimit: SEARCH_ANALYTICS_ROW_LIMIT,
      startRow: 0
    };

    logger.debug('Querying Search Console search analytics', {
      siteUrl: request.siteUrl,
      startDate: request.startDate,
      endDate: request.endDate,
      dimensions: request.dimensions
    });

    const startedAt = Date.now();
    try {
      const response = await client.searchanalytics.query({ siteUrl: request.siteUrl, requestBody });
      logger.debug('Search Console query complete', {
        rows: response.data.rows?.length ?? 0,
        durationMs: Date.now() - startedAt
      });
      return response.data;
    } catch (error) {
      throw SearchAnalyticsFetchError.fromUnknown(error);
    }
  };
}

export async function listSites(client: SearchConsoleClient): Promise<string[]> {
  try {
    const response = await client.sites.list();
    return response.data.siteEntry?.flatMap((entry) => (entry.siteUrl ? [entry.siteUrl] : [])) ?? [];
  } catch (error) {
    throw SearchAnalyticsFetchError.fromUnknown(error);
  }
}
