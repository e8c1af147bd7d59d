import { beforeEach, describe, it, expect, vi } from 'vitest';

const { mockQuery, mockListSites, mockSetCredentials, mockOAuth2, mockSearchconsole } = vi.hoisted(() => {
  const mockQuery = vi.fn();
  const mockListSites = vi.fn();
  const mockSetCredentials = vi.fn();
  return {
    mockQuery,
    mockListSites,
    mockSetCredentials,
    mockOAuth2: vi.fn(function () {
      return { setCredentials: mockSetCredentials };
    }),
    mockSearchconsole: vi.fn(() => ({
      searchanalytics: { query: mockQuery },
      sites: { list: mockListSites }
    }))
  };
});

vi.mock('googleapis', () => ({
  google: {
    auth: { OAuth2: mockOAuth2 },
    searchconsole: mockSearchconsole
  }
}));

import { Logger } from '../../utils/logger';
import { SearchAnalyticsFetchError } from '../errors';
import {
  SEARCH_ANALYTICS_ROW_LIMIT,
  createSearchAnalyticsQuery,
  createSearchConsoleClient,
  listSites
} from '../search-console';

const credentials = {
  clientId: 'test-client-id',
  clientSecret: 'test-secret',
  refreshToken: 'test-refresh-token',
  redirectUri: 'urn:ietf:wg:oauth:2.0:oob'
};

const logger = new Logger({ level: 'error', format: 'json', sink: () => undefined });

const request = {
  siteUrl: 'sc-domain:example.com',
  startDate: '2026-09-16',
  endDate: '2026-10-16',
  dimensions: ['query' as const]
};

describe('Search Console client', () => {
  beforeEach(() => {
    mockQuery.mockReset();
    mockListSites.mockReset();
    mockSetCredentials.mockClear();
    mockOAuth2.mockClear();
    mockSearchconsole.mockClear();
  });

  it('authorizes with the refresh token against the v1 API', () => {
    createSearchConsoleClient(credentials);

    expect(mockOAuth2).toHaveBeenCalledWith('test-client-id', 'test-secret', 'urn:ietf:wg:oauth:2.0:oob');
    expect(mockSetCredentials).toHaveBeenCalledWith({
      refresh_token: 'test-refresh-token',
      scope: 'https://www.googleapis.com/auth/webmasters.readonly'
    });
    expect(mockSearchconsole).toHaveBeenCalledWith(expect.objectContaining({ version: 'v1' }));
  });

  it('requests a single page of up to 25,000 rows', async () => {
    const data = { rows: [{ keys: ['boil eggs'], clicks: 10, impressions: 1000, ctr: 0.01, position: 2.1 }] };
    mockQuery.mockResolvedValue({ data });
    const query = createSearchAnalyticsQuery(createSearchConsoleClient(credentials), logger);

    await expect(query(request)).resolves.toBe(data);
    expect(SEARCH_ANALYTICS_ROW_LIMIT).toBe(25000);
    expect(mockQuery).toHaveBeenCalledTimes(1);
    expect(mockQuery).toHaveBeenCalledWith({
      siteUrl: 'sc-domain:example.com',
      requestBody: {
        startDate: '2026-09-16',
        endDate: '2026-10-16',
        dimensions: ['query'],
        rowLimit: 25000,
        startRow: 0
      }
    });
  });

  it('passes an empty response through', async () => {
    mockQuery.mockResolvedValue({ data: {} });
    const query = createSearchAnalyticsQuery(createSearchConsoleClient(credentials), logger);

    await expect(query(request)).resolves.toEqual({});
  });

  it('turns API failures into fetch errors carrying the HTTP status', async () => {
    mockQuery.mockRejectedValue(Object.assign(new Error('Forbidden'), { response: { status: 403 } }));
    const query = createSearchAnalyticsQuery(createSearchConsoleClient(credentials), logger);

    const error = await query(request).catch((caught: unknown) => caught);

    if (!(error instanceof SearchAnalyticsFetchError)) throw new Error('expected a SearchAnalyticsFetchError');
    expect(error.status).toBe(403);
    expect(error.message).toBe('Site not verified in Search Console or insufficient permissions for this property.');
    expect(mockQuery).toHaveBeenCalledTimes(1);
  });

  it('lists the verified site URLs, skipping entries without one', async () => {
    mockListSites.mockResolvedValue({
      data: { siteEntry: [{ siteUrl: 'https://example.com/' }, { siteUrl: null }, { siteUrl: 'sc-domain:example.org' }] }
    });

    await expect(listSites(createSearchConsoleClient(credentials))).resolves.toEqual([
      'https://example.com/',
      'sc-domain:example.org'
    ]);
  });

  it('returns no sites when the account has none', async () => {
    mockListSites.mockResolvedValue({ data: {} });

    await expect(listSites(createSearchConsoleClient(credentials))).resolves.toEqual([]);
  });
});
