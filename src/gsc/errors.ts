function extractStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }

  // gaxios puts the HTTP status on error.response.status; error.code is a string for network errors
  if ('response' in error) {
    const { response } = error;
    if (typeof response === 'object' && response !== null && 'status' in response && typeof response.status === 'number') {
      return response.status;
    }
  }

  if ('code' in error && typeof error.code === 'number') {
    return error.code;
  }

  return undefined;
}

function describeStatus(status: number | undefined, fallback: string): string {
  if (status === 401) {
    return 'Search Console authentication failed. Re-authorize and refresh GSC_REFRESH_TOKEN.';
  }
  if (status === 403) {
    return 'Site not verified in Search Console or insufficient permissions for this property.';
  }
  if (status === 429) {
    return 'Search Console quota exceeded. Try again later.';
  }
  return fallback;
}

export class SearchAnalyticsFetchError extends Error {
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'SearchAnalyticsFetchError';
    this.status = options.status;
  }

  static fromUnknown(error: unknown): SearchAnalyticsFetchError {
    if (error instanceof SearchAnalyticsFetchError) {
      return error;
    }
    const status = extractStatus(error);
    const fallback = `Error fetching Search Console data: ${error instanceof Error ? error.message : String(error)}`;
    return new SearchAnalyticsFetchError(describeStatus(status, fallback), { status, cause: error });
  }
}
