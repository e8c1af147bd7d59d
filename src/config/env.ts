import { config as loadEnv } from 'dotenv';
import { resolve } from 'node:path';

import { ConfigurationError } from './errors';
import type { EnvConfig } from './types';

let cachedEnv: EnvConfig | null = null;

function readVariable(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

export function loadEnvConfig(): EnvConfig {
  if (cachedEnv) {
    return cachedEnv;
  }

  loadEnv({ path: resolve(process.cwd(), '.env') });

  cachedEnv = {
    gscClientId: readVariable('GSC_CLIENT_ID'),
    gscClientSecret: readVariable('GSC_CLIENT_SECRET'),
    gscRefreshToken: readVariable('GSC_REFRESH_TOKEN'),
    gscRedirectUri: readVariable('GSC_REDIRECT_URI')
  };

  return cachedEnv;
}

export interface SearchConsoleCredentials {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
  redirectUri?: string;
}

export function requireSearchConsoleCredentials(env: EnvConfig): SearchConsoleCredentials {
  const missing: string[] = [];
  if (!env.gscClientId) missing.push('GSC_CLIENT_ID');
  if (!env.gscClientSecret) missing.push('GSC_CLIENT_SECRET');
  if (!env.gscRefreshToken) missing.push('GSC_REFRESH_TOKEN');

  if (!env.gscClientId || !env.gscClientSecret || !env.gscRefreshToken) {
    throw new ConfigurationError(`Missing Search Console credentials: ${missing.join(', ')}`);
  }

  return {
    clientId: env.gscClientId,
    clientSecret: env.gscClientSecret,
    refreshToken: env.gscRefreshToken,
    redirectUri: env.gscRedirectUri
  };
}
