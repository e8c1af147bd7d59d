import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse } from 'yaml';

import { ConfigurationError } from './errors';
import { settingsSchema } from './schema';
import type { Settings } from './types';

let cached: { path: string; settings: Settings } | null = null;

function describeIssues(issues: { path: (string | number)[]; message: string }[]): string {
  return issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');
}

export function defaultSettingsPath(): string {
  return resolve(process.cwd(), 'configs', 'settings.yaml');
}

export function loadSettings(configPath: string = defaultSettingsPath()): Settings {
  if (cached && cached.path === configPath) {
    return cached.settings;
  }

  let fileContents: string;
  try {
    fileContents = readFileSync(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Unable to read settings file at ${configPath}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = parse(fileContents);
  } catch (error) {
    throw new ConfigurationError(`Settings file at ${configPath} is not valid YAML`, { cause: error });
  }

  const result = settingsSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigurationError(`Invalid settings in ${configPath}: ${describeIssues(result.error.issues)}`);
  }

  cached = { path: configPath, settings: result.data };
  return result.data;
}

export function clearSettingsCache(): void {
  cached = null;
}
