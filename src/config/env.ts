/**
 * Runtime configuration
 * Everything a deployment can change comes from environment variables;
 * call sites load .env.local through dotenv before calling loadConfig().
 */

import { DEFAULT_KEYWORDS } from './static-config.js';

export interface AppConfig {
  apiBase: string;
  keywords: string[];
  // Undefined means poll until the job finishes or fails
  pollDeadlineMs?: number;
  // Applied to runs started by HTTP requests when pollDeadlineMs is unset
  httpPollDeadlineMs: number;
  failFast: boolean;
  outputPath: string;
  port: number;
  adminApiKey?: string;
}

export const DEFAULT_API_BASE = 'https://api.usaspending.gov/api/v2';
export const DEFAULT_HTTP_POLL_DEADLINE_SECONDS = 600;

export function parseKeywordList(value: string | undefined, defaultValue: string[] = []): string[] {
  if (!value) return defaultValue;
  return value.split(',').map(s => s.trim()).filter(s => s.length > 0);
}

function parseBoolean(value: string | undefined, defaultValue: boolean = false): boolean {
  if (!value) return defaultValue;
  return value.trim().toLowerCase() === 'true';
}

function parsePositiveNumber(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) || parsed <= 0 ? undefined : parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const deadlineSeconds = parsePositiveNumber(env.POLL_DEADLINE_SECONDS);

  return {
    apiBase: (env.USASPENDING_API_BASE || DEFAULT_API_BASE).replace(/\/+$/, ''),
    keywords: parseKeywordList(env.AWARD_KEYWORDS, DEFAULT_KEYWORDS),
    pollDeadlineMs: deadlineSeconds === undefined ? undefined : deadlineSeconds * 1000,
    httpPollDeadlineMs: (parsePositiveNumber(env.HTTP_POLL_DEADLINE_SECONDS) ?? DEFAULT_HTTP_POLL_DEADLINE_SECONDS) * 1000,
    failFast: parseBoolean(env.AWARDS_FAIL_FAST),
    outputPath: env.AWARDS_OUTPUT_PATH || 'data/awards.xlsx',
    port: parsePositiveNumber(env.PORT) ?? 3001,
    adminApiKey: env.ADMIN_API_KEY || undefined,
  };
}
