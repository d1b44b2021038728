/**
 * Award pipeline
 * Fetches each award-type group in turn, stitches the rows together and
 * runs the classifier over the combined table.
 */

import { classifyAndFilter } from '../analyzer/award-classifier.js';
import type { AppConfig } from '../config/env.js';
import type { StaticConfig } from '../config/static-config.js';
import { fetchAndExtract } from '../scraper/archive-retriever.js';
import { AwardFetchError, RunAbortedError } from '../scraper/errors.js';
import { defaultFetch } from '../scraper/http.js';
import { sleep, submitAndWait } from '../scraper/usaspending-download.js';
import type { DownloadDeps, PollOptions } from '../scraper/usaspending-download.js';
import type {
  AwardRow,
  AwardRunReport,
  AwardTypeGroup,
  GroupOutcome,
} from '../types/index.js';
import { describeError } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';

export interface PipelineOptions {
  config: StaticConfig;
  // Overrides config.keywords for both the request and the description filter
  keywords?: readonly string[];
  failFast?: boolean;
  pollDeadlineMs?: number;
  signal?: AbortSignal;
}

/**
 * Keep exactly the allowlisted columns, in allowlist order; missing ones become ''.
 */
export function restrictColumns(rows: readonly AwardRow[], columns: readonly string[]): AwardRow[] {
  return rows.map(row => {
    const restricted: AwardRow = {};
    for (const column of columns) {
      restricted[column] = row[column] ?? '';
    }
    return restricted;
  });
}

export async function fetchGroupAwards(
  group: Readonly<AwardTypeGroup>,
  config: StaticConfig,
  deps: DownloadDeps,
  pollOptions: PollOptions = {},
): Promise<AwardRow[]> {
  const downloadUrl = await submitAndWait(group.codes, config, deps, pollOptions);
  return fetchAndExtract(downloadUrl, deps, pollOptions.signal);
}

export async function runAwardPipeline(
  options: PipelineOptions,
  deps: DownloadDeps,
): Promise<AwardRunReport> {
  const now = new Date(deps.clock());
  const evaluatedAt = now.toISOString();
  const keywords = [...(options.keywords ?? options.config.keywords)];
  const requestConfig: StaticConfig = { ...options.config, keywords };
  const pollOptions: PollOptions = {
    deadlineMs: options.pollDeadlineMs,
    signal: options.signal,
  };

  const groups: GroupOutcome[] = [];
  const warnings: string[] = [];
  const combined: AwardRow[] = [];

  for (const group of options.config.groups) {
    if (options.signal?.aborted) {
      throw new RunAbortedError(group.name);
    }

    const outcome: GroupOutcome = { group: group.name, codes: [...group.codes], rowCount: 0 };
    groups.push(outcome);

    let rows: AwardRow[];
    try {
      rows = await fetchGroupAwards(group, requestConfig, deps, pollOptions);
    } catch (error) {
      // An abort ends the whole run, not just this group
      if (options.signal?.aborted) throw new RunAbortedError(group.name);
      if (options.failFast) throw error;

      const message = error instanceof Error ? error.message : String(error);
      outcome.error = message;
      warnings.push(`Failed to fetch ${group.name} awards: ${message}`);
      deps.logger.error(`Fetch failed for ${group.name}`, {
        ...describeError(error),
        recoverable: error instanceof AwardFetchError,
      });
      continue;
    }

    outcome.rowCount = rows.length;
    if (rows.length === 0) {
      warnings.push(`No awards returned for ${group.name}`);
      deps.logger.warn(`No awards returned for ${group.name}`);
      continue;
    }

    for (const row of rows) {
      combined.push({ ...row, fetched_at: evaluatedAt });
    }
  }

  const restricted = restrictColumns(combined, options.config.desiredColumns);
  const awards = classifyAndFilter(restricted, keywords, now);

  deps.logger.info(`Kept ${awards.length} of ${restricted.length} awards`, {
    keywords,
    evaluatedAt,
  });

  return { evaluatedAt, keywords, awards, groups, warnings };
}

export function createDownloadDeps(appConfig: AppConfig, config: StaticConfig, logger: Logger): DownloadDeps {
  return {
    fetch: defaultFetch,
    headers: config.headers,
    logger,
    apiBase: appConfig.apiBase,
    sleep,
    clock: Date.now,
    backoff: config.backoff,
  };
}

export type PipelineRunner = (keywords?: readonly string[], signal?: AbortSignal) => Promise<AwardRunReport>;

/**
 * Bind the run-level settings for request-driven runs.
 * Polling is always bounded here: POLL_DEADLINE_SECONDS, else HTTP_POLL_DEADLINE_SECONDS.
 */
export function createPipelineRunner(
  appConfig: AppConfig,
  config: StaticConfig,
  deps: DownloadDeps,
): PipelineRunner {
  return (keywords, signal) => runAwardPipeline({
    config,
    keywords,
    failFast: appConfig.failFast,
    pollDeadlineMs: appConfig.pollDeadlineMs ?? appConfig.httpPollDeadlineMs,
    signal,
  }, deps);
}
