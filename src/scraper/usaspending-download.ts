/**
 * USAspending.gov Award Download Client
 * Submits an award download job and polls its status until the archive is ready
 *
 * Data source: https://api.usaspending.gov
 * Endpoints:
 *   - POST /download/awards/            queue an export job
 *   - GET  /download/status/?file_name  job status, carries the archive URL once finished
 */

import { z } from 'zod';
import type { Response } from 'node-fetch';
import { POLL_BACKOFF } from '../config/static-config.js';
import type { PollBackoff, StaticConfig } from '../config/static-config.js';
import type {
  DownloadFilters,
  DownloadJobHandle,
  DownloadJobRequest,
  DownloadJobStatus,
  DownloadPayloadTemplate,
} from '../types/index.js';
import {
  JobFailedError,
  MissingJobIdError,
  PollAbortedError,
  PollDeadlineExceededError,
} from './errors.js';
import { ensureOk } from './http.js';
import type { HttpDeps } from './http.js';

const downloadJobResponseSchema = z.object({
  file_name: z.string().nullish(),
  status_url: z.string().nullish(),
}).passthrough();

const downloadStatusSchema = z.object({
  status: z.string().nullish(),
  url: z.string().nullish(),
  file_url: z.string().nullish(),
  message: z.string().nullish(),
}).passthrough();

export interface DownloadDeps extends HttpDeps {
  apiBase: string;
  sleep: (ms: number) => Promise<void>;
  clock: () => number;
  backoff?: PollBackoff;
}

export interface PollOptions {
  // Measured from the first status request
  deadlineMs?: number;
  signal?: AbortSignal;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise(resolve => setTimeout(resolve, ms));

export function nextBackoffDelay(currentSeconds: number, maxDelaySeconds: number): number {
  return Math.min(currentSeconds * 2, maxDelaySeconds);
}

/**
 * Wait lengths, in seconds, for `count` consecutive non-terminal polls.
 */
export function backoffSchedule(count: number, backoff: PollBackoff = POLL_BACKOFF): number[] {
  const delays: number[] = [];
  let delay = backoff.initialDelaySeconds;
  for (let i = 0; i < count; i++) {
    delays.push(delay);
    delay = nextBackoffDelay(delay, backoff.maxDelaySeconds);
  }
  return delays;
}

export function buildDownloadPayload(
  template: Readonly<DownloadPayloadTemplate>,
  filters: Omit<DownloadFilters, 'award_type_codes'>,
  awardTypeCodes: readonly string[],
): DownloadJobRequest {
  const keywords = filters.keywords ?? [];
  return {
    ...template,
    fields: [...template.fields],
    filters: {
      ...(keywords.length > 0 ? { keywords: [...keywords] } : {}),
      time_period: filters.time_period.map(period => ({ ...period })),
      award_type_codes: [...awardTypeCodes],
    },
  };
}

export function statusUrlFor(apiBase: string, jobId: string): string {
  const params = new URLSearchParams({ file_name: jobId, type: 'awards' });
  return `${apiBase}/download/status/?${params.toString()}`;
}

async function readJson(response: Response): Promise<{ text: string; data: unknown }> {
  const text = await response.text();
  try {
    const data: unknown = JSON.parse(text);
    return { text, data };
  } catch {
    return { text, data: undefined };
  }
}

/**
 * Queue an award download job and return its handle
 */
export async function submitDownloadJob(
  payload: DownloadJobRequest,
  deps: DownloadDeps,
  signal?: AbortSignal,
): Promise<DownloadJobHandle> {
  const url = `${deps.apiBase}/download/awards/`;
  deps.logger.info(`Submitting download job for award_type_codes=${payload.filters.award_type_codes.join(',')}`);

  const response = await deps.fetch(url, {
    method: 'POST',
    headers: { ...deps.headers },
    body: JSON.stringify(payload),
    signal,
  });
  await ensureOk(response, 'POST', url);

  const { text, data } = await readJson(response);
  const parsed = downloadJobResponseSchema.safeParse(data);
  const jobId = parsed.success ? parsed.data.file_name?.trim() : undefined;
  if (!jobId) {
    throw new MissingJobIdError(text);
  }

  deps.logger.info(`Download job ID: ${jobId}`);
  return { jobId, statusUrl: statusUrlFor(deps.apiBase, jobId) };
}

export async function getDownloadStatus(
  handle: DownloadJobHandle,
  deps: DownloadDeps,
  signal?: AbortSignal,
): Promise<DownloadJobStatus> {
  const response = await deps.fetch(handle.statusUrl, {
    method: 'GET',
    headers: { ...deps.headers },
    signal,
  });
  await ensureOk(response, 'GET', handle.statusUrl);

  const { text, data } = await readJson(response);
  const parsed = downloadStatusSchema.safeParse(data);
  if (!parsed.success) {
    deps.logger.warn(`Unreadable status response for job ${handle.jobId}`, { body: text });
    return { status: '' };
  }

  return {
    status: parsed.data.status ?? '',
    url: parsed.data.url,
    file_url: parsed.data.file_url,
    message: parsed.data.message,
  };
}

/**
 * Poll the job until it finishes with a download URL or fails.
 * Without a deadline or signal this waits as long as the job stays open.
 */
export async function pollDownloadJob(
  handle: DownloadJobHandle,
  deps: DownloadDeps,
  options: PollOptions = {},
): Promise<string> {
  const backoff = deps.backoff ?? POLL_BACKOFF;
  const { deadlineMs, signal } = options;
  const deadlineAt = deadlineMs === undefined ? undefined : deps.clock() + deadlineMs;
  let delay = backoff.initialDelaySeconds;

  while (true) {
    if (signal?.aborted) {
      throw new PollAbortedError(handle.jobId);
    }

    const jobStatus = await getDownloadStatus(handle, deps, signal);
    deps.logger.info(`Job ${handle.jobId} status: ${jobStatus.status}`);

    if (jobStatus.status === 'finished') {
      const downloadUrl = jobStatus.url || jobStatus.file_url;
      if (downloadUrl) {
        deps.logger.info('Download URL available, fetching data…');
        return downloadUrl;
      }
    } else if (jobStatus.status === 'failed') {
      deps.logger.error(`Download job ${handle.jobId} failed`, { message: jobStatus.message });
      throw new JobFailedError(handle.jobId, jobStatus.message ?? undefined);
    }

    const delayMs = delay * 1000;
    if (deadlineAt !== undefined && deadlineMs !== undefined && deps.clock() + delayMs > deadlineAt) {
      throw new PollDeadlineExceededError(handle.jobId, deadlineMs);
    }

    deps.logger.info(`Waiting ${delay}s before retry…`);
    await deps.sleep(delayMs);
    delay = nextBackoffDelay(delay, backoff.maxDelaySeconds);
  }
}

/**
 * Submit a download for one set of award type codes and wait for its URL
 */
export async function submitAndWait(
  codes: readonly string[],
  config: StaticConfig,
  deps: DownloadDeps,
  options: PollOptions = {},
): Promise<string> {
  const payload = buildDownloadPayload(
    config.payloadTemplate,
    { keywords: [...config.keywords], time_period: [config.timePeriod] },
    codes,
  );
  const handle = await submitDownloadJob(payload, deps, options.signal);
  return pollDownloadJob(handle, { ...deps, backoff: deps.backoff ?? config.backoff }, options);
}
