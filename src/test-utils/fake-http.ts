/**
 * In-process stand-ins for the USAspending API used by the tests
 */

import JSZip from 'jszip';
import { Response } from 'node-fetch';
import type { RequestInit } from 'node-fetch';
import { STATIC_HEADERS } from '../config/static-config.js';
import type { FetchFn } from '../scraper/http.js';
import type { DownloadDeps } from '../scraper/usaspending-download.js';
import { silentLogger } from '../utils/logger.js';

export const TEST_API_BASE = 'https://api.example.test/api/v2';
export const TEST_NOW = Date.UTC(2025, 0, 1);

export interface RecordedRequest {
  url: string;
  method: string;
  body: string;
  signal: RequestInit['signal'];
}

export type FakeHandler = (request: RecordedRequest) => Response | Promise<Response>;

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function textResponse(body: string, status: number): Response {
  return new Response(body, { status });
}

export function archiveResponse(archive: Buffer): Response {
  return new Response(archive, {
    status: 200,
    headers: { 'Content-Type': 'application/zip' },
  });
}

export function createFakeFetch(handler: FakeHandler): { fetch: FetchFn; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const fetch: FetchFn = async (url, init) => {
    const request: RecordedRequest = {
      url,
      method: init?.method ?? 'GET',
      body: typeof init?.body === 'string' ? init.body : '',
      signal: init?.signal,
    };
    requests.push(request);
    if (init?.signal?.aborted) {
      const error = new Error('The operation was aborted.');
      error.name = 'AbortError';
      throw error;
    }
    return handler(request);
  };
  return { fetch, requests };
}

/** Answers requests with the given responses in order. */
export function queuedResponses(responses: Response[]): FakeHandler {
  const queue = [...responses];
  return request => {
    const next = queue.shift();
    if (!next) throw new Error(`Unexpected request: ${request.method} ${request.url}`);
    return next;
  };
}

/**
 * Download deps with a virtual clock: each sleep is recorded and moves the clock forward.
 */
export function createTestDeps(fetch: FetchFn, start: number = TEST_NOW): DownloadDeps & { sleeps: number[] } {
  const sleeps: number[] = [];
  let current = start;
  return {
    fetch,
    headers: STATIC_HEADERS,
    logger: silentLogger,
    apiBase: TEST_API_BASE,
    sleep: async ms => {
      sleeps.push(ms);
      current += ms;
    },
    clock: () => current,
    sleeps,
  };
}

export function toCsv(rows: Array<Record<string, string>>): string {
  const header = Object.keys(rows[0] ?? {});
  const lines = rows.map(row => header.map(column => row[column] ?? '').join(','));
  return [header.join(','), ...lines].join('\n') + '\n';
}

export async function buildArchive(entries: Array<[name: string, content: string]>): Promise<Buffer> {
  const zip = new JSZip();
  for (const [name, content] of entries) {
    zip.file(name, content);
  }
  return zip.generateAsync({ type: 'nodebuffer' });
}
