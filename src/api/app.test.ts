import type { Server } from 'http';
import fetch from 'node-fetch';
import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import * as XLSX from 'xlsx';
import { loadConfig } from '../config/env.js';
import { createStaticConfig } from '../config/static-config.js';
import { HttpStatusError, RunAbortedError } from '../scraper/errors.js';
import type { AwardRunReport, AwardSink, ClassifiedAward } from '../types/index.js';
import { silentLogger } from '../utils/logger.js';
import { createApp } from './app.js';

const REPORT: AwardRunReport = {
  evaluatedAt: '2025-01-01T00:00:00.000Z',
  keywords: ['alpha'],
  awards: [{ award_type: 'contract', piid_or_fain: 'C-1', recipient_name: 'Acme Corp' }],
  groups: [
    { group: 'contract', codes: ['A', 'B', 'C', 'D'], rowCount: 1 },
    { group: 'contract_idv', codes: ['IDV_A'], rowCount: 0, error: 'boom' },
    { group: 'grant', codes: ['02'], rowCount: 0 },
  ],
  warnings: ['Failed to fetch contract_idv awards: boom', 'No awards returned for grant'],
};

const pipelineCalls: Array<string[] | undefined> = [];
const pipelineSignals: Array<AbortSignal | undefined> = [];
const published: Array<{ records: ClassifiedAward[]; lastUpdated: Date }> = [];
let pipelineError: Error | undefined;
let slowRun: ((signal: AbortSignal | undefined) => Promise<AwardRunReport>) | undefined;

const sink: AwardSink = {
  async publish(records, lastUpdated) {
    published.push({ records, lastUpdated });
  },
};

function startApp(adminApiKey: string | undefined): Promise<{ server: Server; baseUrl: string }> {
  const app = createApp({
    appConfig: { ...loadConfig({}), adminApiKey },
    staticConfig: createStaticConfig(['alpha']),
    runPipeline: async (keywords, signal) => {
      pipelineCalls.push(keywords);
      pipelineSignals.push(signal);
      if (slowRun) return slowRun(signal);
      if (pipelineError) throw pipelineError;
      return REPORT;
    },
    sink,
    logger: silentLogger,
  });

  return new Promise((resolve, reject) => {
    const server = app.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('Server is not listening on a TCP port'));
        return;
      }
      resolve({ server, baseUrl: `http://127.0.0.1:${address.port}` });
    });
  });
}

function stop(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close(error => (error ? reject(error) : resolve()));
  });
}

describe('award API', () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    ({ server, baseUrl } = await startApp('test-secret'));
  });

  afterAll(async () => {
    await stop(server);
  });

  beforeEach(() => {
    pipelineCalls.length = 0;
    pipelineSignals.length = 0;
    published.length = 0;
    pipelineError = undefined;
    slowRun = undefined;
  });

  it('reports health', async () => {
    const response = await fetch(`${baseUrl}/api/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: 'ok' });
  });

  it('exposes the static configuration', async () => {
    const response = await fetch(`${baseUrl}/api/config`);
    const body = await response.json();

    expect(body).toMatchObject({
      keywords: ['alpha'],
      timePeriod: { start_date: '2007-10-01', end_date: '2025-09-30' },
    });
  });

  it('runs the pipeline with keywords from the query string', async () => {
    const response = await fetch(`${baseUrl}/api/awards?keywords=${encodeURIComponent('alpha, beta')}`);

    expect(response.status).toBe(200);
    expect(pipelineCalls).toEqual([['alpha', 'beta']]);
    expect(await response.json()).toEqual({
      evaluatedAt: REPORT.evaluatedAt,
      keywords: REPORT.keywords,
      count: 1,
      warnings: REPORT.warnings,
      groups: REPORT.groups,
      awards: REPORT.awards,
    });
  });

  it('gives the run a signal that stays live for a completed response', async () => {
    await fetch(`${baseUrl}/api/awards`);

    expect(pipelineSignals).toHaveLength(1);
    expect(pipelineSignals[0]).toBeInstanceOf(AbortSignal);
    expect(pipelineSignals[0]?.aborted).toBe(false);
  });

  it('aborts the run when the client disconnects', async () => {
    let runStarted: () => void = () => {};
    const started = new Promise<void>(resolve => {
      runStarted = resolve;
    });
    const runAborted = new Promise<void>(resolve => {
      slowRun = signal => new Promise<AwardRunReport>((_, reject) => {
        signal?.addEventListener('abort', () => {
          resolve();
          reject(new RunAbortedError('contract'));
        });
        runStarted();
      });
    });

    const client = new AbortController();
    const request = fetch(`${baseUrl}/api/awards`, { signal: client.signal }).catch((e: unknown) => e);
    await started;
    client.abort();

    expect(await request).toHaveProperty('name', 'AbortError');
    await runAborted;
    expect(pipelineSignals[0]?.aborted).toBe(true);
  });

  it('uses the configured keywords when none are given', async () => {
    await fetch(`${baseUrl}/api/awards`);

    expect(pipelineCalls).toEqual([undefined]);
  });

  it('turns the keyword filter off for an empty keyword list', async () => {
    await fetch(`${baseUrl}/api/awards?keywords=`);

    expect(pipelineCalls).toEqual([[]]);
  });

  it('exports the run as a workbook', async () => {
    const response = await fetch(`${baseUrl}/api/awards/export`);

    expect(response.status).toBe(200);
    expect(response.headers.get('content-disposition')).toBe('attachment; filename="awards.xlsx"');
    const workbook = XLSX.read(Buffer.from(await response.arrayBuffer()), { type: 'buffer' });
    expect(workbook.SheetNames).toEqual(['Awards', 'Metadata']);
  });

  it('maps upstream HTTP failures to 502', async () => {
    pipelineError = new HttpStatusError('POST', 'https://api.example.test', 503, 'down');

    const response = await fetch(`${baseUrl}/api/awards`);

    expect(response.status).toBe(502);
    expect(await response.json()).toEqual({ error: 'POST https://api.example.test failed 503: down' });
  });

  it('returns 500 for other failures', async () => {
    pipelineError = new Error('disk full');

    const response = await fetch(`${baseUrl}/api/awards`);

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ error: 'disk full' });
  });

  it('rejects a refresh without the API key', async () => {
    const response = await fetch(`${baseUrl}/api/awards/refresh`, { method: 'POST' });

    expect(response.status).toBe(401);
    expect(pipelineCalls).toEqual([]);
  });

  it('publishes a refresh to the sink', async () => {
    const response = await fetch(`${baseUrl}/api/awards/refresh`, {
      method: 'POST',
      headers: { 'x-api-key': 'test-secret' },
    });

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      success: true,
      count: 1,
      warnings: REPORT.warnings,
      lastUpdated: '2025-01-01T00:00:00.000Z',
    });
    expect(published).toHaveLength(1);
    expect(published[0]?.records).toEqual(REPORT.awards);
    expect(published[0]?.lastUpdated.toISOString()).toBe('2025-01-01T00:00:00.000Z');
  });

  it('answers unknown API routes with 404', async () => {
    const response = await fetch(`${baseUrl}/api/nope`);

    expect(response.status).toBe(404);
  });
});

describe('award API without an admin key', () => {
  it('refuses refreshes', async () => {
    const { server, baseUrl } = await startApp(undefined);
    try {
      const response = await fetch(`${baseUrl}/api/awards/refresh`, {
        method: 'POST',
        headers: { 'x-api-key': 'test-secret' },
      });
      expect(response.status).toBe(500);
    } finally {
      await stop(server);
    }
  });
});
