import fetch from 'node-fetch';
import type { RequestInit, Response } from 'node-fetch';
import { HttpStatusError } from './errors.js';
import type { Logger } from '../utils/logger.js';

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface HttpDeps {
  fetch: FetchFn;
  headers: Readonly<Record<string, string>>;
  logger: Logger;
}

export const defaultFetch: FetchFn = (url, init) => fetch(url, init);

/**
 * Throw HttpStatusError carrying the response body for any non-2xx status.
 */
export async function ensureOk(response: Response, method: string, url: string): Promise<Response> {
  if (!response.ok) {
    const body = await response.text();
    throw new HttpStatusError(method, url, response.status, body);
  }
  return response;
}
