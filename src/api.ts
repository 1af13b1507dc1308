import { z } from 'zod';
import { LINODE_API, LINODE_PAGE_SIZE } from './constants.js';
import { RequestError } from './errors.js';
import type { Logger } from './logger.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/** Query parameters for GET, JSON body for everything else */
export type RequestBody = Record<string, string | number | boolean | undefined>;

export interface ApiResponse {
  status: number;
  data: unknown;
}

/** Issues authenticated calls against the Linode API v4 */
export interface LinodeApi {
  /** Send a request and keep the response status alongside the decoded body */
  request(method: HttpMethod, path: string, body?: RequestBody): Promise<ApiResponse>;
  /** Send a request and return only the decoded body */
  do(method: HttpMethod, path: string, body?: RequestBody): Promise<unknown>;
}

export interface LinodeApiOptions {
  apiToken: string;
  /** Override the API root, mainly for tests */
  baseUrl?: string;
  logger?: Logger;
}

/**
 * Create a Linode API client.
 *
 * Uses native `fetch` (Node 18+). Any non-2xx answer or transport failure is
 * raised as a `RequestError` carrying the status (0 when nothing came back)
 * and the raw response text.
 */
export function createLinodeApi(options: LinodeApiOptions): LinodeApi {
  const { apiToken, logger } = options;
  const baseUrl = (options.baseUrl ?? LINODE_API).replace(/\/+$/, '');

  if (!apiToken) {
    throw new Error('Linode: apiToken is required');
  }

  async function request(
    method: HttpMethod,
    path: string,
    body?: RequestBody
  ): Promise<ApiResponse> {
    let url = `${baseUrl}/${path.replace(/^\/+/, '')}`;
    const headers = new Headers();
    headers.set('Authorization', `Bearer ${apiToken}`);
    headers.set('Content-Type', 'application/json');

    const init: RequestInit = { method, headers };
    if (body) {
      if (method === 'GET') {
        const query = toQueryString(body);
        if (query) url += `?${query}`;
      } else {
        init.body = JSON.stringify(body);
      }
    }

    logger?.debug({ method, url }, 'linode api request');

    let res: Response;
    try {
      res = await fetch(url, init);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new RequestError(0, '', `Linode API request failed: ${reason}`, {
        cause: err,
      });
    }

    if (!res.ok) {
      const text = await res.text();
      throw new RequestError(
        res.status,
        text,
        `Linode API error ${res.status}: ${text}`
      );
    }

    const text = await res.text();
    if (!text) return { status: res.status, data: {} };
    try {
      return { status: res.status, data: JSON.parse(text) };
    } catch (err) {
      throw new RequestError(
        res.status,
        text,
        `Linode API answered ${res.status} with a body that is not JSON`,
        { cause: err }
      );
    }
  }

  return {
    request,

    async do(method, path, body) {
      const { data } = await request(method, path, body);
      return data;
    },
  };
}

/** Upper bound on pages walked by one listing */
const MAX_PAGES = 1000;

const pageSchema = z.object({
  data: z.array(z.unknown()).default([]),
  pages: z.number().default(1),
});

/**
 * Walk a paginated listing endpoint and collect every item.
 *
 * Stops once the reported page count is reached or a page comes back empty.
 */
export async function fetchAllPages<T extends z.ZodTypeAny>(
  api: LinodeApi,
  path: string,
  item: T
): Promise<z.output<T>[]> {
  const items: z.output<T>[] = [];
  let page = 1;

  while (page <= MAX_PAGES) {
    const raw = await api.do('GET', path, { page, page_size: LINODE_PAGE_SIZE });
    const envelope = pageSchema.parse(raw);
    for (const entry of envelope.data) {
      items.push(item.parse(entry));
    }

    if (page >= envelope.pages || envelope.data.length === 0) break;
    page++;
  }

  return items;
}

function toQueryString(body: RequestBody): string {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(body)) {
    if (value !== undefined) params.set(key, String(value));
  }
  return params.toString();
}
