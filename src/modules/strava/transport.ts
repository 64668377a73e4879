import { openAsBlob } from 'node:fs';
import { basename } from 'node:path';

import { stravaApiBaseUrl, stravaRequestTimeoutMs } from './strava-config';
import type { HeaderMap, HttpMethod, QueryParams, TransportRequestOptions, TransportResponse } from './types';

/**
 * HTTP collaborator used by the API client. Implementations own base URL
 * resolution, timeouts and connection handling; HTTP error statuses resolve
 * normally and only transport failures reject.
 */
export interface StravaTransport {
  request(method: HttpMethod, path: string, options: TransportRequestOptions): Promise<TransportResponse | string>;
}

type FetchTransportOptions = {
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  openFile?: (path: string) => Promise<Blob>;
};

const buildUrl = (baseUrl: string, path: string, query: QueryParams): URL => {
  const normalizedBase = baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;
  const normalizedPath = path.startsWith('/') ? path.slice(1) : path;
  const url = new URL(`${normalizedBase}/${normalizedPath}`);

  for (const [key, value] of Object.entries(query)) {
    url.searchParams.set(key, String(value));
  }

  return url;
};

const collectHeaders = (headers: Headers): HeaderMap => {
  const output: HeaderMap = {};
  headers.forEach((value, key) => {
    const name = key.toLowerCase();
    const values = output[name] ?? [];
    values.push(value);
    output[name] = values;
  });
  return output;
};

export const createFetchTransport = (options: FetchTransportOptions = {}): StravaTransport => {
  const baseUrl = options.baseUrl ?? stravaApiBaseUrl;
  const timeoutMs = options.timeoutMs ?? stravaRequestTimeoutMs;
  const fetchImpl = options.fetchImpl ?? globalThis.fetch?.bind(globalThis);
  const openFile = options.openFile ?? ((path: string) => openAsBlob(path));

  if (!fetchImpl) {
    throw new Error('Fetch implementation is required for the Strava transport');
  }

  return {
    async request(method, path, requestOptions): Promise<TransportResponse | string> {
      const url = buildUrl(baseUrl, path, requestOptions.query);

      let body: FormData | undefined;
      if (requestOptions.file) {
        const file = await openFile(requestOptions.file.path);
        body = new FormData();
        body.append(requestOptions.file.field, file, basename(requestOptions.file.path));
      }

      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

      try {
        const response = await fetchImpl(url, {
          method,
          headers: {
            Accept: requestOptions.responseType === 'text' ? '*/*' : 'application/json'
          },
          body,
          signal: controller.signal
        });

        const text = await response.text();
        if (requestOptions.responseType === 'text' && response.ok) {
          return text;
        }

        return {
          status: response.status,
          headers: collectHeaders(response.headers),
          body: text
        };
      } finally {
        clearTimeout(timeoutId);
      }
    }
  };
};
