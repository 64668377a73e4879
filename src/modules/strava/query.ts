import type { QueryInput, QueryParams, QueryValue } from './types';

const isList = (value: QueryInput): value is readonly QueryValue[] => Array.isArray(value);

/**
 * Builds the query bag for a request. Entries that are `null` or `undefined`
 * are left out so the API applies its own defaults; `access_token` is always last.
 */
export const buildQuery = (params: Record<string, QueryInput>, accessToken: string): QueryParams => {
  const query: QueryParams = {};

  for (const [key, value] of Object.entries(params)) {
    if (value === null || value === undefined) {
      continue;
    }

    query[key] = isList(value) ? value.join(',') : value;
  }

  query.access_token = accessToken;
  return query;
};

export const joinList = (value: string | readonly (string | number)[]): string =>
  typeof value === 'string' ? value : value.join(',');
