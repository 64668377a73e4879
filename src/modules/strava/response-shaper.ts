import type { ResponseBody, ShapedResponse, TransportResponse } from './types';

const SUCCESS_STATUSES = new Set([200, 201]);

export const isSuccessStatus = (status: number): boolean => SUCCESS_STATUSES.has(status);

export const decodeBody = (text: string): ResponseBody => {
  if (!text || text.trim().length === 0) {
    return null;
  }

  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
};

/**
 * Turns a transport response into a response envelope. Route exports come
 * back from the transport as plain strings and are passed through untouched.
 */
export const shapeResponse = (response: TransportResponse | string): ShapedResponse => {
  if (typeof response === 'string') {
    return response;
  }

  return {
    headers: response.headers,
    body: decodeBody(response.body),
    success: isSuccessStatus(response.status),
    status: response.status
  };
};
