import env from '../../config/env';

const DEFAULT_AUTHORIZE_URL = 'https://www.strava.com/oauth/authorize';
const DEFAULT_TOKEN_URL = 'https://www.strava.com/oauth/token';
const DEFAULT_API_BASE_URL = 'https://www.strava.com/api/v3';

export const sanitizeUrl = (rawUrl: string | null | undefined, fallback: string): string => {
  if (!rawUrl) {
    return fallback;
  }

  try {
    return new URL(rawUrl).toString();
  } catch {
    return fallback;
  }
};

export const stravaAuthorizeUrl = sanitizeUrl(env.STRAVA_AUTHORIZE_URL, DEFAULT_AUTHORIZE_URL);
export const stravaTokenUrl = sanitizeUrl(env.STRAVA_TOKEN_URL, DEFAULT_TOKEN_URL);
export const stravaApiBaseUrl = sanitizeUrl(env.STRAVA_API_BASE_URL, DEFAULT_API_BASE_URL);
export const stravaRequestTimeoutMs = env.STRAVA_REQUEST_TIMEOUT_MS;

export const stravaDefaults = {
  authorizeUrl: DEFAULT_AUTHORIZE_URL,
  tokenUrl: DEFAULT_TOKEN_URL,
  apiBaseUrl: DEFAULT_API_BASE_URL
} as const;
