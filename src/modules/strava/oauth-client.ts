import { z } from 'zod';

import env from '../../config/env';
import { baseLogger, type Logger } from '../../observability/logger';
import { StravaOAuthError } from './errors';
import { stravaAuthorizeUrl, stravaTokenUrl } from './strava-config';
import type { AccessTokenProvider } from './token';

export type StravaAthleteProfile = {
  id: number;
  username: string | null;
  firstname: string | null;
  lastname: string | null;
  city: string | null;
  country: string | null;
  profile: string | null;
} | null;

export class StravaAccessToken implements AccessTokenProvider {
  constructor(
    readonly accessToken: string,
    readonly refreshToken: string,
    readonly expiresAt: Date,
    readonly scope: string[] = [],
    readonly athlete: StravaAthleteProfile = null
  ) {}

  getToken(): string {
    return this.accessToken;
  }

  hasExpired(now: Date = new Date()): boolean {
    return this.expiresAt.getTime() <= now.getTime();
  }
}

export type AuthorizeUrlInput = {
  state: string;
  scope: string[];
  redirectUri?: string;
  approvalPrompt?: 'auto' | 'force';
};

export type CodeExchangeInput = {
  code: string;
  redirectUri?: string;
};

export interface StravaOAuthClient {
  buildAuthorizeUrl(input: AuthorizeUrlInput): string;
  exchangeCode(input: CodeExchangeInput): Promise<StravaAccessToken>;
  refresh(refreshToken: string): Promise<StravaAccessToken>;
}

type CreateOAuthClientOptions = {
  clientId?: string | null;
  clientSecret?: string | null;
  redirectUri?: string;
  authorizeUrl?: string;
  tokenUrl?: string;
  fetchImpl?: typeof fetch;
  logger?: Logger;
};

const nullableString = z
  .string()
  .nullish()
  .transform((value) => value ?? null);

const athleteSchema = z
  .object({
    id: z.number(),
    username: nullableString,
    firstname: nullableString,
    lastname: nullableString,
    city: nullableString,
    country: nullableString,
    profile: nullableString
  })
  .nullish()
  .transform((value) => value ?? null);

const tokenPayloadSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1),
  expires_at: z.coerce.number().int().positive(),
  scope: z.string().optional(),
  athlete: athleteSchema
});

type TokenPayload = z.infer<typeof tokenPayloadSchema>;

const resolveScope = (raw: string | undefined): string[] =>
  (raw ?? '')
    .split(/[,\s]+/)
    .map((scope) => scope.trim())
    .filter(Boolean);

const toAccessToken = (payload: TokenPayload): StravaAccessToken =>
  new StravaAccessToken(
    payload.access_token,
    payload.refresh_token,
    new Date(payload.expires_at * 1000),
    resolveScope(payload.scope),
    payload.athlete
  );

export const createStravaOAuthClient = (options: CreateOAuthClientOptions = {}): StravaOAuthClient => {
  const clientId = options.clientId ?? env.STRAVA_CLIENT_ID ?? null;
  const clientSecret = options.clientSecret ?? env.STRAVA_CLIENT_SECRET ?? null;
  const defaultRedirectUri = options.redirectUri ?? env.STRAVA_REDIRECT_URI;
  const authorizeUrl = options.authorizeUrl ?? stravaAuthorizeUrl;
  const tokenUrl = options.tokenUrl ?? stravaTokenUrl;
  const fetchImpl = options.fetchImpl ?? globalThis.fetch?.bind(globalThis);
  const logger = (options.logger ?? baseLogger).with({ component: 'strava-oauth' });

  if (!fetchImpl) {
    throw new Error('Fetch implementation is required for the Strava OAuth client');
  }

  const requireCredentials = (): { clientId: string; clientSecret: string } => {
    if (!clientId || !clientSecret) {
      throw new StravaOAuthError('Strava OAuth credentials are not configured');
    }
    return { clientId, clientSecret };
  };

  const requestToken = async (grant: Record<string, string>): Promise<StravaAccessToken> => {
    const credentials = requireCredentials();
    const body = new URLSearchParams({
      client_id: credentials.clientId,
      client_secret: credentials.clientSecret,
      ...grant
    });

    const response = await fetchImpl(tokenUrl, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        Accept: 'application/json'
      },
      body: body.toString()
    });

    const responseText = await response.text().catch(() => '');

    if (!response.ok) {
      logger.warn('Strava token request failed', {
        grantType: grant.grant_type,
        status: response.status,
        bodyPreview: responseText.substring(0, 200)
      });
      throw new StravaOAuthError(
        `Strava token request failed with status ${response.status}${responseText ? `: ${responseText.substring(0, 200)}` : ''}`,
        response.status
      );
    }

    let raw: unknown;
    try {
      raw = JSON.parse(responseText);
    } catch {
      throw new StravaOAuthError('Strava token request returned invalid JSON', response.status);
    }

    const parsed = tokenPayloadSchema.safeParse(raw);
    if (!parsed.success) {
      const missing = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
      throw new StravaOAuthError(`Strava token request returned an invalid payload. Invalid: ${missing}`, response.status);
    }

    logger.info('Strava token issued', {
      grantType: grant.grant_type,
      athleteId: parsed.data.athlete?.id ?? null
    });

    return toAccessToken(parsed.data);
  };

  return {
    buildAuthorizeUrl(input: AuthorizeUrlInput): string {
      const { clientId: id } = requireCredentials();
      const url = new URL(authorizeUrl);
      url.searchParams.set('client_id', id);
      url.searchParams.set('redirect_uri', input.redirectUri ?? defaultRedirectUri);
      url.searchParams.set('response_type', 'code');
      url.searchParams.set('approval_prompt', input.approvalPrompt ?? 'auto');
      url.searchParams.set('scope', input.scope.join(','));
      url.searchParams.set('state', input.state);
      return url.toString();
    },

    exchangeCode(input: CodeExchangeInput): Promise<StravaAccessToken> {
      return requestToken({
        grant_type: 'authorization_code',
        code: input.code,
        redirect_uri: input.redirectUri ?? defaultRedirectUri
      });
    },

    refresh(refreshToken: string): Promise<StravaAccessToken> {
      return requestToken({
        grant_type: 'refresh_token',
        refresh_token: refreshToken
      });
    }
  };
};
