import { z } from 'zod';
import dotenv from 'dotenv';

const envFile = process.env.NODE_ENV === 'test' ? '.env.test' : '.env';
dotenv.config({ path: envFile });

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  STRAVA_API_BASE_URL: z.string().url().default('https://www.strava.com/api/v3'),
  STRAVA_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  STRAVA_CLIENT_ID: z.string().optional(),
  STRAVA_CLIENT_SECRET: z.string().optional(),
  STRAVA_REDIRECT_URI: z.string().url().default('http://localhost:5173/oauth/strava/callback'),
  STRAVA_AUTHORIZE_URL: z.string().optional(),
  STRAVA_TOKEN_URL: z.string().optional()
});

const emptyToUndefined = (source: NodeJS.ProcessEnv): Record<string, string | undefined> =>
  Object.fromEntries(
    Object.entries(source).map(([key, value]) => [key, value && value.trim().length > 0 ? value : undefined])
  );

const env = envSchema.parse(emptyToUndefined(process.env));

export default env;
