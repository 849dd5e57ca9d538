import 'dotenv/config';

import { z } from 'zod';

const booleanFlag = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false', '1', '0', 'yes', 'no', 'on', 'off'])
    .optional()
    .default(fallback)
    .transform((value) => ['true', '1', 'yes', 'on'].includes(value));

const isKnownTimeZone = (timeZone: string) => {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
};

const envSchema = z.object({
  // Passed through as-is; the Graph API rejects empty or stale credentials.
  FB_PAGE_ID: z.string().default(''),
  FB_PAGE_TOKEN: z.string().default(''),
  METRIX_SERIES_URL: z.string().url().default('https://discgolfmetrix.com/3272824&view=info'),
  METRIX_BASE_URL: z.string().url().default('https://discgolfmetrix.com'),
  SERIES_NAME: z.string().min(1).default('TFK Seriespill'),
  TIMEZONE: z.string().refine(isKnownTimeZone, 'TIMEZONE must be an IANA zone').default('Europe/Oslo'),
  GRAPH_API_BASE_URL: z.string().url().default('https://graph.facebook.com'),
  GRAPH_API_VERSION: z
    .string()
    .regex(/^v\d+\.\d+$/, 'GRAPH_API_VERSION must look like v23.0')
    .default('v23.0'),
  DRY_RUN: booleanFlag('false'),
  ANNOUNCE_CRON: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info')
});

export type Env = z.infer<typeof envSchema>;

let cached: Env | null = null;

export const parseEnv = (source: NodeJS.ProcessEnv): Env => {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new Error(`Invalid environment configuration: ${parsed.error.message}`);
  }
  return parsed.data;
};

export const getEnv = (): Env => {
  if (!cached) {
    cached = parseEnv(process.env);
  }
  return cached;
};
