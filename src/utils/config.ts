import { config as loadDotenv } from 'dotenv';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import { AppConfig } from '../types';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36';

// Coerce numeric env values, falling back to a default when unset
const intInRange = (min: number, max: number, def: number) =>
  z.preprocess((v) => {
    if (v === undefined || (typeof v === 'string' && v.trim() === '')) return def;
    if (typeof v === 'string') return Number(v);
    return v;
  }, z.number().int().min(min).max(max));

const allowedLogLevels = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

const EnvSchema = z.object({
  LOG_LEVEL: z.enum(allowedLogLevels).optional().default('info'),
  TEMP_DIRECTORY: z.string().optional(),
  COOKIES_FILE: z.string().optional().default('./cookies.txt'),
  COOKIES: z.string().optional(),
  REQUEST_TIMEOUT_MS: intInRange(1000, 600000, 15000),
  DOWNLOAD_TIMEOUT_MS: intInRange(1000, 3600000, 180000),
  MAX_FILE_SIZE: intInRange(1, Number.MAX_SAFE_INTEGER, 1024 * 1024 * 1024), // 1GB default
  SHORT_VIDEO_API_URL: z
    .string()
    .optional()
    .default('https://www.tikwm.com/api/')
    .refine((v) => /^https?:\/\//i.test(v), {
      message: 'SHORT_VIDEO_API_URL must start with http/https',
    }),
  YTDLP_PATH: z.string().optional().default('yt-dlp'),
  USER_AGENT: z.string().optional().default(DEFAULT_USER_AGENT),
  SENTRY_DSN: z.string().optional(),
});

/**
 * Load configuration from environment variables (and .env when present)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  if (env === process.env) {
    loadDotenv();
  }

  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const values = parsed.data;

  return {
    logLevel: values.LOG_LEVEL,
    tempDirectory: values.TEMP_DIRECTORY || path.join(os.tmpdir(), 'media-router'),
    cookiesFile: values.COOKIES_FILE,
    cookiesContent: values.COOKIES || undefined,
    requestTimeout: values.REQUEST_TIMEOUT_MS,
    downloadTimeout: values.DOWNLOAD_TIMEOUT_MS,
    maxFileSize: values.MAX_FILE_SIZE,
    sentryDsn: values.SENTRY_DSN || undefined,
    providers: {
      shortVideoApiUrl: values.SHORT_VIDEO_API_URL,
      ytDlpPath: values.YTDLP_PATH,
      userAgent: values.USER_AGENT || DEFAULT_USER_AGENT,
    },
  };
}
