/**
 * Runtime configuration.
 *
 * Read once from the environment at start-up. The entry point loads `.env`
 * through dotenv before calling loadConfig(); tests pass an explicit record.
 */

import { z } from 'zod';
import { LogLevel, parseLogLevel } from './logger';

const intFromEnv = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  PORT: intFromEnv(5000),
  PUBLIC_BASE_URL: z.string().url().default('http://localhost:5000'),

  PROVIDER_API_KEY: z.string().min(1, 'PROVIDER_API_KEY is not set'),
  PROVIDER_CREATE_URL: z.string().url().default('https://api.kie.ai/api/v1/jobs/createTask'),
  PROVIDER_MODEL: z.string().min(1).default('grok-imagine/text-to-video'),
  PROVIDER_REQUEST_SHAPE: z.enum(['jobs', 'veo']).default('jobs'),
  PROVIDER_ASPECT_RATIO: z.string().default('9:16'),
  PROVIDER_DURATION_SECONDS: intFromEnv(5),
  PROVIDER_FPS: intFromEnv(24),
  PROVIDER_MODE: z.string().default('normal'),
  PROVIDER_SUBMIT_TIMEOUT_MS: intFromEnv(30_000),
  PROVIDER_DOWNLOAD_TIMEOUT_MS: intFromEnv(120_000),

  S3_ENDPOINT: z.string().url().optional(),
  S3_REGION: z.string().default('us-east-1'),
  S3_ACCESS_KEY_ID: z.string().optional(),
  S3_SECRET_ACCESS_KEY: z.string().optional(),
  S3_BUCKET: z.string().min(1).default('videos'),
  S3_FORCE_PATH_STYLE: z
    .enum(['true', 'false'])
    .default('true')
    .transform((value) => value === 'true'),

  REDIS_URL: z.string().default('redis://localhost:6379'),
  QUEUE_NAME: z.string().min(1).default('video_processing_jobs'),

  JWT_SECRET_KEY: z.string().min(1, 'JWT_SECRET_KEY is not set'),
  JWT_ALGORITHM: z.enum(['HS256', 'HS384', 'HS512']).default('HS256'),
  JWT_ISSUER: z.string().optional(),
  JWT_AUDIENCE: z.string().optional(),

  FFMPEG_PATH: z.string().default('ffmpeg'),
  THUMBNAIL_OFFSET: z.string().default('00:00:01'),

  STATUS_RATE_LIMIT_PER_MINUTE: intFromEnv(30),
  LOG_LEVEL: z.string().optional(),
});

export type ProviderRequestShape = 'jobs' | 'veo';
export type JwtAlgorithm = 'HS256' | 'HS384' | 'HS512';

export interface ProviderConfig {
  apiKey: string;
  createUrl: string;
  model: string;
  requestShape: ProviderRequestShape;
  callbackUrl: string;
  aspectRatio: string;
  durationSeconds: number;
  fps: number;
  mode: string;
  submitTimeoutMs: number;
  downloadTimeoutMs: number;
}

export interface StorageConfig {
  endpoint?: string;
  region: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  bucket: string;
  forcePathStyle: boolean;
}

export interface AuthConfig {
  secret: string;
  algorithm: JwtAlgorithm;
  issuer?: string;
  audience?: string;
}

export interface AppConfig {
  port: number;
  provider: ProviderConfig;
  storage: StorageConfig;
  queue: { redisUrl: string; name: string };
  auth: AuthConfig;
  thumbnails: { ffmpegPath: string; offset: string };
  statusRateLimitPerMinute: number;
  logLevel: LogLevel;
}

/** Path the provider posts results to, relative to PUBLIC_BASE_URL. */
export const CALLBACK_PATH = '/api/video/callback';

export class ConfigError extends Error {
  constructor(public issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`),
    );
  }
  const e = parsed.data;

  return {
    port: e.PORT,
    provider: {
      apiKey: e.PROVIDER_API_KEY,
      createUrl: e.PROVIDER_CREATE_URL,
      model: e.PROVIDER_MODEL,
      requestShape: e.PROVIDER_REQUEST_SHAPE,
      callbackUrl: new URL(CALLBACK_PATH, e.PUBLIC_BASE_URL).toString(),
      aspectRatio: e.PROVIDER_ASPECT_RATIO,
      durationSeconds: e.PROVIDER_DURATION_SECONDS,
      fps: e.PROVIDER_FPS,
      mode: e.PROVIDER_MODE,
      submitTimeoutMs: e.PROVIDER_SUBMIT_TIMEOUT_MS,
      downloadTimeoutMs: e.PROVIDER_DOWNLOAD_TIMEOUT_MS,
    },
    storage: {
      endpoint: e.S3_ENDPOINT,
      region: e.S3_REGION,
      accessKeyId: e.S3_ACCESS_KEY_ID,
      secretAccessKey: e.S3_SECRET_ACCESS_KEY,
      bucket: e.S3_BUCKET,
      forcePathStyle: e.S3_FORCE_PATH_STYLE,
    },
    queue: { redisUrl: e.REDIS_URL, name: e.QUEUE_NAME },
    auth: {
      secret: e.JWT_SECRET_KEY,
      algorithm: e.JWT_ALGORITHM,
      issuer: e.JWT_ISSUER,
      audience: e.JWT_AUDIENCE,
    },
    thumbnails: { ffmpegPath: e.FFMPEG_PATH, offset: e.THUMBNAIL_OFFSET },
    statusRateLimitPerMinute: e.STATUS_RATE_LIMIT_PER_MINUTE,
    logLevel: parseLogLevel(e.LOG_LEVEL),
  };
}
