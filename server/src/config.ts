import path from 'node:path';
import { config as loadEnv } from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from './lib/errors.js';
import type { Resolution, SourceConfig } from './types.js';

const flagSchema = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .default('false')
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const POSITIVE_INTEGER = /^\d+$/;

/**
 * Parses a `height,width` pair such as `720,1280`. Anything other than two
 * comma-separated positive integers is rejected.
 */
export function parseResolution(value: string): Resolution {
  const parts = value.split(',').map((part) => part.trim());
  if (parts.length !== 2 || !parts.every((part) => POSITIVE_INTEGER.test(part))) {
    throw new ConfigurationError([
      `expected "height,width" as two positive integers, got "${value}"`,
    ]);
  }
  const [height, width] = parts.map(Number);
  if (height <= 0 || width <= 0) {
    throw new ConfigurationError([`dimensions must be positive, got "${value}"`]);
  }
  return { width, height };
}

const resolutionSchema = z
  .string()
  .default('720,1280')
  .transform((value, ctx) => {
    try {
      return parseResolution(value);
    } catch (error) {
      if (!(error instanceof ConfigurationError)) throw error;
      error.issues.forEach((message) =>
        ctx.addIssue({ code: z.ZodIssueCode.custom, message }),
      );
      return z.NEVER;
    }
  });

const envSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(8888),
    CAMERA_SOURCE: z.enum(['directory', 'synthetic']).default('synthetic'),
    CAMERA_DIRECTORY: z.string().min(1).optional(),
    CAMERA_FORMAT: z.string().min(1).default('*.jpg'),
    CAMERA_CYCLE: flagSchema,
    CAMERA_RATE: z.coerce.number().int().positive().default(20),
    CAMERA_RESOLUTION: resolutionSchema,
    CAMERA_SAVE_PATH: z.string().min(1).optional(),
    CAMERA_RETAIN: z.coerce.number().int().positive().default(100),
    WS_HEARTBEAT_MS: z.coerce.number().int().positive().default(15_000),
    CORS_ORIGINS: z
      .string()
      .default('http://localhost:5173,http://127.0.0.1:5173'),
    LOG_LEVEL: z.string().default('info'),
  })
  .superRefine((env, ctx) => {
    if (env.CAMERA_SOURCE === 'directory' && !env.CAMERA_DIRECTORY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['CAMERA_DIRECTORY'],
        message: 'required when CAMERA_SOURCE=directory',
      });
    }
    if (env.CAMERA_SOURCE === 'synthetic' && !env.CAMERA_SAVE_PATH) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['CAMERA_SAVE_PATH'],
        message: 'required when CAMERA_SOURCE=synthetic',
      });
    }
  });

export interface AppConfig {
  port: number;
  rate: number;
  source: SourceConfig;
  heartbeatMs: number;
  corsOrigins: string[];
  logLevel: string;
}

/** Validates the environment. Every problem found is reported in one ConfigurationError. */
export function parseConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  const values = parsed.data;

  let source: SourceConfig;
  if (values.CAMERA_SOURCE === 'directory' && values.CAMERA_DIRECTORY) {
    source = {
      kind: 'directory',
      directory: path.resolve(values.CAMERA_DIRECTORY),
      format: values.CAMERA_FORMAT,
      cycle: values.CAMERA_CYCLE,
    };
  } else if (values.CAMERA_SOURCE === 'synthetic' && values.CAMERA_SAVE_PATH) {
    source = {
      kind: 'synthetic',
      resolution: values.CAMERA_RESOLUTION,
      savePath: path.resolve(values.CAMERA_SAVE_PATH),
      retain: values.CAMERA_RETAIN,
    };
  } else {
    throw new ConfigurationError([`CAMERA_SOURCE: ${values.CAMERA_SOURCE} is missing its path`]);
  }

  return {
    port: values.PORT,
    rate: values.CAMERA_RATE,
    source,
    heartbeatMs: values.WS_HEARTBEAT_MS,
    corsOrigins: values.CORS_ORIGINS.split(',').map((origin) => origin.trim()),
    logLevel: values.LOG_LEVEL,
  };
}

export function loadConfig(): AppConfig {
  loadEnv({
    path: path.resolve(process.cwd(), '.env'),
  });
  return parseConfig(process.env);
}
