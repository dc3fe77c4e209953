/**
 * Relay configuration
 *
 * Sources, highest precedence first:
 * 1. Environment variables
 * 2. A .env file, read with dotenv
 * 3. Schema defaults
 */
import { existsSync, readFileSync } from 'node:fs';
import * as dotenv from 'dotenv';
import { z } from 'zod';
import { DEFAULT_BASE_URL, DEFAULT_SITE } from '@qa-relay/fetch-client';
import { ValidationError } from '@qa-relay/fetch-retry';
import { formatZodIssues } from './schemas.mjs';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const RelayConfigSchema = z.object({
  apiKey: z.string().min(1).optional(),
  accessToken: z.string().min(1).optional(),
  baseUrl: z.string().url().default(DEFAULT_BASE_URL),
  site: z.string().min(1).default(DEFAULT_SITE),
  accessMode: z.enum(['auto', 'authenticated', 'unauthenticated']).default('auto'),
  maxConcurrentRequests: z.number().int().positive().default(5),
  maxQueueSize: z.number().int().positive().optional(),
  cacheTtlMs: z.number().positive().default(300_000),
  cacheMaxSize: z.number().int().positive().default(500),
  lowWaterMark: z.number().int().nonnegative().default(50),
  maxRetries: z.number().int().nonnegative().default(3),
  retryDelayMs: z.number().nonnegative().default(1000),
  maxRetryDelayMs: z.number().nonnegative().default(30_000),
  requestTimeoutMs: z.number().positive().default(30_000),
  logLevel: z.enum(LOG_LEVELS).default('info'),
  logPretty: z.boolean().default(false),
});

export type RelayConfig = z.output<typeof RelayConfigSchema>;
export type RelayConfigInput = z.input<typeof RelayConfigSchema>;

export type Environment = Record<string, string | undefined>;

/**
 * Environment variable behind each setting
 */
export const ENV_VARS: Readonly<Record<keyof RelayConfig, string>> = {
  apiKey: 'STACKOVERFLOW_API_KEY',
  accessToken: 'STACKOVERFLOW_ACCESS_TOKEN',
  baseUrl: 'STACKOVERFLOW_BASE_URL',
  site: 'STACKOVERFLOW_SITE',
  accessMode: 'ACCESS_MODE',
  maxConcurrentRequests: 'MAX_CONCURRENT_REQUESTS',
  maxQueueSize: 'MAX_QUEUE_SIZE',
  cacheTtlMs: 'CACHE_TTL',
  cacheMaxSize: 'CACHE_MAX_SIZE',
  lowWaterMark: 'QUOTA_LOW_WATER_MARK',
  maxRetries: 'MAX_RETRIES',
  retryDelayMs: 'RETRY_DELAY',
  maxRetryDelayMs: 'MAX_RETRY_DELAY',
  requestTimeoutMs: 'REQUEST_TIMEOUT',
  logLevel: 'LOG_LEVEL',
  logPretty: 'LOG_PRETTY',
};

function isConfigKey(key: unknown): key is keyof RelayConfig {
  return typeof key === 'string' && Object.prototype.hasOwnProperty.call(ENV_VARS, key);
}

function describeIssues(issues: readonly z.ZodIssue[], useEnvNames: boolean): string {
  if (!useEnvNames) {
    return formatZodIssues(issues);
  }
  return formatZodIssues(
    issues.map((issue) => {
      const [field, ...rest] = issue.path;
      return { path: isConfigKey(field) ? [ENV_VARS[field], ...rest] : issue.path, message: issue.message };
    })
  );
}

function parseWith(input: unknown, useEnvNames: boolean): RelayConfig {
  const result = RelayConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(`Invalid configuration: ${describeIssues(result.error.issues, useEnvNames)}`);
  }
  return result.data;
}

/**
 * Validate a configuration object and fill in defaults
 */
export function parseRelayConfig(input: RelayConfigInput = {}): RelayConfig {
  return parseWith(input, false);
}

function readString(env: Environment, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Unparseable numbers come back as NaN so the schema reports them
 */
function readNumber(env: Environment, name: string, scale = 1): number | undefined {
  const value = readString(env, name);
  return value === undefined ? undefined : Number(value) * scale;
}

function readBoolean(env: Environment, name: string): boolean | string | undefined {
  const value = readString(env, name)?.toLowerCase();
  if (value === undefined) {
    return undefined;
  }
  if (['1', 'true', 'yes', 'on'].includes(value)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(value)) {
    return false;
  }
  return value;
}

/**
 * Build the configuration from environment variables.
 * Durations given in seconds (CACHE_TTL, RETRY_DELAY, MAX_RETRY_DELAY,
 * REQUEST_TIMEOUT) are converted to milliseconds.
 */
export function loadConfigFromEnv(env: Environment = process.env): RelayConfig {
  const raw = {
    apiKey: readString(env, ENV_VARS.apiKey),
    accessToken: readString(env, ENV_VARS.accessToken),
    baseUrl: readString(env, ENV_VARS.baseUrl),
    site: readString(env, ENV_VARS.site),
    accessMode: readString(env, ENV_VARS.accessMode)?.toLowerCase(),
    maxConcurrentRequests: readNumber(env, ENV_VARS.maxConcurrentRequests),
    maxQueueSize: readNumber(env, ENV_VARS.maxQueueSize),
    cacheTtlMs: readNumber(env, ENV_VARS.cacheTtlMs, 1000),
    cacheMaxSize: readNumber(env, ENV_VARS.cacheMaxSize),
    lowWaterMark: readNumber(env, ENV_VARS.lowWaterMark),
    maxRetries: readNumber(env, ENV_VARS.maxRetries),
    retryDelayMs: readNumber(env, ENV_VARS.retryDelayMs, 1000),
    maxRetryDelayMs: readNumber(env, ENV_VARS.maxRetryDelayMs, 1000),
    requestTimeoutMs: readNumber(env, ENV_VARS.requestTimeoutMs, 1000),
    logLevel: readString(env, ENV_VARS.logLevel)?.toLowerCase(),
    logPretty: readBoolean(env, ENV_VARS.logPretty),
  };

  return parseWith(raw, true);
}

export interface LoadConfigOptions {
  /** Path of the .env file. Default: `.env` in the working directory, skipped when absent */
  envFile?: string;
  /** Default: process.env */
  env?: Environment;
}

/**
 * Load a .env file, then build the configuration from the environment.
 * Variables already set in the environment are not overridden by the file.
 */
export function loadConfig(options: LoadConfigOptions = {}): RelayConfig {
  const env = options.env ?? process.env;
  const envFile = options.envFile ?? '.env';

  if (!existsSync(envFile)) {
    if (options.envFile !== undefined) {
      throw new ValidationError(`Env file not found: ${envFile}`);
    }
    return loadConfigFromEnv(env);
  }

  const merged: Environment = dotenv.parse(readFileSync(envFile, 'utf-8'));
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }

  return loadConfigFromEnv(merged);
}
