/**
 * Environment configuration for the ingestion service
 * Loads and validates environment variables once at startup; the result is
 * passed explicitly into the ingestion loop.
 */

import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';
import { isLogLevel, type LogLevel } from '../utils/logger';
import type { RunMode } from '../types/news';

type Env = Record<string, string | undefined>;

export interface EnvironmentConfig {
  finnhub: {
    apiKey: string;
    apiUrl: string;
    requestTimeoutMs: number;
  };
  supabase: {
    url: string;
    key: string;
  };
  ingestion: {
    category: string;
    table: string;
    fallbackMinId: number;
    fetchLimit: number;
  };
  scheduler: {
    runMode: RunMode;
    pollIntervalMs: number;
    minSleepMs: number;
    maxConsecutiveFailures: number;
  };
  logging: {
    level: LogLevel;
  };
}

export const REQUIRED_VARIABLES = ['FINNHUB_API_KEY', 'SUPABASE_URL', 'SUPABASE_KEY'];

// Largest delay setTimeout honours; anything above fires after 1ms
export const MAX_TIMER_MS = 2147483647;

const httpUrlSchema = z
  .string()
  .url()
  .refine(value => /^https?:\/\//i.test(value), 'must use http or https');

function readInt(env: Env, name: string, fallback: number, min = 1, max = Number.MAX_SAFE_INTEGER): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigurationError(`${name} must be an integer between ${min} and ${max}, got "${raw}"`);
  }
  return value;
}

function readUrl(env: Env, name: string, fallback: string): string {
  const raw = env[name] || fallback;
  const parsed = httpUrlSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`${name} must be an absolute http(s) URL, got "${raw}"`);
  }
  return parsed.data;
}

function readRunMode(env: Env): RunMode {
  const raw = (env.RUN_MODE || 'continuous').trim().toLowerCase();
  if (raw === 'once' || raw === 'continuous') {
    return raw;
  }
  throw new ConfigurationError(`RUN_MODE must be "once" or "continuous", got "${env.RUN_MODE}"`);
}

/**
 * Load and validate environment configuration
 * @throws ConfigurationError if required variables are missing or malformed
 */
export function loadEnvironmentConfig(env: Env = process.env): Readonly<EnvironmentConfig> {
  // SERVICE_ROLE_KEY bypasses RLS, which inserts into the news table need
  const apiKey = env.FINNHUB_API_KEY;
  const supabaseUrl = env.SUPABASE_URL || env.NEXT_PUBLIC_SUPABASE_URL;
  const supabaseKey = env.SUPABASE_KEY || env.SUPABASE_SERVICE_ROLE_KEY;

  const requiredVars = [
    { name: 'FINNHUB_API_KEY', value: apiKey },
    { name: 'SUPABASE_URL', value: supabaseUrl },
    { name: 'SUPABASE_KEY', value: supabaseKey }
  ];

  const missing = requiredVars.filter(varObj => !varObj.value).map(v => v.name);
  if (!apiKey || !supabaseUrl || !supabaseKey) {
    throw new ConfigurationError(
      `Missing required environment variables: ${missing.join(', ')}`,
      missing
    );
  }

  const level = (env.LOG_LEVEL || 'info').toLowerCase();

  const config: EnvironmentConfig = {
    finnhub: {
      apiKey,
      apiUrl: readUrl(env, 'NEWS_API_URL', 'https://finnhub.io/api/v1/news'),
      requestTimeoutMs: readInt(env, 'REQUEST_TIMEOUT_MS', 30000, 1, MAX_TIMER_MS)
    },
    supabase: {
      url: supabaseUrl,
      key: supabaseKey
    },
    ingestion: {
      category: env.NEWS_CATEGORY || 'forex',
      table: env.NEWS_TABLE || 'forex_news',
      fallbackMinId: readInt(env, 'FALLBACK_MIN_ID', 10, 0),
      fetchLimit: readInt(env, 'FETCH_LIMIT', 10)
    },
    scheduler: {
      runMode: readRunMode(env),
      pollIntervalMs: readInt(env, 'POLL_INTERVAL_MS', 60000, 1, MAX_TIMER_MS),
      minSleepMs: readInt(env, 'MIN_SLEEP_MS', 1000, 1, MAX_TIMER_MS),
      maxConsecutiveFailures: readInt(env, 'MAX_CONSECUTIVE_FAILURES', 5)
    },
    logging: {
      level: isLogLevel(level) ? level : 'info'
    }
  };

  return Object.freeze(config);
}
