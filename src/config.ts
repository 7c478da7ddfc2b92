/**
 * Interactions Gateway - Configuration
 *
 * Loads configuration from environment variables (and .env via dotenv).
 * Every problem is collected so one failed start reports all of them.
 */

import * as dotenv from 'dotenv';
import type { GatewayConfig } from './types.js';

dotenv.config();

const DEFAULT_API_BASE_URL = 'https://discord.com/api/v10';
const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

type Env = Record<string, string | undefined>;

class EnvReader {
  readonly problems: string[] = [];

  constructor(private readonly env: Env) {}

  string(key: string, fallback: string): string {
    const value = this.env[key]?.trim();
    return value ? value : fallback;
  }

  required(key: string, pattern: RegExp, expected: string): string {
    const value = this.env[key]?.trim() ?? '';
    if (!value) {
      this.problems.push(`${key} is required`);
    } else if (!pattern.test(value)) {
      this.problems.push(`${key} must be ${expected}`);
    }
    return value;
  }

  integer(key: string, fallback: number, min: number, max: number = Number.MAX_SAFE_INTEGER): number {
    const raw = this.env[key]?.trim();
    if (!raw) return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min || value > max) {
      this.problems.push(`${key} must be an integer between ${min} and ${max}, got "${raw}"`);
      return fallback;
    }
    return value;
  }
}

/**
 * Build GatewayConfig from env. Throws one Error listing every problem.
 */
export function loadConfig(env: Env = process.env): GatewayConfig {
  const read = new EnvReader(env);

  const publicKey = read.required('DISCORD_PUBLIC_KEY', /^[0-9a-f]{64}$/i, '64 hex characters');
  const applicationId = read.required('DISCORD_APPLICATION_ID', /^\d{1,20}$/, 'a numeric snowflake');

  const apiBaseUrl = read.string('DISCORD_API_BASE_URL', DEFAULT_API_BASE_URL).replace(/\/+$/, '');
  if (!/^https?:\/\//.test(apiBaseUrl)) {
    read.problems.push('DISCORD_API_BASE_URL must be an http(s) URL');
  }

  const debug = env.DEBUG === 'true';
  const logLevel = debug ? 'debug' : read.string('LOG_LEVEL', 'info');
  if (!LOG_LEVELS.includes(logLevel)) {
    read.problems.push(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`);
  }

  const config: GatewayConfig = {
    port: read.integer('PORT', 3023, 0, 65535),
    host: read.string('HOST', '127.0.0.1'),
    discord: { publicKey, applicationId, apiBaseUrl },
    interactions: {
      responseBudgetMs: read.integer('RESPONSE_BUDGET_MS', 2500, 1, 2900),
      maxBodyBytes: read.integer('MAX_BODY_BYTES', 262144, 1024),
      signatureMaxAgeSeconds: read.integer('SIGNATURE_MAX_AGE_SECONDS', 0, 0),
      replayCacheTtlMs: read.integer('REPLAY_CACHE_TTL_MS', 900000, 0),
    },
    followUp: {
      maxAttempts: read.integer('FOLLOWUP_MAX_ATTEMPTS', 5, 1, 20),
      initialDelayMs: read.integer('FOLLOWUP_INITIAL_DELAY_MS', 500, 0),
      maxDelayMs: read.integer('FOLLOWUP_MAX_DELAY_MS', 30000, 0),
      timeoutMs: read.integer('FOLLOWUP_TIMEOUT_MS', 10000, 1),
      windowMs: read.integer('FOLLOWUP_WINDOW_MS', 900000, 1),
    },
    logLevel,
    debug,
    adminToken: read.string('ADMIN_TOKEN', ''),
  };

  if (read.problems.length > 0) {
    throw new Error(`Invalid configuration:\n  - ${read.problems.join('\n  - ')}`);
  }

  return config;
}
