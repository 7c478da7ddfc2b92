import { describe, it } from 'node:test';
import assert from 'node:assert';
import { loadConfig } from '../config.js';

const PUBLIC_KEY = 'a'.repeat(64);

const minimal = { DISCORD_PUBLIC_KEY: PUBLIC_KEY, DISCORD_APPLICATION_ID: '123456789012345678' };

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig(minimal);
    assert.deepStrictEqual(config, {
      port: 3023,
      host: '127.0.0.1',
      discord: {
        publicKey: PUBLIC_KEY,
        applicationId: '123456789012345678',
        apiBaseUrl: 'https://discord.com/api/v10',
      },
      interactions: {
        responseBudgetMs: 2500,
        maxBodyBytes: 262144,
        signatureMaxAgeSeconds: 0,
        replayCacheTtlMs: 900000,
      },
      followUp: {
        maxAttempts: 5,
        initialDelayMs: 500,
        maxDelayMs: 30000,
        timeoutMs: 10000,
        windowMs: 900000,
      },
      logLevel: 'info',
      debug: false,
      adminToken: '',
    });
  });

  it('reads overrides', () => {
    const config = loadConfig({
      ...minimal,
      PORT: '8080',
      HOST: '0.0.0.0',
      DISCORD_API_BASE_URL: 'http://localhost:9999/api/',
      RESPONSE_BUDGET_MS: '2000',
      REPLAY_CACHE_TTL_MS: '0',
      FOLLOWUP_MAX_ATTEMPTS: '3',
      LOG_LEVEL: 'warn',
      ADMIN_TOKEN: 'test-secret',
    });
    assert.strictEqual(config.port, 8080);
    assert.strictEqual(config.host, '0.0.0.0');
    assert.strictEqual(config.discord.apiBaseUrl, 'http://localhost:9999/api');
    assert.strictEqual(config.interactions.responseBudgetMs, 2000);
    assert.strictEqual(config.interactions.replayCacheTtlMs, 0);
    assert.strictEqual(config.followUp.maxAttempts, 3);
    assert.strictEqual(config.logLevel, 'warn');
    assert.strictEqual(config.adminToken, 'test-secret');
  });

  it('forces debug logging when DEBUG is true', () => {
    const config = loadConfig({ ...minimal, DEBUG: 'true', LOG_LEVEL: 'warn' });
    assert.strictEqual(config.debug, true);
    assert.strictEqual(config.logLevel, 'debug');
  });

  it('lists every problem in one error', () => {
    assert.throws(
      () => loadConfig({ DISCORD_PUBLIC_KEY: 'xyz', PORT: 'eighty', RESPONSE_BUDGET_MS: '5000' }),
      (err: unknown) => {
        assert.ok(err instanceof Error);
        assert.strictEqual(
          err.message,
          [
            'Invalid configuration:',
            '  - DISCORD_PUBLIC_KEY must be 64 hex characters',
            '  - DISCORD_APPLICATION_ID is required',
            '  - PORT must be an integer between 0 and 65535, got "eighty"',
            '  - RESPONSE_BUDGET_MS must be an integer between 1 and 2900, got "5000"',
          ].join('\n')
        );
        return true;
      }
    );
  });

  it('rejects unknown log levels and non-http API URLs', () => {
    assert.throws(
      () => loadConfig({ ...minimal, LOG_LEVEL: 'loud', DISCORD_API_BASE_URL: 'ftp://x' }),
      /DISCORD_API_BASE_URL must be an http\(s\) URL\n {2}- LOG_LEVEL must be one of/
    );
  });
});
