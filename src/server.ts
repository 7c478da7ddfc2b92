/**
 * Interactions Gateway
 *
 * Receives Discord HTTP interactions, verifies them, and dispatches them to
 * registered handlers under the 3-second response contract. Late results
 * go out as follow-ups over the webhook API.
 *
 * URL pattern: https://{public host}/interactions
 */

import { createApp, createServices } from './app.js';
import { loadConfig } from './config.js';
import { registerBuiltinHandlers } from './handlers/index.js';
import { createLogger } from './logger.js';
import type { GatewayConfig } from './types.js';
import { errorMessage } from './errors.js';

const SHUTDOWN_DRAIN_MS = 10000;
const REPLAY_CLEANUP_INTERVAL_MS = 60000;

// Load config (exits on failure)
let config: GatewayConfig;
try {
  config = loadConfig();
} catch (err) {
  console.error('[FATAL] Failed to load config:', errorMessage(err));
  process.exit(1);
}

const log = createLogger(config.logLevel);
const services = createServices(config, { log });
registerBuiltinHandlers(services.router);
services.replayCache.startCleanup(REPLAY_CLEANUP_INTERVAL_MS);

const app = createApp(services);

const server = app.listen(config.port, config.host, () => {
  const counts = services.router.counts();

  console.log('========================================');
  console.log('Discord Interactions Gateway');
  console.log('========================================');
  console.log(`Listen: ${config.host}:${config.port}`);
  console.log(`Application: ${config.discord.applicationId}`);
  console.log(`Discord API: ${config.discord.apiBaseUrl}`);
  console.log(`Response budget: ${config.interactions.responseBudgetMs}ms`);
  console.log(
    `Handlers: ${counts.command} command, ${counts.component} component, ${counts.autocomplete} autocomplete, ${counts.modal} modal`
  );
  console.log(`Follow-ups: ${config.followUp.maxAttempts} attempts, ${config.followUp.timeoutMs}ms timeout`);
  console.log(
    `Replay cache: ${config.interactions.replayCacheTtlMs > 0 ? `${config.interactions.replayCacheTtlMs}ms` : 'off'}`
  );
  console.log(`Admin auth: ${config.adminToken ? 'enabled' : 'DISABLED'}`);
  console.log(`Debug: ${config.debug}`);
  console.log('');
  console.log('Endpoints:');
  console.log('  POST /interactions   - Discord interactions endpoint');
  console.log('  GET  /health         - Health check');
  console.log('  GET  /api/activity   - Activity log');
  console.log('  GET  /api/stats      - Gateway stats');
  console.log('========================================');
});

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info({ signal }, 'Shutting down');

  await new Promise<void>((resolve) => server.close(() => resolve()));

  const remaining = await services.coordinator.drain(SHUTDOWN_DRAIN_MS);
  if (remaining > 0) {
    log.warn({ remaining }, 'Exiting with follow-ups still pending');
  }

  services.replayCache.stopCleanup();
  process.exit(0);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      log.error({ err }, `Shutdown failed: ${errorMessage(err)}`);
      process.exit(1);
    });
  });
}
