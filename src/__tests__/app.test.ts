import { describe, it, before, after, beforeEach } from 'node:test';
import assert from 'node:assert';
import { once } from 'node:events';
import type { Server } from 'node:http';
import { createApp, createServices } from '../app.js';
import { clearEvents } from '../api/activity-log.js';
import { registerBuiltinHandlers } from '../handlers/index.js';
import { createLogger } from '../logger.js';
import type { GatewayConfig } from '../types.js';
import { RecordingDelivery, TEST_INTERACTION_ID, createSigner } from './helpers.js';

const signer = createSigner();
const TIMESTAMP = '1767225600';

const config: GatewayConfig = {
  port: 0,
  host: '127.0.0.1',
  discord: { publicKey: signer.publicKeyHex, applicationId: '123', apiBaseUrl: 'https://discord.test/api/v10' },
  interactions: { responseBudgetMs: 500, maxBodyBytes: 2048, signatureMaxAgeSeconds: 0, replayCacheTtlMs: 60000 },
  followUp: { maxAttempts: 1, initialDelayMs: 10, maxDelayMs: 10, timeoutMs: 100, windowMs: 60000 },
  logLevel: 'silent',
  debug: false,
  adminToken: 'test-admin-token',
};

describe('gateway app over HTTP', () => {
  let server: Server;
  let baseUrl: string;

  before(async () => {
    const services = createServices(config, { followUps: new RecordingDelivery(), log: createLogger('silent') });
    registerBuiltinHandlers(services.router);
    server = createApp(services).listen(0, '127.0.0.1');
    await once(server, 'listening');
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('Expected a TCP address');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  after(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  beforeEach(() => {
    clearEvents();
  });

  function postInteraction(body: string, signature?: string): Promise<Response> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json', 'X-Signature-Timestamp': TIMESTAMP };
    if (signature !== undefined) headers['X-Signature-Ed25519'] = signature;
    return fetch(`${baseUrl}/interactions`, { method: 'POST', headers, body });
  }

  const admin = { Authorization: 'Bearer test-admin-token' };

  it('reports health', async () => {
    const res = await fetch(`${baseUrl}/health`);
    assert.strictEqual(res.status, 200);
    const body: unknown = await res.json();
    assert.ok(typeof body === 'object' && body !== null);
    assert.ok('status' in body && body.status === 'ok');
    assert.ok('handlers' in body && body.handlers === 3);
    assert.ok('pendingFollowUps' in body && body.pendingFollowUps === 0);
  });

  it('answers a signed ping command with pong', async () => {
    const body = JSON.stringify({
      type: 2,
      id: TEST_INTERACTION_ID,
      token: 'test-token',
      data: { name: 'ping', type: 1 },
    });
    const res = await postInteraction(body, signer.sign(body, TIMESTAMP));
    assert.strictEqual(res.status, 200);
    assert.match(res.headers.get('content-type') ?? '', /^application\/json/);
    assert.strictEqual(await res.text(), '{"type":4,"data":{"content":"pong"}}');
  });

  it('answers the handshake', async () => {
    const body = '{"type":1}';
    const res = await postInteraction(body, signer.sign(body, TIMESTAMP));
    assert.strictEqual(res.status, 200);
    assert.strictEqual(await res.text(), '{"type":1}');
  });

  it('verifies against the exact bytes received', async () => {
    const body = '{ "type" : 1 }';
    const res = await postInteraction(body, signer.sign(body, TIMESTAMP));
    assert.strictEqual(res.status, 200);
  });

  it('rejects unsigned requests with an empty 401', async () => {
    const res = await postInteraction('{"type":1}');
    assert.strictEqual(res.status, 401);
    assert.strictEqual(await res.text(), '');
  });

  it('rejects bodies over the limit with 413', async () => {
    const body = JSON.stringify({ type: 1, padding: 'x'.repeat(4096) });
    const res = await postInteraction(body, signer.sign(body, TIMESTAMP));
    assert.strictEqual(res.status, 413);
    assert.strictEqual(await res.text(), '');
  });

  it('records rejected requests in the activity log', async () => {
    await postInteraction('{"type":1}', '0'.repeat(128));
    const res = await fetch(`${baseUrl}/api/activity?type=security`, { headers: admin });
    assert.strictEqual(res.status, 200);
    const body: unknown = await res.json();
    assert.ok(typeof body === 'object' && body !== null && 'count' in body);
    assert.strictEqual(body.count, 1);
  });

  it('rejects unknown activity types', async () => {
    const res = await fetch(`${baseUrl}/api/activity?type=bogus`, { headers: admin });
    assert.strictEqual(res.status, 400);
  });

  it('protects the management API with the admin token', async () => {
    const denied = await fetch(`${baseUrl}/api/stats`);
    assert.strictEqual(denied.status, 401);
    assert.deepStrictEqual(await denied.json(), { error: 'Unauthorized' });

    const wrong = await fetch(`${baseUrl}/api/stats`, { headers: { Authorization: 'Bearer wrong' } });
    assert.strictEqual(wrong.status, 401);

    const allowed = await fetch(`${baseUrl}/api/stats`, { headers: admin });
    assert.strictEqual(allowed.status, 200);
    const body: unknown = await allowed.json();
    assert.ok(typeof body === 'object' && body !== null);
    assert.ok('handlers' in body);
    assert.deepStrictEqual(body.handlers, { command: 2, component: 1, autocomplete: 0, modal: 0 });
    assert.ok('responseBudgetMs' in body && body.responseBudgetMs === 500);
  });

  it('answers unknown paths with 404', async () => {
    const res = await fetch(`${baseUrl}/nope`);
    assert.strictEqual(res.status, 404);
  });
});
