/**
 * Bridge Server Tests
 *
 * Real `ws` server on an ephemeral loopback port; clients are `ws` sockets
 * or a full OverlaySocket over wsSocketFactory.
 */

import { once } from 'node:events';
import { describe, it, expect, afterEach } from 'vitest';
import WebSocket from 'ws';
import { startBridgeServer, type BridgeOptions, type BridgeServer } from '../../src/bridge/bridge-server';
import { OverlaySocket } from '../../src/transport/OverlaySocket';
import type { InboundMessage } from '../../src/transport/messages';
import { wsSocketFactory } from '../../src/transport/ws-socket';
import { SILENT_LOGGER } from '../../src/utils/log';

type Frame = Record<string, unknown>;

function isFrame(value: unknown): value is Frame {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function waitUntil(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) throw new Error('condition not met in time');
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
}

class TestClient {
  readonly frames: Frame[] = [];
  readonly closed: Promise<{ code: number; reason: string }>;

  constructor(readonly ws: WebSocket) {
    ws.on('message', (data) => {
      const parsed: unknown = JSON.parse(data.toString());
      if (isFrame(parsed)) this.frames.push(parsed);
    });
    this.closed = new Promise((resolve) => {
      ws.on('close', (code, reason) => resolve({ code, reason: reason.toString() }));
    });
  }

  async next(type: string): Promise<Frame> {
    await waitUntil(() => this.frames.some((frame) => frame.type === type));
    const frame = this.frames.find((candidate) => candidate.type === type);
    if (!frame) throw new Error(`no ${type} frame`);
    return frame;
  }

  send(payload: object): void {
    this.ws.send(JSON.stringify(payload));
  }
}

const running: BridgeServer[] = [];
const clients: WebSocket[] = [];

async function start(options: BridgeOptions = {}): Promise<BridgeServer> {
  const server = startBridgeServer({ port: 0, logger: SILENT_LOGGER, ...options });
  running.push(server);
  await server.listening;
  return server;
}

async function connect(url: string): Promise<TestClient> {
  const ws = new WebSocket(url);
  clients.push(ws);
  const client = new TestClient(ws);
  await once(ws, 'open');
  return client;
}

afterEach(async () => {
  for (const ws of clients.splice(0)) ws.terminate();
  await Promise.all(running.splice(0).map((server) => server.shutdown()));
});

describe('startBridgeServer', () => {
  it('greets a new overlay with hello', async () => {
    const server = await start();
    const client = await connect(server.url);
    expect(await client.next('hello')).toEqual({ type: 'hello', version: 1, requiresAuth: false });
    expect(server.url).toMatch(/^ws:\/\/127\.0\.0\.1:\d+\/gacha$/);
  });

  it('rejects clients on the wrong path', async () => {
    const server = await start();
    const client = await connect(server.url.replace('/gacha', '/other'));
    expect(await client.closed).toEqual({ code: 1008, reason: 'Invalid overlay path' });
  });

  it('answers ping with pong', async () => {
    const server = await start();
    const client = await connect(server.url);
    client.send({ type: 'ping', ts: 99 });
    expect(await client.next('pong')).toEqual({ type: 'pong', ts: 99 });
  });

  describe('token auth', () => {
    it('acknowledges a ready with the right token', async () => {
      const server = await start({ token: 'test-secret' });
      const client = await connect(server.url);
      expect(await client.next('hello')).toEqual({ type: 'hello', version: 1, requiresAuth: true });
      expect(server.clients()[0].authenticated).toBe(false);

      client.send({ type: 'ready', token: 'test-secret' });
      await client.next('ready_ack');
      expect(server.clients()[0].authenticated).toBe(true);
    });

    it('closes with 4003 on a wrong token', async () => {
      const server = await start({ token: 'test-secret' });
      const client = await connect(server.url);
      client.send({ type: 'ready', token: 'wrong' });
      expect(await client.next('error')).toEqual({ type: 'error', code: 'unauthorized' });
      expect(await client.closed).toEqual({ code: 4003, reason: 'Invalid token' });
    });

    it('withholds broadcasts from unauthenticated clients', async () => {
      const server = await start({ token: 'test-secret' });
      await connect(server.url);
      await waitUntil(() => server.clients().length === 1);
      await expect(server.broadcastClear()).resolves.toBe(false);
    });
  });

  describe('broadcast', () => {
    it('is false with nobody connected', async () => {
      const server = await start();
      await expect(server.broadcastClear()).resolves.toBe(false);
    });

    it('delivers the pulls envelope', async () => {
      const server = await start();
      const client = await connect(server.url);
      await client.next('hello');

      const delivered = await server.broadcastPulls({
        userId: 'user-1',
        totalPulls: 1,
        pulls: [{ name: 'fire_imp', rarity: 'R', level: 2 }],
        displayName: 'Tester',
      });
      expect(delivered).toBe(true);

      const frame = await client.next('gacha_pulls');
      const payload = frame.payload;
      if (!isFrame(payload)) throw new Error('missing payload');
      expect(typeof payload.timestamp).toBe('number');
      expect({ ...payload, timestamp: 0 }).toEqual({
        userId: 'user-1',
        totalPulls: 1,
        pulls: [{ name: 'fire_imp', rarity: 'R', level: 2 }],
        timestamp: 0,
        displayName: 'Tester',
        setName: '',
      });
    });
  });

  it('feeds an OverlaySocket end to end', async () => {
    const server = await start({ token: 'test-secret' });
    const received: InboundMessage[] = [];
    const socket = new OverlaySocket({
      url: server.url,
      token: 'test-secret',
      factory: wsSocketFactory,
      logger: SILENT_LOGGER,
      onMessage: (message) => received.push(message),
    });
    socket.connect();
    try {
      await waitUntil(() => server.clients().some((client) => client.authenticated));
      await server.broadcastPulls({
        userId: 'user-1',
        totalPulls: 1,
        pulls: [{ name: 'fire_imp', rarity: 'R', level: 2, image_path: 'cards/fire_imp.png' }],
        setName: 'ember_wilds',
      });
      await waitUntil(() => received.some((message) => message.type === 'gacha_pulls'));

      const pulls = received.find((message) => message.type === 'gacha_pulls');
      expect(pulls).toEqual({
        type: 'gacha_pulls',
        pulls: [{ name: 'fire_imp', rarity: 'R', isShiny: false, level: 2, imageRef: 'cards/fire_imp.png' }],
        meta: { totalPulls: 1, displayName: '', userId: 'user-1', setName: 'Ember Wilds' },
      });
      expect(received.map((message) => message.type)).toEqual(['unknown', 'unknown', 'gacha_pulls']);
    } finally {
      socket.close();
    }
  });

  it('closes every client with 1001 on shutdown', async () => {
    const server = await start();
    const client = await connect(server.url);
    await client.next('hello');
    await server.shutdown();
    running.splice(running.indexOf(server), 1);
    expect(await client.closed).toEqual({ code: 1001, reason: 'Server shutting down' });
  });
});
